export function normalizeWhitespace(s: string) {
  return (s || "").replace(/\r/g, "").replace(/[ \t\u00a0]+/g, " ").trim();
}

/** Drop a leading BOM and fold CRLF / CR line endings into "\n". */
export function normalizeDocumentText(text: string) {
  return (text || "").replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
}

/** Lines with blank ones kept; block boundaries depend on them. */
export function splitRawLines(text: string): string[] {
  return normalizeDocumentText(text).split("\n");
}

export function isBlankLine(line: string | undefined) {
  return !line || !line.trim();
}

/** "14,5" -> 14.5; null when the text is not a plain decimal. */
export function parseDecimal(raw: string): number | null {
  const v = (raw || "").trim().replace(/,/g, ".");
  if (!/^\d+(\.\d*)?$/.test(v)) return null;
  const n = Number(v);
  return Number.isFinite(n) ? n : null;
}
