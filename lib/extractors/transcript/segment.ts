import { isBlankLine, normalizeWhitespace, splitRawLines } from "../common";
import { isIdentityLine, parseNameLine } from "./fields";
import { extractParcoursInfo } from "./header";
import type { ParcoursInfo, RawStudentBlock, SegmentedDocument } from "./types";

function nextNonBlank(lines: string[], from: number): string | undefined {
  for (let i = from; i < lines.length; i += 1) {
    if (!isBlankLine(lines[i])) return lines[i];
  }
  return undefined;
}

/** Pass 1: line indexes where a student block starts (name line, then an identity line after any blank lines). */
export function findBlockAnchors(lines: string[]): number[] {
  const anchors: number[] = [];
  for (let i = 0; i < lines.length - 1; i += 1) {
    if (!parseNameLine(lines[i])) continue;
    if (!isIdentityLine(nextNonBlank(lines, i + 1))) continue;
    anchors.push(i);
  }
  return anchors;
}

function isPageHeader(line: string, marker: string) {
  return !!marker && normalizeWhitespace(line).startsWith(marker);
}

/** A block stops at the first blank line that is followed by a page header. */
function cutAtPageHeader(lines: string[], marker: string): string[] {
  for (let i = 1; i < lines.length; i += 1) {
    if (isBlankLine(lines[i - 1]) && isPageHeader(lines[i], marker)) {
      return lines.slice(0, i);
    }
  }
  return lines;
}

function trimTrailingBlank(lines: string[]): string[] {
  let end = lines.length;
  while (end > 0 && isBlankLine(lines[end - 1])) end -= 1;
  return lines.slice(0, end);
}

/** Pass 2: slice between consecutive anchors, the last slice running to end of document. */
export function sliceBlocks(lines: string[], anchors: number[], pageHeaderMarker: string): RawStudentBlock[] {
  const marker = normalizeWhitespace(pageHeaderMarker);
  return anchors.map((start, index) => {
    const end = anchors[index + 1] ?? lines.length;
    const body = trimTrailingBlank(cutAtPageHeader(lines.slice(start, end), marker));
    return { index, startLine: start + 1, text: body.join("\n") };
  });
}

export function segmentDocument(
  text: string,
  opts: { pageHeaderMarker: string; placeholders: ParcoursInfo }
): SegmentedDocument {
  const lines = splitRawLines(text);
  const header = extractParcoursInfo(lines.join("\n"), opts.placeholders);
  const blocks = sliceBlocks(lines, findBlockAnchors(lines), opts.pageHeaderMarker);
  return { ...header, blocks };
}
