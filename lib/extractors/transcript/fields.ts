import { isBlankLine, normalizeWhitespace } from "../common";
import { ENROLLMENT_RE } from "./header";
import type { RawStudentBlock, StudentFieldsOutcome } from "./types";

const UPPER = "A-ZÀ-ÖØ-Þ";
const LETTER = "A-Za-zÀ-ÖØ-öø-ÿ";

// "MARTIN DE LA TOUR Anne-Sophie": upper-case family name, then the given name.
export const NAME_LINE_RE = new RegExp(
  `^([${UPPER}]+(?:[ '-][${UPPER}]+)*)\\s+([${LETTER}'-]+(?:\\s[${LETTER}'-]+)*)$`
);
export const STUDENT_NUMBER_RE = /^N°\s*[EÉ]tudiant\s*:\s*(\d+)(?:\s+INE\s*:\s*(\S+))?/;
export const BIRTH_DATE_RE = /^Née?\s+le\s*:/;
export const UNIT_MARKER_RE = /^UE\d/;

export function parseNameLine(line: string): { familyName: string; givenName: string } | null {
  const m = normalizeWhitespace(line).match(NAME_LINE_RE);
  if (!m) return null;
  return { familyName: m[1], givenName: m[2] };
}

/** Lines that may follow a student's name line. */
export function isIdentityLine(line: string | undefined) {
  const v = normalizeWhitespace(line || "");
  if (!v) return false;
  return STUDENT_NUMBER_RE.test(v) || BIRTH_DATE_RE.test(v) || ENROLLMENT_RE.test(v);
}

function labelFor(block: RawStudentBlock) {
  const first = block.text.split("\n").find((l) => !isBlankLine(l)) ?? "";
  return normalizeWhitespace(first).slice(0, 80) || `block #${block.index + 1}`;
}

/**
 * Splits one student block into identity fields and the notes text.
 * Never throws: a block missing any required line comes back as skipped with its cause.
 */
export function extractStudentFields(block: RawStudentBlock): StudentFieldsOutcome {
  const label = labelFor(block);
  const skipped = (cause: string): StudentFieldsOutcome => ({ status: "skipped", label, cause });

  const lines = block.text.split("\n").map((l) => normalizeWhitespace(l));
  const nameIdx = lines.findIndex((l) => !!l);
  if (nameIdx === -1) return skipped("empty block");

  const name = parseNameLine(lines[nameIdx]);
  if (!name) return skipped("name line not recognised");

  const notesIdx = lines.findIndex((l, i) => i > nameIdx && UNIT_MARKER_RE.test(l));
  const identityLines = lines.slice(nameIdx + 1, notesIdx === -1 ? lines.length : notesIdx);

  let studentNumber: string | null = null;
  let ine: string | null = null;
  for (const l of identityLines) {
    const m = l.match(STUDENT_NUMBER_RE);
    if (!m) continue;
    studentNumber = m[1];
    ine = m[2] ?? null;
    break;
  }

  if (!studentNumber) return skipped("missing student number line");
  if (!identityLines.some((l) => BIRTH_DATE_RE.test(l))) return skipped("missing birth date line");
  if (!identityLines.some((l) => ENROLLMENT_RE.test(l))) return skipped("missing semester enrollment line");
  if (notesIdx === -1) return skipped("missing notes section");

  const notesText = block.text
    .split("\n")
    .slice(notesIdx)
    .join("\n")
    .trim();

  return {
    status: "parsed",
    familyName: name.familyName,
    givenName: name.givenName,
    studentNumber,
    ine,
    notesText,
  };
}
