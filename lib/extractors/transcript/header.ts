import type { ParcoursField, ParcoursInfo, ParcoursResult } from "./types";

export const ENROLLMENT_RE = /inscrite?\s+en\s+Semestre\s+(\d+)\s+(\S+)/;

const FULL_YEAR_RE = /Année\s+universitaire\s*:?\s*(\d{4})\s*\/\s*(\d{4})\b/;
const SESSION_YEAR_RE = /Session\s+S\d+\s+(\d{4})\s*\/\s*(\d{4}|\d{2})\b/;

/** "2022/23" -> "2022-2023"; a 4-digit end year is kept as written. */
export function normalizeAcademicYear(start: string, end: string) {
  const endYear = end.length === 2 ? `20${end}` : end;
  return `${start}-${endYear}`;
}

export function extractAcademicYear(text: string): string | null {
  const full = text.match(FULL_YEAR_RE);
  if (full) return normalizeAcademicYear(full[1], full[2]);

  const session = text.match(SESSION_YEAR_RE);
  if (session) return normalizeAcademicYear(session[1], session[2]);

  return null;
}

export function extractSemesterAndTrack(text: string): { semester: string; track: string } | null {
  const m = text.match(ENROLLMENT_RE);
  if (!m) return null;
  return { semester: m[1], track: m[2] };
}

/**
 * Document-level metadata. Read once per document: the first enrollment line
 * decides the track and semester for every student in it.
 */
export function extractParcoursInfo(text: string, placeholders: ParcoursInfo): ParcoursResult {
  const warnings: string[] = [];
  const defaultedFields: ParcoursField[] = [];

  const enrollment = extractSemesterAndTrack(text);
  const academicYear = extractAcademicYear(text);

  const parcours: ParcoursInfo = {
    track: enrollment?.track ?? placeholders.track,
    semester: enrollment?.semester ?? placeholders.semester,
    academicYear: academicYear ?? placeholders.academicYear,
  };

  if (!enrollment) defaultedFields.push("track", "semester");
  if (!academicYear) defaultedFields.push("academicYear");
  for (const field of defaultedFields) {
    warnings.push(`${field}: not detected, using "${parcours[field]}"`);
  }

  return { parcours, defaultedFields, warnings };
}
