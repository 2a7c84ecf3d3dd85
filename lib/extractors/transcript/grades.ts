import { normalizeWhitespace, parseDecimal } from "../common";
import { UNIT_MARKER_RE } from "./fields";
import type { GradeEntry, GradeTreeResult } from "./types";

const UNIT_SCORE_RE = /^(UE\d+[A-Z]*)\b(.*?)\s+(\d[\d.,]*)\s*\/\s*20\b/;
const COURSE_SCORE_RE = /^(.+?)\s+(\d[\d.,]*)\s*\/\s*20\b/;

// Column headers that survive the text export and look like scored lines.
const HEADER_REMNANTS = ["Note/Barème", "Note :"];

export type UnitSection = {
  unitCode: string | null;
  markerLine: string;
  scoreText: string | null;
  body: string[];
};

export function isHeaderRemnant(label: string) {
  return HEADER_REMNANTS.some((h) => label.includes(h));
}

/** Each unit marker line owns the lines up to the next marker. */
export function splitUnitSections(notesText: string): UnitSection[] {
  const lines = (notesText || "").split("\n").map((l) => normalizeWhitespace(l));
  const markers: number[] = [];
  lines.forEach((l, i) => {
    if (UNIT_MARKER_RE.test(l)) markers.push(i);
  });

  return markers.map((start, k) => {
    const end = markers[k + 1] ?? lines.length;
    const markerLine = lines[start];
    const m = markerLine.match(UNIT_SCORE_RE);
    return {
      unitCode: m ? m[1] : null,
      markerLine,
      scoreText: m ? m[3] : null,
      body: lines.slice(start + 1, end).filter(Boolean),
    };
  });
}

function toScore(raw: string, label: string, warnings: string[]) {
  const n = parseDecimal(raw);
  if (n === null) {
    warnings.push(`score: "${raw}" for ${label} is not a number, stored as 0`);
    return 0;
  }
  return n;
}

function courseEntries(section: UnitSection, unitCode: string, warnings: string[]): GradeEntry[] {
  const out: GradeEntry[] = [];
  for (const line of section.body) {
    const m = line.match(COURSE_SCORE_RE);
    if (!m) continue;
    const courseName = normalizeWhitespace(m[1]);
    if (!courseName || isHeaderRemnant(courseName)) continue;
    out.push({ unitCode, courseName, score: toScore(m[2], courseName, warnings), isUnit: false });
  }
  return out;
}

/**
 * Flat, parent-tagged grade list: every unit entry is followed by its courses.
 * Courses under an unscored unit marker have no unit entry to hang on and are dropped.
 */
export function buildGradeTree(notesText: string): GradeTreeResult {
  const warnings: string[] = [];
  const grades: GradeEntry[] = [];

  for (const section of splitUnitSections(notesText)) {
    if (!section.unitCode || section.scoreText === null) {
      const orphans = section.body.filter((l) => COURSE_SCORE_RE.test(l) && !isHeaderRemnant(l));
      if (orphans.length) {
        warnings.push(`unit: "${section.markerLine}" has no score, ${orphans.length} course line(s) dropped`);
      }
      continue;
    }

    const unitCode = section.unitCode;
    grades.push({
      unitCode,
      courseName: unitCode,
      score: toScore(section.scoreText, unitCode, warnings),
      isUnit: true,
    });
    grades.push(...courseEntries(section, unitCode, warnings));
  }

  return { grades, warnings };
}
