import { reportTranscriptError } from "@/lib/api/errors";
import { log } from "@/lib/ops/logger";
import { extractStudentFields } from "./fields";
import { buildGradeTree } from "./grades";
import { segmentDocument } from "./segment";
import type { ParsedStudent, ParsedTranscript, SkippedStudent, TranscriptParseOptions } from "./types";

export * from "./types";
export { extractParcoursInfo, normalizeAcademicYear } from "./header";
export { extractStudentFields } from "./fields";
export { findBlockAnchors, segmentDocument, sliceBlocks } from "./segment";
export { buildGradeTree, splitUnitSections } from "./grades";

export function parseTranscript(text: string, opts: TranscriptParseOptions): ParsedTranscript {
  const { source } = opts;
  const doc = segmentDocument(text, opts);

  if (doc.defaultedFields.length) {
    if (opts.strictHeader) {
      throw reportTranscriptError({
        code: "HEADER_UNRESOLVED",
        operation: "parseTranscript",
        message: `Transcript header incomplete: ${doc.defaultedFields.join(", ")} not found`,
        details: { source, defaultedFields: doc.defaultedFields },
      });
    }
    log.warn("header_defaulted", { source, defaultedFields: doc.defaultedFields, parcours: doc.parcours });
  }

  const students: ParsedStudent[] = [];
  const skipped: SkippedStudent[] = [];

  for (const block of doc.blocks) {
    const fields = extractStudentFields(block);
    if (fields.status === "skipped") {
      skipped.push({ blockIndex: block.index, startLine: block.startLine, label: fields.label, cause: fields.cause });
      log.warn("student_skipped", { source, line: block.startLine, student: fields.label, cause: fields.cause });
      continue;
    }

    const tree = buildGradeTree(fields.notesText);
    const student = `${fields.familyName} ${fields.givenName}`;
    for (const warning of tree.warnings) {
      log.warn("grade_warning", { source, student, line: block.startLine, warning });
    }

    students.push({
      record: {
        familyName: fields.familyName,
        givenName: fields.givenName,
        studentNumber: fields.studentNumber,
        ...doc.parcours,
      },
      grades: tree.grades,
      blockIndex: block.index,
      startLine: block.startLine,
      warnings: tree.warnings,
    });
  }

  if (!students.length) log.warn("no_students_found", { source, blocks: doc.blocks.length });
  else log.info("transcript_parsed", { source, students: students.length, skipped: skipped.length });

  return {
    source,
    parcours: doc.parcours,
    defaultedFields: doc.defaultedFields,
    warnings: doc.warnings,
    students,
    skipped,
  };
}
