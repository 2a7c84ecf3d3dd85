export { closeStore, openStore, withStore } from "@/lib/db/store";
export type { StoreOptions, TranscriptStore } from "@/lib/db/store";
export { deleteWhere, exportAll, getStudentGrades, listDistinct, listStudents } from "@/lib/db/queries";
export type {
  DistinctDimension,
  GradeFilters,
  StoredStudent,
  TermFilters,
  TranscriptRow,
} from "@/lib/db/queries";
export { importDocument, importTranscript, previewDocument } from "@/lib/imports/importTranscript";
export type { ImportOptions, ImportSummary, TranscriptInput, TranscriptPreview } from "@/lib/imports/importTranscript";
export { exportWorkbook } from "@/lib/exports/workbook";
export { TranscriptImportError, isTranscriptImportError } from "./errors";
export type { TranscriptErrorCode } from "./errors";
export { parseTranscript } from "@/lib/extractors/transcript";
export type { GradeEntry, ParcoursInfo, ParsedTranscript, StudentRecord } from "@/lib/extractors/transcript/types";
