import * as XLSX from "xlsx";
import { exportAll, type TermFilters, type TranscriptRow } from "@/lib/db/queries";
import type { TranscriptStore } from "@/lib/db/store";

export const WORKBOOK_SHEET = "Grades";

export const WORKBOOK_COLUMNS = [
  "Family name",
  "Given name",
  "Student number",
  "Track",
  "Academic year",
  "Semester",
  "Unit",
  "Course",
  "Score",
  "Is unit",
] as const;

type WorkbookRecord = Record<(typeof WORKBOOK_COLUMNS)[number], string | number>;

export function toWorkbookRecord(row: TranscriptRow): WorkbookRecord {
  return {
    "Family name": row.familyName,
    "Given name": row.givenName,
    "Student number": row.studentNumber ?? "",
    Track: row.track,
    "Academic year": row.academicYear,
    Semester: row.semester,
    Unit: row.unitCode,
    Course: row.courseName,
    Score: row.score,
    "Is unit": row.isUnit ? 1 : 0,
  };
}

export function buildWorkbook(rows: TranscriptRow[]): XLSX.WorkBook {
  const sheet = XLSX.utils.json_to_sheet(rows.map(toWorkbookRecord), { header: [...WORKBOOK_COLUMNS] });
  const book = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(book, sheet, WORKBOOK_SHEET);
  return book;
}

/** The joined export as a single-sheet .xlsx file. */
export async function exportWorkbook(store: TranscriptStore, filters: TermFilters = {}): Promise<Buffer> {
  const rows = await exportAll(store, filters);
  const out: unknown = XLSX.write(buildWorkbook(rows), { type: "buffer", bookType: "xlsx" });
  if (!Buffer.isBuffer(out)) throw new Error("xlsx did not return a buffer");
  return out;
}
