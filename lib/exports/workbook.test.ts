import * as XLSX from "xlsx";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { closeStore, type TranscriptStore } from "@/lib/db/store";
import type { TranscriptRow } from "@/lib/db/queries";
import { importTranscript } from "@/lib/imports/importTranscript";
import { fixturePath, memoryStore } from "@/tests/support";
import { exportWorkbook, toWorkbookRecord, WORKBOOK_COLUMNS, WORKBOOK_SHEET } from "./workbook";

let store: TranscriptStore;

beforeEach(async () => {
  store = await memoryStore();
});

afterEach(async () => {
  await closeStore(store);
});

function readSheet(buffer: Buffer) {
  const book = XLSX.read(buffer, { type: "buffer" });
  expect(book.SheetNames).toEqual([WORKBOOK_SHEET]);
  return book.Sheets[WORKBOOK_SHEET];
}

describe("exportWorkbook", () => {
  it("writes one header row and one row per grade", async () => {
    await importTranscript(store, { path: fixturePath("releve-s7.txt") });
    const sheet = readSheet(await exportWorkbook(store));

    const table: unknown[][] = XLSX.utils.sheet_to_json(sheet, { header: 1 });
    expect(table[0]).toEqual([...WORKBOOK_COLUMNS]);
    expect(table).toHaveLength(14);
    expect(table[1]).toEqual(["DUPONT", "Jean", "11111111", "M1-API", "2022-2023", "7", "UE701", "UE701", 14.5, 1]);
    expect(table[2]).toEqual([
      "DUPONT",
      "Jean",
      "11111111",
      "M1-API",
      "2022-2023",
      "7",
      "UE701",
      "Algorithmique",
      12,
      0,
    ]);
  });

  it("honours term filters", async () => {
    await importTranscript(store, { path: fixturePath("releve-s7.txt") });
    await importTranscript(store, { path: fixturePath("releve-s8-malformed.txt") });
    const sheet = readSheet(await exportWorkbook(store, { semester: "8" }));

    const table: unknown[][] = XLSX.utils.sheet_to_json(sheet, { header: 1 });
    expect(table).toHaveLength(7);
  });

  it("still writes the header for an empty store", async () => {
    const sheet = readSheet(await exportWorkbook(store));
    const table: unknown[][] = XLSX.utils.sheet_to_json(sheet, { header: 1 });
    expect(table).toEqual([[...WORKBOOK_COLUMNS]]);
  });
});

describe("toWorkbookRecord", () => {
  it("writes a missing student number as an empty cell", () => {
    const row: TranscriptRow = {
      studentId: 1,
      familyName: "NOIR",
      givenName: "Lucas",
      studentNumber: null,
      track: "M1-API",
      academicYear: "2023-2024",
      semester: "7",
      unitCode: "UE901",
      courseName: "Rapport",
      score: 14,
      isUnit: false,
    };
    expect(toWorkbookRecord(row)).toEqual({
      "Family name": "NOIR",
      "Given name": "Lucas",
      "Student number": "",
      Track: "M1-API",
      "Academic year": "2023-2024",
      Semester: "7",
      Unit: "UE901",
      Course: "Rapport",
      Score: 14,
      "Is unit": 0,
    });
  });
});
