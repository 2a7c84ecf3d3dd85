import fs from "node:fs";
import path from "node:path";
import { openStore, type TranscriptStore } from "@/lib/db/store";
import type { ParcoursInfo, TranscriptParseOptions } from "@/lib/extractors/transcript/types";

export const FIXTURES_DIR = path.join(process.cwd(), "tests", "fixtures");

export function fixturePath(name: string) {
  return path.join(FIXTURES_DIR, name);
}

export function readFixture(name: string) {
  return fs.readFileSync(fixturePath(name), "utf8");
}

export const PLACEHOLDERS: ParcoursInfo = { track: "UNKNOWN", academicYear: "UNKNOWN", semester: "UNKNOWN" };

export const PAGE_HEADER = "Université Savoie Mont Blanc Année universitaire";

export function parseOptions(overrides: Partial<TranscriptParseOptions> = {}): TranscriptParseOptions {
  return {
    source: "test.txt",
    pageHeaderMarker: PAGE_HEADER,
    placeholders: PLACEHOLDERS,
    strictHeader: false,
    ...overrides,
  };
}

export function memoryStore(): Promise<TranscriptStore> {
  return openStore({ databasePath: ":memory:" });
}

/** A minimal well-formed student block. */
export function studentBlock(opts: {
  family: string;
  given: string;
  number: string;
  notes: string[];
  semester?: string;
  track?: string;
}) {
  return [
    `${opts.family} ${opts.given}`,
    `N° Etudiant : ${opts.number} INE : 0Z0000000ZZ`,
    "Né le : 01/01/2000 à Chambéry",
    `inscrit en Semestre ${opts.semester ?? "7"} ${opts.track ?? "M1-API"}`,
    ...opts.notes,
  ].join("\n");
}

export function transcriptText(header: string[], blocks: string[]) {
  return [...header, "", blocks.join("\n\n"), ""].join("\n");
}
