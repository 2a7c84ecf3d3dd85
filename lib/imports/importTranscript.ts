import { promises as fs } from "node:fs";
import { isTranscriptImportError, makeRequestId, reportTranscriptError } from "@/lib/api/errors";
import { countStudentsForTerm } from "@/lib/db/queries";
import type { TranscriptStore } from "@/lib/db/store";
import { parseTranscript } from "@/lib/extractors/transcript";
import type { ParcoursField, ParcoursInfo, ParsedTranscript, SkippedStudent } from "@/lib/extractors/transcript/types";
import { appendOpsEvent } from "@/lib/ops/eventLog";
import { log, toErrorMessage } from "@/lib/ops/logger";
import { readTranscriptConfig, type TranscriptConfig } from "@/lib/transcripts/config";
import { commitTranscript, type FailedStudent } from "./commit";

export type TranscriptInput = { path: string } | { text: string | Buffer; sourceName?: string };

export type ImportOptions = Partial<TranscriptConfig>;

export type ImportSummary = {
  importId: string;
  source: string;
  parcours: ParcoursInfo;
  defaultedFields: ParcoursField[];
  attempted: number;
  imported: number;
  alreadyPresent: number;
  gradesInserted: number;
  failed: FailedStudent[];
  skipped: SkippedStudent[];
  warnings: string[];
};

export type TranscriptPreview = {
  source: string;
  parcours: ParcoursInfo;
  defaultedFields: ParcoursField[];
  students: number;
  skipped: SkippedStudent[];
  /** Students already stored for the same track, year and semester. */
  existingStudents: number;
};

export async function readTranscriptInput(input: TranscriptInput): Promise<{ text: string; source: string }> {
  if ("path" in input) {
    try {
      return { text: await fs.readFile(input.path, "utf8"), source: input.path };
    } catch (e) {
      throw reportTranscriptError({
        code: "SOURCE_UNREADABLE",
        operation: "readTranscriptInput",
        message: `Cannot read transcript file ${input.path}`,
        details: { path: input.path },
        cause: e,
      });
    }
  }
  const text = typeof input.text === "string" ? input.text : input.text.toString("utf8");
  return { text, source: input.sourceName || "<buffer>" };
}

function parseWithConfig(text: string, source: string, config: TranscriptConfig): ParsedTranscript {
  return parseTranscript(text, {
    source,
    pageHeaderMarker: config.pageHeaderMarker,
    placeholders: config.placeholders,
    strictHeader: config.strictHeader,
  });
}

function collectWarnings(parsed: ParsedTranscript) {
  const out = [...parsed.warnings];
  for (const s of parsed.students) {
    for (const w of s.warnings) out.push(`${s.record.familyName} ${s.record.givenName}: ${w}`);
  }
  return out;
}

/** Parses without writing anything and reports whether the term is already in the store. */
export async function previewDocument(
  store: TranscriptStore,
  input: TranscriptInput,
  options: ImportOptions = {}
): Promise<TranscriptPreview> {
  const { config } = readTranscriptConfig(options);
  const { text, source } = await readTranscriptInput(input);
  const parsed = parseWithConfig(text, source, config);
  const existingStudents = await countStudentsForTerm(store.dataSource.manager, parsed.parcours);
  if (existingStudents) {
    log.warn("term_already_stored", { source, parcours: parsed.parcours, existingStudents });
  }
  return {
    source,
    parcours: parsed.parcours,
    defaultedFields: parsed.defaultedFields,
    students: parsed.students.length,
    skipped: parsed.skipped,
    existingStudents,
  };
}

export async function importTranscript(
  store: TranscriptStore,
  input: TranscriptInput,
  options: ImportOptions = {}
): Promise<ImportSummary> {
  const { config } = readTranscriptConfig(options);
  const importId = makeRequestId();
  let source = "path" in input ? input.path : input.sourceName || "<buffer>";

  try {
    const read = await readTranscriptInput(input);
    source = read.source;
    const parsed = parseWithConfig(read.text, source, config);

    const committed = parsed.students.length
      ? await commitTranscript(store, parsed)
      : { attempted: 0, imported: 0, alreadyPresent: 0, gradesInserted: 0, failed: [] };

    const summary: ImportSummary = {
      importId,
      source,
      parcours: parsed.parcours,
      defaultedFields: parsed.defaultedFields,
      ...committed,
      skipped: parsed.skipped,
      warnings: collectWarnings(parsed),
    };

    log.info("transcript_imported", {
      importId,
      source,
      parcours: summary.parcours,
      attempted: summary.attempted,
      imported: summary.imported,
      alreadyPresent: summary.alreadyPresent,
      failed: summary.failed.length,
      skipped: summary.skipped.length,
      gradesInserted: summary.gradesInserted,
    });
    await appendOpsEvent(config.opsLogPath, {
      type: "TRANSCRIPT_IMPORTED",
      source,
      details: {
        importId,
        parcours: summary.parcours,
        imported: summary.imported,
        alreadyPresent: summary.alreadyPresent,
        failed: summary.failed.length,
        skipped: summary.skipped.length,
      },
    });
    return summary;
  } catch (e) {
    await appendOpsEvent(config.opsLogPath, {
      type: "TRANSCRIPT_IMPORT_FAILED",
      source,
      details: { importId, cause: toErrorMessage(e) },
    });
    if (isTranscriptImportError(e)) throw e;
    throw reportTranscriptError({
      code: "STORE_FAILURE",
      operation: "importTranscript",
      requestId: importId,
      message: `Import of ${source} aborted, nothing was committed`,
      details: { source },
      cause: e,
    });
  }
}

/** Number of students newly committed from the file at `path`. */
export async function importDocument(store: TranscriptStore, path: string, options: ImportOptions = {}) {
  const summary = await importTranscript(store, { path }, options);
  return summary.imported;
}
