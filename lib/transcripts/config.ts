import fs from "node:fs";
import path from "node:path";
import { reportTranscriptError } from "@/lib/api/errors";
import type { ParcoursInfo } from "@/lib/extractors/transcript/types";

const FILE_NAME = ".transcript-import.json";

export type TranscriptConfig = {
  databasePath: string;
  pageHeaderMarker: string;
  placeholders: ParcoursInfo;
  strictHeader: boolean;
  opsLogPath: string | null;
};

export type TranscriptConfigSource = "default" | "settings";

export function defaultTranscriptConfig(cwd = process.cwd()): TranscriptConfig {
  return {
    databasePath: "academic_data.db",
    pageHeaderMarker: "Université Savoie Mont Blanc Année universitaire",
    placeholders: { track: "UNKNOWN", academicYear: "UNKNOWN", semester: "UNKNOWN" },
    strictHeader: false,
    opsLogPath: path.join(cwd, ".transcript-ops-events.jsonl"),
  };
}

function normalizeText(v: unknown, fallback: string) {
  const s = String(v ?? "").trim();
  return s || fallback;
}

function normalizeFlag(v: unknown, fallback: boolean) {
  if (typeof v === "boolean") return v;
  const s = String(v ?? "").trim().toLowerCase();
  if (s === "1" || s === "true" || s === "yes") return true;
  if (s === "0" || s === "false" || s === "no") return false;
  return fallback;
}

function normalizeOpsLogPath(v: unknown, fallback: string | null, cwd: string) {
  if (v === null) return null;
  const s = String(v ?? "").trim();
  if (!s) return fallback;
  if (s.toLowerCase() === "off") return null;
  return path.isAbsolute(s) ? s : path.join(cwd, s);
}

function normalizePlaceholders(v: unknown, fallback: ParcoursInfo): ParcoursInfo {
  if (!v || typeof v !== "object") return fallback;
  return {
    track: normalizeText(Reflect.get(v, "track"), fallback.track),
    academicYear: normalizeText(Reflect.get(v, "academicYear"), fallback.academicYear),
    semester: normalizeText(Reflect.get(v, "semester"), fallback.semester),
  };
}

export function normalizeTranscriptConfig(
  input: Record<string, unknown>,
  base = defaultTranscriptConfig(),
  cwd = process.cwd()
): TranscriptConfig {
  return {
    databasePath: normalizeText(input.databasePath, base.databasePath),
    pageHeaderMarker: normalizeText(input.pageHeaderMarker, base.pageHeaderMarker),
    placeholders: normalizePlaceholders(input.placeholders, base.placeholders),
    strictHeader: normalizeFlag(input.strictHeader, base.strictHeader),
    opsLogPath: "opsLogPath" in input ? normalizeOpsLogPath(input.opsLogPath, base.opsLogPath, cwd) : base.opsLogPath,
  };
}

function invalidSettings(file: string, message: string, cause?: unknown) {
  return reportTranscriptError({
    code: "CONFIG_INVALID",
    operation: "readTranscriptConfig",
    message,
    details: { file },
    cause,
  });
}

function readSettingsFile(cwd: string): Record<string, unknown> | null {
  const file = path.join(cwd, FILE_NAME);
  if (!fs.existsSync(file)) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (e) {
    throw invalidSettings(file, `${FILE_NAME} is not valid JSON`, e);
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw invalidSettings(file, `${FILE_NAME} must hold a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  if (env.TRANSCRIPT_DB_PATH) out.databasePath = env.TRANSCRIPT_DB_PATH;
  if (env.TRANSCRIPT_PAGE_HEADER) out.pageHeaderMarker = env.TRANSCRIPT_PAGE_HEADER;
  if (env.TRANSCRIPT_STRICT_HEADER) out.strictHeader = env.TRANSCRIPT_STRICT_HEADER;
  if (env.TRANSCRIPT_OPS_LOG) out.opsLogPath = env.TRANSCRIPT_OPS_LOG;
  return out;
}

/** Settings file, then environment, then per-call overrides; defaults fill the rest. */
export function readTranscriptConfig(
  overrides: Partial<TranscriptConfig> = {},
  opts: { cwd?: string; env?: NodeJS.ProcessEnv } = {}
): { config: TranscriptConfig; source: TranscriptConfigSource } {
  const cwd = opts.cwd ?? process.cwd();
  const settings = readSettingsFile(cwd);
  const merged: Record<string, unknown> = {
    ...(settings ?? {}),
    ...envOverrides(opts.env ?? process.env),
    ...overrides,
  };
  return {
    config: normalizeTranscriptConfig(merged, defaultTranscriptConfig(cwd), cwd),
    source: settings ? "settings" : "default",
  };
}
