export type LogLevel = "info" | "warn" | "error";

const RANK: Record<LogLevel | "silent", number> = { info: 0, warn: 1, error: 2, silent: 3 };

function threshold(): number {
  const v = String(process.env.TRANSCRIPT_LOG_LEVEL || "").trim().toLowerCase();
  if (v === "info" || v === "warn" || v === "error" || v === "silent") return RANK[v];
  return RANK.info;
}

export function toErrorMessage(cause: unknown) {
  if (!cause) return "";
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

/** One JSON object per line: level, ts, event, then the caller's fields. */
export function logEvent(level: LogLevel, event: string, fields: Record<string, unknown> = {}) {
  if (RANK[level] < threshold()) return;
  const line = JSON.stringify({ level, ts: new Date().toISOString(), event, ...fields });
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.info(line);
}

export const log = {
  info: (event: string, fields?: Record<string, unknown>) => logEvent("info", event, fields),
  warn: (event: string, fields?: Record<string, unknown>) => logEvent("warn", event, fields),
  error: (event: string, fields?: Record<string, unknown>) => logEvent("error", event, fields),
};
