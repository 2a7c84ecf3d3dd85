import { promises as fs } from "node:fs";
import { log, toErrorMessage } from "./logger";

export type OpsEventType = "TRANSCRIPT_IMPORTED" | "TRANSCRIPT_IMPORT_FAILED" | "STUDENTS_DELETED";

export type OpsEvent = {
  ts?: string;
  type: OpsEventType;
  source?: string | null;
  details?: Record<string, unknown>;
};

export async function appendOpsEvent(logPath: string | null, event: OpsEvent) {
  if (!logPath) return;
  const payload = {
    ts: event.ts || new Date().toISOString(),
    type: event.type,
    source: event.source || null,
    details: event.details || {},
  };
  try {
    await fs.appendFile(logPath, `${JSON.stringify(payload)}\n`, "utf8");
  } catch (e) {
    // A failed append never fails the run it describes.
    log.warn("ops_event_write_failed", { logPath, type: event.type, cause: toErrorMessage(e) });
  }
}
