import { randomUUID } from "node:crypto";
import { log, toErrorMessage } from "@/lib/ops/logger";

export type TranscriptErrorCode =
  | "SOURCE_UNREADABLE"
  | "HEADER_UNRESOLVED"
  | "STORE_UNAVAILABLE"
  | "STORE_FAILURE"
  | "CONFIG_INVALID";

type TranscriptErrorInput = {
  code: TranscriptErrorCode;
  message: string;
  operation: string;
  requestId?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
};

export class TranscriptImportError extends Error {
  readonly code: TranscriptErrorCode;
  readonly requestId: string;
  readonly details: Record<string, unknown>;

  constructor(input: TranscriptErrorInput) {
    super(input.message, input.cause === undefined ? undefined : { cause: input.cause });
    this.name = "TranscriptImportError";
    this.code = input.code;
    this.requestId = input.requestId || makeRequestId();
    this.details = input.details ?? {};
  }
}

export function makeRequestId() {
  return randomUUID();
}

export function isTranscriptImportError(e: unknown): e is TranscriptImportError {
  return e instanceof TranscriptImportError;
}

/** Logs the failure once, with its request id, and hands back the error for the caller to throw. */
export function reportTranscriptError(input: TranscriptErrorInput) {
  const error = new TranscriptImportError(input);
  log.error("transcript_error", {
    operation: input.operation,
    requestId: error.requestId,
    code: error.code,
    message: error.message,
    details: error.details,
    cause: toErrorMessage(input.cause),
  });
  return error;
}
