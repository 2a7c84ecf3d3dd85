import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { log, toErrorMessage } from "./logger";

let previousLevel: string | undefined;

beforeEach(() => {
  previousLevel = process.env.TRANSCRIPT_LOG_LEVEL;
});

afterEach(() => {
  if (previousLevel === undefined) delete process.env.TRANSCRIPT_LOG_LEVEL;
  else process.env.TRANSCRIPT_LOG_LEVEL = previousLevel;
  vi.restoreAllMocks();
});

describe("log", () => {
  it("writes one JSON object with the event and fields", () => {
    process.env.TRANSCRIPT_LOG_LEVEL = "info";
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    log.warn("student_skipped", { line: 12 });

    expect(warn).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(warn.mock.calls[0][0]));
    expect(entry).toMatchObject({ level: "warn", event: "student_skipped", line: 12 });
  });

  it("drops entries below the configured level", () => {
    process.env.TRANSCRIPT_LOG_LEVEL = "warn";
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    log.info("transcript_parsed");
    log.error("transcript_error");

    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
  });
});

describe("toErrorMessage", () => {
  it("reads errors, strings and nothing", () => {
    expect(toErrorMessage(new Error("boom"))).toBe("boom");
    expect(toErrorMessage("plain")).toBe("plain");
    expect(toErrorMessage(undefined)).toBe("");
  });
});
