import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { isTranscriptImportError } from "@/lib/api/errors";
import { importTranscript } from "@/lib/imports/importTranscript";
import { fixturePath } from "@/tests/support";
import { listStudents } from "./queries";
import { closeStore, openStore, withStore } from "./store";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "transcript-store-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("openStore", () => {
  it("creates the schema on first use", async () => {
    const store = await openStore({ databasePath: ":memory:" });
    try {
      expect(await listStudents(store)).toEqual([]);
    } finally {
      await closeStore(store);
    }
  });

  it("reports an unusable location as STORE_UNAVAILABLE", async () => {
    const blocker = path.join(dir, "not-a-directory");
    fs.writeFileSync(blocker, "", "utf8");

    let caught: unknown;
    try {
      await openStore({ databasePath: path.join(blocker, "store.db") });
    } catch (e) {
      caught = e;
    }
    expect(isTranscriptImportError(caught) && caught.code).toBe("STORE_UNAVAILABLE");
  });
});

describe("withStore", () => {
  it("closes the handle once the callback settles", async () => {
    const store = await withStore({ databasePath: ":memory:" }, async (s) => s);
    expect(store.dataSource.isInitialized).toBe(false);
  });

  it("closes the handle when the callback throws", async () => {
    let opened: { isInitialized: boolean } | null = null;
    await expect(
      withStore({ databasePath: ":memory:" }, async (s) => {
        opened = s.dataSource;
        throw new Error("callback failed");
      })
    ).rejects.toThrow("callback failed");
    expect(opened).not.toBeNull();
    expect(opened).toMatchObject({ isInitialized: false });
  });

  it("keeps committed rows across reopenings of a file store", async () => {
    const databasePath = path.join(dir, "grades.db");
    await withStore({ databasePath }, (store) =>
      importTranscript(store, { path: fixturePath("releve-s7.txt") }, { opsLogPath: null })
    );

    const students = await withStore({ databasePath }, (store) => listStudents(store));
    expect(students.map((s) => s.familyName)).toEqual(["DUPONT", "LEGRAND", "MARTIN DE LA TOUR"]);
  });
});
