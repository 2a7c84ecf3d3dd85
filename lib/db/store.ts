import "reflect-metadata";
import { DataSource } from "typeorm";
import { reportTranscriptError } from "@/lib/api/errors";
import { log } from "@/lib/ops/logger";
import { readTranscriptConfig } from "@/lib/transcripts/config";
import { entities } from "./schema";

export type TranscriptStore = {
  dataSource: DataSource;
  databasePath: string;
};

export type StoreOptions = {
  /** SQLite file, or ":memory:". Defaults to the configured `databasePath`. */
  databasePath?: string;
};

export async function openStore(opts: StoreOptions = {}): Promise<TranscriptStore> {
  const databasePath = opts.databasePath ?? readTranscriptConfig().config.databasePath;
  const dataSource = new DataSource({
    type: "better-sqlite3",
    database: databasePath,
    entities,
    synchronize: true,
    logging: false,
  });

  try {
    await dataSource.initialize();
  } catch (e) {
    throw reportTranscriptError({
      code: "STORE_UNAVAILABLE",
      operation: "openStore",
      message: `Cannot open transcript store at ${databasePath}`,
      details: { databasePath },
      cause: e,
    });
  }

  log.info("store_opened", { databasePath });
  return { dataSource, databasePath };
}

export async function closeStore(store: TranscriptStore) {
  if (!store.dataSource.isInitialized) return;
  await store.dataSource.destroy();
}

/** Open, run, release. The handle never outlives `fn`. */
export async function withStore<T>(opts: StoreOptions, fn: (store: TranscriptStore) => Promise<T>): Promise<T> {
  const store = await openStore(opts);
  try {
    return await fn(store);
  } finally {
    await closeStore(store);
  }
}
