import type { Logger } from "./logger.js";
import type { UrlStore } from "./storage.js";
import { FileUrlStore } from "./storage_file.js";
import { MemoryUrlStore } from "./storage_memory.js";
import { PostgresUrlStore } from "./storage_postgres.js";

export interface StoreOptions {
  databaseUrl?: string;
  filePath?: string;
}

export interface StoreFactories {
  postgres(databaseUrl: string): Promise<UrlStore>;
  file(filePath: string, logger: Logger): Promise<UrlStore>;
  memory(): UrlStore;
}

export const defaultFactories: StoreFactories = {
  postgres: (databaseUrl) => PostgresUrlStore.connect(databaseUrl),
  file: (filePath, logger) => FileUrlStore.open(filePath, logger),
  memory: () => new MemoryUrlStore()
};

/**
 * Picks the store once at startup: Postgres when a connection string is set,
 * then the JSON file when a path is set, then memory. A backend that fails
 * to open is logged and skipped.
 */
export async function selectStore(
  opts: StoreOptions,
  logger: Logger,
  factories: StoreFactories = defaultFactories
): Promise<UrlStore> {
  if (opts.databaseUrl) {
    try {
      const store = await factories.postgres(opts.databaseUrl);
      logger.info({ storage: store.kind }, "using postgres storage");
      return store;
    } catch (err) {
      logger.warn({ err }, "postgres storage unavailable, falling back");
    }
  }

  if (opts.filePath) {
    try {
      const store = await factories.file(opts.filePath, logger);
      logger.info({ storage: store.kind, file: opts.filePath }, "using file storage");
      return store;
    } catch (err) {
      logger.warn({ err, file: opts.filePath }, "file storage unavailable, falling back");
    }
  }

  const store = factories.memory();
  logger.info({ storage: store.kind }, "using in-memory storage");
  return store;
}
