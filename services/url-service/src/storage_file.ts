import { mkdir, readFile, rename, writeFile } from "fs/promises";
import { dirname } from "path";
import { PingNotSupportedError } from "./errors.js";
import type { Logger } from "./logger.js";
import { RecordTable } from "./records.js";
import type { StoredUrl, UrlRecord, UrlStore } from "./storage.js";

/** On-disk shape: one JSON array of these. */
interface FileEntry {
  short_id: string;
  original_url: string;
  user_id: string;
  is_deleted: boolean;
}

function isFileEntry(v: unknown): v is FileEntry {
  return (
    typeof v === "object" &&
    v !== null &&
    "short_id" in v &&
    typeof v.short_id === "string" &&
    "original_url" in v &&
    typeof v.original_url === "string" &&
    "user_id" in v &&
    typeof v.user_id === "string" &&
    "is_deleted" in v &&
    typeof v.is_deleted === "boolean"
  );
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function loadRecords(filePath: string): Promise<UrlRecord[] | null> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }

  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) {
    throw new Error(`${filePath}: expected a JSON array`);
  }

  return parsed.map((entry, i) => {
    if (!isFileEntry(entry)) throw new Error(`${filePath}: malformed entry at index ${i}`);
    return {
      shortId: entry.short_id,
      originalUrl: entry.original_url,
      userId: entry.user_id,
      deleted: entry.is_deleted
    };
  });
}

/**
 * Records live in memory and are rewritten to disk after each mutation.
 *
 * Writes never overlap: a single flush loop runs at a time and keeps going
 * while mutations arrive, so bursts collapse into a few whole-file rewrites.
 * Callers return before the write lands; a crash in between loses it.
 */
export class FileUrlStore implements UrlStore {
  readonly kind = "file";
  private dirty = false;
  private flushing: Promise<void> | null = null;

  private constructor(
    readonly filePath: string,
    private readonly table: RecordTable,
    private readonly logger: Logger
  ) {}

  static async open(filePath: string, logger: Logger): Promise<FileUrlStore> {
    await mkdir(dirname(filePath), { recursive: true });
    const records = await loadRecords(filePath);
    const store = new FileUrlStore(filePath, new RecordTable(records ?? []), logger);
    if (records === null) {
      // fail now rather than on the first flush if the path is not writable
      await store.writeSnapshot();
    }
    return store;
  }

  async save(shortId: string, originalUrl: string, userId: string, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    this.table.insert([[shortId, originalUrl]], userId);
    this.markDirty();
  }

  async saveBatch(items: ReadonlyMap<string, string>, userId: string, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    this.table.insert(items, userId);
    this.markDirty();
  }

  async get(shortId: string, signal?: AbortSignal): Promise<string | null> {
    signal?.throwIfAborted();
    return this.table.get(shortId);
  }

  async findByOriginalUrl(originalUrl: string, signal?: AbortSignal): Promise<string | null> {
    signal?.throwIfAborted();
    return this.table.findByOriginalUrl(originalUrl);
  }

  async getUrlsByUserId(userId: string, signal?: AbortSignal): Promise<StoredUrl[]> {
    signal?.throwIfAborted();
    return this.table.listByUser(userId);
  }

  async deleteUrls(shortIds: readonly string[], userId: string, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    if (this.table.markDeleted(shortIds, userId) > 0) this.markDirty();
  }

  async ping(): Promise<void> {
    throw new PingNotSupportedError(this.kind);
  }

  /** Resolves once every mutation made so far has been written (or has failed to write). */
  async flush(): Promise<void> {
    while (this.flushing) await this.flushing;
  }

  async close(): Promise<void> {
    await this.flush();
  }

  private markDirty(): void {
    this.dirty = true;
    if (this.flushing) return;

    this.flushing = this.drain().finally(() => {
      this.flushing = null;
      if (this.dirty) this.markDirty();
    });
  }

  private async drain(): Promise<void> {
    while (this.dirty) {
      this.dirty = false;
      try {
        await this.writeSnapshot();
      } catch (err) {
        this.logger.error({ err, file: this.filePath }, "file storage flush failed");
      }
    }
  }

  private async writeSnapshot(): Promise<void> {
    const entries: FileEntry[] = this.table.snapshot().map((rec) => ({
      short_id: rec.shortId,
      original_url: rec.originalUrl,
      user_id: rec.userId,
      is_deleted: rec.deleted
    }));

    const tmp = `${this.filePath}.tmp`;
    await writeFile(tmp, JSON.stringify(entries, null, 2));
    await rename(tmp, this.filePath);
  }
}
