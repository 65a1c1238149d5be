import { PingNotSupportedError } from "./errors.js";
import { RecordTable } from "./records.js";
import type { StoredUrl, UrlStore } from "./storage.js";

export class MemoryUrlStore implements UrlStore {
  readonly kind = "memory";
  private readonly table = new RecordTable();

  async save(shortId: string, originalUrl: string, userId: string, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    this.table.insert([[shortId, originalUrl]], userId);
  }

  async saveBatch(items: ReadonlyMap<string, string>, userId: string, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    this.table.insert(items, userId);
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
    this.table.markDeleted(shortIds, userId);
  }

  async ping(): Promise<void> {
    throw new PingNotSupportedError(this.kind);
  }

  async close(): Promise<void> {
    // nothing
  }
}
