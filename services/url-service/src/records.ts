import { OriginalUrlConflictError, ShortIdConflictError } from "./errors.js";
import type { StoredUrl, UrlRecord } from "./storage.js";

/**
 * In-process record map with an index of live URLs.
 * Backs both the memory and the file store; every method is synchronous,
 * so a mutation is never observed half-applied.
 */
export class RecordTable {
  private readonly records = new Map<string, UrlRecord>();
  private readonly liveByUrl = new Map<string, string>();

  constructor(initial: Iterable<UrlRecord> = []) {
    for (const rec of initial) {
      if (this.records.has(rec.shortId)) throw new ShortIdConflictError(rec.shortId);
      if (!rec.deleted && this.liveByUrl.has(rec.originalUrl)) {
        throw new OriginalUrlConflictError(rec.originalUrl);
      }
      this.put(rec);
    }
  }

  /** Inserts every pair or none of them. */
  insert(items: Iterable<readonly [string, string]>, userId: string): void {
    const pending: UrlRecord[] = [];
    const batchUrls = new Set<string>();

    for (const [shortId, originalUrl] of items) {
      if (this.records.has(shortId)) throw new ShortIdConflictError(shortId);
      if (this.liveByUrl.has(originalUrl) || batchUrls.has(originalUrl)) {
        throw new OriginalUrlConflictError(originalUrl);
      }
      batchUrls.add(originalUrl);
      pending.push({ shortId, originalUrl, userId, deleted: false });
    }

    for (const rec of pending) this.put(rec);
  }

  get(shortId: string): string | null {
    const rec = this.records.get(shortId);
    if (!rec || rec.deleted) return null;
    return rec.originalUrl;
  }

  findByOriginalUrl(originalUrl: string): string | null {
    return this.liveByUrl.get(originalUrl) ?? null;
  }

  listByUser(userId: string): StoredUrl[] {
    const out: StoredUrl[] = [];
    for (const rec of this.records.values()) {
      if (rec.userId === userId && !rec.deleted) {
        out.push({ shortId: rec.shortId, originalUrl: rec.originalUrl });
      }
    }
    return out;
  }

  /** Returns how many records changed. */
  markDeleted(shortIds: readonly string[], userId: string): number {
    let changed = 0;
    for (const shortId of shortIds) {
      const rec = this.records.get(shortId);
      if (!rec || rec.deleted || rec.userId !== userId) continue;
      rec.deleted = true;
      this.liveByUrl.delete(rec.originalUrl);
      changed++;
    }
    return changed;
  }

  snapshot(): UrlRecord[] {
    return Array.from(this.records.values(), (rec) => ({ ...rec }));
  }

  private put(rec: UrlRecord): void {
    this.records.set(rec.shortId, { ...rec });
    if (!rec.deleted) this.liveByUrl.set(rec.originalUrl, rec.shortId);
  }
}
