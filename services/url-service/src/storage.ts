export type StoreKind = "postgres" | "file" | "memory";

export interface UrlRecord {
  shortId: string;
  originalUrl: string;
  userId: string;
  deleted: boolean;
}

export interface StoredUrl {
  shortId: string;
  originalUrl: string;
}

/**
 * Contract shared by every backend.
 *
 * Inserts never overwrite: a taken short id raises `ShortIdConflictError`,
 * and a URL that already has a live record raises `OriginalUrlConflictError`.
 * `get` and `findByOriginalUrl` only see live records.
 */
export interface UrlStore {
  readonly kind: StoreKind;
  save(shortId: string, originalUrl: string, userId: string, signal?: AbortSignal): Promise<void>;
  /** All-or-nothing insert of `shortId -> originalUrl` pairs. */
  saveBatch(items: ReadonlyMap<string, string>, userId: string, signal?: AbortSignal): Promise<void>;
  get(shortId: string, signal?: AbortSignal): Promise<string | null>;
  findByOriginalUrl(originalUrl: string, signal?: AbortSignal): Promise<string | null>;
  getUrlsByUserId(userId: string, signal?: AbortSignal): Promise<StoredUrl[]>;
  /** Marks ids deleted when `userId` owns them; other ids are skipped. */
  deleteUrls(shortIds: readonly string[], userId: string, signal?: AbortSignal): Promise<void>;
  ping(signal?: AbortSignal): Promise<void>;
  close(): Promise<void>;
}
