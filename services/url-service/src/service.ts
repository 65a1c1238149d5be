import { UserUrlCache } from "./cache.js";
import type { UserUrl } from "./cache.js";
import { isConflict, ShortIdConflictError, ShortIdGenerationError, StorageError } from "./errors.js";
import type { ShortIdGenerator } from "./generator.js";
import type { Logger } from "./logger.js";
import { urlDeletionsTotal, urlsShortenedTotal } from "./metrics.js";
import type { StoredUrl, UrlStore } from "./storage.js";
import { WorkerPool } from "./worker_pool.js";

export const DEFAULT_DELETE_CONCURRENCY = 4;

/** Attempts per shorten call when the store reports a conflicting insert. */
export const MAX_SAVE_ATTEMPTS = 3;

export interface ShortenResult {
  shortUrl: string;
  /** false when the URL already had a live short id, whoever created it */
  isNew: boolean;
}

export interface BatchItem {
  correlationId: string;
  originalUrl: string;
}

export interface BatchResult {
  correlationId: string;
  shortUrl: string;
}

export interface ServiceOptions {
  store: UrlStore;
  generator: ShortIdGenerator;
  /** Prefix for every short URL, without a trailing slash. */
  baseUrl: string;
  logger: Logger;
  deleteConcurrency?: number;
}

/** Waits for `work`, or until `signal` aborts, whichever comes first. */
async function unlessAborted(work: Promise<void>, signal?: AbortSignal): Promise<void> {
  if (!signal) return work;
  if (signal.aborted) return;

  let onAbort = () => {};
  const aborted = new Promise<void>((resolve) => {
    onAbort = () => resolve();
    signal.addEventListener("abort", onAbort, { once: true });
  });
  try {
    await Promise.race([work, aborted]);
  } finally {
    signal.removeEventListener("abort", onAbort);
  }
}

/**
 * Shortening, lookup, listing and deletion on top of a {@link UrlStore}.
 *
 * Owns the per-user listing cache: any write on behalf of a user drops that
 * user's snapshot before touching the store. Deletes run in a shared worker
 * pool whose work outlives the request that queued it.
 */
export class ShortenerService {
  private readonly store: UrlStore;
  private readonly generator: ShortIdGenerator;
  private readonly baseUrl: string;
  private readonly logger: Logger;
  private readonly cache = new UserUrlCache();
  private readonly deletions: WorkerPool;

  constructor(opts: ServiceOptions) {
    this.store = opts.store;
    this.generator = opts.generator;
    this.baseUrl = opts.baseUrl;
    this.logger = opts.logger;
    this.deletions = new WorkerPool(opts.deleteConcurrency ?? DEFAULT_DELETE_CONCURRENCY);
  }

  get storeKind(): UrlStore["kind"] {
    return this.store.kind;
  }

  async shorten(originalUrl: string, userId: string, signal?: AbortSignal): Promise<ShortenResult> {
    for (let attempt = 1; ; attempt++) {
      try {
        const result = await this.tryShorten(originalUrl, userId, signal);
        urlsShortenedTotal.inc({ result: result.isNew ? "created" : "existing" });
        return result;
      } catch (err) {
        if (isConflict(err) && attempt < MAX_SAVE_ATTEMPTS) {
          this.logger.warn({ err, attempt, originalUrl }, "shorten conflict, retrying");
          continue;
        }
        if (isConflict(err)) {
          throw new StorageError(`error saving URL ${originalUrl}: ${err.message}`, { cause: err });
        }
        throw err;
      }
    }
  }

  async shortenBatch(items: readonly BatchItem[], userId: string, signal?: AbortSignal): Promise<BatchResult[]> {
    if (items.length === 0) return [];

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.tryShortenBatch(items, userId, signal);
      } catch (err) {
        if (isConflict(err) && attempt < MAX_SAVE_ATTEMPTS) {
          this.logger.warn({ err, attempt, size: items.length }, "batch conflict, retrying");
          continue;
        }
        if (isConflict(err)) {
          throw new StorageError(`error saving URL batch: ${err.message}`, { cause: err });
        }
        throw err;
      }
    }
  }

  get(shortId: string, signal?: AbortSignal): Promise<string | null> {
    return this.store.get(shortId, signal);
  }

  async getUrlsByUserId(userId: string, signal?: AbortSignal): Promise<readonly UserUrl[]> {
    return this.cache.fill(userId, async () => {
      let stored: StoredUrl[];
      try {
        stored = await this.store.getUrlsByUserId(userId, signal);
      } catch (err) {
        throw new StorageError(`error listing URLs of user ${userId}`, { cause: err });
      }

      return Object.freeze(
        stored.map((s) => Object.freeze({ shortUrl: this.shortUrl(s.shortId), originalUrl: s.originalUrl }))
      );
    });
  }

  /**
   * Drops the user's cache entry and queues one delete per id; each finished
   * delete drops it again.
   * Resolves once every id is in a worker's hands, or as soon as `signal`
   * aborts; the deletes themselves keep running either way.
   */
  async deleteUrls(shortIds: readonly string[], userId: string, signal?: AbortSignal): Promise<void> {
    this.cache.invalidate(userId);
    if (shortIds.length === 0) return;

    // listings read while a delete is in flight may still show the id
    const job = this.deletions.submit(
      shortIds.map((id) => async () => {
        try {
          await this.store.deleteUrls([id], userId);
        } finally {
          this.cache.invalidate(userId);
        }
      })
    );

    void job.settled.then((outcomes) => {
      outcomes.forEach((outcome, i) => {
        if (outcome.status === "fulfilled") {
          urlDeletionsTotal.inc({ outcome: "ok" });
          return;
        }
        urlDeletionsTotal.inc({ outcome: "failed" });
        this.logger.warn({ err: outcome.reason, shortId: shortIds[i], userId }, "deferred delete failed");
      });
    });

    await unlessAborted(job.dispatched, signal);
  }

  ping(signal?: AbortSignal): Promise<void> {
    return this.store.ping(signal);
  }

  /** Resolves when no deletes are queued or running. */
  idle(): Promise<void> {
    return this.deletions.onIdle();
  }

  async close(): Promise<void> {
    await this.idle();
    await this.store.close();
  }

  private async tryShorten(originalUrl: string, userId: string, signal?: AbortSignal): Promise<ShortenResult> {
    const existing = await this.lookup(originalUrl, signal);
    if (existing !== null) {
      return { shortUrl: this.shortUrl(existing), isNew: false };
    }

    const shortId = this.nextShortId();
    this.cache.invalidate(userId);

    try {
      await this.store.save(shortId, originalUrl, userId, signal);
    } catch (err) {
      if (isConflict(err)) throw err;
      throw new StorageError(`error saving URL ${originalUrl} as ${shortId}`, { cause: err });
    }
    return { shortUrl: this.shortUrl(shortId), isNew: true };
  }

  /**
   * Reuses live ids for URLs that already have one, mints one id per
   * remaining distinct URL, and stores the new pairs in a single batch.
   * The correlation pairing is built in input order as ids are assigned.
   */
  private async tryShortenBatch(
    items: readonly BatchItem[],
    userId: string,
    signal?: AbortSignal
  ): Promise<BatchResult[]> {
    const distinct = [...new Set(items.map((item) => item.originalUrl))];
    const found = await Promise.all(distinct.map((url) => this.lookup(url, signal)));

    const idByUrl = new Map<string, string>();
    distinct.forEach((url, i) => {
      const shortId = found[i];
      if (shortId) idByUrl.set(url, shortId);
    });

    const toSave = new Map<string, string>();
    const pairs: Array<{ correlationId: string; shortId: string }> = [];

    for (const item of items) {
      let shortId = idByUrl.get(item.originalUrl);
      if (shortId === undefined) {
        shortId = this.nextShortId();
        if (toSave.has(shortId)) throw new ShortIdConflictError(shortId);
        toSave.set(shortId, item.originalUrl);
        idByUrl.set(item.originalUrl, shortId);
      }
      pairs.push({ correlationId: item.correlationId, shortId });
    }

    this.cache.invalidate(userId);

    if (toSave.size > 0) {
      try {
        await this.store.saveBatch(toSave, userId, signal);
      } catch (err) {
        if (isConflict(err)) throw err;
        throw new StorageError(`error saving batch of ${toSave.size} URLs (ids ${[...toSave.keys()].join(", ")})`, {
          cause: err
        });
      }
    }

    return pairs.map((p) => ({ correlationId: p.correlationId, shortUrl: this.shortUrl(p.shortId) }));
  }

  private async lookup(originalUrl: string, signal?: AbortSignal): Promise<string | null> {
    try {
      return await this.store.findByOriginalUrl(originalUrl, signal);
    } catch (err) {
      throw new StorageError(`error finding URL ${originalUrl}`, { cause: err });
    }
  }

  private nextShortId(): string {
    const shortId = this.generator.generate();
    if (shortId === "") throw new ShortIdGenerationError();
    return shortId;
  }

  private shortUrl(shortId: string): string {
    return `${this.baseUrl}/${shortId}`;
  }
}
