export interface UserUrl {
  shortUrl: string;
  originalUrl: string;
}

interface Fill {
  stale: boolean;
}

/**
 * Read-through snapshots of each user's URL list.
 *
 * `invalidate` drops the snapshot and marks every fill in flight for that
 * user as stale; a stale fill still returns its result but never stores it.
 * Per-user bookkeeping exists only while a snapshot or a fill does.
 */
export class UserUrlCache {
  private readonly entries = new Map<string, readonly UserUrl[]>();
  private readonly fills = new Map<string, Set<Fill>>();

  get(userId: string): readonly UserUrl[] | undefined {
    return this.entries.get(userId);
  }

  /** Returns the cached snapshot, or runs `load` and caches what it returns. */
  async fill(userId: string, load: () => Promise<readonly UserUrl[]>): Promise<readonly UserUrl[]> {
    const cached = this.entries.get(userId);
    if (cached) return cached;

    const fill: Fill = { stale: false };
    let inFlight = this.fills.get(userId);
    if (!inFlight) {
      inFlight = new Set();
      this.fills.set(userId, inFlight);
    }
    inFlight.add(fill);

    try {
      const urls = await load();
      if (!fill.stale) this.entries.set(userId, urls);
      return urls;
    } finally {
      inFlight.delete(fill);
      if (inFlight.size === 0) this.fills.delete(userId);
    }
  }

  invalidate(userId: string): void {
    this.entries.delete(userId);
    for (const fill of this.fills.get(userId) ?? []) fill.stale = true;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Users with a fill in flight. */
  get filling(): number {
    return this.fills.size;
  }
}
