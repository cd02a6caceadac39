import type { SummaryRecord } from './news-article.interface';

export interface SummariesCacheEntry {
  readonly timestamp: number;
  readonly data: readonly SummaryRecord[];
}

/**
 * Single-slot cache for the summaries response.
 *
 * The entry is replaced as a whole on every store, so a reader sees either
 * the previous list or the new one. Staleness is only checked when read;
 * nothing is refreshed in the background.
 */
export class SummariesCache {
  private entry: SummariesCacheEntry | null = null;

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  /** Returns the cached list while it is younger than the TTL, otherwise null. */
  read(): readonly SummaryRecord[] | null {
    const entry = this.entry;
    if (entry === null) return null;
    return this.now() - entry.timestamp < this.ttlMs ? entry.data : null;
  }

  store(data: readonly SummaryRecord[]): void {
    this.entry = Object.freeze({ timestamp: this.now(), data });
  }

  snapshot(): SummariesCacheEntry | null {
    return this.entry;
  }
}
