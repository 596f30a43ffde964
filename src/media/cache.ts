/**
 * msgate — Media Handle Cache
 *
 * One cache for both outcomes of a media resolution: uploaded handles
 * and recent failures, keyed by (channel id, source URL).
 */

// ============================================================================
// INTERFACE
// ============================================================================

export type CacheLookup =
  | { state: 'hit'; handle: string }
  | { state: 'failed' }
  | { state: 'miss' };

/**
 * Async so that a shared store can sit behind it. Concurrent misses for
 * the same key may both upload; the last write wins.
 */
export interface MediaHandleCache {
  get(channelId: string, url: string): Promise<CacheLookup>;
  putSuccess(channelId: string, url: string, handle: string): Promise<void>;
  putFailure(channelId: string, url: string, ttlMs: number): Promise<void>;
}

// ============================================================================
// IN-MEMORY
// ============================================================================

type Entry =
  | { kind: 'handle'; handle: string }
  | { kind: 'failed'; expiresAt: number };

export interface InMemoryMediaCacheOptions {
  /** Entries kept per channel before the oldest is evicted. */
  maxEntriesPerChannel?: number;
  now?: () => number;
}

const DEFAULT_MAX_ENTRIES = 10_000;

export class InMemoryMediaCache implements MediaHandleCache {
  private readonly channels = new Map<string, Map<string, Entry>>();
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: InMemoryMediaCacheOptions = {}) {
    this.maxEntries = options.maxEntriesPerChannel ?? DEFAULT_MAX_ENTRIES;
    this.now = options.now ?? Date.now;
  }

  async get(channelId: string, url: string): Promise<CacheLookup> {
    const entries = this.channels.get(channelId);
    const entry = entries?.get(url);
    if (!entries || !entry) return { state: 'miss' };

    if (entry.kind === 'handle') return { state: 'hit', handle: entry.handle };

    if (entry.expiresAt <= this.now()) {
      entries.delete(url);
      return { state: 'miss' };
    }
    return { state: 'failed' };
  }

  async putSuccess(channelId: string, url: string, handle: string): Promise<void> {
    this.set(channelId, url, { kind: 'handle', handle });
  }

  async putFailure(channelId: string, url: string, ttlMs: number): Promise<void> {
    this.set(channelId, url, { kind: 'failed', expiresAt: this.now() + ttlMs });
  }

  /** Number of entries held for a channel, both kinds. */
  size(channelId: string): number {
    return this.channels.get(channelId)?.size ?? 0;
  }

  private set(channelId: string, url: string, entry: Entry): void {
    let entries = this.channels.get(channelId);
    if (!entries) {
      entries = new Map();
      this.channels.set(channelId, entries);
    }

    // re-insert so the key moves to the newest position
    entries.delete(url);
    entries.set(url, entry);

    if (entries.size > this.maxEntries) {
      // Map iteration order is insertion order
      const oldest = entries.keys().next().value;
      if (oldest !== undefined) {
        entries.delete(oldest);
      }
    }
  }
}
