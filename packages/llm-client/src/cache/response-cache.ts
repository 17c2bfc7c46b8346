import { createHash } from 'crypto';

export interface CachedResponse {
  payload: string;
  timestamp: number;
}

export interface ResponseCacheOptions {
  ttlMs: number;
  maxEntries: number;
}

export const DEFAULT_CACHE_OPTIONS: ResponseCacheOptions = {
  ttlMs: 5 * 60 * 1000,
  maxEntries: 50,
};

/**
 * Bounded TTL cache of sanitized response payloads. When full, the entry inserted
 * earliest is evicted. Expired entries are dropped when read.
 */
export class ResponseCache {
  private readonly entries = new Map<string, CachedResponse>();

  constructor(
    private readonly options: ResponseCacheOptions = DEFAULT_CACHE_OPTIONS,
    private readonly now: () => number = Date.now
  ) {}

  static keyFor(model: string, prompt: string): string {
    return createHash('sha256').update(`${model}\n${prompt}`).digest('hex');
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): string | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (this.now() - entry.timestamp >= this.options.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.payload;
  }

  set(key: string, payload: string): void {
    // Re-inserting moves the key to the newest position.
    this.entries.delete(key);

    while (this.entries.size >= this.options.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }

    this.entries.set(key, { payload, timestamp: this.now() });
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }
}
