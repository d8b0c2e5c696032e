import type { ModelCacheEntry, ModelInfo } from '../types/index.js';

export const DEFAULT_MODEL_CACHE_TTL_MS = 24 * 60 * 60 * 1000;

/**
 * Store of per-provider model lists. Entries past their TTL are still
 * returned; callers decide whether to refresh.
 */
export interface ModelCache {
  get(provider: string): ModelCacheEntry | undefined;
  set(provider: string, models: ModelInfo[]): ModelCacheEntry;
  delete(provider: string): void;
  isStale(entry: ModelCacheEntry): boolean;
}

export class MemoryModelCache implements ModelCache {
  private snapshot: ReadonlyMap<string, ModelCacheEntry> = new Map();
  private ttlMs: number;
  private now: () => number;

  constructor(ttlMs: number = DEFAULT_MODEL_CACHE_TTL_MS, now: () => number = Date.now) {
    this.ttlMs = ttlMs;
    this.now = now;
  }

  get(provider: string): ModelCacheEntry | undefined {
    return this.snapshot.get(provider);
  }

  set(provider: string, models: ModelInfo[]): ModelCacheEntry {
    const entry: ModelCacheEntry = Object.freeze({
      provider,
      models: [...models],
      refreshedAt: this.now(),
      ttlMs: this.ttlMs,
    });
    const next = new Map(this.snapshot);
    next.set(provider, entry);
    this.snapshot = next;
    return entry;
  }

  delete(provider: string): void {
    if (!this.snapshot.has(provider)) return;
    const next = new Map(this.snapshot);
    next.delete(provider);
    this.snapshot = next;
  }

  isStale(entry: ModelCacheEntry): boolean {
    return this.now() - entry.refreshedAt >= entry.ttlMs;
  }
}
