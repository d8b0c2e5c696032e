import type { ModelCacheEntry, ModelInfo } from '../types/index.js';
import type { ModelCache } from './model-cache.js';
import logger from '../config/logger.js';

export type ModelFetcher = (provider: string) => Promise<ModelInfo[]>;

export interface ProviderModels {
  provider: string;
  models: ModelInfo[];
}

/**
 * Serves model lists from the cache. A missing entry is fetched and awaited;
 * a stale one is returned as is while a background refresh replaces it.
 */
export class ModelCatalog {
  private cache: ModelCache;
  private fetcher: ModelFetcher;
  private refreshing: Map<string, Promise<ModelCacheEntry>> = new Map();

  constructor(cache: ModelCache, fetcher: ModelFetcher) {
    this.cache = cache;
    this.fetcher = fetcher;
  }

  async getModels(provider: string, options: { forceRefresh?: boolean } = {}): Promise<ModelInfo[]> {
    const entry = this.cache.get(provider);
    if (!entry || options.forceRefresh) {
      return (await this.refresh(provider)).models;
    }
    if (this.cache.isStale(entry)) {
      void this.refresh(provider).catch((error: unknown) => {
        logger.warn(
          { provider, error: error instanceof Error ? error.message : String(error) },
          'Background model refresh failed; serving stale list'
        );
      });
    }
    return entry.models;
  }

  /**
   * Fetches and stores the provider's models. Concurrent calls share one fetch.
   */
  refresh(provider: string): Promise<ModelCacheEntry> {
    const pending = this.refreshing.get(provider);
    if (pending) {
      return pending;
    }
    const promise = this.fetcher(provider)
      .then((models) => {
        logger.info({ provider, count: models.length }, 'Model list refreshed');
        return this.cache.set(provider, models);
      })
      .finally(() => {
        this.refreshing.delete(provider);
      });
    this.refreshing.set(provider, promise);
    return promise;
  }

  /**
   * Models of every listed provider. Providers whose listing fails are
   * logged and left out.
   */
  async listAll(providers: string[]): Promise<ProviderModels[]> {
    const results = await Promise.allSettled(providers.map((provider) => this.getModels(provider)));
    const out: ProviderModels[] = [];
    results.forEach((result, i) => {
      if (result.status === 'fulfilled') {
        out.push({ provider: providers[i], models: result.value });
      } else {
        logger.warn(
          {
            provider: providers[i],
            error: result.reason instanceof Error ? result.reason.message : String(result.reason),
          },
          'Failed to list models'
        );
      }
    });
    return out;
  }

  invalidate(provider: string): void {
    this.cache.delete(provider);
  }
}
