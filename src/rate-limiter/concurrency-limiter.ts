import { BackpressureError } from '../errors/errors.js';
import logger from '../config/logger.js';

export const DEFAULT_MAX_CONCURRENT = 16;

export interface ConcurrencyStatus {
  inFlight: number;
  limit: number;
}

export type Release = () => void;

/**
 * Per-provider cap on concurrent outbound calls. Requests over the cap fail
 * immediately with BackpressureError; nothing is queued.
 */
export class ConcurrencyLimiter {
  private limits: Map<string, number>;
  private inFlight: Map<string, number>;
  private defaultLimit: number;

  constructor(limits: Record<string, number> = {}, defaultLimit: number = DEFAULT_MAX_CONCURRENT) {
    this.limits = new Map(Object.entries(limits));
    this.inFlight = new Map();
    this.defaultLimit = defaultLimit;
  }

  /**
   * Takes a slot for `provider`. The returned function frees it and is safe
   * to call more than once.
   */
  tryAcquire(provider: string): Release {
    const limit = this.limitFor(provider);
    const current = this.inFlight.get(provider) ?? 0;

    if (current >= limit) {
      logger.warn({ provider, limit }, 'Concurrency limit reached, rejecting request');
      throw new BackpressureError(`Too many concurrent requests to provider ${provider} (limit ${limit})`, {
        provider,
      });
    }

    this.inFlight.set(provider, current + 1);
    logger.debug({ provider, inFlight: current + 1 }, 'Concurrency slot acquired');

    let released = false;
    return () => {
      if (released) return;
      released = true;
      const remaining = (this.inFlight.get(provider) ?? 1) - 1;
      if (remaining <= 0) {
        this.inFlight.delete(provider);
      } else {
        this.inFlight.set(provider, remaining);
      }
    };
  }

  setLimit(provider: string, limit: number | undefined): void {
    if (limit === undefined) {
      this.limits.delete(provider);
    } else {
      this.limits.set(provider, limit);
    }
  }

  getStatus(provider: string): ConcurrencyStatus {
    return { inFlight: this.inFlight.get(provider) ?? 0, limit: this.limitFor(provider) };
  }

  private limitFor(provider: string): number {
    return this.limits.get(provider) ?? this.defaultLimit;
  }
}
