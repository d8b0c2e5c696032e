import { describe, it, expect, beforeEach } from 'vitest';
import fc from 'fast-check';
import { ConcurrencyLimiter, DEFAULT_MAX_CONCURRENT } from '../src/rate-limiter/concurrency-limiter.js';
import { BackpressureError } from '../src/errors/errors.js';

describe('ConcurrencyLimiter', () => {
  let limiter: ConcurrencyLimiter;

  beforeEach(() => {
    limiter = new ConcurrencyLimiter({ openai: 2 });
  });

  describe('unit tests', () => {
    it('tryAcquire counts slots until the limit', () => {
      limiter.tryAcquire('openai');
      limiter.tryAcquire('openai');

      expect(limiter.getStatus('openai')).toEqual({ inFlight: 2, limit: 2 });
    });

    it('tryAcquire rejects over the limit without queueing', () => {
      limiter.tryAcquire('openai');
      limiter.tryAcquire('openai');

      expect(() => limiter.tryAcquire('openai')).toThrow(BackpressureError);
      expect(limiter.getStatus('openai').inFlight).toBe(2);
    });

    it('release frees exactly one slot, even when called twice', () => {
      const release = limiter.tryAcquire('openai');
      limiter.tryAcquire('openai');

      release();
      release();

      expect(limiter.getStatus('openai').inFlight).toBe(1);
      expect(() => limiter.tryAcquire('openai')).not.toThrow();
    });

    it('providers without a configured limit use the default', () => {
      expect(limiter.getStatus('ollama')).toEqual({ inFlight: 0, limit: DEFAULT_MAX_CONCURRENT });
    });

    it('setLimit changes and clears a provider limit', () => {
      limiter.setLimit('openai', 1);
      limiter.tryAcquire('openai');
      expect(() => limiter.tryAcquire('openai')).toThrow('Too many concurrent requests to provider openai (limit 1)');

      limiter.setLimit('openai', undefined);
      expect(limiter.getStatus('openai').limit).toBe(DEFAULT_MAX_CONCURRENT);
    });

    it('limits are tracked per provider', () => {
      limiter.tryAcquire('openai');
      limiter.tryAcquire('openai');

      expect(() => limiter.tryAcquire('gemini')).not.toThrow();
    });
  });

  describe('property-based tests', () => {
    it('in-flight count never exceeds the limit and returns to zero', () => {
      fc.assert(
        fc.property(fc.integer({ min: 1, max: 5 }), fc.array(fc.boolean(), { maxLength: 40 }), (limit, ops) => {
          const l = new ConcurrencyLimiter({ p: limit });
          const held: Array<() => void> = [];
          for (const acquire of ops) {
            if (acquire) {
              try {
                held.push(l.tryAcquire('p'));
              } catch (error) {
                expect(error).toBeInstanceOf(BackpressureError);
                expect(held).toHaveLength(limit);
              }
            } else {
              held.pop()?.();
            }
            expect(l.getStatus('p').inFlight).toBe(held.length);
            expect(held.length).toBeLessThanOrEqual(limit);
          }
          held.forEach((release) => release());
          expect(l.getStatus('p').inFlight).toBe(0);
        })
      );
    });
  });
});
