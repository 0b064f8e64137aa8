/**
 * Re-issuance gate for challenges.
 *
 * `acquire` decides and records in one step: when it reports `acquired`,
 * the issuance time has already been written, so two concurrent callers
 * for the same key can never both pass.
 *
 * Two implementations:
 * - {@link StoreIssuanceThrottle} keeps an {@link IssuanceMark} per key in
 *   the document store and advances it with a conditional write;
 * - {@link RedisIssuanceThrottle} runs the sliding-window limiter with a
 *   limit of one.
 *
 * @module services/issuanceThrottle
 */

import type { IssuanceMark } from '../types/index.js';
import type { DocumentStore } from '../store/documentStore.js';
import { addSeconds, canIssue, retryAfterSeconds } from '../policy/attemptGuard.js';
import { checkLimit, type RateLimitRedis } from '../middleware/rateLimiter.js';

export type ThrottleDecision = { acquired: true } | { acquired: false; retryAfterSeconds: number };

export interface IssuanceThrottle {
  acquire(key: string, now: Date, windowSeconds: number): Promise<ThrottleDecision>;
  /** Drop marks whose window has elapsed; returns how many were removed. */
  purgeStale(now: Date, windowSeconds: number): Promise<number>;
}

/** Bound on lost races before a contended key is reported as throttled. */
const MAX_ACQUIRE_ROUNDS = 3;

export class StoreIssuanceThrottle implements IssuanceThrottle {
  constructor(private readonly marks: DocumentStore<IssuanceMark>) {}

  async acquire(key: string, now: Date, windowSeconds: number): Promise<ThrottleDecision> {
    for (let round = 0; round < MAX_ACQUIRE_ROUNDS; round++) {
      const mark = await this.marks.get(key);

      if (!mark) {
        const created = await this.marks.createWithId(key, { lastIssuedAt: now });
        if (created) return { acquired: true };
        continue;
      }

      if (!canIssue(mark.lastIssuedAt, now, windowSeconds)) {
        return {
          acquired: false,
          retryAfterSeconds: retryAfterSeconds(mark.lastIssuedAt, now, windowSeconds),
        };
      }

      const advanced = await this.marks.conditionalUpdate(
        key,
        { lastIssuedAt: mark.lastIssuedAt },
        { lastIssuedAt: now },
      );
      if (advanced) return { acquired: true };
    }

    // Every round lost to a concurrent issuance for the same key.
    return { acquired: false, retryAfterSeconds: windowSeconds };
  }

  async purgeStale(now: Date, windowSeconds: number): Promise<number> {
    return this.marks.deleteWhere({
      notAfter: { lastIssuedAt: addSeconds(now, -windowSeconds) },
    });
  }
}

export class RedisIssuanceThrottle implements IssuanceThrottle {
  constructor(
    private readonly redis: RateLimitRedis,
    private readonly keyPrefix = 'throttle:',
  ) {}

  async acquire(key: string, now: Date, windowSeconds: number): Promise<ThrottleDecision> {
    const result = await checkLimit(
      this.redis,
      `${this.keyPrefix}${key}`,
      1,
      windowSeconds,
      now.getTime(),
    );
    if (result.allowed) return { acquired: true };

    const waitMs = result.resetAt.getTime() - now.getTime();
    return { acquired: false, retryAfterSeconds: Math.max(1, Math.ceil(waitMs / 1000)) };
  }

  /** Redis expires the keys itself. */
  async purgeStale(): Promise<number> {
    return 0;
  }
}
