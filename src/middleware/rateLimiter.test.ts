/**
 * Unit tests for the Redis-backed sliding window rate limiter.
 *
 * Uses a mock Redis client to verify rate-limiting logic without
 * requiring a live Redis instance.
 *
 * @module middleware/rateLimiter.test
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  checkLimit,
  otpIssueKey,
  otpVerifyKey,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_WINDOW_SECONDS,
  RATE_LIMIT_PREFIX,
  type RateLimitRedis,
} from './rateLimiter.js';

// ─── Mock Redis ──────────────────────────────────────────────────────────────

function createMockRedis() {
  const mockEval = vi.fn();
  const redis: RateLimitRedis = { eval: mockEval };
  return { redis, mockEval };
}

const NOW = Date.parse('2024-06-01T10:00:00.000Z');

// ─── Tests ───────────────────────────────────────────────────────────────────

describe('rateLimiter', () => {
  let mocks: ReturnType<typeof createMockRedis>;

  beforeEach(() => {
    mocks = createMockRedis();
  });

  describe('key builders', () => {
    it('otpIssueKey should prefix with rl:otp-issue:', () => {
      expect(otpIssueKey('192.168.1.1')).toBe(`${RATE_LIMIT_PREFIX}otp-issue:192.168.1.1`);
    });

    it('otpVerifyKey should prefix with rl:otp-verify:', () => {
      expect(otpVerifyKey('10.0.0.1')).toBe('rl:otp-verify:10.0.0.1');
    });
  });

  describe('checkLimit', () => {
    it('should allow the first request', async () => {
      mocks.mockEval.mockResolvedValueOnce([0, String(NOW)]);

      const result = await checkLimit(mocks.redis, 'rl:otp-issue:1.2.3.4', 5, 60, NOW);

      expect(result).toEqual({
        allowed: true,
        remaining: 4,
        resetAt: new Date(NOW + 60_000),
      });
    });

    it('should allow the last request under the limit', async () => {
      mocks.mockEval.mockResolvedValueOnce([4, String(NOW - 1000)]);

      const result = await checkLimit(mocks.redis, 'k', 5, 60, NOW);

      expect(result.allowed).toBe(true);
      expect(result.remaining).toBe(0);
    });

    it('should deny at the limit and reset when the oldest entry leaves the window', async () => {
      const oldest = NOW - 45_000;
      mocks.mockEval.mockResolvedValueOnce([5, String(oldest)]);

      const result = await checkLimit(mocks.redis, 'k', 5, 60, NOW);

      expect(result).toEqual({
        allowed: false,
        remaining: 0,
        resetAt: new Date(oldest + 60_000),
      });
    });

    it('should accept a bare count reply', async () => {
      mocks.mockEval.mockResolvedValueOnce(2);

      const result = await checkLimit(mocks.redis, 'k', 5, 60, NOW);

      expect(result.remaining).toBe(2);
      expect(result.resetAt).toEqual(new Date(NOW + 60_000));
    });

    it('should pass key, window start, limit and window to the script', async () => {
      mocks.mockEval.mockResolvedValueOnce([0, String(NOW)]);

      await checkLimit(mocks.redis, 'rl:otp-issue:1.2.3.4', undefined, undefined, NOW);

      const args = mocks.mockEval.mock.calls[0] ?? [];
      // [script, numKeys, key, windowStart, limit, now, member, windowSeconds]
      expect(args[1]).toBe(1);
      expect(args[2]).toBe('rl:otp-issue:1.2.3.4');
      expect(args[3]).toBe(String(NOW - DEFAULT_WINDOW_SECONDS * 1000));
      expect(args[4]).toBe(String(DEFAULT_MAX_ATTEMPTS));
      expect(args[5]).toBe(String(NOW));
      expect(args[7]).toBe(String(DEFAULT_WINDOW_SECONDS));
    });

    it('should use a distinct member per call', async () => {
      mocks.mockEval.mockResolvedValue([0, String(NOW)]);

      await checkLimit(mocks.redis, 'k', 5, 60, NOW);
      await checkLimit(mocks.redis, 'k', 5, 60, NOW);

      const members = mocks.mockEval.mock.calls.map((call) => call[6]);
      expect(members[0]).not.toBe(members[1]);
    });
  });
});
