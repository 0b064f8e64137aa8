/**
 * Redis-backed sliding window rate limiter.
 *
 * Uses a sorted set per key to track request timestamps within a
 * sliding window. Each accepted request adds a member scored by its
 * timestamp; expired members are pruned on every check. Used for per-IP
 * limits on the HTTP surface and, with a limit of one, as the Redis
 * variant of the OTP re-issuance gate.
 *
 * @module middleware/rateLimiter
 */

import type { Redis } from 'ioredis';
import type { RateLimitResult } from '../types/index.js';

/** The subset of the ioredis client the limiter needs. */
export type RateLimitRedis = Pick<Redis, 'eval'>;

// ─── Defaults ────────────────────────────────────────────────────────────────

/** Default maximum requests per IP within the window. */
export const DEFAULT_MAX_ATTEMPTS = 10;

/** Default window size in seconds (15 minutes). */
export const DEFAULT_WINDOW_SECONDS = 15 * 60;

/** Key prefix used in Redis to namespace rate-limit keys. */
export const RATE_LIMIT_PREFIX = 'rl:';

// ─── Endpoint-specific key builders ──────────────────────────────────────────

/** Rate-limit key for OTP issuance requests from a given IP. */
export function otpIssueKey(ip: string): string {
  return `${RATE_LIMIT_PREFIX}otp-issue:${ip}`;
}

/** Rate-limit key for OTP verification requests from a given IP. */
export function otpVerifyKey(ip: string): string {
  return `${RATE_LIMIT_PREFIX}otp-verify:${ip}`;
}

// ─── Core rate-limit operations ──────────────────────────────────────────────

/**
 * Prune → count → conditionally add → expire, atomically. Returns the
 * count before the add and the score of the oldest surviving member.
 */
const SLIDING_WINDOW_SCRIPT = `
  redis.call('ZREMRANGEBYSCORE', KEYS[1], '-inf', ARGV[1])
  local count = redis.call('ZCARD', KEYS[1])
  if count < tonumber(ARGV[2]) then
    redis.call('ZADD', KEYS[1], ARGV[3], ARGV[4])
  end
  redis.call('EXPIRE', KEYS[1], ARGV[5])
  local oldest = redis.call('ZRANGE', KEYS[1], 0, 0, 'WITHSCORES')
  return {count, oldest[2] or ARGV[3]}
`;

function toNumber(value: unknown): number {
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * Check whether a request identified by `key` is allowed under the
 * sliding window rate limit, recording it when it is.
 *
 * `resetAt` is when the oldest entry leaves the window, i.e. the earliest
 * instant a blocked caller can succeed.
 */
export async function checkLimit(
  redis: RateLimitRedis,
  key: string,
  limit: number = DEFAULT_MAX_ATTEMPTS,
  windowSeconds: number = DEFAULT_WINDOW_SECONDS,
  now: number = Date.now(),
): Promise<RateLimitResult> {
  const windowStart = now - windowSeconds * 1000;
  // Unique member value to avoid collisions on same-ms requests
  const member = `${now}:${Math.random().toString(36).slice(2)}`;

  const reply: unknown = await redis.eval(
    SLIDING_WINDOW_SCRIPT,
    1,
    key,
    windowStart.toString(),
    limit.toString(),
    now.toString(),
    member,
    windowSeconds.toString(),
  );

  const [rawCount, rawOldest] = Array.isArray(reply) ? reply : [reply, now];
  const currentCount = toNumber(rawCount);
  const oldest = toNumber(rawOldest ?? now);

  const allowed = currentCount < limit;
  const remaining = allowed ? limit - currentCount - 1 : 0;
  const resetAt = new Date(oldest + windowSeconds * 1000);

  return { allowed, remaining, resetAt };
}
