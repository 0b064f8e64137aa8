/**
 * Attempt and time-window policy shared by every challenge manager.
 *
 * Pure functions over values the caller passes in. Expiry is reached at
 * the instant `now >= expiresAt`.
 *
 * @module policy/attemptGuard
 */

const MS_PER_SECOND = 1000;

/** Whether a record expiring at `expiresAt` is expired at `now`. */
export function isExpired(expiresAt: Date, now: Date): boolean {
  return now.getTime() >= expiresAt.getTime();
}

/** Attempts left before exhaustion, never negative. */
export function remainingAttempts(attempts: number, max: number): number {
  return Math.max(0, max - attempts);
}

/** Whether the attempt counter has reached its maximum. */
export function isExhausted(attempts: number, max: number): boolean {
  return attempts >= max;
}

/**
 * Whether a new challenge may be issued.
 *
 * @param lastIssuedAt - Previous issuance for the same key, or null if none
 * @param windowSeconds - Minimum spacing between two issuances
 */
export function canIssue(lastIssuedAt: Date | null, now: Date, windowSeconds: number): boolean {
  if (!lastIssuedAt) return true;
  return now.getTime() - lastIssuedAt.getTime() >= windowSeconds * MS_PER_SECOND;
}

/** Whole seconds until {@link canIssue} turns true; 0 when it already is. */
export function retryAfterSeconds(
  lastIssuedAt: Date | null,
  now: Date,
  windowSeconds: number,
): number {
  if (!lastIssuedAt) return 0;
  const remainingMs = lastIssuedAt.getTime() + windowSeconds * MS_PER_SECOND - now.getTime();
  return remainingMs > 0 ? Math.ceil(remainingMs / MS_PER_SECOND) : 0;
}

/** `now + seconds` as a new Date. */
export function addSeconds(now: Date, seconds: number): Date {
  return new Date(now.getTime() + seconds * MS_PER_SECOND);
}
