/**
 * One-time-password challenges for SMS and email.
 *
 * Issuance normalises the identifier, passes the per-(purpose, identifier)
 * re-issuance gate, stores only a salted hash of a fresh numeric code and
 * hands the code to the {@link Notifier}. Verification enforces expiry,
 * the attempt budget and single use with one conditional write per
 * attempt: `attempts` only ever moves `n → n+1` and `verified` only
 * `false → true`, each guarded on the values just read. A lost write
 * re-reads the session and evaluates it again.
 *
 * @module services/otpChallengeManager
 */

import {
  OtpChannel,
  OtpPurpose,
  type OtpSession,
  type OtpSessionView,
  type OtpVerifyFailure,
  type OtpVerifyResult,
} from '../types/index.js';
import type { DocumentStore } from '../store/documentStore.js';
import type { ChallengeConfig } from '../config.js';
import {
  addSeconds,
  isExhausted,
  isExpired,
  remainingAttempts,
} from '../policy/attemptGuard.js';
import {
  cryptoRandomSource,
  generateNumericCode,
  generateSalt,
  Sha256Hasher,
  type Hasher,
  type RandomSource,
} from '../crypto/challengeCrypto.js';
import { normalizeIdentifier } from '../utils/validators/identifierValidator.js';
import { maskIdentifier } from '../utils/masking.js';
import { InvalidRequestError, RateLimitedError } from '../utils/errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { IssuanceThrottle } from './issuanceThrottle.js';
import type { Notifier } from './notifier.js';
import type { AuthMethodRegistry } from './authMethodRegistry.js';

export type OtpSettings = ChallengeConfig['otp'];

export const DEFAULT_OTP_SETTINGS: OtpSettings = {
  ttlSeconds: 300,
  maxAttempts: 5,
  codeLength: 6,
  resendWindowSeconds: 60,
};

export interface IssueOtpRequest {
  identifier: string;
  countryCode?: string | null;
  purpose: OtpPurpose;
  userId?: string | null;
  ttlSeconds?: number;
}

export interface IssuedOtp {
  sessionId: string;
  expiresAt: Date;
  channel: OtpChannel;
}

export interface OtpChallengeManagerDeps {
  sessions: DocumentStore<OtpSession>;
  throttle: IssuanceThrottle;
  notifier: Notifier;
  registry: AuthMethodRegistry;
  settings?: Partial<OtpSettings>;
  hasher?: Hasher;
  random?: RandomSource;
  logger?: Logger;
  now?: () => Date;
}

export class OtpChallengeManager {
  private readonly sessions: DocumentStore<OtpSession>;
  private readonly throttle: IssuanceThrottle;
  private readonly notifier: Notifier;
  private readonly registry: AuthMethodRegistry;
  private readonly settings: OtpSettings;
  private readonly hasher: Hasher;
  private readonly random: RandomSource;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: OtpChallengeManagerDeps) {
    this.sessions = deps.sessions;
    this.throttle = deps.throttle;
    this.notifier = deps.notifier;
    this.registry = deps.registry;
    this.settings = { ...DEFAULT_OTP_SETTINGS, ...deps.settings };
    this.hasher = deps.hasher ?? new Sha256Hasher();
    this.random = deps.random ?? cryptoRandomSource;
    this.logger = (deps.logger ?? silentLogger).child({ component: 'otpChallengeManager' });
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Issue and deliver a new code.
   *
   * @throws {InvalidRequestError} When the identifier or TTL is malformed
   * @throws {RateLimitedError} When a code for the same purpose and identifier was issued inside the window
   * @throws {NotificationError} When delivery fails; the session is removed first
   */
  async issue(request: IssueOtpRequest): Promise<IssuedOtp> {
    const normalized = normalizeIdentifier(request.identifier, request.countryCode);
    if (!normalized) {
      throw new InvalidRequestError('Identifier must be a valid email address or phone number', {
        identifier: ['must be a valid email address or phone number'],
      });
    }
    const ttlSeconds = request.ttlSeconds ?? this.settings.ttlSeconds;
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
      throw new InvalidRequestError('ttlSeconds must be a positive integer', {
        ttlSeconds: ['must be a positive integer'],
      });
    }

    const { identifier, channel, countryCode } = normalized;
    const masked = maskIdentifier(identifier);
    const now = this.now();

    const decision = await this.throttle.acquire(
      `otp:${request.purpose}:${identifier}`,
      now,
      this.settings.resendWindowSeconds,
    );
    if (!decision.acquired) {
      this.logger.warn('OTP issuance throttled', {
        identifier: masked,
        purpose: request.purpose,
        retryAfterSeconds: decision.retryAfterSeconds,
      });
      throw new RateLimitedError(decision.retryAfterSeconds);
    }

    const code = generateNumericCode(this.random, this.settings.codeLength);
    const salt = generateSalt(this.random);
    const session = await this.sessions.create({
      identifier,
      countryCode,
      channel,
      userId: request.userId ?? null,
      purpose: request.purpose,
      codeHash: this.hasher.hash(code, salt),
      salt,
      createdAt: now,
      expiresAt: addSeconds(now, ttlSeconds),
      attempts: 0,
      maxAttempts: this.settings.maxAttempts,
      verified: false,
      verifiedAt: null,
      lastAttemptAt: null,
    });

    try {
      await this.notifier.send({
        kind: 'OTP_CODE',
        channel,
        to: identifier,
        code,
        purpose: request.purpose,
        expiresInSeconds: ttlSeconds,
      });
    } catch (err) {
      this.logger.error('OTP delivery failed', err, { sessionId: session.id, identifier: masked });
      await this.sessions.delete(session.id).catch((cleanupErr: unknown) => {
        this.logger.error('Failed to remove undelivered OTP session', cleanupErr, {
          sessionId: session.id,
        });
      });
      throw err;
    }

    this.logger.info('OTP issued', {
      sessionId: session.id,
      identifier: masked,
      channel,
      purpose: request.purpose,
    });
    return { sessionId: session.id, expiresAt: session.expiresAt, channel };
  }

  /** Check `suppliedCode` against the session, consuming one attempt on mismatch. */
  async verify(sessionId: string, suppliedCode: string): Promise<OtpVerifyResult> {
    let maxRounds = Number.POSITIVE_INFINITY;

    for (let round = 0; round < maxRounds; round++) {
      const session = await this.sessions.get(sessionId);
      if (!session) return { success: false, reason: 'NOT_FOUND' };
      maxRounds = Math.min(maxRounds, session.maxAttempts + 2);

      const now = this.now();
      const failure = terminalFailure(session, now);
      if (failure) return { success: false, reason: failure };

      const guard = { attempts: session.attempts, verified: false };

      if (!this.hasher.verify(suppliedCode, session.salt, session.codeHash)) {
        const attempts = session.attempts + 1;
        const updated = await this.sessions.conditionalUpdate(sessionId, guard, {
          attempts,
          lastAttemptAt: now,
        });
        if (!updated) continue;

        const remaining = remainingAttempts(attempts, session.maxAttempts);
        this.logger.warn('OTP verification failed', {
          sessionId,
          identifier: maskIdentifier(session.identifier),
          remainingAttempts: remaining,
        });
        return isExhausted(attempts, session.maxAttempts)
          ? { success: false, reason: 'EXHAUSTED' }
          : { success: false, reason: 'INVALID_CODE', remainingAttempts: remaining };
      }

      const verified = await this.sessions.conditionalUpdate(sessionId, guard, {
        verified: true,
        verifiedAt: now,
        lastAttemptAt: now,
      });
      if (!verified) continue;

      this.logger.info('OTP verified', {
        sessionId,
        identifier: maskIdentifier(session.identifier),
        purpose: session.purpose,
      });
      await this.updateRegistry(verified);
      return { success: true, session: toSessionView(verified) };
    }

    this.logger.warn('OTP verification gave up under contention', { sessionId });
    return { success: false, reason: 'EXHAUSTED' };
  }

  /** Read-only status of a session; null when unknown. */
  async getSession(sessionId: string): Promise<OtpSessionView | null> {
    const session = await this.sessions.get(sessionId);
    return session ? toSessionView(session) : null;
  }

  /** Delete sessions whose `expiresAt` is at or before `now`. */
  async purgeExpired(now: Date): Promise<number> {
    return this.sessions.deleteWhere({ notAfter: { expiresAt: now } });
  }

  private async updateRegistry(session: OtpSession): Promise<void> {
    const userId = session.userId;
    if (!userId) return;

    const type = session.channel === OtpChannel.SMS ? 'SMS_OTP' : 'EMAIL_OTP';
    const actor = { id: userId };
    try {
      const method = await this.registry.findByIdentifier(userId, type, session.identifier);
      if (!method) {
        this.logger.debug('No enrolled method for verified identifier', { sessionId: session.id, type });
        return;
      }
      const current =
        session.purpose === OtpPurpose.REGISTRATION
          ? ((await this.registry.markVerified(method, actor)) ?? method)
          : method;
      await this.registry.recordUse(current, actor);
    } catch (err) {
      this.logger.error('Failed to update authentication method after OTP verification', err, {
        sessionId: session.id,
        userId,
      });
    }
  }
}

/** Why a session can no longer be verified, checked in a fixed order. */
function terminalFailure(session: OtpSession, now: Date): OtpVerifyFailure | null {
  if (isExpired(session.expiresAt, now)) return 'EXPIRED';
  if (isExhausted(session.attempts, session.maxAttempts)) return 'EXHAUSTED';
  if (session.verified) return 'ALREADY_CONSUMED';
  return null;
}

export function toSessionView(session: OtpSession): OtpSessionView {
  const { codeHash: _codeHash, salt: _salt, ...view } = session;
  return view;
}
