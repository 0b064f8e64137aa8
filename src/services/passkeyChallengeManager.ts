/**
 * Single-use WebAuthn challenges.
 *
 * A challenge is consumed by one conditional write guarded on
 * `used: false`; whoever commits first wins and every other caller sees
 * `ALREADY_USED`. Authentication challenges may be bound to the one
 * credential that is allowed to answer them.
 *
 * @module services/passkeyChallengeManager
 */

import {
  PasskeyChallengeType,
  type PasskeyChallenge,
  type PasskeyConsumeResult,
} from '../types/index.js';
import type { DocumentStore } from '../store/documentStore.js';
import { addSeconds, isExpired } from '../policy/attemptGuard.js';
import { cryptoRandomSource, generateChallenge, type RandomSource } from '../crypto/challengeCrypto.js';
import { InvalidRequestError } from '../utils/errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { AuthMethodRegistry } from './authMethodRegistry.js';

export const DEFAULT_PASSKEY_CHALLENGE_TTL_SECONDS = 300;

export interface IssuePasskeyChallengeRequest {
  userId: string;
  type: PasskeyChallengeType;
  sessionId?: string | null;
  credentialId?: string | null;
  ttlSeconds?: number;
}

export interface IssuedPasskeyChallenge {
  challengeId: string;
  challenge: string;
  expiresAt: Date;
}

export interface PasskeyChallengeManagerDeps {
  challenges: DocumentStore<PasskeyChallenge>;
  registry: AuthMethodRegistry;
  ttlSeconds?: number;
  random?: RandomSource;
  logger?: Logger;
  now?: () => Date;
}

export class PasskeyChallengeManager {
  private readonly challenges: DocumentStore<PasskeyChallenge>;
  private readonly registry: AuthMethodRegistry;
  private readonly ttlSeconds: number;
  private readonly random: RandomSource;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: PasskeyChallengeManagerDeps) {
    this.challenges = deps.challenges;
    this.registry = deps.registry;
    this.ttlSeconds = deps.ttlSeconds ?? DEFAULT_PASSKEY_CHALLENGE_TTL_SECONDS;
    this.random = deps.random ?? cryptoRandomSource;
    this.logger = (deps.logger ?? silentLogger).child({ component: 'passkeyChallengeManager' });
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * @throws {InvalidRequestError} When the user id is blank, the TTL is not a
   *   positive integer, or a credential is bound to a registration challenge
   */
  async issue(request: IssuePasskeyChallengeRequest): Promise<IssuedPasskeyChallenge> {
    const fields: Record<string, string[]> = {};
    if (request.userId.trim().length === 0) fields['userId'] = ['is required'];
    if (request.credentialId && request.type === PasskeyChallengeType.REGISTRATION) {
      fields['credentialId'] = ['is only allowed on authentication challenges'];
    }
    const ttlSeconds = request.ttlSeconds ?? this.ttlSeconds;
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
      fields['ttlSeconds'] = ['must be a positive integer'];
    }
    if (Object.keys(fields).length > 0) {
      throw new InvalidRequestError('Invalid passkey challenge request', fields);
    }

    const now = this.now();
    const record = await this.challenges.create({
      challenge: generateChallenge(this.random),
      userId: request.userId,
      sessionId: request.sessionId ?? null,
      credentialId: request.credentialId ?? null,
      type: request.type,
      used: false,
      usedAt: null,
      respondingCredentialId: null,
      createdAt: now,
      expiresAt: addSeconds(now, ttlSeconds),
    });

    this.logger.info('Passkey challenge issued', {
      challengeId: record.id,
      userId: record.userId,
      type: record.type,
      bound: record.credentialId !== null,
    });
    return { challengeId: record.id, challenge: record.challenge, expiresAt: record.expiresAt };
  }

  async consume(challengeId: string, respondingCredentialId?: string | null): Promise<PasskeyConsumeResult> {
    const record = await this.challenges.get(challengeId);
    return record
      ? this.consumeRecord(record, respondingCredentialId ?? null)
      : { success: false, reason: 'NOT_FOUND' };
  }

  /** Consume by the challenge value echoed back in WebAuthn client data. */
  async consumeByValue(challenge: string, respondingCredentialId?: string | null): Promise<PasskeyConsumeResult> {
    const [record] = await this.challenges.find({ equals: { challenge }, limit: 1 });
    return record
      ? this.consumeRecord(record, respondingCredentialId ?? null)
      : { success: false, reason: 'NOT_FOUND' };
  }

  /** Delete challenges whose `expiresAt` is at or before `now`. */
  async purgeExpired(now: Date): Promise<number> {
    return this.challenges.deleteWhere({ notAfter: { expiresAt: now } });
  }

  private async consumeRecord(
    record: PasskeyChallenge,
    respondingCredentialId: string | null,
  ): Promise<PasskeyConsumeResult> {
    const now = this.now();
    if (isExpired(record.expiresAt, now)) return { success: false, reason: 'EXPIRED' };
    if (record.used) return { success: false, reason: 'ALREADY_USED' };
    if (record.credentialId !== null && record.credentialId !== respondingCredentialId) {
      this.logger.warn('Passkey challenge answered by another credential', {
        challengeId: record.id,
        userId: record.userId,
      });
      return { success: false, reason: 'CREDENTIAL_MISMATCH' };
    }

    const consumed = await this.challenges.conditionalUpdate(
      record.id,
      { used: false },
      { used: true, usedAt: now, respondingCredentialId },
    );
    if (!consumed) {
      // Lost to a concurrent consume, or purged in between.
      const current = await this.challenges.get(record.id);
      return { success: false, reason: current ? 'ALREADY_USED' : 'NOT_FOUND' };
    }

    this.logger.info('Passkey challenge consumed', { challengeId: record.id, type: record.type });
    if (consumed.type === PasskeyChallengeType.AUTHENTICATION && respondingCredentialId) {
      await this.recordPasskeyUse(consumed, respondingCredentialId);
    }
    return { success: true, challenge: consumed };
  }

  private async recordPasskeyUse(challenge: PasskeyChallenge, credentialId: string): Promise<void> {
    try {
      const method = await this.registry.findByCredentialId(challenge.userId, credentialId);
      if (method) await this.registry.recordUse(method, { id: challenge.userId });
    } catch (err) {
      this.logger.error('Failed to record passkey use', err, {
        challengeId: challenge.id,
        userId: challenge.userId,
      });
    }
  }
}
