/**
 * Push-notification sign-in requests.
 *
 * A request starts PENDING and reaches exactly one of APPROVED, DENIED,
 * EXPIRED or CANCELLED. Every transition is a conditional write guarded
 * on `status: PENDING`, so a user response, the expiry sweep and a bulk
 * cancel can race freely: the first committer decides the outcome and
 * the others observe it.
 *
 * A response is judged against expiry at one instant, which is also the
 * `resolvedAt` it writes, so a resolved request never records a decision
 * after its `expiresAt`. The write itself may commit up to one store round
 * trip after that instant.
 *
 * @module services/pushAuthRequestManager
 */

import {
  PushAuthDecision,
  PushAuthPurpose,
  PushAuthStatus,
  TERMINAL_PUSH_STATUSES,
  type Actor,
  type PushAuthRequest,
  type PushRespondResult,
} from '../types/index.js';
import type { DocumentStore } from '../store/documentStore.js';
import type { ChallengeConfig } from '../config.js';
import { addSeconds, isExpired } from '../policy/attemptGuard.js';
import { cryptoRandomSource, generateChallenge, type RandomSource } from '../crypto/challengeCrypto.js';
import { InvalidRequestError } from '../utils/errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { Notifier } from './notifier.js';

export type PushSettings = ChallengeConfig['push'];

export const DEFAULT_PUSH_SETTINGS: PushSettings = {
  ttlSeconds: 120,
  maxPendingPerUser: 3,
  retentionHours: 24,
};

const MS_PER_HOUR = 3_600_000;

export interface CreatePushAuthRequest {
  userId: string;
  purpose?: PushAuthPurpose;
  ipAddress?: string | null;
  userAgent?: string | null;
  location?: string | null;
  ttlSeconds?: number;
}

export interface CreatedPushAuthRequest {
  requestId: string;
  challenge: string;
  expiresAt: Date;
}

export interface PushAuthRequestManagerDeps {
  requests: DocumentStore<PushAuthRequest>;
  notifier: Notifier;
  settings?: Partial<PushSettings>;
  random?: RandomSource;
  logger?: Logger;
  now?: () => Date;
}

const PENDING = { status: PushAuthStatus.PENDING } as const;

/** Recorded as `resolvedBy` when a request runs out of time. */
export const PUSH_EXPIRY_ACTOR: Actor = { id: 'push-expiry' };

export class PushAuthRequestManager {
  private readonly requests: DocumentStore<PushAuthRequest>;
  private readonly notifier: Notifier;
  private readonly settings: PushSettings;
  private readonly random: RandomSource;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: PushAuthRequestManagerDeps) {
    this.requests = deps.requests;
    this.notifier = deps.notifier;
    this.settings = { ...DEFAULT_PUSH_SETTINGS, ...deps.settings };
    this.random = deps.random ?? cryptoRandomSource;
    this.logger = (deps.logger ?? silentLogger).child({ component: 'pushAuthRequestManager' });
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Open a PENDING request and push it to the user's devices. Older
   * pending requests beyond the per-user limit are cancelled first.
   *
   * @throws {InvalidRequestError} When the user id is blank or the TTL is not a positive integer
   * @throws {NotificationError} When the push fails; the request is cancelled first
   */
  async create(request: CreatePushAuthRequest): Promise<CreatedPushAuthRequest> {
    if (request.userId.trim().length === 0) {
      throw new InvalidRequestError('userId is required', { userId: ['is required'] });
    }
    const ttlSeconds = request.ttlSeconds ?? this.settings.ttlSeconds;
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
      throw new InvalidRequestError('ttlSeconds must be a positive integer', {
        ttlSeconds: ['must be a positive integer'],
      });
    }

    const creator: Actor = { id: request.userId };
    await this.trimPending(request.userId, creator, null);

    const now = this.now();
    const created = await this.requests.create({
      userId: request.userId,
      challenge: generateChallenge(this.random),
      status: PushAuthStatus.PENDING,
      purpose: request.purpose ?? PushAuthPurpose.SIGN_IN,
      ipAddress: request.ipAddress ?? null,
      userAgent: request.userAgent ?? null,
      location: request.location ?? null,
      createdAt: now,
      expiresAt: addSeconds(now, ttlSeconds),
      resolvedAt: null,
      resolvedBy: null,
    });
    // A concurrent create may have passed the first trim too.
    await this.trimPending(request.userId, creator, created.id);

    try {
      await this.notifier.send({
        kind: 'PUSH_AUTH',
        userId: created.userId,
        requestId: created.id,
        challenge: created.challenge,
        purpose: created.purpose,
        ipAddress: created.ipAddress,
        location: created.location,
        expiresAt: created.expiresAt,
      });
    } catch (err) {
      this.logger.error('Push delivery failed', err, { requestId: created.id, userId: created.userId });
      await this.transition(created.id, PushAuthStatus.CANCELLED, creator).catch((cleanupErr: unknown) => {
        this.logger.error('Failed to cancel undelivered push request', cleanupErr, {
          requestId: created.id,
        });
      });
      throw err;
    }

    this.logger.info('Push auth request created', {
      requestId: created.id,
      userId: created.userId,
      purpose: created.purpose,
    });
    return { requestId: created.id, challenge: created.challenge, expiresAt: created.expiresAt };
  }

  /** Approve or deny on behalf of `actor`, who must own the request. */
  async respond(requestId: string, decision: PushAuthDecision, actor: Actor): Promise<PushRespondResult> {
    const request = await this.requests.get(requestId);
    if (!request) return { success: false, reason: 'NOT_FOUND' };
    return this.respondTo(request, decision, actor);
  }

  /** {@link respond}, looking the request up by its challenge value. */
  async respondByChallenge(
    challenge: string,
    decision: PushAuthDecision,
    actor: Actor,
  ): Promise<PushRespondResult> {
    const [request] = await this.requests.find({ equals: { challenge }, limit: 1 });
    if (!request) return { success: false, reason: 'NOT_FOUND' };
    return this.respondTo(request, decision, actor);
  }

  /**
   * Current state of a request; null when unknown. An overdue PENDING
   * request is expired on the way out.
   */
  async poll(requestId: string): Promise<PushAuthRequest | null> {
    const request = await this.requests.get(requestId);
    if (!request) return null;
    if (request.status !== PushAuthStatus.PENDING || !isExpired(request.expiresAt, this.now())) {
      return request;
    }

    const expired = await this.transition(request.id, PushAuthStatus.EXPIRED, PUSH_EXPIRY_ACTOR);
    return expired ?? this.requests.get(requestId);
  }

  /** Cancel one PENDING request; false when it is missing, not pending, or not the actor's. */
  async cancel(requestId: string, actor: Actor): Promise<boolean> {
    const request = await this.requests.get(requestId);
    if (!request || request.userId !== actor.id) return false;
    return (await this.transition(requestId, PushAuthStatus.CANCELLED, actor)) !== null;
  }

  /**
   * Cancel every PENDING request of the user, e.g. after they signed in
   * another way. Returns how many this call cancelled.
   */
  async cancelPendingForUser(userId: string, actor: Actor): Promise<number> {
    const pending = await this.requests.find({ equals: { userId, status: PushAuthStatus.PENDING } });
    const cancelled = await this.transitionAll(pending, PushAuthStatus.CANCELLED, actor);
    if (cancelled > 0) {
      this.logger.info('Pending push requests cancelled', { userId, count: cancelled, actor: actor.id });
    }
    return cancelled;
  }

  /** Expire every PENDING request with `expiresAt <= now`. */
  async expireSweep(now: Date, actor: Actor = PUSH_EXPIRY_ACTOR): Promise<number> {
    const overdue = await this.requests.find({
      equals: { status: PushAuthStatus.PENDING },
      notAfter: { expiresAt: now },
    });
    return this.transitionAll(overdue, PushAuthStatus.EXPIRED, actor);
  }

  async markExpired(): Promise<number> {
    return this.expireSweep(this.now());
  }

  /** Delete terminal requests created at or before `now - olderThanHours`. */
  async deleteOldRequests(olderThanHours: number = this.settings.retentionHours): Promise<number> {
    const cutoff = new Date(this.now().getTime() - olderThanHours * MS_PER_HOUR);
    return this.requests.deleteWhere({
      oneOf: { status: TERMINAL_PUSH_STATUSES },
      notAfter: { createdAt: cutoff },
    });
  }

  private async respondTo(
    request: PushAuthRequest,
    decision: PushAuthDecision,
    actor: Actor,
  ): Promise<PushRespondResult> {
    if (request.userId !== actor.id) {
      this.logger.warn('Push response from another user', { requestId: request.id, actor: actor.id });
      return { success: false, reason: 'USER_MISMATCH' };
    }
    if (request.status !== PushAuthStatus.PENDING) {
      return { success: false, reason: 'INVALID_TRANSITION', status: request.status };
    }
    const decidedAt = this.now();
    if (isExpired(request.expiresAt, decidedAt)) {
      await this.transition(request.id, PushAuthStatus.EXPIRED, PUSH_EXPIRY_ACTOR, decidedAt);
      return { success: false, reason: 'EXPIRED' };
    }

    const target = decision === PushAuthDecision.APPROVE ? PushAuthStatus.APPROVED : PushAuthStatus.DENIED;
    const resolved = await this.transition(request.id, target, actor, decidedAt);
    if (resolved) {
      this.logger.info('Push auth request resolved', { requestId: request.id, status: target });
      return { success: true, request: resolved };
    }

    const current = await this.requests.get(request.id);
    return current
      ? { success: false, reason: 'INVALID_TRANSITION', status: current.status }
      : { success: false, reason: 'NOT_FOUND' };
  }

  private async transition(
    requestId: string,
    status: PushAuthStatus,
    actor: Actor,
    at: Date = this.now(),
  ): Promise<PushAuthRequest | null> {
    return this.requests.conditionalUpdate(requestId, PENDING, {
      status,
      resolvedAt: at,
      resolvedBy: actor.id,
    });
  }

  private async transitionAll(
    requests: PushAuthRequest[],
    status: PushAuthStatus,
    actor: Actor,
  ): Promise<number> {
    let changed = 0;
    for (const request of requests) {
      if (await this.transition(request.id, status, actor)) changed++;
    }
    return changed;
  }

  /**
   * Cancel the oldest PENDING requests of the user, other than `keepId`,
   * until one more request fits the limit.
   */
  private async trimPending(userId: string, actor: Actor, keepId: string | null): Promise<void> {
    const pending = await this.requests.find({
      equals: { userId, status: PushAuthStatus.PENDING },
      orderBy: 'createdAt',
    });
    const others = pending.filter((request) => request.id !== keepId);
    const surplus = others.length - (this.settings.maxPendingPerUser - 1);
    if (surplus <= 0) return;

    const cancelled = await this.transitionAll(others.slice(0, surplus), PushAuthStatus.CANCELLED, actor);
    this.logger.info('Oldest pending push requests superseded', { userId, count: cancelled });
  }
}
