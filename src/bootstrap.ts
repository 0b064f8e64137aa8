/**
 * Composition root: builds the document stores, managers and housekeeping
 * worker from configuration. The HTTP server and the tests share it.
 *
 * @module bootstrap
 */

import type { ChallengeConfig, ServerConfig } from './config.js';
import type { ChallengeDependencies } from './controllers/challengeController.js';
import { silentLogger, type Logger } from './logging/logger.js';
import type { RateLimitRedis } from './middleware/rateLimiter.js';
import { AuthMethodRegistry } from './services/authMethodRegistry.js';
import { HousekeepingWorker } from './services/housekeeping.js';
import {
  RedisIssuanceThrottle,
  StoreIssuanceThrottle,
  type IssuanceThrottle,
} from './services/issuanceThrottle.js';
import {
  createLoggingTransports,
  NotifierAdapter,
  type NotificationTransports,
} from './services/notifier.js';
import { OtpChallengeManager } from './services/otpChallengeManager.js';
import { PasskeyChallengeManager } from './services/passkeyChallengeManager.js';
import { PushAuthRequestManager } from './services/pushAuthRequestManager.js';
import type { StoredDocument } from './types/index.js';
import type { CollectionSchema } from './store/codec.js';
import {
  authMethods,
  issuanceMarks,
  otpSessions,
  passkeyChallenges,
  pushAuthRequests,
} from './store/collections.js';
import type { DocumentStore } from './store/documentStore.js';
import { InMemoryDocumentStore } from './store/inMemoryDocumentStore.js';
import { PgDocumentStore } from './store/pgDocumentStore.js';
import type { RetryOptions } from './store/retry.js';

export interface ServiceOptions {
  config: ChallengeConfig;
  storeDriver: ServerConfig['storeDriver'];
  /** Product name used in message text. */
  productName?: string;
  /** When given, resend throttling is kept in Redis instead of the store. */
  redis?: RateLimitRedis;
  /** Delivery providers; defaults to transports that only log. */
  transports?: NotificationTransports;
  logger?: Logger;
  now?: () => Date;
}

export interface Services {
  challenges: ChallengeDependencies;
  throttle: IssuanceThrottle;
  housekeeping: HousekeepingWorker;
}

export function buildServices(options: ServiceOptions): Services {
  const { config } = options;
  const logger = options.logger ?? silentLogger;
  const storeLogger = logger.child({ component: 'store' });

  const retry: RetryOptions = {
    maxAttempts: config.store.retryAttempts,
    baseDelayMs: config.store.retryBaseDelayMs,
    timeoutMs: config.store.timeoutMs,
    onRetry: (err, attempt, delayMs) => {
      storeLogger.warn('Retrying storage call', {
        attempt,
        delayMs,
        reason: err instanceof Error ? err.message : String(err),
      });
    },
  };

  function open<T extends StoredDocument>(schema: CollectionSchema<T>): DocumentStore<T> {
    return options.storeDriver === 'memory'
      ? new InMemoryDocumentStore(schema)
      : new PgDocumentStore(schema, retry);
  }

  const throttle: IssuanceThrottle = options.redis
    ? new RedisIssuanceThrottle(options.redis)
    : new StoreIssuanceThrottle(open(issuanceMarks));

  const notifier = new NotifierAdapter(options.transports ?? createLoggingTransports(logger), {
    productName: options.productName ?? 'Challenge Auth',
  });

  const registry = new AuthMethodRegistry(open(authMethods), { logger, now: options.now });

  const otp = new OtpChallengeManager({
    sessions: open(otpSessions),
    throttle,
    notifier,
    registry,
    settings: config.otp,
    logger,
    now: options.now,
  });

  const passkey = new PasskeyChallengeManager({
    challenges: open(passkeyChallenges),
    registry,
    ttlSeconds: config.passkey.challengeTtlSeconds,
    logger,
    now: options.now,
  });

  const push = new PushAuthRequestManager({
    requests: open(pushAuthRequests),
    notifier,
    settings: config.push,
    logger,
    now: options.now,
  });

  const housekeeping = new HousekeepingWorker(
    { otp, passkey, push, throttle },
    {
      intervalSeconds: config.housekeepingIntervalSeconds,
      resendWindowSeconds: config.otp.resendWindowSeconds,
      retentionHours: config.push.retentionHours,
      logger,
      now: options.now,
    },
  );

  return { challenges: { otp, passkey, push, registry }, throttle, housekeeping };
}
