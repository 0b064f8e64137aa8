/**
 * Public entry point: managers, stores and the HTTP app factory for
 * one-time passwords, passkey challenges and push sign-in requests.
 *
 * @module challenge-auth-core
 */

// ─── Domain Types ───
export {
  CHALLENGE_ERROR_CODES,
  OtpChannel,
  OtpPurpose,
  PasskeyChallengeType,
  PushAuthDecision,
  PushAuthPurpose,
  PushAuthStatus,
  SecurityLevel,
  TERMINAL_PUSH_STATUSES,
} from './types/index.js';
export type {
  Actor,
  AuthenticationMethod,
  AuthMethodMetadata,
  AuthMethodType,
  AuthMethodView,
  ChallengeErrorCode,
  ErrorResponse,
  IssuanceMark,
  OtpSession,
  OtpSessionView,
  OtpVerifyResult,
  PasskeyChallenge,
  PasskeyConsumeResult,
  PushAuthRequest,
  PushRespondResult,
} from './types/index.js';

// ─── Errors ───
export * from './utils/errors.js';

// ─── Storage ───
export type { DocumentPatch, DocumentQuery, DocumentStore } from './store/documentStore.js';
export { InMemoryDocumentStore } from './store/inMemoryDocumentStore.js';
export { PgDocumentStore } from './store/pgDocumentStore.js';
export * as collections from './store/collections.js';

// ─── Services ───
export * as attemptGuard from './policy/attemptGuard.js';
export { AuthMethodRegistry } from './services/authMethodRegistry.js';
export { OtpChallengeManager } from './services/otpChallengeManager.js';
export { PasskeyChallengeManager } from './services/passkeyChallengeManager.js';
export { PushAuthRequestManager } from './services/pushAuthRequestManager.js';
export { HousekeepingWorker } from './services/housekeeping.js';
export {
  RedisIssuanceThrottle,
  StoreIssuanceThrottle,
  type IssuanceThrottle,
} from './services/issuanceThrottle.js';
export {
  createLoggingTransports,
  NotifierAdapter,
  type NotificationTransports,
  type Notifier,
} from './services/notifier.js';

// ─── Composition ───
export { buildServices, type ServiceOptions, type Services } from './bootstrap.js';
export { createApp, type AppDependencies } from './app.js';
export { getChallengeConfig, getDbConfig, getRedisConfig, getServerConfig } from './config.js';
export { createLogger, type Logger } from './logging/logger.js';
