/**
 * Runtime configuration read from environment variables.
 *
 * Every getter takes the environment as a parameter (defaulting to
 * `process.env`) and returns a plain object. Numeric settings that are
 * present but malformed throw {@link ConfigError} at startup.
 *
 * @module config
 */

import { parseLogLevel, type LogLevel } from './logging/logger.js';

type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(
    public readonly variable: string,
    value: string,
  ) {
    super(`Invalid value for ${variable}: "${value}" is not a positive integer`);
    this.name = 'ConfigError';
  }
}

export interface ChallengeConfig {
  otp: {
    ttlSeconds: number;
    maxAttempts: number;
    codeLength: number;
    resendWindowSeconds: number;
  };
  passkey: {
    challengeTtlSeconds: number;
  };
  push: {
    ttlSeconds: number;
    maxPendingPerUser: number;
    retentionHours: number;
  };
  housekeepingIntervalSeconds: number;
  store: {
    retryAttempts: number;
    retryBaseDelayMs: number;
    timeoutMs: number;
  };
}

export interface ServerConfig {
  port: number;
  logLevel: LogLevel;
  /** `memory` runs without PostgreSQL; state is lost on restart. */
  storeDriver: 'postgres' | 'memory';
}

export interface DbConfig {
  /** `postgres://` URL; when null `pg` reads the standard `PG*` variables. */
  connectionString: string | null;
  maxConnections: number;
  /** Server-side limit on any single statement. */
  statementTimeoutMs: number;
  ssl: boolean;
}

export interface RedisConfig {
  url: string;
  keyPrefix: string;
}

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  if (!/^\d+$/.test(raw.trim())) throw new ConfigError(name, raw);
  const value = parseInt(raw, 10);
  if (value <= 0) throw new ConfigError(name, raw);
  return value;
}

export function getChallengeConfig(env: Env = process.env): ChallengeConfig {
  return {
    otp: {
      ttlSeconds: positiveInt(env, 'OTP_TTL_SECONDS', 300),
      maxAttempts: positiveInt(env, 'OTP_MAX_ATTEMPTS', 5),
      codeLength: positiveInt(env, 'OTP_CODE_LENGTH', 6),
      resendWindowSeconds: positiveInt(env, 'OTP_RESEND_WINDOW_SECONDS', 60),
    },
    passkey: {
      challengeTtlSeconds: positiveInt(env, 'PASSKEY_CHALLENGE_TTL_SECONDS', 300),
    },
    push: {
      ttlSeconds: positiveInt(env, 'PUSH_AUTH_TTL_SECONDS', 300),
      maxPendingPerUser: positiveInt(env, 'PUSH_AUTH_MAX_PENDING', 3),
      retentionHours: positiveInt(env, 'PUSH_AUTH_RETENTION_HOURS', 24),
    },
    housekeepingIntervalSeconds: positiveInt(env, 'HOUSEKEEPING_INTERVAL_SECONDS', 60),
    store: {
      retryAttempts: positiveInt(env, 'STORE_RETRY_ATTEMPTS', 3),
      retryBaseDelayMs: positiveInt(env, 'STORE_RETRY_BASE_DELAY_MS', 50),
      timeoutMs: positiveInt(env, 'STORE_TIMEOUT_MS', 5000),
    },
  };
}

export function getServerConfig(env: Env = process.env): ServerConfig {
  return {
    port: positiveInt(env, 'PORT', 3000),
    logLevel: parseLogLevel(env['LOG_LEVEL']),
    storeDriver: env['STORE_DRIVER'] === 'memory' ? 'memory' : 'postgres',
  };
}

export function getDbConfig(env: Env = process.env): DbConfig {
  const url = env['DATABASE_URL']?.trim();
  return {
    connectionString: url ? url : null,
    maxConnections: positiveInt(env, 'DB_POOL_MAX', 10),
    statementTimeoutMs: positiveInt(env, 'DB_STATEMENT_TIMEOUT_MS', 5000),
    ssl: env['DB_SSL'] === 'true',
  };
}

export function getRedisConfig(env: Env = process.env): RedisConfig {
  return {
    url: env['REDIS_URL'] ?? 'redis://localhost:6379',
    keyPrefix: env['REDIS_KEY_PREFIX'] ?? 'challenge-auth:',
  };
}
