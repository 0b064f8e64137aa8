/**
 * Structured Logger
 *
 * JSON-structured logging with level filtering, base context and child
 * loggers. Metadata fields that can carry secret material (codes, hashes,
 * salts, key material) are redacted before an entry reaches the sink, so
 * call sites cannot leak them by accident.
 *
 * @module logging/logger
 */

import { randomUUID } from 'node:crypto';

// ─── Types ───────────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

export interface LogMetadata {
  [key: string]: unknown;
}

export interface LogContext {
  correlationId?: string;
  userId?: string;
  service?: string;
  component?: string;
}

export interface ErrorInfo {
  name: string;
  message: string;
  code?: string;
  stack?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  correlationId: string;
  component?: string;
  userId?: string;
  metadata?: LogMetadata;
  error?: ErrorInfo;
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, error?: unknown, metadata?: LogMetadata): void;
  fatal(message: string, error?: unknown, metadata?: LogMetadata): void;
  child(context: LogContext): Logger;
}

// ─── Log Level Ordering ──────────────────────────────────────────────────────

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

/** Metadata keys whose values are never written. */
const REDACTED_KEYS = new Set([
  'code',
  'otp',
  'codeHash',
  'salt',
  'secretKey',
  'publicKey',
  'password',
]);

const REDACTED = '[REDACTED]';

/**
 * Output sink for log entries. Defaults to stdout JSON.
 * Can be replaced for testing or custom transports.
 */
export type LogOutput = (entry: LogEntry) => void;

const defaultLogOutput: LogOutput = (entry: LogEntry) => {
  process.stdout.write(JSON.stringify(entry) + '\n');
};

// ─── Logger Options ──────────────────────────────────────────────────────────

export interface LoggerOptions {
  /** Service name included in every log entry. Defaults to 'challenge-auth'. */
  service?: string;
  /** Minimum log level to emit. Defaults to 'info'. */
  level?: LogLevel;
  /** Base context merged into every log entry. */
  context?: LogContext;
  /** Custom output sink. Defaults to JSON on stdout. */
  output?: LogOutput;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  return LOG_LEVELS.find((level) => level === value?.toLowerCase()) ?? fallback;
}

function redact(metadata: LogMetadata): LogMetadata {
  const safe: LogMetadata = {};
  for (const [key, value] of Object.entries(metadata)) {
    safe[key] = REDACTED_KEYS.has(key) ? REDACTED : value;
  }
  return safe;
}

function toErrorInfo(error: unknown): ErrorInfo {
  if (!(error instanceof Error)) {
    return { name: 'NonError', message: String(error) };
  }
  const info: ErrorInfo = { name: error.name, message: error.message, stack: error.stack };
  if ('code' in error && typeof error.code === 'string') info.code = error.code;
  return info;
}

// ─── Implementation ──────────────────────────────────────────────────────────

export function createLogger(options: LoggerOptions = {}): Logger {
  const service = options.service ?? 'challenge-auth';
  const minLevel = options.level ?? 'info';
  const baseContext: LogContext = {
    service,
    ...options.context,
  };
  if (!baseContext.correlationId) {
    baseContext.correlationId = randomUUID();
  }
  const output = options.output ?? defaultLogOutput;

  function buildEntry(
    level: LogLevel,
    message: string,
    error?: unknown,
    metadata?: LogMetadata,
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: baseContext.service ?? service,
      correlationId: baseContext.correlationId ?? '',
    };

    if (baseContext.component) entry.component = baseContext.component;
    if (baseContext.userId) entry.userId = baseContext.userId;
    if (metadata && Object.keys(metadata).length > 0) entry.metadata = redact(metadata);
    if (error !== undefined) entry.error = toErrorInfo(error);

    return entry;
  }

  function log(level: LogLevel, message: string, error?: unknown, metadata?: LogMetadata): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minLevel]) return;
    output(buildEntry(level, message, error, metadata));
  }

  return {
    debug(message, metadata) {
      log('debug', message, undefined, metadata);
    },
    info(message, metadata) {
      log('info', message, undefined, metadata);
    },
    warn(message, metadata) {
      log('warn', message, undefined, metadata);
    },
    error(message, error, metadata) {
      log('error', message, error, metadata);
    },
    fatal(message, error, metadata) {
      log('fatal', message, error, metadata);
    },
    child(context: LogContext): Logger {
      return createLogger({
        service,
        level: minLevel,
        context: { ...baseContext, ...context },
        output,
      });
    },
  };
}

/** Logger that drops everything; the default for components built without one. */
export const silentLogger: Logger = createLogger({ output: () => {} });
