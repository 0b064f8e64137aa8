import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createLogger, parseLogLevel, type LogEntry, type LogOutput } from './logger.js';
import { RateLimitedError } from '../utils/errors.js';

describe('Logger', () => {
  let captured: LogEntry[];
  let output: LogOutput;

  beforeEach(() => {
    captured = [];
    output = (entry: LogEntry) => {
      captured.push(entry);
    };
  });

  describe('JSON structured output', () => {
    it('should write one JSON line to stdout by default', () => {
      const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
      const logger = createLogger({ service: 'test-svc' });

      logger.info('hello');

      expect(writeSpy).toHaveBeenCalledOnce();
      const raw = String(writeSpy.mock.calls[0]?.[0]);
      const parsed: unknown = JSON.parse(raw.trim());
      expect(parsed).toMatchObject({ level: 'info', message: 'hello', service: 'test-svc' });

      writeSpy.mockRestore();
    });

    it('should include the standard fields', () => {
      const logger = createLogger({
        output,
        context: { correlationId: 'corr-123', userId: 'u-1', component: 'otp' },
      });

      logger.info('issued');

      expect(captured).toHaveLength(1);
      expect(captured[0]).toMatchObject({
        level: 'info',
        message: 'issued',
        service: 'challenge-auth',
        correlationId: 'corr-123',
        userId: 'u-1',
        component: 'otp',
      });
    });

    it('should generate a correlation id when none is given', () => {
      createLogger({ output }).info('x');
      expect(captured[0]?.correlationId).toMatch(/^[0-9a-f-]{36}$/);
    });
  });

  describe('log levels', () => {
    it('should drop entries below the minimum level', () => {
      const logger = createLogger({ output, level: 'warn' });

      logger.debug('d');
      logger.info('i');
      logger.warn('w');
      logger.error('e');

      expect(captured.map((e) => e.level)).toEqual(['warn', 'error']);
    });

    it('parses level names case-insensitively with a fallback', () => {
      expect(parseLogLevel('DEBUG')).toBe('debug');
      expect(parseLogLevel('verbose')).toBe('info');
      expect(parseLogLevel(undefined, 'error')).toBe('error');
    });
  });

  describe('metadata', () => {
    it('should redact secret fields', () => {
      const logger = createLogger({ output });

      logger.info('otp issued', { code: '123456', salt: 'abc', codeHash: 'def', channel: 'SMS' });

      expect(captured[0]?.metadata).toEqual({
        code: '[REDACTED]',
        salt: '[REDACTED]',
        codeHash: '[REDACTED]',
        channel: 'SMS',
      });
    });

    it('should omit empty metadata', () => {
      createLogger({ output }).info('x', {});
      expect(captured[0]?.metadata).toBeUndefined();
    });
  });

  describe('errors', () => {
    it('should serialise the error with its code', () => {
      createLogger({ output }).error('throttled', new RateLimitedError(30));

      expect(captured[0]?.error).toMatchObject({
        name: 'RateLimitedError',
        message: 'Too many requests. Retry in 30 seconds.',
        code: 'AUTH_RATE_LIMITED',
      });
    });

    it('should describe non-Error values', () => {
      createLogger({ output }).error('odd', 'plain string');
      expect(captured[0]?.error).toEqual({ name: 'NonError', message: 'plain string' });
    });
  });

  describe('child loggers', () => {
    it('should inherit context, level and sink', () => {
      const parent = createLogger({ output, level: 'warn', context: { correlationId: 'c-1' } });
      const child = parent.child({ component: 'push' });

      child.info('skipped');
      child.warn('kept');

      expect(captured).toHaveLength(1);
      expect(captured[0]).toMatchObject({ correlationId: 'c-1', component: 'push', message: 'kept' });
    });
  });
});
