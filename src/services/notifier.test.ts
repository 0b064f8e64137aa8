/**
 * Unit tests for the notification adapter.
 *
 * @module services/notifier.test
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { OtpChannel, OtpPurpose, PushAuthPurpose } from '../types/index.js';
import { NotificationError } from '../utils/errors.js';
import { createLogger, type LogEntry } from '../logging/logger.js';
import {
  createLoggingTransports,
  NotifierAdapter,
  type EmailTransport,
  type OtpCodeMessage,
  type PushTransport,
  type SmsTransport,
} from './notifier.js';

// ─── Helpers ─────────────────────────────────────────────────────────────────

function createMockTransports() {
  return {
    sms: { sendSms: vi.fn<SmsTransport['sendSms']>().mockResolvedValue(undefined) },
    email: { sendMail: vi.fn<EmailTransport['sendMail']>().mockResolvedValue(undefined) },
    push: { sendPush: vi.fn<PushTransport['sendPush']>().mockResolvedValue(undefined) },
  };
}

function otpMessage(overrides: Partial<OtpCodeMessage> = {}): OtpCodeMessage {
  return {
    kind: 'OTP_CODE',
    channel: OtpChannel.SMS,
    to: '+15551234567',
    code: '042137',
    purpose: OtpPurpose.AUTHENTICATION,
    expiresInSeconds: 300,
    ...overrides,
  };
}

// ─── Tests ───────────────────────────────────────────────────────────────────

describe('NotifierAdapter', () => {
  let transports: ReturnType<typeof createMockTransports>;
  let notifier: NotifierAdapter;

  beforeEach(() => {
    transports = createMockTransports();
    notifier = new NotifierAdapter(transports, { productName: 'Acme' });
  });

  describe('OTP codes', () => {
    it('sends SMS codes through the SMS transport', async () => {
      await notifier.send(otpMessage());

      expect(transports.sms.sendSms).toHaveBeenCalledWith({
        to: '+15551234567',
        body: '042137 is your Acme verification code. It expires in 5 minutes.',
      });
      expect(transports.email.sendMail).not.toHaveBeenCalled();
    });

    it('uses the singular for a one-minute code', async () => {
      await notifier.send(otpMessage({ expiresInSeconds: 60 }));

      expect(transports.sms.sendSms.mock.calls[0]?.[0].body).toBe(
        '042137 is your Acme verification code. It expires in 1 minute.',
      );
    });

    it('sends email codes with a purpose-specific subject', async () => {
      await notifier.send(
        otpMessage({ channel: OtpChannel.EMAIL, to: 'ada@example.com', purpose: OtpPurpose.REGISTRATION }),
      );

      const mail = transports.email.sendMail.mock.calls[0]?.[0];
      expect(mail?.to).toBe('ada@example.com');
      expect(mail?.subject).toBe('Confirm your email for Acme');
      expect(mail?.html).toContain('>042137</p>');
    });

    it('uses the sign-in subject for authentication codes', async () => {
      await notifier.send(otpMessage({ channel: OtpChannel.EMAIL, to: 'ada@example.com' }));
      expect(transports.email.sendMail.mock.calls[0]?.[0].subject).toBe('Your Acme sign-in code');
    });
  });

  describe('push requests', () => {
    it('sends the request id, challenge and expiry as data', async () => {
      await notifier.send({
        kind: 'PUSH_AUTH',
        userId: 'user-1',
        requestId: 'req-1',
        challenge: 'chal',
        purpose: PushAuthPurpose.SIGN_IN,
        ipAddress: '10.0.0.1',
        location: 'Lagos',
        expiresAt: new Date('2024-06-01T10:05:00.000Z'),
      });

      expect(transports.push.sendPush).toHaveBeenCalledWith({
        userId: 'user-1',
        title: 'Acme: sign-in request',
        body: 'Approve or deny the request from Lagos · 10.0.0.1.',
        data: { requestId: 'req-1', challenge: 'chal', expiresAt: '2024-06-01T10:05:00.000Z' },
      });
    });

    it('titles recovery requests accordingly', async () => {
      await notifier.send({
        kind: 'PUSH_AUTH',
        userId: 'user-1',
        requestId: 'req-1',
        challenge: 'chal',
        purpose: PushAuthPurpose.RECOVERY,
        ipAddress: null,
        location: null,
        expiresAt: new Date('2024-06-01T10:05:00.000Z'),
      });

      const push = transports.push.sendPush.mock.calls[0]?.[0];
      expect(push?.title).toBe('Acme: account recovery request');
      expect(push?.body).toBe('Approve or deny the request.');
    });
  });

  describe('failures', () => {
    it('wraps transport errors in NotificationError', async () => {
      const cause = new Error('gateway down');
      transports.sms.sendSms.mockRejectedValueOnce(cause);

      const error = await notifier.send(otpMessage()).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(NotificationError);
      if (error instanceof NotificationError) {
        expect(error.code).toBe('NOTIFICATION_SERVICE_ERROR');
        expect(error.message).toBe('Failed to deliver SMS verification code');
        expect(error.cause).toBe(cause);
      }
    });
  });
});

describe('createLoggingTransports', () => {
  it('logs masked recipients and never the code', async () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ output: (entry) => entries.push(entry) });
    const notifier = new NotifierAdapter(createLoggingTransports(logger), { productName: 'Acme' });

    await notifier.send(otpMessage());

    expect(entries).toHaveLength(1);
    expect(entries[0]?.metadata).toEqual({ to: '+• (•••) •••-4567' });
    expect(JSON.stringify(entries)).not.toContain('042137');
  });
});
