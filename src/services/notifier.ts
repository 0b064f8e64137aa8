/**
 * Notification adapter for challenge delivery.
 *
 * Formats OTP codes and push-authentication prompts and hands them to
 * injected transports (an SMS gateway, an email provider, a push
 * service). Transport failures surface as {@link NotificationError} so
 * managers can roll back the record they just created.
 *
 * The adapter never logs message content: an OTP code only ever exists
 * in the transport payload.
 *
 * @module services/notifier
 */

import {
  OtpChannel,
  OtpPurpose,
  PushAuthPurpose,
} from '../types/index.js';
import { NotificationError } from '../utils/errors.js';
import type { Logger } from '../logging/logger.js';
import { maskIdentifier } from '../utils/masking.js';

// ─── Transports ──────────────────────────────────────────────────────────────

export interface SmsTransport {
  sendSms(options: { to: string; body: string }): Promise<void>;
}

export interface EmailTransport {
  sendMail(options: { to: string; subject: string; html: string }): Promise<void>;
}

export interface PushTransport {
  sendPush(options: {
    userId: string;
    title: string;
    body: string;
    data: Record<string, string>;
  }): Promise<void>;
}

export interface NotificationTransports {
  sms: SmsTransport;
  email: EmailTransport;
  push: PushTransport;
}

// ─── Messages ────────────────────────────────────────────────────────────────

export interface OtpCodeMessage {
  kind: 'OTP_CODE';
  channel: OtpChannel;
  to: string;
  code: string;
  purpose: OtpPurpose;
  expiresInSeconds: number;
}

export interface PushAuthMessage {
  kind: 'PUSH_AUTH';
  userId: string;
  requestId: string;
  challenge: string;
  purpose: PushAuthPurpose;
  ipAddress: string | null;
  location: string | null;
  expiresAt: Date;
}

export type NotificationMessage = OtpCodeMessage | PushAuthMessage;

export interface Notifier {
  send(message: NotificationMessage): Promise<void>;
}

export interface NotifierConfig {
  /** Product name shown in message text. */
  productName: string;
}

// ─── Adapter Implementation ──────────────────────────────────────────────────

export class NotifierAdapter implements Notifier {
  constructor(
    private readonly transports: NotificationTransports,
    private readonly config: NotifierConfig,
  ) {}

  /**
   * @throws {NotificationError} When the transport fails to deliver
   */
  async send(message: NotificationMessage): Promise<void> {
    try {
      await this.dispatch(message);
    } catch (err) {
      throw new NotificationError(`Failed to deliver ${describeMessage(message)}`, err);
    }
  }

  private async dispatch(message: NotificationMessage): Promise<void> {
    if (message.kind === 'PUSH_AUTH') {
      await this.transports.push.sendPush({
        userId: message.userId,
        title: pushTitle(message.purpose, this.config.productName),
        body: pushBody(message),
        data: {
          requestId: message.requestId,
          challenge: message.challenge,
          expiresAt: message.expiresAt.toISOString(),
        },
      });
      return;
    }

    const minutes = Math.max(1, Math.round(message.expiresInSeconds / 60));
    if (message.channel === OtpChannel.SMS) {
      await this.transports.sms.sendSms({
        to: message.to,
        body: `${message.code} is your ${this.config.productName} verification code. It expires in ${minutes} minute${minutes === 1 ? '' : 's'}.`,
      });
      return;
    }

    await this.transports.email.sendMail({
      to: message.to,
      subject: emailSubject(message.purpose, this.config.productName),
      html: buildCodeHtml(message.code, minutes, this.config.productName),
    });
  }
}

function describeMessage(message: NotificationMessage): string {
  return message.kind === 'PUSH_AUTH'
    ? 'push authentication request'
    : `${message.channel === OtpChannel.SMS ? 'SMS' : 'email'} verification code`;
}

function emailSubject(purpose: OtpPurpose, productName: string): string {
  return purpose === OtpPurpose.REGISTRATION
    ? `Confirm your email for ${productName}`
    : `Your ${productName} sign-in code`;
}

function pushTitle(purpose: PushAuthPurpose, productName: string): string {
  switch (purpose) {
    case PushAuthPurpose.MFA:
      return `${productName}: confirm it's you`;
    case PushAuthPurpose.RECOVERY:
      return `${productName}: account recovery request`;
    default:
      return `${productName}: sign-in request`;
  }
}

function pushBody(message: PushAuthMessage): string {
  const origin = [message.location, message.ipAddress].filter(Boolean).join(' · ');
  return origin
    ? `Approve or deny the request from ${origin}.`
    : 'Approve or deny the request.';
}

function buildCodeHtml(code: string, minutes: number, productName: string): string {
  return [
    '<div style="font-family: sans-serif; max-width: 480px; margin: 0 auto;">',
    `<h2>${productName} verification code</h2>`,
    `<p style="font-size: 28px; letter-spacing: 6px; font-weight: bold;">${code}</p>`,
    `<p>This code expires in ${minutes} minute${minutes === 1 ? '' : 's'}.</p>`,
    '<p>If you did not request this code, you can safely ignore this email.</p>',
    '</div>',
  ].join('\n');
}

// ─── Development Transports ──────────────────────────────────────────────────

/**
 * Transports that only record that a delivery happened, with the
 * recipient masked. For running the service without real providers.
 */
export function createLoggingTransports(logger: Logger): NotificationTransports {
  return {
    sms: {
      async sendSms({ to }) {
        logger.info('SMS delivery (logging transport)', { to: maskIdentifier(to) });
      },
    },
    email: {
      async sendMail({ to, subject }) {
        logger.info('Email delivery (logging transport)', { to: maskIdentifier(to), subject });
      },
    },
    push: {
      async sendPush({ userId, title, data }) {
        logger.info('Push delivery (logging transport)', {
          userId,
          title,
          requestId: data['requestId'],
        });
      },
    },
  };
}
