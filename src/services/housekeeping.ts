/**
 * Periodic cleanup of challenge records.
 *
 * Each run expires overdue push requests, deletes old terminal ones and
 * purges expired OTP sessions, passkey challenges and stale issuance
 * marks. Sweeps are independent: one failing is logged and the others
 * still run. Every sweep only touches records it may legally change, so
 * several instances can run the worker at once.
 *
 * @module services/housekeeping
 */

import type { Actor } from '../types/index.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { IssuanceThrottle } from './issuanceThrottle.js';
import type { OtpChallengeManager } from './otpChallengeManager.js';
import type { PasskeyChallengeManager } from './passkeyChallengeManager.js';
import type { PushAuthRequestManager } from './pushAuthRequestManager.js';

export const HOUSEKEEPING_ACTOR: Actor = { id: 'housekeeping' };

export interface HousekeepingTargets {
  otp: Pick<OtpChallengeManager, 'purgeExpired'>;
  passkey: Pick<PasskeyChallengeManager, 'purgeExpired'>;
  push: Pick<PushAuthRequestManager, 'expireSweep' | 'deleteOldRequests'>;
  throttle: IssuanceThrottle;
}

export interface HousekeepingOptions {
  intervalSeconds: number;
  /** Issuance marks older than this window no longer throttle anything. */
  resendWindowSeconds: number;
  retentionHours: number;
  logger?: Logger;
  now?: () => Date;
}

/** Records changed per sweep; null when that sweep failed. */
export interface SweepReport {
  expiredPushRequests: number | null;
  deletedPushRequests: number | null;
  purgedOtpSessions: number | null;
  purgedPasskeyChallenges: number | null;
  purgedIssuanceMarks: number | null;
}

export class HousekeepingWorker {
  private readonly logger: Logger;
  private readonly now: () => Date;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<SweepReport> | null = null;

  constructor(
    private readonly targets: HousekeepingTargets,
    private readonly options: HousekeepingOptions,
  ) {
    this.logger = (options.logger ?? silentLogger).child({ component: 'housekeeping' });
    this.now = options.now ?? (() => new Date());
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.runOnce();
    }, this.options.intervalSeconds * 1000);
    // Allow Node to exit even if timer is active
    this.timer.unref();
    this.logger.info('Housekeeping started', { intervalSeconds: this.options.intervalSeconds });
  }

  /** Stop scheduling and wait for a run in progress. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) await this.inFlight;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /** One pass over every sweep. Overlapping calls share the run in progress. */
  runOnce(): Promise<SweepReport> {
    this.inFlight ??= this.sweep().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  private async sweep(): Promise<SweepReport> {
    const now = this.now();
    const { otp, passkey, push, throttle } = this.targets;

    const report: SweepReport = {
      expiredPushRequests: await this.attempt('push expiry', () => push.expireSweep(now, HOUSEKEEPING_ACTOR)),
      deletedPushRequests: await this.attempt('push retention', () =>
        push.deleteOldRequests(this.options.retentionHours),
      ),
      purgedOtpSessions: await this.attempt('otp purge', () => otp.purgeExpired(now)),
      purgedPasskeyChallenges: await this.attempt('passkey purge', () => passkey.purgeExpired(now)),
      purgedIssuanceMarks: await this.attempt('issuance marks purge', () =>
        throttle.purgeStale(now, this.options.resendWindowSeconds),
      ),
    };

    this.logger.info('Housekeeping run finished', { ...report });
    return report;
  }

  private async attempt(sweep: string, run: () => Promise<number>): Promise<number | null> {
    try {
      return await run();
    } catch (err) {
      this.logger.error('Housekeeping sweep failed', err, { sweep });
      return null;
    }
  }
}
