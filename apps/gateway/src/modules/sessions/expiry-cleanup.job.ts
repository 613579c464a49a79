/**
 * ExpiryCleanupJob
 * - Periodically deletes sessions whose refresh token has expired.
 * - Expiry is judged on the refresh token only: a session stays alive while its
 *   refresh token could still mint a new access token.
 * - Runs on an unref'd interval timer, never overlaps itself, and never blocks requests.
 */
// src/modules/sessions/expiry-cleanup.job.ts
import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { CLOCK, type Clock } from '@/modules/auth/jwt/jwt.constants';
import { SessionStore } from './session.store';

export const CLEANUP_SETTINGS = Symbol('CLEANUP_SETTINGS');

export interface CleanupSettings {
  enabled: boolean;
  intervalSeconds: number;
}

@Injectable()
export class ExpiryCleanupJob implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(ExpiryCleanupJob.name);
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<void> | null = null;

  constructor(
    private readonly store: SessionStore,
    @Inject(CLEANUP_SETTINGS) private readonly settings: CleanupSettings,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  onModuleInit() {
    if (!this.settings.enabled) {
      this.logger.log('Session cleanup disabled');
      return;
    }
    this.timer = setInterval(() => void this.tick(), this.settings.intervalSeconds * 1000);
    this.timer.unref();
    this.logger.log(`Session cleanup scheduled every ${this.settings.intervalSeconds}s`);
  }

  async onModuleDestroy() {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    // let an in-flight sweep finish before the pool closes
    if (this.running) await this.running;
  }

  /**
   * Delete every session whose refresh token expired before `now`.
   * @returns number of deleted sessions
   */
  async run(now: Date = this.clock()): Promise<number> {
    this.logger.log('Starting session cleanup');
    const deleted = await this.store.deleteAllExpiredByRefreshTokenExpiration(now);
    this.logger.log(`Deleted ${deleted} expired sessions`);
    return deleted;
  }

  /** Timer callback. Failures are logged; the next tick tries again. */
  private async tick(): Promise<void> {
    if (this.running) {
      this.logger.warn('Previous cleanup still running, skipping this tick');
      return;
    }
    this.running = this.run()
      .then(() => undefined)
      .catch((e: unknown) => {
        if (e instanceof Error) {
          this.logger.error(`Session cleanup failed: ${e.message}`, e.stack);
        } else {
          this.logger.error(`Session cleanup failed: ${String(e)}`);
        }
      })
      .finally(() => {
        this.running = null;
      });
    await this.running;
  }
}
