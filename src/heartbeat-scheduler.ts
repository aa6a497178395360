// src/heartbeat-scheduler.ts

import Logger from './logger.js';
import { MAX_TIMER_DELAY_MS, MIN_HEARTBEAT_INTERVAL_MS } from './constants/constants.js';
import { HeartbeatStats, LoggerInstance } from './types/mass-types.js';

export interface HeartbeatSchedulerOptions {
  /** Interval between beats, ms */
  interval: number;
  /** Builds and publishes one heartbeat */
  beat: () => Promise<void>;
  logger?: Logger;
}

/**
 * Periodic heartbeat independent of inbound traffic. Each tick is armed only
 * after the previous one settles, so a slow or failing publish never causes
 * a burst of catch-up beats.
 */
export class HeartbeatScheduler {
  private interval: number;
  private readonly beat: () => Promise<void>;
  private readonly logger: LoggerInstance;
  private timerId: NodeJS.Timeout | null = null;
  private stopped: boolean = true;
  private stats: HeartbeatStats = {
    ticks: 0,
    published: 0,
    failures: 0,
    lastError: null,
    lastRunTime: null,
  };

  constructor(options: HeartbeatSchedulerOptions) {
    this.interval = HeartbeatScheduler.validateInterval(options.interval);
    this.beat = options.beat;
    this.logger = (options.logger ?? new Logger()).createLogger('HeartbeatScheduler');
  }

  private static validateInterval(interval: number): number {
    if (!Number.isFinite(interval) || interval < MIN_HEARTBEAT_INTERVAL_MS || interval > MAX_TIMER_DELAY_MS) {
      throw new RangeError(
        `Heartbeat interval must be ${MIN_HEARTBEAT_INTERVAL_MS}..${MAX_TIMER_DELAY_MS}ms, got ${interval}`
      );
    }
    return interval;
  }

  start(): void {
    if (!this.stopped) {
      this.logger.debug('Scheduler already running');
      return;
    }
    this.stopped = false;
    this.logger.info(`Heartbeat started, every ${this.interval}ms`);
    this.scheduleNextTick();
  }

  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    if (this.timerId) {
      clearTimeout(this.timerId);
      this.timerId = null;
    }
    this.logger.info('Heartbeat stopped');
  }

  isRunning(): boolean {
    return !this.stopped;
  }

  /**
   * Changes the interval; a running scheduler re-arms with the new value.
   */
  setInterval(interval: number): void {
    this.interval = HeartbeatScheduler.validateInterval(interval);
    if (!this.stopped) this.scheduleNextTick();
  }

  getInterval(): number {
    return this.interval;
  }

  getStats(): HeartbeatStats {
    return { ...this.stats };
  }

  private scheduleNextTick(): void {
    if (this.stopped) return;
    if (this.timerId) clearTimeout(this.timerId);

    this.timerId = setTimeout(() => {
      this.timerId = null;
      if (this.stopped) return;
      this.tick().then(
        () => this.scheduleNextTick(),
        (err: unknown) => {
          this.logger.error(`Heartbeat tick crashed: ${String(err)}`);
          this.scheduleNextTick();
        }
      );
    }, this.interval);
  }

  private async tick(): Promise<void> {
    this.stats.ticks++;
    this.stats.lastRunTime = Date.now();
    try {
      await this.beat();
      this.stats.published++;
      this.logger.debug('Heartbeat published', { fn: 'heartbeat' });
    } catch (err: unknown) {
      this.stats.failures++;
      this.stats.lastError = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Heartbeat not published, retrying next tick: ${this.stats.lastError}`, {
        fn: 'heartbeat',
      });
    }
  }
}
