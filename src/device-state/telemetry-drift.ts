// src/device-state/telemetry-drift.ts

import { DeviceState } from './device-state.js';
import { randomInt } from '../utils/utils.js';
import { MAX_TIMER_DELAY_MS } from '../constants/constants.js';
import { LoggerInstance } from '../types/mass-types.js';

export type DriftField = 'signal' | 'cpuTemp';

export interface DriftParams {
  field: DriftField;
  range: [number, number];
  intervalMs: number;
}

/**
 * Periodically moves signal strength or CPU temperature to a random value
 * inside a range, the way a real unit's readings wander.
 */
export class TelemetryDrift {
  private tasks: Map<DriftField, NodeJS.Timeout> = new Map();

  constructor(
    private readonly state: DeviceState,
    private readonly logger: LoggerInstance,
    private readonly random: () => number = Math.random
  ) {}

  /**
   * Starts (or restarts) drifting one field.
   * @throws RangeError on an empty range or an interval outside what timers honour
   */
  start(params: DriftParams): void {
    const { field, range, intervalMs } = params;
    const [min, max] = range;

    if (!Number.isInteger(min) || !Number.isInteger(max) || min > max) {
      throw new RangeError(`Drift range must be integers with min <= max, got ${min}-${max}`);
    }
    if (!Number.isFinite(intervalMs) || intervalMs <= 0 || intervalMs > MAX_TIMER_DELAY_MS) {
      throw new RangeError(`Drift interval must be 1..${MAX_TIMER_DELAY_MS}ms, got ${intervalMs}`);
    }

    this.stop(field);

    const timer = setInterval(() => {
      const value = randomInt(min, max, this.random);
      const update = field === 'signal' ? { signal: value } : { cpuTemp: value };
      this.state.updateTelemetry(update).then(
        () => this.logger.debug('Telemetry drifted', { field, value }),
        (err: unknown) =>
          this.logger.error('Telemetry drift failed', {
            field,
            error: err instanceof Error ? err.message : String(err),
          })
      );
    }, intervalMs);
    timer.unref();

    this.tasks.set(field, timer);
    this.logger.debug('Telemetry drift started', { field, min, max, intervalMs });
  }

  stop(field: DriftField): void {
    const timer = this.tasks.get(field);
    if (timer) {
      clearInterval(timer);
      this.tasks.delete(field);
      this.logger.debug('Telemetry drift stopped', { field });
    }
  }

  stopAll(): void {
    for (const field of [...this.tasks.keys()]) this.stop(field);
  }

  isRunning(field: DriftField): boolean {
    return this.tasks.has(field);
  }
}
