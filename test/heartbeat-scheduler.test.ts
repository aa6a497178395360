// test/heartbeat-scheduler.test.ts

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { HeartbeatScheduler } from '../src/heartbeat-scheduler.js';
import { MassDeviceEmulator } from '../src/device-emulator/device-emulator.js';
import { FakeTransport, createState, fixedClock, quietLogger } from './helpers.js';

describe('HeartbeatScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('beats once per interval', async () => {
    const beat = vi.fn(async () => {});
    const scheduler = new HeartbeatScheduler({ interval: 1000, beat, logger: quietLogger() });
    scheduler.start();

    await vi.advanceTimersByTimeAsync(999);
    expect(beat).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(2001);
    expect(beat.mock.calls.length).toBeGreaterThanOrEqual(2);
    expect(scheduler.getStats().published).toBe(beat.mock.calls.length);
    scheduler.stop();
  });

  it('keeps beating after a failed publish', async () => {
    let calls = 0;
    const scheduler = new HeartbeatScheduler({
      interval: 100,
      beat: async () => {
        calls++;
        if (calls === 1) throw new Error('broker unavailable');
      },
      logger: quietLogger(),
    });
    scheduler.start();
    await vi.advanceTimersByTimeAsync(250);
    scheduler.stop();

    const stats = scheduler.getStats();
    expect(stats.failures).toBe(1);
    expect(stats.lastError).toBe('broker unavailable');
    expect(stats.published).toBeGreaterThanOrEqual(1);
    expect(stats.ticks).toBe(stats.failures + stats.published);
  });

  it('stops beating when stopped', async () => {
    const beat = vi.fn(async () => {});
    const scheduler = new HeartbeatScheduler({ interval: 100, beat, logger: quietLogger() });
    scheduler.start();
    expect(scheduler.isRunning()).toBe(true);
    scheduler.stop();
    expect(scheduler.isRunning()).toBe(false);

    await vi.advanceTimersByTimeAsync(1000);
    expect(beat).not.toHaveBeenCalled();
  });

  it('re-arms with a new interval', async () => {
    const beat = vi.fn(async () => {});
    const scheduler = new HeartbeatScheduler({ interval: 10_000, beat, logger: quietLogger() });
    scheduler.start();
    scheduler.setInterval(500);
    expect(scheduler.getInterval()).toBe(500);

    await vi.advanceTimersByTimeAsync(500);
    expect(beat).toHaveBeenCalledTimes(1);
    scheduler.stop();
  });

  it('ignores a second start', async () => {
    const beat = vi.fn(async () => {});
    const scheduler = new HeartbeatScheduler({ interval: 100, beat, logger: quietLogger() });
    scheduler.start();
    scheduler.start();
    await vi.advanceTimersByTimeAsync(100);
    expect(beat).toHaveBeenCalledTimes(1);
    scheduler.stop();
  });

  it.each([0, -5, Number.NaN, 2_147_483_648, 3_000_000_000])('rejects an interval of %s', interval => {
    expect(
      () => new HeartbeatScheduler({ interval, beat: async () => {}, logger: quietLogger() })
    ).toThrow(RangeError);
  });

  it('refuses a new interval beyond the timer limit and keeps the old one', async () => {
    const beat = vi.fn(async () => {});
    const scheduler = new HeartbeatScheduler({ interval: 1000, beat, logger: quietLogger() });
    scheduler.start();
    expect(() => scheduler.setInterval(3_000_000_000)).toThrow(RangeError);
    expect(scheduler.getInterval()).toBe(1000);

    await vi.advanceTimersByTimeAsync(100);
    expect(beat).not.toHaveBeenCalled();
    scheduler.stop();
  });

  it('publishes the telemetry current at each tick', async () => {
    const transport = new FakeTransport();
    const emulator = new MassDeviceEmulator({
      transport,
      state: createState(),
      clock: fixedClock,
      heartbeatInterval: 1000,
      logger: quietLogger(),
    });
    await emulator.start();

    await vi.advanceTimersByTimeAsync(1000);
    await emulator.applyTelemetry({ signal: 30 });
    await vi.advanceTimersByTimeAsync(2000);
    await emulator.stop();

    const heartbeats = transport.envelopes().filter(envelope => envelope.function === 'heartbeat');
    expect(heartbeats.length).toBeGreaterThanOrEqual(2);
    expect(heartbeats[0]?.notification).toMatchObject({ signal: 13 });
    expect(heartbeats[heartbeats.length - 1]?.notification).toMatchObject({ signal: 30 });
    expect(emulator.getHeartbeatStats()?.failures).toBe(0);
  });
});
