import { afterEach, describe, expect, it, vi } from 'vitest';

import { AutoScanScheduler } from './auto-scan-scheduler.js';

describe('AutoScanScheduler', () => {
  let scheduler: AutoScanScheduler | null = null;

  afterEach(() => {
    scheduler?.stop();
    vi.useRealTimers();
  });

  it('stays off for a zero interval', () => {
    scheduler = new AutoScanScheduler({ runScheduledScan: async () => true });

    scheduler.start(0);

    expect(scheduler.isRunning()).toBe(false);
  });

  it('schedules positive intervals', () => {
    scheduler = new AutoScanScheduler({ runScheduledScan: async () => true });

    scheduler.start(60);

    expect(scheduler.isRunning()).toBe(true);
  });

  it('skips a tick while the previous scan is still running', async () => {
    let finish: (value: boolean) => void = () => undefined;
    const runScheduledScan = vi.fn(async () => true);
    runScheduledScan.mockImplementationOnce(
      () =>
        new Promise<boolean>((resolve) => {
          finish = resolve;
        }),
    );
    scheduler = new AutoScanScheduler({ runScheduledScan });

    const first = scheduler.tick();
    await scheduler.tick();
    finish(true);
    await first;
    await scheduler.tick();

    expect(runScheduledScan).toHaveBeenCalledTimes(2);
  });

  it('times a 45 second interval from the end of each scan', async () => {
    vi.useFakeTimers();
    const runScheduledScan = vi.fn(
      () =>
        new Promise<boolean>((resolve) => {
          setTimeout(() => resolve(true), 10_000);
        }),
    );
    scheduler = new AutoScanScheduler({ runScheduledScan });

    scheduler.start(45);
    expect(scheduler.isRunning()).toBe(true);

    await vi.advanceTimersByTimeAsync(44_999);
    expect(runScheduledScan).toHaveBeenCalledTimes(0);
    await vi.advanceTimersByTimeAsync(1);
    expect(runScheduledScan).toHaveBeenCalledTimes(1);

    // scan ends at 55 s, so the next one is due at 100 s
    await vi.advanceTimersByTimeAsync(54_999);
    expect(runScheduledScan).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(runScheduledScan).toHaveBeenCalledTimes(2);
  });

  it('runs a 90 second interval every 90 seconds until stopped', async () => {
    vi.useFakeTimers();
    const runScheduledScan = vi.fn(async () => true);
    scheduler = new AutoScanScheduler({ runScheduledScan });

    scheduler.start(90);
    await vi.advanceTimersByTimeAsync(90_000);
    expect(runScheduledScan).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(90_000);
    expect(runScheduledScan).toHaveBeenCalledTimes(2);

    scheduler.stop();
    await vi.advanceTimersByTimeAsync(500_000);
    expect(runScheduledScan).toHaveBeenCalledTimes(2);
    expect(scheduler.isRunning()).toBe(false);
  });
});
