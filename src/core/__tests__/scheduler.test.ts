/**
 * Interval scheduler tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { IntervalScheduler } from '../scheduler.js';

const mockLogger = {
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

describe('IntervalScheduler', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs immediately and then every pollSeconds', async () => {
    const scheduler = new IntervalScheduler({ pollSeconds: 15 }, mockLogger);
    const callback = vi.fn().mockResolvedValue(undefined);

    scheduler.start(callback);
    await vi.advanceTimersByTimeAsync(0);
    expect(callback).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(14_999);
    expect(callback).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1);
    expect(callback).toHaveBeenCalledTimes(2);

    await scheduler.stop();
  });

  it('waits for a run to finish before scheduling the next one', async () => {
    const scheduler = new IntervalScheduler({ pollSeconds: 15 }, mockLogger);
    let release: () => void = () => {};
    const callback = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        })
    );

    scheduler.start(callback);
    await vi.advanceTimersByTimeAsync(60_000);
    expect(callback).toHaveBeenCalledTimes(1);

    release();
    await vi.advanceTimersByTimeAsync(15_000);
    expect(callback).toHaveBeenCalledTimes(2);

    release();
    await scheduler.stop();
  });

  it('logs callback errors and keeps running', async () => {
    const scheduler = new IntervalScheduler({ pollSeconds: 15 }, mockLogger);
    const failure = new Error('boom');
    const callback = vi.fn().mockRejectedValueOnce(failure).mockResolvedValue(undefined);

    scheduler.start(callback);
    await vi.advanceTimersByTimeAsync(15_000);

    expect(mockLogger.error).toHaveBeenCalledWith('Scheduled run failed', failure);
    expect(callback).toHaveBeenCalledTimes(2);

    await scheduler.stop();
  });

  it('stop drains the in-flight run and schedules nothing further', async () => {
    const scheduler = new IntervalScheduler({ pollSeconds: 15 }, mockLogger);
    let release: () => void = () => {};
    const callback = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        })
    );

    scheduler.start(callback);
    await vi.advanceTimersByTimeAsync(0);
    expect(scheduler.running).toBe(true);

    let stopped = false;
    const stopping = scheduler.stop().then(() => {
      stopped = true;
    });
    await vi.advanceTimersByTimeAsync(0);
    expect(stopped).toBe(false);

    release();
    await stopping;
    expect(stopped).toBe(true);
    expect(scheduler.running).toBe(false);

    await vi.advanceTimersByTimeAsync(60_000);
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('stop before the first run prevents it', async () => {
    const scheduler = new IntervalScheduler({ pollSeconds: 15 }, mockLogger);
    const callback = vi.fn().mockResolvedValue(undefined);

    scheduler.start(callback);
    await scheduler.stop();
    await vi.advanceTimersByTimeAsync(60_000);

    expect(callback).not.toHaveBeenCalled();
  });
});
