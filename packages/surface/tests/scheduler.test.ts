import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MAX_TIMER_DELAY_MS, systemScheduler } from '../src/scheduler.js';

describe('systemScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should run a callback after the delay', () => {
    const callback = vi.fn();

    systemScheduler.schedule(500, callback);

    vi.advanceTimersByTime(499);
    expect(callback).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('should wait the full delay when it exceeds a single timer', () => {
    const callback = vi.fn();
    const delay = 2 ** 31;

    systemScheduler.schedule(delay, callback);

    vi.advanceTimersByTime(1000);
    expect(callback).not.toHaveBeenCalled();
    vi.advanceTimersByTime(delay - 1 - 1000);
    expect(callback).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('should chain several chunks for very long delays', () => {
    const callback = vi.fn();
    const delay = MAX_TIMER_DELAY_MS * 2 + 10;

    systemScheduler.schedule(delay, callback);

    vi.advanceTimersByTime(MAX_TIMER_DELAY_MS * 2);
    expect(callback).not.toHaveBeenCalled();
    vi.advanceTimersByTime(10);
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('should cancel a long delay after its first chunk', () => {
    const callback = vi.fn();
    const task = systemScheduler.schedule(2 ** 31 + 5000, callback);

    vi.advanceTimersByTime(MAX_TIMER_DELAY_MS + 1);
    task.cancel();
    vi.advanceTimersByTime(MAX_TIMER_DELAY_MS);

    expect(callback).not.toHaveBeenCalled();
  });

  it('should report the current time', () => {
    vi.setSystemTime(new Date('2026-05-01T00:00:00.000Z'));

    expect(systemScheduler.now()).toBe(Date.parse('2026-05-01T00:00:00.000Z'));
  });
});
