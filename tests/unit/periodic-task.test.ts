import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PeriodicTask } from '../../src/periodic-task.js';

describe('PeriodicTask', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('ticks once per interval while running', async () => {
    const tick = vi.fn();
    const task = new PeriodicTask('test', 1000, tick);

    expect(task.start()).toBe(true);
    await vi.advanceTimersByTimeAsync(999);
    expect(tick).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(tick).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(3000);
    expect(tick).toHaveBeenCalledTimes(4);
    task.stop();
  });

  it('ignores a second start() so there is never more than one timer', async () => {
    const tick = vi.fn();
    const task = new PeriodicTask('test', 1000, tick);

    task.start();
    expect(task.start()).toBe(false);
    await vi.advanceTimersByTimeAsync(2000);

    expect(tick).toHaveBeenCalledTimes(2);
    task.stop();
  });

  it('stop() is idempotent and halts ticking', async () => {
    const tick = vi.fn();
    const task = new PeriodicTask('test', 1000, tick);

    expect(task.stop()).toBe(false);
    task.start();
    expect(task.isRunning()).toBe(true);
    expect(task.stop()).toBe(true);
    expect(task.stop()).toBe(false);
    expect(task.isRunning()).toBe(false);

    await vi.advanceTimersByTimeAsync(5000);
    expect(tick).not.toHaveBeenCalled();
  });

  it('keeps ticking after a tick rejects', async () => {
    const tick = vi.fn()
      .mockRejectedValueOnce(new Error('boom'))
      .mockResolvedValue(undefined);
    const task = new PeriodicTask('test', 1000, tick);

    task.start();
    await vi.advanceTimersByTimeAsync(3000);

    expect(tick).toHaveBeenCalledTimes(3);
    task.stop();
  });
});
