import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DelayQueue } from './delayQueue';

describe('DelayQueue', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2025-03-01T09:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  const at = (offsetMs: number) => new Date(Date.now() + offsetMs);

  it('fires callbacks in due-time order', () => {
    const queue = new DelayQueue();
    const fired: string[] = [];

    queue.schedule(at(3000), () => void fired.push('c'));
    queue.schedule(at(1000), () => void fired.push('a'));
    queue.schedule(at(2000), () => void fired.push('b'));
    expect(queue.size).toBe(3);

    vi.advanceTimersByTime(1000);
    expect(fired).toEqual(['a']);

    vi.advanceTimersByTime(2000);
    expect(fired).toEqual(['a', 'b', 'c']);
    expect(queue.size).toBe(0);
  });

  it('keeps insertion order for equal due times', () => {
    const queue = new DelayQueue();
    const fired: number[] = [];
    const due = at(500);

    for (let i = 0; i < 3; i++) {
      queue.schedule(due, () => void fired.push(i));
    }

    vi.advanceTimersByTime(500);
    expect(fired).toEqual([0, 1, 2]);
  });

  it('runs past-due entries on the next tick', () => {
    const queue = new DelayQueue();
    const callback = vi.fn();

    queue.schedule(at(-60000), callback);
    expect(callback).not.toHaveBeenCalled();

    vi.advanceTimersByTime(0);
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('cancels pending entries', () => {
    const queue = new DelayQueue();
    const kept = vi.fn();
    const dropped = vi.fn();

    const id = queue.schedule(at(1000), dropped);
    queue.schedule(at(2000), kept);

    expect(queue.cancel(id)).toBe(true);
    expect(queue.cancel(id)).toBe(false);

    vi.advanceTimersByTime(2000);
    expect(dropped).not.toHaveBeenCalled();
    expect(kept).toHaveBeenCalledTimes(1);
  });

  it('keeps going after a callback throws or rejects', async () => {
    const queue = new DelayQueue();
    const after = vi.fn();

    queue.schedule(at(100), () => {
      throw new Error('boom');
    });
    queue.schedule(at(100), () => Promise.reject(new Error('async boom')));
    queue.schedule(at(100), after);

    await vi.advanceTimersByTimeAsync(100);
    expect(after).toHaveBeenCalledTimes(1);
  });

  it('drops everything on shutdown and refuses new entries', () => {
    const queue = new DelayQueue();
    const callback = vi.fn();
    queue.schedule(at(1000), callback);

    queue.shutdown();
    vi.advanceTimersByTime(5000);

    expect(callback).not.toHaveBeenCalled();
    expect(queue.size).toBe(0);
    expect(() => queue.schedule(at(1000), callback)).toThrow('shut down');
  });

  it('re-arms entries beyond the maximum timer delay', () => {
    const queue = new DelayQueue();
    const callback = vi.fn();
    const thirtyDays = 30 * 24 * 60 * 60 * 1000;

    queue.schedule(at(thirtyDays), callback);

    vi.advanceTimersByTime(2 ** 31 - 1);
    expect(callback).not.toHaveBeenCalled();

    vi.advanceTimersByTime(thirtyDays - (2 ** 31 - 1));
    expect(callback).toHaveBeenCalledTimes(1);
  });
});
