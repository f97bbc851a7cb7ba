/**
 * Delay Queue
 *
 * Runs callbacks at absolute due times using a single timer armed for the
 * earliest entry. Entries can be cancelled until they fire; shutdown() drops
 * everything and disarms the timer.
 */

import { v4 as uuidv4 } from 'uuid';
import { logger, describeError } from '../services/logger';

// setTimeout overflows above 2^31-1 ms (~24.8 days)
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export type DelayedCallback = () => void | Promise<void>;

interface QueueEntry {
  id: string;
  dueAt: number;
  label: string;
  callback: DelayedCallback;
}

export interface TimerApi {
  now(): number;
  setTimeout(fn: () => void, ms: number): NodeJS.Timeout;
  clearTimeout(handle: NodeJS.Timeout): void;
}

const systemTimers: TimerApi = {
  now: () => Date.now(),
  setTimeout: (fn, ms) => setTimeout(fn, ms),
  clearTimeout: (handle) => clearTimeout(handle),
};

export class DelayQueue {
  // Sorted by dueAt; equal due times keep insertion order
  private entries: QueueEntry[] = [];
  private timer: NodeJS.Timeout | null = null;
  private closed = false;

  constructor(private timers: TimerApi = systemTimers) {}

  get size(): number {
    return this.entries.length;
  }

  /**
   * Schedule `callback` to run at `dueAt`. Past due times run on the next tick.
   */
  schedule(dueAt: Date, callback: DelayedCallback, label = 'delayed task'): string {
    if (this.closed) {
      throw new Error('DelayQueue has been shut down');
    }

    const entry: QueueEntry = { id: uuidv4(), dueAt: dueAt.getTime(), label, callback };
    let index = this.entries.findIndex((e) => e.dueAt > entry.dueAt);
    if (index === -1) index = this.entries.length;
    this.entries.splice(index, 0, entry);

    if (index === 0) this.arm();
    return entry.id;
  }

  cancel(id: string): boolean {
    const index = this.entries.findIndex((e) => e.id === id);
    if (index === -1) return false;

    this.entries.splice(index, 1);
    if (index === 0) this.arm();
    return true;
  }

  shutdown(): void {
    this.closed = true;
    this.disarm();
    if (this.entries.length > 0) {
      logger.info('Delay queue shut down with pending entries', { pending: this.entries.length });
    }
    this.entries = [];
  }

  private disarm(): void {
    if (this.timer) {
      this.timers.clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private arm(): void {
    this.disarm();
    const next = this.entries[0];
    if (!next || this.closed) return;

    const delay = Math.min(Math.max(next.dueAt - this.timers.now(), 0), MAX_TIMER_DELAY_MS);
    this.timer = this.timers.setTimeout(() => {
      this.timer = null;
      this.flush();
    }, delay);
    this.timer.unref();
  }

  private flush(): void {
    const now = this.timers.now();
    while (this.entries.length > 0 && this.entries[0].dueAt <= now) {
      const entry = this.entries.shift();
      if (entry) this.run(entry);
    }
    this.arm();
  }

  private run(entry: QueueEntry): void {
    const report = (error: unknown) =>
      logger.error('Delayed callback failed', { id: entry.id, label: entry.label, error: describeError(error) });

    try {
      const pending = entry.callback();
      if (pending instanceof Promise) pending.catch(report);
    } catch (error) {
      report(error);
    }
  }
}
