/**
 * Reminder Store
 *
 * Process-lifetime, append-only list of scheduled tasks. Owned by whoever
 * builds the executors and passed to the ones that need it; nothing else
 * reads it.
 */

import { v4 as uuidv4 } from 'uuid';

export interface Reminder {
  id: string;
  task: string;
  dueAt: Date;
  createdAt: Date;
}

export class ReminderStore {
  private reminders: Reminder[] = [];

  add(task: string, dueAt: Date, createdAt: Date = new Date()): Reminder {
    const reminder: Reminder = { id: uuidv4(), task, dueAt, createdAt };
    this.reminders.push(reminder);
    return reminder;
  }

  /**
   * Snapshot in insertion order; callers cannot mutate the store through it
   */
  list(): readonly Reminder[] {
    return this.reminders.slice();
  }

  get size(): number {
    return this.reminders.length;
  }
}
