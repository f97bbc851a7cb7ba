import { describe, it, expect } from 'vitest';
import { ReminderStore } from './reminderStore';

describe('ReminderStore', () => {
  it('appends reminders in insertion order', () => {
    const store = new ReminderStore();
    const first = store.add('stretch', new Date(2025, 2, 1, 10, 0));
    const second = store.add('call mom', new Date(2025, 2, 1, 11, 0));

    expect(store.size).toBe(2);
    expect(store.list().map((r) => r.task)).toEqual(['stretch', 'call mom']);
    expect(first.id).not.toBe(second.id);
  });

  it('hands out copies of its list', () => {
    const store = new ReminderStore();
    store.add('stretch', new Date());

    const snapshot = store.list();
    store.add('water plants', new Date());

    expect(snapshot).toHaveLength(1);
    expect(store.list()).toHaveLength(2);
  });
});
