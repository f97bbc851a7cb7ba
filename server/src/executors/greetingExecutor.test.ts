import { describe, it, expect } from 'vitest';
import { GreetingExecutor, timeOfDay } from './greetingExecutor';
import { ReminderStore } from '../core/reminderStore';
import { GreetUserParams } from '../core/schemas';

const context = { turnId: 'turn-1', source: 'voice' as const };

describe('timeOfDay', () => {
  it.each([
    { hour: 0, expected: 'morning' },
    { hour: 11, expected: 'morning' },
    { hour: 12, expected: 'afternoon' },
    { hour: 17, expected: 'afternoon' },
    { hour: 18, expected: 'evening' },
    { hour: 23, expected: 'evening' },
  ])('hour $hour is $expected', ({ hour, expected }) => {
    expect(timeOfDay(new Date(2025, 2, 1, hour, 30))).toBe(expected);
  });
});

describe('GreetingExecutor', () => {
  it('counts every scheduled reminder, whatever day it is due', async () => {
    const reminders = new ReminderStore();
    reminders.add('stretch', new Date(2025, 2, 1, 23, 30));
    reminders.add('dentist', new Date(2025, 2, 2, 9, 0));
    const executor = new GreetingExecutor(reminders, () => new Date(2025, 2, 1, 21, 0));

    const result = await executor.execute(GreetUserParams.parse({}), context);

    expect(result).toMatchObject({ success: true, message: 'Good evening, User! You have 2 reminders today.' });
  });

  it('includes reminders whose time has already passed', async () => {
    const reminders = new ReminderStore();
    reminders.add('stand-up', new Date(2025, 1, 27, 9, 0));
    const executor = new GreetingExecutor(reminders, () => new Date(2025, 2, 1, 9, 15));

    const result = await executor.execute(GreetUserParams.parse({}), context);

    expect(result.message).toBe('Good morning, User! You have 1 reminders today.');
  });

  it('uses the given name', async () => {
    const executor = new GreetingExecutor(new ReminderStore(), () => new Date(2025, 2, 1, 19, 0));

    const result = await executor.execute({ name: 'Ada' }, context);

    expect(result.message).toBe('Good evening, Ada! You have 0 reminders today.');
  });
});
