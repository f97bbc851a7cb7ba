import { describe, it, expect } from 'vitest';
import { createExecutorRegistry } from './index';
import { loadConfig } from '../config';
import { ReminderStore } from '../core/reminderStore';

describe('createExecutorRegistry', () => {
  it('registers every tool the interpreter dispatches to', () => {
    const registry = createExecutorRegistry(loadConfig({ NODE_ENV: 'test' }), { reminders: new ReminderStore() });

    expect(registry.list().map((t) => t.name)).toEqual([
      'open_app',
      'get_weather',
      'search_web',
      'send_email',
      'schedule_task',
      'greet_user',
    ]);
  });

  it('reports unconfigured email instead of attempting to send', async () => {
    const registry = createExecutorRegistry(loadConfig({ NODE_ENV: 'test' }), { reminders: new ReminderStore() });

    const result = await registry.execute(
      'send_email',
      { to: 'bob@example.com', subject: 'hi', body: 'there' },
      { turnId: 'turn-1', source: 'internal' }
    );

    expect(result.error?.code).toBe('NOT_CONFIGURED');
  });
});
