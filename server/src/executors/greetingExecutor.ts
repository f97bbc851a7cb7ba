/**
 * Greeting Executor - time-of-day greeting with the reminder count
 */

import { IToolExecutor, ExecutionResult, ToolContext, buildResult } from './interface';
import { GreetUserParams, GreetUserParamsType } from '../core/schemas';
import { ReminderStore } from '../core/reminderStore';

export function timeOfDay(date: Date): 'morning' | 'afternoon' | 'evening' {
  const hour = date.getHours();
  if (hour < 12) return 'morning';
  if (hour < 18) return 'afternoon';
  return 'evening';
}

export class GreetingExecutor implements IToolExecutor<GreetUserParamsType> {
  readonly id = 'greet_user';
  readonly name = 'Greeting';
  readonly category = 'social';
  readonly description = 'Greet the user and report how many reminders have been scheduled';
  readonly schema = GreetUserParams;

  constructor(
    private reminders: ReminderStore,
    private now: () => Date = () => new Date()
  ) {}

  async execute(params: GreetUserParamsType, _context: ToolContext): Promise<ExecutionResult> {
    const startedAt = new Date();
    const now = this.now();
    return buildResult(
      this.id,
      startedAt,
      `Good ${timeOfDay(now)}, ${params.name}! You have ${this.reminders.size} reminders today.`
    );
  }
}
