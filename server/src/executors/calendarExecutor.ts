/**
 * Calendar Executor - Google Calendar integration
 *
 * Creates a 30-minute event starting N minutes from now. On success the
 * task is recorded in the reminder store and a local "starting now"
 * notification is queued.
 */

import { z } from 'zod';
import { IToolExecutor, ExecutionResult, ToolContext, buildResult } from './interface';
import { ScheduleTaskParams, ScheduleTaskParamsType } from '../core/schemas';
import { ReminderStore } from '../core/reminderStore';
import { DelayQueue } from '../core/delayQueue';
import { GoogleAuthClient } from '../services/googleAuth';
import { fetchWithTimeout, FetchFn } from '../services/http';
import { logger, describeError } from '../services/logger';

export const EVENT_DURATION_MINUTES = 30;

const CreatedEvent = z.object({
  id: z.string(),
  htmlLink: z.string(),
});

export interface CalendarEventResource {
  summary: string;
  description: string;
  start: { dateTime: string; timeZone: string };
  end: { dateTime: string; timeZone: string };
}

/**
 * Event resource for a task starting `minutesFromNow` after `now`
 */
export function buildEventResource(
  title: string,
  description: string,
  minutesFromNow: number,
  timeZone: string,
  now: Date
): CalendarEventResource {
  const start = new Date(now.getTime() + minutesFromNow * 60000);
  const end = new Date(start.getTime() + EVENT_DURATION_MINUTES * 60000);
  return {
    summary: title,
    description,
    start: { dateTime: start.toISOString(), timeZone },
    end: { dateTime: end.toISOString(), timeZone },
  };
}

/**
 * Wall-clock time in the calendar's zone, e.g. "3:45 PM"
 */
export function formatLocalTime(date: Date, timeZone: string): string {
  // ICU puts a narrow no-break space before AM/PM
  return new Intl.DateTimeFormat('en-US', { hour: 'numeric', minute: '2-digit', timeZone })
    .format(date)
    .replace(/\u202f/g, ' ');
}

export type ReminderNotifier = (message: string) => void;

export interface CalendarExecutorOptions {
  auth: GoogleAuthClient;
  calendarId: string;
  timeZone: string;
  apiUrl: string;
  reminders: ReminderStore;
  queue?: DelayQueue;
  notify?: ReminderNotifier;
  timeoutMs?: number;
  fetchImpl?: FetchFn;
  now?: () => Date;
}

export class CalendarExecutor implements IToolExecutor<ScheduleTaskParamsType> {
  readonly id = 'schedule_task';
  readonly name = 'Google Calendar';
  readonly category = 'productivity';
  readonly description = 'Schedule a task in Google Calendar N minutes from now';
  readonly schema = ScheduleTaskParams;

  private now: () => Date;

  constructor(private options: CalendarExecutorOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async execute(params: ScheduleTaskParamsType, context: ToolContext): Promise<ExecutionResult> {
    const startedAt = new Date();
    const { title, minutesFromNow } = params;
    const description = params.description || title;

    try {
      const token = await this.options.auth.getAccessToken();
      const event = buildEventResource(title, description, minutesFromNow, this.options.timeZone, this.now());

      const url = `${this.options.apiUrl}/calendars/${encodeURIComponent(this.options.calendarId)}/events`;
      const response = await fetchWithTimeout(
        url,
        {
          method: 'POST',
          headers: { Authorization: `Bearer ${token}`, 'Content-Type': 'application/json' },
          body: JSON.stringify(event),
        },
        { timeoutMs: this.options.timeoutMs, fetchImpl: this.options.fetchImpl }
      );

      if (!response.ok) {
        throw new Error(`Calendar API error: ${response.status}`);
      }

      const created = CreatedEvent.parse(await response.json());
      const dueAt = new Date(event.start.dateTime);
      this.track(title, dueAt);

      const when = formatLocalTime(dueAt, this.options.timeZone);
      logger.info('Calendar event created', { turnId: context.turnId, eventId: created.id, title, dueAt });
      return buildResult(
        this.id,
        startedAt,
        `Event '${title}' scheduled for ${when} (${this.options.timeZone}). Link: ${created.htmlLink}`
      );
    } catch (error) {
      logger.error('Failed to schedule calendar event', {
        turnId: context.turnId,
        title,
        minutesFromNow,
        error: describeError(error),
      });
      return buildResult(this.id, startedAt, `Failed to schedule '${title}' in Google Calendar.`, {
        code: 'CALENDAR_ERROR',
      });
    }
  }

  private track(title: string, dueAt: Date): void {
    this.options.reminders.add(title, dueAt);

    const { queue, notify } = this.options;
    if (!queue || !notify) return;

    try {
      queue.schedule(dueAt, () => notify(`Reminder: ${title} is starting now.`), `reminder:${title}`);
    } catch (error) {
      // The event exists remotely; only the local heads-up is lost
      logger.warn('Could not queue reminder notification', { title, error: describeError(error) });
    }
  }
}
