/**
 * Command Rules
 *
 * Ordered keyword rules that turn a lower-cased utterance into a tool
 * invocation. Evaluation is top to bottom, first match wins; the fallback
 * rule matches everything and must stay last.
 *
 * Matching is plain substring/prefix checks. "hi" matches inside words
 * ("this", "which") and the email grammar breaks when a subject or body
 * contains the words "to", "subject" or "message". Both are known
 * limitations of the grammar, not bugs to patch here.
 */

import type { ExecutionResult } from '../executors/interface';
import type { ToolInvocation } from './schemas';

// =============================================================================
// SPOKEN TEXT
// =============================================================================

export const FALLBACK_MESSAGE = 'Hmm, not sure what that means, Sir.';
export const APOLOGY_MESSAGE = "Apologies, I couldn't process that command.";
export const SCHEDULE_CLARIFY_MESSAGE = "Please specify the time, like 'in 10 minutes'.";
export const SCHEDULE_SUCCESS_MESSAGE = 'Event successfully added to Google Calendar, Sir.';
export const SCHEDULE_FAILURE_MESSAGE = "I couldn't set that schedule, Sir.";
export const SEARCH_CLARIFY_MESSAGE = 'What would you like me to search for?';

// =============================================================================
// TYPES
// =============================================================================

export type RuleId = 'open_app' | 'weather' | 'search' | 'email' | 'schedule' | 'greeting' | 'fallback';

export type Extraction =
  | { kind: 'invoke'; invocation: ToolInvocation }
  | { kind: 'clarify'; message: string }
  | { kind: 'failed'; reason: string }
  | { kind: 'none' };

export interface CommandRule {
  id: RuleId;
  matches(text: string): boolean;
  // Spoken before extraction runs; null when the tool result is the reply
  acknowledgment(text: string): string | null;
  // May throw CommandParseError; the interpreter turns that into 'failed'
  extract(text: string): Extraction;
  // Spoken after the tool returns
  followUp?(result: ExecutionResult): string | null;
  // Spoken when extraction fails
  failureReply?: string;
}

export class CommandParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommandParseError';
  }
}

// =============================================================================
// EXTRACTORS
// =============================================================================

const OPEN_PREFIX = 'open ';
const WEATHER_INFIX = 'weather in ';
const SEARCH_PREFIX = 'search for ';

export function extractAppName(text: string): string {
  return text.slice(OPEN_PREFIX.length);
}

export function extractCity(text: string, defaultCity: string): string {
  const at = text.indexOf(WEATHER_INFIX);
  if (at === -1) return defaultCity;
  return text.slice(at + WEATHER_INFIX.length).trim() || defaultCity;
}

export function extractSearchQuery(text: string): string {
  const at = text.indexOf(SEARCH_PREFIX);
  return at === -1 ? '' : text.slice(at + SEARCH_PREFIX.length).trim();
}

export interface EmailFields {
  to: string;
  subject: string;
  body: string;
}

/**
 * Space-tokenized scan for the markers `to`, `subject` and `message`.
 * Recipient is the token after `to`; subject runs from after `subject`
 * up to `message`; the body is everything after `message`.
 */
export function parseEmailCommand(text: string): EmailFields {
  const parts = text.split(' ');
  const markerIndex = (marker: string): number => {
    const index = parts.indexOf(marker);
    if (index === -1) {
      throw new CommandParseError(`Missing "${marker}" in email command`);
    }
    return index + 1;
  };

  const toIndex = markerIndex('to');
  const subjectIndex = markerIndex('subject');
  const messageIndex = markerIndex('message');

  if (toIndex >= parts.length) {
    throw new CommandParseError('No recipient after "to" in email command');
  }

  return {
    to: parts[toIndex],
    subject: parts.slice(subjectIndex, messageIndex - 1).join(' '),
    body: parts.slice(messageIndex).join(' '),
  };
}

export interface ScheduleFields {
  title: string;
  minutes: number;
}

/**
 * "<schedule|remind me to> <title> in <N> minutes"
 *
 * Returns null when either " in " or " minutes" is missing, so the caller
 * can ask for an explicit duration instead of guessing one.
 */
export function parseScheduleCommand(text: string): ScheduleFields | null {
  if (!text.includes(' in ') || !text.includes(' minutes')) return null;

  const segments = text.split(' in ');
  const title = segments[0].replaceAll('schedule', '').replaceAll('remind me to', '').trim();
  const amount = segments[1].replaceAll(' minutes', '').trim();

  if (!/^\d+$/.test(amount)) {
    throw new CommandParseError(`"${amount}" is not a number of minutes`);
  }

  return { title, minutes: Number.parseInt(amount, 10) };
}

// =============================================================================
// RULE TABLE
// =============================================================================

export interface CommandRuleOptions {
  defaultCity: string;
}

export function createCommandRules(options: CommandRuleOptions): CommandRule[] {
  return [
    {
      id: 'open_app',
      matches: (text) => text.startsWith(OPEN_PREFIX),
      acknowledgment: (text) => `Roger that, opening ${extractAppName(text)}.`,
      extract: (text) => ({
        kind: 'invoke',
        invocation: { tool: 'open_app', args: { appName: extractAppName(text) } },
      }),
    },
    {
      id: 'weather',
      matches: (text) => text.includes('weather'),
      acknowledgment: () => 'Check! Getting the weather.',
      extract: (text) => ({
        kind: 'invoke',
        invocation: { tool: 'get_weather', args: { city: extractCity(text, options.defaultCity) } },
      }),
    },
    {
      id: 'search',
      matches: (text) => text.includes('search for'),
      acknowledgment: () => 'Will do, searching the web.',
      extract: (text) => {
        const query = extractSearchQuery(text);
        if (!query) return { kind: 'clarify', message: SEARCH_CLARIFY_MESSAGE };
        return { kind: 'invoke', invocation: { tool: 'search_web', args: { query } } };
      },
    },
    {
      id: 'email',
      matches: (text) => text.includes('send email'),
      acknowledgment: () => 'Check! Sending your email.',
      extract: (text) => ({
        kind: 'invoke',
        invocation: { tool: 'send_email', args: parseEmailCommand(text) },
      }),
    },
    {
      id: 'schedule',
      matches: (text) => text.includes('schedule') || text.includes('remind me'),
      acknowledgment: () => 'Got it! Scheduling that in your Google Calendar.',
      extract: (text) => {
        const fields = parseScheduleCommand(text);
        if (!fields) return { kind: 'clarify', message: SCHEDULE_CLARIFY_MESSAGE };
        return {
          kind: 'invoke',
          invocation: {
            tool: 'schedule_task',
            args: { title: fields.title, description: fields.title, minutesFromNow: fields.minutes },
          },
        };
      },
      followUp: (result) => (result.success ? SCHEDULE_SUCCESS_MESSAGE : SCHEDULE_FAILURE_MESSAGE),
      failureReply: SCHEDULE_FAILURE_MESSAGE,
    },
    {
      id: 'greeting',
      matches: (text) => text.includes('hello') || text.includes('hi'),
      acknowledgment: () => null,
      extract: () => ({ kind: 'invoke', invocation: { tool: 'greet_user', args: {} } }),
      followUp: (result) => result.message,
    },
    {
      id: 'fallback',
      matches: () => true,
      acknowledgment: () => FALLBACK_MESSAGE,
      extract: () => ({ kind: 'none' }),
    },
  ];
}
