/**
 * Core Schemas
 *
 * Argument schemas for every tool the interpreter can dispatch to, and the
 * wire format of the voice stream. Tool arguments are validated here before
 * any executor runs, whether they came from a spoken command or the tools API.
 */

import { z } from 'zod';

// =============================================================================
// TOOL NAMES
// =============================================================================

export const ToolName = z.enum([
  'open_app',
  'get_weather',
  'search_web',
  'send_email',
  'schedule_task',
  'greet_user',
]);

export type ToolNameType = z.infer<typeof ToolName>;

// =============================================================================
// TOOL ARGUMENTS
// =============================================================================

export const OpenAppParams = z.object({
  appName: z.string(),
});

/**
 * City is optional; the executor falls back to its configured default
 */
export const GetWeatherParams = z.object({
  city: z.string().trim().min(1).max(100).optional(),
});

export const SearchWebParams = z.object({
  query: z.string().trim().min(1).max(500),
});

// Recipients are whatever the speaker said; no address validation
export const SendEmailParams = z.object({
  to: z.string().min(1),
  subject: z.string(),
  body: z.string(),
  cc: z.string().min(1).optional(),
});

export const ScheduleTaskParams = z.object({
  title: z.string().trim().min(1).max(200),
  description: z.string().default(''),
  minutesFromNow: z.number().int().positive().max(60 * 24 * 365),
});

export const GreetUserParams = z.object({
  name: z.string().min(1).default('User'),
});

export type OpenAppParamsType = z.infer<typeof OpenAppParams>;
export type GetWeatherParamsType = z.infer<typeof GetWeatherParams>;
export type SearchWebParamsType = z.infer<typeof SearchWebParams>;
export type SendEmailParamsType = z.infer<typeof SendEmailParams>;
export type ScheduleTaskParamsType = z.infer<typeof ScheduleTaskParams>;
export type GreetUserParamsType = z.infer<typeof GreetUserParams>;

/**
 * Raw (pre-validation) arguments per tool, as produced by the interpreter
 */
export interface ToolArgsMap {
  open_app: z.input<typeof OpenAppParams>;
  get_weather: z.input<typeof GetWeatherParams>;
  search_web: z.input<typeof SearchWebParams>;
  send_email: z.input<typeof SendEmailParams>;
  schedule_task: z.input<typeof ScheduleTaskParams>;
  greet_user: z.input<typeof GreetUserParams>;
}

/**
 * A resolved tool call: which tool, with which arguments
 */
export type ToolInvocation = {
  [K in ToolNameType]: { tool: K; args: ToolArgsMap[K] };
}[ToolNameType];

// =============================================================================
// VOICE STREAM MESSAGES
// =============================================================================

export const VoiceClientMessage = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('utterance'),
    text: z.string().max(2000),
  }),
  z.object({
    type: z.literal('ping'),
  }),
]);

export type VoiceClientMessageType = z.infer<typeof VoiceClientMessage>;

export type VoiceServerMessage =
  | { type: 'connected'; sessionId: string }
  | { type: 'speak'; text: string }
  | { type: 'turn_complete'; turnId: string }
  | { type: 'pong' }
  | { type: 'error'; error: string };

export const VoiceCommandRequest = z.object({
  text: z.string().min(1).max(2000),
});

export const ExecuteToolRequest = z.object({
  name: z.string(),
  parameters: z.record(z.unknown()).optional(),
});
