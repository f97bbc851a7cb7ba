/**
 * Server Configuration
 *
 * Loads `.env` and parses the environment into a typed config object.
 * Everything except JWT_SECRET has a default so the tools can run
 * (and report "not configured") without a full setup.
 */

import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3001),
  JWT_SECRET: optionalString,
  ALLOWED_ORIGINS: z.string().default('http://localhost:5173'),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(100),

  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  DEFAULT_CITY: z.string().default('Manila'),
  WEATHER_BASE_URL: z.string().url().default('https://wttr.in'),

  SEARCH_MODE: z.enum(['api', 'browser']).default('api'),
  SEARCH_API_URL: z.string().url().default('https://api.duckduckgo.com/'),
  SEARCH_ENGINE_URL: z.string().url().default('https://www.google.com/search?q='),

  SMTP_HOST: z.string().default('smtp.gmail.com'),
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  GMAIL_USER: optionalString,
  GMAIL_APP_PASSWORD: optionalString,

  GOOGLE_CLIENT_SECRET_PATH: z.string().default('credentials.json'),
  GOOGLE_TOKEN_PATH: z.string().default('token.json'),
  CALENDAR_ID: z.string().default('primary'),
  CALENDAR_TIME_ZONE: z.string().default('Asia/Manila'),
  CALENDAR_API_URL: z.string().url().default('https://www.googleapis.com/calendar/v3'),

  APPS_CONFIG_PATH: optionalString,
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  env: Env['NODE_ENV'];
  port: number;
  auth: { jwtSecret?: string };
  cors: { allowedOrigins: string[] };
  rateLimit: { windowMs: number; max: number };
  httpTimeoutMs: number;
  weather: { defaultCity: string; baseUrl: string };
  search: { mode: Env['SEARCH_MODE']; apiUrl: string; engineUrl: string };
  email: { host: string; port: number; user?: string; password?: string };
  calendar: {
    clientSecretPath: string;
    tokenPath: string;
    calendarId: string;
    timeZone: string;
    apiUrl: string;
  };
  apps: { configPath?: string };
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  const env = parsed.data;
  return {
    env: env.NODE_ENV,
    port: env.PORT,
    auth: { jwtSecret: env.JWT_SECRET },
    cors: {
      allowedOrigins: env.ALLOWED_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean),
    },
    rateLimit: { windowMs: env.RATE_LIMIT_WINDOW_MS, max: env.RATE_LIMIT_MAX_REQUESTS },
    httpTimeoutMs: env.HTTP_TIMEOUT_MS,
    weather: { defaultCity: env.DEFAULT_CITY, baseUrl: env.WEATHER_BASE_URL },
    search: {
      mode: env.SEARCH_MODE,
      apiUrl: env.SEARCH_API_URL,
      engineUrl: env.SEARCH_ENGINE_URL,
    },
    email: {
      host: env.SMTP_HOST,
      port: env.SMTP_PORT,
      user: env.GMAIL_USER,
      password: env.GMAIL_APP_PASSWORD,
    },
    calendar: {
      clientSecretPath: env.GOOGLE_CLIENT_SECRET_PATH,
      tokenPath: env.GOOGLE_TOKEN_PATH,
      calendarId: env.CALENDAR_ID,
      timeZone: env.CALENDAR_TIME_ZONE,
      apiUrl: env.CALENDAR_API_URL,
    },
    apps: { configPath: env.APPS_CONFIG_PATH },
  };
}
