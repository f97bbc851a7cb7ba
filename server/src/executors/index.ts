/**
 * Executor Registry & Initialization
 *
 * Builds the registry of every tool the interpreter can dispatch to,
 * wired to the given configuration and shared services.
 */

import { ExecutorRegistry } from './interface';
import { AppLauncherExecutor, loadAppTable } from './appLauncherExecutor';
import { WeatherExecutor } from './weatherExecutor';
import { WebSearchExecutor } from './webSearchExecutor';
import { EmailExecutor } from './emailExecutor';
import { CalendarExecutor, ReminderNotifier } from './calendarExecutor';
import { GreetingExecutor } from './greetingExecutor';
import { ReminderStore } from '../core/reminderStore';
import { DelayQueue } from '../core/delayQueue';
import { AppConfig } from '../config';
import { FileTokenStore, GoogleAuthClient } from '../services/googleAuth';
import { logger } from '../services/logger';

export interface ExecutorDependencies {
  reminders: ReminderStore;
  queue?: DelayQueue;
  notify?: ReminderNotifier;
}

export function createExecutorRegistry(config: AppConfig, deps: ExecutorDependencies): ExecutorRegistry {
  const registry = new ExecutorRegistry();
  const timeoutMs = config.httpTimeoutMs;

  // System
  registry.register(new AppLauncherExecutor({ apps: loadAppTable(config.apps.configPath) }));

  // Information
  registry.register(
    new WeatherExecutor({
      baseUrl: config.weather.baseUrl,
      defaultCity: config.weather.defaultCity,
      timeoutMs,
    })
  );
  registry.register(
    new WebSearchExecutor({
      mode: config.search.mode,
      apiUrl: config.search.apiUrl,
      engineUrl: config.search.engineUrl,
      timeoutMs,
    })
  );

  // Communication
  registry.register(
    new EmailExecutor({
      host: config.email.host,
      port: config.email.port,
      user: config.email.user,
      password: config.email.password,
      timeoutMs,
    })
  );

  // Productivity
  registry.register(
    new CalendarExecutor({
      auth: new GoogleAuthClient({
        clientSecretPath: config.calendar.clientSecretPath,
        tokenStore: new FileTokenStore(config.calendar.tokenPath),
        timeoutMs,
      }),
      calendarId: config.calendar.calendarId,
      timeZone: config.calendar.timeZone,
      apiUrl: config.calendar.apiUrl,
      reminders: deps.reminders,
      queue: deps.queue,
      notify: deps.notify,
      timeoutMs,
    })
  );

  registry.register(new GreetingExecutor(deps.reminders));

  logger.info(`Executors initialized. ${registry.list().length} tools available.`);
  return registry;
}

export { ExecutorRegistry } from './interface';
export type { ExecutionResult, ToolContext, ToolDescriptor, IToolExecutor } from './interface';
