/**
 * App Launcher Executor - Launch local applications by name
 */

import fs from 'fs';
import { z } from 'zod';
import { IToolExecutor, ExecutionResult, ToolContext, buildResult } from './interface';
import { OpenAppParams, OpenAppParamsType } from '../core/schemas';
import { Launcher, launchDetached, expandEnvVars } from '../services/processLauncher';
import { logger, describeError } from '../services/logger';

export const DEFAULT_APPS: Record<string, string> = {
  notepad: '%SystemRoot%\\System32\\notepad.exe',
  calculator: '%SystemRoot%\\System32\\calc.exe',
  chrome: '%ProgramFiles%\\Google\\Chrome\\Application\\chrome.exe',
  paint: '%SystemRoot%\\System32\\mspaint.exe',
  explorer: '%SystemRoot%\\explorer.exe',
};

const AppTable = z.record(z.string().min(1));

/**
 * Read extra name -> path entries from a JSON file
 */
export function loadAppTable(configPath?: string): Record<string, string> {
  const table: Record<string, string> = { ...DEFAULT_APPS };
  if (!configPath) return table;

  try {
    const parsed = AppTable.safeParse(JSON.parse(fs.readFileSync(configPath, 'utf-8')));
    if (!parsed.success) {
      logger.warn('Ignoring invalid app table', { configPath, issues: parsed.error.issues.length });
      return table;
    }
    for (const [name, appPath] of Object.entries(parsed.data)) {
      table[name.toLowerCase()] = appPath;
    }
  } catch (error) {
    logger.warn('Could not read app table', { configPath, error: describeError(error) });
  }
  return table;
}

export interface AppLauncherOptions {
  apps?: Record<string, string>;
  launcher?: Launcher;
  env?: NodeJS.ProcessEnv;
}

export class AppLauncherExecutor implements IToolExecutor<OpenAppParamsType> {
  readonly id = 'open_app';
  readonly name = 'App Launcher';
  readonly category = 'system';
  readonly description = 'Open a local application by name. Examples: "open notepad", "open chrome"';
  readonly schema = OpenAppParams;

  private apps: Map<string, string>;
  private launcher: Launcher;
  private env: NodeJS.ProcessEnv;

  constructor(options: AppLauncherOptions = {}) {
    const table = options.apps ?? DEFAULT_APPS;
    this.apps = new Map(Object.entries(table).map(([name, appPath]) => [name.toLowerCase(), appPath]));
    this.launcher = options.launcher ?? launchDetached;
    this.env = options.env ?? process.env;
  }

  resolve(appName: string): string | null {
    const appPath = this.apps.get(appName.toLowerCase());
    return appPath ? expandEnvVars(appPath, this.env) : null;
  }

  async execute(params: OpenAppParamsType, context: ToolContext): Promise<ExecutionResult> {
    const startedAt = new Date();
    const { appName } = params;
    const appPath = this.resolve(appName);

    if (!appPath) {
      return buildResult(this.id, startedAt, `App '${appName}' not recognized.`, {
        code: 'APP_NOT_FOUND',
      });
    }

    try {
      await this.launcher(appPath);
      logger.info(`App '${appName}' opened successfully`, { turnId: context.turnId, appPath });
      return buildResult(this.id, startedAt, `${appName} opened successfully!`);
    } catch (error) {
      logger.error(`Failed to open ${appName}`, { turnId: context.turnId, appPath, error: describeError(error) });
      return buildResult(this.id, startedAt, `Failed to open ${appName}: ${describeError(error)}`, {
        code: 'LAUNCH_FAILED',
      });
    }
  }
}
