/**
 * Process Launcher
 *
 * Starts local programs detached from the server. Used by the app launcher
 * and the browser-mode web search.
 */

import { spawn } from 'child_process';

export type Launcher = (command: string, args?: string[]) => Promise<void>;

/**
 * Spawn a detached process. Resolves once the OS has started it, rejects
 * if the executable cannot be started (ENOENT, EACCES, ...).
 */
export const launchDetached: Launcher = (command, args = []) =>
  new Promise<void>((resolve, reject) => {
    const child = spawn(command, args, {
      detached: true,
      stdio: 'ignore',
      windowsHide: false,
    });
    child.once('error', reject);
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });

/**
 * Command that opens a URL in the user's default browser
 */
export function browserCommand(url: string, platform: NodeJS.Platform = process.platform): {
  command: string;
  args: string[];
} {
  switch (platform) {
    case 'win32':
      return { command: 'rundll32', args: ['url.dll,FileProtocolHandler', url] };
    case 'darwin':
      return { command: 'open', args: [url] };
    default:
      return { command: 'xdg-open', args: [url] };
  }
}

/**
 * Expand %VAR%, $VAR and ${VAR} references. Unknown variables are left as-is.
 */
export function expandEnvVars(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value
    .replace(/%([A-Za-z_][A-Za-z0-9_()]*)%/g, (match, name: string) => env[name] ?? match)
    .replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (match, name: string) => env[name] ?? match)
    .replace(/\$([A-Za-z_][A-Za-z0-9_]*)/g, (match, name: string) => env[name] ?? match);
}
