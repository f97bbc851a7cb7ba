import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, vi, afterEach } from 'vitest';
import { AppLauncherExecutor, DEFAULT_APPS, loadAppTable } from './appLauncherExecutor';
import { ToolContext } from './interface';

const context: ToolContext = { turnId: 'turn-1', source: 'voice' };
const env = { SystemRoot: 'C:\\Windows', ProgramFiles: 'C:\\Program Files' };

describe('AppLauncherExecutor', () => {
  it('resolves names case-insensitively and expands environment variables', () => {
    const executor = new AppLauncherExecutor({ env, launcher: vi.fn(async () => {}) });

    expect(executor.resolve('Notepad')).toBe('C:\\Windows\\System32\\notepad.exe');
    expect(executor.resolve('chrome')).toBe('C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe');
    expect(executor.resolve('winamp')).toBeNull();
  });

  it('launches a known app', async () => {
    const launcher = vi.fn(async () => {});
    const executor = new AppLauncherExecutor({ env, launcher });

    const result = await executor.execute({ appName: 'calculator' }, context);

    expect(launcher).toHaveBeenCalledWith('C:\\Windows\\System32\\calc.exe');
    expect(result).toMatchObject({ success: true, message: 'calculator opened successfully!' });
  });

  it('reports an unknown app without launching anything', async () => {
    const launcher = vi.fn(async () => {});
    const executor = new AppLauncherExecutor({ env, launcher });

    const result = await executor.execute({ appName: 'winamp' }, context);

    expect(launcher).not.toHaveBeenCalled();
    expect(result).toMatchObject({
      success: false,
      message: "App 'winamp' not recognized.",
      error: { code: 'APP_NOT_FOUND' },
    });
  });

  it('reports a launch failure', async () => {
    const launcher = vi.fn(async () => {
      throw new Error('spawn ENOENT');
    });
    const executor = new AppLauncherExecutor({ env, launcher });

    const result = await executor.execute({ appName: 'paint' }, context);

    expect(result).toMatchObject({
      success: false,
      message: 'Failed to open paint: spawn ENOENT',
      error: { code: 'LAUNCH_FAILED' },
    });
  });

  it('uses a custom table when given', async () => {
    const launcher = vi.fn(async () => {});
    const executor = new AppLauncherExecutor({ apps: { Editor: '/usr/bin/gedit' }, env, launcher });

    await executor.execute({ appName: 'editor' }, context);

    expect(launcher).toHaveBeenCalledWith('/usr/bin/gedit');
    expect(executor.resolve('notepad')).toBeNull();
  });
});

describe('loadAppTable', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  function writeTable(content: string): string {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'apps-'));
    const file = path.join(dir, 'apps.json');
    fs.writeFileSync(file, content);
    return file;
  }

  it('returns the defaults without a config file', () => {
    expect(loadAppTable()).toEqual(DEFAULT_APPS);
  });

  it('merges entries from the config file over the defaults', () => {
    const file = writeTable(JSON.stringify({ VSCode: '/usr/bin/code', notepad: '/usr/bin/gedit' }));

    const table = loadAppTable(file);

    expect(table.vscode).toBe('/usr/bin/code');
    expect(table.notepad).toBe('/usr/bin/gedit');
    expect(table.calculator).toBe(DEFAULT_APPS.calculator);
  });

  it('ignores a file that is not a name-to-path map', () => {
    const file = writeTable(JSON.stringify({ notepad: 42 }));
    expect(loadAppTable(file)).toEqual(DEFAULT_APPS);
  });

  it('ignores a missing file', () => {
    expect(loadAppTable(path.join(os.tmpdir(), 'no-such-apps-file.json'))).toEqual(DEFAULT_APPS);
  });
});
