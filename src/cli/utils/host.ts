import { spawn as nodeSpawn } from 'node:child_process';
import { FettersError } from '../../errors.js';

/**
 * Minimal child process interface for dependency injection.
 */
export interface ChildProcessLike {
  once(event: 'spawn', listener: () => void): unknown;
  once(event: 'error', listener: (err: Error) => void): unknown;
  once(event: 'exit', listener: (code: number | null) => void): unknown;
  unref(): void;
}

export interface SpawnProcessOptions {
  detached: boolean;
  stdio: 'ignore' | 'inherit';
}

export interface HostDeps {
  spawnProcess: (command: string, args: string[], options: SpawnProcessOptions) => ChildProcessLike;
  platform: NodeJS.Platform;
  env: Record<string, string | undefined>;
}

const defaultDeps: HostDeps = {
  spawnProcess: (command, args, options) => nodeSpawn(command, args, options),
  platform: process.platform,
  env: process.env,
};

/**
 * Command and arguments that hand a URL or file path to the desktop's
 * default handler.
 */
export function openerCommand(
  target: string,
  platform: NodeJS.Platform,
): { command: string; args: string[] } {
  switch (platform) {
    case 'darwin':
      return { command: 'open', args: [target] };
    case 'win32':
      return { command: 'cmd', args: ['/c', 'start', '""', target] };
    default:
      return { command: 'xdg-open', args: [target] };
  }
}

/**
 * The editor from `$VISUAL` or `$EDITOR`, split on whitespace so values such
 * as `code --wait` carry their arguments.
 */
export function editorCommand(
  env: Record<string, string | undefined>,
  platform: NodeJS.Platform,
): { command: string; args: string[] } {
  const [command, ...args] = (env.VISUAL || env.EDITOR || '').trim().split(/\s+/);
  if (command) return { command, args };
  return { command: platform === 'win32' ? 'notepad' : 'vi', args: [] };
}

/**
 * Open a link or local file with the platform opener. Resolves once the opener
 * has started; it keeps running detached from this process.
 */
export function openInHost(target: string, overrides: Partial<HostDeps> = {}): Promise<void> {
  const deps: HostDeps = { ...defaultDeps, ...overrides };
  const { command, args } = openerCommand(target, deps.platform);

  return new Promise((resolve, reject) => {
    const child = deps.spawnProcess(command, args, { detached: true, stdio: 'ignore' });
    child.once('error', (err) => reject(FettersError.io(err)));
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });
}

/**
 * Run the user's editor on a file and wait for it to exit.
 */
export function launchEditor(file: string, overrides: Partial<HostDeps> = {}): Promise<void> {
  const deps: HostDeps = { ...defaultDeps, ...overrides };
  const { command, args } = editorCommand(deps.env, deps.platform);

  return new Promise((resolve, reject) => {
    const child = deps.spawnProcess(command, [...args, file], { detached: false, stdio: 'inherit' });
    child.once('error', (err) => reject(FettersError.io(err)));
    child.once('exit', (code) => {
      if (code === 0) {
        resolve();
      } else {
        reject(FettersError.io(new Error(`${command} exited with code ${code ?? 'null'}`)));
      }
    });
  });
}
