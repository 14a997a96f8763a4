import { describe, it, expect } from 'vitest';
import { EventEmitter } from 'node:events';
import {
  editorCommand,
  launchEditor,
  openInHost,
  openerCommand,
} from '../../../src/cli/utils/host.js';
import type { ChildProcessLike, HostDeps, SpawnProcessOptions } from '../../../src/cli/utils/host.js';
import { FettersError } from '../../../src/errors.js';

class FakeChild extends EventEmitter implements ChildProcessLike {
  unrefCalls = 0;

  unref(): void {
    this.unrefCalls++;
  }
}

interface SpawnCall {
  command: string;
  args: string[];
  options: SpawnProcessOptions;
}

function fakeSpawn(): {
  child: FakeChild;
  calls: SpawnCall[];
  spawnProcess: HostDeps['spawnProcess'];
} {
  const child = new FakeChild();
  const calls: SpawnCall[] = [];
  return {
    child,
    calls,
    spawnProcess: (command, args, options) => {
      calls.push({ command, args, options });
      return child;
    },
  };
}

describe('openerCommand', () => {
  it('picks the opener for each platform', () => {
    expect(openerCommand('https://example.com', 'darwin')).toEqual({
      command: 'open',
      args: ['https://example.com'],
    });
    expect(openerCommand('https://example.com', 'win32')).toEqual({
      command: 'cmd',
      args: ['/c', 'start', '""', 'https://example.com'],
    });
    expect(openerCommand('https://example.com', 'linux')).toEqual({
      command: 'xdg-open',
      args: ['https://example.com'],
    });
  });
});

describe('editorCommand', () => {
  it('prefers VISUAL, then EDITOR', () => {
    expect(editorCommand({ VISUAL: 'code -w', EDITOR: 'nano' }, 'linux')).toEqual({
      command: 'code',
      args: ['-w'],
    });
    expect(editorCommand({ EDITOR: 'nano' }, 'linux')).toEqual({ command: 'nano', args: [] });
  });

  it('splits arguments off the editor value', () => {
    expect(editorCommand({ EDITOR: '  subl  -n --wait ' }, 'linux')).toEqual({
      command: 'subl',
      args: ['-n', '--wait'],
    });
  });

  it('falls back per platform', () => {
    expect(editorCommand({}, 'linux')).toEqual({ command: 'vi', args: [] });
    expect(editorCommand({ EDITOR: '' }, 'win32')).toEqual({ command: 'notepad', args: [] });
    expect(editorCommand({ EDITOR: '   ' }, 'darwin')).toEqual({ command: 'vi', args: [] });
  });
});

describe('openInHost', () => {
  it('resolves once the opener starts and detaches it', async () => {
    const { child, calls, spawnProcess } = fakeSpawn();
    const opened = openInHost('https://example.com/job', { spawnProcess, platform: 'linux' });
    child.emit('spawn');
    await opened;

    expect(calls).toEqual([
      {
        command: 'xdg-open',
        args: ['https://example.com/job'],
        options: { detached: true, stdio: 'ignore' },
      },
    ]);
    expect(child.unrefCalls).toBe(1);
  });

  it('rejects with an IO error when the opener cannot start', async () => {
    const { child, spawnProcess } = fakeSpawn();
    const opened = openInHost('https://example.com/job', { spawnProcess, platform: 'linux' });
    child.emit('error', new Error('spawn xdg-open ENOENT'));

    await expect(opened).rejects.toThrow('IO error: spawn xdg-open ENOENT');
    await expect(opened).rejects.toBeInstanceOf(FettersError);
  });
});

describe('launchEditor', () => {
  it('waits for the editor to exit cleanly', async () => {
    const { child, calls, spawnProcess } = fakeSpawn();
    const edited = launchEditor('/tmp/config.toml', {
      spawnProcess,
      platform: 'linux',
      env: { EDITOR: 'nano' },
    });
    child.emit('exit', 0);
    await edited;

    expect(calls).toEqual([
      {
        command: 'nano',
        args: ['/tmp/config.toml'],
        options: { detached: false, stdio: 'inherit' },
      },
    ]);
  });

  it('passes the editor arguments before the file', async () => {
    const { child, calls, spawnProcess } = fakeSpawn();
    const edited = launchEditor('/tmp/config.toml', {
      spawnProcess,
      platform: 'linux',
      env: { EDITOR: 'code --wait' },
    });
    child.emit('exit', 0);
    await edited;

    expect(calls).toEqual([
      {
        command: 'code',
        args: ['--wait', '/tmp/config.toml'],
        options: { detached: false, stdio: 'inherit' },
      },
    ]);
  });

  it('rejects when the editor exits with a failure code', async () => {
    const { child, spawnProcess } = fakeSpawn();
    const edited = launchEditor('/tmp/config.toml', { spawnProcess, platform: 'linux', env: {} });
    child.emit('exit', 1);

    await expect(edited).rejects.toThrow('IO error: vi exited with code 1');
  });
});
