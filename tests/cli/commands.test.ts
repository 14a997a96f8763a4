import { describe, it, expect } from 'vitest';
import type { Command } from 'commander';
import { addCommand } from '../../src/cli/commands/add.js';
import { configCommand } from '../../src/cli/commands/config.js';
import { exportCommand } from '../../src/cli/commands/export.js';
import { listCommand } from '../../src/cli/commands/list.js';
import { sprintCommand } from '../../src/cli/commands/sprint.js';
import { stageCommand } from '../../src/cli/commands/stage.js';
import { renderBanner } from '../../src/cli/formatters/banner.js';

const QUERY_FLAGS = ['--company', '--link', '--notes', '--sprint', '--status', '--title', '--stages'];

function longFlags(command: Command): Array<string | undefined> {
  return command.options.map((option) => option.long);
}

describe('command tree', () => {
  it('gives listing commands the shared query flags', () => {
    expect(longFlags(listCommand)).toEqual(QUERY_FLAGS);
    for (const sub of stageCommand.commands) {
      expect(longFlags(sub)).toEqual(QUERY_FLAGS);
    }
  });

  it('registers the stage and sprint subcommands', () => {
    expect(stageCommand.commands.map((c) => c.name())).toEqual(['add', 'delete', 'tree', 'update']);
    expect(sprintCommand.commands.map((c) => c.name())).toEqual(['current', 'new', 'show-all', 'set']);
    expect(configCommand.commands.map((c) => c.name())).toEqual(['edit', 'show']);
  });

  it('takes the company as an argument to add', () => {
    expect(addCommand.registeredArguments.map((arg) => arg.name())).toEqual(['company']);
  });

  it('accepts directory, filename and sprint on export', () => {
    expect(longFlags(exportCommand)).toEqual(['--directory', '--filename', '--sprint']);
  });
});

describe('renderBanner', () => {
  it('ends with the version line', () => {
    const lines = renderBanner('1.2.3').split('\n');
    expect(lines).toHaveLength(8);
    expect(lines[5]).toBe('');
    expect(lines[6]).toBe('  track your job applications · v1.2.3');
    expect(lines[7]).toBe('');
  });
});
