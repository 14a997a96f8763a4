import { Command } from 'commander';
import { runCommand } from '../context.js';
import { newSprint, setSprint, showAllSprints, showCurrentSprint } from '../logic/sprint.js';

const currentCommand = new Command('current')
  .description('Display the current sprint name')
  .action(async (_options: unknown, command: Command) => {
    await runCommand(command, async (ctx) => {
      showCurrentSprint(ctx);
    });
  });

const newCommand = new Command('new')
  .description('Create a new job sprint and make it current')
  .option('-n, --name <name>', 'Override the default sprint name (YYYY-MM-DD)')
  .action(async (options: { name?: string }, command: Command) => {
    await runCommand(command, async (ctx) => {
      newSprint(ctx, options.name);
    });
  });

const showAllCommand = new Command('show-all')
  .description('Show all job sprints')
  .action(async (_options: unknown, command: Command) => {
    await runCommand(command, async (ctx) => {
      showAllSprints(ctx);
    });
  });

const setCommand = new Command('set')
  .description('Set the current job sprint')
  .action(async (_options: unknown, command: Command) => {
    await runCommand(command, async (ctx) => {
      await setSprint(ctx);
    });
  });

export const sprintCommand = new Command('sprint')
  .description('Manage job sprints')
  .addCommand(currentCommand)
  .addCommand(newCommand)
  .addCommand(showAllCommand)
  .addCommand(setCommand);
