import { Command } from 'commander';
import { runCommand } from '../context.js';
import { addStage, deleteStage, showStageTree, updateStage } from '../logic/stage.js';
import { addQueryOptions, toJobFilter } from '../options.js';

const addCommand = addQueryOptions(
  new Command('add').description('Add a new interview stage to an application'),
).action(async (options: unknown, command: Command) => {
  await runCommand(command, async (ctx) => {
    await addStage(ctx, toJobFilter(options));
  });
});

const deleteCommand = addQueryOptions(
  new Command('delete').description('Delete an interview stage from an application'),
).action(async (options: unknown, command: Command) => {
  await runCommand(command, async (ctx) => {
    await deleteStage(ctx, toJobFilter(options));
  });
});

const treeCommand = addQueryOptions(
  new Command('tree').description(
    'Display interview stage trees. Every application with stages is shown when no query flags are given.',
  ),
).action(async (options: unknown, command: Command) => {
  await runCommand(command, async (ctx) => {
    await showStageTree(ctx, toJobFilter(options));
  });
});

const updateCommand = addQueryOptions(
  new Command('update').description('Update an interview stage for an application'),
).action(async (options: unknown, command: Command) => {
  await runCommand(command, async (ctx) => {
    await updateStage(ctx, toJobFilter(options));
  });
});

export const stageCommand = new Command('stage')
  .description('Manage interview stages for a job application')
  .addCommand(addCommand)
  .addCommand(deleteCommand)
  .addCommand(treeCommand)
  .addCommand(updateCommand);
