import { Command } from 'commander';
import { runCommand } from '../context.js';
import { deleteJob } from '../logic/jobs.js';
import { addQueryOptions, toJobFilter } from '../options.js';

export const deleteCommand = addQueryOptions(
  new Command('delete').description('Delete a tracked job application'),
).action(async (options: unknown, command: Command) => {
  await runCommand(command, async (ctx) => {
    await deleteJob(ctx, toJobFilter(options));
  });
});
