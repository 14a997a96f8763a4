import { Command } from 'commander';
import { runCommand } from '../context.js';
import { updateJob } from '../logic/jobs.js';
import { addQueryOptions, toJobFilter } from '../options.js';

export const updateCommand = addQueryOptions(
  new Command('update').description('Update a tracked job application'),
).action(async (options: unknown, command: Command) => {
  await runCommand(command, async (ctx) => {
    await updateJob(ctx, toJobFilter(options));
  });
});
