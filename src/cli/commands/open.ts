import { Command } from 'commander';
import { runCommand } from '../context.js';
import { openJob } from '../logic/jobs.js';
import { addQueryOptions, toJobFilter } from '../options.js';

export const openCommand = addQueryOptions(
  new Command('open').description(
    'Open the link associated with a job application in your default browser',
  ),
).action(async (options: unknown, command: Command) => {
  await runCommand(command, async (ctx) => {
    await openJob(ctx, toJobFilter(options));
  });
});
