import { Command } from 'commander';
import { runCommand } from '../context.js';
import { listJobs } from '../logic/jobs.js';
import { addQueryOptions, toJobFilter } from '../options.js';

export const listCommand = addQueryOptions(
  new Command('list').description(
    'List job applications in the current sprint, or those matching the query flags',
  ),
).action(async (options: unknown, command: Command) => {
  await runCommand(command, async (ctx) => {
    listJobs(ctx, toJobFilter(options));
  });
});
