import { Command } from 'commander';
import { runCommand } from '../context.js';
import { addJob } from '../logic/jobs.js';

export const addCommand = new Command('add')
  .description('Track a new job application')
  .argument('<company>', 'The name of the company')
  .action(async (company: string, _options: unknown, command: Command) => {
    await runCommand(command, async (ctx) => {
      await addJob(ctx, company);
    });
  });
