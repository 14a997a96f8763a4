import { Command } from 'commander';
import { runCommand } from '../context.js';
import { showInsights } from '../logic/insights.js';

export const insightsCommand = new Command('insights')
  .description('Show job application insights')
  .action(async (_options: unknown, command: Command) => {
    await runCommand(command, async (ctx) => {
      showInsights(ctx);
    });
  });
