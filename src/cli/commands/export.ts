import { Command } from 'commander';
import { runCommand } from '../context.js';
import { exportJobs } from '../logic/export.js';
import type { ExportOptions } from '../logic/export.js';

export const exportCommand = new Command('export')
  .description('Export all tracked job applications from a sprint to a spreadsheet')
  .option(
    '-d, --directory <dir>',
    'Export the spreadsheet to the given directory path. Defaults to the current directory.',
  )
  .option(
    '-f, --filename <file>',
    "Set a filename for the exported file. The '.xlsx' extension is added if missing.",
  )
  .option('-s, --sprint <sprint>', 'Select a sprint to export from. Defaults to the current sprint.')
  .action(async (options: ExportOptions, command: Command) => {
    await runCommand(command, async (ctx) => {
      await exportJobs(ctx, options);
    });
  });
