#!/usr/bin/env node
import { Command } from 'commander';
import { addCommand } from './commands/add.js';
import { bannerCommand } from './commands/banner.js';
import { configCommand } from './commands/config.js';
import { deleteCommand } from './commands/delete.js';
import { exportCommand } from './commands/export.js';
import { insightsCommand } from './commands/insights.js';
import { listCommand } from './commands/list.js';
import { openCommand } from './commands/open.js';
import { sprintCommand } from './commands/sprint.js';
import { stageCommand } from './commands/stage.js';
import { updateCommand } from './commands/update.js';
import { VERSION } from './version.js';

const program = new Command();

program
  .name('fetters')
  .description('Track job applications in sprints from the command line')
  .version(VERSION)
  .option('-v, --verbose', 'Print debug logs to stderr', false);

program.addCommand(addCommand);
program.addCommand(bannerCommand);
program.addCommand(configCommand);
program.addCommand(deleteCommand);
program.addCommand(exportCommand);
program.addCommand(insightsCommand);
program.addCommand(listCommand);
program.addCommand(openCommand);
program.addCommand(sprintCommand);
program.addCommand(stageCommand);
program.addCommand(updateCommand);

await program.parseAsync();
