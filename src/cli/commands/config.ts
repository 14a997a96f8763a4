import { Command } from 'commander';
import { runAction } from '../context.js';
import { editConfig, showConfig } from '../logic/config.js';

const editCommand = new Command('edit')
  .description('Edit the configuration file in $EDITOR')
  .action(async (_options: unknown, command: Command) => {
    await runAction(command, async (ctx) => {
      await editConfig(ctx);
    });
  });

const showCommand = new Command('show')
  .description('Display the current configuration settings')
  .action(async (_options: unknown, command: Command) => {
    await runAction(command, async (ctx) => {
      showConfig(ctx);
    });
  });

export const configCommand = new Command('config')
  .description('Configure fetters by opening its config file')
  .addCommand(editCommand)
  .addCommand(showCommand);
