import { Command } from 'commander';
import { runAction } from '../context.js';
import { renderBanner } from '../formatters/banner.js';
import { VERSION } from '../version.js';

export const bannerCommand = new Command('banner')
  .description('Display the ASCII art')
  .action(async (_options: unknown, command: Command) => {
    await runAction(command, async (ctx) => {
      ctx.out(renderBanner(VERSION));
    });
  });
