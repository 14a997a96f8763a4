import type { FettersConfig } from '../../config/schema.js';
import type { BaseContext } from '../context.js';
import { writeLine } from '../utils/output.js';

export function showConfig(ctx: BaseContext): FettersConfig {
  const config = ctx.config.load();
  writeLine(ctx.out, `Config file: ${ctx.config.path}`);
  writeLine(ctx.out, `current_sprint_name = ${JSON.stringify(config.current_sprint_name)}`);
  return config;
}

/**
 * Open config.toml in the user's editor, writing the defaults first when the
 * file does not exist yet. The edited file is re-read to validate it.
 */
export async function editConfig(ctx: BaseContext): Promise<FettersConfig> {
  if (!ctx.config.exists()) {
    ctx.config.save(ctx.config.load());
  }
  // The editor takes over the terminal; release stdin first.
  ctx.prompter.close();
  await ctx.host.edit(ctx.config.path);
  return ctx.config.load();
}
