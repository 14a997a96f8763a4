import type { Command } from 'commander';
import { createConfigStore } from '../config/store.js';
import type { ConfigStore } from '../config/store.js';
import { FettersDatabase } from '../db/database.js';
import {
  InterviewStageRepository,
  JobRepository,
  SprintRepository,
  StatusRepository,
  TitleRepository,
} from '../db/repositories/index.js';
import { toFettersError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { resolveAppPaths } from '../paths.js';
import { resolveCurrentSprint } from '../sprint/current-sprint.js';
import type { CurrentSprint } from '../sprint/current-sprint.js';
import { launchEditor, openInHost } from './utils/host.js';
import { writeStdout } from './utils/output.js';
import type { Output } from './utils/output.js';
import { createLazyPrompter, createReadlinePrompter } from './utils/prompt.js';
import type { Prompter } from './utils/prompt.js';

/** Desktop integration used by `open` and `config edit`. */
export interface Host {
  open(target: string): Promise<void>;
  edit(file: string): Promise<void>;
}

/** What every command outside the store needs. */
export interface BaseContext {
  config: ConfigStore;
  prompter: Prompter;
  out: Output;
  logger: Logger;
  host: Host;
  now: () => Date;
  cwd: () => string;
}

export interface CommandContext extends BaseContext {
  db: FettersDatabase;
  statuses: StatusRepository;
  titles: TitleRepository;
  sprints: SprintRepository;
  jobs: JobRepository;
  stages: InterviewStageRepository;
  currentSprint: CurrentSprint;
}

export interface OpenContextOptions {
  databasePath: string;
  base: BaseContext;
}

/**
 * Open the store for one command: apply migrations, seed statuses and resolve
 * the current sprint from config.
 */
export function openContext({ databasePath, base }: OpenContextOptions): CommandContext {
  const db = new FettersDatabase(databasePath, { logger: base.logger });
  try {
    const statuses = new StatusRepository(db);
    const seeded = statuses.seed();
    if (seeded > 0) {
      base.logger.debug('Seeded statuses', { count: seeded });
    }

    const sprints = new SprintRepository(db, base.now);
    const config = base.config.load();
    const configured = config.current_sprint_name;
    const known = configured.trim() === '' || sprints.findByName(configured) !== null;
    const currentSprint = resolveCurrentSprint(config, sprints);
    if (!known && currentSprint.kind === 'sprint') {
      base.logger.warn('Created sprint named in config', {
        sprint: currentSprint.sprint.name,
        start_date: currentSprint.sprint.start_date,
      });
    }
    base.logger.debug('Resolved current sprint', {
      sprint: currentSprint.kind === 'sprint' ? currentSprint.sprint.name : null,
    });

    return {
      ...base,
      db,
      statuses,
      titles: new TitleRepository(db),
      sprints,
      jobs: new JobRepository(db),
      stages: new InterviewStageRepository(db),
      currentSprint,
    };
  } catch (err) {
    db.close();
    throw err;
  }
}

function defaultBaseContext(verbose: boolean): BaseContext {
  return {
    config: createConfigStore(),
    prompter: createLazyPrompter(() => createReadlinePrompter()),
    out: writeStdout,
    logger: createLogger(verbose),
    host: {
      open: (target) => openInHost(target),
      edit: (file) => launchEditor(file),
    },
    now: () => new Date(),
    cwd: () => process.cwd(),
  };
}

function isVerbose(command: Command): boolean {
  return command.optsWithGlobals<{ verbose?: boolean }>().verbose === true;
}

function fail(err: unknown): never {
  const error = toFettersError(err);
  process.stderr.write(error.userFacing ? `${error.message}\n` : `Error: ${error.message}\n`);
  process.exit(2);
}

/**
 * Run a command body that does not touch the store.
 */
export async function runAction(
  command: Command,
  fn: (ctx: BaseContext) => Promise<void>,
): Promise<void> {
  try {
    const base = defaultBaseContext(isVerbose(command));
    try {
      await fn(base);
    } finally {
      base.prompter.close();
    }
  } catch (err) {
    fail(err);
  }
}

/**
 * Run a command body against the store. The database and prompts are closed
 * before returning; errors print one line and exit with code 2.
 */
export async function runCommand(
  command: Command,
  fn: (ctx: CommandContext) => Promise<void>,
): Promise<void> {
  try {
    const base = defaultBaseContext(isVerbose(command));
    try {
      const ctx = openContext({ databasePath: resolveAppPaths().databaseFile, base });
      try {
        await fn(ctx);
      } finally {
        ctx.db.close();
      }
    } finally {
      base.prompter.close();
    }
  } catch (err) {
    fail(err);
  }
}
