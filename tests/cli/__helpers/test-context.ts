import { createConfigStore } from '../../../src/config/store.js';
import type { ConfigStore } from '../../../src/config/store.js';
import { openContext } from '../../../src/cli/context.js';
import type { BaseContext, CommandContext } from '../../../src/cli/context.js';
import type { Choice, Prompter } from '../../../src/cli/utils/prompt.js';
import type { JobRow, SprintRow } from '../../../src/db/repositories/types.js';
import { IN_MEMORY } from '../../../src/db/database.js';
import { silentLogger } from '../../../src/logger.js';

/**
 * One scripted answer per prompt, consumed in order:
 * - text: a string or null
 * - select: the zero-based index of the choice, or null
 * - multiSelect: an array of zero-based indexes, or null
 * - confirm: a boolean or null
 * - date: a Date or null
 */
export type ScriptedAnswer = string | number | number[] | boolean | Date | null;

export interface ScriptedPrompter extends Prompter {
  asked: string[];
  /** Queue more answers. */
  answer(...answers: ScriptedAnswer[]): void;
  remaining(): number;
  closed: boolean;
}

export function createScriptedPrompter(answers: ScriptedAnswer[]): ScriptedPrompter {
  const queue = [...answers];

  function next(message: string): ScriptedAnswer {
    prompter.asked.push(message);
    if (queue.length === 0) {
      throw new Error(`No scripted answer left for prompt "${message}"`);
    }
    const answer = queue.shift();
    return answer === undefined ? null : answer;
  }

  function pick<T>(message: string, choices: Choice<T>[], index: number): T {
    const choice = choices[index];
    if (choice === undefined) {
      throw new Error(`Scripted index ${index} is out of range for "${message}"`);
    }
    return choice.value;
  }

  const prompter: ScriptedPrompter = {
    asked: [],
    closed: false,
    answer: (...more: ScriptedAnswer[]) => {
      queue.push(...more);
    },
    remaining: () => queue.length,

    async text(message: string): Promise<string | null> {
      const answer = next(message);
      if (answer !== null && typeof answer !== 'string') {
        throw new Error(`Expected a text answer for "${message}"`);
      }
      return answer;
    },

    async select<T>(message: string, choices: Choice<T>[]): Promise<T | null> {
      const answer = next(message);
      if (answer === null) return null;
      if (typeof answer !== 'number') {
        throw new Error(`Expected a choice index for "${message}"`);
      }
      return pick(message, choices, answer);
    },

    async multiSelect<T>(message: string, choices: Choice<T>[]): Promise<T[] | null> {
      const answer = next(message);
      if (answer === null) return null;
      if (!Array.isArray(answer)) {
        throw new Error(`Expected choice indexes for "${message}"`);
      }
      return answer.map((index) => pick(message, choices, index));
    },

    async confirm(message: string): Promise<boolean | null> {
      const answer = next(message);
      if (answer !== null && typeof answer !== 'boolean') {
        throw new Error(`Expected a yes/no answer for "${message}"`);
      }
      return answer;
    },

    async date(message: string): Promise<Date | null> {
      const answer = next(message);
      if (answer !== null && !(answer instanceof Date)) {
        throw new Error(`Expected a date answer for "${message}"`);
      }
      return answer;
    },

    close(): void {
      prompter.closed = true;
    },
  };
  return prompter;
}

export const CONFIG_PATH = '/fake/.config/fetters/config.toml';

export function createMemoryConfigStore(currentSprint?: string): {
  store: ConfigStore;
  files: Map<string, string>;
} {
  const files = new Map<string, string>();
  const store = createConfigStore({
    configPath: CONFIG_PATH,
    readFile: (p: string) => {
      const content = files.get(p);
      if (content === undefined) throw new Error(`ENOENT: ${p}`);
      return content;
    },
    writeFile: (p: string, data: string) => {
      files.set(p, data);
    },
    existsSync: (p: string) => files.has(p),
    mkdirSync: () => {},
  });
  if (currentSprint !== undefined) {
    store.setCurrentSprint(currentSprint);
  }
  return { store, files };
}

export interface TestContextOptions {
  currentSprint?: string;
  answers?: ScriptedAnswer[];
  now?: Date;
  cwd?: string;
}

export interface TestBase {
  base: BaseContext;
  prompter: ScriptedPrompter;
  files: Map<string, string>;
  opened: string[];
  edited: string[];
  output: () => string;
}

export function makeTestBase(options: TestContextOptions = {}): TestBase {
  const chunks: string[] = [];
  const opened: string[] = [];
  const edited: string[] = [];
  const prompter = createScriptedPrompter(options.answers ?? []);
  const { store, files } = createMemoryConfigStore(options.currentSprint);
  const now = options.now ?? new Date(2025, 0, 15, 9, 30, 0);

  const base: BaseContext = {
    config: store,
    prompter,
    out: (content: string) => {
      chunks.push(content);
    },
    logger: silentLogger,
    host: {
      open: async (target: string) => {
        opened.push(target);
      },
      edit: async (file: string) => {
        edited.push(file);
      },
    },
    now: () => now,
    cwd: () => options.cwd ?? '/work',
  };

  return { base, prompter, files, opened, edited, output: () => chunks.join('') };
}

export interface TestContext extends TestBase {
  ctx: CommandContext;
}

/**
 * Command context over an in-memory database and an in-memory config file.
 */
export function makeTestContext(options: TestContextOptions = {}): TestContext {
  const testBase = makeTestBase(options);
  const ctx = openContext({ databasePath: IN_MEMORY, base: testBase.base });
  return { ...testBase, ctx };
}

export interface JobSeed {
  company: string;
  title?: string;
  status?: string;
  link?: string | null;
  notes?: string | null;
  sprint?: SprintRow;
}

/** Insert a job directly, defaulting to a PENDING Engineer in the current sprint. */
export function seedJob(ctx: CommandContext, seed: JobSeed): JobRow {
  const status = ctx.statuses.findByName(seed.status ?? 'PENDING');
  if (!status) throw new Error(`Unknown status ${seed.status ?? 'PENDING'}`);
  const sprint = seed.sprint ?? (ctx.currentSprint.kind === 'sprint' ? ctx.currentSprint.sprint : null);
  if (!sprint) throw new Error('No sprint to seed into');

  return ctx.jobs.add({
    company_name: seed.company,
    created: '2025-01-14 08:00:00',
    title_id: ctx.titles.getOrCreate(seed.title ?? 'Engineer').id,
    status_id: status.id,
    link: seed.link ?? null,
    notes: seed.notes ?? null,
    sprint_id: sprint.id,
  });
}
