import { createInterface } from 'node:readline';
import { FettersError } from '../../errors.js';
import { formatDate, parseDate } from '../../utils/dates.js';

export interface Choice<T> {
  label: string;
  value: T;
}

/**
 * Interactive prompts used by the command flows. Every method resolves `null`
 * when the user skips the question (empty answer where no default applies,
 * `q`, or closed input).
 */
export interface Prompter {
  text(message: string, options?: { initial?: string }): Promise<string | null>;
  select<T>(
    message: string,
    choices: Choice<T>[],
    options?: { defaultIndex?: number },
  ): Promise<T | null>;
  multiSelect<T>(message: string, choices: Choice<T>[]): Promise<T[] | null>;
  confirm(message: string, options?: { defaultValue?: boolean }): Promise<boolean | null>;
  date(message: string, options?: { initial?: Date }): Promise<Date | null>;
  close(): void;
}

export interface PrompterIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

const SKIP = 'q';

/**
 * Parse `1,3` style answers into zero-based indexes. Null when any part is
 * not a listed choice.
 */
export function parseSelection(answer: string, count: number): number[] | null {
  const indexes: number[] = [];
  for (const part of answer.split(',')) {
    const trimmed = part.trim();
    if (trimmed === '') continue;
    if (!/^\d+$/.test(trimmed)) return null;
    const index = parseInt(trimmed, 10) - 1;
    if (index < 0 || index >= count) return null;
    if (!indexes.includes(index)) indexes.push(index);
  }
  return indexes.length > 0 ? indexes : null;
}

/**
 * Numbered-choice prompts over node:readline.
 */
export function createReadlinePrompter(
  io: PrompterIO = { input: process.stdin, output: process.stdout },
): Prompter {
  const rl = createInterface({ input: io.input, output: io.output });

  // Lines that arrive before a question is asked are kept for the next one.
  const pending: string[] = [];
  let waiting: ((line: string | null) => void) | null = null;
  let closed = false;

  rl.on('line', (line) => {
    if (waiting) {
      const deliver = waiting;
      waiting = null;
      deliver(line);
    } else {
      pending.push(line);
    }
  });
  rl.once('close', () => {
    closed = true;
    if (waiting) {
      const deliver = waiting;
      waiting = null;
      deliver(null);
    }
  });

  async function ask(prompt: string): Promise<string | null> {
    if (!closed) {
      try {
        rl.setPrompt(prompt);
        rl.prompt();
      } catch (err) {
        throw FettersError.prompt(err);
      }
    }

    const queued = pending.shift();
    if (queued !== undefined) return queued.trim();
    if (closed) return null;

    const line = await new Promise<string | null>((resolve) => {
      waiting = resolve;
    });
    return line === null ? null : line.trim();
  }

  function print(line: string): void {
    io.output.write(`${line}\n`);
  }

  function listChoices<T>(choices: Choice<T>[], defaultIndex?: number): void {
    choices.forEach((choice, i) => {
      const marker = i === defaultIndex ? ' (default)' : '';
      print(`  ${i + 1}) ${choice.label}${marker}`);
    });
  }

  return {
    async text(message: string, options: { initial?: string } = {}): Promise<string | null> {
      const hint = options.initial ? ` [${options.initial}]` : '';
      const answer = await ask(`${message}${hint} `);
      if (answer === null) return null;
      if (answer === '') return options.initial ?? null;
      return answer;
    },

    async select<T>(
      message: string,
      choices: Choice<T>[],
      options: { defaultIndex?: number } = {},
    ): Promise<T | null> {
      if (choices.length === 0) return null;
      print(message);
      listChoices(choices, options.defaultIndex);
      const defaultChoice =
        options.defaultIndex === undefined ? undefined : choices[options.defaultIndex];

      for (;;) {
        const hint = options.defaultIndex === undefined ? '' : ` [${options.defaultIndex + 1}]`;
        const answer = await ask(`Choice${hint} (${SKIP} to skip): `);
        if (answer === null || answer === SKIP) return null;
        if (answer === '') return defaultChoice?.value ?? null;
        const picked = parseSelection(answer, choices.length);
        if (picked !== null && picked.length === 1) {
          return choices[picked[0]].value;
        }
        print(`Enter a number between 1 and ${choices.length}.`);
      }
    },

    async multiSelect<T>(message: string, choices: Choice<T>[]): Promise<T[] | null> {
      if (choices.length === 0) return null;
      print(message);
      listChoices(choices);

      for (;;) {
        const answer = await ask(`Choices, comma separated (${SKIP} to skip): `);
        if (answer === null || answer === '' || answer === SKIP) return null;
        const picked = parseSelection(answer, choices.length);
        if (picked !== null) {
          return picked.map((i) => choices[i].value);
        }
        print(`Enter numbers between 1 and ${choices.length}, e.g. 1,3.`);
      }
    },

    async confirm(
      message: string,
      options: { defaultValue?: boolean } = {},
    ): Promise<boolean | null> {
      const defaultValue = options.defaultValue ?? true;
      const answer = await ask(`${message} ${defaultValue ? '(Y/n)' : '(y/N)'} `);
      if (answer === null) return null;
      const normalized = answer.toLowerCase();
      if (normalized === '') return defaultValue;
      if (normalized === 'y' || normalized === 'yes') return true;
      if (normalized === 'n' || normalized === 'no') return false;
      return null;
    },

    async date(message: string, options: { initial?: Date } = {}): Promise<Date | null> {
      const initial = options.initial ?? new Date();
      for (;;) {
        const answer = await ask(`${message} [${formatDate(initial)}] (${SKIP} to skip): `);
        if (answer === null || answer === SKIP) return null;
        if (answer === '') return initial;
        const parsed = parseDate(answer);
        if (parsed !== null) return parsed;
        print('Enter a date as YYYY-MM-DD.');
      }
    },

    close(): void {
      rl.close();
    },
  };
}

/**
 * Defer creating the real prompter until a question is asked, so commands that
 * never prompt leave stdin alone.
 */
export function createLazyPrompter(create: () => Prompter): Prompter {
  let prompter: Prompter | null = null;

  function get(): Prompter {
    if (prompter === null) {
      prompter = create();
    }
    return prompter;
  }

  return {
    text(message: string, options?: { initial?: string }): Promise<string | null> {
      return get().text(message, options);
    },

    select<T>(
      message: string,
      choices: Choice<T>[],
      options?: { defaultIndex?: number },
    ): Promise<T | null> {
      return get().select(message, choices, options);
    },

    multiSelect<T>(message: string, choices: Choice<T>[]): Promise<T[] | null> {
      return get().multiSelect(message, choices);
    },

    confirm(message: string, options?: { defaultValue?: boolean }): Promise<boolean | null> {
      return get().confirm(message, options);
    },

    date(message: string, options?: { initial?: Date }): Promise<Date | null> {
      return get().date(message, options);
    },

    close(): void {
      prompter?.close();
      prompter = null;
    },
  };
}
