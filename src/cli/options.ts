import type { Command } from 'commander';
import { z } from 'zod';
import type { JobFilter } from '../db/repositories/types.js';
import { FettersError } from '../errors.js';

/**
 * Attach the job query flags shared by list, delete, update, open and the
 * stage subcommands.
 */
export function addQueryOptions(command: Command): Command {
  return command
    .option('-c, --company <company>', 'Filter results by company name. Supports searching with partial text.')
    .option('-l, --link <link>', 'Filter results by links. Supports searching with partial text.')
    .option('-n, --notes <notes>', 'Filter results by notes. Supports searching with partial text.')
    .option('--sprint <sprint>', 'Filter results by sprint name. Supports searching with partial text.')
    .option('-s, --status <status>', 'Filter results by application status. Supports searching with partial text.')
    .option('-t, --title <title>', 'Filter results by job title. Supports searching with partial text.')
    .option(
      '--stages [count]',
      'Filter by number of interview stages. Without a value, shows jobs with any stages. With a number, shows jobs with that exact count.',
    );
}

const queryOptionsSchema = z.object({
  company: z.string().optional(),
  link: z.string().optional(),
  notes: z.string().optional(),
  sprint: z.string().optional(),
  status: z.string().optional(),
  title: z.string().optional(),
  stages: z.union([z.literal(true), z.string()]).optional(),
});

/**
 * Convert parsed commander options into a JobFilter. A bare `--stages` means
 * "any stages" (0); otherwise it must be a non-negative integer.
 */
export function toJobFilter(options: unknown): JobFilter {
  const result = queryOptionsSchema.safeParse(options);
  if (!result.success) {
    throw FettersError.unknown(
      `Invalid query options: ${result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
    );
  }

  const { stages, ...rest } = result.data;
  const filter: JobFilter = {};
  for (const key of ['company', 'link', 'notes', 'sprint', 'status', 'title'] as const) {
    const value = rest[key];
    if (value !== undefined) {
      filter[key] = value;
    }
  }

  if (stages === true) {
    filter.stages = 0;
  } else if (stages !== undefined) {
    if (!/^\d+$/.test(stages)) {
      throw FettersError.unknown(`--stages expects a non-negative integer, got "${stages}"`);
    }
    filter.stages = parseInt(stages, 10);
  }

  return filter;
}

/** True when no query flag was given. */
export function isEmptyFilter(filter: JobFilter): boolean {
  return Object.values(filter).every((value) => value === undefined);
}
