import * as path from 'node:path';
import { FettersError } from '../../errors.js';
import { exportFilename, sheetTitle } from '../../projectors/export.js';
import { requireCurrentSprint } from '../../sprint/current-sprint.js';
import type { CommandContext } from '../context.js';
import { writeLine } from '../utils/output.js';
import { buildWorkbook, writeWorkbook } from '../utils/spreadsheet.js';

export interface ExportOptions {
  directory?: string;
  filename?: string;
  sprint?: string;
}

/**
 * Write every job of a sprint (default: the current one) to an XLSX file and
 * return its path.
 */
export async function exportJobs(ctx: CommandContext, options: ExportOptions): Promise<string> {
  const current = requireCurrentSprint(ctx.currentSprint);
  const sprint = options.sprint ?? current.name;

  const jobs = ctx.jobs.list({ sprint }, current);
  if (jobs.length === 0) {
    throw FettersError.noJobsAvailable(sprint);
  }

  const { workbook, sheetName } = buildWorkbook(sprint, jobs);
  const filePath = path.join(
    options.directory ?? ctx.cwd(),
    exportFilename(ctx.now(), sprint, options.filename),
  );
  await writeWorkbook(workbook, filePath);

  ctx.logger.debug('Exported jobs', { sheet: sheetName, rows: jobs.length, path: filePath });
  writeLine(ctx.out, `Successfully exported all jobs for sprint ${sprint} to path: ${filePath}!`);
  const title = sheetTitle(sprint);
  if (sheetName !== title) {
    writeLine(
      ctx.out,
      `Sheet named "${sheetName}" instead of "${title}": sheet names cannot contain : \\ / ? * [ ] or exceed 31 characters.`,
    );
  }
  return filePath;
}
