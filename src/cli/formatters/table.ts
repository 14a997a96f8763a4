import type { InsightRow, ListedJob, SprintRow } from '../../db/repositories/types.js';

/**
 * Render a bordered text table:
 *
 * ```
 * +----+---------+
 * | ID | Company |
 * +----+---------+
 * | 1  | Acme    |
 * +----+---------+
 * ```
 *
 * Cell text is used as is; embedded newlines are flattened to spaces.
 */
export function renderTable(headers: readonly string[], rows: readonly string[][]): string {
  const clean = (cell: string): string => cell.replace(/\r?\n/g, ' ');
  const body = rows.map((row) => row.map(clean));
  const widths = headers.map((header, col) =>
    Math.max(header.length, ...body.map((row) => (row[col] ?? '').length)),
  );

  const border = `+${widths.map((w) => '-'.repeat(w + 2)).join('+')}+`;
  const line = (cells: readonly string[]): string =>
    `|${widths.map((w, col) => ` ${(cells[col] ?? '').padEnd(w)} `).join('|')}|`;

  return [border, line(headers), border, ...body.map(line), border].join('\n') + '\n';
}

export const JOB_HEADERS = [
  'ID',
  'Created',
  'Company Name',
  'Title',
  'Status',
  'Num Stages',
  'Link',
  'Notes',
] as const;

export function jobCells(job: ListedJob): string[] {
  return [
    String(job.id),
    job.created,
    job.company_name,
    job.title ?? 'N/A',
    job.status ?? 'N/A',
    job.stages_count === null ? '' : String(job.stages_count),
    job.link ?? 'N/A',
    job.notes ?? 'N/A',
  ];
}

export function renderJobsTable(jobs: ListedJob[]): string {
  return renderTable(JOB_HEADERS, jobs.map(jobCells));
}

/** One-line description used when picking a job from a list. */
export function jobLabel(job: ListedJob): string {
  return `ID: ${job.id} | Company: ${job.company_name} | Title: ${job.title ?? ''} | Status: ${job.status ?? ''}`;
}

export const SPRINT_HEADERS = ['Sprint Name', 'Start Date', 'End Date', '# of Jobs'] as const;

export function renderSprintsTable(sprints: SprintRow[]): string {
  return renderTable(
    SPRINT_HEADERS,
    sprints.map((s) => [s.name, s.start_date, s.end_date ?? 'N/A', String(s.num_jobs)]),
  );
}

export function sprintLabel(sprint: SprintRow): string {
  return `${sprint.name} (Start Date: ${sprint.start_date}, End Date: ${sprint.end_date ?? 'N/A'})`;
}

export function renderInsightsTable(labelHeader: string, rows: InsightRow[]): string {
  return renderTable(
    [labelHeader, 'Count', 'Sprint %', 'Overall %'],
    rows.map((r) => [r.label, String(r.count), r.sprint_percentage, r.overall_percentage]),
  );
}
