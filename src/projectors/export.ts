import type { ListedJob } from '../db/repositories/types.js';
import { formatDate } from '../utils/dates.js';

export const EXPORT_HEADERS = [
  'Timestamp',
  'Company Name',
  'Title',
  'Status',
  'Link',
  'Notes',
] as const;

export type ExportRow = [string, string, string, string, string, string];

/** ARGB fill for the header row and for rows with no known status. */
export const DEFAULT_FILL = 'FF999999';

const STATUS_FILLS: Record<string, string> = {
  GHOSTED: 'FF999999',
  HIRED: 'FF00A36C',
  'IN PROGRESS': 'FFFFFF00',
  'NOT HIRING ANYMORE': 'FFC9C9C9',
  'OFFER RECEIVED': 'FFFF00FF',
  PENDING: 'FF0096FF',
  REJECTED: 'FFEE4B2B',
};

export function statusFill(status: string | null): string {
  if (status === null) return DEFAULT_FILL;
  return STATUS_FILLS[status] ?? DEFAULT_FILL;
}

/**
 * One spreadsheet row per job, in the order given:
 * created, company, title or "N/A", status or "N/A", link or "", notes or "".
 */
export function projectExport(jobs: ListedJob[]): ExportRow[] {
  return jobs.map((job) => [
    job.created,
    job.company_name,
    job.title ?? 'N/A',
    job.status ?? 'N/A',
    job.link ?? '',
    job.notes ?? '',
  ]);
}

export function sheetTitle(sprint: string | undefined): string {
  return `Sprint: ${sprint ?? 'unknown'}`;
}

const MAX_SHEET_NAME_LENGTH = 31;

/**
 * Workbook-safe form of a sheet title: characters Excel rejects
 * (`* ? : \ / [ ]`) are dropped, leading and trailing apostrophes are
 * stripped and the result is cut to 31 characters.
 */
export function sanitizeSheetName(title: string): string {
  return title
    .replace(/[*?:\\/[\]]/g, '')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^'+|'+$/g, '')
    .slice(0, MAX_SHEET_NAME_LENGTH)
    .trim();
}

/**
 * `<YYYY-MM-DD>-fetters-export-sprint-<sprint>.xlsx` unless a filename is
 * given, in which case `.xlsx` is appended when missing.
 */
export function exportFilename(today: Date, sprint: string | undefined, filename?: string): string {
  if (filename !== undefined) {
    return filename.endsWith('.xlsx') ? filename : `${filename}.xlsx`;
  }
  return `${formatDate(today)}-fetters-export-sprint-${sprint ?? 'unknown'}.xlsx`;
}
