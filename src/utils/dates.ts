/**
 * Date helpers. Sprint and job dates are `YYYY-MM-DD` (job `created` adds
 * ` HH:MM:SS`); interview stage dates are `YYYY/MM/DD`. All use local time.
 */

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `YYYY-MM-DD` */
export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** `YYYY-MM-DD HH:MM:SS` */
export function formatTimestamp(date: Date): string {
  return `${formatDate(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/** `YYYY/MM/DD` */
export function formatStageDate(date: Date): string {
  return `${date.getFullYear()}/${pad(date.getMonth() + 1)}/${pad(date.getDate())}`;
}

function parseParts(value: string, separator: '-' | '/'): Date | null {
  const pattern = separator === '-' ? /^(\d{4})-(\d{2})-(\d{2})$/ : /^(\d{4})\/(\d{2})\/(\d{2})$/;
  const match = pattern.exec(value.trim());
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(year, month - 1, day);

  // Reject rollovers such as 2025-02-30.
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
}

/** Parse `YYYY-MM-DD`, or null when malformed or not a real calendar day. */
export function parseDate(value: string): Date | null {
  return parseParts(value, '-');
}

/** Parse `YYYY/MM/DD`, or null when malformed or not a real calendar day. */
export function parseStageDate(value: string): Date | null {
  return parseParts(value, '/');
}
