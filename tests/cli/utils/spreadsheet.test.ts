import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import ExcelJS from 'exceljs';
import { buildWorkbook, writeWorkbook } from '../../../src/cli/utils/spreadsheet.js';
import type { ListedJob } from '../../../src/db/repositories/types.js';

const jobs: ListedJob[] = [
  {
    id: 1,
    created: '2025-01-15 09:30:00',
    company_name: 'Acme',
    title: 'Engineer',
    status: 'HIRED',
    stages_count: 2,
    link: 'https://example.com/1',
    notes: null,
  },
  {
    id: 2,
    created: '2025-01-15 10:00:00',
    company_name: 'Globex',
    title: null,
    status: 'REJECTED',
    stages_count: null,
    link: null,
    notes: 'no reply',
  },
];

function rowValues(sheet: ExcelJS.Worksheet, rowNumber: number): unknown[] {
  const row = sheet.getRow(rowNumber);
  return [1, 2, 3, 4, 5, 6].map((col) => row.getCell(col).value);
}

describe('buildWorkbook', () => {
  it('names the single sheet after the sprint', () => {
    const { workbook, sheetName } = buildWorkbook('2025-01-15', jobs);
    expect(sheetName).toBe('Sprint 2025-01-15');
    expect(workbook.worksheets.map((sheet) => sheet.name)).toEqual(['Sprint 2025-01-15']);
  });

  it('writes a header row then one row per job in order', () => {
    const { workbook, sheetName } = buildWorkbook('2025-01-15', jobs);
    const sheet = workbook.getWorksheet(sheetName);
    expect(sheet).toBeDefined();
    if (!sheet) return;

    expect(sheet.rowCount).toBe(3);
    expect(rowValues(sheet, 1)).toEqual(['Timestamp', 'Company Name', 'Title', 'Status', 'Link', 'Notes']);
    expect(rowValues(sheet, 2)).toEqual([
      '2025-01-15 09:30:00',
      'Acme',
      'Engineer',
      'HIRED',
      'https://example.com/1',
      '',
    ]);
    expect(rowValues(sheet, 3)).toEqual(['2025-01-15 10:00:00', 'Globex', 'N/A', 'REJECTED', '', 'no reply']);
  });

  it('fills each row by status', () => {
    const { workbook, sheetName } = buildWorkbook('2025-01-15', jobs);
    const sheet = workbook.getWorksheet(sheetName);
    if (!sheet) throw new Error('sheet missing');

    const solid = (argb: string) => ({ type: 'pattern', pattern: 'solid', fgColor: { argb } });
    expect(sheet.getRow(1).getCell(1).fill).toEqual(solid('FF999999'));
    expect(sheet.getRow(2).getCell(6).fill).toEqual(solid('FF00A36C'));
    expect(sheet.getRow(3).getCell(3).fill).toEqual(solid('FFEE4B2B'));
  });

  it('falls back to "unknown" without a sprint name', () => {
    expect(buildWorkbook(undefined, []).sheetName).toBe('Sprint unknown');
  });
});

describe('writeWorkbook', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'fetters-export-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes a file that reads back with the same rows', async () => {
    const { workbook, sheetName } = buildWorkbook('2025-01-15', jobs);
    const file = path.join(dir, 'out.xlsx');
    await writeWorkbook(workbook, file);

    const read = new ExcelJS.Workbook();
    await read.xlsx.readFile(file);
    const sheet = read.getWorksheet(sheetName);
    if (!sheet) throw new Error('sheet missing');

    expect(rowValues(sheet, 2).slice(0, 4)).toEqual(['2025-01-15 09:30:00', 'Acme', 'Engineer', 'HIRED']);
    expect(sheet.getRow(3).getCell(1).fill).toMatchObject({ fgColor: { argb: 'FFEE4B2B' } });
  });

  it('wraps write failures as XLSX errors', async () => {
    const { workbook } = buildWorkbook('2025-01-15', jobs);
    await expect(writeWorkbook(workbook, path.join(dir, 'missing', 'out.xlsx'))).rejects.toMatchObject({
      kind: 'Xlsx',
    });
  });
});
