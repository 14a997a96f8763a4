import ExcelJS from 'exceljs';
import { FettersError } from '../../errors.js';
import type { ListedJob } from '../../db/repositories/types.js';
import {
  DEFAULT_FILL,
  EXPORT_HEADERS,
  projectExport,
  sanitizeSheetName,
  sheetTitle,
  statusFill,
} from '../../projectors/export.js';

function solidFill(argb: string): ExcelJS.Fill {
  return { type: 'pattern', pattern: 'solid', fgColor: { argb } };
}

function fillRow(row: ExcelJS.Row, argb: string): void {
  for (let col = 1; col <= EXPORT_HEADERS.length; col++) {
    row.getCell(col).fill = solidFill(argb);
  }
}

/**
 * Build the export workbook: one sheet, a grey header row, then one row per
 * job filled with its status color.
 */
export function buildWorkbook(
  sprint: string | undefined,
  jobs: ListedJob[],
): { workbook: ExcelJS.Workbook; sheetName: string } {
  const sheetName = sanitizeSheetName(sheetTitle(sprint));
  if (sheetName === '') {
    throw FettersError.sheetName(`"${sheetTitle(sprint)}" has no usable characters`);
  }

  const workbook = new ExcelJS.Workbook();
  let worksheet: ExcelJS.Worksheet;
  try {
    worksheet = workbook.addWorksheet(sheetName);
  } catch (err) {
    throw FettersError.sheetName(err instanceof Error ? err.message : String(err));
  }

  fillRow(worksheet.addRow([...EXPORT_HEADERS]), DEFAULT_FILL);

  const rows = projectExport(jobs);
  rows.forEach((values, index) => {
    fillRow(worksheet.addRow(values), statusFill(jobs[index].status));
  });

  return { workbook, sheetName };
}

export async function writeWorkbook(workbook: ExcelJS.Workbook, filePath: string): Promise<void> {
  try {
    await workbook.xlsx.writeFile(filePath);
  } catch (err) {
    throw FettersError.xlsx(err);
  }
}
