import fs from 'fs/promises';
import path from 'path';
import ExcelJS from 'exceljs';
import type { JobRecord } from '../types.js';
import { DATASET_COLUMNS, toDatasetRow } from './dataset.js';

const WIDE_COLUMNS = new Set<string>(['Job Description', 'Extracted Details', 'Highlights']);

/** Mirrors the dataset into an .xlsx sheet for human inspection; nothing reads it back. */
export async function writeSpreadsheet(filePath: string, jobs: JobRecord[]): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet('Jobs');
  sheet.columns = DATASET_COLUMNS.map((column) => ({
    header: column,
    key: column,
    width: WIDE_COLUMNS.has(column) ? 80 : 24,
  }));
  sheet.getRow(1).font = { bold: true };

  for (const job of jobs) {
    const row = toDatasetRow(job);
    const details = row['Extracted Details'];
    sheet.addRow({
      ...row,
      'Extracted Details': details && typeof details === 'object' ? JSON.stringify(details) : details ?? null,
    });
  }

  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await workbook.xlsx.writeFile(filePath);
}
