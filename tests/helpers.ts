import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import ExcelJS from 'exceljs';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'pallet-tests-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function writeWorkbook(
  filePath: string,
  rows: Array<Array<string | number>>,
  sheetName = 'DATA'
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(sheetName);
  for (const row of rows) {
    sheet.addRow(row);
  }
  await workbook.xlsx.writeFile(filePath);
}

export async function writeJson(filePath: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(value, null, 2), 'utf8');
}

export async function setMtime(filePath: string, date: Date): Promise<void> {
  await fs.utimes(filePath, date, date);
}
