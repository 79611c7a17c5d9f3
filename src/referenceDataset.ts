import fs from 'fs/promises';
import path from 'path';
import ExcelJS from 'exceljs';
import type { Row, Worksheet } from 'exceljs';
import type { ReferenceSearchStrategy } from './config.js';
import { SourceCorruptError, SourceUnavailableError, errnoCode, toSourceError } from './errors.js';
import { createLogger } from './logger.js';
import { normalizeSerial, validateSerial } from './serials.js';
import type { ReferenceAttributes, ReferenceLookup, ReferenceRecord } from './types.js';

const log = createLogger('reference');

/** Header names accepted for the identifier column, in priority order, compared without spaces/underscores. */
const IDENTIFIER_HEADERS = ['SERIALNO', 'SERIALNUMBER', 'SERIAL', 'UNITID', 'IDENTIFIER', 'ID'];
const DATA_SHEET = 'DATA';

export type SkipReason = 'empty-identifier' | 'invalid-identifier' | 'duplicate-identifier';

export type RowParse =
  | { kind: 'valid'; record: ReferenceRecord }
  | { kind: 'skipped'; row: number; reason: SkipReason };

export interface ParseSummary {
  source: string;
  validRows: number;
  skippedRows: number;
  skipped: Array<{ row: number; reason: SkipReason }>;
}

export interface ReferenceSourceOptions {
  pointerFile?: string;
  directory?: string;
  pattern?: RegExp;
  search?: ReferenceSearchStrategy[];
}

function normalizeHeader(value: string): string {
  return value.trim().toUpperCase().replace(/[\s_-]+/g, '');
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

async function fromPointer(pointerFile: string): Promise<string | null> {
  let content: string;
  try {
    content = await fs.readFile(pointerFile, 'utf-8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return null;
    }
    throw toSourceError(error, pointerFile);
  }

  const target = content
    .split(/\r?\n/)
    .map(line => line.trim())
    .find(line => line && !line.startsWith('#'));
  if (!target) {
    log.warn(`Pointer file ${pointerFile} is empty`);
    return null;
  }

  const resolved = path.resolve(path.dirname(pointerFile), target);
  if (!(await fileExists(resolved))) {
    log.warn(`Pointer file ${pointerFile} names ${resolved}, which does not exist`);
    return null;
  }
  return resolved;
}

async function newestMatching(directory: string, pattern: RegExp): Promise<string | null> {
  let entries: string[];
  try {
    entries = await fs.readdir(directory);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return null;
    }
    throw toSourceError(error, directory);
  }

  let newest: { filePath: string; mtimeMs: number } | null = null;
  for (const entry of entries) {
    // ~$ files are lock files left by an open spreadsheet editor
    if (entry.startsWith('~$') || !pattern.test(entry)) {
      continue;
    }
    const filePath = path.join(directory, entry);
    const stat = await fs.stat(filePath).catch(() => null);
    if (!stat?.isFile()) {
      continue;
    }
    if (!newest || stat.mtimeMs > newest.mtimeMs) {
      newest = { filePath, mtimeMs: stat.mtimeMs };
    }
  }
  return newest?.filePath ?? null;
}

/**
 * Finds the reference dataset: an explicit pointer file first, then the most
 * recently modified file in the reference directory matching the pattern.
 */
export async function resolveReferenceSource(options: ReferenceSourceOptions): Promise<string> {
  const search = options.search ?? ['pointer', 'newest'];
  for (const strategy of search) {
    if (strategy === 'pointer' && options.pointerFile) {
      const found = await fromPointer(options.pointerFile);
      if (found) {
        return found;
      }
    }
    if (strategy === 'newest' && options.directory && options.pattern) {
      const found = await newestMatching(options.directory, options.pattern);
      if (found) {
        return found;
      }
    }
  }

  const searched = [options.pointerFile, options.directory].filter(Boolean).join(', ');
  throw new SourceUnavailableError(`No reference dataset found (searched: ${searched || 'nothing configured'})`);
}

async function readWorksheet(filePath: string): Promise<Worksheet> {
  // Opening first surfaces missing and locked files with their errno codes.
  try {
    const handle = await fs.open(filePath, 'r');
    await handle.close();
  } catch (error) {
    throw toSourceError(error, filePath);
  }

  const workbook = new ExcelJS.Workbook();
  try {
    if (path.extname(filePath).toLowerCase() === '.csv') {
      // Identity map keeps serials as text instead of numbers or dates.
      return await workbook.csv.readFile(filePath, { map: (value: unknown) => value });
    }
    await workbook.xlsx.readFile(filePath);
  } catch (error) {
    throw toSourceError(error, filePath);
  }

  const sheet =
    workbook.worksheets.find(ws => ws.name.trim().toUpperCase() === DATA_SHEET) ?? workbook.worksheets[0];
  if (!sheet) {
    throw new SourceCorruptError(`Workbook has no worksheets: ${filePath}`, filePath);
  }
  return sheet;
}

function readAttributes(row: Row, columns: Map<number, string>): ReferenceAttributes {
  const attributes: ReferenceAttributes = {};
  for (const [col, header] of columns) {
    const cell = row.getCell(col);
    if (typeof cell.value === 'number') {
      attributes[header] = cell.value;
      continue;
    }
    const text = cell.text.trim();
    if (text) {
      attributes[header] = text;
    }
  }
  return attributes;
}

export function parseRows(sheet: Worksheet, filePath: string): RowParse[] {
  const headerRow = sheet.getRow(1);
  const headers = new Map<string, number>();
  const attributeColumns = new Map<number, string>();
  for (let col = 1; col <= headerRow.cellCount; col += 1) {
    const text = headerRow.getCell(col).text.trim();
    if (!text) {
      continue;
    }
    const key = normalizeHeader(text);
    if (!headers.has(key)) {
      headers.set(key, col);
    }
    attributeColumns.set(col, text);
  }

  const identifierHeader = IDENTIFIER_HEADERS.find(header => headers.has(header));
  const identifierCol = identifierHeader ? headers.get(identifierHeader) : undefined;
  if (identifierCol === undefined) {
    throw new SourceCorruptError(
      `No serial number column in ${filePath} (expected one of: SerialNo, Serial, Unit ID, Identifier, ID)`,
      filePath
    );
  }
  attributeColumns.delete(identifierCol);

  const seen = new Set<string>();
  const results: RowParse[] = [];
  for (let rowNumber = 2; rowNumber <= sheet.rowCount; rowNumber += 1) {
    const row = sheet.getRow(rowNumber);
    if (!row.hasValues) {
      continue;
    }

    const raw = row.getCell(identifierCol).text;
    const check = validateSerial(raw);
    if (!check.ok) {
      const reason: SkipReason = raw.trim() ? 'invalid-identifier' : 'empty-identifier';
      results.push({ kind: 'skipped', row: rowNumber, reason });
      continue;
    }
    if (seen.has(check.serial)) {
      results.push({ kind: 'skipped', row: rowNumber, reason: 'duplicate-identifier' });
      continue;
    }

    seen.add(check.serial);
    results.push({
      kind: 'valid',
      record: { serial: check.serial, attributes: readAttributes(row, attributeColumns), row: rowNumber }
    });
  }
  return results;
}

export async function parseReferenceFile(
  filePath: string
): Promise<{ index: Map<string, ReferenceRecord>; summary: ParseSummary }> {
  const sheet = await readWorksheet(filePath);
  const rows = parseRows(sheet, filePath);

  const index = new Map<string, ReferenceRecord>();
  const skipped: ParseSummary['skipped'] = [];
  for (const parsed of rows) {
    if (parsed.kind === 'valid') {
      index.set(parsed.record.serial, parsed.record);
    } else {
      skipped.push({ row: parsed.row, reason: parsed.reason });
    }
  }

  if (index.size === 0) {
    throw new SourceCorruptError(`No valid serial numbers in ${filePath}`, filePath, skipped.length);
  }
  if (skipped.length > 0) {
    const sample = skipped.slice(0, 5).map(entry => `row ${entry.row} (${entry.reason})`).join(', ');
    log.warn(`Skipped ${skipped.length} row(s) in ${path.basename(filePath)}: ${sample}${skipped.length > 5 ? ', ...' : ''}`);
  }

  return {
    index,
    summary: { source: filePath, validRows: index.size, skippedRows: skipped.length, skipped }
  };
}

/**
 * Index of known serial numbers. A reload builds the new index completely
 * before swapping it in, so a failed reload leaves the previous one serving.
 */
export class ReferenceDataset implements ReferenceLookup {
  private index = new Map<string, ReferenceRecord>();
  private summary: ParseSummary | null = null;
  private loadedAt: Date | null = null;

  constructor(private readonly options: ReferenceSourceOptions = {}) {}

  get size(): number {
    return this.index.size;
  }

  get source(): string | null {
    return this.summary?.source ?? null;
  }

  get lastSummary(): ParseSummary | null {
    return this.summary;
  }

  get lastLoadedAt(): Date | null {
    return this.loadedAt;
  }

  isLoaded(): boolean {
    return this.summary !== null;
  }

  async load(source?: string): Promise<ParseSummary> {
    const filePath = source ?? (await resolveReferenceSource(this.options));
    const { index, summary } = await parseReferenceFile(filePath);
    this.index = index;
    this.summary = summary;
    this.loadedAt = new Date();
    log.debug(`Loaded ${index.size} serial(s) from ${filePath}`);
    return summary;
  }

  lookup(serial: string): ReferenceRecord | undefined {
    const key = normalizeSerial(serial);
    return key ? this.index.get(key) : undefined;
  }
}
