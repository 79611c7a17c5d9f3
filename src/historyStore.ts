import fs from 'fs/promises';
import path from 'path';
import { PersistenceFailureError, RecordNotFoundError, errnoCode } from './errors.js';
import { createLogger } from './logger.js';
import type {
  BatchRecord,
  BatchRecordSink,
  HistoryFilters,
  HistoryPeriod,
  HistorySort,
  HistorySortKey,
  ResetMarker
} from './types.js';

const log = createLogger('history');

const DAY_MS = 24 * 60 * 60 * 1000;

export interface HistoryStoreOptions {
  historyFile: string;
  artifactRoot: string;
  now?: () => Date;
}

export interface HistoryLoadSummary {
  records: number;
  skipped: number;
  hidden: number[];
  recoveredFromCorruption: boolean;
}

/** An entry kept in the file as written because it could not be read as a record. */
interface UnreadableEntry {
  raw: unknown;
  palletNumber: number | null;
  serials: string[];
}

export interface DeleteResult {
  record: BatchRecord;
  artifactPath: string | null;
  artifactRemoved: boolean;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pick(source: Record<string, unknown>, ...keys: string[]): unknown {
  for (const key of keys) {
    if (source[key] !== undefined) {
      return source[key];
    }
  }
  return undefined;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value : undefined;
}

/**
 * Accepts records written by this store and the older snake_case layout
 * (`pallet_number`, `serial_numbers`, `completed_at`, `exported_file`).
 */
export function toBatchRecord(value: unknown): BatchRecord | null {
  if (!isObject(value)) {
    return null;
  }

  const palletNumber = pick(value, 'palletNumber', 'pallet_number');
  const serials = pick(value, 'serials', 'serial_numbers');
  const completedAt = pick(value, 'completedAt', 'completed_at');
  if (typeof palletNumber !== 'number' || !Number.isInteger(palletNumber) || palletNumber < 1) {
    return null;
  }
  if (!Array.isArray(serials) || !serials.every((serial): serial is string => typeof serial === 'string')) {
    return null;
  }
  if (typeof completedAt !== 'string' || !completedAt) {
    return null;
  }

  const exportedFile = pick(value, 'exportedFile', 'exported_file');
  const record: BatchRecord = {
    palletNumber,
    serials: [...serials],
    createdAt: optionalString(pick(value, 'createdAt', 'created_at')) ?? completedAt,
    completedAt,
    category: optionalString(pick(value, 'category', 'panel_type')) ?? '',
    exportedFile: typeof exportedFile === 'string' && exportedFile ? exportedFile : null
  };

  const destination = pick(value, 'destination');
  if (typeof destination === 'string' && destination) {
    record.destination = destination;
  }

  const reset = pick(value, 'reset');
  if (isObject(reset) && typeof reset.at === 'string') {
    record.reset = { at: reset.at, reason: typeof reset.reason === 'string' ? reset.reason : '' };
  } else if (reset === true) {
    const at = pick(value, 'reset_at');
    const reason = pick(value, 'reset_reason');
    record.reset = {
      at: typeof at === 'string' ? at : completedAt,
      reason: typeof reason === 'string' ? reason : ''
    };
  }

  return record;
}

function claimedPalletNumber(value: unknown): number | null {
  const parsed = typeof value === 'string' && value.trim() ? Number(value) : value;
  return typeof parsed === 'number' && Number.isInteger(parsed) && parsed >= 1 ? parsed : null;
}

/** Whatever pallet number and serials can still be read from an entry `toBatchRecord` refused. */
function toUnreadableEntry(raw: unknown): UnreadableEntry {
  if (!isObject(raw)) {
    return { raw, palletNumber: null, serials: [] };
  }
  const serials = pick(raw, 'serials', 'serial_numbers');
  return {
    raw,
    palletNumber: claimedPalletNumber(pick(raw, 'palletNumber', 'pallet_number')),
    serials: Array.isArray(serials) ? serials.filter((serial): serial is string => typeof serial === 'string') : []
  };
}

function topPalletNumber(entries: readonly { palletNumber: number | null }[]): number {
  return entries.reduce((max, entry) => Math.max(max, entry.palletNumber ?? 0), 0);
}

function cloneRecord(record: BatchRecord): BatchRecord {
  return { ...record, serials: [...record.serials], ...(record.reset ? { reset: { ...record.reset } } : {}) };
}

function startOfDay(date: Date): number {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate()).getTime();
}

export function matchesPeriod(completedAt: string, period: HistoryPeriod, now: Date): boolean {
  if (period === 'all') {
    return true;
  }
  const date = new Date(completedAt);
  if (Number.isNaN(date.getTime())) {
    return false;
  }

  const daysAgo = Math.round((startOfDay(now) - startOfDay(date)) / DAY_MS);
  switch (period) {
    case 'today':
      return daysAgo === 0;
    case 'week':
      return daysAgo >= 0 && daysAgo <= 6;
    case 'month':
      return date.getFullYear() === now.getFullYear() && date.getMonth() === now.getMonth();
    case 'year':
      return date.getFullYear() === now.getFullYear();
  }
}

function compareBy(key: HistorySortKey): (a: BatchRecord, b: BatchRecord) => number {
  switch (key) {
    case 'palletNumber':
      return (a, b) => a.palletNumber - b.palletNumber;
    case 'completedAt':
      return (a, b) => {
        const left = Date.parse(a.completedAt);
        const right = Date.parse(b.completedAt);
        return (Number.isNaN(left) ? -Infinity : left) - (Number.isNaN(right) ? -Infinity : right) || 0;
      };
    case 'fileName':
      return (a, b) => {
        const left = a.exportedFile ? path.basename(a.exportedFile) : '';
        const right = b.exportedFile ? path.basename(b.exportedFile) : '';
        return left < right ? -1 : left > right ? 1 : 0;
      };
  }
}

/**
 * Durable pallet history. The JSON file is the source of truth; the in-memory
 * array mirrors it and is only replaced after a successful write.
 */
export class HistoryStore implements BatchRecordSink {
  private entries: BatchRecord[] = [];
  private hidden = new Set<number>();
  private unreadable: UnreadableEntry[] = [];
  private highWater = 0;
  private readonly historyFile: string;
  private readonly artifactRoot: string;
  private readonly now: () => Date;

  constructor(options: HistoryStoreOptions) {
    this.historyFile = options.historyFile;
    this.artifactRoot = options.artifactRoot;
    this.now = options.now ?? (() => new Date());
  }

  get file(): string {
    return this.historyFile;
  }

  get size(): number {
    return this.entries.length;
  }

  async load(): Promise<HistoryLoadSummary> {
    let content: string | null = null;
    try {
      content = await fs.readFile(this.historyFile, 'utf-8');
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        throw new PersistenceFailureError(this.historyFile, undefined, { cause: error });
      }
    }

    let recoveredFromCorruption = false;
    let raw: unknown = [];
    if (content !== null && content.trim()) {
      try {
        raw = JSON.parse(content);
      } catch {
        recoveredFromCorruption = true;
        await this.backupCorruptFile('was unreadable');
      }
    }

    let items: unknown[] = [];
    let highWater = 0;
    if (Array.isArray(raw)) {
      items = raw;
    } else if (isObject(raw) && Array.isArray(raw.pallets)) {
      items = raw.pallets;
      highWater = (claimedPalletNumber(pick(raw, 'nextPalletNumber', 'next_pallet_number')) ?? 1) - 1;
    } else if (!recoveredFromCorruption) {
      recoveredFromCorruption = true;
      await this.backupCorruptFile('has no pallet list');
    }

    const loaded: BatchRecord[] = [];
    const unreadable: UnreadableEntry[] = [];
    const seen = new Set<number>();
    for (const item of items) {
      const record = toBatchRecord(item);
      if (!record || seen.has(record.palletNumber)) {
        unreadable.push(toUnreadableEntry(item));
        continue;
      }
      seen.add(record.palletNumber);
      loaded.push(record);
    }
    if (unreadable.length > 0) {
      log.warn(
        `Skipped ${unreadable.length} malformed or duplicate record(s) in ${this.historyFile}; they stay in the file and their serials stay reserved`
      );
      await this.backupCorruptFile('has unreadable records');
    }

    this.entries = loaded;
    this.unreadable = unreadable;
    this.highWater = highWater;
    const hidden = await this.reconcileWithFilesystem();
    return { records: loaded.length, skipped: unreadable.length, hidden, recoveredFromCorruption };
  }

  records(): BatchRecord[] {
    return this.entries.map(cloneRecord);
  }

  get(palletNumber: number): BatchRecord | undefined {
    const record = this.entries.find(entry => entry.palletNumber === palletNumber);
    return record ? cloneRecord(record) : undefined;
  }

  isHidden(palletNumber: number): boolean {
    return this.hidden.has(palletNumber);
  }

  /** Serials named by entries that could not be read; they keep their pallet until the file is fixed. */
  reservedSerials(): Map<string, number> {
    const reserved = new Map<string, number>();
    for (const entry of this.unreadable) {
      if (entry.palletNumber === null) {
        continue;
      }
      for (const serial of entry.serials) {
        reserved.set(serial, entry.palletNumber);
      }
    }
    return reserved;
  }

  /** Never reuses a number, including those of deleted pallets. */
  nextPalletNumber(): number {
    return Math.max(this.highWater, topPalletNumber(this.entries), topPalletNumber(this.unreadable)) + 1;
  }

  async commit(record: BatchRecord): Promise<void> {
    if (this.entries.some(entry => entry.palletNumber === record.palletNumber)) {
      throw new PersistenceFailureError(this.historyFile, record.palletNumber, {
        cause: new Error(`Pallet #${record.palletNumber} is already in history`)
      });
    }

    const next = [...this.entries, cloneRecord(record)];
    await this.persist(next, record.palletNumber);
    this.entries = next;
    this.hidden.delete(record.palletNumber);
  }

  query(filters: HistoryFilters = {}, sort?: HistorySort): BatchRecord[] {
    const period = filters.period ?? 'all';
    const search = filters.search?.trim().toUpperCase() ?? '';
    const now = this.now();

    const matches = this.entries.filter(record => {
      if (!filters.includeHidden && this.hidden.has(record.palletNumber)) {
        return false;
      }
      if (!filters.includeReset && record.reset) {
        return false;
      }
      if (!matchesPeriod(record.completedAt, period, now)) {
        return false;
      }
      if (filters.destination !== undefined && record.destination !== filters.destination) {
        return false;
      }
      if (search && !record.serials.some(serial => serial.toUpperCase().includes(search))) {
        return false;
      }
      return true;
    });

    if (sort) {
      const compare = compareBy(sort.key);
      const sign = sort.direction === 'desc' ? -1 : 1;
      matches.sort((a, b) => sign * compare(a, b));
    }
    return matches.map(cloneRecord);
  }

  /**
   * Hides records whose artifact cannot be found anymore. Records stay in the
   * file; they come back once the artifact is restored and history reloads.
   */
  async reconcileWithFilesystem(): Promise<number[]> {
    const hidden = new Set<number>();
    for (const record of this.entries) {
      if (record.exportedFile && (await this.resolveArtifact(record)) === null) {
        hidden.add(record.palletNumber);
      }
    }
    this.hidden = hidden;
    if (hidden.size > 0) {
      log.warn(`${hidden.size} pallet(s) hidden because their export file is missing: #${[...hidden].join(', #')}`);
    }
    return [...hidden];
  }

  /** Absolute path, then relative to the artifact root, then by file name in the root or a dated folder. */
  async resolveArtifact(record: Pick<BatchRecord, 'exportedFile'>): Promise<string | null> {
    const exportedFile = record.exportedFile;
    if (!exportedFile) {
      return null;
    }

    const candidates: string[] = [];
    if (path.isAbsolute(exportedFile)) {
      candidates.push(exportedFile);
    } else {
      candidates.push(path.join(this.artifactRoot, exportedFile));
    }
    const fileName = path.basename(exportedFile);
    candidates.push(path.join(this.artifactRoot, fileName));

    for (const candidate of candidates) {
      if (await isFile(candidate)) {
        return candidate;
      }
    }

    let folders: string[];
    try {
      const entries = await fs.readdir(this.artifactRoot, { withFileTypes: true });
      folders = entries.filter(entry => entry.isDirectory()).map(entry => entry.name);
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        log.warn(`Could not search ${this.artifactRoot}:`, error);
      }
      return null;
    }

    for (const folder of folders) {
      const candidate = path.join(this.artifactRoot, folder, fileName);
      if (await isFile(candidate)) {
        return candidate;
      }
    }
    return null;
  }

  /**
   * Removes a pallet from history and deletes its export file. The history
   * write must succeed; the file removal is best effort.
   */
  async delete(palletNumber: number): Promise<DeleteResult> {
    const record = this.entries.find(entry => entry.palletNumber === palletNumber);
    if (!record) {
      throw new RecordNotFoundError(palletNumber);
    }

    const artifactPath = await this.resolveArtifact(record);
    const next = this.entries.filter(entry => entry.palletNumber !== palletNumber);
    await this.persist(next, palletNumber);
    this.entries = next;
    this.hidden.delete(palletNumber);

    let artifactRemoved = false;
    if (artifactPath) {
      try {
        await fs.rm(artifactPath);
        artifactRemoved = true;
      } catch (error) {
        if (errnoCode(error) !== 'ENOENT') {
          log.warn(`Pallet #${palletNumber} removed from history but ${artifactPath} could not be deleted:`, error);
        }
      }
    } else if (record.exportedFile) {
      log.debug(`Export file for pallet #${palletNumber} was already gone: ${record.exportedFile}`);
    }

    return { record: cloneRecord(record), artifactPath, artifactRemoved };
  }

  /** Keeps the record for audit but frees its serials for scanning again. */
  async resetRecord(palletNumber: number, reason: string): Promise<BatchRecord> {
    const index = this.entries.findIndex(entry => entry.palletNumber === palletNumber);
    if (index === -1) {
      throw new RecordNotFoundError(palletNumber);
    }

    const marker: ResetMarker = { at: this.now().toISOString(), reason: reason.trim() || 'Manual reset' };
    const updated: BatchRecord = { ...cloneRecord(this.entries[index]), reset: marker };
    const next = [...this.entries];
    next[index] = updated;
    await this.persist(next, palletNumber);
    this.entries = next;
    return cloneRecord(updated);
  }

  private async persist(entries: BatchRecord[], palletNumber?: number): Promise<void> {
    const nextPalletNumber = Math.max(this.nextPalletNumber(), topPalletNumber(entries) + 1);
    const document = { nextPalletNumber, pallets: [...entries, ...this.unreadable.map(entry => entry.raw)] };
    const tempFile = `${this.historyFile}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.historyFile), { recursive: true });
      await fs.writeFile(tempFile, JSON.stringify(document, null, 2), 'utf-8');
      await fs.rename(tempFile, this.historyFile);
    } catch (error) {
      await fs.rm(tempFile, { force: true }).catch(cleanupError => {
        log.debug(`Could not remove ${tempFile}: ${String(cleanupError)}`);
      });
      throw new PersistenceFailureError(this.historyFile, palletNumber, { cause: error });
    }
    this.highWater = nextPalletNumber - 1;
  }

  private async backupCorruptFile(problem: string): Promise<void> {
    const backup = `${this.historyFile}.corrupted`;
    try {
      await fs.copyFile(this.historyFile, backup);
      log.error(`Pallet history ${problem}. A copy was saved to ${backup}.`);
    } catch (error) {
      log.error(`Pallet history ${problem} and could not be backed up to ${backup}:`, error);
    }
  }
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}
