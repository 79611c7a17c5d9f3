import { ArchiveManager, type ArchiveResult } from './archiveManager.js';
import { BatchExporter } from './batchExporter.js';
import { BatchManager } from './batchManager.js';
import type { TrackerConfig } from './config.js';
import { CustomerDirectory } from './customerDirectory.js';
import { NotReadyError } from './errors.js';
import { HistoryStore, type DeleteResult, type HistoryLoadSummary } from './historyStore.js';
import { createLogger } from './logger.js';
import { ReferenceDataset, type ParseSummary } from './referenceDataset.js';
import { UniquenessIndex } from './uniquenessIndex.js';
import { ValidationCache, type ValidationCacheOptions } from './validationCache.js';
import type {
  AddUnitResult,
  Batch,
  BatchRecord,
  BatchStatus,
  Customer,
  FinalizeOptions,
  HistoryFilters,
  HistorySort
} from './types.js';

const log = createLogger('tracker');

export type PalletTrackerConfig = Pick<
  TrackerConfig,
  | 'capacity'
  | 'unknownUnitPolicy'
  | 'artifactRoot'
  | 'artifactPrefix'
  | 'historyFile'
  | 'referenceDir'
  | 'referencePointerFile'
  | 'referencePattern'
  | 'referenceSearch'
  | 'customersFile'
  | 'archiveRoot'
  | 'archiveAfterDays'
>;

export interface PalletTrackerOptions {
  now?: () => Date;
  cache?: ValidationCacheOptions;
}

export interface LoadSummary {
  history: HistoryLoadSummary;
  reference: ParseSummary;
  customers: number;
  palletNumber: number;
}

/**
 * Wires the reference dataset, history, uniqueness index and lifecycle
 * together. Everything but `load()` waits for the first successful load.
 */
export class PalletTracker {
  readonly history: HistoryStore;
  readonly reference: ReferenceDataset;
  readonly customerDirectory: CustomerDirectory;
  private readonly index = new UniquenessIndex();
  private readonly cache: ValidationCache;
  private readonly manager: BatchManager;
  private readonly archiver: ArchiveManager;
  private loaded = false;
  private resolveReady: () => void = () => undefined;

  /** Settles once the first `load()` succeeds. */
  readonly ready: Promise<void>;

  constructor(config: PalletTrackerConfig, options: PalletTrackerOptions = {}) {
    const now = options.now ?? (() => new Date());
    this.ready = new Promise(resolve => {
      this.resolveReady = resolve;
    });

    this.cache = new ValidationCache({ now: () => now().getTime(), ...options.cache });
    this.history = new HistoryStore({ historyFile: config.historyFile, artifactRoot: config.artifactRoot, now });
    this.reference = new ReferenceDataset({
      pointerFile: config.referencePointerFile,
      directory: config.referenceDir,
      pattern: config.referencePattern,
      search: config.referenceSearch
    });
    this.customerDirectory = new CustomerDirectory(config.customersFile);
    this.archiver = new ArchiveManager({
      artifactRoot: config.artifactRoot,
      archiveRoot: config.archiveRoot,
      archiveAfterDays: config.archiveAfterDays,
      now
    });

    this.manager = new BatchManager({
      index: this.index,
      cache: this.cache,
      reference: this.reference,
      exporter: new BatchExporter({
        artifactRoot: config.artifactRoot,
        prefix: config.artifactPrefix,
        reference: this.reference,
        customers: this.customerDirectory
      }),
      history: this.history,
      capacity: config.capacity,
      unknownUnitPolicy: config.unknownUnitPolicy,
      now
    });
  }

  get isReady(): boolean {
    return this.loaded;
  }

  /**
   * History loads before the reference dataset so the uniqueness index is
   * complete before the first scan. Starts pallet #next when none is active.
   */
  async load(): Promise<LoadSummary> {
    const history = await this.history.load();
    const reference = await this.reference.load();
    const customers = await this.customerDirectory.load();

    this.cache.clear();
    this.rebuildIndex();
    if (!this.manager.current) {
      this.manager.startNext(this.history.nextPalletNumber());
    }

    const wasLoaded = this.loaded;
    this.loaded = true;
    if (!wasLoaded) {
      this.resolveReady();
    }

    const palletNumber = this.manager.status()?.palletNumber ?? this.history.nextPalletNumber();
    log.info(
      `Ready: ${history.records} pallet(s) in history, ${reference.validRows} known serial(s), pallet #${palletNumber} active`
    );
    return { history, reference, customers, palletNumber };
  }

  addUnit(raw: string): AddUnitResult {
    this.assertReady();
    return this.manager.addUnit(raw);
  }

  async finalize(options: FinalizeOptions): Promise<BatchRecord> {
    this.assertReady();
    return this.manager.finalize(options);
  }

  reset(): Batch {
    this.assertReady();
    return this.manager.reset();
  }

  startNextBatch(): Batch {
    this.assertReady();
    const active = this.manager.current;
    const next = Math.max(this.history.nextPalletNumber(), active ? active.palletNumber + 1 : 1);
    return this.manager.startNext(next);
  }

  status(): BatchStatus | undefined {
    this.assertReady();
    return this.manager.status();
  }

  current(): Batch | undefined {
    this.assertReady();
    return this.manager.current;
  }

  query(filters?: HistoryFilters, sort?: HistorySort): BatchRecord[] {
    this.assertReady();
    return this.history.query(filters, sort);
  }

  async delete(palletNumber: number): Promise<DeleteResult> {
    this.assertReady();
    const result = await this.history.delete(palletNumber);
    this.releaseSerials(result.record.serials);
    return result;
  }

  async resetRecord(palletNumber: number, reason: string): Promise<BatchRecord> {
    this.assertReady();
    const record = await this.history.resetRecord(palletNumber, reason);
    this.releaseSerials(record.serials);
    return record;
  }

  async reloadReference(): Promise<ParseSummary> {
    this.assertReady();
    const summary = await this.reference.load();
    this.cache.clearReference();
    return summary;
  }

  customers(): Customer[] {
    this.assertReady();
    return this.customerDirectory.list();
  }

  async reloadCustomers(): Promise<number> {
    this.assertReady();
    return this.customerDirectory.load();
  }

  async archive(): Promise<ArchiveResult> {
    this.assertReady();
    const result = await this.archiver.archiveOldArtifacts();
    if (result.moved.length > 0) {
      await this.history.reconcileWithFilesystem();
    }
    return result;
  }

  private releaseSerials(serials: string[]): void {
    this.cache.invalidateUniqueness(serials);
    this.rebuildIndex();
  }

  private rebuildIndex(): void {
    this.index.rebuild(this.history.records(), this.manager.current, this.history.reservedSerials());
  }

  private assertReady(): void {
    if (!this.loaded) {
      throw new NotReadyError();
    }
  }
}
