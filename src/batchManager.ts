import {
  BatchFullError,
  BatchNotAcceptingUnitsError,
  DuplicateUnitError,
  InvalidFormatError,
  InvalidTransitionError,
  UnknownUnitError
} from './errors.js';
import { createLogger } from './logger.js';
import { validateSerial } from './serials.js';
import type { UniquenessIndex } from './uniquenessIndex.js';
import type { ValidationCache } from './validationCache.js';
import type {
  AddUnitResult,
  AddUnitWarning,
  Batch,
  BatchArtifactExporter,
  BatchRecord,
  BatchRecordSink,
  BatchStatus,
  FinalizeOptions,
  ReferenceLookup,
  UnknownUnitPolicy
} from './types.js';

const log = createLogger('pallet');

export const DEFAULT_CAPACITY = 25;

export interface BatchManagerDeps {
  index: UniquenessIndex;
  cache: ValidationCache;
  reference: ReferenceLookup;
  exporter: BatchArtifactExporter;
  history: BatchRecordSink;
  capacity?: number;
  unknownUnitPolicy?: UnknownUnitPolicy;
  now?: () => Date;
}

function snapshot(batch: Batch): Batch {
  return { ...batch, serials: [...batch.serials] };
}

/**
 * State machine for the one pallet being built:
 * `building → full → exported`. A new pallet only starts through `startNext`.
 */
export class BatchManager {
  private batch: Batch | undefined;
  private readonly capacity: number;
  private readonly unknownUnitPolicy: UnknownUnitPolicy;
  private readonly now: () => Date;

  constructor(private readonly deps: BatchManagerDeps) {
    this.capacity = deps.capacity ?? DEFAULT_CAPACITY;
    this.unknownUnitPolicy = deps.unknownUnitPolicy ?? 'reject';
    this.now = deps.now ?? (() => new Date());
  }

  get current(): Batch | undefined {
    return this.batch ? snapshot(this.batch) : undefined;
  }

  status(): BatchStatus | undefined {
    if (!this.batch) {
      return undefined;
    }
    return {
      palletNumber: this.batch.palletNumber,
      count: this.batch.serials.length,
      capacity: this.batch.capacity,
      remaining: Math.max(0, this.batch.capacity - this.batch.serials.length),
      state: this.batch.state
    };
  }

  startNext(palletNumber: number): Batch {
    if (this.batch && this.batch.state !== 'exported') {
      throw new InvalidTransitionError('start a new pallet', this.batch.state, this.batch.palletNumber);
    }

    this.batch = {
      palletNumber,
      serials: [],
      state: 'building',
      capacity: this.capacity,
      createdAt: this.now().toISOString()
    };
    log.debug(`Started pallet #${palletNumber} (capacity ${this.capacity})`);
    return snapshot(this.batch);
  }

  addUnit(raw: string): AddUnitResult {
    const check = validateSerial(raw);
    if (!check.ok) {
      throw new InvalidFormatError(raw, check.reason);
    }
    const serial = check.serial;

    const batch = this.batch;
    if (!batch || batch.state === 'exported') {
      throw new BatchNotAcceptingUnitsError(batch?.palletNumber, batch?.state ?? 'not started');
    }
    if (batch.state === 'full') {
      throw new BatchFullError(batch.palletNumber, batch.capacity);
    }
    if (batch.serials.length >= batch.capacity) {
      batch.state = 'full';
      throw new BatchFullError(batch.palletNumber, batch.capacity);
    }

    const { index, cache, reference } = this.deps;
    const holder = cache.uniqueness(serial, () => index.isAssigned(serial));
    if (holder !== undefined) {
      throw new DuplicateUnitError(serial, holder, holder === batch.palletNumber ? 'current' : 'history');
    }

    const warnings: AddUnitWarning[] = [];
    const record = cache.reference(serial, () => reference.lookup(serial));
    if (!record) {
      if (this.unknownUnitPolicy === 'reject') {
        throw new UnknownUnitError(serial);
      }
      warnings.push('unknown-unit');
      log.warn(`Serial ${serial} is not in the reference dataset; accepted by policy`);
    }

    batch.serials.push(serial);
    index.assign(serial, batch.palletNumber);
    cache.invalidateUniqueness([serial]);
    if (batch.serials.length >= batch.capacity) {
      batch.state = 'full';
      log.info(`Pallet #${batch.palletNumber} is full (${batch.capacity} panels)`);
    }

    const result: AddUnitResult = {
      serial,
      count: batch.serials.length,
      capacity: batch.capacity,
      state: batch.state,
      warnings
    };
    if (record) {
      result.reference = record;
    }
    return result;
  }

  /** Discards the panels of a pallet still being built; their serials can be scanned again. */
  reset(): Batch {
    const batch = this.batch;
    if (!batch || batch.state !== 'building') {
      throw new InvalidTransitionError('reset the pallet', batch?.state ?? 'not started', batch?.palletNumber);
    }

    const released = batch.serials.splice(0, batch.serials.length);
    this.deps.index.release(released);
    this.deps.cache.invalidateUniqueness(released);
    log.info(`Pallet #${batch.palletNumber} reset, ${released.length} panel(s) released`);
    return snapshot(batch);
  }

  /**
   * Exports the pallet and records it in history. On any failure the pallet
   * keeps its state so the export can be retried; an artifact written before
   * a failed history commit is removed.
   */
  async finalize(options: FinalizeOptions): Promise<BatchRecord> {
    const batch = this.batch;
    if (!batch || batch.state === 'exported') {
      throw new InvalidTransitionError('complete the pallet', batch?.state ?? 'not started', batch?.palletNumber);
    }
    if (batch.serials.length === 0) {
      throw new InvalidTransitionError('complete an empty pallet', batch.state, batch.palletNumber);
    }

    const category = options.category.trim();
    const destination = options.destination?.trim() || undefined;
    const completedAt = this.now();
    const exportedFile = await this.deps.exporter.export(snapshot(batch), { category, destination, completedAt });

    const record: BatchRecord = {
      palletNumber: batch.palletNumber,
      serials: [...batch.serials],
      createdAt: batch.createdAt,
      completedAt: completedAt.toISOString(),
      category,
      exportedFile
    };
    if (destination) {
      record.destination = destination;
    }

    try {
      await this.deps.history.commit(record);
    } catch (error) {
      await this.deps.exporter.discard(exportedFile);
      throw error;
    }

    batch.state = 'exported';
    batch.completedAt = record.completedAt;
    batch.category = category;
    batch.destination = destination;
    batch.exportedFile = exportedFile;
    return record;
  }
}
