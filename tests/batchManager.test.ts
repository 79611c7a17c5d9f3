import { describe, expect, it, vi } from 'vitest';
import { BatchManager, DEFAULT_CAPACITY } from '../src/batchManager.js';
import {
  BatchFullError,
  BatchNotAcceptingUnitsError,
  DestinationUnwritableError,
  DuplicateUnitError,
  InvalidFormatError,
  InvalidTransitionError,
  PersistenceFailureError,
  UnknownUnitError
} from '../src/errors.js';
import { UniquenessIndex } from '../src/uniquenessIndex.js';
import { ValidationCache } from '../src/validationCache.js';
import type {
  BatchArtifactExporter,
  BatchRecord,
  BatchRecordSink,
  ReferenceLookup,
  UnknownUnitPolicy
} from '../src/types.js';

const now = new Date(2026, 0, 6, 14, 30, 5);

function serials(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `SN${String(i + 1).padStart(3, '0')}`);
}

function setup(options: { capacity?: number; policy?: UnknownUnitPolicy; known?: string[] } = {}) {
  const known = new Set(options.known ?? serials(30).concat(['ABC123', 'OLD1']));
  const reference: ReferenceLookup = {
    lookup: serial => (known.has(serial) ? { serial, attributes: {}, row: 2 } : undefined)
  };

  const exportFn = vi.fn<BatchArtifactExporter['export']>(async batch => `/exports/PALLET_${batch.palletNumber}.xlsx`);
  const discardFn = vi.fn<BatchArtifactExporter['discard']>(async () => undefined);
  const commit = vi.fn<BatchRecordSink['commit']>(async () => undefined);
  const index = new UniquenessIndex();

  const manager = new BatchManager({
    index,
    cache: new ValidationCache({ now: () => now.getTime() }),
    reference,
    exporter: { export: exportFn, discard: discardFn },
    history: { commit },
    capacity: options.capacity,
    unknownUnitPolicy: options.policy,
    now: () => now
  });

  return { manager, index, exporter: { export: exportFn, discard: discardFn }, commit };
}

describe('BatchManager', () => {
  it('rejects units until a pallet is started', () => {
    const { manager } = setup();
    expect(manager.status()).toBeUndefined();
    expect(() => manager.addUnit('SN001')).toThrow(BatchNotAcceptingUnitsError);
  });

  it('starts a pallet with the default capacity', () => {
    const { manager } = setup();
    const batch = manager.startNext(1);

    expect(batch).toEqual({
      palletNumber: 1,
      serials: [],
      state: 'building',
      capacity: DEFAULT_CAPACITY,
      createdAt: now.toISOString()
    });
    expect(manager.status()).toEqual({ palletNumber: 1, count: 0, capacity: 25, remaining: 25, state: 'building' });
  });

  it('accepts 25 units, turns full on the 25th and refuses the 26th', () => {
    const { manager } = setup({ capacity: 25 });
    manager.startNext(1);
    const units = serials(26);

    for (const serial of units.slice(0, 24)) {
      manager.addUnit(serial);
    }
    expect(manager.status()).toMatchObject({ count: 24, remaining: 1, state: 'building' });

    const result = manager.addUnit(units[24]);
    expect(result).toEqual({
      serial: 'SN025',
      count: 25,
      capacity: 25,
      state: 'full',
      reference: { serial: 'SN025', attributes: {}, row: 2 },
      warnings: []
    });

    expect(() => manager.addUnit(units[25])).toThrow(BatchFullError);
    expect(manager.current?.serials).toHaveLength(25);
    expect(new Set(manager.current?.serials).size).toBe(25);
  });

  it('rejects a serial already on the pallet, whatever its case', () => {
    const { manager } = setup();
    manager.startNext(1);
    manager.addUnit('ABC123');

    expect(() => manager.addUnit(' abc123 ')).toThrow(DuplicateUnitError);
    expect(() => manager.addUnit('abc123')).toThrow(
      expect.objectContaining({ serial: 'ABC123', palletNumber: 1, scope: 'current' })
    );
    expect(manager.status()?.count).toBe(1);
  });

  it('rejects a serial held by a completed pallet', () => {
    const { manager, index } = setup();
    index.assign('OLD1', 7);
    manager.startNext(8);

    expect(() => manager.addUnit('old1')).toThrow(
      expect.objectContaining({ code: 'DUPLICATE_UNIT', palletNumber: 7, scope: 'history' })
    );
  });

  it('rejects malformed input without touching the pallet', () => {
    const { manager } = setup();
    manager.startNext(1);

    expect(() => manager.addUnit('   ')).toThrow(InvalidFormatError);
    expect(() => manager.addUnit('X'.repeat(101))).toThrow(InvalidFormatError);
    expect(manager.status()?.count).toBe(0);
  });

  it('rejects serials missing from the reference dataset by default', () => {
    const { manager, index } = setup();
    manager.startNext(1);

    expect(() => manager.addUnit('NOPE1')).toThrow(UnknownUnitError);
    expect(manager.status()?.count).toBe(0);
    expect(index.isAssigned('NOPE1')).toBeUndefined();
  });

  it('accepts unknown serials with a warning under the warn policy', () => {
    const { manager } = setup({ policy: 'warn' });
    manager.startNext(1);

    const result = manager.addUnit('NOPE1');
    expect(result.warnings).toEqual(['unknown-unit']);
    expect(result.reference).toBeUndefined();
    expect(result.count).toBe(1);
  });

  it('reset releases the serials so they can be scanned again', () => {
    const { manager, index } = setup();
    manager.startNext(1);
    manager.addUnit('SN001');
    manager.addUnit('SN002');

    const batch = manager.reset();

    expect(batch.serials).toEqual([]);
    expect(batch.state).toBe('building');
    expect(index.size).toBe(0);
    expect(manager.addUnit('SN001').count).toBe(1);
  });

  it('cannot reset a full pallet', () => {
    const { manager } = setup({ capacity: 1 });
    manager.startNext(1);
    manager.addUnit('SN001');

    expect(() => manager.reset()).toThrow(InvalidTransitionError);
    expect(manager.status()?.count).toBe(1);
  });

  it('cannot start a new pallet while one is being built', () => {
    const { manager } = setup();
    manager.startNext(1);
    expect(() => manager.startNext(2)).toThrow(InvalidTransitionError);
  });

  describe('finalize', () => {
    it('exports, commits and closes the pallet', async () => {
      const { manager, exporter, commit } = setup({ capacity: 2 });
      manager.startNext(1);
      manager.addUnit('SN001');
      manager.addUnit('SN002');

      const record = await manager.finalize({ category: ' 330WT ', destination: 'Jane Doe | Acme Solar' });

      const expected: BatchRecord = {
        palletNumber: 1,
        serials: ['SN001', 'SN002'],
        createdAt: now.toISOString(),
        completedAt: now.toISOString(),
        category: '330WT',
        destination: 'Jane Doe | Acme Solar',
        exportedFile: '/exports/PALLET_1.xlsx'
      };
      expect(record).toEqual(expected);
      expect(exporter.export).toHaveBeenCalledWith(expect.objectContaining({ palletNumber: 1, state: 'full' }), {
        category: '330WT',
        destination: 'Jane Doe | Acme Solar',
        completedAt: now
      });
      expect(commit).toHaveBeenCalledWith(expected);
      expect(manager.current).toMatchObject({
        state: 'exported',
        completedAt: now.toISOString(),
        category: '330WT',
        exportedFile: '/exports/PALLET_1.xlsx'
      });
      expect(() => manager.addUnit('SN003')).toThrow(BatchNotAcceptingUnitsError);
    });

    it('finalizes a partial pallet and keeps its serials reserved for the next one', async () => {
      const { manager } = setup();
      manager.startNext(1);
      manager.addUnit('SN001');

      const record = await manager.finalize({ category: '330WT', destination: '  ' });
      expect(record.destination).toBeUndefined();

      manager.startNext(2);
      expect(() => manager.addUnit('SN001')).toThrow(
        expect.objectContaining({ palletNumber: 1, scope: 'history' })
      );
    });

    it('keeps the pallet when the export fails', async () => {
      const { manager, exporter, commit } = setup({ capacity: 1 });
      manager.startNext(1);
      manager.addUnit('SN001');
      exporter.export.mockRejectedValueOnce(new DestinationUnwritableError('/exports', 'read-only file system'));

      await expect(manager.finalize({ category: '330WT' })).rejects.toBeInstanceOf(DestinationUnwritableError);
      expect(commit).not.toHaveBeenCalled();
      expect(manager.status()?.state).toBe('full');
    });

    it('discards the artifact and keeps the pallet when the history commit fails', async () => {
      const { manager, exporter, commit } = setup({ capacity: 1 });
      manager.startNext(1);
      manager.addUnit('SN001');
      commit.mockRejectedValueOnce(new PersistenceFailureError('/exports/pallet_history.json', 1));

      await expect(manager.finalize({ category: '330WT' })).rejects.toBeInstanceOf(PersistenceFailureError);
      expect(exporter.discard).toHaveBeenCalledWith('/exports/PALLET_1.xlsx');
      expect(manager.status()?.state).toBe('full');

      const record = await manager.finalize({ category: '330WT' });
      expect(record.palletNumber).toBe(1);
      expect(manager.status()?.state).toBe('exported');
    });

    it('refuses an empty pallet', async () => {
      const { manager, exporter } = setup();
      manager.startNext(1);

      await expect(manager.finalize({ category: '330WT' })).rejects.toBeInstanceOf(InvalidTransitionError);
      expect(exporter.export).not.toHaveBeenCalled();
    });
  });
});
