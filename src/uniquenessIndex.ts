import type { Batch, BatchRecord } from './types.js';

/**
 * Serial → pallet number for every serial on a live or completed pallet.
 * A projection of the history plus the active pallet; never persisted.
 */
export class UniquenessIndex {
  private assignments = new Map<string, number>();

  get size(): number {
    return this.assignments.size;
  }

  isAssigned(serial: string): number | undefined {
    return this.assignments.get(serial);
  }

  assign(serial: string, palletNumber: number): void {
    this.assignments.set(serial, palletNumber);
  }

  release(serials: Iterable<string>): void {
    for (const serial of serials) {
      this.assignments.delete(serial);
    }
  }

  /**
   * Reset records keep their serials out of the index so they can be scanned
   * again. `reserved` holds serials that belong to no readable record.
   */
  rebuild(records: readonly BatchRecord[], active?: Batch, reserved?: ReadonlyMap<string, number>): void {
    const next = new Map<string, number>(reserved);
    for (const record of records) {
      if (record.reset) {
        continue;
      }
      for (const serial of record.serials) {
        next.set(serial, record.palletNumber);
      }
    }
    if (active && active.state !== 'exported') {
      for (const serial of active.serials) {
        next.set(serial, active.palletNumber);
      }
    }
    this.assignments = next;
  }
}
