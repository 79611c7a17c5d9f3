export type BatchState = 'building' | 'full' | 'exported';

export type UnknownUnitPolicy = 'reject' | 'warn';

export type ReferenceAttributes = Record<string, string | number>;

export interface ReferenceRecord {
  serial: string;
  attributes: ReferenceAttributes;
  row: number;
}

export interface Batch {
  palletNumber: number;
  serials: string[];
  state: BatchState;
  capacity: number;
  createdAt: string;
  completedAt?: string;
  category?: string;
  destination?: string;
  exportedFile?: string;
}

export interface ResetMarker {
  at: string;
  reason: string;
}

export interface BatchRecord {
  palletNumber: number;
  serials: string[];
  createdAt: string;
  completedAt: string;
  category: string;
  destination?: string;
  exportedFile: string | null;
  reset?: ResetMarker;
}

export interface BatchStatus {
  palletNumber: number;
  count: number;
  capacity: number;
  remaining: number;
  state: BatchState;
}

export type AddUnitWarning = 'unknown-unit';

export interface AddUnitResult {
  serial: string;
  count: number;
  capacity: number;
  state: BatchState;
  reference?: ReferenceRecord;
  warnings: AddUnitWarning[];
}

export interface FinalizeOptions {
  category: string;
  destination?: string;
}

export interface ExportOptions extends FinalizeOptions {
  completedAt: Date;
}

export interface ReferenceLookup {
  lookup(serial: string): ReferenceRecord | undefined;
}

export interface BatchArtifactExporter {
  export(batch: Batch, options: ExportOptions): Promise<string>;
  discard(artifactPath: string): Promise<void>;
}

export interface BatchRecordSink {
  commit(record: BatchRecord): Promise<void>;
}

export interface Customer {
  name: string;
  business: string;
  address: string;
  city: string;
  state: string;
  zipCode: string;
}

export type HistoryPeriod = 'today' | 'week' | 'month' | 'year' | 'all';

export type HistorySortKey = 'palletNumber' | 'completedAt' | 'fileName';

export type SortDirection = 'asc' | 'desc';

export interface HistoryFilters {
  period?: HistoryPeriod;
  destination?: string;
  search?: string;
  includeHidden?: boolean;
  includeReset?: boolean;
}

export interface HistorySort {
  key: HistorySortKey;
  direction?: SortDirection;
}

export interface CustomerLookup {
  get(tag: string): Customer | undefined;
}
