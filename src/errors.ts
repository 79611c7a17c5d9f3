/**
 * Error kinds raised by the pallet engine.
 *
 * Every kind is recoverable by the operator: none of them should terminate the
 * process. `PERSISTENCE_FAILURE` is the loud one, since it means a completed
 * pallet may not be durable.
 */
export const ErrorCode = {
  INVALID_FORMAT: 'INVALID_FORMAT',
  BATCH_NOT_ACCEPTING_UNITS: 'BATCH_NOT_ACCEPTING_UNITS',
  BATCH_FULL: 'BATCH_FULL',
  DUPLICATE_UNIT: 'DUPLICATE_UNIT',
  UNKNOWN_UNIT: 'UNKNOWN_UNIT',
  SOURCE_UNAVAILABLE: 'SOURCE_UNAVAILABLE',
  SOURCE_CORRUPT: 'SOURCE_CORRUPT',
  SOURCE_LOCKED: 'SOURCE_LOCKED',
  DESTINATION_UNWRITABLE: 'DESTINATION_UNWRITABLE',
  PERSISTENCE_FAILURE: 'PERSISTENCE_FAILURE',
  INVALID_TRANSITION: 'INVALID_TRANSITION',
  RECORD_NOT_FOUND: 'RECORD_NOT_FOUND',
  NOT_READY: 'NOT_READY',
  INVALID_CONFIG: 'INVALID_CONFIG'
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export class InventoryError extends Error {
  readonly code: ErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InventoryError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details
    };
  }
}

export class InvalidFormatError extends InventoryError {
  constructor(readonly input: string, readonly reason: string) {
    super(ErrorCode.INVALID_FORMAT, `Invalid serial "${input}": ${reason}`, { input, reason });
    this.name = 'InvalidFormatError';
  }
}

export class BatchNotAcceptingUnitsError extends InventoryError {
  constructor(readonly palletNumber: number | undefined, readonly state: string) {
    super(
      ErrorCode.BATCH_NOT_ACCEPTING_UNITS,
      palletNumber === undefined
        ? 'No pallet is being built. Start a new pallet first.'
        : `Pallet #${palletNumber} is ${state} and does not accept panels`,
      { palletNumber, state }
    );
    this.name = 'BatchNotAcceptingUnitsError';
  }
}

export class BatchFullError extends InventoryError {
  constructor(readonly palletNumber: number, readonly capacity: number) {
    super(ErrorCode.BATCH_FULL, `Pallet #${palletNumber} is full (${capacity} panels)`, { palletNumber, capacity });
    this.name = 'BatchFullError';
  }
}

/** `scope` tells the operator whether the serial sits on the pallet being built or on a completed one. */
export type DuplicateScope = 'current' | 'history';

export class DuplicateUnitError extends InventoryError {
  constructor(readonly serial: string, readonly palletNumber: number, readonly scope: DuplicateScope) {
    super(
      ErrorCode.DUPLICATE_UNIT,
      scope === 'current'
        ? `Serial ${serial} is already on this pallet (#${palletNumber})`
        : `Serial ${serial} was already used on pallet #${palletNumber}`,
      { serial, palletNumber, scope }
    );
    this.name = 'DuplicateUnitError';
  }
}

export class UnknownUnitError extends InventoryError {
  constructor(readonly serial: string) {
    super(ErrorCode.UNKNOWN_UNIT, `Serial ${serial} was not found in the reference dataset`, { serial });
    this.name = 'UnknownUnitError';
  }
}

export class SourceUnavailableError extends InventoryError {
  constructor(message: string, readonly path?: string, options?: { cause?: unknown }) {
    super(ErrorCode.SOURCE_UNAVAILABLE, message, { path }, options);
    this.name = 'SourceUnavailableError';
  }
}

export class SourceCorruptError extends InventoryError {
  constructor(message: string, readonly path: string, readonly skippedRows = 0, options?: { cause?: unknown }) {
    super(ErrorCode.SOURCE_CORRUPT, message, { path, skippedRows }, options);
    this.name = 'SourceCorruptError';
  }
}

export class SourceLockedError extends InventoryError {
  constructor(readonly path: string, options?: { cause?: unknown }) {
    super(ErrorCode.SOURCE_LOCKED, `File is locked or open in another program: ${path}`, { path }, options);
    this.name = 'SourceLockedError';
  }
}

export class DestinationUnwritableError extends InventoryError {
  constructor(readonly path: string, reason: string, options?: { cause?: unknown }) {
    super(ErrorCode.DESTINATION_UNWRITABLE, `Cannot write ${path}: ${reason}`, { path, reason }, options);
    this.name = 'DestinationUnwritableError';
  }
}

export class PersistenceFailureError extends InventoryError {
  constructor(readonly path: string, readonly palletNumber?: number, options?: { cause?: unknown }) {
    super(
      ErrorCode.PERSISTENCE_FAILURE,
      `Pallet history could not be saved to ${path}` +
        (palletNumber === undefined ? '' : ` (pallet #${palletNumber})`),
      { path, palletNumber },
      options
    );
    this.name = 'PersistenceFailureError';
  }
}

export class InvalidTransitionError extends InventoryError {
  constructor(readonly operation: string, readonly state: string, palletNumber?: number) {
    super(
      ErrorCode.INVALID_TRANSITION,
      `Cannot ${operation} while the pallet is ${state}`,
      { operation, state, palletNumber }
    );
    this.name = 'InvalidTransitionError';
  }
}

export class RecordNotFoundError extends InventoryError {
  constructor(readonly palletNumber: number) {
    super(ErrorCode.RECORD_NOT_FOUND, `Pallet #${palletNumber} was not found in history`, { palletNumber });
    this.name = 'RecordNotFoundError';
  }
}

export class NotReadyError extends InventoryError {
  constructor() {
    super(ErrorCode.NOT_READY, 'Pallet tracker is not loaded yet. Call load() first.');
    this.name = 'NotReadyError';
  }
}

export class InvalidConfigError extends InventoryError {
  constructor(readonly key: string, readonly value: string, expected: string) {
    super(ErrorCode.INVALID_CONFIG, `Invalid ${key}="${value}": expected ${expected}`, { key, value });
    this.name = 'InvalidConfigError';
  }
}

export function isInventoryError(error: unknown): error is InventoryError {
  return error instanceof InventoryError;
}

export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

const LOCKED_CODES = new Set(['EBUSY', 'ETXTBSY']);
const DENIED_CODES = new Set(['EACCES', 'EPERM']);

/** Maps a failed read of an input file (reference, customers) onto an error kind. */
export function toSourceError(error: unknown, filePath: string): InventoryError {
  if (error instanceof InventoryError) {
    return error;
  }
  const code = errnoCode(error);
  if (code === 'ENOENT') {
    return new SourceUnavailableError(`File not found: ${filePath}`, filePath, { cause: error });
  }
  if (code && (LOCKED_CODES.has(code) || DENIED_CODES.has(code))) {
    return new SourceLockedError(filePath, { cause: error });
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new SourceCorruptError(`Could not parse ${filePath}: ${reason}`, filePath, 0, { cause: error });
}

/** Maps a failed write of an artifact onto an error kind. Anything but a busy file is unwritable. */
export function toDestinationError(error: unknown, filePath: string): InventoryError {
  if (error instanceof InventoryError) {
    return error;
  }
  const code = errnoCode(error);
  if (code && LOCKED_CODES.has(code)) {
    return new SourceLockedError(filePath, { cause: error });
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new DestinationUnwritableError(filePath, reason, { cause: error });
}
