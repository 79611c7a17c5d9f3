import { describe, expect, it } from 'vitest';
import {
  DestinationUnwritableError,
  DuplicateUnitError,
  InventoryError,
  SourceCorruptError,
  SourceLockedError,
  SourceUnavailableError,
  errnoCode,
  isInventoryError,
  toDestinationError,
  toSourceError
} from '../src/errors.js';

function errnoError(code: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(`${code}: simulated`);
  error.code = code;
  return error;
}

describe('errors', () => {
  it('carries a code and details through toJSON', () => {
    const error = new DuplicateUnitError('ABC123', 1, 'history');

    expect(error).toBeInstanceOf(InventoryError);
    expect(isInventoryError(error)).toBe(true);
    expect(error.message).toBe('Serial ABC123 was already used on pallet #1');
    expect(error.toJSON()).toEqual({
      name: 'DuplicateUnitError',
      code: 'DUPLICATE_UNIT',
      message: 'Serial ABC123 was already used on pallet #1',
      details: { serial: 'ABC123', palletNumber: 1, scope: 'history' }
    });
  });

  it('reads errno codes only from error-like values', () => {
    expect(errnoCode(errnoError('ENOENT'))).toBe('ENOENT');
    expect(errnoCode({ code: 42 })).toBeUndefined();
    expect(errnoCode('ENOENT')).toBeUndefined();
  });

  it('maps read failures onto source errors', () => {
    expect(toSourceError(errnoError('ENOENT'), '/in/a.xlsx')).toBeInstanceOf(SourceUnavailableError);
    expect(toSourceError(errnoError('EBUSY'), '/in/a.xlsx')).toBeInstanceOf(SourceLockedError);
    expect(toSourceError(errnoError('EACCES'), '/in/a.xlsx')).toBeInstanceOf(SourceLockedError);
    const corrupt = toSourceError(new Error('invalid signature'), '/in/a.xlsx');
    expect(corrupt).toBeInstanceOf(SourceCorruptError);
    expect(corrupt.message).toBe('Could not parse /in/a.xlsx: invalid signature');
  });

  it('maps write failures onto destination errors', () => {
    expect(toDestinationError(errnoError('EBUSY'), '/out/a.xlsx')).toBeInstanceOf(SourceLockedError);
    for (const code of ['EACCES', 'EPERM', 'EROFS', 'ENOSPC', 'ENOTDIR', 'EEXIST']) {
      expect(toDestinationError(errnoError(code), '/out/a.xlsx')).toBeInstanceOf(DestinationUnwritableError);
    }
  });

  it('passes existing inventory errors through', () => {
    const original = new SourceLockedError('/in/a.xlsx');
    expect(toSourceError(original, '/other')).toBe(original);
    expect(toDestinationError(original, '/other')).toBe(original);
  });
});
