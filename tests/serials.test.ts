import { describe, expect, it } from 'vitest';
import { MAX_SERIAL_LENGTH, normalizeSerial, validateSerial } from '../src/serials.js';

describe('normalizeSerial', () => {
  it('trims and uppercases', () => {
    expect(normalizeSerial('  abc123 ')).toBe('ABC123');
  });

  it('drops a trailing cell reference', () => {
    expect(normalizeSerial('sn-77(c33)')).toBe('SN-77');
    expect(normalizeSerial('SN-77 (AB3)')).toBe('SN-77 (AB3)');
  });

  it('drops the .0 a spreadsheet adds to numeric serials', () => {
    expect(normalizeSerial('12345.0')).toBe('12345');
    expect(normalizeSerial(12345)).toBe('12345');
    expect(normalizeSerial('12.5')).toBe('12.5');
  });

  it('returns an empty string for missing values', () => {
    expect(normalizeSerial(null)).toBe('');
    expect(normalizeSerial(undefined)).toBe('');
    expect(normalizeSerial('   ')).toBe('');
  });
});

describe('validateSerial', () => {
  it('accepts a scanner line ending', () => {
    expect(validateSerial(' abc\n')).toEqual({ ok: true, serial: 'ABC' });
  });

  it('rejects empty input', () => {
    expect(validateSerial('')).toEqual({ ok: false, reason: 'serial is empty' });
    expect(validateSerial('   ')).toEqual({ ok: false, reason: 'serial is empty' });
  });

  it('enforces the length limit', () => {
    expect(validateSerial('A'.repeat(MAX_SERIAL_LENGTH))).toEqual({ ok: true, serial: 'A'.repeat(100) });
    expect(validateSerial('A'.repeat(MAX_SERIAL_LENGTH + 1))).toEqual({
      ok: false,
      reason: 'longer than 100 characters'
    });
  });

  it('rejects control characters inside the serial', () => {
    expect(validateSerial('AB\u0007C')).toEqual({ ok: false, reason: 'contains control characters' });
  });
});
