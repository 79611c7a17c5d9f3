export const MAX_SERIAL_LENGTH = 100;

const CELL_REFERENCE_SUFFIX = /\([a-z]\d+\)$/i;
const NUMERIC_FLOAT = /^\d+\.0$/;
const CONTROL_CHARS = /[\u0000-\u001f\u007f-\u009f]/;

/**
 * Canonical form of a serial: trimmed, uppercased, without a trailing cell
 * reference such as `(C33)` and without the `.0` a spreadsheet adds to
 * numeric serials.
 */
export function normalizeSerial(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }

  let serial = String(value).trim();
  if (!serial) {
    return '';
  }

  serial = serial.replace(CELL_REFERENCE_SUFFIX, '');
  if (NUMERIC_FLOAT.test(serial)) {
    serial = serial.slice(0, -2);
  }

  return serial.trim().toUpperCase();
}

export type SerialCheck =
  | { ok: true; serial: string }
  | { ok: false; reason: string };

export function validateSerial(raw: string): SerialCheck {
  if (CONTROL_CHARS.test(raw.trim())) {
    return { ok: false, reason: 'contains control characters' };
  }

  const serial = normalizeSerial(raw);
  if (!serial) {
    return { ok: false, reason: 'serial is empty' };
  }
  if (serial.length > MAX_SERIAL_LENGTH) {
    return { ok: false, reason: `longer than ${MAX_SERIAL_LENGTH} characters` };
  }

  return { ok: true, serial };
}
