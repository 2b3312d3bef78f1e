import crypto from 'node:crypto';

// No 0/O or 1/I/L, so codes survive being copied by hand.
const BACKUP_CODE_ALPHABET = 'ABCDEFGHJKMNPQRSTUVWXYZ23456789';
const BACKUP_CODE_LENGTH = 8;

export const BACKUP_CODE_COUNT = 10;
export const BACKUP_CODE_PATTERN = /^[A-Z2-9]{4}-[A-Z2-9]{4}$/;

export function generateBackupCodes(count = BACKUP_CODE_COUNT) {
  const codes: string[] = [];

  for (let i = 0; i < count; i += 1) {
    let raw = '';
    for (let j = 0; j < BACKUP_CODE_LENGTH; j += 1) {
      raw += BACKUP_CODE_ALPHABET[crypto.randomInt(BACKUP_CODE_ALPHABET.length)];
    }
    codes.push(`${raw.slice(0, 4)}-${raw.slice(4)}`);
  }

  return codes;
}

/** Accepts `abcd efgh`, `ABCDEFGH` or `ABCD-EFGH`; returns the canonical form or null. */
export function normalizeBackupCode(input: string) {
  const compact = input.toUpperCase().replace(/[\s-]/g, '');
  if (compact.length !== BACKUP_CODE_LENGTH) {
    return null;
  }

  const formatted = `${compact.slice(0, 4)}-${compact.slice(4)}`;
  return BACKUP_CODE_PATTERN.test(formatted) ? formatted : null;
}
