import argon2 from 'argon2';
import crypto from 'node:crypto';

const ARGON2_OPTIONS: argon2.Options = {
  type: argon2.argon2id,
  memoryCost: 19456,
  timeCost: 2,
  parallelism: 1,
};

// Verified against when no account matches, so unknown emails cost the same as wrong passwords.
let dummyHash: Promise<string> | null = null;

export function hashSecret(value: string) {
  return argon2.hash(value, ARGON2_OPTIONS);
}

export async function verifySecret(hash: string, value: string) {
  try {
    return await argon2.verify(hash, value);
  } catch {
    return false;
  }
}

export async function burnVerification(value: string) {
  dummyHash ??= hashSecret(crypto.randomBytes(16).toString('hex'));
  await verifySecret(await dummyHash, value);
  return false;
}

/** Lookup hash for high-entropy tokens (refresh tokens, verification links). */
export function sha256(value: string) {
  return crypto.createHash('sha256').update(value).digest('hex');
}

export function randomToken(bytes = 32) {
  return crypto.randomBytes(bytes).toString('base64url');
}
