import crypto from 'node:crypto';

const BASE32_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ234567';
const SECRET_BYTES = 20;

export const TOTP_DEFAULTS = {
  stepSeconds: 30,
  digits: 6,
  window: 1,
  algorithm: 'SHA1',
} as const;

export interface TotpOptions {
  stepSeconds?: number;
  digits?: number;
  window?: number;
  timestamp?: number;
}

export interface TotpMatch {
  step: number;
  offset: number;
}

/** 160-bit random secret, base32 without padding (32 characters). */
export function generateTotpSecret() {
  return base32Encode(crypto.randomBytes(SECRET_BYTES));
}

export function buildProvisioningUri(secret: string, accountLabel: string, issuer: string) {
  const encodedLabel = encodeURIComponent(`${issuer}:${accountLabel}`);
  const params = new URLSearchParams({
    secret,
    issuer,
    algorithm: TOTP_DEFAULTS.algorithm,
    digits: String(TOTP_DEFAULTS.digits),
    period: String(TOTP_DEFAULTS.stepSeconds),
  });
  return `otpauth://totp/${encodedLabel}?${params.toString()}`;
}

export function totpStep(timestamp: number, stepSeconds: number = TOTP_DEFAULTS.stepSeconds) {
  return Math.floor(timestamp / (stepSeconds * 1000));
}

export function generateTotp(secret: string, options: TotpOptions = {}) {
  const digits = options.digits ?? TOTP_DEFAULTS.digits;
  const stepSeconds = options.stepSeconds ?? TOTP_DEFAULTS.stepSeconds;
  const timestamp = options.timestamp ?? Date.now();
  return generateOtp(base32Decode(secret), totpStep(timestamp, stepSeconds), digits);
}

/**
 * Compares `token` with the codes of the current step and `window` steps on
 * either side. Returns the step that matched, or null.
 */
export function matchTotp(secret: string, token: string, options: TotpOptions = {}): TotpMatch | null {
  const digits = options.digits ?? TOTP_DEFAULTS.digits;
  const stepSeconds = options.stepSeconds ?? TOTP_DEFAULTS.stepSeconds;
  const window = options.window ?? TOTP_DEFAULTS.window;
  const timestamp = options.timestamp ?? Date.now();

  if (!new RegExp(`^[0-9]{${digits}}$`).test(token)) {
    return null;
  }

  const secretBuffer = base32Decode(secret);
  const counter = totpStep(timestamp, stepSeconds);
  const submitted = Buffer.from(token);

  let match: TotpMatch | null = null;
  for (let offset = -window; offset <= window; offset += 1) {
    const expected = Buffer.from(generateOtp(secretBuffer, counter + offset, digits));
    if (crypto.timingSafeEqual(expected, submitted) && match === null) {
      match = { step: counter + offset, offset };
    }
  }

  return match;
}

function generateOtp(secret: Buffer, counter: number, digits: number) {
  const buffer = Buffer.alloc(8);
  buffer.writeBigUInt64BE(BigInt(counter));

  const hmac = crypto.createHmac('sha1', secret).update(buffer).digest();
  const offset = hmac[hmac.length - 1] & 0xf;
  const binary =
    ((hmac[offset] & 0x7f) << 24) |
    ((hmac[offset + 1] & 0xff) << 16) |
    ((hmac[offset + 2] & 0xff) << 8) |
    (hmac[offset + 3] & 0xff);

  return (binary % 10 ** digits).toString().padStart(digits, '0');
}

export function base32Encode(buffer: Buffer) {
  let bits = 0;
  let value = 0;
  let output = '';

  for (const byte of buffer) {
    value = (value << 8) | byte;
    bits += 8;

    while (bits >= 5) {
      const index = (value >>> (bits - 5)) & 31;
      output += BASE32_ALPHABET[index];
      bits -= 5;
    }
  }

  if (bits > 0) {
    const index = (value << (5 - bits)) & 31;
    output += BASE32_ALPHABET[index];
  }

  return output;
}

export function base32Decode(input: string) {
  const clean = input.toUpperCase().replace(/[\s=-]/g, '');

  let bits = 0;
  let value = 0;
  const bytes: number[] = [];

  for (const char of clean) {
    const index = BASE32_ALPHABET.indexOf(char);
    if (index === -1) {
      throw new Error('Invalid base32 character');
    }

    value = (value << 5) | index;
    bits += 5;

    if (bits >= 8) {
      bytes.push((value >>> (bits - 8)) & 0xff);
      bits -= 8;
    }
  }

  return Buffer.from(bytes);
}
