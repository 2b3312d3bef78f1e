import { describe, expect, it } from 'vitest';

import {
  base32Decode,
  base32Encode,
  buildProvisioningUri,
  generateTotp,
  generateTotpSecret,
  matchTotp,
  totpStep,
} from '../src/lib/totp';

// Shared secret from the RFC 6238 reference vectors ("12345678901234567890").
const REFERENCE_SECRET = 'GEZDGNBVGY3TQOJQGEZDGNBVGY3TQOJQ';

describe('totp', () => {
  it('encodes and decodes base32 without padding', () => {
    expect(base32Encode(Buffer.from('12345678901234567890'))).toBe(REFERENCE_SECRET);
    expect(base32Decode(REFERENCE_SECRET).toString()).toBe('12345678901234567890');
    expect(base32Decode('gezd gnbv-gy3tqojq').toString()).toBe('1234567890');
  });

  it('rejects characters outside the base32 alphabet', () => {
    expect(() => base32Decode('ABC1')).toThrow('Invalid base32 character');
  });

  it('produces the reference codes', () => {
    expect(generateTotp(REFERENCE_SECRET, { timestamp: 59_000 })).toBe('287082');
    expect(generateTotp(REFERENCE_SECRET, { timestamp: 1_111_111_109_000 })).toBe('081804');
    expect(generateTotp(REFERENCE_SECRET, { timestamp: 59_000, digits: 8 })).toBe('94287082');
  });

  it('matches the current step and one step either side', () => {
    const now = 1_111_111_109_000;
    const current = totpStep(now);

    expect(matchTotp(REFERENCE_SECRET, '081804', { timestamp: now })).toEqual({
      step: current,
      offset: 0,
    });

    const previous = generateTotp(REFERENCE_SECRET, { timestamp: now - 30_000 });
    expect(matchTotp(REFERENCE_SECRET, previous, { timestamp: now })).toEqual({
      step: current - 1,
      offset: -1,
    });

    const next = generateTotp(REFERENCE_SECRET, { timestamp: now + 30_000 });
    expect(matchTotp(REFERENCE_SECRET, next, { timestamp: now })?.offset).toBe(1);
  });

  it('rejects codes outside the window or of the wrong shape', () => {
    const now = 1_111_111_109_000;
    const stale = generateTotp(REFERENCE_SECRET, { timestamp: now - 90_000 });

    expect(matchTotp(REFERENCE_SECRET, stale, { timestamp: now })).toBeNull();
    expect(matchTotp(REFERENCE_SECRET, '08180', { timestamp: now })).toBeNull();
    expect(matchTotp(REFERENCE_SECRET, '08180a', { timestamp: now })).toBeNull();
  });

  it('generates 160-bit secrets', () => {
    const secret = generateTotpSecret();

    expect(secret).toMatch(/^[A-Z2-7]{32}$/);
    expect(base32Decode(secret)).toHaveLength(20);
  });

  it('builds an otpauth provisioning uri', () => {
    expect(buildProvisioningUri('JBSWY3DPEHPK3PXP', 'casey@example.com', 'MFA Gateway')).toBe(
      'otpauth://totp/MFA%20Gateway%3Acasey%40example.com' +
        '?secret=JBSWY3DPEHPK3PXP&issuer=MFA+Gateway&algorithm=SHA1&digits=6&period=30',
    );
  });
});
