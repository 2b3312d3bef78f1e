import type { AccountWithSecrets } from '../domain/models';
import type { AuthRepository } from '../repositories/auth-repository';
import { burnVerification, verifySecret } from '../lib/hashing';

export type CredentialFailureReason = 'not_found' | 'no_password' | 'mismatch' | 'inactive';

export type CredentialCheck =
  | { ok: true; account: AccountWithSecrets }
  | { ok: false; reason: CredentialFailureReason; account: AccountWithSecrets | null };

export function normalizeEmail(email: string) {
  return email.trim().toLowerCase();
}

/**
 * Checks a password against the stored argon2id hash. Counters are left to the
 * attempt ledger.
 */
export class CredentialVerifier {
  constructor(private readonly repository: AuthRepository) {}

  findAccount(email: string) {
    return this.repository.findAccountByEmail(normalizeEmail(email));
  }

  async check(account: AccountWithSecrets | null, password: string): Promise<CredentialCheck> {
    if (!account) {
      await burnVerification(password);
      return { ok: false, reason: 'not_found', account: null };
    }

    if (!account.passwordHash) {
      await burnVerification(password);
      return { ok: false, reason: 'no_password', account };
    }

    const valid = await verifySecret(account.passwordHash, password);

    if (!valid) {
      return { ok: false, reason: 'mismatch', account };
    }

    if (account.status !== 'active') {
      return { ok: false, reason: 'inactive', account };
    }

    return { ok: true, account };
  }
}
