import crypto from 'node:crypto';
import { z } from 'zod';

import type { AccountWithSecrets, BackupCodeSet } from '../domain/models';
import type { AuthRepository } from '../repositories/auth-repository';
import type { SecretBox } from '../lib/encryption';
import { BACKUP_CODE_COUNT, generateBackupCodes, normalizeBackupCode } from '../lib/backup-codes';
import { hashSecret, verifySecret } from '../lib/hashing';

const EMAIL_CODE_PATTERN = /^[0-9]{6}$/;
const MAX_BACKUP_CONSUME_ATTEMPTS = 3;

const BackupCodeSetSchema = z.object({
  version: z.literal(1),
  generatedAt: z.string(),
  hashes: z.array(z.string()).max(31),
  usedMask: z.number().int().nonnegative(),
});

export type EmailCodeFailure = 'not_found' | 'expired' | 'already_used' | 'mismatch';

export type EmailCodeVerification = { ok: true } | { ok: false; reason: EmailCodeFailure };

export type BackupCodeFailure = 'no_codes' | 'malformed' | 'mismatch' | 'already_used';

export type BackupCodeConsumption =
  | { ok: true; remaining: number }
  | { ok: false; reason: BackupCodeFailure };

export interface IssuedEmailCode {
  code: string;
  expiresAt: Date;
}

export interface GeneratedBackupCodes {
  codes: string[];
  encrypted: string;
}

export interface OneTimeCodeOptions {
  emailCodeTtlMinutes: number;
}

function isUsed(set: BackupCodeSet, index: number) {
  return (set.usedMask & (1 << index)) !== 0;
}

export class OneTimeCodeManager {
  constructor(
    private readonly repository: AuthRepository,
    private readonly secretBox: SecretBox,
    private readonly options: OneTimeCodeOptions,
  ) {}

  async issueEmailCode(accountId: string, now: Date = new Date()): Promise<IssuedEmailCode> {
    const code = crypto.randomInt(0, 1_000_000).toString().padStart(6, '0');
    const expiresAt = new Date(now.getTime() + this.options.emailCodeTtlMinutes * 60_000);

    await this.repository.createEmailCode({
      accountId,
      codeHash: await hashSecret(code),
      expiresAt,
      createdAt: now,
    });

    return { code, expiresAt };
  }

  /** Only the newest code counts; issuing a new one supersedes the rest. */
  async verifyEmailCode(
    accountId: string,
    code: string,
    now: Date = new Date(),
  ): Promise<EmailCodeVerification> {
    const latest = await this.repository.findLatestEmailCode(accountId);

    if (!latest) {
      return { ok: false, reason: 'not_found' };
    }
    if (latest.usedAt) {
      return { ok: false, reason: 'already_used' };
    }
    if (latest.expiresAt.getTime() <= now.getTime()) {
      return { ok: false, reason: 'expired' };
    }

    const trimmed = code.trim();
    if (!EMAIL_CODE_PATTERN.test(trimmed) || !(await verifySecret(latest.codeHash, trimmed))) {
      return { ok: false, reason: 'mismatch' };
    }

    const marked = await this.repository.markEmailCodeUsed(latest.id, now);
    return marked ? { ok: true } : { ok: false, reason: 'already_used' };
  }

  async createBackupCodeSet(now: Date = new Date()): Promise<GeneratedBackupCodes> {
    const codes = generateBackupCodes(BACKUP_CODE_COUNT);
    const set: BackupCodeSet = {
      version: 1,
      generatedAt: now.toISOString(),
      hashes: await Promise.all(codes.map((code) => hashSecret(code))),
      usedMask: 0,
    };

    return { codes, encrypted: this.secretBox.encryptJson(set) };
  }

  /** Replaces any previous set for the account. */
  async generateBackupCodes(accountId: string, now: Date = new Date()) {
    const generated = await this.createBackupCodeSet(now);
    await this.repository.updateMfaSettings(
      accountId,
      { backupCodesEncrypted: generated.encrypted },
      now,
    );
    return generated.codes;
  }

  /**
   * Marks the matching code used by compare-and-set on the encrypted blob. A
   * lost race re-reads the blob, so a concurrent use of the same code reports
   * `already_used` while a different code still succeeds.
   */
  async consumeBackupCode(
    account: Pick<AccountWithSecrets, 'id' | 'backupCodesEncrypted'>,
    code: string,
  ): Promise<BackupCodeConsumption> {
    const normalized = normalizeBackupCode(code);
    if (!normalized) {
      return { ok: false, reason: 'malformed' };
    }

    let blob = account.backupCodesEncrypted;

    for (let attempt = 0; attempt < MAX_BACKUP_CONSUME_ATTEMPTS; attempt += 1) {
      if (!blob) {
        return { ok: false, reason: 'no_codes' };
      }

      const set = this.readBackupCodeSet(blob);
      const index = await this.findBackupCodeIndex(set, normalized);

      if (index === null) {
        return { ok: false, reason: 'mismatch' };
      }
      if (isUsed(set, index)) {
        return { ok: false, reason: 'already_used' };
      }

      const next: BackupCodeSet = { ...set, usedMask: set.usedMask | (1 << index) };
      const swapped = await this.repository.compareAndSetBackupCodes(
        account.id,
        blob,
        this.secretBox.encryptJson(next),
      );

      if (swapped) {
        return { ok: true, remaining: countRemaining(next) };
      }

      const fresh = await this.repository.findAccountById(account.id);
      blob = fresh?.backupCodesEncrypted ?? null;
    }

    return { ok: false, reason: 'already_used' };
  }

  remainingBackupCodes(encrypted: string | null) {
    return encrypted ? countRemaining(this.readBackupCodeSet(encrypted)) : 0;
  }

  private readBackupCodeSet(encrypted: string): BackupCodeSet {
    return BackupCodeSetSchema.parse(this.secretBox.decryptJson(encrypted));
  }

  private async findBackupCodeIndex(set: BackupCodeSet, code: string) {
    for (let index = 0; index < set.hashes.length; index += 1) {
      if (await verifySecret(set.hashes[index], code)) {
        return index;
      }
    }
    return null;
  }
}

function countRemaining(set: BackupCodeSet) {
  return set.hashes.filter((_, index) => !isUsed(set, index)).length;
}
