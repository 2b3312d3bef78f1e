export type AccountStatus = 'active' | 'suspended' | 'pending_verification' | 'inactive';
export type MfaMethod = 'totp' | 'email' | 'backup';
export type AttemptMethod = 'password' | MfaMethod;
export type ChallengeMethod = Exclude<MfaMethod, 'backup'>;

export interface Account {
  id: string;
  email: string;
  displayName: string | null;
  status: AccountStatus;
  emailVerified: boolean;
  mfaEnabled: boolean;
  totpEnabled: boolean;
  emailMfaEnabled: boolean;
  failedLoginAttempts: number;
  lastFailedLoginAt: Date | null;
  lockedUntil: Date | null;
  federatedProvider: string | null;
  federatedSubject: string | null;
  lastLoginAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface AccountWithSecrets extends Account {
  passwordHash: string | null;
  totpSecretEncrypted: string | null;
  totpLastUsedStep: number | null;
  backupCodesEncrypted: string | null;
}

export interface DeviceInfo {
  ipAddress?: string | null;
  userAgent?: string | null;
  label?: string | null;
}

export interface SessionRecord {
  id: string;
  accountId: string;
  familyId: string;
  tokenHash: string;
  ipAddress: string | null;
  userAgent: string | null;
  deviceLabel: string | null;
  active: boolean;
  expiresAt: Date;
  lastUsedAt: Date | null;
  replacedBySessionId: string | null;
  mfaVerifiedAt: Date | null;
  mfaSessionExpiresAt: Date | null;
  createdAt: Date;
}

export interface EmailCodeRecord {
  id: string;
  accountId: string;
  codeHash: string;
  expiresAt: Date;
  usedAt: Date | null;
  createdAt: Date;
}

export interface AttemptRecord {
  id: string;
  accountId: string;
  method: AttemptMethod;
  success: boolean;
  ipAddress: string | null;
  userAgent: string | null;
  createdAt: Date;
}

export interface EmailVerificationTokenRecord {
  id: string;
  accountId: string;
  tokenHash: string;
  expiresAt: Date;
  consumedAt: Date | null;
  createdAt: Date;
}

/**
 * Decrypted form of `backup_codes_encrypted`. Bit `i` of `usedMask` is set once
 * `hashes[i]` has been consumed.
 */
export interface BackupCodeSet {
  version: 1;
  generatedAt: string;
  hashes: string[];
  usedMask: number;
}

export interface RequestOrigin {
  ipAddress?: string | null;
  userAgent?: string | null;
}

export function toPublicAccount(account: AccountWithSecrets): Account {
  const { passwordHash, totpSecretEncrypted, totpLastUsedStep, backupCodesEncrypted, ...rest } =
    account;
  return rest;
}
