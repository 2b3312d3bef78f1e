import type {
  Account,
  AccountStatus,
  AccountWithSecrets,
  AttemptMethod,
  AttemptRecord,
  EmailCodeRecord,
  EmailVerificationTokenRecord,
  SessionRecord,
} from '../domain/models';

export interface CreateAccountInput {
  email: string;
  passwordHash: string | null;
  displayName?: string | null;
  status?: AccountStatus;
  emailVerified?: boolean;
  federatedProvider?: string | null;
  federatedSubject?: string | null;
}

export interface RegisterLoginFailureInput {
  accountId: string;
  now: Date;
  /** Failures before this no longer count towards the threshold. */
  windowStart: Date;
  threshold: number;
  lockUntil: Date;
}

export interface LoginFailureState {
  failedLoginAttempts: number;
  lockedUntil: Date | null;
  /** True only for the update that moved the account into lockout. */
  lockTriggered: boolean;
}

/** Fields left undefined are unchanged. `mfaEnabled` is always recomputed. */
export interface MfaSettingsPatch {
  totpEnabled?: boolean;
  emailMfaEnabled?: boolean;
  totpSecretEncrypted?: string | null;
  backupCodesEncrypted?: string | null;
  totpLastUsedStep?: number | null;
}

export interface CreateSessionInput {
  id: string;
  accountId: string;
  familyId: string;
  tokenHash: string;
  expiresAt: Date;
  ipAddress?: string | null;
  userAgent?: string | null;
  deviceLabel?: string | null;
  createdAt: Date;
}

export interface RecordAttemptInput {
  accountId: string;
  method: AttemptMethod;
  success: boolean;
  ipAddress?: string | null;
  userAgent?: string | null;
  createdAt: Date;
}

export interface AttemptWindowSummary {
  count: number;
  oldest: Date | null;
}

export interface CreateEmailCodeInput {
  accountId: string;
  codeHash: string;
  expiresAt: Date;
  createdAt: Date;
}

export interface AuthRepository {
  createAccount(input: CreateAccountInput): Promise<Account>;
  findAccountByEmail(email: string): Promise<AccountWithSecrets | null>;
  findAccountById(id: string): Promise<AccountWithSecrets | null>;
  findAccountByFederatedSubject(
    provider: string,
    subject: string,
  ): Promise<AccountWithSecrets | null>;
  linkFederatedIdentity(
    accountId: string,
    provider: string,
    subject: string,
    when: Date,
  ): Promise<void>;
  markEmailVerified(accountId: string, when: Date): Promise<void>;
  updatePasswordHash(accountId: string, passwordHash: string, when: Date): Promise<void>;
  updateLastLogin(accountId: string, when: Date): Promise<void>;
  /** Sets the tombstone; false when the account was already deleted. */
  softDeleteAccount(accountId: string, when: Date): Promise<boolean>;

  registerLoginFailure(input: RegisterLoginFailureInput): Promise<LoginFailureState>;
  resetLoginFailures(accountId: string): Promise<void>;

  updateMfaSettings(accountId: string, patch: MfaSettingsPatch, when: Date): Promise<void>;
  /** Succeeds only when `step` is newer than the stored step. */
  advanceTotpStep(accountId: string, step: number): Promise<boolean>;
  /** Succeeds only when the stored blob still equals `expected`. */
  compareAndSetBackupCodes(
    accountId: string,
    expected: string,
    next: string | null,
  ): Promise<boolean>;

  saveEmailVerificationToken(
    accountId: string,
    tokenHash: string,
    expiresAt: Date,
  ): Promise<EmailVerificationTokenRecord>;
  findEmailVerificationToken(tokenHash: string): Promise<EmailVerificationTokenRecord | null>;
  consumeEmailVerificationToken(id: string, when: Date): Promise<boolean>;

  createEmailCode(input: CreateEmailCodeInput): Promise<EmailCodeRecord>;
  findLatestEmailCode(accountId: string): Promise<EmailCodeRecord | null>;
  markEmailCodeUsed(id: string, when: Date): Promise<boolean>;

  recordAttempt(input: RecordAttemptInput): Promise<AttemptRecord>;
  /**
   * Runs `work` while holding an exclusive lock on the account's attempts for
   * `method`, across every process sharing the store.
   */
  withAttemptLock<T>(accountId: string, method: AttemptMethod, work: () => Promise<T>): Promise<T>;
  summarizeFailedAttempts(
    accountId: string,
    method: AttemptMethod,
    since: Date,
  ): Promise<AttemptWindowSummary>;

  createSession(input: CreateSessionInput): Promise<SessionRecord>;
  findSessionById(id: string): Promise<SessionRecord | null>;
  findSessionByTokenHash(tokenHash: string): Promise<SessionRecord | null>;
  /**
   * Deactivates `previousId` and inserts `next` in one unit of work. Returns
   * null, leaving both untouched, when `previousId` was no longer active.
   */
  rotateSession(
    previousId: string,
    next: CreateSessionInput,
    when: Date,
  ): Promise<SessionRecord | null>;
  touchSession(id: string, when: Date): Promise<void>;
  deactivateSession(id: string, when: Date): Promise<void>;
  deactivateSessionFamily(familyId: string, when: Date): Promise<number>;
  deactivateSessionsForAccount(accountId: string, when: Date): Promise<number>;
  markSessionMfaVerified(id: string, verifiedAt: Date, expiresAt: Date): Promise<void>;

  /**
   * Records a challenge token id; false when it had already been recorded.
   * Records whose challenge expired before `when` are pruned.
   */
  consumeChallenge(jti: string, accountId: string, expiresAt: Date, when: Date): Promise<boolean>;
  /** Forgets a recorded challenge id so the challenge can be tried again. */
  releaseChallenge(jti: string): Promise<void>;

  ping(): Promise<void>;
}
