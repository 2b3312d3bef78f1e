import { randomUUID } from 'node:crypto';
import type { Pool, PoolClient, QueryResultRow } from 'pg';
import { DatabaseError } from 'pg';

import type {
  AuthRepository,
  AttemptWindowSummary,
  CreateAccountInput,
  CreateEmailCodeInput,
  CreateSessionInput,
  LoginFailureState,
  MfaSettingsPatch,
  RecordAttemptInput,
  RegisterLoginFailureInput,
} from './auth-repository';
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
import { toPublicAccount } from '../domain/models';
import { conflict, serviceUnavailable } from '../errors';

interface AccountRow {
  id: string;
  email: string;
  display_name: string | null;
  status: AccountStatus;
  email_verified: boolean;
  mfa_enabled: boolean;
  totp_enabled: boolean;
  email_mfa_enabled: boolean;
  failed_login_attempts: number;
  last_failed_login_at: Date | null;
  locked_until: Date | null;
  federated_provider: string | null;
  federated_subject: string | null;
  last_login_at: Date | null;
  created_at: Date;
  updated_at: Date;
  password_hash: string | null;
  totp_secret_encrypted: string | null;
  totp_last_used_step: string | null;
  backup_codes_encrypted: string | null;
}

interface SessionRow {
  id: string;
  account_id: string;
  family_id: string;
  token_hash: string;
  ip_address: string | null;
  user_agent: string | null;
  device_label: string | null;
  active: boolean;
  expires_at: Date;
  last_used_at: Date | null;
  replaced_by_session_id: string | null;
  mfa_verified_at: Date | null;
  mfa_session_expires_at: Date | null;
  created_at: Date;
}

interface EmailCodeRow {
  id: string;
  account_id: string;
  code_hash: string;
  expires_at: Date;
  used_at: Date | null;
  created_at: Date;
}

interface AttemptRow {
  id: string;
  account_id: string;
  method: AttemptMethod;
  success: boolean;
  ip_address: string | null;
  user_agent: string | null;
  created_at: Date;
}

interface EmailVerificationTokenRow {
  id: string;
  account_id: string;
  token_hash: string;
  expires_at: Date;
  consumed_at: Date | null;
  created_at: Date;
}

const ACCOUNT_COLUMNS = `
  id, email, display_name, status, email_verified, mfa_enabled, totp_enabled,
  email_mfa_enabled, failed_login_attempts, last_failed_login_at, locked_until,
  federated_provider, federated_subject, last_login_at, created_at, updated_at,
  password_hash, totp_secret_encrypted, totp_last_used_step, backup_codes_encrypted`;

const UNIQUE_VIOLATION = '23505';

function mapAccount(row: AccountRow): AccountWithSecrets {
  return {
    id: row.id,
    email: row.email,
    displayName: row.display_name,
    status: row.status,
    emailVerified: row.email_verified,
    mfaEnabled: row.mfa_enabled,
    totpEnabled: row.totp_enabled,
    emailMfaEnabled: row.email_mfa_enabled,
    failedLoginAttempts: row.failed_login_attempts,
    lastFailedLoginAt: row.last_failed_login_at,
    lockedUntil: row.locked_until,
    federatedProvider: row.federated_provider,
    federatedSubject: row.federated_subject,
    lastLoginAt: row.last_login_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    passwordHash: row.password_hash,
    totpSecretEncrypted: row.totp_secret_encrypted,
    totpLastUsedStep: row.totp_last_used_step === null ? null : Number(row.totp_last_used_step),
    backupCodesEncrypted: row.backup_codes_encrypted,
  };
}

function mapSession(row: SessionRow): SessionRecord {
  return {
    id: row.id,
    accountId: row.account_id,
    familyId: row.family_id,
    tokenHash: row.token_hash,
    ipAddress: row.ip_address,
    userAgent: row.user_agent,
    deviceLabel: row.device_label,
    active: row.active,
    expiresAt: row.expires_at,
    lastUsedAt: row.last_used_at,
    replacedBySessionId: row.replaced_by_session_id,
    mfaVerifiedAt: row.mfa_verified_at,
    mfaSessionExpiresAt: row.mfa_session_expires_at,
    createdAt: row.created_at,
  };
}

function mapEmailCode(row: EmailCodeRow): EmailCodeRecord {
  return {
    id: row.id,
    accountId: row.account_id,
    codeHash: row.code_hash,
    expiresAt: row.expires_at,
    usedAt: row.used_at,
    createdAt: row.created_at,
  };
}

function mapAttempt(row: AttemptRow): AttemptRecord {
  return {
    id: row.id,
    accountId: row.account_id,
    method: row.method,
    success: row.success,
    ipAddress: row.ip_address,
    userAgent: row.user_agent,
    createdAt: row.created_at,
  };
}

function mapEmailVerificationToken(row: EmailVerificationTokenRow): EmailVerificationTokenRecord {
  return {
    id: row.id,
    accountId: row.account_id,
    tokenHash: row.token_hash,
    expiresAt: row.expires_at,
    consumedAt: row.consumed_at,
    createdAt: row.created_at,
  };
}

export class PgAuthRepository implements AuthRepository {
  constructor(private readonly pool: Pool) {}

  async createAccount(input: CreateAccountInput): Promise<Account> {
    try {
      const rows = await this.query<AccountRow>(
        `INSERT INTO accounts (
           id, email, password_hash, display_name, status, email_verified,
           federated_provider, federated_subject
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
         RETURNING ${ACCOUNT_COLUMNS}`,
        [
          randomUUID(),
          input.email,
          input.passwordHash,
          input.displayName ?? null,
          input.status ?? 'active',
          input.emailVerified ?? false,
          input.federatedProvider ?? null,
          input.federatedSubject ?? null,
        ],
      );
      return toPublicAccount(mapAccount(rows[0]));
    } catch (error) {
      if (error instanceof DatabaseError && error.code === UNIQUE_VIOLATION) {
        throw conflict('AUTH_EMAIL_EXISTS', 'An account already exists for this email.');
      }
      throw error;
    }
  }

  async findAccountByEmail(email: string): Promise<AccountWithSecrets | null> {
    const rows = await this.query<AccountRow>(
      `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE lower(email) = lower($1) AND deleted_at IS NULL`,
      [email],
    );
    return rows[0] ? mapAccount(rows[0]) : null;
  }

  async findAccountById(id: string): Promise<AccountWithSecrets | null> {
    const rows = await this.query<AccountRow>(
      `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE id = $1 AND deleted_at IS NULL`,
      [id],
    );
    return rows[0] ? mapAccount(rows[0]) : null;
  }

  async findAccountByFederatedSubject(
    provider: string,
    subject: string,
  ): Promise<AccountWithSecrets | null> {
    const rows = await this.query<AccountRow>(
      `SELECT ${ACCOUNT_COLUMNS} FROM accounts
        WHERE federated_provider = $1 AND federated_subject = $2 AND deleted_at IS NULL`,
      [provider, subject],
    );
    return rows[0] ? mapAccount(rows[0]) : null;
  }

  async linkFederatedIdentity(
    accountId: string,
    provider: string,
    subject: string,
    when: Date,
  ): Promise<void> {
    await this.query(
      `UPDATE accounts
          SET federated_provider = $2, federated_subject = $3, email_verified = true, updated_at = $4
        WHERE id = $1`,
      [accountId, provider, subject, when],
    );
  }

  async markEmailVerified(accountId: string, when: Date): Promise<void> {
    await this.query(
      `UPDATE accounts
          SET email_verified = true,
              status = CASE WHEN status = 'pending_verification' THEN 'active' ELSE status END,
              updated_at = $2
        WHERE id = $1`,
      [accountId, when],
    );
  }

  async updatePasswordHash(accountId: string, passwordHash: string, when: Date): Promise<void> {
    await this.query(`UPDATE accounts SET password_hash = $2, updated_at = $3 WHERE id = $1`, [
      accountId,
      passwordHash,
      when,
    ]);
  }

  async updateLastLogin(accountId: string, when: Date): Promise<void> {
    await this.query(`UPDATE accounts SET last_login_at = $2 WHERE id = $1`, [accountId, when]);
  }

  async softDeleteAccount(accountId: string, when: Date): Promise<boolean> {
    const count = await this.execute(
      `UPDATE accounts
          SET deleted_at = $2, status = 'inactive', updated_at = $2
        WHERE id = $1 AND deleted_at IS NULL`,
      [accountId, when],
    );
    return count === 1;
  }

  async registerLoginFailure(input: RegisterLoginFailureInput): Promise<LoginFailureState> {
    const rows = await this.query<{
      failed_login_attempts: number;
      locked_until: Date | null;
      lock_triggered: boolean;
    }>(
      `WITH recent AS (
         SELECT id,
                ARRAY(SELECT f FROM unnest(recent_failed_logins) AS f WHERE f >= $3)
                  || $2::timestamptz AS failures
           FROM accounts
          WHERE id = $1
            FOR UPDATE
       )
       UPDATE accounts a
          SET recent_failed_logins = recent.failures,
              failed_login_attempts = cardinality(recent.failures),
              last_failed_login_at = $2,
              locked_until = CASE
                WHEN a.locked_until IS NOT NULL AND a.locked_until > $2 THEN a.locked_until
                WHEN cardinality(recent.failures) >= $4 THEN $5
                ELSE a.locked_until
              END,
              updated_at = $2
         FROM recent
        WHERE a.id = recent.id
        RETURNING a.failed_login_attempts, a.locked_until,
                  (a.locked_until IS NOT NULL AND a.locked_until = $5) AS lock_triggered`,
      [input.accountId, input.now, input.windowStart, input.threshold, input.lockUntil],
    );

    const row = rows[0];
    if (!row) {
      return { failedLoginAttempts: 0, lockedUntil: null, lockTriggered: false };
    }

    return {
      failedLoginAttempts: row.failed_login_attempts,
      lockedUntil: row.locked_until,
      lockTriggered: row.lock_triggered,
    };
  }

  async resetLoginFailures(accountId: string): Promise<void> {
    await this.query(
      `UPDATE accounts
          SET failed_login_attempts = 0, last_failed_login_at = NULL,
              recent_failed_logins = '{}', locked_until = NULL
        WHERE id = $1 AND (failed_login_attempts <> 0 OR locked_until IS NOT NULL)`,
      [accountId],
    );
  }

  async updateMfaSettings(accountId: string, patch: MfaSettingsPatch, when: Date): Promise<void> {
    const params: unknown[] = [accountId, when];
    const assignments: string[] = ['updated_at = $2'];

    const bind = (column: string, value: unknown) => {
      params.push(value);
      const placeholder = `$${params.length}`;
      assignments.push(`${column} = ${placeholder}`);
      return placeholder;
    };

    const totpExpression =
      patch.totpEnabled === undefined ? 'totp_enabled' : bind('totp_enabled', patch.totpEnabled);
    const emailExpression =
      patch.emailMfaEnabled === undefined
        ? 'email_mfa_enabled'
        : bind('email_mfa_enabled', patch.emailMfaEnabled);

    if (patch.totpSecretEncrypted !== undefined) {
      bind('totp_secret_encrypted', patch.totpSecretEncrypted);
    }
    if (patch.backupCodesEncrypted !== undefined) {
      bind('backup_codes_encrypted', patch.backupCodesEncrypted);
    }
    if (patch.totpLastUsedStep !== undefined) {
      bind('totp_last_used_step', patch.totpLastUsedStep);
    }

    assignments.push(`mfa_enabled = (${totpExpression}::boolean OR ${emailExpression}::boolean)`);

    await this.query(`UPDATE accounts SET ${assignments.join(', ')} WHERE id = $1`, params);
  }

  async advanceTotpStep(accountId: string, step: number): Promise<boolean> {
    const count = await this.execute(
      `UPDATE accounts
          SET totp_last_used_step = $2
        WHERE id = $1 AND (totp_last_used_step IS NULL OR totp_last_used_step < $2)`,
      [accountId, step],
    );
    return count === 1;
  }

  async compareAndSetBackupCodes(
    accountId: string,
    expected: string,
    next: string | null,
  ): Promise<boolean> {
    const count = await this.execute(
      `UPDATE accounts
          SET backup_codes_encrypted = $3
        WHERE id = $1 AND backup_codes_encrypted = $2`,
      [accountId, expected, next],
    );
    return count === 1;
  }

  async saveEmailVerificationToken(
    accountId: string,
    tokenHash: string,
    expiresAt: Date,
  ): Promise<EmailVerificationTokenRecord> {
    const rows = await this.query<EmailVerificationTokenRow>(
      `INSERT INTO email_verification_tokens (id, account_id, token_hash, expires_at)
       VALUES ($1, $2, $3, $4)
       RETURNING id, account_id, token_hash, expires_at, consumed_at, created_at`,
      [randomUUID(), accountId, tokenHash, expiresAt],
    );
    return mapEmailVerificationToken(rows[0]);
  }

  async findEmailVerificationToken(tokenHash: string): Promise<EmailVerificationTokenRecord | null> {
    const rows = await this.query<EmailVerificationTokenRow>(
      `SELECT id, account_id, token_hash, expires_at, consumed_at, created_at
         FROM email_verification_tokens WHERE token_hash = $1`,
      [tokenHash],
    );
    return rows[0] ? mapEmailVerificationToken(rows[0]) : null;
  }

  async consumeEmailVerificationToken(id: string, when: Date): Promise<boolean> {
    const count = await this.execute(
      `UPDATE email_verification_tokens SET consumed_at = $2 WHERE id = $1 AND consumed_at IS NULL`,
      [id, when],
    );
    return count === 1;
  }

  async createEmailCode(input: CreateEmailCodeInput): Promise<EmailCodeRecord> {
    const rows = await this.query<EmailCodeRow>(
      `INSERT INTO email_mfa_codes (id, account_id, code_hash, expires_at, created_at)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING id, account_id, code_hash, expires_at, used_at, created_at`,
      [randomUUID(), input.accountId, input.codeHash, input.expiresAt, input.createdAt],
    );
    return mapEmailCode(rows[0]);
  }

  async findLatestEmailCode(accountId: string): Promise<EmailCodeRecord | null> {
    const rows = await this.query<EmailCodeRow>(
      `SELECT id, account_id, code_hash, expires_at, used_at, created_at
         FROM email_mfa_codes
        WHERE account_id = $1
        ORDER BY created_at DESC
        LIMIT 1`,
      [accountId],
    );
    return rows[0] ? mapEmailCode(rows[0]) : null;
  }

  async markEmailCodeUsed(id: string, when: Date): Promise<boolean> {
    const count = await this.execute(
      `UPDATE email_mfa_codes SET used_at = $2 WHERE id = $1 AND used_at IS NULL`,
      [id, when],
    );
    return count === 1;
  }

  async recordAttempt(input: RecordAttemptInput): Promise<AttemptRecord> {
    const rows = await this.query<AttemptRow>(
      `INSERT INTO auth_attempts (id, account_id, method, success, ip_address, user_agent, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING id, account_id, method, success, ip_address, user_agent, created_at`,
      [
        randomUUID(),
        input.accountId,
        input.method,
        input.success,
        input.ipAddress ?? null,
        input.userAgent ?? null,
        input.createdAt,
      ],
    );
    return mapAttempt(rows[0]);
  }

  withAttemptLock<T>(
    accountId: string,
    method: AttemptMethod,
    work: () => Promise<T>,
  ): Promise<T> {
    return this.transaction(async (client) => {
      await this.run(() =>
        client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [`${accountId}:${method}`]),
      );
      return work();
    });
  }

  async summarizeFailedAttempts(
    accountId: string,
    method: AttemptMethod,
    since: Date,
  ): Promise<AttemptWindowSummary> {
    const rows = await this.query<{ count: number; oldest: Date | null }>(
      `SELECT COUNT(*)::int AS count, MIN(created_at) AS oldest
         FROM auth_attempts
        WHERE account_id = $1
          AND method = $2
          AND success = false
          AND created_at > GREATEST(
            $3::timestamptz,
            COALESCE(
              (SELECT MAX(created_at) FROM auth_attempts
                WHERE account_id = $1 AND method = $2 AND success = true),
              $3::timestamptz
            )
          )`,
      [accountId, method, since],
    );
    return { count: rows[0]?.count ?? 0, oldest: rows[0]?.oldest ?? null };
  }

  async createSession(input: CreateSessionInput): Promise<SessionRecord> {
    return this.insertSession(null, input);
  }

  async findSessionById(id: string): Promise<SessionRecord | null> {
    const rows = await this.query<SessionRow>(`SELECT * FROM sessions WHERE id = $1`, [id]);
    return rows[0] ? mapSession(rows[0]) : null;
  }

  async findSessionByTokenHash(tokenHash: string): Promise<SessionRecord | null> {
    const rows = await this.query<SessionRow>(`SELECT * FROM sessions WHERE token_hash = $1`, [
      tokenHash,
    ]);
    return rows[0] ? mapSession(rows[0]) : null;
  }

  async rotateSession(
    previousId: string,
    next: CreateSessionInput,
    when: Date,
  ): Promise<SessionRecord | null> {
    return this.transaction(async (client) => {
      const result = await client.query(
        `UPDATE sessions
            SET active = false, replaced_by_session_id = $2, last_used_at = $3
          WHERE id = $1 AND active = true AND expires_at > $3`,
        [previousId, next.id, when],
      );

      if (result.rowCount !== 1) {
        return null;
      }

      return this.insertSession(client, next);
    });
  }

  async touchSession(id: string, when: Date): Promise<void> {
    await this.query(`UPDATE sessions SET last_used_at = $2 WHERE id = $1`, [id, when]);
  }

  async deactivateSession(id: string, when: Date): Promise<void> {
    await this.query(
      `UPDATE sessions SET active = false, last_used_at = $2 WHERE id = $1 AND active = true`,
      [id, when],
    );
  }

  async deactivateSessionFamily(familyId: string, when: Date): Promise<number> {
    return this.execute(
      `UPDATE sessions
          SET active = false, mfa_session_expires_at = NULL, last_used_at = $2
        WHERE family_id = $1 AND (active = true OR mfa_session_expires_at IS NOT NULL)`,
      [familyId, when],
    );
  }

  async deactivateSessionsForAccount(accountId: string, when: Date): Promise<number> {
    return this.execute(
      `UPDATE sessions
          SET active = false, mfa_session_expires_at = NULL, last_used_at = $2
        WHERE account_id = $1 AND (active = true OR mfa_session_expires_at IS NOT NULL)`,
      [accountId, when],
    );
  }

  async markSessionMfaVerified(id: string, verifiedAt: Date, expiresAt: Date): Promise<void> {
    await this.query(
      `UPDATE sessions SET mfa_verified_at = $2, mfa_session_expires_at = $3 WHERE id = $1`,
      [id, verifiedAt, expiresAt],
    );
  }

  async consumeChallenge(
    jti: string,
    accountId: string,
    expiresAt: Date,
    when: Date,
  ): Promise<boolean> {
    const count = await this.execute(
      `WITH pruned AS (
         DELETE FROM consumed_challenges WHERE expires_at < $4
       )
       INSERT INTO consumed_challenges (jti, account_id, expires_at, consumed_at)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (jti) DO NOTHING`,
      [jti, accountId, expiresAt, when],
    );
    return count === 1;
  }

  async releaseChallenge(jti: string): Promise<void> {
    await this.query(`DELETE FROM consumed_challenges WHERE jti = $1`, [jti]);
  }

  async ping(): Promise<void> {
    await this.query('SELECT 1');
  }

  private async insertSession(client: PoolClient | null, input: CreateSessionInput) {
    const text = `INSERT INTO sessions (
        id, account_id, family_id, token_hash, ip_address, user_agent, device_label,
        active, expires_at, created_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, true, $8, $9)
      RETURNING *`;
    const params = [
      input.id,
      input.accountId,
      input.familyId,
      input.tokenHash,
      input.ipAddress ?? null,
      input.userAgent ?? null,
      input.deviceLabel ?? null,
      input.expiresAt,
      input.createdAt,
    ];

    const rows = client
      ? (await this.run(() => client.query<SessionRow>(text, params))).rows
      : await this.query<SessionRow>(text, params);
    return mapSession(rows[0]);
  }

  private async query<T extends QueryResultRow>(text: string, params: unknown[] = []) {
    const result = await this.run(() => this.pool.query<T>(text, params));
    return result.rows;
  }

  private async execute(text: string, params: unknown[]) {
    const result = await this.run(() => this.pool.query(text, params));
    return result.rowCount ?? 0;
  }

  private async transaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.run(() => this.pool.connect());

    try {
      await this.run(() => client.query('BEGIN'));
      const result = await work(client);
      await this.run(() => client.query(result === null ? 'ROLLBACK' : 'COMMIT'));
      return result;
    } catch (error) {
      await client.query('ROLLBACK').catch(() => undefined);
      throw error;
    } finally {
      client.release();
    }
  }

  private async run<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw toStoreError(error);
    }
  }
}

// Constraint violations are data errors and pass through; anything else
// (connection refused, pool or statement timeout, shutdown) is an outage.
function toStoreError(error: unknown) {
  if (error instanceof DatabaseError && error.code?.startsWith('23')) {
    return error;
  }

  const failure = serviceUnavailable(
    'STORE_UNAVAILABLE',
    'The authentication store is temporarily unavailable.',
  );
  failure.cause = error;
  return failure;
}
