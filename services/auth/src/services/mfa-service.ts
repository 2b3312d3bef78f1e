import type { BaseLogger } from 'pino';

import type {
  Account,
  AccountWithSecrets,
  MfaMethod,
  RequestOrigin,
} from '../domain/models';
import { toPublicAccount } from '../domain/models';
import type { AuthRepository } from '../repositories/auth-repository';
import type { SecretBox } from '../lib/encryption';
import type { AttemptLedger } from './attempt-ledger';
import type { EmailService } from './email-service';
import type { OneTimeCodeManager } from './one-time-codes';
import { badRequest, conflict, tooManyRequests, unauthorized } from '../errors';
import { buildProvisioningUri, generateTotpSecret, matchTotp } from '../lib/totp';

const BACKUP_CODES_LOW_THRESHOLD = 2;

export interface MfaServiceDependencies {
  repository: AuthRepository;
  ledger: AttemptLedger;
  codes: OneTimeCodeManager;
  secretBox: SecretBox;
  emailService: EmailService;
  logger: BaseLogger;
  totpIssuer: string;
}

export interface MfaStatus {
  mfaRequired: boolean;
  totpEnabled: boolean;
  totpPending: boolean;
  emailMfaEnabled: boolean;
  emailVerified: boolean;
  backupCodesRemaining: number;
  preferredMethod: Exclude<MfaMethod, 'backup'> | null;
}

export interface TotpSetupResult {
  secret: string;
  provisioningUri: string;
  backupCodes: string[];
}

export interface EmailCodeDispatch {
  expiresAt: Date;
  delivered: boolean;
}

export interface SecondFactorResult {
  method: MfaMethod;
  backupCodesRemaining: number | null;
  backupCodesLow: boolean;
}

type FactorCheck = { ok: true; backupCodesRemaining: number | null } | { ok: false; reason: string };

function assertNever(value: never): never {
  throw new Error(`Unhandled MFA method: ${String(value)}`);
}

export class MfaService {
  private readonly repository: AuthRepository;

  private readonly ledger: AttemptLedger;

  private readonly codes: OneTimeCodeManager;

  private readonly secretBox: SecretBox;

  private readonly emailService: EmailService;

  private readonly logger: BaseLogger;

  private readonly totpIssuer: string;

  constructor(dependencies: MfaServiceDependencies) {
    this.repository = dependencies.repository;
    this.ledger = dependencies.ledger;
    this.codes = dependencies.codes;
    this.secretBox = dependencies.secretBox;
    this.emailService = dependencies.emailService;
    this.logger = dependencies.logger;
    this.totpIssuer = dependencies.totpIssuer;
  }

  async getStatus(accountId: string): Promise<MfaStatus> {
    const account = await this.requireAccount(accountId);

    return {
      mfaRequired: account.mfaEnabled,
      totpEnabled: account.totpEnabled,
      totpPending: !account.totpEnabled && account.totpSecretEncrypted !== null,
      emailMfaEnabled: account.emailMfaEnabled,
      emailVerified: account.emailVerified,
      backupCodesRemaining: this.codes.remainingBackupCodes(account.backupCodesEncrypted),
      preferredMethod: account.totpEnabled ? 'totp' : account.emailMfaEnabled ? 'email' : null,
    };
  }

  /**
   * Stores a fresh secret and backup set. TOTP stays disabled until
   * `confirmTotp` sees a valid code, so calling this again restarts enrolment.
   */
  async setupTotp(accountId: string, now: Date = new Date()): Promise<TotpSetupResult> {
    const account = await this.requireAccount(accountId);

    if (account.totpEnabled) {
      throw conflict('AUTH_TOTP_ALREADY_ENABLED', 'TOTP is already enabled for this account.');
    }

    const secret = generateTotpSecret();
    const backup = await this.codes.createBackupCodeSet(now);

    await this.repository.updateMfaSettings(
      account.id,
      {
        totpSecretEncrypted: this.secretBox.encrypt(secret),
        backupCodesEncrypted: backup.encrypted,
        totpLastUsedStep: null,
      },
      now,
    );

    this.logger.info({ accountId: account.id }, 'totp enrolment started');

    return {
      secret,
      provisioningUri: buildProvisioningUri(secret, account.email, this.totpIssuer),
      backupCodes: backup.codes,
    };
  }

  async confirmTotp(
    accountId: string,
    code: string,
    origin: RequestOrigin = {},
    now: Date = new Date(),
  ): Promise<Account> {
    const account = await this.requireAccount(accountId);

    if (account.totpEnabled) {
      throw conflict('AUTH_TOTP_ALREADY_ENABLED', 'TOTP is already enabled for this account.');
    }
    if (!account.totpSecretEncrypted) {
      throw badRequest('AUTH_TOTP_NOT_INITIALIZED', 'Start TOTP setup before confirming it.');
    }

    await this.verifySecondFactor(account, 'totp', code, origin, now);
    await this.repository.updateMfaSettings(account.id, { totpEnabled: true }, now);

    this.logger.info({ accountId: account.id }, 'totp enabled');
    return this.requirePublicAccount(account.id);
  }

  async disableTotp(
    accountId: string,
    code: string,
    origin: RequestOrigin = {},
    now: Date = new Date(),
  ): Promise<Account> {
    const account = await this.requireAccount(accountId);

    if (!account.totpEnabled) {
      throw badRequest('AUTH_TOTP_NOT_ENABLED', 'TOTP is not enabled for this account.');
    }

    await this.verifySecondFactor(account, 'totp', code, origin, now);
    await this.repository.updateMfaSettings(
      account.id,
      {
        totpEnabled: false,
        totpSecretEncrypted: null,
        backupCodesEncrypted: null,
        totpLastUsedStep: null,
      },
      now,
    );

    this.logger.info({ accountId: account.id }, 'totp disabled');
    return this.requirePublicAccount(account.id);
  }

  async setupEmailMfa(accountId: string, now: Date = new Date()): Promise<Account> {
    const account = await this.requireAccount(accountId);

    if (!account.emailVerified) {
      throw badRequest(
        'AUTH_EMAIL_NOT_VERIFIED',
        'Verify your email address before enabling email codes.',
      );
    }

    if (!account.emailMfaEnabled) {
      await this.repository.updateMfaSettings(account.id, { emailMfaEnabled: true }, now);
      this.logger.info({ accountId: account.id }, 'email mfa enabled');
    }

    return this.requirePublicAccount(account.id);
  }

  async sendEmailCode(accountId: string, now: Date = new Date()): Promise<EmailCodeDispatch> {
    const account = await this.requireAccount(accountId);

    if (!account.emailMfaEnabled) {
      throw badRequest('AUTH_EMAIL_MFA_DISABLED', 'Email codes are not enabled for this account.');
    }

    return this.dispatchEmailCode(account, now);
  }

  /** Issues a code for the account and mails it. Used by login challenges too. */
  async dispatchEmailCode(
    account: Pick<Account, 'id' | 'email' | 'displayName'>,
    now: Date = new Date(),
  ): Promise<EmailCodeDispatch> {
    const issued = await this.codes.issueEmailCode(account.id, now);
    const delivery = await this.emailService.sendEmailMfaCode({
      to: { email: account.email, displayName: account.displayName },
      code: issued.code,
      expiresAt: issued.expiresAt,
    });

    if (!delivery.sent) {
      this.logger.warn({ accountId: account.id }, 'email code issued but not delivered');
    }

    return { expiresAt: issued.expiresAt, delivered: delivery.sent };
  }

  async verifyEmailCode(
    accountId: string,
    code: string,
    origin: RequestOrigin = {},
    now: Date = new Date(),
  ) {
    const account = await this.requireAccount(accountId);
    return this.verifySecondFactor(account, 'email', code, origin, now);
  }

  async disableEmailMfa(accountId: string, now: Date = new Date()): Promise<Account> {
    const account = await this.requireAccount(accountId);

    if (account.emailMfaEnabled) {
      await this.repository.updateMfaSettings(account.id, { emailMfaEnabled: false }, now);
      this.logger.info({ accountId: account.id }, 'email mfa disabled');
    }

    return this.requirePublicAccount(account.id);
  }

  async verifyBackupCode(
    accountId: string,
    code: string,
    origin: RequestOrigin = {},
    now: Date = new Date(),
  ) {
    const account = await this.requireAccount(accountId);
    return this.verifySecondFactor(account, 'backup', code, origin, now);
  }

  /** Replaces the backup set; requires a current TOTP code. */
  async regenerateBackupCodes(
    accountId: string,
    totpCode: string,
    origin: RequestOrigin = {},
    now: Date = new Date(),
  ): Promise<string[]> {
    const account = await this.requireAccount(accountId);

    if (!account.totpEnabled) {
      throw badRequest('AUTH_TOTP_NOT_ENABLED', 'Backup codes require TOTP to be enabled.');
    }

    await this.verifySecondFactor(account, 'totp', totpCode, origin, now);
    const codes = await this.codes.generateBackupCodes(account.id, now);

    this.logger.info({ accountId: account.id }, 'backup codes regenerated');
    return codes;
  }

  /**
   * Rate-limits, checks and records one second-factor attempt. Every failure
   * surfaces as the same `AUTH_INVALID_CODE`; the reason only reaches the log.
   */
  async verifySecondFactor(
    account: AccountWithSecrets,
    method: MfaMethod,
    code: string,
    origin: RequestOrigin = {},
    now: Date = new Date(),
  ): Promise<SecondFactorResult> {
    const evaluation = await this.ledger.evaluate(
      account.id,
      method,
      () => this.checkFactor(account, method, code, now),
      origin,
      now,
    );

    if (evaluation.limited) {
      this.logger.warn(
        { accountId: account.id, method, retryAfterSeconds: evaluation.retryAfterSeconds },
        'mfa attempts rate limited',
      );
      throw tooManyRequests(
        'AUTH_MFA_RATE_LIMITED',
        'Too many verification attempts. Try again later.',
        evaluation.retryAfterSeconds,
      );
    }

    const result = evaluation.outcome;

    if (!result.ok) {
      this.logger.warn(
        {
          accountId: account.id,
          method,
          reason: result.reason,
          ipAddress: origin.ipAddress ?? null,
          userAgent: origin.userAgent ?? null,
        },
        'mfa verification failed',
      );
      throw unauthorized('AUTH_INVALID_CODE', 'The verification code is invalid.');
    }

    const backupCodesLow =
      result.backupCodesRemaining !== null &&
      result.backupCodesRemaining <= BACKUP_CODES_LOW_THRESHOLD;

    if (backupCodesLow) {
      await this.emailService.sendSecurityNotice({
        to: { email: account.email, displayName: account.displayName },
        event: 'backup_codes_low',
        detail: { remaining: result.backupCodesRemaining ?? 0 },
      });
    }

    return { method, backupCodesRemaining: result.backupCodesRemaining, backupCodesLow };
  }

  private async checkFactor(
    account: AccountWithSecrets,
    method: MfaMethod,
    code: string,
    now: Date,
  ): Promise<FactorCheck> {
    switch (method) {
      case 'totp':
        return this.checkTotp(account, code, now);
      case 'email': {
        if (!account.emailMfaEnabled) {
          return { ok: false, reason: 'email_mfa_disabled' };
        }
        const verification = await this.codes.verifyEmailCode(account.id, code, now);
        return verification.ok
          ? { ok: true, backupCodesRemaining: null }
          : { ok: false, reason: verification.reason };
      }
      case 'backup': {
        const consumption = await this.codes.consumeBackupCode(account, code);
        return consumption.ok
          ? { ok: true, backupCodesRemaining: consumption.remaining }
          : { ok: false, reason: consumption.reason };
      }
      default:
        return assertNever(method);
    }
  }

  /**
   * Accepts a code for an enabled or pending secret. The matched step must be
   * newer than the last one used and is advanced by compare-and-set.
   */
  private async checkTotp(
    account: AccountWithSecrets,
    code: string,
    now: Date,
  ): Promise<FactorCheck> {
    if (!account.totpSecretEncrypted) {
      return { ok: false, reason: 'totp_not_configured' };
    }

    const secret = this.secretBox.decrypt(account.totpSecretEncrypted);
    const match = matchTotp(secret, code.trim(), { timestamp: now.getTime() });

    if (!match) {
      return { ok: false, reason: 'mismatch' };
    }

    if (account.totpLastUsedStep !== null && match.step <= account.totpLastUsedStep) {
      return { ok: false, reason: 'replayed' };
    }

    const advanced = await this.repository.advanceTotpStep(account.id, match.step);
    return advanced ? { ok: true, backupCodesRemaining: null } : { ok: false, reason: 'replayed' };
  }

  private async requireAccount(accountId: string) {
    const account = await this.repository.findAccountById(accountId);

    if (!account || account.status !== 'active') {
      throw unauthorized('AUTH_ACCOUNT_NOT_FOUND', 'Account is not available.');
    }

    return account;
  }

  private async requirePublicAccount(accountId: string) {
    return toPublicAccount(await this.requireAccount(accountId));
  }
}
