import type { BaseLogger } from 'pino';

import type {
  Account,
  AccountWithSecrets,
  ChallengeMethod,
  DeviceInfo,
  MfaMethod,
  RequestOrigin,
} from '../domain/models';
import { toPublicAccount } from '../domain/models';
import type { AuthRepository } from '../repositories/auth-repository';
import type { AttemptLedger } from './attempt-ledger';
import type { CredentialVerifier } from './credential-verifier';
import { normalizeEmail } from './credential-verifier';
import type { EmailService } from './email-service';
import type { IdentityVerifier } from './identity-verifier';
import type { MfaService } from './mfa-service';
import type { AuthTokens, TokenIssuer } from './token-issuer';
import {
  badRequest,
  conflict,
  forbidden,
  gone,
  locked,
  notFound,
  tooManyRequests,
  unauthorized,
} from '../errors';
import { hashSecret, randomToken, sha256 } from '../lib/hashing';

const DAY_MS = 24 * 60 * 60 * 1000;

export type AuthFlowState =
  | 'start'
  | 'credential_check'
  | 'direct_success'
  | 'mfa_pending'
  | 'mfa_verify'
  | 'success'
  | 'locked'
  | 'failed';

export interface AuthServiceSettings {
  rememberDeviceDays: number;
  emailVerificationTtlHours: number;
  exposeDebugTokens: boolean;
}

export interface AuthServiceDependencies {
  repository: AuthRepository;
  credentials: CredentialVerifier;
  ledger: AttemptLedger;
  tokens: TokenIssuer;
  mfa: MfaService;
  emailService: EmailService;
  identityVerifier: IdentityVerifier | null;
  logger: BaseLogger;
  settings: AuthServiceSettings;
}

export interface RequestContext extends RequestOrigin {
  deviceLabel?: string | null;
}

export interface RegisterInput {
  email: string;
  password: string;
  displayName?: string | null;
}

export interface RegisterResult {
  account: Account;
  emailVerificationRequired: boolean;
  debug?: {
    emailVerificationToken: string;
  };
}

export interface LoginInput {
  email: string;
  password: string;
  rememberedDeviceToken?: string | null;
}

export interface FederatedLoginInput {
  identityToken: string;
  rememberedDeviceToken?: string | null;
}

export interface VerifyMfaInput {
  challengeToken: string;
  method: MfaMethod;
  code: string;
  rememberDevice?: boolean;
}

export interface RememberedDevice {
  token: string;
  expiresAt: Date;
}

export interface AuthenticatedResult {
  type: 'authenticated';
  account: Account;
  tokens: AuthTokens;
  rememberedDevice: RememberedDevice | null;
  usedRememberedDevice: boolean;
  backupCodesRemaining: number | null;
  backupCodesLow: boolean;
}

export interface ChallengeResult {
  type: 'mfa_challenge';
  challengeToken: string;
  method: ChallengeMethod;
  availableMethods: MfaMethod[];
  expiresAt: Date;
}

export type LoginResult = AuthenticatedResult | ChallengeResult;

export interface RefreshResult {
  account: Account;
  tokens: AuthTokens;
}

export interface ResendResult {
  expiresAt: Date;
  delivered: boolean;
}

function toDevice(context: RequestContext): DeviceInfo {
  return {
    ipAddress: context.ipAddress ?? null,
    userAgent: context.userAgent ?? null,
    label: context.deviceLabel ?? null,
  };
}

/**
 * Login and MFA state machine. Every login and verification call writes the
 * state it ended in to the log.
 */
export class AuthService {
  private readonly repository: AuthRepository;

  private readonly credentials: CredentialVerifier;

  private readonly ledger: AttemptLedger;

  private readonly tokens: TokenIssuer;

  private readonly mfa: MfaService;

  private readonly emailService: EmailService;

  private readonly identityVerifier: IdentityVerifier | null;

  private readonly logger: BaseLogger;

  private readonly settings: AuthServiceSettings;

  constructor(dependencies: AuthServiceDependencies) {
    this.repository = dependencies.repository;
    this.credentials = dependencies.credentials;
    this.ledger = dependencies.ledger;
    this.tokens = dependencies.tokens;
    this.mfa = dependencies.mfa;
    this.emailService = dependencies.emailService;
    this.identityVerifier = dependencies.identityVerifier;
    this.logger = dependencies.logger;
    this.settings = dependencies.settings;
  }

  get federatedLoginEnabled() {
    return this.identityVerifier !== null;
  }

  async register(input: RegisterInput, now: Date = new Date()): Promise<RegisterResult> {
    const email = normalizeEmail(input.email);

    if (await this.repository.findAccountByEmail(email)) {
      throw conflict('AUTH_EMAIL_EXISTS', 'An account already exists for this email.');
    }

    const account = await this.repository.createAccount({
      email,
      passwordHash: await hashSecret(input.password),
      displayName: input.displayName?.trim() || null,
      status: 'active',
      emailVerified: false,
    });

    const verificationToken = randomToken();
    const expiresAt = new Date(
      now.getTime() + this.settings.emailVerificationTtlHours * 3_600_000,
    );
    await this.repository.saveEmailVerificationToken(
      account.id,
      sha256(verificationToken),
      expiresAt,
    );
    await this.emailService.sendVerificationEmail({
      to: { email: account.email, displayName: account.displayName },
      verificationToken,
      expiresAt,
    });

    this.logger.info({ accountId: account.id }, 'account registered');

    return {
      account,
      emailVerificationRequired: true,
      debug: this.settings.exposeDebugTokens
        ? { emailVerificationToken: verificationToken }
        : undefined,
    };
  }

  async verifyEmailAddress(token: string, now: Date = new Date()): Promise<Account> {
    const record = await this.repository.findEmailVerificationToken(sha256(token));

    if (!record || record.consumedAt) {
      throw badRequest(
        'AUTH_EMAIL_VERIFICATION_INVALID',
        'Verification token is invalid or has already been used.',
      );
    }

    if (record.expiresAt.getTime() <= now.getTime()) {
      throw gone('AUTH_EMAIL_VERIFICATION_EXPIRED', 'Verification token has expired.');
    }

    if (!(await this.repository.consumeEmailVerificationToken(record.id, now))) {
      throw badRequest(
        'AUTH_EMAIL_VERIFICATION_INVALID',
        'Verification token is invalid or has already been used.',
      );
    }

    await this.repository.markEmailVerified(record.accountId, now);
    this.logger.info({ accountId: record.accountId }, 'email address verified');

    return this.getAccount(record.accountId);
  }

  async login(
    input: LoginInput,
    context: RequestContext = {},
    now: Date = new Date(),
  ): Promise<LoginResult> {
    this.logFlow('start', { ipAddress: context.ipAddress ?? null }, 'login attempt');
    const account = await this.credentials.findAccount(input.email);

    if (account) {
      const lock = this.ledger.lockStatus(account, now);
      if (lock.locked) {
        this.logFlow('locked', { accountId: account.id, ...context }, 'login rejected');
        throw locked(
          'AUTH_ACCOUNT_LOCKED',
          'Too many failed sign-in attempts. Try again later.',
          lock.retryAfterSeconds,
        );
      }
    }

    const check = await this.credentials.check(account, input.password);

    if (!check.ok) {
      await this.handleCredentialFailure(check.account, check.reason, input.email, context, now);
      throw unauthorized('AUTH_INVALID_CREDENTIALS', 'Email or password is incorrect.');
    }

    await this.ledger.record(check.account.id, 'password', true, context, now);
    await this.ledger.resetPasswordFailures(check.account.id);

    return this.continueAfterPrimaryFactor(
      check.account,
      input.rememberedDeviceToken ?? null,
      context,
      now,
    );
  }

  async federatedLogin(
    input: FederatedLoginInput,
    context: RequestContext = {},
    now: Date = new Date(),
  ): Promise<LoginResult> {
    if (!this.identityVerifier) {
      throw notFound('AUTH_FEDERATED_DISABLED', 'Federated sign-in is not configured.');
    }

    const identity = await this.identityVerifier.verify(input.identityToken);
    let account = await this.repository.findAccountByFederatedSubject(
      identity.provider,
      identity.subject,
    );

    if (!account) {
      const email = normalizeEmail(identity.email);
      const existing = await this.repository.findAccountByEmail(email);

      if (existing) {
        if (!identity.emailVerified) {
          this.logFlow(
            'failed',
            { accountId: existing.id, provider: identity.provider, ...context },
            'federated identity with unverified email matches an existing account',
          );
          throw unauthorized(
            'AUTH_FEDERATED_LINK_REFUSED',
            'Sign in with your password to link this identity.',
          );
        }
        if (existing.federatedSubject && existing.federatedProvider === identity.provider) {
          throw conflict(
            'AUTH_FEDERATED_ALREADY_LINKED',
            'This account is linked to a different identity.',
          );
        }

        await this.repository.linkFederatedIdentity(
          existing.id,
          identity.provider,
          identity.subject,
          now,
        );
        if (!existing.emailVerified) {
          await this.repository.markEmailVerified(existing.id, now);
        }
        this.logger.info(
          { accountId: existing.id, provider: identity.provider },
          'federated identity linked',
        );
      } else {
        const created = await this.repository.createAccount({
          email,
          passwordHash: null,
          displayName: identity.name,
          status: 'active',
          emailVerified: identity.emailVerified,
          federatedProvider: identity.provider,
          federatedSubject: identity.subject,
        });
        this.logger.info(
          { accountId: created.id, provider: identity.provider },
          'account created from federated identity',
        );
      }

      account = await this.repository.findAccountByFederatedSubject(
        identity.provider,
        identity.subject,
      );
    }

    if (!account) {
      throw unauthorized('AUTH_FEDERATED_TOKEN_INVALID', 'Identity token is invalid.');
    }

    if (account.status !== 'active') {
      this.logFlow('failed', { accountId: account.id, reason: 'inactive' }, 'login rejected');
      throw forbidden('AUTH_ACCOUNT_INACTIVE', 'This account is not active.');
    }

    const lock = this.ledger.lockStatus(account, now);
    if (lock.locked) {
      this.logFlow('locked', { accountId: account.id, ...context }, 'login rejected');
      throw locked(
        'AUTH_ACCOUNT_LOCKED',
        'Too many failed sign-in attempts. Try again later.',
        lock.retryAfterSeconds,
      );
    }

    return this.continueAfterPrimaryFactor(
      account,
      input.rememberedDeviceToken ?? null,
      context,
      now,
    );
  }

  async verifyMfa(
    input: VerifyMfaInput,
    context: RequestContext = {},
    now: Date = new Date(),
  ): Promise<AuthenticatedResult> {
    const challenge = this.readChallenge(input.challengeToken, context);

    const account = await this.repository.findAccountById(challenge.accountId);

    if (!account || account.status !== 'active' || !account.mfaEnabled) {
      this.logFlow(
        'failed',
        { accountId: challenge.accountId, reason: 'account_unavailable' },
        'mfa verification rejected',
      );
      throw unauthorized('AUTH_CHALLENGE_INVALID', 'The MFA challenge is invalid.');
    }

    if (!this.isMethodAllowed(account, challenge.method, input.method)) {
      throw badRequest(
        'AUTH_MFA_METHOD_NOT_ALLOWED',
        'This verification method is not available for the challenge.',
        { method: input.method, challengeMethod: challenge.method },
      );
    }

    // Claimed before the factor is checked so a completed challenge cannot
    // spend another code; released again when the check fails.
    const claimed = await this.repository.consumeChallenge(
      challenge.jti,
      account.id,
      challenge.expiresAt,
      now,
    );

    if (!claimed) {
      this.logFlow(
        'failed',
        { accountId: account.id, reason: 'challenge_reused' },
        'mfa verification rejected',
      );
      throw unauthorized(
        'AUTH_CHALLENGE_INVALID',
        'The MFA challenge has already been completed.',
      );
    }

    this.logFlow('mfa_verify', { accountId: account.id, method: input.method }, 'mfa verification');

    const factor = await this.mfa
      .verifySecondFactor(account, input.method, input.code, context, now)
      .catch(async (error: unknown) => {
        this.logFlow(
          'failed',
          { accountId: account.id, method: input.method },
          'mfa verification failed',
        );
        await this.repository.releaseChallenge(challenge.jti);
        throw error;
      });

    const result = await this.completeAuthentication(account, context, now, 'success');

    if (input.rememberDevice) {
      const expiresAt = new Date(now.getTime() + this.settings.rememberDeviceDays * DAY_MS);
      await this.repository.markSessionMfaVerified(result.tokens.sessionId, now, expiresAt);
      result.rememberedDevice = {
        token: this.tokens.issueRememberedDeviceToken(
          account.id,
          result.tokens.sessionId,
          expiresAt,
        ),
        expiresAt,
      };
    }

    result.backupCodesRemaining = factor.backupCodesRemaining;
    result.backupCodesLow = factor.backupCodesLow;
    return result;
  }

  /** Sends a fresh code for an outstanding email challenge. */
  async resendChallengeCode(challengeToken: string, now: Date = new Date()): Promise<ResendResult> {
    const challenge = this.readChallenge(challengeToken, {});

    if (challenge.method !== 'email') {
      throw badRequest('AUTH_MFA_METHOD_NOT_ALLOWED', 'Only email challenges can be resent.');
    }

    const account = await this.repository.findAccountById(challenge.accountId);

    if (!account || account.status !== 'active' || !account.emailMfaEnabled) {
      throw unauthorized('AUTH_CHALLENGE_INVALID', 'The MFA challenge is invalid.');
    }

    const decision = await this.ledger.checkRateLimit(account.id, 'email', now);
    if (decision.limited) {
      throw tooManyRequests(
        'AUTH_MFA_RATE_LIMITED',
        'Too many verification attempts. Try again later.',
        decision.retryAfterSeconds,
      );
    }

    return this.mfa.dispatchEmailCode(account, now);
  }

  async refresh(
    refreshToken: string,
    context: RequestContext = {},
    now: Date = new Date(),
  ): Promise<RefreshResult> {
    const rotated = await this.tokens.refresh(refreshToken, toDevice(context), now);
    return { account: rotated.account, tokens: rotated.tokens };
  }

  /**
   * Always succeeds; an unknown or already revoked token is ignored. Ends the
   * refresh token's family and forgets the remembered device presented with it.
   */
  async logout(
    refreshToken: string | null,
    rememberedDeviceToken: string | null = null,
    now: Date = new Date(),
  ) {
    const session = refreshToken
      ? await this.repository.findSessionByTokenHash(sha256(refreshToken))
      : null;

    if (session?.active) {
      await this.tokens.revoke(session, now);
      this.logger.info({ accountId: session.accountId, sessionId: session.id }, 'session closed');
    }

    if (rememberedDeviceToken) {
      const forgotten = await this.tokens.forgetRememberedDevice(
        rememberedDeviceToken,
        session?.accountId ?? null,
        now,
      );
      if (forgotten) {
        this.logger.info({ accountId: forgotten.accountId }, 'remembered device forgotten');
      }
    }
  }

  /**
   * Tombstones the account and ends every session and remembered device.
   * Accounts with a password must confirm it; federated-only accounts cannot.
   */
  async deleteAccount(
    accountId: string,
    currentPassword: string | null,
    context: RequestContext = {},
    now: Date = new Date(),
  ) {
    const account = await this.repository.findAccountById(accountId);

    if (!account) {
      throw notFound('AUTH_ACCOUNT_NOT_FOUND', 'Account is not available.');
    }

    if (account.passwordHash) {
      const check = await this.credentials.check(account, currentPassword ?? '');
      if (!check.ok) {
        await this.ledger.record(account.id, 'password', false, context, now);
        this.logger.warn({ accountId, reason: check.reason }, 'account deletion rejected');
        throw unauthorized('AUTH_INVALID_CREDENTIALS', 'Current password is incorrect.');
      }
    }

    if (!(await this.repository.softDeleteAccount(accountId, now))) {
      throw notFound('AUTH_ACCOUNT_NOT_FOUND', 'Account is not available.');
    }

    const revoked = await this.tokens.revokeAll(accountId, now);
    this.logger.info({ accountId, revoked }, 'account deleted');
  }

  async logoutAll(accountId: string, now: Date = new Date()) {
    const revoked = await this.tokens.revokeAll(accountId, now);
    this.logger.info({ accountId, revoked }, 'all sessions closed');
    return revoked;
  }

  async changePassword(
    accountId: string,
    currentPassword: string,
    newPassword: string,
    context: RequestContext = {},
    now: Date = new Date(),
  ) {
    const account = await this.repository.findAccountById(accountId);
    const check = await this.credentials.check(account, currentPassword);

    if (!check.ok) {
      if (check.account) {
        await this.ledger.record(check.account.id, 'password', false, context, now);
      }
      this.logger.warn({ accountId, reason: check.reason }, 'password change rejected');
      throw unauthorized('AUTH_INVALID_CREDENTIALS', 'Current password is incorrect.');
    }

    await this.repository.updatePasswordHash(accountId, await hashSecret(newPassword), now);
    const revoked = await this.tokens.revokeAll(accountId, now);

    await this.emailService.sendSecurityNotice({
      to: { email: check.account.email, displayName: check.account.displayName },
      event: 'password_changed',
    });

    this.logger.info({ accountId, revoked }, 'password changed');
  }

  async getAccount(accountId: string): Promise<Account> {
    const account = await this.repository.findAccountById(accountId);

    if (!account) {
      throw unauthorized('AUTH_ACCOUNT_NOT_FOUND', 'Account is not available.');
    }

    return toPublicAccount(account);
  }

  private async handleCredentialFailure(
    account: AccountWithSecrets | null,
    reason: string,
    email: string,
    context: RequestContext,
    now: Date,
  ) {
    const logContext = {
      accountId: account?.id ?? null,
      email: normalizeEmail(email),
      reason,
      ipAddress: context.ipAddress ?? null,
      userAgent: context.userAgent ?? null,
    };

    if (!account) {
      this.logFlow('failed', logContext, 'login rejected');
      return;
    }

    await this.ledger.record(account.id, 'password', false, context, now);

    if (reason === 'inactive') {
      this.logFlow('failed', logContext, 'login rejected');
      throw forbidden('AUTH_ACCOUNT_INACTIVE', 'This account is not active.');
    }

    const outcome = await this.ledger.registerPasswordFailure(account.id, now);
    this.logFlow(
      outcome.shouldLock ? 'locked' : 'failed',
      { ...logContext, failedLoginAttempts: outcome.failedLoginAttempts },
      outcome.shouldLock ? 'login rejected; account locked' : 'login rejected',
    );

    if (outcome.shouldLock) {
      await this.emailService.sendSecurityNotice({
        to: { email: account.email, displayName: account.displayName },
        event: 'account_locked',
        detail: { lockedUntil: outcome.lockedUntil?.toISOString() ?? '' },
      });
    }
  }

  private async continueAfterPrimaryFactor(
    account: AccountWithSecrets,
    rememberedDeviceToken: string | null,
    context: RequestContext,
    now: Date,
  ): Promise<LoginResult> {
    this.logFlow('credential_check', { accountId: account.id }, 'primary factor accepted');

    if (!account.mfaEnabled) {
      return this.completeAuthentication(account, context, now, 'direct_success');
    }

    const rememberedSessionId = rememberedDeviceToken
      ? await this.findRememberedSession(account, rememberedDeviceToken, now)
      : null;

    if (rememberedSessionId) {
      await this.repository.touchSession(rememberedSessionId, now);
      const result = await this.completeAuthentication(account, context, now, 'direct_success');
      result.usedRememberedDevice = true;
      return result;
    }

    const method: ChallengeMethod = account.totpEnabled ? 'totp' : 'email';
    const challenge = this.tokens.issueChallengeToken(account.id, method, now);

    if (method === 'email') {
      await this.mfa.dispatchEmailCode(account, now);
    }

    const availableMethods: MfaMethod[] =
      account.totpEnabled && account.backupCodesEncrypted ? [method, 'backup'] : [method];

    this.logFlow('mfa_pending', { accountId: account.id, method }, 'mfa challenge issued');

    return {
      type: 'mfa_challenge',
      challengeToken: challenge.token,
      method,
      availableMethods,
      expiresAt: challenge.expiresAt,
    };
  }

  /** Returns the session the device token is bound to while its MFA window is open. */
  private async findRememberedSession(account: Account, token: string, now: Date) {
    const claims = this.tokens.verifyRememberedDeviceToken(token);

    if (!claims || claims.accountId !== account.id) {
      return null;
    }

    const session = await this.repository.findSessionById(claims.sessionId);

    if (
      !session ||
      session.accountId !== account.id ||
      !session.mfaSessionExpiresAt ||
      session.mfaSessionExpiresAt.getTime() <= now.getTime()
    ) {
      return null;
    }

    return session.id;
  }

  private readChallenge(token: string, context: RequestContext) {
    try {
      return this.tokens.verifyChallengeToken(token);
    } catch (error) {
      this.logFlow(
        'failed',
        { reason: 'challenge_rejected', ipAddress: context.ipAddress ?? null },
        'mfa verification rejected',
      );
      throw error;
    }
  }

  private isMethodAllowed(
    account: AccountWithSecrets,
    challengeMethod: ChallengeMethod,
    method: MfaMethod,
  ) {
    if (method === 'backup') {
      return account.totpEnabled && account.backupCodesEncrypted !== null;
    }
    if (method !== challengeMethod) {
      return false;
    }
    return method === 'totp' ? account.totpEnabled : account.emailMfaEnabled;
  }

  private async completeAuthentication(
    account: AccountWithSecrets,
    context: RequestContext,
    now: Date,
    state: 'direct_success' | 'success',
  ): Promise<AuthenticatedResult> {
    const issued = await this.tokens.issueSession(account, toDevice(context), now);
    await this.repository.updateLastLogin(account.id, now);

    this.logFlow(state, { accountId: account.id, sessionId: issued.session.id }, 'authenticated');

    return {
      type: 'authenticated',
      account: toPublicAccount({ ...account, lastLoginAt: now }),
      tokens: issued.tokens,
      rememberedDevice: null,
      usedRememberedDevice: false,
      backupCodesRemaining: null,
      backupCodesLow: false,
    };
  }

  private logFlow(state: AuthFlowState, details: Record<string, unknown>, message: string) {
    const entry = { ...details, state };
    switch (state) {
      case 'failed':
      case 'locked':
        this.logger.warn(entry, message);
        break;
      case 'start':
      case 'credential_check':
      case 'mfa_verify':
        this.logger.debug(entry, message);
        break;
      default:
        this.logger.info(entry, message);
    }
  }
}
