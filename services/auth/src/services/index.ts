import type { BaseLogger } from 'pino';

import type { Env } from '../env';
import { SecretBox } from '../lib/encryption';
import type { AuthRepository } from '../repositories/auth-repository';
import { AttemptLedger } from './attempt-ledger';
import { AuthService } from './auth-service';
import { CredentialVerifier } from './credential-verifier';
import type { EmailService } from './email-service';
import type { IdentityVerifier } from './identity-verifier';
import { MfaService } from './mfa-service';
import { OneTimeCodeManager } from './one-time-codes';
import { TokenIssuer } from './token-issuer';

export interface AuthServicesDependencies {
  repository: AuthRepository;
  env: Env;
  emailService: EmailService;
  identityVerifier: IdentityVerifier | null;
  logger: BaseLogger;
}

export interface AuthServices {
  authService: AuthService;
  mfaService: MfaService;
  tokenIssuer: TokenIssuer;
  ledger: AttemptLedger;
  codes: OneTimeCodeManager;
  credentials: CredentialVerifier;
}

export function createAuthServices(dependencies: AuthServicesDependencies): AuthServices {
  const { repository, env, emailService, identityVerifier, logger } = dependencies;
  const secretBox = new SecretBox(env.MFA_ENCRYPTION_KEY);

  const credentials = new CredentialVerifier(repository);
  const ledger = new AttemptLedger(repository, {
    lockoutThreshold: env.LOCKOUT_THRESHOLD,
    lockoutWindowMinutes: env.LOCKOUT_WINDOW_MINUTES,
    lockoutDurationMinutes: env.LOCKOUT_DURATION_MINUTES,
    rateLimitMax: env.MFA_RATE_LIMIT_MAX,
    rateLimitWindowMinutes: env.MFA_RATE_LIMIT_WINDOW_MINUTES,
  });
  const codes = new OneTimeCodeManager(repository, secretBox, {
    emailCodeTtlMinutes: env.EMAIL_CODE_TTL_MINUTES,
  });
  const tokenIssuer = new TokenIssuer(
    repository,
    {
      accessSecret: env.JWT_ACCESS_SECRET,
      challengeSecret: env.JWT_CHALLENGE_SECRET,
      accessTokenTtlSeconds: env.ACCESS_TOKEN_TTL_SECONDS,
      refreshTokenTtlSeconds: env.REFRESH_TOKEN_TTL_SECONDS,
      challengeTtlSeconds: env.MFA_CHALLENGE_TTL_SECONDS,
    },
    logger,
  );
  const mfaService = new MfaService({
    repository,
    ledger,
    codes,
    secretBox,
    emailService,
    logger,
    totpIssuer: env.MFA_TOTP_ISSUER,
  });
  const authService = new AuthService({
    repository,
    credentials,
    ledger,
    tokens: tokenIssuer,
    mfa: mfaService,
    emailService,
    identityVerifier,
    logger,
    settings: {
      rememberDeviceDays: env.MFA_REMEMBER_DEVICE_DAYS,
      emailVerificationTtlHours: env.EMAIL_VERIFICATION_TOKEN_TTL_HOURS,
      exposeDebugTokens: !env.isProduction,
    },
  });

  return { authService, mfaService, tokenIssuer, ledger, codes, credentials };
}
