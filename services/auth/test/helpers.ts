import pino from 'pino';
import { vi } from 'vitest';

import type { Env } from '../src/env';
import { createAuthServices } from '../src/services';
import { InMemoryAuthRepository } from './in-memory-auth-repository';
import { RecordingEmailService, StaticIdentityVerifier } from './stubs';

export const TEST_PASSWORD = 'Sup3rSecurePass!';

export function buildTestEnv(overrides: Partial<Env> = {}): Env {
  return {
    NODE_ENV: 'test',
    PORT: 4001,
    HOST: '127.0.0.1',
    LOG_LEVEL: 'silent',
    DATABASE_URL: 'postgres://localhost:5432/test',
    STORE_TIMEOUT_MS: 5_000,
    STORE_POOL_MAX: 2,
    JWT_ACCESS_SECRET: 'test-access-secret-test-access-secret',
    JWT_CHALLENGE_SECRET: 'test-challenge-secret-test-challenge',
    ACCESS_TOKEN_TTL_SECONDS: 900,
    REFRESH_TOKEN_TTL_SECONDS: 60 * 60 * 24 * 7,
    MFA_CHALLENGE_TTL_SECONDS: 300,
    EMAIL_CODE_TTL_MINUTES: 5,
    EMAIL_VERIFICATION_TOKEN_TTL_HOURS: 24,
    LOCKOUT_THRESHOLD: 5,
    LOCKOUT_WINDOW_MINUTES: 15,
    LOCKOUT_DURATION_MINUTES: 15,
    MFA_RATE_LIMIT_MAX: 3,
    MFA_RATE_LIMIT_WINDOW_MINUTES: 5,
    MFA_REMEMBER_DEVICE_DAYS: 7,
    MFA_REMEMBER_COOKIE_NAME: 'mg_mfa_remember',
    MFA_ENCRYPTION_KEY: 'AQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQE=',
    MFA_TOTP_ISSUER: 'MFA Gateway Test',
    COOKIE_DOMAIN: undefined,
    COOKIE_SECURE: false,
    RATE_LIMIT_MAX: 1_000,
    RATE_LIMIT_WINDOW_MINUTES: 1,
    APP_BASE_URL: 'http://localhost:3000',
    MAIL_FROM: 'no-reply@example.com',
    SMTP_HOST: undefined,
    SMTP_PORT: 587,
    SMTP_USER: undefined,
    SMTP_PASSWORD: undefined,
    OIDC_ISSUER: undefined,
    OIDC_AUDIENCE: undefined,
    OIDC_JWKS_URL: undefined,
    FEDERATED_PROVIDER: 'oidc',
    isProduction: false,
    ...overrides,
  };
}

export function createAuthServiceForTest(overrides: Partial<Env> = {}) {
  const env = buildTestEnv(overrides);
  const repository = new InMemoryAuthRepository();
  const emailService = new RecordingEmailService();
  const identityVerifier = new StaticIdentityVerifier();
  const logger = pino({ level: 'silent' });

  const services = createAuthServices({
    repository,
    env,
    emailService,
    identityVerifier,
    logger,
  });

  return {
    ...services,
    service: services.authService,
    repository,
    emailService,
    identityVerifier,
    env,
  };
}

export type TestContext = ReturnType<typeof createAuthServiceForTest>;

/** Registers an account and marks its email verified. */
export async function createVerifiedAccount(
  context: TestContext,
  email = 'casey@example.com',
  password = TEST_PASSWORD,
) {
  const registered = await context.service.register({ email, password, displayName: 'Casey' });
  await context.repository.markEmailVerified(registered.account.id, new Date());
  return registered.account;
}

/** Moves the faked clock forward and returns the new time. */
export function advanceClock(ms: number) {
  const next = new Date(Date.now() + ms);
  vi.setSystemTime(next);
  return next;
}

/** Runs `fn` and returns what it threw; fails when nothing was thrown. */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error to be thrown');
}
