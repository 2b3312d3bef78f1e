import fastify from 'fastify';
import cookie from '@fastify/cookie';
import { describe, expect, it, vi } from 'vitest';

import validationPlugin from '../src/plugins/validation';
import authzPlugin from '../src/plugins/authz';
import { authRoutes } from '../src/routes/auth-routes';
import { locked } from '../src/errors';
import { buildTestEnv, createAuthServiceForTest } from './helpers';

async function buildTestApp() {
  const env = buildTestEnv();
  const context = createAuthServiceForTest();
  const app = fastify();

  app.decorate('authService', context.authService);
  app.decorate('mfaService', context.mfaService);
  app.decorate('tokenIssuer', context.tokenIssuer);

  await app.register(cookie);
  await app.register(validationPlugin);
  await app.register(authzPlugin);
  await app.register(authRoutes, {
    cookies: {
      COOKIE_DOMAIN: env.COOKIE_DOMAIN,
      COOKIE_SECURE: env.COOKIE_SECURE,
      MFA_REMEMBER_COOKIE_NAME: env.MFA_REMEMBER_COOKIE_NAME,
    },
  });
  await app.ready();

  return { app, context };
}

describe('authRoutes validation', () => {
  it('rejects payloads with missing required fields', async () => {
    const { app, context } = await buildTestApp();
    const register = vi.spyOn(context.authService, 'register');

    try {
      const response = await app.inject({
        method: 'POST',
        url: '/api/auth/register',
        payload: { password: 'Sup3rSecurePass!' },
      });

      expect(response.statusCode).toBe(422);
      const payload = response.json();
      expect(payload.error.code).toBe('VALIDATION_ERROR');
      expect(payload.error.details).toEqual([
        { path: 'email', message: 'Required', code: 'invalid_type' },
      ]);
      expect(register).not.toHaveBeenCalled();
    } finally {
      await app.close();
    }
  });

  it('rejects payloads containing unexpected keys', async () => {
    const { app, context } = await buildTestApp();
    const register = vi.spyOn(context.authService, 'register');

    try {
      const response = await app.inject({
        method: 'POST',
        url: '/api/auth/register',
        payload: {
          email: 'new@example.com',
          password: 'Sup3rSecurePass!',
          unexpected: true,
        },
      });

      expect(response.statusCode).toBe(422);
      const payload = response.json();
      expect(payload.error.details).toEqual(
        expect.arrayContaining([
          expect.objectContaining({
            code: 'unrecognized_keys',
            message: expect.stringContaining('unexpected'),
          }),
        ]),
      );
      expect(register).not.toHaveBeenCalled();
    } finally {
      await app.close();
    }
  });

  it('enforces the password policy on registration', async () => {
    const { app } = await buildTestApp();

    try {
      const response = await app.inject({
        method: 'POST',
        url: '/api/auth/register',
        payload: { email: 'new@example.com', password: 'alllowercase' },
      });

      expect(response.statusCode).toBe(422);
      const messages = response
        .json<{ error: { details: { path: string; message: string }[] } }>()
        .error.details.filter((detail) => detail.path === 'password')
        .map((detail) => detail.message);
      expect(messages).toEqual([
        'Password must include an uppercase letter',
        'Password must include a digit',
        'Password must include a symbol',
      ]);
    } finally {
      await app.close();
    }
  });

  it('only accepts known MFA methods', async () => {
    const { app, context } = await buildTestApp();
    const verifyMfa = vi.spyOn(context.authService, 'verifyMfa');

    try {
      const response = await app.inject({
        method: 'POST',
        url: '/api/auth/mfa/verify',
        payload: { challengeToken: 'challenge-token', method: 'sms', code: '123456' },
      });

      expect(response.statusCode).toBe(422);
      expect(response.json().error.details[0]).toMatchObject({
        path: 'method',
        code: 'invalid_enum_value',
      });
      expect(verifyMfa).not.toHaveBeenCalled();
    } finally {
      await app.close();
    }
  });

  it('sanitizes string payloads before calling service methods', async () => {
    const { app, context } = await buildTestApp();
    const account = await context.repository.createAccount({
      email: 'casey@example.com',
      passwordHash: null,
    });
    const verifyEmailAddress = vi
      .spyOn(context.authService, 'verifyEmailAddress')
      .mockResolvedValue(account);

    try {
      const response = await app.inject({
        method: 'POST',
        url: '/api/auth/email/verify',
        payload: { token: '  trimmed-token-value  \u0000' },
      });

      expect(response.statusCode).toBe(200);
      expect(verifyEmailAddress).toHaveBeenCalledWith('trimmed-token-value');
      expect(response.json().data.account.email).toBe('casey@example.com');
    } finally {
      await app.close();
    }
  });

  it('returns MFA challenges without session tokens', async () => {
    const { app, context } = await buildTestApp();
    const login = vi.spyOn(context.authService, 'login').mockResolvedValue({
      type: 'mfa_challenge',
      challengeToken: 'challenge-token',
      method: 'totp',
      availableMethods: ['totp', 'backup'],
      expiresAt: new Date('2026-03-02T10:05:00.000Z'),
    });

    try {
      const response = await app.inject({
        method: 'POST',
        url: '/api/auth/login',
        payload: { email: 'casey@example.com', password: 'Sup3rSecurePass!' },
        cookies: { mg_mfa_remember: 'remembered-device-token' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        data: {
          challengeToken: 'challenge-token',
          method: 'totp',
          availableMethods: ['totp', 'backup'],
          expiresAt: '2026-03-02T10:05:00.000Z',
        },
        meta: { mfaRequired: true },
      });
      expect(login).toHaveBeenCalledWith(
        {
          email: 'casey@example.com',
          password: 'Sup3rSecurePass!',
          rememberedDeviceToken: 'remembered-device-token',
        },
        expect.objectContaining({ ipAddress: '127.0.0.1', deviceLabel: null }),
      );
    } finally {
      await app.close();
    }
  });

  it('maps service errors to their status with a retry-after header', async () => {
    const { app, context } = await buildTestApp();
    vi.spyOn(context.authService, 'login').mockRejectedValue(
      locked('AUTH_ACCOUNT_LOCKED', 'Too many failed sign-in attempts. Try again later.', 900),
    );

    try {
      const response = await app.inject({
        method: 'POST',
        url: '/api/auth/login',
        payload: { email: 'casey@example.com', password: 'Sup3rSecurePass!' },
      });

      expect(response.statusCode).toBe(423);
      expect(response.headers['retry-after']).toBe('900');
      expect(response.json().error).toEqual({
        code: 'AUTH_ACCOUNT_LOCKED',
        message: 'Too many failed sign-in attempts. Try again later.',
        details: { retryAfterSeconds: 900 },
      });
    } finally {
      await app.close();
    }
  });

  it('requires a refresh token from the body or a cookie', async () => {
    const { app } = await buildTestApp();

    try {
      const response = await app.inject({
        method: 'POST',
        url: '/api/auth/refresh',
        payload: {},
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.code).toBe('AUTH_MISSING_REFRESH_TOKEN');
    } finally {
      await app.close();
    }
  });
});
