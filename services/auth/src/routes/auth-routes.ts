import type { FastifyPluginAsync, FastifyReply } from 'fastify';
import { z } from 'zod';

import type { AuthenticatedResult, LoginResult } from '../services/auth-service';
import {
  REFRESH_COOKIE,
  type CookieSettings,
  buildContext,
  clearAuthCookies,
  clearRememberDeviceCookie,
  handleServiceError,
  readCookie,
  requireAccountId,
  serializeAccount,
  serializeSession,
  setAuthCookies,
  setRememberDeviceCookie,
} from './http';

const passwordSchema = z
  .string()
  .min(12, 'Password must be at least 12 characters')
  .max(128, 'Password must be at most 128 characters')
  .regex(/[A-Z]/, 'Password must include an uppercase letter')
  .regex(/[a-z]/, 'Password must include a lowercase letter')
  .regex(/[0-9]/, 'Password must include a digit')
  .regex(/[^A-Za-z0-9]/, 'Password must include a symbol');

const emailSchema = z.string().email().max(254);
const codeSchema = z.string().min(6).max(16);
const mfaMethodSchema = z.enum(['totp', 'email', 'backup']);

const RegisterSchema = z
  .object({
    email: emailSchema,
    password: passwordSchema,
    displayName: z.string().min(1).max(255).optional(),
  })
  .strict();

const LoginSchema = z
  .object({
    email: emailSchema,
    password: z.string().min(1).max(128),
    rememberedDeviceToken: z.string().min(10).optional(),
    deviceLabel: z.string().max(100).optional(),
  })
  .strict();

const FederatedLoginSchema = z
  .object({
    identityToken: z.string().min(10),
    rememberedDeviceToken: z.string().min(10).optional(),
    deviceLabel: z.string().max(100).optional(),
  })
  .strict();

const MfaVerifySchema = z
  .object({
    challengeToken: z.string().min(10),
    method: mfaMethodSchema,
    code: codeSchema,
    rememberDevice: z.boolean().optional(),
    deviceLabel: z.string().max(100).optional(),
  })
  .strict();

const MfaResendSchema = z
  .object({
    challengeToken: z.string().min(10),
  })
  .strict();

const RefreshSchema = z
  .object({
    refreshToken: z.string().optional(),
  })
  .strict();

const LogoutSchema = z
  .object({
    refreshToken: z.string().optional(),
    rememberedDeviceToken: z.string().optional(),
  })
  .strict();

const DeleteAccountSchema = z
  .object({
    currentPassword: z.string().min(1).max(128).optional(),
  })
  .strict();

const VerifyEmailSchema = z
  .object({
    token: z.string().min(10),
  })
  .strict();

const ChangePasswordSchema = z
  .object({
    currentPassword: z.string().min(1).max(128),
    newPassword: passwordSchema,
  })
  .strict()
  .refine((data) => data.currentPassword !== data.newPassword, {
    message: 'New password must differ from the current password',
    path: ['newPassword'],
  });

export interface AuthRoutesOptions {
  cookies: CookieSettings;
}

export const authRoutes: FastifyPluginAsync<AuthRoutesOptions> = async (fastify, opts) => {
  const { cookies } = opts;

  function sendLoginResult(reply: FastifyReply, result: LoginResult) {
    if (result.type === 'authenticated') {
      return sendAuthenticated(reply, result);
    }

    clearAuthCookies(reply, cookies);

    return reply.code(200).send({
      data: {
        challengeToken: result.challengeToken,
        method: result.method,
        availableMethods: result.availableMethods,
        expiresAt: result.expiresAt.toISOString(),
      },
      meta: {
        mfaRequired: true,
      },
    });
  }

  function sendAuthenticated(reply: FastifyReply, result: AuthenticatedResult) {
    setAuthCookies(reply, cookies, result.tokens);
    if (result.rememberedDevice) {
      setRememberDeviceCookie(reply, cookies, result.rememberedDevice);
    }

    return reply.code(200).send({
      data: {
        account: serializeAccount(result.account),
        session: serializeSession(result.tokens),
        rememberedDevice: result.rememberedDevice
          ? {
              token: result.rememberedDevice.token,
              expiresAt: result.rememberedDevice.expiresAt.toISOString(),
            }
          : null,
        backupCodesRemaining: result.backupCodesRemaining,
      },
      meta: {
        mfaRequired: false,
        usedRememberedDevice: result.usedRememberedDevice,
        backupCodesLow: result.backupCodesLow,
      },
    });
  }

  fastify.post(
    '/api/auth/register',
    fastify.withValidation({ body: RegisterSchema }, async (request, reply) => {
      const { body } = request.validated;

      try {
        const result = await fastify.authService.register(body);

        return reply.code(201).send({
          data: {
            account: serializeAccount(result.account),
            emailVerificationRequired: result.emailVerificationRequired,
            debug: result.debug,
          },
          meta: {},
        });
      } catch (error) {
        return handleServiceError(request, reply, error);
      }
    }),
  );

  fastify.post(
    '/api/auth/login',
    fastify.withValidation({ body: LoginSchema }, async (request, reply) => {
      const { body } = request.validated;

      try {
        const result = await fastify.authService.login(
          {
            email: body.email,
            password: body.password,
            rememberedDeviceToken:
              body.rememberedDeviceToken ?? readCookie(request, cookies.MFA_REMEMBER_COOKIE_NAME),
          },
          buildContext(request, body.deviceLabel),
        );

        return sendLoginResult(reply, result);
      } catch (error) {
        return handleServiceError(request, reply, error);
      }
    }),
  );

  fastify.post(
    '/api/auth/federated',
    fastify.withValidation({ body: FederatedLoginSchema }, async (request, reply) => {
      const { body } = request.validated;

      try {
        const result = await fastify.authService.federatedLogin(
          {
            identityToken: body.identityToken,
            rememberedDeviceToken:
              body.rememberedDeviceToken ?? readCookie(request, cookies.MFA_REMEMBER_COOKIE_NAME),
          },
          buildContext(request, body.deviceLabel),
        );

        return sendLoginResult(reply, result);
      } catch (error) {
        return handleServiceError(request, reply, error);
      }
    }),
  );

  fastify.post(
    '/api/auth/mfa/verify',
    fastify.withValidation({ body: MfaVerifySchema }, async (request, reply) => {
      const { body } = request.validated;

      try {
        const result = await fastify.authService.verifyMfa(
          {
            challengeToken: body.challengeToken,
            method: body.method,
            code: body.code,
            rememberDevice: body.rememberDevice,
          },
          buildContext(request, body.deviceLabel),
        );

        return sendAuthenticated(reply, result);
      } catch (error) {
        return handleServiceError(request, reply, error);
      }
    }),
  );

  fastify.post(
    '/api/auth/mfa/resend',
    fastify.withValidation({ body: MfaResendSchema }, async (request, reply) => {
      const { body } = request.validated;

      try {
        const result = await fastify.authService.resendChallengeCode(body.challengeToken);

        return reply.code(202).send({
          data: {
            expiresAt: result.expiresAt.toISOString(),
            delivered: result.delivered,
          },
          meta: {},
        });
      } catch (error) {
        return handleServiceError(request, reply, error);
      }
    }),
  );

  fastify.post(
    '/api/auth/refresh',
    fastify.withValidation({ body: RefreshSchema }, async (request, reply) => {
      const { body } = request.validated;
      const refreshToken = body.refreshToken ?? readCookie(request, REFRESH_COOKIE);

      if (!refreshToken) {
        return reply.code(400).send({
          error: {
            code: 'AUTH_MISSING_REFRESH_TOKEN',
            message: 'Refresh token not provided.',
            details: null,
          },
          correlationId: request.id,
        });
      }

      try {
        const result = await fastify.authService.refresh(refreshToken, buildContext(request));
        setAuthCookies(reply, cookies, result.tokens);

        return reply.code(200).send({
          data: {
            account: serializeAccount(result.account),
            session: serializeSession(result.tokens),
          },
          meta: {},
        });
      } catch (error) {
        clearAuthCookies(reply, cookies);
        return handleServiceError(request, reply, error);
      }
    }),
  );

  fastify.post(
    '/api/auth/logout',
    fastify.withValidation({ body: LogoutSchema }, async (request, reply) => {
      const { body } = request.validated;
      const refreshToken = body.refreshToken ?? readCookie(request, REFRESH_COOKIE);
      const rememberedDeviceToken =
        body.rememberedDeviceToken ?? readCookie(request, cookies.MFA_REMEMBER_COOKIE_NAME);

      try {
        await fastify.authService.logout(refreshToken, rememberedDeviceToken);
      } catch (error) {
        request.log.warn({ err: error }, 'logout could not revoke the session');
      }

      clearAuthCookies(reply, cookies);
      clearRememberDeviceCookie(reply, cookies);
      return reply.code(204).send();
    }),
  );

  fastify.post(
    '/api/auth/logout-all',
    { preHandler: fastify.authenticate },
    async (request, reply) => {
      try {
        const revoked = await fastify.authService.logoutAll(requireAccountId(request));
        clearAuthCookies(reply, cookies);
        clearRememberDeviceCookie(reply, cookies);

        return reply.code(200).send({ data: { revokedSessions: revoked }, meta: {} });
      } catch (error) {
        return handleServiceError(request, reply, error);
      }
    },
  );

  fastify.post(
    '/api/auth/email/verify',
    fastify.withValidation({ body: VerifyEmailSchema }, async (request, reply) => {
      const { body } = request.validated;

      try {
        const account = await fastify.authService.verifyEmailAddress(body.token);

        return reply.code(200).send({
          data: { account: serializeAccount(account) },
          meta: {},
        });
      } catch (error) {
        return handleServiceError(request, reply, error);
      }
    }),
  );

  fastify.post(
    '/api/auth/password/change',
    {
      preHandler: fastify.authenticate,
      handler: fastify.withValidation({ body: ChangePasswordSchema }, async (request, reply) => {
        const { body } = request.validated;

        try {
          await fastify.authService.changePassword(
            requireAccountId(request),
            body.currentPassword,
            body.newPassword,
            buildContext(request),
          );
          clearAuthCookies(reply, cookies);
          clearRememberDeviceCookie(reply, cookies);

          return reply.code(204).send();
        } catch (error) {
          return handleServiceError(request, reply, error);
        }
      }),
    },
  );

  fastify.delete(
    '/api/auth/account',
    {
      preHandler: fastify.authenticate,
      handler: fastify.withValidation({ body: DeleteAccountSchema }, async (request, reply) => {
        const { body } = request.validated;

        try {
          await fastify.authService.deleteAccount(
            requireAccountId(request),
            body.currentPassword ?? null,
            buildContext(request),
          );
          clearAuthCookies(reply, cookies);
          clearRememberDeviceCookie(reply, cookies);

          return reply.code(204).send();
        } catch (error) {
          return handleServiceError(request, reply, error);
        }
      }),
    },
  );

  fastify.get('/api/auth/me', { preHandler: fastify.authenticate }, async (request, reply) => {
    try {
      const account = await fastify.authService.getAccount(requireAccountId(request));
      return reply.code(200).send({ data: { account: serializeAccount(account) }, meta: {} });
    } catch (error) {
      return handleServiceError(request, reply, error);
    }
  });
};
