import type { FastifyReply, FastifyRequest } from 'fastify';
import type { CookieSerializeOptions } from '@fastify/cookie';

import type { Env } from '../env';
import type { Account } from '../domain/models';
import type { RequestContext } from '../services/auth-service';
import type { AuthTokens } from '../services/token-issuer';
import { ServiceError, unauthorized } from '../errors';
import { ACCESS_COOKIE } from '../plugins/authz';

export const REFRESH_COOKIE = 'mg_refresh';

export type CookieSettings = Pick<
  Env,
  'COOKIE_DOMAIN' | 'COOKIE_SECURE' | 'MFA_REMEMBER_COOKIE_NAME'
>;

export function buildContext(request: FastifyRequest, deviceLabel?: string | null): RequestContext {
  const userAgent = request.headers['user-agent'];
  return {
    ipAddress: request.ip,
    userAgent: typeof userAgent === 'string' ? userAgent : null,
    deviceLabel: deviceLabel ?? null,
  };
}

export function serializeAccount(account: Account) {
  return {
    id: account.id,
    email: account.email,
    displayName: account.displayName,
    status: account.status,
    emailVerified: account.emailVerified,
    mfaEnabled: account.mfaEnabled,
    totpEnabled: account.totpEnabled,
    emailMfaEnabled: account.emailMfaEnabled,
    federatedProvider: account.federatedProvider,
    lastLoginAt: account.lastLoginAt ? account.lastLoginAt.toISOString() : null,
    createdAt: account.createdAt.toISOString(),
  };
}

export function serializeSession(tokens: AuthTokens) {
  return {
    sessionId: tokens.sessionId,
    accessToken: tokens.accessToken,
    accessTokenExpiresAt: tokens.accessTokenExpiresAt.toISOString(),
    refreshToken: tokens.refreshToken,
    refreshTokenExpiresAt: tokens.refreshTokenExpiresAt.toISOString(),
  };
}

function cookieOptions(settings: CookieSettings): CookieSerializeOptions {
  return {
    httpOnly: true,
    sameSite: 'lax',
    secure: settings.COOKIE_SECURE,
    domain: settings.COOKIE_DOMAIN,
    path: '/',
  };
}

function secondsUntil(date: Date) {
  return Math.max(1, Math.floor((date.getTime() - Date.now()) / 1000));
}

export function setAuthCookies(reply: FastifyReply, settings: CookieSettings, tokens: AuthTokens) {
  reply.setCookie(ACCESS_COOKIE, tokens.accessToken, {
    ...cookieOptions(settings),
    maxAge: secondsUntil(tokens.accessTokenExpiresAt),
  });
  reply.setCookie(REFRESH_COOKIE, tokens.refreshToken, {
    ...cookieOptions(settings),
    maxAge: secondsUntil(tokens.refreshTokenExpiresAt),
  });
}

export function setRememberDeviceCookie(
  reply: FastifyReply,
  settings: CookieSettings,
  remembered: { token: string; expiresAt: Date },
) {
  reply.setCookie(settings.MFA_REMEMBER_COOKIE_NAME, remembered.token, {
    ...cookieOptions(settings),
    expires: remembered.expiresAt,
  });
}

export function clearAuthCookies(reply: FastifyReply, settings: CookieSettings) {
  reply.clearCookie(ACCESS_COOKIE, cookieOptions(settings));
  reply.clearCookie(REFRESH_COOKIE, cookieOptions(settings));
}

export function clearRememberDeviceCookie(reply: FastifyReply, settings: CookieSettings) {
  reply.clearCookie(settings.MFA_REMEMBER_COOKIE_NAME, cookieOptions(settings));
}

export function readCookie(request: FastifyRequest, name: string) {
  const value = request.cookies?.[name];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

export function requireAccountId(request: FastifyRequest) {
  if (!request.account) {
    throw unauthorized('AUTH_UNAUTHORIZED', 'Authentication required.');
  }
  return request.account.id;
}

export function handleServiceError(request: FastifyRequest, reply: FastifyReply, error: unknown) {
  if (error instanceof ServiceError) {
    if (error.retryAfterSeconds !== null) {
      reply.header('Retry-After', String(error.retryAfterSeconds));
    }
    if (error.status >= 500) {
      request.log.error({ err: error }, 'service dependency failed');
    }
    reply.code(error.status).send({
      error: {
        code: error.code,
        message: error.message,
        details: error.details ?? null,
      },
      correlationId: request.id,
    });
    return reply;
  }
  throw error;
}
