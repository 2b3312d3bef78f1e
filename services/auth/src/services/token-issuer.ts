import crypto from 'node:crypto';
import jwt from 'jsonwebtoken';
import type { BaseLogger } from 'pino';
import { z } from 'zod';

import type { Account, ChallengeMethod, DeviceInfo, SessionRecord } from '../domain/models';
import { toPublicAccount } from '../domain/models';
import type { AuthRepository, CreateSessionInput } from '../repositories/auth-repository';
import { forbidden, gone, unauthorized } from '../errors';
import { randomToken, sha256 } from '../lib/hashing';

const TOKEN_ISSUER = 'mfa-gateway-auth';
const ACCESS_TOKEN_AUDIENCE = 'mfa-gateway-api';
const CHALLENGE_AUDIENCE = 'mfa-gateway-challenge';
const REMEMBERED_DEVICE_AUDIENCE = 'mfa-gateway-device';
const REFRESH_TOKEN_BYTES = 48;

const AccessClaimsSchema = z.object({
  sub: z.string().uuid(),
  email: z.string(),
  sid: z.string().uuid(),
  typ: z.literal('access'),
});

const ChallengeClaimsSchema = z.object({
  sub: z.string().uuid(),
  typ: z.literal('mfa_challenge'),
  method: z.enum(['totp', 'email']),
  jti: z.string().uuid(),
  exp: z.number().int(),
});

const RememberedDeviceClaimsSchema = z.object({
  sub: z.string().uuid(),
  sid: z.string().uuid(),
  typ: z.literal('mfa_session'),
});

export interface TokenIssuerOptions {
  accessSecret: string;
  challengeSecret: string;
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
  challengeTtlSeconds: number;
}

export interface AccessTokenClaims {
  accountId: string;
  email: string;
  sessionId: string;
}

export interface ChallengeClaims {
  accountId: string;
  method: ChallengeMethod;
  jti: string;
  expiresAt: Date;
}

export interface RememberedDeviceClaims {
  accountId: string;
  sessionId: string;
}

export interface AuthTokens {
  accessToken: string;
  accessTokenExpiresAt: Date;
  refreshToken: string;
  refreshTokenExpiresAt: Date;
  sessionId: string;
}

export interface IssuedSession {
  tokens: AuthTokens;
  session: SessionRecord;
}

export interface IssuedRefreshToken {
  refreshToken: string;
  session: SessionRecord;
}

export interface IssuedChallenge {
  token: string;
  jti: string;
  expiresAt: Date;
}

export class TokenIssuer {
  constructor(
    private readonly repository: AuthRepository,
    private readonly options: TokenIssuerOptions,
    private readonly logger: BaseLogger,
  ) {}

  issueAccessToken(
    account: Pick<Account, 'id' | 'email'>,
    sessionId: string,
    now: Date = new Date(),
  ) {
    const expiresAt = new Date(now.getTime() + this.options.accessTokenTtlSeconds * 1000);
    const token = jwt.sign(
      {
        email: account.email,
        sid: sessionId,
        typ: 'access',
        iat: Math.floor(now.getTime() / 1000),
        exp: Math.floor(expiresAt.getTime() / 1000),
      },
      this.options.accessSecret,
      {
        algorithm: 'HS256',
        subject: account.id,
        issuer: TOKEN_ISSUER,
        audience: ACCESS_TOKEN_AUDIENCE,
      },
    );

    return { token, expiresAt };
  }

  verifyAccessToken(token: string): AccessTokenClaims {
    const claims = this.decode(
      token,
      this.options.accessSecret,
      ACCESS_TOKEN_AUDIENCE,
      AccessClaimsSchema,
      null,
    );

    if (!claims) {
      throw unauthorized('AUTH_ACCESS_TOKEN_INVALID', 'Access token is invalid or expired.');
    }

    return { accountId: claims.sub, email: claims.email, sessionId: claims.sid };
  }

  async issueRefreshToken(
    accountId: string,
    device: DeviceInfo = {},
    familyId: string | null = null,
    now: Date = new Date(),
  ): Promise<IssuedRefreshToken> {
    const refreshToken = randomToken(REFRESH_TOKEN_BYTES);
    const session = await this.repository.createSession(
      this.buildSessionInput(accountId, refreshToken, device, familyId, now),
    );

    return { refreshToken, session };
  }

  async issueSession(
    account: Pick<Account, 'id' | 'email'>,
    device: DeviceInfo = {},
    now: Date = new Date(),
  ): Promise<IssuedSession> {
    const { refreshToken, session } = await this.issueRefreshToken(account.id, device, null, now);
    return { tokens: this.bundle(account, refreshToken, session, now), session };
  }

  /**
   * Rotates a refresh token. Presenting a token whose session was already
   * rotated revokes every session in its family.
   */
  async refresh(
    refreshToken: string,
    device: DeviceInfo = {},
    now: Date = new Date(),
  ): Promise<IssuedSession & { account: Account }> {
    const session = await this.repository.findSessionByTokenHash(sha256(refreshToken));

    if (!session) {
      throw invalidRefreshToken();
    }

    if (!session.active) {
      if (session.replacedBySessionId) {
        const revoked = await this.repository.deactivateSessionFamily(session.familyId, now);
        this.logger.warn(
          { accountId: session.accountId, familyId: session.familyId, revoked },
          'refresh token reuse detected; session family revoked',
        );
      }
      throw invalidRefreshToken();
    }

    if (session.expiresAt.getTime() <= now.getTime()) {
      await this.repository.deactivateSession(session.id, now);
      throw invalidRefreshToken();
    }

    const account = await this.repository.findAccountById(session.accountId);

    if (!account || account.status !== 'active') {
      await this.repository.deactivateSession(session.id, now);
      throw forbidden('AUTH_ACCOUNT_INACTIVE', 'This account is not active.');
    }

    const nextToken = randomToken(REFRESH_TOKEN_BYTES);
    const rotated = await this.repository.rotateSession(
      session.id,
      this.buildSessionInput(
        account.id,
        nextToken,
        {
          ipAddress: device.ipAddress ?? session.ipAddress,
          userAgent: device.userAgent ?? session.userAgent,
          label: device.label ?? session.deviceLabel,
        },
        session.familyId,
        now,
      ),
      now,
    );

    if (!rotated) {
      throw invalidRefreshToken();
    }

    return {
      tokens: this.bundle(account, nextToken, rotated, now),
      session: rotated,
      account: toPublicAccount(account),
    };
  }

  /**
   * Ends the session's whole family, so the sessions it was rotated from lose
   * their remembered-device window as well.
   */
  revoke(session: Pick<SessionRecord, 'familyId'>, now: Date = new Date()) {
    return this.repository.deactivateSessionFamily(session.familyId, now);
  }

  revokeAll(accountId: string, now: Date = new Date()) {
    return this.repository.deactivateSessionsForAccount(accountId, now);
  }

  issueChallengeToken(
    accountId: string,
    method: ChallengeMethod,
    now: Date = new Date(),
  ): IssuedChallenge {
    const jti = crypto.randomUUID();
    const expiresAt = new Date(now.getTime() + this.options.challengeTtlSeconds * 1000);
    const token = jwt.sign(
      {
        typ: 'mfa_challenge',
        method,
        iat: Math.floor(now.getTime() / 1000),
        exp: Math.floor(expiresAt.getTime() / 1000),
      },
      this.options.challengeSecret,
      {
        algorithm: 'HS256',
        subject: accountId,
        jwtid: jti,
        issuer: TOKEN_ISSUER,
        audience: CHALLENGE_AUDIENCE,
      },
    );

    return { token, jti, expiresAt };
  }

  verifyChallengeToken(token: string): ChallengeClaims {
    const claims = this.decode(
      token,
      this.options.challengeSecret,
      CHALLENGE_AUDIENCE,
      ChallengeClaimsSchema,
      'AUTH_CHALLENGE_EXPIRED',
    );

    if (!claims) {
      throw unauthorized('AUTH_CHALLENGE_INVALID', 'The MFA challenge is invalid.');
    }

    return {
      accountId: claims.sub,
      method: claims.method,
      jti: claims.jti,
      expiresAt: new Date(claims.exp * 1000),
    };
  }

  issueRememberedDeviceToken(accountId: string, sessionId: string, expiresAt: Date) {
    return jwt.sign(
      {
        sid: sessionId,
        typ: 'mfa_session',
        exp: Math.floor(expiresAt.getTime() / 1000),
      },
      this.options.challengeSecret,
      {
        algorithm: 'HS256',
        subject: accountId,
        issuer: TOKEN_ISSUER,
        audience: REMEMBERED_DEVICE_AUDIENCE,
      },
    );
  }

  /** Returns null for anything that is not a live, well-formed device token. */
  verifyRememberedDeviceToken(token: string): RememberedDeviceClaims | null {
    const claims = this.decode(
      token,
      this.options.challengeSecret,
      REMEMBERED_DEVICE_AUDIENCE,
      RememberedDeviceClaimsSchema,
      null,
    );
    return claims ? { accountId: claims.sub, sessionId: claims.sid } : null;
  }

  /**
   * Closes the remembered-device window the token points at. With
   * `expectedAccountId` set, a token issued to another account is ignored.
   */
  async forgetRememberedDevice(
    token: string,
    expectedAccountId: string | null,
    now: Date = new Date(),
  ): Promise<RememberedDeviceClaims | null> {
    const claims = this.verifyRememberedDeviceToken(token);

    if (!claims || (expectedAccountId !== null && claims.accountId !== expectedAccountId)) {
      return null;
    }

    const session = await this.repository.findSessionById(claims.sessionId);

    if (!session || session.accountId !== claims.accountId) {
      return null;
    }

    await this.repository.deactivateSessionFamily(session.familyId, now);
    return claims;
  }

  private bundle(
    account: Pick<Account, 'id' | 'email'>,
    refreshToken: string,
    session: SessionRecord,
    now: Date,
  ): AuthTokens {
    const access = this.issueAccessToken(account, session.id, now);
    return {
      accessToken: access.token,
      accessTokenExpiresAt: access.expiresAt,
      refreshToken,
      refreshTokenExpiresAt: session.expiresAt,
      sessionId: session.id,
    };
  }

  private buildSessionInput(
    accountId: string,
    refreshToken: string,
    device: DeviceInfo,
    familyId: string | null,
    now: Date,
  ): CreateSessionInput {
    return {
      id: crypto.randomUUID(),
      accountId,
      familyId: familyId ?? crypto.randomUUID(),
      tokenHash: sha256(refreshToken),
      expiresAt: new Date(now.getTime() + this.options.refreshTokenTtlSeconds * 1000),
      ipAddress: device.ipAddress ?? null,
      userAgent: device.userAgent ?? null,
      deviceLabel: device.label ?? null,
      createdAt: now,
    };
  }

  /**
   * Verifies signature, issuer and audience, then validates the claim shape.
   * Returns null for a bad token; an expired one throws `gone(expiredCode)`
   * when a code is given.
   */
  private decode<T>(
    token: string,
    secret: string,
    audience: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    expiredCode: string | null,
  ): T | null {
    let payload: string | jwt.JwtPayload;

    try {
      payload = jwt.verify(token, secret, {
        algorithms: ['HS256'],
        issuer: TOKEN_ISSUER,
        audience,
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError && expiredCode) {
        throw gone(expiredCode, 'The token has expired.');
      }
      if (error instanceof jwt.JsonWebTokenError) {
        return null;
      }
      throw error;
    }

    const parsed = schema.safeParse(payload);
    return parsed.success ? parsed.data : null;
  }
}

function invalidRefreshToken() {
  return unauthorized('AUTH_REFRESH_TOKEN_INVALID', 'Refresh token is invalid or expired.');
}
