import { createRemoteJWKSet, errors, jwtVerify } from 'jose';
import type { JWTVerifyGetKey } from 'jose';
import { z } from 'zod';

import { serviceUnavailable, unauthorized } from '../errors';

export interface VerifiedIdentity {
  provider: string;
  subject: string;
  email: string;
  emailVerified: boolean;
  name: string | null;
}

export interface IdentityVerifier {
  verify(identityToken: string): Promise<VerifiedIdentity>;
}

export interface OidcVerifierOptions {
  provider: string;
  issuer: string;
  audience: string;
  jwksUrl: string;
  timeoutMs: number;
}

const IdentityClaimsSchema = z.object({
  sub: z.string().min(1),
  email: z.string().email(),
  email_verified: z.union([z.boolean(), z.enum(['true', 'false'])]).optional(),
  name: z.string().optional(),
});

export class OidcIdentityVerifier implements IdentityVerifier {
  private readonly keys: JWTVerifyGetKey;

  constructor(
    private readonly options: OidcVerifierOptions,
    keys?: JWTVerifyGetKey,
  ) {
    this.keys =
      keys ??
      createRemoteJWKSet(new URL(options.jwksUrl), { timeoutDuration: options.timeoutMs });
  }

  async verify(identityToken: string): Promise<VerifiedIdentity> {
    let payload: unknown;

    try {
      ({ payload } = await jwtVerify(identityToken, this.keys, {
        issuer: this.options.issuer,
        audience: this.options.audience,
      }));
    } catch (error) {
      if (error instanceof errors.JWKSTimeout) {
        throw serviceUnavailable(
          'IDENTITY_PROVIDER_UNAVAILABLE',
          'The identity provider could not be reached.',
        );
      }
      if (error instanceof errors.JOSEError) {
        throw unauthorized('AUTH_FEDERATED_TOKEN_INVALID', 'Identity token is invalid.');
      }
      throw error;
    }

    const claims = IdentityClaimsSchema.safeParse(payload);

    if (!claims.success) {
      throw unauthorized('AUTH_FEDERATED_TOKEN_INVALID', 'Identity token is missing claims.');
    }

    return {
      provider: this.options.provider,
      subject: claims.data.sub,
      email: claims.data.email,
      emailVerified:
        claims.data.email_verified === true || claims.data.email_verified === 'true',
      name: claims.data.name ?? null,
    };
  }
}
