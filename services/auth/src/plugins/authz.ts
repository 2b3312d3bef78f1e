import fp from 'fastify-plugin';
import type { FastifyPluginAsync, FastifyRequest } from 'fastify';

import { ServiceError, forbidden, unauthorized } from '../errors';
import type { AccessTokenClaims } from '../services/token-issuer';

export const ACCESS_COOKIE = 'mg_session';

function extractBearerToken(request: FastifyRequest) {
  const header = request.headers.authorization;
  if (typeof header === 'string') {
    const match = /^Bearer\s+(.+)$/i.exec(header);
    if (match) {
      return match[1].trim();
    }
  }

  const cookieToken = request.cookies?.[ACCESS_COOKIE];
  return typeof cookieToken === 'string' && cookieToken.length > 0 ? cookieToken : null;
}

const authzPlugin: FastifyPluginAsync = async (fastify) => {
  fastify.decorateRequest('account', null);
  fastify.decorateRequest('sessionId', null);

  fastify.decorate('authenticate', async function authenticate(request: FastifyRequest) {
    const token = extractBearerToken(request);

    if (!token) {
      throw unauthorized('AUTH_UNAUTHORIZED', 'Authentication required.');
    }

    let claims: AccessTokenClaims;
    try {
      claims = fastify.tokenIssuer.verifyAccessToken(token);
    } catch (error) {
      if (error instanceof ServiceError) {
        throw unauthorized('AUTH_UNAUTHORIZED', 'Authentication required.');
      }
      throw error;
    }

    const account = await fastify.authService
      .getAccount(claims.accountId)
      .catch((error: unknown) => {
        if (error instanceof ServiceError && error.status === 401) {
          return null;
        }
        throw error;
      });

    if (!account) {
      throw unauthorized('AUTH_UNAUTHORIZED', 'Authentication required.');
    }

    if (account.status !== 'active') {
      throw forbidden('AUTH_ACCOUNT_INACTIVE', 'This account is not active.');
    }

    request.account = account;
    request.sessionId = claims.sessionId;
    return account;
  });
};

export default fp(authzPlugin, { name: 'authz-plugin' });
