import fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import sensible from '@fastify/sensible';
import cookie from '@fastify/cookie';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import type { Pool } from 'pg';

import { env as defaultEnv, type Env } from './env';
import pgPlugin from './plugins/pg';
import validationPlugin from './plugins/validation';
import authzPlugin from './plugins/authz';
import { PgAuthRepository } from './repositories/pg-auth-repository';
import type { AuthRepository } from './repositories/auth-repository';
import { createAuthServices } from './services';
import { SmtpEmailService, type EmailService } from './services/email-service';
import { OidcIdentityVerifier, type IdentityVerifier } from './services/identity-verifier';
import { ServiceError } from './errors';
import { authRoutes } from './routes/auth-routes';
import { mfaRoutes } from './routes/mfa-routes';

export interface BuildAppOptions {
  env?: Env;
  pool?: Pool;
  repository?: AuthRepository;
  emailService?: EmailService;
  /** `null` turns federated sign-in off regardless of configuration. */
  identityVerifier?: IdentityVerifier | null;
  logger?: FastifyServerOptions['logger'];
}

function createIdentityVerifier(env: Env): IdentityVerifier | null {
  if (!env.OIDC_ISSUER || !env.OIDC_AUDIENCE || !env.OIDC_JWKS_URL) {
    return null;
  }

  return new OidcIdentityVerifier({
    provider: env.FEDERATED_PROVIDER,
    issuer: env.OIDC_ISSUER,
    audience: env.OIDC_AUDIENCE,
    jwksUrl: env.OIDC_JWKS_URL,
    timeoutMs: env.STORE_TIMEOUT_MS,
  });
}

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const resolvedEnv = options.env ?? defaultEnv;

  const app = fastify({
    logger: options.logger ?? { level: resolvedEnv.LOG_LEVEL },
  });

  // Set before any plugin is registered so every route context inherits it.
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ServiceError) {
      request.log.warn({ err: error }, 'Handled service error');
      if (error.retryAfterSeconds !== null) {
        reply.header('Retry-After', String(error.retryAfterSeconds));
      }
      return reply.code(error.status).send({
        error: {
          code: error.code,
          message: error.message,
          details: error.details,
        },
        correlationId: request.id,
      });
    }

    if (error.statusCode && error.statusCode < 500) {
      return reply.send(error);
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.code(500).send({
      error: {
        code: 'INTERNAL_SERVER_ERROR',
        message: 'An unexpected error occurred.',
      },
      correlationId: request.id,
    });
  });

  await app.register(sensible);
  await app.register(cors, {
    origin: true,
    credentials: true,
  });
  await app.register(helmet);
  await app.register(cookie);
  await app.register(rateLimit, {
    max: resolvedEnv.RATE_LIMIT_MAX,
    timeWindow: `${resolvedEnv.RATE_LIMIT_WINDOW_MINUTES} minutes`,
  });

  let repository = options.repository;
  if (!repository) {
    await app.register(pgPlugin, { env: resolvedEnv, pool: options.pool });
    repository = new PgAuthRepository(app.pg);
  }

  const services = createAuthServices({
    repository,
    env: resolvedEnv,
    emailService: options.emailService ?? new SmtpEmailService(resolvedEnv, app.log),
    identityVerifier:
      options.identityVerifier === undefined
        ? createIdentityVerifier(resolvedEnv)
        : options.identityVerifier,
    logger: app.log,
  });

  app.decorate('authRepository', repository);
  app.decorate('authService', services.authService);
  app.decorate('mfaService', services.mfaService);
  app.decorate('tokenIssuer', services.tokenIssuer);

  await app.register(validationPlugin);
  await app.register(authzPlugin);
  await app.register(authRoutes, {
    cookies: {
      COOKIE_DOMAIN: resolvedEnv.COOKIE_DOMAIN,
      COOKIE_SECURE: resolvedEnv.COOKIE_SECURE,
      MFA_REMEMBER_COOKIE_NAME: resolvedEnv.MFA_REMEMBER_COOKIE_NAME,
    },
  });
  await app.register(mfaRoutes);

  app.get('/health', async (request, reply) => {
    try {
      await app.authRepository.ping();
      return reply.code(200).send({ status: 'ok' });
    } catch (error) {
      request.log.error({ err: error }, 'health check failed');
      return reply.code(503).send({ status: 'unavailable' });
    }
  });

  return app;
}
