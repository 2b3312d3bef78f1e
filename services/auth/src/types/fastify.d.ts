import type { FastifyReply, FastifyRequest, RouteHandlerMethod } from 'fastify';
import type { Pool } from 'pg';

import type { Account } from '../domain/models';
import type { ValidationHandler, ValidationSchemas } from '../plugins/validation';
import type { AuthRepository } from '../repositories/auth-repository';
import type { AuthService } from '../services/auth-service';
import type { MfaService } from '../services/mfa-service';
import type { TokenIssuer } from '../services/token-issuer';

declare module 'fastify' {
  interface FastifyInstance {
    pg: Pool;
    authRepository: AuthRepository;
    authService: AuthService;
    mfaService: MfaService;
    tokenIssuer: TokenIssuer;
    withValidation<T extends ValidationSchemas>(
      schemas: T,
      handler: ValidationHandler<T>,
    ): RouteHandlerMethod;
    authenticate(request: FastifyRequest, reply: FastifyReply): Promise<Account>;
  }

  interface FastifyRequest {
    account: Account | null;
    sessionId: string | null;
    validated: Record<string, unknown>;
  }
}
