import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';

import { buildContext, handleServiceError, requireAccountId, serializeAccount } from './http';

const CodeSchema = z
  .object({
    code: z.string().min(6).max(16),
  })
  .strict();

export const mfaRoutes: FastifyPluginAsync = async (fastify) => {
  const authenticated = { preHandler: fastify.authenticate };

  fastify.get('/api/auth/mfa/status', authenticated, async (request, reply) => {
    try {
      const status = await fastify.mfaService.getStatus(requireAccountId(request));
      return reply.code(200).send({ data: { status }, meta: {} });
    } catch (error) {
      return handleServiceError(request, reply, error);
    }
  });

  fastify.post('/api/auth/mfa/totp/setup', authenticated, async (request, reply) => {
    try {
      const setup = await fastify.mfaService.setupTotp(requireAccountId(request));

      return reply.code(201).send({
        data: {
          secret: setup.secret,
          provisioningUri: setup.provisioningUri,
          backupCodes: setup.backupCodes,
        },
        meta: {},
      });
    } catch (error) {
      return handleServiceError(request, reply, error);
    }
  });

  fastify.post('/api/auth/mfa/totp/confirm', {
    ...authenticated,
    handler: fastify.withValidation({ body: CodeSchema }, async (request, reply) => {
      try {
        const account = await fastify.mfaService.confirmTotp(
          requireAccountId(request),
          request.validated.body.code,
          buildContext(request),
        );
        return reply.code(200).send({ data: { account: serializeAccount(account) }, meta: {} });
      } catch (error) {
        return handleServiceError(request, reply, error);
      }
    }),
  });

  fastify.post('/api/auth/mfa/totp/disable', {
    ...authenticated,
    handler: fastify.withValidation({ body: CodeSchema }, async (request, reply) => {
      try {
        const account = await fastify.mfaService.disableTotp(
          requireAccountId(request),
          request.validated.body.code,
          buildContext(request),
        );
        return reply.code(200).send({ data: { account: serializeAccount(account) }, meta: {} });
      } catch (error) {
        return handleServiceError(request, reply, error);
      }
    }),
  });

  fastify.post('/api/auth/mfa/email/setup', authenticated, async (request, reply) => {
    try {
      const account = await fastify.mfaService.setupEmailMfa(requireAccountId(request));
      return reply.code(200).send({ data: { account: serializeAccount(account) }, meta: {} });
    } catch (error) {
      return handleServiceError(request, reply, error);
    }
  });

  fastify.post('/api/auth/mfa/email/send', authenticated, async (request, reply) => {
    try {
      const dispatch = await fastify.mfaService.sendEmailCode(requireAccountId(request));

      return reply.code(202).send({
        data: { expiresAt: dispatch.expiresAt.toISOString(), delivered: dispatch.delivered },
        meta: {},
      });
    } catch (error) {
      return handleServiceError(request, reply, error);
    }
  });

  fastify.post('/api/auth/mfa/email/verify', {
    ...authenticated,
    handler: fastify.withValidation({ body: CodeSchema }, async (request, reply) => {
      try {
        await fastify.mfaService.verifyEmailCode(
          requireAccountId(request),
          request.validated.body.code,
          buildContext(request),
        );
        return reply.code(200).send({ data: { verified: true }, meta: {} });
      } catch (error) {
        return handleServiceError(request, reply, error);
      }
    }),
  });

  fastify.post('/api/auth/mfa/email/disable', authenticated, async (request, reply) => {
    try {
      const account = await fastify.mfaService.disableEmailMfa(requireAccountId(request));
      return reply.code(200).send({ data: { account: serializeAccount(account) }, meta: {} });
    } catch (error) {
      return handleServiceError(request, reply, error);
    }
  });

  fastify.post('/api/auth/mfa/backup/verify', {
    ...authenticated,
    handler: fastify.withValidation({ body: CodeSchema }, async (request, reply) => {
      try {
        const result = await fastify.mfaService.verifyBackupCode(
          requireAccountId(request),
          request.validated.body.code,
          buildContext(request),
        );
        return reply.code(200).send({
          data: { verified: true, backupCodesRemaining: result.backupCodesRemaining },
          meta: { backupCodesLow: result.backupCodesLow },
        });
      } catch (error) {
        return handleServiceError(request, reply, error);
      }
    }),
  });

  fastify.post('/api/auth/mfa/backup/regenerate', {
    ...authenticated,
    handler: fastify.withValidation({ body: CodeSchema }, async (request, reply) => {
      try {
        const backupCodes = await fastify.mfaService.regenerateBackupCodes(
          requireAccountId(request),
          request.validated.body.code,
          buildContext(request),
        );
        return reply.code(201).send({ data: { backupCodes }, meta: {} });
      } catch (error) {
        return handleServiceError(request, reply, error);
      }
    }),
  });
};
