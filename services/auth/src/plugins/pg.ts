import fp from 'fastify-plugin';
import type { FastifyPluginAsync } from 'fastify';
import { Pool } from 'pg';

import type { Env } from '../env';

export interface PgPluginOptions {
  env: Env;
  pool?: Pool;
}

export function createPool(env: Pick<Env, 'DATABASE_URL' | 'STORE_TIMEOUT_MS' | 'STORE_POOL_MAX'>) {
  return new Pool({
    connectionString: env.DATABASE_URL,
    max: env.STORE_POOL_MAX,
    connectionTimeoutMillis: env.STORE_TIMEOUT_MS,
    query_timeout: env.STORE_TIMEOUT_MS,
    statement_timeout: env.STORE_TIMEOUT_MS,
    idleTimeoutMillis: 30_000,
  });
}

const pgPlugin: FastifyPluginAsync<PgPluginOptions> = async (fastify, opts) => {
  const pool = opts.pool ?? createPool(opts.env);

  pool.on('error', (error) => {
    fastify.log.error({ err: error }, 'idle postgres client failed');
  });

  fastify.decorate('pg', pool);

  fastify.addHook('onClose', async () => {
    await pool.end();
  });
};

export default fp(pgPlugin, { name: 'pg-plugin' });
