import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { createDbClient } from './client.js';
import type { Database } from './client.js';
import type { DatabaseConfig } from './database-config.js';

export interface SyncDbPluginOptions {
  readonly database: DatabaseConfig;
}

/**
 * Owns the pool behind the sync run queries: decorates `fastify.syncDb`
 * and ends the pool when the server closes.
 */
async function syncDbPlugin(fastify: FastifyInstance, opts: SyncDbPluginOptions): Promise<void> {
  const { sql, db } = createDbClient(opts.database);
  fastify.decorate('syncDb', db);

  fastify.log.info({ poolMax: opts.database.poolMax }, 'Sync database pool configured');

  fastify.addHook('onClose', async () => {
    await sql.end();
    fastify.log.info('Sync database pool closed');
  });
}

export default fp(syncDbPlugin, {
  name: 'sync-db',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    syncDb: Database;
  }
}
