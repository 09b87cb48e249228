import Fastify from 'fastify';

import {
  redisPlugin,
  syncDbPlugin,
  loadDatabaseConfig,
  loadPipelineConfig,
} from './infrastructure/index.js';

import {
  recordRoutes,
  pipelineRoutes,
  dateRoutes,
  syncRoutes,
  healthRoutes,
} from './interfaces/http/index.js';

/**
 * Bootstrap Fastify server.
 *
 * Order:
 * 1) Pipeline config
 * 2) Infrastructure plugins
 * 3) HTTP routes
 * 4) listen()
 */
async function main(): Promise<void> {

  const fastify = Fastify({
    logger: {
      level: process.env['LOG_LEVEL'] ?? 'info',
    },
  });

  const config = loadPipelineConfig(process.env['PIPELINE_CONFIG'], fastify.log);

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(redisPlugin);
  await fastify.register(syncDbPlugin, { database: loadDatabaseConfig() });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(recordRoutes);
  await fastify.register(pipelineRoutes, { config });
  await fastify.register(dateRoutes, { timeZone: config.timeZone });
  await fastify.register(syncRoutes);
  await fastify.register(healthRoutes);

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  const host = process.env['HOST'] ?? '0.0.0.0';
  const port = Number(process.env['PORT'] ?? 3000);

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      fastify.log.info({ signal }, 'Shutting down server...');
      fastify.close().then(
        () => process.exit(0),
        (err: unknown) => {
          fastify.log.error({ err }, 'Error during shutdown');
          process.exit(1);
        },
      );
    });
  }

  await fastify.listen({
    host,
    port,
  });
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
