import { Redis } from 'ioredis';
import { pino } from 'pino';
import { syncBatch } from './application/index.js';
import { todayIn } from './domain/index.js';
import {
  createDbClient,
  createSyncMappingStore,
  DryRunCalendarGateway,
  findSyncMappings,
  insertSyncRun,
  loadDatabaseConfig,
  loadPipelineConfig,
  selectSimilarityBackend,
  startConsumer,
  VenueTableGeocoder,
} from './infrastructure/index.js';

/**
 * Standalone worker process that drains raw listings from the Redis
 * Stream, runs the aggregation pipeline over each batch, pushes the
 * result to the calendar (dry-run gateway) and records the run in PostgreSQL.
 *
 * Runs independently of the Fastify HTTP server. Several instances can
 * share the consumer group when launched with different WORKER_ID values.
 */
const log = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

const redisUrl = process.env['REDIS_URL'] ?? 'redis://localhost:6379';
const batchSize = Number(process.env['WORKER_BATCH_SIZE'] ?? 200);

const redis = new Redis(redisUrl, {
  maxRetriesPerRequest: null,
  enableReadyCheck: true,
  lazyConnect: true,
});

const { sql, db } = createDbClient(loadDatabaseConfig());

// Abort controller for graceful shutdown
const ac = new AbortController();

async function main(): Promise<void> {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new Error(`WORKER_BATCH_SIZE must be a positive integer, got "${process.env['WORKER_BATCH_SIZE'] ?? ''}"`);
  }

  const config = loadPipelineConfig(process.env['PIPELINE_CONFIG'], log);
  const geocoder = new VenueTableGeocoder(config.settings.scheduler.venues);
  const backend = selectSimilarityBackend(config.similarityBackend);

  await redis.connect();
  log.info('Redis connected');

  // Tables for local dev; production runs drizzle-kit migrations.
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS sync_mappings (
      sync_key    VARCHAR(1100) PRIMARY KEY,
      remote_id   VARCHAR(255)  NOT NULL,
      title       VARCHAR(1000) NOT NULL,
      start_date  DATE          NOT NULL,
      updated_at  TIMESTAMPTZ   NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS sync_runs (
      run_id            UUID PRIMARY KEY,
      started_at        TIMESTAMPTZ NOT NULL,
      finished_at       TIMESTAMPTZ NOT NULL,
      processed         INTEGER     NOT NULL,
      accepted          INTEGER     NOT NULL,
      failed            INTEGER     NOT NULL,
      merged            INTEGER     NOT NULL,
      inserted          INTEGER     NOT NULL DEFAULT 0,
      updated           INTEGER     NOT NULL DEFAULT 0,
      sync_failed       INTEGER     NOT NULL DEFAULT 0,
      quality_filtered  INTEGER     NOT NULL,
      skipped           INTEGER     NOT NULL,
      conflicts         INTEGER     NOT NULL,
      average_quality   REAL        NOT NULL,
      grade             VARCHAR(2)  NOT NULL
    )
  `);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_sync_mappings_start_date ON sync_mappings (start_date)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_sync_runs_started_at ON sync_runs (started_at)`);

  log.info('Database ready (sync_mappings + sync_runs tables)');

  const gateway = new DryRunCalendarGateway(log);
  const store = createSyncMappingStore(db);

  await startConsumer(redis, log, ac.signal, async (records) => {
    await syncBatch(records, {
      settings: config.settings,
      today: todayIn(config.timeZone),
      log,
      geocoder,
      backend,
      minQualityScore: config.sync.minQualityScore,
      timeZone: config.timeZone,
      gateway,
      store,
      findMappings: (keys) => findSyncMappings(db, keys),
      recordRun: (run) => insertSyncRun(db, run),
    });
  }, { batchSize });
}

// Graceful shutdown on SIGINT / SIGTERM
function shutdown(): void {
  log.info('Shutting down worker...');
  ac.abort();

  // Give the in-flight batch a moment, then force exit
  setTimeout(() => {
    Promise.allSettled([redis.quit(), sql.end()]).then(() => process.exit(0), () => process.exit(1));
  }, 3000);
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main().catch((err: unknown) => {
  log.fatal({ err }, 'Worker crashed');
  process.exit(1);
});
