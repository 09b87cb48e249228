export { redisPlugin, enqueueRawRecords, decodeStreamRecord, RAW_RECORDS_STREAM } from './redis/index.js';
export {
  createDbClient,
  syncMappings,
  syncRuns,
  syncDbPlugin,
  loadDatabaseConfig,
  upsertSyncMapping,
  findSyncMappings,
  createSyncMappingStore,
  insertSyncRun,
  listRecentSyncRuns,
} from './db/index.js';
export type { Database, DatabaseConfig, SyncDbPluginOptions, SyncRunRow, SyncRunInput } from './db/index.js';
export { startConsumer } from './worker/index.js';
export type { BatchHandler, ConsumerOptions } from './worker/index.js';
export { loadPipelineConfig, mergePipelineConfig, DEFAULT_PIPELINE_CONFIG } from './config/pipeline-config.js';
export type { PipelineConfig, PipelineConfigFile } from './config/pipeline-config.js';
export { selectSimilarityBackend, diceSimilarity, SIMILARITY_BACKENDS } from './similarity/backend.js';
export type { SimilarityBackendName } from './similarity/backend.js';
export { VenueTableGeocoder } from './geocoding/venue-table-geocoder.js';
export { DryRunCalendarGateway } from './calendar/dry-run-gateway.js';
