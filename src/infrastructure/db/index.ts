export { syncMappings, syncRuns } from './schema.js';
export { createDbClient } from './client.js';
export type { Database } from './client.js';
export { upsertSyncMapping, findSyncMappings, createSyncMappingStore } from './sync-mapping-repository.js';
export { insertSyncRun, listRecentSyncRuns } from './sync-run-repository.js';
export type { SyncRunRow, SyncRunInput } from './sync-run-repository.js';
export { default as syncDbPlugin } from './db-plugin.js';
export type { SyncDbPluginOptions } from './db-plugin.js';
export { loadDatabaseConfig } from './database-config.js';
export type { DatabaseConfig } from './database-config.js';
