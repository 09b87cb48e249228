import { inArray } from 'drizzle-orm';
import type { SyncMapping, SyncMappingStore } from '../../application/index.js';
import type { Database } from './client.js';
import { syncMappings } from './schema.js';

/**
 * Inserts or refreshes the mapping from a record's sync key to the remote
 * calendar event id. ON CONFLICT on the key updates the existing row.
 */
export async function upsertSyncMapping(db: Database, mapping: SyncMapping): Promise<void> {
  const now = new Date();
  await db
    .insert(syncMappings)
    .values({
      sync_key: mapping.syncKey,
      remote_id: mapping.remoteId,
      title: mapping.title,
      start_date: mapping.startDate,
      updated_at: now,
    })
    .onConflictDoUpdate({
      target: syncMappings.sync_key,
      set: {
        remote_id: mapping.remoteId,
        title: mapping.title,
        start_date: mapping.startDate,
        updated_at: now,
      },
    });
}

/**
 * Looks up remote ids for the given sync keys.
 * Keys with no stored mapping are absent from the returned map.
 */
export async function findSyncMappings(db: Database, keys: readonly string[]): Promise<Map<string, string>> {
  if (keys.length === 0) return new Map();

  const rows = await db
    .select({ sync_key: syncMappings.sync_key, remote_id: syncMappings.remote_id })
    .from(syncMappings)
    .where(inArray(syncMappings.sync_key, [...keys]));

  return new Map(rows.map((row) => [row.sync_key, row.remote_id]));
}

/** SyncMappingStore over the `sync_mappings` table. */
export function createSyncMappingStore(db: Database): SyncMappingStore {
  return {
    save: (mapping) => upsertSyncMapping(db, mapping),
  };
}
