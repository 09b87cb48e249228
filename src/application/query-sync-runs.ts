import type { Database, SyncRunRow } from '../infrastructure/db/index.js';
import { listRecentSyncRuns } from '../infrastructure/db/index.js';

const DEFAULT_LIMIT = 20;
const MAX_LIMIT = 100;

export interface ListSyncRunsParams {
  limit?: number;
}

export interface SyncRunList {
  data: SyncRunRow[];
  count: number;
  limit: number;
}

/**
 * Use case: list the most recent worker runs.
 * Clamps limit to [1, 100], defaults to 20.
 */
export async function listSyncRuns(db: Database, params: ListSyncRunsParams): Promise<SyncRunList> {
  const limit = Math.min(Math.max(params.limit ?? DEFAULT_LIMIT, 1), MAX_LIMIT);
  const data = await listRecentSyncRuns(db, limit);
  return { data, count: data.length, limit };
}
