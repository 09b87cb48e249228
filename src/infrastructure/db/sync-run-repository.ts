import { randomUUID } from 'node:crypto';
import { desc } from 'drizzle-orm';
import type { Database } from './client.js';
import { syncRuns } from './schema.js';

/** Row shape returned by sync run queries. */
export type SyncRunRow = typeof syncRuns.$inferSelect;

/** Fields recorded for one run (server assigns run_id). */
export interface SyncRunInput {
  startedAt: Date;
  finishedAt: Date;
  processed: number;
  accepted: number;
  failed: number;
  merged: number;
  inserted?: number;
  updated?: number;
  syncFailed?: number;
  qualityFiltered: number;
  skipped: number;
  conflicts: number;
  averageQuality: number;
  grade: string;
}

/**
 * Inserts a sync run row.
 * Generates a UUID for run_id and returns it.
 */
export async function insertSyncRun(db: Database, run: SyncRunInput): Promise<string> {
  const runId = randomUUID();
  await db.insert(syncRuns).values({
    run_id: runId,
    started_at: run.startedAt,
    finished_at: run.finishedAt,
    processed: run.processed,
    accepted: run.accepted,
    failed: run.failed,
    merged: run.merged,
    inserted: run.inserted ?? 0,
    updated: run.updated ?? 0,
    sync_failed: run.syncFailed ?? 0,
    quality_filtered: run.qualityFiltered,
    skipped: run.skipped,
    conflicts: run.conflicts,
    average_quality: run.averageQuality,
    grade: run.grade,
  });
  return runId;
}

/** Most recent runs first (started_at DESC). */
export async function listRecentSyncRuns(db: Database, limit: number): Promise<SyncRunRow[]> {
  return db
    .select()
    .from(syncRuns)
    .orderBy(desc(syncRuns.started_at))
    .limit(limit);
}
