import { syncKey } from '../domain/index.js';
import type { SyncRunInput } from '../infrastructure/db/index.js';
import { applySyncPlan, planCalendarSync } from './calendar-sync.js';
import type { CalendarGateway, SyncMappingStore, SyncOutcome, SyncPlan } from './calendar-sync.js';
import { processBatch } from './pipeline.js';
import type { BatchDeps } from './pipeline.js';

export interface SyncBatchDeps extends BatchDeps {
  readonly minQualityScore: number;
  readonly timeZone: string;
  readonly gateway: CalendarGateway;
  readonly store: SyncMappingStore;
  /** Known remote ids by sync key. */
  readonly findMappings: (keys: readonly string[]) => Promise<ReadonlyMap<string, string>>;
  /** Persists the run and returns its id. */
  readonly recordRun: (run: SyncRunInput) => Promise<string>;
  readonly nowFn?: () => Date;
}

export interface SyncBatchResult {
  readonly runId: string;
  readonly plan: SyncPlan;
  readonly sync: SyncOutcome;
}

/**
 * Use case behind the worker: run the pipeline over one stream batch,
 * push the surviving events to the calendar and record the run.
 *
 * Returns null when nothing survived ingestion; no run is recorded then.
 */
export async function syncBatch(raw: readonly unknown[], deps: SyncBatchDeps): Promise<SyncBatchResult | null> {
  const { log } = deps;
  const now = deps.nowFn ?? (() => new Date());
  const startedAt = now();

  const outcome = await processBatch(raw, deps);
  const { result } = outcome;
  if (!result.ok) {
    log.warn({ processed: raw.length, failed: outcome.failures.length }, 'Batch produced no records');
    return null;
  }

  const mappings = await deps.findMappings(result.events.map((e) => syncKey(e)));
  const plan = planCalendarSync(result.events, result.optimization.remaining, mappings, {
    minQualityScore: deps.minQualityScore,
    timeZone: deps.timeZone,
  });
  const sync = await applySyncPlan(plan, deps.gateway, deps.store, log);

  const runId = await deps.recordRun({
    startedAt,
    finishedAt: now(),
    processed: raw.length,
    accepted: outcome.acceptedCount,
    failed: outcome.failures.length,
    merged: result.dedup.mergedCount,
    inserted: sync.inserted,
    updated: sync.updated,
    syncFailed: sync.failed,
    qualityFiltered: plan.qualityFiltered,
    skipped: plan.skipped,
    conflicts: result.optimization.remaining.length,
    averageQuality: result.quality.averages.overall,
    grade: result.quality.grade,
  });

  log.info({ runId, planned: plan.operations.length, ...sync }, 'Sync run recorded');
  return { runId, plan, sync };
}
