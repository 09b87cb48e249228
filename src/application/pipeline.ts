import {
  createNormalizer,
  Deduplicator,
  QualityValidator,
  SimilarityEngine,
  SmartScheduler,
  summarizeQuality,
} from '../domain/index.js';
import type {
  BatchValidation,
  DeduplicationResult,
  EnrichmentConfig,
  EventRecord,
  IsoDate,
  NormalizerConfig,
  OptimizationResult,
  QualityConfig,
  QualitySummary,
  SchedulerConfig,
  SimilarityConfig,
  StringSimilarity,
} from '../domain/index.js';
import { enrichWithGeocoder } from './geocoding.js';
import type { Geocoder } from './geocoding.js';
import { ingestRawRecords } from './ingest.js';
import type { IngestFailure } from './ingest.js';
import type { Log } from './logging.js';
import { buildPipelineReport } from './report.js';
import type { PipelineReport, PipelineStep } from './report.js';

export interface PipelineSettings {
  readonly normalizer: NormalizerConfig;
  readonly similarity: SimilarityConfig;
  readonly quality: QualityConfig;
  readonly scheduler: SchedulerConfig;
  readonly enrichment: EnrichmentConfig;
  readonly autoMerge: boolean;
  readonly autoFix: boolean;
}

export interface PipelineOptions {
  readonly settings: PipelineSettings;
  readonly today: IsoDate;
  /** String similarity backend; the built-in indel ratio when omitted. */
  readonly backend?: StringSimilarity;
  readonly failedCount?: number;
  readonly completedSteps?: readonly PipelineStep[];
  readonly nowFn?: () => number;
}

export type PipelineErrorCode = 'NO_RECORDS';

export type PipelineResult =
  | {
    readonly ok: true;
    readonly events: readonly EventRecord[];
    readonly dedup: DeduplicationResult;
    readonly validation: BatchValidation;
    readonly quality: QualitySummary;
    readonly optimization: OptimizationResult;
    readonly report: PipelineReport;
  }
  | { readonly ok: false; readonly error: { readonly code: PipelineErrorCode; readonly message: string } };

/**
 * Dedup → validate/auto-fix → schedule → report over an already-ingested,
 * fully materialised batch. Synchronous and in-memory.
 */
export function runPipeline(records: readonly EventRecord[], options: PipelineOptions): PipelineResult {
  if (records.length === 0) {
    return { ok: false, error: { code: 'NO_RECORDS', message: 'No records to process' } };
  }

  const { settings } = options;
  const nowFn = options.nowFn ?? (() => performance.now());
  const startedAt = nowFn();

  const engine = new SimilarityEngine(createNormalizer(settings.normalizer), options.backend, settings.similarity);
  const dedup = new Deduplicator(engine, nowFn).deduplicate(records, settings.autoMerge);

  const validator = new QualityValidator(() => options.today, settings.quality);
  const validation = validator.validateAll(dedup.events, { autoFix: settings.autoFix });
  const quality = summarizeQuality(validation.reports);

  const optimization = new SmartScheduler(settings.scheduler).optimize(validation.events);
  const events = optimization.optimizedEvents;

  const completedSteps: PipelineStep[] = [...(options.completedSteps ?? []), 'deduplicate', 'validate', 'schedule', 'report'];

  const report = buildPipelineReport({
    events,
    failedCount: options.failedCount ?? 0,
    dedup,
    quality,
    optimization,
    durationMs: nowFn() - startedAt,
    completedSteps,
  });

  return { ok: true, events, dedup, validation, quality, optimization, report };
}

export interface BatchDeps {
  readonly settings: PipelineSettings;
  readonly today: IsoDate;
  readonly log: Log;
  readonly geocoder?: Geocoder;
  readonly backend?: StringSimilarity;
}

export interface BatchOutcome {
  readonly acceptedCount: number;
  readonly failures: readonly IngestFailure[];
  readonly result: PipelineResult;
}

/**
 * Ingest raw listings, optionally geocode them, and run the pipeline.
 * Per-record ingestion failures are returned, never thrown.
 */
export async function processBatch(raw: readonly unknown[], deps: BatchDeps): Promise<BatchOutcome> {
  const { log, settings } = deps;

  const ingested = ingestRawRecords(raw, deps.today, settings.enrichment);
  log.info({ accepted: ingested.records.length, failed: ingested.failures.length }, 'Ingested raw records');
  for (const failure of ingested.failures) {
    log.warn({ index: failure.index, title: failure.title, reason: failure.reason }, 'Record skipped');
  }

  const steps: PipelineStep[] = ['ingest'];
  let records = ingested.records;
  if (deps.geocoder !== undefined) {
    records = await enrichWithGeocoder(records, deps.geocoder, log);
    steps.push('geocode');
  }

  const result = runPipeline(records, {
    settings,
    today: deps.today,
    backend: deps.backend,
    failedCount: ingested.failures.length,
    completedSteps: steps,
  });

  if (result.ok) {
    log.info(
      {
        finalCount: result.events.length,
        merged: result.dedup.mergedCount,
        autoFixes: result.validation.autoFixesApplied,
        conflicts: result.optimization.remaining.length,
        grade: result.quality.grade,
      },
      'Pipeline complete',
    );
  } else {
    log.warn({ code: result.error.code }, result.error.message);
  }

  return { acceptedCount: ingested.records.length, failures: ingested.failures, result };
}
