export { rawRecordSchema, rawRecordBatchSchema, parseDateRequestSchema } from './raw-record-schema.js';
export type { RawRecord, ParseDateRequest } from './raw-record-schema.js';
export type { Log } from './logging.js';
export { ingestRawRecords, buildRecord } from './ingest.js';
export type { IngestFailure, IngestResult } from './ingest.js';
export { enrichWithGeocoder } from './geocoding.js';
export type { Geocoder, GeocodeQuery, GeocodeResult } from './geocoding.js';
export { runPipeline, processBatch } from './pipeline.js';
export type {
  PipelineSettings,
  PipelineOptions,
  PipelineResult,
  PipelineErrorCode,
  BatchDeps,
  BatchOutcome,
} from './pipeline.js';
export {
  buildPipelineReport,
  buildDuplicateReport,
  buildScheduleSummary,
  pipelineRecommendations,
  topEvents,
  PIPELINE_STEPS,
  TOP_EVENT_LIMIT,
} from './report.js';
export type { PipelineReport, DuplicateReport, ScheduleSummary, TopEvent, PipelineStep } from './report.js';
export {
  toCalendarEventBody,
  planCalendarSync,
  applySyncPlan,
  syncPriority,
  DEFAULT_TIME_ZONE,
  DEFAULT_MIN_QUALITY_SCORE,
} from './calendar-sync.js';
export type {
  CalendarEventBody,
  CalendarTime,
  CalendarGateway,
  SyncMapping,
  SyncMappingStore,
  SyncOperation,
  SyncPlan,
  SyncOutcome,
  SyncPlanOptions,
} from './calendar-sync.js';
export { syncBatch } from './sync-batch.js';
export type { SyncBatchDeps, SyncBatchResult } from './sync-batch.js';
