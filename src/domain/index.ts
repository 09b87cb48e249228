export type {
  EventRecord,
  EventDraft,
  EventCategory,
  QualityLevel,
  IsoDate,
  TimeOfDay,
  Timing,
  TimingInput,
  Location,
  Pricing,
  Contact,
  PriceField,
} from './event.js';
export {
  EVENT_CATEGORIES,
  PRICE_FIELDS,
  createEventRecord,
  reviseEventRecord,
  toDraft,
  computeQualityScore,
  computeConfidenceScore,
  computeIdentityHash,
  qualityLevelFor,
  syncKey,
  toMinutes,
  fromMinutes,
} from './event.js';
export type { DateParts } from './calendar.js';
export {
  addDays,
  daysBetween,
  dayOfWeek,
  isIsoDate,
  isValidDate,
  isWeekend,
  monthKey,
  parseIsoDate,
  toIsoDate,
  todayIn,
} from './calendar.js';
export { DateParseError } from './errors.js';
export * from './dates/index.js';
export * from './normalize/index.js';
export * from './similarity/index.js';
export * from './dedup/index.js';
export * from './quality/index.js';
export * from './scheduling/index.js';
export * from './enrichment/index.js';
