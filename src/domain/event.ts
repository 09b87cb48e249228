import { createHash } from 'node:crypto';

/**
 * Core domain types for the aggregated event model.
 *
 * An EventRecord is an immutable value: every change (auto-fix, merge,
 * schedule shift) goes through `createEventRecord` / `reviseEventRecord`,
 * which copy the nested parts and recompute the derived fields.
 */

export const EVENT_CATEGORIES = [
  'festival',
  'market',
  'sports',
  'culture',
  'food',
  'nature',
  'entertainment',
  'education',
  'business',
  'other',
] as const;

export type EventCategory = (typeof EVENT_CATEGORIES)[number];

export type QualityLevel = 'high' | 'medium' | 'low' | 'poor';

/** Calendar date, `YYYY-MM-DD`. */
export type IsoDate = string;

/** Wall-clock time of day, `HH:mm`. */
export type TimeOfDay = string;

export interface Timing {
  readonly startDate: IsoDate;
  readonly endDate: IsoDate | null;
  readonly startTime: TimeOfDay | null;
  readonly endTime: TimeOfDay | null;
  readonly isAllDay: boolean;
  readonly durationMinutes: number | null;
}

export interface Location {
  readonly name: string;
  readonly address: string;
  readonly city: string;
  readonly prefecture: string;
  readonly latitude: number | null;
  readonly longitude: number | null;
  readonly venueType: string;
}

export interface Pricing {
  readonly isFree: boolean;
  readonly adultPrice: number | null;
  readonly childPrice: number | null;
  readonly seniorPrice: number | null;
  readonly advancePrice: number | null;
}

export interface Contact {
  readonly organizer: string;
  readonly phone: string;
  readonly email: string;
  readonly website: string;
}

/** The canonical unit flowing through the pipeline. */
export interface EventRecord {
  readonly title: string;
  readonly description: string;
  readonly category: EventCategory;
  readonly timing: Timing | null;
  readonly location: Location | null;
  readonly pricing: Pricing | null;
  readonly contact: Contact | null;
  readonly sourceUrl: string;
  readonly sourceSite: string;
  /** Every source site that contributed to this record, sorted and unique. */
  readonly sources: readonly string[];
  readonly tags: readonly string[];
  readonly qualityScore: number;
  readonly qualityLevel: QualityLevel;
  readonly confidenceScore: number;
  readonly identityHash: string;
}

/** Timing input: the derived `isAllDay` / `durationMinutes` are filled in. */
export interface TimingInput {
  readonly startDate: IsoDate;
  readonly endDate?: IsoDate | null;
  readonly startTime?: TimeOfDay | null;
  readonly endTime?: TimeOfDay | null;
}

/** Everything needed to build a record; derived fields are computed. */
export interface EventDraft {
  readonly title: string;
  readonly description?: string;
  readonly category?: EventCategory;
  readonly timing?: TimingInput | null;
  readonly location?: Partial<Location> | null;
  readonly pricing?: Partial<Pricing> | null;
  readonly contact?: Partial<Contact> | null;
  readonly sourceUrl?: string;
  readonly sourceSite?: string;
  readonly sources?: readonly string[];
  readonly tags?: readonly string[];
}

export const PRICE_FIELDS = ['adultPrice', 'childPrice', 'seniorPrice', 'advancePrice'] as const;
export type PriceField = (typeof PRICE_FIELDS)[number];

/** Minutes since midnight for an `HH:mm` string. */
export function toMinutes(time: TimeOfDay): number {
  const [h, m] = time.split(':');
  return Number(h) * 60 + Number(m);
}

export function fromMinutes(minutes: number): TimeOfDay {
  const h = Math.floor(minutes / 60);
  const m = minutes % 60;
  return `${String(h).padStart(2, '0')}:${String(m).padStart(2, '0')}`;
}

function sortedUnique(values: readonly string[]): string[] {
  return [...new Set(values.filter((v) => v !== ''))].sort();
}

function buildTiming(input: TimingInput): Timing {
  const startTime = input.startTime ?? null;
  const endTime = input.endTime ?? null;
  // Inverted times carry no duration until validation swaps them.
  const durationMinutes = startTime !== null && endTime !== null && toMinutes(endTime) >= toMinutes(startTime)
    ? toMinutes(endTime) - toMinutes(startTime)
    : null;

  return Object.freeze({
    startDate: input.startDate,
    endDate: input.endDate ?? null,
    startTime,
    endTime,
    isAllDay: startTime === null,
    durationMinutes,
  });
}

function buildLocation(input: Partial<Location>): Location {
  return Object.freeze({
    name: input.name ?? '',
    address: input.address ?? '',
    city: input.city ?? '',
    prefecture: input.prefecture ?? '',
    latitude: input.latitude ?? null,
    longitude: input.longitude ?? null,
    venueType: input.venueType ?? '',
  });
}

function buildPricing(input: Partial<Pricing>): Pricing {
  return Object.freeze({
    isFree: input.isFree ?? true,
    adultPrice: input.adultPrice ?? null,
    childPrice: input.childPrice ?? null,
    seniorPrice: input.seniorPrice ?? null,
    advancePrice: input.advancePrice ?? null,
  });
}

function buildContact(input: Partial<Contact>): Contact {
  return Object.freeze({
    organizer: input.organizer ?? '',
    phone: input.phone ?? '',
    email: input.email ?? '',
    website: input.website ?? '',
  });
}

interface ScoredFields {
  readonly title: string;
  readonly description: string;
  readonly category: EventCategory;
  readonly timing: Timing | null;
  readonly location: Location | null;
  readonly pricing: Pricing | null;
  readonly contact: Contact | null;
  readonly sourceUrl: string;
}

/** Parse-completeness score in [0, 100]. */
export function computeQualityScore(fields: ScoredFields): number {
  let score = 0;
  const title = fields.title.trim();

  if (title.length > 3) score += 20;
  if (title.length > 10) score += 5;

  if (fields.timing !== null) {
    score += 15;
    if (fields.timing.startTime !== null) score += 5;
    if (fields.timing.endDate !== null || fields.timing.endTime !== null) score += 5;
  }

  if (fields.location !== null && fields.location.name !== '') {
    score += 10;
    if (fields.location.address !== '') score += 5;
    if (fields.location.latitude !== null && fields.location.longitude !== null) score += 5;
  }

  const description = fields.description.trim();
  if (description.length > 10) score += 10;
  if (description.length > 50) score += 5;

  if (fields.contact !== null && (fields.contact.phone !== '' || fields.contact.email !== '')) {
    score += 5;
  }
  if (fields.pricing !== null && !fields.pricing.isFree) score += 5;
  if (fields.sourceUrl.startsWith('http')) score += 5;
  if (fields.category !== 'other') score += 5;

  return Math.min(score, 100);
}

export function qualityLevelFor(score: number, title: string): QualityLevel {
  if (title.trim() === '') return 'poor';
  if (score >= 80) return 'high';
  if (score >= 60) return 'medium';
  if (score >= 40) return 'low';
  return 'poor';
}

export function computeConfidenceScore(fields: ScoredFields): number {
  let score = 0;
  if (fields.title.trim().length > 5) score += 25;
  if (fields.timing !== null) {
    score += 20;
    if (fields.timing.startTime !== null) score += 10;
  }
  if (fields.location !== null && fields.location.name !== '') {
    score += 20;
    if (fields.location.city !== '') score += 10;
  }
  if (fields.description.trim().length > 20) score += 15;
  return Math.min(score, 100);
}

function sha256(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('hex');
}

/** Stable identity of a listing (title + venue); not a dedup key. */
export function computeIdentityHash(title: string, locationName: string): string {
  return sha256(title + locationName).slice(0, 16);
}

/** Upsert key used by the calendar sync boundary. */
export function syncKey(record: EventRecord): string {
  return sha256(record.title + (record.timing?.startDate ?? ''));
}

/** Build an immutable record and compute its derived fields. */
export function createEventRecord(draft: EventDraft): EventRecord {
  const fields: ScoredFields = {
    title: draft.title,
    description: draft.description ?? '',
    category: draft.category ?? 'other',
    timing: draft.timing ? buildTiming(draft.timing) : null,
    location: draft.location ? buildLocation(draft.location) : null,
    pricing: draft.pricing ? buildPricing(draft.pricing) : null,
    contact: draft.contact ? buildContact(draft.contact) : null,
    sourceUrl: draft.sourceUrl ?? '',
  };

  const sourceSite = draft.sourceSite ?? '';
  const qualityScore = computeQualityScore(fields);

  return Object.freeze({
    ...fields,
    sourceSite,
    sources: Object.freeze(sortedUnique([sourceSite, ...(draft.sources ?? [])])),
    tags: Object.freeze(sortedUnique(draft.tags ?? [])),
    qualityScore,
    qualityLevel: qualityLevelFor(qualityScore, fields.title),
    confidenceScore: computeConfidenceScore(fields),
    identityHash: computeIdentityHash(fields.title, fields.location?.name ?? ''),
  });
}

/** Turn a record back into a draft so it can be revised. */
export function toDraft(record: EventRecord): EventDraft {
  return {
    title: record.title,
    description: record.description,
    category: record.category,
    timing: record.timing,
    location: record.location,
    pricing: record.pricing,
    contact: record.contact,
    sourceUrl: record.sourceUrl,
    sourceSite: record.sourceSite,
    sources: record.sources,
    tags: record.tags,
  };
}

/** New record with `changes` applied; derived fields are recomputed. */
export function reviseEventRecord(record: EventRecord, changes: Partial<EventDraft>): EventRecord {
  return createEventRecord({ ...toDraft(record), ...changes });
}
