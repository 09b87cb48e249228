import { addDays, syncKey } from '../domain/index.js';
import type { EventRecord, IsoDate, ScheduleConflict } from '../domain/index.js';
import type { Log } from './logging.js';

export const DEFAULT_TIME_ZONE = 'Asia/Tokyo';
export const DEFAULT_MIN_QUALITY_SCORE = 60;
const MAX_CONFLICT_LINES = 3;

export type CalendarTime =
  | { readonly date: IsoDate }
  | { readonly dateTime: string; readonly timeZone: string };

/** Request body shape of a calendar event, as the remote calendar API takes it. */
export interface CalendarEventBody {
  readonly summary: string;
  readonly start: CalendarTime;
  readonly end: CalendarTime;
  readonly description: string;
  readonly location?: string;
  readonly source: { readonly title: string; readonly url: string };
  readonly extendedProperties: { readonly private: Readonly<Record<string, string>> };
}

/** Remote calendar. No concrete client ships with the service. */
export interface CalendarGateway {
  insert(body: CalendarEventBody): Promise<{ id: string }>;
  update(remoteId: string, body: CalendarEventBody): Promise<void>;
}

export interface SyncMapping {
  readonly syncKey: string;
  readonly remoteId: string;
  readonly title: string;
  readonly startDate: IsoDate;
}

export interface SyncMappingStore {
  save(mapping: SyncMapping): Promise<void>;
}

export interface SyncOperation {
  readonly kind: 'insert' | 'update';
  readonly key: string;
  /** Set for updates. */
  readonly remoteId: string | null;
  readonly record: EventRecord;
  readonly body: CalendarEventBody;
  readonly priority: number;
}

export interface SyncPlan {
  readonly operations: readonly SyncOperation[];
  /** Timed records dropped for a quality score under the threshold. */
  readonly qualityFiltered: number;
  /** Records with no timing, which cannot be placed on a calendar. */
  readonly skipped: number;
}

export interface SyncOutcome {
  readonly inserted: number;
  readonly updated: number;
  readonly failed: number;
}

export interface SyncPlanOptions {
  readonly minQualityScore?: number;
  readonly timeZone?: string;
}

function withThousands(n: number): string {
  return String(n).replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

// Keyed by title and start date: recurring listings at one venue share an identity hash.
function conflictsOf(record: EventRecord, conflicts: readonly ScheduleConflict[]): ScheduleConflict[] {
  const key = syncKey(record);
  return conflicts.filter((c) => syncKey(c.first) === key || syncKey(c.second) === key);
}

function describe(record: EventRecord, own: readonly ScheduleConflict[]): string {
  const lines: string[] = [];
  if (record.description !== '') lines.push(record.description, '');

  lines.push(`品質スコア: ${record.qualityScore}/100`);
  lines.push(`カテゴリ: ${record.category}`);
  if (record.sources.length > 0) lines.push(`情報源: ${record.sources.join(', ')}`);

  if (own.length > 0) {
    lines.push('', 'スケジュール注意:');
    for (const c of own.slice(0, MAX_CONFLICT_LINES)) lines.push(`  • ${c.description}`);
  }

  const contact = record.contact;
  if (contact !== null) {
    const parts = [
      contact.phone !== '' ? `電話: ${contact.phone}` : null,
      contact.email !== '' ? `メール: ${contact.email}` : null,
      contact.organizer !== '' ? `主催: ${contact.organizer}` : null,
    ].filter((p): p is string => p !== null);
    if (parts.length > 0) lines.push('', '連絡先:', ...parts.map((p) => `  ${p}`));
  }

  const pricing = record.pricing;
  if (pricing !== null && pricing.isFree) {
    lines.push('', '参加費: 無料');
  } else if (pricing !== null) {
    lines.push('', '料金:');
    if (pricing.adultPrice !== null) lines.push(`  大人: ${withThousands(pricing.adultPrice)}円`);
    if (pricing.childPrice !== null) lines.push(`  子供: ${withThousands(pricing.childPrice)}円`);
    if (pricing.seniorPrice !== null) lines.push(`  シニア: ${withThousands(pricing.seniorPrice)}円`);
    if (pricing.advancePrice !== null) lines.push(`  前売: ${withThousands(pricing.advancePrice)}円`);
  }

  return lines.join('\n');
}

/**
 * Calendar body for one record; null when the record has no timing.
 *
 * All-day events use an exclusive end date. Timed events without an end
 * time run until 23:59:59 of their last day.
 */
export function toCalendarEventBody(
  record: EventRecord,
  conflicts: readonly ScheduleConflict[],
  timeZone: string = DEFAULT_TIME_ZONE,
): CalendarEventBody | null {
  const t = record.timing;
  if (t === null) return null;

  const lastDay = t.endDate ?? t.startDate;
  const own = conflictsOf(record, conflicts);

  const [start, end]: [CalendarTime, CalendarTime] = t.isAllDay
    ? [{ date: t.startDate }, { date: addDays(lastDay, 1) }]
    : [
      { dateTime: `${t.startDate}T${t.startTime ?? '00:00'}:00`, timeZone },
      { dateTime: `${lastDay}T${t.endTime !== null ? `${t.endTime}:00` : '23:59:59'}`, timeZone },
    ];

  const loc = record.location;
  const location = loc === null || loc.name === ''
    ? undefined
    : loc.address !== '' ? `${loc.name}, ${loc.address}` : loc.name;

  return {
    summary: record.title,
    start,
    end,
    description: describe(record, own),
    ...(location !== undefined ? { location } : {}),
    source: { title: record.sourceSite !== '' ? record.sourceSite : 'Event Source', url: record.sourceUrl },
    extendedProperties: {
      private: {
        quality_score: String(record.qualityScore),
        category: record.category,
        source_site: record.sourceSite,
        event_hash: record.identityHash,
        has_conflicts: own.length > 0 ? 'yes' : 'no',
      },
    },
  };
}

/** Sync ordering weight: quality, festival bonus, conflict penalty, completeness bonus. */
export function syncPriority(record: EventRecord, conflicts: readonly ScheduleConflict[]): number {
  let priority = record.qualityScore;
  if (record.category === 'festival') priority += 10;
  priority -= conflictsOf(record, conflicts).length * 5;
  if (record.location !== null && record.location.address !== '') priority += 5;
  if (record.contact !== null && (record.contact.phone !== '' || record.contact.email !== '')) priority += 5;
  return priority;
}

/**
 * Decide what to send to the calendar: filter by quality, order by sync
 * priority and choose insert or update from the known mappings.
 */
export function planCalendarSync(
  records: readonly EventRecord[],
  conflicts: readonly ScheduleConflict[],
  mappings: ReadonlyMap<string, string>,
  options: SyncPlanOptions = {},
): SyncPlan {
  const minQuality = options.minQualityScore ?? DEFAULT_MIN_QUALITY_SCORE;
  const timeZone = options.timeZone ?? DEFAULT_TIME_ZONE;

  let qualityFiltered = 0;
  let skipped = 0;
  const operations: SyncOperation[] = [];

  for (const record of records) {
    const body = toCalendarEventBody(record, conflicts, timeZone);
    if (body === null) {
      skipped += 1;
      continue;
    }
    if (record.qualityScore < minQuality) {
      qualityFiltered += 1;
      continue;
    }

    const key = syncKey(record);
    const remoteId = mappings.get(key) ?? null;
    operations.push({
      kind: remoteId === null ? 'insert' : 'update',
      key,
      remoteId,
      record,
      body,
      priority: syncPriority(record, conflicts),
    });
  }

  operations.sort((a, b) => b.priority - a.priority);
  return { operations, qualityFiltered, skipped };
}

/**
 * Execute a plan one operation at a time. A failed operation is logged and
 * counted; the rest of the plan still runs.
 */
export async function applySyncPlan(
  plan: SyncPlan,
  gateway: CalendarGateway,
  store: SyncMappingStore,
  log: Log,
): Promise<SyncOutcome> {
  let inserted = 0;
  let updated = 0;
  let failed = 0;

  for (const op of plan.operations) {
    try {
      let remoteId: string;
      if (op.kind === 'update' && op.remoteId !== null) {
        await gateway.update(op.remoteId, op.body);
        remoteId = op.remoteId;
      } else {
        remoteId = (await gateway.insert(op.body)).id;
      }
      await store.save({
        syncKey: op.key,
        remoteId,
        title: op.record.title,
        startDate: op.record.timing?.startDate ?? '',
      });
      if (op.kind === 'update') updated += 1;
      else inserted += 1;
    } catch (err: unknown) {
      failed += 1;
      log.error({ err, key: op.key, kind: op.kind, title: op.record.title }, 'Calendar sync operation failed');
    }
  }

  log.info({ inserted, updated, failed }, 'Calendar sync applied');
  return { inserted, updated, failed };
}
