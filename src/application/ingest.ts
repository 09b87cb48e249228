import {
  createEventRecord,
  DateParseError,
  DEFAULT_ENRICHMENT_CONFIG,
  detectCity,
  detectPrefecture,
  detectVenueType,
  extractContact,
  extractPricing,
  extractTags,
  extractTimes,
  inferCategory,
  parseDateRange,
} from '../domain/index.js';
import type { EnrichmentConfig, EventRecord, IsoDate } from '../domain/index.js';
import { rawRecordSchema } from './raw-record-schema.js';
import type { RawRecord } from './raw-record-schema.js';

export interface IngestFailure {
  /** Position of the record in the submitted batch. */
  readonly index: number;
  readonly title: string;
  readonly reason: string;
}

export interface IngestResult {
  readonly records: EventRecord[];
  readonly failures: IngestFailure[];
}

function dateTextOf(raw: RawRecord): string {
  if (raw.dateText !== undefined && raw.dateText.trim() !== '') return raw.dateText;
  return raw.end !== undefined && raw.end.trim() !== '' ? `${raw.start}〜${raw.end}` : raw.start;
}

function titleOf(input: unknown): string {
  if (typeof input === 'object' && input !== null && 'title' in input && typeof input.title === 'string') {
    return input.title;
  }
  return '';
}

/**
 * Build an enriched record from one validated raw listing.
 *
 * @throws DateParseError when the date text cannot be parsed.
 */
export function buildRecord(raw: RawRecord, today: IsoDate, config: EnrichmentConfig): EventRecord {
  const dateText = dateTextOf(raw);
  const range = parseDateRange(dateText, today);

  const description = raw.description ?? '';
  const name = raw.location?.trim() ?? '';
  const address = raw.address?.trim() ?? '';
  const combined = [raw.title, name, address, description].join(' ');

  const times = extractTimes(`${dateText} ${description}`);
  const city = raw.city ?? detectCity(combined, config);

  return createEventRecord({
    title: raw.title,
    description,
    category: raw.category ?? inferCategory(raw.title, description, config),
    timing: {
      startDate: range.start,
      endDate: range.end,
      startTime: times.startTime,
      endTime: times.endTime,
    },
    location: name === '' && address === ''
      ? null
      : {
        name,
        address,
        city,
        prefecture: detectPrefecture(combined, city, config),
        venueType: detectVenueType(name, config),
      },
    pricing: extractPricing(description),
    contact: extractContact(description),
    sourceUrl: raw.url ?? '',
    sourceSite: raw.site,
    tags: [...(raw.tags ?? []), ...extractTags(combined, config)],
  });
}

/**
 * Validate and enrich a batch of raw scraped listings.
 *
 * Failures are isolated per record: a schema violation, a blank title or an
 * unparseable date is reported in `failures` and the rest of the batch
 * continues.
 */
export function ingestRawRecords(
  inputs: readonly unknown[],
  today: IsoDate,
  config: EnrichmentConfig = DEFAULT_ENRICHMENT_CONFIG,
): IngestResult {
  const records: EventRecord[] = [];
  const failures: IngestFailure[] = [];

  inputs.forEach((input, index) => {
    const parsed = rawRecordSchema.safeParse(input);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      failures.push({ index, title: titleOf(input), reason: `invalid record: ${detail}` });
      return;
    }

    const raw = parsed.data;
    if (raw.title.trim() === '') {
      failures.push({ index, title: raw.title, reason: 'empty title' });
      return;
    }

    try {
      records.push(buildRecord(raw, today, config));
    } catch (err) {
      if (!(err instanceof DateParseError)) throw err;
      failures.push({ index, title: raw.title, reason: err.message });
    }
  });

  return { records, failures };
}
