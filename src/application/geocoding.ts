import { reviseEventRecord } from '../domain/index.js';
import type { EventRecord } from '../domain/index.js';
import type { Log } from './logging.js';

export interface GeocodeQuery {
  readonly name: string;
  readonly city: string;
}

export interface GeocodeResult {
  readonly latitude: number;
  readonly longitude: number;
  readonly formattedAddress: string;
}

/** Resolves a venue to coordinates. Implementations may call out over the network. */
export interface Geocoder {
  geocode(query: GeocodeQuery): Promise<GeocodeResult | null>;
}

function needsGeocode(record: EventRecord): boolean {
  const loc = record.location;
  return loc !== null && loc.name !== '' && (loc.latitude === null || loc.longitude === null);
}

/**
 * Fill coordinates (and a blank address) for records that have a venue
 * name but no geocode. Lookups run one at a time; a failed lookup is
 * logged and the record is kept as it was.
 */
export async function enrichWithGeocoder(
  records: readonly EventRecord[],
  geocoder: Geocoder,
  log: Log,
): Promise<EventRecord[]> {
  const enriched: EventRecord[] = [];
  let resolved = 0;

  for (const record of records) {
    const loc = record.location;
    if (loc === null || !needsGeocode(record)) {
      enriched.push(record);
      continue;
    }

    let result: GeocodeResult | null = null;
    try {
      result = await geocoder.geocode({ name: loc.name, city: loc.city });
    } catch (err: unknown) {
      log.warn({ err, title: record.title, venue: loc.name }, 'Geocoding failed');
    }

    if (result === null) {
      enriched.push(record);
      continue;
    }

    resolved += 1;
    enriched.push(reviseEventRecord(record, {
      location: {
        ...loc,
        latitude: result.latitude,
        longitude: result.longitude,
        address: loc.address !== '' ? loc.address : result.formattedAddress,
      },
    }));
  }

  log.debug({ total: records.length, resolved }, 'Geocoding pass complete');
  return enriched;
}
