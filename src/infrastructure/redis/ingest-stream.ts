import type { Redis } from 'ioredis';
import type { RawRecord } from '../../application/index.js';

/** Stream the HTTP API appends raw listings to and the worker drains. */
export const RAW_RECORDS_STREAM = 'raw_events_stream';

/**
 * Appends validated raw listings to the Redis Stream in one MULTI.
 *
 * Each entry carries the source site (for inspection with XRANGE) and
 * the JSON-serialized record, since stream values must be strings.
 *
 * @returns The stream entry IDs assigned by Redis, in input order.
 */
export async function enqueueRawRecords(redis: Redis, records: readonly RawRecord[]): Promise<string[]> {
  const tx = redis.multi();
  for (const record of records) {
    tx.xadd(RAW_RECORDS_STREAM, '*', 'site', record.site, 'record', JSON.stringify(record));
  }

  const results = await tx.exec();
  if (results === null) {
    throw new Error('Redis transaction aborted while enqueueing raw records');
  }

  return results.map(([err, id]) => {
    if (err !== null) throw err;
    if (typeof id !== 'string') throw new Error('XADD returned no entry id');
    return id;
  });
}

/** Flat `[field, value, …]` stream fields → the decoded record, or null when absent or not JSON. */
export function decodeStreamRecord(fields: readonly string[]): unknown {
  for (let i = 0; i + 1 < fields.length; i += 2) {
    if (fields[i] !== 'record') continue;
    const value = fields[i + 1] ?? '';
    try {
      return JSON.parse(value);
    } catch {
      return null;
    }
  }
  return null;
}
