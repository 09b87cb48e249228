import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { decodeStreamRecord, RAW_RECORDS_STREAM } from '../redis/index.js';

const GROUP_NAME = 'pipeline_workers';
const CONSUMER_NAME = process.env['WORKER_ID'] ?? 'worker-1';

// How long to block waiting for the first entry of a batch (ms)
const BLOCK_MS = 5000;

export interface StreamBatch {
  readonly ids: string[];
  readonly records: unknown[];
}

/** Processes one fully materialised batch. Throwing leaves the batch unacknowledged. */
export type BatchHandler = (records: readonly unknown[]) => Promise<void>;

export interface ConsumerOptions {
  readonly batchSize: number;
  readonly blockMs?: number;
}

type StreamReply = [key: string, entries: [id: string, fields: string[]][]][];

/**
 * Ensures the consumer group exists, creating the stream if needed.
 *
 * Start ID "0" so listings enqueued before the first worker boot are
 * still processed. BUSYGROUP (group already exists) is expected.
 */
async function ensureConsumerGroup(redis: Redis, log: Logger): Promise<void> {
  try {
    await redis.xgroup('CREATE', RAW_RECORDS_STREAM, GROUP_NAME, '0', 'MKSTREAM');
    log.info({ group: GROUP_NAME, stream: RAW_RECORDS_STREAM }, 'Consumer group created');
  } catch (err: unknown) {
    if (err instanceof Error && err.message.includes('BUSYGROUP')) {
      log.debug({ group: GROUP_NAME }, 'Consumer group already exists');
      return;
    }
    throw err;
  }
}

function collect(reply: StreamReply | null, batch: StreamBatch): number {
  if (reply === null) return 0;
  let count = 0;
  for (const [, entries] of reply) {
    for (const [id, fields] of entries) {
      batch.ids.push(id);
      // Pending entries deleted elsewhere come back with empty fields.
      if (fields.length > 0) batch.records.push(decodeStreamRecord(fields));
      count++;
    }
  }
  return count;
}

/**
 * Reads one batch: this consumer's pending entries first (crash recovery),
 * then new entries, blocking only for the first read. Stops at
 * `batchSize` entries or when the stream has nothing more to give.
 */
export async function readBatch(redis: Redis, batchSize: number, blockMs: number): Promise<StreamBatch> {
  const batch: StreamBatch = { ids: [], records: [] };

  const pending = await redis.xreadgroup(
    'GROUP', GROUP_NAME, CONSUMER_NAME,
    'COUNT', batchSize,
    'STREAMS', RAW_RECORDS_STREAM,
    '0',
  );
  collect(pending, batch);

  let block = batch.ids.length === 0;
  while (batch.ids.length < batchSize) {
    const remaining = batchSize - batch.ids.length;
    const reply = block
      ? await redis.xreadgroup(
        'GROUP', GROUP_NAME, CONSUMER_NAME,
        'COUNT', remaining,
        'BLOCK', blockMs,
        'STREAMS', RAW_RECORDS_STREAM,
        '>',
      )
      : await redis.xreadgroup(
        'GROUP', GROUP_NAME, CONSUMER_NAME,
        'COUNT', remaining,
        'STREAMS', RAW_RECORDS_STREAM,
        '>',
      );
    block = false;
    if (collect(reply, batch) === 0) break;
  }

  return batch;
}

/** Acknowledge and delete consumed entries so the stream does not grow. */
export async function completeBatch(redis: Redis, ids: readonly string[]): Promise<void> {
  if (ids.length === 0) return;
  await redis.xack(RAW_RECORDS_STREAM, GROUP_NAME, ...ids);
  await redis.xdel(RAW_RECORDS_STREAM, ...ids);
}

/**
 * Main consumer loop.
 *
 * 1. Read a batch (pending first, then new entries).
 * 2. Hand the whole batch to `handler`.
 * 3. XACK + XDEL only after the handler resolved.
 *
 * A handler failure is logged and the entries stay pending, so the next
 * iteration retries them. The loop runs until `signal` is aborted.
 */
export async function startConsumer(
  redis: Redis,
  log: Logger,
  signal: AbortSignal,
  handler: BatchHandler,
  options: ConsumerOptions,
): Promise<void> {
  await ensureConsumerGroup(redis, log);

  const blockMs = options.blockMs ?? BLOCK_MS;
  log.info(
    { consumer: CONSUMER_NAME, group: GROUP_NAME, stream: RAW_RECORDS_STREAM, batchSize: options.batchSize },
    'Consumer started',
  );

  while (!signal.aborted) {
    try {
      const batch = await readBatch(redis, options.batchSize, blockMs);
      if (batch.ids.length === 0) continue;

      log.info({ entries: batch.ids.length }, 'Batch read');
      await handler(batch.records);
      await completeBatch(redis, batch.ids);
    } catch (err: unknown) {
      if (signal.aborted) break;
      log.error({ err }, 'Consumer loop error, retrying in 1s');
      await sleep(1000);
    }
  }

  log.info('Consumer stopped');
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
