export { default as redisPlugin } from './redis-plugin.js';
export { enqueueRawRecords, decodeStreamRecord, RAW_RECORDS_STREAM } from './ingest-stream.js';
