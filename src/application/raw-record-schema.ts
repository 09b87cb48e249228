import { z } from 'zod';
import { EVENT_CATEGORIES } from '../domain/index.js';

/**
 * Zod schema for one raw listing as handed over by a site scraper.
 *
 * - `start` is either an ISO date or the scraped date text; `end` likewise.
 * - `dateText`, when present, is the full original date string and takes
 *   precedence over `start` / `end`.
 * - `title` may be blank here; ingestion reports it as a per-record failure
 *   instead of rejecting the whole batch.
 */
export const rawRecordSchema = z.object({
  title: z.string().max(1000),
  start: z.string().min(1).max(200),
  end: z.string().max(200).optional(),
  dateText: z.string().max(500).optional(),
  location: z.string().max(500).optional(),
  address: z.string().max(500).optional(),
  city: z.string().max(100).optional(),
  url: z.string().max(2000).optional(),
  site: z.string().min(1).max(255),
  description: z.string().max(20_000).optional(),
  category: z.enum(EVENT_CATEGORIES).optional(),
  tags: z.array(z.string().min(1).max(100)).max(50).optional(),
});

export type RawRecord = z.infer<typeof rawRecordSchema>;

export const rawRecordBatchSchema = z.array(rawRecordSchema).min(1, 'Batch must contain at least one record');

export const parseDateRequestSchema = z.object({
  text: z.string().min(1).max(500),
  today: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD').optional(),
});

export type ParseDateRequest = z.infer<typeof parseDateRequestSchema>;
