import { pgTable, uuid, varchar, timestamp, integer, real, date, index } from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the `sync_mappings` table.
 *
 * `sync_key` (title + start date) is the natural primary key, so a
 * record seen again upserts onto the remote event it created before.
 */
export const syncMappings = pgTable('sync_mappings', {
  sync_key: varchar('sync_key', { length: 1100 }).primaryKey(),
  remote_id: varchar('remote_id', { length: 255 }).notNull(),
  title: varchar('title', { length: 1000 }).notNull(),
  start_date: date('start_date', { mode: 'string' }).notNull(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_sync_mappings_start_date').on(table.start_date),
]);

/**
 * Drizzle schema for the `sync_runs` table.
 *
 * One row per worker batch: what came in, what the pipeline did with it
 * and what was planned for the calendar.
 */
export const syncRuns = pgTable('sync_runs', {
  run_id: uuid('run_id').primaryKey(),
  started_at: timestamp('started_at', { withTimezone: true }).notNull(),
  finished_at: timestamp('finished_at', { withTimezone: true }).notNull(),
  processed: integer('processed').notNull(),
  accepted: integer('accepted').notNull(),
  failed: integer('failed').notNull(),
  merged: integer('merged').notNull(),
  inserted: integer('inserted').notNull().default(0),
  updated: integer('updated').notNull().default(0),
  sync_failed: integer('sync_failed').notNull().default(0),
  quality_filtered: integer('quality_filtered').notNull(),
  skipped: integer('skipped').notNull(),
  conflicts: integer('conflicts').notNull(),
  average_quality: real('average_quality').notNull(),
  grade: varchar('grade', { length: 2 }).notNull(),
}, (table) => [
  index('idx_sync_runs_started_at').on(table.started_at),
]);
