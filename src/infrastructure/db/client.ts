import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import type { DatabaseConfig } from './database-config.js';
import * as schema from './schema.js';

/**
 * postgres.js pool plus the drizzle instance over the sync tables.
 *
 * The pool opens connections on first query, so building a client never
 * touches the network.
 */
export function createDbClient(config: DatabaseConfig) {
  const sql = postgres(config.url, {
    max: config.poolMax,
    idle_timeout: config.idleTimeoutSeconds,
    connect_timeout: config.connectTimeoutSeconds,
  });

  return { sql, db: drizzle(sql, { schema }) };
}

export type Database = ReturnType<typeof createDbClient>['db'];
