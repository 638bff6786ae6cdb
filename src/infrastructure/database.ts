/**
 * PostgreSQL client (postgres.js) with connection lifecycle management.
 * Built once in main.ts and handed to the repositories that need it.
 */
import postgres from 'postgres';

import type { Logger } from '@/observability/logger.js';

/** Options for creating the database client. */
export interface DatabaseOptions {
  url: string;
  logger: Logger;
  /** Maximum pooled connections. Default: 10 */
  maxConnections?: number;
}

/** Wrapper around the postgres.js client with lifecycle hooks. */
export interface Database {
  /** The raw postgres.js client. */
  sql: postgres.Sql;
  /** Verify the database is reachable. */
  connect(): Promise<void>;
  /** Gracefully close all pooled connections. */
  disconnect(): Promise<void>;
}

/**
 * Create a Database wrapper. No connection is opened until the first query.
 */
export function createDatabase(options: DatabaseOptions): Database {
  const { logger } = options;

  const sql = postgres(options.url, {
    max: options.maxConnections ?? 10,
    idle_timeout: 20,
    connect_timeout: 10,
    connection: {
      application_name: 'conduit',
    },
    onnotice: (notice) => {
      logger.debug('PostgreSQL notice', {
        component: 'database',
        message: notice['message'],
      });
    },
  });

  return {
    sql,

    async connect(): Promise<void> {
      await sql`SELECT 1`;
      logger.info('Database connected', { component: 'database' });
    },

    async disconnect(): Promise<void> {
      await sql.end({ timeout: 5 });
      logger.info('Database disconnected', { component: 'database' });
    },
  };
}
