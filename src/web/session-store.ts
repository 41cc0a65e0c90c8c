import connectPgSimple from 'connect-pg-simple';
import session from 'express-session';
import type { Pool } from 'pg';

const PgSessionStore = connectPgSimple(session);

export type PgSessionStore = InstanceType<typeof PgSessionStore>;

export interface PgSessionStoreOptions {
  /** Seconds between deletions of expired sessions; false turns pruning off */
  pruneIntervalSeconds: number | false;
  tableName?: string;
}

/**
 * Session store keeping sessions in PostgreSQL on the application's pool.
 * The table is created on first use. Call `close()` on shutdown to stop pruning.
 */
export function createPgSessionStore(pool: Pool, options: PgSessionStoreOptions): PgSessionStore {
  return new PgSessionStore({
    pool,
    tableName: options.tableName ?? 'session',
    createTableIfMissing: true,
    pruneSessionInterval: options.pruneIntervalSeconds,
  });
}
