import { Pool, PoolClient } from 'pg';
import { DatabaseClient, DbRow, PooledConnection, QueryParam, QueryResult } from './database-client.interface';

/**
 * Wrapper for the pooled connection from pg library
 */
class PgPooledConnection implements PooledConnection {
  constructor(private client: PoolClient) {}

  async query<T extends DbRow = DbRow>(sql: string, params?: QueryParam[]): Promise<QueryResult<T>> {
    const result = await this.client.query<T>(sql, params);

    return {
      rows: result.rows,
      rowCount: result.rowCount,
    };
  }

  release(destroy = false): void {
    this.client.release(destroy);
  }
}

/**
 * DatabaseClient implementation for the 'pg' library
 * @see https://node-postgres.com/
 */
export class PgClient extends DatabaseClient {
  constructor(private pool: Pool) {
    super();
  }

  /**
   * Wrap an existing pool (or anything exposing the pg Pool API)
   */
  static fromPool(pool: Pool): PgClient {
    return new PgClient(pool);
  }

  async query<T extends DbRow = DbRow>(sql: string, params?: QueryParam[]): Promise<QueryResult<T>> {
    const result = await this.pool.query<T>(sql, params);

    return {
      rows: result.rows,
      rowCount: result.rowCount,
    };
  }

  async connect(): Promise<PooledConnection> {
    const client = await this.pool.connect();
    return new PgPooledConnection(client);
  }

  async end(): Promise<void> {
    await this.pool.end();
  }

  getDriverName(): string {
    return 'pg';
  }
}
