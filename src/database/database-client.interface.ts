/**
 * Value that can be bound to a query placeholder ($1, $2, ...)
 */
export type QueryParam = string | number | boolean | Date | null;

/**
 * Raw row as returned by the driver, keyed by database column name
 */
export type DbRow = Record<string, unknown>;

/**
 * Database-agnostic query result interface
 */
export interface QueryResult<T extends DbRow = DbRow> {
  rows: T[];
  rowCount: number | null;
}

/**
 * Query function handed to transaction callbacks
 */
export type TransactionQuery = (sql: string, params?: QueryParam[]) => Promise<QueryResult>;

/**
 * Database-agnostic pooled client/connection interface
 * Represents a single connection from the pool for transactions
 */
export interface PooledConnection {
  query<T extends DbRow = DbRow>(sql: string, params?: QueryParam[]): Promise<QueryResult<T>>;
  /**
   * Return the connection to the pool, or discard it when `destroy` is set
   */
  release(destroy?: boolean): void;
}

/**
 * Base database client interface that all drivers must implement
 */
export abstract class DatabaseClient {
  /**
   * Whether this client is currently in a transaction
   */
  isInTransaction(): boolean {
    return false;
  }

  /**
   * Execute a query with optional parameters
   */
  abstract query<T extends DbRow = DbRow>(sql: string, params?: QueryParam[]): Promise<QueryResult<T>>;

  /**
   * Get a connection from the pool for transactions
   */
  abstract connect(): Promise<PooledConnection>;

  /**
   * Close the connection pool
   */
  abstract end(): Promise<void>;

  /**
   * Get the driver name (pg, ...)
   */
  abstract getDriverName(): string;

  /**
   * Execute a callback within a transaction.
   * The transaction is committed on success or rolled back on error.
   *
   * @param callback - Function to execute within the transaction. Receives a query function.
   * @returns The result of the callback
   */
  async transaction<T>(callback: (query: TransactionQuery) => Promise<T>): Promise<T> {
    const connection = await this.connect();
    const query: TransactionQuery = (sql, params) => connection.query(sql, params);
    let broken = false;

    try {
      await connection.query('BEGIN');
      const result = await callback(query);
      await connection.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await connection.query('ROLLBACK');
      } catch (rollbackError) {
        // The connection state is unknown; it must not go back to the pool
        broken = true;
        console.error('Transaction rollback failed:', rollbackError);
      }
      throw error;
    } finally {
      connection.release(broken);
    }
  }
}

/**
 * A wrapper client that routes queries through a transactional connection.
 * Used internally to ensure all operations within a transaction use the same connection.
 */
export class TransactionalClient extends DatabaseClient {
  constructor(
    private queryFn: TransactionQuery,
    private parentClient: DatabaseClient
  ) {
    super();
  }

  isInTransaction(): boolean {
    return true;
  }

  async query<T extends DbRow = DbRow>(sql: string, params?: QueryParam[]): Promise<QueryResult<T>> {
    const result = await this.queryFn(sql, params);
    return narrowResult<T>(result);
  }

  async connect(): Promise<PooledConnection> {
    // In a transaction, we shouldn't allow getting a new connection
    throw new Error('Cannot get a new connection while in a transaction');
  }

  async end(): Promise<void> {
    // No-op - the parent client manages the connection lifecycle
  }

  getDriverName(): string {
    return this.parentClient.getDriverName();
  }

  async transaction<T>(_callback: (query: TransactionQuery) => Promise<T>): Promise<T> {
    throw new Error('Nested transactions are not supported');
  }
}

/**
 * Re-type driver rows for callers that know the row shape.
 * Drivers hand back untyped rows; the caller's SQL decides the columns.
 */
export function narrowResult<T extends DbRow>(result: QueryResult): QueryResult<T> {
  return result as QueryResult<T>;
}
