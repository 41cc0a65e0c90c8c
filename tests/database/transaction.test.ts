import { describe, test, expect } from '@jest/globals';
import { BlogDatabase } from '../../src/blog/blog-database';
import {
  DatabaseClient,
  DbRow,
  PooledConnection,
  QueryParam,
  QueryResult,
  TransactionalClient,
  narrowResult,
} from '../../src/database/database-client.interface';
import { withDatabase } from '../utils/test-database';

/**
 * Client that records every statement instead of talking to a server.
 * Statements on pooled connections and direct pool queries are kept apart.
 */
class RecordingClient extends DatabaseClient {
  statements: string[] = [];
  directStatements: string[] = [];
  released = 0;
  destroyed = 0;

  constructor(private failOn?: string) {
    super();
  }

  async query<T extends DbRow = DbRow>(sql: string, _params?: QueryParam[]): Promise<QueryResult<T>> {
    this.directStatements.push(sql);
    return { rows: [], rowCount: 0 };
  }

  async connect(): Promise<PooledConnection> {
    return {
      query: async <T extends DbRow = DbRow>(sql: string): Promise<QueryResult<T>> => {
        this.statements.push(sql);
        if (sql === this.failOn) {
          throw new Error(`${sql} failed`);
        }
        // INSERT ... RETURNING hands back the stored row
        const rows = sql.startsWith('INSERT') ? narrowResult<T>({ rows: [{ id: 1 }], rowCount: 1 }).rows : [];
        return { rows, rowCount: rows.length };
      },
      release: (destroy?: boolean) => {
        this.released++;
        if (destroy) {
          this.destroyed++;
        }
      },
    };
  }

  async end(): Promise<void> {}

  getDriverName(): string {
    return 'recording';
  }
}

describe('DatabaseClient.transaction', () => {
  test('should wrap the callback in BEGIN and COMMIT and release the connection', async () => {
    const client = new RecordingClient();

    const result = await client.transaction(async (query) => {
      await query('SELECT 1');
      return 42;
    });

    expect(result).toBe(42);
    expect(client.statements).toEqual(['BEGIN', 'SELECT 1', 'COMMIT']);
    expect(client.released).toBe(1);
  });

  test('should roll back and rethrow when the callback fails', async () => {
    const client = new RecordingClient();

    await expect(client.transaction(async (query) => {
      await query('SELECT 1');
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(client.statements).toEqual(['BEGIN', 'SELECT 1', 'ROLLBACK']);
    expect(client.released).toBe(1);
    expect(client.destroyed).toBe(0);
  });

  test('should keep the original error and discard the connection when ROLLBACK fails', async () => {
    const client = new RecordingClient('ROLLBACK');

    await expect(client.transaction(async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(client.statements).toEqual(['BEGIN', 'ROLLBACK']);
    expect(client.released).toBe(1);
    expect(client.destroyed).toBe(1);
  });
});

describe('TransactionalClient', () => {
  test('should report being in a transaction and refuse new connections', async () => {
    const parent = new RecordingClient();
    const client = new TransactionalClient(async () => ({ rows: [], rowCount: 0 }), parent);

    expect(client.isInTransaction()).toBe(true);
    expect(client.getDriverName()).toBe('recording');
    await expect(client.connect()).rejects.toThrow('Cannot get a new connection while in a transaction');
    await expect(client.transaction(async () => 1)).rejects.toThrow('Nested transactions are not supported');
  });
});

describe('DbContext.transaction', () => {
  test('should commit changes when the callback succeeds', async () => {
    await withDatabase(async (db) => {
      await db.transaction(async (ctx) => {
        await ctx.users.insert({ email: 'tx@test.com', password: 'hash', name: 'Tx User' });

        // Visible inside the transaction
        expect(await ctx.users.count()).toBe(1);
      });

      expect(await db.users.count()).toBe(1);
      const user = await db.users.where({ email: 'tx@test.com' }).firstOrDefault();
      expect(user?.name).toBe('Tx User');
    });
  });

  test('should run every write on the transaction connection and roll it back when the callback throws', async () => {
    const client = new RecordingClient();
    const db = new BlogDatabase(client);

    await expect(db.transaction(async (ctx) => {
      await ctx.users.insert({ email: 'rollback@test.com', password: 'hash', name: 'Rolled Back' });
      throw new Error('abort');
    })).rejects.toThrow('abort');

    expect(client.statements).toEqual([
      'BEGIN',
      'INSERT INTO "users" ("email", "password", "name") VALUES ($1, $2, $3) RETURNING *',
      'ROLLBACK',
    ]);
    expect(client.directStatements).toEqual([]);
    expect(client.released).toBe(1);
  });

  test('should commit the writes of a successful callback on the same connection', async () => {
    const client = new RecordingClient();
    const db = new BlogDatabase(client);

    await db.transaction(async (ctx) => {
      await ctx.users.insert({ email: 'tx@test.com', password: 'hash', name: 'Tx User' });
    });

    expect(client.statements).toEqual([
      'BEGIN',
      'INSERT INTO "users" ("email", "password", "name") VALUES ($1, $2, $3) RETURNING *',
      'COMMIT',
    ]);
    expect(client.directStatements).toEqual([]);
  });

  test('should hand the callback a context of the same class bound to the transaction', async () => {
    await withDatabase(async (db) => {
      const result = await db.transaction(async (ctx) => {
        expect(ctx).toBeInstanceOf(BlogDatabase);
        expect(ctx.getClient().isInTransaction()).toBe(true);
        return 'done';
      });

      expect(result).toBe('done');
      expect(db.getClient().isInTransaction()).toBe(false);
    });
  });

  test('should join the outer transaction when called on a transactional context', async () => {
    await withDatabase(async (db) => {
      await db.transaction(async (outer) => {
        await outer.transaction(async (inner) => {
          expect(inner).toBe(outer);
        });
      });
    });
  });
});
