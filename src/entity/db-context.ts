import { DatabaseClient, TransactionalClient } from '../database/database-client.interface';
import { DbEntity, EntityConstructor } from './entity-base';
import { DbModelConfig } from './model-config';
import { DbEntityTable } from '../query/entity-table';
import { QueryLogOptions } from '../query/sql-utils';
import { SchemaManager } from '../schema/schema-manager';

/**
 * Options for a database context
 */
export interface DbContextOptions extends QueryLogOptions {}

/**
 * Base class for application database contexts.
 *
 * Subclasses configure their entities in `setupModel` and expose typed tables
 * through getters calling `this.table(Entity)`.
 */
export abstract class DbContext {
  private model: DbModelConfig;

  constructor(
    protected client: DatabaseClient,
    protected options: DbContextOptions = {}
  ) {
    this.model = new DbModelConfig();
    this.setupModel(this.model);
  }

  /**
   * Configure entities, columns and relations
   */
  protected abstract setupModel(model: DbModelConfig): void;

  /**
   * Typed table accessor for an entity of the model
   */
  table<TEntity extends DbEntity>(entityClass: EntityConstructor<TEntity>): DbEntityTable<TEntity> {
    return new DbEntityTable<TEntity>(this.client, this.model.getMetadata(entityClass), this.options);
  }

  /**
   * Run a callback inside a transaction.
   * The callback receives a context of the same class whose tables all use the
   * transaction's connection. Commits when the callback resolves, rolls back when it throws.
   */
  async transaction<T>(callback: (ctx: this) => Promise<T>): Promise<T> {
    if (this.client.isInTransaction()) {
      return callback(this);
    }
    return this.client.transaction(async (query) => {
      // Shares model and options with this context through the prototype chain
      const scoped: this = Object.create(this);
      scoped.client = new TransactionalClient(query, this.client);
      return callback(scoped);
    });
  }

  getSchemaManager(): SchemaManager {
    return new SchemaManager(this.client, this.model, { logQueries: this.options.logQueries });
  }

  getModel(): DbModelConfig {
    return this.model;
  }

  getClient(): DatabaseClient {
    return this.client;
  }

  /**
   * Release the underlying connection pool
   */
  async dispose(): Promise<void> {
    await this.client.end();
  }
}
