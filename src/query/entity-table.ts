import { DatabaseClient, DbRow, QueryParam } from '../database/database-client.interface';
import { isUniqueViolation, violatedConstraint } from '../database/pg-errors';
import { UniqueViolationError } from '../errors';
import { DbEntity, EntityMetadata, PropertyMetadata, getPrimaryKey } from '../entity/entity-base';
import { EntityRow, InsertData, UpdateData, WhereFilter } from '../entity/db-column';
import {
  ColumnValue,
  QueryLogOptions,
  buildInsertSql,
  buildUpdateSql,
  buildWhereClause,
  logQuery,
  mapRowToProperties,
  quoteIdentifier,
  resolveColumnValues,
} from './sql-utils';

/**
 * Equality-filtered query over one table
 */
export class DbQuery<TEntity extends DbEntity> {
  constructor(
    private table: DbEntityTable<TEntity>,
    private conditions: ColumnValue[]
  ) {}

  /**
   * All matching rows, ordered by primary key
   */
  async toList(): Promise<EntityRow<TEntity>[]> {
    return this.table.select(this.conditions);
  }

  /**
   * First matching row by primary key order, or null
   */
  async firstOrDefault(): Promise<EntityRow<TEntity> | null> {
    const rows = await this.table.select(this.conditions, 1);
    return rows[0] ?? null;
  }

  async count(): Promise<number> {
    return this.table.countWhere(this.conditions);
  }
}

/**
 * Typed access to the table of one entity
 */
export class DbEntityTable<TEntity extends DbEntity> {
  private primaryKey: PropertyMetadata;

  constructor(
    private client: DatabaseClient,
    private metadata: EntityMetadata,
    private logOptions: QueryLogOptions = {}
  ) {
    this.primaryKey = getPrimaryKey(metadata);
  }

  /**
   * Insert a row and return it as stored (including the generated key)
   */
  async insert(data: InsertData<TEntity>): Promise<EntityRow<TEntity>> {
    const { sql, params } = buildInsertSql(this.metadata, resolveColumnValues(this.metadata, data));
    const result = await this.execute(sql, params);
    const row = result[0];
    if (!row) {
      throw new Error(`Insert into "${this.metadata.tableName}" returned no row`);
    }
    return row;
  }

  /**
   * Row with the given primary key, or null
   */
  async findById(id: number): Promise<EntityRow<TEntity> | null> {
    const rows = await this.select([{ property: this.primaryKey, value: id }], 1);
    return rows[0] ?? null;
  }

  /**
   * All rows, ordered by primary key
   */
  async toList(): Promise<EntityRow<TEntity>[]> {
    return this.select([]);
  }

  /**
   * Filter rows by column equality
   */
  where(filter: WhereFilter<TEntity>): DbQuery<TEntity> {
    return new DbQuery(this, resolveColumnValues(this.metadata, filter));
  }

  /**
   * Update the row with the given primary key. Returns the updated row, or null if none matched.
   */
  async update(id: number, data: UpdateData<TEntity>): Promise<EntityRow<TEntity> | null> {
    const values = resolveColumnValues(this.metadata, data);
    if (values.length === 0) {
      return this.findById(id);
    }
    const { sql, params } = buildUpdateSql(this.metadata, this.primaryKey, id, values);
    const rows = await this.execute(sql, params);
    return rows[0] ?? null;
  }

  /**
   * Delete the row with the given primary key. Returns whether a row was deleted.
   */
  async delete(id: number): Promise<boolean> {
    const sql = `DELETE FROM ${quoteIdentifier(this.metadata.tableName)}` +
      ` WHERE ${quoteIdentifier(this.primaryKey.columnName)} = $1`;
    logQuery(sql, [id], this.logOptions);
    const result = await this.client.query(sql, [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async count(): Promise<number> {
    return this.countWhere([]);
  }

  /** @internal */
  async select(conditions: ColumnValue[], limit?: number): Promise<EntityRow<TEntity>[]> {
    const params: QueryParam[] = [];
    let sql = `SELECT * FROM ${quoteIdentifier(this.metadata.tableName)}${buildWhereClause(conditions, params)}` +
      ` ORDER BY ${quoteIdentifier(this.primaryKey.columnName)} ASC`;
    if (limit !== undefined) {
      sql += ` LIMIT ${limit}`;
    }
    return this.execute(sql, params);
  }

  /** @internal */
  async countWhere(conditions: ColumnValue[]): Promise<number> {
    const params: QueryParam[] = [];
    const sql = `SELECT COUNT(*) AS "count" FROM ${quoteIdentifier(this.metadata.tableName)}` +
      buildWhereClause(conditions, params);
    logQuery(sql, params, this.logOptions);
    const result = await this.client.query<{ count: unknown }>(sql, params);
    return Number(result.rows[0]?.count ?? 0);
  }

  /**
   * Run a statement returning rows of this table.
   * Unique constraint violations surface as UniqueViolationError.
   */
  private async execute(sql: string, params: QueryParam[]): Promise<EntityRow<TEntity>[]> {
    logQuery(sql, params, this.logOptions);
    try {
      const result = await this.client.query(sql, params);
      return result.rows.map(row => this.toEntityRow(row));
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new UniqueViolationError(violatedConstraint(error), { cause: error });
      }
      throw error;
    }
  }

  private toEntityRow(row: DbRow): EntityRow<TEntity> {
    // Column set comes from the entity's own metadata
    return mapRowToProperties(this.metadata, row) as EntityRow<TEntity>;
  }
}
