import { QueryParam } from '../database/database-client.interface';
import { EntityMetadata, PropertyMetadata } from '../entity/entity-base';

/**
 * Query logging switches shared by contexts and tables
 */
export interface QueryLogOptions {
  logQueries?: boolean;
  logParameters?: boolean;
}

/**
 * A column assignment or comparison, already resolved to its database column
 */
export interface ColumnValue {
  property: PropertyMetadata;
  value: QueryParam;
}

/**
 * Quote an identifier for PostgreSQL
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Convert an application value to a bindable query parameter
 */
export function toQueryParam(value: unknown, propertyKey: string): QueryParam {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean' || value instanceof Date) {
    return value;
  }
  throw new Error(`Unsupported value for column property "${propertyKey}": ${typeof value}`);
}

/**
 * Resolve a partial object of property values to column values.
 * Keys that are undefined are skipped; unknown keys are rejected.
 */
export function resolveColumnValues(metadata: EntityMetadata, data: object): ColumnValue[] {
  const resolved: ColumnValue[] = [];
  for (const [key, value] of Object.entries(data)) {
    if (value === undefined) continue;
    const property = metadata.properties.get(key);
    if (!property) {
      throw new Error(`Unknown property "${key}" on ${metadata.entityClass.name}`);
    }
    resolved.push({ property, value: toQueryParam(value, key) });
  }
  return resolved;
}

/**
 * Build a WHERE clause of equality conditions joined by AND.
 * NULL values compare with IS NULL.
 */
export function buildWhereClause(conditions: ColumnValue[], params: QueryParam[]): string {
  if (conditions.length === 0) {
    return '';
  }
  const parts = conditions.map(({ property, value }) => {
    const column = quoteIdentifier(property.columnName);
    if (value === null) {
      return `${column} IS NULL`;
    }
    params.push(value);
    return `${column} = $${params.length}`;
  });
  return ` WHERE ${parts.join(' AND ')}`;
}

/**
 * Build INSERT ... RETURNING * for the given column values
 */
export function buildInsertSql(metadata: EntityMetadata, values: ColumnValue[]): { sql: string; params: QueryParam[] } {
  const table = quoteIdentifier(metadata.tableName);
  if (values.length === 0) {
    return { sql: `INSERT INTO ${table} DEFAULT VALUES RETURNING *`, params: [] };
  }
  const columns = values.map(v => quoteIdentifier(v.property.columnName));
  const placeholders = values.map((_, index) => `$${index + 1}`);
  return {
    sql: `INSERT INTO ${table} (${columns.join(', ')}) VALUES (${placeholders.join(', ')}) RETURNING *`,
    params: values.map(v => v.value),
  };
}

/**
 * Build UPDATE ... RETURNING * for a single row identified by its primary key
 */
export function buildUpdateSql(
  metadata: EntityMetadata,
  primaryKey: PropertyMetadata,
  id: number,
  values: ColumnValue[]
): { sql: string; params: QueryParam[] } {
  const params: QueryParam[] = values.map(v => v.value);
  const assignments = values.map((v, index) => `${quoteIdentifier(v.property.columnName)} = $${index + 1}`);
  params.push(id);
  return {
    sql: `UPDATE ${quoteIdentifier(metadata.tableName)} SET ${assignments.join(', ')}` +
      ` WHERE ${quoteIdentifier(primaryKey.columnName)} = $${params.length} RETURNING *`,
    params,
  };
}

/**
 * Map a driver row (keyed by column name) to property names
 */
export function mapRowToProperties(metadata: EntityMetadata, row: Record<string, unknown>): Record<string, unknown> {
  const mapped: Record<string, unknown> = {};
  for (const property of metadata.properties.values()) {
    mapped[property.propertyKey] = row[property.columnName];
  }
  return mapped;
}

/**
 * Log a statement according to the logging switches
 */
export function logQuery(sql: string, params: QueryParam[], options: QueryLogOptions): void {
  if (!options.logQueries) return;
  console.log('[SQL]', sql);
  if (options.logParameters && params.length > 0) {
    console.log('[SQL params]', params);
  }
}
