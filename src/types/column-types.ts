/**
 * PostgreSQL column types supported by the model
 */
export type ColumnType = 'serial' | 'integer' | 'varchar' | 'text';

/**
 * Resolved column definition
 */
export interface ColumnConfig {
  name: string;
  type: ColumnType;
  length?: number;
  primaryKey: boolean;
  autoIncrement: boolean;
}

/**
 * Fluent column definition used by `property(...).hasType(...)`
 */
export class ColumnBuilder<TType extends ColumnType = ColumnType> {
  private config: ColumnConfig;

  constructor(name: string, type: TType, length?: number) {
    this.config = {
      name,
      type,
      length,
      primaryKey: false,
      autoIncrement: type === 'serial',
    };
  }

  /**
   * Mark this column as the table's primary key
   */
  primaryKey(): this {
    this.config.primaryKey = true;
    return this;
  }

  /**
   * SQL type as written in DDL, e.g. `varchar(250)`
   */
  sqlType(): string {
    return this.config.length !== undefined
      ? `${this.config.type}(${this.config.length})`
      : this.config.type;
  }

  build(): ColumnConfig {
    return { ...this.config };
  }
}

export function serial(name: string): ColumnBuilder<'serial'> {
  return new ColumnBuilder(name, 'serial');
}

export function integer(name: string): ColumnBuilder<'integer'> {
  return new ColumnBuilder(name, 'integer');
}

export function varchar(name: string, length: number): ColumnBuilder<'varchar'> {
  return new ColumnBuilder(name, 'varchar', length);
}

export function text(name: string): ColumnBuilder<'text'> {
  return new ColumnBuilder(name, 'text');
}
