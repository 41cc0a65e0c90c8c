/**
 * Typed column marker declared on entity classes.
 *
 * Entities declare `email!: DbColumn<string>`; rows read from or written to the
 * database carry the unwrapped value type instead.
 */
export class DbColumn<TValue> {
  /** @internal */
  readonly __isDbColumn = true;

  /** @internal */
  declare readonly __valueType: TValue;
}

/**
 * Helper to check if a type includes DbColumn
 */
type IncludesDbColumn<T> = NonNullable<T> extends DbColumn<unknown> ? true : false;

/**
 * Helper to unwrap DbColumn from potentially optional type
 */
type UnwrapOptionalDbColumn<T> = NonNullable<T> extends DbColumn<infer V> ? V : never;

/**
 * Type helper to extract only DbColumn properties from an entity.
 * Navigation properties are dropped, column values are unwrapped.
 */
export type ExtractDbColumns<T> = {
  [K in keyof T as IncludesDbColumn<T[K]> extends true ? K : never]: UnwrapOptionalDbColumn<T[K]>;
};

/**
 * Type helper to extract just the keys of DbColumn properties from an entity.
 *
 * @example
 * ```typescript
 * class User extends DbEntity {
 *   id!: DbColumn<number>;
 *   email!: DbColumn<string>;
 *   posts?: Post[]; // navigation property
 * }
 *
 * type UserColumnKeys = ExtractDbColumnKeys<User>;
 * // Result: 'id' | 'email'
 * ```
 */
export type ExtractDbColumnKeys<T> = keyof ExtractDbColumns<T> & string;

/**
 * A row of an entity's table as seen by application code
 */
export type EntityRow<TEntity> = ExtractDbColumns<TEntity>;

/**
 * Type for insert data - column values without the generated primary key
 */
export type InsertData<TEntity> = Omit<ExtractDbColumns<TEntity>, 'id'>;

/**
 * Type for update data - any subset of the non-key columns
 */
export type UpdateData<TEntity> = Partial<InsertData<TEntity>>;

/**
 * Equality filter over column values
 */
export type WhereFilter<TEntity> = Partial<ExtractDbColumns<TEntity>>;
