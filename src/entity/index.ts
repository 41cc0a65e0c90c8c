export { DbColumn } from './db-column';
export type { EntityRow, ExtractDbColumnKeys, ExtractDbColumns, InsertData, UpdateData, WhereFilter } from './db-column';
export { DbEntity, getPrimaryKey } from './entity-base';
export type { EntityConstructor, EntityMetadata, ForeignKeyAction, NavigationMetadata, PropertyMetadata } from './entity-base';
export { DbModelConfig, EntityConfigBuilder, NavigationConfigBuilder, PropertyConfigBuilder } from './model-config';
export type { ReferenceKeys } from './model-config';
export { DbContext } from './db-context';
export type { DbContextOptions } from './db-context';
