import { ColumnBuilder } from '../types/column-types';

/**
 * Unique symbol for DbEntity type branding
 * @internal
 */
declare const __entityBrandSymbol: unique symbol;

/**
 * Base class for all entities
 */
export abstract class DbEntity {
  /** @internal - Type brand to distinguish DbEntity from plain objects in the type system */
  declare readonly [__entityBrandSymbol]: true;
}

/**
 * DbEntity constructor type
 */
export type EntityConstructor<T extends DbEntity = DbEntity> = new () => T;

/**
 * Property metadata
 */
export interface PropertyMetadata {
  propertyKey: string;
  columnName: string;
  columnBuilder: ColumnBuilder;
  isPrimaryKey: boolean;
  isRequired: boolean;
  isUnique: boolean;
}

/**
 * Foreign key action type
 */
export type ForeignKeyAction = 'cascade' | 'restrict' | 'no action' | 'set null' | 'set default';

/**
 * Navigation metadata for a reference held by this entity (the FK side)
 */
export interface NavigationMetadata {
  propertyKey: string;
  targetEntity: () => EntityConstructor;
  foreignKey: string;
  principalKey: string;
  isRequired: boolean;
  onDelete?: ForeignKeyAction;
}

/**
 * DbEntity metadata for a single entity
 */
export interface EntityMetadata {
  entityClass: EntityConstructor;
  tableName: string;
  properties: Map<string, PropertyMetadata>;
  navigations: Map<string, NavigationMetadata>;
}

/**
 * Find the primary key property of an entity
 */
export function getPrimaryKey(metadata: EntityMetadata): PropertyMetadata {
  for (const property of metadata.properties.values()) {
    if (property.isPrimaryKey) {
      return property;
    }
  }
  throw new Error(`Entity ${metadata.entityClass.name} has no primary key`);
}
