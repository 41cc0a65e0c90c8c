import { DbEntity, EntityConstructor, EntityMetadata, ForeignKeyAction, NavigationMetadata, PropertyMetadata } from './entity-base';
import { ExtractDbColumnKeys } from './db-column';
import { ColumnBuilder } from '../types/column-types';

/**
 * Keys of an entity that hold a single related entity
 */
export type ReferenceKeys<T> = {
  [K in keyof T]-?: NonNullable<T[K]> extends DbEntity ? K : never;
}[keyof T] & string;

/**
 * Configures a single column property
 */
export class PropertyConfigBuilder {
  constructor(private metadata: PropertyMetadata) {}

  /**
   * Map the property to a column definition
   */
  hasType(column: ColumnBuilder): this {
    const config = column.build();
    this.metadata.columnBuilder = column;
    this.metadata.columnName = config.name;
    this.metadata.isPrimaryKey = config.primaryKey;
    return this;
  }

  isRequired(): this {
    this.metadata.isRequired = true;
    return this;
  }

  isUnique(): this {
    this.metadata.isUnique = true;
    return this;
  }
}

/**
 * Configures a reference navigation (the side that stores the foreign key)
 */
export class NavigationConfigBuilder<TEntity extends DbEntity, TTarget extends DbEntity> {
  constructor(private metadata: NavigationMetadata) {}

  withForeignKey(key: ExtractDbColumnKeys<TEntity>): this {
    this.metadata.foreignKey = key;
    return this;
  }

  withPrincipalKey(key: ExtractDbColumnKeys<TTarget>): this {
    this.metadata.principalKey = key;
    return this;
  }

  onDelete(action: ForeignKeyAction): this {
    this.metadata.onDelete = action;
    return this;
  }

  isRequired(): this {
    this.metadata.isRequired = true;
    return this;
  }
}

/**
 * Configures a single entity
 */
export class EntityConfigBuilder<TEntity extends DbEntity> {
  constructor(private metadata: EntityMetadata) {}

  toTable(name: string): this {
    this.metadata.tableName = name;
    return this;
  }

  property(key: ExtractDbColumnKeys<TEntity>): PropertyConfigBuilder {
    let property = this.metadata.properties.get(key);
    if (!property) {
      property = {
        propertyKey: key,
        columnName: key,
        columnBuilder: new ColumnBuilder(key, 'text'),
        isPrimaryKey: false,
        isRequired: false,
        isUnique: false,
      };
      this.metadata.properties.set(key, property);
    }
    return new PropertyConfigBuilder(property);
  }

  hasOne<TTarget extends DbEntity>(
    key: ReferenceKeys<TEntity>,
    targetEntity: () => EntityConstructor<TTarget>
  ): NavigationConfigBuilder<TEntity, TTarget> {
    const navigation: NavigationMetadata = {
      propertyKey: key,
      targetEntity,
      foreignKey: `${key}Id`,
      principalKey: 'id',
      isRequired: false,
    };
    this.metadata.navigations.set(key, navigation);
    return new NavigationConfigBuilder(navigation);
  }
}

/**
 * Model builder for configuring entities
 */
export class DbModelConfig {
  private metadata = new Map<EntityConstructor, EntityMetadata>();

  /**
   * Configure an entity
   */
  entity<TEntity extends DbEntity>(
    entityClass: EntityConstructor<TEntity>,
    configure: (builder: EntityConfigBuilder<TEntity>) => void
  ): void {
    let metadata = this.metadata.get(entityClass);
    if (!metadata) {
      metadata = {
        entityClass,
        tableName: entityClass.name.toLowerCase(),
        properties: new Map(),
        navigations: new Map(),
      };
      this.metadata.set(entityClass, metadata);
    }
    configure(new EntityConfigBuilder<TEntity>(metadata));
  }

  getMetadata(entityClass: EntityConstructor): EntityMetadata {
    const metadata = this.metadata.get(entityClass);
    if (!metadata) {
      throw new Error(`Entity ${entityClass.name} is not part of the model`);
    }
    return metadata;
  }

  /**
   * All configured entities, in registration order
   */
  getEntities(): EntityMetadata[] {
    return Array.from(this.metadata.values());
  }
}
