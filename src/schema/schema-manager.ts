import { DatabaseClient } from '../database/database-client.interface';
import { EntityMetadata, NavigationMetadata } from '../entity/entity-base';
import { DbModelConfig } from '../entity/model-config';
import { quoteIdentifier } from '../query/sql-utils';

/**
 * Creates and drops the tables described by a model
 */
export class SchemaManager {
  private logQueries: boolean;
  private schemaName: string;

  constructor(
    private client: DatabaseClient,
    private model: DbModelConfig,
    options?: { logQueries?: boolean; schemaName?: string }
  ) {
    this.logQueries = options?.logQueries ?? false;
    this.schemaName = options?.schemaName ?? 'public';
  }

  /**
   * Names of the tables present in the schema
   */
  async getExistingTables(): Promise<string[]> {
    const result = await this.client.query<{ table_name: string }>(
      'SELECT table_name FROM information_schema.tables WHERE table_schema = $1',
      [this.schemaName]
    );
    return result.rows.map(row => row.table_name);
  }

  /**
   * Create every table that does not exist yet, referenced tables first
   */
  async ensureCreated(): Promise<void> {
    const existing = new Set(await this.getExistingTables());
    for (const entity of this.getCreationOrder()) {
      if (existing.has(entity.tableName)) {
        continue;
      }
      if (this.logQueries) {
        console.log(`  Creating table "${entity.tableName}"...`);
      }
      await this.client.query(this.getCreateTableSql(entity));
    }
  }

  /**
   * Drop every table of the model, dependents first
   */
  async ensureDeleted(): Promise<void> {
    for (const entity of this.getCreationOrder().reverse()) {
      if (this.logQueries) {
        console.log(`  Dropping table "${entity.tableName}"...`);
      }
      await this.client.query(`DROP TABLE IF EXISTS ${quoteIdentifier(entity.tableName)} CASCADE`);
    }
  }

  /**
   * Entities ordered so that every table comes after the tables it references
   */
  getCreationOrder(): EntityMetadata[] {
    const ordered: EntityMetadata[] = [];
    const visiting = new Set<EntityMetadata>();

    const visit = (entity: EntityMetadata): void => {
      if (ordered.includes(entity)) return;
      if (visiting.has(entity)) {
        throw new Error(`Circular reference involving table "${entity.tableName}"`);
      }
      visiting.add(entity);
      for (const navigation of entity.navigations.values()) {
        const target = this.model.getMetadata(navigation.targetEntity());
        if (target !== entity) {
          visit(target);
        }
      }
      visiting.delete(entity);
      ordered.push(entity);
    };

    for (const entity of this.model.getEntities()) {
      visit(entity);
    }
    return ordered;
  }

  /**
   * Build the CREATE TABLE statement for an entity
   */
  getCreateTableSql(entity: EntityMetadata): string {
    const requiredForeignKeys = new Set(
      Array.from(entity.navigations.values())
        .filter(nav => nav.isRequired)
        .map(nav => nav.foreignKey)
    );

    const definitions: string[] = [];

    for (const property of entity.properties.values()) {
      let definition = `${quoteIdentifier(property.columnName)} ${property.columnBuilder.sqlType()}`;
      if (property.isPrimaryKey) {
        definition += ' PRIMARY KEY';
      } else if (property.isRequired || requiredForeignKeys.has(property.propertyKey)) {
        definition += ' NOT NULL';
      }
      if (property.isUnique) {
        definition += ' UNIQUE';
      }
      definitions.push(definition);
    }

    for (const navigation of entity.navigations.values()) {
      definitions.push(this.buildForeignKey(entity, navigation));
    }

    return `CREATE TABLE IF NOT EXISTS ${quoteIdentifier(entity.tableName)} (\n  ${definitions.join(',\n  ')}\n)`;
  }

  private buildForeignKey(entity: EntityMetadata, navigation: NavigationMetadata): string {
    const target = this.model.getMetadata(navigation.targetEntity());

    const fkProperty = entity.properties.get(navigation.foreignKey);
    if (!fkProperty) {
      throw new Error(`Foreign key property "${navigation.foreignKey}" not found on ${entity.entityClass.name}`);
    }

    const pkProperty = target.properties.get(navigation.principalKey);
    if (!pkProperty) {
      throw new Error(`Principal key property "${navigation.principalKey}" not found on ${target.entityClass.name}`);
    }

    const constraintName = `FK_${entity.tableName}_${target.tableName}_${fkProperty.columnName}`;

    let sql = `CONSTRAINT ${quoteIdentifier(constraintName)} FOREIGN KEY (${quoteIdentifier(fkProperty.columnName)})` +
      ` REFERENCES ${quoteIdentifier(target.tableName)} (${quoteIdentifier(pkProperty.columnName)})`;

    if (navigation.onDelete) {
      sql += ` ON DELETE ${navigation.onDelete.toUpperCase()}`;
    }
    return sql;
  }
}
