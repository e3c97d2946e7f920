import { eq, getTableColumns, is, Table } from 'drizzle-orm';
import type { Column } from 'drizzle-orm';
import { ConfigurationException } from '../../core/exceptions';
import type { ModelRegistry } from '../../core/registry';
import { isRecord } from '../../core/types';
import type { Model, ModelObject } from '../../core/types';

// ============================================================================
// Drizzle Database Types
// ============================================================================

/**
 * Internal query builder interface used for type-safe method calls.
 * All Drizzle query builders satisfy this interface at runtime.
 */
export interface QueryBuilder extends PromiseLike<unknown[]> {
  where(condition: unknown): QueryBuilder;
  limit(n: number): QueryBuilder;
  values(data: Record<string, unknown>): QueryBuilder;
  returning(): QueryBuilder;
}

/**
 * Internal database interface used for type-safe method calls.
 * All Drizzle databases (PostgreSQL, MySQL, SQLite) satisfy this interface at runtime.
 */
export interface Database {
  select(): { from(table: Table): QueryBuilder };
  insert(table: Table): QueryBuilder;
}

/**
 * Casts a database to the internal Database interface for method calls.
 * This is safe because all Drizzle databases have these methods at runtime.
 */
export function cast<T>(instance: T): Database {
  return instance as unknown as Database;
}

/**
 * Base constraint for Drizzle database types.
 *
 * @example
 * ```ts
 * import { drizzle } from 'drizzle-orm/libsql';
 *
 * const session = new DrizzleSession(drizzle(client), registry);
 * ```
 */
export interface DrizzleDatabaseConstraint {
  select: unknown;
  insert: unknown;
}

/**
 * Gets the Drizzle table from the model.
 * @throws ConfigurationException when the model carries no Drizzle table
 */
export function getTable(model: Model): Table {
  if (!is(model.table, Table)) {
    throw new ConfigurationException(`Model ${model.tableName} does not have a table reference`);
  }
  return model.table;
}

/**
 * Gets a column from the table.
 * Uses drizzle-orm's getTableColumns for type-safe column access.
 *
 * @throws ConfigurationException if the column is not found in the table
 */
export function getColumn(table: Table, field: string): Column {
  const columns = getTableColumns(table);
  const column = columns[field];
  if (!column) {
    throw new ConfigurationException(
      `Column '${field}' not found in table. ` +
      `Available columns: ${Object.keys(columns).join(', ')}`
    );
  }
  return column;
}

/**
 * Selects the rows of `table` whose `field` equals `value`.
 */
export async function selectWhere(
  db: DrizzleDatabaseConstraint,
  table: Table,
  field: string,
  value: unknown,
  limit?: number
): Promise<ModelObject[]> {
  const query = cast(db).select().from(table).where(eq(getColumn(table, field), value));
  const rows = await (limit === undefined ? query : query.limit(limit));
  return rows.filter(isRecord);
}

/**
 * Loads related records for a given item using Drizzle queries.
 */
export async function loadDrizzleRelation(
  db: DrizzleDatabaseConstraint,
  registry: ModelRegistry,
  model: Model,
  item: ModelObject,
  relationName: string
): Promise<ModelObject> {
  const relation = registry.relation(model, relationName);
  const relatedModel = registry.relatedModel(model, relationName);
  const relatedTable = getTable(relatedModel);

  switch (relation.type) {
    case 'hasOne': {
      const localValue = item[relation.localKey ?? registry.primaryKey(model)];
      if (localValue === undefined || localValue === null) {
        return { ...item, [relationName]: null };
      }
      const results = await selectWhere(db, relatedTable, relation.foreignKey, localValue, 1);
      return { ...item, [relationName]: results[0] ?? null };
    }
    case 'hasMany': {
      const localValue = item[relation.localKey ?? registry.primaryKey(model)];
      if (localValue === undefined || localValue === null) {
        return { ...item, [relationName]: [] };
      }
      const results = await selectWhere(db, relatedTable, relation.foreignKey, localValue);
      return { ...item, [relationName]: results };
    }
    case 'belongsTo': {
      // For belongsTo, the foreign key is on the current item
      const foreignValue = item[relation.foreignKey];
      if (foreignValue === undefined || foreignValue === null) {
        return { ...item, [relationName]: null };
      }
      const parentKey = relation.localKey ?? registry.primaryKey(relatedModel);
      const results = await selectWhere(db, relatedTable, parentKey, foreignValue, 1);
      return { ...item, [relationName]: results[0] ?? null };
    }
  }
}

/**
 * Loads all requested relations for an item, one query per relation.
 */
export async function loadDrizzleRelations(
  db: DrizzleDatabaseConstraint,
  registry: ModelRegistry,
  model: Model,
  item: ModelObject,
  relationNames: string[]
): Promise<ModelObject> {
  let result = { ...item };
  for (const relationName of relationNames) {
    result = await loadDrizzleRelation(db, registry, model, result, relationName);
  }
  return result;
}
