import type { ModelRegistry } from '../../core/registry';
import type { Model, ModelObject } from '../../core/types';
import { isRecord } from '../../core/types';

/**
 * Module-level in-memory storage: table name to primary key to record.
 * Records hold stored fields only; relationship values are attached on
 * load.
 */
export const storage = new Map<string, Map<string, ModelObject>>();

/**
 * Returns the per-table Map for the given table name, creating it lazily.
 */
export function getStore(tableName: string): Map<string, ModelObject> {
  let store = storage.get(tableName);
  if (!store) {
    store = new Map();
    storage.set(tableName, store);
  }
  return store;
}

/**
 * Returns a copy of `record` with the named relationship attached: the
 * related record or `null` for to-one relations, an array for `hasMany`.
 */
export function loadRelation(
  registry: ModelRegistry,
  model: Model,
  record: ModelObject,
  relationName: string
): ModelObject {
  const relation = registry.relation(model, relationName);
  const relatedModel = registry.relatedModel(model, relationName);
  const related = Array.from(getStore(relatedModel.tableName).values());

  switch (relation.type) {
    case 'belongsTo': {
      // For belongsTo, the foreign key is on the current record
      const foreignValue = record[relation.foreignKey];
      const parentKey = relation.localKey ?? registry.primaryKey(relatedModel);
      const parent = foreignValue === undefined || foreignValue === null
        ? undefined
        : related.find((item) => item[parentKey] === foreignValue);
      return { ...record, [relationName]: parent ? { ...parent } : null };
    }
    case 'hasOne':
    case 'hasMany': {
      const localValue = record[relation.localKey ?? registry.primaryKey(model)];
      const children = localValue === undefined || localValue === null
        ? []
        : related.filter((item) => item[relation.foreignKey] === localValue).map((item) => ({ ...item }));
      if (relation.type === 'hasMany') {
        return { ...record, [relationName]: children };
      }
      return { ...record, [relationName]: children[0] ?? null };
    }
  }
}

/**
 * Attaches several relationships to a record.
 */
export function loadRelations(
  registry: ModelRegistry,
  model: Model,
  record: ModelObject,
  relationNames: string[]
): ModelObject {
  let result = { ...record };
  for (const name of relationNames) {
    result = loadRelation(registry, model, result, name);
  }
  return result;
}

/**
 * Copies relationship values of an instance into foreign key columns:
 * the instance's own column for `belongsTo`, the related records' columns
 * for `hasOne` and `hasMany`. Related records no longer referenced are
 * detached.
 */
export function syncForeignKeys(
  registry: ModelRegistry,
  model: Model,
  instance: ModelObject,
  record: ModelObject
): void {
  for (const name of registry.relationshipNames(model)) {
    if (!(name in instance)) continue;
    const relation = registry.relation(model, name);
    const relatedModel = registry.relatedModel(model, name);
    const value = instance[name];

    if (relation.type === 'belongsTo') {
      const parentKey = relation.localKey ?? registry.primaryKey(relatedModel);
      record[relation.foreignKey] = isRecord(value) ? value[parentKey] : null;
      continue;
    }

    const localValue = record[relation.localKey ?? registry.primaryKey(model)];
    const relatedKey = registry.primaryKey(relatedModel);
    const store = getStore(relatedModel.tableName);
    const children = (Array.isArray(value) ? value : [value]).filter(isRecord);
    const keep = new Set(children.map((child) => String(child[relatedKey])));

    for (const [key, stored] of store) {
      if (stored[relation.foreignKey] === localValue && !keep.has(key)) {
        store.set(key, { ...stored, [relation.foreignKey]: null });
      }
    }
    for (const key of keep) {
      const stored = store.get(key);
      if (stored) {
        store.set(key, { ...stored, [relation.foreignKey]: localValue });
      }
    }
  }
}

/**
 * Clears all in-memory storage. Useful for testing.
 */
export function clearStorage(): void {
  storage.clear();
}

/**
 * Gets the storage for a specific table. Useful for testing.
 */
export function getStorage(tableName: string): Map<string, ModelObject> {
  return getStore(tableName);
}
