import { randomUUID } from 'node:crypto';
import { NotFoundException } from '../../core/exceptions';
import type { ModelRegistry } from '../../core/registry';
import type { Model, ModelObject, Session } from '../../core/types';
import { getStore, loadRelations, syncForeignKeys } from './helpers';

/**
 * Session over the module-level in-memory storage.
 *
 * @example
 * ```ts
 * const session = new MemorySession(registry);
 * const person = await session.add(PersonModel, { name: 'Ann' });
 * const loaded = await session.load(PersonModel, 1);
 * ```
 */
export class MemorySession implements Session {
  constructor(private readonly registry: ModelRegistry) {}

  /**
   * Fetches a stored record without its relationships.
   * @throws NotFoundException when no record has this primary key
   */
  async get(model: Model, id: string | number): Promise<ModelObject> {
    const record = getStore(model.tableName).get(String(id));
    if (!record) {
      throw new NotFoundException(this.registry.collectionName(model), id);
    }
    return { ...record };
  }

  /**
   * Fetches a stored record with relationships attached, all of them unless
   * `include` names some.
   */
  async load(model: Model, id: string | number, include?: string[]): Promise<ModelObject> {
    const record = await this.get(model, id);
    return loadRelations(this.registry, model, record, include ?? this.registry.relationshipNames(model));
  }

  /**
   * Stores an instance, typically one built by a deserializer.
   * Relationship values are written through to foreign key columns and a
   * missing primary key is generated. Returns the stored record.
   */
  async add(model: Model, instance: ModelObject): Promise<ModelObject> {
    const store = getStore(model.tableName);
    const primaryKey = this.registry.primaryKey(model);

    const record: ModelObject = {};
    for (const [key, value] of Object.entries(instance)) {
      if (!this.registry.hasRelationship(model, key)) {
        record[key] = value;
      }
    }
    if (record[primaryKey] === undefined || record[primaryKey] === null) {
      record[primaryKey] = this.generateId(model);
    }

    syncForeignKeys(this.registry, model, instance, record);
    store.set(String(record[primaryKey]), record);
    return { ...record };
  }

  /**
   * Removes a stored record.
   * @throws NotFoundException when no record has this primary key
   */
  async delete(model: Model, id: string | number): Promise<void> {
    const store = getStore(model.tableName);
    if (!store.delete(String(id))) {
      throw new NotFoundException(this.registry.collectionName(model), id);
    }
  }

  /**
   * Generates a primary key: the next integer for numeric keys, a UUID
   * otherwise. Override to customize ID generation.
   */
  protected generateId(model: Model): string | number {
    if (!this.registry.hasNumericPrimaryKey(model)) {
      return randomUUID();
    }
    const primaryKey = this.registry.primaryKey(model);
    let max = 0;
    for (const record of getStore(model.tableName).values()) {
      const value = record[primaryKey];
      if (typeof value === 'number' && value > max) max = value;
    }
    return max + 1;
  }
}

export { clearStorage, getStorage, loadRelation, loadRelations } from './helpers';
