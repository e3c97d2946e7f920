import { NotFoundException } from '../../core/exceptions';
import type { ModelRegistry } from '../../core/registry';
import { isRecord } from '../../core/types';
import type { Model, ModelObject, Session } from '../../core/types';
import {
  cast,
  getTable,
  loadDrizzleRelations,
  selectWhere,
} from './helpers';
import type { DrizzleDatabaseConstraint } from './helpers';

/**
 * Session backed by a Drizzle database. Every model it touches must carry
 * its Drizzle table in `model.table`.
 *
 * @example
 * ```ts
 * const db = drizzle(createClient({ url: ':memory:' }));
 * const session = new DrizzleSession(db, registry);
 * const deserializer = new ResourceDeserializer(session, ArticleModel, registry);
 * ```
 */
export class DrizzleSession<DB extends DrizzleDatabaseConstraint = DrizzleDatabaseConstraint>
  implements Session
{
  constructor(
    readonly db: DB,
    private readonly registry: ModelRegistry
  ) {}

  async get(model: Model, id: string | number): Promise<ModelObject> {
    const table = getTable(model);
    const [row] = await selectWhere(this.db, table, this.registry.primaryKey(model), id, 1);
    if (!row) {
      throw new NotFoundException(this.registry.collectionName(model), id);
    }
    return row;
  }

  /**
   * Fetches a row with relationships attached, all of them unless `include`
   * names some.
   */
  async load(model: Model, id: string | number, include?: string[]): Promise<ModelObject> {
    const row = await this.get(model, id);
    return loadDrizzleRelations(
      this.db,
      this.registry,
      model,
      row,
      include ?? this.registry.relationshipNames(model)
    );
  }

  /**
   * Inserts an instance built by a deserializer. `belongsTo` relationship
   * values fill their foreign key columns; other relationship values are
   * not written. Returns the inserted row.
   */
  async add(model: Model, instance: ModelObject): Promise<ModelObject> {
    const table = getTable(model);
    const values: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(instance)) {
      if (!this.registry.hasRelationship(model, key)) {
        values[key] = value;
        continue;
      }
      const relation = this.registry.relation(model, key);
      if (relation.type === 'belongsTo') {
        const relatedModel = this.registry.relatedModel(model, key);
        const parentKey = relation.localKey ?? this.registry.primaryKey(relatedModel);
        values[relation.foreignKey] = isRecord(value) ? value[parentKey] : null;
      }
    }

    const [row] = (await cast(this.db).insert(table).values(values).returning()).filter(isRecord);
    if (!row) {
      throw new NotFoundException(this.registry.collectionName(model));
    }
    return row;
  }
}

export {
  cast,
  getColumn,
  getTable,
  loadDrizzleRelation,
  loadDrizzleRelations,
} from './helpers';
export type { Database, QueryBuilder, DrizzleDatabaseConstraint } from './helpers';
