import { z } from 'zod';
import { ConfigurationException } from './exceptions';
import { parseTemporal, temporalKind, unwrapSchema } from './temporal';
import type { Model, ModelObject, RelationConfig } from './types';

/**
 * Registry of model definitions and the schema-introspection layer used by
 * serializers and deserializers.
 *
 * Models reference each other through `relations[name].model`, which is
 * the related model's `tableName`, so every related model must be
 * registered before relationships are resolved.
 *
 * @example
 * ```ts
 * const registry = new ModelRegistry([PersonModel, ArticleModel]);
 * registry.collectionName(PersonModel); // 'person'
 * registry.foreignKeys(ArticleModel);   // ['authorId']
 * ```
 */
export class ModelRegistry {
  private readonly byTable = new Map<string, Model>();
  private readonly byCollection = new Map<string, Model>();

  constructor(models: Iterable<Model> = []) {
    for (const model of models) {
      this.register(model);
    }
  }

  /**
   * Adds a model. Table and collection names must be unique.
   */
  register(model: Model): this {
    const collection = this.collectionName(model);
    const existing = this.byTable.get(model.tableName) ?? this.byCollection.get(collection);
    if (existing && existing !== model) {
      throw new ConfigurationException(
        `A model named '${model.tableName}' (type '${collection}') is already registered`
      );
    }
    if (model.primaryKeys.length === 0) {
      throw new ConfigurationException(`Model '${model.tableName}' has no primary key`);
    }
    this.byTable.set(model.tableName, model);
    this.byCollection.set(collection, model);
    return this;
  }

  /** All registered models, in registration order. */
  models(): Model[] {
    return [...this.byTable.values()];
  }

  /**
   * Gets a model by table name.
   * @throws ConfigurationException if no such model is registered
   */
  get(tableName: string): Model {
    const model = this.byTable.get(tableName);
    if (!model) {
      throw new ConfigurationException(`Model '${tableName}' is not registered`);
    }
    return model;
  }

  /** Gets a model by its collection (resource type) name. */
  findByType(type: string): Model | undefined {
    return this.byCollection.get(type);
  }

  /** The resource type name of a model on the wire. */
  collectionName(model: Model): string {
    return model.collectionName ?? model.tableName;
  }

  // --------------------------------------------------------------------------
  // Fields
  // --------------------------------------------------------------------------

  /** Stored field names, in schema order. */
  attributeNames(model: Model): string[] {
    return Object.keys(model.schema.shape);
  }

  /** Computed field names, in declaration order. */
  computedFieldNames(model: Model): string[] {
    return Object.keys(model.computedFields ?? {});
  }

  relationshipNames(model: Model): string[] {
    return Object.keys(model.relations ?? {});
  }

  /** Columns on this model that back a to-one (`belongsTo`) relation. */
  foreignKeys(model: Model): string[] {
    return Object.values(model.relations ?? {})
      .filter((relation) => relation.type === 'belongsTo')
      .map((relation) => relation.foreignKey);
  }

  hasAttribute(model: Model, name: string): boolean {
    return Object.prototype.hasOwnProperty.call(model.schema.shape, name);
  }

  hasRelationship(model: Model, name: string): boolean {
    return model.relations !== undefined && Object.prototype.hasOwnProperty.call(model.relations, name);
  }

  // --------------------------------------------------------------------------
  // Relationships
  // --------------------------------------------------------------------------

  /**
   * @throws ConfigurationException if the model has no such relationship
   */
  relation(model: Model, name: string): RelationConfig {
    const relation = this.hasRelationship(model, name) ? model.relations?.[name] : undefined;
    if (!relation) {
      throw new ConfigurationException(`Model '${model.tableName}' has no relationship '${name}'`);
    }
    return relation;
  }

  relatedModel(model: Model, name: string): Model {
    return this.get(this.relation(model, name).model);
  }

  /** Whether the relationship holds a list of instances. */
  isToMany(model: Model, name: string): boolean {
    return this.relation(model, name).type === 'hasMany';
  }

  // --------------------------------------------------------------------------
  // Primary keys
  // --------------------------------------------------------------------------

  primaryKey(model: Model): string {
    const [primaryKey] = model.primaryKeys;
    if (primaryKey === undefined) {
      throw new ConfigurationException(`Model '${model.tableName}' has no primary key`);
    }
    return primaryKey;
  }

  primaryKeyValue(model: Model, instance: ModelObject, primaryKey?: string): unknown {
    return instance[primaryKey ?? this.primaryKey(model)];
  }

  /** Whether the primary key is declared as a number in the schema. */
  hasNumericPrimaryKey(model: Model): boolean {
    const primaryKey = this.primaryKey(model);
    if (!this.hasAttribute(model, primaryKey)) return false;
    const field = model.schema.shape[primaryKey];
    return field !== undefined && unwrapSchema(field) instanceof z.ZodNumber;
  }

  /**
   * Converts a wire `id` into the primary key's stored type. Numeric keys
   * become numbers when the text is the number's canonical form, so `'0x1'`
   * and `' 1'` stay strings.
   */
  parseId(model: Model, id: string): string | number {
    if (!this.hasNumericPrimaryKey(model)) return id;
    const numeric = Number(id);
    return Number.isFinite(numeric) && String(numeric) === id ? numeric : id;
  }

  // --------------------------------------------------------------------------
  // Instances
  // --------------------------------------------------------------------------

  /**
   * Replaces the wire form of temporal fields with `Date` and `Duration`
   * values. Non-temporal fields are copied unchanged.
   */
  stringsToTemporal(model: Model, fields: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [name, value] of Object.entries(fields)) {
      const field = this.hasAttribute(model, name) ? model.schema.shape[name] : undefined;
      const kind = field === undefined ? undefined : temporalKind(field);
      result[name] = kind === undefined ? value : parseTemporal(kind, value);
    }
    return result;
  }

  /**
   * Builds a new instance from a field map, validated against the model
   * schema with its primary keys made optional.
   *
   * @throws ZodError when the fields do not satisfy the schema
   */
  construct(model: Model, fields: Record<string, unknown>): ModelObject {
    const optionalKeys = Object.fromEntries(
      model.primaryKeys
        .filter((key) => this.hasAttribute(model, key))
        .map((key) => [key, true] as const)
    );
    const parsed: ModelObject = model.schema.partial(optionalKeys).parse(fields);
    return parsed;
  }
}
