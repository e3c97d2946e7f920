import type { z, ZodObject, ZodRawShape, ZodType } from 'zod';

// ============================================================================
// Schema Type Utilities
// ============================================================================

/**
 * Extract keys from a Zod object schema.
 */
export type SchemaKeys<T extends ZodObject<ZodRawShape>> = keyof z.infer<T>;

/**
 * A persisted domain object. Relationship values live under the
 * relationship name: a related instance or `null` for to-one relations,
 * an array for to-many relations.
 */
export type ModelObject = Record<string, unknown>;

// ============================================================================
// Relation Types
// ============================================================================

/**
 * Relation type definitions for models.
 * `hasMany` is the only to-many relation; the other two are to-one.
 */
export type RelationType = 'hasOne' | 'hasMany' | 'belongsTo';

/**
 * Configuration for a single relation.
 */
export interface RelationConfig {
  /** Type of relation */
  type: RelationType;
  /** The related model's table name */
  model: string;
  /**
   * Foreign key field name. For `belongsTo` the column lives on this model
   * and is never serialized as an attribute; otherwise it lives on the
   * related model.
   */
  foreignKey: string;
  /** Local key field name (defaults to primary key) */
  localKey?: string;
}

/**
 * Map of relation names to their configurations.
 */
export type RelationsConfig = Record<string, RelationConfig>;

// ============================================================================
// Computed Field Types
// ============================================================================

/**
 * Configuration for a computed field.
 * Computed fields are derived from the instance at serialization time and
 * are never accepted as input.
 */
export interface ComputedFieldConfig<T = ModelObject, R = unknown> {
  /** Produces the field value from the instance. */
  compute(record: T): R;
  /**
   * Schema the produced value must satisfy. A mismatch fails serialization
   * of the instance.
   */
  schema?: ZodType;
}

/**
 * Map of computed field names to their configurations.
 */
export type ComputedFieldsConfig<T = ModelObject> = Record<string, ComputedFieldConfig<T>>;

// ============================================================================
// Model Definition
// ============================================================================

export interface Model<
  T extends ZodObject<ZodRawShape> = ZodObject<ZodRawShape>,
  TTable = unknown
> {
  /** Database table name, also used to reference the model from relations */
  tableName: string;
  /**
   * Resource type name on the wire (JSON API `type`).
   * @default tableName
   */
  collectionName?: string;
  /** Zod schema of the stored fields */
  schema: T;
  /** Primary key field names - the first one is the resource `id` */
  primaryKeys: Array<SchemaKeys<T> & string>;
  /** ORM table reference (Drizzle Table) */
  table?: TTable;
  /**
   * Define relations for this model.
   *
   * @example
   * ```ts
   * const PersonModel = defineModel({
   *   tableName: 'person',
   *   schema: PersonSchema,
   *   primaryKeys: ['id'],
   *   relations: {
   *     articles: { type: 'hasMany', model: 'article', foreignKey: 'authorId' },
   *   },
   * });
   * ```
   */
  relations?: RelationsConfig;
  /**
   * Define computed fields for this model.
   * They are serialized as attributes alongside the stored fields.
   *
   * @example
   * ```ts
   * computedFields: {
   *   displayName: { compute: (person) => person.name.toUpperCase() },
   * }
   * ```
   */
  computedFields?: ComputedFieldsConfig<z.infer<T>>;
}

/**
 * Identity helper that keeps the schema's inferred types on the model.
 */
export function defineModel<
  T extends ZodObject<ZodRawShape>,
  TTable = unknown
>(model: Model<T, TTable>): Model<T, TTable> {
  return model;
}

// ============================================================================
// Persistence
// ============================================================================

/**
 * Persistence session used to look up related instances by primary key.
 * Implementations throw `NotFoundException` when no instance matches.
 */
export interface Session {
  get(model: Model, id: string | number): Promise<ModelObject>;
}

// ============================================================================
// Utility Types
// ============================================================================

/**
 * Narrows an unknown value to a plain key/value record.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
