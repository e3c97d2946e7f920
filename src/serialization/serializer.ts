import type { ZodType } from 'zod';
import { ConfigurationException, SerializationException } from '../core/exceptions';
import { getLogger } from '../core/logger';
import type { ModelRegistry } from '../core/registry';
import { serializeTemporal } from '../core/temporal';
import type { UrlBuilder } from '../core/urls';
import type { Model, ModelObject } from '../core/types';
import { createRelationship } from './relationships';
import type { RelationshipObject, ResourceObject, ResourceSerializerOptions } from './types';

/**
 * Names that never become attributes, on top of anything starting with `__`.
 */
const FIELD_BLACKLIST = new Set(['constructor', 'prototype']);

/**
 * JSON API reserves `type` and `id`; no attribute or relationship may use
 * them.
 */
const RESERVED_NAMES = new Set(['type', 'id']);

/** Marker in a field filter that keeps the resource's self link. */
const SELF_LINK = 'self';

/**
 * Where an attribute value comes from.
 */
type FieldSource =
  | { kind: 'stored' }
  | { kind: 'computed'; compute: (instance: ModelObject) => unknown; schema?: ZodType };

/**
 * Turns instances of one model into JSON API resource objects.
 *
 * Attribute and relationship sets are computed once here; each call can
 * only narrow them.
 *
 * @example
 * ```ts
 * const serializer = new ResourceSerializer(PersonModel, registry, urls, { exclude: ['password'] });
 * serializer.serialize(person);
 * // { id: '1', type: 'person', attributes: { name: 'Ann' }, relationships: {...}, links: {...} }
 *
 * serializer.serialize(person, ['name']);
 * // { id: '1', type: 'person', attributes: { name: 'Ann' } }
 * ```
 */
export class ResourceSerializer {
  readonly type: string;
  readonly primaryKey: string;
  private readonly attributes: ReadonlyMap<string, FieldSource>;
  private readonly relationships: ReadonlySet<string>;
  private readonly only?: ReadonlySet<string>;

  constructor(
    private readonly model: Model,
    private readonly registry: ModelRegistry,
    private readonly urls: UrlBuilder,
    options: ResourceSerializerOptions = {}
  ) {
    const { only, exclude, additionalAttributes } = options;

    if (only !== undefined && exclude !== undefined) {
      throw new ConfigurationException('Cannot specify both `only` and `exclude` simultaneously');
    }
    if (additionalAttributes !== undefined && exclude !== undefined) {
      const clash = additionalAttributes.filter((name) => exclude.includes(name));
      if (clash.length > 0) {
        throw new ConfigurationException(
          'Cannot exclude attributes listed in `additionalAttributes`',
          { fields: clash }
        );
      }
    }

    this.type = options.type ?? registry.collectionName(model);
    this.primaryKey = options.primaryKey ?? registry.primaryKey(model);

    const computed = model.computedFields ?? {};
    let columns = new Set([
      ...registry.attributeNames(model),
      ...registry.computedFieldNames(model),
    ]);
    let relations = new Set(registry.relationshipNames(model));

    for (const name of RESERVED_NAMES) {
      columns.delete(name);
      relations.delete(name);
    }

    for (const name of additionalAttributes ?? []) {
      columns.add(name);
    }

    if (only !== undefined) {
      const allowed = new Set(only);
      columns = new Set([...columns].filter((name) => allowed.has(name)));
      relations = new Set([...relations].filter((name) => allowed.has(name)));
      this.only = allowed;
    }

    for (const name of exclude ?? []) {
      columns.delete(name);
      relations.delete(name);
    }

    for (const name of registry.foreignKeys(model)) {
      columns.delete(name);
    }

    const attributes = new Map<string, FieldSource>();
    for (const name of columns) {
      if (name.startsWith('__') || FIELD_BLACKLIST.has(name)) continue;
      const field = Object.prototype.hasOwnProperty.call(computed, name) ? computed[name] : undefined;
      attributes.set(
        name,
        field
          ? { kind: 'computed', compute: (instance) => field.compute(instance), schema: field.schema }
          : { kind: 'stored' }
      );
    }

    this.attributes = attributes;
    this.relationships = relations;
  }

  /** Attribute names this serializer emits, before per-call filtering. */
  get attributeNames(): string[] {
    return [...this.attributes.keys()];
  }

  /** Relationship names this serializer emits, before per-call filtering. */
  get relationshipNames(): string[] {
    return [...this.relationships];
  }

  /**
   * Serializes one instance.
   *
   * @param only - Narrows the emitted fields and relationships. Include
   *   `'self'` to keep the self link.
   * @throws SerializationException if an attribute cannot be read, or a
   *   computed value does not match its schema
   */
  serialize(instance: ModelObject, only?: string[]): ResourceObject {
    const filter = only === undefined ? undefined : new Set(only);
    const keep = (name: string) => filter === undefined || filter.has(name);

    const idValue = instance[this.primaryKey];
    if (idValue === undefined || idValue === null) {
      throw new SerializationException(
        instance,
        `Instance has no value for primary key '${this.primaryKey}'`
      );
    }

    const result: ResourceObject = { id: String(idValue), type: this.type };

    const attributes: Record<string, unknown> = {};
    for (const [name, source] of this.attributes) {
      if (!keep(name)) continue;
      let value: unknown;
      try {
        value = this.readAttribute(instance, name, source);
      } catch (error) {
        throw new SerializationException(
          instance,
          `Failed to read attribute '${name}'`,
          { ...result, attributes: { ...attributes } },
          { cause: error }
        );
      }
      if (source.kind === 'computed' && source.schema !== undefined) {
        const checked = source.schema.safeParse(value);
        if (!checked.success) {
          throw new SerializationException(
            instance,
            `Computed field '${name}' does not match its schema`,
            { ...result, attributes: { ...attributes } },
            { cause: checked.error }
          );
        }
      }
      attributes[name] = serializeTemporal(value);
    }
    if (Object.keys(attributes).length > 0) {
      result.attributes = attributes;
    }

    const relationships: Record<string, RelationshipObject> = {};
    for (const name of this.relationships) {
      if (!keep(name)) continue;
      relationships[name] = createRelationship(this.registry, this.urls, this.model, instance, name);
    }
    if (Object.keys(relationships).length > 0) {
      result.relationships = relationships;
    }

    const selfAllowed =
      (this.only === undefined || this.only.has(SELF_LINK)) &&
      (filter === undefined || filter.has(SELF_LINK));
    if (selfAllowed) {
      const url = this.urls.resourceUrl(this.model, idValue);
      if (url !== null) {
        result.links = { self: url };
      } else {
        getLogger().debug('No endpoint for resource, omitting self link', { type: this.type });
      }
    }

    return result;
  }

  /**
   * Serializes a list of instances, in order.
   */
  serializeMany(instances: Iterable<ModelObject>, only?: string[]): ResourceObject[] {
    return Array.from(instances, (instance) => this.serialize(instance, only));
  }

  private readAttribute(instance: ModelObject, name: string, source: FieldSource): unknown {
    return source.kind === 'computed' ? source.compute(instance) : instance[name];
  }
}
