import {
  ConfigurationException,
  ConflictingType,
  DeserializationException,
  MissingID,
  MissingType,
  SerializationException,
} from '../core/exceptions';
import type { AnyDeserializationException } from '../core/exceptions';
import type { ModelRegistry } from '../core/registry';
import type { UrlBuilder } from '../core/urls';
import { isRecord } from '../core/types';
import type { Model, ModelObject, Session } from '../core/types';
import type { Linkage, RelationshipLinks, RelationshipObject, ResourceIdentifier } from './types';

// ============================================================================
// Serialize direction
// ============================================================================

/**
 * Builds the `{id, type}` identifier of an instance. `type` overrides the
 * model's collection name.
 */
export function serializeRelationshipIdentifier(
  registry: ModelRegistry,
  model: Model,
  instance: ModelObject,
  type?: string
): ResourceIdentifier {
  return {
    id: String(registry.primaryKeyValue(model, instance)),
    type: type ?? registry.collectionName(model),
  };
}

/**
 * Builds the relationship object for `relation` of `instance`.
 *
 * `links.related` is only present when the related model has an endpoint.
 * To-many relationships always carry a list, empty when nothing is
 * related; to-one relationships carry an identifier or `null`.
 *
 * @throws ConfigurationException if `model` has no endpoint
 * @throws SerializationException if a related value is not an instance
 */
export function createRelationship(
  registry: ModelRegistry,
  urls: UrlBuilder,
  model: Model,
  instance: ModelObject,
  relation: string
): RelationshipObject {
  const id = registry.primaryKeyValue(model, instance);
  const self = urls.relationshipUrl(model, id, relation);
  if (self === null) {
    throw new ConfigurationException(
      `No endpoint registered for '${registry.collectionName(model)}'`
    );
  }

  const links: RelationshipLinks = { self };
  const relatedModel = registry.relatedModel(model, relation);
  if (urls.resourceUrl(relatedModel) !== null) {
    const related = urls.relatedUrl(model, id, relation);
    if (related !== null) {
      links.related = related;
    }
  }

  const value = instance[relation];
  const toIdentifier = (related: unknown): ResourceIdentifier => {
    if (!isRecord(related)) {
      throw new SerializationException(
        instance,
        `Relationship '${relation}' holds a value that is not an instance`
      );
    }
    return serializeRelationshipIdentifier(registry, relatedModel, related);
  };

  let data: Linkage;
  if (registry.isToMany(model, relation)) {
    data = Array.isArray(value) ? value.map(toIdentifier) : [];
  } else {
    data = value === undefined || value === null ? null : toIdentifier(value);
  }

  return { links, data };
}

// ============================================================================
// Deserialize direction
// ============================================================================

/**
 * Resolved value of a linkage: an instance, a list of instances, or `null`.
 */
export type ResolvedLinkage = ModelObject | ModelObject[] | null;

/**
 * Resolves the linkage of one relationship into instances of the related
 * model.
 *
 * @example
 * ```ts
 * const authors = new RelationshipDeserializer(session, PersonModel, registry, 'author');
 * await authors.deserialize({ type: 'person', id: '1' }); // the stored person
 * ```
 */
export class RelationshipDeserializer {
  /** Expected `type` of every identifier. */
  readonly type: string;

  constructor(
    private readonly session: Session,
    private readonly model: Model,
    private readonly registry: ModelRegistry,
    private readonly relationName?: string
  ) {
    this.type = registry.collectionName(model);
  }

  /**
   * Returns the structural problems of a linkage without looking anything
   * up.
   */
  check(linkage: unknown): AnyDeserializationException[] {
    if (linkage === null) return [];
    const items: unknown[] = Array.isArray(linkage) ? linkage : [linkage];
    const problems: AnyDeserializationException[] = [];
    for (const item of items) {
      const parsed = this.parseIdentifier(item);
      if (parsed instanceof DeserializationException) problems.push(parsed);
    }
    return problems;
  }

  /**
   * Fetches the instance, or instances for a list, referenced by a linkage.
   * `null` clears a to-one relationship.
   *
   * @throws MissingID, MissingType or ConflictingType for malformed identifiers
   * @throws the session's not-found error, unchanged, for unknown ids
   */
  async deserialize(linkage: unknown): Promise<ResolvedLinkage> {
    if (linkage === null) return null;
    if (!Array.isArray(linkage)) return this.resolve(linkage);

    const instances: ModelObject[] = [];
    // Lookups run one at a time; sessions are not shared across concurrent calls.
    for (const item of linkage) {
      instances.push(await this.resolve(item));
    }
    return instances;
  }

  private parseIdentifier(item: unknown): ResourceIdentifier | AnyDeserializationException {
    if (!isRecord(item) || !('id' in item)) {
      return new MissingID(this.relationName);
    }
    if (!('type' in item)) {
      return new MissingType(this.relationName);
    }
    if (item.type !== this.type) {
      return new ConflictingType(this.type, String(item.type), this.relationName);
    }
    return { id: String(item.id), type: this.type };
  }

  private async resolve(item: unknown): Promise<ModelObject> {
    const identifier = this.parseIdentifier(item);
    if (identifier instanceof DeserializationException) throw identifier;
    return this.session.get(this.model, this.registry.parseId(this.model, identifier.id));
  }
}
