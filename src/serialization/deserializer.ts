import {
  ClientGeneratedIDNotAllowed,
  ConflictingType,
  InputValidationException,
  MissingData,
  MissingType,
  MultipleDeserializationExceptions,
  UnknownAttribute,
  UnknownRelationship,
} from '../core/exceptions';
import type { AnyDeserializationException } from '../core/exceptions';
import type { ModelRegistry } from '../core/registry';
import { isRecord } from '../core/types';
import type { Model, ModelObject, Session } from '../core/types';
import { RelationshipDeserializer } from './relationships';
import type { ResolvedLinkage } from './relationships';
import type { ResourceDeserializerOptions } from './types';

/**
 * Names JSON API reserves outside of `attributes`.
 */
const RESERVED_NAMES = new Set(['type', 'id']);

/**
 * Throws on the first reported problem, or gathers them all when
 * collecting.
 */
class ProblemCollector {
  private readonly problems: AnyDeserializationException[] = [];

  constructor(private readonly collect: boolean) {}

  report(problem: AnyDeserializationException): void {
    if (!this.collect) throw problem;
    this.problems.push(problem);
  }

  throwIfAny(): void {
    const [first, ...rest] = this.problems;
    if (first === undefined) return;
    if (rest.length === 0) throw first;
    throw new MultipleDeserializationExceptions(this.problems);
  }
}

function readObject(data: Record<string, unknown>, member: string): Record<string, unknown> {
  const value = data[member];
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new InputValidationException(`"${member}" must be an object`);
  }
  return value;
}

/**
 * Turns a JSON API document into a new, unsaved instance of one model.
 *
 * Nothing is assigned to the instance until every relationship has been
 * resolved, so a failing linkage never leaves a half-built instance.
 * Persisting the instance is the caller's job.
 *
 * @example
 * ```ts
 * const deserializer = new ResourceDeserializer(session, ArticleModel, registry);
 * const article = await deserializer.deserialize({
 *   data: {
 *     type: 'article',
 *     attributes: { title: 'Hello' },
 *     relationships: { author: { data: { type: 'person', id: '1' } } },
 *   },
 * });
 * ```
 */
export class ResourceDeserializer {
  /** Expected `type` of the primary resource. */
  readonly type: string;
  readonly allowClientGeneratedIds: boolean;
  readonly collectErrors: boolean;
  private readonly linkages: ReadonlyMap<string, RelationshipDeserializer>;

  constructor(
    session: Session,
    private readonly model: Model,
    private readonly registry: ModelRegistry,
    options: ResourceDeserializerOptions = {}
  ) {
    this.type = registry.collectionName(model);
    this.allowClientGeneratedIds = options.allowClientGeneratedIds ?? false;
    this.collectErrors = options.collectErrors ?? false;

    const linkages = new Map<string, RelationshipDeserializer>();
    for (const name of registry.relationshipNames(model)) {
      linkages.set(
        name,
        new RelationshipDeserializer(session, registry.relatedModel(model, name), registry, name)
      );
    }
    this.linkages = linkages;
  }

  /**
   * Builds a new instance from `document`. Everything outside `data` is
   * ignored.
   *
   * @throws a `DeserializationException` subclass for malformed documents
   * @throws MultipleDeserializationExceptions when collecting several problems
   * @throws the session's not-found error for unknown related ids
   * @throws ZodError when the attributes do not satisfy the model schema
   */
  async deserialize(document: unknown): Promise<ModelObject> {
    if (!isRecord(document) || !isRecord(document.data)) {
      throw new MissingData();
    }
    const data = document.data;
    const problems = new ProblemCollector(this.collectErrors);

    if (!('type' in data)) {
      problems.report(new MissingType());
    }
    if ('id' in data && !this.allowClientGeneratedIds) {
      problems.report(new ClientGeneratedIDNotAllowed());
    }
    if ('type' in data && data.type !== this.type) {
      problems.report(new ConflictingType(this.type, String(data.type)));
    }

    const relationships = readObject(data, 'relationships');
    const attributes = readObject(data, 'attributes');

    for (const name of Object.keys(relationships)) {
      if (!this.linkages.has(name)) {
        problems.report(new UnknownRelationship(name));
      }
    }
    for (const name of Object.keys(attributes)) {
      if (RESERVED_NAMES.has(name) || !this.registry.hasAttribute(this.model, name)) {
        problems.report(new UnknownAttribute(name));
      }
    }

    const pending: Array<[string, RelationshipDeserializer, unknown]> = [];
    for (const [name, object] of Object.entries(relationships)) {
      const deserializer = this.linkages.get(name);
      if (deserializer === undefined) continue;
      if (!isRecord(object) || !('data' in object)) {
        problems.report(new MissingData(name));
        continue;
      }
      if (this.collectErrors) {
        for (const problem of deserializer.check(object.data)) {
          problems.report(problem);
        }
      }
      pending.push([name, deserializer, object.data]);
    }

    problems.throwIfAny();

    const resolved = new Map<string, ResolvedLinkage>();
    for (const [name, deserializer, linkage] of pending) {
      resolved.set(name, await deserializer.deserialize(linkage));
    }

    const fields: Record<string, unknown> = { ...attributes };
    if ('id' in data && (typeof data.id === 'string' || typeof data.id === 'number')) {
      fields[this.registry.primaryKey(this.model)] = this.registry.parseId(this.model, String(data.id));
    }

    const instance = this.registry.construct(
      this.model,
      this.registry.stringsToTemporal(this.model, fields)
    );

    for (const [name, value] of resolved) {
      instance[name] = value;
    }
    return instance;
  }
}
