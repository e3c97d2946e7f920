/**
 * Config-based entry point: one declarative object describing every
 * resource the API serves.
 *
 * @example
 * ```ts
 * import { createJsonApi, MemorySession } from 'hono-jsonapi';
 *
 * const api = createJsonApi({
 *   baseUrl: 'https://api.example.com',
 *   prefix: '/api',
 *   resources: [
 *     { model: PersonModel, exclude: ['password'] },
 *     { model: ArticleModel },
 *     { model: TagModel, endpoint: false },
 *   ],
 * });
 *
 * app.get('/api/person/:id', async (c) => {
 *   const person = await session.load(PersonModel, c.req.param('id'));
 *   return c.json({ data: api.serialize('person', person) });
 * });
 * ```
 */

import { z } from 'zod';
import { ConfigurationException } from '../core/exceptions';
import { ModelRegistry } from '../core/registry';
import { isRecord } from '../core/types';
import type { Model, ModelObject, Session } from '../core/types';
import { EndpointUrlBuilder } from '../core/urls';
import { ResourceDeserializer } from '../serialization/deserializer';
import { ResourceSerializer } from '../serialization/serializer';
import type {
  ResourceDeserializerOptions,
  ResourceObject,
} from '../serialization/types';

// ============================================================================
// Configuration Schema
// ============================================================================

function isModel(value: unknown): value is Model {
  return (
    isRecord(value) &&
    typeof value.tableName === 'string' &&
    value.schema instanceof z.ZodObject &&
    Array.isArray(value.primaryKeys)
  );
}

const fieldList = z.array(z.string().min(1));

/**
 * One served resource type.
 */
export const ResourceConfigSchema = z.object({
  model: z.custom<Model>(isModel, 'Expected a model created with defineModel()'),
  /** Fields and relationships to emit; `'self'` keeps the self link. */
  only: fieldList.optional(),
  /** Fields and relationships never to emit. */
  exclude: fieldList.optional(),
  /** Extra instance properties emitted as attributes. */
  additionalAttributes: fieldList.optional(),
  /** Field serialized as the resource `id`. */
  primaryKey: z.string().min(1).optional(),
  /** Whether the resource has its own URL; `false` omits its links. */
  endpoint: z.boolean().default(true),
});

export const JsonApiConfigSchema = z.object({
  baseUrl: z.url(),
  prefix: z.string().default(''),
  resources: z.array(ResourceConfigSchema).min(1),
});

export type ResourceConfig = z.input<typeof ResourceConfigSchema>;
export type JsonApiConfig = z.input<typeof JsonApiConfigSchema>;

// ============================================================================
// Configured API
// ============================================================================

/**
 * A configured set of resources sharing one registry and URL scheme.
 * Serializers are built once per resource type.
 */
export class JsonApi {
  private readonly serializers = new Map<string, ResourceSerializer>();

  constructor(
    readonly registry: ModelRegistry,
    readonly urls: EndpointUrlBuilder,
    resources: z.output<typeof ResourceConfigSchema>[]
  ) {
    for (const { model, only, exclude, additionalAttributes, primaryKey } of resources) {
      this.serializers.set(
        registry.collectionName(model),
        new ResourceSerializer(model, registry, urls, { only, exclude, additionalAttributes, primaryKey })
      );
    }
  }

  /** Resource types served by this API, in configuration order. */
  get types(): string[] {
    return [...this.serializers.keys()];
  }

  /**
   * @throws ConfigurationException for an unknown resource type
   */
  model(type: string): Model {
    const model = this.registry.findByType(type);
    if (!model) {
      throw new ConfigurationException(`Unknown resource type '${type}'`);
    }
    return model;
  }

  /**
   * @throws ConfigurationException for an unknown resource type
   */
  serializer(type: string): ResourceSerializer {
    const serializer = this.serializers.get(type);
    if (!serializer) {
      throw new ConfigurationException(`Unknown resource type '${type}'`);
    }
    return serializer;
  }

  serialize(type: string, instance: ModelObject, only?: string[]): ResourceObject {
    return this.serializer(type).serialize(instance, only);
  }

  /**
   * Builds a deserializer for one request. Sessions are per request, so
   * deserializers are not cached.
   */
  deserializer(
    type: string,
    session: Session,
    options?: ResourceDeserializerOptions
  ): ResourceDeserializer {
    return new ResourceDeserializer(session, this.model(type), this.registry, options);
  }
}

/**
 * Validates the configuration and builds the API.
 *
 * @throws ConfigurationException when the configuration is invalid, or a
 *   relationship points at a model that is not configured
 */
export function createJsonApi(config: JsonApiConfig): JsonApi {
  const result = JsonApiConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigurationException(
      'Invalid JSON API configuration',
      result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }
  const { baseUrl, prefix, resources } = result.data;

  const registry = new ModelRegistry(resources.map((resource) => resource.model));
  for (const model of registry.models()) {
    for (const name of registry.relationshipNames(model)) {
      registry.relatedModel(model, name);
    }
  }

  const urls = new EndpointUrlBuilder(registry, { baseUrl, prefix });
  for (const resource of resources) {
    if (resource.endpoint) {
      urls.register(resource.model);
    }
  }

  return new JsonApi(registry, urls, resources);
}
