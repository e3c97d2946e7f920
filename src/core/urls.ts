import type { ModelRegistry } from './registry';
import type { Model } from './types';

/**
 * Builds canonical URLs for resources and relationships.
 *
 * Every method returns `null` when no endpoint is registered for the model;
 * callers omit the corresponding link.
 */
export interface UrlBuilder {
  /** `GET` URL of a resource, or of its collection when `id` is omitted. */
  resourceUrl(model: Model, id?: unknown): string | null;
  /** URL of a relationship object (`/<type>/<id>/relationships/<name>`). */
  relationshipUrl(model: Model, id: unknown, relation: string): string | null;
  /** URL of the related resource(s) (`/<type>/<id>/<name>`). */
  relatedUrl(model: Model, id: unknown, relation: string): string | null;
}

export interface EndpointUrlBuilderOptions {
  /** Absolute root of the API, e.g. `https://api.example.com`. */
  baseUrl: string;
  /** Path prefix shared by every endpoint, e.g. `/api/v1`. @default '' */
  prefix?: string;
}

function trimSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, '');
}

/**
 * URL builder over an explicit set of models that have endpoints.
 *
 * @example
 * ```ts
 * const urls = new EndpointUrlBuilder(registry, { baseUrl: 'https://api.example.com', prefix: '/api' });
 * urls.register(PersonModel);
 * urls.resourceUrl(PersonModel, 1); // 'https://api.example.com/api/person/1'
 * urls.resourceUrl(TagModel, 1);    // null
 * ```
 */
export class EndpointUrlBuilder implements UrlBuilder {
  private readonly endpoints = new Set<string>();
  private readonly root: string;

  constructor(
    private readonly registry: ModelRegistry,
    options: EndpointUrlBuilderOptions
  ) {
    const base = options.baseUrl.replace(/\/+$/, '');
    const prefix = trimSlashes(options.prefix ?? '');
    this.root = prefix ? `${base}/${prefix}` : base;
  }

  /** Marks a model as having an endpoint. */
  register(model: Model): this {
    this.endpoints.add(model.tableName);
    return this;
  }

  hasEndpoint(model: Model): boolean {
    return this.endpoints.has(model.tableName);
  }

  resourceUrl(model: Model, id?: unknown): string | null {
    if (!this.hasEndpoint(model)) return null;
    const collection = `${this.root}/${encodeURIComponent(this.registry.collectionName(model))}`;
    return id === undefined ? collection : `${collection}/${encodeURIComponent(String(id))}`;
  }

  relationshipUrl(model: Model, id: unknown, relation: string): string | null {
    const resource = this.resourceUrl(model, id);
    return resource === null ? null : `${resource}/relationships/${encodeURIComponent(relation)}`;
  }

  relatedUrl(model: Model, id: unknown, relation: string): string | null {
    const resource = this.resourceUrl(model, id);
    return resource === null ? null : `${resource}/${encodeURIComponent(relation)}`;
  }
}
