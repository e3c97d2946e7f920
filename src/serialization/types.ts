/**
 * The minimal `{type, id}` reference to a resource.
 */
export interface ResourceIdentifier {
  id: string;
  type: string;
}

/**
 * Relationship `data`: `null` for an empty to-one relationship, an
 * identifier for a populated one, a list for to-many relationships.
 */
export type Linkage = ResourceIdentifier | ResourceIdentifier[] | null;

export interface RelationshipLinks {
  self: string;
  related?: string;
}

export interface RelationshipObject {
  links: RelationshipLinks;
  data: Linkage;
}

/**
 * A JSON API resource object.
 */
export interface ResourceObject {
  id: string;
  type: string;
  attributes?: Record<string, unknown>;
  relationships?: Record<string, RelationshipObject>;
  links?: { self: string };
}

/**
 * Construction options of a resource serializer.
 */
export interface ResourceSerializerOptions {
  /** Resource type name. Defaults to the model's collection name. */
  type?: string;
  /** Field read for the resource `id`. Defaults to the model's first primary key. */
  primaryKey?: string;
  /**
   * Fields and relationships to emit. Include `'self'` to keep the
   * resource's self link. Cannot be combined with `exclude`.
   */
  only?: string[];
  /** Fields and relationships never emitted. Cannot be combined with `only`. */
  exclude?: string[];
  /** Extra instance properties emitted as attributes. */
  additionalAttributes?: string[];
}

/**
 * Construction options of a resource deserializer.
 */
export interface ResourceDeserializerOptions {
  /** Accept an `id` sent by the client. @default false */
  allowClientGeneratedIds?: boolean;
  /**
   * Report every structural problem of a document instead of the first
   * one. Several problems are raised together as
   * `MultipleDeserializationExceptions`. @default false
   */
  collectErrors?: boolean;
}
