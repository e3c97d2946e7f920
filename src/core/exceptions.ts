import { HTTPException } from 'hono/http-exception';
import type { ZodError } from 'zod';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ModelObject } from './types';
import type { ResourceObject } from '../serialization/types';

/**
 * Valid HTTP status codes for API exceptions.
 * Uses Hono's ContentfulStatusCode which excludes informational codes (1xx).
 */
export type ApiStatusCode = ContentfulStatusCode;

/**
 * A JSON API error object.
 * @see https://jsonapi.org/format/#error-objects
 */
export interface JsonApiErrorObject {
  status: string;
  code: string;
  title: string;
  detail: string;
  meta?: Record<string, unknown>;
}

/**
 * A JSON API document carrying only errors.
 */
export interface JsonApiErrorDocument {
  errors: JsonApiErrorObject[];
}

const STATUS_TITLES: Partial<Record<number, string>> = {
  400: 'Bad Request',
  403: 'Forbidden',
  404: 'Not Found',
  409: 'Conflict',
  500: 'Internal Server Error',
};

/**
 * Base API exception that extends Hono's HTTPException.
 * Provides structured error responses with code, message, and optional details.
 *
 * @example
 * ```ts
 * throw new ApiException('Something went wrong', 500, 'INTERNAL_ERROR');
 * throw new ApiException('Invalid input', 400, 'VALIDATION_ERROR', { field: 'email' });
 * ```
 */
export class ApiException extends HTTPException {
  public readonly code: string;
  public readonly details?: unknown;

  constructor(
    message: string,
    status: ApiStatusCode = 500,
    code: string = 'INTERNAL_ERROR',
    details?: unknown,
    options: { cause?: unknown } = {}
  ) {
    super(status, { message, cause: options.cause });
    this.name = 'ApiException';
    this.code = code;
    this.details = details;
  }

  /**
   * Human readable description of the problem, reported as the error
   * object's `detail` member.
   */
  get detailText(): string {
    return this.message;
  }

  /**
   * Converts the exception to a JSON API error object.
   */
  toErrorObject(): JsonApiErrorObject {
    const errorObj: JsonApiErrorObject = {
      status: String(this.status),
      code: this.code,
      title: STATUS_TITLES[this.status] ?? 'Error',
      detail: this.detailText,
    };
    if (this.details) {
      errorObj.meta = { details: this.details };
    }
    return errorObj;
  }

  /**
   * Converts the exception to a JSON API error document.
   */
  toJSON(): JsonApiErrorDocument {
    return { errors: [this.toErrorObject()] };
  }

  /**
   * Gets the HTTP status code.
   * Alias for compatibility with code expecting 'status' property.
   */
  get statusCode(): ApiStatusCode {
    return this.status;
  }
}

export class InputValidationException extends ApiException {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.name = 'InputValidationException';
  }

  static fromZodError(error: ZodError): InputValidationException {
    const issues = error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
      code: issue.code,
    }));

    return new InputValidationException('Validation failed', issues);
  }
}

export class NotFoundException extends ApiException {
  constructor(resource: string = 'Resource', id?: string | number) {
    super(
      id === undefined ? `${resource} not found` : `${resource} with id '${id}' not found`,
      404,
      'NOT_FOUND'
    );
    this.name = 'NotFoundException';
  }
}

export class ConfigurationException extends ApiException {
  constructor(message: string, details?: unknown) {
    super(message, 500, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationException';
  }
}

// ============================================================================
// Serialization
// ============================================================================

/**
 * Raised when an instance cannot be turned into a resource object, for
 * example when a computed field throws.
 *
 * `resource` holds whatever part of the resource object was built before
 * the failure.
 */
export class SerializationException extends ApiException {
  public readonly instance: ModelObject;
  public readonly resource?: Partial<ResourceObject>;

  constructor(
    instance: ModelObject,
    message?: string,
    resource?: Partial<ResourceObject>,
    options: { cause?: unknown } = {}
  ) {
    super(message ?? 'Failed to serialize object', 500, 'SERIALIZATION_ERROR', undefined, options);
    this.name = 'SerializationException';
    this.instance = instance;
    this.resource = resource;
  }
}

// ============================================================================
// Deserialization
// ============================================================================

export type DeserializationErrorKind =
  | 'MissingData'
  | 'MissingType'
  | 'MissingID'
  | 'ClientGeneratedIDNotAllowed'
  | 'ConflictingType'
  | 'UnknownAttribute'
  | 'UnknownRelationship';

/**
 * Base class of the errors raised while turning a JSON API document into
 * an instance. `detail` is safe to show to clients.
 */
export abstract class DeserializationException extends ApiException {
  abstract readonly kind: DeserializationErrorKind;
  public readonly detail: string;

  constructor(detail: string, status: ApiStatusCode, code: string) {
    super(`Failed to deserialize object: ${detail}`, status, code);
    this.name = 'DeserializationException';
    this.detail = detail;
  }

  get detailText(): string {
    return this.detail;
  }
}

function missingDetail(element: string, relationName?: string): string {
  if (relationName === undefined) {
    return `missing "${element}" element`;
  }
  return `missing "${element}" element in linkage object for relationship "${relationName}"`;
}

/** A resource or relationship object lacks a `data` element. */
export class MissingData extends DeserializationException {
  readonly kind = 'MissingData' as const;

  constructor(public readonly relationName?: string) {
    super(missingDetail('data', relationName), 400, 'MISSING_DATA');
    this.name = 'MissingData';
  }
}

/** A resource or linkage object lacks a `type` element. */
export class MissingType extends DeserializationException {
  readonly kind = 'MissingType' as const;

  constructor(public readonly relationName?: string) {
    super(missingDetail('type', relationName), 400, 'MISSING_TYPE');
    this.name = 'MissingType';
  }
}

/** A linkage object lacks an `id` element. */
export class MissingID extends DeserializationException {
  readonly kind = 'MissingID' as const;

  constructor(public readonly relationName?: string) {
    super(missingDetail('id', relationName), 400, 'MISSING_ID');
    this.name = 'MissingID';
  }
}

/** The client sent an `id` for a new resource. */
export class ClientGeneratedIDNotAllowed extends DeserializationException {
  readonly kind = 'ClientGeneratedIDNotAllowed' as const;

  constructor() {
    super('Server does not allow client-generated IDS', 403, 'CLIENT_GENERATED_ID_NOT_ALLOWED');
    this.name = 'ClientGeneratedIDNotAllowed';
  }
}

/**
 * The `type` of the primary resource, or of a linkage object when
 * `relationName` is set, is not the expected collection name.
 */
export class ConflictingType extends DeserializationException {
  readonly kind = 'ConflictingType' as const;

  constructor(
    public readonly expectedType: string,
    public readonly givenType: string,
    public readonly relationName?: string
  ) {
    super(
      relationName === undefined
        ? `expected type "${expectedType}" but got type "${givenType}"`
        : `expected type "${expectedType}" but got type "${givenType}" in linkage object for relationship "${relationName}"`,
      409,
      'CONFLICTING_TYPE'
    );
    this.name = 'ConflictingType';
  }
}

/** An `attributes` member names a field the model does not have. */
export class UnknownAttribute extends DeserializationException {
  readonly kind = 'UnknownAttribute' as const;

  constructor(public readonly field: string) {
    super(`model has no attribute "${field}"`, 400, 'UNKNOWN_ATTRIBUTE');
    this.name = 'UnknownAttribute';
  }
}

/** A `relationships` member names a relationship the model does not have. */
export class UnknownRelationship extends DeserializationException {
  readonly kind = 'UnknownRelationship' as const;

  constructor(public readonly field: string) {
    super(`model has no relationship "${field}"`, 400, 'UNKNOWN_RELATIONSHIP');
    this.name = 'UnknownRelationship';
  }
}

/**
 * Closed union of every deserialization error, discriminated by `kind`.
 */
export type AnyDeserializationException =
  | MissingData
  | MissingType
  | MissingID
  | ClientGeneratedIDNotAllowed
  | ConflictingType
  | UnknownAttribute
  | UnknownRelationship;

/**
 * Several deserialization errors found in one document. Only raised by
 * deserializers configured with `collectErrors`.
 */
export class MultipleDeserializationExceptions extends ApiException {
  public readonly exceptions: AnyDeserializationException[];

  constructor(exceptions: AnyDeserializationException[]) {
    const statuses = new Set(exceptions.map((e) => e.status));
    const [shared] = statuses;
    super(
      `Failed to deserialize object: ${exceptions.length} problems found`,
      statuses.size === 1 && shared !== undefined ? shared : 400,
      'MULTIPLE_ERRORS'
    );
    this.name = 'MultipleDeserializationExceptions';
    this.exceptions = exceptions;
  }

  toJSON(): JsonApiErrorDocument {
    return { errors: this.exceptions.map((e) => e.toErrorObject()) };
  }
}
