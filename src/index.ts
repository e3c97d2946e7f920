// Core exports
export {
  ApiException,
  InputValidationException,
  NotFoundException,
  ConfigurationException,
  SerializationException,
  DeserializationException,
  MissingData,
  MissingType,
  MissingID,
  ClientGeneratedIDNotAllowed,
  ConflictingType,
  UnknownAttribute,
  UnknownRelationship,
  MultipleDeserializationExceptions,
} from './core/exceptions.js';
export type {
  ApiStatusCode,
  JsonApiErrorObject,
  JsonApiErrorDocument,
  DeserializationErrorKind,
  AnyDeserializationException,
} from './core/exceptions.js';
export {
  createJsonApiErrorHandler,
  zodErrorMapper,
  JSON_API_CONTENT_TYPE,
} from './core/error-handler.js';
export type {
  ErrorMapper,
  ErrorHook,
  ErrorHandlerConfig,
} from './core/error-handler.js';
export { defineModel, isRecord } from './core/types.js';
export type {
  SchemaKeys,
  ModelObject,
  RelationType,
  RelationConfig,
  RelationsConfig,
  ComputedFieldConfig,
  ComputedFieldsConfig,
  Model,
  Session,
} from './core/types.js';
export { ModelRegistry } from './core/registry.js';
export { EndpointUrlBuilder } from './core/urls.js';
export type { UrlBuilder, EndpointUrlBuilderOptions } from './core/urls.js';
export { Duration, duration, parseTemporal, serializeTemporal } from './core/temporal.js';
export type { TemporalKind } from './core/temporal.js';

// Logger exports
export {
  createConsoleLogger,
  setLogger,
  getLogger,
  resetLogger,
} from './core/logger.js';
export type { Logger, LogLevel, ConsoleLoggerOptions } from './core/logger.js';

// Serialization exports
export {
  ResourceSerializer,
  ResourceDeserializer,
  RelationshipDeserializer,
  createRelationship,
  serializeRelationshipIdentifier,
} from './serialization/index.js';
export type {
  ResolvedLinkage,
  ResourceIdentifier,
  Linkage,
  RelationshipLinks,
  RelationshipObject,
  ResourceObject,
  ResourceSerializerOptions,
  ResourceDeserializerOptions,
} from './serialization/index.js';

// Config-based API exports
export {
  createJsonApi,
  JsonApi,
  JsonApiConfigSchema,
  ResourceConfigSchema,
} from './config/index.js';
export type { JsonApiConfig, ResourceConfig } from './config/index.js';

// Session exports
export { MemorySession, clearStorage, getStorage } from './adapters/memory/index.js';
export { DrizzleSession } from './adapters/drizzle/index.js';
