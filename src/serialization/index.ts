export { ResourceSerializer } from './serializer';
export { ResourceDeserializer } from './deserializer';
export {
  createRelationship,
  serializeRelationshipIdentifier,
  RelationshipDeserializer,
} from './relationships';
export type { ResolvedLinkage } from './relationships';
export type {
  ResourceIdentifier,
  Linkage,
  RelationshipLinks,
  RelationshipObject,
  ResourceObject,
  ResourceSerializerOptions,
  ResourceDeserializerOptions,
} from './types';
