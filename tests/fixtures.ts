/**
 * Models shared by the serialization tests.
 */
import { z } from 'zod';
import {
  defineModel,
  duration,
  EndpointUrlBuilder,
  ModelRegistry,
} from '../src/index.js';

export const BASE_URL = 'http://localhost';

// ============================================================================
// Zod Schemas
// ============================================================================

export const PersonSchema = z.object({
  id: z.number(),
  name: z.string().min(1),
  birthday: z.date().optional(),
  bedtime: duration().optional(),
});

export const ArticleSchema = z.object({
  id: z.number(),
  title: z.string().min(1),
  authorId: z.number().nullable().optional(),
});

export const TagSchema = z.object({
  id: z.number(),
  label: z.string(),
  articleId: z.number().nullable().optional(),
});

// ============================================================================
// Models
// ============================================================================

export const PersonModel = defineModel({
  tableName: 'person',
  schema: PersonSchema,
  primaryKeys: ['id'],
  relations: {
    articles: { type: 'hasMany', model: 'article', foreignKey: 'authorId' },
  },
  computedFields: {
    displayName: { compute: (person) => person.name.toUpperCase() },
  },
});

export const ArticleModel = defineModel({
  tableName: 'article',
  schema: ArticleSchema,
  primaryKeys: ['id'],
  relations: {
    author: { type: 'belongsTo', model: 'person', foreignKey: 'authorId' },
    tags: { type: 'hasMany', model: 'tag', foreignKey: 'articleId' },
  },
});

/** Served without an endpoint of its own. */
export const TagModel = defineModel({
  tableName: 'tag',
  schema: TagSchema,
  primaryKeys: ['id'],
});

export function createFixtures() {
  const registry = new ModelRegistry([PersonModel, ArticleModel, TagModel]);
  const urls = new EndpointUrlBuilder(registry, { baseUrl: BASE_URL, prefix: '/api' })
    .register(PersonModel)
    .register(ArticleModel);
  return { registry, urls };
}
