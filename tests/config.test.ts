/**
 * Tests for the config-based API.
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import {
  ConfigurationException,
  MemorySession,
  clearStorage,
  createJsonApi,
  defineModel,
} from '../src/index.js';
import { ArticleModel, PersonModel, TagModel } from './fixtures.js';

function configurationError(fn: () => unknown): ConfigurationException {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationException) return error;
    throw error;
  }
  throw new Error('Expected a ConfigurationException');
}

describe('createJsonApi', () => {
  const api = createJsonApi({
    baseUrl: 'http://localhost',
    prefix: '/api',
    resources: [
      { model: PersonModel, exclude: ['birthday', 'bedtime', 'displayName'] },
      { model: ArticleModel },
      { model: TagModel, endpoint: false },
    ],
  });

  beforeEach(() => {
    clearStorage();
  });

  describe('configured API', () => {
    it('should list resource types in configuration order', () => {
      expect(api.types).toEqual(['person', 'article', 'tag']);
    });

    it('should serialize with the per-resource options', () => {
      expect(api.serialize('person', { id: 1, name: 'Ann' })).toEqual({
        id: '1',
        type: 'person',
        attributes: { name: 'Ann' },
        relationships: {
          articles: {
            links: {
              self: 'http://localhost/api/person/1/relationships/articles',
              related: 'http://localhost/api/person/1/articles',
            },
            data: [],
          },
        },
        links: { self: 'http://localhost/api/person/1' },
      });
    });

    it('should omit links for resources without an endpoint', () => {
      const tag = api.serialize('tag', { id: 3, label: 'news', articleId: 10 });

      expect(tag).toEqual({ id: '3', type: 'tag', attributes: { label: 'news', articleId: 10 } });
      expect(api.urls.hasEndpoint(TagModel)).toBe(false);
    });

    it('should narrow fields per call', () => {
      expect(api.serialize('article', { id: 10, title: 'First' }, ['title'])).toEqual({
        id: '10',
        type: 'article',
        attributes: { title: 'First' },
      });
    });

    it('should look up models by type', () => {
      expect(api.model('article')).toBe(ArticleModel);
      expect(api.registry.findByType('tag')).toBe(TagModel);
    });

    it('should reject unknown types', () => {
      expect(() => api.serializer('dog')).toThrow("Unknown resource type 'dog'");
      expect(() => api.model('dog')).toThrow(ConfigurationException);
    });

    it('should build deserializers bound to a session', async () => {
      const session = new MemorySession(api.registry);
      await session.add(PersonModel, { id: 1, name: 'Ann' });

      const article = await api.deserializer('article', session).deserialize({
        data: {
          type: 'article',
          attributes: { title: 'Hello' },
          relationships: { author: { data: { type: 'person', id: '1' } } },
        },
      });

      expect(article).toEqual({ title: 'Hello', author: { id: 1, name: 'Ann' } });
    });

    it('should pass deserializer options through', async () => {
      const session = new MemorySession(api.registry);

      const person = await api
        .deserializer('person', session, { allowClientGeneratedIds: true })
        .deserialize({ data: { type: 'person', id: '4', attributes: { name: 'Di' } } });

      expect(person).toEqual({ id: 4, name: 'Di' });
    });
  });

  describe('validation', () => {
    it('should reject an invalid base URL', () => {
      const error = configurationError(() =>
        createJsonApi({ baseUrl: 'not a url', resources: [{ model: PersonModel }] })
      );

      expect(error.message).toBe('Invalid JSON API configuration');
      expect(error.details).toEqual([expect.objectContaining({ path: 'baseUrl' })]);
    });

    it('should require at least one resource', () => {
      const error = configurationError(() =>
        createJsonApi({ baseUrl: 'http://localhost', resources: [] })
      );

      expect(error.details).toEqual([expect.objectContaining({ path: 'resources' })]);
    });

    it('should reject relationships to models that are not configured', () => {
      const error = configurationError(() =>
        createJsonApi({ baseUrl: 'http://localhost', resources: [{ model: ArticleModel }] })
      );

      expect(error.message).toBe("Model 'person' is not registered");
    });

    it('should reject two models with the same name', () => {
      const OtherPerson = defineModel({
        tableName: 'person',
        schema: z.object({ id: z.string() }),
        primaryKeys: ['id'],
      });

      const error = configurationError(() =>
        createJsonApi({
          baseUrl: 'http://localhost',
          resources: [{ model: PersonModel }, { model: OtherPerson }],
        })
      );

      expect(error.message).toBe("A model named 'person' (type 'person') is already registered");
    });

    it('should reject conflicting serializer options', () => {
      const error = configurationError(() =>
        createJsonApi({
          baseUrl: 'http://localhost',
          resources: [{ model: TagModel, only: ['label'], exclude: ['articleId'] }],
        })
      );

      expect(error.message).toBe('Cannot specify both `only` and `exclude` simultaneously');
    });
  });
});
