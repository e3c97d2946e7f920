/**
 * Tests for ResourceSerializer.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { z, ZodError } from 'zod';
import {
  ConfigurationException,
  defineModel,
  Duration,
  EndpointUrlBuilder,
  ModelRegistry,
  ResourceSerializer,
  SerializationException,
  resetLogger,
  setLogger,
} from '../src/index.js';
import { ArticleModel, PersonModel, TagModel, createFixtures } from './fixtures.js';

describe('ResourceSerializer', () => {
  let fixtures: ReturnType<typeof createFixtures>;

  beforeEach(() => {
    fixtures = createFixtures();
  });

  // ==========================================================================
  // Resource objects
  // ==========================================================================

  describe('serialize', () => {
    it('should serialize a person with a to-many relationship', () => {
      const serializer = new ResourceSerializer(PersonModel, fixtures.registry, fixtures.urls, {
        exclude: ['birthday', 'bedtime', 'displayName'],
      });

      const result = serializer.serialize({
        id: 1,
        name: 'Ann',
        articles: [
          { id: 10, title: 'First' },
          { id: 11, title: 'Second' },
        ],
      });

      expect(result).toEqual({
        id: '1',
        type: 'person',
        attributes: { name: 'Ann' },
        relationships: {
          articles: {
            links: {
              self: 'http://localhost/api/person/1/relationships/articles',
              related: 'http://localhost/api/person/1/articles',
            },
            data: [
              { id: '10', type: 'article' },
              { id: '11', type: 'article' },
            ],
          },
        },
        links: { self: 'http://localhost/api/person/1' },
      });
    });

    it('should emit computed fields and normalize temporal values', () => {
      const serializer = new ResourceSerializer(PersonModel, fixtures.registry, fixtures.urls);

      const result = serializer.serialize({
        id: 2,
        name: 'Bo',
        birthday: new Date('2000-01-02T03:04:05.000Z'),
        bedtime: Duration.fromSeconds(90),
      });

      expect(result.attributes).toEqual({
        name: 'Bo',
        birthday: '2000-01-02T03:04:05.000Z',
        bedtime: 90,
        displayName: 'BO',
      });
    });

    it('should serialize an absent to-many relationship as an empty list', () => {
      const serializer = new ResourceSerializer(PersonModel, fixtures.registry, fixtures.urls);

      const result = serializer.serialize({ id: 2, name: 'Bo' });

      expect(result.relationships?.articles?.data).toEqual([]);
    });

    it('should serialize an empty to-one relationship as null', () => {
      const serializer = new ResourceSerializer(ArticleModel, fixtures.registry, fixtures.urls);

      const result = serializer.serialize({ id: 10, title: 'Draft', authorId: null, author: null });

      expect(result.relationships?.author).toEqual({
        links: {
          self: 'http://localhost/api/article/10/relationships/author',
          related: 'http://localhost/api/article/10/author',
        },
        data: null,
      });
    });

    it('should not emit the foreign key behind a to-one relationship', () => {
      const serializer = new ResourceSerializer(ArticleModel, fixtures.registry, fixtures.urls);

      const result = serializer.serialize({
        id: 10,
        title: 'Draft',
        authorId: 1,
        author: { id: 1, name: 'Ann' },
      });

      expect(result.attributes).toEqual({ title: 'Draft' });
      expect(result.relationships?.author?.data).toEqual({ id: '1', type: 'person' });
    });

    it('should omit the related link when the related model has no endpoint', () => {
      const serializer = new ResourceSerializer(ArticleModel, fixtures.registry, fixtures.urls);

      const result = serializer.serialize({ id: 10, title: 'Draft', tags: [{ id: 3, label: 'news' }] });

      expect(result.relationships?.tags).toEqual({
        links: { self: 'http://localhost/api/article/10/relationships/tags' },
        data: [{ id: '3', type: 'tag' }],
      });
    });

    it('should never emit fields named id or type as attributes', () => {
      const ThingModel = defineModel({
        tableName: 'thing',
        schema: z.object({ id: z.number(), type: z.string(), value: z.string() }),
        primaryKeys: ['id'],
      });
      const registry = new ModelRegistry([ThingModel]);
      const urls = new EndpointUrlBuilder(registry, { baseUrl: 'http://localhost' }).register(ThingModel);
      const serializer = new ResourceSerializer(ThingModel, registry, urls);

      const result = serializer.serialize({ id: 1, type: 'widget', value: 'v' });

      expect(result).toEqual({
        id: '1',
        type: 'thing',
        attributes: { value: 'v' },
        links: { self: 'http://localhost/thing/1' },
      });
    });

    it('should emit additional attributes read from the instance', () => {
      const serializer = new ResourceSerializer(PersonModel, fixtures.registry, fixtures.urls, {
        exclude: ['birthday', 'bedtime', 'displayName', 'articles'],
        additionalAttributes: ['nickname'],
      });

      const result = serializer.serialize({ id: 1, name: 'Ann', nickname: 'Annie' });

      expect(result.attributes).toEqual({ name: 'Ann', nickname: 'Annie' });
      expect(result.relationships).toBeUndefined();
    });

    it('should honor a custom type and primary key', () => {
      const serializer = new ResourceSerializer(PersonModel, fixtures.registry, fixtures.urls, {
        type: 'people',
        primaryKey: 'name',
        only: ['name'],
      });

      expect(serializer.serialize({ id: 1, name: 'Ann' })).toEqual({
        id: 'Ann',
        type: 'people',
        attributes: { name: 'Ann' },
      });
    });

    it('should not mutate the instance', () => {
      const serializer = new ResourceSerializer(PersonModel, fixtures.registry, fixtures.urls);
      const person = { id: 1, name: 'Ann', articles: [{ id: 10, title: 'First' }] };

      serializer.serialize(person);

      expect(person).toEqual({ id: 1, name: 'Ann', articles: [{ id: 10, title: 'First' }] });
    });
  });

  // ==========================================================================
  // Field filtering
  // ==========================================================================

  describe('field filtering', () => {
    it('should intersect the per-call filter with the configured one', () => {
      const serializer = new ResourceSerializer(PersonModel, fixtures.registry, fixtures.urls, {
        only: ['name', 'displayName'],
      });

      const result = serializer.serialize({ id: 1, name: 'Ann' }, ['displayName', 'bedtime']);

      expect(result).toEqual({ id: '1', type: 'person', attributes: { displayName: 'ANN' } });
    });

    it('should keep relationships named in the filter', () => {
      const serializer = new ResourceSerializer(PersonModel, fixtures.registry, fixtures.urls);

      const result = serializer.serialize({ id: 1, name: 'Ann', articles: [] }, ['articles']);

      expect(result.attributes).toBeUndefined();
      expect(Object.keys(result.relationships ?? {})).toEqual(['articles']);
      expect(result.links).toBeUndefined();
    });

    it('should keep the self link only when the filters name it', () => {
      const serializer = new ResourceSerializer(PersonModel, fixtures.registry, fixtures.urls, {
        only: ['name', 'self'],
      });

      expect(serializer.serialize({ id: 1, name: 'Ann' }).links).toEqual({
        self: 'http://localhost/api/person/1',
      });
      expect(serializer.serialize({ id: 1, name: 'Ann' }, ['name']).links).toBeUndefined();
      expect(serializer.serialize({ id: 1, name: 'Ann' }, ['name', 'self']).links).toEqual({
        self: 'http://localhost/api/person/1',
      });
    });

    it('should expose the resolved attribute and relationship names', () => {
      const serializer = new ResourceSerializer(PersonModel, fixtures.registry, fixtures.urls, {
        exclude: ['bedtime'],
      });

      expect(serializer.attributeNames).toEqual(['name', 'birthday', 'displayName']);
      expect(serializer.relationshipNames).toEqual(['articles']);
    });
  });

  // ==========================================================================
  // Configuration errors
  // ==========================================================================

  describe('configuration', () => {
    it('should reject only combined with exclude', () => {
      expect(
        () =>
          new ResourceSerializer(PersonModel, fixtures.registry, fixtures.urls, {
            only: ['name'],
            exclude: ['bedtime'],
          })
      ).toThrow(ConfigurationException);
    });

    it('should reject excluding an additional attribute', () => {
      expect(
        () =>
          new ResourceSerializer(PersonModel, fixtures.registry, fixtures.urls, {
            additionalAttributes: ['nickname'],
            exclude: ['nickname'],
          })
      ).toThrow('Cannot exclude attributes listed in `additionalAttributes`');
    });
  });

  // ==========================================================================
  // Failures
  // ==========================================================================

  describe('failures', () => {
    it('should raise SerializationException with the partial resource when a computed field throws', () => {
      const GadgetModel = defineModel({
        tableName: 'gadget',
        schema: z.object({ id: z.number(), label: z.string() }),
        primaryKeys: ['id'],
        computedFields: {
          broken: {
            compute: () => {
              throw new Error('sensor offline');
            },
          },
        },
      });
      const registry = new ModelRegistry([GadgetModel]);
      const urls = new EndpointUrlBuilder(registry, { baseUrl: 'http://localhost' }).register(GadgetModel);
      const serializer = new ResourceSerializer(GadgetModel, registry, urls);
      const gadget = { id: 1, label: 'lamp' };

      let caught: unknown;
      try {
        serializer.serialize(gadget);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(SerializationException);
      if (!(caught instanceof SerializationException)) return;
      expect(caught.message).toBe("Failed to read attribute 'broken'");
      expect(caught.status).toBe(500);
      expect(caught.instance).toBe(gadget);
      expect(caught.resource).toEqual({ id: '1', type: 'gadget', attributes: { label: 'lamp' } });
      expect(caught.cause).toBeInstanceOf(Error);
    });

    it('should check computed values against their schema', () => {
      const GadgetModel = defineModel({
        tableName: 'gadget',
        schema: z.object({ id: z.number(), label: z.string() }),
        primaryKeys: ['id'],
        computedFields: {
          shortLabel: { compute: (gadget) => gadget.label.slice(0, 3), schema: z.string() },
          rating: { compute: (gadget) => gadget.label.length, schema: z.number().max(5) },
        },
      });
      const registry = new ModelRegistry([GadgetModel]);
      const urls = new EndpointUrlBuilder(registry, { baseUrl: 'http://localhost' }).register(GadgetModel);
      const serializer = new ResourceSerializer(GadgetModel, registry, urls);

      expect(serializer.serialize({ id: 1, label: 'fan' }).attributes).toEqual({
        label: 'fan',
        shortLabel: 'fan',
        rating: 3,
      });

      let caught: unknown;
      try {
        serializer.serialize({ id: 2, label: 'heater' });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(SerializationException);
      if (!(caught instanceof SerializationException)) return;
      expect(caught.message).toBe("Computed field 'rating' does not match its schema");
      expect(caught.resource).toEqual({
        id: '2',
        type: 'gadget',
        attributes: { label: 'heater', shortLabel: 'hea' },
      });
      expect(caught.cause).toBeInstanceOf(ZodError);
    });

    it('should raise SerializationException when the primary key is missing', () => {
      const serializer = new ResourceSerializer(PersonModel, fixtures.registry, fixtures.urls);

      expect(() => serializer.serialize({ name: 'Ann' })).toThrow(
        "Instance has no value for primary key 'id'"
      );
    });

    it('should raise SerializationException for a related value that is not an instance', () => {
      const serializer = new ResourceSerializer(PersonModel, fixtures.registry, fixtures.urls);

      expect(() => serializer.serialize({ id: 1, name: 'Ann', articles: [42] })).toThrow(
        SerializationException
      );
    });
  });

  // ==========================================================================
  // Models without an endpoint
  // ==========================================================================

  describe('models without an endpoint', () => {
    const debug = vi.fn();

    beforeEach(() => {
      debug.mockClear();
      setLogger({ debug, warn: vi.fn(), error: vi.fn() });
    });

    afterEach(() => {
      resetLogger();
    });

    it('should omit the self link and log at debug level', () => {
      const serializer = new ResourceSerializer(TagModel, fixtures.registry, fixtures.urls);

      const result = serializer.serialize({ id: 3, label: 'news', articleId: 10 });

      expect(result).toEqual({
        id: '3',
        type: 'tag',
        attributes: { label: 'news', articleId: 10 },
      });
      expect(debug).toHaveBeenCalledWith('No endpoint for resource, omitting self link', {
        type: 'tag',
      });
    });
  });

  describe('serializeMany', () => {
    it('should serialize instances in order', () => {
      const serializer = new ResourceSerializer(PersonModel, fixtures.registry, fixtures.urls, {
        only: ['name'],
      });

      const result = serializer.serializeMany([
        { id: 1, name: 'Ann' },
        { id: 2, name: 'Bo' },
      ]);

      expect(result).toEqual([
        { id: '1', type: 'person', attributes: { name: 'Ann' } },
        { id: '2', type: 'person', attributes: { name: 'Bo' } },
      ]);
    });
  });
});
