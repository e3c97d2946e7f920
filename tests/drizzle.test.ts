/**
 * Tests for the Drizzle session.
 * Uses SQLite via libsql for testing.
 */
import { describe, it, expect, beforeEach, beforeAll } from 'vitest';
import { z } from 'zod';
import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';
import { drizzle } from 'drizzle-orm/libsql';
import { createClient } from '@libsql/client';
import { sql } from 'drizzle-orm';
import {
  ConfigurationException,
  DrizzleSession,
  EndpointUrlBuilder,
  ModelRegistry,
  NotFoundException,
  ResourceDeserializer,
  ResourceSerializer,
  defineModel,
} from '../src/index.js';

// ============================================================================
// Database Setup
// ============================================================================

const personTable = sqliteTable('person', {
  id: integer('id').primaryKey(),
  name: text('name').notNull(),
});

const articleTable = sqliteTable('article', {
  id: integer('id').primaryKey(),
  title: text('title').notNull(),
  authorId: integer('authorId').references(() => personTable.id),
});

// Create in-memory SQLite database
const client = createClient({ url: ':memory:' });
const db = drizzle(client);

// ============================================================================
// Models
// ============================================================================

const PersonModel = defineModel({
  tableName: 'person',
  schema: z.object({ id: z.number(), name: z.string().min(1) }),
  primaryKeys: ['id'],
  table: personTable,
  relations: {
    articles: { type: 'hasMany', model: 'article', foreignKey: 'authorId' },
  },
});

const ArticleModel = defineModel({
  tableName: 'article',
  schema: z.object({
    id: z.number(),
    title: z.string().min(1),
    authorId: z.number().nullable().optional(),
  }),
  primaryKeys: ['id'],
  table: articleTable,
  relations: {
    author: { type: 'belongsTo', model: 'person', foreignKey: 'authorId' },
  },
});

const CommentModel = defineModel({
  tableName: 'comment',
  schema: z.object({ id: z.number(), body: z.string() }),
  primaryKeys: ['id'],
});

const registry = new ModelRegistry([PersonModel, ArticleModel, CommentModel]);

// ============================================================================
// Tests
// ============================================================================

describe('DrizzleSession', () => {
  const session = new DrizzleSession(db, registry);

  beforeAll(async () => {
    await db.run(sql`
      CREATE TABLE IF NOT EXISTS person (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL
      )
    `);

    await db.run(sql`
      CREATE TABLE IF NOT EXISTS article (
        id INTEGER PRIMARY KEY,
        title TEXT NOT NULL,
        authorId INTEGER REFERENCES person(id)
      )
    `);
  });

  beforeEach(async () => {
    // Clear tables
    await db.delete(articleTable);
    await db.delete(personTable);

    await db.insert(personTable).values([
      { id: 1, name: 'Ann' },
      { id: 2, name: 'Bo' },
    ]);
    await db.insert(articleTable).values([
      { id: 10, title: 'First', authorId: 1 },
      { id: 11, title: 'Second', authorId: 1 },
      { id: 12, title: 'Orphan', authorId: null },
    ]);
  });

  describe('get', () => {
    it('should fetch a row by primary key', async () => {
      expect(await session.get(PersonModel, 1)).toEqual({ id: 1, name: 'Ann' });
    });

    it('should throw NotFoundException for an unknown id', async () => {
      await expect(session.get(PersonModel, 9)).rejects.toThrow(NotFoundException);
      await expect(session.get(PersonModel, 9)).rejects.toThrow("person with id '9' not found");
    });

    it('should require a Drizzle table on the model', async () => {
      await expect(session.get(CommentModel, 1)).rejects.toThrow(ConfigurationException);
    });
  });

  describe('load', () => {
    it('should attach hasMany relationships', async () => {
      const person = await session.load(PersonModel, 1);

      expect(person.name).toBe('Ann');
      expect(person.articles).toEqual([
        { id: 10, title: 'First', authorId: 1 },
        { id: 11, title: 'Second', authorId: 1 },
      ]);
    });

    it('should attach an empty list when nothing is related', async () => {
      expect(await session.load(PersonModel, 2)).toEqual({ id: 2, name: 'Bo', articles: [] });
    });

    it('should attach belongsTo relationships', async () => {
      expect(await session.load(ArticleModel, 10)).toEqual({
        id: 10,
        title: 'First',
        authorId: 1,
        author: { id: 1, name: 'Ann' },
      });
      expect((await session.load(ArticleModel, 12)).author).toBeNull();
    });
  });

  describe('add', () => {
    it('should insert a row and fill belongsTo foreign keys', async () => {
      const article = await session.add(ArticleModel, {
        id: 20,
        title: 'Third',
        author: { id: 2, name: 'Bo' },
      });

      expect(article).toEqual({ id: 20, title: 'Third', authorId: 2 });
      expect(await session.get(ArticleModel, 20)).toEqual({ id: 20, title: 'Third', authorId: 2 });
    });
  });

  describe('with serializers', () => {
    it('should deserialize against stored rows and serialize the result', async () => {
      const urls = new EndpointUrlBuilder(registry, { baseUrl: 'http://localhost' })
        .register(PersonModel)
        .register(ArticleModel);
      const deserializer = new ResourceDeserializer(session, ArticleModel, registry);
      const serializer = new ResourceSerializer(ArticleModel, registry, urls);

      const instance = await deserializer.deserialize({
        data: {
          type: 'article',
          attributes: { title: 'Fresh' },
          relationships: { author: { data: { type: 'person', id: '2' } } },
        },
      });
      const stored = await session.add(ArticleModel, instance);
      const loaded = await session.load(ArticleModel, Number(stored.id));

      expect(serializer.serialize(loaded)).toEqual({
        id: String(stored.id),
        type: 'article',
        attributes: { title: 'Fresh' },
        relationships: {
          author: {
            links: {
              self: `http://localhost/article/${String(stored.id)}/relationships/author`,
              related: `http://localhost/article/${String(stored.id)}/author`,
            },
            data: { id: '2', type: 'person' },
          },
        },
        links: { self: `http://localhost/article/${String(stored.id)}` },
      });
    });

    it('should pass not-found errors through the deserializer', async () => {
      const deserializer = new ResourceDeserializer(session, ArticleModel, registry);

      await expect(
        deserializer.deserialize({
          data: {
            type: 'article',
            attributes: { title: 'Fresh' },
            relationships: { author: { data: { type: 'person', id: '404' } } },
          },
        })
      ).rejects.toThrow(NotFoundException);
    });
  });
});
