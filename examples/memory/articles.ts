/**
 * Example: JSON API resources over in-memory storage
 *
 * Serves people and their articles as JSON API documents. Articles are
 * created from JSON API documents whose `author` relationship points at a
 * stored person.
 *
 * Run with: npx tsx examples/memory/articles.ts
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { serve } from '@hono/node-server';
import { z } from 'zod';
import {
  JSON_API_CONTENT_TYPE,
  MemorySession,
  clearStorage,
  createJsonApi,
  createJsonApiErrorHandler,
  defineModel,
} from '../../src/index.js';

// Clear storage on start
clearStorage();

// ============================================================================
// Models
// ============================================================================

const PersonModel = defineModel({
  tableName: 'person',
  schema: z.object({
    id: z.number(),
    name: z.string().min(1),
    email: z.email(),
  }),
  primaryKeys: ['id'],
  relations: {
    articles: { type: 'hasMany', model: 'article', foreignKey: 'authorId' },
  },
});

const ArticleModel = defineModel({
  tableName: 'article',
  schema: z.object({
    id: z.number(),
    title: z.string().min(1),
    publishedAt: z.date().optional(),
    authorId: z.number().nullable().optional(),
  }),
  primaryKeys: ['id'],
  relations: {
    author: { type: 'belongsTo', model: 'person', foreignKey: 'authorId' },
  },
  computedFields: {
    slug: { compute: (article) => article.title.toLowerCase().replace(/\s+/g, '-') },
  },
});

const port = 3456;

const api = createJsonApi({
  baseUrl: `http://localhost:${port}`,
  resources: [
    { model: PersonModel, exclude: ['email'] },
    { model: ArticleModel },
  ],
});

const session = new MemorySession(api.registry);

// ============================================================================
// Seed Data
// ============================================================================

await session.add(PersonModel, { id: 1, name: 'Ann', email: 'ann@example.com' });
await session.add(ArticleModel, { id: 10, title: 'First Steps', authorId: 1 });

// ============================================================================
// Routes
// ============================================================================

function document(c: Context, body: unknown, status: ContentfulStatusCode = 200): Response {
  return c.body(JSON.stringify(body), status, { 'Content-Type': JSON_API_CONTENT_TYPE });
}

const app = new Hono();
app.onError(createJsonApiErrorHandler());

app.get('/person/:id', async (c) => {
  const person = await session.load(PersonModel, c.req.param('id'));
  return document(c, { data: api.serialize('person', person) });
});

app.get('/person/:id/relationships/articles', async (c) => {
  const person = await session.load(PersonModel, c.req.param('id'), ['articles']);
  const resource = api.serialize('person', person, ['articles']);
  return document(c, resource.relationships?.articles ?? { data: [] });
});

app.get('/article/:id', async (c) => {
  const article = await session.load(ArticleModel, c.req.param('id'));
  return document(c, { data: api.serialize('article', article) });
});

app.post('/article', async (c) => {
  const instance = await api.deserializer('article', session).deserialize(await c.req.json());
  const stored = await session.add(ArticleModel, instance);
  const article = await session.load(ArticleModel, String(stored.id));
  return document(c, { data: api.serialize('article', article) }, 201);
});

console.log(`
JSON API example running on http://localhost:${port}

1. Fetch a person with their articles:
   curl http://localhost:${port}/person/1

2. Create an article written by that person:
   curl -X POST http://localhost:${port}/article \\
     -H 'Content-Type: application/vnd.api+json' \\
     -d '{"data":{"type":"article","attributes":{"title":"Second Thoughts"},"relationships":{"author":{"data":{"type":"person","id":"1"}}}}}'

3. Send a document of the wrong type (409):
   curl -X POST http://localhost:${port}/article -d '{"data":{"type":"person"}}'
`);

serve({
  fetch: app.fetch,
  port,
});
