import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import {
  setupTestDb,
  cleanupTestDb,
  clearTables,
  createTestServer,
  type TestDb,
} from '../fixtures/test-helpers.js';
import type { CardResponse, TopicResponse } from '../../src/restapi/presenters/index.js';

const TEST_DB_PATH = './data/test-restapi.db';

const ALLOWED_TYPES = ['flashcard', 'summary', 'quiz', 'task', 'usecase', 'mindmap'];

interface CreateTopicResponse {
  topic: TopicResponse;
  cards: CardResponse[];
}

let testDb: TestDb;
let app: FastifyInstance;

async function createTopic(topic: string, formats: string[]): Promise<CreateTopicResponse> {
  const res = await app.inject({ method: 'POST', url: '/topics', payload: { topic, formats } });
  expect(res.statusCode).toBe(201);
  const body: CreateTopicResponse = res.json();
  return body;
}

async function countRows(): Promise<{ topics: number; cards: number }> {
  const topics: TopicResponse[] = (await app.inject({ method: 'GET', url: '/topics' })).json();
  const cards: CardResponse[] = (await app.inject({ method: 'GET', url: '/cards' })).json();
  return { topics: topics.length, cards: cards.length };
}

describe('REST API Integration', () => {
  beforeAll(() => {
    testDb = setupTestDb(TEST_DB_PATH);
  });

  afterAll(() => {
    cleanupTestDb(testDb);
  });

  beforeEach(async () => {
    clearTables(testDb);
    app = await createTestServer(testDb);
  });

  afterEach(async () => {
    await app.close();
  });

  it('GET /health returns ok', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok' });
  });

  describe('POST /topics', () => {
    it('creates the topic with one card per format in order', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/topics',
        payload: { topic: 'Docker volumes', formats: ['flashcard', 'summary'] },
      });

      expect(res.statusCode).toBe(201);
      const body: CreateTopicResponse = res.json();
      expect(body.topic.name).toBe('Docker volumes');
      expect(Object.keys(body.topic)).toEqual(['id', 'name', 'created_at']);
      expect(body.cards).toHaveLength(2);
      expect(body.cards[0]?.content.startsWith('Q: What is Docker volumes?')).toBe(true);
      expect(body.cards[1]?.content.startsWith('Summary for Docker volumes:')).toBe(true);
      expect(body.cards.map((c) => c.topic_id)).toEqual([body.topic.id, body.topic.id]);
    });

    it('returns cards with snake_case keys and ISO timestamps', async () => {
      const { topic, cards } = await createTopic('Sets', ['quiz']);
      const card = cards[0];

      expect(card).toEqual({
        id: card?.id,
        topic_id: topic.id,
        card_type: 'quiz',
        content: 'Quiz question about Sets: write one key concept related to it.',
        created_at: topic.created_at,
      });
      expect(topic.created_at).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    });

    it('creates three cards matching the generator for three formats', async () => {
      const { cards } = await createTopic('Heaps', ['task', 'usecase', 'mindmap']);
      expect(cards.map((c) => [c.card_type, c.content])).toEqual([
        ['task', 'Task for Heaps: perform a small exercise that uses this topic in practice.'],
        ['usecase', 'Use case for Heaps: describe when and why you would use Heaps.'],
        ['mindmap', 'Mindmap structure for Heaps: main idea -> subtopic A, subtopic B, subtopic C.'],
      ]);
    });

    it('rejects a duplicate name with 409 and writes nothing', async () => {
      await createTopic('Graphs', ['quiz']);

      const res = await app.inject({
        method: 'POST',
        url: '/topics',
        payload: { topic: 'Graphs', formats: ['summary', 'task'] },
      });

      expect(res.statusCode).toBe(409);
      expect(res.json()).toEqual({ error: 'Topic already exists' });
      expect(await countRows()).toEqual({ topics: 1, cards: 1 });
    });

    it('treats names differing in case as different topics', async () => {
      await createTopic('Graphs', ['quiz']);
      await createTopic('graphs', ['quiz']);
      expect(await countRows()).toEqual({ topics: 2, cards: 2 });
    });

    it.each(['', '   ', '\t\n'])('rejects the blank name %j', async (topic) => {
      const res = await app.inject({
        method: 'POST',
        url: '/topics',
        payload: { topic, formats: ['quiz'] },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: 'Topic name cannot be empty' });
      expect(await countRows()).toEqual({ topics: 0, cards: 0 });
    });

    it('rejects a request without a body', async () => {
      const res = await app.inject({ method: 'POST', url: '/topics' });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: "Missing 'topic' in request body" });
    });

    it('rejects a body that is not JSON as missing the topic', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/topics',
        headers: { 'content-type': 'text/plain' },
        payload: 'topic=Graphs',
      });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: "Missing 'topic' in request body" });
    });

    it('rejects malformed JSON', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/topics',
        headers: { 'content-type': 'application/json' },
        payload: '{"topic": ',
      });
      expect(res.statusCode).toBe(400);
      const body: { error: unknown } = res.json();
      expect(typeof body.error).toBe('string');
    });

    it('rejects an empty formats list', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/topics',
        payload: { topic: 'Graphs', formats: [] },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: 'Formats must be a non-empty list' });
    });

    it('rejects an invalid format, names it and persists nothing', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/topics',
        payload: { topic: 'Graphs', formats: ['flashcard', 'podcast'] },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: "Invalid card_type in formats: 'podcast'",
        allowed_types: ALLOWED_TYPES,
      });
      expect(await countRows()).toEqual({ topics: 0, cards: 0 });
    });
  });

  describe('GET /topics', () => {
    it('lists topics by id', async () => {
      const first = await createTopic('Zeta', ['quiz']);
      const second = await createTopic('Alpha', ['quiz']);

      const res = await app.inject({ method: 'GET', url: '/topics' });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual([first.topic, second.topic]);
    });

    it('returns an empty list on an empty store', async () => {
      const res = await app.inject({ method: 'GET', url: '/topics' });
      expect(res.json()).toEqual([]);
    });
  });

  describe('GET /topics/:id/cards', () => {
    it('returns exactly the flashcard of the topic', async () => {
      const created = await createTopic('Docker volumes', ['flashcard', 'summary']);
      await createTopic('Kubernetes', ['flashcard']);

      const res = await app.inject({
        method: 'GET',
        url: `/topics/${created.topic.id}/cards?type=flashcard`,
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual([created.cards[0]]);
    });

    it('returns every card of the topic without a filter', async () => {
      const created = await createTopic('Graphs', ['quiz', 'task']);

      const res = await app.inject({ method: 'GET', url: `/topics/${created.topic.id}/cards` });
      expect(res.json()).toEqual(created.cards);

      const empty = await app.inject({
        method: 'GET',
        url: `/topics/${created.topic.id}/cards?type=`,
      });
      expect(empty.json()).toEqual(created.cards);
    });

    it('returns 404 for an unknown topic even with an invalid filter', async () => {
      const res = await app.inject({ method: 'GET', url: '/topics/999999/cards?type=bogus' });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: 'Topic not found' });
    });

    it('returns 404 for a non-numeric topic id', async () => {
      const res = await app.inject({ method: 'GET', url: '/topics/abc/cards' });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: 'Topic not found' });
    });

    it('returns 400 for an invalid filter on an existing topic', async () => {
      const created = await createTopic('Graphs', ['quiz']);
      const res = await app.inject({
        method: 'GET',
        url: `/topics/${created.topic.id}/cards?type=bogus`,
      });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: 'Invalid card_type', allowed_types: ALLOWED_TYPES });
    });
  });

  describe('GET /cards', () => {
    it('filters quiz cards across topics', async () => {
      const graphs = await createTopic('Graphs', ['quiz', 'summary']);
      const sets = await createTopic('Sets', ['task', 'quiz']);

      const res = await app.inject({ method: 'GET', url: '/cards?type=quiz' });
      expect(res.statusCode).toBe(200);
      const cards: CardResponse[] = res.json();
      expect(cards).toEqual([graphs.cards[0], sets.cards[1]]);
      expect(cards.every((c) => c.card_type === 'quiz')).toBe(true);
    });

    it('uses the first value of a repeated type parameter', async () => {
      const graphs = await createTopic('Graphs', ['quiz', 'summary']);

      const res = await app.inject({ method: 'GET', url: '/cards?type=quiz&type=bogus' });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual([graphs.cards[0]]);
    });

    it('returns 400 with the allowed set for an invalid type on an empty store', async () => {
      const res = await app.inject({ method: 'GET', url: '/cards?type=video' });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: 'Invalid card_type', allowed_types: ALLOWED_TYPES });
    });
  });

  describe('PUT /cards/:id', () => {
    it('updates the given fields and returns the card', async () => {
      const { cards } = await createTopic('Graphs', ['quiz']);
      const card = cards[0];

      const res = await app.inject({
        method: 'PUT',
        url: `/cards/${card?.id}`,
        payload: { card_type: 'task', content: '  Draw a graph  ' },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ ...card, card_type: 'task', content: '  Draw a graph  ' });
    });

    it('keeps fields that are not provided', async () => {
      const { cards } = await createTopic('Graphs', ['quiz']);
      const card = cards[0];

      const res = await app.inject({
        method: 'PUT',
        url: `/cards/${card?.id}`,
        payload: { content: 'only content' },
      });
      expect(res.json()).toEqual({ ...card, content: 'only content' });
    });

    it('treats a non-JSON body as an empty update', async () => {
      const { cards } = await createTopic('Graphs', ['quiz']);
      const card = cards[0];

      const res = await app.inject({
        method: 'PUT',
        url: `/cards/${card?.id}`,
        headers: { 'content-type': 'text/plain' },
        payload: 'hello',
      });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual(card);
    });

    it('treats an empty JSON body as an empty update', async () => {
      const { cards } = await createTopic('Graphs', ['quiz']);
      const card = cards[0];

      const res = await app.inject({
        method: 'PUT',
        url: `/cards/${card?.id}`,
        headers: { 'content-type': 'application/json' },
        payload: '',
      });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual(card);
    });

    it('treats a malformed JSON body as an empty update', async () => {
      const { cards } = await createTopic('Graphs', ['quiz']);
      const card = cards[0];

      const res = await app.inject({
        method: 'PUT',
        url: `/cards/${card?.id}`,
        headers: { 'content-type': 'application/json' },
        payload: '{bad',
      });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual(card);
    });

    it('reports an unknown card as 404 even with a malformed JSON body', async () => {
      const res = await app.inject({
        method: 'PUT',
        url: '/cards/999',
        headers: { 'content-type': 'application/json' },
        payload: '{bad',
      });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: 'Card not found' });
    });

    it('returns 404 for an unknown card and mutates nothing', async () => {
      const { cards } = await createTopic('Graphs', ['quiz']);

      const res = await app.inject({
        method: 'PUT',
        url: '/cards/999999',
        payload: { card_type: 'task', content: 'x' },
      });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: 'Card not found' });
      const after = await app.inject({ method: 'GET', url: '/cards' });
      expect(after.json()).toEqual(cards);
    });

    it('returns 400 for an invalid card_type and leaves the card unchanged', async () => {
      const { cards } = await createTopic('Graphs', ['quiz']);
      const card = cards[0];

      const res = await app.inject({
        method: 'PUT',
        url: `/cards/${card?.id}`,
        payload: { card_type: 'essay', content: 'changed' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: 'Invalid card_type', allowed_types: ALLOWED_TYPES });
      const after = await app.inject({ method: 'GET', url: '/cards' });
      expect(after.json()).toEqual(cards);
    });
  });

  describe('DELETE /cards/:id', () => {
    it('deletes once, then reports 404', async () => {
      const { cards } = await createTopic('Graphs', ['quiz', 'summary']);
      const id = cards[0]?.id;

      const first = await app.inject({ method: 'DELETE', url: `/cards/${id}` });
      expect(first.statusCode).toBe(200);
      expect(first.json()).toEqual({ status: 'deleted', id });

      const second = await app.inject({ method: 'DELETE', url: `/cards/${id}` });
      expect(second.statusCode).toBe(404);
      expect(second.json()).toEqual({ error: 'Card not found' });

      expect(await countRows()).toEqual({ topics: 1, cards: 1 });
    });
  });

  describe('DELETE /cards/:id with a JSON content type', () => {
    it('deletes when the body is empty', async () => {
      const { cards } = await createTopic('Graphs', ['quiz']);
      const id = cards[0]?.id;

      const res = await app.inject({
        method: 'DELETE',
        url: `/cards/${id}`,
        headers: { 'content-type': 'application/json' },
        payload: '',
      });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ status: 'deleted', id });

      const again = await app.inject({
        method: 'DELETE',
        url: `/cards/${id}`,
        headers: { 'content-type': 'application/json' },
        payload: '',
      });
      expect(again.statusCode).toBe(404);
      expect(await countRows()).toEqual({ topics: 1, cards: 0 });
    });

    it('ignores a malformed body', async () => {
      const { cards } = await createTopic('Graphs', ['quiz']);
      const id = cards[0]?.id;

      const res = await app.inject({
        method: 'DELETE',
        url: `/cards/${id}`,
        headers: { 'content-type': 'application/json' },
        payload: 'not json',
      });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ status: 'deleted', id });
    });
  });

  describe('routing', () => {
    it('returns 404 JSON for unknown paths', async () => {
      const res = await app.inject({ method: 'GET', url: '/nope' });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: 'Route not found' });
    });

    it('returns 404 for an unsupported method', async () => {
      const res = await app.inject({ method: 'PATCH', url: '/cards/1' });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: 'Route not found' });
    });
  });
});
