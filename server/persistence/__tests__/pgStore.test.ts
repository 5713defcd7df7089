import { describe, expect, it, vi } from 'vitest';
import type { ArticleDraft } from '../../../shared/types';
import { buildListQuery, createPgArticleStoreFromClient, rowToArticle, type SqlClient } from '../pgStore';

const FINGERPRINT = 'c'.repeat(64);

const row = (overrides: Record<string, unknown> = {}) => ({
  id: '7',
  fingerprint: FINGERPRINT,
  title: 'Python 4.0',
  text: 'Python just released version 4.0',
  summary: null,
  source: 'https://example.com',
  author: null,
  original_link: null,
  categories_auto: ['programming'],
  categories_advanced: null,
  categories_user: null,
  language: 'en',
  comments_count: 0,
  likes_count: '3',
  views_count: 0,
  created_at: new Date('2026-01-01T00:00:00.000Z'),
  updated_at: '2026-01-02T00:00:00.000Z',
  ...overrides,
});

const draft: ArticleDraft = {
  fingerprint: FINGERPRINT,
  title: 'Python 4.0',
  text: 'Python just released version 4.0',
  summary: 'Python just released version 4.0',
  source: null,
  author: null,
  originalLink: null,
  categoriesAuto: ['programming'],
  categoriesAdvanced: {
    primaryCategory: 'Programming',
    subcategories: ['Python'],
    keywords: ['python'],
    confidence: 0.9,
    summary: 'A release.',
  },
  categoriesUser: ['Later', 'later'],
  language: 'en',
};

type Scripted = { rows: unknown[] } | { error: unknown };

/** Answers queries from a script, in order, and records what was asked. */
const scriptedClient = (script: Scripted[]) => {
  const calls: Array<{ text: string; values?: unknown[] }> = [];
  const client: SqlClient = {
    query: async (text, values) => {
      calls.push({ text, values });
      const next = script.shift();
      if (!next) throw new Error(`Unexpected query: ${text}`);
      if ('error' in next) throw next.error;
      return next;
    },
    end: vi.fn(async () => undefined),
  };
  return { client, calls };
};

describe('rowToArticle', () => {
  it('maps snake_case columns and fills empty values', () => {
    expect(rowToArticle(row())).toEqual({
      id: '7',
      fingerprint: FINGERPRINT,
      title: 'Python 4.0',
      text: 'Python just released version 4.0',
      summary: '',
      source: 'https://example.com',
      author: null,
      originalLink: null,
      categoriesAuto: ['programming'],
      categoriesAdvanced: null,
      categoriesUser: [],
      language: 'en',
      commentsCount: 0,
      likesCount: 3,
      viewsCount: 0,
      createdAt: '2026-01-01T00:00:00.000Z',
      updatedAt: '2026-01-02T00:00:00.000Z',
    });
  });
});

describe('buildListQuery', () => {
  it('parameterizes every filter and clamps the window', () => {
    const { text, values } = buildListQuery({ category: 'ai', language: 'en', search: 'python', limit: 500, offset: 10 });

    expect(text).toContain(
      'FROM articles WHERE ($1 = ANY(categories_user) OR $1 = ANY(categories_auto)) AND language = $2 AND (title ILIKE $3 OR text ILIKE $3)',
    );
    expect(text.endsWith('ORDER BY created_at DESC, id DESC LIMIT $4 OFFSET $5')).toBe(true);
    expect(values).toEqual(['ai', 'en', '%python%', 200, 10]);
  });

  it('omits the WHERE clause without filters', () => {
    const { text, values } = buildListQuery();

    expect(text).toContain('FROM articles ORDER BY created_at DESC');
    expect(values).toEqual([50, 0]);
  });
});

describe('createPgArticleStoreFromClient', () => {
  it('inserts new articles with ON CONFLICT DO NOTHING', async () => {
    const { client, calls } = scriptedClient([{ rows: [row()] }]);
    const store = createPgArticleStoreFromClient(client);

    const outcome = await store.insertIfAbsent(draft);

    expect(outcome.status).toBe('inserted');
    expect(calls).toHaveLength(1);
    expect(calls[0].text).toContain('ON CONFLICT (fingerprint) DO NOTHING');
    expect(calls[0].values).toEqual([
      FINGERPRINT,
      'Python 4.0',
      'Python just released version 4.0',
      'Python just released version 4.0',
      null,
      null,
      null,
      ['programming'],
      JSON.stringify(draft.categoriesAdvanced),
      ['Later'],
      'en',
    ]);
  });

  it('returns the existing row when the insert conflicts', async () => {
    const { client, calls } = scriptedClient([{ rows: [] }, { rows: [row({ id: '3' })] }]);
    const store = createPgArticleStoreFromClient(client);

    const outcome = await store.insertIfAbsent(draft);

    expect(outcome.status).toBe('duplicate');
    if (outcome.status !== 'duplicate') return;
    expect(outcome.existing.id).toBe('3');
    expect(calls[1].values).toEqual([FINGERPRINT]);
  });

  it('treats a unique violation as a duplicate', async () => {
    const { client } = scriptedClient([{ error: { code: '23505' } }, { rows: [row()] }]);

    const outcome = await createPgArticleStoreFromClient(client).insertIfAbsent(draft);

    expect(outcome.status).toBe('duplicate');
  });

  it('propagates other database errors', async () => {
    const { client } = scriptedClient([{ error: new Error('connection refused') }]);

    await expect(createPgArticleStoreFromClient(client).insertIfAbsent(draft)).rejects.toThrow('connection refused');
  });

  it('skips the database for ids that cannot exist', async () => {
    const { client, calls } = scriptedClient([]);
    const store = createPgArticleStoreFromClient(client);

    expect(await store.findById('abc')).toBeNull();
    expect(await store.updateCounters('1; DROP TABLE articles', { likes: 1 })).toBeNull();
    expect(calls).toHaveLength(0);
  });

  it('skips the database for ids beyond the integer range', async () => {
    const { client, calls } = scriptedClient([{ rows: [] }]);
    const store = createPgArticleStoreFromClient(client);

    expect(await store.findById('9999999999')).toBeNull();
    expect(await store.updateCounters('2147483648', { views: 1 })).toBeNull();
    expect(await store.addUserCategories('2147483648', ['x'])).toBeNull();
    expect(calls).toHaveLength(0);

    expect(await store.findById('2147483647')).toBeNull();
    expect(calls).toHaveLength(1);
    expect(calls[0].values).toEqual(['2147483647']);
  });

  it('updates counters with zero defaults for missing deltas', async () => {
    const { client, calls } = scriptedClient([{ rows: [row({ likes_count: 4 })] }]);

    const article = await createPgArticleStoreFromClient(client).updateCounters('7', { likes: 1 });

    expect(article?.likesCount).toBe(4);
    expect(calls[0].text).toContain('LEAST(2147483647, GREATEST(0, likes_count::bigint + $3))');
    expect(calls[0].values).toEqual(['7', 0, 1, 0]);
  });

  it('de-duplicates user categories before merging them', async () => {
    const { client, calls } = scriptedClient([{ rows: [row({ categories_user: ['Later'] })] }]);

    const article = await createPgArticleStoreFromClient(client).addUserCategories('7', ['Later', 'later', ' ']);

    expect(article?.categoriesUser).toEqual(['Later']);
    expect(calls[0].values).toEqual(['7', ['Later']]);
  });

  it('returns null when an update matches no row', async () => {
    const { client } = scriptedClient([{ rows: [] }]);

    expect(await createPgArticleStoreFromClient(client).addUserCategories('99', ['x'])).toBeNull();
  });

  it('closes the underlying pool', async () => {
    const { client } = scriptedClient([]);

    await createPgArticleStoreFromClient(client).close();

    expect(client.end).toHaveBeenCalledTimes(1);
  });
});
