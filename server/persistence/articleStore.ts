import type { Article, ArticleDraft, ArticleQuery, CounterDeltas } from '../../shared/types';
import { uniqueStrings } from '../utils/text';

export type InsertOutcome = { status: 'inserted'; article: Article } | { status: 'duplicate'; existing: Article };

/**
 * Persistence boundary for articles. The unique constraint on `fingerprint`
 * is the only arbiter between concurrent writers.
 */
export interface ArticleStore {
  insertIfAbsent: (draft: ArticleDraft) => Promise<InsertOutcome>;
  findByFingerprint: (fingerprint: string) => Promise<Article | null>;
  findById: (id: string) => Promise<Article | null>;
  list: (query?: ArticleQuery) => Promise<Article[]>;
  updateCounters: (id: string, deltas: CounterDeltas) => Promise<Article | null>;
  addUserCategories: (id: string, labels: string[]) => Promise<Article | null>;
  close: () => Promise<void>;
}

/** Largest value of a Postgres `integer`: the bound for article ids and counters. */
export const MAX_INT4 = 2_147_483_647;

export const DEFAULT_LIST_LIMIT = 50;
export const MAX_LIST_LIMIT = 200;

export const clampListWindow = (query: ArticleQuery = {}): { limit: number; offset: number } => ({
  limit: Math.max(1, Math.min(MAX_LIST_LIMIT, Math.floor(query.limit ?? DEFAULT_LIST_LIMIT))),
  offset: Math.max(0, Math.floor(query.offset ?? 0)),
});

const clampCounter = (value: number): number => Math.min(MAX_INT4, Math.max(0, value));

const cloneArticle = (article: Article): Article => ({
  ...article,
  categoriesAuto: [...article.categoriesAuto],
  categoriesUser: [...article.categoriesUser],
  categoriesAdvanced: article.categoriesAdvanced
    ? {
        ...article.categoriesAdvanced,
        subcategories: [...article.categoriesAdvanced.subcategories],
        keywords: [...article.categoriesAdvanced.keywords],
      }
    : null,
});

const matchesQuery = (article: Article, query: ArticleQuery): boolean => {
  if (query.category && !article.categoriesAuto.includes(query.category) && !article.categoriesUser.includes(query.category)) {
    return false;
  }
  if (query.language && article.language !== query.language) {
    return false;
  }
  if (query.search) {
    const needle = query.search.toLowerCase();
    if (!article.title.toLowerCase().includes(needle) && !article.text.toLowerCase().includes(needle)) {
      return false;
    }
  }
  return true;
};

/**
 * Process-local store. Check-and-insert runs without an await in between, so
 * it is atomic with respect to other submissions in the same process.
 */
export const createMemoryArticleStore = (options: { now?: () => Date } = {}): ArticleStore => {
  const now = options.now ?? (() => new Date());
  const byId = new Map<string, Article>();
  const idByFingerprint = new Map<string, string>();
  let nextId = 1;

  const mutate = (id: string, apply: (article: Article) => Article): Article | null => {
    const current = byId.get(id);
    if (!current) return null;
    const next = { ...apply(current), updatedAt: now().toISOString() };
    byId.set(id, next);
    return cloneArticle(next);
  };

  return {
    insertIfAbsent: async (draft) => {
      const existingId = idByFingerprint.get(draft.fingerprint);
      const existing = existingId ? byId.get(existingId) : undefined;
      if (existing) {
        return { status: 'duplicate', existing: cloneArticle(existing) };
      }
      const ts = now().toISOString();
      const article: Article = {
        ...draft,
        id: String(nextId++),
        categoriesUser: uniqueStrings(draft.categoriesUser),
        commentsCount: 0,
        likesCount: 0,
        viewsCount: 0,
        createdAt: ts,
        updatedAt: ts,
      };
      byId.set(article.id, article);
      idByFingerprint.set(article.fingerprint, article.id);
      return { status: 'inserted', article: cloneArticle(article) };
    },

    findByFingerprint: async (fingerprint) => {
      const id = idByFingerprint.get(fingerprint);
      const article = id ? byId.get(id) : undefined;
      return article ? cloneArticle(article) : null;
    },

    findById: async (id) => {
      const article = byId.get(id);
      return article ? cloneArticle(article) : null;
    },

    list: async (query = {}) => {
      const { limit, offset } = clampListWindow(query);
      return Array.from(byId.values())
        .filter((article) => matchesQuery(article, query))
        .sort((a, b) => b.createdAt.localeCompare(a.createdAt) || Number(b.id) - Number(a.id))
        .slice(offset, offset + limit)
        .map(cloneArticle);
    },

    updateCounters: async (id, deltas) =>
      mutate(id, (article) => ({
        ...article,
        commentsCount: clampCounter(article.commentsCount + (deltas.comments ?? 0)),
        likesCount: clampCounter(article.likesCount + (deltas.likes ?? 0)),
        viewsCount: clampCounter(article.viewsCount + (deltas.views ?? 0)),
      })),

    addUserCategories: async (id, labels) =>
      mutate(id, (article) => ({
        ...article,
        categoriesUser: uniqueStrings([...article.categoriesUser, ...labels]),
      })),

    close: async () => {},
  };
};
