import fs from 'node:fs/promises';
import pg from 'pg';
import { z } from 'zod';
import type { AppConfig } from '../../shared/config';
import type { Article, ArticleDraft, ArticleQuery } from '../../shared/types';
import { uniqueStrings } from '../utils/text';
import { MAX_INT4, clampListWindow, type ArticleStore } from './articleStore';

/** The slice of `pg.Pool` the store uses; tests substitute an in-process fake. */
export interface SqlClient {
  query: (text: string, values?: unknown[]) => Promise<{ rows: unknown[] }>;
  end?: () => Promise<void>;
}

const UNIQUE_VIOLATION = '23505';

const COLUMNS = `id::text AS id, fingerprint, title, text, summary, source, author, original_link,
  categories_auto, categories_advanced, categories_user, language,
  comments_count, likes_count, views_count, created_at, updated_at`;

const AdvancedColumnSchema = z.object({
  primaryCategory: z.string(),
  subcategories: z.array(z.string()),
  keywords: z.array(z.string()),
  confidence: z.number(),
  summary: z.string(),
});

const ArticleRowSchema = z.object({
  id: z.coerce.string(),
  fingerprint: z.string(),
  title: z.string(),
  text: z.string(),
  summary: z.string().nullable(),
  source: z.string().nullable(),
  author: z.string().nullable(),
  original_link: z.string().nullable(),
  categories_auto: z.array(z.string()).nullable(),
  categories_advanced: AdvancedColumnSchema.nullable(),
  categories_user: z.array(z.string()).nullable(),
  language: z.string().nullable(),
  comments_count: z.coerce.number().int(),
  likes_count: z.coerce.number().int(),
  views_count: z.coerce.number().int(),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date(),
});

export const rowToArticle = (row: unknown): Article => {
  const r = ArticleRowSchema.parse(row);
  return {
    id: r.id,
    fingerprint: r.fingerprint,
    title: r.title,
    text: r.text,
    summary: r.summary ?? '',
    source: r.source,
    author: r.author,
    originalLink: r.original_link,
    categoriesAuto: r.categories_auto ?? [],
    categoriesAdvanced: r.categories_advanced,
    categoriesUser: r.categories_user ?? [],
    language: r.language ?? 'unknown',
    commentsCount: r.comments_count,
    likesCount: r.likes_count,
    viewsCount: r.views_count,
    createdAt: r.created_at.toISOString(),
    updatedAt: r.updated_at.toISOString(),
  };
};

const isUniqueViolation = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === UNIQUE_VIOLATION;

const isSerialId = (id: string): boolean => /^\d{1,10}$/.test(id) && Number(id) <= MAX_INT4;

export const buildListQuery = (query: ArticleQuery = {}): { text: string; values: unknown[] } => {
  const where: string[] = [];
  const values: unknown[] = [];
  const param = (value: unknown) => {
    values.push(value);
    return `$${values.length}`;
  };

  if (query.category) {
    const p = param(query.category);
    where.push(`(${p} = ANY(categories_user) OR ${p} = ANY(categories_auto))`);
  }
  if (query.language) {
    where.push(`language = ${param(query.language)}`);
  }
  if (query.search) {
    const p = param(`%${query.search}%`);
    where.push(`(title ILIKE ${p} OR text ILIKE ${p})`);
  }

  const { limit, offset } = clampListWindow(query);
  const whereSql = where.length ? `WHERE ${where.join(' AND ')}` : '';
  const text = `SELECT ${COLUMNS} FROM articles ${whereSql} ORDER BY created_at DESC, id DESC LIMIT ${param(limit)} OFFSET ${param(offset)}`;
  return { text: text.replace(/\s+/g, ' ').trim(), values };
};

export const ensureSchema = async (client: SqlClient, schemaPath: string): Promise<void> => {
  const ddl = await fs.readFile(schemaPath, 'utf-8');
  await client.query(ddl);
};

export const createPgArticleStoreFromClient = (client: SqlClient): ArticleStore => {
  const findOne = async (sql: string, values: unknown[]): Promise<Article | null> => {
    const { rows } = await client.query(sql, values);
    return rows.length ? rowToArticle(rows[0]) : null;
  };

  const findByFingerprint = (fingerprint: string) =>
    findOne(`SELECT ${COLUMNS} FROM articles WHERE fingerprint = $1`, [fingerprint]);

  const insertIfAbsent = async (draft: ArticleDraft) => {
    const values = [
      draft.fingerprint,
      draft.title,
      draft.text,
      draft.summary,
      draft.source,
      draft.author,
      draft.originalLink,
      draft.categoriesAuto,
      draft.categoriesAdvanced ? JSON.stringify(draft.categoriesAdvanced) : null,
      uniqueStrings(draft.categoriesUser),
      draft.language,
    ];
    let inserted: Article | null = null;
    try {
      inserted = await findOne(
        `INSERT INTO articles (fingerprint, title, text, summary, source, author, original_link,
           categories_auto, categories_advanced, categories_user, language)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8::text[], $9::jsonb, $10::text[], $11)
         ON CONFLICT (fingerprint) DO NOTHING
         RETURNING ${COLUMNS}`,
        values,
      );
    } catch (error) {
      if (!isUniqueViolation(error)) throw error;
    }
    if (inserted) {
      return { status: 'inserted' as const, article: inserted };
    }
    const existing = await findByFingerprint(draft.fingerprint);
    if (!existing) {
      throw new Error(`Insert for fingerprint ${draft.fingerprint} conflicted but no existing row was found`);
    }
    return { status: 'duplicate' as const, existing };
  };

  return {
    insertIfAbsent,
    findByFingerprint,

    findById: async (id) => (isSerialId(id) ? findOne(`SELECT ${COLUMNS} FROM articles WHERE id = $1::int`, [id]) : null),

    list: async (query) => {
      const { text, values } = buildListQuery(query);
      const { rows } = await client.query(text, values);
      return rows.map(rowToArticle);
    },

    updateCounters: async (id, deltas) => {
      if (!isSerialId(id)) return null;
      return findOne(
        `UPDATE articles SET
           comments_count = LEAST(2147483647, GREATEST(0, comments_count::bigint + $2)),
           likes_count = LEAST(2147483647, GREATEST(0, likes_count::bigint + $3)),
           views_count = LEAST(2147483647, GREATEST(0, views_count::bigint + $4)),
           updated_at = NOW()
         WHERE id = $1::int
         RETURNING ${COLUMNS}`,
        [id, deltas.comments ?? 0, deltas.likes ?? 0, deltas.views ?? 0],
      );
    },

    addUserCategories: async (id, labels) => {
      if (!isSerialId(id)) return null;
      // Case-insensitive merge that keeps the first spelling and original order.
      return findOne(
        `UPDATE articles SET
           categories_user = COALESCE((
             SELECT array_agg(label ORDER BY ord)
             FROM (
               SELECT DISTINCT ON (lower(label)) label, ord
               FROM unnest(categories_user || $2::text[]) WITH ORDINALITY AS t(label, ord)
               WHERE btrim(label) <> ''
               ORDER BY lower(label), ord
             ) merged
           ), '{}'),
           updated_at = NOW()
         WHERE id = $1::int
         RETURNING ${COLUMNS}`,
        [id, uniqueStrings(labels)],
      );
    },

    close: async () => {
      await client.end?.();
    },
  };
};

export const createPgArticleStore = async (
  settings: AppConfig['persistence'],
  options: { schemaPath?: string } = {},
): Promise<ArticleStore> => {
  if (!settings.databaseUrl) {
    throw new Error('DATABASE_URL missing');
  }
  const pool = new pg.Pool({ connectionString: settings.databaseUrl, max: settings.poolSize });
  const client: SqlClient = {
    query: (text, values) => pool.query(text, values),
    end: () => pool.end(),
  };
  if (options.schemaPath) {
    await ensureSchema(client, options.schemaPath);
  }
  return createPgArticleStoreFromClient(client);
};
