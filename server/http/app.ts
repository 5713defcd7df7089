import cors from 'cors';
import express from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { z } from 'zod';
import type { PublicConfig } from '../../shared/config';
import type { CategoryCatalog } from '../categorization/catalog';
import type { IngestionErrorCode } from '../errors';
import { describeError, type Logger } from '../obs/logger';
import { MAX_INT4, type ArticleStore } from '../persistence/articleStore';
import type { IngestionOutcome, IngestionPipeline } from '../pipeline/ingest';
import { isFingerprint } from '../pipeline/fingerprint';

export interface AppDeps {
  pipeline: IngestionPipeline;
  store: ArticleStore;
  catalog: CategoryCatalog;
  logger: Logger;
  publicConfig: PublicConfig;
  requestLogging?: boolean;
}

const MAX_BATCH_SIZE = 50;

const statusByCode: Record<IngestionErrorCode, number> = {
  invalid_submission: 400,
  empty_content: 422,
  extraction_failed: 422,
  duplicate: 200,
  categorization_failed: 502,
  persistence_failed: 503,
};

const ListQuerySchema = z.object({
  category: z.string().trim().min(1).optional(),
  language: z.string().trim().toLowerCase().min(1).optional(),
  search: z.string().trim().min(1).optional(),
  limit: z.coerce.number().int().positive().optional(),
  offset: z.coerce.number().int().nonnegative().optional(),
});

const counterDelta = z
  .number()
  .int()
  .min(-MAX_INT4 - 1)
  .max(MAX_INT4)
  .optional();

const CountersSchema = z
  .object({
    comments: counterDelta,
    likes: counterDelta,
    views: counterDelta,
  })
  .strict()
  .refine((value) => Object.values(value).some((delta) => delta !== undefined), 'at least one counter is required');

const CategoriesSchema = z.object({
  categories: z.array(z.string().trim().min(1).max(100)).min(1).max(20),
});

const BatchSchema = z.object({
  submissions: z.array(z.unknown()).min(1).max(MAX_BATCH_SIZE),
});

const issuesOf = (error: z.ZodError): string[] =>
  error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`);

const badRequest = (res: Response, message: string, issues: string[] = []) => {
  res.status(400).json({ error: { code: 'invalid_request', message, issues } });
};

/** Express 4 does not forward rejected promises to the error middleware on its own. */
const asyncRoute =
  (handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    handler(req, res).catch(next);
  };

export const outcomeToResponse = (outcome: IngestionOutcome): { status: number; body: Record<string, unknown> } => {
  switch (outcome.status) {
    case 'persisted':
      return {
        status: 201,
        body: { status: 'persisted', article: outcome.article, advanced: outcome.advanced },
      };
    case 'duplicate':
      return {
        status: statusByCode.duplicate,
        body: { status: 'duplicate', fingerprint: outcome.fingerprint, article: outcome.existing },
      };
    case 'rejected': {
      const { error } = outcome;
      return {
        status: statusByCode[error.code],
        body: {
          status: 'rejected',
          stage: outcome.stage,
          error: {
            code: error.code,
            message: error.message,
            retryable: error.retryable,
            ...('issues' in error ? { issues: error.issues } : {}),
          },
        },
      };
    }
  }
};

export const createApp = ({ pipeline, store, catalog, logger, publicConfig, requestLogging = false }: AppDeps) => {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  if (requestLogging) {
    app.use((req, res, next) => {
      const startedAt = Date.now();
      res.on('finish', () => {
        logger.debug('HTTP response', {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          elapsedMs: Date.now() - startedAt,
        });
      });
      next();
    });
  }

  app.get('/api/healthz', (_req: Request, res: Response) => {
    res.json({ ok: true, ts: new Date().toISOString() });
  });

  app.get('/api/config', (_req: Request, res: Response) => {
    res.json(publicConfig);
  });

  app.get('/api/categories', (_req: Request, res: Response) => {
    res.json({ categories: catalog.map(({ label, keywords }) => ({ label, keywords })) });
  });

  app.post(
    '/api/articles',
    asyncRoute(async (req, res) => {
      const outcome = await pipeline.ingest(req.body);
      const { status, body } = outcomeToResponse(outcome);
      res.status(status).json(body);
    }),
  );

  app.post(
    '/api/articles/batch',
    asyncRoute(async (req, res) => {
      const parsed = BatchSchema.safeParse(req.body);
      if (!parsed.success) {
        badRequest(res, 'Invalid batch', issuesOf(parsed.error));
        return;
      }
      const outcomes = await pipeline.ingestBatch(parsed.data.submissions);
      res.json({
        results: outcomes.map((outcome) => {
          const { status, body } = outcomeToResponse(outcome);
          return { httpStatus: status, ...body };
        }),
      });
    }),
  );

  app.get(
    '/api/articles',
    asyncRoute(async (req, res) => {
      const parsed = ListQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        badRequest(res, 'Invalid query', issuesOf(parsed.error));
        return;
      }
      const articles = await store.list(parsed.data);
      res.json({ articles });
    }),
  );

  app.get(
    '/api/articles/fingerprint/:fingerprint',
    asyncRoute(async (req, res) => {
      const fingerprint = req.params.fingerprint.toLowerCase();
      if (!isFingerprint(fingerprint)) {
        badRequest(res, 'fingerprint must be 64 hex characters');
        return;
      }
      const article = await store.findByFingerprint(fingerprint);
      if (!article) {
        res.status(404).json({ error: { code: 'not_found', message: 'Article not found' } });
        return;
      }
      res.json({ article });
    }),
  );

  app.get(
    '/api/articles/:id',
    asyncRoute(async (req, res) => {
      const article = await store.findById(req.params.id);
      if (!article) {
        res.status(404).json({ error: { code: 'not_found', message: 'Article not found' } });
        return;
      }
      res.json({ article });
    }),
  );

  app.post(
    '/api/articles/:id/categories',
    asyncRoute(async (req, res) => {
      const parsed = CategoriesSchema.safeParse(req.body);
      if (!parsed.success) {
        badRequest(res, 'Invalid categories', issuesOf(parsed.error));
        return;
      }
      const article = await store.addUserCategories(req.params.id, parsed.data.categories);
      if (!article) {
        res.status(404).json({ error: { code: 'not_found', message: 'Article not found' } });
        return;
      }
      res.json({ article });
    }),
  );

  app.post(
    '/api/articles/:id/counters',
    asyncRoute(async (req, res) => {
      const parsed = CountersSchema.safeParse(req.body);
      if (!parsed.success) {
        badRequest(res, 'Invalid counters', issuesOf(parsed.error));
        return;
      }
      const article = await store.updateCounters(req.params.id, parsed.data);
      if (!article) {
        res.status(404).json({ error: { code: 'not_found', message: 'Article not found' } });
        return;
      }
      res.json({ article });
    }),
  );

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    // body-parser marks malformed JSON with a 4xx status.
    if (typeof error === 'object' && error !== null && 'status' in error && error.status === 400) {
      badRequest(res, 'Malformed JSON body');
      return;
    }
    logger.error('Unhandled request error', { method: req.method, path: req.originalUrl, ...describeError(error) });
    res.status(500).json({ error: { code: 'internal_error', message: 'Internal server error' } });
  });

  return app;
};
