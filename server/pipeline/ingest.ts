import { randomUUID } from 'node:crypto';
import type { AdvancedCategorization, Article, ArticleDraft, StageEvent, StageName } from '../../shared/types';
import { isUnavailable, type AdvancedCategorizer } from '../categorization/advanced';
import { categorizeBasic } from '../categorization/basic';
import type { CategoryCatalog } from '../categorization/catalog';
import { detectLanguage } from '../categorization/language';
import {
  CategorizationServiceError,
  DuplicateError,
  ExtractionError,
  PersistenceError,
  type IngestionError,
  errorMessage,
  isIngestionError,
} from '../errors';
import { describeError, type Logger } from '../obs/logger';
import type { ArticleStore } from '../persistence/articleStore';
import type { TextExtractor } from '../retrieval/extraction';
import { Semaphore } from '../utils/concurrency';
import { buildExcerpt, firstWords } from '../utils/text';
import { generateFingerprint } from './fingerprint';
import { makeStageEmitter } from './stageEmitter';
import { resolveSubmission } from './submission';

export type AdvancedStatus = 'categorized' | 'unavailable' | 'failed';

export type IngestionOutcome =
  | { status: 'persisted'; submissionId: string; article: Article; advanced: AdvancedStatus }
  | { status: 'duplicate'; submissionId: string; fingerprint: string; existing: Article; error: DuplicateError }
  | { status: 'rejected'; submissionId: string; stage: StageName; error: IngestionError };

export interface IngestOptions {
  onStage?: (event: StageEvent) => void;
  signal?: AbortSignal;
}

export interface IngestionPipelineDeps {
  store: ArticleStore;
  extractor: TextExtractor;
  catalog: CategoryCatalog;
  advanced: AdvancedCategorizer;
  logger: Logger;
  maxConcurrency?: number;
  idFactory?: () => string;
}

export interface IngestionPipeline {
  ingest: (submission: unknown, options?: IngestOptions) => Promise<IngestionOutcome>;
  ingestBatch: (submissions: unknown[], options?: IngestOptions) => Promise<IngestionOutcome[]>;
}

const TITLE_FALLBACK_WORDS = 12;
const SUMMARY_FALLBACK_CHARS = 300;

/** Carries the stage a step failed in up to the single rejection point. */
class StageFailure extends Error {
  constructor(
    readonly stage: StageName,
    readonly error: IngestionError,
  ) {
    super(error.message);
  }
}

const failAt = async <T>(stage: StageName, task: () => Promise<T>, wrap?: (error: unknown) => IngestionError): Promise<T> => {
  try {
    return await task();
  } catch (error) {
    if (isIngestionError(error)) throw new StageFailure(stage, error);
    if (wrap) throw new StageFailure(stage, wrap(error));
    throw error;
  }
};

export const createIngestionPipeline = (deps: IngestionPipelineDeps): IngestionPipeline => {
  const { store, extractor, catalog, advanced, logger } = deps;
  const idFactory = deps.idFactory ?? randomUUID;
  const gate = new Semaphore(deps.maxConcurrency ?? 4);

  const categorizeAdvanced = async (
    text: string,
    title: string | null,
    keywords: readonly string[],
    log: Logger,
    signal?: AbortSignal,
  ): Promise<{ status: AdvancedStatus; result: AdvancedCategorization | null }> => {
    try {
      const result = await advanced.classify(text, title, signal, keywords);
      return isUnavailable(result) ? { status: 'unavailable', result: null } : { status: 'categorized', result };
    } catch (error) {
      const wrapped =
        error instanceof CategorizationServiceError
          ? error
          : new CategorizationServiceError(`Advanced categorization failed: ${errorMessage(error)}`, { cause: error });
      log.warn('Advanced categorization failed; keeping basic categories only', describeError(wrapped));
      return { status: 'failed', result: null };
    }
  };

  const run = async (input: unknown, options: IngestOptions): Promise<IngestionOutcome> => {
    const submissionId = idFactory();
    const log = logger.child({ submissionId });
    const stages = makeStageEmitter(submissionId, options.onStage, (error) =>
      log.warn('Stage listener threw', describeError(error)),
    );

    try {
      stages.start('received');
      const resolved = await failAt('received', async () => resolveSubmission(input));
      stages.success('received', { data: { kind: resolved.kind } });

      const { metadata } = resolved;
      stages.start('resolved');
      const content =
        resolved.kind === 'url'
          ? await failAt(
              'resolved',
              async () => {
                const extracted = await extractor.extractFromUrl(resolved.url, { signal: options.signal });
                return {
                  text: extracted.text,
                  title: metadata.title ?? extracted.title,
                  source: metadata.source ?? extracted.source,
                  author: metadata.author ?? extracted.author,
                  originalLink: extracted.originalLink,
                  keywords: extracted.keywords,
                };
              },
              (error) => new ExtractionError(errorMessage(error), resolved.url, { cause: error }),
            )
          : {
              text: resolved.text,
              title: metadata.title ?? null,
              source: metadata.source ?? null,
              author: metadata.author ?? null,
              originalLink: null,
              keywords: [],
            };
      stages.success('resolved', { data: { kind: resolved.kind, length: content.text.length } });

      stages.start('fingerprinted');
      const fingerprint = await failAt('fingerprinted', async () => generateFingerprint(content.text));
      stages.success('fingerprinted', { data: { fingerprint } });

      stages.start('duplicate_check');
      const existing = await failAt(
        'duplicate_check',
        () => store.findByFingerprint(fingerprint),
        (error) => new PersistenceError(`Duplicate lookup failed: ${errorMessage(error)}`, { cause: error }),
      );
      if (existing) {
        stages.success('duplicate_check', { message: 'duplicate', data: { existingId: existing.id } });
        return duplicateOutcome(submissionId, existing, log);
      }
      stages.success('duplicate_check', { message: 'new' });

      const text = content.text.trim();
      stages.start('categorizing');
      const categoriesAuto = categorizeBasic(text, catalog, content.title);
      const advancedOutcome = await categorizeAdvanced(text, content.title, content.keywords, log, options.signal);
      stages.success('categorizing', { data: { categoriesAuto, advanced: advancedOutcome.status } });

      const draft: ArticleDraft = {
        fingerprint,
        title: content.title || firstWords(text, TITLE_FALLBACK_WORDS),
        text,
        summary: advancedOutcome.result?.summary || buildExcerpt(text, SUMMARY_FALLBACK_CHARS),
        source: content.source,
        author: content.author,
        originalLink: content.originalLink,
        categoriesAuto,
        categoriesAdvanced: advancedOutcome.result,
        categoriesUser: metadata.categoriesUser ?? [],
        language: metadata.language ?? detectLanguage(text),
      };

      stages.start('persisted');
      const inserted = await failAt(
        'persisted',
        () => store.insertIfAbsent(draft),
        (error) => new PersistenceError(`Failed to store article: ${errorMessage(error)}`, { cause: error }),
      );
      if (inserted.status === 'duplicate') {
        // Lost a race with a concurrent submission of the same content.
        stages.success('persisted', { message: 'duplicate', data: { existingId: inserted.existing.id } });
        return duplicateOutcome(submissionId, inserted.existing, log);
      }
      stages.success('persisted', { data: { id: inserted.article.id, fingerprint } });
      log.info('Article persisted', {
        articleId: inserted.article.id,
        fingerprint,
        categoriesAuto,
        advanced: advancedOutcome.status,
      });
      return { status: 'persisted', submissionId, article: inserted.article, advanced: advancedOutcome.status };
    } catch (error) {
      if (!(error instanceof StageFailure)) throw error;
      stages.failure(error.stage, error.error);
      stages.success('rejected', { message: error.error.code });
      const meta = { stage: error.stage, retryable: error.error.retryable, ...describeError(error.error) };
      if (error.error.retryable) {
        log.error('Submission rejected', meta);
      } else {
        log.warn('Submission rejected', meta);
      }
      return { status: 'rejected', submissionId, stage: error.stage, error: error.error };
    }
  };

  const ingest = (submission: unknown, options: IngestOptions = {}) =>
    gate.run(() => run(submission, options), options.signal);

  return {
    ingest,
    ingestBatch: (submissions, options = {}) => Promise.all(submissions.map((submission) => ingest(submission, options))),
  };
};

const duplicateOutcome = (submissionId: string, existing: Article, log: Logger): IngestionOutcome => {
  log.info('Duplicate submission', { fingerprint: existing.fingerprint, existingId: existing.id });
  return {
    status: 'duplicate',
    submissionId,
    fingerprint: existing.fingerprint,
    existing,
    error: new DuplicateError(existing),
  };
};
