import { z } from 'zod';
import { isAdvancedConfigured, type AppConfig } from '../../shared/config';
import type { AdvancedCategorization } from '../../shared/types';
import { CategorizationServiceError, errorMessage } from '../errors';
import type { Logger } from '../obs/logger';
import { createGeminiTextGenerator, type TextGenerator } from '../services/genai';
import { abortable, createDeadline } from '../utils/async';
import { parseJsonPayload } from '../utils/jsonExtract';
import { normalizeWhitespace, uniqueStrings } from '../utils/text';
import { loadAdvancedTaxonomy, type AdvancedTaxonomy } from './catalog';

export const UNAVAILABLE = Object.freeze({ status: 'unavailable' } as const);
export type Unavailable = typeof UNAVAILABLE;

export type AdvancedResult = AdvancedCategorization | Unavailable;

export const isUnavailable = (result: AdvancedResult): result is Unavailable =>
  'status' in result && result.status === 'unavailable';

export interface AdvancedCategorizer {
  readonly available: boolean;
  /**
   * Resolves to {@link UNAVAILABLE} when no service is configured. Rejects with
   * {@link CategorizationServiceError} when a configured service fails.
   * `keywords` taken from the source page lead the result's keyword list.
   */
  classify: (
    text: string,
    title?: string | null,
    signal?: AbortSignal,
    keywords?: readonly string[],
  ) => Promise<AdvancedResult>;
}

const MAX_INPUT_CHARS = 6000;
const MAX_SUBCATEGORIES = 3;
const MAX_KEYWORDS = 10;

const stringList = z.array(z.coerce.string()).catch([]);

const ModelResponseSchema = z.object({
  primary_category: z.string().min(1),
  subcategories: stringList,
  keywords: stringList,
  confidence: z.coerce.number().finite(),
  summary: z
    .string()
    .nullish()
    .transform((value) => value ?? ''),
});

export const clampConfidence = (value: number): number => Math.min(1, Math.max(0, value));

export const createUnavailableCategorizer = (): AdvancedCategorizer => ({
  available: false,
  classify: async () => UNAVAILABLE,
});

export const buildClassificationPrompt = (text: string, title: string | null | undefined, taxonomy: AdvancedTaxonomy): string => {
  const content = normalizeWhitespace(title ? `${title}\n\n${text}` : text).slice(0, MAX_INPUT_CHARS);
  const categories = taxonomy.primary
    .map((entry) => `- ${entry.key}: ${entry.description}. Subcategories: ${entry.subcategories.join(', ') || 'none'}`)
    .join('\n');
  return [
    'You classify articles for a reading-list service.',
    'Pick the single best primary category and up to 3 of its subcategories from this list:',
    categories,
    '',
    'Also extract 5-10 key terms and write a 2-3 sentence summary in the language of the article.',
    'Respond with JSON only:',
    '{"primary_category": "...", "subcategories": ["..."], "keywords": ["..."], "confidence": 0.0, "summary": "..."}',
    'confidence is your own estimate between 0 and 1.',
    '',
    'Article:',
    content,
  ].join('\n');
};

/** Maps a parsed model reply onto the taxonomy: unknown primaries fall back, foreign subcategories are dropped. */
export const normalizeClassification = (
  raw: unknown,
  taxonomy: AdvancedTaxonomy,
  seedKeywords: readonly string[] = [],
): AdvancedCategorization => {
  const parsed = ModelResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Malformed classification: ${parsed.error.issues.map((issue) => `${issue.path.join('.') || 'root'} ${issue.message}`).join('; ')}`);
  }
  const reply = parsed.data;
  const wanted = reply.primary_category.trim().toLowerCase();
  const primary =
    taxonomy.primary.find((entry) => entry.key.toLowerCase() === wanted) ??
    taxonomy.primary.find((entry) => entry.key === taxonomy.fallback);
  const allowed = new Map((primary?.subcategories ?? []).map((sub) => [sub.toLowerCase(), sub]));
  const subcategories = uniqueStrings(
    reply.subcategories.flatMap((sub) => {
      const match = allowed.get(normalizeWhitespace(sub).toLowerCase());
      return match ? [match] : [];
    }),
    MAX_SUBCATEGORIES,
  );

  return {
    primaryCategory: primary?.key ?? taxonomy.fallback,
    subcategories,
    keywords: uniqueStrings([...seedKeywords, ...reply.keywords], MAX_KEYWORDS),
    confidence: clampConfidence(reply.confidence),
    summary: normalizeWhitespace(reply.summary),
  };
};

export interface GeminiCategorizerOptions {
  generator: TextGenerator;
  taxonomy: AdvancedTaxonomy;
  timeoutMs: number;
  logger: Logger;
}

export const createGeminiCategorizer = ({ generator, taxonomy, timeoutMs, logger }: GeminiCategorizerOptions): AdvancedCategorizer => {
  const log = logger.child({ component: 'advanced-categorizer', model: generator.model });

  return {
    available: true,
    classify: async (text, title, signal, keywords = []) => {
      const deadline = createDeadline(timeoutMs, signal);
      const started = Date.now();
      try {
        const request = generator.generate(buildClassificationPrompt(text, title, taxonomy), {
          responseMimeType: 'application/json',
          signal: deadline.signal,
        });
        const raw = await abortable(request, deadline.signal);
        const result = normalizeClassification(parseJsonPayload(raw), taxonomy, keywords);
        log.debug('Classified article', {
          primaryCategory: result.primaryCategory,
          confidence: result.confidence,
          elapsedMs: Date.now() - started,
        });
        return result;
      } catch (error) {
        const reason = deadline.timedOut() ? `timed out after ${timeoutMs}ms` : errorMessage(error);
        throw new CategorizationServiceError(`Advanced categorization failed: ${reason}`, { cause: error });
      } finally {
        deadline.clear();
      }
    },
  };
};

/** Chooses the variant from configuration; the caller never inspects which one it got. */
export const createAdvancedCategorizer = (
  config: AppConfig,
  logger: Logger,
  overrides: { generator?: TextGenerator; taxonomy?: AdvancedTaxonomy } = {},
): AdvancedCategorizer => {
  if (!isAdvancedConfigured(config)) {
    logger.info('Advanced categorizer disabled', {
      enabled: config.advanced.enabled,
      hasApiKey: Boolean(config.advanced.apiKey),
    });
    return createUnavailableCategorizer();
  }
  return createGeminiCategorizer({
    generator: overrides.generator ?? createGeminiTextGenerator(config.advanced, logger),
    taxonomy: overrides.taxonomy ?? loadAdvancedTaxonomy(config.categorization.taxonomyPath),
    timeoutMs: config.advanced.timeoutMs,
    logger,
  });
};
