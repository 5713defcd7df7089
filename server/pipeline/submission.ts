import { z } from 'zod';
import type { SubmissionMetadata } from '../../shared/types';
import { InvalidSubmissionError } from '../errors';

// Limits match the column widths in db/schema.sql.
const optionalText = (max: number) =>
  z
    .string()
    .trim()
    .max(max)
    .optional()
    .transform((value) => value || undefined);

export const SubmissionSchema = z
  .object({
    text: z.string().optional(),
    url: z.string().trim().optional(),
    forceText: z.boolean().optional().default(false),
    title: optionalText(500),
    source: optionalText(500),
    author: optionalText(200),
    language: z
      .string()
      .trim()
      .toLowerCase()
      .regex(/^[a-z]{2,3}(?:-[a-z0-9]{2,6})?$|^unknown$/, 'language must be a language code')
      .optional(),
    categoriesUser: z.array(z.string().trim().min(1).max(100)).max(20).optional(),
  })
  .strict();

export type ResolvedInput =
  | { kind: 'text'; text: string; metadata: SubmissionMetadata }
  | { kind: 'url'; url: string; metadata: SubmissionMetadata };

const BARE_URL_RE = /^https?:\/\/\S+$/i;

/**
 * Decides what a submission asks for. Exactly one of `text`/`url` is
 * accepted; with both present, `forceText` picks the text. A `text` that is a
 * single bare http(s) URL is fetched unless `forceText` is set.
 */
export const resolveSubmission = (input: unknown): ResolvedInput => {
  const parsed = SubmissionSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'submission'}: ${issue.message}`);
    throw new InvalidSubmissionError('Invalid submission', issues);
  }
  const { text, url, forceText, title, source, author, language, categoriesUser } = parsed.data;
  const metadata: SubmissionMetadata = { title, source, author, language, categoriesUser };
  const hasText = text !== undefined;
  const hasUrl = url !== undefined && url !== '';

  if (hasText && hasUrl && !forceText) {
    throw new InvalidSubmissionError('Provide either text or url, not both (or set forceText to use the text)');
  }
  if (hasText) {
    const trimmed = text.trim();
    if (!forceText && BARE_URL_RE.test(trimmed)) {
      return { kind: 'url', url: trimmed, metadata };
    }
    return { kind: 'text', text, metadata };
  }
  if (hasUrl) {
    return { kind: 'url', url, metadata };
  }
  throw new InvalidSubmissionError('Submission needs text or url');
};
