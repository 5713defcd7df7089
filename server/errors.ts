import type { Article } from '../shared/types';

export type IngestionErrorCode =
  | 'invalid_submission'
  | 'empty_content'
  | 'extraction_failed'
  | 'duplicate'
  | 'categorization_failed'
  | 'persistence_failed';

export abstract class IngestionError extends Error {
  abstract readonly code: IngestionErrorCode;
  /** Only store connectivity problems are worth retrying by the caller. */
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidSubmissionError extends IngestionError {
  readonly code = 'invalid_submission';

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message);
  }
}

export class EmptyContentError extends IngestionError {
  readonly code = 'empty_content';

  constructor(message = 'Submitted content is empty after normalization') {
    super(message);
  }
}

export class ExtractionError extends IngestionError {
  readonly code = 'extraction_failed';

  constructor(
    message: string,
    readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class DuplicateError extends IngestionError {
  readonly code = 'duplicate';

  constructor(readonly existing: Article) {
    super(`Article already exists with fingerprint ${existing.fingerprint}`);
  }

  get fingerprint(): string {
    return this.existing.fingerprint;
  }
}

export class CategorizationServiceError extends IngestionError {
  readonly code = 'categorization_failed';
}

export class PersistenceError extends IngestionError {
  readonly code = 'persistence_failed';
  override readonly retryable = true;
}

export const isIngestionError = (error: unknown): error is IngestionError => error instanceof IngestionError;

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
