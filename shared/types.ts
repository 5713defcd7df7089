export type StageName =
  | 'received'
  | 'resolved'
  | 'fingerprinted'
  | 'duplicate_check'
  | 'categorizing'
  | 'persisted'
  | 'rejected';

export type StageStatus = 'start' | 'success' | 'failure';

export interface StageEvent<T = unknown> {
  submissionId: string;
  stage: StageName;
  status: StageStatus;
  message?: string;
  data?: T;
  ts: string;
}

export interface AdvancedCategorization {
  primaryCategory: string;
  subcategories: string[];
  keywords: string[];
  /** Model self-reported score, clamped to [0, 1]. */
  confidence: number;
  summary: string;
}

export interface Article {
  id: string;
  fingerprint: string;
  title: string;
  text: string;
  summary: string;
  source: string | null;
  author: string | null;
  originalLink: string | null;
  categoriesAuto: string[];
  /** `null` when the advanced categorizer was unavailable or failed. */
  categoriesAdvanced: AdvancedCategorization | null;
  categoriesUser: string[];
  language: string;
  commentsCount: number;
  likesCount: number;
  viewsCount: number;
  createdAt: string;
  updatedAt: string;
}

/** Everything the store needs to create an Article; identity, counters and timestamps are assigned on insert. */
export type ArticleDraft = Omit<
  Article,
  'id' | 'commentsCount' | 'likesCount' | 'viewsCount' | 'createdAt' | 'updatedAt'
>;

export interface ArticleQuery {
  category?: string;
  language?: string;
  search?: string;
  limit?: number;
  offset?: number;
}

export interface CounterDeltas {
  comments?: number;
  likes?: number;
  views?: number;
}

export interface SubmissionMetadata {
  title?: string;
  source?: string;
  author?: string;
  language?: string;
  categoriesUser?: string[];
}
