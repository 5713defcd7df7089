import fs from 'node:fs';
import { z } from 'zod';
import { tokenizeWords } from '../utils/text';

const CatalogFileSchema = z.object({
  categories: z
    .array(
      z.object({
        label: z.string().trim().min(1),
        keywords: z.array(z.string().trim().min(1)).min(1),
      }),
    )
    .min(1),
});

const TaxonomyFileSchema = z.object({
  fallback: z.string().trim().min(1),
  primary: z
    .array(
      z.object({
        key: z.string().trim().min(1),
        description: z.string(),
        subcategories: z.array(z.string().trim().min(1)),
      }),
    )
    .min(1),
});

export interface CatalogEntry {
  readonly label: string;
  readonly keywords: readonly string[];
  /** Each keyword split into the token sequence the categorizer matches against. */
  readonly keywordTokens: readonly (readonly string[])[];
}

export type CategoryCatalog = readonly CatalogEntry[];

export interface TaxonomyEntry {
  readonly key: string;
  readonly description: string;
  readonly subcategories: readonly string[];
}

export interface AdvancedTaxonomy {
  readonly fallback: string;
  readonly primary: readonly TaxonomyEntry[];
}

const readJsonFile = (filePath: string): unknown => JSON.parse(fs.readFileSync(filePath, 'utf-8'));

/** Builds the immutable catalog from `{label, keywords}` pairs; catalog order is the tie-break order. */
export const buildCategoryCatalog = (entries: ReadonlyArray<{ label: string; keywords: readonly string[] }>): CategoryCatalog => {
  const seen = new Set<string>();
  const catalog = entries.map((entry) => {
    if (seen.has(entry.label)) {
      throw new Error(`Duplicate category label in catalog: ${entry.label}`);
    }
    seen.add(entry.label);
    const keywordTokens = entry.keywords.map((keyword) => Object.freeze(tokenizeWords(keyword))).filter((tokens) => tokens.length > 0);
    return Object.freeze({
      label: entry.label,
      keywords: Object.freeze([...entry.keywords]),
      keywordTokens: Object.freeze(keywordTokens),
    });
  });
  return Object.freeze(catalog);
};

export const loadCategoryCatalog = (filePath: string): CategoryCatalog => {
  const parsed = CatalogFileSchema.parse(readJsonFile(filePath));
  return buildCategoryCatalog(parsed.categories);
};

export const loadAdvancedTaxonomy = (filePath: string): AdvancedTaxonomy => {
  const parsed = TaxonomyFileSchema.parse(readJsonFile(filePath));
  if (!parsed.primary.some((entry) => entry.key === parsed.fallback)) {
    throw new Error(`Taxonomy fallback "${parsed.fallback}" is not one of its primary categories`);
  }
  return Object.freeze({
    fallback: parsed.fallback,
    primary: Object.freeze(parsed.primary.map((entry) => Object.freeze({ ...entry, subcategories: Object.freeze(entry.subcategories) }))),
  });
};
