import { tokenizeWords } from '../utils/text';
import type { CategoryCatalog } from './catalog';

export interface CategoryScore {
  label: string;
  score: number;
}

const countSequence = (tokens: readonly string[], sequence: readonly string[]): number => {
  const [head] = sequence;
  let count = 0;
  for (let i = 0; i + sequence.length <= tokens.length; i += 1) {
    if (tokens[i] !== head) continue;
    let matched = true;
    for (let j = 1; j < sequence.length; j += 1) {
      if (tokens[i + j] !== sequence[j]) {
        matched = false;
        break;
      }
    }
    if (matched) count += 1;
  }
  return count;
};

/** Keyword occurrence counts per catalog entry, in catalog order (zero scores included). */
export const scoreCategories = (text: string, catalog: CategoryCatalog, title?: string | null): CategoryScore[] => {
  const tokens = tokenizeWords(title ? `${title} ${text}` : text);
  return catalog.map((entry) => ({
    label: entry.label,
    score: entry.keywordTokens.reduce((sum, sequence) => sum + countSequence(tokens, sequence), 0),
  }));
};

/**
 * Labels with a positive score, highest first. Ties keep catalog order, which
 * relies on Array#sort being stable.
 */
export const categorizeBasic = (text: string, catalog: CategoryCatalog, title?: string | null): string[] =>
  scoreCategories(text, catalog, title)
    .filter((entry) => entry.score > 0)
    .sort((a, b) => b.score - a.score)
    .map((entry) => entry.label);
