export const normalizeWhitespace = (text: string): string => text.replace(/\s+/g, ' ').trim();

export const buildExcerpt = (value: string | null | undefined, maxLength = 300): string => {
  if (!value) return '';
  const normalized = normalizeWhitespace(String(value));
  if (normalized.length <= maxLength) return normalized;
  return `${normalized.slice(0, Math.max(0, maxLength - 3)).trim()}...`;
};

export const firstWords = (text: string, count: number): string =>
  normalizeWhitespace(text).split(' ').slice(0, count).join(' ');

const WORD_RE = /[\p{L}\p{N}]+/gu;

/** Lower-cased runs of letters and digits, in text order. */
export const tokenizeWords = (text: string): string[] => text.toLowerCase().match(WORD_RE) ?? [];

/** Case-insensitive de-duplication that keeps the first spelling seen. */
export const uniqueStrings = (values: Iterable<string>, limit = Infinity): string[] => {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of values) {
    const value = normalizeWhitespace(raw);
    const key = value.toLowerCase();
    if (!value || seen.has(key)) continue;
    seen.add(key);
    out.push(value);
    if (out.length >= limit) break;
  }
  return out;
};
