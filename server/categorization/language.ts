import { tokenizeWords } from '../utils/text';

export type LanguageCode = 'en' | 'ru' | 'fr' | 'de' | 'es' | 'unknown';

const SAMPLE_LENGTH = 1000;
const MIN_MARKER_HITS = 2;

// Function words that rarely appear in the other candidate languages.
const MARKERS: ReadonlyArray<[LanguageCode, ReadonlySet<string>]> = [
  ['en', new Set(['the', 'and', 'with', 'is', 'are', 'was', 'of', 'to', 'that', 'this', 'for', 'just'])],
  ['fr', new Set(['le', 'la', 'les', 'des', 'une', 'est', 'avec', 'dans', 'pour', 'selon', 'aux', 'du'])],
  ['de', new Set(['der', 'die', 'das', 'und', 'ist', 'nicht', 'mit', 'ein', 'eine', 'auf', 'für', 'wird'])],
  ['es', new Set(['el', 'los', 'las', 'una', 'por', 'con', 'para', 'según', 'está', 'pero', 'como', 'más'])],
];

/** Best-effort language guess from script and common function words. */
export const detectLanguage = (text: string): LanguageCode => {
  const sample = text.slice(0, SAMPLE_LENGTH);
  const letters = sample.match(/\p{L}/gu) ?? [];
  if (!letters.length) return 'unknown';

  const cyrillic = letters.filter((ch) => /\p{Script=Cyrillic}/u.test(ch)).length;
  if (cyrillic / letters.length > 0.5) return 'ru';

  const tokens = tokenizeWords(sample);
  let best: LanguageCode = 'unknown';
  let bestHits = 0;
  for (const [code, markers] of MARKERS) {
    const hits = tokens.reduce((count, token) => (markers.has(token) ? count + 1 : count), 0);
    if (hits > bestHits) {
      best = code;
      bestHits = hits;
    }
  }
  return bestHits >= MIN_MARKER_HITS ? best : 'unknown';
};
