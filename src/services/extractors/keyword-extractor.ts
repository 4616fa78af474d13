/**
 * 🔑 Keyword Extractor
 *
 * Single-document TF-IDF. With one document every term has the same inverse
 * document frequency, so a term's score is its count divided by the L2 norm
 * of the kept counts.
 *
 * @module services/extractors/keyword-extractor
 */

import { KEYWORD_CONFIG } from '@/config/pipeline';
import type { Keyword } from '@/types/annotation';

const ASCII_PUNCTUATION = /[!"#$%&'()*+,\-./:;<=>?@[\\\]^_`{|}~]/g;

/**
 * Lowercased tokens with punctuation removed, stopwords and short words dropped.
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(ASCII_PUNCTUATION, '')
    .split(/\s+/)
    .filter(
      (word) =>
        word.length >= KEYWORD_CONFIG.minWordLength && !KEYWORD_CONFIG.stopwords.has(word)
    );
}

/**
 * Top keywords by score, highest first.
 *
 * @example
 * ```typescript
 * extractKeywords('budget budget review meeting friday notes');
 * // => [{ word: 'budget', score: 0.7071 }, { word: 'friday', score: 0.3536 }, ...]
 * ```
 */
export function extractKeywords(text: string, topN: number = KEYWORD_CONFIG.topN): Keyword[] {
  const tokens = tokenize(text);
  if (tokens.length < KEYWORD_CONFIG.minTokens) return [];

  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }

  const top = [...counts.entries()]
    .sort(([wordA, countA], [wordB, countB]) => countB - countA || wordA.localeCompare(wordB))
    .slice(0, topN);

  const norm = Math.sqrt(top.reduce((sum, [, count]) => sum + count * count, 0));

  return top.map(([word, count]) => ({
    word,
    score: Math.round((count / norm) * 10000) / 10000,
  }));
}
