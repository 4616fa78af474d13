/**
 * NLP Engine Contract
 *
 * The annotation stages never reach for a model themselves; they receive an
 * `NlpEngine` handle built once per process (see `getNlpEngine`). Tests pass
 * a fake with fixed answers.
 *
 * @module services/nlp/types
 */

import type { Entity } from '@/types/annotation';

export interface NlpEngine {
  /** Splits text into sentences, in order */
  sentences(text: string): string[];

  /** Named mentions found in the text, in order of appearance */
  entities(text: string): Entity[];

  /** Polarity of the whole text in [-1, 1] */
  sentiment(text: string): number;
}
