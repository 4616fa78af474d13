/**
 * ✅ Action-Item Detector
 *
 * Every sentence that contains an action phrase ("please", "could you",
 * "send", "review", ...) becomes an action item, with a deadline when the
 * sentence carries a "by …" phrase that resolves.
 *
 * @module services/classifiers/action-items
 */

import { ACTION_PHRASES } from '@/config/pipeline';
import type { ActionItem } from '@/types/annotation';
import type { NlpEngine } from '@/services/nlp';
import { findDeadline } from './deadline-parser';
import { wordPattern } from './rules';

const ACTION_PATTERN = wordPattern(ACTION_PHRASES);

/**
 * Sentences from the engine, further split on line breaks so that a
 * greeting line never merges with the request below it.
 */
export function splitSentences(text: string, engine: NlpEngine): string[] {
  return engine
    .sentences(text)
    .flatMap((sentence) => sentence.split(/\n+/))
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

export function isActionSentence(sentence: string): boolean {
  return ACTION_PATTERN.test(sentence);
}

export function detectActionItems(text: string, engine: NlpEngine, reference: Date): ActionItem[] {
  if (!text.trim()) return [];

  return splitSentences(text, engine)
    .filter(isActionSentence)
    .map((sentence) => ({
      text: sentence,
      deadline: findDeadline(sentence, reference)?.toISOString() ?? null,
    }));
}
