/**
 * Sentiment label and score.
 *
 * The score comes from the NLP engine. The label is the first matching rule:
 * urgency wording, then the positive and negative thresholds. Values exactly
 * on a threshold stay Neutral.
 *
 * @module services/extractors/sentiment-scorer
 */

import { SENTIMENT_CONFIG } from '@/config/pipeline';
import type { SentimentLabel, SentimentResult } from '@/types/annotation';
import type { NlpEngine } from '@/services/nlp';

interface LabelRule {
  label: SentimentLabel;
  matches: (text: string, score: number) => boolean;
}

const URGENCY_PATTERN = new RegExp(`\\b(?:${SENTIMENT_CONFIG.urgencyTerms.join('|')})\\b`, 'i');

export const SENTIMENT_RULES: readonly LabelRule[] = [
  { label: 'Urgent', matches: (text) => URGENCY_PATTERN.test(text) },
  { label: 'Positive', matches: (_text, score) => score > SENTIMENT_CONFIG.positiveThreshold },
  { label: 'Negative', matches: (_text, score) => score < SENTIMENT_CONFIG.negativeThreshold },
];

export function labelSentiment(text: string, score: number): SentimentLabel {
  return SENTIMENT_RULES.find((rule) => rule.matches(text, score))?.label ?? 'Neutral';
}

export function scoreSentiment(text: string, engine: NlpEngine): SentimentResult {
  if (!text.trim()) return { label: 'Neutral', score: 0 };

  const raw = engine.sentiment(text);
  const score = Number.isFinite(raw) ? Math.max(-1, Math.min(1, raw)) : 0;

  return { label: labelSentiment(text, score), score };
}
