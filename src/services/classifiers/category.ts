/**
 * 🏷️ Category Classifier
 *
 * One point per category term found as a whole word in subject + body, half
 * a point to Meeting for every DATE or TIME entity. The best-scoring category
 * wins (declaration order breaks ties); below the minimum score the email is
 * 'Other'.
 *
 * @module services/classifiers/category
 */

import { CATEGORY_CONFIG, EMAIL_CATEGORIES, type EmailCategory } from '@/config/pipeline';
import type { Entity } from '@/types/annotation';
import { wordPattern } from './rules';

type ScoredCategory = Exclude<EmailCategory, 'Other'>;

const SCORED_CATEGORIES = EMAIL_CATEGORIES.filter(
  (category): category is ScoredCategory => category !== 'Other'
);

const TERM_PATTERNS: ReadonlyArray<{ category: ScoredCategory; patterns: RegExp[] }> =
  SCORED_CATEGORIES.map((category) => ({
    category,
    patterns: CATEGORY_CONFIG.terms[category].map((term) => wordPattern([term])),
  }));

export function scoreCategories(
  subject: string,
  text: string,
  entities: readonly Entity[]
): Map<ScoredCategory, number> {
  const combined = `${subject} ${text}`;
  const scores = new Map<ScoredCategory, number>();

  for (const { category, patterns } of TERM_PATTERNS) {
    scores.set(category, patterns.filter((pattern) => pattern.test(combined)).length);
  }

  const meetingEntities = entities.filter((entity) => entity.type === 'DATE' || entity.type === 'TIME');
  scores.set(
    'Meeting',
    (scores.get('Meeting') ?? 0) + meetingEntities.length * CATEGORY_CONFIG.meetingEntityWeight
  );

  return scores;
}

export function categorize(subject: string, text: string, entities: readonly Entity[]): EmailCategory {
  const scores = scoreCategories(subject, text, entities);

  let best: EmailCategory = 'Other';
  let bestScore = 0;

  for (const category of SCORED_CATEGORIES) {
    const score = scores.get(category) ?? 0;
    if (score > bestScore) {
      best = category;
      bestScore = score;
    }
  }

  return bestScore < CATEGORY_CONFIG.minScore ? 'Other' : best;
}
