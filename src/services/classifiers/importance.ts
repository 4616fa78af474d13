/**
 * 🔥 Content Importance
 *
 * Scores how important an email reads from its content alone, independent of
 * Gmail's own flags:
 *
 * | Signal                               | Weight       |
 * |--------------------------------------|--------------|
 * | urgency word in the subject          | 2 per word   |
 * | urgency phrase in the body           | 1 per phrase |
 * | PERSON or ORG entity                 | 0.5 each     |
 * | summed score of the top 3 keywords   | × 0.5        |
 *
 * The content counts as important when the total is above the threshold.
 *
 * @module services/classifiers/importance
 */

import { IMPORTANCE_CONFIG } from '@/config/pipeline';
import type { Entity, Keyword } from '@/types/annotation';
import { countPhrases, evaluateRules, type RuleEvaluation, type ScoringRule } from './rules';

export interface ContentSignals {
  readonly subject: string;
  readonly body: string;
  readonly entities: readonly Entity[];
  readonly keywords: readonly Keyword[];
}

export const CONTENT_IMPORTANCE_RULES: readonly ScoringRule<ContentSignals>[] = [
  {
    name: 'subjectUrgentWords',
    weight: IMPORTANCE_CONFIG.subjectWordWeight,
    measure: ({ subject }) => countPhrases(subject, IMPORTANCE_CONFIG.subjectUrgentWords),
  },
  {
    name: 'bodyUrgentPhrases',
    weight: IMPORTANCE_CONFIG.bodyPhraseWeight,
    measure: ({ body }) => countPhrases(body, IMPORTANCE_CONFIG.bodyUrgentPhrases),
  },
  {
    name: 'peopleAndOrganizations',
    weight: IMPORTANCE_CONFIG.peopleOrgWeight,
    measure: ({ entities }) => entities.filter((e) => e.type === 'PERSON' || e.type === 'ORG').length,
  },
  {
    name: 'topKeywords',
    weight: IMPORTANCE_CONFIG.keywordWeight,
    measure: ({ keywords }) =>
      keywords.slice(0, IMPORTANCE_CONFIG.topKeywordCount).reduce((sum, k) => sum + k.score, 0),
  },
];

export function scoreContentImportance(signals: ContentSignals): RuleEvaluation {
  return evaluateRules(CONTENT_IMPORTANCE_RULES, signals);
}

export function isContentImportant(signals: ContentSignals): boolean {
  return scoreContentImportance(signals).score > IMPORTANCE_CONFIG.threshold;
}
