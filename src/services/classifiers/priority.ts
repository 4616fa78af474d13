/**
 * 📊 Priority Scorer
 *
 * Priority in [0, 10] from an ordered list of weighted rules over the
 * signals gathered for one email. Every weight is non-negative, so adding
 * a signal never lowers the score.
 *
 * @module services/classifiers/priority
 */

import { PRIORITY_CONFIG, PRIORITY_WEIGHTS, SENTIMENT_CONFIG } from '@/config/pipeline';
import type { Entity, Keyword, SentimentLabel } from '@/types/annotation';
import { isContentImportant } from './importance';
import { evaluateRules, wordPattern, type RuleContribution, type ScoringRule } from './rules';

export interface PrioritySignals {
  readonly subject: string;
  readonly body: string;
  readonly sentiment: SentimentLabel;
  readonly keywords: readonly Keyword[];
  readonly entities: readonly Entity[];
  readonly isStarred: boolean;
  readonly isGmailImportant: boolean;
  readonly hasActionItems: boolean;
  readonly needsFollowup: boolean;
}

export interface PriorityResult {
  readonly score: number;
  readonly isImportant: boolean;
  readonly contributions: readonly RuleContribution[];
}

const SUBJECT_URGENCY = wordPattern(SENTIMENT_CONFIG.urgencyTerms);

function countEntities(entities: readonly Entity[], type: Entity['type']): number {
  return entities.filter((entity) => entity.type === type).length;
}

export const PRIORITY_RULES: readonly ScoringRule<PrioritySignals>[] = [
  { name: 'gmailImportant', weight: PRIORITY_WEIGHTS.gmailImportant, measure: (s) => s.isGmailImportant },
  { name: 'gmailStarred', weight: PRIORITY_WEIGHTS.gmailStarred, measure: (s) => s.isStarred },
  { name: 'contentImportant', weight: PRIORITY_WEIGHTS.contentImportant, measure: (s) => isContentImportant(s) },
  { name: 'sentimentUrgent', weight: PRIORITY_WEIGHTS.sentimentUrgent, measure: (s) => s.sentiment === 'Urgent' },
  { name: 'sentimentNegative', weight: PRIORITY_WEIGHTS.sentimentNegative, measure: (s) => s.sentiment === 'Negative' },
  { name: 'subjectUrgency', weight: PRIORITY_WEIGHTS.subjectUrgency, measure: (s) => SUBJECT_URGENCY.test(s.subject) },
  {
    name: 'manyPeople',
    weight: PRIORITY_WEIGHTS.manyPeople,
    measure: (s) => countEntities(s.entities, 'PERSON') > PRIORITY_CONFIG.manyPeopleCount,
  },
  { name: 'organization', weight: PRIORITY_WEIGHTS.organization, measure: (s) => countEntities(s.entities, 'ORG') > 0 },
  { name: 'actionItems', weight: PRIORITY_WEIGHTS.actionItems, measure: (s) => s.hasActionItems },
  { name: 'followup', weight: PRIORITY_WEIGHTS.followup, measure: (s) => s.needsFollowup },
];

export function clampPriority(score: number): number {
  const clamped = Math.min(PRIORITY_CONFIG.max, Math.max(PRIORITY_CONFIG.min, score));
  return Math.round(clamped * 10) / 10;
}

export function scorePriority(signals: PrioritySignals): PriorityResult {
  const { score, contributions } = evaluateRules(PRIORITY_RULES, signals, PRIORITY_WEIGHTS.base);
  const finalScore = clampPriority(score);

  return {
    score: finalScore,
    isImportant: signals.isGmailImportant || finalScore >= PRIORITY_CONFIG.importanceThreshold,
    contributions,
  };
}

/** Statistics bucket for a priority score */
export function priorityBucket(score: number): 'low' | 'medium' | 'high' {
  if (score <= PRIORITY_CONFIG.lowMax) return 'low';
  if (score <= PRIORITY_CONFIG.mediumMax) return 'medium';
  return 'high';
}
