/**
 * Heuristic classifiers: judgments built on top of extracted fragments.
 *
 * @module services/classifiers
 */

export { evaluateRules, countPhrases, wordPattern } from './rules';
export type { ScoringRule, RuleContribution, RuleEvaluation } from './rules';
export { findDeadline } from './deadline-parser';
export { detectActionItems, splitSentences, isActionSentence } from './action-items';
export { detectFollowup, needsFollowup } from './followup';
export { categorize, scoreCategories } from './category';
export { CONTENT_IMPORTANCE_RULES, scoreContentImportance, isContentImportant } from './importance';
export type { ContentSignals } from './importance';
export { PRIORITY_RULES, scorePriority, clampPriority, priorityBucket } from './priority';
export type { PrioritySignals, PriorityResult } from './priority';
