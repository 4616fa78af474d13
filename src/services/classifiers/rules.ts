/**
 * Weighted rule evaluation shared by the heuristic classifiers.
 *
 * A rule measures how often it fires for an input (a boolean counts as 0 or
 * 1) and contributes `weight × measure` to the score. Rules are evaluated in
 * order and every contribution is reported, so weights can be tested one
 * rule at a time.
 *
 * @module services/classifiers/rules
 */

export interface ScoringRule<T> {
  readonly name: string;
  readonly weight: number;
  readonly measure: (input: T) => number | boolean;
}

export interface RuleContribution {
  readonly name: string;
  readonly contribution: number;
}

export interface RuleEvaluation {
  readonly score: number;
  readonly contributions: readonly RuleContribution[];
}

export function evaluateRules<T>(
  rules: readonly ScoringRule<T>[],
  input: T,
  initialScore = 0
): RuleEvaluation {
  const contributions: RuleContribution[] = [];
  let score = initialScore;

  for (const rule of rules) {
    const measured = rule.measure(input);
    const amount = typeof measured === 'boolean' ? Number(measured) : measured;
    const contribution = rule.weight * amount;

    if (contribution !== 0) {
      contributions.push({ name: rule.name, contribution });
    }
    score += contribution;
  }

  return { score, contributions };
}

/**
 * Counts how many of the phrases occur in the text (each at most once).
 */
export function countPhrases(text: string, phrases: readonly string[]): number {
  const lower = text.toLowerCase();
  return phrases.filter((phrase) => lower.includes(phrase)).length;
}

/**
 * Builds a case-insensitive whole-word pattern for a list of terms.
 */
export function wordPattern(terms: readonly string[]): RegExp {
  const escaped = terms.map((term) => term.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'));
  return new RegExp(`\\b(?:${escaped.join('|')})\\b`, 'i');
}
