/**
 * 📊 Insight Aggregations
 *
 * Pure reductions over a user's stored rows, used by the listing and
 * statistics routes.
 *
 * @module services/insights/aggregations
 */

import { priorityBucket } from '@/services/classifiers';
import type { ContactSummary, EmailStatistics, EntitySummary, KeywordSummary } from '@/types/api';
import type { ActionItemRow, Email } from '@/types/database';

/** Distinct (text, type) pairs in first-seen order */
export function distinctEntities(rows: readonly EntitySummary[]): EntitySummary[] {
  const seen = new Map<string, EntitySummary>();
  for (const { text, type } of rows) {
    const key = `${type}:${text}`;
    if (!seen.has(key)) seen.set(key, { text, type });
  }
  return [...seen.values()];
}

/** One entry per word with its highest score, best first */
export function topKeywords(rows: readonly KeywordSummary[]): KeywordSummary[] {
  const best = new Map<string, number>();
  for (const { word, score } of rows) {
    const current = best.get(word);
    if (current === undefined || score > current) best.set(word, score);
  }
  return [...best.entries()]
    .map(([word, score]) => ({ word, score }))
    .sort((a, b) => b.score - a.score || a.word.localeCompare(b.word));
}

/** One contact per address (case-insensitive, first seen wins), by name */
export function distinctContacts(rows: readonly ContactSummary[]): ContactSummary[] {
  const byAddress = new Map<string, ContactSummary>();
  for (const row of rows) {
    const key = row.email.toLowerCase();
    if (!byAddress.has(key)) {
      byAddress.set(key, {
        name: row.name,
        email: row.email,
        phone: row.phone,
        company: row.company,
        position: row.position,
      });
    }
  }
  return [...byAddress.values()].sort((a, b) => a.name.localeCompare(b.name));
}

/** Earliest deadline first; items without one go last, oldest first */
export function compareActionItems(
  a: Pick<ActionItemRow, 'deadline' | 'created_at'>,
  b: Pick<ActionItemRow, 'deadline' | 'created_at'>
): number {
  if (a.deadline && b.deadline) {
    const byDeadline = Date.parse(a.deadline) - Date.parse(b.deadline);
    if (byDeadline !== 0) return byDeadline;
  } else if (a.deadline) {
    return -1;
  } else if (b.deadline) {
    return 1;
  }
  return Date.parse(a.created_at) - Date.parse(b.created_at);
}

type StatisticsEmail = Pick<Email, 'category' | 'sentiment_label' | 'priority_score' | 'needs_followup'>;

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

/**
 * Counts per category and sentiment, a low/medium/high priority histogram
 * (unscored emails are left out), follow-ups and action-item progress.
 */
export function buildStatistics(
  emails: readonly StatisticsEmail[],
  actionItems: ReadonlyArray<Pick<ActionItemRow, 'completed'>>
): EmailStatistics {
  const statistics: EmailStatistics = {
    total: emails.length,
    categories: {},
    sentiments: {},
    priorityDistribution: { low: 0, medium: 0, high: 0 },
    followupNeeded: 0,
    actionItems: {
      total: actionItems.length,
      completed: actionItems.filter((item) => item.completed).length,
    },
  };

  for (const email of emails) {
    if (email.category) increment(statistics.categories, email.category);
    if (email.sentiment_label) increment(statistics.sentiments, email.sentiment_label);
    if (email.priority_score !== null) statistics.priorityDistribution[priorityBucket(email.priority_score)]++;
    if (email.needs_followup) statistics.followupNeeded++;
  }

  return statistics;
}
