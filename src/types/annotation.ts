/**
 * Annotation Pipeline Types
 *
 * Value types passed between the normalizer, extractors, classifiers and the
 * aggregator. Fragments are readonly; stages build new values rather than
 * mutate the ones they receive.
 *
 * @module types/annotation
 */

import type { EmailCategory } from '@/config/pipeline';

export type { EmailCategory };

// ═══════════════════════════════════════════════════════════════════════════════
// INPUT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * An email as handed over by the Gmail integration layer.
 */
export interface RawEmail {
  readonly id: string;
  readonly subject: string;
  /** Display name of the sender, or the address when there is none */
  readonly sender: string;
  readonly senderEmail: string;
  /** ISO 8601 timestamp */
  readonly receivedAt: string;
  readonly body: string;
  /** 'text/html', 'text/plain', or null when unknown */
  readonly mimeType: string | null;
  readonly isStarred: boolean;
  readonly isImportantFlag: boolean;
}

// ═══════════════════════════════════════════════════════════════════════════════
// FRAGMENTS
// ═══════════════════════════════════════════════════════════════════════════════

export const ENTITY_TYPES = ['PERSON', 'ORG', 'LOC', 'DATE', 'TIME', 'MONEY'] as const;
export type EntityType = (typeof ENTITY_TYPES)[number];

export interface Entity {
  readonly text: string;
  readonly type: EntityType;
}

export interface Keyword {
  readonly word: string;
  readonly score: number;
}

export interface ActionItem {
  readonly text: string;
  /** ISO 8601 timestamp, or null when no deadline could be parsed */
  readonly deadline: string | null;
}

export interface Contact {
  readonly name: string;
  readonly email: string;
  readonly phone: string | null;
  readonly company: string | null;
  readonly position: string | null;
}

export const SENTIMENT_LABELS = ['Positive', 'Negative', 'Neutral', 'Urgent'] as const;
export type SentimentLabel = (typeof SENTIMENT_LABELS)[number];

export interface SentimentResult {
  readonly label: SentimentLabel;
  /** In [-1, 1] */
  readonly score: number;
}

export interface FollowupResult {
  readonly needsFollowup: boolean;
  /** Calendar date (yyyy-MM-dd) */
  readonly followupDate: string | null;
}

export type ContentType = 'general' | 'receipt' | 'list';

// ═══════════════════════════════════════════════════════════════════════════════
// OUTPUT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Everything the pipeline derives from one email. Annotation fields are null
 * (lists empty) when the stage that produces them failed.
 */
export interface AnnotatedEmail {
  readonly normalizedBody: string | null;
  readonly summary: string | null;
  readonly category: EmailCategory | null;
  readonly sentimentLabel: SentimentLabel | null;
  readonly sentimentScore: number | null;
  readonly priorityScore: number | null;
  readonly isImportant: boolean;
  readonly needsFollowup: boolean;
  readonly followupDate: string | null;
  readonly entities: readonly Entity[];
  readonly keywords: readonly Keyword[];
  readonly actionItems: readonly ActionItem[];
  readonly contacts: readonly Contact[];
}
