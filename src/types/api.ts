/**
 * API Payload Types
 *
 * Shapes the route handlers return inside the `{ success, data }` envelope,
 * shared by the routes and the dashboard's fetch client.
 *
 * @module types/api
 */

import type { ActionItemRow, ContactRow, Email, EntityRow, KeywordRow } from './database';

// ═══════════════════════════════════════════════════════════════════════════════
// EMAILS
// ═══════════════════════════════════════════════════════════════════════════════

/** Columns selected for inbox listings */
export const EMAIL_SUMMARY_SELECT =
  'id, gmail_id, subject, sender_name, sender_email, received_at, summary, category, sentiment_label, sentiment_score, priority_score, is_important, is_starred, needs_followup, followup_date';

export type EmailSummary = Pick<
  Email,
  | 'id'
  | 'gmail_id'
  | 'subject'
  | 'sender_name'
  | 'sender_email'
  | 'received_at'
  | 'summary'
  | 'category'
  | 'sentiment_label'
  | 'sentiment_score'
  | 'priority_score'
  | 'is_important'
  | 'is_starred'
  | 'needs_followup'
  | 'followup_date'
>;

export type EntitySummary = Pick<EntityRow, 'text' | 'type'>;
export type KeywordSummary = Pick<KeywordRow, 'word' | 'score'>;
export type ContactSummary = Pick<ContactRow, 'name' | 'email' | 'phone' | 'company' | 'position'>;

export interface EmailDetail extends Email {
  entities: EntitySummary[];
  keywords: KeywordSummary[];
  action_items: ActionItemRow[];
  contacts: ContactSummary[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ACTION ITEMS
// ═══════════════════════════════════════════════════════════════════════════════

/** An action item with the subject and sender of its email */
export interface ActionItemWithEmail extends ActionItemRow {
  email: { subject: string; sender_name: string } | null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATISTICS
// ═══════════════════════════════════════════════════════════════════════════════

export interface PriorityDistribution {
  low: number;
  medium: number;
  high: number;
}

export interface EmailStatistics {
  total: number;
  categories: Record<string, number>;
  sentiments: Record<string, number>;
  priorityDistribution: PriorityDistribution;
  followupNeeded: number;
  actionItems: { total: number; completed: number };
}

// ═══════════════════════════════════════════════════════════════════════════════
// AUTH & SYNC
// ═══════════════════════════════════════════════════════════════════════════════

export interface AuthUser {
  id: string;
  email: string | null;
  /** True when a Gmail account is connected with a live or refreshable token */
  isAuthenticated: boolean;
  gmailEmail: string | null;
  lastSyncAt: string | null;
}

export interface SyncSummary {
  fetched: number;
  created: number;
  updated: number;
  failed: number;
}
