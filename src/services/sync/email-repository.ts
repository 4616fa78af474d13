/**
 * Email Repository
 *
 * Persists annotated emails. The email row is upserted on
 * (user_id, gmail_id) so a re-fetch never duplicates it, then the child
 * rows (entities, keywords, action items, contacts) of that email are
 * replaced.
 *
 * The row builders are pure and exported for tests; `SupabaseEmailRepository`
 * does the I/O.
 *
 * @module services/sync/email-repository
 */

import { createLogger } from '@/lib/utils/logger';
import type { TypedSupabaseClient } from '@/lib/supabase/server';
import type { ProcessingOutcome } from '@/services/processors';
import type { RawEmail } from '@/types/annotation';
import type { TableInsert } from '@/types/database';

const logger = createLogger('EmailRepository');

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface GmailFlags {
  isStarred: boolean;
  isGmailImportant: boolean;
}

/** What the sync service knows about a message besides its pipeline input */
export interface StoredMessage {
  raw: RawEmail;
  threadId: string | null;
}

export interface EmailChildRows {
  entities: TableInsert<'entities'>[];
  keywords: TableInsert<'keywords'>[];
  actionItems: TableInsert<'action_items'>[];
  contacts: TableInsert<'contacts'>[];
}

export interface EmailRepository {
  /** Gmail ids among `gmailIds` the user already has stored */
  findExistingGmailIds(userId: string, gmailIds: readonly string[]): Promise<Set<string>>;
  updateGmailFlags(userId: string, gmailId: string, flags: GmailFlags): Promise<void>;
  /** Upserts the email and replaces its child rows; returns the email row id */
  saveProcessed(userId: string, message: StoredMessage, outcome: ProcessingOutcome): Promise<string>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ROW BUILDERS
// ═══════════════════════════════════════════════════════════════════════════════

function describeFailure(outcome: ProcessingOutcome): string | null {
  if (outcome.success) return null;
  return outcome.errors.map(({ stage, error }) => `${stage}: ${error}`).join('; ') || 'processing failed';
}

export function buildEmailRow(
  userId: string,
  { raw, threadId }: StoredMessage,
  outcome: ProcessingOutcome
): TableInsert<'emails'> {
  const { annotation } = outcome;

  return {
    user_id: userId,
    gmail_id: raw.id,
    thread_id: threadId,
    subject: raw.subject,
    sender_name: raw.sender,
    sender_email: raw.senderEmail,
    received_at: raw.receivedAt,
    raw_body: raw.body,
    mime_type: raw.mimeType,
    normalized_body: annotation.normalizedBody,
    summary: annotation.summary,
    category: annotation.category,
    sentiment_label: annotation.sentimentLabel,
    sentiment_score: annotation.sentimentScore,
    priority_score: annotation.priorityScore,
    is_important: annotation.isImportant,
    is_starred: raw.isStarred,
    is_gmail_important: raw.isImportantFlag,
    needs_followup: annotation.needsFollowup,
    followup_date: annotation.followupDate,
    processing_error: describeFailure(outcome),
  };
}

export function buildChildRows(userId: string, emailId: string, outcome: ProcessingOutcome): EmailChildRows {
  const { annotation } = outcome;
  const owner = { user_id: userId, email_id: emailId };

  return {
    entities: annotation.entities.map(({ text, type }) => ({ ...owner, text, type })),
    keywords: annotation.keywords.map(({ word, score }) => ({ ...owner, word, score })),
    actionItems: annotation.actionItems.map(({ text, deadline }) => ({ ...owner, text, deadline })),
    contacts: annotation.contacts.map((contact) => ({ ...owner, ...contact })),
  };
}

/**
 * Flag-only update for an email that is already stored. The Gmail
 * important flag forces is_important; clearing it leaves the stored
 * judgment alone.
 */
export function buildFlagUpdate(flags: GmailFlags) {
  return {
    is_starred: flags.isStarred,
    is_gmail_important: flags.isGmailImportant,
    ...(flags.isGmailImportant ? { is_important: true } : {}),
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SUPABASE REPOSITORY
// ═══════════════════════════════════════════════════════════════════════════════

export class SupabaseEmailRepository implements EmailRepository {
  constructor(private readonly supabase: TypedSupabaseClient) {}

  async findExistingGmailIds(userId: string, gmailIds: readonly string[]): Promise<Set<string>> {
    if (gmailIds.length === 0) return new Set();

    const { data, error } = await this.supabase
      .from('emails')
      .select('gmail_id')
      .eq('user_id', userId)
      .in('gmail_id', [...gmailIds]);

    if (error) {
      throw new Error(`Failed to look up stored emails: ${error.message}`);
    }

    return new Set((data ?? []).map((row) => row.gmail_id));
  }

  async updateGmailFlags(userId: string, gmailId: string, flags: GmailFlags): Promise<void> {
    const { error } = await this.supabase
      .from('emails')
      .update(buildFlagUpdate(flags))
      .eq('user_id', userId)
      .eq('gmail_id', gmailId);

    if (error) {
      throw new Error(`Failed to update flags for ${gmailId}: ${error.message}`);
    }
  }

  async saveProcessed(userId: string, message: StoredMessage, outcome: ProcessingOutcome): Promise<string> {
    const { data, error } = await this.supabase
      .from('emails')
      .upsert(buildEmailRow(userId, message, outcome), { onConflict: 'user_id,gmail_id' })
      .select('id')
      .single();

    if (error || !data) {
      throw new Error(`Failed to save email ${message.raw.id}: ${error?.message ?? 'no row returned'}`);
    }

    const children = buildChildRows(userId, data.id, outcome);
    await this.replaceChildren(data.id, children);

    logger.debug('Email saved', {
      userId,
      emailId: data.id,
      entities: children.entities.length,
      actionItems: children.actionItems.length,
    });

    return data.id;
  }

  private async replaceChildren(emailId: string, rows: EmailChildRows): Promise<void> {
    const results = await Promise.all([
      this.supabase.from('entities').delete().eq('email_id', emailId),
      this.supabase.from('keywords').delete().eq('email_id', emailId),
      this.supabase.from('action_items').delete().eq('email_id', emailId),
      this.supabase.from('contacts').delete().eq('email_id', emailId),
    ]);
    const deleteError = results.find((result) => result.error)?.error;
    if (deleteError) {
      throw new Error(`Failed to clear annotations for ${emailId}: ${deleteError.message}`);
    }

    const inserts = await Promise.all([
      rows.entities.length > 0 ? this.supabase.from('entities').insert(rows.entities) : null,
      rows.keywords.length > 0 ? this.supabase.from('keywords').insert(rows.keywords) : null,
      rows.actionItems.length > 0 ? this.supabase.from('action_items').insert(rows.actionItems) : null,
      rows.contacts.length > 0 ? this.supabase.from('contacts').insert(rows.contacts) : null,
    ]);
    const insertError = inserts.find((result) => result?.error)?.error;
    if (insertError) {
      throw new Error(`Failed to save annotations for ${emailId}: ${insertError.message}`);
    }
  }
}
