import { describe, it, expect } from 'vitest';
import { buildChildRows, buildEmailRow, buildFlagUpdate } from '../email-repository';
import { minimalAnnotation, type ProcessingOutcome } from '@/services/processors';
import type { RawEmail } from '@/types/annotation';

const raw: RawEmail = {
  id: 'gmail-1',
  subject: 'Report',
  sender: 'Jane Smith',
  senderEmail: 'jane@example.com',
  receivedAt: '2026-01-05T09:00:00.000Z',
  body: 'Please send the report by Friday.',
  mimeType: 'text/plain',
  isStarred: true,
  isImportantFlag: false,
};

const outcome: ProcessingOutcome = {
  emailId: 'gmail-1',
  success: true,
  durationMs: 3,
  errors: [],
  annotation: {
    normalizedBody: 'Please send the report by Friday.',
    summary: 'Please send the report by Friday.',
    category: 'Update',
    sentimentLabel: 'Neutral',
    sentimentScore: 0,
    priorityScore: 6.5,
    isImportant: false,
    needsFollowup: true,
    followupDate: '2026-01-09',
    entities: [{ text: 'Jane Smith', type: 'PERSON' }],
    keywords: [{ word: 'report', score: 1 }],
    actionItems: [{ text: 'Please send the report by Friday.', deadline: '2026-01-09T17:00:00.000Z' }],
    contacts: [{ name: 'Jane Smith', email: 'jane@example.com', phone: null, company: null, position: null }],
  },
};

describe('buildEmailRow', () => {
  it('maps the raw email and annotation onto the emails columns', () => {
    expect(buildEmailRow('user-1', { raw, threadId: 'thread-1' }, outcome)).toEqual({
      user_id: 'user-1',
      gmail_id: 'gmail-1',
      thread_id: 'thread-1',
      subject: 'Report',
      sender_name: 'Jane Smith',
      sender_email: 'jane@example.com',
      received_at: '2026-01-05T09:00:00.000Z',
      raw_body: 'Please send the report by Friday.',
      mime_type: 'text/plain',
      normalized_body: 'Please send the report by Friday.',
      summary: 'Please send the report by Friday.',
      category: 'Update',
      sentiment_label: 'Neutral',
      sentiment_score: 0,
      priority_score: 6.5,
      is_important: false,
      is_starred: true,
      is_gmail_important: false,
      needs_followup: true,
      followup_date: '2026-01-09',
      processing_error: null,
    });
  });

  it('records the failed stages when processing failed', () => {
    const failed: ProcessingOutcome = {
      emailId: 'gmail-1',
      success: false,
      durationMs: 1,
      errors: [{ stage: 'normalize', error: 'bad markup' }],
      annotation: minimalAnnotation(raw),
    };

    const row = buildEmailRow('user-1', { raw, threadId: null }, failed);

    expect(row.processing_error).toBe('normalize: bad markup');
    expect(row.summary).toBeNull();
    expect(row.priority_score).toBeNull();
  });
});

describe('buildChildRows', () => {
  it('tags every child row with the email and user', () => {
    const rows = buildChildRows('user-1', 'email-row-1', outcome);

    expect(rows.entities).toEqual([{ user_id: 'user-1', email_id: 'email-row-1', text: 'Jane Smith', type: 'PERSON' }]);
    expect(rows.keywords).toEqual([{ user_id: 'user-1', email_id: 'email-row-1', word: 'report', score: 1 }]);
    expect(rows.actionItems).toEqual([
      {
        user_id: 'user-1',
        email_id: 'email-row-1',
        text: 'Please send the report by Friday.',
        deadline: '2026-01-09T17:00:00.000Z',
      },
    ]);
    expect(rows.contacts[0]).toMatchObject({ email_id: 'email-row-1', email: 'jane@example.com' });
  });
});

describe('buildFlagUpdate', () => {
  it('forces importance only when Gmail marks the email important', () => {
    expect(buildFlagUpdate({ isStarred: false, isGmailImportant: true })).toEqual({
      is_starred: false,
      is_gmail_important: true,
      is_important: true,
    });
    expect(buildFlagUpdate({ isStarred: true, isGmailImportant: false })).toEqual({
      is_starred: true,
      is_gmail_important: false,
    });
  });
});
