/**
 * Tests for EmailSyncService with in-memory Gmail, account store and
 * repository fakes.
 *
 * @module services/sync/__tests__/email-sync-service.test
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EmailSyncService, mergeMessageIds } from '../email-sync-service';
import type { EmailRepository } from '../email-repository';
import { BatchProcessor, EmailProcessor } from '@/services/processors';
import { createFakeEngine } from '@/services/nlp/__tests__/fake-engine';
import { EmailParser, GmailAuthError, GmailSyncError } from '@/lib/gmail';
import type { GmailAccountStore, GmailMessage, IGmailService, ITokenManager, ListMessagesOptions } from '@/lib/gmail';
import type { GmailAccount } from '@/types/database';

// ═══════════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════════

const REFERENCE = new Date(2026, 0, 5, 9, 0);

const account: GmailAccount = {
  id: 'account-1',
  user_id: 'user-1',
  email: 'me@example.com',
  display_name: null,
  access_token: 'test-access-token',
  refresh_token: 'test-refresh-token',
  token_expiry: '2026-01-05T10:00:00.000Z',
  last_sync_at: null,
  created_at: '2026-01-01T00:00:00.000Z',
  updated_at: '2026-01-01T00:00:00.000Z',
};

function message(id: string, from: string | null, labelIds: string[], body = 'Hello there.'): GmailMessage {
  return {
    id,
    threadId: `thread-${id}`,
    labelIds,
    internalDate: '1767603600000',
    payload: {
      mimeType: 'text/plain',
      headers: [
        ...(from ? [{ name: 'From', value: from }] : []),
        { name: 'Subject', value: `Subject ${id}` },
      ],
      body: { data: Buffer.from(body).toString('base64url') },
    },
  };
}

const MESSAGES: Record<string, GmailMessage> = {
  m1: message('m1', 'Jane Smith <jane@example.com>', ['INBOX', 'IMPORTANT'], 'Please send the report by Friday.'),
  m2: message('m2', 'bob@example.com', ['INBOX', 'STARRED']),
  m4: message('m4', null, ['INBOX', 'IMPORTANT']),
};

const LISTINGS: Record<string, string[]> = {
  '': ['m1', 'm2', 'm3'],
  'is:important': ['m1', 'm4'],
  'is:starred': ['m2'],
};

function createGmail(): IGmailService {
  return {
    listMessages: async (options?: Partial<ListMessagesOptions>) => ({
      messages: (LISTINGS[options?.query ?? ''] ?? []).map((id) => ({ id, threadId: `thread-${id}` })),
    }),
    getMessage: async (id: string) => {
      const found = MESSAGES[id];
      if (!found) throw new Error('not found');
      return found;
    },
    // m3 fails to fetch and is left out
    getMessages: async (ids: string[]) => ids.flatMap((id) => MESSAGES[id] ?? []),
  };
}

/** Parser that records every message it is handed and rejects m1 */
class RejectingParser extends EmailParser {
  public readonly seen: string[] = [];

  public override parse(message: GmailMessage) {
    this.seen.push(message.id);
    if (message.id === 'm1') throw new Error('unreadable payload');
    return super.parse(message);
  }
}

interface DepsOptions {
  account?: GmailAccount | null;
  existing?: string[];
  parser?: EmailParser;
}

function createDeps(options: DepsOptions = {}) {
  const markSynced = vi.fn<GmailAccountStore['markSynced']>(async () => undefined);
  const accounts: GmailAccountStore = {
    findByUserId: vi.fn(async () => (options.account === undefined ? account : options.account)),
    saveTokens: vi.fn(async () => undefined),
    markSynced,
  };

  const tokenManager: ITokenManager = {
    getValidToken: vi.fn(async () => 'test-access-token'),
    refreshToken: vi.fn(async () => ({ success: true })),
    isTokenExpired: () => false,
  };

  const updateGmailFlags = vi.fn<EmailRepository['updateGmailFlags']>(async () => undefined);
  const saveProcessed = vi.fn<EmailRepository['saveProcessed']>(async (_userId, stored) => `row-${stored.raw.id}`);
  const findExistingGmailIds = vi.fn<EmailRepository['findExistingGmailIds']>(
    async (_userId, ids) => new Set(ids.filter((id) => (options.existing ?? ['m2']).includes(id)))
  );
  const emails: EmailRepository = {
    findExistingGmailIds,
    updateGmailFlags,
    saveProcessed,
  };

  const service = new EmailSyncService({
    accounts,
    emails,
    tokenManager,
    batchProcessor: new BatchProcessor(new EmailProcessor(createFakeEngine())),
    createGmail,
    parser: options.parser,
  });

  return { service, markSynced, updateGmailFlags, saveProcessed, findExistingGmailIds };
}

// ═══════════════════════════════════════════════════════════════════════════════
// TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('mergeMessageIds', () => {
  it('keeps first-seen order without duplicates', () => {
    expect(mergeMessageIds([[{ id: 'a' }, { id: 'b' }], [{ id: 'b' }, { id: 'c' }], [{ id: 'a' }]])).toEqual([
      'a',
      'b',
      'c',
    ]);
  });
});

describe('EmailSyncService.fetchAndProcess', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('stores new emails, refreshes known ones and counts failures', async () => {
    const { service, updateGmailFlags, saveProcessed, markSynced } = createDeps();

    const result = await service.fetchAndProcess('user-1', { referenceDate: REFERENCE });

    // m3 was not fetched and m4 has no sender
    expect(result).toEqual({ fetched: 3, created: 1, updated: 1, failed: 2 });
    expect(updateGmailFlags).toHaveBeenCalledWith('user-1', 'm2', { isStarred: true, isGmailImportant: false });
    expect(markSynced).toHaveBeenCalledWith('account-1', expect.any(String));

    expect(saveProcessed).toHaveBeenCalledTimes(1);
    const call = saveProcessed.mock.lastCall;
    if (!call) throw new Error('saveProcessed was not called');
    const [userId, stored, outcome] = call;
    expect(userId).toBe('user-1');
    expect(stored.threadId).toBe('thread-m1');
    expect(stored.raw).toMatchObject({ id: 'm1', sender: 'Jane Smith', isImportantFlag: true, mimeType: 'text/plain' });
    expect(outcome.success).toBe(true);
    expect(outcome.annotation.isImportant).toBe(true);
    expect(outcome.annotation.actionItems).toEqual([
      { text: 'Please send the report by Friday.', deadline: new Date(2026, 0, 9, 17, 0).toISOString() },
    ]);
  });

  it('counts an email that cannot be saved as failed', async () => {
    const { service, saveProcessed } = createDeps({ existing: [] });
    saveProcessed.mockRejectedValueOnce(new Error('db down'));

    const result = await service.fetchAndProcess('user-1', { referenceDate: REFERENCE });

    expect(result).toEqual({ fetched: 3, created: 1, updated: 0, failed: 3 });
  });

  it('rejects with an auth error when no Gmail account is connected', async () => {
    const { service } = createDeps({ account: null });

    await expect(service.fetchAndProcess('user-1')).rejects.toBeInstanceOf(GmailAuthError);
  });

  it('parses with the injected parser and counts its failures', async () => {
    const parser = new RejectingParser();
    const { service, saveProcessed } = createDeps({ parser });

    const result = await service.fetchAndProcess('user-1', { referenceDate: REFERENCE });

    expect(parser.seen).toEqual(['m1', 'm2', 'm4']);
    expect(result).toEqual({ fetched: 3, created: 0, updated: 1, failed: 3 });
    expect(saveProcessed).not.toHaveBeenCalled();
  });

  it('wraps a failed lookup of known emails in a sync error at the save stage', async () => {
    const { service, markSynced, findExistingGmailIds } = createDeps();
    findExistingGmailIds.mockRejectedValueOnce(new Error('db down'));

    const error = await service.fetchAndProcess('user-1', { referenceDate: REFERENCE }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GmailSyncError);
    expect(error).toMatchObject({
      message: 'Email sync failed during save: db down',
      failedAt: 'save',
      emailsFetched: 3,
    });
    expect(markSynced).not.toHaveBeenCalled();
  });

  it('wraps a failed sync timestamp update in a sync error', async () => {
    const { service, markSynced } = createDeps();
    markSynced.mockRejectedValueOnce(new Error('timeout'));

    await expect(service.fetchAndProcess('user-1', { referenceDate: REFERENCE })).rejects.toMatchObject({
      name: 'GmailSyncError',
      failedAt: 'save',
      emailsFetched: 3,
    });
  });
});
