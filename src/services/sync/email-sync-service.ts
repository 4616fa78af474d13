/**
 * Email Sync Service
 *
 * Runs one "fetch new emails" request for a user: loads their Gmail
 * account, lists recent, important and starred messages, and stores them.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * FLOW
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * 1. Load the Gmail account and a valid access token
 * 2. List INBOX (recent), `is:important` and `is:starred`, merged by id
 * 3. Fetch and parse the full messages
 * 4. Already stored → update the Gmail flags only
 * 5. New → annotate with the batch processor, then upsert with child rows
 *
 * A message that fails to fetch, parse or save is counted and skipped.
 * Account and auth problems abort the whole run. Any other failure of a
 * whole stage (the account lookup, the Gmail listing, the stored-id lookup,
 * the sync timestamp) is rethrown as a `GmailSyncError` naming the stage.
 *
 * @module services/sync/email-sync-service
 */

import { appConfig } from '@/config/app';
import {
  EmailParser,
  GmailAuthError,
  GmailSyncError,
  SupabaseGmailAccountStore,
  TokenManager,
  createGmailService,
  emailParser,
  isGmailError,
  parseGmailMessages,
  type GmailAccountStore,
  type IGmailService,
  type ITokenManager,
  type ListMessagesOptions,
  type ParsedEmail,
  type SyncStage,
} from '@/lib/gmail';
import { createLogger } from '@/lib/utils/logger';
import type { TypedSupabaseClient } from '@/lib/supabase/server';
import { getNlpEngine } from '@/services/nlp';
import { BatchProcessor, EmailProcessor, type ProcessingContext } from '@/services/processors';
import { SupabaseEmailRepository, type EmailRepository } from './email-repository';

const logger = createLogger('EmailSyncService');

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface SyncResult {
  /** Messages fetched from Gmail */
  fetched: number;
  /** New emails annotated and stored */
  created: number;
  /** Stored emails whose Gmail flags were refreshed */
  updated: number;
  /** Messages that could not be fetched, parsed or saved */
  failed: number;
}

export interface EmailSyncDependencies {
  accounts: GmailAccountStore;
  emails: EmailRepository;
  tokenManager: ITokenManager;
  batchProcessor: BatchProcessor;
  createGmail: (accessToken: string, accountId: string) => IGmailService;
  parser?: EmailParser;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/** The three listings one sync run merges */
export function buildListings(): Array<Partial<ListMessagesOptions>> {
  return [
    { maxResults: appConfig.sync.recentCount, labelIds: ['INBOX'] },
    { maxResults: appConfig.sync.importantCount, query: 'is:important', labelIds: [] },
    { maxResults: appConfig.sync.starredCount, query: 'is:starred', labelIds: [] },
  ];
}

/** Ids in first-seen order without duplicates */
export function mergeMessageIds(lists: ReadonlyArray<ReadonlyArray<{ id: string }>>): string[] {
  return [...new Set(lists.flatMap((list) => list.map((message) => message.id)))];
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVICE
// ═══════════════════════════════════════════════════════════════════════════════

export class EmailSyncService {
  private readonly parser: EmailParser;

  constructor(private readonly deps: EmailSyncDependencies) {
    this.parser = deps.parser ?? emailParser;
  }

  /**
   * Fetches and annotates the user's latest emails.
   *
   * @throws GmailAuthError when there is no Gmail account or its token cannot be refreshed
   * @throws GmailSyncError when a whole stage fails for a reason other than Gmail
   */
  async fetchAndProcess(userId: string, context: ProcessingContext = {}): Promise<SyncResult> {
    const startTime = Date.now();
    logger.start('Fetching and processing emails', { userId });

    const account = await this.atStage('account', userId, 0, () => this.deps.accounts.findByUserId(userId));
    if (!account) {
      throw new GmailAuthError('No Gmail account connected', { userId }, false);
    }

    const accessToken = await this.deps.tokenManager.getValidToken(account);
    const gmail = this.deps.createGmail(accessToken, account.id);

    const { messageIds, messages } = await this.atStage('fetch', userId, 0, async () => {
      const listings = await Promise.all(buildListings().map((options) => gmail.listMessages(options)));
      const ids = mergeMessageIds(listings.map((listing) => listing.messages));
      return { messageIds: ids, messages: await gmail.getMessages(ids) };
    });

    const result: SyncResult = {
      fetched: messages.length,
      created: 0,
      updated: 0,
      failed: messageIds.length - messages.length,
    };

    const parsed: ParsedEmail[] = [];
    for (const email of parseGmailMessages(messages, this.parser)) {
      if (email) parsed.push(email);
      else result.failed++;
    }

    const existing = await this.atStage('save', userId, result.fetched, () =>
      this.deps.emails.findExistingGmailIds(
        userId,
        parsed.map((email) => email.gmailId)
      )
    );

    const fresh = parsed.filter((email) => !existing.has(email.gmailId));
    const known = parsed.filter((email) => existing.has(email.gmailId));

    await this.refreshFlags(userId, known, result);
    await this.storeNew(userId, fresh, context, result);

    await this.atStage('save', userId, result.fetched, () =>
      this.deps.accounts.markSynced(account.id, new Date().toISOString())
    );

    logger.success('Emails fetched and processed', {
      userId,
      accountId: account.id,
      ...result,
      durationMs: Date.now() - startTime,
    });

    return result;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // PRIVATE HELPER METHODS
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Runs one stage of the sync. Gmail errors keep their type; anything else
   * becomes a GmailSyncError carrying the stage and the fetched count.
   */
  private async atStage<T>(
    stage: SyncStage,
    userId: string,
    emailsFetched: number,
    task: () => Promise<T>
  ): Promise<T> {
    try {
      return await task();
    } catch (error) {
      if (isGmailError(error)) throw error;

      logger.error('Sync stage failed', { userId, stage, error: errorMessage(error) });
      throw new GmailSyncError(
        `Email sync failed during ${stage}: ${errorMessage(error)}`,
        { userId, originalError: error instanceof Error ? error : undefined },
        emailsFetched,
        stage
      );
    }
  }

  private async refreshFlags(userId: string, emails: ParsedEmail[], result: SyncResult): Promise<void> {
    for (const email of emails) {
      try {
        await this.deps.emails.updateGmailFlags(userId, email.gmailId, {
          isStarred: email.isStarred,
          isGmailImportant: email.isImportant,
        });
        result.updated++;
      } catch (error) {
        result.failed++;
        logger.warn('Failed to update Gmail flags', { userId, emailId: email.gmailId, error: errorMessage(error) });
      }
    }
  }

  private async storeNew(
    userId: string,
    emails: ParsedEmail[],
    context: ProcessingContext,
    result: SyncResult
  ): Promise<void> {
    if (emails.length === 0) return;

    const messages = emails.map((email) => ({ raw: this.parser.toRawEmail(email), threadId: email.threadId }));
    const batch = await this.deps.batchProcessor.processBatch(
      messages.map((message) => message.raw),
      context
    );

    for (const message of messages) {
      const outcome = batch.outcomes.get(message.raw.id);
      if (!outcome) {
        result.failed++;
        continue;
      }

      try {
        await this.deps.emails.saveProcessed(userId, message, outcome);
        result.created++;
      } catch (error) {
        result.failed++;
        logger.error('Failed to save email', { userId, emailId: message.raw.id, error: errorMessage(error) });
      }
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// FACTORY
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Wires the service to Supabase, Gmail and the process-wide NLP engine.
 */
export function createEmailSyncService(supabase: TypedSupabaseClient): EmailSyncService {
  const accounts = new SupabaseGmailAccountStore(supabase);

  return new EmailSyncService({
    accounts,
    emails: new SupabaseEmailRepository(supabase),
    tokenManager: new TokenManager(accounts),
    batchProcessor: new BatchProcessor(new EmailProcessor(getNlpEngine())),
    createGmail: createGmailService,
  });
}
