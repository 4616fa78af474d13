/**
 * Gmail API Service
 *
 * High-level interface over googleapis `gmail_v1` for the read-only calls the
 * inbox needs. Handles retries with exponential backoff and maps failures to
 * the typed errors in `./errors`.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * USAGE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * ```typescript
 * const accessToken = await tokenManager.getValidToken(account);
 * const gmail = createGmailService(accessToken, account.id);
 *
 * const { messages } = await gmail.listMessages({ maxResults: 25 });
 * const full = await gmail.getMessages(messages.map((m) => m.id));
 * ```
 *
 * @module lib/gmail/gmail-service
 */

import { google, type gmail_v1 } from 'googleapis';
import { appConfig } from '@/config/app';
import { createLogger, logEmail } from '@/lib/utils/logger';
import { GmailAPIError, GmailAuthError, GmailRateLimitError } from './errors';
import type {
  GmailHeader,
  GmailMessage,
  GmailMessagePart,
  GmailMessagesListResponse,
  IGmailService,
  ListMessagesOptions,
} from './types';

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

/** Used when a 429 response carries no Retry-After header */
const DEFAULT_RATE_LIMIT_DELAY_MS = 10_000;

/** Messages fetched in parallel per batch by getMessages() */
const MESSAGE_BATCH_SIZE = 20;

const DEFAULT_LIST_OPTIONS: ListMessagesOptions = {
  maxResults: 25,
  query: '',
  labelIds: ['INBOX'],
};

const logger = createLogger('GmailService');

// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE MAPPING
// googleapis types mark every field optional and nullable
// ═══════════════════════════════════════════════════════════════════════════════

function toHeaders(headers: gmail_v1.Schema$MessagePartHeader[] | undefined): GmailHeader[] {
  return (headers ?? []).flatMap((header) =>
    header.name ? [{ name: header.name, value: header.value ?? '' }] : []
  );
}

function toMessagePart(part: gmail_v1.Schema$MessagePart): GmailMessagePart {
  return {
    partId: part.partId ?? undefined,
    mimeType: part.mimeType ?? undefined,
    filename: part.filename ?? undefined,
    headers: toHeaders(part.headers),
    body: part.body
      ? {
          attachmentId: part.body.attachmentId ?? undefined,
          size: part.body.size ?? undefined,
          data: part.body.data ?? undefined,
        }
      : undefined,
    parts: part.parts?.map(toMessagePart),
  };
}

function toGmailMessage(data: gmail_v1.Schema$Message, requestedId: string): GmailMessage {
  return {
    id: data.id ?? requestedId,
    threadId: data.threadId ?? '',
    labelIds: data.labelIds ?? undefined,
    snippet: data.snippet ?? undefined,
    internalDate: data.internalDate ?? undefined,
    payload: data.payload ? toMessagePart(data.payload) : undefined,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// GMAIL SERVICE CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class GmailService implements IGmailService {
  private readonly gmail: gmail_v1.Gmail;

  /** Account ID for logging context */
  private readonly accountId?: string;

  constructor(accessToken: string, accountId?: string) {
    const auth = new google.auth.OAuth2();
    auth.setCredentials({ access_token: accessToken });

    this.gmail = google.gmail({ version: 'v1', auth });
    this.accountId = accountId;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // PUBLIC METHODS
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Lists message ids (and thread ids). Use getMessage() for content.
   *
   * @example
   * ```typescript
   * const important = await service.listMessages({ maxResults: 10, query: 'is:important' });
   * ```
   */
  public async listMessages(
    options: Partial<ListMessagesOptions> = {}
  ): Promise<GmailMessagesListResponse> {
    const { maxResults, query, labelIds } = { ...DEFAULT_LIST_OPTIONS, ...options };

    logEmail.fetchStart({ accountId: this.accountId, count: maxResults, query });

    try {
      const response = await this.executeWithRetry(() =>
        this.gmail.users.messages.list({
          userId: 'me',
          maxResults,
          q: query || undefined,
          labelIds: labelIds.length > 0 ? labelIds : undefined,
        })
      );

      const messages = (response.data.messages ?? []).flatMap((m) =>
        m.id ? [{ id: m.id, threadId: m.threadId ?? '' }] : []
      );

      logEmail.fetchComplete({ accountId: this.accountId, count: messages.length, query });

      return {
        messages,
        nextPageToken: response.data.nextPageToken ?? undefined,
        resultSizeEstimate: response.data.resultSizeEstimate ?? undefined,
      };
    } catch (error) {
      const gmailError = this.handleError(error);
      logEmail.fetchError({ accountId: this.accountId, error: gmailError.message, query });
      throw gmailError;
    }
  }

  /**
   * Gets one message with its full MIME structure.
   */
  public async getMessage(messageId: string): Promise<GmailMessage> {
    logger.debug('Fetching message', { accountId: this.accountId, emailId: messageId });

    try {
      const response = await this.executeWithRetry(() =>
        this.gmail.users.messages.get({ userId: 'me', id: messageId, format: 'full' })
      );
      return toGmailMessage(response.data, messageId);
    } catch (error) {
      const gmailError = this.handleError(error, { messageId });
      logger.error('Failed to fetch message', {
        accountId: this.accountId,
        emailId: messageId,
        error: gmailError.message,
      });
      throw gmailError;
    }
  }

  /**
   * Gets several messages in parallel batches. A message that fails to
   * fetch is logged and left out; auth errors abort the whole call.
   */
  public async getMessages(messageIds: string[]): Promise<GmailMessage[]> {
    if (messageIds.length === 0) return [];

    const messages: GmailMessage[] = [];
    const errors: Array<{ messageId: string; error: string }> = [];

    for (let i = 0; i < messageIds.length; i += MESSAGE_BATCH_SIZE) {
      const batch = messageIds.slice(i, i + MESSAGE_BATCH_SIZE);
      const results = await Promise.allSettled(batch.map((id) => this.getMessage(id)));

      for (const [index, result] of results.entries()) {
        if (result.status === 'fulfilled') {
          messages.push(result.value);
          continue;
        }
        if (result.reason instanceof GmailAuthError) throw result.reason;

        errors.push({
          messageId: batch[index] ?? 'unknown',
          error: result.reason instanceof Error ? result.reason.message : 'Unknown error',
        });
      }
    }

    if (errors.length > 0) {
      logger.warn('Some messages failed to fetch', {
        accountId: this.accountId,
        successCount: messages.length,
        failureCount: errors.length,
        errors: errors.slice(0, 5),
      });
    }

    logger.info('Message fetch complete', {
      accountId: this.accountId,
      requested: messageIds.length,
      fetched: messages.length,
      failed: errors.length,
    });

    return messages;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // PRIVATE HELPER METHODS
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Retries rate limits (after Retry-After) and 5xx responses (exponential
   * backoff). Auth and other 4xx errors are thrown at once.
   */
  private async executeWithRetry<T>(operation: () => Promise<T>): Promise<T> {
    const { maxAttempts, baseDelayMs } = appConfig.retry;
    let lastError: GmailAPIError | GmailAuthError | null = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        return await operation();
      } catch (error) {
        const gmailError = this.handleError(error);
        lastError = gmailError;

        if (gmailError instanceof GmailAuthError) throw gmailError;
        if (!gmailError.isRetryable || attempt === maxAttempts) throw gmailError;

        const delayMs =
          gmailError instanceof GmailRateLimitError
            ? gmailError.retryAfterMs
            : baseDelayMs * Math.pow(2, attempt - 1);

        logger.warn('Retrying Gmail API call', {
          accountId: this.accountId,
          attempt,
          delayMs,
          statusCode: gmailError.statusCode,
          error: gmailError.message,
        });
        await this.delay(delayMs);
      }
    }

    throw lastError ?? new GmailAPIError('Gmail request failed', 500, { accountId: this.accountId });
  }

  /**
   * Maps a thrown value to a typed Gmail error:
   * 401/403 → GmailAuthError, 429 → GmailRateLimitError, else GmailAPIError.
   */
  private handleError(
    error: unknown,
    context: { messageId?: string } = {}
  ): GmailAPIError | GmailAuthError {
    if (error instanceof GmailAPIError || error instanceof GmailAuthError) {
      return error;
    }

    const statusCode = this.extractStatusCode(error);
    const originalError = error instanceof Error ? error : undefined;
    const message = originalError?.message ?? 'Unknown Gmail error';
    const errorContext = { accountId: this.accountId, ...context, originalError };

    if (statusCode === 401 || statusCode === 403) {
      return new GmailAuthError(
        'Gmail authentication failed',
        { ...errorContext, statusCode },
        statusCode === 401
      );
    }

    if (statusCode === 429) {
      return new GmailRateLimitError(
        'Gmail rate limit exceeded',
        this.extractRetryAfter(error),
        errorContext
      );
    }

    return new GmailAPIError(message, statusCode ?? 500, errorContext);
  }

  /**
   * Google API errors carry the status as a numeric `code`, as
   * `response.status`, or as `status`.
   */
  private extractStatusCode(error: unknown): number | undefined {
    if (!error || typeof error !== 'object') return undefined;

    if ('code' in error && typeof error.code === 'number') return error.code;

    if ('response' in error && error.response && typeof error.response === 'object') {
      const { response } = error;
      if ('status' in response && typeof response.status === 'number') return response.status;
    }

    if ('status' in error && typeof error.status === 'number') return error.status;

    return undefined;
  }

  private extractRetryAfter(error: unknown): number {
    if (
      error &&
      typeof error === 'object' &&
      'response' in error &&
      error.response &&
      typeof error.response === 'object' &&
      'headers' in error.response &&
      error.response.headers &&
      typeof error.response.headers === 'object' &&
      'retry-after' in error.response.headers
    ) {
      const seconds = Number.parseInt(String(error.response.headers['retry-after']), 10);
      if (!Number.isNaN(seconds)) return seconds * 1000;
    }

    return DEFAULT_RATE_LIMIT_DELAY_MS;
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// FACTORY FUNCTION
// ═══════════════════════════════════════════════════════════════════════════════

export function createGmailService(accessToken: string, accountId?: string): GmailService {
  return new GmailService(accessToken, accountId);
}
