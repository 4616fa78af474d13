/**
 * Custom Error Classes for Gmail Integration
 *
 * Structured, typed errors for Gmail API and OAuth operations. Each error
 * carries a context object and serializes to plain JSON for logging.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * ERROR HIERARCHY
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * GmailError (base)
 * ├── GmailAuthError      - OAuth/authentication failures
 * ├── GmailAPIError       - API request failures
 * │   └── GmailRateLimitError - Rate limit exceeded
 * ├── GmailParseError     - Message parsing failures
 * └── GmailSyncError      - Fetch-and-process failures
 *
 * ```typescript
 * try {
 *   await gmailService.listMessages({ maxResults: 25 });
 * } catch (error) {
 *   if (error instanceof GmailRateLimitError) {
 *     await delay(error.retryAfterMs);
 *   } else if (error instanceof GmailAuthError && error.isRefreshable) {
 *     await tokenManager.refreshToken(account);
 *   }
 * }
 * ```
 *
 * @module lib/gmail/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CONTEXT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Context information for Gmail errors.
 */
export interface GmailErrorContext {
  /** Gmail account row id */
  accountId?: string;
  /** Session user id */
  userId?: string;
  /** Gmail message id for message-specific errors */
  messageId?: string;
  /** HTTP status code from the Gmail API */
  statusCode?: number;
  /** Original error that caused this one */
  originalError?: Error;
  /** Additional metadata for debugging */
  metadata?: Record<string, unknown>;
}

/** JSON shape produced by `GmailError.toJSON()` */
export interface GmailErrorJSON {
  name: string;
  message: string;
  timestamp: string;
  context: Omit<GmailErrorContext, 'originalError'> & { originalError?: string };
}

// ═══════════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Base error class for all Gmail-related errors.
 */
export class GmailError extends Error {
  /** Structured context for debugging */
  public readonly context: GmailErrorContext;

  /** Timestamp when the error occurred */
  public readonly timestamp: string;

  constructor(message: string, context: GmailErrorContext = {}) {
    super(message);
    this.name = 'GmailError';
    this.context = context;
    this.timestamp = new Date().toISOString();

    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Converts the error to a JSON-serializable object. The original error
   * is reduced to its message.
   */
  public toJSON(): GmailErrorJSON {
    const { originalError, ...rest } = this.context;
    return {
      name: this.name,
      message: this.message,
      timestamp: this.timestamp,
      context: {
        ...rest,
        ...(originalError ? { originalError: originalError.message } : {}),
      },
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// AUTH ERROR
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * OAuth failure: expired or revoked token, missing refresh token, or a
 * 401/403 from the API.
 */
export class GmailAuthError extends GmailError {
  /** Whether a token refresh might fix this */
  public readonly isRefreshable: boolean;

  constructor(message: string, context: GmailErrorContext = {}, isRefreshable = true) {
    super(message, context);
    this.name = 'GmailAuthError';
    this.isRefreshable = isRefreshable;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// API ERROR
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Failed Gmail API request. 5xx and 429 are retryable.
 */
export class GmailAPIError extends GmailError {
  /** HTTP status code from the API response */
  public readonly statusCode: number;

  /** Whether this error is retryable */
  public readonly isRetryable: boolean;

  constructor(message: string, statusCode: number, context: GmailErrorContext = {}) {
    super(message, { ...context, statusCode });
    this.name = 'GmailAPIError';
    this.statusCode = statusCode;
    this.isRetryable = statusCode >= 500 || statusCode === 429;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RATE LIMIT ERROR
// ═══════════════════════════════════════════════════════════════════════════════

export class GmailRateLimitError extends GmailAPIError {
  /** Milliseconds to wait before retrying */
  public readonly retryAfterMs: number;

  constructor(message: string, retryAfterMs: number, context: GmailErrorContext = {}) {
    super(message, 429, context);
    this.name = 'GmailRateLimitError';
    this.retryAfterMs = retryAfterMs;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// PARSE ERROR
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A Gmail message could not be turned into a `ParsedEmail` (missing id or
 * sender). Callers skip the message and continue.
 */
export class GmailParseError extends GmailError {
  /** The field that failed to parse */
  public readonly failedField?: string;

  constructor(message: string, context: GmailErrorContext = {}, failedField?: string) {
    super(message, context);
    this.name = 'GmailParseError';
    this.failedField = failedField;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// SYNC ERROR
// ═══════════════════════════════════════════════════════════════════════════════

export type SyncStage = 'account' | 'fetch' | 'parse' | 'save';

/**
 * High-level failure of a fetch-and-process run, wrapping the lower-level
 * cause with how far the run got.
 */
export class GmailSyncError extends GmailError {
  /** Messages fetched before the failure */
  public readonly emailsFetched: number;

  /** Stage at which the run failed */
  public readonly failedAt: SyncStage;

  constructor(
    message: string,
    context: GmailErrorContext = {},
    emailsFetched = 0,
    failedAt: SyncStage = 'fetch'
  ) {
    super(message, context);
    this.name = 'GmailSyncError';
    this.emailsFetched = emailsFetched;
    this.failedAt = failedAt;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR UTILITIES
// ═══════════════════════════════════════════════════════════════════════════════

export function isGmailError(error: unknown): error is GmailError {
  return error instanceof GmailError;
}

/**
 * Wraps any thrown value in a GmailError. Gmail errors pass through
 * unchanged when no extra context is given.
 */
export function toGmailError(error: unknown, context: GmailErrorContext = {}): GmailError {
  if (error instanceof GmailError) {
    return Object.keys(context).length === 0
      ? error
      : new GmailError(error.message, { ...error.context, ...context, originalError: error });
  }

  if (error instanceof Error) {
    return new GmailError(error.message, { ...context, originalError: error });
  }

  return new GmailError(typeof error === 'string' ? error : 'Unknown Gmail error', context);
}
