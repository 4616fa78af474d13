/**
 * Gmail Integration Module
 *
 * Read-only access to a user's Gmail: listing and fetching messages,
 * parsing them into pipeline input, and keeping OAuth tokens fresh.
 *
 * ```typescript
 * import { createGmailService, TokenManager, emailParser } from '@/lib/gmail';
 * ```
 *
 * @module lib/gmail
 */

// ═══════════════════════════════════════════════════════════════════════════════
// SERVICES
// ═══════════════════════════════════════════════════════════════════════════════

export { GmailService, createGmailService } from './gmail-service';
export { TokenManager, isTokenExpired, TOKEN_EXPIRY_BUFFER_MS } from './token-manager';
export { EmailParser, emailParser, parseGmailMessages } from './email-parser';
export { SupabaseGmailAccountStore } from './account-store';
export type { GmailAccountStore, StoredTokens } from './account-store';

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  GmailError,
  GmailAuthError,
  GmailAPIError,
  GmailRateLimitError,
  GmailParseError,
  GmailSyncError,
  isGmailError,
  toGmailError,
} from './errors';

export type { GmailErrorContext, GmailErrorJSON, SyncStage } from './errors';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type {
  GmailHeader,
  GmailMessagePart,
  GmailMessage,
  GmailMessageRef,
  GmailMessagesListResponse,
  ParsedEmail,
  ListMessagesOptions,
  TokenRefreshResult,
  IGmailService,
  ITokenManager,
  GmailAccount,
  GmailLabelId,
} from './types';

export { GMAIL_LABELS } from './types';
