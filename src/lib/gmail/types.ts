/**
 * TypeScript Types for Gmail Integration
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * TYPE CATEGORIES
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * 1. API Types - the subset of Gmail API shapes we read
 * 2. Parsed Types - our internal email representation
 * 3. Listing / Token Types - request options and OAuth results
 * 4. Service Interfaces - seams for tests and the sync service
 *
 * @module lib/gmail/types
 */

import type { GmailAccount } from '@/types/database';

export type { GmailAccount };

// ═══════════════════════════════════════════════════════════════════════════════
// GMAIL API TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface GmailHeader {
  name: string;
  value: string;
}

/**
 * Gmail message part. Multipart messages nest parts for text/HTML
 * alternatives and attachments.
 */
export interface GmailMessagePart {
  partId?: string;
  /** e.g. 'text/plain', 'text/html', 'multipart/alternative' */
  mimeType?: string;
  filename?: string;
  headers?: GmailHeader[];
  body?: {
    attachmentId?: string;
    size?: number;
    /** base64url-encoded content */
    data?: string;
  };
  parts?: GmailMessagePart[];
}

/**
 * Gmail message as returned by messages.get (format=full).
 */
export interface GmailMessage {
  id: string;
  threadId: string;
  /** e.g. 'INBOX', 'UNREAD', 'STARRED', 'IMPORTANT' */
  labelIds?: string[];
  snippet?: string;
  /** Milliseconds since epoch, as a string */
  internalDate?: string;
  payload?: GmailMessagePart;
}

export interface GmailMessageRef {
  id: string;
  threadId: string;
}

export interface GmailMessagesListResponse {
  messages: GmailMessageRef[];
  nextPageToken?: string;
  resultSizeEstimate?: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PARSED EMAIL TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A Gmail message reduced to the fields we store and annotate.
 */
export interface ParsedEmail {
  gmailId: string;
  threadId: string;
  subject: string;
  senderEmail: string;
  senderName: string | null;
  /** ISO 8601 */
  date: string;
  snippet: string | null;
  bodyText: string | null;
  bodyHtml: string | null;
  gmailLabels: string[];
  isRead: boolean;
  isStarred: boolean;
  isImportant: boolean;
}

// ═══════════════════════════════════════════════════════════════════════════════
// LISTING & TOKEN TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface ListMessagesOptions {
  maxResults: number;
  /** Gmail search query, e.g. 'is:important' */
  query: string;
  labelIds: string[];
}

export interface TokenRefreshResult {
  success: boolean;
  accessToken?: string;
  /** ISO 8601 */
  expiresAt?: string;
  error?: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVICE INTERFACES
// ═══════════════════════════════════════════════════════════════════════════════

export interface IGmailService {
  listMessages(options?: Partial<ListMessagesOptions>): Promise<GmailMessagesListResponse>;
  getMessage(messageId: string): Promise<GmailMessage>;
  getMessages(messageIds: string[]): Promise<GmailMessage[]>;
}

export interface ITokenManager {
  getValidToken(account: GmailAccount): Promise<string>;
  refreshToken(account: GmailAccount): Promise<TokenRefreshResult>;
  isTokenExpired(expiresAt: string | null, bufferMs?: number): boolean;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

export const GMAIL_LABELS = {
  INBOX: 'INBOX',
  UNREAD: 'UNREAD',
  STARRED: 'STARRED',
  IMPORTANT: 'IMPORTANT',
} as const;

export type GmailLabelId = (typeof GMAIL_LABELS)[keyof typeof GMAIL_LABELS];
