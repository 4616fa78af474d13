/**
 * Gmail Email Parser
 *
 * Parses Gmail API message responses into `ParsedEmail`, and hands them to
 * the annotation pipeline as `RawEmail`.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * FEATURES
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * - Extracts headers (From, Subject, Date) case-insensitively
 * - Decodes base64url-encoded body content
 * - Walks nested multipart messages for text/plain and text/html
 * - Falls back to internalDate when the Date header does not parse
 * - Reads STARRED, IMPORTANT and UNREAD from the label ids
 *
 * ```typescript
 * const parsed = emailParser.parse(gmailMessage);
 * const raw = emailParser.toRawEmail(parsed);
 * const outcome = await processor.process(raw);
 * ```
 *
 * @module lib/gmail/email-parser
 */

import { createLogger } from '@/lib/utils/logger';
import type { RawEmail } from '@/types/annotation';
import { GmailParseError } from './errors';
import { GMAIL_LABELS } from './types';
import type { GmailHeader, GmailMessage, GmailMessagePart, ParsedEmail } from './types';

const logger = createLogger('EmailParser');

interface ParsedAddress {
  email: string | null;
  name: string | null;
}

interface ExtractedBody {
  text: string | null;
  html: string | null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// EMAIL PARSER CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class EmailParser {
  /**
   * Parses a Gmail message.
   *
   * @throws GmailParseError when the id, thread id or sender is missing
   */
  public parse(message: GmailMessage): ParsedEmail {
    if (!message.id || !message.threadId) {
      throw new GmailParseError(
        'Message missing required fields (id or threadId)',
        { messageId: message.id },
        'id'
      );
    }

    const headers = message.payload?.headers ?? [];

    const { email: senderEmail, name: senderName } = this.parseEmailAddress(
      this.getHeader(headers, 'From')
    );
    if (!senderEmail) {
      throw new GmailParseError(
        'Could not extract sender email from message',
        { messageId: message.id },
        'sender_email'
      );
    }

    const { text: bodyText, html: bodyHtml } = this.extractBody(message.payload);
    const gmailLabels = message.labelIds ?? [];

    return {
      gmailId: message.id,
      threadId: message.threadId,
      subject: this.getHeader(headers, 'Subject') ?? '',
      senderEmail,
      senderName,
      date: this.parseDate(this.getHeader(headers, 'Date'), message.internalDate),
      snippet: message.snippet || null,
      bodyText,
      bodyHtml,
      gmailLabels,
      isRead: !gmailLabels.includes(GMAIL_LABELS.UNREAD),
      isStarred: gmailLabels.includes(GMAIL_LABELS.STARRED),
      isImportant: gmailLabels.includes(GMAIL_LABELS.IMPORTANT),
    };
  }

  /**
   * Converts a parsed email to pipeline input. The HTML body is preferred
   * since the normalizer converts it; plain text is the fallback.
   */
  public toRawEmail(parsed: ParsedEmail): RawEmail {
    const useHtml = parsed.bodyHtml !== null;

    return {
      id: parsed.gmailId,
      subject: parsed.subject,
      sender: parsed.senderName ?? parsed.senderEmail,
      senderEmail: parsed.senderEmail,
      receivedAt: parsed.date,
      body: (useHtml ? parsed.bodyHtml : parsed.bodyText) ?? '',
      mimeType: useHtml ? 'text/html' : parsed.bodyText !== null ? 'text/plain' : null,
      isStarred: parsed.isStarred,
      isImportantFlag: parsed.isImportant,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // PRIVATE HELPER METHODS
  // ═══════════════════════════════════════════════════════════════════════════

  private getHeader(headers: GmailHeader[], name: string): string | null {
    const normalizedName = name.toLowerCase();
    const header = headers.find((h) => h.name?.toLowerCase() === normalizedName);
    return header?.value || null;
  }

  /**
   * Handles:
   * - "Display Name <email@example.com>" (name may be quoted)
   * - "<email@example.com>"
   * - "email@example.com (Display Name)"
   * - "email@example.com"
   */
  private parseEmailAddress(header: string | null): ParsedAddress {
    if (!header) return { email: null, name: null };

    const trimmed = header.trim();

    const angleMatch = trimmed.match(/^(.*?)\s*<([^>]+)>$/);
    if (angleMatch?.[2]) {
      let displayName = (angleMatch[1] ?? '').trim();
      if (displayName.startsWith('"') && displayName.endsWith('"')) {
        displayName = displayName.slice(1, -1).trim();
      }
      return { email: angleMatch[2].trim().toLowerCase(), name: displayName || null };
    }

    const parenMatch = trimmed.match(/^(\S+)\s*\((.+)\)$/);
    if (parenMatch?.[1] && parenMatch[2]) {
      return { email: parenMatch[1].trim().toLowerCase(), name: parenMatch[2].trim() };
    }

    if (trimmed.includes('@')) {
      return { email: trimmed.toLowerCase(), name: null };
    }

    logger.warn('Could not parse email address', { header });
    return { email: null, name: null };
  }

  /**
   * Date header first, then internalDate, then now.
   */
  private parseDate(dateHeader: string | null, internalDate?: string): string {
    if (dateHeader) {
      const parsed = new Date(dateHeader);
      if (!Number.isNaN(parsed.getTime())) return parsed.toISOString();
      logger.debug('Could not parse Date header, using internalDate', { dateHeader });
    }

    if (internalDate) {
      const timestamp = Number.parseInt(internalDate, 10);
      if (!Number.isNaN(timestamp)) return new Date(timestamp).toISOString();
      logger.warn('Could not parse internalDate', { internalDate });
    }

    logger.warn('Using current time as email date');
    return new Date().toISOString();
  }

  /**
   * First text/plain and first text/html part, depth first.
   */
  private extractBody(payload: GmailMessagePart | undefined): ExtractedBody {
    const result: ExtractedBody = { text: null, html: null };
    if (!payload) return result;

    const findParts = (part: GmailMessagePart): void => {
      const mimeType = part.mimeType?.toLowerCase();
      const data = part.body?.data;

      if (data) {
        if (mimeType === 'text/plain' && result.text === null) {
          result.text = this.decodeBase64Url(data);
        } else if (mimeType === 'text/html' && result.html === null) {
          result.html = this.decodeBase64Url(data);
        }
      }

      for (const subPart of part.parts ?? []) {
        if (result.text !== null && result.html !== null) break;
        findParts(subPart);
      }
    };

    findParts(payload);
    return result;
  }

  /**
   * Gmail uses URL-safe base64 (- and _ instead of + and /).
   */
  private decodeBase64Url(data: string): string {
    const base64 = data.replace(/-/g, '+').replace(/_/g, '/');
    return Buffer.from(base64, 'base64').toString('utf-8');
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// SINGLETON & UTILITIES
// ═══════════════════════════════════════════════════════════════════════════════

export const emailParser = new EmailParser();

/**
 * Parses several messages. Unparseable messages are logged and returned as
 * null so callers can count them.
 */
export function parseGmailMessages(
  messages: GmailMessage[],
  parser: EmailParser = emailParser
): Array<ParsedEmail | null> {
  return messages.map((message) => {
    try {
      return parser.parse(message);
    } catch (error) {
      logger.warn('Failed to parse message', {
        emailId: message.id,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      return null;
    }
  });
}
