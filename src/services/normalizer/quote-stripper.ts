/**
 * Quoted-reply removal.
 *
 * Two passes: email-reply-parser drops the quoted fragments it recognizes,
 * then line rules handle what it leaves behind (`>` lines, inline
 * "On … wrote:" headers, Outlook "Original Message" blocks).
 *
 * @module services/normalizer/quote-stripper
 */

import EmailReplyParser from 'email-reply-parser';
import { NORMALIZER_CONFIG } from '@/config/pipeline';

const QUOTE_PREFIX = /^\s*>/;
const INLINE_QUOTE_HEADER = /\bOn\s[^\n]{1,200}?\bwrote:/i;
const ORIGINAL_MESSAGE = /^\s*-{2,}\s*(?:Original|Forwarded) Message\s*-{2,}\s*$/im;

/**
 * Visible text according to email-reply-parser. Falls back to the input
 * when the parser leaves almost nothing of a substantial message.
 */
export function stripWithReplyParser(text: string): string {
  const visible = new EmailReplyParser().read(text).getVisibleText().trim();

  if (visible.length < NORMALIZER_CONFIG.minVisibleReplyChars && text.trim().length > 50) {
    return text;
  }
  return visible;
}

/**
 * Line rules for quoted content:
 * - lines starting with `>` are dropped
 * - an "On … wrote:" header drops itself and the rest of its line
 * - an "Original Message" separator drops everything from there on
 */
export function stripQuotedLines(text: string): string {
  const separator = text.match(ORIGINAL_MESSAGE);
  const head = separator?.index !== undefined ? text.slice(0, separator.index) : text;

  return head
    .split('\n')
    .filter((line) => !QUOTE_PREFIX.test(line))
    .map((line) => {
      const header = line.match(INLINE_QUOTE_HEADER);
      return header?.index !== undefined ? line.slice(0, header.index).trimEnd() : line;
    })
    .join('\n');
}
