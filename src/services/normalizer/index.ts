/**
 * 🧹 Content Normalizer
 *
 * Turns a raw email body (HTML or plain text) into clean plain text:
 * markup converted, quoted replies and signatures removed, whitespace
 * collapsed.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * STEPS
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * 1. html        HTML → text (only when the body is HTML)
 * 2. replies     email-reply-parser visible text
 * 3. quotes      `>` lines, "On … wrote:" headers, Original Message blocks
 * 4. signature   cut at the first signature marker
 * 5. whitespace  invisible characters, spaces, blank lines
 * 6. tags        leftover tag-shaped text removed
 *
 * A step that throws is logged and skipped; the text from the previous step
 * carries on. `normalizeContent` itself never throws.
 *
 * @module services/normalizer
 */

import { logPipeline } from '@/lib/utils/logger';
import { htmlToText, looksLikeHtml } from './html-converter';
import { stripQuotedLines, stripWithReplyParser } from './quote-stripper';
import { stripSignature } from './signature-stripper';
import { collapseWhitespace, removeTags } from './whitespace';

export { looksLikeHtml, htmlToText } from './html-converter';
export { stripQuotedLines, stripWithReplyParser } from './quote-stripper';
export { stripSignature } from './signature-stripper';
export { collapseWhitespace, removeTags, TAG_PATTERN } from './whitespace';

type Step = (text: string) => string;

function applyStep(name: string, step: Step, text: string): string {
  try {
    return step(text);
  } catch (error) {
    logPipeline.stageFailed(`normalize:${name}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return text;
  }
}

/**
 * Normalizes a raw email body.
 *
 * @param body - Raw body as fetched
 * @param mimeType - 'text/html', 'text/plain' or null when unknown
 *
 * @example
 * ```typescript
 * normalizeContent('<p>Hi Sam,</p><p>See you at 3.</p><p>Thanks,<br>Ana</p>', 'text/html');
 * // => 'Hi Sam,\n\nSee you at 3.'
 * ```
 */
export function normalizeContent(body: string | null | undefined, mimeType: string | null = null): string {
  if (typeof body !== 'string' || body.trim().length === 0) return '';

  let text = body;

  if (looksLikeHtml(text, mimeType)) {
    text = applyStep('html', htmlToText, text);
  }

  text = applyStep('replies', stripWithReplyParser, text);
  text = applyStep('quotes', stripQuotedLines, text);
  text = applyStep('signature', stripSignature, text);
  text = applyStep('whitespace', collapseWhitespace, text);
  text = applyStep('tags', (value) => collapseWhitespace(removeTags(value)), text);

  return text;
}
