/**
 * HTML → plain text conversion for email bodies.
 *
 * @module services/normalizer/html-converter
 */

import { convert } from 'html-to-text';

const HTML_MIME_PATTERN = /html/i;
const MARKUP_PATTERN = /<(?:!doctype|html|head|body|div|p|br|table|tr|td|span|a|ul|ol|li|h[1-6]|strong|em|b|i|img|style)\b[^>]*>/i;

/**
 * True when the mime hint says HTML or the body carries common markup.
 */
export function looksLikeHtml(body: string, mimeType: string | null): boolean {
  if (mimeType && HTML_MIME_PATTERN.test(mimeType)) return true;
  return MARKUP_PATTERN.test(body);
}

/**
 * Converts an HTML body to readable text. Links keep only their visible
 * text; images, styles and scripts are dropped.
 */
export function htmlToText(html: string): string {
  return convert(html, {
    wordwrap: false,
    preserveNewlines: false,
    selectors: [
      { selector: 'a', options: { ignoreHref: true } },
      { selector: 'img', format: 'skip' },
      { selector: 'style', format: 'skip' },
      { selector: 'script', format: 'skip' },
      { selector: 'h1', options: { uppercase: false } },
      { selector: 'h2', options: { uppercase: false } },
      { selector: 'h3', options: { uppercase: false } },
      { selector: 'table', format: 'dataTable' },
    ],
  });
}
