/**
 * Whitespace and markup clean-up applied at the end of normalization.
 *
 * @module services/normalizer/whitespace
 */

const INVISIBLE_CHARS = /[\u200B-\u200D\u2060\uFEFF\u00AD\u034F\u180E]/g;
const NBSP = /[\u00A0\u2007\u202F]/g;
const INLINE_SPACE = /[ \t\f\v]+/g;

/** Tag-shaped sequences: `<p>`, `</div>`, `<br/>`, `<!doctype html>`, `<!-- x -->` */
export const TAG_PATTERN = /<\/?[a-zA-Z!][^<>]*>/g;

/**
 * NFC-normalizes, removes invisible characters, collapses runs of spaces
 * and keeps at most one blank line between paragraphs.
 */
export function collapseWhitespace(text: string): string {
  return text
    .normalize('NFC')
    .replace(/\r\n?/g, '\n')
    .replace(INVISIBLE_CHARS, '')
    .replace(NBSP, ' ')
    .replace(INLINE_SPACE, ' ')
    .split('\n')
    .map((line) => line.trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Removes tag-shaped sequences until none are left. Each pass shortens the
 * text, so the loop ends.
 */
export function removeTags(text: string): string {
  let current = text;
  let next = current.replace(TAG_PATTERN, ' ');

  while (next !== current) {
    current = next;
    next = current.replace(TAG_PATTERN, ' ');
  }

  return current;
}
