/**
 * 📝 Summarizer
 *
 * Short summary of a cleaned email body. The strategy depends on what the
 * text looks like:
 *
 * - receipt  → key facts joined with " - " (merchant, order, date, items, total, address)
 * - list     → "title: item, item and N more items"
 * - general  → top sentences by content-word frequency, in original order
 *
 * The result is never longer than SUMMARIZER_CONFIG.maxChars. Empty input
 * yields a fixed placeholder.
 *
 * @module services/extractors/summarizer
 */

import { SUMMARIZER_CONFIG, KEYWORD_CONFIG } from '@/config/pipeline';
import type { ContentType } from '@/types/annotation';
import type { NlpEngine } from '@/services/nlp';

// ═══════════════════════════════════════════════════════════════════════════════
// CONTENT TYPE DETECTION
// ═══════════════════════════════════════════════════════════════════════════════

const RECEIPT_PATTERNS = [
  /\border\s+(?:number|no\.?|#)/i,
  /\bsubtotal\b/i,
  /\btotal\b\s*:?\s*\$?\d/i,
  /\bpaid with\b/i,
  /\breceipt\b/i,
  /\binvoice\b/i,
  /\border confirmation\b/i,
];

const LIST_ITEM = /^\s*(?:[*\-•]|\d+[.)]|[a-z]\))\s+(.+)$/;

/**
 * Receipt markers win over list markers: itemized receipts are usually
 * bulleted too.
 */
export function detectContentType(text: string): ContentType {
  if (RECEIPT_PATTERNS.some((pattern) => pattern.test(text))) return 'receipt';

  const listLines = text.split('\n').filter((line) => LIST_ITEM.test(line));
  if (listLines.length >= 2) return 'list';

  return 'general';
}

// ═══════════════════════════════════════════════════════════════════════════════
// LENGTH BOUND
// ═══════════════════════════════════════════════════════════════════════════════

const ELLIPSIS = '…';

/**
 * Cuts text to at most `maxChars`, on a word boundary when one is close.
 */
export function truncateSummary(text: string, maxChars: number = SUMMARIZER_CONFIG.maxChars): string {
  if (text.length <= maxChars) return text;

  const hardCut = text.slice(0, maxChars - ELLIPSIS.length);
  const lastSpace = hardCut.lastIndexOf(' ');
  const cut = lastSpace > maxChars / 2 ? hardCut.slice(0, lastSpace) : hardCut;

  return `${cut.trimEnd()}${ELLIPSIS}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECEIPTS
// ═══════════════════════════════════════════════════════════════════════════════

const MERCHANT_PATTERNS = [
  /receipt from ([A-Z][\w&' ]{1,40}?)(?:[.,!\n]|$)/i,
  /thank you for (?:shopping|your order) (?:at|with) ([A-Z][\w&' ]{1,40}?)(?:[.,!\n]|$)/i,
  /^([A-Z][\w&' ]{1,40}?) order confirmation/im,
];
const ORDER_NUMBER = /\border\s*(?:number|no\.?|#)\s*:?\s*#?([A-Z0-9][A-Z0-9-]{2,})/i;
const DATE_PATTERNS = [
  /\b\d{1,2}[/-]\d{1,2}[/-]\d{2,4}\b/,
  /\b(?:jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)[a-z]*\.?\s+\d{1,2},?\s+\d{4}\b/i,
];
const TOTAL = /\btotal\b\s*:?\s*\$?(\d[\d,]*\.\d{2})/i;
const ADDRESS = /\b\d+\s+[A-Za-z0-9 .]+?\s(?:St|Ave|Rd|Blvd|Street|Avenue|Road|Lane|Dr)\b\.?/;
const ITEM_LINE = /^(.*?)\s*[-:]?\s*\$(\d[\d,]*\.\d{2})\b/;
const NON_ITEM_WORDS = /\b(?:subtotal|tax|total|tip|donation|shipping|discount)\b/i;
const QUANTITY = /^(\d+)\s*[x*]\s*(.+)$/i;

function firstMatch(text: string, patterns: readonly RegExp[], group = 1): string | null {
  for (const pattern of patterns) {
    const match = text.match(pattern);
    const value = match?.[group]?.trim();
    if (value) return value;
  }
  return null;
}

function receiptItems(lines: string[]): string[] {
  const items: string[] = [];

  for (const line of lines) {
    if (NON_ITEM_WORDS.test(line)) continue;

    const match = line.match(ITEM_LINE);
    const rawName = match?.[1]?.replace(/^\s*(?:[*\-•]|\d+[.)])\s+/, '').trim();
    if (!rawName || rawName.length <= 2 || /^\d+$/.test(rawName)) continue;

    const quantity = rawName.match(QUANTITY);
    items.push(quantity ? `${quantity[1]}x ${quantity[2]}` : rawName);
  }

  return items;
}

export function summarizeReceipt(text: string): string {
  const lines = text.split('\n').map((line) => line.trim()).filter(Boolean);
  const parts: string[] = [];

  const merchant = firstMatch(text, MERCHANT_PATTERNS);
  const orderNumber = firstMatch(text, [ORDER_NUMBER]);
  const date = firstMatch(text, DATE_PATTERNS, 0);
  const items = receiptItems(lines);
  const total = firstMatch(text, [TOTAL]);
  const address = firstMatch(text, [ADDRESS], 0);

  if (merchant) parts.push(merchant);
  if (orderNumber) parts.push(`Order #${orderNumber}`);
  if (date) parts.push(`on ${date}`);
  if (items.length > 0) {
    parts.push(
      items.length <= SUMMARIZER_CONFIG.maxListedReceiptItems
        ? `Items: ${items.join(', ')}`
        : `${items.length} items`
    );
  }
  if (total) parts.push(`Total: $${total}`);
  if (address) parts.push(`at ${address}`);

  if (parts.length > 0) return parts.join(' - ');

  return lines.slice(0, 5).join(' ');
}

// ═══════════════════════════════════════════════════════════════════════════════
// LISTS
// ═══════════════════════════════════════════════════════════════════════════════

export function summarizeList(text: string): string | null {
  const lines = text.split('\n').map((line) => line.trim()).filter(Boolean);
  const items: string[] = [];
  let title: string | null = null;

  for (const line of lines) {
    const match = line.match(LIST_ITEM);
    const item = match?.[1]?.trim();
    if (item) {
      items.push(item);
    } else if (title === null && items.length === 0) {
      title = line.replace(/:$/, '');
    }
  }

  if (items.length === 0) return null;

  const shown = SUMMARIZER_CONFIG.sentenceCount - 1;
  const body =
    items.length <= SUMMARIZER_CONFIG.sentenceCount
      ? items.join(', ')
      : `${items.slice(0, shown).join(', ')} and ${items.length - shown} more items`;

  return title ? `${title}: ${body}` : body;
}

// ═══════════════════════════════════════════════════════════════════════════════
// GENERAL PROSE
// ═══════════════════════════════════════════════════════════════════════════════

function contentWords(text: string): string[] {
  return (text.toLowerCase().match(/[a-z0-9]+/g) ?? []).filter(
    (word) => !KEYWORD_CONFIG.stopwords.has(word)
  );
}

/**
 * Ranks sentences by the mean frequency of their content words, weighted by
 * position and length, and returns the best ones in original order.
 */
export function rankSentences(sentences: readonly string[], count: number = SUMMARIZER_CONFIG.sentenceCount): string[] {
  if (sentences.length <= count) return [...sentences];

  const frequencies = new Map<string, number>();
  for (const word of contentWords(sentences.join(' '))) {
    frequencies.set(word, (frequencies.get(word) ?? 0) + 1);
  }

  const scored = sentences.map((sentence, index) => {
    const words = contentWords(sentence);
    if (words.length === 0) return { index, score: 0 };

    const positionWeight =
      index === 0 || index === sentences.length - 1 ? SUMMARIZER_CONFIG.positionWeight : 1;

    let lengthWeight = 1;
    if (words.length < SUMMARIZER_CONFIG.shortSentenceWords) {
      lengthWeight = SUMMARIZER_CONFIG.shortSentenceWeight;
    } else if (words.length > SUMMARIZER_CONFIG.longSentenceWords) {
      lengthWeight = SUMMARIZER_CONFIG.longSentenceWeight;
    }

    const total = words.reduce((sum, word) => sum + (frequencies.get(word) ?? 0), 0);
    return { index, score: (total / words.length) * positionWeight * lengthWeight };
  });

  return scored
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .slice(0, count)
    .sort((a, b) => a.index - b.index)
    .map(({ index }) => sentences[index] ?? '');
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Summarizes clean text.
 *
 * @param hint - Content type; detected from the text when omitted
 */
export function summarize(text: string, engine: NlpEngine, hint?: ContentType): string {
  const trimmed = text.trim();
  if (!trimmed) return SUMMARIZER_CONFIG.placeholder;
  if (trimmed.length < SUMMARIZER_CONFIG.minChars) return trimmed;

  const contentType = hint ?? detectContentType(trimmed);
  let summary: string | null = null;

  if (contentType === 'receipt') {
    summary = summarizeReceipt(trimmed);
  } else if (contentType === 'list') {
    summary = summarizeList(trimmed);
  }

  if (!summary) {
    const sentences = engine.sentences(trimmed);
    summary = sentences.length > 0 ? rankSentences(sentences).join(' ') : trimmed;
  }

  return truncateSummary(summary.replace(/\s+/g, ' ').trim());
}
