/**
 * Tests for the summarizer.
 *
 * @module services/extractors/__tests__/summarizer.test
 */

import { describe, it, expect } from 'vitest';
import { SUMMARIZER_CONFIG } from '@/config/pipeline';
import { createFakeEngine } from '@/services/nlp/__tests__/fake-engine';
import {
  summarize,
  detectContentType,
  truncateSummary,
  summarizeList,
  rankSentences,
} from '../summarizer';

const engine = createFakeEngine();

const RECEIPT = [
  'Receipt from Blue Bottle Coffee.',
  'Order number: AB-1234',
  'Date: 03/14/2026',
  '1 x Latte $4.50',
  'Croissant $3.25',
  'Subtotal $7.75',
  'Total: $8.40',
].join('\n');

describe('summarize', () => {
  it('returns the placeholder for empty input', () => {
    expect(summarize('', engine)).toBe('No content to summarize.');
    expect(summarize('  \n ', engine)).toBe('No content to summarize.');
  });

  it('returns very short input as it is', () => {
    expect(summarize('  Ok thanks ', engine)).toBe('Ok thanks');
  });

  it('never exceeds the maximum length', () => {
    const text = Array.from({ length: 40 }, (_, i) => `Sentence number ${i} talks about the quarterly budget plan.`).join(' ');
    const summary = summarize(text, engine);

    expect(summary.length).toBeLessThanOrEqual(SUMMARIZER_CONFIG.maxChars);
  });

  it('summarizes receipts as key facts', () => {
    expect(summarize(RECEIPT, engine)).toBe(
      'Blue Bottle Coffee - Order #AB-1234 - on 03/14/2026 - Items: 1x Latte, Croissant - Total: $8.40'
    );
  });

  it('summarizes lists with a title', () => {
    const text = 'Agenda for Thursday:\n- Budget review\n- Hiring plan\n- Office move\n- Team offsite';
    expect(summarize(text, engine)).toBe('Agenda for Thursday: Budget review, Hiring plan and 2 more items');
  });

  it('honors the content type hint', () => {
    expect(summarize('Groceries:\n- milk\n- eggs', engine, 'general')).toBe('Groceries: - milk - eggs');
  });
});

describe('detectContentType', () => {
  it('prefers receipt over list', () => {
    expect(detectContentType('Your receipt\n- Latte $4.50\n- Bagel $2.00')).toBe('receipt');
  });

  it('needs two list lines for a list', () => {
    expect(detectContentType('Notes:\n- one item')).toBe('general');
    expect(detectContentType('Notes:\n1. one\n2. two')).toBe('list');
  });
});

describe('summarizeList', () => {
  it('lists up to three items', () => {
    expect(summarizeList('Groceries:\n- milk\n- eggs\n- bread')).toBe('Groceries: milk, eggs, bread');
  });

  it('returns null without items', () => {
    expect(summarizeList('no items here')).toBeNull();
  });
});

describe('truncateSummary', () => {
  it('cuts on a word boundary with an ellipsis', () => {
    expect(truncateSummary('alpha beta gamma delta', 15)).toBe('alpha beta…');
  });

  it('leaves short text alone', () => {
    expect(truncateSummary('short', 15)).toBe('short');
  });
});

describe('rankSentences', () => {
  it('keeps the best sentences in original order', () => {
    const sentences = [
      'Budget review meeting moved to Friday.',
      'Lunch was nice.',
      'Bring the budget numbers to the review meeting.',
      'The budget meeting is important.',
    ];

    expect(rankSentences(sentences)).toEqual([sentences[0], sentences[2], sentences[3]]);
  });
});
