/**
 * Tests for content importance and priority scoring.
 *
 * @module services/classifiers/__tests__/priority.test
 */

import { describe, it, expect } from 'vitest';
import { isContentImportant } from '../importance';
import { scorePriority, priorityBucket, type PrioritySignals } from '../priority';

const BASE: PrioritySignals = {
  subject: 'Weekly notes',
  body: 'Notes from this week.',
  sentiment: 'Neutral',
  keywords: [],
  entities: [],
  isStarred: false,
  isGmailImportant: false,
  hasActionItems: false,
  needsFollowup: false,
};

describe('isContentImportant', () => {
  it('weighs urgency words in the subject', () => {
    expect(isContentImportant({ ...BASE, subject: 'URGENT: action required' })).toBe(true);
  });

  it('stays false for plain content', () => {
    expect(isContentImportant(BASE)).toBe(false);
    expect(
      isContentImportant({
        ...BASE,
        keywords: [
          { word: 'alpha', score: 0.9 },
          { word: 'bravo', score: 0.9 },
          { word: 'charlie', score: 0.9 },
          { word: 'delta', score: 0.9 },
        ],
      })
    ).toBe(false);
  });
});

describe('scorePriority', () => {
  it('starts from the base score', () => {
    expect(scorePriority(BASE)).toEqual({ score: 5, isImportant: false, contributions: [] });
  });

  it('is monotonic in action items and follow-up', () => {
    expect(scorePriority({ ...BASE, hasActionItems: true }).score).toBe(5.5);
    expect(scorePriority({ ...BASE, needsFollowup: true }).score).toBe(5.7);
    expect(scorePriority({ ...BASE, hasActionItems: true, needsFollowup: true }).score).toBe(6.2);
  });

  it('marks Gmail-important emails as important', () => {
    const result = scorePriority({ ...BASE, isGmailImportant: true });

    expect(result.score).toBe(7);
    expect(result.isImportant).toBe(true);
    expect(result.contributions).toEqual([{ name: 'gmailImportant', contribution: 2 }]);
  });

  it('marks high scores as important without the Gmail flag', () => {
    const result = scorePriority({ ...BASE, isStarred: true, sentiment: 'Urgent' });

    expect(result.score).toBe(7.5);
    expect(result.isImportant).toBe(true);
  });

  it('clamps to 10', () => {
    const result = scorePriority({
      subject: 'URGENT: action required',
      body: 'Please respond as soon as possible.',
      sentiment: 'Urgent',
      keywords: [],
      entities: [
        { text: 'Ann Lee', type: 'PERSON' },
        { text: 'Bo Chan', type: 'PERSON' },
        { text: 'Cy Ortiz', type: 'PERSON' },
        { text: 'Acme Corp', type: 'ORG' },
      ],
      isStarred: true,
      isGmailImportant: true,
      hasActionItems: true,
      needsFollowup: true,
    });

    expect(result.score).toBe(10);
  });
});

describe('priorityBucket', () => {
  it('splits scores into low, medium and high', () => {
    expect(priorityBucket(3)).toBe('low');
    expect(priorityBucket(3.1)).toBe('medium');
    expect(priorityBucket(7)).toBe('medium');
    expect(priorityBucket(7.1)).toBe('high');
  });
});
