import { describe, it, expect } from 'vitest';
import type { Entity } from '@/types/annotation';
import { categorize, scoreCategories } from '../category';

describe('categorize', () => {
  it('picks the category with the most terms', () => {
    expect(categorize('Team meeting tomorrow', 'Can we schedule a call to discuss?', [])).toBe('Meeting');
  });

  it('falls back to Other below the minimum score', () => {
    expect(categorize('Hello', 'Just saying hi.', [])).toBe('Other');
    expect(categorize('Invoice and bug', '', [])).toBe('Other');
  });

  it('breaks ties by declaration order', () => {
    expect(categorize('invoice payment', 'bug fix', [])).toBe('Finance');
  });

  it('counts date and time entities toward Meeting', () => {
    const entities: Entity[] = [
      { text: 'Tuesday', type: 'DATE' },
      { text: '3pm', type: 'TIME' },
      { text: 'Jan 9', type: 'DATE' },
      { text: '10am', type: 'TIME' },
    ];

    expect(scoreCategories('Lunch', 'See you', entities).get('Meeting')).toBe(2);
    expect(categorize('Lunch', 'See you', entities)).toBe('Meeting');
  });
});
