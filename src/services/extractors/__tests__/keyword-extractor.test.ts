import { describe, it, expect } from 'vitest';
import { extractKeywords, tokenize } from '../keyword-extractor';

describe('extractKeywords', () => {
  it('scores counts against the L2 norm', () => {
    expect(extractKeywords('budget budget review meeting friday notes')).toEqual([
      { word: 'budget', score: 0.7071 },
      { word: 'friday', score: 0.3536 },
      { word: 'meeting', score: 0.3536 },
      { word: 'notes', score: 0.3536 },
      { word: 'review', score: 0.3536 },
    ]);
  });

  it('returns nothing for fewer than five tokens', () => {
    expect(extractKeywords('budget review meeting friday')).toEqual([]);
    expect(extractKeywords('')).toEqual([]);
  });

  it('keeps at most topN words', () => {
    const text = 'alpha bravo charlie delta echo foxtrot golf hotel india juliet kilo lima';
    expect(extractKeywords(text, 3).map((k) => k.word)).toEqual(['alpha', 'bravo', 'charlie']);
  });
});

describe('tokenize', () => {
  it('drops punctuation, stopwords and short words', () => {
    expect(tokenize('The Q3 report, is it ready?!')).toEqual(['report', 'ready']);
  });
});
