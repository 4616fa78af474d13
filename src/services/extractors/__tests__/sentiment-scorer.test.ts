import { describe, it, expect } from 'vitest';
import { createFakeEngine } from '@/services/nlp/__tests__/fake-engine';
import { labelSentiment, scoreSentiment } from '../sentiment-scorer';

describe('labelSentiment', () => {
  it('puts urgency first', () => {
    expect(labelSentiment('Please reply ASAP', 0.9)).toBe('Urgent');
  });

  it('keeps threshold values neutral', () => {
    expect(labelSentiment('fine', 0.05)).toBe('Neutral');
    expect(labelSentiment('fine', -0.05)).toBe('Neutral');
  });

  it('labels scores beyond the thresholds', () => {
    expect(labelSentiment('great', 0.06)).toBe('Positive');
    expect(labelSentiment('bad', -0.3)).toBe('Negative');
  });
});

describe('scoreSentiment', () => {
  it('is neutral for empty text', () => {
    expect(scoreSentiment('  ', createFakeEngine({ sentiment: 0.8 }))).toEqual({ label: 'Neutral', score: 0 });
  });

  it('clamps the engine score to [-1, 1]', () => {
    expect(scoreSentiment('wonderful news', createFakeEngine({ sentiment: 3 }))).toEqual({
      label: 'Positive',
      score: 1,
    });
  });

  it('treats a non-finite score as zero', () => {
    expect(scoreSentiment('hmm', createFakeEngine({ sentiment: Number.NaN }))).toEqual({
      label: 'Neutral',
      score: 0,
    });
  });
});
