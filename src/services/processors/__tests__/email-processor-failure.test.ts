import { describe, it, expect, vi } from 'vitest';
import type { RawEmail } from '@/types/annotation';
import { createFakeEngine } from '@/services/nlp/__tests__/fake-engine';
import { EmailProcessor, minimalAnnotation } from '../email-processor';

vi.mock('@/services/normalizer', () => ({
  normalizeContent: () => {
    throw new Error('normalizer exploded');
  },
}));

const raw: RawEmail = {
  id: 'msg-broken',
  subject: 'Quarterly numbers',
  sender: 'Finance',
  senderEmail: 'finance@example.com',
  receivedAt: '2026-01-05T08:00:00.000Z',
  body: '<p>Numbers attached</p>',
  mimeType: 'text/html',
  isStarred: true,
  isImportantFlag: true,
};

describe('EmailProcessor when normalization fails', () => {
  it('returns a minimal annotation instead of throwing', async () => {
    const outcome = await new EmailProcessor(createFakeEngine()).process(raw);

    expect(outcome.success).toBe(false);
    expect(outcome.annotation).toEqual(minimalAnnotation(raw));
    expect(outcome.annotation.isImportant).toBe(true);
    expect(outcome.errors).toEqual([{ stage: 'normalize', error: 'normalizer exploded' }]);
  });
});
