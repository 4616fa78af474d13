import { describe, it, expect, vi } from 'vitest';
import { createFakeEngine } from '@/services/nlp/__tests__/fake-engine';
import type { RawEmail } from '@/types/annotation';
import { BatchProcessor } from '../batch-processor';
import { EmailProcessor, type ProcessingContext, type ProcessingOutcome } from '../email-processor';

class ExplodingProcessor extends EmailProcessor {
  async process(raw: RawEmail, context?: ProcessingContext): Promise<ProcessingOutcome> {
    if (raw.id === 'bad') throw new Error('exploded');
    return super.process(raw, context);
  }
}

function rawEmail(id: string): RawEmail {
  return {
    id,
    subject: `Subject ${id}`,
    sender: 'Sender',
    senderEmail: 'sender@example.com',
    receivedAt: '2026-01-05T08:00:00.000Z',
    body: 'Short note about the launch plan.',
    mimeType: 'text/plain',
    isStarred: false,
    isImportantFlag: false,
  };
}

describe('BatchProcessor', () => {
  it('keeps going after one email fails', async () => {
    const batch = new BatchProcessor(new ExplodingProcessor(createFakeEngine()));
    const onProgress = vi.fn();
    const emails = ['a', 'b', 'bad', 'c', 'd'].map(rawEmail);

    const result = await batch.processBatch(emails, {}, { batchSize: 2, delayBetweenBatchesMs: 0, onProgress });

    expect(result.totalEmails).toBe(5);
    expect(result.successCount).toBe(4);
    expect(result.failureCount).toBe(1);
    expect(result.errors).toEqual([{ emailId: 'bad', stage: 'processor', error: 'exploded' }]);
    expect([...result.outcomes.keys()]).toEqual(['a', 'b', 'bad', 'c', 'd']);
    expect(onProgress.mock.calls).toEqual([
      [2, 5],
      [4, 5],
      [5, 5],
    ]);
  });

  it('handles an empty list', async () => {
    const batch = new BatchProcessor(new EmailProcessor(createFakeEngine()));
    const result = await batch.processBatch([]);

    expect(result.totalEmails).toBe(0);
    expect(result.outcomes.size).toBe(0);
  });
});
