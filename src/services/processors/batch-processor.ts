/**
 * Batch Processor Service
 *
 * Annotates many emails in parallel chunks.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * BATCH PROCESSING STRATEGY
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * - Processes emails in configurable chunk sizes (default: 10)
 * - Runs emails within a chunk in parallel
 * - Adds a small delay between chunks
 * - One email's failure never stops the rest of the batch
 *
 * @module services/processors/batch-processor
 */

import { appConfig } from '@/config/app';
import { createLogger, logPipeline } from '@/lib/utils/logger';
import type { RawEmail } from '@/types/annotation';
import { EmailProcessor, minimalAnnotation, type ProcessingContext, type ProcessingOutcome } from './email-processor';

const logger = createLogger('BatchProcessor');

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface BatchOptions {
  /**
   * Emails processed in parallel per chunk.
   * Default: appConfig.email.batchSize
   */
  batchSize?: number;

  /**
   * Pause between chunks in milliseconds.
   * Default: appConfig.email.batchDelayMs
   */
  delayBetweenBatchesMs?: number;

  /**
   * Called after each chunk.
   */
  onProgress?: (completed: number, total: number) => void;
}

export interface BatchResult {
  totalEmails: number;
  successCount: number;
  failureCount: number;
  totalTimeMs: number;
  /** Outcome per email id */
  outcomes: Map<string, ProcessingOutcome>;
  errors: Array<{ emailId: string; stage: string; error: string }>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// BATCH PROCESSOR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class BatchProcessor {
  constructor(private readonly emailProcessor: EmailProcessor) {}

  /**
   * Processes a list of emails in chunks.
   *
   * @example
   * ```typescript
   * const batch = new BatchProcessor(new EmailProcessor(getNlpEngine()));
   * const result = await batch.processBatch(rawEmails, {}, { batchSize: 5 });
   * console.log(`Annotated ${result.successCount}/${result.totalEmails}`);
   * ```
   */
  async processBatch(
    emails: readonly RawEmail[],
    context: ProcessingContext = {},
    options: BatchOptions = {}
  ): Promise<BatchResult> {
    const batchSize = Math.max(1, options.batchSize ?? appConfig.email.batchSize);
    const delayMs = options.delayBetweenBatchesMs ?? appConfig.email.batchDelayMs;
    const startTime = Date.now();
    const totalEmails = emails.length;

    logger.start('Starting batch processing', { totalEmails, batchSize });

    const outcomes = new Map<string, ProcessingOutcome>();
    const errors: BatchResult['errors'] = [];
    let successCount = 0;
    let failureCount = 0;

    for (let i = 0; i < totalEmails; i += batchSize) {
      const chunk = emails.slice(i, i + batchSize);

      const chunkOutcomes = await Promise.all(
        chunk.map((email) => this.processEmail(email, context))
      );

      for (const outcome of chunkOutcomes) {
        outcomes.set(outcome.emailId, outcome);

        if (outcome.success) {
          successCount++;
        } else {
          failureCount++;
        }

        for (const error of outcome.errors) {
          errors.push({ emailId: outcome.emailId, ...error });
        }
      }

      options.onProgress?.(Math.min(i + batchSize, totalEmails), totalEmails);

      if (i + batchSize < totalEmails && delayMs > 0) {
        await this.delay(delayMs);
      }
    }

    const totalTimeMs = Date.now() - startTime;

    logPipeline.batchComplete({ totalEmails, successCount, failureCount, durationMs: totalTimeMs });

    return { totalEmails, successCount, failureCount, totalTimeMs, outcomes, errors };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // PRIVATE METHODS
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Never rejects: an unexpected error becomes a failed outcome.
   */
  private async processEmail(email: RawEmail, context: ProcessingContext): Promise<ProcessingOutcome> {
    try {
      return await this.emailProcessor.process(email, context);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error('Unexpected error processing email', { emailId: email.id, error: message });

      return {
        emailId: email.id,
        success: false,
        annotation: minimalAnnotation(email),
        errors: [{ stage: 'processor', error: message }],
        durationMs: 0,
      };
    }
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
