/**
 * Processors Module
 *
 * @module services/processors
 */

export { EmailProcessor, minimalAnnotation } from './email-processor';
export type { ProcessingContext, ProcessingError, ProcessingOutcome } from './email-processor';

export { BatchProcessor } from './batch-processor';
export type { BatchOptions, BatchResult } from './batch-processor';
