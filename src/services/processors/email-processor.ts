/**
 * Email Processor Service
 *
 * Runs one raw email through the annotation pipeline and assembles the
 * immutable `AnnotatedEmail` record.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * PROCESSING PIPELINE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * PHASE 0: Normalization
 *   - HTML to text, quoted replies, signatures, whitespace
 *
 * PHASE 1: Feature extractors (run concurrently)
 *   - Summary, entities, keywords, sentiment, contacts
 *
 * PHASE 2: Heuristic classifiers (wait on Phase 1 fragments)
 *   - Action items, follow-up, category, priority
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * ERROR HANDLING STRATEGY
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * - Every stage is wrapped; a failed stage leaves its field null (lists empty)
 *   and is reported in `errors`
 * - If normalization itself fails, the outcome carries a minimal annotation
 *   where only `isImportant` (the Gmail flag) is set
 * - `process()` never throws
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * USAGE EXAMPLE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * ```typescript
 * import { getNlpEngine } from '@/services/nlp';
 * import { EmailProcessor } from '@/services/processors';
 *
 * const processor = new EmailProcessor(getNlpEngine());
 * const outcome = await processor.process(rawEmail, { referenceDate: new Date() });
 *
 * if (outcome.success) {
 *   console.log(outcome.annotation.priorityScore);
 * }
 * ```
 *
 * @module services/processors/email-processor
 */

import { appConfig } from '@/config/app';
import { createLogger, logPipeline } from '@/lib/utils/logger';
import { normalizeContent } from '@/services/normalizer';
import {
  summarize,
  extractEntities,
  extractKeywords,
  scoreSentiment,
  extractContacts,
} from '@/services/extractors';
import { detectActionItems, detectFollowup, categorize, scorePriority } from '@/services/classifiers';
import type { NlpEngine } from '@/services/nlp';
import type {
  AnnotatedEmail,
  ActionItem,
  Contact,
  Entity,
  FollowupResult,
  Keyword,
  RawEmail,
  SentimentResult,
} from '@/types/annotation';

// ═══════════════════════════════════════════════════════════════════════════════
// LOGGER
// ═══════════════════════════════════════════════════════════════════════════════

const logger = createLogger('EmailProcessor');

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Per-call context.
 */
export interface ProcessingContext {
  /**
   * Date that relative deadlines ("by Friday") are resolved against.
   * Default: the current time
   */
  referenceDate?: Date;
}

export interface ProcessingError {
  /** Pipeline stage that failed, e.g. 'entities' */
  stage: string;
  error: string;
}

export interface ProcessingOutcome {
  emailId: string;
  /** False when normalization failed and only a minimal annotation exists */
  success: boolean;
  annotation: AnnotatedEmail;
  errors: ProcessingError[];
  durationMs: number;
}

type StageResult<T> = { ok: true; value: T } | { ok: false; error: string };

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Annotation for an email the pipeline could not process: no derived fields,
 * importance taken from Gmail alone.
 */
export function minimalAnnotation(raw: RawEmail): AnnotatedEmail {
  return {
    normalizedBody: null,
    summary: null,
    category: null,
    sentimentLabel: null,
    sentimentScore: null,
    priorityScore: null,
    isImportant: raw.isImportantFlag,
    needsFollowup: false,
    followupDate: null,
    entities: [],
    keywords: [],
    actionItems: [],
    contacts: [],
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ═══════════════════════════════════════════════════════════════════════════════
// EMAIL PROCESSOR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Email Processor
 *
 * Holds the NLP engine handle it was built with; nothing on the instance
 * changes between calls, so one processor can serve concurrent emails.
 */
export class EmailProcessor {
  constructor(private readonly engine: NlpEngine) {}

  // ═══════════════════════════════════════════════════════════════════════════
  // PUBLIC METHODS
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Annotates a single email.
   *
   * @returns The outcome, with per-stage errors; never rejects
   */
  async process(raw: RawEmail, context: ProcessingContext = {}): Promise<ProcessingOutcome> {
    const startTime = Date.now();
    const reference = context.referenceDate ?? new Date();
    const errors: ProcessingError[] = [];

    logger.start('Processing email', {
      emailId: raw.id,
      subject: raw.subject.substring(0, 50),
      sender: raw.senderEmail,
    });

    // ─────────────────────────────────────────────────────────────────────────
    // PHASE 0: Normalization
    // ─────────────────────────────────────────────────────────────────────────
    const normalized = await this.runStage('normalize', errors, raw.id, () =>
      normalizeContent(raw.body.slice(0, appConfig.email.maxBodyChars), raw.mimeType)
    );

    if (!normalized.ok) {
      logger.error('Email could not be normalized', { emailId: raw.id, error: normalized.error });
      return {
        emailId: raw.id,
        success: false,
        annotation: minimalAnnotation(raw),
        errors,
        durationMs: Date.now() - startTime,
      };
    }

    const text = normalized.value;
    const engine = this.engine;

    // ─────────────────────────────────────────────────────────────────────────
    // PHASE 1: Feature extractors in parallel
    // ─────────────────────────────────────────────────────────────────────────
    const [summary, entities, keywords, sentiment, contacts] = await Promise.all([
      this.runStage('summary', errors, raw.id, () => summarize(text, engine)),
      this.runStage('entities', errors, raw.id, (): Entity[] => extractEntities(text, engine)),
      this.runStage('keywords', errors, raw.id, (): Keyword[] => extractKeywords(text)),
      this.runStage('sentiment', errors, raw.id, (): SentimentResult => scoreSentiment(text, engine)),
      this.runStage('contacts', errors, raw.id, (): Contact[] => extractContacts(text, engine)),
    ]);

    const entityList = entities.ok ? entities.value : [];
    const keywordList = keywords.ok ? keywords.value : [];

    // ─────────────────────────────────────────────────────────────────────────
    // PHASE 2: Classifiers
    // ─────────────────────────────────────────────────────────────────────────
    const [actionItems, followup, category] = await Promise.all([
      this.runStage('actionItems', errors, raw.id, (): ActionItem[] =>
        detectActionItems(text, engine, reference)
      ),
      this.runStage('followup', errors, raw.id, (): FollowupResult =>
        detectFollowup(raw.subject, text, reference)
      ),
      this.runStage('category', errors, raw.id, () => categorize(raw.subject, text, entityList)),
    ]);

    const actionItemList = actionItems.ok ? actionItems.value : [];
    const followupResult = followup.ok ? followup.value : null;

    const priority = await this.runStage('priority', errors, raw.id, () =>
      scorePriority({
        subject: raw.subject,
        body: text,
        sentiment: sentiment.ok ? sentiment.value.label : 'Neutral',
        keywords: keywordList,
        entities: entityList,
        isStarred: raw.isStarred,
        isGmailImportant: raw.isImportantFlag,
        hasActionItems: actionItemList.length > 0,
        needsFollowup: followupResult?.needsFollowup ?? false,
      })
    );

    const annotation: AnnotatedEmail = {
      normalizedBody: text,
      summary: summary.ok ? summary.value : null,
      category: category.ok ? category.value : null,
      sentimentLabel: sentiment.ok ? sentiment.value.label : null,
      sentimentScore: sentiment.ok ? sentiment.value.score : null,
      priorityScore: priority.ok ? priority.value.score : null,
      isImportant: priority.ok ? priority.value.isImportant : raw.isImportantFlag,
      needsFollowup: followupResult?.needsFollowup ?? false,
      followupDate: followupResult?.followupDate ?? null,
      entities: entityList,
      keywords: keywordList,
      actionItems: actionItemList,
      contacts: contacts.ok ? contacts.value : [],
    };

    const durationMs = Date.now() - startTime;

    logPipeline.emailProcessed({
      emailId: raw.id,
      category: annotation.category,
      priorityScore: annotation.priorityScore,
      failedStages: errors.length,
      durationMs,
    });

    return { emailId: raw.id, success: true, annotation, errors, durationMs };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // PRIVATE METHODS
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Runs one stage, recording a failure instead of throwing.
   */
  private async runStage<T>(
    stage: string,
    errors: ProcessingError[],
    emailId: string,
    run: () => T
  ): Promise<StageResult<T>> {
    try {
      return { ok: true, value: run() };
    } catch (error) {
      const message = errorMessage(error);
      logPipeline.stageFailed(stage, { emailId, error: message });
      errors.push({ stage, error: message });
      return { ok: false, error: message };
    }
  }
}
