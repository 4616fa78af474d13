/**
 * Annotation Pipeline Configuration
 *
 * Thresholds, weights and phrase lists used by the normalizer, extractors
 * and classifiers. Longer word lists live in `config/data/*.json`.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * PRIORITY WEIGHTS
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Every weight is non-negative. A signal being present can only raise the
 * priority score, never lower it.
 *
 * @module config/pipeline
 */

import categoryTerms from './data/category-terms.json';
import stopwords from './data/stopwords.json';
import locations from './data/locations.json';
import jobTitles from './data/job-titles.json';

// ═══════════════════════════════════════════════════════════════════════════════
// NORMALIZER
// ═══════════════════════════════════════════════════════════════════════════════

export const NORMALIZER_CONFIG = {
  /** Lines matching one of these start a signature block */
  signatureMarkers: [
    /^--\s*$/,
    /^best regards\b/i,
    /^regards,/i,
    /^sincerely,/i,
    /^thank you,\s*$/i,
    /^thanks,\s*$/i,
    /^sent from my \w+/i,
    /^get outlook for\b/i,
  ],
  /** A signature cut that would remove more than this share of a long text is skipped */
  maxSignatureRemovalRatio: 0.8,
  /** Texts shorter than this are always cut at the signature marker */
  signatureRatioMinLength: 200,
  /** Reply-parser output shorter than this falls back to its input */
  minVisibleReplyChars: 10,
} as const;

// ═══════════════════════════════════════════════════════════════════════════════
// SUMMARIZER
// ═══════════════════════════════════════════════════════════════════════════════

export const SUMMARIZER_CONFIG = {
  maxChars: 280,
  placeholder: 'No content to summarize.',
  /** Inputs shorter than this are returned as they are */
  minChars: 10,
  sentenceCount: 3,
  positionWeight: 1.5,
  shortSentenceWords: 3,
  shortSentenceWeight: 0.5,
  longSentenceWords: 25,
  longSentenceWeight: 0.7,
  maxListedReceiptItems: 3,
} as const;

// ═══════════════════════════════════════════════════════════════════════════════
// KEYWORDS
// ═══════════════════════════════════════════════════════════════════════════════

export const KEYWORD_CONFIG = {
  topN: 10,
  minTokens: 5,
  minWordLength: 3,
  stopwords: new Set<string>(stopwords),
} as const;

// ═══════════════════════════════════════════════════════════════════════════════
// SENTIMENT
// ═══════════════════════════════════════════════════════════════════════════════

export const SENTIMENT_CONFIG = {
  /** Scores strictly above this are Positive; exactly this value is Neutral */
  positiveThreshold: 0.05,
  /** Scores strictly below this are Negative; exactly this value is Neutral */
  negativeThreshold: -0.05,
  urgencyTerms: ['urgent', 'asap', 'immediately', 'deadline', 'critical', 'emergency'],
} as const;

// ═══════════════════════════════════════════════════════════════════════════════
// ACTION ITEMS & FOLLOW-UP
// ═══════════════════════════════════════════════════════════════════════════════

export const ACTION_PHRASES = [
  'please',
  'would you',
  'could you',
  'can you',
  'need you to',
  'should',
  'must',
  'review',
  'update',
  'create',
  'send',
  'share',
  'prepare',
  'complete',
  'follow up',
  'call',
  'email',
  'submit',
  'provide',
  'check',
  'confirm',
  'schedule',
  'organize',
] as const;

export const FOLLOWUP_PHRASES = [
  'follow up',
  'followup',
  'follow-up',
  'get back to',
  'let me know',
  'waiting for your response',
  'waiting for your reply',
  'looking forward to hearing',
  'would appreciate your response',
  'please respond',
  'hope to hear',
  "let's discuss",
  'will you be able to',
] as const;

export const DEADLINE_CONFIG = {
  /** Hour used for "end of day" and "end of week" */
  endOfDayHour: 17,
  /** Business days after the reference date when no date is found */
  followupDefaultBusinessDays: 1,
} as const;

// ═══════════════════════════════════════════════════════════════════════════════
// IMPORTANCE & PRIORITY
// ═══════════════════════════════════════════════════════════════════════════════

export const IMPORTANCE_CONFIG = {
  subjectUrgentWords: [
    'urgent',
    'important',
    'critical',
    'deadline',
    'asap',
    'attention',
    'immediately',
    'required',
    'action',
  ],
  bodyUrgentPhrases: [
    'as soon as possible',
    'urgent matter',
    'immediate attention',
    'please respond',
    'need your input',
    'action required',
    'deadline',
    'by tomorrow',
    'high priority',
  ],
  subjectWordWeight: 2,
  bodyPhraseWeight: 1,
  peopleOrgWeight: 0.5,
  topKeywordCount: 3,
  keywordWeight: 0.5,
  /** Content importance is flagged when its score is strictly above this */
  threshold: 3,
} as const;

export const PRIORITY_WEIGHTS = {
  base: 5,
  gmailImportant: 2,
  gmailStarred: 1,
  contentImportant: 2,
  sentimentUrgent: 1.5,
  sentimentNegative: 1,
  subjectUrgency: 0.5,
  manyPeople: 0.5,
  organization: 0.3,
  actionItems: 0.5,
  followup: 0.7,
} as const;

export const PRIORITY_CONFIG = {
  min: 0,
  max: 10,
  /** Scores at or above this mark an email as important */
  importanceThreshold: 7,
  /** More than this many PERSON entities adds the manyPeople weight */
  manyPeopleCount: 2,
  /** Statistics buckets: low <= lowMax, medium <= mediumMax, else high */
  lowMax: 3,
  mediumMax: 7,
} as const;

// ═══════════════════════════════════════════════════════════════════════════════
// CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

export const EMAIL_CATEGORIES = [
  'Meeting',
  'Sales',
  'Update',
  'Personal',
  'Finance',
  'Technical',
  'Promotional',
  'Other',
] as const;

export type EmailCategory = (typeof EMAIL_CATEGORIES)[number];

export const CATEGORY_CONFIG = {
  terms: categoryTerms,
  meetingEntityWeight: 0.5,
  minScore: 2,
} as const;

// ═══════════════════════════════════════════════════════════════════════════════
// ENTITIES & CONTACTS
// ═══════════════════════════════════════════════════════════════════════════════

export const ENTITY_CONFIG = {
  locations,
  organizationSuffixes: [
    'Inc',
    'Corp',
    'Corporation',
    'LLC',
    'Ltd',
    'Group',
    'Company',
    'Technologies',
    'Labs',
    'Bank',
    'University',
  ],
} as const;

export const CONTACT_CONFIG = {
  nameWindow: 100,
  detailWindow: 200,
  jobTitles,
} as const;
