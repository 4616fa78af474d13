/**
 * Feature extractors: summary, entities, keywords, sentiment, contacts.
 * Each consumes clean text and is independent of the others.
 *
 * @module services/extractors
 */

export { summarize, detectContentType, truncateSummary, summarizeReceipt, summarizeList, rankSentences } from './summarizer';
export { extractEntities } from './entity-extractor';
export { extractKeywords, tokenize } from './keyword-extractor';
export { scoreSentiment, labelSentiment, SENTIMENT_RULES } from './sentiment-scorer';
export { extractContacts } from './contact-extractor';
