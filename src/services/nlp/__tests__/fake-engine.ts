/**
 * In-process NlpEngine for pipeline tests. Sentences split after terminal
 * punctuation; entities are the configured ones that occur in the text.
 */

import type { Entity } from '@/types/annotation';
import type { NlpEngine } from '../types';

export interface FakeEngineOptions {
  entities?: Entity[];
  sentiment?: number;
}

export function createFakeEngine(options: FakeEngineOptions = {}): NlpEngine {
  return {
    sentences: (text) =>
      text
        .split(/(?<=[.!?])\s+/)
        .map((sentence) => sentence.trim())
        .filter(Boolean),
    entities: (text) => (options.entities ?? []).filter((entity) => text.includes(entity.text)),
    sentiment: () => options.sentiment ?? 0,
  };
}
