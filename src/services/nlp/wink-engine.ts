/**
 * 🧠 wink-nlp Engine
 *
 * `NlpEngine` backed by wink-nlp and its English lite model. Built-in
 * entity recognition covers dates, times and money; people, organizations
 * and places are taught to the model as custom entities when the engine is
 * constructed.
 *
 * The model is loaded once per engine. Construct the engine at process
 * level and pass it to the pipeline; nothing here is mutated per call.
 *
 * @module services/nlp/wink-engine
 */

import winkNLP from 'wink-nlp';
import type { ItemCustomEntity, ItemEntity } from 'wink-nlp';
import model from 'wink-eng-lite-web-model';
import { createLogger } from '@/lib/utils/logger';
import { ENTITY_CONFIG } from '@/config/pipeline';
import type { Entity, EntityType } from '@/types/annotation';
import type { NlpEngine } from './types';

const logger = createLogger('WinkEngine');

// ═══════════════════════════════════════════════════════════════════════════════
// ENTITY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/** wink built-in entity types we keep, mapped to ours */
const BUILTIN_ENTITY_TYPES: Readonly<Record<string, EntityType>> = {
  DATE: 'DATE',
  TIME: 'TIME',
  MONEY: 'MONEY',
};

const CUSTOM_ENTITY_TYPES: Readonly<Record<string, EntityType>> = {
  person: 'PERSON',
  organization: 'ORG',
  location: 'LOC',
};

/**
 * Custom entity patterns. wink matches literal words on their normalized
 * (lowercase) form, so literals are lowercased here.
 */
function buildCustomEntityPatterns(): Array<{ name: string; patterns: string[] }> {
  const suffixes = ENTITY_CONFIG.organizationSuffixes.map((s) => s.toLowerCase()).join('|');

  const locationPatterns = ENTITY_CONFIG.locations.map((place) =>
    place
      .toLowerCase()
      .split(/\s+/)
      .map((word) => `[${word}]`)
      .join(' ')
  );

  return [
    { name: 'organization', patterns: [`[PROPN] [${suffixes}]`, `[PROPN] [PROPN] [${suffixes}]`] },
    { name: 'location', patterns: locationPatterns },
    { name: 'person', patterns: ['[PROPN] [PROPN]'] },
  ];
}

function toText(value: unknown): string | null {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════════════════════

export function createWinkEngine(): NlpEngine {
  const startTime = Date.now();
  const nlp = winkNLP(model);
  const its = nlp.its;

  nlp.learnCustomEntities(buildCustomEntityPatterns());

  logger.info('wink-nlp model loaded', { durationMs: Date.now() - startTime });

  return {
    sentences(text) {
      if (!text.trim()) return [];

      const out: unknown = nlp.readDoc(text).sentences().out();
      if (!Array.isArray(out)) return [];

      return out
        .filter((sentence): sentence is string => typeof sentence === 'string')
        .map((sentence) => sentence.trim())
        .filter((sentence) => sentence.length > 0);
    },

    entities(text) {
      if (!text.trim()) return [];

      const doc = nlp.readDoc(text);
      const found: Entity[] = [];

      doc.customEntities().each((entity: ItemCustomEntity) => {
        const value = toText(entity.out());
        const kind = toText(entity.out(its.type));
        const type = kind ? CUSTOM_ENTITY_TYPES[kind] : undefined;
        if (value && type) found.push({ text: value, type });
      });

      doc.entities().each((entity: ItemEntity) => {
        const value = toText(entity.out());
        const kind = toText(entity.out(its.type));
        const type = kind ? BUILTIN_ENTITY_TYPES[kind] : undefined;
        if (value && type) found.push({ text: value, type });
      });

      return found;
    },

    sentiment(text) {
      if (!text.trim()) return 0;

      const score: unknown = nlp.readDoc(text).out(its.sentiment);
      if (typeof score !== 'number' || Number.isNaN(score)) return 0;

      return Math.max(-1, Math.min(1, score));
    },
  };
}
