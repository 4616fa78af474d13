/**
 * Named-entity extraction through the injected NLP engine.
 *
 * @module services/extractors/entity-extractor
 */

import type { Entity } from '@/types/annotation';
import type { NlpEngine } from '@/services/nlp';

/**
 * Entities in order of first appearance, without repeats of the same
 * text and type.
 */
export function extractEntities(text: string, engine: NlpEngine): Entity[] {
  if (!text.trim()) return [];

  const seen = new Set<string>();
  const entities: Entity[] = [];

  for (const entity of engine.entities(text)) {
    const key = `${entity.type}:${entity.text}`;
    if (seen.has(key)) continue;

    seen.add(key);
    entities.push({ text: entity.text, type: entity.type });
  }

  return entities;
}
