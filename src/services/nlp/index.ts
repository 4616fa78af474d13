/**
 * NLP engine exports and the process-wide engine handle.
 *
 * @module services/nlp
 */

import { createWinkEngine } from './wink-engine';
import type { NlpEngine } from './types';

export type { NlpEngine } from './types';
export { createWinkEngine } from './wink-engine';

let engine: NlpEngine | null = null;

/**
 * Returns the engine for this process, loading the model on first use.
 * Route handlers call this and pass the handle into the pipeline.
 */
export function getNlpEngine(): NlpEngine {
  if (!engine) {
    engine = createWinkEngine();
  }
  return engine;
}
