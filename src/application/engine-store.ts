import type { ClassificationEngine } from './classification-engine.js';

/**
 * Holder for the live classification engine.
 *
 * Consumers call `get()` per event; a configuration reload builds a new
 * engine and swaps it in with `set()`. Both are synchronous, so an event
 * is always classified by one complete engine, never a mix of old and
 * new configuration.
 */
export class EngineStore {
  private engine: ClassificationEngine;

  constructor(initial: ClassificationEngine) {
    this.engine = initial;
  }

  get(): ClassificationEngine {
    return this.engine;
  }

  set(next: ClassificationEngine): void {
    this.engine = next;
  }
}
