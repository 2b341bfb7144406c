import type { ActionRegistry } from '../config/registry.js';

/**
 * Single-slot holder for the live registry. Readers keep whatever snapshot `current()` handed them; a
 * `replace()` only affects later `current()` calls.
 */
export class RegistrySwapGate {
  private snapshot: ActionRegistry;

  private generation = 0;

  constructor(initial: ActionRegistry) {
    this.snapshot = initial;
  }

  current(): ActionRegistry {
    return this.snapshot;
  }

  replace(next: ActionRegistry): void {
    this.snapshot = next;
    this.generation += 1;
  }

  /**
   * Number of replacements so far.
   */
  get version(): number {
    return this.generation;
  }
}
