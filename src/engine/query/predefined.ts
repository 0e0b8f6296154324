/**
 * blockquery — Predefined query store
 *
 * Name → compiled predicate table consulted for `@name` references.
 * Populated by the host before compiling, then optionally frozen.
 * Re-registering a name replaces the earlier predicate.
 */

import { RegistryFrozenError } from './types.js';
import type { Predicate, PredefinedQueryLookup } from './types.js';

export class PredefinedQueryStore implements PredefinedQueryLookup {
  private readonly queries: Map<string, Predicate> = new Map();
  private frozen = false;

  register(name: string, predicate: Predicate): void {
    if (this.frozen) {
      throw new RegistryFrozenError('the predefined query store');
    }
    this.queries.set(name, predicate);
  }

  lookup(name: string): Predicate | undefined {
    return this.queries.get(name);
  }

  has(name: string): boolean {
    return this.queries.has(name);
  }

  /** Registered names in registration order. */
  names(): string[] {
    return [...this.queries.keys()];
  }

  get size(): number {
    return this.queries.size;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  freeze(): void {
    this.frozen = true;
  }
}
