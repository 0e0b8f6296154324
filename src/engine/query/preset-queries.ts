/**
 * blockquery — Preset queries
 *
 * Built-in named predicates available to every query as `@name`.
 * The position-based predicates (neighbouring water, air above) have
 * no token of their own and are only reachable through these names.
 */

import { hasAdjacentWater, hasAirAbove, matchAny, matchNone } from './builder.js';
import type { PredefinedQueryStore } from './predefined.js';
import type { NameResolver, Predicate } from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PresetQuery {
  name: string;
  description: string;
  /** Builds the predicate, or returns undefined when the registry lacks what it needs */
  create(resolver: NameResolver): Predicate | undefined;
}

// ---------------------------------------------------------------------------
// Preset definitions
// ---------------------------------------------------------------------------

/** Material name looked up for `@hasWater` */
export const WATER_MATERIAL = 'water';

const PRESET_QUERIES: readonly PresetQuery[] = [
  {
    name: 'anything',
    description: 'Matches every position.',
    create: () => matchAny(),
  },
  {
    name: 'nothing',
    description: 'Matches no position.',
    create: () => matchNone(),
  },
  {
    name: 'airAbove',
    description: 'The position directly above is empty.',
    create: () => hasAirAbove(),
  },
  {
    name: 'hasWater',
    description: 'At least one horizontal neighbour has the water material.',
    create: (resolver) => {
      const water = resolver.resolveMaterialTag(WATER_MATERIAL);
      return water !== undefined ? hasAdjacentWater(water) : undefined;
    },
  },
];

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Return all preset query definitions. */
export function getPresetQueries(): readonly PresetQuery[] {
  return PRESET_QUERIES;
}

/** Find a preset query by name. */
export function getPresetQuery(name: string): PresetQuery | undefined {
  return PRESET_QUERIES.find((p) => p.name === name);
}

/**
 * Register every preset the resolver can support.
 *
 * @returns Names that were registered
 */
export function installPresetQueries(store: PredefinedQueryStore, resolver: NameResolver): string[] {
  const installed: string[] = [];
  for (const preset of PRESET_QUERIES) {
    const predicate = preset.create(resolver);
    if (predicate !== undefined) {
      store.register(preset.name, predicate);
      installed.push(preset.name);
    }
  }
  return installed;
}
