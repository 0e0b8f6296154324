/**
 * blockquery — Predicate construction helpers
 *
 * Every node is frozen when built. AND / OR nodes are assembled with
 * CombinatorBuilder and collapse to their only child when finalized.
 */

import type { MaterialTag, Predicate, StateView, TypeTag } from './types.js';

function freeze(node: Predicate): Predicate {
  return Object.freeze(node);
}

const MATCH_ANY = freeze({ kind: 'matchAny' });
const MATCH_NONE = freeze({ kind: 'matchNone' });
const HAS_AIR_ABOVE = freeze({ kind: 'hasAirAbove' });

/**
 * Ordered builder for AND / OR nodes.
 *
 * build() returns the identity predicate for no children (matchAny for AND,
 * matchNone for OR), the child itself for a single child, and a frozen
 * combinator otherwise.
 */
export class CombinatorBuilder {
  private readonly kind: 'and' | 'or';
  private readonly children: Predicate[] = [];

  constructor(kind: 'and' | 'or') {
    this.kind = kind;
  }

  add(child: Predicate): this {
    this.children.push(child);
    return this;
  }

  get size(): number {
    return this.children.length;
  }

  build(): Predicate {
    if (this.children.length === 0) {
      return this.kind === 'and' ? MATCH_ANY : MATCH_NONE;
    }
    if (this.children.length === 1) {
      return this.children[0];
    }
    const children = Object.freeze([...this.children]);
    return freeze({ kind: this.kind, children });
  }
}

export function matchAny(): Predicate {
  return MATCH_ANY;
}

export function matchNone(): Predicate {
  return MATCH_NONE;
}

export function and(...children: Predicate[]): Predicate {
  const builder = new CombinatorBuilder('and');
  for (const child of children) builder.add(child);
  return builder.build();
}

export function or(...children: Predicate[]): Predicate {
  const builder = new CombinatorBuilder('or');
  for (const child of children) builder.add(child);
  return builder.build();
}

export function not(child: Predicate): Predicate {
  return freeze({ kind: 'not', child });
}

export function byIdentity(identifier: string): Predicate {
  return freeze({ kind: 'byIdentity', identifier });
}

/** Match exactly the given state (same block, same property values). */
export function byStateValue(state: StateView): Predicate {
  return freeze({ kind: 'byStateValue', stateKey: state.stateKey() });
}

export function byTypeTag(tag: TypeTag, strict = false): Predicate {
  return freeze({ kind: 'byTypeTag', tag, strict });
}

/** Property name and accepted values are stored lower-cased; duplicate values are dropped. */
export function byProperty(name: string, values: Iterable<string>): Predicate {
  const accepted = new Set<string>();
  for (const value of values) accepted.add(value.toLowerCase());
  return freeze({
    kind: 'byProperty',
    name: name.toLowerCase(),
    values: Object.freeze([...accepted]),
  });
}

export function byMaterialTag(material: MaterialTag): Predicate {
  return freeze({ kind: 'byMaterialTag', material });
}

export function hasAdjacentWater(water: MaterialTag): Predicate {
  return freeze({ kind: 'hasAdjacentWater', water });
}

export function hasAirAbove(): Predicate {
  return HAS_AIR_ABOVE;
}

/** Inclusive vertical range. An inverted range matches nothing. */
export function inAltitudeRange(minHeight: number, maxHeight: number): Predicate {
  return freeze({ kind: 'inAltitudeRange', minHeight, maxHeight });
}
