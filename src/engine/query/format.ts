/**
 * blockquery — Predicate formatter
 *
 * Renders a compiled predicate as a single line of text for diagnostics,
 * e.g. `or(block(core:grass), and(block(core:dirt), not(material(water))))`.
 */

import type { Predicate } from './types.js';

export function formatPredicate(predicate: Predicate): string {
  switch (predicate.kind) {
    case 'matchAny':
      return 'any';
    case 'matchNone':
      return 'none';
    case 'or':
    case 'and':
      return `${predicate.kind}(${predicate.children.map(formatPredicate).join(', ')})`;
    case 'not':
      return `not(${formatPredicate(predicate.child)})`;
    case 'byIdentity':
      return `block(${predicate.identifier})`;
    case 'byStateValue':
      return `state(${predicate.stateKey})`;
    case 'byTypeTag':
      return `${predicate.strict ? 'strictType' : 'type'}(${predicate.tag.name})`;
    case 'byProperty':
      return `property(${predicate.name}=${predicate.values.join('|')})`;
    case 'byMaterialTag':
      return `material(${predicate.material.name})`;
    case 'hasAdjacentWater':
      return `adjacent(${predicate.water.name})`;
    case 'hasAirAbove':
      return 'airAbove';
    case 'inAltitudeRange':
      return `altitude(${predicate.minHeight}..${predicate.maxHeight})`;
  }
}
