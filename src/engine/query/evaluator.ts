/**
 * blockquery — Predicate evaluator
 *
 * Walks a compiled Predicate against a world accessor at one position.
 * Pure and re-entrant: nothing is cached and the world is only read.
 * Lookup misses (absent property, unknown neighbour) evaluate to false.
 */

import { isTypeTagDerivedFrom } from './registry.js';
import type { Position, Predicate, WorldView } from './types.js';

/** Horizontal neighbour offsets: west, east, north, south */
const HORIZONTAL_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [-1, 0],
  [1, 0],
  [0, -1],
  [0, 1],
];

/**
 * Evaluate `predicate` at `position`.
 *
 * AND / OR children are evaluated in source order and stop at the
 * first child that decides the result.
 */
export function matches(predicate: Predicate, world: WorldView, position: Position): boolean {
  switch (predicate.kind) {
    case 'matchAny':
      return true;
    case 'matchNone':
      return false;
    case 'or':
      for (const child of predicate.children) {
        if (matches(child, world, position)) {
          return true;
        }
      }
      return false;
    case 'and':
      for (const child of predicate.children) {
        if (!matches(child, world, position)) {
          return false;
        }
      }
      return true;
    case 'not':
      return !matches(predicate.child, world, position);
    case 'byIdentity':
      return world.stateAt(position).identifier() === predicate.identifier;
    case 'byStateValue':
      return world.stateAt(position).stateKey() === predicate.stateKey;
    case 'byTypeTag': {
      const tag = world.stateAt(position).typeTag();
      return predicate.strict ? tag === predicate.tag : isTypeTagDerivedFrom(tag, predicate.tag);
    }
    case 'byProperty': {
      const value = world.stateAt(position).propertyValue(predicate.name);
      return value !== undefined && predicate.values.includes(value.toLowerCase());
    }
    case 'byMaterialTag':
      return world.stateAt(position).materialTag() === predicate.material;
    case 'hasAdjacentWater':
      return HORIZONTAL_OFFSETS.some(
        ([dx, dz]) =>
          world.stateAt({ x: position.x + dx, y: position.y, z: position.z + dz }).materialTag() ===
          predicate.water,
      );
    case 'hasAirAbove':
      return world.isEmpty({ x: position.x, y: position.y + 1, z: position.z });
    case 'inAltitudeRange':
      return position.y >= predicate.minHeight && position.y <= predicate.maxHeight;
  }
}
