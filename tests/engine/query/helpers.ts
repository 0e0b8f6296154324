/**
 * Shared fixtures for block query tests.
 */

import { NameRegistry } from '../../../src/engine/query/registry.js';
import { createQueryContext } from '../../../src/engine/query/index.js';
import type { QueryContext } from '../../../src/engine/query/index.js';
import type { Position, StateView, WorldView } from '../../../src/engine/query/types.js';

/**
 * Small registry:
 *   core.Block
 *   ├─ core.Air      core:air (empty)
 *   ├─ core.Liquid   core:water
 *   ├─ core.Stone    core:stone
 *   ├─ core.Grass    core:grass
 *   └─ core.Leaves   core:leaves
 *      └─ custom.RedLeaves  custom:red_leaves
 *   core:dirt uses core.Block directly.
 */
export function createTestRegistry(): NameRegistry {
  const registry = new NameRegistry();
  for (const material of ['air', 'water', 'rock', 'ground', 'grass', 'leaves']) {
    registry.defineMaterial(material);
  }
  registry.defineTypeTag('core.Block');
  registry.defineTypeTag('core.Air', 'core.Block');
  registry.defineTypeTag('core.Liquid', 'core.Block');
  registry.defineTypeTag('core.Stone', 'core.Block');
  registry.defineTypeTag('core.Grass', 'core.Block');
  registry.defineTypeTag('core.Leaves', 'core.Block');
  registry.defineTypeTag('custom.RedLeaves', 'core.Leaves');

  registry.defineBlock({ identifier: 'air', typeTag: 'core.Air', material: 'air', empty: true });
  registry.defineBlock({ identifier: 'water', typeTag: 'core.Liquid', material: 'water' });
  registry.defineBlock({ identifier: 'stone', typeTag: 'core.Stone', material: 'rock' });
  registry.defineBlock({ identifier: 'dirt', typeTag: 'core.Block', material: 'ground' });
  registry.defineBlock({ identifier: 'grass', typeTag: 'core.Grass', material: 'grass' });
  registry.defineBlock({ identifier: 'leaves', typeTag: 'core.Leaves', material: 'leaves' });
  registry.defineBlock({
    identifier: 'custom:red_leaves',
    typeTag: 'custom.RedLeaves',
    material: 'leaves',
  });
  return registry;
}

export function createTestContext(): QueryContext {
  return createQueryContext(createTestRegistry());
}

/** WorldView wrapper that counts block state lookups. */
export class CountingWorld implements WorldView {
  private readonly inner: WorldView;
  stateLookups = 0;

  constructor(inner: WorldView) {
    this.inner = inner;
  }

  stateAt(position: Position): StateView {
    this.stateLookups++;
    return this.inner.stateAt(position);
  }

  isEmpty(position: Position): boolean {
    return this.inner.isEmpty(position);
  }
}

export const ORIGIN: Position = { x: 0, y: 0, z: 0 };
