import { describe, it, expect } from 'vitest';
import {
  getPresetQueries,
  getPresetQuery,
  installPresetQueries,
} from '../../../src/engine/query/preset-queries.js';
import { PredefinedQueryStore } from '../../../src/engine/query/predefined.js';
import { NameRegistry } from '../../../src/engine/query/registry.js';
import { createTestRegistry } from './helpers.js';

describe('Preset queries', () => {
  it('4 つのプリセットが定義されている', () => {
    expect(getPresetQueries().map((p) => p.name)).toEqual([
      'anything',
      'nothing',
      'airAbove',
      'hasWater',
    ]);
  });

  it('getPresetQuery は名前で検索し、なければ undefined', () => {
    expect(getPresetQuery('airAbove')?.description).toBe('The position directly above is empty.');
    expect(getPresetQuery('missing')).toBeUndefined();
  });

  it('water マテリアルがあれば hasWater は水マテリアルを保持する', () => {
    const registry = createTestRegistry();
    const predicate = getPresetQuery('hasWater')?.create(registry);

    expect(predicate?.kind).toBe('hasAdjacentWater');
    if (predicate?.kind !== 'hasAdjacentWater') return;
    expect(predicate.water).toBe(registry.resolveMaterialTag('water'));
  });

  it('installPresetQueries はレジストリが対応できるものだけ登録する', () => {
    const store = new PredefinedQueryStore();
    const installed = installPresetQueries(store, new NameRegistry());

    expect(installed).toEqual(['anything', 'nothing', 'airAbove']);
    expect(store.has('hasWater')).toBe(false);
  });

  it('すべて揃っていれば 4 つとも登録する', () => {
    const store = new PredefinedQueryStore();
    expect(installPresetQueries(store, createTestRegistry())).toHaveLength(4);
    expect(store.lookup('airAbove')?.kind).toBe('hasAirAbove');
  });
});
