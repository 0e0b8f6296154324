import { describe, it, expect, beforeEach } from 'vitest';
import { matches } from '../../../src/engine/query/evaluator.js';
import { compile } from '../../../src/engine/query/parser.js';
import {
  byStateValue,
  inAltitudeRange,
  matchAny,
  matchNone,
} from '../../../src/engine/query/builder.js';
import type { QueryContext } from '../../../src/engine/query/index.js';
import type { Position } from '../../../src/engine/query/types.js';
import { VoxelWorld } from '../../../src/engine/world/voxel-world.js';
import { CountingWorld, ORIGIN, createTestContext } from './helpers.js';

describe('Evaluator', () => {
  let ctx: QueryContext;
  let world: VoxelWorld;

  /** Helper: compile and evaluate in one step */
  function test(spec: string, position: Position = ORIGIN): boolean {
    return matches(compile(spec, ctx), world, position);
  }

  beforeEach(() => {
    ctx = createTestContext();
    world = new VoxelWorld(ctx.registry);
  });

  // ============================================================
  // 基本シナリオ
  // ============================================================

  describe('ブロック識別子', () => {
    it('stone を置いた位置にのみ一致する', () => {
      world.set({ x: 0, y: 0, z: 0 }, 'stone');
      const predicate = compile('stone', ctx);

      expect(matches(predicate, world, { x: 0, y: 0, z: 0 })).toBe(true);
      expect(matches(predicate, world, { x: 1, y: 0, z: 0 })).toBe(false);
    });

    it('名前空間付きでも同じブロックに一致する', () => {
      world.set(ORIGIN, 'stone');
      expect(test('core:stone')).toBe(true);
    });
  });

  describe('プロパティ', () => {
    it('[variant=red|blue] は blue（大文字小文字問わず）に一致し green には一致しない', () => {
      const predicate = compile('[variant=red|blue]', ctx);
      const blue = { x: 0, y: 0, z: 0 };
      const upperBlue = { x: 1, y: 0, z: 0 };
      const green = { x: 2, y: 0, z: 0 };
      world.set(blue, 'stone', { variant: 'blue' });
      world.set(upperBlue, 'stone', { Variant: 'BLUE' });
      world.set(green, 'stone', { variant: 'green' });

      expect(matches(predicate, world, blue)).toBe(true);
      expect(matches(predicate, world, upperBlue)).toBe(true);
      expect(matches(predicate, world, green)).toBe(false);
    });

    it('プロパティがない状態には一致しない（エラーにならない）', () => {
      world.set(ORIGIN, 'stone');
      expect(test('[facing=up]')).toBe(false);
      expect(test('![facing=up]')).toBe(true);
    });

    it('[Facing=UP] と [facing=up] は同じ結果になる', () => {
      world.set(ORIGIN, 'leaves', { facing: 'Up' });
      expect(test('[Facing=UP]')).toBe(true);
      expect(test('[facing=up]')).toBe(true);
    });
  });

  describe('マテリアル', () => {
    it('!~water は water 以外のマテリアルすべてに一致する', () => {
      world.set({ x: 0, y: 0, z: 0 }, 'water');
      world.set({ x: 1, y: 0, z: 0 }, 'stone');
      world.set({ x: 2, y: 0, z: 0 }, 'leaves');

      expect(test('!~water', { x: 0, y: 0, z: 0 })).toBe(false);
      expect(test('!~water', { x: 1, y: 0, z: 0 })).toBe(true);
      expect(test('!~water', { x: 2, y: 0, z: 0 })).toBe(true);
      // 未設定の位置は air
      expect(test('!~water', { x: 3, y: 0, z: 0 })).toBe(true);
    });
  });

  describe('タイプタグ', () => {
    beforeEach(() => {
      world.set({ x: 0, y: 0, z: 0 }, 'leaves');
      world.set({ x: 1, y: 0, z: 0 }, 'custom:red_leaves');
      world.set({ x: 2, y: 0, z: 0 }, 'stone');
    });

    it('%Leaves は派生タイプにも一致する', () => {
      expect(test('%Leaves', { x: 0, y: 0, z: 0 })).toBe(true);
      expect(test('%Leaves', { x: 1, y: 0, z: 0 })).toBe(true);
      expect(test('%Leaves', { x: 2, y: 0, z: 0 })).toBe(false);
    });

    it('$Leaves は完全一致のみ', () => {
      expect(test('$Leaves', { x: 0, y: 0, z: 0 })).toBe(true);
      expect(test('$Leaves', { x: 1, y: 0, z: 0 })).toBe(false);
    });

    it('%Block はすべてのブロックに一致する', () => {
      expect(test('%Block', { x: 2, y: 0, z: 0 })).toBe(true);
      expect(test('%Block', { x: 9, y: 0, z: 0 })).toBe(true);
    });
  });

  // ============================================================
  // 優先順位・否定
  // ============================================================

  describe('優先順位', () => {
    it('"A,B" と "AB" は A のみ満たす状態で結果が異なる', () => {
      world.set(ORIGIN, 'stone');
      expect(test('stone,~grass')).toBe(true);
      expect(test('stone~grass')).toBe(false);
    });
  });

  describe('否定', () => {
    const specs = ['stone', '~rock', '%Leaves', '$Stone', '[variant=granite]', '@airAbove', '@hasWater'];

    it('単一トークンの S について !S は S の否定になる', () => {
      world.set({ x: 0, y: 0, z: 0 }, 'stone', { variant: 'granite' });
      world.set({ x: 1, y: 0, z: 0 }, 'water');
      world.set({ x: 2, y: 0, z: 0 }, 'leaves');
      world.set({ x: 2, y: 1, z: 0 }, 'dirt');
      const positions: Position[] = [
        { x: 0, y: 0, z: 0 },
        { x: 1, y: 0, z: 0 },
        { x: 2, y: 0, z: 0 },
        { x: 5, y: 5, z: 5 },
      ];

      for (const spec of specs) {
        for (const p of positions) {
          expect(test(`!${spec}`, p)).toBe(!test(spec, p));
        }
      }
    });
  });

  // ============================================================
  // 位置ベースの述語
  // ============================================================

  describe('@airAbove', () => {
    it('真上が空なら一致し、ブロックがあれば一致しない', () => {
      world.set(ORIGIN, 'grass');
      expect(test('grass @airAbove')).toBe(true);

      world.set({ x: 0, y: 1, z: 0 }, 'leaves');
      expect(test('grass @airAbove')).toBe(false);
    });
  });

  describe('@hasWater', () => {
    it('水平方向 4 近傍のいずれかが water なら一致する', () => {
      world.set({ x: 1, y: 0, z: 0 }, 'water');
      expect(test('@hasWater', { x: 0, y: 0, z: 0 })).toBe(true);
      expect(test('@hasWater', { x: 2, y: 0, z: 0 })).toBe(true);
      expect(test('@hasWater', { x: 1, y: 0, z: 1 })).toBe(true);
      expect(test('@hasWater', { x: 1, y: 0, z: -1 })).toBe(true);
    });

    it('斜め・上下の水は対象外', () => {
      world.set({ x: 1, y: 0, z: 1 }, 'water');
      world.set({ x: 0, y: 1, z: 0 }, 'water');
      world.set({ x: 0, y: -1, z: 0 }, 'water');
      expect(test('@hasWater', ORIGIN)).toBe(false);
    });
  });

  describe('inAltitudeRange', () => {
    it('y が範囲内（両端を含む）なら一致する', () => {
      const predicate = inAltitudeRange(0, 64);
      expect(matches(predicate, world, { x: 0, y: 0, z: 0 })).toBe(true);
      expect(matches(predicate, world, { x: 0, y: 64, z: 0 })).toBe(true);
      expect(matches(predicate, world, { x: 0, y: 65, z: 0 })).toBe(false);
      expect(matches(predicate, world, { x: 0, y: -1, z: 0 })).toBe(false);
    });

    it('逆転した範囲はどこにも一致しない', () => {
      expect(matches(inAltitudeRange(10, 5), world, { x: 0, y: 7, z: 0 })).toBe(false);
    });
  });

  describe('byStateValue', () => {
    it('ブロックとプロパティ値が完全に等しい状態にのみ一致する', () => {
      const granite = world.set({ x: 0, y: 0, z: 0 }, 'stone', { variant: 'granite' });
      world.set({ x: 1, y: 0, z: 0 }, 'stone', { VARIANT: 'Granite' });
      world.set({ x: 2, y: 0, z: 0 }, 'stone', { variant: 'diorite' });
      world.set({ x: 3, y: 0, z: 0 }, 'stone');
      const predicate = byStateValue(granite);

      expect(matches(predicate, world, { x: 0, y: 0, z: 0 })).toBe(true);
      expect(matches(predicate, world, { x: 1, y: 0, z: 0 })).toBe(true);
      expect(matches(predicate, world, { x: 2, y: 0, z: 0 })).toBe(false);
      expect(matches(predicate, world, { x: 3, y: 0, z: 0 })).toBe(false);
    });
  });

  it('matchAny / matchNone', () => {
    expect(matches(matchAny(), world, ORIGIN)).toBe(true);
    expect(matches(matchNone(), world, ORIGIN)).toBe(false);
    expect(test('@anything')).toBe(true);
    expect(test('@nothing')).toBe(false);
  });

  // ============================================================
  // 短絡評価
  // ============================================================

  describe('短絡評価', () => {
    it('or は最初に真になった子で停止する', () => {
      world.set(ORIGIN, 'stone');
      const counting = new CountingWorld(world);

      expect(matches(compile('stone,dirt', ctx), counting, ORIGIN)).toBe(true);
      expect(counting.stateLookups).toBe(1);
    });

    it('and は最初に偽になった子で停止する', () => {
      world.set(ORIGIN, 'stone');
      const counting = new CountingWorld(world);

      expect(matches(compile('dirt ~rock [variant=x]', ctx), counting, ORIGIN)).toBe(false);
      expect(counting.stateLookups).toBe(1);
    });

    it('すべての子を評価する場合はソース順に参照する', () => {
      world.set(ORIGIN, 'stone');
      const counting = new CountingWorld(world);

      expect(matches(compile('dirt,grass,stone', ctx), counting, ORIGIN)).toBe(true);
      expect(counting.stateLookups).toBe(3);
    });
  });

  // ============================================================
  // 冪等性・純粋性
  // ============================================================

  it('同じクエリを 2 回コンパイルしても同じ結果になる', () => {
    world.set({ x: 0, y: 0, z: 0 }, 'grass');
    world.set({ x: 1, y: 0, z: 0 }, 'water');
    world.set({ x: 2, y: 0, z: 0 }, 'stone', { variant: 'granite' });
    const spec = 'grass @hasWater, stone [variant=granite|diorite], !%Block';
    const first = compile(spec, ctx);
    const second = compile(spec, ctx);

    expect(second).not.toBe(first);
    for (let x = -1; x <= 3; x++) {
      const p = { x, y: 0, z: 0 };
      expect(matches(second, world, p)).toBe(matches(first, world, p));
    }
  });

  it('評価はワールドを変更しない', () => {
    world.set(ORIGIN, 'stone');
    const before = world.size;
    test('stone @hasWater @airAbove, %Leaves');
    expect(world.size).toBe(before);
  });
});
