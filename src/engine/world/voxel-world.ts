/**
 * blockquery — In-memory voxel world
 *
 * Sparse position → block state map implementing WorldView.
 * Positions never set hold the fill block (air by default).
 */

import { UnknownIdentifierError } from '../query/types.js';
import type {
  BlockDefinition,
  MaterialTag,
  Position,
  StateView,
  TypeTag,
  WorldView,
} from '../query/types.js';
import type { NameRegistry } from '../query/registry.js';

export const DEFAULT_FILL_BLOCK = 'core:air';

/** A block with concrete property values. Property names are stored lower-cased. */
export class BlockState implements StateView {
  readonly block: BlockDefinition;
  private readonly properties: ReadonlyMap<string, string>;
  private readonly key: string;

  constructor(block: BlockDefinition, properties?: Readonly<Record<string, string>>) {
    this.block = block;
    const entries = Object.entries(properties ?? {}).map(
      ([name, value]): [string, string] => [name.toLowerCase(), value],
    );
    this.properties = new Map(entries);
    this.key = buildStateKey(block.identifier, this.properties);
  }

  identifier(): string {
    return this.block.identifier;
  }

  typeTag(): TypeTag {
    return this.block.typeTag;
  }

  materialTag(): MaterialTag {
    return this.block.material;
  }

  propertyValue(name: string): string | undefined {
    return this.properties.get(name.toLowerCase());
  }

  stateKey(): string {
    return this.key;
  }
}

function buildStateKey(identifier: string, properties: ReadonlyMap<string, string>): string {
  if (properties.size === 0) {
    return identifier;
  }
  const pairs = [...properties.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([name, value]) => `${name}=${value.toLowerCase()}`);
  return `${identifier}[${pairs.join(',')}]`;
}

export interface BlockPlacement extends Position {
  block: string;
  properties?: Record<string, string>;
}

export interface VoxelWorldOptions {
  /** Identifier of the block held by positions that were never set */
  fillBlock?: string;
}

export class VoxelWorld implements WorldView {
  private readonly registry: NameRegistry;
  private readonly cells: Map<string, BlockState> = new Map();
  private readonly fill: BlockState;

  /**
   * @throws UnknownIdentifierError when the fill block is not registered
   */
  constructor(registry: NameRegistry, options?: VoxelWorldOptions) {
    this.registry = registry;
    this.fill = this.createState(options?.fillBlock ?? DEFAULT_FILL_BLOCK);
  }

  /** Build a world from plain placement records. */
  static fromPlacements(
    registry: NameRegistry,
    placements: readonly BlockPlacement[],
    options?: VoxelWorldOptions,
  ): VoxelWorld {
    const world = new VoxelWorld(registry, options);
    for (const p of placements) {
      world.set(p, p.block, p.properties);
    }
    return world;
  }

  /**
   * Place a block at a position, replacing whatever was there.
   *
   * @throws UnknownIdentifierError when the block is not registered
   */
  set(position: Position, identifier: string, properties?: Record<string, string>): BlockState {
    const state = this.createState(identifier, properties);
    this.cells.set(positionKey(position), state);
    return state;
  }

  stateAt(position: Position): BlockState {
    return this.cells.get(positionKey(position)) ?? this.fill;
  }

  isEmpty(position: Position): boolean {
    return this.stateAt(position).block.empty;
  }

  /** Number of explicitly placed positions. */
  get size(): number {
    return this.cells.size;
  }

  private createState(identifier: string, properties?: Record<string, string>): BlockState {
    const block = this.registry.block(identifier);
    if (block === undefined) {
      throw new UnknownIdentifierError(identifier, identifier);
    }
    return new BlockState(block, properties);
  }
}

function positionKey(position: Position): string {
  return `${position.x},${position.y},${position.z}`;
}
