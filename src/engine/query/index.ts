/**
 * blockquery — Block query engine public API
 *
 * Provides:
 * - createQueryContext: registry + predefined store with presets installed
 * - compileQuery / declareQuery: compile query text, optionally under a name
 * - defineQuery / loadSavedQueries / listQueries: the saved query library
 * - matchPositions: evaluate a predicate at many positions
 */

import type Database from 'better-sqlite3';
import { compile } from './parser.js';
import { matches } from './evaluator.js';
import { PredefinedQueryStore } from './predefined.js';
import { getPresetQueries, installPresetQueries } from './preset-queries.js';
import type { PresetQuery } from './preset-queries.js';
import type { NameRegistry } from './registry.js';
import { DEFAULT_PROPERTY_NAME, QueryCompileError } from './types.js';
import type {
  CompileContext,
  Position,
  Predicate,
  SaveQueryInput,
  SavedQuery,
  WorldView,
} from './types.js';
import { SavedQueryRepository } from '../../db/repository/saved-query-repository.js';
import { DEFAULT_FILL_BLOCK } from '../world/voxel-world.js';

export type { PresetQuery };

export interface NamedQuery {
  name: string;
  description?: string;
  queryText: string;
}

/** Everything needed to compile queries against one registry. */
export interface QueryContext extends CompileContext {
  registry: NameRegistry;
  predefined: PredefinedQueryStore;
  defaultPropertyName: string;
  /** Block held by world positions that were never set */
  fillBlock: string;
  /** Queries declared by the host (e.g. from the catalog), in declaration order */
  declared: NamedQuery[];
}

export interface QueryContextOptions {
  defaultPropertyName?: string;
  fillBlock?: string;
}

export interface LoadSavedQueriesResult {
  loaded: string[];
  failed: Array<{ name: string; message: string }>;
}

export interface QueryListing {
  name: string;
  description?: string;
  source: 'preset' | 'declared' | 'saved';
  queryText?: string;
}

export interface PositionMatch extends Position {
  matched: boolean;
}

/**
 * Create a query context over a populated registry.
 * Preset queries the registry can support are registered immediately.
 */
export function createQueryContext(
  registry: NameRegistry,
  options?: QueryContextOptions,
): QueryContext {
  const predefined = new PredefinedQueryStore();
  installPresetQueries(predefined, registry);
  return {
    registry,
    resolver: registry,
    predefined,
    defaultPropertyName: options?.defaultPropertyName ?? DEFAULT_PROPERTY_NAME,
    fillBlock: options?.fillBlock ?? DEFAULT_FILL_BLOCK,
    declared: [],
  };
}

/** Compile query text against the context's registry and predefined queries. */
export function compileQuery(context: QueryContext, queryText: string): Predicate {
  return compile(queryText, context);
}

/**
 * Compile a query and register it under `name` for later `@name` references.
 * Re-declaring a name replaces the earlier predicate.
 */
export function declareQuery(context: QueryContext, query: NamedQuery): Predicate {
  const predicate = compile(query.queryText, context);
  context.predefined.register(query.name, predicate);
  const index = context.declared.findIndex((q) => q.name === query.name);
  if (index === -1) {
    context.declared.push(query);
  } else {
    context.declared[index] = query;
  }
  return predicate;
}

/**
 * Compile a query, save it to the library and register it.
 * Nothing is saved when the query does not compile.
 */
export function defineQuery(
  db: Database.Database,
  context: QueryContext,
  input: SaveQueryInput,
): SavedQuery {
  const predicate = compile(input.queryText, context);
  const repo = new SavedQueryRepository(db);
  const saved = repo.upsert(input);
  context.predefined.register(saved.name, predicate);
  return saved;
}

/**
 * Compile every saved query and register it.
 *
 * A redefined query may refer to one created after it, so queries are
 * retried in passes (creation order within a pass) until a pass registers
 * nothing new. Queries that still do not compile (e.g. the catalog changed)
 * are reported with their last error, not thrown.
 */
export function loadSavedQueries(
  db: Database.Database,
  context: QueryContext,
): LoadSavedQueriesResult {
  const repo = new SavedQueryRepository(db);
  const loaded: string[] = [];
  let pending = repo.findAll();
  let failed: LoadSavedQueriesResult['failed'] = [];

  while (pending.length > 0) {
    const retry: SavedQuery[] = [];
    failed = [];

    for (const saved of pending) {
      try {
        context.predefined.register(saved.name, compile(saved.queryText, context));
        loaded.push(saved.name);
      } catch (err: unknown) {
        if (!(err instanceof QueryCompileError)) {
          throw err;
        }
        retry.push(saved);
        failed.push({ name: saved.name, message: err.message });
      }
    }

    if (retry.length === pending.length) {
      break;
    }
    pending = retry;
  }

  return { loaded, failed };
}

/**
 * List every named query: presets installed in the context,
 * host-declared queries, then saved queries.
 */
export function listQueries(db: Database.Database, context: QueryContext): QueryListing[] {
  const presets = getPresetQueries()
    .filter((p) => context.predefined.has(p.name))
    .map((p) => ({
      name: p.name,
      description: p.description,
      source: 'preset' as const,
    }));

  const declared = context.declared.map((q) => ({
    name: q.name,
    description: q.description,
    source: 'declared' as const,
    queryText: q.queryText,
  }));

  const repo = new SavedQueryRepository(db);
  const saved = repo.findAll().map((q) => ({
    name: q.name,
    description: q.description,
    source: 'saved' as const,
    queryText: q.queryText,
  }));

  return [...presets, ...declared, ...saved];
}

/** Evaluate `predicate` at each position, preserving order. */
export function matchPositions(
  predicate: Predicate,
  world: WorldView,
  positions: readonly Position[],
): PositionMatch[] {
  return positions.map((p) => ({
    x: p.x,
    y: p.y,
    z: p.z,
    matched: matches(predicate, world, p),
  }));
}
