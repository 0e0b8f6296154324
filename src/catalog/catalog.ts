/**
 * blockquery — Block catalog
 *
 * カタログ JSON（マテリアル・タイプタグ・ブロック・名前付きクエリ）を
 * Zod で検証し、NameRegistry と QueryContext を組み立てる。
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { NameRegistry } from '../engine/query/registry.js';
import { createQueryContext, declareQuery } from '../engine/query/index.js';
import type { QueryContext } from '../engine/query/index.js';
import { CatalogError, QueryCompileError } from '../engine/query/types.js';

// ============================================================
// Zod スキーマ
// ============================================================

const NAME_PATTERN = /^[A-Za-z0-9_]+$/;

export const TypeTagEntrySchema = z.object({
  name: z.string().min(1),
  parent: z.string().min(1).optional(),
});

export const BlockEntrySchema = z.object({
  identifier: z.string().regex(/^[A-Za-z0-9_:]+$/),
  typeTag: z.string().min(1),
  material: z.string().min(1),
  empty: z.boolean().optional(),
});

export const QueryEntrySchema = z.object({
  name: z.string().regex(NAME_PATTERN),
  description: z.string().optional(),
  query: z.string().min(1),
});

export const CatalogSchema = z.object({
  defaultNamespace: z.string().regex(NAME_PATTERN).default('core'),
  typeTagPrefixes: z.array(z.string()).default(['', 'custom.', 'core.']),
  defaultPropertyName: z.string().regex(NAME_PATTERN).default('variant'),
  fillBlock: z.string().min(1).default('core:air'),
  materials: z.array(z.string().regex(NAME_PATTERN)),
  typeTags: z.array(TypeTagEntrySchema),
  blocks: z.array(BlockEntrySchema),
  queries: z.array(QueryEntrySchema).default([]),
});
export type Catalog = z.infer<typeof CatalogSchema>;

/** Bundled catalog shipped with the package. */
export const DEFAULT_CATALOG_PATH = fileURLToPath(
  new URL('../../data/default-catalog.json', import.meta.url),
);

// ============================================================
// 読み込み
// ============================================================

/**
 * 任意の値をカタログとして検証する。
 *
 * @throws CatalogError 検証に失敗した場合
 */
export function parseCatalog(raw: unknown): Catalog {
  const result = CatalogSchema.safeParse(raw);
  if (!result.success) {
    throw new CatalogError(`Invalid catalog: ${result.error.message}`);
  }
  return result.data;
}

/**
 * JSON ファイルからカタログを読み込む。
 *
 * @param filePath カタログファイルのパス（省略時は同梱カタログ）
 * @throws CatalogError JSON として読めない・検証に失敗した場合
 */
export function loadCatalogFile(filePath: string = DEFAULT_CATALOG_PATH): Catalog {
  const resolved = path.resolve(filePath);
  const content = fs.readFileSync(resolved, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new CatalogError(`Catalog ${resolved} is not valid JSON: ${message}`);
  }
  return parseCatalog(raw);
}

// ============================================================
// 組み立て
// ============================================================

/**
 * カタログの定義から NameRegistry を構築する。
 * タイプタグの親は、それより前に定義されている必要がある。
 */
export function buildRegistry(catalog: Catalog): NameRegistry {
  const registry = new NameRegistry({
    typeTagPrefixes: catalog.typeTagPrefixes,
    defaultNamespace: catalog.defaultNamespace,
  });

  for (const material of catalog.materials) {
    registry.defineMaterial(material);
  }
  for (const tag of catalog.typeTags) {
    registry.defineTypeTag(tag.name, tag.parent);
  }
  for (const block of catalog.blocks) {
    registry.defineBlock(block);
  }

  if (registry.block(catalog.fillBlock) === undefined) {
    throw new CatalogError(`Fill block '${catalog.fillBlock}' is not defined`);
  }

  return registry;
}

/**
 * レジストリを構築し、プリセットとカタログのクエリを登録した QueryContext を返す。
 * カタログのクエリは記述順にコンパイルされるため、前方のクエリのみ @name で参照できる。
 *
 * @throws CatalogError クエリのコンパイルに失敗した場合
 */
export function createCatalogContext(catalog: Catalog): QueryContext {
  const registry = buildRegistry(catalog);
  const context = createQueryContext(registry, {
    defaultPropertyName: catalog.defaultPropertyName,
    fillBlock: catalog.fillBlock,
  });

  for (const entry of catalog.queries) {
    try {
      declareQuery(context, {
        name: entry.name,
        description: entry.description,
        queryText: entry.query,
      });
    } catch (err: unknown) {
      if (err instanceof QueryCompileError) {
        throw new CatalogError(`Catalog query '${entry.name}': ${err.message}`);
      }
      throw err;
    }
  }

  return context;
}
