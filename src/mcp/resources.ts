/**
 * blockquery — MCP Resources
 *
 * Read-only resources for browsing the registry and named queries.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type Database from 'better-sqlite3';
import { listQueries } from '../engine/query/index.js';
import type { QueryContext } from '../engine/query/index.js';

export function registerResources(
  server: McpServer,
  db: Database.Database,
  context: QueryContext,
): void {
  // 1. blockquery://queries — named queries usable as @name
  server.resource(
    'queries',
    'blockquery://queries',
    { description: 'Named queries (presets, catalog and saved) usable as @name' },
    async (uri) => ({
      contents: [
        {
          uri: uri.href,
          mimeType: 'application/json',
          text: JSON.stringify(listQueries(db, context), null, 2),
        },
      ],
    }),
  );

  // 2. blockquery://catalog — names a query can refer to
  server.resource(
    'catalog',
    'blockquery://catalog',
    { description: 'Blocks, type tags and materials known to the query compiler' },
    async (uri) => {
      const { registry } = context;
      const catalog = {
        defaultNamespace: registry.defaultNamespace,
        typeTagPrefixes: registry.typeTagPrefixes,
        defaultPropertyName: context.defaultPropertyName,
        materials: registry.materials().map((m) => m.name),
        typeTags: registry.typeTags().map((t) => ({ name: t.name, parent: t.parent?.name })),
        blocks: registry.blocks().map((b) => ({
          identifier: b.identifier,
          typeTag: b.typeTag.name,
          material: b.material.name,
          empty: b.empty,
        })),
      };
      return {
        contents: [
          {
            uri: uri.href,
            mimeType: 'application/json',
            text: JSON.stringify(catalog, null, 2),
          },
        ],
      };
    },
  );
}
