/**
 * blockquery — MCP Query Tools
 *
 * Tools for compiling block queries, matching them against a block
 * snapshot, and managing the saved query library.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type Database from 'better-sqlite3';
import { z } from 'zod';
import {
  compileQuery,
  defineQuery,
  listQueries,
  matchPositions,
} from '../../engine/query/index.js';
import type { QueryContext, QueryListing } from '../../engine/query/index.js';
import { formatPredicate } from '../../engine/query/format.js';
import { VoxelWorld } from '../../engine/world/voxel-world.js';

const PositionSchema = {
  x: z.number().int(),
  y: z.number().int(),
  z: z.number().int(),
};

/** Format an error thrown while compiling or matching as a tool error result. */
function errorResult(err: unknown): { content: Array<{ type: 'text'; text: string }>; isError: true } {
  const message = err instanceof Error ? err.message : String(err);
  return {
    content: [{ type: 'text', text: `Query error: ${message}` }],
    isError: true,
  };
}

/**
 * Format a query listing line.
 *
 * Example: - fertile [declared]: Soil that supports plants. = grass,mycelium,%Grass,%Dirt
 */
function formatListing(q: QueryListing): string {
  const description = q.description ? `: ${q.description}` : '';
  const text = q.queryText !== undefined ? ` = ${q.queryText}` : '';
  return `- ${q.name} [${q.source}]${description}${text}`;
}

/**
 * Register block query MCP tools on the server.
 */
export function registerQueryTools(
  server: McpServer,
  db: Database.Database,
  context: QueryContext,
): void {
  // 1. compile_query
  server.tool(
    'compile_query',
    'Compile a block query and show the resulting predicate tree. Commas separate alternatives (OR), adjacent terms must all match (AND), "!" negates one term.',
    {
      query: z.string().describe('Block query text, e.g. "grass,dirt !~water" or "@fertile [variant=red|blue]"'),
    },
    async ({ query }) => {
      try {
        const predicate = compileQuery(context, query);
        return { content: [{ type: 'text', text: formatPredicate(predicate) }] };
      } catch (err: unknown) {
        return errorResult(err);
      }
    },
  );

  // 2. match_query
  server.tool(
    'match_query',
    'Evaluate a block query at the given positions of a block snapshot. Positions not listed in blocks hold the fill block (air).',
    {
      query: z.string().describe('Block query text'),
      blocks: z
        .array(
          z.object({
            ...PositionSchema,
            block: z.string().describe('Block identifier, e.g. "stone" or "core:stone"'),
            properties: z.record(z.string()).optional().describe('Block state properties'),
          }),
        )
        .describe('Blocks placed in the snapshot'),
      positions: z.array(z.object(PositionSchema)).describe('Positions to evaluate'),
    },
    async ({ query, blocks, positions }) => {
      try {
        const predicate = compileQuery(context, query);
        const world = VoxelWorld.fromPlacements(context.registry, blocks, {
          fillBlock: context.fillBlock,
        });
        const results = matchPositions(predicate, world, positions);
        return { content: [{ type: 'text', text: JSON.stringify(results, null, 2) }] };
      } catch (err: unknown) {
        return errorResult(err);
      }
    },
  );

  // 3. define_query
  server.tool(
    'define_query',
    'Compile a block query and save it under a name so other queries can reference it as @name. Redefining a name replaces it.',
    {
      name: z
        .string()
        .regex(/^[A-Za-z0-9_]+$/)
        .describe('Query name (letters, digits, underscore)'),
      query: z.string().describe('Block query text'),
      description: z.string().optional().describe('Description of the query'),
    },
    async ({ name, query, description }) => {
      try {
        const saved = defineQuery(db, context, { name, description, queryText: query });
        return { content: [{ type: 'text', text: JSON.stringify(saved, null, 2) }] };
      } catch (err: unknown) {
        return errorResult(err);
      }
    },
  );

  // 4. list_queries
  server.tool(
    'list_queries',
    'List the named queries available as @name: presets, catalog queries and saved queries.',
    {},
    async () => {
      const queries = listQueries(db, context);
      if (queries.length === 0) {
        return { content: [{ type: 'text', text: 'No named queries.' }] };
      }
      return {
        content: [
          {
            type: 'text',
            text: `Named queries:\n${queries.map(formatListing).join('\n')}`,
          },
        ],
      };
    },
  );
}
