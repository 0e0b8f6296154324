/**
 * blockquery — MCP Server
 *
 * Creates and configures the MCP server with all tools and resources.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type Database from 'better-sqlite3';
import type { QueryContext } from '../engine/query/index.js';
import { registerQueryTools } from './tools/query.js';
import { registerResources } from './resources.js';

/**
 * Create a fully configured MCP server with all blockquery tools and resources.
 *
 * @param db - The better-sqlite3 database holding saved queries
 * @param context - Query context (registry + predefined queries)
 * @returns Configured McpServer instance
 */
export function createMcpServer(db: Database.Database, context: QueryContext): McpServer {
  const server = new McpServer({
    name: 'blockquery',
    version: '0.1.0',
  });

  // compile_query, match_query, define_query, list_queries
  registerQueryTools(server, db, context);

  registerResources(server, db, context);

  return server;
}
