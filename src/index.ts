#!/usr/bin/env node
/**
 * blockquery — Block query MCP server
 *
 * カタログからレジストリを構築し、保存済みクエリを登録してから
 * stdio トランスポートで MCP クライアントと接続する。
 */

import Database from 'better-sqlite3';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { migrateDatabase } from './db/migrate.js';
import { createCatalogContext, loadCatalogFile } from './catalog/catalog.js';
import { loadSavedQueries } from './engine/query/index.js';
import { createMcpServer } from './mcp/server.js';

const DB_PATH = process.env['BLOCKQUERY_DB_PATH'] ?? 'blockquery.db';
const CATALOG_PATH = process.env['BLOCKQUERY_CATALOG_PATH'];

const db = new Database(DB_PATH);
migrateDatabase(db);

const context = createCatalogContext(loadCatalogFile(CATALOG_PATH));
// 保存済みクエリのうちコンパイルできないものは list_queries に残り、@name では参照できない
loadSavedQueries(db, context);

const server = createMcpServer(db, context);
const transport = new StdioServerTransport();
await server.connect(transport);
