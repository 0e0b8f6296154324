import type Database from 'better-sqlite3';
import crypto from 'node:crypto';
import type { SavedQuery, SaveQueryInput } from '../../engine/query/types.js';

/**
 * Raw row shape returned by better-sqlite3 for the `saved_queries` table.
 */
interface SavedQueryRow {
  id: string;
  name: string;
  description: string | null;
  query_text: string;
  created_at: string;
  updated_at: string;
}

/** Maps a snake_case DB row to a camelCase SavedQuery entity. */
function rowToSavedQuery(row: SavedQueryRow): SavedQuery {
  return {
    id: row.id,
    name: row.name,
    description: row.description ?? undefined,
    queryText: row.query_text,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

const COLUMNS = 'id, name, description, query_text, created_at, updated_at';

/**
 * Repository for the `saved_queries` table.
 */
export class SavedQueryRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /**
   * Insert a SavedQuery, or replace the text and description of the one
   * with the same name. The id and createdAt of an existing row are kept.
   */
  upsert(input: SaveQueryInput): SavedQuery {
    const now = new Date().toISOString();

    const stmt = this.db.prepare<[string, string, string | null, string, string, string]>(
      `INSERT INTO saved_queries (id, name, description, query_text, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?)
       ON CONFLICT(name) DO UPDATE SET
         description = excluded.description,
         query_text  = excluded.query_text,
         updated_at  = excluded.updated_at`,
    );

    stmt.run(
      crypto.randomUUID(),
      input.name,
      input.description ?? null,
      input.queryText,
      now,
      now,
    );

    const saved = this.findByName(input.name);
    if (saved === undefined) {
      throw new Error(`Saved query '${input.name}' missing after upsert`);
    }
    return saved;
  }

  /** Find a SavedQuery by name. */
  findByName(name: string): SavedQuery | undefined {
    const stmt = this.db.prepare<[string], SavedQueryRow>(
      `SELECT ${COLUMNS} FROM saved_queries WHERE name = ?`,
    );
    const row = stmt.get(name);
    return row ? rowToSavedQuery(row) : undefined;
  }

  /** Return all SavedQueries in creation order. */
  findAll(): SavedQuery[] {
    const stmt = this.db.prepare<[], SavedQueryRow>(
      `SELECT ${COLUMNS} FROM saved_queries ORDER BY created_at, rowid`,
    );
    return stmt.all().map(rowToSavedQuery);
  }
}
