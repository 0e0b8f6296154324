/**
 * blockquery — SQLite schema
 *
 * Single source of truth for the saved query library.
 */

/** Schema version stored in PRAGMA user_version. */
export const SCHEMA_VERSION = 1;

export const SCHEMA_SQL = `
-- ============================================================
-- Saved named queries (registered as @name at start-up)
-- ============================================================
CREATE TABLE IF NOT EXISTS saved_queries (
  id            TEXT PRIMARY KEY,
  name          TEXT NOT NULL UNIQUE,
  description   TEXT,
  query_text    TEXT NOT NULL,
  created_at    TEXT NOT NULL,
  updated_at    TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_saved_queries_created ON saved_queries(created_at);
`;
