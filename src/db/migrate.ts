import type Database from 'better-sqlite3';
import { SCHEMA_SQL, SCHEMA_VERSION } from './schema.js';

/**
 * Get the current schema version from the database.
 */
export function getSchemaVersion(db: Database.Database): number {
  const row = db.prepare('PRAGMA user_version').get() as {
    user_version: number;
  };
  return row.user_version;
}

/**
 * Bring the database up to the current schema.
 *
 * Schema SQL only uses IF NOT EXISTS, so running it on an up-to-date
 * database is a no-op. The version is only ever raised.
 */
export function migrateDatabase(db: Database.Database): void {
  const currentVersion = getSchemaVersion(db);

  const migrate = db.transaction(() => {
    db.exec(SCHEMA_SQL);
    if (currentVersion < SCHEMA_VERSION) {
      db.pragma(`user_version = ${SCHEMA_VERSION}`);
    }
  });
  migrate();
}
