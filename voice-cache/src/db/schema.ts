import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';

export const DATABASE_FILE = 'voice-cache.db';

/**
 * Open (or create) the metadata database.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(location: string): Database.Database {
  let db: Database.Database;

  if (location === ':memory:') {
    db = new Database(':memory:');
  } else {
    // Ensure data directory exists
    if (!fs.existsSync(location)) {
      fs.mkdirSync(location, { recursive: true });
    }
    db = new Database(path.join(location, DATABASE_FILE));
    // Enable WAL mode for better concurrency
    db.pragma('journal_mode = WAL');
  }

  initSchema(db);
  return db;
}

function initSchema(db: Database.Database): void {
  // Whole documents keyed by name
  db.exec(`
    CREATE TABLE IF NOT EXISTS kv (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      updated_at INTEGER NOT NULL
    )
  `);

  console.log('[DB] Schema initialized');
}
