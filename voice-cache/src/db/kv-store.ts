import type Database from 'better-sqlite3';
import { openDatabase } from './schema.js';

/**
 * Persistent whole-document key-value store
 */
export interface KeyValueStore {
  read(key: string): string | null;
  write(key: string, blob: string): void;
  erase(): void;
  close(): void;
}

interface KvRow {
  value: string;
}

function isKvRow(row: unknown): row is KvRow {
  return typeof row === 'object' && row !== null && 'value' in row && typeof row.value === 'string';
}

export class SqliteKeyValueStore implements KeyValueStore {
  private readonly db: Database.Database;

  constructor(location: string) {
    this.db = openDatabase(location);
  }

  read(key: string): string | null {
    const row: unknown = this.db.prepare('SELECT value FROM kv WHERE key = ?').get(key);
    return isKvRow(row) ? row.value : null;
  }

  write(key: string, blob: string): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO kv (key, value, updated_at) VALUES (?, ?, ?)
    `).run(key, blob, Date.now());
  }

  erase(): void {
    this.db.prepare('DELETE FROM kv').run();
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
