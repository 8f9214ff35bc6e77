import Database from 'better-sqlite3';

const SCHEMA_VERSION = 1;

/**
 * Open the recordings database and bring its schema up to date.
 * Creates tables if they don't exist and runs migrations if needed.
 */
export function initDatabase(dbPath: string): Database.Database {
  const db = new Database(dbPath);

  // Concurrent readers while an export is being inserted
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }

  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY
    )
  `);

  const versionRow = db.prepare<[], { version: number }>('SELECT version FROM schema_version LIMIT 1').get();
  const currentVersion = versionRow?.version ?? 0;

  if (currentVersion < SCHEMA_VERSION) {
    runMigrations(db, currentVersion, SCHEMA_VERSION);
  }

  return db;
}

function runMigrations(db: Database.Database, from: number, to: number): void {
  const migrations: Record<number, () => void> = {
    1: () => migrateToV1(db),
  };

  db.transaction(() => {
    for (let version = from + 1; version <= to; version++) {
      const migrate = migrations[version];
      if (migrate) {
        migrate();
      }
    }

    db.prepare('DELETE FROM schema_version').run();
    db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(to);
  })();
}

function migrateToV1(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS recordings (
      id TEXT PRIMARY KEY,
      path TEXT NOT NULL,
      created_at TEXT NOT NULL,
      duration REAL NOT NULL,
      file_size INTEGER NOT NULL,
      chunk_count INTEGER NOT NULL,
      type TEXT NOT NULL DEFAULT 'video'
    )
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_recordings_created_at ON recordings(created_at);
  `);
}

export type { Database };
