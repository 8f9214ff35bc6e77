import { mkdirSync } from 'node:fs';
import { basename, dirname } from 'node:path';
import type Database from 'better-sqlite3';
import type { RecordingInfo } from '@screen-rewind/shared';
import { deleteFileIfPresent } from './buffer-store.js';
import { initDatabase } from './database.js';

export interface RecordingCatalogOptions {
  /** Database file path, or ':memory:' */
  dbPath: string;
}

interface RecordingRow {
  id: string;
  path: string;
  created_at: string;
  duration: number;
  file_size: number;
  chunk_count: number;
  type: string;
}

type InsertParams = [string, string, string, number, number, number, string];

function rowToRecording(row: RecordingRow): RecordingInfo {
  return {
    id: row.id,
    path: row.path,
    fileName: basename(row.path),
    createdAt: row.created_at,
    duration: row.duration,
    fileSize: row.file_size,
    chunkCount: row.chunk_count,
    // Video is the only export type
    type: 'video',
  };
}

/**
 * Finished exports, persisted in SQLite. Owns the exported files once added.
 */
export class RecordingCatalog {
  private db: Database.Database;

  private stmts: {
    insertRecording: Database.Statement<InsertParams>;
    getRecording: Database.Statement<[string], RecordingRow>;
    listRecordings: Database.Statement<[], RecordingRow>;
    deleteRecording: Database.Statement<[string]>;
  };

  constructor(options: RecordingCatalogOptions) {
    if (options.dbPath !== ':memory:') {
      mkdirSync(dirname(options.dbPath), { recursive: true });
    }
    this.db = initDatabase(options.dbPath);

    this.stmts = {
      insertRecording: this.db.prepare<InsertParams>(`
        INSERT INTO recordings (id, path, created_at, duration, file_size, chunk_count, type)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `),
      getRecording: this.db.prepare<[string], RecordingRow>('SELECT * FROM recordings WHERE id = ?'),
      listRecordings: this.db.prepare<[], RecordingRow>(
        'SELECT * FROM recordings ORDER BY created_at DESC, rowid DESC'
      ),
      deleteRecording: this.db.prepare<[string]>('DELETE FROM recordings WHERE id = ?'),
    };
  }

  add(recording: RecordingInfo): void {
    this.stmts.insertRecording.run(
      recording.id,
      recording.path,
      recording.createdAt,
      recording.duration,
      recording.fileSize,
      recording.chunkCount,
      recording.type
    );
  }

  /** Newest first */
  list(): RecordingInfo[] {
    return this.stmts.listRecordings.all().map(rowToRecording);
  }

  get(id: string): RecordingInfo | undefined {
    const row = this.stmts.getRecording.get(id);
    return row ? rowToRecording(row) : undefined;
  }

  /**
   * Delete a recording and its file. Resolves false if the id is unknown.
   */
  async delete(id: string): Promise<boolean> {
    const row = this.stmts.getRecording.get(id);
    if (!row) {
      return false;
    }
    await deleteFileIfPresent(row.path);
    this.stmts.deleteRecording.run(id);
    console.log(`[RecordingCatalog] Deleted ${basename(row.path)}`);
    return true;
  }

  close(): void {
    this.db.close();
  }
}
