import { EventEmitter } from 'events';
import { readdir, stat, unlink } from 'fs/promises';
import * as path from 'path';
import type { ChunkInfo } from '@screen-rewind/shared';
import { EmptyChunkFileError, getErrnoCode } from './errors.js';

/**
 * One fixed-duration capture unit held in the rolling buffer.
 */
export interface Chunk {
  id: string;
  /** Absolute path of the backing media file */
  path: string;
  /** Epoch milliseconds of recording start */
  createdAt: number;
  /** Nominal length in seconds */
  duration: number;
}

export const CHUNK_FILE_PREFIX = 'chunk_';

export interface BufferStoreOptions {
  /** Buffer directory; enables the orphan sweep in clearAll() */
  directory?: string;
  /** Deletes a chunk file. Must treat a missing file as success. */
  deleteFile?: (filePath: string) => Promise<void>;
}

export interface BufferStoreEvents {
  changed: (chunks: Chunk[]) => void;
}

export async function deleteFileIfPresent(filePath: string): Promise<void> {
  try {
    await unlink(filePath);
  } catch (error) {
    if (getErrnoCode(error) !== 'ENOENT') {
      throw error;
    }
  }
}

export function toChunkInfo(chunk: Chunk): ChunkInfo {
  return {
    id: chunk.id,
    fileName: path.basename(chunk.path),
    createdAt: new Date(chunk.createdAt).toISOString(),
    duration: chunk.duration,
  };
}

/**
 * Ordered registry of the chunks currently retained, and their eviction.
 *
 * Mutations run one at a time through an internal queue; reads return
 * snapshots and never see a half-applied mutation. A chunk's file is deleted
 * together with its record, except that clearAll() drops the record of a
 * pinned chunk at once and deletes the file on release.
 */
export class BufferStore extends EventEmitter {
  private chunks: Chunk[] = [];
  private queue: Promise<void> = Promise.resolve();
  private pinCounts = new Map<string, number>();
  private pendingRemoval = new Set<string>();
  /** Files of pinned chunks already dropped by clearAll(), by chunk id */
  private pendingFiles = new Map<string, string>();
  private directory: string | undefined;
  private deleteFile: (filePath: string) => Promise<void>;

  constructor(options: BufferStoreOptions = {}) {
    super();
    this.directory = options.directory;
    this.deleteFile = options.deleteFile ?? deleteFileIfPresent;
  }

  /**
   * Register a chunk whose file has been written.
   * @throws EmptyChunkFileError if the file is missing or empty
   */
  add(chunk: Chunk): Promise<void> {
    return this.exclusive(async () => {
      let size: number;
      try {
        size = (await stat(chunk.path)).size;
      } catch (error) {
        if (getErrnoCode(error) === 'ENOENT') {
          throw new EmptyChunkFileError(chunk.path);
        }
        throw error;
      }
      if (size === 0) {
        throw new EmptyChunkFileError(chunk.path);
      }

      this.chunks.push(chunk);
      this.chunks.sort((a, b) => a.createdAt - b.createdAt);
      this.emitChanged();
    });
  }

  /**
   * Drop a chunk and delete its file. Resolves false if it was not present.
   */
  remove(chunk: Chunk): Promise<boolean> {
    return this.exclusive(() => this.removeLocked(chunk.id));
  }

  /**
   * Chunks with createdAt in [from, to], oldest first.
   */
  queryRange(from: number, to: number): Chunk[] {
    return this.chunks.filter((chunk) => chunk.createdAt >= from && chunk.createdAt <= to);
  }

  /**
   * Remove every chunk that started before `now - bufferSeconds`.
   * Pinned chunks are kept and removed once released.
   */
  evictExpired(now: number, bufferSeconds: number): Promise<Chunk[]> {
    return this.exclusive(async () => {
      const cutoff = now - bufferSeconds * 1000;
      const evicted: Chunk[] = [];

      for (const chunk of this.chunks.filter((c) => c.createdAt < cutoff)) {
        if (this.isPinned(chunk.id)) {
          this.pendingRemoval.add(chunk.id);
          continue;
        }
        if (await this.removeLocked(chunk.id)) {
          evicted.push(chunk);
        }
      }

      if (evicted.length > 0) {
        console.log(`[BufferStore] Evicted ${evicted.length} chunk(s) older than ${bufferSeconds}s`);
      }
      return evicted;
    });
  }

  /**
   * Remove every chunk, then delete stray chunk files left in the buffer
   * directory by an earlier process. Files of pinned chunks are deleted once
   * released. Resolves the number of records removed.
   */
  clearAll(): Promise<number> {
    return this.exclusive(async () => {
      let removed = 0;
      for (const chunk of [...this.chunks]) {
        if (this.isPinned(chunk.id)) {
          this.chunks = this.chunks.filter((c) => c.id !== chunk.id);
          this.pendingRemoval.delete(chunk.id);
          this.pendingFiles.set(chunk.id, chunk.path);
          this.emitChanged();
          removed++;
          continue;
        }
        if (await this.removeLocked(chunk.id)) {
          removed++;
        }
      }

      if (this.directory) {
        await this.sweepOrphans(this.directory);
      }
      return removed;
    });
  }

  /**
   * Keep `chunks` from being deleted until the returned release is called.
   * Releasing twice is a no-op.
   */
  pin(chunks: Chunk[]): () => Promise<void> {
    const ids = chunks.map((chunk) => chunk.id);
    for (const id of ids) {
      this.pinCounts.set(id, (this.pinCounts.get(id) ?? 0) + 1);
    }

    let released = false;
    return async () => {
      if (released) {
        return;
      }
      released = true;

      const due: string[] = [];
      for (const id of ids) {
        const count = (this.pinCounts.get(id) ?? 1) - 1;
        if (count > 0) {
          this.pinCounts.set(id, count);
          continue;
        }
        this.pinCounts.delete(id);
        if (this.pendingRemoval.has(id) || this.pendingFiles.has(id)) {
          due.push(id);
        }
      }

      if (due.length > 0) {
        await this.exclusive(async () => {
          for (const id of due) {
            // Re-pinned while waiting for the queue
            if (this.isPinned(id)) {
              continue;
            }
            const detached = this.pendingFiles.get(id);
            if (detached === undefined) {
              await this.removeLocked(id);
              continue;
            }
            this.pendingFiles.delete(id);
            await this.deleteQuietly(detached);
          }
        });
      }
    };
  }

  isPinned(id: string): boolean {
    return this.pinCounts.has(id);
  }

  list(): Chunk[] {
    return [...this.chunks];
  }

  get size(): number {
    return this.chunks.length;
  }

  /** Sum of the nominal chunk durations, in seconds */
  totalDuration(): number {
    return this.chunks.reduce((total, chunk) => total + chunk.duration, 0);
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.queue.then(task);
    // The queue only orders tasks; each caller observes its own failure
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async removeLocked(id: string): Promise<boolean> {
    const index = this.chunks.findIndex((chunk) => chunk.id === id);
    this.pendingRemoval.delete(id);
    if (index === -1) {
      return false;
    }

    const [chunk] = this.chunks.splice(index, 1);
    this.emitChanged();
    await this.deleteQuietly(chunk.path);
    return true;
  }

  private async deleteQuietly(filePath: string): Promise<void> {
    try {
      await this.deleteFile(filePath);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[BufferStore] Failed to delete ${filePath}: ${message}`);
    }
  }

  private async sweepOrphans(directory: string): Promise<void> {
    let entries: string[];
    try {
      entries = await readdir(directory);
    } catch (error) {
      if (getErrnoCode(error) === 'ENOENT') {
        return;
      }
      throw error;
    }

    const retained = new Set(
      [...this.chunks.map((chunk) => chunk.path), ...this.pendingFiles.values()].map((file) => path.basename(file))
    );
    const orphans = entries.filter((name) => name.startsWith(CHUNK_FILE_PREFIX) && !retained.has(name));
    for (const name of orphans) {
      try {
        await this.deleteFile(path.join(directory, name));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`[BufferStore] Failed to delete orphan ${name}: ${message}`);
      }
    }
    if (orphans.length > 0) {
      console.log(`[BufferStore] Removed ${orphans.length} leftover chunk file(s)`);
    }
  }

  private emitChanged(): void {
    this.emit('changed', this.list());
  }

  // Type-safe event emitter methods
  override on<K extends keyof BufferStoreEvents>(event: K, listener: BufferStoreEvents[K]): this {
    return super.on(event, listener);
  }

  override emit<K extends keyof BufferStoreEvents>(
    event: K,
    ...args: Parameters<BufferStoreEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
