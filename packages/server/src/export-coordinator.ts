import { EventEmitter } from 'events';
import { mkdir, stat, writeFile } from 'fs/promises';
import * as path from 'path';
import { nanoid } from 'nanoid';
import {
  type ExportPreset,
  type ExportQuality,
  type RecordingInfo,
  DEFAULT_EXPORT_QUALITY,
  getExportPreset,
} from '@screen-rewind/shared';
import { type BufferStore, type Chunk, deleteFileIfPresent } from './buffer-store.js';
import {
  EncoderNotFoundError,
  ExecutableNotFoundError,
  ExportInProgressError,
  MergeFailedError,
  NoChunksAvailableError,
  ProcessFailedError,
  RewindError,
  getErrnoCode,
} from './errors.js';
import { FFMPEG_SEARCH_DIRS, type ProcessGateway } from './process-gateway.js';

/**
 * Where finished exports are recorded
 */
export interface RecordingSink {
  add(recording: RecordingInfo): void;
}

export interface ExportCoordinatorOptions {
  gateway: ProcessGateway;
  store: BufferStore;
  catalog: RecordingSink;
  recordingsDir: string;
  /** Concat lists are written here */
  tempDir: string;
  /** Default trailing window, in seconds */
  exportSeconds: number;
  quality?: ExportQuality;
  /** Override for the ffmpeg executable */
  ffmpegPath?: string;
  now?: () => number;
}

export interface ExportCoordinatorEvents {
  export_started: (windowSeconds: number, chunkCount: number) => void;
  export_completed: (recording: RecordingInfo) => void;
  export_failed: (error: Error) => void;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * "Recording 2024-05-01 12.30.00", in local time
 */
export function recordingBaseName(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}.${pad(date.getMinutes())}.${pad(date.getSeconds())}`;
  return `Recording ${day} ${time}`;
}

/**
 * ffmpeg concat demuxer input: one `file '<path>'` line per chunk, in order.
 */
export function buildConcatList(chunks: Chunk[]): string {
  return chunks.map((chunk) => `file '${chunk.path.replace(/'/g, "'\\''")}'\n`).join('');
}

export function buildMergeArgs(listPath: string, outputPath: string, preset: ExportPreset): string[] {
  return [
    '-f', 'concat',
    '-safe', '0',
    '-i', listPath,
    '-c:v', 'libx264',
    '-crf', String(preset.crf),
    '-preset', preset.preset,
    '-c:a', 'aac',
    '-b:a', '128k',
    '-y',
    outputPath,
  ];
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (error) {
    if (getErrnoCode(error) === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Merges the trailing window of the rolling buffer into one recording.
 * Runs alongside the recorder loop and never modifies the buffer.
 */
export class ExportCoordinator extends EventEmitter {
  private gateway: ProcessGateway;
  private store: BufferStore;
  private catalog: RecordingSink;
  private recordingsDir: string;
  private tempDir: string;
  private exportSeconds: number;
  private quality: ExportQuality;
  private encoder: string;
  private now: () => number;
  private exporting = false;

  constructor(options: ExportCoordinatorOptions) {
    super();
    this.gateway = options.gateway;
    this.store = options.store;
    this.catalog = options.catalog;
    this.recordingsDir = options.recordingsDir;
    this.tempDir = options.tempDir;
    this.exportSeconds = options.exportSeconds;
    this.quality = options.quality ?? DEFAULT_EXPORT_QUALITY;
    this.encoder = options.ffmpegPath ?? 'ffmpeg';
    this.now = options.now ?? Date.now;
  }

  get isExporting(): boolean {
    return this.exporting;
  }

  get defaultWindowSeconds(): number {
    return this.exportSeconds;
  }

  /**
   * Merge the chunks recorded in the last `windowSeconds` into one file and
   * add it to the catalog.
   */
  async exportLast(windowSeconds: number = this.exportSeconds): Promise<RecordingInfo> {
    if (this.exporting) {
      throw new ExportInProgressError();
    }
    this.exporting = true;

    try {
      const recording = await this.merge(windowSeconds);
      console.log(`[ExportCoordinator] Exported ${recording.fileName} (${recording.chunkCount} chunks)`);
      this.emit('export_completed', recording);
      return recording;
    } catch (error) {
      const failure = error instanceof RewindError ? error : new MergeFailedError(describeError(error));
      console.error(`[ExportCoordinator] Export failed: ${failure.message}`);
      this.emit('export_failed', failure);
      throw failure;
    } finally {
      this.exporting = false;
    }
  }

  private async merge(windowSeconds: number): Promise<RecordingInfo> {
    const now = this.now();
    const chunks = this.store.queryRange(now - windowSeconds * 1000, now);
    if (chunks.length === 0) {
      throw new NoChunksAvailableError(windowSeconds);
    }

    if (!this.gateway.resolve(this.encoder, FFMPEG_SEARCH_DIRS)) {
      throw new EncoderNotFoundError(this.encoder);
    }

    this.emit('export_started', windowSeconds, chunks.length);
    console.log(`[ExportCoordinator] Merging ${chunks.length} chunk(s) from the last ${windowSeconds}s`);

    const release = this.store.pin(chunks);
    const listPath = path.join(this.tempDir, `concat_${nanoid()}.txt`);
    let outputPath: string | null = null;

    try {
      await writeFile(listPath, buildConcatList(chunks), 'utf-8');
      await mkdir(this.recordingsDir, { recursive: true });
      outputPath = await this.nextOutputPath(new Date(now));

      await this.runEncoder(listPath, outputPath);

      const { size } = await stat(outputPath);
      const recording: RecordingInfo = {
        id: nanoid(),
        path: outputPath,
        fileName: path.basename(outputPath),
        createdAt: new Date(now).toISOString(),
        duration: chunks.reduce((total, chunk) => total + chunk.duration, 0),
        fileSize: size,
        chunkCount: chunks.length,
        type: 'video',
      };
      this.catalog.add(recording);
      return recording;
    } catch (error) {
      if (outputPath) {
        await this.removeQuietly(outputPath, 'partial output');
      }
      throw error;
    } finally {
      await this.removeQuietly(listPath, 'concat list');
      await release();
    }
  }

  private async runEncoder(listPath: string, outputPath: string): Promise<void> {
    try {
      await this.gateway.run({
        command: this.encoder,
        args: buildMergeArgs(listPath, outputPath, getExportPreset(this.quality)),
        label: 'merge',
        searchDirs: FFMPEG_SEARCH_DIRS,
      });
    } catch (error) {
      if (error instanceof ExecutableNotFoundError) {
        throw new EncoderNotFoundError(this.encoder);
      }
      if (error instanceof ProcessFailedError) {
        throw new MergeFailedError(error.cancelled ? 'Merge was cancelled' : error.stderr);
      }
      throw new MergeFailedError(describeError(error));
    }
  }

  /** First free "Recording <date>[ n].mov" in the recordings directory */
  private async nextOutputPath(date: Date): Promise<string> {
    const base = recordingBaseName(date);
    let candidate = path.join(this.recordingsDir, `${base}.mov`);
    for (let n = 2; await pathExists(candidate); n++) {
      candidate = path.join(this.recordingsDir, `${base} ${n}.mov`);
    }
    return candidate;
  }

  private async removeQuietly(filePath: string, what: string): Promise<void> {
    try {
      await deleteFileIfPresent(filePath);
    } catch (error) {
      console.warn(`[ExportCoordinator] Failed to delete ${what} ${filePath}: ${describeError(error)}`);
    }
  }

  // Type-safe event emitter methods
  override on<K extends keyof ExportCoordinatorEvents>(event: K, listener: ExportCoordinatorEvents[K]): this {
    return super.on(event, listener);
  }

  override emit<K extends keyof ExportCoordinatorEvents>(
    event: K,
    ...args: Parameters<ExportCoordinatorEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
