import { EventEmitter } from 'events';
import * as path from 'path';
import { nanoid } from 'nanoid';
import { type BufferStore, type Chunk, deleteFileIfPresent } from './buffer-store.js';
import { type CaptureCommand, chunkFileName } from './capture-command.js';
import { ChunkCaptureFailedError, EmptyChunkFileError } from './errors.js';
import type { ProcessExit, ProcessGateway, ProcessHandle } from './process-gateway.js';

export const DEFAULT_SETTLE_MS = 2000;
export const DEFAULT_RESTART_DELAY_MS = 500;
export const DEFAULT_CAPTURE_GRACE_MS = 10000;

// Backoff once this many iterations in a row produced no chunk
export const FAILURE_BACKOFF_THRESHOLD = 3;
export const BACKOFF_INITIAL_DELAY_MS = 1000;
export const BACKOFF_MAX_DELAY_MS = 30000;

export interface ChunkRecorderOptions {
  gateway: ProcessGateway;
  store: BufferStore;
  capture: CaptureCommand;
  bufferDir: string;
  chunkSeconds: number;
  bufferSeconds: number;
  /** Wait after the capture exits before the file is checked */
  settleMs?: number;
  /** Pause between iterations */
  restartDelayMs?: number;
  /** Added to the chunk duration to form the capture's hard timeout */
  captureGraceMs?: number;
  now?: () => number;
}

export interface ChunkDiscardedEvent {
  fileName: string;
  reason: string;
  consecutiveFailures: number;
}

export interface ChunkRecorderEvents {
  capture_started: (fileName: string) => void;
  chunk_recorded: (chunk: Chunk) => void;
  chunk_discarded: (event: ChunkDiscardedEvent) => void;
  backoff: (delayMs: number, consecutiveFailures: number) => void;
  stopped: () => void;
}

/**
 * Delay before the next attempt after `failures` consecutive discarded chunks.
 */
export function backoffDelay(failures: number): number {
  const exponent = Math.max(0, failures - FAILURE_BACKOFF_THRESHOLD);
  return Math.min(BACKOFF_INITIAL_DELAY_MS * 2 ** exponent, BACKOFF_MAX_DELAY_MS);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Records the screen in fixed-length chunks, one after another, until stopped.
 *
 * Each iteration evicts expired chunks, runs one capture process, and registers
 * the resulting file. A failed iteration is discarded and the loop carries on.
 */
export class ChunkRecorder extends EventEmitter {
  private gateway: ProcessGateway;
  private store: BufferStore;
  private capture: CaptureCommand;
  private bufferDir: string;
  private chunkSeconds: number;
  private bufferSeconds: number;
  private settleMs: number;
  private restartDelayMs: number;
  private captureGraceMs: number;
  private now: () => number;

  private running = false;
  private loop: Promise<void> | null = null;
  private currentHandle: ProcessHandle | null = null;
  private wake: (() => void) | null = null;
  private consecutiveFailures = 0;

  constructor(options: ChunkRecorderOptions) {
    super();
    this.gateway = options.gateway;
    this.store = options.store;
    this.capture = options.capture;
    this.bufferDir = options.bufferDir;
    this.chunkSeconds = options.chunkSeconds;
    this.bufferSeconds = options.bufferSeconds;
    this.settleMs = options.settleMs ?? DEFAULT_SETTLE_MS;
    this.restartDelayMs = options.restartDelayMs ?? DEFAULT_RESTART_DELAY_MS;
    this.captureGraceMs = options.captureGraceMs ?? DEFAULT_CAPTURE_GRACE_MS;
    this.now = options.now ?? Date.now;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get isCapturing(): boolean {
    return this.currentHandle !== null;
  }

  get failureCount(): number {
    return this.consecutiveFailures;
  }

  start(): void {
    if (this.loop) {
      console.log('[ChunkRecorder] Already running');
      return;
    }
    this.running = true;
    this.consecutiveFailures = 0;
    this.loop = this.runLoop().finally(() => {
      this.loop = null;
      this.emit('stopped');
    });
  }

  /**
   * Stop the loop, cancelling any capture in flight. Resolves once the loop has
   * exited; a chunk interrupted by the stop is still registered if it has content.
   */
  async stop(): Promise<void> {
    this.running = false;
    this.currentHandle?.cancel();
    this.wake?.();
    if (this.loop) {
      await this.loop;
    }
  }

  private async runLoop(): Promise<void> {
    console.log(`[ChunkRecorder] Started (${this.chunkSeconds}s chunks, ${this.bufferSeconds}s buffer)`);

    while (this.running) {
      try {
        await this.recordChunk();
      } catch (error) {
        this.consecutiveFailures++;
        console.error(`[ChunkRecorder] Iteration failed: ${describeError(error)}`);
      }

      if (!this.running) {
        break;
      }

      if (this.consecutiveFailures >= FAILURE_BACKOFF_THRESHOLD) {
        const delayMs = backoffDelay(this.consecutiveFailures);
        console.warn(
          `[ChunkRecorder] ${this.consecutiveFailures} consecutive failures, retrying in ${delayMs}ms`
        );
        this.emit('backoff', delayMs, this.consecutiveFailures);
        await this.delay(delayMs);
      } else {
        await this.delay(this.restartDelayMs);
      }
    }

    console.log('[ChunkRecorder] Stopped');
  }

  private async recordChunk(): Promise<void> {
    if (this.currentHandle) {
      console.log('[ChunkRecorder] Recording already in progress, skipping');
      return;
    }

    await this.store.evictExpired(this.now(), this.bufferSeconds);
    if (!this.running) {
      return;
    }

    const startedAt = this.now();
    const fileName = chunkFileName(new Date(startedAt), this.capture.extension);
    const filePath = path.join(this.bufferDir, fileName);

    let exit: ProcessExit;
    try {
      const handle = this.gateway.launch({
        command: this.capture.command,
        args: this.capture.buildArgs(filePath, this.chunkSeconds),
        timeoutMs: this.chunkSeconds * 1000 + this.captureGraceMs,
        label: `capture ${fileName}`,
        searchDirs: this.capture.searchDirs,
      });
      this.currentHandle = handle;
      this.emit('capture_started', fileName);
      exit = await handle.completion;
    } catch (error) {
      await this.discard(filePath, fileName, describeError(error));
      return;
    } finally {
      this.currentHandle = null;
    }

    const stderr = exit.stderr;
    if (exit.exitCode !== 0 && !exit.cancelled) {
      console.warn(`[ChunkRecorder] Capture of ${fileName} exited with code ${exit.exitCode ?? 'null'}: ${stderr}`);
    }

    await this.delay(this.settleMs);

    const chunk: Chunk = {
      id: nanoid(),
      path: filePath,
      createdAt: startedAt,
      duration: this.chunkSeconds,
    };
    try {
      await this.store.add(chunk);
    } catch (error) {
      const reason =
        error instanceof EmptyChunkFileError && stderr.trim() !== ''
          ? new ChunkCaptureFailedError(fileName, stderr).message
          : describeError(error);
      await this.discard(filePath, fileName, reason);
      return;
    }

    this.consecutiveFailures = 0;
    this.emit('chunk_recorded', chunk);
  }

  private async discard(filePath: string, fileName: string, reason: string): Promise<void> {
    this.consecutiveFailures++;
    try {
      await deleteFileIfPresent(filePath);
    } catch (error) {
      console.warn(`[ChunkRecorder] Failed to delete partial ${fileName}: ${describeError(error)}`);
    }
    console.warn(`[ChunkRecorder] Discarded ${fileName}: ${reason}`);
    this.emit('chunk_discarded', {
      fileName,
      reason,
      consecutiveFailures: this.consecutiveFailures,
    });
  }

  /** Timer that stop() can cut short */
  private delay(ms: number): Promise<void> {
    if (!this.running || ms <= 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }

  // Type-safe event emitter methods
  override on<K extends keyof ChunkRecorderEvents>(event: K, listener: ChunkRecorderEvents[K]): this {
    return super.on(event, listener);
  }

  override emit<K extends keyof ChunkRecorderEvents>(
    event: K,
    ...args: Parameters<ChunkRecorderEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
