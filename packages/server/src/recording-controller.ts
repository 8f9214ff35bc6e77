import { EventEmitter } from 'events';
import { mkdir } from 'fs/promises';
import type { RecorderStatus, RecordingState } from '@screen-rewind/shared';
import type { BufferStore } from './buffer-store.js';
import type { CaptureCommand } from './capture-command.js';
import type { ChunkRecorder } from './chunk-recorder.js';
import type { ExportCoordinator } from './export-coordinator.js';
import type { ProcessGateway } from './process-gateway.js';

export interface RecordingControllerOptions {
  gateway: ProcessGateway;
  store: BufferStore;
  recorder: ChunkRecorder;
  capture: CaptureCommand;
  bufferDir: string;
  /** Reported in status */
  exporter?: ExportCoordinator;
}

export interface RecordingControllerEvents {
  state_changed: (state: RecordingState) => void;
}

/**
 * Top-level start/stop state machine around the chunk recorder.
 * Transitions are applied one at a time, in call order.
 */
export class RecordingController extends EventEmitter {
  private gateway: ProcessGateway;
  private store: BufferStore;
  private recorder: ChunkRecorder;
  private capture: CaptureCommand;
  private bufferDir: string;
  private exporter: ExportCoordinator | undefined;
  private state: RecordingState = 'idle';
  private transitions: Promise<void> = Promise.resolve();

  constructor(options: RecordingControllerOptions) {
    super();
    this.gateway = options.gateway;
    this.store = options.store;
    this.recorder = options.recorder;
    this.capture = options.capture;
    this.bufferDir = options.bufferDir;
    this.exporter = options.exporter;
  }

  getState(): RecordingState {
    return this.state;
  }

  /**
   * Begin a fresh session: the buffer is emptied before the first chunk.
   * No-op while already recording.
   * @throws CaptureUnavailableError if the capture tool cannot be found
   */
  start(): Promise<void> {
    return this.transition(async () => {
      if (this.state === 'recording') {
        return;
      }

      const executable = this.capture.resolveExecutable((command, extraDirs) =>
        this.gateway.resolve(command, extraDirs)
      );
      console.log(`[RecordingController] Starting session (${this.capture.backend}: ${executable})`);

      await mkdir(this.bufferDir, { recursive: true });
      await this.store.clearAll();
      this.recorder.start();
      this.setState('recording');
    });
  }

  /**
   * Stop recording; resolves once the in-flight chunk has been settled.
   * No-op while idle.
   */
  stop(): Promise<void> {
    return this.transition(async () => {
      if (this.state === 'idle') {
        return;
      }
      await this.recorder.stop();
      this.setState('idle');
      console.log('[RecordingController] Session stopped');
    });
  }

  getStatus(): RecorderStatus {
    const chunks = this.store.list();
    return {
      state: this.state,
      chunkCount: chunks.length,
      bufferedSeconds: this.store.totalDuration(),
      oldestChunkAt: chunks.length > 0 ? new Date(chunks[0].createdAt).toISOString() : null,
      newestChunkAt: chunks.length > 0 ? new Date(chunks[chunks.length - 1].createdAt).toISOString() : null,
      capturing: this.recorder.isCapturing,
      exporting: this.exporter?.isExporting ?? false,
      consecutiveFailures: this.recorder.failureCount,
    };
  }

  private transition(task: () => Promise<void>): Promise<void> {
    const result = this.transitions.then(task);
    // Keep the chain alive after a failed transition; the caller gets the error
    this.transitions = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private setState(state: RecordingState): void {
    this.state = state;
    this.emit('state_changed', state);
  }

  // Type-safe event emitter methods
  override on<K extends keyof RecordingControllerEvents>(event: K, listener: RecordingControllerEvents[K]): this {
    return super.on(event, listener);
  }

  override emit<K extends keyof RecordingControllerEvents>(
    event: K,
    ...args: Parameters<RecordingControllerEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}
