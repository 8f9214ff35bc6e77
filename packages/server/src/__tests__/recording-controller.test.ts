import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { RecordingState } from '@screen-rewind/shared';
import { BufferStore } from '../buffer-store.js';
import { CaptureCommand } from '../capture-command.js';
import { ChunkRecorder } from '../chunk-recorder.js';
import { CaptureUnavailableError } from '../errors.js';
import { ExportCoordinator } from '../export-coordinator.js';
import { MockProcessGateway } from '../mock-process-gateway.js';
import { RecordingCatalog } from '../recording-catalog.js';
import { RecordingController } from '../recording-controller.js';

describe('RecordingController', () => {
  let root: string;
  let bufferDir: string;
  let gateway: MockProcessGateway;
  let store: BufferStore;
  let recorder: ChunkRecorder;
  let controller: RecordingController;
  let states: RecordingState[];

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'recording-controller-test-'));
    bufferDir = join(root, 'buffer');
    gateway = new MockProcessGateway({ captureDurationMs: 5 });
    store = new BufferStore({ directory: bufferDir });
    const capture = new CaptureCommand({ backend: 'screencapture' });
    recorder = new ChunkRecorder({
      gateway,
      store,
      capture,
      bufferDir,
      chunkSeconds: 10,
      bufferSeconds: 120,
      settleMs: 0,
      restartDelayMs: 0,
    });
    controller = new RecordingController({ gateway, store, recorder, capture, bufferDir });

    states = [];
    controller.on('state_changed', (state) => states.push(state));

    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    await controller.stop();
    vi.restoreAllMocks();
    rmSync(root, { recursive: true, force: true });
  });

  describe('start', () => {
    it('should begin recording into a freshly cleared buffer', async () => {
      mkdirSync(bufferDir);
      const stalePath = join(bufferDir, 'chunk_2024-01-01T00-00-00.000Z.mov');
      writeFileSync(stalePath, 'left over from a previous run');

      const sizeAtFirstCapture: number[] = [];
      recorder.on('capture_started', () => sizeAtFirstCapture.push(store.size));

      await controller.start();

      expect(controller.getState()).toBe('recording');
      expect(states).toEqual(['recording']);
      expect(existsSync(stalePath)).toBe(false);

      await vi.waitFor(() => expect(store.size).toBeGreaterThanOrEqual(1));
      expect(sizeAtFirstCapture[0]).toBe(0);
    });

    it('should start empty while an export still holds the previous chunks', async () => {
      mkdirSync(bufferDir);
      const oldPath = join(bufferDir, 'chunk_old.mov');
      writeFileSync(oldPath, 'previous session');
      await store.add({ id: 'old', path: oldPath, createdAt: Date.now() - 1000, duration: 10 });

      const catalog = new RecordingCatalog({ dbPath: ':memory:' });
      const exporter = new ExportCoordinator({
        gateway: new MockProcessGateway({ mergeDurationMs: 300 }),
        store,
        catalog,
        recordingsDir: join(root, 'recordings'),
        tempDir: root,
        exportSeconds: 60,
      });
      vi.spyOn(console, 'error').mockImplementation(() => {});

      const sizeAtFirstCapture: number[] = [];
      recorder.on('capture_started', () => sizeAtFirstCapture.push(store.size));

      const exported = exporter.exportLast();
      await controller.start();

      expect(store.list().map((chunk) => chunk.id)).not.toContain('old');
      expect(existsSync(oldPath)).toBe(true);

      const recording = await exported;
      expect(recording.chunkCount).toBe(1);
      expect(existsSync(oldPath)).toBe(false);

      await vi.waitFor(() => expect(sizeAtFirstCapture.length).toBeGreaterThanOrEqual(1));
      expect(sizeAtFirstCapture[0]).toBe(0);
      catalog.close();
    });

    it('should create the buffer directory', async () => {
      await controller.start();
      expect(existsSync(bufferDir)).toBe(true);
    });

    it('should be a no-op while recording', async () => {
      await controller.start();
      await controller.start();

      expect(states).toEqual(['recording']);
      await vi.waitFor(() => expect(store.size).toBeGreaterThanOrEqual(2));
      expect(gateway.peakActive).toBe(1);
    });

    it('should stay idle when the capture tool is unavailable', async () => {
      gateway.setMissing('screencapture', true);
      mkdirSync(bufferDir);
      const stalePath = join(bufferDir, 'chunk_2024-01-01T00-00-00.000Z.mov');
      writeFileSync(stalePath, 'left over');

      await expect(controller.start()).rejects.toBeInstanceOf(CaptureUnavailableError);

      expect(controller.getState()).toBe('idle');
      expect(states).toEqual([]);
      expect(gateway.launches).toHaveLength(0);
      expect(existsSync(stalePath)).toBe(true);
    });

    it('should accept a new start after a failed one', async () => {
      gateway.setMissing('screencapture', true);
      await expect(controller.start()).rejects.toThrow('Capture tool not found: screencapture');

      gateway.setMissing('screencapture', false);
      await controller.start();

      expect(controller.getState()).toBe('recording');
    });
  });

  describe('stop', () => {
    it('should stop the recorder and return to idle', async () => {
      await controller.start();
      await vi.waitFor(() => expect(store.size).toBeGreaterThanOrEqual(1));

      await controller.stop();

      expect(controller.getState()).toBe('idle');
      expect(recorder.isRunning).toBe(false);
      expect(gateway.activeCount).toBe(0);
      expect(states).toEqual(['recording', 'idle']);
    });

    it('should be idempotent', async () => {
      await controller.stop();
      await controller.start();
      await controller.stop();
      await controller.stop();

      expect(states).toEqual(['recording', 'idle']);
    });

    it('should keep the buffer for export after stopping', async () => {
      await controller.start();
      await vi.waitFor(() => expect(store.size).toBeGreaterThanOrEqual(1));
      await controller.stop();

      expect(store.size).toBeGreaterThanOrEqual(1);
    });
  });

  it('should apply concurrent transitions in call order', async () => {
    await Promise.all([controller.start(), controller.stop(), controller.start()]);

    expect(states).toEqual(['recording', 'idle', 'recording']);
    expect(controller.getState()).toBe('recording');
  });

  describe('getStatus', () => {
    it('should report an idle, empty recorder', () => {
      expect(controller.getStatus()).toEqual({
        state: 'idle',
        chunkCount: 0,
        bufferedSeconds: 0,
        oldestChunkAt: null,
        newestChunkAt: null,
        capturing: false,
        exporting: false,
        consecutiveFailures: 0,
      });
    });

    it('should summarize the buffer', async () => {
      await controller.start();
      await vi.waitFor(() => expect(store.size).toBeGreaterThanOrEqual(2));
      await controller.stop();

      const chunks = store.list();
      const status = controller.getStatus();
      expect(status.state).toBe('idle');
      expect(status.chunkCount).toBe(chunks.length);
      expect(status.bufferedSeconds).toBe(chunks.length * 10);
      expect(status.oldestChunkAt).toBe(new Date(chunks[0].createdAt).toISOString());
      expect(status.newestChunkAt).toBe(new Date(chunks[chunks.length - 1].createdAt).toISOString());
      expect(status.capturing).toBe(false);
    });
  });
});
