import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, existsSync, statSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { BufferStore } from '../buffer-store.js';
import { CaptureCommand } from '../capture-command.js';
import { ChunkRecorder, backoffDelay, type ChunkDiscardedEvent } from '../chunk-recorder.js';
import { MockProcessGateway, type MockProcessGatewayOptions } from '../mock-process-gateway.js';

describe('ChunkRecorder', () => {
  let dir: string;
  let store: BufferStore;
  let gateway: MockProcessGateway;
  let recorder: ChunkRecorder;

  function createRecorder(options: MockProcessGatewayOptions = { captureDurationMs: 5 }): void {
    gateway = new MockProcessGateway(options);
    recorder = new ChunkRecorder({
      gateway,
      store,
      capture: new CaptureCommand({ backend: 'screencapture' }),
      bufferDir: dir,
      chunkSeconds: 10,
      bufferSeconds: 120,
      settleMs: 0,
      restartDelayMs: 0,
    });
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'chunk-recorder-test-'));
    store = new BufferStore({ directory: dir });
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    createRecorder();
  });

  afterEach(async () => {
    await recorder.stop();
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  describe('recording loop', () => {
    it('should record non-empty chunks back to back', async () => {
      recorder.start();
      await vi.waitFor(() => expect(store.size).toBeGreaterThanOrEqual(3));
      await recorder.stop();

      for (const chunk of store.list()) {
        expect(statSync(chunk.path).size).toBe(1024);
        expect(chunk.duration).toBe(10);
      }
      expect(gateway.peakActive).toBe(1);
    });

    it('should invoke the capture tool for one chunk duration with a hard timeout', async () => {
      recorder.start();
      await vi.waitFor(() => expect(store.size).toBeGreaterThanOrEqual(1));
      await recorder.stop();

      const [spec] = gateway.launches;
      const outputPath = spec.args[3];
      expect(spec.command).toBe('screencapture');
      expect(spec.args.slice(0, 3)).toEqual(['-v', '-V', '10']);
      expect(outputPath).toMatch(/chunk_\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}\.\d{3}Z\.mov$/);
      expect(outputPath.startsWith(dir)).toBe(true);
      expect(spec.timeoutMs).toBe(20000);
    });

    it('should evict expired chunks before capturing', async () => {
      const oldPath = join(dir, 'chunk_old.mov');
      writeFileSync(oldPath, 'frames');
      await store.add({ id: 'old', path: oldPath, createdAt: Date.now() - 200_000, duration: 10 });

      const started = vi.fn();
      recorder.on('capture_started', started);
      recorder.start();
      await vi.waitFor(() => expect(started).toHaveBeenCalled());

      expect(store.list().map((chunk) => chunk.id)).not.toContain('old');
      expect(existsSync(oldPath)).toBe(false);
    });

    it('should emit chunk_recorded for each registered chunk', async () => {
      const recorded = vi.fn();
      recorder.on('chunk_recorded', recorded);

      recorder.start();
      await vi.waitFor(() => expect(recorded.mock.calls.length).toBeGreaterThanOrEqual(2));
      await recorder.stop();

      expect(store.list().slice(0, 2)).toEqual(recorded.mock.calls.slice(0, 2).map(([chunk]) => chunk));
    });
  });

  describe('self-healing', () => {
    it('should discard an empty capture and carry on', async () => {
      gateway.enqueue({ bytes: 0, stderr: 'screen recording not permitted' });
      const discarded: ChunkDiscardedEvent[] = [];
      recorder.on('chunk_discarded', (event) => discarded.push(event));

      recorder.start();
      await vi.waitFor(() => expect(store.size).toBeGreaterThanOrEqual(1));
      await recorder.stop();

      expect(discarded).toHaveLength(1);
      expect(discarded[0].consecutiveFailures).toBe(1);
      expect(discarded[0].reason).toContain('screen recording not permitted');
      expect(existsSync(join(dir, discarded[0].fileName))).toBe(false);
      expect(recorder.failureCount).toBe(0);
    });

    it('should discard a capture that never wrote a file', async () => {
      gateway.enqueue({ bytes: null, exitCode: 1 });
      const discarded = vi.fn();
      recorder.on('chunk_discarded', discarded);

      recorder.start();
      await vi.waitFor(() => expect(store.size).toBeGreaterThanOrEqual(1));
      await recorder.stop();

      expect(discarded).toHaveBeenCalledTimes(1);
      expect(gateway.launches.length).toBeGreaterThanOrEqual(2);
    });

    it('should discard a chunk the store cannot register', async () => {
      vi.spyOn(store, 'add').mockRejectedValueOnce(new Error('EACCES: permission denied'));
      const discarded: ChunkDiscardedEvent[] = [];
      recorder.on('chunk_discarded', (event) => discarded.push(event));

      recorder.start();
      await vi.waitFor(() => expect(store.size).toBeGreaterThanOrEqual(1));
      await recorder.stop();

      expect(discarded).toHaveLength(1);
      expect(discarded[0]).toMatchObject({ reason: 'EACCES: permission denied', consecutiveFailures: 1 });
      expect(existsSync(join(dir, discarded[0].fileName))).toBe(false);
      expect(recorder.failureCount).toBe(0);
    });

    it('should recover from a capture that failed to launch', async () => {
      gateway.enqueue({ launchError: 'spawn EACCES' });
      const discarded: ChunkDiscardedEvent[] = [];
      recorder.on('chunk_discarded', (event) => discarded.push(event));

      recorder.start();
      await vi.waitFor(() => expect(store.size).toBeGreaterThanOrEqual(1));
      await recorder.stop();

      expect(discarded[0].reason).toBe('Failed to launch capture ' + discarded[0].fileName + ': spawn EACCES');
    });

    it('should report a missing capture tool as a discarded chunk', async () => {
      createRecorder({ captureDurationMs: 5, missingExecutables: ['screencapture'] });
      const discarded: ChunkDiscardedEvent[] = [];
      recorder.on('chunk_discarded', (event) => discarded.push(event));

      recorder.start();
      await vi.waitFor(() => expect(discarded.length).toBeGreaterThanOrEqual(1));
      await recorder.stop();

      expect(discarded[0].reason).toBe('Executable not found: screencapture');
      expect(store.size).toBe(0);
    });
  });

  describe('backoff', () => {
    it('should back off for 1000ms after three consecutive failures', async () => {
      gateway.enqueue({ bytes: null }, { bytes: null }, { bytes: null });
      const backoff = vi.fn();
      recorder.on('backoff', backoff);

      recorder.start();
      await vi.waitFor(() => expect(backoff).toHaveBeenCalled());
      await recorder.stop();

      expect(backoff).toHaveBeenCalledTimes(1);
      expect(backoff).toHaveBeenCalledWith(1000, 3);
      // stop() cut the backoff short: no fourth attempt
      expect(gateway.launches).toHaveLength(3);
      expect(recorder.failureCount).toBe(3);
    });

    it('should double the delay per failure up to 30 seconds', () => {
      expect(backoffDelay(3)).toBe(1000);
      expect(backoffDelay(4)).toBe(2000);
      expect(backoffDelay(5)).toBe(4000);
      expect(backoffDelay(8)).toBe(30000);
      expect(backoffDelay(20)).toBe(30000);
    });
  });

  describe('start / stop', () => {
    it('should run a single loop when started twice', async () => {
      recorder.start();
      recorder.start();
      await vi.waitFor(() => expect(store.size).toBeGreaterThanOrEqual(2));
      await recorder.stop();

      expect(gateway.peakActive).toBe(1);
      expect(console.log).toHaveBeenCalledWith('[ChunkRecorder] Already running');
    });

    it('should cancel the capture in flight and keep its content', async () => {
      createRecorder({ captureDurationMs: 60_000 });
      recorder.start();
      await vi.waitFor(() => expect(recorder.isCapturing).toBe(true));

      await recorder.stop();

      expect(recorder.isRunning).toBe(false);
      expect(recorder.isCapturing).toBe(false);
      expect(gateway.launches).toHaveLength(1);
      expect(store.size).toBe(1);
    });

    it('should register nothing after stop resolves', async () => {
      recorder.start();
      await vi.waitFor(() => expect(store.size).toBeGreaterThanOrEqual(1));
      await recorder.stop();

      const count = store.size;
      const files = readdirSync(dir).length;
      await new Promise((resolve) => setTimeout(resolve, 50));

      expect(store.size).toBe(count);
      expect(readdirSync(dir)).toHaveLength(files);
      expect(gateway.activeCount).toBe(0);
    });

    it('should be idempotent', async () => {
      const stopped = vi.fn();
      recorder.on('stopped', stopped);
      await recorder.stop();

      recorder.start();
      await vi.waitFor(() => expect(store.size).toBeGreaterThanOrEqual(1));
      await recorder.stop();
      await recorder.stop();

      expect(stopped).toHaveBeenCalledTimes(1);
      expect(recorder.isRunning).toBe(false);
    });
  });
});
