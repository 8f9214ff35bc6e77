import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { getRequestListener } from '@hono/node-server';
import { WebSocketServer, WebSocket } from 'ws';
import { createServer as createHttpServer, type Server as HttpServer } from 'node:http';
import { z } from 'zod';
import type { ClientMessage, ServerMessage } from '@screen-rewind/shared';
import { BufferStore, toChunkInfo } from './buffer-store.js';
import { CaptureCommand } from './capture-command.js';
import { ChunkRecorder } from './chunk-recorder.js';
import type { RewindConfig } from './config.js';
import { RewindError, RecordingNotFoundError, getErrorStderr, getStatusCodeForError } from './errors.js';
import { ExportCoordinator } from './export-coordinator.js';
import { MockProcessGateway } from './mock-process-gateway.js';
import { ChildProcessGateway, type ProcessGateway } from './process-gateway.js';
import { RecordingCatalog } from './recording-catalog.js';
import { RecordingController } from './recording-controller.js';

export interface ServerOptions {
  config: RewindConfig;
  /** Process gateway to use instead of the one chosen by config.useMock */
  gateway?: ProcessGateway;
  /** Recorder timing overrides */
  settleMs?: number;
  restartDelayMs?: number;
}

export interface RewindServer {
  app: Hono;
  start(): Promise<void>;
  stop(): Promise<void>;
  getController(): RecordingController;
  getExportCoordinator(): ExportCoordinator;
  getCatalog(): RecordingCatalog;
  getBufferStore(): BufferStore;
}

const exportRequestSchema = z.object({
  windowSeconds: z.number().positive().optional(),
});

const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('get_status') }),
  z.object({ type: z.literal('start_recording') }),
  z.object({ type: z.literal('stop_recording') }),
  z.object({ type: z.literal('export'), windowSeconds: z.number().positive().optional() }),
  z.object({ type: z.literal('list_recordings') }),
]);

function errorMessage(error: unknown): ServerMessage {
  if (error instanceof RewindError) {
    return { type: 'error', message: error.message, code: error.code, stderr: getErrorStderr(error) };
  }
  return { type: 'error', message: error instanceof Error ? error.message : String(error) };
}

export function createServer(options: ServerOptions): RewindServer {
  const { config } = options;

  const gateway: ProcessGateway =
    options.gateway ?? (config.useMock ? new MockProcessGateway() : new ChildProcessGateway());
  if (!options.gateway && config.useMock) {
    console.log('[Server] Using mock process gateway');
  }

  const store = new BufferStore({ directory: config.bufferDir });
  const capture = new CaptureCommand({ backend: config.captureBackend, executablePath: config.capturePath });
  const recorder = new ChunkRecorder({
    gateway,
    store,
    capture,
    bufferDir: config.bufferDir,
    chunkSeconds: config.chunkSeconds,
    bufferSeconds: config.bufferSeconds,
    settleMs: options.settleMs,
    restartDelayMs: options.restartDelayMs,
  });
  const catalog = new RecordingCatalog({ dbPath: config.dbPath });
  const exporter = new ExportCoordinator({
    gateway,
    store,
    catalog,
    recordingsDir: config.recordingsDir,
    tempDir: config.tempDir,
    exportSeconds: config.exportSeconds,
    quality: config.exportQuality,
    ffmpegPath: config.ffmpegPath,
  });
  const controller = new RecordingController({
    gateway,
    store,
    recorder,
    capture,
    bufferDir: config.bufferDir,
    exporter,
  });

  const app = new Hono();
  let httpServer: HttpServer | null = null;
  let wss: WebSocketServer | null = null;

  // All connected WebSocket clients
  const allClients = new Set<WebSocket>();

  function send(ws: WebSocket, message: ServerMessage): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
    }
  }

  function broadcast(message: ServerMessage): void {
    for (const ws of allClients) {
      send(ws, message);
    }
  }

  // Relay component events to every client
  controller.on('state_changed', (state) => {
    broadcast({ type: 'recording_state_changed', state });
  });

  store.on('changed', (chunks) => {
    broadcast({
      type: 'buffer_changed',
      chunkCount: chunks.length,
      bufferedSeconds: chunks.reduce((total, chunk) => total + chunk.duration, 0),
    });
  });

  recorder.on('chunk_discarded', (event) => {
    broadcast({ type: 'chunk_discarded', ...event });
  });

  exporter.on('export_started', (windowSeconds, chunkCount) => {
    broadcast({ type: 'export_started', windowSeconds, chunkCount });
  });

  exporter.on('export_completed', (recording) => {
    broadcast({ type: 'export_completed', recording });
  });

  exporter.on('export_failed', (error) => {
    broadcast({
      type: 'export_failed',
      code: error instanceof RewindError ? error.code : 'EXPORT_FAILED',
      message: error.message,
    });
  });

  // CORS middleware
  app.use('*', cors());

  app.onError((error, c) => {
    if (error instanceof RewindError) {
      const stderr = getErrorStderr(error);
      return c.json(
        { error: error.message, code: error.code, ...(stderr !== undefined ? { stderr } : {}) },
        getStatusCodeForError(error)
      );
    }
    console.error('[Server] Unhandled error:', error);
    return c.json({ error: 'Internal server error', code: 'INTERNAL_ERROR' }, 500);
  });

  // Health check endpoint
  app.get('/health', (c) => {
    return c.json({ status: 'ok' });
  });

  app.get('/api/status', (c) => {
    return c.json(controller.getStatus());
  });

  app.post('/api/recording/start', async (c) => {
    await controller.start();
    return c.json(controller.getStatus());
  });

  app.post('/api/recording/stop', async (c) => {
    await controller.stop();
    return c.json(controller.getStatus());
  });

  app.get('/api/buffer', (c) => {
    return c.json({ chunks: store.list().map(toChunkInfo) });
  });

  app.post('/api/exports', async (c) => {
    const raw = await c.req.text();
    let payload: unknown = {};
    if (raw.trim() !== '') {
      try {
        payload = JSON.parse(raw);
      } catch {
        return c.json({ error: 'Request body is not valid JSON', code: 'INVALID_REQUEST' }, 400);
      }
    }

    const parsed = exportRequestSchema.safeParse(payload);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return c.json(
        { error: issue ? `${issue.path.join('.')}: ${issue.message}` : 'Invalid request', code: 'INVALID_REQUEST' },
        400
      );
    }

    const recording = await exporter.exportLast(parsed.data.windowSeconds);
    return c.json({ recording }, 201);
  });

  app.get('/api/recordings', (c) => {
    return c.json({ recordings: catalog.list() });
  });

  app.delete('/api/recordings/:id', async (c) => {
    const id = c.req.param('id');
    const deleted = await catalog.delete(id);
    if (!deleted) {
      throw new RecordingNotFoundError(id);
    }
    return c.body(null, 204);
  });

  async function handleMessage(ws: WebSocket, message: ClientMessage): Promise<void> {
    switch (message.type) {
      case 'get_status':
        send(ws, { type: 'status', status: controller.getStatus() });
        break;

      case 'start_recording':
        await controller.start();
        send(ws, { type: 'status', status: controller.getStatus() });
        break;

      case 'stop_recording':
        await controller.stop();
        send(ws, { type: 'status', status: controller.getStatus() });
        break;

      case 'export':
        // The export_completed broadcast reaches this client as well
        await exporter.exportLast(message.windowSeconds);
        break;

      case 'list_recordings':
        send(ws, { type: 'recording_list', recordings: catalog.list() });
        break;
    }
  }

  return {
    app,

    async start() {
      return new Promise((resolve, reject) => {
        httpServer = createHttpServer(getRequestListener(app.fetch));

        // WebSocket upgrades on /ws share the HTTP port
        wss = new WebSocketServer({ server: httpServer, path: '/ws' });

        wss.on('connection', (ws) => {
          allClients.add(ws);
          send(ws, { type: 'status', status: controller.getStatus() });

          ws.on('message', (data) => {
            let payload: unknown;
            try {
              payload = JSON.parse(data.toString());
            } catch {
              send(ws, { type: 'error', message: 'Invalid message format' });
              return;
            }

            const parsed = clientMessageSchema.safeParse(payload);
            if (!parsed.success) {
              send(ws, { type: 'error', message: 'Unknown message type' });
              return;
            }

            handleMessage(ws, parsed.data).catch((error: unknown) => {
              console.error('[Server] Error handling message:', error);
              send(ws, errorMessage(error));
            });
          });

          ws.on('close', () => {
            allClients.delete(ws);
          });
        });

        httpServer.once('error', reject);
        httpServer.listen(config.port, config.host, () => {
          resolve();
        });
      });
    },

    async stop() {
      await controller.stop();
      await gateway.shutdown();

      for (const ws of allClients) {
        ws.close();
      }
      allClients.clear();
      wss?.close();

      await new Promise<void>((resolve) => {
        if (!httpServer) {
          resolve();
          return;
        }
        httpServer.close((error) => {
          if (error) {
            console.warn(`[Server] HTTP server close: ${error.message}`);
          }
          resolve();
        });
      });

      catalog.close();
    },

    getController() {
      return controller;
    },

    getExportCoordinator() {
      return exporter;
    },

    getCatalog() {
      return catalog;
    },

    getBufferStore() {
      return store;
    },
  };
}
