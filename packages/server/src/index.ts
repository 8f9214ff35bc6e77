import { parseArgs, resolveConfig } from './config.js';
import { InvalidConfigError } from './errors.js';
import { createServer } from './server.js';

function loadConfig() {
  try {
    return resolveConfig(parseArgs(process.argv.slice(2)));
  } catch (error) {
    if (error instanceof InvalidConfigError) {
      console.error(`[Config] ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

const config = loadConfig();

const server = createServer({ config });

async function main(): Promise<void> {
  await server.start();
  console.log(`Screen Rewind server running at http://${config.host}:${config.port}`);
  console.log(`WebSocket endpoint: ws://${config.host}:${config.port}/ws`);
  console.log(`Buffer: ${config.bufferDir} (${config.chunkSeconds}s chunks, ${config.bufferSeconds}s window)`);
  console.log(`Recordings: ${config.recordingsDir}`);
  console.log(`Capture backend: ${config.captureBackend}${config.useMock ? ' (mock)' : ''}`);

  if (config.autostart) {
    try {
      await server.getController().start();
    } catch (error) {
      // Server stays up; a client can start recording later
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[RecordingController] Could not start recording: ${message}`);
    }
  }
}

main().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});

let shuttingDown = false;

async function shutdown(): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  console.log('\nShutting down...');
  await server.stop();
  process.exit(0);
}

// Graceful shutdown
process.on('SIGINT', () => {
  shutdown().catch((error: unknown) => {
    console.error('Error during shutdown:', error);
    process.exit(1);
  });
});

process.on('SIGTERM', () => {
  shutdown().catch((error: unknown) => {
    console.error('Error during shutdown:', error);
    process.exit(1);
  });
});
