/**
 * Runtime configuration: defaults, then environment variables, then CLI flags.
 */

import * as os from 'os';
import * as path from 'path';
import {
  type CaptureBackend,
  type ExportQuality,
  DEFAULT_EXPORT_QUALITY,
  defaultCaptureBackend,
  isCaptureBackend,
  isExportQuality,
} from '@screen-rewind/shared';
import { InvalidConfigError } from './errors.js';

export const DEFAULT_PORT = 3001;
export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_CHUNK_SECONDS = 10;
export const DEFAULT_BUFFER_SECONDS = 120;
export const DEFAULT_EXPORT_SECONDS = 60;

export interface RewindConfig {
  port: number;
  host: string;
  /** Root for the buffer, recordings and database unless set individually */
  dataDir: string;
  /** Rolling chunk files; cleared on every session start */
  bufferDir: string;
  /** Merged exports */
  recordingsDir: string;
  dbPath: string;
  /** Concat lists are written here */
  tempDir: string;
  chunkSeconds: number;
  bufferSeconds: number;
  exportSeconds: number;
  captureBackend: CaptureBackend;
  /** Override for the capture executable */
  capturePath?: string;
  /** Override for the ffmpeg used to merge */
  ffmpegPath?: string;
  exportQuality: ExportQuality;
  /** Fake capture and merge processes */
  useMock: boolean;
  /** Start recording as soon as the server is up */
  autostart: boolean;
}

/**
 * Unvalidated values from the command line. Numbers and enums stay strings
 * so that env and CLI share one validation path.
 */
export interface ConfigInput {
  port?: string;
  host?: string;
  dataDir?: string;
  bufferDir?: string;
  recordingsDir?: string;
  dbPath?: string;
  chunkSeconds?: string;
  bufferSeconds?: string;
  exportSeconds?: string;
  captureBackend?: string;
  capturePath?: string;
  ffmpegPath?: string;
  exportQuality?: string;
  useMock?: boolean;
  autostart?: boolean;
}

/**
 * Expand ~ to home directory in path.
 */
export function expandPath(value: string): string {
  if (value === '~') {
    return os.homedir();
  }
  if (value.startsWith('~/')) {
    return path.join(os.homedir(), value.slice(2));
  }
  return value;
}

function resolvePath(value: string): string {
  return path.resolve(expandPath(value));
}

function parsePositive(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidConfigError(`${name} must be a positive number, got "${raw}"`);
  }
  return value;
}

function parsePort(raw: string | undefined): number {
  const port = parsePositive('port', raw, DEFAULT_PORT);
  if (!Number.isInteger(port) || port > 65535) {
    throw new InvalidConfigError(`port must be an integer between 1 and 65535, got "${raw ?? ''}"`);
  }
  return port;
}

function isFlagSet(value: string | undefined): boolean {
  return value === 'true' || value === '1';
}

/** True when `child` is `parent` or lies inside it */
function isWithin(parent: string, child: string): boolean {
  const relative = path.relative(parent, child);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

/**
 * Parse command-line arguments into config input.
 */
export function parseArgs(argv: string[]): ConfigInput {
  const result: ConfigInput = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const nextArg = argv[i + 1];

    switch (arg) {
      case '--port':
        if (nextArg) {
          result.port = nextArg;
          i++;
        }
        break;
      case '--host':
        if (nextArg) {
          result.host = nextArg;
          i++;
        }
        break;
      case '--data-dir':
        if (nextArg) {
          result.dataDir = nextArg;
          i++;
        }
        break;
      case '--buffer-dir':
        if (nextArg) {
          result.bufferDir = nextArg;
          i++;
        }
        break;
      case '--recordings-dir':
        if (nextArg) {
          result.recordingsDir = nextArg;
          i++;
        }
        break;
      case '--db-path':
        if (nextArg) {
          result.dbPath = nextArg;
          i++;
        }
        break;
      case '--chunk-seconds':
        if (nextArg) {
          result.chunkSeconds = nextArg;
          i++;
        }
        break;
      case '--buffer-seconds':
        if (nextArg) {
          result.bufferSeconds = nextArg;
          i++;
        }
        break;
      case '--export-seconds':
        if (nextArg) {
          result.exportSeconds = nextArg;
          i++;
        }
        break;
      case '--capture-backend':
        if (nextArg) {
          result.captureBackend = nextArg;
          i++;
        }
        break;
      case '--capture-path':
        if (nextArg) {
          result.capturePath = nextArg;
          i++;
        }
        break;
      case '--ffmpeg-path':
        if (nextArg) {
          result.ffmpegPath = nextArg;
          i++;
        }
        break;
      case '--quality':
        if (nextArg) {
          result.exportQuality = nextArg;
          i++;
        }
        break;
      case '--mock':
        result.useMock = true;
        break;
      case '--no-autostart':
        result.autostart = false;
        break;
    }
  }

  return result;
}

/**
 * Merge defaults, environment and CLI input, then validate.
 * @throws InvalidConfigError
 */
export function resolveConfig(
  input: ConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): RewindConfig {
  const dataDir = resolvePath(input.dataDir ?? env.REWIND_DATA_DIR ?? '~/.screen-rewind');
  const bufferDir = resolvePath(input.bufferDir ?? env.REWIND_BUFFER_DIR ?? path.join(dataDir, 'buffer'));
  const recordingsDir = resolvePath(
    input.recordingsDir ?? env.REWIND_RECORDINGS_DIR ?? path.join(dataDir, 'recordings')
  );
  const dbPath = input.dbPath ?? env.REWIND_DB_PATH ?? path.join(dataDir, 'recordings.db');

  if (isWithin(bufferDir, recordingsDir) || isWithin(recordingsDir, bufferDir)) {
    throw new InvalidConfigError(
      `Buffer directory (${bufferDir}) and recordings directory (${recordingsDir}) must not overlap`
    );
  }

  const chunkSeconds = parsePositive('chunk seconds', input.chunkSeconds ?? env.REWIND_CHUNK_SECONDS, DEFAULT_CHUNK_SECONDS);
  const bufferSeconds = parsePositive(
    'buffer seconds',
    input.bufferSeconds ?? env.REWIND_BUFFER_SECONDS,
    DEFAULT_BUFFER_SECONDS
  );
  const exportSeconds = parsePositive(
    'export seconds',
    input.exportSeconds ?? env.REWIND_EXPORT_SECONDS,
    DEFAULT_EXPORT_SECONDS
  );

  if (bufferSeconds % chunkSeconds !== 0) {
    console.warn(
      `[Config] Buffer duration ${bufferSeconds}s is not a multiple of chunk duration ${chunkSeconds}s`
    );
  }

  const backendInput = input.captureBackend ?? env.REWIND_CAPTURE_BACKEND;
  let captureBackend = defaultCaptureBackend(platform);
  if (backendInput !== undefined) {
    if (!isCaptureBackend(backendInput)) {
      throw new InvalidConfigError(`Unknown capture backend: ${backendInput}`);
    }
    captureBackend = backendInput;
  }

  const qualityInput = input.exportQuality ?? env.REWIND_EXPORT_QUALITY;
  let exportQuality = DEFAULT_EXPORT_QUALITY;
  if (qualityInput !== undefined) {
    if (!isExportQuality(qualityInput)) {
      throw new InvalidConfigError(`Unknown export quality: ${qualityInput}`);
    }
    exportQuality = qualityInput;
  }

  const capturePath = input.capturePath ?? env.REWIND_CAPTURE_PATH;
  const ffmpegPath = input.ffmpegPath ?? env.REWIND_FFMPEG_PATH;

  return {
    port: parsePort(input.port ?? env.PORT),
    host: input.host ?? env.HOST ?? DEFAULT_HOST,
    dataDir,
    bufferDir,
    recordingsDir,
    dbPath: dbPath === ':memory:' ? dbPath : resolvePath(dbPath),
    tempDir: os.tmpdir(),
    chunkSeconds,
    bufferSeconds,
    exportSeconds,
    captureBackend,
    capturePath: capturePath ? expandPath(capturePath) : undefined,
    ffmpegPath: ffmpegPath ? expandPath(ffmpegPath) : undefined,
    exportQuality,
    useMock: input.useMock ?? isFlagSet(env.USE_MOCK),
    autostart: input.autostart ?? true,
  };
}
