/**
 * Capture invocations for each capture backend.
 */

import type { CaptureBackend } from '@screen-rewind/shared';
import { CaptureUnavailableError } from './errors.js';
import { FFMPEG_SEARCH_DIRS, findExecutable } from './process-gateway.js';
import { CHUNK_FILE_PREFIX } from './buffer-store.js';

export interface CaptureCommandOptions {
  backend: CaptureBackend;
  /** Override for the executable (default: backend name, searched in PATH) */
  executablePath?: string;
  platform?: NodeJS.Platform;
  /** X11 display for ffmpeg on Linux (default: $DISPLAY or :0.0) */
  display?: string;
}

export type ExecutableResolver = (command: string, extraDirs: string[]) => string | null;

const FFMPEG_FRAMERATE = 30;

/**
 * Sortable, millisecond-resolution chunk file name, e.g.
 * chunk_2024-05-01T12-30-00.250Z.mov
 */
export function chunkFileName(date: Date, extension: string): string {
  return `${CHUNK_FILE_PREFIX}${date.toISOString().replace(/:/g, '-')}.${extension}`;
}

function ffmpegGrabInput(platform: NodeJS.Platform, display: string | undefined): { format: string; input: string } {
  switch (platform) {
    case 'darwin':
      // Device 1 is the main screen; no audio
      return { format: 'avfoundation', input: '1:none' };
    case 'win32':
      return { format: 'gdigrab', input: 'desktop' };
    default:
      return { format: 'x11grab', input: display ?? process.env.DISPLAY ?? ':0.0' };
  }
}

export class CaptureCommand {
  readonly backend: CaptureBackend;
  readonly command: string;
  readonly extension: string;
  readonly searchDirs: string[];
  private platform: NodeJS.Platform;
  private display: string | undefined;

  constructor(options: CaptureCommandOptions) {
    this.backend = options.backend;
    this.command = options.executablePath ?? options.backend;
    this.extension = options.backend === 'screencapture' ? 'mov' : 'mp4';
    this.searchDirs = options.backend === 'ffmpeg' ? FFMPEG_SEARCH_DIRS : [];
    this.platform = options.platform ?? process.platform;
    this.display = options.display;
  }

  /**
   * Arguments recording `seconds` of the screen into `outputPath`.
   * The process is expected to exit by itself when the duration elapses.
   */
  buildArgs(outputPath: string, seconds: number): string[] {
    if (this.backend === 'screencapture') {
      return ['-v', '-V', String(seconds), outputPath];
    }

    const { format, input } = ffmpegGrabInput(this.platform, this.display);
    return [
      '-y',
      '-f', format,
      '-framerate', String(FFMPEG_FRAMERATE),
      '-i', input,
      '-t', String(seconds),
      '-c:v', 'libx264',
      '-preset', 'ultrafast',
      '-pix_fmt', 'yuv420p',
      outputPath,
    ];
  }

  /**
   * Absolute path of the capture executable.
   * @throws CaptureUnavailableError
   */
  resolveExecutable(resolver: ExecutableResolver = findExecutable): string {
    const executable = resolver(this.command, this.searchDirs);
    if (!executable) {
      const hint = this.backend === 'screencapture'
        ? 'screencapture is only available on macOS; use the ffmpeg backend elsewhere'
        : 'install FFmpeg or set REWIND_CAPTURE_PATH';
      throw new CaptureUnavailableError(`Capture tool not found: ${this.command} (${hint})`);
    }
    return executable;
  }
}
