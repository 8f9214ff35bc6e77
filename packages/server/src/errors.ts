/**
 * Domain errors for the recording core.
 *
 * Every error carries a stable `code` so the control server can map it to an
 * HTTP status and clients can branch on it without parsing messages.
 */
export abstract class RewindError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = this.constructor.name;
    // Restore the prototype chain (extending Error loses it when downleveled)
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ==================== Process Gateway ====================

export class ExecutableNotFoundError extends RewindError {
  constructor(public readonly executable: string) {
    super(`Executable not found: ${executable}`, 'EXECUTABLE_NOT_FOUND');
  }
}

export class ProcessLaunchFailedError extends RewindError {
  constructor(executable: string, cause: Error) {
    super(`Failed to launch ${executable}: ${cause.message}`, 'PROCESS_LAUNCH_FAILED');
  }
}

export class ProcessFailedError extends RewindError {
  constructor(
    label: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
    public readonly cancelled = false
  ) {
    super(
      cancelled ? `${label} was cancelled` : `${label} exited with code ${exitCode ?? 'null'}: ${stderr}`,
      'PROCESS_FAILED'
    );
  }
}

// ==================== Capture ====================

export class CaptureUnavailableError extends RewindError {
  constructor(message: string) {
    super(message, 'CAPTURE_UNAVAILABLE');
  }
}

export class ChunkCaptureFailedError extends RewindError {
  constructor(
    fileName: string,
    public readonly stderr: string
  ) {
    super(`Capture of ${fileName} produced no file: ${stderr}`, 'CHUNK_CAPTURE_FAILED');
  }
}

export class EmptyChunkFileError extends RewindError {
  constructor(public readonly path: string) {
    super(`Chunk file is missing or empty: ${path}`, 'EMPTY_CHUNK_FILE');
  }
}

// ==================== Export ====================

export class EncoderNotFoundError extends RewindError {
  constructor(executable: string) {
    super(`Encoder not found (${executable}). Install FFmpeg, e.g. brew install ffmpeg`, 'ENCODER_NOT_FOUND');
  }
}

export class MergeFailedError extends RewindError {
  constructor(public readonly stderr: string) {
    super(`Merge failed: ${stderr}`, 'MERGE_FAILED');
  }
}

export class NoChunksAvailableError extends RewindError {
  constructor(windowSeconds: number) {
    super(`No chunks recorded in the last ${windowSeconds} seconds`, 'NO_CHUNKS_AVAILABLE');
  }
}

export class ExportInProgressError extends RewindError {
  constructor() {
    super('An export is already in progress', 'EXPORT_IN_PROGRESS');
  }
}

// ==================== Catalog / Config ====================

export class RecordingNotFoundError extends RewindError {
  constructor(id: string) {
    super(`Recording not found: ${id}`, 'RECORDING_NOT_FOUND');
  }
}

export class InvalidConfigError extends RewindError {
  constructor(message: string) {
    super(message, 'INVALID_CONFIG');
  }
}

/**
 * HTTP status for a domain error code
 */
export function getStatusCodeForError(error: RewindError): 400 | 404 | 409 | 500 | 503 {
  switch (error.code) {
    case 'NO_CHUNKS_AVAILABLE':
    case 'RECORDING_NOT_FOUND':
      return 404;

    case 'EXPORT_IN_PROGRESS':
      return 409;

    case 'INVALID_CONFIG':
      return 400;

    // External tool missing or not permitted
    case 'CAPTURE_UNAVAILABLE':
    case 'ENCODER_NOT_FOUND':
    case 'EXECUTABLE_NOT_FOUND':
      return 503;

    default:
      return 500;
  }
}

/**
 * Verbatim stderr carried by process-backed errors, if any
 */
export function getErrorStderr(error: unknown): string | undefined {
  if (error instanceof MergeFailedError || error instanceof ProcessFailedError || error instanceof ChunkCaptureFailedError) {
    return error.stderr;
  }
  return undefined;
}

/**
 * `code` of a Node.js system error (ENOENT, EACCES, ...), if any
 */
export function getErrnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
