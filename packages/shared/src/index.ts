// WebSocket and REST message types for Screen Rewind

export * from './export-presets.js';

// ==================== Recorder Types ====================

/** Recording session state. There is no paused state: pausing is stop + start. */
export type RecordingState = 'idle' | 'recording';

/** How chunks are captured */
export type CaptureBackend = 'screencapture' | 'ffmpeg';

export const CAPTURE_BACKENDS: readonly CaptureBackend[] = ['screencapture', 'ffmpeg'];

export function isCaptureBackend(value: string): value is CaptureBackend {
  return (CAPTURE_BACKENDS as readonly string[]).includes(value);
}

/** Default capture backend for a platform (screencapture only exists on macOS) */
export function defaultCaptureBackend(platform: string): CaptureBackend {
  return platform === 'darwin' ? 'screencapture' : 'ffmpeg';
}

/** A chunk held in the rolling buffer, as seen by clients */
export interface ChunkInfo {
  id: string;
  /** File name inside the buffer directory */
  fileName: string;
  /** ISO timestamp of recording start */
  createdAt: string;
  /** Nominal duration in seconds */
  duration: number;
}

export type RecordingType = 'video';

/** A merged export owned by the recordings catalog */
export interface RecordingInfo {
  id: string;
  path: string;
  fileName: string;
  createdAt: string;
  /** Sum of the nominal durations of the merged chunks, in seconds */
  duration: number;
  fileSize: number;
  chunkCount: number;
  type: RecordingType;
}

export interface RecorderStatus {
  state: RecordingState;
  chunkCount: number;
  bufferedSeconds: number;
  oldestChunkAt: string | null;
  newestChunkAt: string | null;
  /** Whether a capture process is in flight */
  capturing: boolean;
  exporting: boolean;
  consecutiveFailures: number;
}

// ==================== Client → Server ====================

export type ClientMessage =
  | GetStatusMessage
  | StartRecordingMessage
  | StopRecordingMessage
  | ExportMessage
  | ListRecordingsMessage;

export interface GetStatusMessage {
  type: 'get_status';
}

export interface StartRecordingMessage {
  type: 'start_recording';
}

export interface StopRecordingMessage {
  type: 'stop_recording';
}

export interface ExportMessage {
  type: 'export';
  /** Trailing window in seconds. Defaults to the configured export window. */
  windowSeconds?: number;
}

export interface ListRecordingsMessage {
  type: 'list_recordings';
}

// ==================== Server → Client ====================

export type ServerMessage =
  | StatusMessage
  | RecordingStateChangedMessage
  | BufferChangedMessage
  | ChunkDiscardedMessage
  | ExportStartedMessage
  | ExportCompletedMessage
  | ExportFailedMessage
  | RecordingListMessage
  | ErrorMessage;

export interface StatusMessage {
  type: 'status';
  status: RecorderStatus;
}

export interface RecordingStateChangedMessage {
  type: 'recording_state_changed';
  state: RecordingState;
}

export interface BufferChangedMessage {
  type: 'buffer_changed';
  chunkCount: number;
  bufferedSeconds: number;
}

export interface ChunkDiscardedMessage {
  type: 'chunk_discarded';
  fileName: string;
  reason: string;
  consecutiveFailures: number;
}

export interface ExportStartedMessage {
  type: 'export_started';
  windowSeconds: number;
  chunkCount: number;
}

export interface ExportCompletedMessage {
  type: 'export_completed';
  recording: RecordingInfo;
}

export interface ExportFailedMessage {
  type: 'export_failed';
  code: string;
  message: string;
}

export interface RecordingListMessage {
  type: 'recording_list';
  recordings: RecordingInfo[];
}

export interface ErrorMessage {
  type: 'error';
  message: string;
  code?: string;
  /** Verbatim stderr of a failed external process */
  stderr?: string;
}
