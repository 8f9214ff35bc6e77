import { spawn, type ChildProcess } from 'node:child_process';
import { statSync, accessSync, constants } from 'node:fs';
import { delimiter, join, resolve } from 'node:path';
import { ExecutableNotFoundError, ProcessFailedError, ProcessLaunchFailedError } from './errors.js';

export interface ProcessSpec {
  /** Executable name (searched in PATH) or path */
  command: string;
  args: string[];
  /** Hard timeout; the process is terminated when it elapses */
  timeoutMs?: number;
  /** Capture stdout/stderr (default: true) */
  captureOutput?: boolean;
  /** Name used in log lines and errors (default: command) */
  label?: string;
  /** Extra directories searched after PATH */
  searchDirs?: string[];
}

export interface ProcessExit {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  cancelled: boolean;
  timedOut: boolean;
}

export interface ProcessHandle {
  readonly pid: number | undefined;
  readonly label: string;
  readonly isRunning: boolean;
  /**
   * Settles once the process has exited and all its timers are cleared.
   * Rejects only when the process could not be spawned.
   */
  readonly completion: Promise<ProcessExit>;
  /** Terminate the process. Idempotent, and a no-op after exit. */
  cancel(): void;
}

/**
 * Interface for process gateway implementations (real or mock)
 */
export interface ProcessGateway {
  readonly activeCount: number;
  /** Absolute path of `command`, or null if it is not installed */
  resolve(command: string, extraDirs?: string[]): string | null;
  launch(spec: ProcessSpec): ProcessHandle;
  /** Launch, await, and throw ProcessFailedError on a non-zero exit */
  run(spec: ProcessSpec): Promise<ProcessExit>;
  /** Cancel every live process and wait for all of them to exit */
  shutdown(): Promise<void>;
}

export interface ChildProcessGatewayOptions {
  /** Delay between SIGTERM and SIGKILL (default: 5000) */
  killGraceMs?: number;
  /** Directories searched after PATH for every launch */
  searchDirs?: string[];
}

const DEFAULT_KILL_GRACE_MS = 5000;

// ffmpeg prints progress to stderr for the whole merge; keep only the tail
const MAX_CAPTURED_OUTPUT = 256 * 1024;

/** Usual install locations for ffmpeg (Homebrew, MacPorts, system) */
export const FFMPEG_SEARCH_DIRS = ['/opt/homebrew/bin', '/usr/local/bin', '/usr/bin', '/opt/local/bin'];

function isExecutableFile(candidate: string): boolean {
  try {
    if (!statSync(candidate).isFile()) {
      return false;
    }
    accessSync(candidate, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve an executable to an absolute path.
 * Names containing a path separator are checked as-is; bare names are looked up
 * in PATH, then in `extraDirs`.
 */
export function findExecutable(command: string, extraDirs: string[] = []): string | null {
  if (command.includes('/') || command.includes('\\')) {
    const absolute = resolve(command);
    return isExecutableFile(absolute) ? absolute : null;
  }

  const pathDirs = (process.env.PATH ?? '').split(delimiter).filter((dir) => dir.length > 0);
  const names = process.platform === 'win32' ? [command, `${command}.exe`] : [command];

  for (const dir of [...pathDirs, ...extraDirs]) {
    for (const name of names) {
      const candidate = join(dir, name);
      if (isExecutableFile(candidate)) {
        return candidate;
      }
    }
  }
  return null;
}

function appendTail(buffer: string, chunk: string): string {
  const combined = buffer + chunk;
  return combined.length > MAX_CAPTURED_OUTPUT ? combined.slice(-MAX_CAPTURED_OUTPUT) : combined;
}

class ChildProcessHandle implements ProcessHandle {
  readonly label: string;
  readonly completion: Promise<ProcessExit>;
  private child: ChildProcess;
  private exited = false;
  private cancelled = false;
  private timedOut = false;
  private stdout = '';
  private stderr = '';
  private timeoutTimer: NodeJS.Timeout | null = null;
  private killTimer: NodeJS.Timeout | null = null;

  constructor(
    executable: string,
    spec: ProcessSpec,
    private readonly killGraceMs: number,
    onSettled: () => void
  ) {
    this.label = spec.label ?? spec.command;
    const captureOutput = spec.captureOutput ?? true;

    this.child = spawn(executable, spec.args, {
      stdio: captureOutput ? ['ignore', 'pipe', 'pipe'] : 'ignore',
    });

    this.completion = new Promise<ProcessExit>((resolvePromise, reject) => {
      this.child.stdout?.on('data', (data: Buffer) => {
        this.stdout = appendTail(this.stdout, data.toString());
      });

      this.child.stderr?.on('data', (data: Buffer) => {
        this.stderr = appendTail(this.stderr, data.toString());
      });

      this.child.on('error', (error) => {
        // Spawn failures arrive here instead of 'close'
        if (this.settle()) {
          onSettled();
          reject(new ProcessLaunchFailedError(executable, error));
        }
      });

      this.child.on('close', (code, signal) => {
        if (this.settle()) {
          onSettled();
          resolvePromise({
            exitCode: code,
            signal,
            stdout: this.stdout,
            stderr: this.stderr,
            cancelled: this.cancelled,
            timedOut: this.timedOut,
          });
        }
      });
    });

    if (spec.timeoutMs !== undefined) {
      this.timeoutTimer = setTimeout(() => {
        console.warn(`[ProcessGateway] ${this.label} exceeded ${spec.timeoutMs}ms, terminating`);
        this.timedOut = true;
        this.terminate();
      }, spec.timeoutMs);
    }
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get isRunning(): boolean {
    return !this.exited;
  }

  cancel(): void {
    if (this.exited || this.cancelled) {
      return;
    }
    this.cancelled = true;
    this.terminate();
  }

  private terminate(): void {
    if (this.exited || this.killTimer) {
      return;
    }
    this.child.kill('SIGTERM');
    this.killTimer = setTimeout(() => {
      if (!this.exited) {
        console.warn(`[ProcessGateway] ${this.label} ignored SIGTERM, sending SIGKILL`);
        this.child.kill('SIGKILL');
      }
    }, this.killGraceMs);
  }

  /** Mark the process as exited; returns false if it already was */
  private settle(): boolean {
    if (this.exited) {
      return false;
    }
    this.exited = true;
    if (this.timeoutTimer) {
      clearTimeout(this.timeoutTimer);
      this.timeoutTimer = null;
    }
    if (this.killTimer) {
      clearTimeout(this.killTimer);
      this.killTimer = null;
    }
    return true;
  }
}

/**
 * Spawns and supervises external capture / encode processes.
 * Every handle is tracked until its process exits, so shutdown() can reap them all.
 */
export class ChildProcessGateway implements ProcessGateway {
  private active = new Set<ProcessHandle>();
  private killGraceMs: number;
  private searchDirs: string[];

  constructor(options: ChildProcessGatewayOptions = {}) {
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.searchDirs = options.searchDirs ?? [];
  }

  get activeCount(): number {
    return this.active.size;
  }

  resolve(command: string, extraDirs: string[] = []): string | null {
    return findExecutable(command, [...this.searchDirs, ...extraDirs]);
  }

  launch(spec: ProcessSpec): ProcessHandle {
    const executable = this.resolve(spec.command, spec.searchDirs);
    if (!executable) {
      throw new ExecutableNotFoundError(spec.command);
    }

    const handle: ProcessHandle = new ChildProcessHandle(executable, spec, this.killGraceMs, () => {
      this.active.delete(handle);
    });
    this.active.add(handle);
    console.log(`[ProcessGateway] Started ${handle.label} (pid ${handle.pid ?? 'unknown'})`);
    return handle;
  }

  async run(spec: ProcessSpec): Promise<ProcessExit> {
    const handle = this.launch(spec);
    const exit = await handle.completion;
    if (exit.exitCode !== 0) {
      throw new ProcessFailedError(handle.label, exit.exitCode, exit.stderr, exit.cancelled);
    }
    return exit;
  }

  async shutdown(): Promise<void> {
    const handles = [...this.active];
    if (handles.length === 0) {
      return;
    }
    console.log(`[ProcessGateway] Terminating ${handles.length} process(es)`);
    for (const handle of handles) {
      handle.cancel();
    }
    await Promise.allSettled(handles.map((handle) => handle.completion));
  }
}
