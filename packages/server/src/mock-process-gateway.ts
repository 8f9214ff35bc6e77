import { readFileSync } from 'fs';
import { writeFile } from 'fs/promises';
import { ExecutableNotFoundError, ProcessFailedError, ProcessLaunchFailedError } from './errors.js';
import type { ProcessExit, ProcessGateway, ProcessHandle, ProcessSpec } from './process-gateway.js';

/**
 * Scripted result for one fake process.
 */
export interface MockOutcome {
  exitCode?: number;
  stderr?: string;
  /** Bytes written to the output path (last argument). 0 leaves an empty file, null writes nothing. */
  bytes?: number | null;
  /** Run time before the fake process exits */
  durationMs?: number;
  /** Reject completion as if spawn failed */
  launchError?: string;
}

export interface MockProcessGatewayOptions {
  /** Run time of fake captures (default: the duration in their arguments) */
  captureDurationMs?: number;
  /** Run time of fake merges (default: 50) */
  mergeDurationMs?: number;
  /** Bytes written by a successful fake process (default: 1024) */
  outputBytes?: number;
  /** Commands reported as not installed */
  missingExecutables?: string[];
}

const DEFAULT_MERGE_DURATION_MS = 50;
const DEFAULT_OUTPUT_BYTES = 1024;

function argAfter(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  return index === -1 ? undefined : args[index + 1];
}

function isMerge(spec: ProcessSpec): boolean {
  return argAfter(spec.args, '-f') === 'concat';
}

class MockProcessHandle implements ProcessHandle {
  readonly completion: Promise<ProcessExit>;
  private exited = false;
  private cancelled = false;
  private timedOut = false;
  private timer: NodeJS.Timeout | null = null;
  private finishEarly: (() => void) | null = null;

  constructor(
    readonly pid: number,
    readonly label: string,
    outputPath: string | undefined,
    durationMs: number,
    outcome: MockOutcome,
    outputBytes: number,
    timeoutMs: number | undefined,
    onSettled: () => void
  ) {
    this.completion = new Promise<ProcessExit>((resolve, reject) => {
      const finish = async (): Promise<void> => {
        if (this.exited) {
          return;
        }
        this.exited = true;
        if (this.timer) {
          clearTimeout(this.timer);
          this.timer = null;
        }

        try {
          if (outcome.launchError !== undefined) {
            throw new ProcessLaunchFailedError(label, new Error(outcome.launchError));
          }
          const bytes = outcome.bytes === undefined ? outputBytes : outcome.bytes;
          if (outputPath && bytes !== null) {
            await writeFile(outputPath, Buffer.alloc(bytes, 1));
          }
          const interrupted = this.cancelled || this.timedOut;
          resolve({
            exitCode: interrupted ? null : (outcome.exitCode ?? 0),
            signal: interrupted ? 'SIGTERM' : null,
            stdout: '',
            stderr: outcome.stderr ?? '',
            cancelled: this.cancelled,
            timedOut: this.timedOut,
          });
        } catch (error) {
          reject(error);
        } finally {
          onSettled();
        }
      };

      const runFor = timeoutMs !== undefined && timeoutMs < durationMs ? timeoutMs : durationMs;
      this.timer = setTimeout(() => {
        this.timedOut = runFor < durationMs;
        void finish();
      }, outcome.launchError !== undefined ? 0 : runFor);
      this.finishEarly = () => void finish();
    });
  }

  get isRunning(): boolean {
    return !this.exited;
  }

  cancel(): void {
    if (this.exited || this.cancelled) {
      return;
    }
    this.cancelled = true;
    this.finishEarly?.();
  }
}

/**
 * In-process gateway that fakes capture and merge processes by writing their
 * output files. Used by tests and by --mock mode.
 */
export class MockProcessGateway implements ProcessGateway {
  /** Every spec passed to launch(), in order */
  readonly launches: ProcessSpec[] = [];
  /** Contents of every concat list seen by a fake merge */
  readonly concatLists: string[] = [];
  /** Highest number of fake processes alive at once */
  peakActive = 0;

  private active = new Set<ProcessHandle>();
  private outcomes: MockOutcome[] = [];
  private missing: Set<string>;
  private nextPid = 10000;

  constructor(private options: MockProcessGatewayOptions = {}) {
    this.missing = new Set(options.missingExecutables ?? []);
  }

  get activeCount(): number {
    return this.active.size;
  }

  /** Script the next launches (first in, first out) */
  enqueue(...outcomes: MockOutcome[]): void {
    this.outcomes.push(...outcomes);
  }

  setMissing(command: string, missing: boolean): void {
    if (missing) {
      this.missing.add(command);
    } else {
      this.missing.delete(command);
    }
  }

  resolve(command: string): string | null {
    return this.missing.has(command) ? null : command;
  }

  launch(spec: ProcessSpec): ProcessHandle {
    if (this.missing.has(spec.command)) {
      throw new ExecutableNotFoundError(spec.command);
    }
    this.launches.push(spec);

    const merge = isMerge(spec);
    if (merge) {
      const listPath = argAfter(spec.args, '-i');
      if (listPath) {
        this.concatLists.push(readFileSync(listPath, 'utf-8'));
      }
    }

    const outcome = this.outcomes.shift() ?? {};
    const durationMs = outcome.durationMs ?? (merge ? this.mergeDurationMs() : this.captureDurationMs(spec));
    const outputPath = spec.args.length > 0 ? spec.args[spec.args.length - 1] : undefined;

    const handle: ProcessHandle = new MockProcessHandle(
      this.nextPid++,
      spec.label ?? spec.command,
      outputPath,
      durationMs,
      outcome,
      this.options.outputBytes ?? DEFAULT_OUTPUT_BYTES,
      spec.timeoutMs,
      () => {
        this.active.delete(handle);
      }
    );
    this.active.add(handle);
    this.peakActive = Math.max(this.peakActive, this.active.size);
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
    for (const handle of handles) {
      handle.cancel();
    }
    await Promise.allSettled(handles.map((handle) => handle.completion));
  }

  private mergeDurationMs(): number {
    return this.options.mergeDurationMs ?? DEFAULT_MERGE_DURATION_MS;
  }

  private captureDurationMs(spec: ProcessSpec): number {
    if (this.options.captureDurationMs !== undefined) {
      return this.options.captureDurationMs;
    }
    // screencapture: -V <seconds>, ffmpeg: -t <seconds>
    const seconds = Number(argAfter(spec.args, '-V') ?? argAfter(spec.args, '-t'));
    return Number.isFinite(seconds) ? seconds * 1000 : 0;
  }
}
