import { spawn, type ChildProcess } from 'node:child_process';
import type { AudioCapability } from '../audio';
import { abortable, logError } from '../utils/errors';
import { logger } from '../utils/log';
import { TIMEOUTS } from '../utils/timeout';
import type { StatusIndicator } from './indicator';

export type ProcessRole = 'recorder' | 'indicator';

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** Spawn failure, e.g. ENOENT */
  error?: Error;
  at: number;
}

export type ExitOutcome =
  | { kind: 'completed' }
  | { kind: 'stopped' }
  | { kind: 'timeout'; afterMs: number }
  | { kind: 'failed'; code: number | null; signal: NodeJS.Signals | null; message?: string };

interface ProcessHandleParams {
  role: ProcessRole;
  name: string;
  child: ChildProcess;
  stopSignal: NodeJS.Signals;
  maxDurationMs?: number;
  selfTerminates?: boolean;
}

const STDERR_TAIL_BYTES = 300;

/**
 * One supervised child process. The handle observes the child's exit itself, so
 * liveness never depends on someone awaiting `exited`.
 */
export class ProcessHandle {
  readonly role: ProcessRole;
  readonly name: string;
  readonly child: ChildProcess;
  readonly stopSignal: NodeJS.Signals;
  readonly startedAt = Date.now();
  readonly maxDurationMs?: number;
  readonly selfTerminates: boolean;
  readonly exited: Promise<ProcessExit>;
  stopRequested = false;
  timedOut = false;
  private exitInfo?: ProcessExit;
  private stderrTail = '';

  constructor(params: ProcessHandleParams) {
    this.role = params.role;
    this.name = params.name;
    this.child = params.child;
    this.stopSignal = params.stopSignal;
    this.maxDurationMs = params.maxDurationMs;
    this.selfTerminates = params.selfTerminates ?? false;

    this.exited = new Promise((resolve) => {
      const record = (exit: ProcessExit) => {
        if (this.exitInfo) return;
        this.exitInfo = exit;
        resolve(exit);
      };
      this.child.once('error', (error: Error) => {
        record({ code: null, signal: null, error, at: Date.now() });
      });
      this.child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
        record({ code, signal, at: Date.now() });
      });
    });

    this.child.stderr?.on('data', (chunk: Buffer) => {
      this.stderrTail = (this.stderrTail + chunk.toString()).slice(-STDERR_TAIL_BYTES);
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get exit(): ProcessExit | undefined {
    return this.exitInfo;
  }

  get stderr(): string {
    return this.stderrTail.trim();
  }
}

export interface SupervisorOptions {
  /** How long a signalled process gets before SIGKILL */
  teardownGraceMs?: number;
  /** Extra time before the watchdog fires for self-terminating recorders */
  selfStopGraceMs?: number;
}

/**
 * Starts, watches and stops the recorder and its status indicator.
 */
export class ProcessSupervisor {
  private readonly teardownGraceMs: number;
  private readonly selfStopGraceMs: number;

  constructor(options: SupervisorOptions = {}) {
    this.teardownGraceMs = options.teardownGraceMs ?? TIMEOUTS.PROCESS_TEARDOWN;
    this.selfStopGraceMs = options.selfStopGraceMs ?? TIMEOUTS.SELF_STOP_GRACE;
  }

  /**
   * Launches the recorder detached from the terminal's process group and arms
   * the duration watchdog. On expiry the recorder gets its graceful stop
   * signal so it can finalize the WAV header; SIGKILL follows only if it is
   * still running after the teardown grace period.
   */
  start(capability: AudioCapability, outputPath: string, maxDurationMs: number): ProcessHandle {
    const maxDurationSec = Math.max(1, Math.ceil(maxDurationMs / 1000));
    const args = capability.buildArgs(outputPath, maxDurationSec);
    logger.log(`[ProcessSupervisor] starting ${capability.command} ${args.join(' ')}`);

    const child = spawn(capability.command, args, {
      detached: true,
      stdio: ['ignore', 'ignore', 'pipe'],
    });
    const handle = new ProcessHandle({
      role: 'recorder',
      name: capability.command,
      child,
      stopSignal: capability.stopSignal,
      maxDurationMs,
      selfTerminates: capability.selfTerminates,
    });

    const watchdogMs = capability.selfTerminates
      ? maxDurationMs + this.selfStopGraceMs
      : maxDurationMs;
    const timer = setTimeout(() => {
      if (!this.isAlive(handle)) return;
      logger.warn(`[ProcessSupervisor] ${handle.name} reached ${maxDurationMs}ms, stopping`);
      handle.timedOut = true;
      void this.stop(handle);
    }, watchdogMs);
    const disarm = () => clearTimeout(timer);
    child.once('exit', disarm);
    child.once('error', disarm);

    return handle;
  }

  /**
   * Launches the indicator and links it to the recorder: when an indicator
   * that offers a stop action goes away while the recorder still runs, the
   * recorder is stopped.
   */
  startIndicator(indicator: StatusIndicator, recorder: ProcessHandle): ProcessHandle | undefined {
    if (recorder.pid === undefined || !this.isAlive(recorder)) {
      return undefined;
    }

    const child = spawn(indicator.command, indicator.buildArgs(recorder.pid), {
      detached: true,
      stdio: [indicator.keepStdinOpen ? 'pipe' : 'ignore', 'ignore', 'ignore'],
    });
    const handle = new ProcessHandle({
      role: 'indicator',
      name: indicator.name,
      child,
      stopSignal: 'SIGTERM',
    });

    if (indicator.stopsRecorder) {
      child.once('exit', () => {
        if (handle.stopRequested || !this.isAlive(recorder)) return;
        logger.log(`[ProcessSupervisor] ${indicator.name} closed, stopping ${recorder.name}`);
        void this.stop(recorder);
      });
    }
    child.once('error', (err: Error) => logError('ProcessSupervisor:indicator', err));

    return handle;
  }

  isAlive(handle: ProcessHandle): boolean {
    return handle.exit === undefined && handle.pid !== undefined;
  }

  /**
   * Waits for the process to exit and classifies how it ended.
   *
   * @throws CancelledError when `signal` fires first; the process keeps running
   */
  async wait(handle: ProcessHandle, signal?: AbortSignal): Promise<ExitOutcome> {
    const exit = await abortable(handle.exited, signal);
    return this.classify(handle, exit);
  }

  /**
   * Waits for the recorder, then tears the indicator down and waits for it
   * too, so the "recording" affordance never outlives the recorder.
   */
  async waitLinked(
    recorder: ProcessHandle,
    indicator: ProcessHandle | undefined,
    signal?: AbortSignal,
  ): Promise<ExitOutcome> {
    const outcome = await this.wait(recorder, signal);
    if (indicator) {
      await this.stop(indicator);
    }
    return outcome;
  }

  /**
   * Signals the process and waits (bounded) for it to exit, escalating to
   * SIGKILL after the grace period. No-op for processes that already exited.
   */
  async stop(handle: ProcessHandle, signal: NodeJS.Signals = handle.stopSignal): Promise<void> {
    if (!this.isAlive(handle)) {
      return;
    }
    handle.stopRequested = true;
    this.sendSignal(handle, signal);

    if (await this.waitForExit(handle, this.teardownGraceMs)) {
      return;
    }
    if (this.isAlive(handle)) {
      logger.warn(`[ProcessSupervisor] ${handle.name} ignored ${signal}, sending SIGKILL`);
      this.sendSignal(handle, 'SIGKILL');
      await this.waitForExit(handle, this.teardownGraceMs);
    }
  }

  private classify(handle: ProcessHandle, exit: ProcessExit): ExitOutcome {
    const elapsed = exit.at - handle.startedAt;

    if (exit.error) {
      return { kind: 'failed', code: null, signal: null, message: exit.error.message };
    }
    if (handle.timedOut) {
      return { kind: 'timeout', afterMs: elapsed };
    }
    if (
      handle.selfTerminates &&
      exit.code === 0 &&
      handle.maxDurationMs !== undefined &&
      elapsed >= handle.maxDurationMs
    ) {
      return { kind: 'timeout', afterMs: elapsed };
    }
    if (handle.stopRequested) {
      return { kind: 'stopped' };
    }
    if (exit.code === 0) {
      return { kind: 'completed' };
    }
    // Killed from outside, e.g. by the tray icon's `kill <pid>`
    if (exit.signal === 'SIGINT' || exit.signal === 'SIGTERM' || exit.code === 130 || exit.code === 143) {
      return { kind: 'stopped' };
    }
    return {
      kind: 'failed',
      code: exit.code,
      signal: exit.signal,
      message: handle.stderr || undefined,
    };
  }

  private sendSignal(handle: ProcessHandle, signal: NodeJS.Signals): void {
    try {
      handle.child.kill(signal);
    } catch (err) {
      logError(`ProcessSupervisor:${handle.name}`, err);
    }
  }

  private waitForExit(handle: ProcessHandle, timeoutMs: number): Promise<boolean> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => resolve(false), timeoutMs);
      void handle.exited.then(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }
}
