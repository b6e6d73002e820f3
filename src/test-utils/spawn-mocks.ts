import { EventEmitter } from 'node:events';
import { vi } from 'vitest';

export const mockSpawn = vi.fn();
export const mockExecFile = vi.fn();

let nextPid = 41000;

class FakeStdin extends EventEmitter {
  readonly chunks: string[] = [];
  ended = false;

  write(chunk: string | Buffer): boolean {
    this.chunks.push(chunk.toString());
    return true;
  }

  end(chunk?: string | Buffer): this {
    if (chunk !== undefined) {
      this.chunks.push(chunk.toString());
    }
    this.ended = true;
    return this;
  }

  get written(): string {
    return this.chunks.join('');
  }
}

/**
 * Stand-in for ChildProcess. Exits only when told to, or when killed
 * (unless `exitOnKill` is turned off to simulate a process ignoring signals).
 */
export class FakeChildProcess extends EventEmitter {
  readonly pid: number | undefined;
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  exitOnKill = true;
  readonly killSignals: NodeJS.Signals[] = [];
  readonly stdin = new FakeStdin();
  readonly stdout = new EventEmitter();
  readonly stderr = new EventEmitter();

  constructor(pid: number | undefined = nextPid++) {
    super();
    this.pid = pid;
  }

  get hasExited(): boolean {
    return this.exitCode !== null || this.signalCode !== null;
  }

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.killSignals.push(signal);
    if (this.hasExited) return false;
    if (this.exitOnKill || signal === 'SIGKILL') {
      setTimeout(() => this.exit(null, signal), 0);
    }
    return true;
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.hasExited) return;
    this.exitCode = code;
    this.signalCode = signal;
    this.emit('exit', code, signal);
    this.emit('close', code, signal);
  }

  unref(): void {}
}

export function createSuccessfulChildProcess(stdout = ''): FakeChildProcess {
  const child = new FakeChildProcess();
  setTimeout(() => {
    if (stdout) {
      child.stdout.emit('data', Buffer.from(stdout));
    }
    child.exit(0);
  }, 0);
  return child;
}

export function createFailedChildProcess(exitCode = 1): FakeChildProcess {
  const child = new FakeChildProcess();
  setTimeout(() => child.exit(exitCode), 0);
  return child;
}

export function createErrorChildProcess(error: Error): FakeChildProcess {
  const child = new FakeChildProcess(undefined);
  setTimeout(() => child.emit('error', error), 0);
  return child;
}

/** Runs until killed, like a recorder waiting for its stop signal. */
export function createRunningChildProcess(): FakeChildProcess {
  return new FakeChildProcess();
}

/**
 * Drives `mockExecFile` from a predicate: the callback gets an error when the
 * predicate returns false, mimicking `which`/`pgrep` exit codes.
 */
export function answerExecFile(predicate: (command: string, args: string[]) => boolean): void {
  mockExecFile.mockImplementation(
    (
      command: string,
      args: string[],
      _options: unknown,
      callback: (err: Error | null) => void,
    ) => {
      const ok = predicate(command, args);
      setTimeout(() => callback(ok ? null : new Error(`${command} exited with code 1`)), 0);
    },
  );
}
