import { execFile, spawn } from 'node:child_process';
import { createTimeoutError } from './errors';
import { logger } from './log';
import { TIMEOUTS } from './timeout';

/**
 * What the capability selectors need to know about the host. Injected so the
 * selection logic can be tested without touching the real system.
 */
export interface HostProbe {
  readonly platform: NodeJS.Platform;
  readonly env: NodeJS.ProcessEnv;
  commandExists(command: string): Promise<boolean>;
  isProcessRunning(name: string): Promise<boolean>;
}

export function commandExists(command: string): Promise<boolean> {
  return new Promise((resolve) => {
    execFile('which', [command], { timeout: TIMEOUTS.COMMAND }, (err) => resolve(!err));
  });
}

/** Exact process-name match, like `pgrep -x`. */
export function isProcessRunning(name: string): Promise<boolean> {
  return new Promise((resolve) => {
    execFile('pgrep', ['-x', name], { timeout: TIMEOUTS.COMMAND }, (err) => resolve(!err));
  });
}

/**
 * Probe backed by `which` and `pgrep`. Lookups are cached for the lifetime of
 * the probe, which is one invocation.
 */
export function createHostProbe(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): HostProbe {
  const commands = new Map<string, Promise<boolean>>();
  const processes = new Map<string, Promise<boolean>>();

  return {
    platform,
    env,
    commandExists(command) {
      let cached = commands.get(command);
      if (!cached) {
        cached = commandExists(command);
        commands.set(command, cached);
      }
      return cached;
    },
    isProcessRunning(name) {
      let cached = processes.get(name);
      if (!cached) {
        cached = isProcessRunning(name);
        processes.set(name, cached);
      }
      return cached;
    },
  };
}

export interface RunCommandOptions {
  /** Written to stdin, which is then closed */
  input?: string;
  /** Collect stdout and resolve with it once the streams close */
  captureOutput?: boolean;
  timeoutMs?: number;
}

/**
 * Runs a short-lived helper command and resolves when it exits with code 0.
 *
 * Without `captureOutput` stdout is ignored and the promise settles on `exit`:
 * clipboard owners such as xclip fork a background child that keeps inherited
 * pipes open long after the command itself has returned.
 */
export function runCommand(
  command: string,
  args: string[],
  options: RunCommandOptions = {},
): Promise<string> {
  const timeoutMs = options.timeoutMs ?? TIMEOUTS.COMMAND;
  const captureOutput = options.captureOutput ?? false;

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: [
        options.input === undefined ? 'ignore' : 'pipe',
        captureOutput ? 'pipe' : 'ignore',
        'ignore',
      ],
    });

    let stdout = '';
    let settled = false;
    const settle = (action: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      action();
    };

    const timer = setTimeout(() => {
      settle(() => {
        child.kill('SIGTERM');
        reject(createTimeoutError(command, timeoutMs));
      });
    }, timeoutMs);

    child.stdout?.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    child.once('error', (err) => settle(() => reject(err)));
    child.once(captureOutput ? 'close' : 'exit', (code: number | null) => {
      settle(() => {
        if (code === 0) {
          resolve(stdout);
        } else {
          reject(new Error(`${command} exited with code ${code}`));
        }
      });
    });

    if (options.input !== undefined && child.stdin) {
      child.stdin.on('error', (err) => {
        logger.warn(`[runCommand] ${command} stdin:`, err.message);
      });
      child.stdin.end(options.input);
    }
  });
}
