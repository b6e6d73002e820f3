/**
 * Timeout handling utilities for async operations
 */

import { createTimeoutError } from './errors';

/**
 * Wraps an async operation with a timeout. The operation receives a signal
 * that fires when the timeout expires or `parentSignal` aborts, so work it
 * hands the signal to is cancelled rather than left running.
 *
 * @param operation - The async function to execute
 * @param timeoutMs - Timeout in milliseconds
 * @param operationName - Name of the operation for error messages
 * @returns Promise that resolves with operation result or rejects with a timeout TranscribeError
 *
 * @example
 * ```typescript
 * const result = await withTimeout(
 *   (timeoutSignal) => client.transcribe(audioPath, credential, { signal: timeoutSignal }),
 *   TIMEOUTS.TRANSCRIPTION + TIMEOUTS.COMMAND,
 *   'transcription',
 *   signal,
 * );
 * ```
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  operationName: string,
  parentSignal?: AbortSignal,
): Promise<T> {
  let timeoutHandle: NodeJS.Timeout | undefined;
  let isTimedOut = false;
  const controller = new AbortController();
  const forwardAbort = () => controller.abort();

  if (parentSignal?.aborted) {
    controller.abort();
  } else {
    parentSignal?.addEventListener('abort', forwardAbort, { once: true });
  }

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      isTimedOut = true;
      // Reject first so the timeout wins the race over the aborted operation
      reject(createTimeoutError(operationName, timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), timeoutPromise]);
  } finally {
    if (timeoutHandle && !isTimedOut) {
      clearTimeout(timeoutHandle);
    }
    parentSignal?.removeEventListener('abort', forwardAbort);
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Timeout constants for different operations in the application
 */
export const TIMEOUTS = {
  /** Upload plus transcription, one attempt */
  TRANSCRIPTION: 30000, // 30 seconds
  /** Short helper commands: which, pgrep, xclip, xdotool, osascript */
  COMMAND: 2000, // 2 seconds
  /** Grace period for a signalled process before SIGKILL */
  PROCESS_TEARDOWN: 3000, // 3 seconds
  /** Extra time given to recorders that stop themselves at the duration limit */
  SELF_STOP_GRACE: 2000, // 2 seconds
  /** Focus restoration needs to settle before the keystroke lands */
  FOCUS_SETTLE: 200,
} as const;

export const RECORDING_LIMITS = {
  DEFAULT_SECONDS: 120,
  LONG_SECONDS: 300,
  MAX_SECONDS: 300,
} as const;
