/**
 * Structured error handling for voxpaste
 * Every pipeline failure is a TranscribeError carrying its category, a user-facing
 * message for notifications and the exit code of the stage that failed.
 */

import { logger } from './log';

export enum ErrorCategory {
  NO_BACKEND = 'no_backend',
  RECORDING = 'recording',
  EMPTY_AUDIO = 'empty_audio',
  NETWORK = 'network',
  API = 'api',
  NO_TEXT = 'no_text',
  CREDENTIAL = 'credential',
  CONFIGURATION = 'configuration',
  TIMEOUT = 'timeout',
  PLATFORM = 'platform',
  UNKNOWN = 'unknown',
}

export const EXIT_CODES = {
  SUCCESS: 0,
  UNKNOWN: 1,
  CONFIGURATION: 2,
  NO_BACKEND: 3,
  RECORDING: 4,
  EMPTY_AUDIO: 5,
  NETWORK: 6,
  API: 7,
  NO_TEXT: 8,
  CANCELLED: 130,
} as const;

export interface TranscribeErrorParams {
  category: ErrorCategory;
  message: string; // Technical message for logs
  userMessage: string; // Shown in the desktop notification
  exitCode: number;
  status?: number;
  originalError?: Error;
}

export class CancelledError extends Error {
  constructor(message = 'Operation cancelled by user') {
    super(message);
    this.name = 'CancelledError';
  }
}

export function isCancelledError(error: unknown): error is CancelledError {
  return error instanceof CancelledError;
}

/**
 * Throws a CancelledError when the signal has already fired.
 */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

/**
 * Settles like `promise`, or rejects with CancelledError as soon as the signal
 * fires, whichever happens first.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(new CancelledError());
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledError());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

export class TranscribeError extends Error {
  readonly category: ErrorCategory;
  readonly userMessage: string;
  readonly exitCode: number;
  readonly status?: number;
  readonly originalError?: Error;

  constructor(params: TranscribeErrorParams) {
    super(params.message);
    this.name = 'TranscribeError';
    this.category = params.category;
    this.userMessage = params.userMessage;
    this.exitCode = params.exitCode;
    this.status = params.status;
    this.originalError = params.originalError;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TranscribeError);
    }
  }
}

export function createNoBackendError(): TranscribeError {
  return new TranscribeError({
    category: ErrorCategory.NO_BACKEND,
    message: 'No audio recording tool found (pw-record, parecord, arecord, rec)',
    userMessage:
      'No audio recording method found. Install pipewire, pulseaudio-utils, alsa-utils or sox.',
    exitCode: EXIT_CODES.NO_BACKEND,
  });
}

export function createRecordingFailedError(
  detail: { code?: number | null; signal?: NodeJS.Signals | null; message?: string },
): TranscribeError {
  const parts = [
    detail.code !== undefined && detail.code !== null ? `code ${detail.code}` : undefined,
    detail.signal ? `signal ${detail.signal}` : undefined,
    detail.message,
  ].filter((part): part is string => Boolean(part));

  return new TranscribeError({
    category: ErrorCategory.RECORDING,
    message: `Recorder failed: ${parts.join(', ') || 'unknown reason'}`,
    userMessage: 'Audio recording failed.',
    exitCode: EXIT_CODES.RECORDING,
  });
}

export function createEmptyAudioError(): TranscribeError {
  return new TranscribeError({
    category: ErrorCategory.EMPTY_AUDIO,
    message: 'Audio file is empty',
    userMessage: 'No audio was recorded.',
    exitCode: EXIT_CODES.EMPTY_AUDIO,
  });
}

export function createNetworkError(error: unknown): TranscribeError {
  const originalError = error instanceof Error ? error : undefined;
  return new TranscribeError({
    category: ErrorCategory.NETWORK,
    message: `Network error: ${originalError?.message || String(error)}`,
    userMessage: 'Failed to connect to the transcription service.',
    exitCode: EXIT_CODES.NETWORK,
    originalError,
  });
}

/**
 * Creates an API error with a status-specific user message.
 */
export function createApiError(status: number, apiMessage: string): TranscribeError {
  let userMessage = `API request failed (HTTP ${status}): ${apiMessage}`;
  if (status === 401 || status === 403) {
    userMessage = 'Invalid API key. Please check your .env file.';
  } else if (status === 429) {
    userMessage = 'Rate limit exceeded. Please try again later.';
  } else if (status >= 500) {
    userMessage = 'Transcription service temporarily unavailable.';
  }

  return new TranscribeError({
    category: ErrorCategory.API,
    message: `API error ${status}: ${apiMessage}`,
    userMessage,
    exitCode: EXIT_CODES.API,
    status,
  });
}

export function createNoTextError(): TranscribeError {
  return new TranscribeError({
    category: ErrorCategory.NO_TEXT,
    message: 'API response contained no text',
    userMessage: 'No text was transcribed.',
    exitCode: EXIT_CODES.NO_TEXT,
  });
}

export function createMissingCredentialError(reason: 'missing' | 'placeholder'): TranscribeError {
  return new TranscribeError({
    category: ErrorCategory.CREDENTIAL,
    message:
      reason === 'missing'
        ? 'GROQ_API_KEY not found in configuration file'
        : 'GROQ_API_KEY still holds the placeholder value',
    userMessage:
      reason === 'missing'
        ? 'Groq API key not found. Please check your .env file.'
        : "Please replace 'your_api_key_here' with your actual Groq API key.",
    exitCode: EXIT_CODES.CONFIGURATION,
  });
}

export function createConfigNotFoundError(searched: string[]): TranscribeError {
  return new TranscribeError({
    category: ErrorCategory.CONFIGURATION,
    message: `.env file not found. Checked: ${searched.join(', ')}`,
    userMessage: '.env file not found in any expected location.',
    exitCode: EXIT_CODES.CONFIGURATION,
  });
}

export function createUsageError(message: string): TranscribeError {
  return new TranscribeError({
    category: ErrorCategory.CONFIGURATION,
    message,
    userMessage: message,
    exitCode: EXIT_CODES.CONFIGURATION,
  });
}

export function createUnsupportedPlatformError(platform: string): TranscribeError {
  return new TranscribeError({
    category: ErrorCategory.PLATFORM,
    message: `Unsupported platform: ${platform}`,
    userMessage: `Platform ${platform} is not supported.`,
    exitCode: EXIT_CODES.CONFIGURATION,
  });
}

/**
 * Creates a timeout error for a specific operation
 */
export function createTimeoutError(operation: string, timeoutMs: number): TranscribeError {
  return new TranscribeError({
    category: ErrorCategory.TIMEOUT,
    message: `Operation '${operation}' timed out after ${timeoutMs}ms`,
    userMessage: 'The operation took too long.',
    exitCode: EXIT_CODES.UNKNOWN,
  });
}

export function toTranscribeError(error: unknown): TranscribeError {
  if (error instanceof TranscribeError) {
    return error;
  }
  return new TranscribeError({
    category: ErrorCategory.UNKNOWN,
    message: `Unexpected error: ${error instanceof Error ? error.message : String(error)}`,
    userMessage: 'Transcription failed. Check the terminal for details.',
    exitCode: EXIT_CODES.UNKNOWN,
    originalError: error instanceof Error ? error : undefined,
  });
}

/**
 * Logs an error with context and structured information
 */
export function logError(context: string, error: unknown): void {
  if (error instanceof TranscribeError) {
    logger.error(
      `[${context}] ${error.category}:`,
      error.message,
      error.originalError ? `\nOriginal: ${error.originalError.message}` : '',
    );
  } else if (error instanceof Error) {
    logger.error(`[${context}]`, error.message);
  } else {
    logger.error(`[${context}]`, String(error));
  }
}
