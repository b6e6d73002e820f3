import { readFile, stat, writeFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { APIConnectionError, APIError, OpenAI } from 'openai';
import { toFile } from 'openai/uploads';
import type { Credential } from '../config/credential';
import { CancelledError, logError, throwIfCancelled } from '../utils/errors';
import { logger } from '../utils/log';
import { TIMEOUTS } from '../utils/timeout';

export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';
export const TRANSCRIPTION_MODEL = 'whisper-large-v3';

/** A RIFF/WAVE header with no samples after it */
export const WAV_HEADER_BYTES = 44;

export type TranscriptionResult =
  | { kind: 'success'; text: string }
  | { kind: 'api_error'; status: number; message: string }
  | { kind: 'empty_audio' }
  | { kind: 'no_text' }
  | { kind: 'network_failure'; message: string };

export interface TranscribeOptions {
  signal?: AbortSignal;
  /** Receives the response body, success or error */
  responsePath?: string;
}

export interface TranscriptionClientOptions {
  baseURL?: string;
  model?: string;
  language?: string;
  timeoutMs?: number;
}

/**
 * Single-shot upload of a recorded WAV to an OpenAI-compatible transcription
 * endpoint. Every outcome except cancellation comes back as a value.
 */
export class TranscriptionClient {
  private readonly baseURL: string;
  private readonly model: string;
  private readonly language: string;
  private readonly timeoutMs: number;

  constructor(options: TranscriptionClientOptions = {}) {
    this.baseURL = options.baseURL ?? GROQ_BASE_URL;
    this.model = options.model ?? TRANSCRIPTION_MODEL;
    this.language = options.language ?? 'en';
    this.timeoutMs = options.timeoutMs ?? TIMEOUTS.TRANSCRIPTION;
  }

  /**
   * @throws CancelledError when `options.signal` aborts before or during the request
   */
  async transcribe(
    audioPath: string,
    credential: Credential,
    options: TranscribeOptions = {},
  ): Promise<TranscriptionResult> {
    const { signal, responsePath } = options;
    throwIfCancelled(signal);

    const { size } = await stat(audioPath);
    logger.log(`[TranscriptionClient] ${basename(audioPath)} size(bytes)=${size}`);
    if (size <= WAV_HEADER_BYTES) {
      return { kind: 'empty_audio' };
    }

    // Retries would re-bill the same audio
    const client = new OpenAI({
      apiKey: credential.key,
      baseURL: this.baseURL,
      maxRetries: 0,
      timeout: this.timeoutMs,
    });

    try {
      const file = await toFile(await readFile(audioPath), 'audio.wav', { type: 'audio/wav' });
      const response = await client.audio.transcriptions.create(
        {
          file,
          model: this.model,
          response_format: 'json',
          language: this.language,
        },
        { signal },
      );
      await this.keepResponse(responsePath, response);

      const text = typeof response.text === 'string' ? response.text.trim() : '';
      return text ? { kind: 'success', text } : { kind: 'no_text' };
    } catch (err) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      if (err instanceof APIConnectionError) {
        logError('TranscriptionClient', err);
        return { kind: 'network_failure', message: err.message };
      }
      if (err instanceof APIError && err.status !== undefined) {
        await this.keepResponse(responsePath, { error: err.error });
        const message = describeApiError(err.error, sdkMessage(err));
        logger.error(`[TranscriptionClient] APIError ${err.status}: ${message}`);
        return { kind: 'api_error', status: err.status, message };
      }
      throw err;
    }
  }

  private async keepResponse(path: string | undefined, body: unknown): Promise<void> {
    if (!path) return;
    try {
      await writeFile(path, JSON.stringify(body), { mode: 0o600 });
    } catch (err) {
      logError('TranscriptionClient:response', err);
    }
  }
}

/**
 * Pulls a human-readable message out of an error body: `error.message`, a
 * bare `error` string, or a top-level `message`.
 */
export function describeApiError(body: unknown, fallback = 'request failed'): string {
  if (typeof body === 'string' && body.trim()) {
    return body.trim();
  }
  if (typeof body === 'object' && body !== null) {
    if ('message' in body && typeof body.message === 'string' && body.message.trim()) {
      return body.message.trim();
    }
    if ('error' in body) {
      return describeApiError(body.error, fallback);
    }
  }
  return fallback;
}

// The SDK prefixes the status, e.g. "502 status code (no body)"
function sdkMessage(err: Error): string | undefined {
  return err.message.replace(/^\d{3}\s*/, '').trim() || undefined;
}
