import { vi } from 'vitest';

// Implementations are passed to vi.fn directly so restoreAllMocks keeps them.

export const mockCreate = vi.fn();

export const MockOpenAI = vi.fn(() => ({
  audio: {
    transcriptions: {
      create: mockCreate,
    },
  },
}));

/** Mirrors the SDK: `error` holds the `error` field of the response body. */
export class MockAPIError extends Error {
  readonly status: number | undefined;
  readonly error: unknown;

  constructor(status: number | undefined, error: unknown, message: string) {
    super(message);
    this.status = status;
    this.error = error;
    this.name = 'APIError';
  }
}

export class MockAPIConnectionError extends MockAPIError {
  constructor(message = 'Connection error.') {
    super(undefined, undefined, message);
    this.name = 'APIConnectionError';
  }
}

export class MockAPIUserAbortError extends MockAPIError {
  constructor() {
    super(undefined, undefined, 'Request was aborted.');
    this.name = 'APIUserAbortError';
  }
}

export const mockToFile = vi.fn(async () => ({ name: 'audio.wav' }));
