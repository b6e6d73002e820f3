import { createMissingCredentialError } from '../utils/errors';
import { logger } from '../utils/log';

export const CREDENTIAL_KEY = 'GROQ_API_KEY';
export const PLACEHOLDER_KEY = 'your_api_key_here';

/** Groq keys: `gsk_` followed by 52 alphanumerics */
export const KEY_FORMAT = /^gsk_[A-Za-z0-9]{52}$/;

export interface Credential {
  readonly key: string;
  /** A mismatch is advisory only, the API gets the final say */
  readonly formatValid: boolean;
}

/**
 * Drops whitespace anywhere in the value and one pair of surrounding quotes,
 * both common results of pasting a key into an editor.
 */
export function normalizeKey(raw: string): string {
  const trimmed = raw.replace(/\s+/g, '');
  const quoted = /^(['"])(.*)\1$/.exec(trimmed);
  return quoted ? quoted[2] : trimmed;
}

export function isValidKeyFormat(key: string): boolean {
  return KEY_FORMAT.test(key);
}

/**
 * Reads the API key out of parsed config values.
 *
 * @throws TranscribeError when the key is absent, blank or the shipped placeholder
 */
export function loadCredential(values: Record<string, string | undefined>): Credential {
  const raw = values[CREDENTIAL_KEY];
  const key = raw === undefined ? '' : normalizeKey(raw);

  if (!key) {
    throw createMissingCredentialError('missing');
  }
  if (key === PLACEHOLDER_KEY) {
    throw createMissingCredentialError('placeholder');
  }

  const formatValid = isValidKeyFormat(key);
  if (!formatValid) {
    logger.warn(
      `[config] ${CREDENTIAL_KEY} does not look like a Groq key (expected gsk_ + 52 characters, got ${key.length} characters); continuing`,
    );
  }
  return { key, formatValid };
}
