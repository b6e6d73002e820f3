import { chmod, readFile, stat } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { parse } from 'dotenv';
import { createConfigNotFoundError } from '../utils/errors';
import { logger } from '../utils/log';

export const ENV_FILE_OVERRIDE = 'VOXPASTE_ENV_FILE';

/** Directory the package is installed in (dist/config → package root) */
export const INSTALL_DIR = resolve(__dirname, '../..');

export interface EnvFileSearch {
  env: NodeJS.ProcessEnv;
  installDir?: string;
  homeDir?: string;
}

/**
 * Config file locations in lookup order. The speech-tools path is where
 * earlier script installs kept their key.
 */
export function envFileCandidates({
  env,
  installDir = INSTALL_DIR,
  homeDir = homedir(),
}: EnvFileSearch): string[] {
  const candidates: string[] = [];
  const override = env[ENV_FILE_OVERRIDE]?.trim();
  if (override) {
    candidates.push(resolve(override));
  }
  candidates.push(
    join(installDir, '.env'),
    join(homeDir, '.local', 'bin', 'speech-tools', '.env'),
    join(homeDir, '.config', 'voxpaste', '.env'),
  );
  return candidates;
}

export async function findEnvFile(candidates: string[]): Promise<string | undefined> {
  for (const candidate of candidates) {
    try {
      if ((await stat(candidate)).isFile()) {
        return candidate;
      }
    } catch {
      // not there, try the next one
    }
  }
  return undefined;
}

/**
 * Warns about and fixes a config file that group or others can read.
 *
 * @returns true when the mode was changed
 */
export async function ensurePrivate(path: string): Promise<boolean> {
  const { mode } = await stat(path);
  if ((mode & 0o077) === 0) {
    return false;
  }
  logger.warn(
    `[config] ${path} is readable by other users (mode ${(mode & 0o777).toString(8)}), restricting to 600`,
  );
  await chmod(path, 0o600);
  return true;
}

export interface LoadedEnvFile {
  path: string;
  values: Record<string, string>;
}

/**
 * Finds the first existing config file, tightens its permissions and parses
 * it with dotenv. The values are returned, never merged into process.env.
 */
export async function loadEnvFile(search: EnvFileSearch): Promise<LoadedEnvFile> {
  const candidates = envFileCandidates(search);
  const path = await findEnvFile(candidates);
  if (!path) {
    throw createConfigNotFoundError(candidates);
  }

  await ensurePrivate(path);
  const values = parse(await readFile(path));
  logger.log(`[config] loaded ${path}`);
  return { path, values };
}
