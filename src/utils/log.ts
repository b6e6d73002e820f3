import { Console } from 'node:console';

/**
 * Diagnostics console. Everything goes to stderr so stdout carries only the
 * transcribed text.
 */
export const logger = new Console({ stdout: process.stderr, stderr: process.stderr });
