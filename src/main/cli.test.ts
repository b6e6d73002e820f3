import { describe, it, expect } from 'vitest';
import { ErrorCategory, EXIT_CODES } from '../utils/errors';
import { parseCliArgs } from './cli';

describe('parseCliArgs', () => {
  it('should default to a two minute limit with paste and indicator enabled', () => {
    expect(parseCliArgs([])).toEqual({
      maxDurationMs: 120000,
      clipboardOnly: false,
      useIndicator: true,
      help: false,
    });
  });

  it('should raise the limit to five minutes with --long', () => {
    expect(parseCliArgs(['--long']).maxDurationMs).toBe(300000);
  });

  it('should take an explicit --max-duration in seconds', () => {
    expect(parseCliArgs(['--max-duration', '45']).maxDurationMs).toBe(45000);
    expect(parseCliArgs(['--max-duration=300']).maxDurationMs).toBe(300000);
  });

  it('should read the delivery and indicator switches', () => {
    expect(parseCliArgs(['--clipboard-only', '--no-indicator', '-h'])).toEqual({
      maxDurationMs: 120000,
      clipboardOnly: true,
      useIndicator: false,
      help: true,
    });
  });

  it.each(['0', '301', '1.5', 'ten', ''])('should reject --max-duration %j', (value) => {
    expect(() => parseCliArgs([`--max-duration=${value}`])).toThrow(
      `--max-duration must be a whole number of seconds between 1 and 300, got '${value}'`,
    );
  });

  it('should reject --long together with --max-duration', () => {
    expect(() => parseCliArgs(['--long', '--max-duration', '60'])).toThrow(
      '--long and --max-duration cannot be combined',
    );
  });

  it('should turn unknown flags into a configuration error', () => {
    try {
      parseCliArgs(['--verbose']);
      expect.unreachable();
    } catch (err) {
      expect(err).toMatchObject({
        category: ErrorCategory.CONFIGURATION,
        exitCode: EXIT_CODES.CONFIGURATION,
      });
    }
  });
});
