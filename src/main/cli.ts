import { parseArgs } from 'node:util';
import { createUsageError } from '../utils/errors';
import { RECORDING_LIMITS } from '../utils/timeout';

export interface CliOptions {
  maxDurationMs: number;
  clipboardOnly: boolean;
  useIndicator: boolean;
  help: boolean;
}

export const HELP_TEXT = `Usage: voxpaste [options]

Record from the microphone until stopped, transcribe the audio with Groq and
paste the text into the window that was focused when recording started.

Options:
  --long                  allow up to ${RECORDING_LIMITS.LONG_SECONDS} seconds of recording (default ${RECORDING_LIMITS.DEFAULT_SECONDS})
  --max-duration <secs>   recording limit in seconds, 1-${RECORDING_LIMITS.MAX_SECONDS}
  --clipboard-only        copy the text but do not paste it
  --no-indicator          do not show a recording indicator
  -h, --help              show this help

Stop recording by clicking the indicator or pressing Ctrl+C.
The API key is read from GROQ_API_KEY in a .env file; set VOXPASTE_ENV_FILE
to point at a specific file.
`;

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        long: { type: 'boolean', default: false },
        'max-duration': { type: 'string' },
        'clipboard-only': { type: 'boolean', default: false },
        'no-indicator': { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
    }).values;
  } catch (err) {
    throw createUsageError(err instanceof Error ? err.message : String(err));
  }
}

/**
 * @throws TranscribeError (configuration) for unknown flags or bad values
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const values = readFlags(argv);
  const maxDuration = values['max-duration'];
  if (maxDuration !== undefined && values.long) {
    throw createUsageError('--long and --max-duration cannot be combined');
  }

  let seconds: number = values.long ? RECORDING_LIMITS.LONG_SECONDS : RECORDING_LIMITS.DEFAULT_SECONDS;
  if (maxDuration !== undefined) {
    seconds = parseDuration(maxDuration);
  }

  return {
    maxDurationMs: seconds * 1000,
    clipboardOnly: values['clipboard-only'] ?? false,
    useIndicator: !values['no-indicator'],
    help: values.help ?? false,
  };
}

function parseDuration(raw: string): number {
  const seconds = /^\d+$/.test(raw.trim()) ? Number(raw.trim()) : NaN;
  if (!Number.isInteger(seconds) || seconds < 1 || seconds > RECORDING_LIMITS.MAX_SECONDS) {
    throw createUsageError(
      `--max-duration must be a whole number of seconds between 1 and ${RECORDING_LIMITS.MAX_SECONDS}, got '${raw}'`,
    );
  }
  return seconds;
}
