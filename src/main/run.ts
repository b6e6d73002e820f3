import { loadCredential, type Credential } from '../config/credential';
import { loadEnvFile } from '../config/env-file';
import { selectNotifier, type Notifier } from '../notify';
import { OutputDispatcher } from '../output/dispatcher';
import { Pipeline } from '../pipeline';
import { ProcessSupervisor } from '../process/supervisor';
import { TranscriptionClient } from '../transcription/client';
import {
  createUnsupportedPlatformError,
  EXIT_CODES,
  logError,
  toTranscribeError,
  TranscribeError,
} from '../utils/errors';
import { createHostProbe } from '../utils/exec';
import { logger } from '../utils/log';
import { HELP_TEXT, parseCliArgs, type CliOptions } from './cli';

export interface CliEnvironment {
  argv: string[];
  env: NodeJS.ProcessEnv;
  platform: NodeJS.Platform;
  stdout: Pick<NodeJS.WritableStream, 'write'>;
  signal: AbortSignal;
  /** Overrides for the config file search */
  installDir?: string;
  homeDir?: string;
}

const RULER = '-'.repeat(40);

/**
 * One CLI invocation. Resolves with the process exit code; the transcript is
 * the only thing written to stdout.
 */
export async function runCli(cli: CliEnvironment): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(cli.argv);
  } catch (err) {
    const error = toTranscribeError(err);
    logger.error(`voxpaste: ${error.userMessage}`);
    logger.error(HELP_TEXT);
    return error.exitCode;
  }
  if (options.help) {
    cli.stdout.write(HELP_TEXT);
    return EXIT_CODES.SUCCESS;
  }

  if (cli.platform !== 'linux' && cli.platform !== 'darwin') {
    return fail(createUnsupportedPlatformError(cli.platform));
  }

  const probe = createHostProbe(cli.platform, cli.env);
  const notifier = await selectNotifier(probe);

  let credential: Credential;
  try {
    const { values } = await loadEnvFile({
      env: cli.env,
      installDir: cli.installDir,
      homeDir: cli.homeDir,
    });
    credential = loadCredential(values);
  } catch (err) {
    return fail(toTranscribeError(err), notifier);
  }

  const dispatcher = await OutputDispatcher.create(probe, { pasteEnabled: !options.clipboardOnly });
  const pipeline = new Pipeline({
    probe,
    supervisor: new ProcessSupervisor(),
    notifier,
    client: new TranscriptionClient(),
    dispatcher,
    credential,
  });

  const report = await pipeline.run({
    maxDurationMs: options.maxDurationMs,
    useIndicator: options.useIndicator,
    signal: cli.signal,
  });

  if (report.text !== undefined) {
    cli.stdout.write(`${RULER}\n${report.text}\n${RULER}\n`);
  }
  if (report.error instanceof TranscribeError) {
    logger.error(`voxpaste: ${report.error.userMessage}`);
  }
  return report.exitCode;
}

function fail(error: TranscribeError, notifier?: Notifier): number {
  logError('voxpaste', error);
  logger.error(`voxpaste: ${error.userMessage}`);
  notifier?.notify('Error', error.userMessage, 'critical');
  return error.exitCode;
}
