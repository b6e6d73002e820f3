#!/usr/bin/env node
import { runCli } from './main/run';
import { bindTerminationSignals } from './main/signals';
import { EXIT_CODES, logError } from './utils/errors';

const controller = new AbortController();
const unbind = bindTerminationSignals(controller);

void runCli({
  argv: process.argv.slice(2),
  env: process.env,
  platform: process.platform,
  stdout: process.stdout,
  signal: controller.signal,
})
  .then(
    (exitCode) => {
      process.exitCode = exitCode;
    },
    (err: unknown) => {
      logError('voxpaste', err);
      process.exitCode = EXIT_CODES.UNKNOWN;
    },
  )
  .finally(unbind);
