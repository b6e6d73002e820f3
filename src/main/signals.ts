import { logger } from '../utils/log';

export const TERMINATION_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

export interface SignalSource {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

/**
 * Turns SIGINT, SIGTERM and SIGHUP into an abort of `controller`. The first
 * signal starts the teardown; later ones are logged while it runs.
 *
 * @returns a function that removes the handlers again
 */
export function bindTerminationSignals(
  controller: AbortController,
  source: SignalSource = process,
): () => void {
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      logger.warn(`[signals] ${signal} received, already stopping`);
      return;
    }
    logger.warn(`[signals] ${signal} received, stopping`);
    controller.abort();
  };

  for (const signal of TERMINATION_SIGNALS) {
    source.on(signal, onSignal);
  }
  return () => {
    for (const signal of TERMINATION_SIGNALS) {
      source.off(signal, onSignal);
    }
  };
}
