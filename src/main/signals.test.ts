import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from 'node:events';
import { logger } from '../utils/log';
import { bindTerminationSignals, type SignalSource } from './signals';

function fakeProcess(): SignalSource & EventEmitter {
  return new EventEmitter();
}

describe('bindTerminationSignals', () => {
  beforeEach(() => {
    vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
  });

  it.each(['SIGINT', 'SIGTERM', 'SIGHUP'] as const)('should abort on %s', (signal) => {
    const source = fakeProcess();
    const controller = new AbortController();
    bindTerminationSignals(controller, source);

    source.emit(signal, signal);

    expect(controller.signal.aborted).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith(`[signals] ${signal} received, stopping`);
  });

  it('should only abort once for repeated signals', () => {
    const source = fakeProcess();
    const controller = new AbortController();
    const onAbort = vi.fn();
    controller.signal.addEventListener('abort', onAbort);
    bindTerminationSignals(controller, source);

    source.emit('SIGINT', 'SIGINT');
    source.emit('SIGINT', 'SIGINT');

    expect(onAbort).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenLastCalledWith('[signals] SIGINT received, already stopping');
  });

  it('should remove its handlers when unbound', () => {
    const source = fakeProcess();
    const unbind = bindTerminationSignals(new AbortController(), source);

    unbind();

    expect(source.listenerCount('SIGINT')).toBe(0);
    expect(source.listenerCount('SIGTERM')).toBe(0);
    expect(source.listenerCount('SIGHUP')).toBe(0);
  });
});
