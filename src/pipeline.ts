import { stat, writeFile } from 'node:fs/promises';
import { selectAudioCapability, type AudioCapability } from './audio';
import type { Credential } from './config/credential';
import type { Notifier } from './notify';
import type { DeliveryOutcome, OutputDispatcher } from './output/dispatcher';
import { selectStatusIndicator, type StatusIndicator } from './process/indicator';
import type { ExitOutcome, ProcessSupervisor } from './process/supervisor';
import { ResourceJanitor, type ReleaseOutcome } from './session/janitor';
import { RecordingSession } from './session/recording-session';
import { WAV_HEADER_BYTES, type TranscriptionClient, type TranscriptionResult } from './transcription/client';
import {
  CancelledError,
  createApiError,
  createEmptyAudioError,
  createNetworkError,
  createNoTextError,
  createRecordingFailedError,
  ErrorCategory,
  EXIT_CODES,
  isCancelledError,
  logError,
  throwIfCancelled,
  toTranscribeError,
  TranscribeError,
} from './utils/errors';
import type { HostProbe } from './utils/exec';
import { logger } from './utils/log';
import { TIMEOUTS, withTimeout } from './utils/timeout';

export type PipelineState =
  | 'idle'
  | 'capability_selected'
  | 'recording'
  | 'validating'
  | 'transcribing'
  | 'dispatching'
  | 'done'
  | 'aborted';

export interface PipelineDependencies {
  probe: HostProbe;
  supervisor: ProcessSupervisor;
  notifier: Notifier;
  client: Pick<TranscriptionClient, 'transcribe'>;
  dispatcher: Pick<OutputDispatcher, 'captureFocusedWindow' | 'deliver' | 'pasteShortcut'>;
  credential: Credential;
  selectCapability?: (probe: HostProbe) => Promise<AudioCapability>;
  selectIndicator?: (probe: HostProbe) => Promise<StatusIndicator | undefined>;
  /** Where session temp files go, the OS default when omitted */
  tempDir?: string;
}

export interface PipelineOptions {
  maxDurationMs: number;
  useIndicator?: boolean;
  signal?: AbortSignal;
}

export interface PipelineReport {
  state: 'done' | 'aborted';
  exitCode: number;
  states: PipelineState[];
  text?: string;
  error?: TranscribeError | CancelledError;
  delivery?: DeliveryOutcome;
}

const PREVIEW_LENGTH = 50;

/**
 * One record → transcribe → deliver run. Each stage either advances the state
 * or aborts the run with the stage's exit code; session resources are
 * released exactly once whichever way the run ends.
 */
export class Pipeline {
  private state: PipelineState = 'idle';
  private readonly visited: PipelineState[] = ['idle'];
  private readonly selectCapability: (probe: HostProbe) => Promise<AudioCapability>;
  private readonly selectIndicator: (probe: HostProbe) => Promise<StatusIndicator | undefined>;

  constructor(private readonly deps: PipelineDependencies) {
    this.selectCapability = deps.selectCapability ?? selectAudioCapability;
    this.selectIndicator = deps.selectIndicator ?? selectStatusIndicator;
  }

  async run(options: PipelineOptions): Promise<PipelineReport> {
    if (this.state !== 'idle') {
      throw new Error(`Pipeline already ran (state: ${this.state})`);
    }

    const { supervisor, notifier, tempDir } = this.deps;
    const janitor = new ResourceJanitor({ supervisor, notifier, tempDir });
    let release: ReleaseOutcome = { reason: 'failed' };

    try {
      const { text, delivery } = await this.execute(janitor, options);
      release = { reason: 'completed' };
      this.transition('done');
      return { state: 'done', exitCode: EXIT_CODES.SUCCESS, states: [...this.visited], text, delivery };
    } catch (err) {
      if (isCancelledError(err)) {
        logger.log(`[Pipeline] cancelled during ${this.state}`);
        release = { reason: 'cancelled' };
        this.transition('aborted');
        return this.aborted(EXIT_CODES.CANCELLED, err);
      }

      const error = this.classify(err);
      logError('Pipeline', error);
      release = { reason: 'failed', message: error.userMessage };
      this.transition('aborted');
      return this.aborted(error.exitCode, error);
    } finally {
      await janitor.releaseAll(release);
    }
  }

  private async execute(
    janitor: ResourceJanitor,
    { maxDurationMs, useIndicator = true, signal }: PipelineOptions,
  ): Promise<{ text: string; delivery: DeliveryOutcome }> {
    const { probe, supervisor, notifier, client, dispatcher, credential } = this.deps;
    throwIfCancelled(signal);

    const capability = await this.selectCapability(probe);
    this.transition('capability_selected');

    const session = await RecordingSession.open(janitor);
    logger.log(`[Pipeline] session ${session.id} recording to ${session.audioPath}`);
    session.focusedWindow = await dispatcher.captureFocusedWindow();
    const indicator = useIndicator ? await this.selectIndicator(probe) : undefined;
    throwIfCancelled(signal);

    this.transition('recording');
    const recorder = session.attachRecorder(
      supervisor.start(capability, session.audioPath, maxDurationMs),
    );
    const indicatorHandle = indicator ? supervisor.startIndicator(indicator, recorder) : undefined;
    if (indicatorHandle) {
      session.attachIndicator(indicatorHandle);
    }
    notifier.notify(
      'Recording started',
      session.indicator && indicator?.stopsRecorder
        ? `Click the ${indicator.name} indicator to stop.`
        : 'Press Ctrl+C in the terminal to stop.',
      'low',
    );

    const exit = await supervisor.waitLinked(recorder, session.indicator, signal);
    this.transition('validating');
    this.checkRecording(exit, maxDurationMs);
    const { size } = await stat(session.audioPath);
    if (size <= WAV_HEADER_BYTES) {
      throw createEmptyAudioError();
    }

    this.transition('transcribing');
    notifier.notify('Transcribing…', 'Sending audio to the transcription service.', 'low');
    // The SDK bounds the request itself; this also covers reading the file
    const result = await withTimeout(
      (stageSignal) =>
        client.transcribe(session.audioPath, credential, {
          signal: stageSignal,
          responsePath: session.responsePath,
        }),
      TIMEOUTS.TRANSCRIPTION + TIMEOUTS.COMMAND,
      'transcription',
      signal,
    );
    const text = unwrapTranscription(result);
    await writeFile(session.textPath, text, { mode: 0o600 });
    throwIfCancelled(signal);

    this.transition('dispatching');
    const delivery = await dispatcher.deliver(text, session.focusedWindow);
    this.announce(text, delivery);
    return { text, delivery };
  }

  private checkRecording(exit: ExitOutcome, maxDurationMs: number): void {
    switch (exit.kind) {
      case 'failed':
        throw createRecordingFailedError(exit);
      case 'timeout': {
        const seconds = Math.ceil(maxDurationMs / 1000);
        logger.warn(`[Pipeline] recording hit the ${seconds}s limit, transcribing what was captured`);
        this.deps.notifier.notify(
          'Recording stopped',
          `Recording stopped after ${seconds} second${seconds === 1 ? '' : 's'} (time limit reached).`,
          'normal',
        );
        return;
      }
      case 'stopped':
      case 'completed':
        return;
    }
  }

  private announce(text: string, delivery: DeliveryOutcome): void {
    const preview = text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}…` : text;
    const { notifier, dispatcher } = this.deps;

    switch (delivery.kind) {
      case 'pasted':
        notifier.notify('Text pasted', preview);
        return;
      case 'clipboard_only':
        logger.warn(`[Pipeline] delivery degraded: ${delivery.reason}`);
        notifier.notify(
          'Text copied',
          `${preview}\nPaste manually with ${dispatcher.pasteShortcut}.`,
        );
        return;
      case 'no_clipboard':
        logger.warn(`[Pipeline] delivery degraded: ${delivery.reason}`);
        notifier.notify(
          'Transcription complete',
          'No clipboard tool available. The text is printed in the terminal.',
        );
        return;
    }
  }

  private classify(err: unknown): TranscribeError {
    const error = toTranscribeError(err);
    // Only the outer transcription bound produces a timeout at this stage
    if (this.state === 'transcribing' && error.category === ErrorCategory.TIMEOUT) {
      return createNetworkError(error);
    }
    return error;
  }

  private aborted(exitCode: number, error: TranscribeError | CancelledError): PipelineReport {
    return { state: 'aborted', exitCode, states: [...this.visited], error };
  }

  private transition(next: PipelineState): void {
    logger.log(`[Pipeline] ${this.state} -> ${next}`);
    this.state = next;
    this.visited.push(next);
  }
}

/** Turns a non-success transcription result into the matching error. */
export function unwrapTranscription(result: TranscriptionResult): string {
  switch (result.kind) {
    case 'success':
      return result.text;
    case 'empty_audio':
      throw createEmptyAudioError();
    case 'no_text':
      throw createNoTextError();
    case 'network_failure':
      throw createNetworkError(new Error(result.message));
    case 'api_error':
      throw createApiError(result.status, result.message);
  }
}
