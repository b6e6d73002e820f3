import { randomUUID } from 'node:crypto';
import type { ProcessHandle } from '../process/supervisor';
import type { ResourceJanitor } from './janitor';

/**
 * One record → transcribe → deliver attempt. Created per invocation by the
 * pipeline; its files and processes are released with the janitor that
 * allocated them.
 */
export class RecordingSession {
  /** Tags the session's log lines */
  readonly id = randomUUID().slice(0, 8);
  recorder?: ProcessHandle;
  indicator?: ProcessHandle;
  /** Window (X11 id or macOS application name) focused before recording */
  focusedWindow?: string;

  private constructor(
    private readonly janitor: ResourceJanitor,
    readonly audioPath: string,
    readonly responsePath: string,
    readonly textPath: string,
  ) {}

  static async open(janitor: ResourceJanitor): Promise<RecordingSession> {
    const audioPath = await janitor.acquire('audio-file');
    const responsePath = await janitor.acquire('response-buffer');
    const textPath = await janitor.acquire('text-file');
    return new RecordingSession(janitor, audioPath, responsePath, textPath);
  }

  attachRecorder(handle: ProcessHandle): ProcessHandle {
    this.recorder = handle;
    this.janitor.trackProcess(handle);
    return handle;
  }

  attachIndicator(handle: ProcessHandle): void {
    this.indicator = handle;
    this.janitor.trackProcess(handle);
  }
}
