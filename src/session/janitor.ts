import { randomBytes } from 'node:crypto';
import { unlink, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Notifier } from '../notify';
import type { ProcessHandle, ProcessSupervisor } from '../process/supervisor';
import { logError } from '../utils/errors';
import { logger } from '../utils/log';

export type FileResourceKind = 'audio-file' | 'text-file' | 'response-buffer';

export type ReleaseOutcome =
  | { reason: 'completed' }
  | { reason: 'failed'; message?: string }
  | { reason: 'cancelled' };

type TrackedResource =
  | { kind: FileResourceKind; path: string }
  | { kind: 'process'; handle: ProcessHandle };

const SUFFIXES: Record<FileResourceKind, string> = {
  'audio-file': '.wav',
  'text-file': '.txt',
  'response-buffer': '.json',
};

export interface JanitorOptions {
  supervisor: ProcessSupervisor;
  notifier?: Notifier;
  tempDir?: string;
}

/**
 * Owns every ephemeral resource of one session and releases them in a single
 * pass: live processes first, in registration order, then temp files.
 */
export class ResourceJanitor {
  private readonly registry: TrackedResource[] = [];
  private readonly supervisor: ProcessSupervisor;
  private readonly notifier?: Notifier;
  private readonly tempDir: string;
  private releasing?: Promise<void>;

  constructor(options: JanitorOptions) {
    this.supervisor = options.supervisor;
    this.notifier = options.notifier;
    this.tempDir = options.tempDir ?? tmpdir();
  }

  /**
   * Creates an empty owner-only temp file and tracks it. The path is tracked
   * before the file exists so a failed create still gets cleaned up.
   */
  async acquire(kind: FileResourceKind): Promise<string> {
    if (this.releasing) {
      throw new Error(`Cannot acquire ${kind}: session already released`);
    }
    const path = join(this.tempDir, `voxpaste-${randomBytes(6).toString('hex')}${SUFFIXES[kind]}`);
    this.registry.push({ kind, path });
    await writeFile(path, '', { mode: 0o600, flag: 'wx' });
    return path;
  }

  trackProcess(handle: ProcessHandle): void {
    this.registry.push({ kind: 'process', handle });
  }

  /**
   * Runs the release pass once. Later calls, concurrent or not, get the same
   * promise. Never rejects.
   */
  releaseAll(outcome: ReleaseOutcome = { reason: 'completed' }): Promise<void> {
    if (!this.releasing) {
      this.releasing = this.release(outcome);
    }
    return this.releasing;
  }

  private async release(outcome: ReleaseOutcome): Promise<void> {
    logger.log('[ResourceJanitor] cleaning up session resources');

    for (const resource of this.registry) {
      if (resource.kind !== 'process') continue;
      try {
        await this.supervisor.stop(resource.handle);
      } catch (err) {
        logError(`ResourceJanitor:${resource.handle.name}`, err);
      }
    }

    for (const resource of this.registry) {
      if (resource.kind === 'process') continue;
      try {
        await unlink(resource.path);
      } catch (err) {
        if (!isMissingFile(err)) {
          logError(`ResourceJanitor:${resource.kind}`, err);
        }
      }
    }

    this.announce(outcome);
  }

  private announce(outcome: ReleaseOutcome): void {
    if (!this.notifier) return;
    try {
      if (outcome.reason === 'cancelled') {
        this.notifier.notify('Cancelled', 'Recording cancelled.', 'low');
      } else if (outcome.reason === 'failed') {
        this.notifier.notify(
          'Error',
          outcome.message ?? 'Transcription failed. Check the terminal for details.',
          'critical',
        );
      }
    } catch (err) {
      logError('ResourceJanitor:notify', err);
    }
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
