import type { HostProbe } from '../utils/exec';
import { logger } from '../utils/log';
import { createNoBackendError } from '../utils/errors';
import { AUDIO_BACKENDS } from './backends';
import type { AudioBackendCandidate, AudioCapability } from './interface';

async function isLive(candidate: AudioBackendCandidate, probe: HostProbe): Promise<boolean> {
  if (candidate.daemons.length === 0) {
    return true;
  }
  for (const daemon of candidate.daemons) {
    if (await probe.isProcessRunning(daemon)) {
      return true;
    }
  }
  return false;
}

/**
 * Picks the highest-preference backend whose tool is installed and whose sound
 * server is running.
 *
 * When tools are installed but none of their daemons runs, the most preferred
 * installed one is returned anyway and a warning is logged; selection only
 * fails when no recording tool exists at all.
 *
 * @throws TranscribeError (no_backend) when no recording tool is installed
 */
export async function selectAudioCapability(
  probe: HostProbe,
  candidates: readonly AudioBackendCandidate[] = AUDIO_BACKENDS,
): Promise<AudioCapability> {
  let firstInstalled: AudioCapability | undefined;

  for (const candidate of candidates) {
    const { capability } = candidate;
    if (!(await probe.commandExists(capability.command))) {
      continue;
    }
    firstInstalled ??= capability;

    if (await isLive(candidate, probe)) {
      logger.log(
        `[selectAudioCapability] using ${capability.backend} (${capability.command})`,
      );
      return capability;
    }

    logger.warn(
      `[selectAudioCapability] ${capability.command} installed but ${candidate.daemons.join('/')} not running, skipping`,
    );
  }

  if (firstInstalled) {
    logger.warn(
      `[selectAudioCapability] no running sound server found, trying ${firstInstalled.command}`,
    );
    return firstInstalled;
  }

  throw createNoBackendError();
}

export type { AudioBackendCandidate, AudioBackendName, AudioCapability } from './interface';
export { AUDIO_FORMAT } from './interface';
export {
  AUDIO_BACKENDS,
  alsaRecorder,
  pipewireRecorder,
  pulseaudioRecorder,
  soxRecorder,
} from './backends';
