export type AudioBackendName = 'pipewire' | 'pulseaudio' | 'alsa' | 'sox';

/** Every backend records 16-bit signed PCM, 16 kHz, mono WAV. */
export const AUDIO_FORMAT = {
  sampleRate: 16000,
  channels: 1,
  bitDepth: 16,
} as const;

/**
 * How to start and stop one recording tool.
 */
export interface AudioCapability {
  readonly backend: AudioBackendName;
  /** Executable name, resolved through PATH */
  readonly command: string;
  /** Signal that makes the recorder flush and exit cleanly */
  readonly stopSignal: NodeJS.Signals;
  /** The recorder stops on its own once `maxDurationSec` is reached */
  readonly selfTerminates: boolean;
  buildArgs(outputPath: string, maxDurationSec: number): string[];
}

/**
 * A selectable backend: the capability plus what has to be true of the host for
 * it to work.
 */
export interface AudioBackendCandidate {
  readonly capability: AudioCapability;
  /**
   * Sound-server processes of which at least one must be running. Empty for
   * backends that talk to the kernel or the OS audio API directly.
   */
  readonly daemons: readonly string[];
}
