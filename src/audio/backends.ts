import { AUDIO_FORMAT, type AudioBackendCandidate, type AudioCapability } from './interface';

const RATE = String(AUDIO_FORMAT.sampleRate);
const CHANNELS = String(AUDIO_FORMAT.channels);

export const pipewireRecorder: AudioCapability = {
  backend: 'pipewire',
  command: 'pw-record',
  stopSignal: 'SIGINT',
  selfTerminates: false,
  buildArgs: (outputPath) => [
    '--format=s16',
    `--rate=${RATE}`,
    `--channels=${CHANNELS}`,
    outputPath,
  ],
};

export const pulseaudioRecorder: AudioCapability = {
  backend: 'pulseaudio',
  command: 'parecord',
  stopSignal: 'SIGINT',
  selfTerminates: false,
  buildArgs: (outputPath) => [
    '--format=s16le',
    `--rate=${RATE}`,
    `--channels=${CHANNELS}`,
    '--file-format=wav',
    outputPath,
  ],
};

export const alsaRecorder: AudioCapability = {
  backend: 'alsa',
  command: 'arecord',
  stopSignal: 'SIGINT',
  selfTerminates: true,
  buildArgs: (outputPath, maxDurationSec) => [
    '-q',
    '-f',
    'S16_LE',
    '-r',
    RATE,
    '-c',
    CHANNELS,
    '-t',
    'wav',
    '-d',
    String(maxDurationSec),
    outputPath,
  ],
};

export const soxRecorder: AudioCapability = {
  backend: 'sox',
  command: 'rec',
  stopSignal: 'SIGINT',
  selfTerminates: true,
  buildArgs: (outputPath, maxDurationSec) => [
    '-q',
    '-r',
    RATE,
    '-c',
    CHANNELS,
    '-b',
    '16',
    '-e',
    'signed-integer',
    outputPath,
    'trim',
    '0',
    String(maxDurationSec),
  ],
};

/** Descending preference. */
export const AUDIO_BACKENDS: readonly AudioBackendCandidate[] = [
  { capability: pipewireRecorder, daemons: ['pipewire'] },
  { capability: pulseaudioRecorder, daemons: ['pulseaudio', 'pipewire-pulse'] },
  { capability: alsaRecorder, daemons: [] },
  { capability: soxRecorder, daemons: [] },
];
