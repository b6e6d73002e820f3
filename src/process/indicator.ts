import type { HostProbe } from '../utils/exec';

/**
 * A small on-screen "recording" affordance run as its own process next to the
 * recorder.
 */
export interface StatusIndicator {
  readonly name: string;
  readonly command: string;
  /** The indicator exiting means the user asked to stop recording */
  readonly stopsRecorder: boolean;
  /** Some dialogs exit as soon as their stdin closes */
  readonly keepStdinOpen: boolean;
  buildArgs(recorderPid: number): string[];
}

/** Tray icon; clicking it sends SIGTERM to the recorder. */
export const yadIndicator: StatusIndicator = {
  name: 'yad',
  command: 'yad',
  stopsRecorder: true,
  keepStdinOpen: false,
  buildArgs: (recorderPid) => [
    '--notification',
    '--image=audio-input-microphone',
    '--text=Recording in progress. Click to stop.',
    `--command=kill ${recorderPid}`,
    '--no-middle',
  ],
};

/** Pulsating progress dialog; closing or cancelling it stops the recording. */
export const zenityIndicator: StatusIndicator = {
  name: 'zenity',
  command: 'zenity',
  stopsRecorder: true,
  keepStdinOpen: true,
  buildArgs: () => [
    '--progress',
    '--pulsate',
    '--title=Speech Recording',
    '--text=Recording... (close this dialog to stop)',
  ],
};

/** Passive popup only, it disappears by itself and cannot stop anything. */
export const kdialogIndicator: StatusIndicator = {
  name: 'kdialog',
  command: 'kdialog',
  stopsRecorder: false,
  keepStdinOpen: false,
  buildArgs: () => [
    '--title',
    'Recording',
    '--passivepopup',
    'Recording in progress. Press Ctrl+C in terminal to stop.',
    '10',
  ],
};

export const STATUS_INDICATORS: readonly StatusIndicator[] = [
  yadIndicator,
  zenityIndicator,
  kdialogIndicator,
];

export async function selectStatusIndicator(
  probe: HostProbe,
  candidates: readonly StatusIndicator[] = STATUS_INDICATORS,
): Promise<StatusIndicator | undefined> {
  if (probe.platform === 'darwin') {
    return undefined;
  }
  for (const indicator of candidates) {
    if (await probe.commandExists(indicator.command)) {
      return indicator;
    }
  }
  return undefined;
}
