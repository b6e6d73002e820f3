import type { HostProbe } from '../utils/exec';
import { ConsoleNotifier, type CommandNotifier } from './command';
import type { Notifier } from './interface';
import { LINUX_NOTIFIERS } from './linux';
import { osascriptNotifier } from './macos';

/**
 * Picks the first installed notification mechanism for the platform, falling
 * back to the terminal.
 */
export async function selectNotifier(probe: HostProbe): Promise<Notifier> {
  const candidates: CommandNotifier[] =
    probe.platform === 'darwin' ? [osascriptNotifier] : LINUX_NOTIFIERS;

  for (const notifier of candidates) {
    if (await probe.commandExists(notifier.command)) {
      return notifier;
    }
  }
  return new ConsoleNotifier();
}

export type { NotificationUrgency, Notifier } from './interface';
export { CommandNotifier, ConsoleNotifier } from './command';
export { notifySend, kdialogNotifier, zenityNotifier, xmessageNotifier } from './linux';
export { appleScriptString, osascriptNotifier } from './macos';
