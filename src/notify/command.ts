import { spawn } from 'node:child_process';
import { logError } from '../utils/errors';
import { logger } from '../utils/log';
import type { NotificationUrgency, Notifier } from './interface';

export type NotifierArgs = (
  title: string,
  message: string,
  urgency: NotificationUrgency,
) => string[];

/**
 * Notifier backed by a helper command. The helper is started detached and not
 * awaited: popups such as zenity or kdialog stay open for seconds.
 */
export class CommandNotifier implements Notifier {
  constructor(
    readonly name: string,
    readonly command: string,
    private readonly buildArgs: NotifierArgs,
  ) {}

  notify(title: string, message: string, urgency: NotificationUrgency = 'normal'): void {
    const child = spawn(this.command, this.buildArgs(title, message, urgency), {
      detached: true,
      stdio: 'ignore',
    });
    child.once('error', (err: Error) => logError(`notify:${this.name}`, err));
    child.unref();
  }
}

/** Last resort: the terminal. */
export class ConsoleNotifier implements Notifier {
  readonly name = 'console';

  notify(title: string, message: string): void {
    logger.log(`[NOTIFICATION] ${title} - ${message}`);
  }
}
