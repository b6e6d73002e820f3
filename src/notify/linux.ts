import { CommandNotifier } from './command';

export const notifySend = new CommandNotifier('notify-send', 'notify-send', (title, message, urgency) => [
  '-u',
  urgency,
  title,
  message,
]);

export const kdialogNotifier = new CommandNotifier('kdialog', 'kdialog', (title, message) => [
  '--title',
  title,
  '--passivepopup',
  message,
  '5',
]);

export const zenityNotifier = new CommandNotifier('zenity', 'zenity', (title, message) => [
  '--info',
  `--title=${title}`,
  `--text=${message}`,
  '--timeout=5',
]);

export const xmessageNotifier = new CommandNotifier('xmessage', 'xmessage', (title, message) => [
  '-timeout',
  '5',
  `${title}: ${message}`,
]);

export const LINUX_NOTIFIERS = [notifySend, kdialogNotifier, zenityNotifier, xmessageNotifier];
