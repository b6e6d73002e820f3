import { CommandNotifier } from './command';

/** AppleScript string literal. */
export function appleScriptString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export const osascriptNotifier = new CommandNotifier('osascript', 'osascript', (title, message) => [
  '-e',
  `display notification ${appleScriptString(message)} with title ${appleScriptString(title)}`,
]);
