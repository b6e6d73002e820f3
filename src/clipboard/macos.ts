import { appleScriptString } from '../notify/macos';
import { runCommand } from '../utils/exec';
import { CommandClipboardWriter } from './command';
import type { PasteOperations } from './interface';

export const pbcopyWriter = new CommandClipboardWriter('pbcopy', 'pbcopy', []);

/**
 * macOS paste through AppleScript and System Events. Focus is tracked per
 * application, not per window.
 */
export class AppleScriptPaste implements PasteOperations {
  readonly name = 'osascript';
  readonly command = 'osascript';
  readonly shortcut = 'Cmd+V';

  async captureFocus(): Promise<string | undefined> {
    const output = await runCommand(
      this.command,
      [
        '-e',
        'tell application "System Events" to get name of first application process whose frontmost is true',
      ],
      { captureOutput: true },
    );
    return output.trim() || undefined;
  }

  async restoreFocus(application: string): Promise<void> {
    await runCommand(this.command, ['-e', `tell application ${appleScriptString(application)} to activate`]);
  }

  async simulatePaste(): Promise<void> {
    await runCommand(this.command, [
      '-e',
      'tell application "System Events"',
      '-e',
      'keystroke "v" using {command down}',
      '-e',
      'end tell',
    ]);
  }
}

export const appleScriptPaste = new AppleScriptPaste();
