import { runCommand } from '../utils/exec';
import { CommandClipboardWriter } from './command';
import type { PasteOperations } from './interface';

export const wlCopyWriter = new CommandClipboardWriter('wl-copy', 'wl-copy', []);
export const xclipWriter = new CommandClipboardWriter('xclip', 'xclip', ['-selection', 'clipboard']);
export const xselWriter = new CommandClipboardWriter('xsel', 'xsel', ['--clipboard', '--input']);

/**
 * X11 paste through xdotool. Window ids come from `getactivewindow`.
 */
export class XdotoolPaste implements PasteOperations {
  readonly name = 'xdotool';
  readonly command = 'xdotool';
  readonly shortcut = 'Ctrl+V';

  async captureFocus(): Promise<string | undefined> {
    const output = await runCommand(this.command, ['getactivewindow'], { captureOutput: true });
    const windowId = output.trim();
    return /^\d+$/.test(windowId) ? windowId : undefined;
  }

  async restoreFocus(windowId: string): Promise<void> {
    await runCommand(this.command, ['windowactivate', '--sync', windowId]);
  }

  async simulatePaste(): Promise<void> {
    // --clearmodifiers keeps a still-held key from turning this into e.g. ctrl+shift+v
    await runCommand(this.command, ['key', '--clearmodifiers', 'ctrl+v']);
  }
}

export const xdotoolPaste = new XdotoolPaste();
