import type { HostProbe } from '../utils/exec';
import type { ClipboardWriter, PasteOperations } from './interface';
import { wlCopyWriter, xclipWriter, xdotoolPaste, xselWriter } from './linux';
import { appleScriptPaste, pbcopyWriter } from './macos';

export type DisplayProtocol = 'wayland' | 'x11' | 'macos';

export function detectDisplayProtocol(probe: HostProbe): DisplayProtocol {
  if (probe.platform === 'darwin') {
    return 'macos';
  }
  if (probe.env.WAYLAND_DISPLAY || probe.env.XDG_SESSION_TYPE === 'wayland') {
    return 'wayland';
  }
  return 'x11';
}

/** Clipboard helpers in order of preference for each display protocol. */
export const CLIPBOARD_WRITERS: Record<DisplayProtocol, readonly ClipboardWriter[]> = {
  wayland: [wlCopyWriter, xclipWriter, xselWriter],
  x11: [xclipWriter, xselWriter, wlCopyWriter],
  macos: [pbcopyWriter],
};

export async function selectClipboardWriter(probe: HostProbe): Promise<ClipboardWriter | undefined> {
  for (const writer of CLIPBOARD_WRITERS[detectDisplayProtocol(probe)]) {
    if (await probe.commandExists(writer.command)) {
      return writer;
    }
  }
  return undefined;
}

/**
 * Paste needs an X server (native or XWayland) on Linux. Wayland-only
 * injectors cannot restore focus, so they are not candidates.
 */
export async function selectPasteOperations(probe: HostProbe): Promise<PasteOperations | undefined> {
  if (probe.platform === 'darwin') {
    return (await probe.commandExists(appleScriptPaste.command)) ? appleScriptPaste : undefined;
  }
  if (!probe.env.DISPLAY) {
    return undefined;
  }
  return (await probe.commandExists(xdotoolPaste.command)) ? xdotoolPaste : undefined;
}

export type { ClipboardWriter, PasteOperations } from './interface';
export { CommandClipboardWriter } from './command';
export { wlCopyWriter, xclipWriter, xselWriter, XdotoolPaste, xdotoolPaste } from './linux';
export { AppleScriptPaste, appleScriptPaste, pbcopyWriter } from './macos';
