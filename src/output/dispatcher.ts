import {
  selectClipboardWriter,
  selectPasteOperations,
  type ClipboardWriter,
  type PasteOperations,
} from '../clipboard';
import type { HostProbe } from '../utils/exec';
import { logError } from '../utils/errors';
import { logger } from '../utils/log';
import { delay, TIMEOUTS } from '../utils/timeout';

export type DeliveryOutcome =
  | { kind: 'pasted' }
  | { kind: 'clipboard_only'; reason: string }
  | { kind: 'no_clipboard'; reason: string };

export interface OutputDispatcherOptions {
  writer?: ClipboardWriter;
  paste?: PasteOperations;
  /** false for --clipboard-only */
  pasteEnabled?: boolean;
  focusSettleMs?: number;
  /** Shown in "paste manually" hints when no paste tool is around */
  fallbackShortcut?: string;
}

/**
 * Delivers a transcript: clipboard first, then (best effort) focus the window
 * that was active before recording and send the paste keystroke. Delivery
 * problems degrade the outcome, they never throw.
 */
export class OutputDispatcher {
  private readonly writer?: ClipboardWriter;
  private readonly paste?: PasteOperations;
  private readonly pasteEnabled: boolean;
  private readonly focusSettleMs: number;
  private readonly fallbackShortcut: string;

  constructor(options: OutputDispatcherOptions = {}) {
    this.writer = options.writer;
    this.paste = options.paste;
    this.pasteEnabled = options.pasteEnabled ?? true;
    this.focusSettleMs = options.focusSettleMs ?? TIMEOUTS.FOCUS_SETTLE;
    this.fallbackShortcut = options.fallbackShortcut ?? 'Ctrl+V';
  }

  /** Selects the clipboard and paste tools once for this host. */
  static async create(
    probe: HostProbe,
    options: Pick<OutputDispatcherOptions, 'pasteEnabled' | 'focusSettleMs'> = {},
  ): Promise<OutputDispatcher> {
    const pasteEnabled = options.pasteEnabled ?? true;
    const writer = await selectClipboardWriter(probe);
    const paste = pasteEnabled ? await selectPasteOperations(probe) : undefined;
    logger.log(
      `[OutputDispatcher] clipboard=${writer?.name ?? 'none'} paste=${paste?.name ?? 'none'}`,
    );
    return new OutputDispatcher({
      ...options,
      writer,
      paste,
      pasteEnabled,
      fallbackShortcut: probe.platform === 'darwin' ? 'Cmd+V' : 'Ctrl+V',
    });
  }

  get pasteShortcut(): string {
    return this.paste?.shortcut ?? this.fallbackShortcut;
  }

  /**
   * Remembers where the user was working. Called before recording starts,
   * while that window still has focus.
   */
  async captureFocusedWindow(): Promise<string | undefined> {
    if (!this.pasteEnabled || !this.paste) {
      return undefined;
    }
    try {
      const target = await this.paste.captureFocus();
      logger.log(`[OutputDispatcher] focused window: ${target ?? 'none'}`);
      return target;
    } catch (err) {
      logError('OutputDispatcher:captureFocus', err);
      return undefined;
    }
  }

  async deliver(text: string, focusedWindow?: string): Promise<DeliveryOutcome> {
    if (!this.writer) {
      return { kind: 'no_clipboard', reason: 'no clipboard tool installed' };
    }
    try {
      await this.writer.write(text);
    } catch (err) {
      logError('OutputDispatcher:clipboard', err);
      return { kind: 'no_clipboard', reason: `${this.writer.name} failed: ${messageOf(err)}` };
    }
    logger.log(`[OutputDispatcher] copied ${text.length} characters with ${this.writer.name}`);

    if (!this.pasteEnabled) {
      return { kind: 'clipboard_only', reason: 'paste disabled' };
    }
    if (!this.paste) {
      return { kind: 'clipboard_only', reason: 'no paste tool installed' };
    }
    if (!focusedWindow) {
      return { kind: 'clipboard_only', reason: 'no window captured before recording' };
    }

    try {
      await this.paste.restoreFocus(focusedWindow);
    } catch (err) {
      logError('OutputDispatcher:restoreFocus', err);
      return { kind: 'clipboard_only', reason: `could not restore focus: ${messageOf(err)}` };
    }

    // Let the window manager finish the focus change before the keystroke lands
    await delay(this.focusSettleMs);

    try {
      await this.paste.simulatePaste();
    } catch (err) {
      logError('OutputDispatcher:paste', err);
      return { kind: 'clipboard_only', reason: `paste keystroke failed: ${messageOf(err)}` };
    }
    logger.log('[OutputDispatcher] pasted');
    return { kind: 'pasted' };
  }
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
