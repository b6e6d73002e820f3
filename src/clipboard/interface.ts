/**
 * Puts text on the system clipboard through an external helper.
 */
export interface ClipboardWriter {
  readonly name: string;
  readonly command: string;
  write(text: string): Promise<void>;
}

/**
 * Focus tracking and the paste keystroke for one windowing system.
 */
export interface PasteOperations {
  readonly name: string;
  readonly command: string;
  /** Human-readable shortcut for "paste manually" hints */
  readonly shortcut: string;

  /**
   * Identifies the window (or application) that currently has focus.
   * @returns undefined when nothing usable is focused
   */
  captureFocus(): Promise<string | undefined>;

  restoreFocus(target: string): Promise<void>;

  /** Sends Ctrl+V (Cmd+V on macOS) to the focused window. */
  simulatePaste(): Promise<void>;
}
