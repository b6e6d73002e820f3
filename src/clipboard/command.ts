import { runCommand } from '../utils/exec';
import type { ClipboardWriter } from './interface';

/** Feeds the text to a clipboard helper on stdin. */
export class CommandClipboardWriter implements ClipboardWriter {
  constructor(
    readonly name: string,
    readonly command: string,
    private readonly args: string[],
  ) {}

  async write(text: string): Promise<void> {
    await runCommand(this.command, this.args, { input: text });
  }
}
