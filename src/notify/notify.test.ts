import { describe, it, expect, vi, beforeEach } from 'vitest';
import { mockSpawn, mockExecFile, createRunningChildProcess } from '../test-utils/spawn-mocks';
import type { HostProbe } from '../utils/exec';
import { logger } from '../utils/log';
import {
  appleScriptString,
  ConsoleNotifier,
  notifySend,
  osascriptNotifier,
  selectNotifier,
  xmessageNotifier,
  zenityNotifier,
} from './index';

vi.mock('node:child_process', () => ({
  spawn: mockSpawn,
  execFile: mockExecFile,
}));

function fakeProbe(platform: NodeJS.Platform, tools: string[]): HostProbe {
  return {
    platform,
    env: {},
    commandExists: async (command) => tools.includes(command),
    isProcessRunning: async () => false,
  };
}

describe('selectNotifier', () => {
  it('should prefer notify-send on linux', async () => {
    await expect(
      selectNotifier(fakeProbe('linux', ['xmessage', 'zenity', 'notify-send'])),
    ).resolves.toBe(notifySend);
  });

  it('should fall through the linux candidates in order', async () => {
    await expect(selectNotifier(fakeProbe('linux', ['xmessage', 'zenity']))).resolves.toBe(
      zenityNotifier,
    );
    await expect(selectNotifier(fakeProbe('linux', ['xmessage']))).resolves.toBe(xmessageNotifier);
  });

  it('should use osascript on macOS', async () => {
    await expect(selectNotifier(fakeProbe('darwin', ['osascript', 'notify-send']))).resolves.toBe(
      osascriptNotifier,
    );
  });

  it('should fall back to the terminal', async () => {
    await expect(selectNotifier(fakeProbe('linux', []))).resolves.toBeInstanceOf(ConsoleNotifier);
  });
});

describe('CommandNotifier', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should start notify-send detached with the urgency', () => {
    const child = createRunningChildProcess();
    const unref = vi.spyOn(child, 'unref');
    mockSpawn.mockReturnValueOnce(child);

    notifySend.notify('Recording started', 'Press Ctrl+C in the terminal to stop.', 'low');

    expect(mockSpawn).toHaveBeenCalledWith(
      'notify-send',
      ['-u', 'low', 'Recording started', 'Press Ctrl+C in the terminal to stop.'],
      { detached: true, stdio: 'ignore' },
    );
    expect(unref).toHaveBeenCalled();
  });

  it('should default to normal urgency', () => {
    mockSpawn.mockReturnValueOnce(createRunningChildProcess());

    notifySend.notify('Text pasted', 'hello world');

    expect(mockSpawn).toHaveBeenCalledWith(
      'notify-send',
      ['-u', 'normal', 'Text pasted', 'hello world'],
      expect.any(Object),
    );
  });

  it('should log a helper that fails to start instead of throwing', () => {
    const child = createRunningChildProcess();
    mockSpawn.mockReturnValueOnce(child);
    const errorSpy = vi.spyOn(logger, 'error').mockImplementation(() => undefined);

    notifySend.notify('Error', 'No audio was recorded.', 'critical');
    child.emit('error', new Error('spawn notify-send ENOENT'));

    expect(errorSpy).toHaveBeenCalledWith('[notify:notify-send]', 'spawn notify-send ENOENT');
    errorSpy.mockRestore();
  });

  it('should build an AppleScript notification with escaped strings', () => {
    mockSpawn.mockReturnValueOnce(createRunningChildProcess());

    osascriptNotifier.notify('Text pasted', 'say "hi"');

    expect(mockSpawn).toHaveBeenCalledWith(
      'osascript',
      ['-e', 'display notification "say \\"hi\\"" with title "Text pasted"'],
      expect.any(Object),
    );
  });
});

describe('appleScriptString', () => {
  it('should escape backslashes before quotes', () => {
    expect(appleScriptString('C:\\path "x"')).toBe('"C:\\\\path \\"x\\""');
  });
});

describe('ConsoleNotifier', () => {
  it('should print to the log', () => {
    const logSpy = vi.spyOn(logger, 'log').mockImplementation(() => undefined);

    new ConsoleNotifier().notify('Cancelled', 'Recording cancelled.');

    expect(logSpy).toHaveBeenCalledWith('[NOTIFICATION] Cancelled - Recording cancelled.');
    logSpy.mockRestore();
  });
});
