import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  mockSpawn,
  mockExecFile,
  createSuccessfulChildProcess,
  createFailedChildProcess,
} from '../test-utils/spawn-mocks';
import type { HostProbe } from '../utils/exec';
import {
  appleScriptPaste,
  detectDisplayProtocol,
  pbcopyWriter,
  selectClipboardWriter,
  selectPasteOperations,
  wlCopyWriter,
  xclipWriter,
  xdotoolPaste,
  xselWriter,
} from './index';

vi.mock('node:child_process', () => ({
  spawn: mockSpawn,
  execFile: mockExecFile,
}));

function fakeProbe(
  platform: NodeJS.Platform,
  env: NodeJS.ProcessEnv,
  tools: string[],
): HostProbe {
  return {
    platform,
    env,
    commandExists: vi.fn(async (command: string) => tools.includes(command)),
    isProcessRunning: vi.fn(async () => false),
  };
}

describe('detectDisplayProtocol', () => {
  it('should detect wayland from WAYLAND_DISPLAY or the session type', () => {
    expect(detectDisplayProtocol(fakeProbe('linux', { WAYLAND_DISPLAY: 'wayland-0' }, []))).toBe(
      'wayland',
    );
    expect(detectDisplayProtocol(fakeProbe('linux', { XDG_SESSION_TYPE: 'wayland' }, []))).toBe(
      'wayland',
    );
  });

  it('should fall back to x11 on linux and report macos on darwin', () => {
    expect(detectDisplayProtocol(fakeProbe('linux', { DISPLAY: ':0' }, []))).toBe('x11');
    expect(detectDisplayProtocol(fakeProbe('darwin', {}, []))).toBe('macos');
  });
});

describe('selectClipboardWriter', () => {
  it('should prefer wl-copy on wayland', async () => {
    const probe = fakeProbe('linux', { WAYLAND_DISPLAY: 'wayland-0' }, ['xclip', 'wl-copy']);

    await expect(selectClipboardWriter(probe)).resolves.toBe(wlCopyWriter);
  });

  it('should prefer xclip, then xsel, on x11', async () => {
    await expect(
      selectClipboardWriter(fakeProbe('linux', { DISPLAY: ':0' }, ['wl-copy', 'xclip', 'xsel'])),
    ).resolves.toBe(xclipWriter);
    await expect(
      selectClipboardWriter(fakeProbe('linux', { DISPLAY: ':0' }, ['wl-copy', 'xsel'])),
    ).resolves.toBe(xselWriter);
  });

  it('should use pbcopy on macOS', async () => {
    await expect(selectClipboardWriter(fakeProbe('darwin', {}, ['pbcopy']))).resolves.toBe(
      pbcopyWriter,
    );
  });

  it('should return undefined when nothing is installed', async () => {
    await expect(selectClipboardWriter(fakeProbe('linux', {}, []))).resolves.toBeUndefined();
  });
});

describe('selectPasteOperations', () => {
  it('should use xdotool when an X display is available', async () => {
    await expect(
      selectPasteOperations(fakeProbe('linux', { DISPLAY: ':0' }, ['xdotool'])),
    ).resolves.toBe(xdotoolPaste);
  });

  it('should not paste without an X display', async () => {
    await expect(
      selectPasteOperations(fakeProbe('linux', { WAYLAND_DISPLAY: 'wayland-0' }, ['xdotool'])),
    ).resolves.toBeUndefined();
  });

  it('should use osascript on macOS', async () => {
    await expect(selectPasteOperations(fakeProbe('darwin', {}, ['osascript']))).resolves.toBe(
      appleScriptPaste,
    );
  });
});

describe('clipboard writers', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should pipe the text into xclip', async () => {
    const child = createSuccessfulChildProcess();
    mockSpawn.mockReturnValueOnce(child);

    await xclipWriter.write('hello world');

    expect(mockSpawn).toHaveBeenCalledWith('xclip', ['-selection', 'clipboard'], {
      stdio: ['pipe', 'ignore', 'ignore'],
    });
    expect(child.stdin.written).toBe('hello world');
    expect(child.stdin.ended).toBe(true);
  });

  it('should call xsel in clipboard input mode', async () => {
    mockSpawn.mockReturnValueOnce(createSuccessfulChildProcess());

    await xselWriter.write('hello');

    expect(mockSpawn).toHaveBeenCalledWith('xsel', ['--clipboard', '--input'], expect.any(Object));
  });

  it('should reject when the helper fails', async () => {
    mockSpawn.mockReturnValueOnce(createFailedChildProcess(1));

    await expect(wlCopyWriter.write('hello')).rejects.toThrow('wl-copy exited with code 1');
  });
});

describe('XdotoolPaste', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should capture the active window id', async () => {
    mockSpawn.mockReturnValueOnce(createSuccessfulChildProcess('71303175\n'));

    await expect(xdotoolPaste.captureFocus()).resolves.toBe('71303175');
    expect(mockSpawn).toHaveBeenCalledWith('xdotool', ['getactivewindow'], {
      stdio: ['ignore', 'pipe', 'ignore'],
    });
  });

  it('should ignore output that is not a window id', async () => {
    mockSpawn.mockReturnValueOnce(createSuccessfulChildProcess('\n'));

    await expect(xdotoolPaste.captureFocus()).resolves.toBeUndefined();
  });

  it('should restore focus synchronously and paste with cleared modifiers', async () => {
    // Each child exits on the tick after it is created, so create them on demand
    mockSpawn
      .mockImplementationOnce(() => createSuccessfulChildProcess())
      .mockImplementationOnce(() => createSuccessfulChildProcess());

    await xdotoolPaste.restoreFocus('71303175');
    await xdotoolPaste.simulatePaste();

    expect(mockSpawn.mock.calls.map((call) => call.slice(0, 2))).toEqual([
      ['xdotool', ['windowactivate', '--sync', '71303175']],
      ['xdotool', ['key', '--clearmodifiers', 'ctrl+v']],
    ]);
  });
});

describe('AppleScriptPaste', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should capture the frontmost application', async () => {
    mockSpawn.mockReturnValueOnce(createSuccessfulChildProcess('TextEdit\n'));

    await expect(appleScriptPaste.captureFocus()).resolves.toBe('TextEdit');
  });

  it('should quote the application name when activating it', async () => {
    mockSpawn.mockReturnValueOnce(createSuccessfulChildProcess());

    await appleScriptPaste.restoreFocus('My "Notes"');

    expect(mockSpawn).toHaveBeenCalledWith(
      'osascript',
      ['-e', 'tell application "My \\"Notes\\"" to activate'],
      expect.any(Object),
    );
  });

  it('should send Cmd+V through System Events', async () => {
    mockSpawn.mockReturnValueOnce(createSuccessfulChildProcess());

    await appleScriptPaste.simulatePaste();

    expect(mockSpawn).toHaveBeenCalledWith(
      'osascript',
      [
        '-e',
        'tell application "System Events"',
        '-e',
        'keystroke "v" using {command down}',
        '-e',
        'end tell',
      ],
      expect.any(Object),
    );
  });
});
