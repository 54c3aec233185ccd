import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { DisplayError } from '../errors';
import { SCREEN_FLAGS } from '../devices/screen';
import { KEY_CODES } from './keys';
import { PLAIN_FONT, rasterizeText } from './raster';
import { parseKey, parseMouse, TerminalBackend, tokenizeInput } from './terminal';
import { MOD_ALT, MOD_CTRL, MOD_NONE, MOD_SHIFT } from './types';

function fakeTerminal(cols = 40, rows = 12) {
  const dataListeners = new Set<(data: string) => void>();
  const resizeListeners = new Set<(size: { cols: number; rows: number }) => void>();
  const output: string[] = [];
  const terminal = {
    cols,
    rows,
    output,
    write(data: string) {
      terminal.output.push(data);
    },
    onData(listener: (data: string) => void) {
      dataListeners.add(listener);
      return { dispose: () => { dataListeners.delete(listener); } };
    },
    onResize(listener: (size: { cols: number; rows: number }) => void) {
      resizeListeners.add(listener);
      return { dispose: () => { resizeListeners.delete(listener); } };
    },
    send(data: string) {
      for (const listener of dataListeners) listener(data);
    },
    resize(newCols: number, newRows: number) {
      terminal.cols = newCols;
      terminal.rows = newRows;
      for (const listener of resizeListeners) listener({ cols: newCols, rows: newRows });
    },
    get listeners() {
      return dataListeners.size + resizeListeners.size;
    },
  };
  return terminal;
}

describe('tokenizeInput', () => {
  it('splits plain characters', () => {
    expect(tokenizeInput('ab')).toEqual(['a', 'b']);
  });

  it('keeps escape sequences whole', () => {
    expect(tokenizeInput('\x1b[A\x1b[1;5C\x1bOP')).toEqual(['\x1b[A', '\x1b[1;5C', '\x1bOP']);
  });

  it('keeps mouse reports whole', () => {
    expect(tokenizeInput('\x1b[<0;5;3Mx')).toEqual(['\x1b[<0;5;3M', 'x']);
  });

  it('separates a lone escape from what follows', () => {
    expect(tokenizeInput('\x1b')).toEqual(['\x1b']);
    expect(tokenizeInput('\x1b\x1b[B')).toEqual(['\x1b', '\x1b[B']);
  });

  it('pairs escape with a following key as alt', () => {
    expect(tokenizeInput('\x1bq')).toEqual(['\x1bq']);
  });
});

describe('parseKey', () => {
  it('maps control keys to named codes', () => {
    expect(parseKey('\r')).toEqual({ code: KEY_CODES.Enter, character: '', modifiers: MOD_NONE });
    expect(parseKey('\x1b')).toEqual({ code: KEY_CODES.Escape, character: '', modifiers: MOD_NONE });
    expect(parseKey('\x7f')).toEqual({ code: KEY_CODES.Backspace, character: '', modifiers: MOD_NONE });
    expect(parseKey(' ')).toEqual({ code: KEY_CODES.Space, character: ' ', modifiers: MOD_NONE });
  });

  it('maps letters case-insensitively with shift for capitals', () => {
    expect(parseKey('a')).toEqual({ code: 65, character: 'a', modifiers: MOD_NONE });
    expect(parseKey('A')).toEqual({ code: 65, character: 'A', modifiers: MOD_SHIFT });
  });

  it('gives symbols codes that never collide with named keys', () => {
    expect(parseKey('&')).toEqual({ code: 0x10000 + 38, character: '&', modifiers: MOD_NONE });
  });

  it('decodes arrows, editing and function keys', () => {
    expect(parseKey('\x1b[A')?.code).toBe(KEY_CODES.ArrowUp);
    expect(parseKey('\x1bOB')?.code).toBe(KEY_CODES.ArrowDown);
    expect(parseKey('\x1b[3~')?.code).toBe(KEY_CODES.Delete);
    expect(parseKey('\x1bOP')?.code).toBe(KEY_CODES.F1);
    expect(parseKey('\x1b[24~')?.code).toBe(KEY_CODES.F12);
  });

  it('decodes modifiers', () => {
    expect(parseKey('\x1b[1;5A')).toEqual({ code: KEY_CODES.ArrowUp, character: '', modifiers: MOD_CTRL });
    expect(parseKey('\x01')).toEqual({ code: KEY_CODES.a, character: '', modifiers: MOD_CTRL });
    expect(parseKey('\x1bq')).toEqual({ code: KEY_CODES.q, character: 'q', modifiers: MOD_ALT });
  });

  it('ignores unknown sequences', () => {
    expect(parseKey('\x1b[Z')).toBeUndefined();
    expect(parseKey('\x1b[99~')).toBeUndefined();
  });
});

describe('parseMouse', () => {
  it('decodes SGR reports', () => {
    expect(parseMouse('\x1b[<0;5;3M')).toEqual({ button: 0, col: 5, row: 3, motion: false, release: false });
    expect(parseMouse('\x1b[<2;1;1m')).toEqual({ button: 2, col: 1, row: 1, motion: false, release: true });
    expect(parseMouse('\x1b[<35;7;2M')).toEqual({ button: 3, col: 7, row: 2, motion: true, release: false });
    expect(parseMouse('\x1b[<65;1;1M')?.button).toBe(65);
  });

  it('rejects anything else', () => {
    expect(parseMouse('\x1b[A')).toBeUndefined();
  });
});

describe('TerminalBackend', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('takes over the terminal on open and gives it back on close', () => {
    const terminal = fakeTerminal();
    const backend = new TerminalBackend(terminal);
    backend.open();
    expect(terminal.output[0]).toBe('\x1b[?1049h\x1b[?25l\x1b[2J\x1b[H\x1b[?1003h\x1b[?1006h');
    expect(terminal.listeners).toBe(2);

    backend.close();
    expect(terminal.output[1]).toBe('\x1b[?1006l\x1b[?1003l\x1b[0m\x1b[?25h\x1b[?1049l');
    expect(terminal.listeners).toBe(0);

    backend.close();
    expect(terminal.output).toHaveLength(2);
  });

  it('warns when opened twice', () => {
    const logger = { warn: vi.fn() };
    const backend = new TerminalBackend(fakeTerminal(), { logger });
    backend.open();
    backend.open();
    expect(logger.warn).toHaveBeenCalledWith('[Terminal] Already open');
  });

  it('simulates key release after a quiet period', () => {
    const terminal = fakeTerminal();
    const backend = new TerminalBackend(terminal);
    backend.open();

    terminal.send('a');
    expect(backend.poll()).toEqual([{ type: 'keyDown', code: 65, character: 'a', modifiers: MOD_NONE }]);

    vi.advanceTimersByTime(79);
    expect(backend.poll()).toEqual([]);

    // Auto-repeat while held re-arms the release
    terminal.send('a');
    expect(backend.poll()).toEqual([]);
    vi.advanceTimersByTime(79);
    expect(backend.poll()).toEqual([]);
    vi.advanceTimersByTime(1);
    expect(backend.poll()).toEqual([{ type: 'keyUp', code: 65, modifiers: MOD_NONE }]);
  });

  it('uses the configured release delay', () => {
    const terminal = fakeTerminal();
    const backend = new TerminalBackend(terminal, { keyReleaseDelay: 10 });
    backend.open();
    terminal.send('\r');
    backend.poll();
    vi.advanceTimersByTime(10);
    expect(backend.poll()).toEqual([{ type: 'keyUp', code: KEY_CODES.Enter, modifiers: MOD_NONE }]);
  });

  it('turns Ctrl+C into quit', () => {
    const terminal = fakeTerminal();
    const backend = new TerminalBackend(terminal);
    backend.open();
    terminal.send('\x03');
    expect(backend.poll()).toEqual([{ type: 'quit' }]);
  });

  it('cancels pending releases on close', () => {
    const terminal = fakeTerminal();
    const backend = new TerminalBackend(terminal);
    backend.open();
    terminal.send('a');
    backend.poll();
    backend.close();
    vi.advanceTimersByTime(100);
    expect(backend.poll()).toEqual([]);
  });

  it('maps mouse reports into window coordinates', () => {
    const terminal = fakeTerminal(40, 12);
    const backend = new TerminalBackend(terminal);
    backend.open();
    // Framed 20x6 window: top-left cell at column 10, row 3
    backend.setMode({ width: 20, height: 6 }, 0);

    terminal.send('\x1b[<0;12;5M');
    expect(backend.poll()).toEqual([
      { type: 'mouseMotion', pos: { x: 1, y: 1 }, rel: { x: 1, y: 1 } },
      { type: 'mouseButtonDown', button: 1 },
    ]);

    terminal.send('\x1b[<0;12;5m');
    expect(backend.poll()).toEqual([{ type: 'mouseButtonUp', button: 1 }]);

    terminal.send('\x1b[<35;14;4M');
    expect(backend.poll()).toEqual([
      { type: 'mouseMotion', pos: { x: 3, y: 0 }, rel: { x: 2, y: -1 } },
    ]);

    terminal.send('\x1b[<65;14;4M');
    expect(backend.poll()).toEqual([
      { type: 'mouseButtonDown', button: 5 },
      { type: 'mouseButtonUp', button: 5 },
    ]);
  });

  it('queues a motion when the cursor is warped', () => {
    const backend = new TerminalBackend(fakeTerminal());
    backend.warpCursor({ x: 4, y: 2 });
    expect(backend.poll()).toEqual([{ type: 'mouseMotion', pos: { x: 4, y: 2 }, rel: { x: 4, y: 2 } }]);
  });

  it('reports resizes the mode follows', () => {
    const terminal = fakeTerminal(40, 12);
    const backend = new TerminalBackend(terminal);
    backend.open();

    backend.setMode({ width: 20, height: 6 }, 0);
    terminal.resize(50, 20);
    expect(backend.poll()).toEqual([]);

    backend.setMode({ width: 20, height: 6 }, SCREEN_FLAGS.RESIZABLE);
    terminal.resize(60, 20);
    expect(backend.poll()).toEqual([{ type: 'windowResize', size: { width: 58, height: 18 } }]);

    backend.setMode({ width: 60, height: 20 }, SCREEN_FLAGS.FULLSCREEN);
    terminal.resize(70, 25);
    expect(backend.poll()).toEqual([{ type: 'windowResize', size: { width: 70, height: 25 } }]);
  });

  it('rejects modes that do not fit', () => {
    const backend = new TerminalBackend(fakeTerminal(40, 12));
    expect(() => backend.setMode({ width: 0, height: 5 }, 0)).toThrow(DisplayError);
    expect(() => backend.setMode({ width: 40, height: 12 }, 0)).toThrow(DisplayError);
    expect(() => backend.setMode({ width: 40, height: 12 }, SCREEN_FLAGS.NOFRAME)).not.toThrow();
  });

  it('reports the terminal size as the display size', () => {
    const backend = new TerminalBackend(fakeTerminal(100, 30));
    expect(backend.info()).toEqual({ displaySize: { width: 100, height: 30 } });
  });

  it('sets the terminal title', () => {
    const terminal = fakeTerminal();
    new TerminalBackend(terminal).setTitle('Lab');
    expect(terminal.output).toEqual(['\x1b]0;Lab\x07']);
  });

  it('clips blits to the window', () => {
    const backend = new TerminalBackend(fakeTerminal());
    backend.setMode({ width: 2, height: 1 }, SCREEN_FLAGS.NOFRAME);
    const image = rasterizeText('XYZ', PLAIN_FONT, [0, 0, 0], null);
    expect(backend.blit(image, { x: -1, y: 0 })).toEqual({ x: 0, y: 0, width: 2, height: 1 });
    expect(backend.blit(image, { x: 5, y: 5 })).toEqual({ x: 5, y: 5, width: 0, height: 0 });
  });

  it('paints the cell buffer with 24-bit colour', () => {
    const terminal = fakeTerminal(4, 3);
    const backend = new TerminalBackend(terminal);
    backend.setMode({ width: 2, height: 1 }, SCREEN_FLAGS.NOFRAME);
    backend.fill([0, 0, 0]);
    backend.blit(rasterizeText('A', PLAIN_FONT, [255, 0, 0], null), { x: 1, y: 0 });
    backend.present();

    expect(terminal.output[terminal.output.length - 1]).toBe(
      '\x1b[0m\x1b[2J\x1b[H'
      + '\x1b[2;2H'
      + '\x1b[0;48;2;0;0;0m '
      + '\x1b[0;38;2;255;0;0;48;2;0;0;0mA'
      + '\x1b[0m'
    );

    backend.present();
    expect(terminal.output[terminal.output.length - 1].startsWith('\x1b[2;2H')).toBe(true);
  });

  it('wraps frames in synchronized output with DOUBLEBUF', () => {
    const terminal = fakeTerminal(4, 3);
    const backend = new TerminalBackend(terminal);
    backend.setMode({ width: 2, height: 1 }, SCREEN_FLAGS.NOFRAME | SCREEN_FLAGS.DOUBLEBUF);
    backend.present();
    const frame = terminal.output[terminal.output.length - 1];
    expect(frame.startsWith('\x1b[?2026h')).toBe(true);
    expect(frame.endsWith('\x1b[?2026l')).toBe(true);
  });

  it('draws a border carrying the title around windowed modes', () => {
    const terminal = fakeTerminal(6, 4);
    const backend = new TerminalBackend(terminal);
    backend.setTitle('T');
    backend.setMode({ width: 2, height: 1 }, 0);
    backend.present();
    const frame = terminal.output[terminal.output.length - 1];
    expect(frame).toContain('\x1b[1;2H┌ T┐');
    expect(frame).toContain('\x1b[2;2H│');
    expect(frame).toContain('\x1b[2;5H│');
    expect(frame).toContain('\x1b[3;2H└──┘');
  });
});
