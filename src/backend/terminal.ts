/**
 * Terminal backend
 *
 * Drives any xterm-compatible terminal: an @xterm/xterm Terminal in the
 * browser, or the stdin/stdout adapter from nodeTerminal.ts.
 *
 * The window is a cell buffer. Blits write into it and present() paints
 * it in one write. Raw terminal input is turned into backend events;
 * since terminals never report key releases, a keyUp is simulated once
 * a key has been silent for keyReleaseDelay ms.
 */

import type { IDisposable } from '@xterm/xterm';
import { DisplayError } from '../errors';
import { SCREEN_FLAGS } from '../devices/screen';
import { characterKeyCode, KEY_CODES } from './keys';
import { rasterizeText } from './raster';
import {
  MOD_ALT,
  MOD_CTRL,
  MOD_NONE,
  MOD_SHIFT,
  type BackendEvent,
  type Cell,
  type Color,
  type DisplayBackend,
  type DisplayInfo,
  type Font,
  type Image,
  type Point,
  type Rect,
  type Size,
} from './types';

/**
 * The part of an xterm Terminal this backend uses
 */
export interface TerminalLike {
  write(data: string): void;
  readonly cols: number;
  readonly rows: number;
  onData(listener: (data: string) => void): IDisposable;
  onResize(listener: (size: { cols: number; rows: number }) => void): IDisposable;
}

export interface TerminalBackendOptions {
  /** Silence after which a key counts as released, in ms */
  keyReleaseDelay?: number;
  logger?: Pick<Console, 'warn'>;
}

export const DEFAULT_KEY_RELEASE_DELAY = 80;

// Escape sequences
const ENTER_ALT_BUFFER = '\x1b[?1049h';
const EXIT_ALT_BUFFER = '\x1b[?1049l';
const HIDE_CURSOR = '\x1b[?25l';
const SHOW_CURSOR = '\x1b[?25h';
const CLEAR = '\x1b[2J\x1b[H';
const RESET = '\x1b[0m';
const MOUSE_ON = '\x1b[?1003h\x1b[?1006h';
const MOUSE_OFF = '\x1b[?1006l\x1b[?1003l';
const SYNC_START = '\x1b[?2026h';
const SYNC_END = '\x1b[?2026l';
const CTRL_C = '\x03';

export interface KeyPress {
  code: number;
  character: string;
  modifiers: number;
}

export interface MouseReport {
  /** 0 left, 1 middle, 2 right, 3 none, 64/65 wheel up/down */
  button: number;
  /** 1-based terminal cell */
  col: number;
  row: number;
  motion: boolean;
  release: boolean;
}

/**
 * Split a chunk of raw input into one token per key or mouse report
 */
export function tokenizeInput(data: string): string[] {
  const tokens: string[] = [];
  const chars = [...data];
  let i = 0;

  while (i < chars.length) {
    const char = chars[i];
    if (char !== '\x1b') {
      tokens.push(char);
      i++;
      continue;
    }

    const next = chars[i + 1];
    if (next === '[') {
      // CSI: parameters, then one final byte
      let j = i + 2;
      while (j < chars.length && /[0-9;<?]/.test(chars[j])) j++;
      const end = Math.min(j + 1, chars.length);
      tokens.push(chars.slice(i, end).join(''));
      i = end;
    } else if (next === 'O' && i + 2 < chars.length) {
      tokens.push(chars.slice(i, i + 3).join(''));
      i += 3;
    } else if (next !== undefined && next !== '\x1b') {
      // Alt + key
      tokens.push(char + next);
      i += 2;
    } else {
      tokens.push(char);
      i++;
    }
  }

  return tokens;
}

const CSI_FINAL_KEYS: Record<string, string> = {
  A: 'ArrowUp',
  B: 'ArrowDown',
  C: 'ArrowRight',
  D: 'ArrowLeft',
  H: 'Home',
  F: 'End',
  P: 'F1',
  Q: 'F2',
  R: 'F3',
  S: 'F4',
};

const CSI_TILDE_KEYS: Record<string, string> = {
  '1': 'Home',
  '2': 'Insert',
  '3': 'Delete',
  '4': 'End',
  '5': 'PageUp',
  '6': 'PageDown',
  '7': 'Home',
  '8': 'End',
  '15': 'F5',
  '17': 'F6',
  '18': 'F7',
  '19': 'F8',
  '20': 'F9',
  '21': 'F10',
  '23': 'F11',
  '24': 'F12',
};

function named(name: string, modifiers = MOD_NONE): KeyPress | undefined {
  const code = KEY_CODES[name];
  if (code === undefined) return undefined;
  return { code, character: name === 'Space' ? ' ' : '', modifiers };
}

/**
 * xterm modifier parameter (1 + bits: 1 shift, 2 alt, 4 ctrl)
 */
function csiModifiers(param: string | undefined): number {
  const bits = Number(param ?? '1') - 1;
  if (!Number.isInteger(bits) || bits <= 0) return MOD_NONE;
  return (bits & 1 ? MOD_SHIFT : 0) | (bits & 2 ? MOD_ALT : 0) | (bits & 4 ? MOD_CTRL : 0);
}

/**
 * Decode a key token; undefined for sequences with no key
 */
export function parseKey(token: string): KeyPress | undefined {
  if (token === '\r' || token === '\n') return named('Enter');
  if (token === '\x1b') return named('Escape');
  if (token === ' ') return named('Space');
  if (token === '\x7f' || token === '\b') return named('Backspace');
  if (token === '\t') return named('Tab');

  const csi = /^\x1b\[([0-9;]*)([A-Za-z~])$/.exec(token);
  if (csi) {
    const params = csi[1].split(';');
    if (csi[2] === '~') {
      const name = CSI_TILDE_KEYS[params[0]];
      return name ? named(name, csiModifiers(params[1])) : undefined;
    }
    const name = CSI_FINAL_KEYS[csi[2]];
    return name ? named(name, csiModifiers(params[1])) : undefined;
  }

  const ss3 = /^\x1bO([A-Z])$/.exec(token);
  if (ss3) {
    const name = CSI_FINAL_KEYS[ss3[1]];
    return name ? named(name) : undefined;
  }

  if (token.length === 2 && token[0] === '\x1b') {
    const key = parseKey(token[1]);
    return key ? { ...key, modifiers: key.modifiers | MOD_ALT } : undefined;
  }

  const chars = [...token];
  if (chars.length !== 1) return undefined;
  const codePoint = token.codePointAt(0) ?? 0;

  // Ctrl + letter
  if (codePoint >= 1 && codePoint <= 26) {
    const letter = String.fromCharCode(codePoint + 96);
    return { code: characterKeyCode(letter), character: '', modifiers: MOD_CTRL };
  }
  if (codePoint < 32) return undefined;

  const shifted = token !== token.toLowerCase() && token === token.toUpperCase();
  return {
    code: characterKeyCode(token),
    character: token,
    modifiers: shifted ? MOD_SHIFT : MOD_NONE,
  };
}

/**
 * Decode an SGR mouse report (ESC [ < b ; col ; row M|m)
 */
export function parseMouse(token: string): MouseReport | undefined {
  const match = /^\x1b\[<(\d+);(\d+);(\d+)([Mm])$/.exec(token);
  if (!match) return undefined;
  const code = Number(match[1]);
  return {
    button: code & 0b11000011,
    col: Number(match[2]),
    row: Number(match[3]),
    motion: (code & 32) !== 0,
    release: match[4] === 'm',
  };
}

const MOUSE_BUTTONS: Record<number, number> = { 0: 1, 1: 2, 2: 3, 64: 4, 65: 5 };

function sgr(cell: Cell): string {
  let params = '0';
  if (cell.bold) params += ';1';
  if (cell.underline) params += ';4';
  if (cell.fg) params += `;38;2;${cell.fg[0]};${cell.fg[1]};${cell.fg[2]}`;
  if (cell.bg) params += `;48;2;${cell.bg[0]};${cell.bg[1]};${cell.bg[2]}`;
  return `\x1b[${params}m`;
}

function moveTo(col: number, row: number): string {
  return `\x1b[${row + 1};${col + 1}H`;
}

export class TerminalBackend implements DisplayBackend {
  private readonly terminal: TerminalLike;
  private readonly keyReleaseDelay: number;
  private readonly logger: Pick<Console, 'warn'>;
  private readonly events: BackendEvent[] = [];
  private readonly held = new Map<number, ReturnType<typeof setTimeout>>();
  private subscriptions: IDisposable[] = [];
  private isOpen = false;

  private size: Size = { width: 0, height: 0 };
  private flags = 0;
  private title = '';
  private background: Color = [0, 0, 0];
  private cells: Cell[][] = [];
  private needsClear = true;
  private pointer: Point = { x: 0, y: 0 };

  constructor(terminal: TerminalLike, options: TerminalBackendOptions = {}) {
    this.terminal = terminal;
    this.keyReleaseDelay = options.keyReleaseDelay ?? DEFAULT_KEY_RELEASE_DELAY;
    this.logger = options.logger ?? console;
  }

  /**
   * Take over the terminal: alternate buffer, hidden cursor, mouse reporting
   */
  open(): void {
    if (this.isOpen) {
      this.logger.warn('[Terminal] Already open');
      return;
    }
    this.isOpen = true;
    this.terminal.write(ENTER_ALT_BUFFER + HIDE_CURSOR + CLEAR + MOUSE_ON);
    this.subscriptions = [
      this.terminal.onData(data => this.handleData(data)),
      this.terminal.onResize(size => this.handleResize(size)),
    ];
  }

  /**
   * Give the terminal back in the state open() found it
   */
  close(): void {
    if (!this.isOpen) return;
    this.isOpen = false;
    for (const subscription of this.subscriptions) subscription.dispose();
    this.subscriptions = [];
    for (const timer of this.held.values()) clearTimeout(timer);
    this.held.clear();
    this.terminal.write(MOUSE_OFF + RESET + SHOW_CURSOR + EXIT_ALT_BUFFER);
  }

  info(): DisplayInfo {
    return { displaySize: { width: this.terminal.cols, height: this.terminal.rows } };
  }

  setMode(size: Size, flags: number): void {
    if (size.width <= 0 || size.height <= 0) {
      throw new DisplayError(`Cannot set display mode ${size.width}x${size.height}`);
    }
    const framed = this.isFramed(flags);
    const needed = { width: size.width + (framed ? 2 : 0), height: size.height + (framed ? 2 : 0) };
    if (needed.width > this.terminal.cols || needed.height > this.terminal.rows) {
      throw new DisplayError(
        `Display mode ${size.width}x${size.height} does not fit a ${this.terminal.cols}x${this.terminal.rows} terminal`
      );
    }

    this.size = { ...size };
    this.flags = flags;
    this.cells = this.blankRows(this.background);
    this.needsClear = true;
  }

  setTitle(title: string): void {
    this.title = title;
    this.terminal.write(`\x1b]0;${title}\x07`);
  }

  fill(color: Color): void {
    this.background = color;
    this.cells = this.blankRows(color);
  }

  /**
   * Copy an image into the window, clipped to its bounds. Cells without a
   * background keep the one already underneath.
   */
  blit(image: Image, at: Point): Rect {
    const left = Math.max(0, at.x);
    const top = Math.max(0, at.y);
    const right = Math.min(this.size.width, at.x + image.width);
    const bottom = Math.min(this.size.height, at.y + image.height);

    for (let y = top; y < bottom; y++) {
      const row = this.cells[y];
      const source = image.cells[y - at.y];
      if (!row || !source) continue;
      for (let x = left; x < right; x++) {
        const cell = source[x - at.x];
        const under = row[x];
        if (!cell || !under) continue;
        row[x] = { ...cell, bg: cell.bg ?? under.bg };
      }
    }

    return {
      x: left,
      y: top,
      width: Math.max(0, right - left),
      height: Math.max(0, bottom - top),
    };
  }

  present(): void {
    const origin = this.origin();
    let out = this.flags & SCREEN_FLAGS.DOUBLEBUF ? SYNC_START : '';

    if (this.needsClear) {
      out += RESET + CLEAR;
      this.needsClear = false;
    }
    if (this.isFramed(this.flags)) {
      out += this.renderFrame(origin);
    }

    for (let y = 0; y < this.cells.length; y++) {
      const row = origin.y + y;
      if (row < 0 || row >= this.terminal.rows) continue;
      out += moveTo(Math.max(0, origin.x), row);
      let style = '';
      for (let x = 0; x < this.cells[y].length; x++) {
        if (origin.x + x < 0 || origin.x + x >= this.terminal.cols) continue;
        const cell = this.cells[y][x];
        const next = sgr(cell);
        if (next !== style) {
          out += next;
          style = next;
        }
        out += cell.char;
      }
    }

    out += RESET;
    if (this.flags & SCREEN_FLAGS.DOUBLEBUF) out += SYNC_END;
    this.terminal.write(out);
  }

  poll(): BackendEvent[] {
    return this.events.splice(0, this.events.length);
  }

  renderText(message: string, font: Font, color: Color, background: Color | null): Image {
    return rasterizeText(message, font, color, background);
  }

  setCursorVisible(visible: boolean): void {
    this.terminal.write(visible ? SHOW_CURSOR : HIDE_CURSOR);
  }

  warpCursor(pos: Point): void {
    this.movePointer({ ...pos });
  }

  joystickName(): string | undefined {
    return undefined;
  }

  private isFramed(flags: number): boolean {
    return (flags & (SCREEN_FLAGS.NOFRAME | SCREEN_FLAGS.FULLSCREEN)) === 0;
  }

  /**
   * Terminal cell of the window's top-left corner
   */
  private origin(): Point {
    if (this.flags & SCREEN_FLAGS.FULLSCREEN) return { x: 0, y: 0 };
    return {
      x: Math.floor((this.terminal.cols - this.size.width) / 2),
      y: Math.floor((this.terminal.rows - this.size.height) / 2),
    };
  }

  private blankRows(bg: Color): Cell[][] {
    const rows: Cell[][] = [];
    for (let y = 0; y < this.size.height; y++) {
      const row: Cell[] = [];
      for (let x = 0; x < this.size.width; x++) {
        row.push({ char: ' ', fg: null, bg, bold: false, underline: false });
      }
      rows.push(row);
    }
    return rows;
  }

  private renderFrame(origin: Point): string {
    const inner = this.size.width;
    const label = this.title ? ` ${this.title} ` : '';
    const shown = [...label].slice(0, inner).join('');
    const before = Math.floor((inner - [...shown].length) / 2);
    const top = '┌' + '─'.repeat(before) + shown + '─'.repeat(inner - before - [...shown].length) + '┐';

    let out = RESET + moveTo(origin.x - 1, origin.y - 1) + top;
    for (let y = 0; y < this.size.height; y++) {
      out += moveTo(origin.x - 1, origin.y + y) + '│';
      out += moveTo(origin.x + inner, origin.y + y) + '│';
    }
    out += moveTo(origin.x - 1, origin.y + this.size.height) + '└' + '─'.repeat(inner) + '┘';
    return out;
  }

  private handleData(data: string): void {
    for (const token of tokenizeInput(data)) {
      if (token === CTRL_C) {
        this.events.push({ type: 'quit' });
        continue;
      }

      const mouse = parseMouse(token);
      if (mouse) {
        this.handleMouse(mouse);
        continue;
      }

      const key = parseKey(token);
      if (key) this.handleKey(key);
    }
  }

  private handleKey(key: KeyPress): void {
    const pending = this.held.get(key.code);
    if (pending !== undefined) {
      // Still held: the terminal is auto-repeating
      clearTimeout(pending);
    } else {
      this.events.push({ type: 'keyDown', ...key });
    }

    this.held.set(key.code, setTimeout(() => {
      this.held.delete(key.code);
      this.events.push({ type: 'keyUp', code: key.code, modifiers: key.modifiers });
    }, this.keyReleaseDelay));
  }

  private handleMouse(report: MouseReport): void {
    const origin = this.origin();
    this.movePointer({ x: report.col - 1 - origin.x, y: report.row - 1 - origin.y });
    if (report.motion) return;

    const button = MOUSE_BUTTONS[report.button];
    if (button === undefined) return;

    if (report.button >= 64) {
      // Wheel notches have no release
      this.events.push({ type: 'mouseButtonDown', button });
      this.events.push({ type: 'mouseButtonUp', button });
    } else {
      this.events.push({ type: report.release ? 'mouseButtonUp' : 'mouseButtonDown', button });
    }
  }

  private movePointer(pos: Point): void {
    const previous = this.pointer;
    if (previous.x === pos.x && previous.y === pos.y) return;
    this.pointer = pos;
    this.events.push({
      type: 'mouseMotion',
      pos,
      rel: { x: pos.x - previous.x, y: pos.y - previous.y },
    });
  }

  private handleResize(size: { cols: number; rows: number }): void {
    this.needsClear = true;
    if (this.flags & SCREEN_FLAGS.FULLSCREEN) {
      this.events.push({ type: 'windowResize', size: { width: size.cols, height: size.rows } });
    } else if (this.flags & SCREEN_FLAGS.RESIZABLE) {
      const border = this.isFramed(this.flags) ? 2 : 0;
      this.events.push({
        type: 'windowResize',
        size: { width: size.cols - border, height: size.rows - border },
      });
    }
  }
}
