/**
 * Screen
 *
 * Presentation context: window size, background colour, title and mode
 * flags. Changing any of them resets the display mode on the backend.
 */

import type { BackendEvent, Color, DisplayBackend, Image, Point, Rect, Size } from '../backend/types';
import { sizesEqual } from '../sprites/rect';

export const SCREEN_FLAGS = {
  FULLSCREEN: 1 << 0,
  DOUBLEBUF: 1 << 1,
  HWSURFACE: 1 << 2,
  OPENGL: 1 << 3,
  RESIZABLE: 1 << 4,
  NOFRAME: 1 << 5,
} as const;

export type ScreenFlag = keyof typeof SCREEN_FLAGS;

export const SCREEN_FLAG_NAMES: readonly ScreenFlag[] = [
  'FULLSCREEN',
  'DOUBLEBUF',
  'HWSURFACE',
  'OPENGL',
  'RESIZABLE',
  'NOFRAME',
];

export function isScreenFlag(value: string): value is ScreenFlag {
  return Object.prototype.hasOwnProperty.call(SCREEN_FLAGS, value);
}

/**
 * Bitmask of a set of flags
 */
export function screenFlagMask(flags: Iterable<ScreenFlag>): number {
  let mask = 0;
  for (const flag of flags) mask |= SCREEN_FLAGS[flag];
  return mask;
}

export interface ScreenConfig {
  size: Size;
  color: Color;
  title: string;
  flags: readonly ScreenFlag[];
}

export const DEFAULT_SCREEN_CONFIG: ScreenConfig = {
  size: { width: 80, height: 24 },
  color: [255, 255, 255],
  title: 'menukit',
  flags: [],
};

export class Screen {
  /** Cleared by a quit event; loops stop at their next iteration */
  running = true;

  private readonly backend: DisplayBackend;
  private windowedSize: Size;
  /** Size passed to the backend by the last mode change */
  private modeSize: Size;
  private _color: Color;
  private _title: string;
  private readonly enabled: Set<ScreenFlag>;

  constructor(backend: DisplayBackend, config: Partial<ScreenConfig> = {}) {
    const resolved = { ...DEFAULT_SCREEN_CONFIG, ...config };
    this.backend = backend;
    this.windowedSize = { ...resolved.size };
    this.modeSize = this.windowedSize;
    this._color = resolved.color;
    this._title = resolved.title;
    this.enabled = new Set(resolved.flags);
    this.resetScreen();
  }

  /**
   * Reapply mode, background colour and title
   */
  resetScreen(): void {
    this.modeSize = { ...this.size };
    this.backend.setMode(this.modeSize, this.flags);
    this.resetColor();
    this.resetTitle();
  }

  resetColor(): void {
    this.backend.fill(this._color);
  }

  resetTitle(): void {
    this.backend.setTitle(this._title);
  }

  update(events: readonly BackendEvent[] = []): void {
    for (const event of events) {
      if (event.type === 'quit') {
        this.running = false;
      } else if (event.type === 'windowResize') {
        if (sizesEqual(event.size, this.modeSize)) continue;
        if (this.fullscreen) {
          // The display itself changed size
          this.resetScreen();
        } else {
          this.size = event.size;
        }
      }
    }
  }

  blit(image: Image, destination: Point): Rect {
    return this.backend.blit(image, destination);
  }

  /**
   * Show everything drawn since the last presentation
   */
  present(): void {
    this.backend.present();
  }

  get width(): number {
    return this.size.width;
  }

  set width(value: number) {
    this.windowedSize = { width: value, height: this.windowedSize.height };
    this.resetScreen();
  }

  get height(): number {
    return this.size.height;
  }

  set height(value: number) {
    this.windowedSize = { width: this.windowedSize.width, height: value };
    this.resetScreen();
  }

  get size(): Size {
    return this.fullscreen ? this.fullscreenSize : this.windowedSize;
  }

  set size(value: Size) {
    this.windowedSize = { ...value };
    this.resetScreen();
  }

  get fullscreenSize(): Size {
    return this.backend.info().displaySize;
  }

  get area(): Rect {
    return { x: 0, y: 0, ...this.size };
  }

  get color(): Color {
    return this._color;
  }

  set color(value: Color) {
    this._color = value;
    this.resetColor();
  }

  get title(): string {
    return this._title;
  }

  set title(value: string) {
    this._title = value;
    this.resetTitle();
  }

  get flags(): number {
    return screenFlagMask(this.enabled);
  }

  hasFlag(flag: ScreenFlag): boolean {
    return this.enabled.has(flag);
  }

  setFlag(flag: ScreenFlag, value: boolean): void {
    if (value) {
      this.enabled.add(flag);
    } else {
      this.enabled.delete(flag);
    }
    this.resetScreen();
  }

  get fullscreen(): boolean {
    return this.hasFlag('FULLSCREEN');
  }

  set fullscreen(value: boolean) {
    this.setFlag('FULLSCREEN', value);
  }

  get doublebuf(): boolean {
    return this.hasFlag('DOUBLEBUF');
  }

  set doublebuf(value: boolean) {
    this.setFlag('DOUBLEBUF', value);
  }

  get hwsurface(): boolean {
    return this.hasFlag('HWSURFACE');
  }

  set hwsurface(value: boolean) {
    this.setFlag('HWSURFACE', value);
  }

  get opengl(): boolean {
    return this.hasFlag('OPENGL');
  }

  set opengl(value: boolean) {
    this.setFlag('OPENGL', value);
  }

  get resizable(): boolean {
    return this.hasFlag('RESIZABLE');
  }

  set resizable(value: boolean) {
    this.setFlag('RESIZABLE', value);
  }

  get noframe(): boolean {
    return this.hasFlag('NOFRAME');
  }

  set noframe(value: boolean) {
    this.setFlag('NOFRAME', value);
  }
}
