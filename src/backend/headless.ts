/**
 * Headless backend
 *
 * Runs the toolkit without a terminal. Input comes from scripted event
 * batches; output is recorded so callers can inspect what was drawn.
 */

import { DisplayError } from '../errors';
import { rasterizeText } from './raster';
import type {
  BackendEvent,
  Color,
  DisplayBackend,
  DisplayInfo,
  Font,
  Image,
  Point,
  Rect,
  Size,
} from './types';

export interface BlitRecord {
  image: Image;
  at: Point;
}

/**
 * Everything drawn between two presentations
 */
export interface FrameRecord {
  fill: Color | null;
  blits: BlitRecord[];
}

export interface HeadlessOptions {
  displaySize?: Size;
  /** Names of the joysticks to report as connected, by id */
  joysticks?: ReadonlyMap<number, string>;
}

export class HeadlessBackend implements DisplayBackend {
  readonly frames: FrameRecord[] = [];
  mode: { size: Size; flags: number } | null = null;
  title = '';
  fillColor: Color | null = null;
  cursorVisible = true;
  closed = false;

  private readonly displaySize: Size;
  private readonly joysticks: ReadonlyMap<number, string>;
  private readonly batches: BackendEvent[][] = [];
  private pending: FrameRecord = { fill: null, blits: [] };

  constructor(options: HeadlessOptions = {}) {
    this.displaySize = { ...(options.displaySize ?? { width: 80, height: 24 }) };
    this.joysticks = options.joysticks ?? new Map();
  }

  /**
   * Script the batch returned by a later poll(); batches come back in order
   */
  queue(...batches: BackendEvent[][]): void {
    for (const batch of batches) this.batches.push([...batch]);
  }

  get pendingBatches(): number {
    return this.batches.length;
  }

  info(): DisplayInfo {
    return { displaySize: { ...this.displaySize } };
  }

  setMode(size: Size, flags: number): void {
    if (size.width <= 0 || size.height <= 0) {
      throw new DisplayError(`Cannot set display mode ${size.width}x${size.height}`);
    }
    this.mode = { size: { ...size }, flags };
  }

  setTitle(title: string): void {
    this.title = title;
  }

  fill(color: Color): void {
    this.fillColor = color;
    this.pending = { fill: color, blits: [] };
  }

  blit(image: Image, at: Point): Rect {
    this.pending.blits.push({ image, at: { ...at } });
    return { x: at.x, y: at.y, width: image.width, height: image.height };
  }

  present(): void {
    this.frames.push(this.pending);
    this.pending = { fill: null, blits: [] };
  }

  poll(): BackendEvent[] {
    return this.batches.shift() ?? [];
  }

  renderText(message: string, font: Font, color: Color, background: Color | null): Image {
    return rasterizeText(message, font, color, background);
  }

  setCursorVisible(visible: boolean): void {
    this.cursorVisible = visible;
  }

  /**
   * Appended to the next scripted batch, or queued as its own batch
   */
  warpCursor(pos: Point): void {
    const motion: BackendEvent = { type: 'mouseMotion', pos: { ...pos }, rel: { x: 0, y: 0 } };
    const next = this.batches[0];
    if (next) {
      next.push(motion);
    } else {
      this.batches.push([motion]);
    }
  }

  joystickName(id: number): string | undefined {
    return this.joysticks.get(id);
  }

  close(): void {
    this.closed = true;
  }

  get lastFrame(): FrameRecord | undefined {
    return this.frames[this.frames.length - 1];
  }
}
