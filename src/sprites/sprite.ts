/**
 * Sprites
 *
 * A sprite owns a position and a cached image. Any change that affects
 * the image drops the cache; the image (and so the area) is rebuilt the
 * next time it is read.
 */

import type { Color, Font, Image, Point, Rect, Size, TextRenderer } from '../backend/types';
import { fillImage, PLAIN_FONT } from '../backend/raster';

export interface BlitTarget {
  blit(image: Image, destination: Point): Rect;
}

export abstract class Sprite {
  private cached: Image | null = null;
  private _pos: Point;

  constructor(pos: Point = { x: 0, y: 0 }) {
    this._pos = { ...pos };
  }

  protected abstract renderImage(): Image;

  /**
   * Drop the cached image; it is rebuilt before the next draw
   */
  invalidate(): void {
    this.cached = null;
  }

  blitOn(target: BlitTarget): Rect {
    return target.blit(this.image, this._pos);
  }

  get image(): Image {
    if (this.cached === null) {
      this.cached = this.renderImage();
    }
    return this.cached;
  }

  get area(): Rect {
    const image = this.image;
    return { x: this._pos.x, y: this._pos.y, width: image.width, height: image.height };
  }

  get x(): number {
    return this._pos.x;
  }

  set x(value: number) {
    this._pos = { x: value, y: this._pos.y };
  }

  get y(): number {
    return this._pos.y;
  }

  set y(value: number) {
    this._pos = { x: this._pos.x, y: value };
  }

  get pos(): Point {
    return this._pos;
  }

  set pos(value: Point) {
    this._pos = { ...value };
  }

  get width(): number {
    return this.image.width;
  }

  get height(): number {
    return this.image.height;
  }

  get size(): Size {
    return { width: this.image.width, height: this.image.height };
  }
}

export interface SurfaceOptions {
  pos?: Point;
  size?: Size;
  color?: Color;
}

/**
 * Solid rectangle
 */
export class Surface extends Sprite {
  private _surfaceSize: Size;
  private _color: Color;

  constructor(options: SurfaceOptions = {}) {
    super(options.pos);
    this._surfaceSize = { ...(options.size ?? { width: 5, height: 3 }) };
    this._color = options.color ?? [0, 0, 0];
  }

  protected renderImage(): Image {
    return fillImage(this._surfaceSize, this._color);
  }

  get size(): Size {
    return super.size;
  }

  set size(value: Size) {
    this._surfaceSize = { ...value };
    this.invalidate();
  }

  get color(): Color {
    return this._color;
  }

  set color(value: Color) {
    this._color = value;
    this.invalidate();
  }
}

export interface TextOptions {
  pos?: Point;
  font?: Font;
  message?: string;
  messageColor?: Color;
  backgroundColor?: Color | null;
}

/**
 * Rasterized text; the backend renders it
 */
export class Text extends Sprite {
  private _font: Font;
  private _message: string;
  private _messageColor: Color;
  private _backgroundColor: Color | null;

  constructor(
    private readonly renderer: TextRenderer,
    options: TextOptions = {}
  ) {
    super(options.pos);
    this._font = { ...(options.font ?? PLAIN_FONT) };
    this._message = options.message ?? 'TEXT';
    this._messageColor = options.messageColor ?? [0, 0, 0];
    this._backgroundColor = options.backgroundColor ?? null;
  }

  protected renderImage(): Image {
    return this.renderer.renderText(this._message, this._font, this._messageColor, this._backgroundColor);
  }

  get font(): Font {
    return this._font;
  }

  set font(value: Font) {
    this._font = { ...value };
    this.invalidate();
  }

  get message(): string {
    return this._message;
  }

  set message(value: string) {
    this._message = value;
    this.invalidate();
  }

  get messageColor(): Color {
    return this._messageColor;
  }

  set messageColor(value: Color) {
    this._messageColor = value;
    this.invalidate();
  }

  get backgroundColor(): Color | null {
    return this._backgroundColor;
  }

  set backgroundColor(value: Color | null) {
    this._backgroundColor = value;
    this.invalidate();
  }
}
