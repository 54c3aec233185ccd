/**
 * Mouse state tracker
 *
 * Buttons: 1 left, 2 middle, 3 right, 4/5 wheel up/down.
 */

import type { BackendEvent, DisplayBackend, Point, Rect } from '../backend/types';
import { containsPoint } from '../sprites/rect';
import {
  createButtonChannel,
  type ButtonState,
  type InputChannel,
  type PushState,
  type TimeSource,
} from './channel';

export const BUTTON_LEFT = 1;
export const BUTTON_MIDDLE = 2;
export const BUTTON_RIGHT = 3;
export const BUTTON_WHEEL_UP = 4;
export const BUTTON_WHEEL_DOWN = 5;

export class Mouse {
  private _pos: Point = { x: 0, y: 0 };
  private _rel: Point = { x: 0, y: 0 };
  private readonly buttons: InputChannel<number, ButtonState>;

  constructor(
    private readonly backend: Pick<DisplayBackend, 'setCursorVisible' | 'warpCursor'>,
    now?: TimeSource
  ) {
    this.buttons = createButtonChannel<number>(now);
  }

  /**
   * Apply one batch of events; relative motion only covers this batch
   */
  update(events: readonly BackendEvent[] = []): void {
    this._rel = { x: 0, y: 0 };
    for (const event of events) {
      if (event.type === 'mouseButtonDown') {
        this.buttons.press(event.button, 'down');
      } else if (event.type === 'mouseButtonUp') {
        this.buttons.set(event.button, 'up');
      } else if (event.type === 'mouseMotion') {
        this._pos = { ...event.pos };
        this._rel = { x: this._rel.x + event.rel.x, y: this._rel.y + event.rel.y };
      }
    }
  }

  get pos(): Point {
    return this._pos;
  }

  get x(): number {
    return this._pos.x;
  }

  get y(): number {
    return this._pos.y;
  }

  get rel(): Point {
    return this._rel;
  }

  get xrel(): number {
    return this._rel.x;
  }

  get yrel(): number {
    return this._rel.y;
  }

  move(): boolean {
    return this._rel.x !== 0 || this._rel.y !== 0;
  }

  /**
   * Know if a button is pushed, depending on the repeat delay in seconds
   */
  push(button: number, delay = 0): PushState {
    return this.buttons.push(button, delay);
  }

  inside(area: Rect): boolean {
    return containsPoint(area, this._pos);
  }

  setVisible(visible = true): void {
    this.backend.setCursorVisible(visible);
  }

  setPos(pos: Point): void {
    this.backend.warpCursor(pos);
  }
}
