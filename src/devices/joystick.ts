/**
 * Joystick state tracker
 *
 * One tracker per joystick id; events for other ids are ignored.
 * Axes count as pushed outside the ±0.1 dead zone, hats outside (0, 0).
 */

import type { BackendEvent, DisplayBackend, HatValue, Point } from '../backend/types';
import {
  createAxisChannel,
  createButtonChannel,
  createHatChannel,
  type ButtonState,
  type InputChannel,
  type PushState,
  type TimeSource,
} from './channel';

export const JOYSTICK_NOT_DETECTED = 'Joystick not detected';

export class Joystick {
  private readonly buttons: InputChannel<number, ButtonState>;
  private readonly axes: InputChannel<number, number>;
  private readonly hats: InputChannel<number, HatValue>;
  private readonly balls = new Map<number, Point>();
  private readonly _name: string;

  constructor(
    private readonly _id: number,
    backend: Pick<DisplayBackend, 'joystickName'>,
    now?: TimeSource
  ) {
    this.buttons = createButtonChannel<number>(now);
    this.axes = createAxisChannel<number>(now);
    this.hats = createHatChannel<number>(now);
    this._name = backend.joystickName(_id) ?? JOYSTICK_NOT_DETECTED;
  }

  update(events: readonly BackendEvent[] = []): void {
    for (const event of events) {
      switch (event.type) {
        case 'joyButtonDown':
          if (event.joy === this._id) this.buttons.press(event.button, 'down');
          break;
        case 'joyButtonUp':
          if (event.joy === this._id) this.buttons.set(event.button, 'up');
          break;
        case 'joyAxisMotion':
          // Any movement re-arms the axis, including a return to centre
          if (event.joy === this._id) this.axes.press(event.axis, event.value);
          break;
        case 'joyHatMotion':
          if (event.joy === this._id) this.hats.press(event.hat, event.value);
          break;
        case 'joyBallMotion':
          if (event.joy === this._id) this.balls.set(event.ball, { ...event.rel });
          break;
        default:
          break;
      }
    }
  }

  get id(): number {
    return this._id;
  }

  get name(): string {
    return this._name;
  }

  pushButton(button: number, delay = 0): PushState {
    return this.buttons.push(button, delay);
  }

  pushAxis(axis: number, delay = 0): PushState {
    return this.axes.push(axis, delay);
  }

  getAxis(axis: number): number | undefined {
    return this.axes.value(axis);
  }

  pushHat(hat: number, delay = 0): PushState {
    return this.hats.push(hat, delay);
  }

  getHat(hat: number): HatValue | undefined {
    return this.hats.value(hat);
  }

  /**
   * Last relative motion reported by a trackball
   */
  getBall(ball: number): Point | undefined {
    return this.balls.get(ball);
  }
}
