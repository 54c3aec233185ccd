/**
 * Device context
 *
 * One screen, keyboard, mouse and clock per application, created once at
 * startup and handed to every menu and option that needs them.
 * Joysticks are created on first use.
 */

import type { BackendEvent, DisplayBackend } from '../backend/types';
import { Clock, type Sleep } from './clock';
import { systemTime, type TimeSource } from './channel';
import { Joystick } from './joystick';
import { Keyboard } from './keyboard';
import { Mouse } from './mouse';
import { Screen, type ScreenConfig } from './screen';

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export interface ContextOptions {
  screen?: Partial<ScreenConfig>;
  logger?: Logger;
  /** Seconds; shared by the clock and every input tracker */
  now?: TimeSource;
  sleep?: Sleep;
}

export interface Context {
  readonly backend: DisplayBackend;
  readonly screen: Screen;
  readonly keyboard: Keyboard;
  readonly mouse: Mouse;
  readonly clock: Clock;
  readonly logger: Logger;
  joystick(id: number): Joystick;
  /** Feed one batch of backend events to every tracker */
  update(events: readonly BackendEvent[]): void;
  /** Poll the backend once and feed the batch to every tracker */
  poll(): BackendEvent[];
}

export function createContext(backend: DisplayBackend, options: ContextOptions = {}): Context {
  const now = options.now ?? systemTime;
  const screen = new Screen(backend, options.screen);
  const keyboard = new Keyboard(now);
  const mouse = new Mouse(backend, now);
  const clock = new Clock({ now, sleep: options.sleep });
  const joysticks = new Map<number, Joystick>();

  const context: Context = {
    backend,
    screen,
    keyboard,
    mouse,
    clock,
    logger: options.logger ?? console,
    joystick(id: number): Joystick {
      let joystick = joysticks.get(id);
      if (!joystick) {
        joystick = new Joystick(id, backend, now);
        joysticks.set(id, joystick);
      }
      return joystick;
    },
    update(events: readonly BackendEvent[]): void {
      screen.update(events);
      keyboard.update(events);
      mouse.update(events);
      for (const joystick of joysticks.values()) {
        joystick.update(events);
      }
    },
    poll(): BackendEvent[] {
      const events = backend.poll();
      context.update(events);
      return events;
    },
  };

  return context;
}
