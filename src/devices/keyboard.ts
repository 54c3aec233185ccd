/**
 * Keyboard state tracker
 *
 * Keys are tracked by code only. Characters and key names resolve to the
 * code that produced them, so a press answers to all three at once.
 */

import type { BackendEvent } from '../backend/types';
import { keyCode } from '../backend/keys';
import {
  createButtonChannel,
  type ButtonState,
  type InputChannel,
  type PushState,
  type TimeSource,
} from './channel';

export class Keyboard {
  private readonly keys: InputChannel<number, ButtonState>;
  /** Last code seen producing each character */
  private readonly characters = new Map<string, number>();

  constructor(now?: TimeSource) {
    this.keys = createButtonChannel<number>(now);
  }

  update(events: readonly BackendEvent[] = []): void {
    for (const event of events) {
      if (event.type === 'keyDown') {
        this.keys.press(event.code, 'down');
        if (event.character !== '') {
          this.characters.set(event.character, event.code);
        }
      } else if (event.type === 'keyUp') {
        this.keys.set(event.code, 'up');
      }
    }
  }

  /**
   * Know if a key is pushed, depending on the repeat delay in seconds
   */
  push(code: number, delay = 0): PushState {
    return this.keys.push(code, delay);
  }

  /**
   * Same as push(), addressed by the character the key produced
   */
  pushChar(character: string, delay = 0): PushState {
    const code = this.characters.get(character);
    if (code === undefined) return undefined;
    return this.keys.push(code, delay);
  }

  /**
   * Same as push(), addressed by key name ('Enter', 'ArrowUp', 'q')
   */
  pushName(name: string, delay = 0): PushState {
    const code = keyCode(name);
    if (code === undefined) return undefined;
    return this.keys.push(code, delay);
  }

  /**
   * Current held state; undefined for keys never seen
   */
  isDown(code: number): boolean | undefined {
    const state = this.keys.value(code);
    return state === undefined ? undefined : state === 'down';
  }
}
