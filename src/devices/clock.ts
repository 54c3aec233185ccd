/**
 * Frame clock
 *
 * tick() caps a loop at a frame rate by sleeping off the rest of the
 * frame. The sleep is short and cannot be interrupted; loops re-check
 * their running flags after it.
 */

import { systemTime, type TimeSource } from './channel';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

const FPS_SAMPLES = 10;

export interface ClockOptions {
  now?: TimeSource;
  sleep?: Sleep;
}

export class Clock {
  private readonly source: TimeSource;
  private readonly wait: Sleep;
  private last: number | null = null;
  private _time = 0;
  private samples: number[] = [];

  constructor(options: ClockOptions = {}) {
    this.source = options.now ?? systemTime;
    this.wait = options.sleep ?? sleep;
  }

  /**
   * Current time in seconds, from the same source as the input trackers
   */
  now(): number {
    return this.source();
  }

  /**
   * Wait out the remainder of the frame and return the milliseconds
   * since the previous tick (0 on the first call). Every tick yields to
   * the event loop at least once, so input and timers get a turn even
   * without a framerate or after an overrun frame.
   */
  async tick(framerate = 0): Promise<number> {
    let remaining = 0;
    if (framerate > 0 && this.last !== null) {
      const elapsed = this.source() * 1000 - this.last;
      remaining = Math.max(0, 1000 / framerate - elapsed);
    }
    await this.wait(remaining);

    const now = this.source() * 1000;
    this._time = this.last === null ? 0 : now - this.last;
    this.last = now;

    if (this._time > 0) {
      this.samples.push(this._time);
      if (this.samples.length > FPS_SAMPLES) this.samples.shift();
    }
    return this._time;
  }

  /**
   * Milliseconds measured by the last tick
   */
  get time(): number {
    return this._time;
  }

  /**
   * Average frame rate over the last few ticks
   */
  get fps(): number {
    if (this.samples.length === 0) return 0;
    const average = this.samples.reduce((sum, ms) => sum + ms, 0) / this.samples.length;
    return 1000 / average;
  }
}
