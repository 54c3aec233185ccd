/**
 * Input channel
 *
 * Edge and repeat tracking for one family of inputs (keys, buttons, axes,
 * hats). Each identifier remembers its current value, whether the press
 * has been reported yet, and when it last reported true.
 */

/**
 * Seconds since an arbitrary origin
 */
export type TimeSource = () => number;

export const systemTime: TimeSource = () => Date.now() / 1000;

/**
 * Result of an edge query: undefined when the identifier was never
 * observed, otherwise whether it counts as pushed right now.
 */
export type PushState = boolean | undefined;

/**
 * Delay that never elapses: fires once per press
 */
export const NO_REPEAT = Number.POSITIVE_INFINITY;

export type ButtonState = 'down' | 'up';

interface ChannelEntry<Value> {
  value: Value;
  first: boolean;
  lastActionTime: number;
}

export class InputChannel<Id, Value> {
  private readonly entries = new Map<Id, ChannelEntry<Value>>();

  constructor(
    private readonly isActive: (value: Value) => boolean,
    private readonly now: TimeSource = systemTime
  ) {}

  /**
   * Record a fresh press: the next push() reports true whatever the delay
   */
  press(id: Id, value: Value): void {
    const entry = this.entries.get(id);
    if (entry) {
      entry.value = value;
      entry.first = true;
    } else {
      this.entries.set(id, { value, first: true, lastActionTime: 0 });
    }
  }

  /**
   * Update the value without arming a press (releases)
   */
  set(id: Id, value: Value): void {
    const entry = this.entries.get(id);
    if (entry) {
      entry.value = value;
    } else {
      this.entries.set(id, { value, first: false, lastActionTime: 0 });
    }
  }

  has(id: Id): boolean {
    return this.entries.has(id);
  }

  value(id: Id): Value | undefined {
    return this.entries.get(id)?.value;
  }

  /**
   * True once per press, then again every `delay` seconds while active.
   */
  push(id: Id, delay = 0): PushState {
    const entry = this.entries.get(id);
    if (!entry) return undefined;

    if (entry.first) {
      entry.first = false;
      entry.lastActionTime = this.now();
      return true;
    }
    if (!this.isActive(entry.value)) return false;

    const now = this.now();
    if (now - entry.lastActionTime >= delay) {
      entry.lastActionTime = now;
      return true;
    }
    return false;
  }
}

// ============================================================================
// Channel kinds
// ============================================================================

export const AXIS_DEAD_ZONE = 0.1;

export function createButtonChannel<Id>(now?: TimeSource): InputChannel<Id, ButtonState> {
  return new InputChannel<Id, ButtonState>(state => state === 'down', now);
}

export function createAxisChannel<Id>(now?: TimeSource): InputChannel<Id, number> {
  return new InputChannel<Id, number>(value => Math.abs(value) > AXIS_DEAD_ZONE, now);
}

export function createHatChannel<Id>(
  now?: TimeSource
): InputChannel<Id, readonly [number, number]> {
  return new InputChannel<Id, readonly [number, number]>(
    ([x, y]) => x !== 0 || y !== 0,
    now
  );
}
