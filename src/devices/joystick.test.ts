import { describe, it, expect } from 'vitest';
import { HeadlessBackend } from '../backend/headless';
import { NO_REPEAT } from './channel';
import { Joystick, JOYSTICK_NOT_DETECTED } from './joystick';

describe('Joystick', () => {
  it('takes its name from the backend', () => {
    const backend = new HeadlessBackend({ joysticks: new Map([[0, 'Gamepad']]) });
    expect(new Joystick(0, backend).name).toBe('Gamepad');
    expect(new Joystick(1, backend).name).toBe(JOYSTICK_NOT_DETECTED);
    expect(new Joystick(1, backend).id).toBe(1);
  });

  it('ignores events for other joysticks', () => {
    const joystick = new Joystick(0, new HeadlessBackend(), () => 0);
    joystick.update([
      { type: 'joyButtonDown', joy: 1, button: 0 },
      { type: 'joyAxisMotion', joy: 1, axis: 0, value: 1 },
    ]);
    expect(joystick.pushButton(0)).toBeUndefined();
    expect(joystick.getAxis(0)).toBeUndefined();
  });

  it('tracks buttons', () => {
    const joystick = new Joystick(0, new HeadlessBackend(), () => 0);
    joystick.update([{ type: 'joyButtonDown', joy: 0, button: 2 }]);
    expect(joystick.pushButton(2, NO_REPEAT)).toBe(true);
    expect(joystick.pushButton(2, NO_REPEAT)).toBe(false);
    joystick.update([{ type: 'joyButtonUp', joy: 0, button: 2 }]);
    expect(joystick.pushButton(2)).toBe(false);
  });

  it('treats small axis values as idle', () => {
    let t = 0;
    const joystick = new Joystick(0, new HeadlessBackend(), () => t);
    joystick.update([{ type: 'joyAxisMotion', joy: 0, axis: 1, value: 0.8 }]);
    expect(joystick.pushAxis(1, 0.5)).toBe(true);
    t = 0.5;
    expect(joystick.pushAxis(1, 0.5)).toBe(true);

    joystick.update([{ type: 'joyAxisMotion', joy: 0, axis: 1, value: 0.05 }]);
    expect(joystick.getAxis(1)).toBe(0.05);
    expect(joystick.pushAxis(1, 0.5)).toBe(true);
    t = 2;
    expect(joystick.pushAxis(1, 0.5)).toBe(false);
  });

  it('tracks hats and balls', () => {
    const joystick = new Joystick(0, new HeadlessBackend(), () => 0);
    joystick.update([
      { type: 'joyHatMotion', joy: 0, hat: 0, value: [0, 1] },
      { type: 'joyBallMotion', joy: 0, ball: 0, rel: { x: 3, y: -2 } },
    ]);
    expect(joystick.getHat(0)).toEqual([0, 1]);
    expect(joystick.pushHat(0, NO_REPEAT)).toBe(true);
    expect(joystick.pushHat(0, NO_REPEAT)).toBe(false);
    expect(joystick.getBall(0)).toEqual({ x: 3, y: -2 });
    expect(joystick.getBall(1)).toBeUndefined();
  });
});
