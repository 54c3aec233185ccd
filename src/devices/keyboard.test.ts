import { describe, it, expect } from 'vitest';
import type { BackendEvent } from '../backend/types';
import { KEY_CODES, KEY_ENTER, KEY_UP, characterKeyCode } from '../backend/keys';
import { NO_REPEAT } from './channel';
import { Keyboard } from './keyboard';

function keyDown(code: number, character = ''): BackendEvent {
  return { type: 'keyDown', code, character, modifiers: 0 };
}

function keyUp(code: number): BackendEvent {
  return { type: 'keyUp', code, modifiers: 0 };
}

describe('Keyboard', () => {
  it('answers undefined for keys never pressed', () => {
    const keyboard = new Keyboard(() => 0);
    expect(keyboard.push(KEY_ENTER)).toBeUndefined();
    expect(keyboard.pushChar('x')).toBeUndefined();
    expect(keyboard.pushName('Escape')).toBeUndefined();
    expect(keyboard.isDown(KEY_ENTER)).toBeUndefined();
  });

  it('reports a key down once per press', () => {
    const keyboard = new Keyboard(() => 0);
    keyboard.update([keyDown(KEY_ENTER)]);
    expect(keyboard.push(KEY_ENTER, NO_REPEAT)).toBe(true);
    expect(keyboard.push(KEY_ENTER, NO_REPEAT)).toBe(false);
    expect(keyboard.isDown(KEY_ENTER)).toBe(true);
  });

  it('tracks releases', () => {
    const keyboard = new Keyboard(() => 0);
    keyboard.update([keyDown(KEY_UP)]);
    keyboard.update([keyUp(KEY_UP)]);
    expect(keyboard.isDown(KEY_UP)).toBe(false);
  });

  it('answers false for a key only ever released', () => {
    const keyboard = new Keyboard(() => 0);
    keyboard.update([keyUp(KEY_UP)]);
    expect(keyboard.push(KEY_UP)).toBe(false);
  });

  it('resolves characters to the key that produced them', () => {
    const keyboard = new Keyboard(() => 0);
    const code = characterKeyCode('q');
    keyboard.update([keyDown(code, 'q')]);
    expect(keyboard.pushChar('q', NO_REPEAT)).toBe(true);
    expect(keyboard.pushChar('Q')).toBeUndefined();
  });

  it('shares one entry between code, character and name', () => {
    const keyboard = new Keyboard(() => 0);
    keyboard.update([keyDown(KEY_CODES.a, 'a')]);
    expect(keyboard.pushName('a', NO_REPEAT)).toBe(true);
    expect(keyboard.pushChar('a', NO_REPEAT)).toBe(false);
    expect(keyboard.push(KEY_CODES.a, NO_REPEAT)).toBe(false);
  });

  it('resolves key names through the key table', () => {
    const keyboard = new Keyboard(() => 0);
    keyboard.update([keyDown(KEY_UP)]);
    expect(keyboard.pushName('ArrowUp', NO_REPEAT)).toBe(true);
    expect(keyboard.pushName('NoSuchKey')).toBeUndefined();
  });

  it('repeats held keys after the delay', () => {
    let t = 0;
    const keyboard = new Keyboard(() => t);
    keyboard.update([keyDown(KEY_UP)]);
    expect(keyboard.push(KEY_UP, 0.25)).toBe(true);
    t = 0.1;
    expect(keyboard.push(KEY_UP, 0.25)).toBe(false);
    t = 0.25;
    expect(keyboard.push(KEY_UP, 0.25)).toBe(true);
  });
});
