/**
 * Key identifiers
 *
 * Every physical key has one numeric code. Named keys use DOM keyCode
 * values from keycodes.json; other printable characters map into a
 * separate range above 0xFFFF so they never collide with a named key
 * ('&' would otherwise share 38 with ArrowUp).
 */

import keyTable from './keycodes.json';

export const KEY_CODES: Readonly<Record<string, number>> = keyTable;

const SYMBOL_BASE = 0x10000;

const namesByCode = new Map<number, string>();
for (const [name, code] of Object.entries(KEY_CODES)) {
  namesByCode.set(code, name);
}

// Frequently used codes
export const KEY_ENTER = KEY_CODES.Enter;
export const KEY_ESCAPE = KEY_CODES.Escape;
export const KEY_SPACE = KEY_CODES.Space;
export const KEY_UP = KEY_CODES.ArrowUp;
export const KEY_DOWN = KEY_CODES.ArrowDown;
export const KEY_LEFT = KEY_CODES.ArrowLeft;
export const KEY_RIGHT = KEY_CODES.ArrowRight;

/**
 * Code of a named key, or of a single character
 */
export function keyCode(name: string): number | undefined {
  const code = KEY_CODES[name] ?? KEY_CODES[name.toLowerCase()];
  if (code !== undefined) return code;
  if ([...name].length === 1) return characterKeyCode(name);
  return undefined;
}

/**
 * Code of the key that produces a character
 */
export function characterKeyCode(char: string): number {
  if (char === ' ') return KEY_SPACE;
  const named = KEY_CODES[char.toLowerCase()];
  if (named !== undefined && char.length === 1) return named;
  return SYMBOL_BASE + (char.codePointAt(0) ?? 0);
}

/**
 * Symbolic name of a key code
 */
export function keyName(code: number): string | undefined {
  const name = namesByCode.get(code);
  if (name !== undefined) return name;
  if (code > SYMBOL_BASE) return String.fromCodePoint(code - SYMBOL_BASE);
  return undefined;
}
