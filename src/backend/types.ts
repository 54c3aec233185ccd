/**
 * Display backend contract
 *
 * Everything the toolkit needs from the outside world: event polling,
 * frame presentation, text rasterization and pointer control.
 */

export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * 24-bit colour as [red, green, blue], each 0-255
 */
export type Color = readonly [number, number, number];

/**
 * Discrete hat direction, each component -1, 0 or 1
 */
export type HatValue = readonly [number, number];

export interface Cell {
  char: string;
  fg: Color | null;
  bg: Color | null;
  bold: boolean;
  underline: boolean;
}

/**
 * A rasterized block of cells, ready to blit
 */
export interface Image {
  width: number;
  height: number;
  cells: Cell[][];
}

export interface Font {
  bold: boolean;
  underline: boolean;
}

// Keyboard modifier bits
export const MOD_NONE = 0;
export const MOD_SHIFT = 1 << 0;
export const MOD_CTRL = 1 << 1;
export const MOD_ALT = 1 << 2;

export type BackendEvent =
  | { type: 'quit' }
  | { type: 'windowResize'; size: Size }
  | { type: 'keyDown'; code: number; character: string; modifiers: number }
  | { type: 'keyUp'; code: number; modifiers: number }
  | { type: 'mouseMotion'; pos: Point; rel: Point }
  | { type: 'mouseButtonDown'; button: number }
  | { type: 'mouseButtonUp'; button: number }
  | { type: 'joyButtonDown'; joy: number; button: number }
  | { type: 'joyButtonUp'; joy: number; button: number }
  | { type: 'joyAxisMotion'; joy: number; axis: number; value: number }
  | { type: 'joyHatMotion'; joy: number; hat: number; value: HatValue }
  | { type: 'joyBallMotion'; joy: number; ball: number; rel: Point };

export type BackendEventType = BackendEvent['type'];

export interface DisplayInfo {
  /** Size of the whole display, used in fullscreen mode */
  displaySize: Size;
}

export interface DisplayBackend {
  info(): DisplayInfo;
  /** Throws DisplayError when the mode cannot be set */
  setMode(size: Size, flags: number): void;
  setTitle(title: string): void;
  fill(color: Color): void;
  blit(image: Image, at: Point): Rect;
  present(): void;
  /** All events received since the previous call, in order */
  poll(): BackendEvent[];
  renderText(message: string, font: Font, color: Color, background: Color | null): Image;
  setCursorVisible(visible: boolean): void;
  warpCursor(pos: Point): void;
  joystickName(id: number): string | undefined;
  close(): void;
}

/**
 * The part of a backend a text sprite needs
 */
export type TextRenderer = Pick<DisplayBackend, 'renderText'>;
