/**
 * menukit
 *
 * Input tracking and focusable menus for terminal programs.
 *
 * Library usage (xterm.js):
 *   import { TerminalBackend, createContext, Menu, Option } from 'menukit';
 *   const backend = new TerminalBackend(terminal);
 *   backend.open();
 *   const ctx = createContext(backend);
 *   await new Menu(ctx, { options: [new Option(ctx, { message: 'PLAY' })] }).loop();
 *
 * CLI usage:
 *   npx menukit
 */

export {
  MOD_ALT,
  MOD_CTRL,
  MOD_NONE,
  MOD_SHIFT,
  type BackendEvent,
  type BackendEventType,
  type Cell,
  type Color,
  type DisplayBackend,
  type DisplayInfo,
  type Font,
  type HatValue,
  type Image,
  type Point,
  type Rect,
  type Size,
  type TextRenderer,
} from './backend/types';
export { fillImage, imageText, PLAIN_FONT, rasterizeText } from './backend/raster';
export {
  characterKeyCode,
  KEY_CODES,
  KEY_DOWN,
  KEY_ENTER,
  KEY_ESCAPE,
  KEY_LEFT,
  KEY_RIGHT,
  KEY_SPACE,
  KEY_UP,
  keyCode,
  keyName,
} from './backend/keys';
export {
  DEFAULT_KEY_RELEASE_DELAY,
  parseKey,
  parseMouse,
  TerminalBackend,
  tokenizeInput,
  type KeyPress,
  type MouseReport,
  type TerminalBackendOptions,
  type TerminalLike,
} from './backend/terminal';
export { HeadlessBackend, type BlitRecord, type FrameRecord, type HeadlessOptions } from './backend/headless';
export { createNodeTerminal, type NodeTerminal } from './backend/nodeTerminal';

export {
  AXIS_DEAD_ZONE,
  InputChannel,
  NO_REPEAT,
  systemTime,
  type ButtonState,
  type PushState,
  type TimeSource,
} from './devices/channel';
export { Keyboard } from './devices/keyboard';
export {
  BUTTON_LEFT,
  BUTTON_MIDDLE,
  BUTTON_RIGHT,
  BUTTON_WHEEL_DOWN,
  BUTTON_WHEEL_UP,
  Mouse,
} from './devices/mouse';
export { Joystick, JOYSTICK_NOT_DETECTED } from './devices/joystick';
export {
  DEFAULT_SCREEN_CONFIG,
  isScreenFlag,
  Screen,
  SCREEN_FLAG_NAMES,
  SCREEN_FLAGS,
  screenFlagMask,
  type ScreenConfig,
  type ScreenFlag,
} from './devices/screen';
export { Clock, sleep, type ClockOptions, type Sleep } from './devices/clock';
export { createContext, type Context, type ContextOptions, type Logger } from './devices/context';

export { containsPoint, rectBottom, rectRight, rectsEqual, sizesEqual } from './sprites/rect';
export { Sprite, Surface, Text, type BlitTarget, type SurfaceOptions, type TextOptions } from './sprites/sprite';

export {
  chainOptions,
  DEFAULT_BLUR_COLOR,
  DEFAULT_FOCUS_COLOR,
  linkOptions,
  NO_ACTION,
  Option,
  toOptionAction,
  type OptionAction,
  type OptionCallback,
  type OptionOptions,
} from './menus/option';
export {
  DEFAULT_BINDINGS,
  DEFAULT_MENU_POLL_RATE,
  Menu,
  type JoystickBinding,
  type MenuBindings,
  type MenuConfig,
  type MenuHandler,
} from './menus/menu';

export {
  DEFAULT_THEME,
  getTheme,
  getThemeColors,
  isThemeName,
  parseColor,
  THEME_NAMES,
  themes,
  type ThemeColors,
  type ThemeName,
  type ThemePalette,
} from './themes';
export {
  DEFAULT_CONFIG,
  parseArgs,
  readConfigFile,
  resolveConfig,
  writeConfigFile,
  type MenukitConfig,
} from './config';
export { createExitMenu, createMainMenu, runLab, type LabSettings } from './lab';
export { ConfigError, DisplayError } from './errors';
