/**
 * Menu
 *
 * Owns a list of options, keeps exactly one of them focused, lays them
 * out as a centred block and runs the interaction loop. What an option
 * does when activated comes from the handler table; options without a
 * handler fall back to their own action.
 */

import type { Color, Rect } from '../backend/types';
import { KEY_DOWN, KEY_ENTER, KEY_SPACE, KEY_UP } from '../backend/keys';
import { NO_REPEAT } from '../devices/channel';
import type { Context } from '../devices/context';
import type { Joystick } from '../devices/joystick';
import { BUTTON_LEFT } from '../devices/mouse';
import { rectsEqual } from '../sprites/rect';
import { Surface } from '../sprites/sprite';
import { Option } from './option';

export type MenuHandler = (option: Option, menu: Menu) => void | Promise<void>;

export interface JoystickBinding {
  id: number;
  hat: number;
  confirmButton: number;
}

export interface MenuBindings {
  previousKeys: readonly number[];
  nextKeys: readonly number[];
  confirmKeys: readonly number[];
  /** Keys that close the menu; none by default */
  closeKeys: readonly number[];
  /** Repeat delay for previous/next while held, in seconds */
  navigationDelay: number;
  clickButton: number;
  joystick: JoystickBinding | null;
}

export const DEFAULT_BINDINGS: MenuBindings = {
  previousKeys: [KEY_UP],
  nextKeys: [KEY_DOWN],
  confirmKeys: [KEY_ENTER, KEY_SPACE],
  closeKeys: [],
  navigationDelay: 0.233,
  clickButton: BUTTON_LEFT,
  joystick: null,
};

export const DEFAULT_MENU_POLL_RATE = 30;

export interface MenuConfig {
  options?: readonly Option[];
  handlers?: ReadonlyMap<Option, MenuHandler>;
  /** Defaults to the whole screen, following its size */
  area?: Rect;
  background?: Color | null;
  /** Blank rows between options */
  spacing?: number;
  /** Loop iterations per second */
  pollRate?: number;
  bindings?: Partial<MenuBindings>;
}

export class Menu {
  running = true;

  private readonly ctx: Context;
  private readonly _options: Option[];
  private _option: Option | null = null;
  private readonly handlers: Map<Option, MenuHandler>;
  private readonly fixedArea: Rect | null;
  private readonly background: Surface | null;
  private readonly spacing: number;
  private readonly pollRate: number;
  private readonly bindings: MenuBindings;
  private readonly joystick: Joystick | null;
  private laidOutArea: Rect | null = null;

  constructor(ctx: Context, config: MenuConfig = {}) {
    this.ctx = ctx;
    this._options = [...(config.options ?? [])];
    this.handlers = new Map(config.handlers ?? []);
    this.fixedArea = config.area ? { ...config.area } : null;
    this.background = config.background ? new Surface({ color: config.background }) : null;
    this.spacing = Math.max(0, config.spacing ?? 1);
    this.pollRate = config.pollRate ?? DEFAULT_MENU_POLL_RATE;
    this.bindings = { ...DEFAULT_BINDINGS, ...config.bindings };
    this.joystick = this.bindings.joystick ? ctx.joystick(this.bindings.joystick.id) : null;

    this.layout();
    const first = this._options[0];
    if (first) this.focus(first);
  }

  get options(): readonly Option[] {
    return this._options;
  }

  /**
   * The focused option; null only when the menu is empty
   */
  get option(): Option | null {
    return this._option;
  }

  get area(): Rect {
    return this.fixedArea ?? this.ctx.screen.area;
  }

  /**
   * Blur the current option and focus `option`. Nothing happens for
   * null, for the option already focused, or for an option this menu
   * does not own.
   */
  focus(option: Option | null): void {
    if (!option || option === this._option || !this._options.includes(option)) return;
    this._option?.onblur();
    this._option = option;
    option.onfocus();
  }

  add(option: Option, handler?: MenuHandler): void {
    this._options.push(option);
    if (handler) this.handlers.set(option, handler);
    this.layout();
    if (!this._option) this.focus(option);
  }

  remove(option: Option): boolean {
    const index = this._options.indexOf(option);
    if (index === -1) return false;

    this._options.splice(index, 1);
    this.handlers.delete(option);
    Option.detach(option);
    if (this._option === option) {
      option.onblur();
      this._option = null;
      this.focus(this._options[0] ?? null);
    }
    this.layout();
    return true;
  }

  /**
   * Register or replace the handler run when `option` is activated
   */
  on(option: Option, handler: MenuHandler): void {
    this.handlers.set(option, handler);
  }

  close(): void {
    this.running = false;
  }

  /**
   * Stack the options top to bottom, centred as a block in the area
   */
  layout(): void {
    const area = this.area;
    const contentHeight = this._options.reduce((sum, option) => sum + option.height, 0)
      + this.spacing * Math.max(0, this._options.length - 1);

    let y = area.y + Math.floor((area.height - contentHeight) / 2);
    for (const option of this._options) {
      option.pos = { x: area.x + Math.floor((area.width - option.width) / 2), y };
      y += option.height + this.spacing;
    }

    if (this.background) {
      this.background.pos = { x: area.x, y: area.y };
      this.background.size = { width: area.width, height: area.height };
    }
    this.laidOutArea = { ...area };
  }

  /**
   * Draw the background, then every option in list order
   */
  render(): void {
    const screen = this.ctx.screen;
    if (!this.laidOutArea || !rectsEqual(this.laidOutArea, this.area)) {
      this.layout();
    }

    if (this.background) {
      this.background.blitOn(screen);
    } else {
      screen.resetColor();
    }
    for (const option of this._options) {
      option.blitOn(screen);
    }
  }

  /**
   * Activate the focused option
   */
  async apply(): Promise<void> {
    const option = this._option;
    if (!option) return;

    const handler = this.handlers.get(option);
    if (handler) {
      await handler(option, this);
      return;
    }
    await option.apply();
  }

  /**
   * Run until this menu or the screen stops. Calling it again reopens
   * a closed menu. Handlers that open sub-menus await their loops, so
   * this loop is suspended until they close.
   */
  async loop(): Promise<void> {
    const { screen, mouse, clock } = this.ctx;
    const bindings = this.bindings;
    this.running = true;

    while (screen.running && this.running) {
      this.ctx.poll();

      if (this.anyKeyPushed(bindings.closeKeys, NO_REPEAT)) {
        this.close();
        break;
      }

      const hat = this.hatDirection();

      if (this.anyKeyPushed(bindings.previousKeys, bindings.navigationDelay) || hat > 0) {
        this.focus(this._option?.previous ?? null);
      }
      if (this.anyKeyPushed(bindings.nextKeys, bindings.navigationDelay) || hat < 0) {
        this.focus(this._option?.next ?? null);
      }

      if (mouse.move() && this._option && !mouse.inside(this._option.area)) {
        const hovered = this._options.find(option => mouse.inside(option.area));
        if (hovered) this.focus(hovered);
      }

      this.render();
      screen.present();
      await clock.tick(this.pollRate);

      const confirmed = this.anyKeyPushed(bindings.confirmKeys, NO_REPEAT)
        || this.joystickConfirmed();
      const clicked = mouse.push(bindings.clickButton, NO_REPEAT) === true
        && this._option !== null
        && mouse.inside(this._option.area);
      if (confirmed || clicked) {
        await this.apply();
      }
    }
  }

  /**
   * Query every key (so each one's press is consumed) and report
   * whether any fired
   */
  private anyKeyPushed(keys: readonly number[], delay: number): boolean {
    let pushed = false;
    for (const key of keys) {
      if (this.ctx.keyboard.push(key, delay) === true) pushed = true;
    }
    return pushed;
  }

  /**
   * 1 for up, -1 for down, 0 when the hat did not fire
   */
  private hatDirection(): number {
    const binding = this.bindings.joystick;
    if (!this.joystick || !binding) return 0;
    if (this.joystick.pushHat(binding.hat, this.bindings.navigationDelay) !== true) return 0;
    const [, y] = this.joystick.getHat(binding.hat) ?? [0, 0];
    return Math.sign(y);
  }

  private joystickConfirmed(): boolean {
    const binding = this.bindings.joystick;
    if (!this.joystick || !binding) return false;
    return this.joystick.pushButton(binding.confirmButton, NO_REPEAT) === true;
  }
}
