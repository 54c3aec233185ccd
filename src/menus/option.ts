/**
 * Menu option
 *
 * A text sprite that can take focus, links to its neighbours, and
 * carries an action. Links are plain references; the menu owns the
 * options.
 */

import type { Color, Font, Point } from '../backend/types';
import type { Context } from '../devices/context';
import { Text } from '../sprites/sprite';

export type OptionCallback = () => void | Promise<void>;

export type OptionAction =
  | { type: 'none' }
  | { type: 'invoke'; run: OptionCallback };

export const NO_ACTION: OptionAction = { type: 'none' };

export function toOptionAction(action: OptionAction | OptionCallback | undefined): OptionAction {
  if (action === undefined) return NO_ACTION;
  if (typeof action === 'function') return { type: 'invoke', run: action };
  return action;
}

export const DEFAULT_BLUR_COLOR: Color = [0, 0, 0];
export const DEFAULT_FOCUS_COLOR: Color = [255, 0, 0];

export interface OptionOptions {
  pos?: Point;
  font?: Font;
  message?: string;
  messageColorOnBlur?: Color;
  messageColorOnFocus?: Color;
  backgroundColorOnBlur?: Color | null;
  backgroundColorOnFocus?: Color | null;
  previous?: Option | null;
  next?: Option | null;
  action?: OptionAction | OptionCallback;
}

export class Option extends Text {
  private readonly logger: Context['logger'];
  private _previous: Option | null = null;
  private _next: Option | null = null;
  private _focused = false;
  private readonly messageColorOnBlur: Color;
  private readonly messageColorOnFocus: Color;
  private readonly backgroundColorOnBlur: Color | null;
  private readonly backgroundColorOnFocus: Color | null;
  action: OptionAction;

  constructor(ctx: Pick<Context, 'backend' | 'logger'>, options: OptionOptions = {}) {
    const messageColorOnBlur = options.messageColorOnBlur ?? DEFAULT_BLUR_COLOR;
    const backgroundColorOnBlur = options.backgroundColorOnBlur ?? null;
    super(ctx.backend, {
      pos: options.pos,
      font: options.font,
      message: options.message ?? 'OPTION',
      messageColor: messageColorOnBlur,
      backgroundColor: backgroundColorOnBlur,
    });
    this.logger = ctx.logger;
    this.messageColorOnBlur = messageColorOnBlur;
    this.messageColorOnFocus = options.messageColorOnFocus ?? DEFAULT_FOCUS_COLOR;
    this.backgroundColorOnBlur = backgroundColorOnBlur;
    this.backgroundColorOnFocus = options.backgroundColorOnFocus ?? null;
    this.action = toOptionAction(options.action);

    if (options.previous) Option.link(options.previous, this);
    if (options.next) Option.link(this, options.next);
  }

  get previous(): Option | null {
    return this._previous;
  }

  set previous(option: Option | null) {
    if (option) {
      Option.link(option, this);
    } else {
      Option.unlinkPrevious(this);
    }
  }

  get next(): Option | null {
    return this._next;
  }

  set next(option: Option | null) {
    if (option) {
      Option.link(this, option);
    } else {
      Option.unlinkNext(this);
    }
  }

  get focused(): boolean {
    return this._focused;
  }

  onblur(): void {
    this._focused = false;
    this.messageColor = this.messageColorOnBlur;
    this.backgroundColor = this.backgroundColorOnBlur;
  }

  onfocus(): void {
    this._focused = true;
    this.messageColor = this.messageColorOnFocus;
    this.backgroundColor = this.backgroundColorOnFocus;
  }

  /**
   * Run the action; without one, report the message instead
   */
  apply(): void | Promise<void> {
    switch (this.action.type) {
      case 'invoke':
        return this.action.run();
      case 'none':
        this.logger.log(this.message);
        return;
    }
  }

  /**
   * Make `first.next` be `second` and `second.previous` be `first` in one
   * step. Whatever either side pointed at before is detached, so the
   * links always stay symmetric.
   */
  static link(first: Option, second: Option): void {
    if (first._next === second && second._previous === first) return;
    Option.unlinkNext(first);
    Option.unlinkPrevious(second);
    first._next = second;
    second._previous = first;
  }

  /**
   * Take `option` out of its chain, joining its neighbours to each other
   */
  static detach(option: Option): void {
    const previous = option._previous;
    const next = option._next;
    Option.unlinkPrevious(option);
    Option.unlinkNext(option);
    if (previous && next && previous !== option && next !== option) {
      Option.link(previous, next);
    }
  }

  private static unlinkNext(option: Option): void {
    const old = option._next;
    if (old && old._previous === option) old._previous = null;
    option._next = null;
  }

  private static unlinkPrevious(option: Option): void {
    const old = option._previous;
    if (old && old._next === option) old._next = null;
    option._previous = null;
  }
}

export function linkOptions(first: Option, second: Option): void {
  Option.link(first, second);
}

/**
 * Link a list of options in order; `circular` also links last to first
 */
export function chainOptions(options: readonly Option[], { circular = false } = {}): void {
  for (let i = 1; i < options.length; i++) {
    linkOptions(options[i - 1], options[i]);
  }
  if (circular && options.length > 1) {
    linkOptions(options[options.length - 1], options[0]);
  }
}
