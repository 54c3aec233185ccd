/**
 * Lab
 *
 * The demo program: a main menu (PLAY, EDITOR, OPTIONS, EXIT) and an
 * exit confirmation. Escape on the main menu, or choosing EXIT, asks
 * before quitting.
 */

import { KEY_ESCAPE } from './backend/keys';
import type { MenukitConfig } from './config';
import type { Context } from './devices/context';
import { Menu, type MenuHandler } from './menus/menu';
import { chainOptions, linkOptions, Option } from './menus/option';
import { getThemeColors, type ThemePalette } from './themes';

export type LabSettings = Pick<MenukitConfig, 'theme' | 'fps' | 'menuFps' | 'navigationDelay'>;

function createOption(ctx: Context, palette: ThemePalette, message: string): Option {
  return new Option(ctx, {
    message,
    messageColorOnBlur: palette.text,
    messageColorOnFocus: palette.focus,
    backgroundColorOnFocus: palette.focusBackground,
  });
}

function menuConfig(settings: LabSettings) {
  return {
    pollRate: settings.menuFps,
    bindings: {
      closeKeys: [KEY_ESCAPE],
      navigationDelay: settings.navigationDelay,
    },
  };
}

/**
 * YES stops the whole program, NO goes back
 */
export function createExitMenu(ctx: Context, settings: LabSettings): Menu {
  const palette = getThemeColors(settings.theme);
  const yes = createOption(ctx, palette, 'YES');
  const no = createOption(ctx, palette, 'NO');
  linkOptions(yes, no);

  const handlers = new Map<Option, MenuHandler>([
    [yes, () => {
      ctx.screen.running = false;
    }],
    [no, (_option, menu) => {
      menu.close();
    }],
  ]);

  return new Menu(ctx, { ...menuConfig(settings), options: [yes, no], handlers });
}

/**
 * PLAY, EDITOR and OPTIONS report their message; EXIT asks for confirmation
 */
export function createMainMenu(ctx: Context, settings: LabSettings): Menu {
  const palette = getThemeColors(settings.theme);
  const options = ['PLAY', 'EDITOR', 'OPTIONS', 'EXIT'].map(message => createOption(ctx, palette, message));
  chainOptions(options, { circular: true });

  const exit = options[3];
  const handlers = new Map<Option, MenuHandler>([
    [exit, () => createExitMenu(ctx, settings).loop()],
  ]);

  return new Menu(ctx, { ...menuConfig(settings), options, handlers });
}

/**
 * Run the main menu until the program is told to stop
 */
export async function runLab(ctx: Context, settings: LabSettings): Promise<void> {
  const main = createMainMenu(ctx, settings);

  while (ctx.screen.running) {
    await main.loop();
    if (!ctx.screen.running) break;

    // Closed with Escape
    await createExitMenu(ctx, settings).loop();
    await ctx.clock.tick(settings.fps);
  }
}
