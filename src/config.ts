/**
 * Configuration
 *
 * Defaults, then ~/.menukit/config.json, then command-line flags.
 * `menukit config` edits the file interactively.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { dirname, resolve } from 'path';
import type { Size } from './backend/types';
import { DEFAULT_KEY_RELEASE_DELAY } from './backend/terminal';
import type { Logger } from './devices/context';
import { isScreenFlag, SCREEN_FLAG_NAMES, type ScreenFlag } from './devices/screen';
import { ConfigError } from './errors';
import { DEFAULT_THEME, isThemeName, THEME_NAMES, themes, type ThemeName } from './themes';

export const CONFIG_DIR = resolve(homedir(), '.menukit');
export const CONFIG_FILE = resolve(CONFIG_DIR, 'config.json');

export interface MenukitConfig {
  theme: ThemeName;
  title: string;
  /** Window size in cells */
  size: Size;
  flags: ScreenFlag[];
  /** Frame rate of the outer loop */
  fps: number;
  /** Poll rate of menu loops */
  menuFps: number;
  /** Seconds between repeated moves while a direction is held */
  navigationDelay: number;
  /** Milliseconds of silence before a terminal key counts as released */
  keyReleaseDelay: number;
}

export const DEFAULT_CONFIG: MenukitConfig = {
  theme: DEFAULT_THEME,
  title: 'Lab',
  size: { width: 40, height: 12 },
  flags: ['DOUBLEBUF'],
  fps: 120,
  menuFps: 30,
  navigationDelay: 0.233,
  keyReleaseDelay: DEFAULT_KEY_RELEASE_DELAY,
};

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isScreenFlagValue(value: unknown): value is ScreenFlag {
  return typeof value === 'string' && isScreenFlag(value);
}

function isPositiveNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

function isSize(value: unknown): value is Size {
  return isRecord(value)
    && Number.isInteger(value.width) && isPositiveNumber(value.width)
    && Number.isInteger(value.height) && isPositiveNumber(value.height);
}

/**
 * Keep the valid fields of a parsed config object; warn about the rest
 */
export function validateConfig(
  data: Record<string, unknown>,
  source: string,
  logger: Pick<Logger, 'warn'> = console
): Partial<MenukitConfig> {
  const config: Partial<MenukitConfig> = {};
  const skip = (field: string, reason: string) => {
    logger.warn(`[Config] ${source}: ignoring "${field}" (${reason})`);
  };

  for (const [field, value] of Object.entries(data)) {
    switch (field) {
      case 'theme':
        if (typeof value === 'string' && isThemeName(value)) config.theme = value;
        else skip(field, `expected one of ${THEME_NAMES.join(', ')}`);
        break;
      case 'title':
        if (typeof value === 'string') config.title = value;
        else skip(field, 'expected a string');
        break;
      case 'size':
        if (isSize(value)) config.size = { width: value.width, height: value.height };
        else skip(field, 'expected {"width": n, "height": n} with positive integers');
        break;
      case 'flags':
        if (Array.isArray(value) && value.every(isScreenFlagValue)) config.flags = value.filter(isScreenFlagValue);
        else skip(field, `expected a list of ${SCREEN_FLAG_NAMES.join(', ')}`);
        break;
      case 'fps':
      case 'menuFps':
      case 'keyReleaseDelay':
        if (isPositiveNumber(value)) config[field] = value;
        else skip(field, 'expected a positive number');
        break;
      case 'navigationDelay':
        if (typeof value === 'number' && Number.isFinite(value) && value >= 0) config.navigationDelay = value;
        else skip(field, 'expected a number of seconds');
        break;
      default:
        skip(field, 'unknown field');
    }
  }

  return config;
}

// ---------------------------------------------------------------------------
// File
// ---------------------------------------------------------------------------

/**
 * Read a config file. A missing file is an empty config; a file that
 * exists but cannot be read or parsed throws ConfigError.
 */
export function readConfigFile(
  path: string = CONFIG_FILE,
  logger: Pick<Logger, 'warn'> = console
): Partial<MenukitConfig> {
  if (!existsSync(path)) return {};

  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(path, `cannot read file (${err instanceof Error ? err.message : String(err)})`);
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(path, `invalid JSON (${err instanceof Error ? err.message : String(err)})`);
  }
  if (!isRecord(data)) {
    throw new ConfigError(path, 'expected a JSON object');
  }

  return validateConfig(data, path, logger);
}

export function writeConfigFile(path: string, config: MenukitConfig): void {
  const dir = dirname(path);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  writeFileSync(path, JSON.stringify(config, null, 2) + '\n');
}

/**
 * Merge config layers over the defaults, later layers winning
 */
export function resolveConfig(...layers: Partial<MenukitConfig>[]): MenukitConfig {
  const config = layers.reduce<MenukitConfig>((merged, layer) => ({ ...merged, ...layer }), DEFAULT_CONFIG);
  return {
    ...config,
    size: { ...config.size },
    flags: [...config.flags],
  };
}

// ---------------------------------------------------------------------------
// Command line
// ---------------------------------------------------------------------------

export type CliCommand = 'run' | 'config' | 'help' | 'listThemes';

export interface CliOptions {
  command: CliCommand;
  configPath: string;
  overrides: Partial<MenukitConfig>;
}

const ARGS_SOURCE = 'command line';

export function parseSize(value: string): Size | undefined {
  const match = /^(\d+)x(\d+)$/i.exec(value.trim());
  if (!match) return undefined;
  const size = { width: Number(match[1]), height: Number(match[2]) };
  return size.width > 0 && size.height > 0 ? size : undefined;
}

export function parseFlags(value: string): ScreenFlag[] | undefined {
  const names = value.split(',').map(name => name.trim().toUpperCase()).filter(name => name !== '');
  const flags = names.filter(isScreenFlagValue);
  return flags.length === names.length ? flags : undefined;
}

export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { command: 'run', configPath: CONFIG_FILE, overrides: {} };
  const { overrides } = options;

  const valueOf = (flag: string, index: number): string => {
    const value = argv[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigError(ARGS_SOURCE, `${flag} expects a value`);
    }
    return value;
  };
  const numberOf = (flag: string, index: number): number => {
    const value = Number(valueOf(flag, index));
    if (!isPositiveNumber(value)) {
      throw new ConfigError(ARGS_SOURCE, `${flag} expects a positive number`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--help':
      case '-h':
        options.command = 'help';
        break;
      case '--list-themes':
        options.command = 'listThemes';
        break;
      case '--theme': {
        const theme = valueOf(arg, i++);
        if (!isThemeName(theme)) {
          throw new ConfigError(ARGS_SOURCE, `unknown theme "${theme}" (${THEME_NAMES.join(', ')})`);
        }
        overrides.theme = theme;
        break;
      }
      case '--title':
        overrides.title = valueOf(arg, i++);
        break;
      case '--fps':
        overrides.fps = numberOf(arg, i++);
        break;
      case '--menu-fps':
        overrides.menuFps = numberOf(arg, i++);
        break;
      case '--size': {
        const size = parseSize(valueOf(arg, i++));
        if (!size) throw new ConfigError(ARGS_SOURCE, '--size expects WIDTHxHEIGHT, e.g. 40x12');
        overrides.size = size;
        break;
      }
      case '--flags': {
        const flags = parseFlags(valueOf(arg, i++));
        if (!flags) throw new ConfigError(ARGS_SOURCE, `--flags expects a comma-separated list of ${SCREEN_FLAG_NAMES.join(', ')}`);
        overrides.flags = flags;
        break;
      }
      case '--config':
        options.configPath = resolve(valueOf(arg, i++));
        break;
      case 'config':
        if (options.command === 'run') options.command = 'config';
        break;
      default:
        throw new ConfigError(ARGS_SOURCE, `unknown argument "${arg}"`);
    }
  }

  return options;
}

// ---------------------------------------------------------------------------
// Interactive editor
// ---------------------------------------------------------------------------

/**
 * Walk through every setting and save the result. Resolves to the saved
 * config, or null when cancelled.
 */
export async function runConfigWizard(path: string, current: MenukitConfig): Promise<MenukitConfig | null> {
  // Loaded on demand so the library and the menus never pull it in
  const p = await import('@clack/prompts');

  p.intro('menukit config');

  const theme = await p.select({
    message: 'Theme',
    initialValue: current.theme,
    options: THEME_NAMES.map(name => ({ value: name, label: themes[name].name, hint: name })),
  });
  if (p.isCancel(theme) || typeof theme !== 'string' || !isThemeName(theme)) {
    p.cancel('No changes saved.');
    return null;
  }

  const title = await p.text({
    message: 'Window title',
    initialValue: current.title,
  });
  if (p.isCancel(title)) {
    p.cancel('No changes saved.');
    return null;
  }

  const sizeInput = await p.text({
    message: 'Window size (columns x rows)',
    initialValue: `${current.size.width}x${current.size.height}`,
    validate: (value) => {
      if (!parseSize(value)) return 'Use WIDTHxHEIGHT, e.g. 40x12';
    },
  });
  if (p.isCancel(sizeInput)) {
    p.cancel('No changes saved.');
    return null;
  }

  const flags = await p.multiselect({
    message: 'Screen flags',
    required: false,
    initialValues: current.flags,
    options: SCREEN_FLAG_NAMES.map(flag => ({ value: flag, label: flag })),
  });
  if (p.isCancel(flags)) {
    p.cancel('No changes saved.');
    return null;
  }

  const menuFps = await p.text({
    message: 'Menu poll rate (per second)',
    initialValue: String(current.menuFps),
    validate: (value) => {
      if (!isPositiveNumber(Number(value))) return 'Enter a positive number';
    },
  });
  if (p.isCancel(menuFps)) {
    p.cancel('No changes saved.');
    return null;
  }

  const config = resolveConfig(current, {
    theme,
    title,
    size: parseSize(sizeInput) ?? current.size,
    flags: flags.filter(isScreenFlagValue),
    menuFps: Number(menuFps),
  });

  const confirmed = await p.confirm({ message: `Save to ${path}?` });
  if (p.isCancel(confirmed) || !confirmed) {
    p.cancel('No changes saved.');
    return null;
  }

  writeConfigFile(path, config);
  p.outro(`Saved ${path}`);
  return config;
}
