/**
 * Menu color themes
 *
 * Palettes are defined as hex strings and parsed to RGB when a menu is
 * built.
 */

import type { Color } from '../backend/types';

/**
 * Available theme identifiers
 */
export type ThemeName =
  | 'classic'
  | 'cyan'
  | 'amber'
  | 'green'
  | 'nord'
  | 'solarized';

/**
 * Theme color definition
 */
export interface ThemeColors {
  /** Display name */
  name: string;
  /** Window background (hex) */
  bg: string;
  /** Text of blurred options (hex) */
  text: string;
  /** Text of the focused option (hex) */
  focus: string;
  /** Background behind the focused option (hex); none when absent */
  focusBg?: string;
}

/**
 * All theme definitions
 */
export const themes: Record<ThemeName, ThemeColors> = {
  classic: {
    name: 'Classic',
    bg: '#FFFFFF',
    text: '#000000',
    focus: '#FF0000',
  },
  cyan: {
    name: 'Cyberpunk',
    bg: '#0A1628',
    text: '#00D9FF',
    focus: '#FF006E',
    focusBg: '#0D1E38',
  },
  amber: {
    name: 'Fallout',
    bg: '#1C1408',
    text: '#FFB000',
    focus: '#FF6600',
    focusBg: '#2A1E0C',
  },
  green: {
    name: 'Matrix',
    bg: '#001A00',
    text: '#39FF14',
    focus: '#001A00',
    focusBg: '#39FF14',
  },
  nord: {
    name: 'Nord',
    bg: '#2E3440',
    text: '#D8DEE9',
    focus: '#88C0D0',
    focusBg: '#3B4252',
  },
  solarized: {
    name: 'Solarized',
    bg: '#002B36',
    text: '#839496',
    focus: '#B58900',
    focusBg: '#073642',
  },
};

/**
 * Parsed palette, ready for screens and options
 */
export interface ThemePalette {
  background: Color;
  text: Color;
  focus: Color;
  focusBackground: Color | null;
}

export const DEFAULT_THEME: ThemeName = 'classic';

/**
 * Parse '#RRGGBB' or '#RGB' (the '#' is optional)
 */
export function parseColor(hex: string): Color {
  const digits = hex.trim().replace(/^#/, '');
  const full = digits.length === 3
    ? [...digits].map(d => d + d).join('')
    : digits;
  if (!/^[0-9a-fA-F]{6}$/.test(full)) {
    throw new Error(`Invalid color: ${hex}`);
  }
  return [
    parseInt(full.slice(0, 2), 16),
    parseInt(full.slice(2, 4), 16),
    parseInt(full.slice(4, 6), 16),
  ];
}

export function getTheme(name: ThemeName): ThemeColors {
  return themes[name];
}

export function getThemeColors(name: ThemeName): ThemePalette {
  const theme = themes[name];
  return {
    background: parseColor(theme.bg),
    text: parseColor(theme.text),
    focus: parseColor(theme.focus),
    focusBackground: theme.focusBg ? parseColor(theme.focusBg) : null,
  };
}

export const THEME_NAMES: readonly ThemeName[] = ['classic', 'cyan', 'amber', 'green', 'nord', 'solarized'];

const VALID_THEME_NAMES = new Set<string>(THEME_NAMES);

/**
 * Check if a string is a valid theme name
 */
export function isThemeName(value: string): value is ThemeName {
  return VALID_THEME_NAMES.has(value);
}
