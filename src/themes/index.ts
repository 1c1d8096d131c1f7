/**
 * Terminal color themes
 *
 * Each theme colors the HUD plus every kind of tile with ANSI escape codes.
 */

/**
 * Available theme identifiers
 */
export type ThemeName =
  | 'cyan'
  | 'amber'
  | 'green'
  | 'white'
  | 'hotpink'
  | 'nord';

/**
 * ANSI colors for one theme
 */
export interface ThemePalette {
  /** Display name */
  name: string;
  /** HUD text, borders and menus */
  accent: string;
  wall: string;
  box: string;
  placedBox: string;
  goal: string;
  player: string;
}

export const themes: Record<ThemeName, ThemePalette> = {
  cyan: {
    name: 'Cyberpunk',
    accent: '\x1b[96m',
    wall: '\x1b[38;5;24m',
    box: '\x1b[38;5;208m',
    placedBox: '\x1b[38;5;46m',
    goal: '\x1b[38;5;201m',
    player: '\x1b[1;97m',
  },
  amber: {
    name: 'Fallout',
    accent: '\x1b[38;5;214m',
    wall: '\x1b[38;5;94m',
    box: '\x1b[38;5;220m',
    placedBox: '\x1b[38;5;190m',
    goal: '\x1b[38;5;166m',
    player: '\x1b[1;38;5;230m',
  },
  green: {
    name: 'Matrix',
    accent: '\x1b[92m',
    wall: '\x1b[38;5;22m',
    box: '\x1b[38;5;118m',
    placedBox: '\x1b[1;38;5;46m',
    goal: '\x1b[38;5;28m',
    player: '\x1b[1;97m',
  },
  white: {
    name: 'Ghost',
    accent: '\x1b[97m',
    wall: '\x1b[38;5;240m',
    box: '\x1b[38;5;252m',
    placedBox: '\x1b[38;5;117m',
    goal: '\x1b[38;5;246m',
    player: '\x1b[1;97m',
  },
  hotpink: {
    name: 'Synthwave',
    accent: '\x1b[38;5;205m',
    wall: '\x1b[38;5;54m',
    box: '\x1b[38;5;51m',
    placedBox: '\x1b[38;5;226m',
    goal: '\x1b[38;5;199m',
    player: '\x1b[1;97m',
  },
  nord: {
    name: 'Nord',
    accent: '\x1b[38;5;110m',
    wall: '\x1b[38;5;60m',
    box: '\x1b[38;5;180m',
    placedBox: '\x1b[38;5;108m',
    goal: '\x1b[38;5;174m',
    player: '\x1b[1;38;5;255m',
  },
};

export const DEFAULT_THEME: ThemeName = 'cyan';

/**
 * Get the palette of a theme
 */
export function getPalette(mode: ThemeName): ThemePalette {
  return themes[mode];
}

/**
 * Get ANSI escape code for a theme's accent color
 */
export function getAnsiColor(mode: ThemeName): string {
  return themes[mode].accent;
}

/**
 * Get all available theme modes
 */
export function getThemeModes(): ThemeName[] {
  return Object.keys(themes).filter(isValidThemeMode);
}

const VALID_THEME_MODES = new Set<string>(Object.keys(themes));

/**
 * Check if a string is a valid theme mode
 */
export function isValidThemeMode(value: string): value is ThemeName {
  return VALID_THEME_MODES.has(value);
}
