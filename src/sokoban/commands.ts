/**
 * Player commands and the inputs that fire them
 *
 * Keys map straight to commands. Pointer input is hit-tested against named
 * screen zones: the viewport is cut into a grid of equal sectors and each
 * zone claims one sector (1-based), e.g. undo lives in the top-left corner.
 */

import type { Size } from './levelDecoder';

export type Command =
  | 'moveUp'
  | 'moveDown'
  | 'moveLeft'
  | 'moveRight'
  | 'undo'
  | 'nextLevel'
  | 'previousLevel';

// ============================================================================
// Keyboard
// ============================================================================

const KEY_COMMANDS: Record<string, Command> = {
  ArrowUp: 'moveUp',
  ArrowDown: 'moveDown',
  ArrowLeft: 'moveLeft',
  ArrowRight: 'moveRight',
  w: 'moveUp',
  s: 'moveDown',
  a: 'moveLeft',
  d: 'moveRight',
  u: 'undo',
  z: 'undo',
  Backspace: 'undo',
  PageUp: 'nextLevel',
  n: 'nextLevel',
  ']': 'nextLevel',
  PageDown: 'previousLevel',
  p: 'previousLevel',
  '[': 'previousLevel',
};

/**
 * Command for a DOM-style key name, or null when the key means nothing here
 */
export function commandForKey(key: string): Command | null {
  const name = key.length === 1 ? key.toLowerCase() : key;
  return Object.hasOwn(KEY_COMMANDS, name) ? KEY_COMMANDS[name] : null;
}

// ============================================================================
// Screen zones
// ============================================================================

export interface ScreenZone {
  horizontalSectors: number;
  verticalSectors: number;
  /** 1-based sector column */
  column: number;
  /** 1-based sector row */
  row: number;
}

export interface ZoneBounds {
  xMin: number;
  yMin: number;
  xMax: number;
  yMax: number;
}

function zone(column: number, row: number): ScreenZone {
  return { horizontalSectors: 20, verticalSectors: 10, column, row };
}

export const SCREEN_ZONES: ReadonlyArray<{ command: Command; zone: ScreenZone }> = [
  { command: 'moveRight', zone: zone(20, 9) },
  { command: 'moveLeft', zone: zone(18, 9) },
  { command: 'moveUp', zone: zone(19, 8) },
  { command: 'moveDown', zone: zone(19, 10) },
  { command: 'undo', zone: zone(1, 1) },
  { command: 'nextLevel', zone: zone(20, 1) },
  { command: 'previousLevel', zone: zone(19, 1) },
];

/**
 * Half-open rectangle [xMin, xMax) x [yMin, yMax) covered by a zone
 */
export function zoneBounds(z: ScreenZone, viewport: Size): ZoneBounds {
  const sectorWidth = Math.floor(viewport.width / z.horizontalSectors);
  const sectorHeight = Math.floor(viewport.height / z.verticalSectors);

  return {
    xMin: sectorWidth * (z.column - 1),
    xMax: sectorWidth * z.column,
    yMin: sectorHeight * (z.row - 1),
    yMax: sectorHeight * z.row,
  };
}

export function inScreenZone(z: ScreenZone, viewport: Size, x: number, y: number): boolean {
  const { xMin, yMin, xMax, yMax } = zoneBounds(z, viewport);
  return x >= xMin && x < xMax && y >= yMin && y < yMax;
}

/**
 * Command of the zone under a 0-based point, or null
 */
export function commandAtPoint(x: number, y: number, viewport: Size): Command | null {
  for (const entry of SCREEN_ZONES) {
    if (inScreenZone(entry.zone, viewport, x, y)) return entry.command;
  }
  return null;
}

// ============================================================================
// Mouse reports
// ============================================================================

export const MOUSE_REPORTING_ON = '\x1b[?1000h\x1b[?1006h';
export const MOUSE_REPORTING_OFF = '\x1b[?1006l\x1b[?1000l';

export interface MousePress {
  /** 0-based column */
  x: number;
  /** 0-based row */
  y: number;
  button: number;
}

const SGR_MOUSE = /^\x1b\[<(\d+);(\d+);(\d+)([Mm])$/;

/**
 * Parse an SGR mouse report (ESC [ < b ; col ; row M). Releases, wheel
 * events and anything else that is not a button press give null.
 */
export function parseMouseReport(data: string): MousePress | null {
  const match = SGR_MOUSE.exec(data);
  if (!match || match[4] !== 'M') return null;

  const button = Number(match[1]);
  // Wheel and motion events carry the 64 and 32 flags
  if (button & 0b1100000) return null;

  return { x: Number(match[2]) - 1, y: Number(match[3]) - 1, button: button & 0b11 };
}
