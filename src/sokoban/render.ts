/**
 * Scene rendering for character terminals
 *
 * Turns a read-only snapshot into one ANSI string: HUD, playfield, touch
 * zone icons and a hint line. Each tile is two characters wide and one
 * row tall at scale 1.
 */

import type { ThemePalette } from '../themes';
import { centerColumn } from '../utils';
import { SCREEN_ZONES, zoneBounds, type Command } from './commands';
import type { Size } from './levelDecoder';
import type { RenderSnapshot } from './gameState';
import type { Direction, Tile } from './tiles';

// ============================================================================
// Constants
// ============================================================================

export const TILE_CELLS: Size = { width: 2, height: 1 };

/** Rows above the playfield (HUD + spacer) */
export const HEADER_ROWS = 2;
/** Rows below the playfield (spacer + hint) */
export const FOOTER_ROWS = 2;

const MIN_COLS = 40;
const MIN_ROWS = 12;

const TILE_GLYPHS: Record<Tile, string> = {
  empty: '  ',
  wall: '██',
  box: '▒▒',
  placedBox: '▓▓',
  goal: '··',
};

const PLAYER_GLYPHS: Record<Direction, string> = {
  up: '/\\',
  down: '\\/',
  left: '<(',
  right: ')>',
};

const ZONE_ICONS: Record<Command, string> = {
  moveUp: '▲',
  moveDown: '▼',
  moveLeft: '◀',
  moveRight: '▶',
  undo: '↶',
  nextLevel: '»',
  previousLevel: '«',
};

export const HINT_TEXT = 'Arrows: MOVE  U: UNDO  PgUp/PgDn: LEVEL  ESC: MENU';

export interface RenderOptions {
  cols: number;
  rows: number;
  levelName: string;
  levelCount: number;
  palette: ThemePalette;
  /** Draw the pointer zone icons */
  showZones?: boolean;
  /** Centered message over the playfield */
  banner?: string;
}

// ============================================================================
// Layout
// ============================================================================

/**
 * Area left for the playfield once HUD and hint rows are reserved
 */
export function playfieldViewport(cols: number, rows: number): Size {
  return { width: cols, height: Math.max(1, rows - HEADER_ROWS - FOOTER_ROWS) };
}

/**
 * Terminal size needed to draw a level at scale 1
 */
export function requiredSize(width: number, height: number): Size {
  return {
    width: Math.max(MIN_COLS, width * TILE_CELLS.width),
    height: Math.max(MIN_ROWS, height * TILE_CELLS.height + HEADER_ROWS + FOOTER_ROWS),
  };
}

export function formatHud(snapshot: RenderSnapshot, levelName: string, levelCount: number): string {
  const level = `${String(snapshot.levelIndex + 1).padStart(2, '0')}/${String(levelCount).padStart(2, '0')}`;
  const moves = String(snapshot.moves).padStart(4, '0');
  return `LEVEL ${level}  ${levelName}  MOVES ${moves}  BOXES ${snapshot.boxesLeft}`;
}

// ============================================================================
// Drawing
// ============================================================================

function scaleGlyph(glyph: string, scale: number): string {
  return Array.from(glyph, char => char.repeat(scale)).join('');
}

function tileColor(tile: Tile, palette: ThemePalette): string {
  switch (tile) {
    case 'wall': return palette.wall;
    case 'box': return palette.box;
    case 'placedBox': return palette.placedBox;
    case 'goal': return palette.goal;
    default: return '';
  }
}

function renderTooSmall(cols: number, rows: number, need: Size, accent: string): string {
  const msg1 = 'Terminal too small!';
  const msg2 = `Need: ${need.width}x${need.height}  Have: ${cols}x${rows}`;
  const centerY = Math.max(2, Math.floor(rows / 2));
  let output = '';
  output += `\x1b[${centerY - 1};${centerColumn(cols, msg1)}H${accent}${msg1}\x1b[0m`;
  output += `\x1b[${centerY + 1};${centerColumn(cols, msg2)}H\x1b[2m${msg2}\x1b[0m`;
  return output;
}

function renderZones(cols: number, rows: number, accent: string): string {
  let output = '';
  const viewport = { width: cols, height: rows };
  for (const { command, zone } of SCREEN_ZONES) {
    const { xMin, yMin, xMax, yMax } = zoneBounds(zone, viewport);
    if (xMax <= xMin || yMax <= yMin) continue;
    const x = xMin + Math.floor((xMax - xMin) / 2);
    const y = yMin + Math.floor((yMax - yMin) / 2);
    output += `\x1b[${y + 1};${x + 1}H\x1b[2m${accent}${ZONE_ICONS[command]}\x1b[0m`;
  }
  return output;
}

/**
 * Render the whole scene. The snapshot's transform must be an integral
 * fit of the level into playfieldViewport(cols, rows) at TILE_CELLS.
 */
export function renderScene(snapshot: RenderSnapshot, options: RenderOptions): string {
  const { cols, rows, palette } = options;
  let output = '\x1b[2J\x1b[H';

  const need = requiredSize(snapshot.width, snapshot.height);
  if (cols < need.width || rows < need.height) {
    return output + renderTooSmall(cols, rows, need, palette.accent);
  }

  const hud = formatHud(snapshot, options.levelName, options.levelCount);
  output += `\x1b[1;${centerColumn(cols, hud)}H${palette.accent}\x1b[1m${hud}\x1b[0m`;

  const { scale, offsetX, offsetY } = snapshot.transform;
  const left = 1 + offsetX;
  const top = 1 + HEADER_ROWS + offsetY;
  const tileWidth = TILE_CELLS.width * scale;
  const tileHeight = TILE_CELLS.height * scale;

  for (let y = 0; y < snapshot.height; y++) {
    for (let x = 0; x < snapshot.width; x++) {
      const isPlayer = x === snapshot.player.x && y === snapshot.player.y;
      const tile = snapshot.grid[x][y];
      const glyph = scaleGlyph(isPlayer ? PLAYER_GLYPHS[snapshot.facing] : TILE_GLYPHS[tile], scale);
      const color = isPlayer ? palette.player : tileColor(tile, palette);
      for (let row = 0; row < tileHeight; row++) {
        output += `\x1b[${top + y * tileHeight + row};${left + x * tileWidth}H${color}${glyph}\x1b[0m`;
      }
    }
  }

  if (options.showZones) {
    output += renderZones(cols, rows, palette.accent);
  }

  if (options.banner) {
    const bannerRow = top + Math.floor((snapshot.height * tileHeight) / 2);
    const text = ` ${options.banner} `;
    output += `\x1b[${bannerRow};${centerColumn(cols, text)}H\x1b[1;7m${palette.accent}${text}\x1b[0m`;
  }

  output += `\x1b[${rows};${centerColumn(cols, HINT_TEXT)}H\x1b[2m${palette.accent}${HINT_TEXT}\x1b[0m`;

  return output;
}
