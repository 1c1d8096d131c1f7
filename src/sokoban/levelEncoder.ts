/**
 * Level authoring helpers
 *
 * Packs grids into the run-length level format read by decodeLevel, and
 * converts between grids and the common plain-text notation:
 *
 *   #  wall        $  box          @  player
 *   .  goal        *  box on goal  +  player on goal
 *   space, - or _  empty floor
 */

import { MAX_RUN } from './levelDecoder';
import { TILE_CHARS, TILE_CODES, Tile, createGrid, type Grid, type Point } from './tiles';

export interface LevelLayout {
  width: number;
  height: number;
  grid: Grid;
  player: Point;
}

export class LevelTextError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LevelTextError';
  }
}

// ============================================================================
// Packing
// ============================================================================

function assertByte(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 0 || value > 255) {
    throw new RangeError(`${label} ${value} does not fit in a byte`);
  }
}

function runBits(run: number): string {
  if (run === 1) return '0';
  return '1' + (run - 2).toString(2).padStart(3, '0');
}

/**
 * Pack a level into its byte representation
 */
export function encodeLevel(level: LevelLayout): Uint8Array {
  const { width, height, grid, player } = level;
  assertByte(width, 'Width');
  assertByte(height, 'Height');
  assertByte(player.x, 'Player x');
  assertByte(player.y, 'Player y');

  const total = width * height;
  const tileAt = (p: number): Tile => grid[p % width][Math.floor(p / width)];

  let bits = '';
  let p = 0;
  while (p < total) {
    const tile = tileAt(p);
    let run = 1;
    while (p + run < total && run < MAX_RUN && tileAt(p + run) === tile) {
      run++;
    }
    bits += runBits(run) + TILE_CODES[tile];
    p += run;
  }

  // Zero padding is never read: decoding stops once the grid is full
  const bodyLength = Math.ceil(bits.length / 8);
  bits = bits.padEnd(bodyLength * 8, '0');

  const bytes = new Uint8Array(2 + bodyLength + 2);
  bytes[0] = width;
  bytes[1] = height;
  for (let i = 0; i < bodyLength; i++) {
    bytes[2 + i] = parseInt(bits.slice(i * 8, i * 8 + 8), 2);
  }
  bytes[bytes.length - 2] = player.x;
  bytes[bytes.length - 1] = player.y;
  return bytes;
}

// ============================================================================
// Plain text
// ============================================================================

const CHAR_TILES: Record<string, Tile> = {
  ' ': Tile.Empty,
  '-': Tile.Empty,
  '_': Tile.Empty,
  '#': Tile.Wall,
  '$': Tile.Box,
  '.': Tile.Goal,
  '*': Tile.PlacedBox,
  '@': Tile.Empty,
  '+': Tile.Goal,
};

/**
 * Parse a single level drawn in plain text
 */
export function parseLevelText(text: string): LevelLayout {
  const lines = text.replace(/\r/g, '').split('\n');
  while (lines.length > 0 && lines[0].trim() === '') lines.shift();
  while (lines.length > 0 && lines[lines.length - 1].trim() === '') lines.pop();

  if (lines.length === 0) {
    throw new LevelTextError('Level text is empty');
  }

  const width = Math.max(...lines.map(line => line.length));
  const height = lines.length;
  const grid = createGrid(width, height);
  let player: Point | null = null;

  for (let y = 0; y < height; y++) {
    const line = lines[y];
    for (let x = 0; x < line.length; x++) {
      const char = line[x];
      const tile = CHAR_TILES[char];
      if (tile === undefined) {
        throw new LevelTextError(`Unknown character '${char}' at line ${y + 1}, column ${x + 1}`);
      }
      if (char === '@' || char === '+') {
        if (player) {
          throw new LevelTextError(`Second player at line ${y + 1}, column ${x + 1}`);
        }
        player = { x, y };
      }
      grid[x][y] = tile;
    }
  }

  if (!player) {
    throw new LevelTextError('Level has no player (@ or +)');
  }

  return { width, height, grid, player };
}

/**
 * Draw a level as plain text, one line per row
 */
export function formatLevelText(level: LevelLayout): string {
  const lines: string[] = [];
  for (let y = 0; y < level.height; y++) {
    let line = '';
    for (let x = 0; x < level.width; x++) {
      const tile = level.grid[x][y];
      if (x === level.player.x && y === level.player.y) {
        line += tile === Tile.Goal ? '+' : '@';
      } else {
        line += TILE_CHARS[tile];
      }
    }
    lines.push(line.trimEnd());
  }
  return lines.join('\n');
}

/**
 * Split a file holding several levels separated by blank lines.
 * Lines starting with ';' are comments.
 */
export function splitLevelText(text: string): string[] {
  const levels: string[] = [];
  let current: string[] = [];

  for (const line of text.replace(/\r/g, '').split('\n')) {
    if (line.startsWith(';')) continue;
    if (line.trim() === '') {
      if (current.length > 0) levels.push(current.join('\n'));
      current = [];
      continue;
    }
    current.push(line);
  }
  if (current.length > 0) levels.push(current.join('\n'));

  return levels;
}
