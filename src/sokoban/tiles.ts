/**
 * Sokoban tiles and directions
 *
 * Tiles are a closed set of string tags. The packed wire codes and the
 * plain-text characters only appear at the encode/decode boundaries.
 */

// ============================================================================
// Tiles
// ============================================================================

export const Tile = {
  Empty: 'empty',
  Wall: 'wall',
  Box: 'box',
  PlacedBox: 'placedBox',
  Goal: 'goal',
} as const;

export type Tile = (typeof Tile)[keyof typeof Tile];

/** Grid indexed grid[x][y] */
export type Grid = Tile[][];

/**
 * Bit codes of the packed level format, most significant bit first.
 * Box is two bits wide even though Goal and PlacedBox take three.
 */
export const TILE_CODES: Record<Tile, string> = {
  empty: '00',
  wall: '01',
  box: '10',
  goal: '110',
  placedBox: '111',
};

/** Characters of the plain-text level format */
export const TILE_CHARS: Record<Tile, string> = {
  empty: ' ',
  wall: '#',
  box: '$',
  goal: '.',
  placedBox: '*',
};

export function isBox(tile: Tile | undefined): boolean {
  return tile === Tile.Box || tile === Tile.PlacedBox;
}

/** Tiles the player may stand on or a box may be pushed onto */
export function isFloor(tile: Tile | undefined): boolean {
  return tile === Tile.Empty || tile === Tile.Goal;
}

// ============================================================================
// Directions
// ============================================================================

export type Direction = 'up' | 'down' | 'left' | 'right';

export const DIRECTIONS: readonly Direction[] = ['up', 'down', 'left', 'right'];

export interface Point {
  x: number;
  y: number;
}

const DELTAS: Record<Direction, Point> = {
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 },
};

export function directionDelta(direction: Direction): Point {
  return DELTAS[direction];
}

export function createGrid(width: number, height: number, fill: Tile = Tile.Empty): Grid {
  return Array(width).fill(null).map(() => Array<Tile>(height).fill(fill));
}

export function copyGrid(grid: Grid): Grid {
  return grid.map(column => [...column]);
}
