/**
 * Packed level decoder
 *
 * Layout of a level buffer:
 *
 *   byte 0          width
 *   byte 1          height
 *   bytes 2..n-3    run-length bitstream, most significant bit first
 *   byte n-2        player x
 *   byte n-1        player y
 *
 * Each run is a counter followed by a tile symbol:
 *
 *   counter   0            1 tile
 *             1 d3 d2 d1   2 + d3*4 + d2*2 + d1 tiles (2..9)
 *   symbol    00 empty, 01 wall, 10 box, 110 goal, 111 box on goal
 *
 * Tiles are emitted in flat order; flat position p lands in grid[p % w][p / w].
 */

import { Tile, createGrid, type Grid, type Point } from './tiles';

// ============================================================================
// Types
// ============================================================================

export interface Size {
  width: number;
  height: number;
}

/** Uniform scale and centering offset that fit a level into a viewport */
export interface DisplayTransform {
  scale: number;
  offsetX: number;
  offsetY: number;
}

export interface Level {
  width: number;
  height: number;
  grid: Grid;
  player: Point;
  display: DisplayTransform;
}

export interface DecodeOptions {
  tileSize?: Size;
  viewport?: Size;
}

export class MalformedLevelError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedLevelError';
  }
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_TILE_SIZE: Size = { width: 64, height: 64 };
export const DEFAULT_VIEWPORT: Size = { width: 1900, height: 1000 };

const PROLOG_BYTES = 2;
const EPILOG_BYTES = 2;
/** Longest run a single counter can encode */
export const MAX_RUN = 9;

// ============================================================================
// Bit reader
// ============================================================================

class BitReader {
  private position = 0;
  private readonly end: number;

  constructor(private readonly bytes: Uint8Array, start: number, end: number) {
    this.position = start * 8;
    this.end = end * 8;
  }

  read(): boolean {
    if (this.position >= this.end) {
      throw new MalformedLevelError('Bitstream ended before the grid was filled');
    }
    const byte = this.bytes[this.position >> 3];
    const bit = 7 - (this.position & 7);
    this.position++;
    return (byte & (1 << bit)) !== 0;
  }

  readBits(count: number): number {
    let value = 0;
    for (let i = 0; i < count; i++) {
      value = (value << 1) | (this.read() ? 1 : 0);
    }
    return value;
  }
}

function readRunLength(reader: BitReader): number {
  if (!reader.read()) return 1;
  return 2 + reader.readBits(3);
}

function readTile(reader: BitReader): Tile {
  if (!reader.read()) {
    return reader.read() ? Tile.Wall : Tile.Empty;
  }
  if (!reader.read()) return Tile.Box;
  return reader.read() ? Tile.PlacedBox : Tile.Goal;
}

// ============================================================================
// Decoding
// ============================================================================

/**
 * Decode a packed level buffer.
 *
 * @throws MalformedLevelError when the buffer cannot describe a playable grid
 */
export function decodeLevel(buffer: Uint8Array, options: DecodeOptions = {}): Level {
  if (buffer.length < PROLOG_BYTES + EPILOG_BYTES) {
    throw new MalformedLevelError(`Level buffer too short (${buffer.length} bytes)`);
  }

  const width = buffer[0];
  const height = buffer[1];
  const total = width * height;
  if (total === 0) {
    throw new MalformedLevelError(`Level has no cells (${width}x${height})`);
  }

  const player = { x: buffer[buffer.length - 2], y: buffer[buffer.length - 1] };
  if (player.x >= width || player.y >= height) {
    throw new MalformedLevelError(
      `Player start (${player.x},${player.y}) outside ${width}x${height} grid`
    );
  }

  const reader = new BitReader(buffer, PROLOG_BYTES, buffer.length - EPILOG_BYTES);
  const grid = createGrid(width, height);

  // Every run emits at least one tile, so this loop runs at most `total` times
  let emitted = 0;
  while (emitted !== total) {
    const run = readRunLength(reader);
    const tile = readTile(reader);
    if (emitted + run > total) {
      throw new MalformedLevelError(
        `Run of ${run} at tile ${emitted} overflows ${width}x${height} grid`
      );
    }
    for (let i = 0; i < run; i++) {
      grid[emitted % width][Math.floor(emitted / width)] = tile;
      emitted++;
    }
  }

  return {
    width,
    height,
    grid,
    player,
    display: computeDisplayTransform(
      { width, height },
      options.tileSize ?? DEFAULT_TILE_SIZE,
      options.viewport ?? DEFAULT_VIEWPORT
    ),
  };
}

// ============================================================================
// Display transform
// ============================================================================

export interface DisplayTransformOptions {
  /** Whole-number scale of at least 1, centred on both axes (character grids) */
  integral?: boolean;
}

/**
 * Fit a grid of `size` tiles into `viewport`, keeping the aspect ratio
 */
export function computeDisplayTransform(
  size: Size,
  tileSize: Size,
  viewport: Size,
  options: DisplayTransformOptions = {}
): DisplayTransform {
  const contentWidth = tileSize.width * size.width;
  const contentHeight = tileSize.height * size.height;

  const factorW = viewport.width / contentWidth;
  const factorH = viewport.height / contentHeight;

  if (options.integral) {
    const scale = Math.max(1, Math.floor(Math.min(factorW, factorH)));
    return {
      scale,
      offsetX: Math.max(0, Math.floor((viewport.width - scale * contentWidth) / 2)),
      offsetY: Math.max(0, Math.floor((viewport.height - scale * contentHeight) / 2)),
    };
  }

  if (factorW > factorH) {
    return { scale: factorH, offsetX: (viewport.width - factorH * contentWidth) / 2, offsetY: 0 };
  }
  return { scale: factorW, offsetX: 0, offsetY: (viewport.height - factorW * contentHeight) / 2 };
}
