/**
 * Sokoban - Level Catalog
 *
 * Built-in levels live in levels.json as packed hex strings. Each entry
 * also carries a reference solution in LURD notation (l/u/r/d walk,
 * uppercase pushes), which the test-suite replays to prove the level
 * can be solved.
 */

import levelData from './levels.json';
import type { LevelCatalog } from './gameState';
import type { Direction } from './tiles';

export interface LevelEntry {
  name: string;
  /** Packed level bytes as hex */
  data: string;
  solution?: string;
}

export function hexToBytes(hex: string): Uint8Array {
  if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
    throw new Error(`Invalid hex level data: '${hex}'`);
  }
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes, b => b.toString(16).padStart(2, '0')).join('');
}

/**
 * Catalog over a list of entries. Buffers are decoded from hex up front
 * and handed out as copies, so callers can never alter the corpus.
 */
export function createLevelCatalog(entries: LevelEntry[]): LevelCatalog {
  if (entries.length === 0) {
    throw new Error('A level catalog needs at least one level');
  }
  const buffers = entries.map(entry => hexToBytes(entry.data));

  return {
    count: entries.length,
    load: (index: number) => {
      const buffer = buffers[index];
      if (!buffer) throw new RangeError(`No level at index ${index}`);
      return buffer.slice();
    },
    name: (index: number) => entries[index]?.name ?? `LEVEL ${index + 1}`,
  };
}

export const LEVEL_ENTRIES: LevelEntry[] = levelData.levels;

export const builtinLevels: LevelCatalog = createLevelCatalog(LEVEL_ENTRIES);

const SOLUTION_MOVES: Record<string, Direction> = {
  u: 'up',
  d: 'down',
  l: 'left',
  r: 'right',
};

/**
 * Expand a LURD move string into directions
 */
export function parseSolution(text: string): Direction[] {
  return Array.from(text.replace(/\s+/g, ''), char => {
    const direction = SOLUTION_MOVES[char.toLowerCase()];
    if (!direction) throw new Error(`Unknown move '${char}' in solution`);
    return direction;
  });
}
