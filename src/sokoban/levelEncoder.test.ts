import { describe, it, expect } from 'vitest';
import { decodeLevel } from './levelDecoder';
import {
  LevelTextError,
  encodeLevel,
  formatLevelText,
  parseLevelText,
  splitLevelText,
} from './levelEncoder';
import { Tile, createGrid } from './tiles';

describe('encodeLevel', () => {
  it('merges equal neighbours into one run', () => {
    const grid = createGrid(2, 2);
    grid[0][0] = Tile.Wall;
    grid[1][1] = Tile.Wall;

    // 0 01, 1 000 00, 0 01 -> 0011 0000 0001 (padded)
    const bytes = encodeLevel({ width: 2, height: 2, grid, player: { x: 1, y: 1 } });
    expect(Array.from(bytes)).toEqual([2, 2, 0x30, 0x10, 1, 1]);
  });

  it('splits runs longer than a counter can hold', () => {
    const grid = createGrid(10, 1, Tile.Wall);

    // 1 111 01, 0 01
    const bytes = encodeLevel({ width: 10, height: 1, grid, player: { x: 3, y: 0 } });
    expect(Array.from(bytes)).toEqual([10, 1, 0xf4, 0x80, 3, 0]);
  });

  it('rejects values that do not fit in a byte', () => {
    const grid = createGrid(256, 1);
    expect(() => encodeLevel({ width: 256, height: 1, grid, player: { x: 0, y: 0 } })).toThrow(RangeError);
    expect(() => encodeLevel({ width: 2, height: 1, grid: createGrid(2, 1), player: { x: -1, y: 0 } }))
      .toThrow('Player x -1 does not fit in a byte');
  });
});

describe('parseLevelText', () => {
  it('reads tiles and the player', () => {
    const layout = parseLevelText('#####\n#@$.#\n#####');

    expect(layout.width).toBe(5);
    expect(layout.height).toBe(3);
    expect(layout.player).toEqual({ x: 1, y: 1 });
    expect(layout.grid[0][0]).toBe(Tile.Wall);
    expect(layout.grid[1][1]).toBe(Tile.Empty);
    expect(layout.grid[2][1]).toBe(Tile.Box);
    expect(layout.grid[3][1]).toBe(Tile.Goal);
  });

  it('puts a goal under a player drawn as +', () => {
    const layout = parseLevelText('#*+#');
    expect(layout.player).toEqual({ x: 2, y: 0 });
    expect(layout.grid[1][0]).toBe(Tile.PlacedBox);
    expect(layout.grid[2][0]).toBe(Tile.Goal);
  });

  it('pads short rows with floor and accepts - and _ as floor', () => {
    const layout = parseLevelText('####\n#@\n#-_#');
    expect(layout.width).toBe(4);
    expect(layout.grid[2][1]).toBe(Tile.Empty);
    expect(layout.grid[3][1]).toBe(Tile.Empty);
    expect(layout.grid[1][2]).toBe(Tile.Empty);
    expect(layout.grid[2][2]).toBe(Tile.Empty);
  });

  it('ignores blank lines around the level and carriage returns', () => {
    const layout = parseLevelText('\n\r\n###\r\n#@#\r\n###\r\n\n');
    expect(layout.height).toBe(3);
    expect(layout.player).toEqual({ x: 1, y: 1 });
  });

  it('reports malformed text', () => {
    expect(() => parseLevelText('  \n ')).toThrow('Level text is empty');
    expect(() => parseLevelText('##\n#x@')).toThrow("Unknown character 'x' at line 2, column 2");
    expect(() => parseLevelText('#@ @#')).toThrow('Second player at line 1, column 4');
    expect(() => parseLevelText('#$.#')).toThrow('Level has no player (@ or +)');
    expect(() => parseLevelText('#$.#')).toThrow(LevelTextError);
  });
});

describe('formatLevelText', () => {
  it('draws the level back as text without trailing spaces', () => {
    const text = ['  ####', '###  #', '#.$@ #', '#*  .#', '######'].join('\n');
    expect(formatLevelText(parseLevelText(text))).toBe(text);
  });

  it('draws + when the player stands on a goal', () => {
    expect(formatLevelText(parseLevelText('#.+ '))).toBe('#.+');
  });

  it('matches a decode of the packed level', () => {
    const text = ['#######', '#.$ @ #', '# *   #', '#######'].join('\n');
    const layout = parseLevelText(text);
    expect(formatLevelText(decodeLevel(encodeLevel(layout)))).toBe(text);
  });
});

describe('splitLevelText', () => {
  it('splits on blank lines and drops comments', () => {
    const text = '; pack\n###\n#@#\n\n\n; second\n###\n#+#\n';
    expect(splitLevelText(text)).toEqual(['###\n#@#', '###\n#+#']);
  });

  it('returns nothing for a file of comments', () => {
    expect(splitLevelText('; only\n\n; comments\n')).toEqual([]);
  });
});
