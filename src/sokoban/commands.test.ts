import { describe, it, expect } from 'vitest';
import {
  SCREEN_ZONES,
  commandAtPoint,
  commandForKey,
  inScreenZone,
  parseMouseReport,
  zoneBounds,
} from './commands';

describe('commandForKey', () => {
  it('maps arrows and WASD to moves', () => {
    expect(commandForKey('ArrowUp')).toBe('moveUp');
    expect(commandForKey('ArrowDown')).toBe('moveDown');
    expect(commandForKey('ArrowLeft')).toBe('moveLeft');
    expect(commandForKey('ArrowRight')).toBe('moveRight');
    expect(commandForKey('w')).toBe('moveUp');
    expect(commandForKey('A')).toBe('moveLeft');
  });

  it('maps undo and level keys', () => {
    expect(commandForKey('Backspace')).toBe('undo');
    expect(commandForKey('u')).toBe('undo');
    expect(commandForKey('Z')).toBe('undo');
    expect(commandForKey('PageUp')).toBe('nextLevel');
    expect(commandForKey(']')).toBe('nextLevel');
    expect(commandForKey('PageDown')).toBe('previousLevel');
    expect(commandForKey('p')).toBe('previousLevel');
  });

  it('returns null for other keys', () => {
    expect(commandForKey('Enter')).toBeNull();
    expect(commandForKey('x')).toBeNull();
    expect(commandForKey('arrowup')).toBeNull();
  });

  it('does not match names inherited from Object', () => {
    expect(commandForKey('constructor')).toBeNull();
    expect(commandForKey('toString')).toBeNull();
    expect(commandForKey('__proto__')).toBeNull();
  });
});

describe('screen zones', () => {
  const viewport = { width: 80, height: 24 };

  it('cuts the viewport into whole sectors', () => {
    const undo = SCREEN_ZONES.find(entry => entry.command === 'undo');
    expect(undo && zoneBounds(undo.zone, viewport)).toEqual({ xMin: 0, xMax: 4, yMin: 0, yMax: 2 });
  });

  it('treats the far edges as outside the zone', () => {
    const zone = { horizontalSectors: 20, verticalSectors: 10, column: 1, row: 1 };
    expect(inScreenZone(zone, viewport, 0, 0)).toBe(true);
    expect(inScreenZone(zone, viewport, 3, 1)).toBe(true);
    expect(inScreenZone(zone, viewport, 4, 0)).toBe(false);
    expect(inScreenZone(zone, viewport, 0, 2)).toBe(false);
  });

  it('finds the command under a point', () => {
    expect(commandAtPoint(0, 0, viewport)).toBe('undo');
    expect(commandAtPoint(77, 1, viewport)).toBe('nextLevel');
    expect(commandAtPoint(73, 0, viewport)).toBe('previousLevel');
    expect(commandAtPoint(78, 17, viewport)).toBe('moveRight');
    expect(commandAtPoint(70, 17, viewport)).toBe('moveLeft');
    expect(commandAtPoint(73, 15, viewport)).toBe('moveUp');
    expect(commandAtPoint(73, 19, viewport)).toBe('moveDown');
  });

  it('returns null away from every zone', () => {
    expect(commandAtPoint(40, 12, viewport)).toBeNull();
    expect(commandAtPoint(73, 17, viewport)).toBeNull();
    // Rows past the last whole sector belong to no zone
    expect(commandAtPoint(77, 21, viewport)).toBeNull();
  });
});

describe('parseMouseReport', () => {
  it('reads a left button press as 0-based cell', () => {
    expect(parseMouseReport('\x1b[<0;10;5M')).toEqual({ x: 9, y: 4, button: 0 });
  });

  it('keeps the button number', () => {
    expect(parseMouseReport('\x1b[<2;3;4M')).toEqual({ x: 2, y: 3, button: 2 });
  });

  it('ignores releases, wheel and motion events', () => {
    expect(parseMouseReport('\x1b[<0;10;5m')).toBeNull();
    expect(parseMouseReport('\x1b[<64;1;1M')).toBeNull();
    expect(parseMouseReport('\x1b[<32;1;1M')).toBeNull();
  });

  it('ignores anything that is not a mouse report', () => {
    expect(parseMouseReport('a')).toBeNull();
    expect(parseMouseReport('\x1b[A')).toBeNull();
  });
});
