/**
 * Sokoban Game State — Pure Game Logic
 *
 * A session is the current level index, the live level decoded from that
 * index, the player's facing and every move attempted since the level was
 * loaded. Moves update the session's own level in place; undo and level
 * changes hand back a new session.
 */

import {
  DEFAULT_TILE_SIZE,
  DEFAULT_VIEWPORT,
  MalformedLevelError,
  computeDisplayTransform,
  decodeLevel,
  type DisplayTransform,
  type Level,
  type Size,
} from './levelDecoder';
import { Tile, copyGrid, directionDelta, isBox, isFloor, type Direction, type Grid, type Point } from './tiles';
import type { Command } from './commands';

// ============================================================================
// Types
// ============================================================================

/** Source of packed levels, looked up by index */
export interface LevelCatalog {
  readonly count: number;
  load(index: number): Uint8Array;
  name(index: number): string;
}

export interface Session {
  levelIndex: number;
  source: Uint8Array;
  level: Level;
  facing: Direction;
  history: Direction[];
}

export interface MoveOutcome {
  /** Player changed cell */
  moved: boolean;
  /** A box changed cell */
  pushed: boolean;
  /** No loose box is left */
  solved: boolean;
}

export interface CommandResult {
  session: Session;
  outcome?: MoveOutcome;
  /** A solving move loaded the next level */
  advanced: boolean;
}

export interface RenderSnapshot {
  readonly grid: ReadonlyArray<ReadonlyArray<Tile>>;
  readonly width: number;
  readonly height: number;
  readonly player: Readonly<Point>;
  readonly facing: Direction;
  readonly levelIndex: number;
  readonly moves: number;
  readonly boxesLeft: number;
  readonly transform: DisplayTransform;
}

const INITIAL_FACING: Direction = 'up';

// ============================================================================
// Session creation
// ============================================================================

function clampIndex(catalog: LevelCatalog, index: number): number {
  return Math.max(0, Math.min(index, catalog.count - 1));
}

function loadSession(levelIndex: number, source: Uint8Array): Session {
  return {
    levelIndex,
    source,
    level: decodeLevel(source),
    facing: INITIAL_FACING,
    history: [],
  };
}

/**
 * Start a session at `index`, clamped into the catalog
 *
 * @throws MalformedLevelError when the level cannot be decoded
 */
export function createSession(catalog: LevelCatalog, index: number): Session {
  const levelIndex = clampIndex(catalog, index);
  return loadSession(levelIndex, catalog.load(levelIndex));
}

// ============================================================================
// Board rules
// ============================================================================

function tileAt(grid: Grid, x: number, y: number): Tile | undefined {
  return grid[x]?.[y];
}

/**
 * Apply one move to the level. Returns the outcome without touching
 * history or facing; cells outside the grid block like walls.
 */
export function stepLevel(level: Level, direction: Direction): Omit<MoveOutcome, 'solved'> {
  const { grid, player } = level;
  const { x: dx, y: dy } = directionDelta(direction);
  const tx = player.x + dx;
  const ty = player.y + dy;
  const target = tileAt(grid, tx, ty);

  if (isFloor(target)) {
    player.x = tx;
    player.y = ty;
    return { moved: true, pushed: false };
  }

  if (target !== undefined && isBox(target)) {
    const bx = tx + dx;
    const by = ty + dy;
    const beyond = tileAt(grid, bx, by);

    if (isFloor(beyond)) {
      grid[tx][ty] = target === Tile.PlacedBox ? Tile.Goal : Tile.Empty;
      grid[bx][by] = beyond === Tile.Goal ? Tile.PlacedBox : Tile.Box;
      player.x = tx;
      player.y = ty;
      return { moved: true, pushed: true };
    }
  }

  return { moved: false, pushed: false };
}

export function countLooseBoxes(level: Level): number {
  let boxesLeft = 0;
  for (const column of level.grid) {
    for (const tile of column) {
      if (tile === Tile.Box) boxesLeft++;
    }
  }
  return boxesLeft;
}

export function isSolved(level: Level): boolean {
  return countLooseBoxes(level) === 0;
}

// ============================================================================
// Moves
// ============================================================================

/**
 * Attempt a move. The attempt is recorded even when a wall blocks it.
 */
export function attemptMove(session: Session, direction: Direction): MoveOutcome {
  session.facing = direction;
  session.history.push(direction);
  const { moved, pushed } = stepLevel(session.level, direction);
  return { moved, pushed, solved: isSolved(session.level) };
}

/**
 * Rebuild the session without its last attempted move by replaying the
 * rest of the history from the freshly decoded level
 */
export function undo(session: Session): Session {
  if (session.history.length === 0) return session;

  const replay = session.history.slice(0, -1);
  const restored = loadSession(session.levelIndex, session.source);
  for (const direction of replay) {
    restored.facing = direction;
    stepLevel(restored.level, direction);
  }
  restored.history = replay;
  return restored;
}

// ============================================================================
// Level navigation
// ============================================================================

/**
 * Load a fresh session at `index`. A level that fails to decode is
 * refused and the current session is kept.
 */
export function goToLevel(catalog: LevelCatalog, session: Session, index: number): Session {
  const levelIndex = clampIndex(catalog, index);
  try {
    return loadSession(levelIndex, catalog.load(levelIndex));
  } catch (err) {
    if (!(err instanceof MalformedLevelError)) throw err;
    console.warn(`[Sokoban] Refusing level ${levelIndex + 1}: ${err.message}`);
    return session;
  }
}

export function nextLevel(catalog: LevelCatalog, session: Session): Session {
  return goToLevel(catalog, session, session.levelIndex + 1);
}

export function previousLevel(catalog: LevelCatalog, session: Session): Session {
  return goToLevel(catalog, session, session.levelIndex - 1);
}

export function restartLevel(catalog: LevelCatalog, session: Session): Session {
  return goToLevel(catalog, session, session.levelIndex);
}

// ============================================================================
// Command handling
// ============================================================================

const MOVE_COMMANDS: Partial<Record<Command, Direction>> = {
  moveUp: 'up',
  moveDown: 'down',
  moveLeft: 'left',
  moveRight: 'right',
};

/**
 * Run one command to completion
 */
export function applyCommand(catalog: LevelCatalog, session: Session, command: Command): CommandResult {
  const direction = MOVE_COMMANDS[command];
  if (direction) {
    const outcome = attemptMove(session, direction);
    if (outcome.solved) {
      return { session: nextLevel(catalog, session), outcome, advanced: true };
    }
    return { session, outcome, advanced: false };
  }

  switch (command) {
    case 'undo':
      return { session: undo(session), advanced: false };
    case 'nextLevel':
      return { session: nextLevel(catalog, session), advanced: false };
    case 'previousLevel':
      return { session: previousLevel(catalog, session), advanced: false };
    default:
      return { session, advanced: false };
  }
}

// ============================================================================
// Snapshot
// ============================================================================

export interface SnapshotOptions {
  viewport?: Size;
  tileSize?: Size;
  /** Whole-number scale for character grids */
  integral?: boolean;
}

/**
 * Read-only view of the session for a renderer
 */
export function createSnapshot(session: Session, options: SnapshotOptions = {}): RenderSnapshot {
  const { level } = session;
  const transform = computeDisplayTransform(
    level,
    options.tileSize ?? DEFAULT_TILE_SIZE,
    options.viewport ?? DEFAULT_VIEWPORT,
    { integral: options.integral }
  );

  return {
    grid: copyGrid(level.grid),
    width: level.width,
    height: level.height,
    player: { ...level.player },
    facing: session.facing,
    levelIndex: session.levelIndex,
    moves: session.history.length,
    boxesLeft: countLooseBoxes(level),
    transform,
  };
}
