/**
 * terminal-sokoban
 *
 * Sokoban for xterm.js and the command line.
 *
 * Library usage (xterm.js):
 *   import { runSokobanGame, setTheme } from 'terminal-sokoban';
 *   setTheme('amber');
 *   const controller = runSokobanGame(terminal, { onQuit: () => terminal.dispose() });
 *
 * Headless usage:
 *   const session = createSession(builtinLevels, 0);
 *   applyCommand(builtinLevels, session, 'moveLeft');
 *
 * CLI usage:
 *   sokoban --level 3
 */

export {
  // Game runner
  runSokobanGame,
  type SokobanController,
  type SokobanOptions,
} from './sokoban';

export {
  // Level decoding
  decodeLevel,
  computeDisplayTransform,
  MalformedLevelError,
  DEFAULT_TILE_SIZE,
  DEFAULT_VIEWPORT,
  MAX_RUN,
  type Level,
  type Size,
  type DisplayTransform,
  type DisplayTransformOptions,
  type DecodeOptions,
} from './sokoban/levelDecoder';

export {
  // Level authoring
  encodeLevel,
  parseLevelText,
  formatLevelText,
  splitLevelText,
  LevelTextError,
  type LevelLayout,
} from './sokoban/levelEncoder';

export {
  // Game state
  createSession,
  attemptMove,
  stepLevel,
  undo,
  goToLevel,
  nextLevel,
  previousLevel,
  restartLevel,
  applyCommand,
  countLooseBoxes,
  isSolved,
  createSnapshot,
  type LevelCatalog,
  type Session,
  type MoveOutcome,
  type CommandResult,
  type RenderSnapshot,
  type SnapshotOptions,
} from './sokoban/gameState';

export {
  // Level catalog
  builtinLevels,
  createLevelCatalog,
  hexToBytes,
  bytesToHex,
  parseSolution,
  LEVEL_ENTRIES,
  type LevelEntry,
} from './sokoban/levels';

export {
  // Commands and pointer zones
  commandForKey,
  commandAtPoint,
  inScreenZone,
  zoneBounds,
  parseMouseReport,
  SCREEN_ZONES,
  MOUSE_REPORTING_ON,
  MOUSE_REPORTING_OFF,
  type Command,
  type ScreenZone,
  type ZoneBounds,
  type MousePress,
} from './sokoban/commands';

export {
  // Rendering
  renderScene,
  formatHud,
  playfieldViewport,
  requiredSize,
  TILE_CELLS,
  type RenderOptions,
} from './sokoban/render';

export {
  Tile,
  TILE_CODES,
  TILE_CHARS,
  DIRECTIONS,
  directionDelta,
  type Direction,
  type Grid,
  type Point,
} from './sokoban/tiles';

export {
  // Theme and terminal utilities
  setTheme,
  getTheme,
  getCurrentThemeColor,
  getCurrentPalette,
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
  type GameTerminal,
  type KeyPress,
} from './utils';

export type { ThemeName, ThemePalette } from './themes';
