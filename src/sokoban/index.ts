/**
 * Sokoban
 *
 * Push every box onto a goal. Levels are decoded from the packed corpus,
 * undo replays the move history, solving a level loads the next one.
 */

import { getCurrentPalette, enterAlternateBuffer, exitAlternateBuffer, type GameTerminal } from '../utils';
import { PAUSE_MENU_ITEMS, checkShortcut, navigateMenu, renderSimpleMenu } from '../shared/menu';
import {
  MOUSE_REPORTING_OFF,
  MOUSE_REPORTING_ON,
  commandAtPoint,
  commandForKey,
  parseMouseReport,
  type Command,
} from './commands';
import {
  applyCommand,
  createSession,
  createSnapshot,
  restartLevel,
  type LevelCatalog,
  type RenderSnapshot,
  type Session,
} from './gameState';
import { builtinLevels } from './levels';
import { TILE_CELLS, playfieldViewport, renderScene } from './render';

/**
 * Sokoban Game Controller
 */
export interface SokobanController {
  stop: () => void;
  isRunning: boolean;
  /** Current state as the renderer sees it */
  readonly snapshot: RenderSnapshot;
}

export interface SokobanOptions {
  catalog?: LevelCatalog;
  startLevel?: number;
  /** Enable mouse reporting and the on-screen control zones */
  mouse?: boolean;
  onQuit?: () => void;
}

const START_DELAY_MS = 50;
const FRAME_MS = 50;
const BANNER_FRAMES = 30;

// ============================================================================
// MAIN GAME FUNCTION
// ============================================================================

/**
 * Run Sokoban on a terminal
 *
 * @throws MalformedLevelError when the start level cannot be decoded
 */
export function runSokobanGame(terminal: GameTerminal, options: SokobanOptions = {}): SokobanController {
  const catalog = options.catalog ?? builtinLevels;
  const mouse = options.mouse ?? true;

  // -------------------------------------------------------------------------
  // STATE
  // -------------------------------------------------------------------------
  let running = true;
  let paused = false;
  let pauseMenuSelection = 0;
  let session: Session = createSession(catalog, options.startLevel ?? 0);
  let banner = '';
  let bannerFrames = 0;

  function snapshot(): RenderSnapshot {
    return createSnapshot(session, {
      viewport: playfieldViewport(terminal.cols, terminal.rows),
      tileSize: TILE_CELLS,
      integral: true,
    });
  }

  // -------------------------------------------------------------------------
  // CONTROLLER
  // -------------------------------------------------------------------------
  const controller: SokobanController = {
    stop: () => {
      if (!running) return;
      running = false;
    },
    get isRunning() { return running; },
    get snapshot() { return snapshot(); },
  };

  // -------------------------------------------------------------------------
  // GAME LOGIC
  // -------------------------------------------------------------------------

  function runCommand(command: Command) {
    const previousIndex = session.levelIndex;
    const result = applyCommand(catalog, session, command);
    session = result.session;

    if (result.advanced) {
      banner = session.levelIndex === previousIndex ? 'ALL LEVELS CLEAR' : 'LEVEL CLEAR';
      bannerFrames = BANNER_FRAMES;
    }
  }

  // -------------------------------------------------------------------------
  // RENDERING
  // -------------------------------------------------------------------------

  function render() {
    const cols = terminal.cols;
    const rows = terminal.rows;
    const palette = getCurrentPalette();

    if (bannerFrames > 0) bannerFrames--;

    let output = renderScene(snapshot(), {
      cols,
      rows,
      levelName: catalog.name(session.levelIndex),
      levelCount: catalog.count,
      palette,
      showZones: mouse && !paused,
      banner: bannerFrames > 0 ? banner : undefined,
    });

    if (paused) {
      const pauseMsg = '══ PAUSED ══';
      const centerX = Math.floor(cols / 2);
      const pauseY = Math.max(3, Math.floor(rows / 2) - 3);
      output += `\x1b[${pauseY};${centerX - Math.floor(pauseMsg.length / 2)}H\x1b[5m${palette.accent}${pauseMsg}\x1b[0m`;
      output += renderSimpleMenu(PAUSE_MENU_ITEMS, pauseMenuSelection, {
        centerX,
        startY: pauseY + 2,
        showShortcuts: false,
      });
    }

    terminal.write(output);
  }

  // -------------------------------------------------------------------------
  // GAME LOOP
  // -------------------------------------------------------------------------

  setTimeout(() => {
    if (!running) return;

    enterAlternateBuffer(terminal, 'sokoban');
    if (mouse) terminal.write(MOUSE_REPORTING_ON);

    const renderInterval = setInterval(() => {
      if (!running) { clearInterval(renderInterval); return; }
      render();
    }, FRAME_MS);

    function quit() {
      controller.stop();
      options.onQuit?.();
    }

    const keyListener = terminal.onKey(({ domEvent }) => {
      if (!running) { keyListener.dispose(); return; }

      domEvent.preventDefault();
      domEvent.stopPropagation();

      const key = domEvent.key.toLowerCase();

      if (key === 'escape') {
        paused = !paused;
        if (paused) pauseMenuSelection = 0;
        return;
      }

      if (paused) {
        const { newSelection, confirmed } = navigateMenu(
          pauseMenuSelection,
          PAUSE_MENU_ITEMS.length,
          key,
          domEvent
        );

        if (newSelection !== pauseMenuSelection) {
          pauseMenuSelection = newSelection;
          return;
        }

        const choice = confirmed ? pauseMenuSelection : checkShortcut(PAUSE_MENU_ITEMS, key);
        switch (choice) {
          case 0: paused = false; break;
          case 1: session = restartLevel(catalog, session); paused = false; break;
          case 2: quit(); break;
        }
        return;
      }

      const command = commandForKey(domEvent.key);
      if (command) runCommand(command);
    });

    const dataListener = terminal.onData(data => {
      if (!running || paused || !mouse) return;
      const press = parseMouseReport(data);
      if (!press || press.button !== 0) return;
      const command = commandAtPoint(press.x, press.y, { width: terminal.cols, height: terminal.rows });
      if (command) runCommand(command);
    });

    const originalStop = controller.stop;
    controller.stop = () => {
      if (!running) return;
      clearInterval(renderInterval);
      keyListener.dispose();
      dataListener.dispose();
      if (mouse) terminal.write(MOUSE_REPORTING_OFF);
      exitAlternateBuffer(terminal, 'sokoban');
      originalStop();
    };
  }, START_DELAY_MS);

  return controller;
}
