/**
 * CLI entry point for terminal-sokoban
 *
 * Provides a Node.js terminal adapter that maps stdin/stdout to the
 * GameTerminal interface, so the game runs in any terminal emulator.
 */

import { runSokobanGame } from './sokoban';
import { MalformedLevelError } from './sokoban/levelDecoder';
import { builtinLevels } from './sokoban/levels';
import { setTheme } from './utils';
import { DEFAULT_THEME, getThemeModes, isValidThemeMode, type ThemeName } from './themes';
import type { GameTerminal, KeyPress } from './utils';

// ---------------------------------------------------------------------------
// Node Terminal Adapter
// ---------------------------------------------------------------------------

interface Disposable {
  dispose: () => void;
}

const SGR_MOUSE_REPORTS = /\x1b\[<\d+;\d+;\d+[Mm]/g;

/**
 * Parse raw stdin escape sequences into key names
 * compatible with DOM KeyboardEvent.key values
 */
function parseKey(data: string): string {
  if (data === '\x1b[A' || data === '\x1bOA') return 'ArrowUp';
  if (data === '\x1b[B' || data === '\x1bOB') return 'ArrowDown';
  if (data === '\x1b[C' || data === '\x1bOC') return 'ArrowRight';
  if (data === '\x1b[D' || data === '\x1bOD') return 'ArrowLeft';
  if (data === '\x1b[5~') return 'PageUp';
  if (data === '\x1b[6~') return 'PageDown';
  if (data === '\r' || data === '\n') return 'Enter';
  if (data === '\x1b') return 'Escape';
  if (data === '\x7f' || data === '\b') return 'Backspace';
  if (data === '\t') return 'Tab';
  return data;
}

function createNodeTerminal(): GameTerminal & { cleanup: () => void } {
  const keyListeners: ((event: KeyPress) => void)[] = [];
  const dataListeners: ((data: string) => void)[] = [];

  if (process.stdin.isTTY) {
    process.stdin.setRawMode(true);
  }
  process.stdin.resume();
  process.stdin.setEncoding('utf8');

  process.stdin.on('data', (data: string) => {
    if (data === '\x03') {
      cleanup();
      process.exit(0);
    }

    // Mouse reports go to data listeners only, one report per call
    const reports = data.match(SGR_MOUSE_REPORTS);
    if (reports) {
      for (const report of reports) {
        for (const listener of [...dataListeners]) listener(report);
      }
      return;
    }

    const key = parseKey(data);
    const domEvent = {
      key,
      preventDefault: () => {},
      stopPropagation: () => {},
    };

    for (const listener of [...keyListeners]) {
      listener({ key, domEvent });
    }

    for (const listener of [...dataListeners]) {
      listener(data);
    }
  });

  let cleanedUp = false;
  function cleanup() {
    if (cleanedUp) return;
    cleanedUp = true;
    if (process.stdin.isTTY) {
      process.stdin.setRawMode(false);
    }
    process.stdin.pause();
    process.stdout.write('\x1b[?1006l\x1b[?1000l');
    process.stdout.write('\x1b[?1049l');
    process.stdout.write('\x1b[?25h');
    process.stdout.write('\x1b[0m');
  }

  function subscribe<T>(listeners: T[], callback: T): Disposable {
    listeners.push(callback);
    return {
      dispose: () => {
        const idx = listeners.indexOf(callback);
        if (idx !== -1) listeners.splice(idx, 1);
      },
    };
  }

  // Synchronized output: wrap writes with DEC sync sequences so the
  // terminal batches clear + redraw into a single atomic paint.
  const SYNC_START = '\x1b[?2026h';
  const SYNC_END = '\x1b[?2026l';

  process.on('exit', cleanup);
  process.on('SIGINT', () => { cleanup(); process.exit(0); });
  process.on('SIGTERM', () => { cleanup(); process.exit(0); });

  return {
    write: (data: string) => {
      process.stdout.write(SYNC_START + data + SYNC_END);
    },
    get cols() { return process.stdout.columns || 80; },
    get rows() { return process.stdout.rows || 24; },
    onKey: (callback: (event: KeyPress) => void) => subscribe(keyListeners, callback),
    onData: (callback: (data: string) => void) => subscribe(dataListeners, callback),
    cleanup,
  };
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

function printHelp() {
  console.log(`
  terminal-sokoban — push every box onto a goal

  Usage:
    sokoban                      Play from the first level
    sokoban --level <n>          Start at level n (1-${builtinLevels.count})
    sokoban --theme <theme>      Set color theme
    sokoban --no-mouse           Disable the on-screen control zones
    sokoban --list               List all levels
    sokoban pack <file>          Pack plain-text levels (--out <levels.json>)
    sokoban --help               Show this help

  Themes:
    ${getThemeModes().join(', ')}

  Controls:
    Arrow keys / WASD    Move and push
    U / Z / Backspace    Undo last move
    PgUp / N / ]         Next level
    PgDn / P / [         Previous level
    ESC                  Pause menu (restart, quit)
`);
}

function takeOption(args: string[], name: string): string | undefined {
  const idx = args.indexOf(name);
  if (idx === -1) return undefined;
  const value = args[idx + 1];
  args.splice(idx, 2);
  return value;
}

function main(args: string[]) {
  if (args.includes('--help') || args.includes('-h')) {
    printHelp();
    process.exit(0);
  }

  if (args.includes('--list') || args.includes('-l')) {
    for (let i = 0; i < builtinLevels.count; i++) {
      console.log(`  ${String(i + 1).padStart(3)}  ${builtinLevels.name(i)}`);
    }
    process.exit(0);
  }

  let theme: ThemeName = DEFAULT_THEME;
  const themeArg = takeOption(args, '--theme');
  if (themeArg !== undefined) {
    if (isValidThemeMode(themeArg)) {
      theme = themeArg;
    } else {
      console.warn(`[Sokoban] Unknown theme '${themeArg}', using ${DEFAULT_THEME}`);
    }
  }
  setTheme(theme);

  let startLevel = 0;
  const levelArg = takeOption(args, '--level');
  if (levelArg !== undefined) {
    const level = Number(levelArg);
    if (!Number.isInteger(level) || level < 1) {
      console.error(`Invalid level: ${levelArg}`);
      process.exit(1);
    }
    startLevel = level - 1;
  }

  const mouse = !args.includes('--no-mouse');

  const terminal = createNodeTerminal();
  process.stdout.write('\x1b]0;Sokoban\x07');

  try {
    runSokobanGame(terminal, {
      catalog: builtinLevels,
      startLevel,
      mouse,
      onQuit: () => {
        terminal.cleanup();
        process.exit(0);
      },
    });
  } catch (err) {
    terminal.cleanup();
    if (err instanceof MalformedLevelError) {
      console.error(`[Sokoban] Cannot load level ${startLevel + 1}: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Entry — branch between developer commands and game runtime
// ---------------------------------------------------------------------------
const cliArgs = process.argv.slice(2);
if (cliArgs[0] === 'pack') {
  import('./pack')
    .then(m => m.packCommand(cliArgs.slice(1)))
    .catch((err: unknown) => {
      console.error(`[Sokoban] pack failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    });
} else {
  main(cliArgs);
}
