import { afterEach, describe, it, expect, vi } from 'vitest';
import { getThemeModes, isValidThemeMode } from './themes';
import {
  centerColumn,
  enterAlternateBuffer,
  exitAlternateBuffer,
  getCurrentPalette,
  getCurrentThemeColor,
  getTheme,
  isInAlternateBuffer,
  setTheme,
  type GameTerminal,
} from './utils';

function fakeTerminal(): GameTerminal & { output: string[] } {
  const output: string[] = [];
  return {
    output,
    cols: 80,
    rows: 24,
    write: (data: string) => { output.push(data); },
    onKey: () => ({ dispose: () => {} }),
    onData: () => ({ dispose: () => {} }),
  };
}

afterEach(() => {
  setTheme('cyan');
  vi.restoreAllMocks();
});

describe('theme configuration', () => {
  it('defaults to cyan', () => {
    expect(getTheme()).toBe('cyan');
    expect(getCurrentThemeColor()).toBe('\x1b[96m');
  });

  it('switches the palette with the theme', () => {
    setTheme('amber');
    expect(getTheme()).toBe('amber');
    expect(getCurrentPalette().name).toBe('Fallout');
    expect(getCurrentThemeColor()).toBe('\x1b[38;5;214m');
  });

  it('lists and validates theme names', () => {
    expect(getThemeModes()).toEqual(['cyan', 'amber', 'green', 'white', 'hotpink', 'nord']);
    expect(isValidThemeMode('nord')).toBe(true);
    expect(isValidThemeMode('sepia')).toBe(false);
  });
});

describe('alternate buffer', () => {
  it('enters once and exits once', () => {
    const terminal = fakeTerminal();

    expect(enterAlternateBuffer(terminal, 'test')).toBe(true);
    expect(isInAlternateBuffer(terminal)).toBe(true);
    expect(terminal.output).toEqual(['\x1b[?1049h', '\x1b[?25l', '\x1b[2J\x1b[H']);

    expect(exitAlternateBuffer(terminal, 'test')).toBe(true);
    expect(isInAlternateBuffer(terminal)).toBe(false);
    expect(terminal.output.slice(3)).toEqual(['\x1b[?1049l', '\x1b[?25h']);
  });

  it('warns on double entry and on exit without entry', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const terminal = fakeTerminal();

    expect(exitAlternateBuffer(terminal, 'early')).toBe(false);
    expect(warn).toHaveBeenLastCalledWith('[AlternateBuffer] Not in alternate buffer, exit requested by: early');

    enterAlternateBuffer(terminal, 'first');
    expect(enterAlternateBuffer(terminal, 'second')).toBe(false);
    expect(warn).toHaveBeenLastCalledWith(
      '[AlternateBuffer] Already in buffer (entered by: first), requested by: second'
    );
    expect(terminal.output).toHaveLength(3);
  });
});

describe('centerColumn', () => {
  it('centres text in 1-based columns', () => {
    expect(centerColumn(40, 'abcd')).toBe(19);
    expect(centerColumn(41, 'abcd')).toBe(19);
  });

  it('never returns a column left of 1', () => {
    expect(centerColumn(4, 'much too long')).toBe(1);
  });
});
