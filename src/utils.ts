/**
 * Shared terminal utilities
 *
 * Theme configuration for the running game plus alternate screen buffer
 * management. The theme is configured by the host application via setTheme().
 */

import type { IDisposable } from '@xterm/xterm';
import { DEFAULT_THEME, getAnsiColor, getPalette, type ThemeName, type ThemePalette } from './themes';

// ============================================================================
// Terminal
// ============================================================================

export interface KeyPress {
  key: string;
  domEvent: {
    key: string;
    preventDefault: () => void;
    stopPropagation: () => void;
  };
}

/**
 * The part of an xterm.js Terminal a game needs. The Node.js adapter in
 * the CLI provides the same surface over stdin/stdout.
 */
export interface GameTerminal {
  write(data: string): void;
  readonly cols: number;
  readonly rows: number;
  onKey(listener: (event: KeyPress) => void): IDisposable;
  onData(listener: (data: string) => void): IDisposable;
}

// ============================================================================
// Theme Configuration
// ============================================================================

/**
 * Current theme mode - configured by the consuming application
 */
let currentTheme: ThemeName = DEFAULT_THEME;

/**
 * Set the current theme mode
 * Call this from your app when the theme changes
 */
export function setTheme(mode: ThemeName): void {
  currentTheme = mode;
}

/**
 * Get the current theme mode
 */
export function getTheme(): ThemeName {
  return currentTheme;
}

/**
 * Get current theme accent color code
 */
export function getCurrentThemeColor(): string {
  return getAnsiColor(currentTheme);
}

export function getCurrentPalette(): ThemePalette {
  return getPalette(currentTheme);
}

// ============================================================================
// Alternate Buffer Management
// ============================================================================

/**
 * Track which terminals are currently in alternate buffer.
 * This prevents double-entry/exit issues and provides debugging info.
 */
const alternateBufferState = new WeakMap<GameTerminal, { reason: string; enteredAt: number }>();

/**
 * Enter alternate screen buffer with state tracking.
 *
 * @param reason - Description of why we're entering (for debugging)
 * @returns true if buffer was entered, false if already in buffer
 */
export function enterAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  const existing = alternateBufferState.get(terminal);
  if (existing) {
    console.warn(`[AlternateBuffer] Already in buffer (entered by: ${existing.reason}), requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049h'); // Enter alternate screen buffer
  terminal.write('\x1b[?25l');   // Hide cursor
  terminal.write('\x1b[2J\x1b[H'); // Clear screen

  alternateBufferState.set(terminal, { reason, enteredAt: Date.now() });
  return true;
}

/**
 * Exit alternate screen buffer with state tracking.
 *
 * @returns true if buffer was exited, false if not in buffer
 */
export function exitAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  if (!alternateBufferState.has(terminal)) {
    console.warn(`[AlternateBuffer] Not in alternate buffer, exit requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049l'); // Exit alternate screen buffer
  terminal.write('\x1b[?25h');   // Show cursor

  alternateBufferState.delete(terminal);
  return true;
}

/**
 * Check if terminal is currently in alternate buffer
 */
export function isInAlternateBuffer(terminal: GameTerminal): boolean {
  return alternateBufferState.has(terminal);
}

// ============================================================================
// Layout Utilities
// ============================================================================

/**
 * Column that centers `text` in a terminal `cols` wide (1-based, never below 1)
 */
export function centerColumn(cols: number, text: string): number {
  return Math.max(1, Math.floor((cols - text.length) / 2) + 1);
}
