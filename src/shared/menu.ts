/**
 * Pause menu helpers
 *
 * Index-based menu navigation (arrow keys + Enter/Space) with keyboard
 * shortcuts for quick access. No callbacks: the caller acts on the index.
 */

import { getCurrentThemeColor } from '../utils';

export interface SimpleMenuItem {
  label: string;
  shortcut?: string; // e.g., 'ESC', 'R', 'Q'
}

/**
 * Handle menu navigation
 * Returns new selection index
 */
export function navigateMenu(
  currentSelection: number,
  itemCount: number,
  key: string,
  domEvent: { key: string }
): { newSelection: number; confirmed: boolean } {
  let newSelection = currentSelection;
  let confirmed = false;

  if (domEvent.key === 'ArrowUp' || key === 'w') {
    newSelection = (currentSelection - 1 + itemCount) % itemCount;
  } else if (domEvent.key === 'ArrowDown' || key === 's') {
    newSelection = (currentSelection + 1) % itemCount;
  } else if (domEvent.key === 'Enter' || domEvent.key === ' ') {
    confirmed = true;
  }

  return { newSelection, confirmed };
}

/**
 * Check if a shortcut key was pressed
 * Returns the index of the matching item, or -1 if no match
 */
export function checkShortcut(
  items: SimpleMenuItem[],
  key: string
): number {
  for (let i = 0; i < items.length; i++) {
    const shortcut = items[i].shortcut;
    if (shortcut && key === shortcut.toLowerCase()) {
      return i;
    }
  }
  return -1;
}

/**
 * Render a menu with the selected item highlighted
 * Returns ANSI escape sequence string
 */
export function renderSimpleMenu(
  items: SimpleMenuItem[],
  selection: number,
  options: {
    centerX: number;
    startY: number;
    showShortcuts?: boolean;
  }
): string {
  const themeColor = getCurrentThemeColor();
  const { centerX, startY, showShortcuts = true } = options;

  let output = '';

  items.forEach((item, i) => {
    const isSelected = i === selection;

    let displayText = item.label;
    if (showShortcuts && item.shortcut) {
      displayText += ` [${item.shortcut}]`;
    }

    const text = isSelected ? `► ${displayText} ◄` : `  ${displayText}  `;
    const style = isSelected ? '\x1b[1;93m' : `\x1b[2m${themeColor}`;

    const itemX = centerX - Math.floor(text.length / 2);
    output += `\x1b[${startY + i};${itemX}H${style}${text}\x1b[0m`;
  });

  return output;
}

export const PAUSE_MENU_ITEMS: SimpleMenuItem[] = [
  { label: 'RESUME', shortcut: 'ESC' },
  { label: 'RESTART LEVEL', shortcut: 'R' },
  { label: 'QUIT', shortcut: 'Q' },
];
