/**
 * Shared terminal utilities
 *
 * Theme state, alternate buffer handling and layout helpers. The theme is
 * configured by the consuming application via setTheme().
 */

import type { Terminal } from '@xterm/xterm';
import { type PhosphorMode, getAnsiColor, isLightTheme as checkLightTheme } from './themes';
import { createLogger } from './log';

const log = createLogger('AlternateBuffer');

/**
 * The slice of an xterm.js Terminal the game draws to and reads keys from.
 * An xterm Terminal satisfies it as is; cli.ts adapts Node's stdio to it.
 */
export type GameTerminal = Pick<Terminal, 'cols' | 'rows' | 'write' | 'onData'>;

// ============================================================================
// Theme Configuration
// ============================================================================

let currentTheme: PhosphorMode = 'cyan';

export function setTheme(mode: PhosphorMode): void {
  currentTheme = mode;
}

export function getTheme(): PhosphorMode {
  return currentTheme;
}

export function getCurrentThemeColor(): string {
  return getAnsiColor(currentTheme);
}

/**
 * Check if current theme is a light theme (needs dark text)
 */
export function isLightTheme(): boolean {
  return checkLightTheme(currentTheme);
}

// ============================================================================
// Alternate Buffer Management
// ============================================================================

/**
 * Terminals currently in the alternate buffer, with who put them there.
 */
const alternateBufferState = new WeakMap<GameTerminal, string>();

/**
 * Enter the alternate screen buffer, hide the cursor and clear.
 * Returns false if the terminal is already in the buffer.
 */
export function enterAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  const enteredBy = alternateBufferState.get(terminal);
  if (enteredBy !== undefined) {
    log.warn(`Already in buffer (entered by: ${enteredBy}), requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049h'); // Enter alternate screen buffer
  terminal.write('\x1b[?25l');   // Hide cursor
  terminal.write('\x1b[2J\x1b[H'); // Clear screen

  alternateBufferState.set(terminal, reason);
  return true;
}

/**
 * Leave the alternate screen buffer and show the cursor again.
 * Returns false if the terminal was not in the buffer.
 */
export function exitAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  if (!alternateBufferState.has(terminal)) {
    log.warn(`Not in alternate buffer, exit requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049l'); // Exit alternate screen buffer
  terminal.write('\x1b[?25h');   // Show cursor

  alternateBufferState.delete(terminal);
  return true;
}

export function isInAlternateBuffer(terminal: GameTerminal): boolean {
  return alternateBufferState.has(terminal);
}

// ============================================================================
// Layout Utilities
// ============================================================================

/**
 * Top row that centres `contentRows` vertically, never above row 1.
 */
export function getVerticalAnchor(terminalRows: number, contentRows: number): number {
  return Math.max(1, Math.floor((terminalRows - contentRows) / 2) + 1);
}

export type { PhosphorMode } from './themes';
