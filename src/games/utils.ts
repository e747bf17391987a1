/**
 * Shared utilities for games
 *
 * This module provides the terminal shape games draw on and the
 * palette-aware color lookup. The palette is configured by the consuming
 * application via setTheme().
 */

import type { Terminal } from '@xterm/xterm';
import {
  type PaletteName,
  type TextColor,
  getAnsiColor,
} from '../themes';

/**
 * The part of an xterm.js Terminal that games rely on. The CLI adapts
 * stdin/stdout to this shape; in a browser a real Terminal fits as is.
 */
export type TerminalLike = Pick<Terminal, 'write' | 'cols' | 'onData'>;

// ============================================================================
// Theme Configuration
// ============================================================================

/**
 * Current palette - configured by the consuming application
 */
let currentTheme: PaletteName = 'classic';

/**
 * Set the current palette
 */
export function setTheme(name: PaletteName): void {
  currentTheme = name;
}

/**
 * Get the current palette
 */
export function getTheme(): PaletteName {
  return currentTheme;
}

/**
 * Get the escape code for a text color in the current palette
 */
export function getTextColorCode(color: TextColor): string {
  return getAnsiColor(currentTheme, color);
}

// ============================================================================
// Layout Utilities
// ============================================================================

/**
 * Width to lay text out in: the requested width, never wider than the
 * terminal. Falls back to the request when the terminal reports no size.
 */
export function getDisplayWidth(requested: number, terminalCols: number): number {
  if (!terminalCols || terminalCols <= 0) return requested;
  return Math.min(requested, terminalCols);
}

export type { PaletteName, TextColor } from '../themes';
