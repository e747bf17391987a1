/**
 * Render capability for the typing game
 *
 * The game never writes escape sequences itself; it drives a Painter.
 * createAnsiPainter() targets a terminal, createTextPainter() records a
 * readable transcript for headless use and tests.
 */

import { ANSI_RESET } from '../../themes';
import { getTextColorCode, type TerminalLike, type TextColor } from '../utils';

export interface Painter {
  moveCursorUp: (lines: number) => void;
  eraseLine: () => void;
  setColor: (color: TextColor) => void;
  resetColor: () => void;
  write: (text: string) => void;
  newline: () => void;
  /** Push everything painted since the last flush to the output */
  flush: () => void;
}

// Raw mode turns off output post-processing, so a bare \n would not return
// the carriage.
const NEWLINE = '\r\n';

/**
 * Painter that emits ANSI escape sequences to a terminal, one write per flush
 */
export function createAnsiPainter(terminal: Pick<TerminalLike, 'write'>): Painter {
  let output = '';

  return {
    moveCursorUp: (lines) => { output += `\x1b[${lines}F`; },
    eraseLine: () => { output += '\x1b[999D\x1b[K'; },
    setColor: (color) => { output += getTextColorCode(color); },
    resetColor: () => { output += ANSI_RESET; },
    write: (text) => { output += text; },
    newline: () => { output += NEWLINE; },
    flush: () => {
      if (!output) return;
      terminal.write(output);
      output = '';
    },
  };
}

export interface TextPainter extends Painter {
  /** Flushed frames, oldest first */
  readonly frames: string[];
}

/**
 * Painter that records a plain transcript. Colors show up as `{green}`,
 * resets as `{/}`, cursor moves as `{up N}`, erases as `{erase}`.
 */
export function createTextPainter(): TextPainter {
  const frames: string[] = [];
  let output = '';

  return {
    frames,
    moveCursorUp: (lines) => { output += `{up ${lines}}`; },
    eraseLine: () => { output += '{erase}'; },
    setColor: (color) => { output += `{${color}}`; },
    resetColor: () => { output += '{/}'; },
    write: (text) => { output += text; },
    newline: () => { output += '\n'; },
    flush: () => {
      frames.push(output);
      output = '';
    },
  };
}
