/**
 * Game frame rendering
 *
 * A frame is DISPLAY_LINES lines of words, a countdown line and the
 * current input. Each frame after the first moves back up over the
 * previous one and overwrites it in place.
 */

import type { TextColor } from '../utils';
import type { Painter } from './painter';
import { DISPLAY_LINES, visibleLineRanges, type ReadonlyGameState, type WordStatus } from './state';

const STATUS_COLORS: Record<WordStatus, TextColor> = {
  untyped: 'default',
  typingCorrect: 'yellow',
  typingWrong: 'red',
  typedCorrect: 'green',
  typedWrong: 'red',
};

export function getStatusColor(status: WordStatus): TextColor {
  return STATUS_COLORS[status];
}

export interface GameRenderer {
  render: (state: ReadonlyGameState) => void;
}

export function createGameRenderer(painter: Painter): GameRenderer {
  let firstFrame = true;

  function render(state: ReadonlyGameState) {
    const shown = visibleLineRanges(state);

    if (!firstFrame) {
      painter.moveCursorUp(DISPLAY_LINES + 1);
    }
    firstFrame = false;

    for (let i = 0; i < DISPLAY_LINES; i++) {
      painter.eraseLine();
      const range = shown[i];
      if (range) {
        const [low, high] = range;
        for (let idx = low; idx < high; idx++) {
          painter.setColor(getStatusColor(state.statuses[idx]));
          painter.write(`${state.words[idx]} `);
        }
        painter.resetColor();
      }
      painter.newline();
    }

    painter.eraseLine();
    painter.write(`--- (${state.timeLeft} s left) ---`);
    painter.newline();
    painter.eraseLine();
    painter.write(state.input);
    painter.flush();
  }

  return { render };
}
