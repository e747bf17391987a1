/**
 * End-of-game statistics
 */

import type { Painter } from './painter';
import type { ReadonlyGameState } from './state';

/** A "word" in typing speed terms is standardized as 5 characters */
export const AVERAGE_WORD_LENGTH = 5;

export interface GameStats {
  correctWords: number;
  wrongWords: number;
  /** Characters of correct words, one extra per word for its delimiter */
  correctChars: number;
  wrongChars: number;
  totalChars: number;
  /** Seconds between the first key and the end; null if the game never started */
  elapsedSeconds: number | null;
  charsPerSecond: number;
  wordsPerMinute: number;
  keysPressed: number;
  /** Fraction in [0, 1] when keys were pressed; 1 otherwise */
  accuracy: number;
}

export function computeStats(state: ReadonlyGameState): GameStats {
  let correctWords = 0;
  let wrongWords = 0;
  let correctChars = 0;
  let wrongChars = 0;

  state.words.forEach((word, i) => {
    const status = state.statuses[i];
    if (status === 'typedCorrect') {
      correctWords++;
      correctChars += word.length + 1;
    } else if (status === 'typedWrong') {
      wrongWords++;
      wrongChars += word.length + 1;
    }
  });

  const elapsedSeconds =
    state.startedAt !== null && state.endedAt !== null
      ? (state.endedAt - state.startedAt) / 1000
      : null;
  const charsPerSecond =
    elapsedSeconds !== null && elapsedSeconds > 0 ? correctChars / elapsedSeconds : 0;

  return {
    correctWords,
    wrongWords,
    correctChars,
    wrongChars,
    totalChars: correctChars + wrongChars,
    elapsedSeconds,
    charsPerSecond,
    wordsPerMinute: (charsPerSecond * 60) / AVERAGE_WORD_LENGTH,
    keysPressed: state.keysPressed,
    accuracy: state.keysPressed > 0 ? correctChars / state.keysPressed : 1,
  };
}

export function formatPercent(fraction: number): string {
  return `${(fraction * 100).toFixed(1)}%`;
}

/**
 * Paint the summary, one labeled line per figure
 */
export function renderStats(stats: GameStats, painter: Painter): void {
  const line = (label: string, value: string) => {
    painter.eraseLine();
    painter.write(`${label.padEnd(24)}${value}`);
    painter.newline();
  };

  // Leave the game frame's input line
  painter.newline();

  line('CPS (chars per second):', stats.charsPerSecond.toFixed(1));
  line('WPM (words per minute):', stats.wordsPerMinute.toFixed(1));

  painter.eraseLine();
  painter.write(`${'Characters typed:'.padEnd(24)}${stats.totalChars} (`);
  painter.setColor('green');
  painter.write(`${stats.correctChars}`);
  painter.resetColor();
  painter.write('|');
  painter.setColor('red');
  painter.write(`${stats.wrongChars}`);
  painter.resetColor();
  painter.write(')');
  painter.newline();

  line('Keys pressed:', `${stats.keysPressed}`);
  line('Accuracy:', formatPercent(stats.accuracy));

  painter.eraseLine();
  painter.write('Correct words:'.padEnd(24));
  painter.setColor('green');
  painter.write(`${stats.correctWords}`);
  painter.resetColor();
  painter.newline();

  painter.eraseLine();
  painter.write('Wrong words:'.padEnd(24));
  painter.setColor('red');
  painter.write(`${stats.wrongWords}`);
  painter.resetColor();
  painter.newline();

  painter.flush();
}
