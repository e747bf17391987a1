import { describe, it, expect } from 'vitest';
import { createTextPainter } from './painter';
import { createGameState } from './state';
import { computeStats, formatPercent, renderStats } from './stats';

function finishedState() {
  const state = createGameState(['hello', 'world', 'abc'], 60, 80);
  state.statuses = ['typedCorrect', 'typedWrong', 'untyped'];
  state.currentWord = 2;
  state.keysPressed = 14;
  state.startedAt = 0;
  state.endedAt = 2000;
  return state;
}

describe('computeStats', () => {
  it('splits characters between correct and wrong words', () => {
    const stats = computeStats(finishedState());
    expect(stats.correctWords).toBe(1);
    expect(stats.wrongWords).toBe(1);
    expect(stats.correctChars).toBe(6);
    expect(stats.wrongChars).toBe(6);
    expect(stats.totalChars).toBe(12);
  });

  it('derives speed from correct characters over elapsed time', () => {
    const stats = computeStats(finishedState());
    expect(stats.elapsedSeconds).toBe(2);
    expect(stats.charsPerSecond).toBe(3);
    expect(stats.wordsPerMinute).toBe(36);
  });

  it('measures accuracy against every key pressed', () => {
    const stats = computeStats(finishedState());
    expect(stats.keysPressed).toBe(14);
    expect(stats.accuracy).toBeCloseTo(6 / 14);
  });

  it('reports zero speed and full accuracy for a game that never started', () => {
    const state = createGameState(['hello'], 60, 80);
    state.endedAt = 500;
    const stats = computeStats(state);
    expect(stats.elapsedSeconds).toBeNull();
    expect(stats.charsPerSecond).toBe(0);
    expect(stats.wordsPerMinute).toBe(0);
    expect(stats.accuracy).toBe(1);
  });

  it('reports zero speed when no time elapsed', () => {
    const state = finishedState();
    state.endedAt = state.startedAt;
    const stats = computeStats(state);
    expect(stats.elapsedSeconds).toBe(0);
    expect(stats.charsPerSecond).toBe(0);
  });

  it('ignores words still marked as being typed', () => {
    const state = createGameState(['hello', 'world'], 60, 80);
    state.statuses = ['typedCorrect', 'typingWrong'];
    const stats = computeStats(state);
    expect(stats.correctWords).toBe(1);
    expect(stats.wrongWords).toBe(0);
  });
});

describe('formatPercent', () => {
  it('uses one decimal place', () => {
    expect(formatPercent(1)).toBe('100.0%');
    expect(formatPercent(6 / 14)).toBe('42.9%');
    expect(formatPercent(0)).toBe('0.0%');
  });
});

describe('renderStats', () => {
  it('paints the summary lines in order', () => {
    const painter = createTextPainter();
    renderStats(computeStats(finishedState()), painter);

    expect(painter.frames).toHaveLength(1);
    expect(painter.frames[0].split('\n')).toEqual([
      '',
      '{erase}CPS (chars per second): 3.0',
      '{erase}WPM (words per minute): 36.0',
      '{erase}Characters typed:       12 ({green}6{/}|{red}6{/})',
      '{erase}Keys pressed:           14',
      '{erase}Accuracy:               42.9%',
      '{erase}Correct words:          {green}1{/}',
      '{erase}Wrong words:            {red}1{/}',
      '',
    ]);
  });
});
