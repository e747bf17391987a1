/**
 * Typing game state
 *
 * Plain data describing one game session plus read-only accessors over it.
 * Only the controller (see ./controller) mutates a GameState; everything
 * else sees it through ReadonlyGameState.
 */

import { divideLines, type LineRange } from './layout';

/** Number of text lines visible at once */
export const DISPLAY_LINES = 2;

/**
 * Lifecycle of a single word:
 * untyped → typingCorrect | typingWrong (while edited) → typedCorrect | typedWrong
 */
export type WordStatus =
  | 'untyped'
  | 'typingCorrect'
  | 'typingWrong'
  | 'typedCorrect'
  | 'typedWrong';

export interface GameState {
  words: string[];
  statuses: WordStatus[];
  /** Index of the word being typed; equals words.length once all are committed */
  currentWord: number;
  /** Text typed so far for the current word */
  input: string;
  lineRanges: LineRange[];
  /** Whole seconds left on the countdown */
  timeLeft: number;
  /** Epoch ms of the first consumed key, null until then */
  startedAt: number | null;
  /** Epoch ms of the end of the game; a non-null value means finished */
  endedAt: number | null;
  /** Keystrokes across committed words, one extra per word for the delimiter */
  keysPressed: number;
  /** Edits made to the current word so far */
  wordKeysPressed: number;
}

export type ReadonlyGameState = {
  readonly [K in keyof GameState]: GameState[K] extends (infer U)[] ? readonly U[] : GameState[K];
};

/**
 * Create the state for a fresh game. The first word starts out as the
 * word being typed.
 */
export function createGameState(
  words: readonly string[],
  maxTime: number,
  maxColumns: number
): GameState {
  return {
    // Own copy: the word sequence and its layout are fixed for the game
    words: [...words],
    statuses: words.map((_, i): WordStatus => (i === 0 ? 'typingCorrect' : 'untyped')),
    currentWord: 0,
    input: '',
    lineRanges: divideLines(words, maxColumns),
    timeLeft: maxTime,
    startedAt: null,
    endedAt: null,
    keysPressed: 0,
    wordKeysPressed: 0,
  };
}

export function isFinished(state: ReadonlyGameState): boolean {
  return state.endedAt !== null;
}

export function isTypingStatus(status: WordStatus): boolean {
  return status === 'typingCorrect' || status === 'typingWrong';
}

/**
 * Index of the line holding the current word. Once every word is committed
 * the last line stays current.
 */
export function currentLineIndex(state: ReadonlyGameState): number {
  const index = state.lineRanges.findIndex(
    ([low, high]) => state.currentWord >= low && state.currentWord < high
  );
  if (index !== -1) return index;
  return Math.max(0, state.lineRanges.length - 1);
}

/**
 * Line ranges inside the viewport: the current line and the ones after it,
 * up to DISPLAY_LINES of them.
 */
export function visibleLineRanges(state: ReadonlyGameState): LineRange[] {
  const current = currentLineIndex(state);
  return state.lineRanges.slice(current, current + DISPLAY_LINES);
}
