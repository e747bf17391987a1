/**
 * Typing game controller
 *
 * Owns the mutable GameState and is the only code allowed to change it.
 * Every operation is synchronous, so each one is applied whole before the
 * next event or render gets a chance to run.
 */

import { routeKey, type KeyAction } from './keys';
import {
  createGameState,
  isFinished,
  isTypingStatus,
  type GameState,
  type ReadonlyGameState,
} from './state';

export interface GameControllerOptions {
  /** Countdown length in seconds */
  maxTime: number;
  /** Width used to lay words out into lines */
  maxColumns: number;
  /** Treat whitespace with no pending input as a wrong, empty word */
  rigorousSpaces?: boolean;
  /** Clock in epoch ms, injectable for tests */
  now?: () => number;
}

export interface GameController {
  readonly state: ReadonlyGameState;
  readonly isStarted: boolean;
  readonly isFinished: boolean;
  /** Aborted the moment the game finishes, from whichever path */
  readonly signal: AbortSignal;

  start: () => void;
  keyPressed: (text: string) => void;
  backspacePressed: () => void;
  wordBackspacePressed: () => void;
  wordFinished: () => void;
  finish: () => void;
  tick: () => void;

  /**
   * Route one chunk of raw input and apply it. The first routed event
   * starts the game. Returns the action that was applied.
   */
  handleKey: (key: string) => KeyAction;
}

export function createGameController(
  words: readonly string[],
  options: GameControllerOptions
): GameController {
  const now = options.now ?? Date.now;
  const rigorousSpaces = options.rigorousSpaces ?? false;
  const state: GameState = createGameState(words, options.maxTime, options.maxColumns);
  const finished = new AbortController();

  function updateTypingStatus() {
    const target = state.words[state.currentWord];
    state.statuses[state.currentWord] = target.startsWith(state.input)
      ? 'typingCorrect'
      : 'typingWrong';
  }

  function editWord(nextInput: string) {
    if (isFinished(state)) return;
    state.input = nextInput;
    state.wordKeysPressed++;
    updateTypingStatus();
  }

  function start() {
    if (state.startedAt !== null) return;
    state.startedAt = now();
  }

  function keyPressed(text: string) {
    editWord(state.input + text);
  }

  function backspacePressed() {
    editWord(state.input.slice(0, -1));
  }

  function wordBackspacePressed() {
    editWord('');
  }

  function wordFinished() {
    if (isFinished(state)) return;

    state.keysPressed += state.wordKeysPressed + 1;
    state.wordKeysPressed = 0;
    state.statuses[state.currentWord] =
      state.words[state.currentWord] === state.input ? 'typedCorrect' : 'typedWrong';
    state.input = '';

    state.currentWord++;
    if (state.currentWord === state.words.length) {
      finish();
      return;
    }
    state.statuses[state.currentWord] = 'typingCorrect';
  }

  function finish() {
    if (isFinished(state)) return;

    // An interrupted word is neither right nor wrong
    if (state.currentWord < state.words.length && isTypingStatus(state.statuses[state.currentWord])) {
      state.statuses[state.currentWord] = 'untyped';
    }
    state.endedAt = now();
    finished.abort();
  }

  function tick() {
    if (isFinished(state)) return;
    state.timeLeft = Math.max(0, state.timeLeft - 1);
    if (state.timeLeft === 0) {
      finish();
    }
  }

  function handleKey(key: string): KeyAction {
    if (isFinished(state)) return { type: 'ignore' };

    const action = routeKey(key, { hasInput: state.input !== '', rigorousSpaces });
    if (action.type === 'ignore') return action;

    start();

    switch (action.type) {
      case 'abort':
        finish();
        break;
      case 'backspace':
        backspacePressed();
        break;
      case 'wordBackspace':
        wordBackspacePressed();
        break;
      case 'commitWord':
        wordFinished();
        break;
      case 'insert':
        keyPressed(action.text);
        break;
    }
    return action;
  }

  return {
    get state(): ReadonlyGameState { return state; },
    get isStarted() { return state.startedAt !== null; },
    get isFinished() { return isFinished(state); },
    signal: finished.signal,
    start,
    keyPressed,
    backspacePressed,
    wordBackspacePressed,
    wordFinished,
    finish,
    tick,
    handleKey,
  };
}
