/**
 * Typing Speed Game
 *
 * Type the words as they come; every word is checked when you hit space.
 * The clock starts on the first key and the game ends when it runs out,
 * when every word is typed, or on Ctrl-C. Speed and accuracy follow.
 *
 * Three activities share the game: terminal input (pushed into a queue),
 * the countdown ticker, and the main loop that applies one queued event
 * at a time. All state changes go through the controller on the event
 * loop, so none of them can interleave.
 */

import { debugLog } from '../../log';
import { getDisplayWidth, type TerminalLike } from '../utils';
import { createGameController } from './controller';
import { createAnsiPainter, type Painter } from './painter';
import { AsyncQueue } from './queue';
import { createGameRenderer } from './render';
import type { ReadonlyGameState } from './state';
import { computeStats, renderStats, type GameStats } from './stats';
import { runTicker, TICK_INTERVAL_MS } from './ticker';

export const DEFAULT_WIDTH = 80;

export interface TypingGameOptions {
  /** The session's word sample, in display order; must not be empty */
  words: readonly string[];
  /** Countdown length in seconds */
  maxTime: number;
  /** Requested display width, clamped to the terminal width */
  width?: number;
  rigorousSpaces?: boolean;
  /** Where to paint; defaults to ANSI output on the terminal */
  painter?: Painter;
  tickIntervalMs?: number;
  now?: () => number;
}

/**
 * Typing Game Controller
 */
export interface TypingGameController {
  /** End the game as if Ctrl-C was pressed */
  stop: () => void;
  readonly isRunning: boolean;
  readonly state: ReadonlyGameState;
  /** Resolves with the final stats once they have been rendered */
  done: Promise<GameStats>;
}

export function runTypingGame(
  terminal: TerminalLike,
  options: TypingGameOptions
): TypingGameController {
  const painter = options.painter ?? createAnsiPainter(terminal);
  const renderer = createGameRenderer(painter);
  const tickIntervalMs = options.tickIntervalMs ?? TICK_INTERVAL_MS;

  const controller = createGameController(options.words, {
    maxTime: options.maxTime,
    maxColumns: getDisplayWidth(options.width ?? DEFAULT_WIDTH, terminal.cols),
    rigorousSpaces: options.rigorousSpaces,
    now: options.now,
  });

  const input = new AsyncQueue<string>();
  const inputListener = terminal.onData((data) => input.put(data));

  // Wake the main loop if the game ends while it waits for input
  controller.signal.addEventListener('abort', () => input.close(), { once: true });

  const renderFrame = () => renderer.render(controller.state);

  async function play(): Promise<GameStats> {
    let ticker: Promise<void> | null = null;
    let tickerError: unknown = null;

    try {
      while (!controller.isFinished) {
        renderFrame();
        const key = await input.get();
        if (key === undefined) break;

        const wasStarted = controller.isStarted;
        const action = controller.handleKey(key);
        debugLog('TypingGame', `key ${JSON.stringify(key)} -> ${action.type}`);

        if (!wasStarted && controller.isStarted) {
          debugLog('TypingGame', 'timer started');
          ticker = runTicker(controller, renderFrame, tickIntervalMs).catch((error: unknown) => {
            tickerError = error;
            controller.finish();
          });
        }
      }
    } finally {
      inputListener.dispose();
      // A failed loop still ends the game, so the countdown stops painting
      controller.finish();
      // The ticker sees the abort and exits; stats must not race a last tick
      await ticker;
    }

    if (tickerError !== null) throw tickerError;

    debugLog('TypingGame', 'finished', {
      word: controller.state.currentWord,
      timeLeft: controller.state.timeLeft,
    });

    const stats = computeStats(controller.state);
    renderStats(stats, painter);
    return stats;
  }

  const done = play();

  return {
    stop: () => controller.finish(),
    get isRunning() { return !controller.isFinished; },
    get state() { return controller.state; },
    done,
  };
}

export { createGameController } from './controller';
export type { GameController, GameControllerOptions } from './controller';
export { divideLines } from './layout';
export type { LineRange } from './layout';
export { routeKey, KEY_BACKSPACE, KEY_INTERRUPT, KEY_WORD_ERASE } from './keys';
export type { KeyAction, RouteContext } from './keys';
export { createAnsiPainter, createTextPainter } from './painter';
export type { Painter, TextPainter } from './painter';
export { AsyncQueue } from './queue';
export { createGameRenderer, getStatusColor } from './render';
export type { GameRenderer } from './render';
export {
  DISPLAY_LINES,
  currentLineIndex,
  isFinished,
  visibleLineRanges,
} from './state';
export type { GameState, ReadonlyGameState, WordStatus } from './state';
export { AVERAGE_WORD_LENGTH, computeStats, renderStats } from './stats';
export type { GameStats } from './stats';
export { runTicker, sleep, TICK_INTERVAL_MS } from './ticker';
