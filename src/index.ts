/**
 * typedash
 *
 * Terminal typing speed game for xterm.js and CLI.
 *
 * Library usage (xterm.js):
 *   import { runTypingGame, sampleWords, setTheme } from 'typedash';
 *   setTheme('bright');
 *   const game = runTypingGame(terminal, { words: sampleWords(myWords), maxTime: 60 });
 *   const stats = await game.done;
 *
 * CLI usage:
 *   npx typedash --time 30
 */

export {
  // Game
  runTypingGame,
  DEFAULT_WIDTH,
  type TypingGameController,
  type TypingGameOptions,

  // Core state machine
  createGameController,
  routeKey,
  divideLines,
  isFinished,
  currentLineIndex,
  visibleLineRanges,
  DISPLAY_LINES,
  KEY_BACKSPACE,
  KEY_INTERRUPT,
  KEY_WORD_ERASE,
  type GameController,
  type GameControllerOptions,
  type GameState,
  type ReadonlyGameState,
  type WordStatus,
  type KeyAction,
  type RouteContext,
  type LineRange,

  // Coordination
  AsyncQueue,
  runTicker,
  sleep,
  TICK_INTERVAL_MS,

  // Rendering
  createAnsiPainter,
  createTextPainter,
  createGameRenderer,
  getStatusColor,
  type Painter,
  type TextPainter,
  type GameRenderer,

  // Stats
  computeStats,
  renderStats,
  AVERAGE_WORD_LENGTH,
  type GameStats,
} from './games/typing';

export {
  setTheme,
  getTheme,
  getTextColorCode,
  getDisplayWidth,
  type TerminalLike,
} from './games/utils';

export {
  PALETTE_NAMES,
  palettes,
  getPalette,
  isValidPaletteName,
  type PaletteName,
  type Palette,
  type TextColor,
} from './themes';

export {
  SAMPLE_SIZE,
  DEFAULT_CORPUS,
  CorpusError,
  listCorpora,
  loadCorpus,
  parseCorpus,
  resolveCorpusPath,
  sampleWords,
} from './corpus';
