import { describe, it, expect } from 'vitest';
import { createGameController, type GameControllerOptions } from './controller';
import { isTypingStatus } from './state';
import { computeStats } from './stats';

function setup(words: string[], options: Partial<GameControllerOptions> = {}) {
  const clock = { now: 1000 };
  const controller = createGameController(words, {
    maxTime: 60,
    maxColumns: 80,
    now: () => clock.now,
    ...options,
  });
  const type = (...keys: string[]) => keys.forEach(key => controller.handleKey(key));
  return { controller, clock, type };
}

describe('createGameController', () => {
  describe('editing the current word', () => {
    it('appends keys and tracks a correct prefix', () => {
      const { controller } = setup(['hello']);
      controller.keyPressed('h');
      controller.keyPressed('e');
      expect(controller.state.input).toBe('he');
      expect(controller.state.statuses[0]).toBe('typingCorrect');
      expect(controller.state.wordKeysPressed).toBe(2);
    });

    it('flags the word as wrong once the input leaves the prefix', () => {
      const { controller } = setup(['hello']);
      controller.keyPressed('h');
      controller.keyPressed('a');
      expect(controller.state.statuses[0]).toBe('typingWrong');
    });

    it('recovers the status after a backspace', () => {
      const { controller } = setup(['hello']);
      controller.keyPressed('h');
      controller.keyPressed('a');
      controller.backspacePressed();
      expect(controller.state.input).toBe('h');
      expect(controller.state.statuses[0]).toBe('typingCorrect');
      expect(controller.state.wordKeysPressed).toBe(3);
    });

    it('counts a backspace on empty input without failing', () => {
      const { controller } = setup(['hello']);
      controller.backspacePressed();
      expect(controller.state.input).toBe('');
      expect(controller.state.wordKeysPressed).toBe(1);
    });

    it('clears the whole input on word backspace', () => {
      const { controller } = setup(['hello']);
      controller.keyPressed('x');
      controller.keyPressed('y');
      controller.wordBackspacePressed();
      expect(controller.state.input).toBe('');
      expect(controller.state.statuses[0]).toBe('typingCorrect');
      expect(controller.state.wordKeysPressed).toBe(3);
    });
  });

  describe('wordFinished', () => {
    it('commits an exact match as correct', () => {
      const { controller } = setup(['hello', 'world']);
      'hello'.split('').forEach(controller.keyPressed);
      controller.wordFinished();
      expect(controller.state.statuses).toEqual(['typedCorrect', 'typingCorrect']);
      expect(controller.state.currentWord).toBe(1);
      expect(controller.state.input).toBe('');
      expect(controller.state.wordKeysPressed).toBe(0);
      expect(controller.state.keysPressed).toBe(6);
    });

    it('commits anything else as wrong', () => {
      const { controller } = setup(['hello', 'world']);
      'helo'.split('').forEach(controller.keyPressed);
      controller.wordFinished();
      expect(controller.state.statuses[0]).toBe('typedWrong');
      expect(controller.state.currentWord).toBe(1);
      expect(controller.state.input).toBe('');
      expect(controller.state.keysPressed).toBe(5);
    });

    it('commits a prefix of the word as wrong', () => {
      const { controller } = setup(['hello', 'world']);
      'hell'.split('').forEach(controller.keyPressed);
      controller.wordFinished();
      expect(controller.state.statuses[0]).toBe('typedWrong');
    });

    it('finishes the game after the last word', () => {
      const { controller, clock } = setup(['a']);
      controller.start();
      controller.keyPressed('a');
      clock.now = 4000;
      controller.wordFinished();
      expect(controller.state.currentWord).toBe(1);
      expect(controller.isFinished).toBe(true);
      expect(controller.state.endedAt).toBe(4000);
      expect(controller.state.statuses).toEqual(['typedCorrect']);
    });

    it('ends after the words it was given, whatever happens to the caller\'s array', () => {
      const words = ['cat', 'dog'];
      const { controller, type } = setup(words);
      words.push('emu');
      type('c', 'a', 't', ' ', 'd', 'o', 'g', ' ');
      expect(controller.isFinished).toBe(true);
      expect(controller.state.words).toEqual(['cat', 'dog']);
      expect(controller.state.lineRanges).toEqual([[0, 2]]);
      expect(controller.state.statuses).toEqual(['typedCorrect', 'typedCorrect']);
    });
  });

  describe('finish', () => {
    it('keeps the first end time', () => {
      const { controller, clock } = setup(['a', 'b']);
      clock.now = 5000;
      controller.finish();
      clock.now = 9000;
      controller.finish();
      expect(controller.state.endedAt).toBe(5000);
    });

    it('aborts the signal', () => {
      const { controller } = setup(['a', 'b']);
      expect(controller.signal.aborted).toBe(false);
      controller.finish();
      expect(controller.signal.aborted).toBe(true);
    });

    it('leaves no word in a typing status', () => {
      const { controller } = setup(['abc', 'def']);
      controller.keyPressed('x');
      controller.finish();
      expect(controller.state.statuses).toEqual(['untyped', 'untyped']);
    });

    it('freezes the state afterwards', () => {
      const { controller } = setup(['abc', 'def']);
      controller.keyPressed('a');
      controller.finish();
      controller.keyPressed('b');
      controller.wordFinished();
      controller.tick();
      expect(controller.state.input).toBe('a');
      expect(controller.state.currentWord).toBe(0);
      expect(controller.state.timeLeft).toBe(60);
    });
  });

  describe('tick', () => {
    it('counts the clock down by one second', () => {
      const { controller } = setup(['a'], { maxTime: 10 });
      controller.tick();
      controller.tick();
      expect(controller.state.timeLeft).toBe(8);
      expect(controller.isFinished).toBe(false);
    });

    it('finishes the game when time runs out', () => {
      const { controller } = setup(['a', 'b'], { maxTime: 1 });
      controller.tick();
      expect(controller.state.timeLeft).toBe(0);
      expect(controller.isFinished).toBe(true);
      expect(controller.state.currentWord).toBe(0);
      expect(controller.state.statuses.some(isTypingStatus)).toBe(false);
    });

    it('never goes below zero', () => {
      const { controller } = setup(['a'], { maxTime: 0 });
      controller.tick();
      expect(controller.state.timeLeft).toBe(0);
      expect(controller.isFinished).toBe(true);
    });
  });

  describe('handleKey', () => {
    it('starts the clock on the first routed key', () => {
      const { controller, clock } = setup(['cat']);
      clock.now = 2500;
      controller.handleKey('c');
      expect(controller.isStarted).toBe(true);
      expect(controller.state.startedAt).toBe(2500);
    });

    it('does not start the clock on ignored keys', () => {
      const { controller } = setup(['cat']);
      expect(controller.handleKey('\x01')).toEqual({ type: 'ignore' });
      expect(controller.handleKey(' ')).toEqual({ type: 'ignore' });
      expect(controller.isStarted).toBe(false);
    });

    it('keeps the original start time', () => {
      const { controller, clock, type } = setup(['cat']);
      type('c');
      clock.now = 8000;
      type('a');
      expect(controller.state.startedAt).toBe(1000);
    });

    it('aborts on Ctrl-C', () => {
      const { controller } = setup(['cat', 'dog']);
      controller.handleKey('c');
      expect(controller.handleKey('\x03')).toEqual({ type: 'abort' });
      expect(controller.isFinished).toBe(true);
    });

    it('ignores everything after the game ends', () => {
      const { controller } = setup(['cat', 'dog']);
      controller.handleKey('\x03');
      expect(controller.handleKey('c')).toEqual({ type: 'ignore' });
      expect(controller.state.input).toBe('');
    });

    it('plays a whole game of two words', () => {
      const { controller, clock, type } = setup(['cat', 'dog']);
      type('c', 'a', 't', ' ');
      expect(controller.state.statuses[0]).toBe('typedCorrect');
      expect(controller.state.currentWord).toBe(1);
      expect(controller.state.keysPressed).toBe(4);

      type('d', 'o', 'g');
      clock.now = 3000;
      type(' ');
      expect(controller.state.statuses[1]).toBe('typedCorrect');
      expect(controller.state.currentWord).toBe(2);
      expect(controller.isFinished).toBe(true);
      expect(controller.state.keysPressed).toBe(8);

      const stats = computeStats(controller.state);
      expect(stats.correctChars).toBe(8);
      expect(stats.wrongChars).toBe(0);
      expect(stats.accuracy).toBe(1);
      expect(stats.elapsedSeconds).toBe(2);
      expect(stats.charsPerSecond).toBe(4);
      expect(stats.wordsPerMinute).toBe(48);
    });

    it('counts every edit made before a commit', () => {
      const { controller, type } = setup(['cat', 'dog']);
      type('c', 'a', 'x', '\x7f', 't');
      expect(controller.state.input).toBe('cat');
      expect(controller.state.wordKeysPressed).toBe(5);

      type(' ');
      expect(controller.state.statuses[0]).toBe('typedCorrect');
      expect(controller.state.keysPressed).toBe(6);
    });

    it('clears the word on Ctrl-W', () => {
      const { controller, type } = setup(['cat', 'dog']);
      type('d', 'o', '\x17', 'c', 'a', 't', ' ');
      expect(controller.state.statuses[0]).toBe('typedCorrect');
      expect(controller.state.keysPressed).toBe(7);
    });

    it('ignores a doubled space by default', () => {
      const { controller, type } = setup(['cat', 'dog']);
      type('c', 'a', 't', ' ', ' ');
      expect(controller.state.currentWord).toBe(1);
      expect(controller.state.statuses[1]).toBe('typingCorrect');
      expect(controller.state.keysPressed).toBe(4);
    });

    it('commits an empty wrong word on a doubled space in rigorous mode', () => {
      const { controller, type } = setup(['cat', 'dog', 'emu'], { rigorousSpaces: true });
      type('c', 'a', 't', ' ', ' ');
      expect(controller.state.currentWord).toBe(2);
      expect(controller.state.statuses).toEqual(['typedCorrect', 'typedWrong', 'typingCorrect']);
      expect(controller.state.keysPressed).toBe(5);
    });

    it('commits on a leading space in rigorous mode and starts the clock', () => {
      const { controller, type } = setup(['cat', 'dog'], { rigorousSpaces: true });
      type(' ');
      expect(controller.isStarted).toBe(true);
      expect(controller.state.statuses[0]).toBe('typedWrong');
      expect(controller.state.currentWord).toBe(1);
    });
  });

  describe('state consistency', () => {
    it('moves forward monotonically with one word being typed at a time', () => {
      const { controller } = setup(['ab', 'cd', 'ef', 'gh', 'ij', 'kl'], { maxTime: 100 });
      const keys = ['a', 'b', ' ', 'x', '\x7f', 'c', 'd', ' ', ' ', 'e', '\x17', 'e', 'f', ' ', 'g', 'z', ' ', 'i'];

      let lastWord = 0;
      let lastKeys = 0;
      let lastTime = controller.state.timeLeft;
      keys.forEach((key, i) => {
        controller.handleKey(key);
        if (i % 3 === 0) controller.tick();

        const { state } = controller;
        expect(state.currentWord).toBeGreaterThanOrEqual(lastWord);
        expect(state.keysPressed).toBeGreaterThanOrEqual(lastKeys);
        expect(state.timeLeft).toBeLessThanOrEqual(lastTime);
        expect(state.statuses.filter(isTypingStatus)).toHaveLength(1);
        expect(state.statuses.slice(0, state.currentWord).every(s => s === 'typedCorrect' || s === 'typedWrong')).toBe(true);
        expect(state.statuses.slice(state.currentWord + 1).every(s => s === 'untyped')).toBe(true);

        lastWord = state.currentWord;
        lastKeys = state.keysPressed;
        lastTime = state.timeLeft;
      });

      expect(controller.state.statuses.slice(0, 4)).toEqual(['typedCorrect', 'typedCorrect', 'typedCorrect', 'typedWrong']);
      controller.finish();
      expect(controller.state.statuses.filter(isTypingStatus)).toHaveLength(0);
    });
  });
});
