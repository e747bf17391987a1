/**
 * Key routing for the typing game
 *
 * Maps raw terminal input (as delivered by onData, possibly several
 * characters at once) onto game actions.
 */

export const KEY_INTERRUPT = '\x03'; // Ctrl-C
export const KEY_BACKSPACE = '\x7f';
export const KEY_WORD_ERASE = '\x17'; // Ctrl-W

export type KeyAction =
  | { type: 'abort' }
  | { type: 'backspace' }
  | { type: 'wordBackspace' }
  | { type: 'commitWord' }
  | { type: 'insert'; text: string }
  | { type: 'ignore' };

export interface RouteContext {
  /** Whether the current word has any pending input */
  hasInput: boolean;
  /** Commit an empty word on whitespace instead of ignoring it */
  rigorousSpaces: boolean;
}

/**
 * Decide what a chunk of raw input means for the game
 */
export function routeKey(key: string, context: RouteContext): KeyAction {
  if (key === '') return { type: 'ignore' };
  if (key === KEY_INTERRUPT) return { type: 'abort' };
  if (key === KEY_BACKSPACE) return { type: 'backspace' };
  if (key === KEY_WORD_ERASE) return { type: 'wordBackspace' };

  if (/^\s/.test(key)) {
    return context.hasInput || context.rigorousSpaces
      ? { type: 'commitWord' }
      : { type: 'ignore' };
  }

  const code = key.codePointAt(0) ?? 0;
  if (key.length > 1 || code >= 32) {
    return { type: 'insert', text: key };
  }

  // Remaining C0 control characters
  return { type: 'ignore' };
}
