/**
 * Node terminal adapter
 *
 * Maps process.stdin/stdout onto the xterm.js-compatible TerminalLike
 * shape games are written against. Raw mode makes keys arrive one at a
 * time and unechoed; cleanup() puts the terminal back the way it was.
 */

import type { IDisposable, IEvent } from '@xterm/xterm';
import { TextDecoder } from 'util';
import type { TerminalLike } from './games/utils';
import { debugLog } from './log';

export interface NodeTerminal extends TerminalLike {
  /** Leave raw mode, stop reading stdin and reset colors. Safe to call twice. */
  cleanup: () => void;
}

type ChunkListener = (chunk: Buffer | string) => void;

/** The parts of process.stdin the adapter uses */
export interface InputStream {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
  resume: () => unknown;
  pause: () => unknown;
  on: (event: 'data', listener: ChunkListener) => unknown;
  off: (event: 'data', listener: ChunkListener) => unknown;
}

/** The parts of process.stdout the adapter uses */
export interface OutputStream {
  columns?: number;
  write: (data: string | Uint8Array) => unknown;
}

export interface NodeTerminalStreams {
  stdin: InputStream;
  stdout: OutputStream;
}

export function createNodeTerminal(
  streams: NodeTerminalStreams = { stdin: process.stdin, stdout: process.stdout }
): NodeTerminal {
  const { stdin, stdout } = streams;
  const dataListeners: ((data: string) => void)[] = [];
  let decoder = new TextDecoder('utf-8', { fatal: true });
  let cleanedUp = false;

  if (stdin.isTTY) {
    stdin.setRawMode?.(true);
  }
  stdin.resume();

  const onStdinData: ChunkListener = (chunk) => {
    let data: string;
    if (typeof chunk === 'string') {
      data = chunk;
    } else {
      try {
        data = decoder.decode(chunk, { stream: true });
      } catch (error) {
        // A garbled keystroke only costs that keystroke
        debugLog('Terminal', 'dropped undecodable input', error);
        decoder = new TextDecoder('utf-8', { fatal: true });
        return;
      }
    }
    if (!data) return;

    for (const listener of [...dataListeners]) {
      listener(data);
    }
  };
  stdin.on('data', onStdinData);

  function cleanup() {
    if (cleanedUp) return;
    cleanedUp = true;
    stdin.off('data', onStdinData);
    if (stdin.isTTY) {
      stdin.setRawMode?.(false);
    }
    stdin.pause();
    stdout.write('\x1b[0m');
  }

  const onData: IEvent<string> = (listener): IDisposable => {
    const callback = (data: string) => listener(data);
    dataListeners.push(callback);
    return {
      dispose: () => {
        const idx = dataListeners.indexOf(callback);
        if (idx !== -1) dataListeners.splice(idx, 1);
      },
    };
  };

  return {
    write: (data: string | Uint8Array) => {
      stdout.write(data);
    },
    get cols() { return stdout.columns || 80; },
    onData,
    cleanup,
  };
}
