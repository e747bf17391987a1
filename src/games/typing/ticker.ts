/**
 * Countdown ticker
 *
 * A cooperative task that ticks the game once per interval until the game
 * finishes. Finishing aborts the controller's signal, which cuts the
 * pending sleep short instead of waiting out the interval.
 */

import type { GameController } from './controller';

/** One tick per second */
export const TICK_INTERVAL_MS = 1000;

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Sleep helper that rejects with an AbortError when the signal fires
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const abortError = () => Object.assign(new Error('Sleep aborted'), { name: 'AbortError' });
    if (signal?.aborted) {
      reject(abortError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(abortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run the countdown until the game finishes.
 *
 * @param onTick - Called after every applied tick (used to re-render)
 */
export async function runTicker(
  controller: GameController,
  onTick: () => void,
  intervalMs: number = TICK_INTERVAL_MS
): Promise<void> {
  try {
    while (!controller.isFinished) {
      await sleep(intervalMs, controller.signal);
      controller.tick();
      onTick();
    }
  } catch (error) {
    // Finishing mid-sleep is the normal way out
    if (!isAbortError(error)) throw error;
  }
}
