/**
 * Debug logging
 *
 * The game owns the terminal while it runs, so diagnostics stay quiet
 * unless TYPEDASH_DEBUG is set. Output goes to stderr, which can be
 * redirected away from the display: `TYPEDASH_DEBUG=1 typedash 2>debug.log`.
 */

export const DEBUG_ENV = 'TYPEDASH_DEBUG';

export function isDebugEnabled(): boolean {
  const value = process.env[DEBUG_ENV];
  return value !== undefined && value !== '' && value !== '0';
}

export function debugLog(module: string, message: string, data?: unknown): void {
  if (!isDebugEnabled()) return;
  if (data === undefined) {
    console.warn(`[${module}] ${message}`);
  } else {
    console.warn(`[${module}] ${message}`, data);
  }
}
