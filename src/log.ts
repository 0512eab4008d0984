/**
 * Tagged console logging
 *
 * Messages are prefixed with their source tag, e.g. `[Level] Tick rate: 25`.
 * Debug output is off unless enabled with setDebug() or BLOCKFALL_DEBUG=1.
 * Everything goes to stderr so a running game's frames on stdout stay intact.
 */

export interface Logger {
  debug: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

let debugEnabled =
  typeof process !== 'undefined' && process.env.BLOCKFALL_DEBUG === '1';

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

export function createLogger(tag: string): Logger {
  return {
    debug: (message) => {
      if (debugEnabled) console.error(`[${tag}] ${message}`);
    },
    warn: (message) => console.warn(`[${tag}] ${message}`),
    error: (message) => console.error(`[${tag}] ${message}`),
  };
}
