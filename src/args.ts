/**
 * Command-line flags for the blockfall binary
 */

import { type PhosphorMode, getThemeModes, isValidThemeMode } from './themes';
import { DEFAULT_FPS } from './game';

export const MAX_FPS = 240;

export interface RunOptions {
  theme: PhosphorMode;
  fps: number;
  debug: boolean;
  pickTheme: boolean;
}

export type ParsedArgs =
  | { kind: 'run'; options: RunOptions }
  | { kind: 'help' }
  | { kind: 'error'; message: string };

export function parseArgs(args: readonly string[]): ParsedArgs {
  const options: RunOptions = { theme: 'cyan', fps: DEFAULT_FPS, debug: false, pickTheme: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--help':
      case '-h':
        return { kind: 'help' };

      case '--debug':
        options.debug = true;
        break;

      case '--pick-theme':
        options.pickTheme = true;
        break;

      case '--theme': {
        const value = args[++i];
        if (value === undefined) return { kind: 'error', message: '--theme needs a value' };
        if (!isValidThemeMode(value)) {
          return {
            kind: 'error',
            message: `Unknown theme: ${value}\nAvailable themes: ${getThemeModes().join(', ')}`,
          };
        }
        options.theme = value;
        break;
      }

      case '--fps': {
        const value = args[++i];
        if (value === undefined) return { kind: 'error', message: '--fps needs a value' };
        const fps = Number(value);
        if (!Number.isInteger(fps) || fps < 1 || fps > MAX_FPS) {
          return { kind: 'error', message: `Invalid --fps value: ${value} (expected 1-${MAX_FPS})` };
        }
        options.fps = fps;
        break;
      }

      default:
        return { kind: 'error', message: `Unknown option: ${arg}` };
    }
  }

  return { kind: 'run', options };
}
