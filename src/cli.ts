/**
 * CLI entry point for blockfall
 *
 * Provides a Node.js terminal adapter that maps stdin/stdout to the
 * xterm.js-compatible surface the game draws on, so it runs directly in
 * any terminal emulator.
 */

import * as p from '@clack/prompts';
import { parseArgs } from './args';
import { type BlockfallController, runBlockfall } from './game';
import { setDebug } from './log';
import { type PhosphorMode, getThemeModes, isLightTheme, isValidThemeMode } from './themes';
import { type GameTerminal, setTheme } from './utils';

// ---------------------------------------------------------------------------
// Node Terminal Adapter
// ---------------------------------------------------------------------------

// Synchronized output: wrap writes with DEC sync sequences so the
// terminal batches clear + redraw into a single atomic paint.
const SYNC_START = '\x1b[?2026h';
const SYNC_END = '\x1b[?2026l';

const CTRL_C = '\x03';

interface NodeTerminal {
  terminal: GameTerminal;
  /** Leave raw mode and give the screen back */
  restore: () => void;
}

function createNodeTerminal(onInterrupt: () => void): NodeTerminal {
  const dataListeners = new Set<Parameters<GameTerminal['onData']>[0]>();

  if (process.stdin.isTTY) {
    process.stdin.setRawMode(true);
  }
  process.stdin.resume();
  process.stdin.setEncoding('utf8');

  const onStdin = (data: string) => {
    if (data.includes(CTRL_C)) {
      onInterrupt();
      return;
    }
    for (const listener of [...dataListeners]) {
      listener(data);
    }
  };
  process.stdin.on('data', onStdin);

  let restored = false;
  function restore() {
    if (restored) return;
    restored = true;
    process.stdin.off('data', onStdin);
    if (process.stdin.isTTY) {
      process.stdin.setRawMode(false);
    }
    process.stdin.pause();
    process.stdout.write('\x1b[?1049l');
    process.stdout.write('\x1b[?25h');
    process.stdout.write('\x1b[0m');
  }

  const terminal: GameTerminal = {
    write: (data) => {
      process.stdout.write(SYNC_START + (typeof data === 'string' ? data : Buffer.from(data).toString('utf8')) + SYNC_END);
    },
    get cols() { return process.stdout.columns || 80; },
    get rows() { return process.stdout.rows || 24; },
    onData: (listener) => {
      dataListeners.add(listener);
      return { dispose: () => dataListeners.delete(listener) };
    },
  };

  process.on('exit', restore);
  process.on('SIGINT', onInterrupt);
  process.on('SIGTERM', onInterrupt);

  return { terminal, restore };
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

function printHelp() {
  console.log(`
  blockfall — falling-block puzzle for the terminal

  Usage:
    blockfall                    Play
    blockfall --theme <theme>    Set color theme
    blockfall --pick-theme       Choose a theme interactively
    blockfall --fps <n>          Frame rate, 1-240 (default 60)
    blockfall --debug            Log debug output to stderr
    blockfall --help             Show this help

  Themes:
    cyan (default), amber, green, white, hotpink, blood, ice,
    bladerunner, tron, kawaii, oled, solarized, nord, highcontrast,
    banana, cream, plus Light variants (e.g. cyanLight)

  Controls:
    ← → / A D            Move
    ↓ / S                Soft drop
    Space                Hard drop
    ↑ / X / W            Rotate clockwise
    Z                    Rotate counterclockwise
    C                    Hold
    ESC / P              Pause
    Enter                Start / resume / restart
    Q                    Quit (from start, pause or game over)

  Examples:
    blockfall --theme green
    BLOCKFALL_DEBUG=1 blockfall 2> blockfall.log
`);
}

async function chooseTheme(initial: PhosphorMode): Promise<PhosphorMode | null> {
  const choice = await p.select<{ value: string; label?: string; hint?: string }[], string>({
    message: 'Pick a color theme',
    initialValue: initial,
    options: getThemeModes().map((mode) => ({
      value: mode,
      label: mode,
      hint: isLightTheme(mode) ? 'light background' : undefined,
    })),
  });
  if (p.isCancel(choice) || !isValidThemeMode(choice)) return null;
  return choice;
}

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2));

  if (parsed.kind === 'help') {
    printHelp();
    return 0;
  }
  if (parsed.kind === 'error') {
    console.error(parsed.message);
    return 1;
  }

  const { options } = parsed;
  if (options.debug) setDebug(true);

  let theme = options.theme;
  if (options.pickTheme) {
    p.intro('blockfall');
    const picked = await chooseTheme(theme);
    if (!picked) {
      p.cancel('No theme picked.');
      return 0;
    }
    theme = picked;
  }
  setTheme(theme);

  let handle: BlockfallController | undefined;
  const { terminal, restore } = createNodeTerminal(() => handle?.stop());
  handle = runBlockfall(terminal, { fps: options.fps });

  try {
    const score = await handle.finished;
    restore();
    p.outro(`Final score: ${score}`);
    return 0;
  } catch (error) {
    restore();
    console.error(error instanceof Error ? error.message : String(error));
    return 1;
  }
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
);
