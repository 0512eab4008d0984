/**
 * Blockfall frame loop
 *
 * Drives a GameController at a fixed frame rate on an xterm.js-compatible
 * terminal: sample keys, update, draw. Stops when the controller reaches
 * Closed, or on stop(), and hands back the final score.
 */

import { GameController, type ShapePicker } from './engine/controller';
import { invariant } from './engine/errors';
import type { KeyBindings } from './input/actions';
import { DebouncedKeyboard } from './input/keyboard';
import { createLogger } from './log';
import { AnsiRenderer, type DrawSink } from './render/ansi';
import { type GameTerminal, enterAlternateBuffer, exitAlternateBuffer } from './utils';

const log = createLogger('Blockfall');

export const DEFAULT_FPS = 60;

export interface GameOptions {
  fps?: number;
  pickShape?: ShapePicker;
  bindings?: KeyBindings;
  refractoryFrames?: number;
  holdFrames?: number;
  /** Defaults to an AnsiRenderer on the same terminal */
  sink?: DrawSink;
}

/**
 * Blockfall Game Controller
 */
export interface BlockfallController {
  stop: () => void;
  readonly isRunning: boolean;
  /** Resolves with the final score once the loop has stopped */
  readonly finished: Promise<number>;
  readonly game: GameController;
}

export function runBlockfall(terminal: GameTerminal, options: GameOptions = {}): BlockfallController {
  const fps = options.fps ?? DEFAULT_FPS;
  invariant(Number.isFinite(fps) && fps > 0, `fps must be a positive number, got ${fps}`);

  const game = new GameController({ pickShape: options.pickShape });
  const keyboard = new DebouncedKeyboard({
    bindings: options.bindings,
    refractoryFrames: options.refractoryFrames,
    holdFrames: options.holdFrames,
  });
  const sink = options.sink ?? new AnsiRenderer(terminal);

  let running = true;
  let resolveFinished: (score: number) => void = () => {};
  let rejectFinished: (error: unknown) => void = () => {};
  const finished = new Promise<number>((resolve, reject) => {
    resolveFinished = resolve;
    rejectFinished = reject;
  });

  enterAlternateBuffer(terminal, 'blockfall');
  const keyListener = terminal.onData((data) => keyboard.feed(data));

  function teardown(reason: string): void {
    running = false;
    clearInterval(frameInterval);
    keyListener.dispose();
    exitAlternateBuffer(terminal, reason);
  }

  function fail(error: unknown): void {
    teardown('error');
    log.error(error instanceof Error ? error.message : String(error));
    rejectFinished(error);
  }

  function frame(): void {
    if (!running) return;
    try {
      keyboard.tick();
      game.update(keyboard);
      if (game.state === 'closed') {
        teardown('quit');
        resolveFinished(game.score);
        return;
      }
      sink.draw(game.snapshot());
    } catch (error) {
      fail(error);
    }
  }

  const frameInterval = setInterval(frame, Math.round(1000 / fps));
  log.debug(`Running at ${fps} fps`);

  try {
    sink.draw(game.snapshot());
  } catch (error) {
    fail(error);
  }

  return {
    stop: () => {
      if (!running) return;
      game.close();
      teardown('stop');
      resolveFinished(game.score);
    },
    get isRunning() {
      return running;
    },
    finished,
    game,
  };
}
