/**
 * blockfall
 *
 * Falling-block puzzle game for xterm.js and the CLI.
 *
 * Library usage (xterm.js):
 *   import { runBlockfall, setTheme } from 'blockfall';
 *   setTheme('amber');
 *   const controller = runBlockfall(terminal);
 *   const score = await controller.finished;
 *
 * The engine (GameController, Playfield, ...) has no terminal dependency
 * and can be driven by any InputSource and DrawSink.
 */

export { runBlockfall, DEFAULT_FPS, type GameOptions, type BlockfallController } from './game';

export {
  GameController,
  randomShape,
  WALL_KICKS,
  PLAY_ACTIONS,
  type GameState,
  type ActivePiece,
  type GameSnapshot,
  type ShapePicker,
  type ControllerOptions,
} from './engine/controller';
export { Playfield, WIDTH, HEIGHT, SPAWN_ANCHOR, CLEAR_SCORES, scoreForClears, inBounds, type Cell, type Anchor } from './engine/playfield';
export {
  PIECE_SHAPES,
  PIECE_ANSI,
  GHOST_ALPHA,
  pieceOffsets,
  fillColor,
  ghostColor,
  isPieceShape,
  type PieceShape,
  type Offset,
  type PieceOffsets,
  type Rgba,
} from './engine/pieces';
export { ROTATIONS, spinClockwise, spinCounterclockwise, type Rotation } from './engine/rotation';
export { Level, SPEED_STEPS, tickIntervalFor } from './engine/level';
export { ContractViolationError, invariant } from './engine/errors';

export {
  ACTIONS,
  DEFAULT_BINDINGS,
  isTriggered,
  type Action,
  type KeySignal,
  type InputSource,
  type KeyBindings,
} from './input/actions';
export {
  DebouncedKeyboard,
  parseKeys,
  DEFAULT_REFRACTORY_FRAMES,
  DEFAULT_HOLD_FRAMES,
  type KeyboardOptions,
} from './input/keyboard';

export { AnsiRenderer, renderFrame, type DrawSink, type RenderOptions } from './render/ansi';

export {
  setTheme,
  getTheme,
  getCurrentThemeColor,
  isLightTheme,
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
  getVerticalAnchor,
  type GameTerminal,
  type PhosphorMode,
} from './utils';
export { THEME_MODES, getAnsiColor, getThemeModes, isValidThemeMode, ANSI_RESET } from './themes';
export { createLogger, setDebug, isDebugEnabled, type Logger } from './log';
