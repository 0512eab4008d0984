/**
 * Logical actions and the input contract the game controller polls.
 */

export type Action =
  | 'moveLeft'
  | 'moveRight'
  | 'softDrop'
  | 'hardDrop'
  | 'rotateClockwise'
  | 'rotateCounterclockwise'
  | 'hold'
  | 'pause'
  | 'unpause'
  | 'start'
  | 'restart'
  | 'quit';

export const ACTIONS: readonly Action[] = [
  'moveLeft',
  'moveRight',
  'softDrop',
  'hardDrop',
  'rotateClockwise',
  'rotateCounterclockwise',
  'hold',
  'pause',
  'unpause',
  'start',
  'restart',
  'quit',
];

/**
 * Debounced per-action signal for the current frame
 *
 * - `triggered`: newly fired this frame
 * - `held`: still down, inside its refractory period
 * - `released`: not down
 */
export type KeySignal = 'triggered' | 'held' | 'released';

export interface InputSource {
  state: (action: Action) => KeySignal;
}

/** Key names (DOM KeyboardEvent.key values) that fire each action */
export type KeyBindings = Readonly<Record<Action, readonly string[]>>;

// Letters are bound in both cases so Caps Lock does not disable them
export const DEFAULT_BINDINGS: KeyBindings = {
  moveLeft: ['ArrowLeft', 'a', 'A'],
  moveRight: ['ArrowRight', 'd', 'D'],
  softDrop: ['ArrowDown', 's', 'S'],
  hardDrop: [' '],
  rotateClockwise: ['ArrowUp', 'x', 'X', 'w', 'W'],
  rotateCounterclockwise: ['z', 'Z'],
  hold: ['c', 'C'],
  pause: ['Escape', 'p', 'P'],
  unpause: ['Enter'],
  start: ['Enter'],
  restart: ['Enter', 'r', 'R'],
  quit: ['q', 'Q'],
};

export function isTriggered(input: InputSource, action: Action): boolean {
  return input.state(action) === 'triggered';
}
