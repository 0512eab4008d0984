/**
 * Shared fixtures for the test suites
 */

import type { GameSnapshot, ShapePicker } from './engine/controller';
import type { PieceShape } from './engine/pieces';
import type { Action, InputSource } from './input/actions';
import type { GameTerminal } from './utils';

/**
 * Input where exactly the given actions fire this frame
 */
export function inputOf(...triggered: Action[]): InputSource {
  return {
    state: (action) => (triggered.includes(action) ? 'triggered' : 'released'),
  };
}

export const NO_INPUT: InputSource = inputOf();

/**
 * Picker that deals the given shapes in order, repeating from the start
 */
export function dealing(...shapes: PieceShape[]): ShapePicker {
  let i = 0;
  return () => shapes[i++ % shapes.length];
}

/**
 * Grid as text rows, `.` for empty cells
 */
export function rowsOf(snapshot: GameSnapshot): string[] {
  return snapshot.grid.map((row) => row.map((cell) => cell ?? '.').join(''));
}

export const EMPTY_ROW = '..........';

/**
 * In-memory terminal: records writes and lets tests type keys
 */
export function fakeTerminal(cols = 80, rows = 30) {
  const listeners = new Set<Parameters<GameTerminal['onData']>[0]>();
  const output: string[] = [];
  const terminal: GameTerminal = {
    cols,
    rows,
    write: (data) => {
      output.push(typeof data === 'string' ? data : new TextDecoder().decode(data));
    },
    onData: (listener) => {
      listeners.add(listener);
      return { dispose: () => listeners.delete(listener) };
    },
  };
  return {
    terminal,
    output,
    type: (data: string) => {
      for (const listener of listeners) listener(data);
    },
    listenerCount: () => listeners.size,
  };
}
