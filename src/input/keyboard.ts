/**
 * Debounced keyboard input
 *
 * Turns raw terminal key data into per-action tri-state signals. Each
 * logical action owns its own refractory counter: after an action fires it
 * cannot fire again for `refractoryFrames` frames, however many of its keys
 * are down. Terminals send no key-up events, so a key counts as down for
 * `holdFrames` frames after the last data chunk that contained it.
 */

import {
  ACTIONS,
  type Action,
  DEFAULT_BINDINGS,
  type InputSource,
  type KeyBindings,
  type KeySignal,
} from './actions';

export const DEFAULT_REFRACTORY_FRAMES = 8;
export const DEFAULT_HOLD_FRAMES = 6;

export interface KeyboardOptions {
  bindings?: KeyBindings;
  refractoryFrames?: number;
  holdFrames?: number;
}

const ESCAPE_SEQUENCES: Record<string, string> = {
  '\x1b[A': 'ArrowUp',
  '\x1bOA': 'ArrowUp',
  '\x1b[B': 'ArrowDown',
  '\x1bOB': 'ArrowDown',
  '\x1b[C': 'ArrowRight',
  '\x1bOC': 'ArrowRight',
  '\x1b[D': 'ArrowLeft',
  '\x1bOD': 'ArrowLeft',
};

// CSI and SS3 sequences, Alt+key, then single characters. A lone ESC is
// the Escape key; any other sequence stays whole so it cannot read as one.
const TOKEN = /\x1b\[[0-9;]*[A-Za-z~]|\x1bO[A-Za-z]|\x1b[^\x1b[O]|[\s\S]/g;

/**
 * Parse raw terminal data into DOM KeyboardEvent.key names.
 * One chunk may hold several keys (typeahead, auto-repeat). Sequences
 * without a name (Delete, F1, Shift+arrow) pass through unchanged.
 */
export function parseKeys(data: string): string[] {
  const keys: string[] = [];
  for (const [token] of data.matchAll(TOKEN)) {
    keys.push(parseKey(token));
  }
  return keys;
}

function parseKey(token: string): string {
  const named = ESCAPE_SEQUENCES[token];
  if (named) return named;
  if (token === '\r' || token === '\n') return 'Enter';
  if (token === '\x1b') return 'Escape';
  if (token === '\x7f' || token === '\b') return 'Backspace';
  if (token === '\t') return 'Tab';
  return token;
}

export class DebouncedKeyboard implements InputSource {
  private readonly bindings: KeyBindings;
  private readonly refractoryFrames: number;
  private readonly holdFrames: number;

  /** key name → frames it still counts as down */
  private readonly down = new Map<string, number>();
  private readonly refractory = new Map<Action, number>();
  private readonly signals = new Map<Action, KeySignal>();

  constructor(options: KeyboardOptions = {}) {
    this.bindings = options.bindings ?? DEFAULT_BINDINGS;
    this.refractoryFrames = options.refractoryFrames ?? DEFAULT_REFRACTORY_FRAMES;
    this.holdFrames = options.holdFrames ?? DEFAULT_HOLD_FRAMES;
  }

  /**
   * Feed raw terminal data (xterm.js onData, Node stdin)
   */
  feed(data: string): void {
    for (const key of parseKeys(data)) {
      this.press(key);
    }
  }

  press(key: string): void {
    this.down.set(key, this.holdFrames);
  }

  /**
   * For sources that do report key-up
   */
  release(key: string): void {
    this.down.delete(key);
  }

  /**
   * Sample keys for the coming frame. Call once per frame, before update.
   */
  tick(): void {
    for (const action of ACTIONS) {
      const remaining = this.refractory.get(action) ?? 0;
      const pressed = this.bindings[action].some((key) => this.down.has(key));
      if (pressed && remaining === 0) {
        this.signals.set(action, 'triggered');
        this.refractory.set(action, this.refractoryFrames);
      } else {
        this.signals.set(action, pressed ? 'held' : 'released');
        this.refractory.set(action, Math.max(0, remaining - 1));
      }
    }

    for (const [key, frames] of this.down) {
      if (frames <= 1) {
        this.down.delete(key);
      } else {
        this.down.set(key, frames - 1);
      }
    }
  }

  state(action: Action): KeySignal {
    return this.signals.get(action) ?? 'released';
  }
}
