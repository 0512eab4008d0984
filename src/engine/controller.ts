/**
 * Game Controller
 *
 * Owns the active piece, hold slot, next queue, fall timer and the
 * Start/Play/Pause/Over/Closed state machine. It is the only code that
 * mutates the Playfield and Level. One update() per frame, then
 * presentation reads snapshot().
 */

import { type Action, type InputSource, isTriggered } from '../input/actions';
import { createLogger } from '../log';
import { invariant } from './errors';
import { Level } from './level';
import { PIECE_SHAPES, type PieceShape } from './pieces';
import {
  type Anchor,
  type Cell,
  Playfield,
  SPAWN_ANCHOR,
  scoreForClears,
} from './playfield';
import { type Rotation, spinClockwise, spinCounterclockwise } from './rotation';

const log = createLogger('Game');

export type GameState = 'start' | 'play' | 'pause' | 'over' | 'closed';

export interface ActivePiece {
  readonly shape: PieceShape;
  readonly rotation: Rotation;
  readonly anchor: Anchor;
}

export interface GameSnapshot {
  readonly grid: readonly (readonly Cell[])[];
  readonly active: ActivePiece & {
    /** Rows to the hard-drop landing spot, for the ghost */
    readonly landingOffset: number;
  };
  readonly hold: PieceShape | null;
  readonly next: PieceShape;
  readonly score: number;
  readonly state: GameState;
  readonly level: number;
  readonly tickInterval: number;
  readonly piecesPlaced: number;
  readonly linesCleared: number;
}

export type ShapePicker = () => PieceShape;

/**
 * Uniform choice among the seven shapes
 */
export function randomShape(): PieceShape {
  return PIECE_SHAPES[Math.floor(Math.random() * PIECE_SHAPES.length)];
}

/** Column offsets tried, in order, when a rotation collides */
export const WALL_KICKS: readonly number[] = [0, -1, 1, -2, 2];

/** Discrete play actions in priority order; at most one fires per frame */
export const PLAY_ACTIONS: readonly Action[] = [
  'moveLeft',
  'moveRight',
  'softDrop',
  'hardDrop',
  'rotateClockwise',
  'rotateCounterclockwise',
  'hold',
];

export interface ControllerOptions {
  pickShape?: ShapePicker;
  /** Starting grid for the first session; restarts always get an empty one */
  playfield?: Playfield;
}

export class GameController {
  private readonly pickShape: ShapePicker;
  private currentState: GameState = 'start';

  private playfield: Playfield;
  private level: Level;
  private piece: ActivePiece;
  private held: PieceShape | null;
  private swapUsed: boolean;
  private upcoming: PieceShape;
  private fallTimer: number;
  private points: number;
  private lines: number;

  constructor(options: ControllerOptions = {}) {
    this.pickShape = options.pickShape ?? randomShape;
    this.playfield = options.playfield ?? new Playfield();
    this.level = new Level();
    this.piece = this.spawn(this.pickShape());
    this.upcoming = this.pickShape();
    this.held = null;
    this.swapUsed = false;
    this.fallTimer = 0;
    this.points = 0;
    this.lines = 0;
  }

  get state(): GameState {
    return this.currentState;
  }

  get score(): number {
    return this.points;
  }

  get active(): ActivePiece {
    return this.piece;
  }

  /**
   * Advance one frame. Must not be called once the game is closed.
   */
  update(input: InputSource): void {
    invariant(this.currentState !== 'closed', 'update() called after the game was closed');

    switch (this.currentState) {
      case 'start':
        if (isTriggered(input, 'start')) {
          this.currentState = 'play';
        } else if (isTriggered(input, 'quit')) {
          this.close();
        }
        return;

      case 'play':
        this.updatePlay(input);
        return;

      case 'pause':
        if (isTriggered(input, 'unpause')) {
          this.currentState = 'play';
        } else if (isTriggered(input, 'quit')) {
          this.close();
        }
        return;

      case 'over':
        if (isTriggered(input, 'restart')) {
          this.newSession();
          this.currentState = 'play';
        } else if (isTriggered(input, 'quit')) {
          this.close();
        }
        return;
    }
  }

  /**
   * Enter the terminal state from anywhere (quit, terminal teardown).
   */
  close(): void {
    if (this.currentState === 'closed') return;
    log.debug(`Closed with score ${this.points}`);
    this.currentState = 'closed';
  }

  snapshot(): GameSnapshot {
    const { shape, rotation, anchor } = this.piece;
    return {
      grid: this.playfield.snapshot(),
      active: {
        shape,
        rotation,
        anchor,
        landingOffset: this.playfield.landingOffset(shape, rotation, anchor),
      },
      hold: this.held,
      next: this.upcoming,
      score: this.points,
      state: this.currentState,
      level: this.level.levelNumber,
      tickInterval: this.level.tickInterval,
      piecesPlaced: this.level.piecesPlaced,
      linesCleared: this.lines,
    };
  }

  private updatePlay(input: InputSource): void {
    if (isTriggered(input, 'pause')) {
      this.currentState = 'pause';
      return;
    }

    const action = PLAY_ACTIONS.find((candidate) => isTriggered(input, candidate));
    if (action !== undefined) {
      this.perform(action);
      return;
    }

    this.fallTimer++;
    if (this.fallTimer >= this.level.tickInterval) {
      if (this.tryShift(0, 1)) {
        this.fallTimer = 0;
      } else {
        this.lockActive();
      }
    }
  }

  private perform(action: Action): void {
    switch (action) {
      case 'moveLeft':
        this.tryShift(-1, 0);
        return;
      case 'moveRight':
        this.tryShift(1, 0);
        return;
      case 'softDrop':
        if (this.tryShift(0, 1)) {
          this.fallTimer = 0;
        } else {
          this.lockActive();
        }
        return;
      case 'hardDrop':
        this.hardDrop();
        return;
      case 'rotateClockwise':
        this.tryRotate(spinClockwise(this.piece.rotation));
        return;
      case 'rotateCounterclockwise':
        this.tryRotate(spinCounterclockwise(this.piece.rotation));
        return;
      case 'hold':
        this.swapHold();
        return;
      default:
        return;
    }
  }

  private tryShift(dx: number, dy: number): boolean {
    const { shape, rotation, anchor } = this.piece;
    if (!this.playfield.isLegal(shape, rotation, anchor, dx, dy)) {
      return false;
    }
    this.piece = { ...this.piece, anchor: { col: anchor.col + dx, row: anchor.row + dy } };
    return true;
  }

  /**
   * Rotate in place, or at the first wall-kick column offset that fits.
   */
  private tryRotate(target: Rotation): void {
    const { shape, anchor } = this.piece;
    const kick = WALL_KICKS.find((dx) => this.playfield.isLegal(shape, target, anchor, dx, 0));
    if (kick === undefined) return;
    this.piece = { shape, rotation: target, anchor: { col: anchor.col + kick, row: anchor.row } };
  }

  private hardDrop(): void {
    const { shape, rotation, anchor } = this.piece;
    const drop = this.playfield.landingOffset(shape, rotation, anchor);
    this.piece = { ...this.piece, anchor: { col: anchor.col, row: anchor.row + drop } };
    this.lockActive();
  }

  /**
   * Once per piece: park the active shape in the hold slot and bring in
   * the held one (or the next one when the slot is empty).
   */
  private swapHold(): void {
    if (this.swapUsed) return;

    const incoming = this.held ?? this.upcoming;
    if (!this.playfield.isLegal(incoming, 0, SPAWN_ANCHOR, 0, 0)) return;

    if (this.held === null) {
      this.upcoming = this.pickShape();
    }
    this.held = this.piece.shape;
    this.piece = this.spawn(incoming);
    this.swapUsed = true;
  }

  private lockActive(): void {
    const { shape, rotation, anchor } = this.piece;
    this.playfield.lockPiece(shape, rotation, anchor);

    const cleared = this.playfield.squashFilledRows();
    this.points += scoreForClears(cleared);
    this.lines += cleared;

    this.piece = { ...this.piece, anchor: SPAWN_ANCHOR };
    if (!this.playfield.isLegal(this.upcoming, 0, SPAWN_ANCHOR, 0, 0)) {
      log.debug(`Spawn blocked, game over with score ${this.points}`);
      this.currentState = 'over';
      return;
    }

    this.piece = this.spawn(this.upcoming);
    this.upcoming = this.pickShape();
    this.swapUsed = false;
    this.level.update();
    this.fallTimer = 0;
  }

  private spawn(shape: PieceShape): ActivePiece {
    return { shape, rotation: 0, anchor: SPAWN_ANCHOR };
  }

  private newSession(): void {
    this.playfield = new Playfield();
    this.level = new Level();
    this.piece = this.spawn(this.pickShape());
    this.upcoming = this.pickShape();
    this.held = null;
    this.swapUsed = false;
    this.fallTimer = 0;
    this.points = 0;
    this.lines = 0;
  }
}
