/**
 * Playfield
 *
 * Fixed 10×22 grid of cells, row 0 at the top. Owns the collision
 * primitive, piece placement and line-clear compaction.
 */

import { invariant } from './errors';
import { type PieceShape, isPieceShape, pieceOffsets } from './pieces';
import type { Rotation } from './rotation';

export const WIDTH = 10;
export const HEIGHT = 22;

export type Cell = PieceShape | null;

export interface Anchor {
  readonly col: number;
  readonly row: number;
}

/** Where every new piece appears, at rotation 0 */
export const SPAWN_ANCHOR: Anchor = { col: WIDTH / 2, row: 1 };

/** Points awarded per lock, indexed by rows cleared */
export const CLEAR_SCORES: readonly number[] = [0, 5, 15, 30, 50];

export function scoreForClears(rowsCleared: number): number {
  invariant(
    Number.isInteger(rowsCleared) && rowsCleared >= 0 && rowsCleared < CLEAR_SCORES.length,
    `cannot clear ${rowsCleared} rows with a single piece`,
  );
  return CLEAR_SCORES[rowsCleared];
}

export function inBounds(col: number, row: number): boolean {
  return Number.isInteger(col) && Number.isInteger(row) &&
    col >= 0 && col < WIDTH && row >= 0 && row < HEIGHT;
}

export class Playfield {
  private readonly cells: Cell[] = new Array<Cell>(WIDTH * HEIGHT).fill(null);

  /**
   * Build a playfield from text rows, top to bottom. `.` is empty, a shape
   * letter is an occupied cell. Fewer than HEIGHT rows fill the bottom.
   */
  static fromRows(rows: readonly string[]): Playfield {
    invariant(rows.length <= HEIGHT, `expected at most ${HEIGHT} rows, got ${rows.length}`);
    const field = new Playfield();
    const top = HEIGHT - rows.length;
    rows.forEach((text, i) => {
      invariant(text.length === WIDTH, `row ${top + i} must have ${WIDTH} cells: "${text}"`);
      for (let col = 0; col < WIDTH; col++) {
        const ch = text[col];
        if (ch === '.') continue;
        invariant(isPieceShape(ch), `unknown cell "${ch}" in row ${top + i}`);
        field.setCell(col, top + i, ch);
      }
    });
    return field;
  }

  cellAt(col: number, row: number): Cell {
    return this.cells[Playfield.indexOf(col, row)];
  }

  setCell(col: number, row: number, cell: Cell): void {
    this.cells[Playfield.indexOf(col, row)] = cell;
  }

  /**
   * True when every cell of the piece, shifted by (dx, dy), is inside the
   * field and empty. All movement, rotation and spawn checks use this.
   */
  isLegal(shape: PieceShape, rotation: Rotation, anchor: Anchor, dx: number, dy: number): boolean {
    for (const [ox, oy] of pieceOffsets(shape, rotation)) {
      const col = anchor.col + ox + dx;
      const row = anchor.row + oy + dy;
      if (!inBounds(col, row) || this.cellAt(col, row) !== null) {
        return false;
      }
    }
    return true;
  }

  /**
   * Rows the piece can fall before it would collide (0 when resting).
   */
  landingOffset(shape: PieceShape, rotation: Rotation, anchor: Anchor): number {
    let offset = 0;
    while (this.isLegal(shape, rotation, anchor, 0, offset + 1)) {
      offset++;
    }
    return offset;
  }

  /**
   * Write the piece into the grid. Legality is the caller's job.
   */
  lockPiece(shape: PieceShape, rotation: Rotation, anchor: Anchor): void {
    for (const [ox, oy] of pieceOffsets(shape, rotation)) {
      this.setCell(anchor.col + ox, anchor.row + oy, shape);
    }
  }

  isRowFilled(row: number): boolean {
    for (let col = 0; col < WIDTH; col++) {
      if (this.cellAt(col, row) === null) return false;
    }
    return true;
  }

  /**
   * Remove every filled row and drop the rows above into the gaps.
   *
   * One pass from the bottom up: each surviving row moves down by the
   * number of filled rows found beneath it, then the rows freed at the top
   * are emptied. Returns how many rows were removed.
   */
  squashFilledRows(): number {
    let cleared = 0;
    for (let row = HEIGHT - 1; row >= 0; row--) {
      if (this.isRowFilled(row)) {
        cleared++;
      } else if (cleared > 0) {
        this.copyRow(row, row + cleared);
      }
    }
    for (let row = 0; row < cleared; row++) {
      this.clearRow(row);
    }
    return cleared;
  }

  /**
   * Copy of the grid as rows, for presentation
   */
  snapshot(): Cell[][] {
    const rows: Cell[][] = [];
    for (let row = 0; row < HEIGHT; row++) {
      rows.push(this.cells.slice(row * WIDTH, (row + 1) * WIDTH));
    }
    return rows;
  }

  /**
   * Inverse of fromRows(), always HEIGHT rows
   */
  toRows(): string[] {
    return this.snapshot().map((cells) => cells.map((cell) => cell ?? '.').join(''));
  }

  private copyRow(from: number, to: number): void {
    for (let col = 0; col < WIDTH; col++) {
      this.setCell(col, to, this.cellAt(col, from));
    }
  }

  private clearRow(row: number): void {
    for (let col = 0; col < WIDTH; col++) {
      this.setCell(col, row, null);
    }
  }

  private static indexOf(col: number, row: number): number {
    invariant(inBounds(col, row), `cell (${col}, ${row}) is outside the ${WIDTH}×${HEIGHT} playfield`);
    return row * WIDTH + col;
  }
}
