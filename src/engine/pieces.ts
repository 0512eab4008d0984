/**
 * Piece catalog
 *
 * Static geometry and colors for the seven shapes. Offsets are (dx, dy)
 * relative to a piece's anchor, with dy growing downward.
 */

import type { Rotation } from './rotation';

export type PieceShape = 'I' | 'O' | 'T' | 'J' | 'L' | 'S' | 'Z';

export const PIECE_SHAPES: readonly PieceShape[] = ['I', 'O', 'T', 'J', 'L', 'S', 'Z'];

export type Offset = readonly [dx: number, dy: number];
export type PieceOffsets = readonly [Offset, Offset, Offset, Offset];

export interface Rgba {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
}

export const GHOST_ALPHA = 0.3;

// Shapes with two-fold symmetry share their 0°/180° and 90°/270° sets.
const I_FLAT: PieceOffsets = [[-1, 0], [0, 0], [1, 0], [2, 0]];
const I_UPRIGHT: PieceOffsets = [[0, -1], [0, 0], [0, 1], [0, 2]];
const O_ANY: PieceOffsets = [[0, 0], [1, 0], [0, 1], [1, 1]];
const S_FLAT: PieceOffsets = [[0, 0], [1, 0], [-1, 1], [0, 1]];
const S_UPRIGHT: PieceOffsets = [[0, -1], [0, 0], [1, 0], [1, 1]];
const Z_FLAT: PieceOffsets = [[-1, 0], [0, 0], [0, 1], [1, 1]];
const Z_UPRIGHT: PieceOffsets = [[0, -1], [-1, 0], [0, 0], [-1, 1]];

const CATALOG: Readonly<Record<PieceShape, Readonly<Record<Rotation, PieceOffsets>>>> = {
  I: { 0: I_FLAT, 90: I_UPRIGHT, 180: I_FLAT, 270: I_UPRIGHT },
  O: { 0: O_ANY, 90: O_ANY, 180: O_ANY, 270: O_ANY },
  T: {
    0: [[0, -1], [-1, 0], [0, 0], [1, 0]],
    90: [[0, -1], [0, 0], [1, 0], [0, 1]],
    180: [[-1, 0], [0, 0], [1, 0], [0, 1]],
    270: [[0, -1], [-1, 0], [0, 0], [0, 1]],
  },
  J: {
    0: [[0, -1], [0, 0], [-1, 1], [0, 1]],
    90: [[-1, -1], [-1, 0], [0, 0], [1, 0]],
    180: [[0, -1], [1, -1], [0, 0], [0, 1]],
    270: [[-1, 0], [0, 0], [1, 0], [1, 1]],
  },
  L: {
    0: [[0, -1], [0, 0], [0, 1], [1, 1]],
    90: [[-1, 0], [0, 0], [1, 0], [-1, 1]],
    180: [[-1, -1], [0, -1], [0, 0], [0, 1]],
    270: [[1, -1], [-1, 0], [0, 0], [1, 0]],
  },
  S: { 0: S_FLAT, 90: S_UPRIGHT, 180: S_FLAT, 270: S_UPRIGHT },
  Z: { 0: Z_FLAT, 90: Z_UPRIGHT, 180: Z_FLAT, 270: Z_UPRIGHT },
};

const FILL_COLORS: Readonly<Record<PieceShape, Rgba>> = {
  I: { r: 0, g: 1, b: 1, a: 1 },
  O: { r: 1, g: 1, b: 0, a: 1 },
  T: { r: 1, g: 0, b: 1, a: 1 },
  J: { r: 0, g: 0, b: 1, a: 1 },
  L: { r: 1, g: 0.5, b: 0, a: 1 },
  S: { r: 0, g: 1, b: 0, a: 1 },
  Z: { r: 1, g: 0, b: 0, a: 1 },
};

/**
 * ANSI foreground codes used by the terminal renderer
 */
export const PIECE_ANSI: Readonly<Record<PieceShape, string>> = {
  I: '\x1b[96m', // Cyan
  O: '\x1b[93m', // Yellow
  T: '\x1b[95m', // Magenta
  J: '\x1b[94m', // Blue
  L: '\x1b[33m', // Orange (dark yellow)
  S: '\x1b[92m', // Green
  Z: '\x1b[91m', // Red
};

export function pieceOffsets(shape: PieceShape, rotation: Rotation): PieceOffsets {
  return CATALOG[shape][rotation];
}

export function fillColor(shape: PieceShape): Rgba {
  return FILL_COLORS[shape];
}

/**
 * Same hue as the fill color at reduced opacity
 */
export function ghostColor(shape: PieceShape): Rgba {
  return { ...FILL_COLORS[shape], a: GHOST_ALPHA };
}

export function isPieceShape(value: string): value is PieceShape {
  return PIECE_SHAPES.some((shape) => shape === value);
}
