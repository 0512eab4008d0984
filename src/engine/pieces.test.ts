import { describe, it, expect } from 'vitest';
import {
  GHOST_ALPHA,
  PIECE_SHAPES,
  fillColor,
  ghostColor,
  isPieceShape,
  pieceOffsets,
} from './pieces';
import { ROTATIONS } from './rotation';

describe('pieceOffsets', () => {
  it('defines four distinct cells for every shape and rotation', () => {
    for (const shape of PIECE_SHAPES) {
      for (const rotation of ROTATIONS) {
        const offsets = pieceOffsets(shape, rotation);
        expect(offsets).toHaveLength(4);
        const keys = new Set(offsets.map(([dx, dy]) => `${dx},${dy}`));
        expect(keys.size).toBe(4);
      }
    }
  });

  it('returns the same data for the same input', () => {
    expect(pieceOffsets('T', 90)).toBe(pieceOffsets('T', 90));
  });

  it('keeps O identical in every rotation', () => {
    for (const rotation of ROTATIONS) {
      expect(pieceOffsets('O', rotation)).toEqual([[0, 0], [1, 0], [0, 1], [1, 1]]);
    }
  });

  it('shares half-turn offsets for I, S and Z', () => {
    for (const shape of ['I', 'S', 'Z'] as const) {
      expect(pieceOffsets(shape, 180)).toEqual(pieceOffsets(shape, 0));
      expect(pieceOffsets(shape, 270)).toEqual(pieceOffsets(shape, 90));
      expect(pieceOffsets(shape, 90)).not.toEqual(pieceOffsets(shape, 0));
    }
  });

  it('lays the I piece flat at spawn', () => {
    expect(pieceOffsets('I', 0)).toEqual([[-1, 0], [0, 0], [1, 0], [2, 0]]);
    expect(pieceOffsets('I', 90)).toEqual([[0, -1], [0, 0], [0, 1], [0, 2]]);
  });

  it('gives T, J and L four different orientations', () => {
    for (const shape of ['T', 'J', 'L'] as const) {
      const sets = new Set(ROTATIONS.map((rotation) => JSON.stringify(pieceOffsets(shape, rotation))));
      expect(sets.size).toBe(4);
    }
  });
});

describe('colors', () => {
  it('uses opaque fill colors', () => {
    expect(fillColor('I')).toEqual({ r: 0, g: 1, b: 1, a: 1 });
    expect(fillColor('L')).toEqual({ r: 1, g: 0.5, b: 0, a: 1 });
  });

  it('derives the ghost from the fill color', () => {
    for (const shape of PIECE_SHAPES) {
      const fill = fillColor(shape);
      expect(ghostColor(shape)).toEqual({ r: fill.r, g: fill.g, b: fill.b, a: GHOST_ALPHA });
    }
    expect(GHOST_ALPHA).toBe(0.3);
  });
});

describe('isPieceShape', () => {
  it('accepts the seven shape letters only', () => {
    expect(PIECE_SHAPES.every(isPieceShape)).toBe(true);
    expect(isPieceShape('X')).toBe(false);
    expect(isPieceShape('i')).toBe(false);
    expect(isPieceShape('')).toBe(false);
  });
});
