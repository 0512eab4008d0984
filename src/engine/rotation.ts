/**
 * Piece orientation: a four-step cycle.
 */

export type Rotation = 0 | 90 | 180 | 270;

export const ROTATIONS: readonly Rotation[] = [0, 90, 180, 270];

export function spinClockwise(rotation: Rotation): Rotation {
  switch (rotation) {
    case 0: return 90;
    case 90: return 180;
    case 180: return 270;
    case 270: return 0;
  }
}

export function spinCounterclockwise(rotation: Rotation): Rotation {
  switch (rotation) {
    case 0: return 270;
    case 90: return 0;
    case 180: return 90;
    case 270: return 180;
  }
}
