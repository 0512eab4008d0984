/**
 * Speed progression keyed by pieces placed (not score).
 */

import { createLogger } from '../log';

const log = createLogger('Level');

interface SpeedStep {
  /** Last piece count that still uses this interval */
  upTo: number;
  /** Frames between automatic one-row descents */
  interval: number;
}

export const SPEED_STEPS: readonly SpeedStep[] = [
  { upTo: 25, interval: 30 },
  { upTo: 50, interval: 25 },
  { upTo: 100, interval: 20 },
  { upTo: 200, interval: 15 },
  { upTo: 300, interval: 12 },
  { upTo: 500, interval: 10 },
  { upTo: 700, interval: 8 },
  { upTo: 900, interval: 6 },
  { upTo: Infinity, interval: 5 },
];

function stepIndexFor(piecesPlaced: number): number {
  return SPEED_STEPS.findIndex((step) => piecesPlaced <= step.upTo);
}

export function tickIntervalFor(piecesPlaced: number): number {
  return SPEED_STEPS[stepIndexFor(piecesPlaced)].interval;
}

export class Level {
  private pieces = 0;
  private interval = tickIntervalFor(0);

  get piecesPlaced(): number {
    return this.pieces;
  }

  get tickInterval(): number {
    return this.interval;
  }

  /** 1-based speed step, for display */
  get levelNumber(): number {
    return stepIndexFor(this.pieces) + 1;
  }

  /**
   * Count one more placed piece and recompute the fall interval.
   */
  update(): void {
    this.pieces++;
    const previous = this.interval;
    this.interval = tickIntervalFor(this.pieces);
    if (this.interval !== previous) {
      log.debug(`Tick rate: ${this.interval}`);
    }
  }
}
