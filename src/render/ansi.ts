/**
 * ANSI renderer
 *
 * Draws a GameSnapshot as one escape-sequence frame: bordered board with
 * double-width cells, ghost and active piece, a side panel with score,
 * level, lines, next and hold, and a centred overlay for Start/Pause/Over.
 * Rendering is a pure function of the snapshot and the terminal size.
 */

import type { GameSnapshot } from '../engine/controller';
import { PIECE_ANSI, type PieceShape, pieceOffsets } from '../engine/pieces';
import { HEIGHT, WIDTH } from '../engine/playfield';
import { ANSI_RESET } from '../themes';
import { type GameTerminal, getCurrentThemeColor, getVerticalAnchor, isLightTheme } from '../utils';

export interface DrawSink {
  draw(snapshot: GameSnapshot): void;
}

export interface RenderOptions {
  cols: number;
  rows: number;
  themeColor: string;
  /** Light backgrounds get a grey ghost instead of a dimmed one */
  lightTheme?: boolean;
}

const BOARD_COLS = WIDTH * 2 + 2;
const BOARD_ROWS = HEIGHT + 2;
const PANEL_GAP = 2;
const PANEL_WIDTH = 12;
const PANEL_INNER = PANEL_WIDTH - 2;
const PREVIEW_ROWS = 3;

export const MIN_COLS = BOARD_COLS + PANEL_GAP + PANEL_WIDTH;
export const MIN_ROWS = BOARD_ROWS;
const ROWS_WITH_TITLE = BOARD_ROWS + 2;

export const TITLE = 'BLOCKFALL';
export const CONTROLS_HINT = 'SPACE drop  C hold  ESC pause';

const BLOCK = '██';
const GHOST = '░░';

function moveTo(row: number, col: number): string {
  return `\x1b[${row};${col}H`;
}

interface Overlay {
  heading: string;
  headingStyle: string;
  lines: string[];
}

function overlayFor(snapshot: GameSnapshot, themeColor: string): Overlay | null {
  switch (snapshot.state) {
    case 'start':
      return {
        heading: TITLE,
        headingStyle: `\x1b[1m${themeColor}`,
        lines: ['Press ENTER to start', 'Press Q to quit'],
      };
    case 'pause':
      return {
        heading: 'PAUSED',
        headingStyle: `\x1b[5m${themeColor}`,
        lines: ['Press ENTER to unpause', 'Press Q to quit'],
      };
    case 'over':
      return {
        heading: 'GAME OVER',
        headingStyle: '\x1b[1;31m',
        lines: [`Score: ${snapshot.score}`, 'Press ENTER to restart', 'Press Q to quit'],
      };
    default:
      return null;
  }
}

function tooSmall(cols: number, rows: number, themeColor: string): string {
  const msg1 = 'Terminal too small!';
  const needWidth = cols < MIN_COLS;
  const needHeight = rows < MIN_ROWS;
  let hint = '';
  if (needWidth && needHeight) {
    hint = 'Make pane larger';
  } else if (needWidth) {
    hint = 'Make pane wider →';
  } else {
    hint = 'Make pane taller ↓';
  }
  const msg2 = `Need: ${MIN_COLS}×${MIN_ROWS}  Have: ${cols}×${rows}`;
  const centerX = Math.floor(cols / 2);
  const centerY = Math.floor(rows / 2);
  let output = '';
  output += `${moveTo(centerY - 1, Math.max(1, centerX - Math.floor(msg1.length / 2)))}${themeColor}${msg1}${ANSI_RESET}`;
  output += `${moveTo(centerY + 1, Math.max(1, centerX - Math.floor(msg2.length / 2)))}\x1b[2m${msg2}${ANSI_RESET}`;
  output += `${moveTo(centerY + 3, Math.max(1, centerX - Math.floor(hint.length / 2)))}\x1b[1m${themeColor}${hint}${ANSI_RESET}`;
  return output;
}

/**
 * Rotation-0 cells of a shape, shifted so the bounding box starts at (0, 0)
 */
function previewCells(shape: PieceShape): { cells: [number, number][]; width: number; height: number } {
  const offsets = pieceOffsets(shape, 0);
  const minX = Math.min(...offsets.map(([dx]) => dx));
  const minY = Math.min(...offsets.map(([, dy]) => dy));
  const cells = offsets.map(([dx, dy]): [number, number] => [dx - minX, dy - minY]);
  return {
    cells,
    width: Math.max(...cells.map(([x]) => x)) + 1,
    height: Math.max(...cells.map(([, y]) => y)) + 1,
  };
}

function pieceBox(
  label: string,
  shape: PieceShape | null,
  top: number,
  left: number,
  themeColor: string
): string {
  let output = '';
  output += `${moveTo(top, left)}${themeColor}┌${'─'.repeat(PANEL_INNER)}┐${ANSI_RESET}`;
  output += `${moveTo(top + 1, left)}${themeColor}│ ${label.padEnd(PANEL_INNER - 1)}│${ANSI_RESET}`;
  for (let i = 0; i < PREVIEW_ROWS; i++) {
    output += `${moveTo(top + 2 + i, left)}${themeColor}│${' '.repeat(PANEL_INNER)}│${ANSI_RESET}`;
  }
  output += `${moveTo(top + 2 + PREVIEW_ROWS, left)}${themeColor}└${'─'.repeat(PANEL_INNER)}┘${ANSI_RESET}`;

  if (shape) {
    const { cells, width, height } = previewCells(shape);
    const x0 = left + 1 + Math.floor((PANEL_INNER - width * 2) / 2);
    const y0 = top + 2 + Math.floor((PREVIEW_ROWS - height) / 2);
    for (const [x, y] of cells) {
      output += `${moveTo(y0 + y, x0 + x * 2)}${PIECE_ANSI[shape]}${BLOCK}${ANSI_RESET}`;
    }
  }
  return output;
}

function statsBox(snapshot: GameSnapshot, top: number, left: number, themeColor: string): string {
  const entries: [string, number][] = [
    ['SCORE', snapshot.score],
    ['LEVEL', snapshot.level],
    ['LINES', snapshot.linesCleared],
  ];
  let output = `${moveTo(top, left)}${themeColor}┌${'─'.repeat(PANEL_INNER)}┐${ANSI_RESET}`;
  entries.forEach(([label, value], i) => {
    const row = top + 1 + i * 3;
    output += `${moveTo(row, left)}${themeColor}│ ${label.padEnd(PANEL_INNER - 1)}│${ANSI_RESET}`;
    output += `${moveTo(row + 1, left)}${themeColor}│ ${value.toString().padStart(PANEL_INNER - 2)} │${ANSI_RESET}`;
    const divider = i === entries.length - 1 ? `└${'─'.repeat(PANEL_INNER)}┘` : `├${'─'.repeat(PANEL_INNER)}┤`;
    output += `${moveTo(row + 2, left)}${themeColor}${divider}${ANSI_RESET}`;
  });
  return output;
}

/**
 * Render one frame. Starts with a full clear, so each frame stands alone.
 */
export function renderFrame(snapshot: GameSnapshot, options: RenderOptions): string {
  const { cols, rows, themeColor } = options;
  let output = '\x1b[2J\x1b[H';

  if (cols < MIN_COLS || rows < MIN_ROWS) {
    return output + tooSmall(cols, rows, themeColor);
  }

  const showChrome = rows >= ROWS_WITH_TITLE;
  const layoutRows = showChrome ? ROWS_WITH_TITLE : BOARD_ROWS;
  const top = getVerticalAnchor(rows, layoutRows);
  const gameTop = showChrome ? top + 1 : top;
  const gameLeft = Math.max(1, Math.floor((cols - MIN_COLS) / 2));
  const panelX = gameLeft + BOARD_COLS + PANEL_GAP;

  if (showChrome) {
    output += `${moveTo(top, Math.floor((cols - TITLE.length) / 2))}${themeColor}\x1b[1m${TITLE}${ANSI_RESET}`;
  }

  // Board border (double-width cells)
  output += `${moveTo(gameTop, gameLeft)}${themeColor}╔${'══'.repeat(WIDTH)}╗${ANSI_RESET}`;
  for (let y = 0; y < HEIGHT; y++) {
    output += `${moveTo(gameTop + 1 + y, gameLeft)}${themeColor}║${ANSI_RESET}`;
    output += `${moveTo(gameTop + 1 + y, gameLeft + 1 + WIDTH * 2)}${themeColor}║${ANSI_RESET}`;
  }
  output += `${moveTo(gameTop + HEIGHT + 1, gameLeft)}${themeColor}╚${'══'.repeat(WIDTH)}╝${ANSI_RESET}`;

  const cellAt = (col: number, row: number) => moveTo(gameTop + 1 + row, gameLeft + 1 + col * 2);

  snapshot.grid.forEach((line, row) => {
    line.forEach((cell, col) => {
      if (cell) output += `${cellAt(col, row)}${PIECE_ANSI[cell]}${BLOCK}${ANSI_RESET}`;
    });
  });

  // The piece that just failed to spawn is not on the board
  if (snapshot.state !== 'over') {
    const { shape, rotation, anchor, landingOffset } = snapshot.active;
    const offsets = pieceOffsets(shape, rotation);
    const color = PIECE_ANSI[shape];
    if (landingOffset > 0) {
      const ghostStyle = options.lightTheme ? '\x1b[90m' : `\x1b[2m${color}`;
      for (const [dx, dy] of offsets) {
        output += `${cellAt(anchor.col + dx, anchor.row + dy + landingOffset)}${ghostStyle}${GHOST}${ANSI_RESET}`;
      }
    }
    for (const [dx, dy] of offsets) {
      output += `${cellAt(anchor.col + dx, anchor.row + dy)}${color}${BLOCK}${ANSI_RESET}`;
    }
  }

  output += statsBox(snapshot, gameTop, panelX, themeColor);
  output += pieceBox('NEXT', snapshot.next, gameTop + 11, panelX, themeColor);
  output += pieceBox('HOLD', snapshot.hold, gameTop + 18, panelX, themeColor);

  const overlay = overlayFor(snapshot, themeColor);
  if (overlay) {
    const centerX = gameLeft + Math.floor(BOARD_COLS / 2);
    const overlayTop = gameTop + Math.floor(HEIGHT / 2) - 2;
    output += `${moveTo(overlayTop, centerX - Math.floor(overlay.heading.length / 2))}${overlay.headingStyle}${overlay.heading}${ANSI_RESET}`;
    overlay.lines.forEach((line, i) => {
      output += `${moveTo(overlayTop + 2 + i, centerX - Math.floor(line.length / 2))}\x1b[2m${themeColor}${line}${ANSI_RESET}`;
    });
  }

  if (showChrome && snapshot.state === 'play') {
    const hintX = Math.max(1, Math.floor((cols - CONTROLS_HINT.length) / 2));
    output += `${moveTo(gameTop + BOARD_ROWS, hintX)}\x1b[2m${themeColor}${CONTROLS_HINT}${ANSI_RESET}`;
  }

  return output;
}

/**
 * DrawSink that writes each frame to a terminal, sized at draw time
 */
export class AnsiRenderer implements DrawSink {
  constructor(
    private readonly terminal: GameTerminal,
    private readonly themeColor: string = getCurrentThemeColor(),
    private readonly lightTheme: boolean = isLightTheme()
  ) {}

  draw(snapshot: GameSnapshot): void {
    this.terminal.write(
      renderFrame(snapshot, {
        cols: this.terminal.cols,
        rows: this.terminal.rows,
        themeColor: this.themeColor,
        lightTheme: this.lightTheme,
      })
    );
  }
}
