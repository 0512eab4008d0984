import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { GameSnapshot } from './engine/controller';
import { ContractViolationError } from './engine/errors';
import { runBlockfall } from './game';
import type { DrawSink } from './render/ansi';
import { dealing, fakeTerminal } from './testHelpers';

const FRAME_MS = 17;

function recordingSink(): DrawSink & { frames: GameSnapshot[] } {
  const frames: GameSnapshot[] = [];
  return { frames, draw: (snapshot) => frames.push(snapshot) };
}

describe('runBlockfall', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('takes over the screen and draws the start screen right away', () => {
    const { terminal, output, listenerCount } = fakeTerminal();
    const handle = runBlockfall(terminal, { pickShape: dealing('T') });
    expect(output.slice(0, 3)).toEqual(['\x1b[?1049h', '\x1b[?25l', '\x1b[2J\x1b[H']);
    expect(output[3]).toContain('Press ENTER to start');
    expect(listenerCount()).toBe(1);
    expect(handle.isRunning).toBe(true);
    handle.stop();
  });

  it('starts on Enter and lets the piece fall', () => {
    const { terminal, type } = fakeTerminal();
    const sink = recordingSink();
    const handle = runBlockfall(terminal, { pickShape: dealing('O'), sink });
    type('\r');
    vi.advanceTimersByTime(FRAME_MS);
    expect(handle.game.state).toBe('play');
    vi.advanceTimersByTime(FRAME_MS * 30);
    expect(sink.frames.at(-1)?.active.anchor).toEqual({ col: 5, row: 2 });
    handle.stop();
  });

  it('quits from the start screen and restores the terminal', async () => {
    const { terminal, output, type, listenerCount } = fakeTerminal();
    const handle = runBlockfall(terminal, { sink: recordingSink() });
    type('q');
    vi.advanceTimersByTime(FRAME_MS);
    await expect(handle.finished).resolves.toBe(0);
    expect(handle.isRunning).toBe(false);
    expect(handle.game.state).toBe('closed');
    expect(listenerCount()).toBe(0);
    expect(output.slice(-2)).toEqual(['\x1b[?1049l', '\x1b[?25h']);
  });

  it('stops drawing once closed', () => {
    const { terminal, type } = fakeTerminal();
    const sink = recordingSink();
    runBlockfall(terminal, { sink });
    type('q');
    vi.advanceTimersByTime(FRAME_MS * 10);
    // The initial frame only: the quitting frame draws nothing
    expect(sink.frames).toHaveLength(1);
  });

  it('stop() closes the game and settles with the score so far', async () => {
    const { terminal, output } = fakeTerminal();
    const handle = runBlockfall(terminal, { sink: recordingSink() });
    handle.stop();
    handle.stop();
    await expect(handle.finished).resolves.toBe(0);
    expect(handle.game.state).toBe('closed');
    expect(output.filter((chunk) => chunk === '\x1b[?1049l')).toHaveLength(1);
  });

  it('paces frames by the fps option', () => {
    const { terminal, type } = fakeTerminal();
    const handle = runBlockfall(terminal, { fps: 10, sink: recordingSink() });
    type('\r');
    vi.advanceTimersByTime(99);
    expect(handle.game.state).toBe('start');
    vi.advanceTimersByTime(1);
    expect(handle.game.state).toBe('play');
    handle.stop();
  });

  it('rejects a non-positive frame rate', () => {
    const { terminal } = fakeTerminal();
    expect(() => runBlockfall(terminal, { fps: 0 })).toThrow(ContractViolationError);
  });

  it('stops and rejects when drawing throws', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const { terminal, output } = fakeTerminal();
    const handle = runBlockfall(terminal, {
      sink: {
        draw: () => {
          throw new ContractViolationError('draw failed');
        },
      },
    });
    await expect(handle.finished).rejects.toThrow('draw failed');
    expect(handle.isRunning).toBe(false);
    expect(output.slice(-2)).toEqual(['\x1b[?1049l', '\x1b[?25h']);
    expect(console.error).toHaveBeenCalledWith('[Blockfall] draw failed');
  });
});
