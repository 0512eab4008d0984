import { describe, it, expect } from 'vitest';
import { DebouncedKeyboard, parseKeys } from './keyboard';

describe('parseKeys', () => {
  it('maps arrow escape sequences in both cursor modes', () => {
    expect(parseKeys('\x1b[A')).toEqual(['ArrowUp']);
    expect(parseKeys('\x1bOB')).toEqual(['ArrowDown']);
    expect(parseKeys('\x1b[C')).toEqual(['ArrowRight']);
    expect(parseKeys('\x1bOD')).toEqual(['ArrowLeft']);
  });

  it('splits chunks holding several keys', () => {
    expect(parseKeys('\x1b[D\x1b[Da')).toEqual(['ArrowLeft', 'ArrowLeft', 'a']);
  });

  it('names control keys the way KeyboardEvent.key does', () => {
    expect(parseKeys('\r')).toEqual(['Enter']);
    expect(parseKeys('\n')).toEqual(['Enter']);
    expect(parseKeys('\x1b')).toEqual(['Escape']);
    expect(parseKeys('\x7f')).toEqual(['Backspace']);
    expect(parseKeys('\t')).toEqual(['Tab']);
    expect(parseKeys(' ')).toEqual([' ']);
  });

  it('keeps unnamed escape sequences whole', () => {
    expect(parseKeys('\x1b[3~')).toEqual(['\x1b[3~']);
    expect(parseKeys('\x1b[H')).toEqual(['\x1b[H']);
    expect(parseKeys('\x1b[5~\x1b[6~')).toEqual(['\x1b[5~', '\x1b[6~']);
    expect(parseKeys('\x1bOP')).toEqual(['\x1bOP']);
    expect(parseKeys('\x1b[1;2D')).toEqual(['\x1b[1;2D']);
    expect(parseKeys('\x1ba')).toEqual(['\x1ba']);
  });

  it('reads only a bare ESC as Escape', () => {
    expect(parseKeys('\x1b\x1b')).toEqual(['Escape', 'Escape']);
    expect(parseKeys('\x1b[3~a\x1b')).toEqual(['\x1b[3~', 'a', 'Escape']);
  });
});

describe('DebouncedKeyboard', () => {
  it('reports released before any key arrives', () => {
    const keyboard = new DebouncedKeyboard();
    keyboard.tick();
    expect(keyboard.state('moveLeft')).toBe('released');
    expect(new DebouncedKeyboard().state('hardDrop')).toBe('released');
  });

  it('fires once, then holds for the refractory period', () => {
    const keyboard = new DebouncedKeyboard({ refractoryFrames: 3, holdFrames: 100 });
    keyboard.press('ArrowLeft');
    const seen: string[] = [];
    for (let frame = 0; frame < 5; frame++) {
      keyboard.tick();
      seen.push(keyboard.state('moveLeft'));
    }
    expect(seen).toEqual(['triggered', 'held', 'held', 'held', 'triggered']);
  });

  it('treats bound keys as synonyms', () => {
    const keyboard = new DebouncedKeyboard();
    keyboard.feed('x');
    keyboard.tick();
    expect(keyboard.state('rotateClockwise')).toBe('triggered');
    expect(keyboard.state('rotateCounterclockwise')).toBe('released');
  });

  it('keeps a separate refractory counter per action', () => {
    const keyboard = new DebouncedKeyboard({ refractoryFrames: 10, holdFrames: 100 });
    keyboard.feed('\x1b[D');
    keyboard.tick();
    keyboard.feed('\x1b[C');
    keyboard.tick();
    expect(keyboard.state('moveLeft')).toBe('held');
    expect(keyboard.state('moveRight')).toBe('triggered');
  });

  it('lets a key go after its hold frames', () => {
    const keyboard = new DebouncedKeyboard({ holdFrames: 2 });
    keyboard.press(' ');
    keyboard.tick();
    expect(keyboard.state('hardDrop')).toBe('triggered');
    keyboard.tick();
    expect(keyboard.state('hardDrop')).toBe('held');
    keyboard.tick();
    expect(keyboard.state('hardDrop')).toBe('released');
  });

  it('suppresses a quick second tap inside the refractory period', () => {
    const keyboard = new DebouncedKeyboard({ refractoryFrames: 3, holdFrames: 1 });
    keyboard.press('s');
    keyboard.tick();
    expect(keyboard.state('softDrop')).toBe('triggered');
    keyboard.tick();
    expect(keyboard.state('softDrop')).toBe('released');
    keyboard.press('s');
    keyboard.tick();
    expect(keyboard.state('softDrop')).toBe('held');
    keyboard.tick();
    keyboard.press('s');
    keyboard.tick();
    expect(keyboard.state('softDrop')).toBe('triggered');
  });

  it('does not pause on Delete, Home or Shift+Left', () => {
    for (const sequence of ['\x1b[3~', '\x1b[H', '\x1b[1;2D', '\x1bOH']) {
      const keyboard = new DebouncedKeyboard();
      keyboard.feed(sequence);
      keyboard.tick();
      expect(keyboard.state('pause')).toBe('released');
    }
  });

  it('pauses on a bare ESC', () => {
    const keyboard = new DebouncedKeyboard();
    keyboard.feed('\x1b');
    keyboard.tick();
    expect(keyboard.state('pause')).toBe('triggered');
  });

  it('accepts letters with Caps Lock on', () => {
    const keyboard = new DebouncedKeyboard();
    keyboard.feed('AXZ');
    keyboard.tick();
    expect(keyboard.state('moveLeft')).toBe('triggered');
    expect(keyboard.state('rotateClockwise')).toBe('triggered');
    expect(keyboard.state('rotateCounterclockwise')).toBe('triggered');
  });

  it('drops a key immediately on release', () => {
    const keyboard = new DebouncedKeyboard({ holdFrames: 100 });
    keyboard.press('c');
    keyboard.release('c');
    keyboard.tick();
    expect(keyboard.state('hold')).toBe('released');
  });

  it('fires every action bound to Enter', () => {
    const keyboard = new DebouncedKeyboard();
    keyboard.feed('\r');
    keyboard.tick();
    expect(keyboard.state('start')).toBe('triggered');
    expect(keyboard.state('unpause')).toBe('triggered');
    expect(keyboard.state('restart')).toBe('triggered');
    expect(keyboard.state('pause')).toBe('released');
  });

  it('accepts custom bindings', () => {
    const keyboard = new DebouncedKeyboard({
      bindings: {
        moveLeft: ['h'],
        moveRight: ['l'],
        softDrop: ['j'],
        hardDrop: ['k'],
        rotateClockwise: ['f'],
        rotateCounterclockwise: ['g'],
        hold: ['v'],
        pause: ['p'],
        unpause: ['p'],
        start: ['Enter'],
        restart: ['Enter'],
        quit: ['q'],
      },
    });
    keyboard.feed('h');
    keyboard.tick();
    expect(keyboard.state('moveLeft')).toBe('triggered');
    keyboard.release('h');
    keyboard.feed('\x1b[D');
    keyboard.tick();
    expect(keyboard.state('moveLeft')).toBe('released');
  });
});
