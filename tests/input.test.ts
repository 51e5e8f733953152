import { describe, it, expect } from 'vitest';
import { readFrameInput } from '../src/game/bullet_bounce/input';
import { KeyboardTracker, type KeyboardSource } from '../src/game/keyState';

type KeyListener = (e: { key: string; repeat?: boolean }) => void;

class FakeKeyboard implements KeyboardSource {
  readonly listeners = { keydown: new Set<KeyListener>(), keyup: new Set<KeyListener>() };

  addEventListener(type: 'keydown' | 'keyup', listener: KeyListener): void {
    this.listeners[type].add(listener);
  }

  removeEventListener(type: 'keydown' | 'keyup', listener: KeyListener): void {
    this.listeners[type].delete(listener);
  }

  down(key: string, repeat = false): void {
    for (const l of this.listeners.keydown) l({ key, repeat });
  }

  up(key: string): void {
    for (const l of this.listeners.keyup) l({ key });
  }
}

describe('readFrameInput', () => {
  it('normalizes diagonal movement and fires shots on press only', () => {
    const input = readFrameInput({ w: true, d: true }, new Set([' ']));
    const p1 = input.players[1];
    expect(p1?.move?.x).toBeCloseTo(Math.SQRT1_2, 12);
    expect(p1?.move?.y).toBeCloseTo(-Math.SQRT1_2, 12);
    expect(p1?.shoot).toBe(true);
    expect(input.players[2]).toEqual({ move: null, rotate: 0, shoot: false });
    // space doubles as the continue key
    expect(input.control).toEqual(['continue']);
  });

  it('maps rotation keys and orders control events', () => {
    const input = readFrameInput({ q: true, arrowleft: true }, new Set(['p', 'escape']));
    expect(input.players[1]?.rotate).toBe(-1);
    expect(input.players[2]?.move).toEqual({ x: -1, y: 0 });
    expect(input.players[1]?.shoot).toBe(false);
    expect(input.control).toEqual(['quit', 'pauseToggle']);
  });

  it('opposite keys cancel out', () => {
    const input = readFrameInput({ a: true, d: true, e: true, q: true }, new Set());
    expect(input.players[1]).toEqual({ move: null, rotate: 0, shoot: false });
  });
});

describe('KeyboardTracker', () => {
  it('tracks held keys and drains presses once', () => {
    const keyboard = new FakeKeyboard();
    const tracker = new KeyboardTracker();
    tracker.attach(keyboard);
    keyboard.down('W');
    keyboard.down('W', true);
    expect(tracker.held.w).toBe(true);
    expect([...tracker.drainPressed()]).toEqual(['w']);
    expect(tracker.drainPressed().size).toBe(0);
    keyboard.up('W');
    expect(tracker.held.w).toBe(false);
  });

  it('a held key does not count as a new press', () => {
    const keyboard = new FakeKeyboard();
    const tracker = new KeyboardTracker();
    tracker.attach(keyboard);
    keyboard.down('Enter');
    tracker.drainPressed();
    keyboard.down('Enter');
    expect(tracker.drainPressed().size).toBe(0);
  });

  it('detach unregisters and reset clears state', () => {
    const keyboard = new FakeKeyboard();
    const tracker = new KeyboardTracker();
    tracker.attach(keyboard);
    keyboard.down('p');
    tracker.reset();
    expect(tracker.held.p).toBe(false);
    expect(tracker.drainPressed().size).toBe(0);
    tracker.detach();
    expect(keyboard.listeners.keydown.size).toBe(0);
    expect(keyboard.listeners.keyup.size).toBe(0);
  });
});
