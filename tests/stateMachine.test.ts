import { describe, it, expect } from 'vitest';
import { InvariantError } from '../src/core/invariant';
import {
  CONTROL_EVENTS,
  GAME_STATES,
  nextState,
  STATE_TRANSITIONS,
  type ControlEvent,
  type GameState,
} from '../src/game/bullet_bounce/stateMachine';

const EXPECTED: Record<GameState, Record<ControlEvent, GameState>> = {
  countdown: { quit: 'matchOver', pauseToggle: 'paused', continue: 'countdown' },
  playing: { quit: 'matchOver', pauseToggle: 'paused', continue: 'playing' },
  paused: { quit: 'matchOver', pauseToggle: 'playing', continue: 'paused' },
  roundOver: { quit: 'matchOver', pauseToggle: 'roundOver', continue: 'countdown' },
  matchOver: { quit: 'matchOver', pauseToggle: 'matchOver', continue: 'matchOver' },
};

describe('Bullet Bounce state table', () => {
  it('defines every (state, event) pair', () => {
    for (const state of GAME_STATES) {
      for (const event of CONTROL_EVENTS) {
        expect(STATE_TRANSITIONS[state][event]).toBeDefined();
        expect(nextState(state, event, { resumeTo: 'playing', matchDecided: false })).toBe(EXPECTED[state][event]);
      }
    }
  });

  it('unpauses into whichever state was paused', () => {
    expect(nextState('paused', 'pauseToggle', { resumeTo: 'countdown', matchDecided: false })).toBe('countdown');
  });

  it('continues into MatchOver once the match is decided', () => {
    expect(nextState('roundOver', 'continue', { resumeTo: null, matchDecided: true })).toBe('matchOver');
  });

  it('refuses to resume into a state that cannot be paused', () => {
    expect(() => nextState('paused', 'pauseToggle', { resumeTo: 'roundOver', matchDecided: false })).toThrow(InvariantError);
    expect(() => nextState('paused', 'pauseToggle', { resumeTo: null, matchDecided: false })).toThrow(InvariantError);
  });

  it('handles quit first when events collide', () => {
    expect(CONTROL_EVENTS).toEqual(['quit', 'pauseToggle', 'continue']);
  });
});
