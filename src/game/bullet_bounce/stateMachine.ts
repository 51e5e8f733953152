import { InvariantError } from '../../core/invariant';

export type GameState = 'countdown' | 'playing' | 'paused' | 'roundOver' | 'matchOver';

export const GAME_STATES: readonly GameState[] = ['countdown', 'playing', 'paused', 'roundOver', 'matchOver'];

/** Discrete control inputs; movement and shooting are per-player commands, not events. */
export type ControlEvent = 'pauseToggle' | 'continue' | 'quit';

/** Handling order when several control events arrive in the same frame. */
export const CONTROL_EVENTS: readonly ControlEvent[] = ['quit', 'pauseToggle', 'continue'];

/**
 * `resume` returns to the state paused from, `advance` moves past a finished round
 * (MatchOver once the match is decided, Countdown otherwise), `ignore` keeps the state.
 */
export type TransitionTarget = GameState | 'resume' | 'advance' | 'ignore';

export const STATE_TRANSITIONS: Readonly<Record<GameState, Readonly<Record<ControlEvent, TransitionTarget>>>> = {
  countdown: { pauseToggle: 'paused', continue: 'ignore', quit: 'matchOver' },
  playing: { pauseToggle: 'paused', continue: 'ignore', quit: 'matchOver' },
  paused: { pauseToggle: 'resume', continue: 'ignore', quit: 'matchOver' },
  roundOver: { pauseToggle: 'ignore', continue: 'advance', quit: 'matchOver' },
  matchOver: { pauseToggle: 'ignore', continue: 'ignore', quit: 'matchOver' },
};

export interface TransitionContext {
  /** State that was active when the game paused. */
  resumeTo: GameState | null;
  /** Whether the finished round decided the match. */
  matchDecided: boolean;
}

export function nextState(state: GameState, event: ControlEvent, ctx: TransitionContext): GameState {
  const target = STATE_TRANSITIONS[state][event];
  switch (target) {
    case 'ignore':
      return state;
    case 'resume':
      if (ctx.resumeTo !== 'countdown' && ctx.resumeTo !== 'playing') {
        throw new InvariantError(`cannot resume from pause into '${String(ctx.resumeTo)}'`);
      }
      return ctx.resumeTo;
    case 'advance':
      return ctx.matchDecided ? 'matchOver' : 'countdown';
    default:
      return target;
  }
}
