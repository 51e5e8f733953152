import { normalize, type Vec2 } from '../../physics/geometry';
import type { KeyState } from '../keyState';
import type { RotateDirection } from './Player';
import type { ControlEvent } from './stateMachine';
import type { PlayerId } from './types';

export interface PlayerCommand {
  /** Desired direction; magnitude above 1 is clamped by the player. null = no movement. */
  move: Vec2 | null;
  rotate: RotateDirection;
  shoot: boolean;
}

/** Everything the host delivers for one tick. */
export interface FrameInput {
  players: Partial<Record<PlayerId, PlayerCommand>>;
  control: readonly ControlEvent[];
}

export const IDLE_COMMAND: PlayerCommand = Object.freeze({ move: null, rotate: 0, shoot: false });

export const EMPTY_INPUT: FrameInput = Object.freeze({ players: {}, control: [] });

export interface PlayerKeys {
  up: string;
  down: string;
  left: string;
  right: string;
  rotateLeft: string;
  rotateRight: string;
  shoot: string;
}

export interface KeyBindings {
  players: Record<PlayerId, PlayerKeys>;
  pause: string;
  /** Any of these advances a finished round. */
  continue: readonly string[];
  quit: string;
}

/** Keys are lower-cased `KeyboardEvent.key` values, matching `keyState`. */
export const DEFAULT_KEY_BINDINGS: KeyBindings = {
  players: {
    1: { up: 'w', down: 's', left: 'a', right: 'd', rotateLeft: 'q', rotateRight: 'e', shoot: ' ' },
    2: {
      up: 'arrowup',
      down: 'arrowdown',
      left: 'arrowleft',
      right: 'arrowright',
      rotateLeft: ',',
      rotateRight: '.',
      shoot: 'enter',
    },
  },
  pause: 'p',
  continue: [' ', 'enter'],
  quit: 'escape',
};

function axis(held: KeyState, negative: string, positive: string): number {
  return (held[positive] ? 1 : 0) - (held[negative] ? 1 : 0);
}

/**
 * Turns held keys plus the keys pressed since the last frame into a `FrameInput`.
 * Movement and rotation follow held keys; shooting and control events fire on the press only.
 */
export function readFrameInput(held: KeyState, pressed: ReadonlySet<string>, bindings: KeyBindings = DEFAULT_KEY_BINDINGS): FrameInput {
  const players: Partial<Record<PlayerId, PlayerCommand>> = {};
  for (const id of [1, 2] as const) {
    const keys = bindings.players[id];
    const dx = axis(held, keys.left, keys.right);
    const dy = axis(held, keys.up, keys.down);
    const rot = axis(held, keys.rotateLeft, keys.rotateRight);
    players[id] = {
      move: dx === 0 && dy === 0 ? null : normalize({ x: dx, y: dy }),
      rotate: rot < 0 ? -1 : rot > 0 ? 1 : 0,
      shoot: pressed.has(keys.shoot),
    };
  }
  const control: ControlEvent[] = [];
  if (pressed.has(bindings.quit)) control.push('quit');
  if (pressed.has(bindings.pause)) control.push('pauseToggle');
  if (bindings.continue.some(k => pressed.has(k))) control.push('continue');
  return { players, control };
}
