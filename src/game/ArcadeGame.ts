/**
 * Capability every game in the collection exposes to the launcher. The launcher drives
 * `update` once per frame with that game's own input shape and draws from `snapshot`.
 */
export interface ArcadeGame<TInput, TSnapshot, TState extends string = string> {
  readonly id: ArcadeGameId;
  update(dtMs: number, input: TInput): void;
  snapshot(): TSnapshot;
  state(): TState;
  /** True once the player asked to go back to the launcher. */
  exitRequested(): boolean;
}

export type ArcadeGameId = 'bullet_bounce' | 'stack_dash' | 'ghost_chase';

export const GAME_NAMES: Readonly<Record<ArcadeGameId, string>> = {
  bullet_bounce: 'Bullet Bounce',
  stack_dash: 'Stack Dash',
  ghost_chase: 'Ghost Chase',
};

export function isArcadeGameId(value: string): value is ArcadeGameId {
  return Object.prototype.hasOwnProperty.call(GAME_NAMES, value);
}
