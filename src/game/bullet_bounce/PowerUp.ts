import type { PowerUpKind } from './types';

/** Pickup lying in the arena. */
export interface PowerUp {
  id: number;
  kind: PowerUpKind;
  x: number;
  y: number;
  radius: number;
  /** Arena clock (ms since round start) when it appeared. */
  spawnedAtMs: number;
  /** Time left before it disappears uncollected. */
  remainingMs: number;
  active: boolean;
}

/** Effect running on a player. At most one per kind; reapplying refreshes `remainingMs`. */
export interface ActivePowerUp {
  readonly kind: PowerUpKind;
  remainingMs: number;
}

export const POWER_UP_LABELS: Readonly<Record<PowerUpKind, string>> = {
  shield: 'Shield',
  speed: 'Speed',
  doubleShot: 'Double Shot',
};
