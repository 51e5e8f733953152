import type { Vec2 } from '../../physics/geometry';

export type PlayerId = 1 | 2;

export const PLAYER_IDS: readonly PlayerId[] = [1, 2];

export type PowerUpKind = 'shield' | 'speed' | 'doubleShot';

export const POWER_UP_KINDS: readonly PowerUpKind[] = ['shield', 'speed', 'doubleShot'];

/** One face of a wall or obstacle. `normal` is unit length and points into open space. */
export interface WallSegment {
  readonly index: number;
  readonly a: Vec2;
  readonly b: Vec2;
  readonly normal: Vec2;
}

export interface WallContact {
  readonly wall: WallSegment;
  /** Fraction of the queried path travelled before contact. */
  readonly t: number;
  readonly point: Vec2;
}

/** Collision surface the bullets integrate against. */
export interface WallQuery {
  nearestWallAlong(from: Vec2, to: Vec2, radius: number): WallContact | null;
  /** Faces (inflated by `radius`) that `point` lies on within `tolerance`, in wall-index order. */
  wallsTouching(point: Vec2, radius: number, tolerance: number): WallSegment[];
}

/** What a shot asks the arena to create. */
export interface BulletSpawn {
  readonly owner: PlayerId;
  readonly x: number;
  readonly y: number;
  readonly angle: number;
}

export type BulletDeath = 'bounceLimit' | 'hitPlayer' | 'expired' | 'outOfBounds' | 'cleared';

export type HitOutcome = 'absorbed' | 'damaged' | 'eliminated' | 'ignored';

export interface Circle {
  readonly x: number;
  readonly y: number;
  readonly radius: number;
}
