import type { Vec2 } from '../../physics/geometry';
import type { GameState } from './stateMachine';
import type { BulletDeath, HitOutcome, PlayerId, PowerUpKind } from './types';

export type RoundEndReason = 'points' | 'elimination' | 'time';

export interface RoundResult {
  round: number;
  /** null = drawn round, nobody is credited. */
  winner: PlayerId | null;
  reason: RoundEndReason;
  scores: Record<PlayerId, number>;
}

export interface MatchResult {
  winner: PlayerId | null;
  roundWins: Record<PlayerId, number>;
  roundsPlayed: number;
  /** Ended by quitting rather than by a decided match. */
  abandoned: boolean;
}

/** Hooks for the presentation layer (sound cues, particles). The core never acts on them. */
export type BulletBounceEvents = {
  bulletFired: { bulletId: number; owner: PlayerId; x: number; y: number; angle: number };
  bulletBounced: { bulletId: number; point: Vec2; wallIndex: number; bouncesRemaining: number };
  bulletDestroyed: { bulletId: number; reason: BulletDeath };
  playerHit: { target: PlayerId; shooter: PlayerId; outcome: HitOutcome; health: number };
  powerUpSpawned: { powerUpId: number; kind: PowerUpKind; x: number; y: number };
  powerUpCollected: { powerUpId: number; kind: PowerUpKind; player: PlayerId };
  powerUpExpired: { player: PlayerId | null; kind: PowerUpKind };
  stateChanged: { from: GameState; to: GameState };
  roundEnded: RoundResult;
  matchEnded: MatchResult;
};
