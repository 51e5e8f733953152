import { createBulletBounceConfig, type BulletBounceConfig, type BulletBounceConfigOverrides } from '../../config/bulletBounce';
import { EventBus } from '../../core/EventBus';
import { Logger } from '../../core/Logger';
import { invariant } from '../../core/invariant';
import { createLcg, type RandomSource } from '../../core/random';
import { circlesOverlap, type Vec2 } from '../../physics/geometry';
import type { ArcadeGame } from '../ArcadeGame';
import { Arena } from './Arena';
import type { BulletBounceEvents, MatchResult, RoundEndReason, RoundResult } from './events';
import { EMPTY_INPUT, IDLE_COMMAND, type FrameInput } from './input';
import { Player } from './Player';
import { CONTROL_EVENTS, nextState, type ControlEvent, type GameState } from './stateMachine';
import { PLAYER_IDS, type PlayerId, type PowerUpKind } from './types';

export interface BulletBounceOptions {
  /** A full config or partial overrides; either way it is validated and frozen. */
  config?: BulletBounceConfigOverrides;
  /** Overrides the seeded generator built from `config.seed`. */
  random?: RandomSource;
}

export interface PlayerSnapshot {
  id: PlayerId;
  x: number;
  y: number;
  angle: number;
  health: number;
  maxHealth: number;
  score: number;
  roundWins: number;
  eliminated: boolean;
  shielded: boolean;
  powerUps: { kind: PowerUpKind; remainingMs: number }[];
}

export interface BulletSnapshot {
  id: number;
  owner: PlayerId;
  x: number;
  y: number;
  bouncesRemaining: number;
  trail: Vec2[];
}

export interface PowerUpSnapshot {
  id: number;
  kind: PowerUpKind;
  x: number;
  y: number;
  remainingMs: number;
}

/** Read-only view handed to the presentation layer each frame. Plain data, safe to keep. */
export interface BulletBounceSnapshot {
  state: GameState;
  /** State the game returns to on unpause; null unless paused. */
  pausedFrom: GameState | null;
  round: number;
  maxRounds: number;
  roundWins: Record<PlayerId, number>;
  roundRemainingMs: number;
  countdownRemainingMs: number;
  roundOverRemainingMs: number;
  players: PlayerSnapshot[];
  bullets: BulletSnapshot[];
  powerUps: PowerUpSnapshot[];
  lastRound: RoundResult | null;
  match: MatchResult | null;
  exitRequested: boolean;
}

/**
 * Round and match controller for Bullet Bounce.
 *
 * One `update` call is one tick. Inside Playing the order is fixed: input, movement, bullet
 * integration against walls, bullet/player hits, pickups, effect and power-up timers, round
 * end check, state change. Nothing else mutates players, bullets or power-ups.
 */
export class BulletBounceGame implements ArcadeGame<FrameInput, BulletBounceSnapshot, GameState> {
  readonly id = 'bullet_bounce' as const;
  readonly config: BulletBounceConfig;
  readonly events = new EventBus<BulletBounceEvents>();
  readonly arena: Arena;
  readonly players: readonly [Player, Player];

  private current: GameState = 'countdown';
  private resumeTo: GameState | null = null;
  private round = 1;
  private roundsPlayed = 0;
  private roundWins: Record<PlayerId, number> = { 1: 0, 2: 0 };
  private countdownRemainingMs: number;
  private roundRemainingMs: number;
  private roundOverRemainingMs = 0;
  private lastRound: RoundResult | null = null;
  private match: MatchResult | null = null;
  private quitRequested = false;

  constructor(options: BulletBounceOptions = {}) {
    this.config = createBulletBounceConfig(options.config);
    this.arena = new Arena(this.config, options.random ?? createLcg(this.config.seed));
    this.players = [new Player(1, this.config), new Player(2, this.config)];
    this.countdownRemainingMs = this.config.match.countdownMs;
    this.roundRemainingMs = this.config.match.roundDurationMs;
    this.resetRoundEntities();
  }

  state(): GameState {
    return this.current;
  }

  exitRequested(): boolean {
    return this.quitRequested;
  }

  player(id: PlayerId): Player {
    return this.players[id - 1];
  }

  getRoundWins(): Readonly<Record<PlayerId, number>> {
    return this.roundWins;
  }

  getRound(): number {
    return this.round;
  }

  getLastRound(): RoundResult | null {
    return this.lastRound;
  }

  getMatchResult(): MatchResult | null {
    return this.match;
  }

  update(dtMs: number, input: FrameInput = EMPTY_INPUT): void {
    invariant(Number.isFinite(dtMs) && dtMs >= 0, `update: invalid frame delta ${dtMs}`);
    for (const event of CONTROL_EVENTS) {
      if (input.control.includes(event)) this.handleControl(event);
    }

    switch (this.current) {
      case 'countdown':
        this.countdownRemainingMs -= dtMs;
        if (this.countdownRemainingMs <= 0) {
          this.countdownRemainingMs = 0;
          this.setState('playing');
        }
        break;
      case 'playing':
        this.simulate(dtMs, input);
        break;
      case 'roundOver':
        this.roundOverRemainingMs -= dtMs;
        if (this.roundOverRemainingMs <= 0) {
          this.roundOverRemainingMs = 0;
          this.advanceRound();
        }
        break;
      case 'paused':
      case 'matchOver':
        break;
    }
  }

  /** Applies one control event through the transition table. */
  handleControl(event: ControlEvent): void {
    const from = this.current;
    const to = nextState(from, event, { resumeTo: this.resumeTo, matchDecided: this.isMatchDecided() });
    if (event === 'quit') {
      this.teardown();
      return;
    }
    if (to === from) return;
    if (to === 'paused') {
      this.resumeTo = from;
      this.setState('paused');
    } else if (from === 'paused') {
      this.resumeTo = null;
      this.setState(to);
    } else if (from === 'roundOver') {
      this.advanceRound();
    } else {
      invariant(false, `unhandled transition ${from} -(${event})-> ${to}`);
    }
  }

  snapshot(): BulletBounceSnapshot {
    return {
      state: this.current,
      pausedFrom: this.current === 'paused' ? this.resumeTo : null,
      round: this.round,
      maxRounds: this.config.match.maxRounds,
      roundWins: { ...this.roundWins },
      roundRemainingMs: this.roundRemainingMs,
      countdownRemainingMs: this.countdownRemainingMs,
      roundOverRemainingMs: this.roundOverRemainingMs,
      players: this.players.map(p => ({
        id: p.id,
        x: p.x,
        y: p.y,
        angle: p.angle,
        health: p.health,
        maxHealth: this.config.player.maxHealth,
        score: p.score,
        roundWins: this.roundWins[p.id],
        eliminated: p.eliminated,
        shielded: p.shieldCharge,
        powerUps: Array.from(p.powerUps.values(), e => ({ kind: e.kind, remainingMs: e.remainingMs })),
      })),
      bullets: this.arena.bullets.values().map(b => ({
        id: b.id,
        owner: b.owner,
        x: b.x,
        y: b.y,
        bouncesRemaining: b.bouncesRemaining,
        trail: b.trail.map(p => ({ x: p.x, y: p.y })),
      })),
      powerUps: this.arena.powerUps.values().map(pu => ({
        id: pu.id,
        kind: pu.kind,
        x: pu.x,
        y: pu.y,
        remainingMs: pu.remainingMs,
      })),
      lastRound: this.lastRound ? { ...this.lastRound, scores: { ...this.lastRound.scores } } : null,
      match: this.match ? { ...this.match, roundWins: { ...this.match.roundWins } } : null,
      exitRequested: this.quitRequested,
    };
  }

  private simulate(dtMs: number, input: FrameInput): void {
    // 1. input: cooldowns and shots
    for (const p of this.players) {
      p.tickCooldown(dtMs);
      const cmd = input.players[p.id] ?? IDLE_COMMAND;
      if (!cmd.shoot) continue;
      for (const spawn of p.shoot()) {
        const bullet = this.arena.spawnBullet(spawn);
        this.events.emit('bulletFired', { bulletId: bullet.id, owner: spawn.owner, x: spawn.x, y: spawn.y, angle: spawn.angle });
      }
    }

    // 2. movement and rotation
    for (const p of this.players) {
      const cmd = input.players[p.id] ?? IDLE_COMMAND;
      p.rotate(cmd.rotate, dtMs);
      p.move(cmd.move, dtMs);
      this.arena.constrainPlayer(p);
    }

    // 3. bullets against walls
    for (const report of this.arena.advanceBullets(dtMs)) {
      const { bullet, contacts, destroyedBy } = report;
      const reflections = destroyedBy === 'bounceLimit' ? contacts.slice(0, -1) : contacts;
      let remaining = bullet.bouncesRemaining + reflections.length;
      for (const contact of reflections) {
        remaining -= 1;
        this.events.emit('bulletBounced', { bulletId: bullet.id, point: contact.point, wallIndex: contact.wall.index, bouncesRemaining: remaining });
      }
    }

    // 4. bullets against players
    this.resolveBulletHits();
    for (const dead of this.arena.removeDeadBullets()) {
      this.events.emit('bulletDestroyed', { bulletId: dead.id, reason: dead.destroyedBy ?? 'cleared' });
    }

    // 5. pickups
    for (const p of this.players) {
      if (p.eliminated) continue;
      const pu = this.arena.collectPowerUp(p);
      if (!pu) continue;
      if (p.applyPowerUp(pu.kind)) {
        this.events.emit('powerUpCollected', { powerUpId: pu.id, kind: pu.kind, player: p.id });
      }
    }

    // 6. effect durations and floor power-ups
    for (const p of this.players) {
      for (const kind of p.tickPowerUps(dtMs)) {
        this.events.emit('powerUpExpired', { player: p.id, kind });
      }
    }
    const occupied = this.players.map(p => ({ x: p.x, y: p.y, radius: p.radius }));
    const { expired, spawned } = this.arena.tickPowerUps(dtMs, occupied);
    for (const pu of expired) this.events.emit('powerUpExpired', { player: null, kind: pu.kind });
    if (spawned) this.events.emit('powerUpSpawned', { powerUpId: spawned.id, kind: spawned.kind, x: spawned.x, y: spawned.y });

    this.roundRemainingMs = Math.max(0, this.roundRemainingMs - dtMs);

    // 7. scoring / elimination, 8. transition
    const outcome = this.decideRound();
    if (outcome) this.endRound(outcome.winner, outcome.reason);
  }

  /**
   * Bullets in id order, players in slot order. A bullet hits at most one player (the first it
   * overlaps) and never its owner.
   */
  private resolveBulletHits(): void {
    for (const bullet of this.arena.bullets.values()) {
      if (!bullet.alive) continue;
      for (const target of this.players) {
        if (target.eliminated || target.id === bullet.owner) continue;
        if (!circlesOverlap(bullet.position, bullet.radius, target.position, target.radius)) continue;
        const outcome = target.takeHit();
        bullet.destroy('hitPlayer');
        if (outcome === 'damaged' || outcome === 'eliminated') {
          this.player(bullet.owner).awardPoints(this.config.match.pointsPerHit);
        }
        this.events.emit('playerHit', { target: target.id, shooter: bullet.owner, outcome, health: target.health });
        break;
      }
    }
  }

  private decideRound(): { winner: PlayerId | null; reason: RoundEndReason } | null {
    const [p1, p2] = this.players;
    const byScore = (): PlayerId | null => (p1.score > p2.score ? 1 : p2.score > p1.score ? 2 : null);
    if (p1.eliminated !== p2.eliminated) {
      return { winner: p1.eliminated ? 2 : 1, reason: 'elimination' };
    }
    if (p1.eliminated && p2.eliminated) {
      return { winner: byScore(), reason: 'elimination' };
    }
    const threshold = this.config.match.pointThreshold;
    if (p1.score >= threshold || p2.score >= threshold) {
      return { winner: byScore(), reason: 'points' };
    }
    if (this.roundRemainingMs <= 0) {
      return { winner: byScore(), reason: 'time' };
    }
    return null;
  }

  private endRound(winner: PlayerId | null, reason: RoundEndReason): void {
    if (winner !== null) this.roundWins[winner] += 1;
    this.roundsPlayed += 1;
    const [p1, p2] = this.players;
    this.lastRound = { round: this.round, winner, reason, scores: { 1: p1.score, 2: p2.score } };
    Logger.info(
      `[BulletBounce] round ${this.round} ${winner === null ? 'drawn' : `won by player ${winner}`} (${reason}); round wins ${this.roundWins[1]}-${this.roundWins[2]}`,
    );
    this.roundOverRemainingMs = this.config.match.roundOverDelayMs;
    this.setState('roundOver');
    this.events.emit('roundEnded', { ...this.lastRound, scores: { ...this.lastRound.scores } });
  }

  private isMatchDecided(): boolean {
    const { roundWinThreshold, maxRounds } = this.config.match;
    return this.roundWins[1] >= roundWinThreshold
      || this.roundWins[2] >= roundWinThreshold
      || this.roundsPlayed >= maxRounds;
  }

  /** Leaves RoundOver: to MatchOver when decided, otherwise into the next round's countdown. */
  private advanceRound(): void {
    invariant(this.current === 'roundOver', `advanceRound from '${this.current}'`);
    if (this.isMatchDecided()) {
      this.finishMatch(false);
      return;
    }
    this.round += 1;
    this.resetRoundEntities();
    this.countdownRemainingMs = this.config.match.countdownMs;
    this.roundRemainingMs = this.config.match.roundDurationMs;
    this.setState('countdown');
  }

  private finishMatch(abandoned: boolean): void {
    const w1 = this.roundWins[1];
    const w2 = this.roundWins[2];
    this.match = {
      winner: abandoned ? null : w1 > w2 ? 1 : w2 > w1 ? 2 : null,
      roundWins: { ...this.roundWins },
      roundsPlayed: this.roundsPlayed,
      abandoned,
    };
    Logger.info(`[BulletBounce] match ${abandoned ? 'abandoned' : 'over'}; round wins ${w1}-${w2}`);
    this.setState('matchOver');
    this.events.emit('matchEnded', { ...this.match, roundWins: { ...this.match.roundWins } });
  }

  /** Quit to launcher: drop all round state and end the match as abandoned. */
  private teardown(): void {
    this.quitRequested = true;
    this.resumeTo = null;
    this.arena.clearRound();
    if (this.current !== 'matchOver') this.finishMatch(true);
  }

  private resetRoundEntities(): void {
    this.arena.clearRound();
    PLAYER_IDS.forEach((id, i) => this.player(id).resetForRound(this.config.arena.spawns[i]));
  }

  private setState(next: GameState): void {
    const from = this.current;
    this.current = next;
    this.events.emit('stateChanged', { from, to: next });
  }
}
