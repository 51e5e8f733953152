import type { BulletBounceConfig, SpawnPoint } from '../../config/bulletBounce';
import { Logger } from '../../core/Logger';
import { invariant } from '../../core/invariant';
import { clampLength, scale, wrapAngle, ZERO, type Vec2 } from '../../physics/geometry';
import type { ActivePowerUp } from './PowerUp';
import type { BulletSpawn, HitOutcome, PlayerId, PowerUpKind } from './types';

export type RotateDirection = -1 | 0 | 1;

/**
 * One of the two duelists. Owned by the game; every mutation here touches only this player's
 * own state. Hits from the other player arrive through `takeHit`, called by the game.
 */
export class Player {
  readonly id: PlayerId;
  readonly radius: number;
  x = 0;
  y = 0;
  /** Facing, radians in [0, 2π). */
  angle = 0;
  velocity: Vec2 = ZERO;
  health: number;
  /** Points scored this round. Only grows until the round resets. */
  score = 0;
  eliminated = false;
  shieldCharge = false;
  shootCooldownMs = 0;
  readonly powerUps = new Map<PowerUpKind, ActivePowerUp>();

  private readonly cfg: BulletBounceConfig['player'];
  private readonly effectDurationMs: number;
  private readonly speedMultiplier: number;

  constructor(id: PlayerId, config: BulletBounceConfig) {
    this.id = id;
    this.cfg = config.player;
    this.radius = config.player.radius;
    this.health = config.player.maxHealth;
    this.effectDurationMs = config.powerUp.effectDurationMs;
    this.speedMultiplier = config.powerUp.speedMultiplier;
  }

  get position(): Vec2 {
    return { x: this.x, y: this.y };
  }

  hasPowerUp(kind: PowerUpKind): boolean {
    return this.powerUps.has(kind);
  }

  /** Speed cap for this frame; a speed boost scales it once no matter how often it was picked up. */
  maxSpeed(): number {
    return this.hasPowerUp('speed') ? this.cfg.moveSpeed * this.speedMultiplier : this.cfg.moveSpeed;
  }

  /**
   * Sets velocity from the input direction (null = stand still), clamps it to `maxSpeed`, and
   * integrates position. Arena bounds are applied afterwards by `Arena.constrainPlayer`.
   */
  move(direction: Vec2 | null, dtMs: number): void {
    if (this.eliminated) {
      this.velocity = ZERO;
      return;
    }
    const max = this.maxSpeed();
    this.velocity = direction ? clampLength(scale(direction, max), max) : ZERO;
    const dt = dtMs / 1000;
    this.x += this.velocity.x * dt;
    this.y += this.velocity.y * dt;
  }

  rotate(direction: RotateDirection, dtMs: number): void {
    if (this.eliminated || direction === 0) return;
    this.angle = wrapAngle(this.angle + direction * this.cfg.rotationSpeed * (dtMs / 1000));
  }

  tickCooldown(dtMs: number): void {
    this.shootCooldownMs = Math.max(0, this.shootCooldownMs - dtMs);
  }

  canShoot(): boolean {
    return !this.eliminated && this.shootCooldownMs <= 0;
  }

  /**
   * Fires along the current facing. Returns nothing while the cooldown runs; a double shot
   * returns two spawns split by `±doubleShotSpread`.
   */
  shoot(): BulletSpawn[] {
    if (!this.canShoot()) return [];
    this.shootCooldownMs = this.cfg.shootCooldownMs;
    if (this.hasPowerUp('doubleShot')) {
      const spread = this.cfg.doubleShotSpread;
      return [this.spawnAt(this.angle - spread), this.spawnAt(this.angle + spread)];
    }
    return [this.spawnAt(this.angle)];
  }

  /** Starts or refreshes an effect. Returns false when the request was ignored. */
  applyPowerUp(kind: PowerUpKind): boolean {
    if (this.eliminated) {
      Logger.warn(`[Player] ignoring ${kind} power-up for eliminated player ${this.id}`);
      return false;
    }
    const current = this.powerUps.get(kind);
    if (current) {
      current.remainingMs = this.effectDurationMs;
    } else {
      this.powerUps.set(kind, { kind, remainingMs: this.effectDurationMs });
    }
    if (kind === 'shield') this.shieldCharge = true;
    return true;
  }

  /** Counts effects down; returns the kinds that ran out this tick. */
  tickPowerUps(dtMs: number): PowerUpKind[] {
    const expired: PowerUpKind[] = [];
    for (const effect of this.powerUps.values()) {
      effect.remainingMs -= dtMs;
      if (effect.remainingMs <= 0) expired.push(effect.kind);
    }
    for (const kind of expired) {
      this.powerUps.delete(kind);
      if (kind === 'shield') this.shieldCharge = false;
    }
    return expired;
  }

  /**
   * A bullet connected. A charged shield eats the hit and is spent; otherwise one health is
   * lost, and reaching zero eliminates the player for the round.
   */
  takeHit(): HitOutcome {
    if (this.eliminated) {
      Logger.warn(`[Player] hit on eliminated player ${this.id} ignored`);
      return 'ignored';
    }
    if (this.shieldCharge) {
      this.shieldCharge = false;
      this.powerUps.delete('shield');
      return 'absorbed';
    }
    invariant(this.health > 0, `player ${this.id}: alive with no health`);
    this.health -= 1;
    if (this.health <= 0) {
      this.health = 0;
      this.eliminated = true;
      this.velocity = ZERO;
      return 'eliminated';
    }
    return 'damaged';
  }

  awardPoints(points: number): void {
    invariant(points >= 0, `player ${this.id}: score can only grow within a round`);
    this.score += points;
  }

  resetForRound(spawn: SpawnPoint): void {
    this.x = spawn.x;
    this.y = spawn.y;
    this.angle = wrapAngle(spawn.angle);
    this.velocity = ZERO;
    this.health = this.cfg.maxHealth;
    this.score = 0;
    this.eliminated = false;
    this.shieldCharge = false;
    this.shootCooldownMs = 0;
    this.powerUps.clear();
  }

  private spawnAt(angle: number): BulletSpawn {
    return { owner: this.id, x: this.x, y: this.y, angle: wrapAngle(angle) };
  }
}
