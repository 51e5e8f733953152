import type { BulletBounceConfig } from '../../config/bulletBounce';
import { Logger } from '../../core/Logger';
import { randomPick, randomRange, type RandomSource } from '../../core/random';
import {
  add,
  circleIntersectsRect,
  circlesOverlap,
  closestPointOnRect,
  dot,
  length,
  normalize,
  scale,
  segmentIntersection,
  sub,
  vec,
  type Rect,
  type Vec2,
} from '../../physics/geometry';
import { EntityStore } from '../EntityStore';
import { Bullet, type AdvanceResult } from './Bullet';
import type { Player } from './Player';
import type { PowerUp } from './PowerUp';
import { POWER_UP_KINDS, type BulletSpawn, type Circle, type WallContact, type WallQuery, type WallSegment } from './types';

export interface BulletAdvanceReport extends AdvanceResult {
  bullet: Bullet;
}

export interface PowerUpTickReport {
  expired: PowerUp[];
  spawned: PowerUp | null;
}

/**
 * Static walls plus everything that lives on the floor for a round: bullets and power-ups.
 * Wall order is fixed (outer top, bottom, left, right, then each obstacle's top, bottom, left,
 * right faces) and breaks ties between equally near contacts.
 */
export class Arena implements WallQuery {
  readonly walls: readonly WallSegment[];
  /** Outer wall blocks and obstacles, used for spawn and player overlap tests. */
  readonly solids: readonly Rect[];
  readonly bullets = new EntityStore<Bullet>();
  readonly powerUps = new EntityStore<PowerUp>();

  private readonly cfg: BulletBounceConfig;
  private readonly rand: RandomSource;
  private spawnTimerMs: number;
  private clockMs = 0;

  constructor(config: BulletBounceConfig, rand: RandomSource) {
    this.cfg = config;
    this.rand = rand;
    this.walls = buildWalls(config.arena);
    this.solids = buildSolids(config.arena);
    this.spawnTimerMs = config.powerUp.spawnIntervalMs;
  }

  /** Whole arena including the outer walls. */
  get bounds(): Rect {
    return { x: 0, y: 0, w: this.cfg.arena.width, h: this.cfg.arena.height };
  }

  /** Open floor inside the outer walls. */
  get floor(): Rect {
    const t = this.cfg.arena.wallThickness;
    return { x: t, y: t, w: this.cfg.arena.width - t * 2, h: this.cfg.arena.height - t * 2 };
  }

  get elapsedMs(): number {
    return this.clockMs;
  }

  /**
   * First wall a circle of `radius` reaches when moving from `from` to `to`. Only faces the
   * path approaches (moving against their normal) count, so a bullet leaving a wall never
   * re-hits it. Faces are inflated by `radius`, ends included, which turns corners square.
   */
  nearestWallAlong(from: Vec2, to: Vec2, radius: number): WallContact | null {
    const path = sub(to, from);
    let best: WallContact | null = null;
    for (const wall of this.walls) {
      if (dot(path, wall.normal) >= 0) continue;
      const { a, b } = inflateFace(wall, radius);
      const t = segmentIntersection(from, to, a, b);
      if (t === null) continue;
      // strict: on a tie the earlier wall keeps the hit
      if (best === null || t < best.t) {
        best = { wall, t, point: add(from, scale(path, t)) };
      }
    }
    return best;
  }

  wallsTouching(point: Vec2, radius: number, tolerance: number): WallSegment[] {
    const touching: WallSegment[] = [];
    for (const wall of this.walls) {
      const { a, b } = inflateFace(wall, radius);
      if (Math.abs(dot(sub(point, a), wall.normal)) > tolerance) continue;
      const span = sub(b, a);
      const along = dot(sub(point, a), normalize(span));
      if (along < -tolerance || along > length(span) + tolerance) continue;
      touching.push(wall);
    }
    return touching;
  }

  spawnBullet(spawn: BulletSpawn): Bullet {
    return this.bullets.add(new Bullet(this.bullets.allocateId(), spawn, this.cfg.bullet));
  }

  /** Advances every live bullet; dead ones stay in the store until `removeDeadBullets`. */
  advanceBullets(dtMs: number): BulletAdvanceReport[] {
    const reports: BulletAdvanceReport[] = [];
    for (const bullet of this.bullets.values()) {
      if (!bullet.alive) continue;
      const result = bullet.advance(dtMs, this, this.bounds, this.cfg.bullet.outOfBoundsMargin);
      reports.push({ bullet, ...result });
    }
    return reports;
  }

  removeDeadBullets(): Bullet[] {
    return this.bullets.removeWhere(b => !b.alive);
  }

  /** Keeps a player on the open floor and outside every obstacle. */
  constrainPlayer(player: Player): void {
    const r = player.radius;
    const floor = this.floor;
    for (const obstacle of this.cfg.arena.obstacles) {
      if (!circleIntersectsRect(player.position, r, obstacle)) continue;
      const pushed = pushOutOfRect(player.position, r, obstacle);
      player.x = pushed.x;
      player.y = pushed.y;
    }
    player.x = Math.max(floor.x + r, Math.min(floor.x + floor.w - r, player.x));
    player.y = Math.max(floor.y + r, Math.min(floor.y + floor.h - r, player.y));
  }

  /**
   * Ages power-ups (removing expired ones) and runs the spawn timer. A spawn is only attempted
   * below the concurrency cap; `occupied` circles (the players) are kept clear.
   */
  tickPowerUps(dtMs: number, occupied: readonly Circle[] = []): PowerUpTickReport {
    this.clockMs += dtMs;
    for (const pu of this.powerUps.values()) {
      pu.remainingMs -= dtMs;
      if (pu.remainingMs <= 0) pu.active = false;
    }
    const expired = this.powerUps.removeWhere(pu => !pu.active);

    let spawned: PowerUp | null = null;
    this.spawnTimerMs -= dtMs;
    if (this.spawnTimerMs <= 0) {
      this.spawnTimerMs += this.cfg.powerUp.spawnIntervalMs;
      if (this.spawnTimerMs <= 0) this.spawnTimerMs = this.cfg.powerUp.spawnIntervalMs;
      if (this.powerUps.size < this.cfg.powerUp.maxConcurrent) {
        spawned = this.trySpawnPowerUp(occupied);
      }
    }
    return { expired, spawned };
  }

  /**
   * Rejection-samples a free spot. Gives up after `spawnRetries` candidates and skips the
   * cycle; never loops unbounded.
   */
  trySpawnPowerUp(occupied: readonly Circle[] = []): PowerUp | null {
    const { radius, spawnRetries, spawnMargin, lifetimeMs } = this.cfg.powerUp;
    const { width, height } = this.cfg.arena;
    for (let attempt = 0; attempt < spawnRetries; attempt++) {
      const candidate = vec(
        randomRange(this.rand, spawnMargin, width - spawnMargin),
        randomRange(this.rand, spawnMargin, height - spawnMargin),
      );
      if (!this.isFreeSpot(candidate, radius, occupied)) continue;
      const pu: PowerUp = {
        id: this.powerUps.allocateId(),
        kind: randomPick(this.rand, POWER_UP_KINDS),
        x: candidate.x,
        y: candidate.y,
        radius,
        spawnedAtMs: this.clockMs,
        remainingMs: lifetimeMs,
        active: true,
      };
      return this.powerUps.add(pu);
    }
    Logger.debug(`[Arena] no free spot for a power-up after ${spawnRetries} tries; skipping this cycle`);
    return null;
  }

  /** Removes and returns the first power-up the player overlaps, if any. */
  collectPowerUp(player: Player): PowerUp | null {
    for (const pu of this.powerUps.values()) {
      if (!pu.active) continue;
      if (circlesOverlap(player.position, player.radius, pu, pu.radius)) {
        pu.active = false;
        this.powerUps.remove(pu.id);
        return pu;
      }
    }
    return null;
  }

  /** Round boundary: floor swept, spawn timer and clock restarted. Walls are untouched. */
  clearRound(): void {
    for (const bullet of this.bullets.values()) bullet.destroy('cleared');
    this.bullets.clear();
    this.powerUps.clear();
    this.spawnTimerMs = this.cfg.powerUp.spawnIntervalMs;
    this.clockMs = 0;
  }

  private isFreeSpot(p: Vec2, radius: number, occupied: readonly Circle[]): boolean {
    for (const solid of this.solids) {
      if (circleIntersectsRect(p, radius, solid)) return false;
    }
    for (const pu of this.powerUps.values()) {
      if (circlesOverlap(p, radius, pu, pu.radius)) return false;
    }
    for (const c of occupied) {
      if (circlesOverlap(p, radius, c, c.radius)) return false;
    }
    return true;
  }
}

function buildWalls(arena: BulletBounceConfig['arena']): WallSegment[] {
  const { width: w, height: h, wallThickness: t } = arena;
  const faces: Array<[Vec2, Vec2, Vec2]> = [
    // inner faces of the outer walls, normals point into the arena
    [vec(t, t), vec(w - t, t), vec(0, 1)],
    [vec(t, h - t), vec(w - t, h - t), vec(0, -1)],
    [vec(t, t), vec(t, h - t), vec(1, 0)],
    [vec(w - t, t), vec(w - t, h - t), vec(-1, 0)],
  ];
  for (const o of arena.obstacles) {
    faces.push(
      [vec(o.x, o.y), vec(o.x + o.w, o.y), vec(0, -1)],
      [vec(o.x, o.y + o.h), vec(o.x + o.w, o.y + o.h), vec(0, 1)],
      [vec(o.x, o.y), vec(o.x, o.y + o.h), vec(-1, 0)],
      [vec(o.x + o.w, o.y), vec(o.x + o.w, o.y + o.h), vec(1, 0)],
    );
  }
  return faces.map(([a, b, normal], index) => ({ index, a, b, normal }));
}

/** A face pushed out by `radius` along its normal and stretched by `radius` at both ends. */
function inflateFace(wall: WallSegment, radius: number): { a: Vec2; b: Vec2 } {
  const along = normalize(sub(wall.b, wall.a));
  const lift = scale(wall.normal, radius);
  return {
    a: add(add(wall.a, lift), scale(along, -radius)),
    b: add(add(wall.b, lift), scale(along, radius)),
  };
}

function buildSolids(arena: BulletBounceConfig['arena']): Rect[] {
  const { width: w, height: h, wallThickness: t } = arena;
  return [
    { x: 0, y: 0, w, h: t },
    { x: 0, y: h - t, w, h: t },
    { x: 0, y: 0, w: t, h },
    { x: w - t, y: 0, w: t, h },
    ...arena.obstacles,
  ];
}

/** Moves a circle overlapping `r` out along the shortest axis (or away from the closest point when the center is outside). */
function pushOutOfRect(center: Vec2, radius: number, r: Rect): Vec2 {
  const closest = closestPointOnRect(r, center);
  const dx = center.x - closest.x;
  const dy = center.y - closest.y;
  if (dx !== 0 || dy !== 0) {
    const n = normalize(vec(dx, dy));
    return add(closest, scale(n, radius));
  }
  // center inside the rectangle: leave through the nearest side
  const left = center.x - r.x;
  const right = r.x + r.w - center.x;
  const top = center.y - r.y;
  const bottom = r.y + r.h - center.y;
  const min = Math.min(left, right, top, bottom);
  if (min === left) return vec(r.x - radius, center.y);
  if (min === right) return vec(r.x + r.w + radius, center.y);
  if (min === top) return vec(center.x, r.y - radius);
  return vec(center.x, r.y + r.h + radius);
}
