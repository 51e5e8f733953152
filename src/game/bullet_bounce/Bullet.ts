import type { BulletBounceConfig } from '../../config/bulletBounce';
import { invariant } from '../../core/invariant';
import { add, dot, fromAngle, normalize, reflect, scale, type Rect, type Vec2 } from '../../physics/geometry';
import type { BulletDeath, BulletSpawn, PlayerId, WallContact, WallQuery } from './types';

/** Upper bound on reflections resolved inside one advance (a bullet wedged in a corner stops there for the frame). */
const MAX_CONTACTS_PER_ADVANCE = 8;

export interface AdvanceResult {
  /** Walls touched this frame, in path order. The last one is the fatal contact when `destroyedBy === 'bounceLimit'`. */
  contacts: WallContact[];
  destroyedBy: BulletDeath | null;
}

/**
 * Projectile that reflects off walls until its bounce budget runs out.
 * The owner is stored by id only; bullets never hold a reference to a player.
 */
export class Bullet {
  readonly id: number;
  readonly owner: PlayerId;
  readonly radius: number;
  /** Scalar speed fixed at creation; re-imposed after every reflection. */
  readonly speed: number;
  x: number;
  y: number;
  vx: number;
  vy: number;
  bouncesRemaining: number;
  ageMs = 0;
  alive = true;
  destroyedBy: BulletDeath | null = null;
  /** Recent positions, oldest first. Rendering only. */
  readonly trail: Vec2[] = [];

  private readonly trailLength: number;
  private readonly lifetimeMs: number;
  private readonly contactEpsilon: number;

  constructor(id: number, spawn: BulletSpawn, cfg: BulletBounceConfig['bullet']) {
    this.id = id;
    this.owner = spawn.owner;
    this.radius = cfg.radius;
    this.speed = cfg.speed;
    this.x = spawn.x;
    this.y = spawn.y;
    const v = fromAngle(spawn.angle, cfg.speed);
    this.vx = v.x;
    this.vy = v.y;
    this.bouncesRemaining = cfg.maxBounces;
    this.trailLength = cfg.trailLength;
    this.lifetimeMs = cfg.lifetimeMs;
    this.contactEpsilon = cfg.contactEpsilon;
  }

  get position(): Vec2 {
    return { x: this.x, y: this.y };
  }

  get velocity(): Vec2 {
    return { x: this.vx, y: this.vy };
  }

  /**
   * Integrates `dtMs` of movement against `walls`. Each contact either reflects the bullet
   * (spending one bounce) or, with no bounces left, destroys it at the contact point. A corner
   * contact reflects off every face the bullet still approaches there.
   * `bounds` enables the lost-bullet check: leaving it by more than `margin` destroys the bullet.
   */
  advance(dtMs: number, walls: WallQuery, bounds?: Rect, margin = 0): AdvanceResult {
    const contacts: WallContact[] = [];
    if (!this.alive) return { contacts, destroyedBy: this.destroyedBy };

    this.pushTrail({ x: this.x, y: this.y });
    this.ageMs += dtMs;

    let remaining = dtMs / 1000;
    for (let i = 0; i < MAX_CONTACTS_PER_ADVANCE && remaining > 0; i++) {
      const from = this.position;
      const to = add(from, scale(this.velocity, remaining));
      const hit = walls.nearestWallAlong(from, to, this.radius);
      if (!hit) {
        this.x = to.x;
        this.y = to.y;
        remaining = 0;
        break;
      }
      // a corner contact touches several faces at once; each approached one costs a bounce,
      // resolved in wall-index order
      const faces = walls.wallsTouching(hit.point, this.radius, this.contactEpsilon)
        .filter(wall => wall.index !== hit.wall.index)
        .concat(hit.wall)
        .sort((l, r) => l.index - r.index);
      for (const wall of faces) {
        if (wall !== hit.wall && dot(this.velocity, wall.normal) >= 0) continue;
        contacts.push(wall === hit.wall ? hit : { wall, t: hit.t, point: hit.point });
        if (this.bouncesRemaining === 0) {
          this.x = hit.point.x;
          this.y = hit.point.y;
          this.destroy('bounceLimit');
          break;
        }
        this.reflectOff(wall.normal);
      }
      if (!this.alive) break;
      this.x = hit.point.x + (this.vx / this.speed) * this.contactEpsilon;
      this.y = hit.point.y + (this.vy / this.speed) * this.contactEpsilon;
      this.pushTrail(hit.point);
      remaining *= 1 - hit.t;
    }

    if (this.alive && this.ageMs >= this.lifetimeMs) {
      this.destroy('expired');
    }
    if (this.alive && bounds && this.isOutside(bounds, margin)) {
      this.destroy('outOfBounds');
    }
    return { contacts, destroyedBy: this.destroyedBy };
  }

  private reflectOff(normal: Vec2): void {
    const dir = normalize(reflect(this.velocity, normal));
    this.vx = dir.x * this.speed;
    this.vy = dir.y * this.speed;
    this.bouncesRemaining -= 1;
    invariant(this.bouncesRemaining >= 0, `bullet ${this.id}: negative bounce budget`);
  }

  destroy(reason: BulletDeath): void {
    if (!this.alive) return;
    this.alive = false;
    this.destroyedBy = reason;
  }

  private isOutside(bounds: Rect, margin: number): boolean {
    const m = this.radius + margin;
    return this.x < bounds.x - m || this.x > bounds.x + bounds.w + m
      || this.y < bounds.y - m || this.y > bounds.y + bounds.h + m;
  }

  private pushTrail(p: Vec2): void {
    this.trail.push(p);
    if (this.trail.length > this.trailLength) this.trail.splice(0, this.trail.length - this.trailLength);
  }
}
