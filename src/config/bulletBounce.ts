import type { Rect } from '../physics/geometry';

export interface SpawnPoint {
  readonly x: number;
  readonly y: number;
  /** Facing angle in radians. */
  readonly angle: number;
}

/**
 * Tuning for one Bullet Bounce match. Built once, frozen, and handed to the arena, the
 * players and the game; nothing reads these values from module state.
 * Times are milliseconds, distances pixels, speeds pixels per second.
 */
export interface BulletBounceConfig {
  readonly arena: {
    readonly width: number;
    readonly height: number;
    readonly wallThickness: number;
    /** Interior blocks bullets reflect off and players cannot walk through. */
    readonly obstacles: readonly Rect[];
    /** Round start positions, player 1 first. */
    readonly spawns: readonly [SpawnPoint, SpawnPoint];
  };
  readonly player: {
    readonly radius: number;
    readonly moveSpeed: number;
    /** Radians per second. */
    readonly rotationSpeed: number;
    readonly maxHealth: number;
    readonly shootCooldownMs: number;
    /** Angle offset (radians) of each bullet of a double shot. */
    readonly doubleShotSpread: number;
  };
  readonly bullet: {
    readonly radius: number;
    readonly speed: number;
    readonly maxBounces: number;
    readonly trailLength: number;
    readonly lifetimeMs: number;
    /** Distance a reflected bullet is pushed off the wall along its new heading. */
    readonly contactEpsilon: number;
    /** Extra distance past the arena edge before a bullet is considered lost. */
    readonly outOfBoundsMargin: number;
  };
  readonly powerUp: {
    readonly radius: number;
    readonly lifetimeMs: number;
    readonly effectDurationMs: number;
    readonly speedMultiplier: number;
    readonly spawnIntervalMs: number;
    readonly maxConcurrent: number;
    readonly spawnRetries: number;
    /** Minimum distance kept between a spawned power-up and the arena walls. */
    readonly spawnMargin: number;
  };
  readonly match: {
    readonly countdownMs: number;
    readonly roundDurationMs: number;
    readonly roundOverDelayMs: number;
    /** Points that win a round outright. */
    readonly pointThreshold: number;
    /** Points awarded to the shooter for every hit that is not absorbed (0 = elimination only). */
    readonly pointsPerHit: number;
    readonly roundWinThreshold: number;
    readonly maxRounds: number;
  };
  readonly seed: number;
}

export type BulletBounceConfigOverrides = {
  readonly [K in keyof BulletBounceConfig]?: BulletBounceConfig[K] extends number
    ? number
    : Partial<BulletBounceConfig[K]>;
};

export class ConfigError extends Error {
  constructor(public readonly key: string, message: string) {
    super(`${key}: ${message}`);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_BULLET_BOUNCE_CONFIG: BulletBounceConfig = deepFreeze<BulletBounceConfig>({
  arena: {
    width: 800,
    height: 600,
    wallThickness: 20,
    obstacles: [
      { x: 200, y: 250, w: 20, h: 100 },
      { x: 580, y: 250, w: 20, h: 100 },
    ],
    spawns: [
      { x: 120, y: 300, angle: 0 },
      { x: 680, y: 300, angle: Math.PI },
    ],
  },
  player: {
    radius: 20,
    moveSpeed: 300,
    rotationSpeed: 6,
    maxHealth: 5,
    shootCooldownMs: 250,
    doubleShotSpread: 0.2,
  },
  bullet: {
    radius: 5,
    speed: 600,
    maxBounces: 3,
    trailLength: 10,
    lifetimeMs: 5000,
    contactEpsilon: 0.01,
    outOfBoundsMargin: 50,
  },
  powerUp: {
    radius: 15,
    lifetimeMs: 10_000,
    effectDurationMs: 5000,
    speedMultiplier: 1.5,
    spawnIntervalMs: 10_000,
    maxConcurrent: 3,
    spawnRetries: 50,
    spawnMargin: 50,
  },
  match: {
    countdownMs: 3000,
    roundDurationMs: 60_000,
    roundOverDelayMs: 5000,
    pointThreshold: 5,
    pointsPerHit: 1,
    roundWinThreshold: 2,
    maxRounds: 3,
  },
  seed: 1,
});

const POSITIVE_INTEGERS: ReadonlyArray<readonly [string, (cfg: BulletBounceConfig) => number]> = [
  ['player.maxHealth', cfg => cfg.player.maxHealth],
  ['bullet.trailLength', cfg => cfg.bullet.trailLength],
  ['powerUp.maxConcurrent', cfg => cfg.powerUp.maxConcurrent],
  ['powerUp.spawnRetries', cfg => cfg.powerUp.spawnRetries],
  ['match.pointThreshold', cfg => cfg.match.pointThreshold],
  ['match.roundWinThreshold', cfg => cfg.match.roundWinThreshold],
  ['match.maxRounds', cfg => cfg.match.maxRounds],
];

/** Merges section-level overrides over the defaults, validates, and freezes the result. */
export function createBulletBounceConfig(overrides: BulletBounceConfigOverrides = {}): BulletBounceConfig {
  const base = DEFAULT_BULLET_BOUNCE_CONFIG;
  const merged: BulletBounceConfig = {
    arena: { ...base.arena, ...overrides.arena },
    player: { ...base.player, ...overrides.player },
    bullet: { ...base.bullet, ...overrides.bullet },
    powerUp: { ...base.powerUp, ...overrides.powerUp },
    match: { ...base.match, ...overrides.match },
    seed: overrides.seed ?? base.seed,
  };
  validate(merged);
  return deepFreeze(merged);
}

function validate(cfg: BulletBounceConfig): void {
  const sections = ['arena', 'player', 'bullet', 'powerUp', 'match'] as const;
  for (const section of sections) {
    for (const [key, value] of Object.entries(cfg[section])) {
      if (typeof value !== 'number') continue;
      if (!Number.isFinite(value) || value < 0) {
        throw new ConfigError(`${section}.${key}`, `must be a finite non-negative number, got ${value}`);
      }
    }
  }
  for (const [key, read] of POSITIVE_INTEGERS) {
    const value = read(cfg);
    if (!Number.isInteger(value) || value < 1) {
      throw new ConfigError(key, `must be a positive integer, got ${value}`);
    }
  }
  const { width, height, wallThickness } = cfg.arena;
  if (width <= wallThickness * 2 || height <= wallThickness * 2) {
    throw new ConfigError('arena', 'must be larger than twice the wall thickness');
  }
  if (cfg.bullet.speed <= 0) {
    throw new ConfigError('bullet.speed', 'must be positive');
  }
  if (!Number.isInteger(cfg.bullet.maxBounces)) {
    throw new ConfigError('bullet.maxBounces', 'must be an integer');
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
