import { describe, it, expect, afterEach } from 'vitest';
import { createBulletBounceConfig, type BulletBounceConfigOverrides } from '../src/config/bulletBounce';
import { Logger } from '../src/core/Logger';
import { Arena } from '../src/game/bullet_bounce/Arena';
import { Player } from '../src/game/bullet_bounce/Player';
import { vec } from '../src/physics/geometry';

function countingRandom(value = 0.5) {
  const source = { calls: 0, next: () => 0 };
  source.next = () => {
    source.calls++;
    return value;
  };
  return source;
}

function makeArena(overrides: BulletBounceConfigOverrides = {}, rand = countingRandom()) {
  const config = createBulletBounceConfig(overrides);
  return { config, rand, arena: new Arena(config, rand.next) };
}

function playerAt(x: number, y: number): Player {
  const p = new Player(1, createBulletBounceConfig());
  p.resetForRound({ x, y, angle: 0 });
  return p;
}

afterEach(() => {
  Logger.clearTelemetryHooks();
});

describe('Arena walls', () => {
  it('orders outer walls first, then four faces per obstacle', () => {
    const { arena } = makeArena();
    expect(arena.walls).toHaveLength(12);
    expect(arena.walls.map(w => w.normal)).toEqual([
      { x: 0, y: 1 }, { x: 0, y: -1 }, { x: 1, y: 0 }, { x: -1, y: 0 },
      { x: 0, y: -1 }, { x: 0, y: 1 }, { x: -1, y: 0 }, { x: 1, y: 0 },
      { x: 0, y: -1 }, { x: 0, y: 1 }, { x: -1, y: 0 }, { x: 1, y: 0 },
    ]);
  });

  it('breaks an exact corner tie in favour of the lower wall index', () => {
    const { arena } = makeArena({ arena: { obstacles: [] } });
    const hit = arena.nearestWallAlong(vec(35, 35), vec(-25, -25), 5);
    expect(hit?.wall.index).toBe(0);
    expect(hit?.t).toBe(1 / 6);
    expect(hit?.point.x).toBeCloseTo(25, 9);
    expect(hit?.point.y).toBeCloseTo(25, 9);
  });

  it('picks the nearer wall when the path reaches it first', () => {
    const { arena } = makeArena({ arena: { obstacles: [] } });
    expect(arena.nearestWallAlong(vec(35, 40), vec(-25, -20), 5)?.wall.index).toBe(2);
  });

  it('reflects off obstacle faces', () => {
    const { arena } = makeArena();
    const hit = arena.nearestWallAlong(vec(150, 300), vec(250, 300), 5);
    expect(hit?.wall.index).toBe(6);
    expect(hit?.t).toBeCloseTo(0.45, 12);
  });

  it('lists every inflated face a point lies on', () => {
    const { arena } = makeArena({ arena: { obstacles: [] } });
    expect(arena.wallsTouching(vec(25, 25), 5, 0.01).map(w => w.index)).toEqual([0, 2]);
    expect(arena.wallsTouching(vec(25.005, 300), 5, 0.01).map(w => w.index)).toEqual([2]);
    expect(arena.wallsTouching(vec(400, 300), 5, 0.01)).toEqual([]);
  });

  it('ignores walls the path moves away from', () => {
    const { arena } = makeArena({ arena: { obstacles: [] } });
    expect(arena.nearestWallAlong(vec(25.01, 300), vec(100, 300), 5)).toBeNull();
  });
});

describe('Arena player constraints', () => {
  it('keeps players on the floor', () => {
    const { arena } = makeArena();
    const p = playerAt(5, 5);
    arena.constrainPlayer(p);
    expect(p.position).toEqual({ x: 40, y: 40 });
  });

  it('pushes players out of obstacles', () => {
    const { arena } = makeArena();
    const inside = playerAt(205, 300);
    arena.constrainPlayer(inside);
    expect(inside.position).toEqual({ x: 180, y: 300 });
    const touching = playerAt(190, 300);
    arena.constrainPlayer(touching);
    expect(touching.position).toEqual({ x: 180, y: 300 });
  });
});

describe('Arena power-ups', () => {
  it('spawns at a free spot with a random kind', () => {
    const { arena, rand } = makeArena({ arena: { obstacles: [] } });
    const pu = arena.trySpawnPowerUp();
    expect(pu).toMatchObject({ id: 1, kind: 'speed', x: 400, y: 300, radius: 15, remainingMs: 10_000, active: true });
    expect(rand.calls).toBe(3);
  });

  it('skips the cycle after the retry budget when no spot is free', () => {
    const debug: string[] = [];
    Logger.addTelemetryHook((level, message) => {
      if (level === 'debug') debug.push(message);
    });
    const { arena, rand } = makeArena({ arena: { obstacles: [{ x: 0, y: 0, w: 800, h: 600 }] } });
    expect(arena.trySpawnPowerUp()).toBeNull();
    expect(arena.powerUps.size).toBe(0);
    expect(rand.calls).toBe(100);
    expect(debug).toEqual(['[Arena] no free spot for a power-up after 50 tries; skipping this cycle']);
  });

  it('keeps spawns clear of occupied circles', () => {
    const { arena, rand } = makeArena({ arena: { obstacles: [] } });
    expect(arena.trySpawnPowerUp([{ x: 400, y: 300, radius: 20 }])).toBeNull();
    expect(rand.calls).toBe(100);
  });

  it('spawns on the interval and expires uncollected power-ups', () => {
    const { arena } = makeArena({ arena: { obstacles: [] } });
    expect(arena.tickPowerUps(9999).spawned).toBeNull();
    const first = arena.tickPowerUps(1).spawned;
    expect(first?.id).toBe(1);
    expect(first?.spawnedAtMs).toBe(10_000);
    const { expired, spawned } = arena.tickPowerUps(10_000);
    expect(expired.map(pu => pu.id)).toEqual([1]);
    expect(spawned?.id).toBe(2);
    expect(arena.powerUps.size).toBe(1);
  });

  it('does not attempt a spawn at the concurrency cap', () => {
    const { arena, rand } = makeArena({ arena: { obstacles: [] }, powerUp: { maxConcurrent: 1, lifetimeMs: 30_000 } });
    arena.tickPowerUps(10_000);
    expect(rand.calls).toBe(3);
    expect(arena.tickPowerUps(10_000).spawned).toBeNull();
    expect(rand.calls).toBe(3);
  });

  it('hands an overlapped power-up to the player and removes it', () => {
    const { arena } = makeArena({ arena: { obstacles: [] } });
    arena.trySpawnPowerUp();
    expect(arena.collectPowerUp(playerAt(600, 300))).toBeNull();
    expect(arena.collectPowerUp(playerAt(420, 300))?.kind).toBe('speed');
    expect(arena.powerUps.size).toBe(0);
  });
});

describe('Arena round reset', () => {
  it('clearRound removes bullets and power-ups and restarts the clock', () => {
    const { arena } = makeArena({ arena: { obstacles: [] } });
    const bullet = arena.spawnBullet({ owner: 1, x: 400, y: 300, angle: 0 });
    arena.trySpawnPowerUp();
    arena.tickPowerUps(500);
    arena.clearRound();
    expect(bullet.destroyedBy).toBe('cleared');
    expect(arena.bullets.size).toBe(0);
    expect(arena.powerUps.size).toBe(0);
    expect(arena.elapsedMs).toBe(0);
  });

  it('removes dead bullets after advancing', () => {
    const { arena } = makeArena({ arena: { obstacles: [] }, bullet: { maxBounces: 0 } });
    arena.spawnBullet({ owner: 1, x: 400, y: 300, angle: 0 });
    arena.spawnBullet({ owner: 2, x: 400, y: 300, angle: Math.PI / 2 });
    const reports = arena.advanceBullets(1000);
    expect(reports.map(r => r.destroyedBy)).toEqual(['bounceLimit', 'bounceLimit']);
    expect(arena.removeDeadBullets().map(b => b.id)).toEqual([1, 2]);
    expect(arena.bullets.size).toBe(0);
  });
});
