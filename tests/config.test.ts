import { describe, it, expect } from 'vitest';
import { ConfigError, createBulletBounceConfig, DEFAULT_BULLET_BOUNCE_CONFIG } from '../src/config/bulletBounce';

function configErrorOf(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected a ConfigError');
}

describe('Bullet Bounce config', () => {
  it('defaults match the tuning table', () => {
    const cfg = createBulletBounceConfig();
    expect(cfg).toEqual(DEFAULT_BULLET_BOUNCE_CONFIG);
    expect(cfg.arena.width).toBe(800);
    expect(cfg.bullet.maxBounces).toBe(3);
    expect(cfg.match.maxRounds).toBe(3);
  });

  it('merges overrides per section and keeps the rest', () => {
    const cfg = createBulletBounceConfig({ bullet: { maxBounces: 1 }, seed: 7 });
    expect(cfg.bullet.maxBounces).toBe(1);
    expect(cfg.bullet.speed).toBe(600);
    expect(cfg.player.radius).toBe(20);
    expect(cfg.seed).toBe(7);
  });

  it('freezes the whole tree', () => {
    const cfg = createBulletBounceConfig({ arena: { obstacles: [{ x: 1, y: 2, w: 3, h: 4 }] } });
    expect(Object.isFrozen(cfg)).toBe(true);
    expect(Object.isFrozen(cfg.arena.obstacles[0])).toBe(true);
    expect(Reflect.set(cfg.bullet, 'speed', 1)).toBe(false);
    expect(cfg.bullet.speed).toBe(600);
  });

  it('rejects negative and non-finite numbers with the offending key', () => {
    const neg = configErrorOf(() => createBulletBounceConfig({ bullet: { speed: -1 } }));
    expect(neg.key).toBe('bullet.speed');
    expect(neg.message).toBe('bullet.speed: must be a finite non-negative number, got -1');
    expect(configErrorOf(() => createBulletBounceConfig({ match: { countdownMs: NaN } })).key).toBe('match.countdownMs');
  });

  it('rejects counts below one', () => {
    const err = configErrorOf(() => createBulletBounceConfig({ player: { maxHealth: 0 } }));
    expect(err.name).toBe('ConfigError');
    expect(err.message).toBe('player.maxHealth: must be a positive integer, got 0');
  });

  it('rejects a zero bullet speed, fractional bounces and an arena thinner than its walls', () => {
    expect(configErrorOf(() => createBulletBounceConfig({ bullet: { speed: 0 } })).message).toBe('bullet.speed: must be positive');
    expect(configErrorOf(() => createBulletBounceConfig({ bullet: { maxBounces: 1.5 } })).key).toBe('bullet.maxBounces');
    expect(configErrorOf(() => createBulletBounceConfig({ arena: { width: 40 } })).key).toBe('arena');
  });

  it('accepts a zero bounce budget', () => {
    expect(createBulletBounceConfig({ bullet: { maxBounces: 0 } }).bullet.maxBounces).toBe(0);
  });
});
