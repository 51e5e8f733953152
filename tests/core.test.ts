import { describe, it, expect, vi, afterEach } from 'vitest';
import { EventBus } from '../src/core/EventBus';
import { Logger, type LogLevel } from '../src/core/Logger';
import { invariant, InvariantError } from '../src/core/invariant';
import { createLcg, randomPick, randomRange } from '../src/core/random';

afterEach(() => {
  Logger.setLogLevel('info');
  Logger.clearTelemetryHooks();
  vi.restoreAllMocks();
});

describe('random', () => {
  it('LCG is deterministic per seed and stays in [0, 1)', () => {
    const a = createLcg(42);
    const b = createLcg(42);
    const seqA = Array.from({ length: 20 }, () => a());
    const seqB = Array.from({ length: 20 }, () => b());
    expect(seqA).toEqual(seqB);
    for (const v of seqA) {
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
    expect(createLcg(1)()).toBe(1015568748 / 0x100000000);
  });

  it('range and pick map the unit interval', () => {
    expect(randomRange(() => 0.5, 10, 20)).toBe(15);
    expect(randomPick(() => 0, ['a', 'b', 'c'])).toBe('a');
    expect(randomPick(() => 0.9999999, ['a', 'b', 'c'])).toBe('c');
    expect(() => randomPick(() => 0, [])).toThrow(RangeError);
  });
});

describe('EventBus', () => {
  type Events = { ping: { n: number }; other: string };

  it('delivers to subscribers until they unsubscribe', () => {
    const bus = new EventBus<Events>();
    const seen: number[] = [];
    const off = bus.on('ping', e => seen.push(e.n));
    bus.emit('ping', { n: 1 });
    off();
    bus.emit('ping', { n: 2 });
    expect(seen).toEqual([1]);
  });

  it('reports a failing listener and keeps going', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const logged: string[] = [];
    Logger.addTelemetryHook((level, message) => logged.push(`${level}:${message}`));
    const bus = new EventBus<Events>();
    const seen: string[] = [];
    bus.on('other', () => {
      throw new Error('boom');
    });
    bus.on('other', s => seen.push(s));
    bus.emit('other', 'hello');
    expect(seen).toEqual(['hello']);
    expect(logged).toEqual(["error:[EventBus] listener for 'other' failed"]);
  });

  it('clear drops every listener', () => {
    const bus = new EventBus<Events>();
    const fn = vi.fn();
    bus.on('ping', fn);
    bus.clear();
    bus.emit('ping', { n: 3 });
    expect(fn).not.toHaveBeenCalled();
  });
});

describe('Logger', () => {
  it('filters console output by level but feeds every hook', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const seen: Array<[LogLevel, string]> = [];
    const remove = Logger.addTelemetryHook((level, message) => seen.push([level, message]));
    Logger.setLogLevel('warn');
    Logger.info('quiet');
    Logger.warn('careful', 42);
    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[WARN] careful', 42);
    expect(seen).toEqual([['info', 'quiet'], ['warn', 'careful']]);
    remove();
    Logger.warn('after');
    expect(seen).toHaveLength(2);
    expect(Logger.getLogLevel()).toBe('warn');
  });
});

describe('invariant', () => {
  it('throws an InvariantError when the condition fails', () => {
    expect(() => invariant(1 > 2, 'math broke')).toThrow(InvariantError);
    expect(() => invariant(false, 'math broke')).toThrow('math broke');
    expect(() => invariant(true, 'fine')).not.toThrow();
  });
});
