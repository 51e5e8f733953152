/**
 * 2D vector and collision primitives shared by bullets, players and the arena.
 * All helpers are pure; vectors are plain `{ x, y }` records and never mutated.
 */
export interface Vec2 {
  readonly x: number;
  readonly y: number;
}

export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly w: number;
  readonly h: number;
}

export const TWO_PI = Math.PI * 2;

export const ZERO: Vec2 = Object.freeze({ x: 0, y: 0 });

export function vec(x: number, y: number): Vec2 {
  return { x, y };
}

export function add(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function sub(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function scale(v: Vec2, s: number): Vec2 {
  return { x: v.x * s, y: v.y * s };
}

export function dot(a: Vec2, b: Vec2): number {
  return a.x * b.x + a.y * b.y;
}

export function lengthSq(v: Vec2): number {
  return v.x * v.x + v.y * v.y;
}

export function length(v: Vec2): number {
  return Math.hypot(v.x, v.y);
}

export function distance(a: Vec2, b: Vec2): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

/** Unit vector in the direction of `v`; the zero vector stays zero. */
export function normalize(v: Vec2): Vec2 {
  const len = length(v);
  if (len === 0) return ZERO;
  return { x: v.x / len, y: v.y / len };
}

export function fromAngle(angle: number, magnitude = 1): Vec2 {
  return { x: Math.cos(angle) * magnitude, y: Math.sin(angle) * magnitude };
}

export function clampLength(v: Vec2, max: number): Vec2 {
  const lenSq = lengthSq(v);
  if (lenSq <= max * max) return v;
  return scale(v, max / Math.sqrt(lenSq));
}

/** Wraps any angle into [0, 2π). */
export function wrapAngle(angle: number): number {
  const a = angle % TWO_PI;
  const wrapped = a < 0 ? a + TWO_PI : a;
  // -tiny % 2π + 2π rounds to exactly 2π
  return wrapped >= TWO_PI ? 0 : wrapped;
}

/** Reflects `v` about the unit normal `n` (angle of incidence equals angle of reflection). */
export function reflect(v: Vec2, n: Vec2): Vec2 {
  const d = 2 * dot(v, n);
  return { x: v.x - d * n.x, y: v.y - d * n.y };
}

export function circlesOverlap(a: Vec2, ra: number, b: Vec2, rb: number): boolean {
  const r = ra + rb;
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return dx * dx + dy * dy < r * r;
}

/**
 * Intersection of the movement path p0→p1 with the segment a→b.
 * Returns the fraction `t` in [0, 1] along the path, or null when the two do not cross
 * (parallel paths never report a hit).
 */
export function segmentIntersection(p0: Vec2, p1: Vec2, a: Vec2, b: Vec2): number | null {
  const rx = p1.x - p0.x;
  const ry = p1.y - p0.y;
  const sx = b.x - a.x;
  const sy = b.y - a.y;
  const denom = rx * sy - ry * sx;
  if (denom === 0) return null;
  const qpx = a.x - p0.x;
  const qpy = a.y - p0.y;
  const t = (qpx * sy - qpy * sx) / denom;
  const u = (qpx * ry - qpy * rx) / denom;
  if (t < 0 || t > 1 || u < 0 || u > 1) return null;
  return t;
}

export function rectContainsPoint(r: Rect, p: Vec2): boolean {
  return p.x >= r.x && p.x <= r.x + r.w && p.y >= r.y && p.y <= r.y + r.h;
}

export function closestPointOnRect(r: Rect, p: Vec2): Vec2 {
  return {
    x: Math.max(r.x, Math.min(p.x, r.x + r.w)),
    y: Math.max(r.y, Math.min(p.y, r.y + r.h)),
  };
}

export function circleIntersectsRect(center: Vec2, radius: number, r: Rect): boolean {
  const c = closestPointOnRect(r, center);
  const dx = center.x - c.x;
  const dy = center.y - c.y;
  return dx * dx + dy * dy < radius * radius;
}
