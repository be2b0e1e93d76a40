/**
 * 2D vector utilities for cursor and path geometry
 */

/** 2D vector as [x, y] tuple */
export type Vec2 = [number, number];

export function add(a: Vec2, b: Vec2): Vec2 {
  return [a[0] + b[0], a[1] + b[1]];
}

export function subtract(a: Vec2, b: Vec2): Vec2 {
  return [a[0] - b[0], a[1] - b[1]];
}

export function scale(v: Vec2, k: number): Vec2 {
  return [v[0] * k, v[1] * k];
}

export function length(v: Vec2): number {
  return Math.sqrt(v[0] * v[0] + v[1] * v[1]);
}

export function distance(a: Vec2, b: Vec2): number {
  return length(subtract(b, a));
}

/**
 * Vector of the given length pointing along `angle` (radians, CCW from +x).
 */
export function fromAngle(angle: number, len: number = 1): Vec2 {
  return scale([Math.cos(angle), Math.sin(angle)], len);
}

/**
 * Component-wise comparison with an absolute tolerance.
 */
export function approxEqual(a: Vec2, b: Vec2, epsilon: number = 1e-9): boolean {
  return Math.abs(a[0] - b[0]) <= epsilon && Math.abs(a[1] - b[1]) <= epsilon;
}
