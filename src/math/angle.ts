/**
 * Angle units and conversions
 */

export type AngleUnit = "degrees" | "radians";

export const FULL_TURN = Math.PI * 2;

/** One full turn expressed in the given unit */
export function fullTurn(unit: AngleUnit): number {
  return unit === "degrees" ? 360 : FULL_TURN;
}

export function toRadians(value: number, unit: AngleUnit): number {
  return unit === "degrees" ? (value * Math.PI) / 180 : value;
}

export function fromRadians(value: number, unit: AngleUnit): number {
  return unit === "degrees" ? (value * 180) / Math.PI : value;
}

/**
 * Wrap an angle into [0, 2π).
 */
export function normalizeRadians(angle: number): number {
  const wrapped = angle % FULL_TURN;
  if (wrapped >= 0) return wrapped;
  // Tiny negative remainders round up to exactly 2π
  const shifted = wrapped + FULL_TURN;
  return shifted < FULL_TURN ? shifted : 0;
}
