/**
 * Star polygon types
 */

/**
 * Caller-facing description of a star {n/m}.
 *
 * The sign of `radius` selects the drawing direction and the sign of `step`
 * selects interior chords (>= 0) or the hull outline (< 0). At most one of
 * `step` / `edgeLength` may be given.
 */
export interface StarSpec {
  radius: number;
  vertices: number;
  step?: number;
  edgeLength?: number;
}

/** Tracing direction around the enclosing circle */
export type Direction = "ccw" | "cw";

export type StarVariant =
  | { kind: "internal"; step: number }
  | { kind: "hullComputed"; step: number }
  | { kind: "hullGiven"; edgeLength: number };

export type StarMode = StarVariant["kind"];

/** A validated StarSpec with signs resolved into explicit fields */
export interface NormalizedStar {
  /** Radius magnitude */
  radius: number;
  vertices: number;
  direction: Direction;
  variant: StarVariant;
}

/**
 * Angles are in radians and carry the direction's sign (positive for ccw).
 * Lengths are positive, in radius units.
 */
interface GeometryBase {
  vertices: number;
  radius: number;
  direction: Direction;
  /** Central angle between neighbouring vertices */
  alpha: number;
  /** Interior angle of the regular n-gon */
  delta: number;
}

export interface InternalGeometry extends GeometryBase {
  mode: "internal";
  step: number;
  /** Half-turn used on each side of a stellation seam */
  beta: number;
  /** Exterior turn between chords */
  gamma: number;
  /** Side of the enclosing n-gon */
  s: number;
  /** Chord length */
  t: number;
  /** Number of disjoint sub-figures, gcd(n, m) */
  stellations: number;
  /** Vertices per sub-figure, n / gcd(n, m) */
  verticesPerFigure: number;
}

export interface HullComputedGeometry extends GeometryBase {
  mode: "hullComputed";
  step: number;
  gamma: number;
  /** Angle at each star point */
  theta: number;
  rho: number;
  lambda: number;
  /** Angle at each inner notch */
  sigma: number;
  /** Edge length */
  u: number;
}

export interface HullGivenGeometry extends GeometryBase {
  mode: "hullGiven";
  s: number;
  theta: number;
  rho: number;
  sigma: number;
  u: number;
}

export type HullGeometry = HullComputedGeometry | HullGivenGeometry;

export type ResolvedGeometry = InternalGeometry | HullGeometry;
