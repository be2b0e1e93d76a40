/**
 * Star parameter resolution
 *
 * Turns a caller's StarSpec into the turning angles and edge lengths needed
 * to trace it. Pure: nothing here touches a cursor, so every validation
 * failure surfaces before drawing starts.
 */

import { gcd } from "../math/integer";
import { FULL_TURN } from "../math/angle";
import {
  EdgeTooShortError,
  InvalidArgumentsError,
  InvalidStepError,
  InvalidVerticesError,
} from "./errors";
import type {
  Direction,
  HullComputedGeometry,
  HullGivenGeometry,
  InternalGeometry,
  NormalizedStar,
  ResolvedGeometry,
  StarSpec,
} from "./types";

/** Step used when neither step nor edgeLength is given */
export function defaultStep(vertices: number): number {
  return Math.max(1, Math.floor((vertices - 1) / 2));
}

export function directionSign(direction: Direction): 1 | -1 {
  return direction === "ccw" ? 1 : -1;
}

function reverse(direction: Direction): Direction {
  return direction === "ccw" ? "cw" : "ccw";
}

/**
 * Validate a StarSpec and resolve its signs into an explicit variant and
 * direction.
 *
 * A step magnitude above n/2 is mirrored to n - m: {n/m} and {n/(n-m)}
 * connect the same vertices. For the hull the direction is also reversed,
 * so a hull step above n/2 draws the mirror image.
 */
export function normalizeStarSpec(spec: StarSpec): NormalizedStar {
  const { radius, vertices, step, edgeLength } = spec;

  if (!Number.isFinite(radius)) {
    throw new InvalidArgumentsError(`radius must be a finite number, got ${radius}`);
  }
  if (!Number.isInteger(vertices) || vertices < 3) {
    throw new InvalidVerticesError(vertices);
  }
  if (step !== undefined && edgeLength !== undefined) {
    throw new InvalidArgumentsError("step and edgeLength cannot both be given");
  }

  let direction: Direction = radius >= 0 ? "ccw" : "cw";
  const magnitude = Math.abs(radius);

  if (edgeLength !== undefined) {
    if (!Number.isFinite(edgeLength) || edgeLength <= 0) {
      throw new InvalidArgumentsError(
        `edgeLength must be a positive finite number, got ${edgeLength}`
      );
    }
    return {
      radius: magnitude,
      vertices,
      direction,
      variant: { kind: "hullGiven", edgeLength },
    };
  }

  const requested = step ?? defaultStep(vertices);
  if (!Number.isInteger(requested)) {
    throw new InvalidStepError(requested, vertices);
  }

  let m = Math.abs(requested);
  if (m < 1 || m > vertices - 1) {
    throw new InvalidStepError(requested, vertices);
  }
  const kind = requested >= 0 ? "internal" : "hullComputed";
  if (m > vertices / 2) {
    m = vertices - m;
    if (kind === "hullComputed") {
      direction = reverse(direction);
    }
  }

  return {
    radius: magnitude,
    vertices,
    direction,
    variant: { kind, step: m },
  };
}

/**
 * Compute the tracing constants for a normalized star.
 *
 * @throws EdgeTooShortError when a given hull edge is shorter than half the
 * enclosing polygon's side
 */
export function resolveGeometry(star: NormalizedStar): ResolvedGeometry {
  const { radius: r, vertices: n, direction, variant } = star;
  const sgn = directionSign(direction);

  const a = FULL_TURN / n;
  const d = ((n - 2) / n) * Math.PI;
  const base = { vertices: n, radius: r, direction, alpha: sgn * a, delta: sgn * d };

  switch (variant.kind) {
    case "internal": {
      const m = variant.step;
      const stellations = gcd(n, m);
      const geometry: InternalGeometry = {
        ...base,
        mode: "internal",
        step: m,
        beta: (sgn * a * (m + 1)) / 2,
        gamma: sgn * a * m,
        s: 2 * r * Math.sin(a / 2),
        t: 2 * r * Math.sin((a * m) / 2),
        stellations,
        verticesPerFigure: n / stellations,
      };
      return geometry;
    }

    case "hullComputed": {
      const m = variant.step;
      const gamma = a * m;
      const theta = Math.PI - gamma;
      const rho = (d - theta) / 2;
      const lambda = Math.PI - (a + theta) / 2;
      const sigma = Math.PI - 2 * rho;
      const geometry: HullComputedGeometry = {
        ...base,
        mode: "hullComputed",
        step: m,
        gamma: sgn * gamma,
        theta: sgn * theta,
        rho: sgn * rho,
        lambda: sgn * lambda,
        sigma: sgn * sigma,
        u: (Math.sin(a / 2) * r) / Math.sin(lambda),
      };
      return geometry;
    }

    case "hullGiven": {
      const u = variant.edgeLength;
      const s = 2 * r * Math.sin(a / 2);
      const minimum = s / 2;
      if (u < minimum) {
        throw new EdgeTooShortError(u, minimum);
      }
      const rho = Math.acos(s / (2 * u));
      const geometry: HullGivenGeometry = {
        ...base,
        mode: "hullGiven",
        s,
        theta: sgn * (d - 2 * rho),
        rho: sgn * rho,
        sigma: sgn * (Math.PI - 2 * rho),
        u,
      };
      return geometry;
    }
  }
}

export function resolveStar(spec: StarSpec): ResolvedGeometry {
  return resolveGeometry(normalizeStarSpec(spec));
}
