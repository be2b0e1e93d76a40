/**
 * Star path planner
 *
 * Resolves a StarSpec and drives a cursor through the figure. All argument
 * errors are raised by resolution, before the cursor is touched. The planner
 * only borrows the cursor for the duration of a draw.
 */

import type { Cursor } from "../cursor/types";
import { emitStarPath } from "./emit";
import { resolveStar } from "./resolve";
import type { ResolvedGeometry, StarSpec } from "./types";

export interface StarPathPlannerOptions {
  /** Log each resolved geometry before drawing (default: false) */
  debug?: boolean;
}

const DEFAULT_OPTIONS: Required<StarPathPlannerOptions> = {
  debug: false,
};

export class StarPathPlanner {
  private readonly options: Required<StarPathPlannerOptions>;

  constructor(options: StarPathPlannerOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  resolve(spec: StarSpec): ResolvedGeometry {
    return resolveStar(spec);
  }

  /**
   * Draw the star with `cursor` and return the geometry that was traced.
   */
  draw(cursor: Cursor, spec: StarSpec): ResolvedGeometry {
    const geometry = this.resolve(spec);
    if (this.options.debug) {
      console.log(`[StarPathPlanner] ${describeGeometry(geometry)}`);
    }
    emitStarPath(cursor, geometry);
    return geometry;
  }
}

/**
 * One-line summary of a geometry, used for debug logging
 */
export function describeGeometry(geometry: ResolvedGeometry): string {
  const head = `mode=${geometry.mode} n=${geometry.vertices} direction=${geometry.direction}`;
  switch (geometry.mode) {
    case "internal":
      return (
        `${head} step=${geometry.step} stellations=${geometry.stellations} ` +
        `chord=${geometry.t.toFixed(2)}`
      );
    case "hullComputed":
      return `${head} step=${geometry.step} edge=${geometry.u.toFixed(2)}`;
    case "hullGiven":
      return `${head} edge=${geometry.u.toFixed(2)} theta=${geometry.theta.toFixed(4)}`;
  }
}

const defaultPlanner = new StarPathPlanner();

/**
 * Draw a regular star polygon {vertices/step} inscribed in a circle of
 * `radius`, starting and ending at the cursor's current position and
 * heading.
 *
 * A negative radius draws clockwise. A negative step draws only the outer
 * hull; `edgeLength` draws the hull with edges of that length instead. With
 * neither, step defaults to floor((vertices - 1) / 2).
 *
 * @example
 * const turtle = new Turtle();
 * drawStar(turtle, 150, 5);                      // pentagram {5/2}
 * drawStar(turtle, 250, 6, 2);                   // two triangles
 * drawStar(turtle, 250, 7, -3);                  // hull of {7/3}
 * drawStar(turtle, 150, 7, undefined, 120);      // hull with 120-unit edges
 */
export function drawStar(
  cursor: Cursor,
  radius: number,
  vertices: number,
  step?: number,
  edgeLength?: number
): ResolvedGeometry {
  return defaultPlanner.draw(cursor, { radius, vertices, step, edgeLength });
}
