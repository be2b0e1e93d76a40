/**
 * Star path emission
 *
 * Walks a resolved geometry and issues move/turn commands to a cursor. The
 * cursor ends at the position and heading it started from, in the angle unit
 * it started with.
 */

import type { Cursor } from "../cursor/types";
import { directionSign } from "./resolve";
import type { HullGeometry, InternalGeometry, ResolvedGeometry } from "./types";

export function emitStarPath(cursor: Cursor, geometry: ResolvedGeometry): void {
  const unit = cursor.angleUnit();
  cursor.setAngleUnit("radians");

  try {
    const orient = cursor.heading();
    const [x, y] = cursor.position();

    if (geometry.mode === "internal") {
      traceInternal(cursor, geometry);
    } else {
      traceHull(cursor, geometry);
    }

    cursor.penUp();
    cursor.goto(x, y);
    cursor.penDown();
    cursor.setHeading(orient);
  } finally {
    cursor.setAngleUnit(unit);
  }
}

/**
 * Chords between every m-th vertex. When gcd(n, m) > 1 the figure splits
 * into separate sub-polygons and the pen jumps one side of the enclosing
 * n-gon between them.
 */
function traceInternal(cursor: Cursor, g: InternalGeometry): void {
  cursor.rotate(-g.gamma / 2);

  for (let i = 0; i < g.vertices; i++) {
    if (i > 0 && i % g.verticesPerFigure === 0) {
      cursor.rotate(g.beta);
      cursor.penUp();
      cursor.forward(g.s);
      cursor.penDown();
      cursor.rotate(g.beta);
    } else {
      cursor.rotate(g.gamma);
    }
    cursor.forward(g.t);
  }

  // Walk back along the n-gon so the fill outline ends where it began
  if (cursor.isFilling()) {
    cursor.penUp();
    cursor.rotate(g.beta + g.delta);
    for (let i = 0; i < g.stellations - 1; i++) {
      cursor.forward(g.s);
      cursor.rotate(-g.alpha);
    }
    cursor.penDown();
  }
}

/** Two edges per point, one "\/" at a time */
function traceHull(cursor: Cursor, g: HullGeometry): void {
  const halfTurn = directionSign(g.direction) * Math.PI;

  cursor.rotate((halfTurn - g.theta) / 2);
  for (let i = 0; i < g.vertices; i++) {
    cursor.forward(g.u);
    cursor.rotate(g.sigma - halfTurn);
    cursor.forward(g.u);
    cursor.rotate(halfTurn - g.theta);
  }
}
