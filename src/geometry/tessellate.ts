/**
 * Polygon tessellation using earcut
 */

import earcut from "earcut";
import type { Ring, TessellatedPolygon } from "./types";

/**
 * Tessellate a polygon (with optional holes) into triangles.
 *
 * @param outer - Outer ring coordinates [[x,y], [x,y], ...]
 * @param holes - Optional array of hole rings
 */
export function tessellatePolygon(
  outer: Ring,
  holes: Ring[] = []
): TessellatedPolygon {
  const coords: number[] = [];
  const holeIndices: number[] = [];

  for (const [x, y] of outer) {
    coords.push(x, y);
  }

  for (const hole of holes) {
    holeIndices.push(coords.length / 2);
    for (const [x, y] of hole) {
      coords.push(x, y);
    }
  }

  const indices = earcut(
    coords,
    holeIndices.length > 0 ? holeIndices : undefined,
    2
  );

  const vertices = new Float32Array(coords);
  const indexArray =
    coords.length / 2 > 65535
      ? new Uint32Array(indices)
      : new Uint16Array(indices);

  return { vertices, indices: indexArray };
}
