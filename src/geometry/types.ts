/**
 * Geometry types
 */

import type { Vec2 } from "../math/vec2";

/** Coordinate as [x, y] */
export type Coord = Vec2;

/** Ring of coordinates (for polygons) */
export type Ring = Coord[];

/** Tessellated polygon result with vertices and indices */
export interface TessellatedPolygon {
  /** Interleaved vertex data [x, y, x, y, ...] */
  vertices: Float32Array;
  /** Triangle indices */
  indices: Uint16Array | Uint32Array;
}
