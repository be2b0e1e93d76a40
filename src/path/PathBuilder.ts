/**
 * Path builder for recorded cursor strokes
 *
 * Accumulates path commands (moveTo, lineTo, closePath) as sub-paths and can
 * measure them or convert them to triangles for filling.
 */

import { distance } from "../math/vec2";
import { tessellatePolygon } from "../geometry/tessellate";
import type { Coord, TessellatedPolygon } from "../geometry/types";

export interface SubPath {
  points: Coord[];
  closed: boolean;
}

export class PathBuilder {
  private subPaths: SubPath[] = [];
  private currentSubPath: SubPath | null = null;

  /**
   * Start a new path (clears existing path data)
   */
  beginPath(): void {
    this.subPaths = [];
    this.currentSubPath = null;
  }

  /**
   * Move to a new position, starting a new sub-path
   */
  moveTo(x: number, y: number): void {
    this.currentSubPath = { points: [[x, y]], closed: false };
    this.subPaths.push(this.currentSubPath);
  }

  /**
   * Draw a line from current position to (x, y)
   */
  lineTo(x: number, y: number): void {
    if (!this.currentSubPath) {
      this.moveTo(x, y);
      return;
    }
    this.currentSubPath.points.push([x, y]);
  }

  /**
   * Close the current sub-path
   */
  closePath(): void {
    if (this.currentSubPath && this.currentSubPath.points.length > 0) {
      this.currentSubPath.closed = true;
    }
    this.currentSubPath = null;
  }

  isEmpty(): boolean {
    return this.subPaths.length === 0;
  }

  /**
   * Snapshot of the recorded sub-paths
   */
  getSubPaths(): SubPath[] {
    return this.subPaths.map((subPath) => ({
      points: subPath.points.map(([x, y]): Coord => [x, y]),
      closed: subPath.closed,
    }));
  }

  /**
   * Sum of segment lengths over all sub-paths, including the closing
   * segment of closed ones.
   */
  totalLength(): number {
    let total = 0;
    for (const { points, closed } of this.subPaths) {
      for (let i = 1; i < points.length; i++) {
        total += distance(points[i - 1]!, points[i]!);
      }
      if (closed && points.length > 1) {
        total += distance(points[points.length - 1]!, points[0]!);
      }
    }
    return total;
  }

  /**
   * Tessellate the path for filling.
   * Each sub-path with at least 3 points is treated as a separate polygon.
   */
  tessellate(): TessellatedPolygon {
    const allVertices: number[] = [];
    const allIndices: number[] = [];

    for (const subPath of this.subPaths) {
      if (subPath.points.length < 3) continue;

      const result = tessellatePolygon(subPath.points);
      const indexOffset = allVertices.length / 2;
      for (let i = 0; i < result.vertices.length; i++) {
        allVertices.push(result.vertices[i]!);
      }
      for (let i = 0; i < result.indices.length; i++) {
        allIndices.push(result.indices[i]! + indexOffset);
      }
    }

    const vertices = new Float32Array(allVertices);
    const indices =
      allVertices.length / 2 > 65535
        ? new Uint32Array(allIndices)
        : new Uint16Array(allIndices);

    return { vertices, indices };
  }
}
