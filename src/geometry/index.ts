/**
 * Geometry utilities
 */

export * from "./types";
export { tessellatePolygon } from "./tessellate";
