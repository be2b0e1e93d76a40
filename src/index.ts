/**
 * Stellate - regular star polygon paths for turtle-style drawing cursors
 */

export const VERSION = "0.0.1";

export {
  drawStar,
  StarPathPlanner,
  type StarPathPlannerOptions,
  describeGeometry,
  resolveStar,
  normalizeStarSpec,
  resolveGeometry,
  emitStarPath,
  StarError,
  InvalidArgumentsError,
  InvalidVerticesError,
  InvalidStepError,
  EdgeTooShortError,
  type StarSpec,
  type Direction,
  type StarVariant,
  type StarMode,
  type NormalizedStar,
  type ResolvedGeometry,
  type InternalGeometry,
  type HullGeometry,
  type HullComputedGeometry,
  type HullGivenGeometry,
} from "./star";
export { Turtle, type TurtleOptions, type TurtleMove, type TurtleFill } from "./cursor";
export type { Cursor, AngleUnit } from "./cursor";
export { PathBuilder, type SubPath } from "./path";
export * from "./geometry";
export * as vec2 from "./math/vec2";
