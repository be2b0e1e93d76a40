/**
 * Star polygon planning
 */

export * from "./types";
export * from "./errors";
export {
  defaultStep,
  directionSign,
  normalizeStarSpec,
  resolveGeometry,
  resolveStar,
} from "./resolve";
export { emitStarPath } from "./emit";
export {
  StarPathPlanner,
  type StarPathPlannerOptions,
  describeGeometry,
  drawStar,
} from "./StarPathPlanner";
