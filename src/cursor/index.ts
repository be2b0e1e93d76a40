export type { Cursor, AngleUnit } from "./types";
export {
  Turtle,
  type TurtleOptions,
  type TurtleMove,
  type TurtleFill,
} from "./Turtle";
