/**
 * Drawing cursor contract
 *
 * The narrow capability surface a path planner needs from a turtle-style pen.
 * Angles are expressed in the cursor's current angle unit.
 */

import type { Vec2 } from "../math/vec2";
import type { AngleUnit } from "../math/angle";

export type { AngleUnit };

export interface Cursor {
  /** Move along the current heading, drawing when the pen is down */
  forward(distance: number): void;
  /** Relative turn, counterclockwise positive */
  rotate(angle: number): void;
  position(): Vec2;
  heading(): number;
  setHeading(angle: number): void;
  /** Move to an absolute position without changing heading */
  goto(x: number, y: number): void;
  penUp(): void;
  penDown(): void;
  isFilling(): boolean;
  setAngleUnit(unit: AngleUnit): void;
  angleUnit(): AngleUnit;
}
