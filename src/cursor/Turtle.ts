/**
 * In-memory turtle cursor
 *
 * Tracks position, heading and pen state, and records every move it makes.
 * Pen-down moves are collected into a PathBuilder as stroked sub-paths; while
 * filling, every move also extends the fill outline, which is triangulated
 * when the fill ends.
 */

import type { Cursor } from "./types";
import { PathBuilder } from "../path/PathBuilder";
import { add, distance, fromAngle, type Vec2 } from "../math/vec2";
import {
  fromRadians,
  fullTurn,
  normalizeRadians,
  toRadians,
  type AngleUnit,
} from "../math/angle";
import type { Ring, TessellatedPolygon } from "../geometry/types";

export interface TurtleOptions {
  /** Starting position (default: origin) */
  position?: Vec2;
  /** Starting heading in `angleUnit` (default: 0, pointing along +x) */
  heading?: number;
  /** Angle unit for headings and turns (default: degrees) */
  angleUnit?: AngleUnit;
}

export interface TurtleMove {
  from: Vec2;
  to: Vec2;
  penDown: boolean;
}

export interface TurtleFill {
  /** Outline visited while filling, starting at the beginFill position */
  ring: Ring;
  triangles: TessellatedPolygon;
}

const DEFAULT_OPTIONS: Required<TurtleOptions> = {
  position: [0, 0],
  heading: 0,
  angleUnit: "degrees",
};

export class Turtle implements Cursor {
  private readonly initial: Required<TurtleOptions>;

  private unit: AngleUnit;
  private pos: Vec2;
  /** Heading in radians, kept in [0, 2π) */
  private headingRad: number;
  private down = true;

  private path = new PathBuilder();
  /** Whether the next pen-down move must start a new sub-path */
  private detached = true;
  private moveLog: TurtleMove[] = [];

  private fillPath: PathBuilder | null = null;
  private fillRing: Ring = [];
  private fillLog: TurtleFill[] = [];

  constructor(options: TurtleOptions = {}) {
    this.initial = { ...DEFAULT_OPTIONS, ...options };
    this.unit = this.initial.angleUnit;
    this.pos = [...this.initial.position];
    this.headingRad = normalizeRadians(
      toRadians(this.initial.heading, this.unit)
    );
  }

  // ==================== Cursor ====================

  forward(distance: number): void {
    this.moveTo(add(this.pos, fromAngle(this.headingRad, distance)));
  }

  rotate(angle: number): void {
    this.headingRad = normalizeRadians(
      this.headingRad + toRadians(angle, this.unit)
    );
  }

  position(): Vec2 {
    return [this.pos[0], this.pos[1]];
  }

  heading(): number {
    const value = fromRadians(this.headingRad, this.unit);
    // Rounding at the top of the range would otherwise report a full turn
    return value < fullTurn(this.unit) ? value : 0;
  }

  setHeading(angle: number): void {
    this.headingRad = normalizeRadians(toRadians(angle, this.unit));
  }

  goto(x: number, y: number): void {
    this.moveTo([x, y]);
  }

  penUp(): void {
    this.down = false;
  }

  penDown(): void {
    this.down = true;
  }

  isFilling(): boolean {
    return this.fillPath !== null;
  }

  setAngleUnit(unit: AngleUnit): void {
    this.unit = unit;
  }

  angleUnit(): AngleUnit {
    return this.unit;
  }

  // ==================== Extras ====================

  isDown(): boolean {
    return this.down;
  }

  /**
   * Draw a polygonal approximation of a circular arc.
   *
   * The centre lies `radius` units to the left for positive radius and to
   * the right for negative radius; the turtle ends on the arc with its
   * heading advanced by `extent`. `circle(r, full turn, n)` visits the
   * vertices of the regular n-gon inscribed in that circle.
   *
   * @param extent - Arc angle in the current unit (default: full turn)
   * @param steps - Number of chords (default: derived from radius and extent)
   */
  circle(radius: number, extent?: number, steps?: number): void {
    const full = fullTurn(this.unit);
    const arc = extent ?? full;
    const count =
      steps ??
      1 + Math.floor(Math.min(11 + Math.abs(radius) / 6, 59) * (Math.abs(arc) / full));

    let w = arc / count;
    let w2 = w / 2;
    let chord = 2 * radius * Math.sin(toRadians(w2, this.unit));
    if (radius < 0) {
      chord = -chord;
      w = -w;
      w2 = -w2;
    }

    this.rotate(w2);
    for (let i = 0; i < count; i++) {
      this.forward(chord);
      this.rotate(w);
    }
    this.rotate(-w2);
  }

  /**
   * Start recording a fill outline at the current position
   */
  beginFill(): void {
    this.fillPath = new PathBuilder();
    this.fillPath.moveTo(this.pos[0], this.pos[1]);
    this.fillRing = [this.position()];
  }

  /**
   * Close the fill outline and triangulate it.
   * Returns null when no fill was started.
   */
  endFill(): TurtleFill | null {
    if (!this.fillPath) {
      console.warn("[Turtle] endFill() called without beginFill()");
      return null;
    }
    this.fillPath.closePath();
    const fill: TurtleFill = {
      ring: this.fillRing,
      triangles: this.fillPath.tessellate(),
    };
    this.fillLog.push(fill);
    this.fillPath = null;
    this.fillRing = [];
    return fill;
  }

  /** Every move made since construction or the last reset */
  get moves(): readonly TurtleMove[] {
    return this.moveLog;
  }

  get fills(): readonly TurtleFill[] {
    return this.fillLog;
  }

  /** Stroked sub-paths drawn with the pen down */
  get strokes(): PathBuilder {
    return this.path;
  }

  /** Total distance travelled with the pen down */
  strokeLength(): number {
    let total = 0;
    for (const move of this.moveLog) {
      if (move.penDown) total += distance(move.from, move.to);
    }
    return total;
  }

  /**
   * Return to the initial options and clear all recorded moves and fills
   */
  reset(): void {
    this.unit = this.initial.angleUnit;
    this.pos = [...this.initial.position];
    this.headingRad = normalizeRadians(
      toRadians(this.initial.heading, this.unit)
    );
    this.down = true;
    this.path = new PathBuilder();
    this.detached = true;
    this.moveLog = [];
    this.fillPath = null;
    this.fillRing = [];
    this.fillLog = [];
  }

  private moveTo(to: Vec2): void {
    const from = this.pos;
    this.moveLog.push({ from, to, penDown: this.down });

    if (this.down) {
      if (this.detached) {
        this.path.moveTo(from[0], from[1]);
        this.detached = false;
      }
      this.path.lineTo(to[0], to[1]);
    } else {
      this.detached = true;
    }

    if (this.fillPath) {
      this.fillPath.lineTo(to[0], to[1]);
      this.fillRing.push([to[0], to[1]]);
    }

    this.pos = to;
  }
}
