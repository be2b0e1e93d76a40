import { describe, it, expect } from "vitest";
import { emitStarPath } from "./emit";
import { resolveStar } from "./resolve";
import { Turtle } from "../cursor/Turtle";
import type { Cursor, AngleUnit } from "../cursor/types";
import type { Vec2 } from "../math/vec2";

/** Cursor that logs each mutating command before passing it to a turtle */
class RecordingCursor implements Cursor {
  readonly turtle: Turtle;
  readonly calls: string[] = [];
  readonly rotations: number[] = [];
  readonly distances: number[] = [];

  constructor(turtle: Turtle = new Turtle()) {
    this.turtle = turtle;
  }

  forward(distance: number): void {
    this.calls.push("forward");
    this.distances.push(distance);
    this.turtle.forward(distance);
  }

  rotate(angle: number): void {
    this.calls.push("rotate");
    this.rotations.push(angle);
    this.turtle.rotate(angle);
  }

  position(): Vec2 {
    return this.turtle.position();
  }

  heading(): number {
    return this.turtle.heading();
  }

  setHeading(angle: number): void {
    this.calls.push("setHeading");
    this.turtle.setHeading(angle);
  }

  goto(x: number, y: number): void {
    this.calls.push("goto");
    this.turtle.goto(x, y);
  }

  penUp(): void {
    this.calls.push("penUp");
    this.turtle.penUp();
  }

  penDown(): void {
    this.calls.push("penDown");
    this.turtle.penDown();
  }

  isFilling(): boolean {
    return this.turtle.isFilling();
  }

  setAngleUnit(unit: AngleUnit): void {
    this.calls.push(`setAngleUnit:${unit}`);
    this.turtle.setAngleUnit(unit);
  }

  angleUnit(): AngleUnit {
    return this.turtle.angleUnit();
  }
}

describe("emitStarPath", () => {
  describe("internal", () => {
    it("jumps between sub-polygons at stellation seams", () => {
      const cursor = new RecordingCursor();
      emitStarPath(cursor, resolveStar({ radius: 250, vertices: 6, step: 2 }));

      expect(cursor.calls).toEqual([
        "setAngleUnit:radians",
        "rotate",
        "rotate", "forward",
        "rotate", "forward",
        "rotate", "forward",
        "rotate", "penUp", "forward", "penDown", "rotate", "forward",
        "rotate", "forward",
        "rotate", "forward",
        "penUp", "goto", "penDown", "setHeading",
        "setAngleUnit:degrees",
      ]);
    });

    it("turns by the resolved angles in radians", () => {
      const cursor = new RecordingCursor();
      emitStarPath(cursor, resolveStar({ radius: 250, vertices: 6, step: 2 }));

      const [centre, first, , , seamIn, seamOut] = cursor.rotations;
      expect(centre).toBeCloseTo(-Math.PI / 3, 12);
      expect(first).toBeCloseTo((2 * Math.PI) / 3, 12);
      expect(seamIn).toBeCloseTo(Math.PI / 2, 12);
      expect(seamOut).toBeCloseTo(Math.PI / 2, 12);
    });

    it("draws chords of length t and jumps of length s", () => {
      const cursor = new RecordingCursor();
      emitStarPath(cursor, resolveStar({ radius: 250, vertices: 6, step: 2 }));

      expect(cursor.distances).toHaveLength(7);
      expect(cursor.distances[3]).toBeCloseTo(250, 9);
      for (const i of [0, 1, 2, 4, 5, 6]) {
        expect(cursor.distances[i]).toBeCloseTo(433.0127018922193, 9);
      }
    });

    it("walks back to the start while filling", () => {
      const turtle = new Turtle();
      turtle.beginFill();
      const cursor = new RecordingCursor(turtle);
      emitStarPath(cursor, resolveStar({ radius: 100, vertices: 12, step: 3 }));

      const tail = cursor.calls.slice(-12);
      expect(tail).toEqual([
        "penUp", "rotate", "forward", "rotate", "forward", "rotate", "penDown",
        "penUp", "goto", "penDown", "setHeading",
        "setAngleUnit:degrees",
      ]);

      const returnMove = turtle.moves[turtle.moves.length - 1]!;
      expect(returnMove.from[0]).toBeCloseTo(0, 9);
      expect(returnMove.from[1]).toBeCloseTo(0, 9);
    });

    it("skips the walk back when not filling", () => {
      const cursor = new RecordingCursor();
      emitStarPath(cursor, resolveStar({ radius: 100, vertices: 12, step: 3 }));

      const returnMove = cursor.turtle.moves[cursor.turtle.moves.length - 1]!;
      expect(returnMove.from[0]).toBeCloseTo(86.60254037844386, 9);
      expect(returnMove.from[1]).toBeCloseTo(50, 9);
    });
  });

  describe("hull", () => {
    it("draws two edges per point", () => {
      const cursor = new RecordingCursor();
      emitStarPath(cursor, resolveStar({ radius: 100, vertices: 7, step: -3 }));

      const body = cursor.calls.slice(2, -5);
      expect(body).toHaveLength(7 * 4);
      expect(body.slice(0, 4)).toEqual(["forward", "rotate", "forward", "rotate"]);
      expect(cursor.distances).toHaveLength(14);
      for (const distance of cursor.distances) {
        expect(distance).toBeCloseTo(69.58954867009433, 9);
      }
    });

    it("never asks whether the cursor is filling", () => {
      const turtle = new Turtle();
      turtle.beginFill();
      const cursor = new RecordingCursor(turtle);
      emitStarPath(cursor, resolveStar({ radius: 100, vertices: 7, step: -3 }));

      expect(cursor.calls.filter((call) => call === "penUp")).toHaveLength(1);
    });
  });

  describe("cursor state", () => {
    it("restores position, heading and angle unit", () => {
      const turtle = new Turtle({ position: [12, -7], heading: 33 });
      emitStarPath(turtle, resolveStar({ radius: 80, vertices: 9, step: 2 }));

      expect(turtle.position()).toEqual([12, -7]);
      expect(turtle.heading()).toBe(new Turtle({ heading: 33 }).heading());
      expect(turtle.angleUnit()).toBe("degrees");
      expect(turtle.isDown()).toBe(true);
    });

    it("restores the angle unit when the cursor fails mid-draw", () => {
      const turtle = new Turtle();
      const cursor = new RecordingCursor(turtle);
      cursor.forward = () => {
        throw new Error("pen jammed");
      };

      expect(() =>
        emitStarPath(cursor, resolveStar({ radius: 100, vertices: 5 }))
      ).toThrow("pen jammed");
      expect(turtle.angleUnit()).toBe("degrees");
    });
  });
});
