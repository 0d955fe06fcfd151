import { Vec2 } from "@/math/Vec2";
import { describe, expect, it } from "vitest";

describe("Vec2", () => {
  describe("subtract", () => {
    it("should subtract b from a", () => {
      expect(Vec2.subtract({ x: 5, y: 7 }, { x: 2, y: 3 })).toEqual({ x: 3, y: 4 });
    });
  });

  describe("offset", () => {
    it("should move from origin along direction", () => {
      expect(Vec2.offset({ x: 1, y: 1 }, { x: 2, y: -1 }, 3)).toEqual({ x: 7, y: -2 });
    });
  });

  describe("dot", () => {
    it("should calculate dot product", () => {
      expect(Vec2.dot({ x: 1, y: 2 }, { x: 3, y: 4 })).toBe(11);
    });
  });

  describe("length and distance", () => {
    it("should calculate squared length", () => {
      expect(Vec2.lengthSquared({ x: 3, y: 4 })).toBe(25);
    });

    it("should calculate distance between points", () => {
      expect(Vec2.distance({ x: 1, y: 1 }, { x: 4, y: 5 })).toBe(5);
      expect(Vec2.distanceSquared({ x: 1, y: 1 }, { x: 4, y: 5 })).toBe(25);
    });
  });

  describe("pointToSegmentDistance", () => {
    const start = { x: 0, y: 0 };
    const end = { x: 10, y: 0 };

    it("should measure perpendicular distance when projection is inside", () => {
      expect(Vec2.pointToSegmentDistance({ x: 5, y: 3 }, start, end)).toBe(3);
    });

    it("should measure to start when projection is before the segment", () => {
      expect(Vec2.pointToSegmentDistance({ x: -3, y: 4 }, start, end)).toBe(5);
    });

    it("should measure to end when projection is past the segment", () => {
      expect(Vec2.pointToSegmentDistance({ x: 13, y: 4 }, start, end)).toBe(5);
    });

    it("should measure to the point for a degenerate segment", () => {
      expect(Vec2.pointToSegmentDistance({ x: 3, y: 4 }, start, start)).toBe(5);
    });
  });
});
