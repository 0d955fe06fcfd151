/**
 * Tests for bitangent construction between two circles.
 */
import { Segment } from "@/math/Segment";
import { Vec2 } from "@/math/Vec2";
import type { Circle } from "@/types";
import {
  EXTERNAL_TANGENT_INDICES,
  INTERNAL_TANGENT_INDICES,
  computeTangents,
  externalTangents,
} from "@/visibility/TangentSolver";
import { TANGENCY_EPSILON } from "@/visibility/tolerance";
import { circle, expectOnCircle, expectPointClose } from "@test/helpers/geometryHelpers";
import { describe, expect, it } from "vitest";

const HALF_ROOT_3 = Math.sqrt(3) / 2;

/**
 * Each tangent must touch both circles perpendicular to their radius.
 */
function expectValidTangents(a: Circle, b: Circle): void {
  const tangents = computeTangents(a, b);

  for (const tangent of tangents) {
    expectOnCircle(tangent.start, a);
    expectOnCircle(tangent.end, b);

    const direction = Segment.delta(tangent);
    expect(Vec2.dot(direction, Vec2.subtract(tangent.start, a.center))).toBeCloseTo(0, 9);
    expect(Vec2.dot(direction, Vec2.subtract(tangent.end, b.center))).toBeCloseTo(0, 9);
  }
}

describe("computeTangents", () => {
  describe("separated equal circles", () => {
    const a = circle(0, 0, 5);
    const b = circle(20, 0, 5);
    const tangents = computeTangents(a, b);

    it("should return four tangents", () => {
      expect(tangents).toHaveLength(4);
    });

    it("should put the external tangents on y = +5 and y = -5", () => {
      const [upper, lower] = EXTERNAL_TANGENT_INDICES.map((i) => tangents[i]);

      expectPointClose(upper?.start, { x: 0, y: 5 });
      expectPointClose(upper?.end, { x: 20, y: 5 });
      expectPointClose(lower?.start, { x: 0, y: -5 });
      expectPointClose(lower?.end, { x: 20, y: -5 });
    });

    it("should cross the internal tangents at the midpoint (10, 0)", () => {
      const [first, second] = INTERNAL_TANGENT_INDICES.map((i) => tangents[i]);

      expectPointClose(first?.start, { x: 2.5, y: 5 * HALF_ROOT_3 });
      expectPointClose(first?.end, { x: 17.5, y: -5 * HALF_ROOT_3 });
      expectPointClose(second?.start, { x: 2.5, y: -5 * HALF_ROOT_3 });
      expectPointClose(second?.end, { x: 17.5, y: 5 * HALF_ROOT_3 });

      expectPointClose(first && Segment.pointAt(first, 0.5), { x: 10, y: 0 });
      expectPointClose(second && Segment.pointAt(second, 0.5), { x: 10, y: 0 });
    });

    it("should start every tangent on A and end it on B", () => {
      expectValidTangents(a, b);
    });
  });

  describe("general positions", () => {
    it.each([
      [circle(0, 0, 3), circle(10, 4, 1.5)],
      [circle(-4, 7, 1), circle(12, -3, 6)],
      [circle(100, 100, 40), circle(300, 180, 25)],
      [circle(0, 0, 0), circle(50, 20, 10)],
      [circle(50, 20, 10), circle(0, 0, 0)],
    ])("should produce four valid tangents for %o and %o", (a, b) => {
      expect(computeTangents(a, b)).toHaveLength(4);
      expectValidTangents(a, b);
    });
  });

  describe("overlapping circles", () => {
    it("should return only the external pair", () => {
      const a = circle(0, 0, 5);
      const b = circle(6, 0, 5);
      const tangents = computeTangents(a, b);

      expect(tangents).toHaveLength(2);
      expectPointClose(tangents[0]?.start, { x: 0, y: 5 });
      expectPointClose(tangents[1]?.start, { x: 0, y: -5 });
      expectValidTangents(a, b);
    });
  });

  describe("touching circles", () => {
    it("should collapse the internal pair to the contact point when touching externally", () => {
      const tangents = computeTangents(circle(0, 0, 5), circle(10, 0, 5));

      expect(tangents).toHaveLength(4);
      for (const i of INTERNAL_TANGENT_INDICES) {
        expectPointClose(tangents[i]?.start, { x: 5, y: 0 });
        expectPointClose(tangents[i]?.end, { x: 5, y: 0 });
      }
    });

    it("should report no tangents when touching internally", () => {
      expect(computeTangents(circle(0, 0, 10), circle(7, 0, 3))).toEqual([]);
    });

    it("should treat near-internal contact within the tolerance as nested", () => {
      const offset = 7 + TANGENCY_EPSILON / 100;
      expect(computeTangents(circle(0, 0, 10), circle(offset, 0, 3))).toEqual([]);
    });
  });

  describe("no tangent family", () => {
    it("should return empty when B is inside A", () => {
      expect(computeTangents(circle(0, 0, 10), circle(2, 0, 3))).toEqual([]);
    });

    it("should return empty when A is inside B", () => {
      expect(computeTangents(circle(2, 0, 3), circle(0, 0, 10))).toEqual([]);
    });

    it("should return empty for concentric circles", () => {
      expect(computeTangents(circle(5, 5, 2), circle(5, 5, 8))).toEqual([]);
      expect(computeTangents(circle(5, 5, 2), circle(5, 5, 2))).toEqual([]);
    });

    it("should return empty for coincident points", () => {
      expect(computeTangents(circle(1, 1, 0), circle(1, 1, 0))).toEqual([]);
    });
  });

  describe("point circles", () => {
    it("should collapse every tangent onto the line between the points", () => {
      const tangents = computeTangents(circle(0, 0, 0), circle(100, 0, 0));

      expect(tangents).toHaveLength(4);
      for (const tangent of tangents) {
        expectPointClose(tangent.start, { x: 0, y: 0 });
        expectPointClose(tangent.end, { x: 100, y: 0 });
      }
    });
  });

  it("should return identical results for identical inputs", () => {
    const a = circle(12.5, -3.25, 4.75);
    const b = circle(-40.125, 18.5, 9.5);

    expect(computeTangents(a, b)).toEqual(computeTangents(a, b));
  });
});

describe("externalTangents", () => {
  it("should return the first two tangents", () => {
    const a = circle(0, 0, 5);
    const b = circle(20, 0, 5);
    const all = computeTangents(a, b);

    expect(externalTangents(a, b)).toEqual([all[0], all[1]]);
  });

  it("should return null for nested circles", () => {
    expect(externalTangents(circle(0, 0, 10), circle(1, 0, 1))).toBeNull();
  });
});
