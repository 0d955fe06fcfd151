import {
  buildCorridor,
  corridorFromTangents,
  corridorIntersectsCircle,
  isPointInPolygon,
  type Corridor,
} from "@/visibility/Corridor";
import { Segment } from "@/math/Segment";
import { circle, expectPointClose } from "@test/helpers/geometryHelpers";
import { describe, expect, it } from "vitest";

const RECTANGLE: Corridor = [
  { x: 0, y: 5 },
  { x: 0, y: -5 },
  { x: 20, y: -5 },
  { x: 20, y: 5 },
];

describe("corridorFromTangents", () => {
  it("should order vertices around the quadrilateral", () => {
    const corridor = corridorFromTangents(
      Segment.fromCoords(0, 5, 20, 5),
      Segment.fromCoords(0, -5, 20, -5)
    );

    expect(corridor).toEqual(RECTANGLE);
  });
});

describe("buildCorridor", () => {
  it("should span the external tangents of two circles", () => {
    const corridor = buildCorridor(circle(0, 0, 5), circle(20, 0, 5));

    expect(corridor).not.toBeNull();
    RECTANGLE.forEach((vertex, i) => expectPointClose(corridor?.[i], vertex));
  });

  it("should return null when one circle contains the other", () => {
    expect(buildCorridor(circle(0, 0, 50), circle(5, 5, 5))).toBeNull();
  });
});

describe("isPointInPolygon", () => {
  it("should detect interior points", () => {
    expect(isPointInPolygon({ x: 10, y: 0 }, RECTANGLE)).toBe(true);
  });

  it("should reject exterior points", () => {
    expect(isPointInPolygon({ x: 10, y: 10 }, RECTANGLE)).toBe(false);
    expect(isPointInPolygon({ x: -1, y: 0 }, RECTANGLE)).toBe(false);
    expect(isPointInPolygon({ x: 21, y: 0 }, RECTANGLE)).toBe(false);
  });

  it("should handle a concave polygon", () => {
    const notch = [
      { x: 0, y: 0 },
      { x: 10, y: 0 },
      { x: 10, y: 10 },
      { x: 5, y: 5 },
      { x: 0, y: 10 },
    ];

    expect(isPointInPolygon({ x: 5, y: 8 }, notch)).toBe(false);
    expect(isPointInPolygon({ x: 5, y: 2 }, notch)).toBe(true);
  });

  it("should reject everything for an empty polygon", () => {
    expect(isPointInPolygon({ x: 0, y: 0 }, [])).toBe(false);
  });
});

describe("corridorIntersectsCircle", () => {
  it("should include circles centered inside", () => {
    expect(corridorIntersectsCircle(RECTANGLE, circle(10, 0, 1))).toBe(true);
  });

  it("should include circles crossing an edge", () => {
    expect(corridorIntersectsCircle(RECTANGLE, circle(10, 7, 3))).toBe(true);
  });

  it("should include circles touching an edge", () => {
    expect(corridorIntersectsCircle(RECTANGLE, circle(25, 0, 5))).toBe(true);
  });

  it("should exclude circles clear of every edge", () => {
    expect(corridorIntersectsCircle(RECTANGLE, circle(10, 9, 3))).toBe(false);
    expect(corridorIntersectsCircle(RECTANGLE, circle(25, 0, 4))).toBe(false);
  });

  it("should include a circle enclosing the whole corridor", () => {
    expect(corridorIntersectsCircle(RECTANGLE, circle(10, 0, 100))).toBe(true);
  });
});
