import type { LineSegment, Vector2 } from "@/types";
import { Vec2 } from "./Vec2";

/**
 * Segment - Pure utility functions for line segment operations
 *
 * A segment doubles as a ray: p(t) = start + t * (end - start),
 * where t = 0 is the start and t = 1 the end.
 */
export const Segment = {
  /**
   * Create a segment from raw coordinates
   */
  fromCoords(x1: number, y1: number, x2: number, y2: number): LineSegment {
    return { start: { x: x1, y: y1 }, end: { x: x2, y: y2 } };
  },

  /**
   * Unnormalized direction (end - start)
   */
  delta(segment: LineSegment): Vector2 {
    return Vec2.subtract(segment.end, segment.start);
  },

  /**
   * Point at parameter t
   */
  pointAt(segment: LineSegment, t: number): Vector2 {
    return Vec2.offset(segment.start, Segment.delta(segment), t);
  },

  /**
   * True when the endpoints are no more than sqrt(toleranceSq) apart,
   * leaving no usable direction
   */
  isDegenerate(segment: LineSegment, toleranceSq = 0): boolean {
    return Vec2.distanceSquared(segment.start, segment.end) <= toleranceSq;
  },
};
