import type { Vector2 } from "@/types";

/**
 * Vec2 - Pure utility functions for 2D vector operations
 * All functions are immutable and return new vectors
 */
export const Vec2 = {
  /**
   * Subtract vector b from vector a
   */
  subtract(a: Vector2, b: Vector2): Vector2 {
    return { x: a.x - b.x, y: a.y - b.y };
  },

  /**
   * Point reached by moving from `origin` along `direction` scaled by `amount`
   */
  offset(origin: Vector2, direction: Vector2, amount: number): Vector2 {
    return { x: origin.x + direction.x * amount, y: origin.y + direction.y * amount };
  },

  dot(a: Vector2, b: Vector2): number {
    return a.x * b.x + a.y * b.y;
  },

  /**
   * Calculate squared length of a vector (faster than length, useful for comparisons)
   */
  lengthSquared(v: Vector2): number {
    return v.x * v.x + v.y * v.y;
  },

  /**
   * Squared distance between two points
   */
  distanceSquared(a: Vector2, b: Vector2): number {
    return Vec2.lengthSquared(Vec2.subtract(b, a));
  },

  distance(a: Vector2, b: Vector2): number {
    return Math.sqrt(Vec2.distanceSquared(a, b));
  },

  /**
   * Calculate the shortest distance from a point to a line segment
   * Degenerate segments (start === end) measure to the single point.
   */
  pointToSegmentDistance(point: Vector2, segmentStart: Vector2, segmentEnd: Vector2): number {
    const v = Vec2.subtract(segmentEnd, segmentStart);
    const w = Vec2.subtract(point, segmentStart);

    const c1 = Vec2.dot(w, v);
    if (c1 <= 0) {
      return Vec2.distance(point, segmentStart);
    }

    const c2 = Vec2.dot(v, v);
    if (c2 <= c1) {
      return Vec2.distance(point, segmentEnd);
    }

    // Projection falls inside the segment
    return Vec2.distance(point, Vec2.offset(segmentStart, v, c1 / c2));
  },
};
