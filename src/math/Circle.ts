import { GEOMETRY_ERROR_CODES, InvalidGeometryError } from "@/visibility/errors";
import type { Circle as CircleShape, Vector2 } from "@/types";
import { Vec2 } from "./Vec2";

export type Circle = CircleShape;

/**
 * Circle - Pure utility functions for circles
 *
 * Radius 0 is a valid circle and represents a point location.
 */
export const Circle = {
  /**
   * Create a validated circle
   * @throws InvalidGeometryError for a negative radius or non-finite input
   */
  create(x: number, y: number, radius: number): CircleShape {
    if (!Number.isFinite(x) || !Number.isFinite(y) || !Number.isFinite(radius)) {
      throw new InvalidGeometryError(
        GEOMETRY_ERROR_CODES.NON_FINITE,
        `Circle requires finite values, got (${x}, ${y}, r=${radius})`,
        { x, y, radius }
      );
    }
    if (radius < 0) {
      throw new InvalidGeometryError(
        GEOMETRY_ERROR_CODES.NEGATIVE_RADIUS,
        `Circle radius must be >= 0, got ${radius}`,
        { radius }
      );
    }
    return { center: { x, y }, radius };
  },

  /**
   * Point strictly inside the circle (boundary excluded)
   */
  containsPoint(circle: CircleShape, point: Vector2): boolean {
    return Vec2.distanceSquared(circle.center, point) < circle.radius * circle.radius;
  },
};
