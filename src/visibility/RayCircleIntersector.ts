/**
 * RayCircleIntersector - Where a line, ray or segment crosses a circle.
 *
 * The same routine serves finite segments and semi-infinite rays: the
 * RayBounds flags decide which part of p(t) = start + t * (end - start)
 * counts.
 *
 * Solves |P + t*D - C|^2 = R^2 with P = start, D = end - start:
 *   a = D·D
 *   b = 2 * D·(P - C)
 *   c = |P - C|^2 - R^2
 */

import { Segment } from "@/math/Segment";
import type { Circle, CircleIntersection, LineSegment, RayBounds } from "@/types";
import { GEOMETRY_ERROR_CODES, InvalidGeometryError } from "./errors";

/** t in [0, 1] */
export const SEGMENT_BOUNDS: RayBounds = { lowerBounded: true, upperBounded: true };

/** t in [0, ∞) */
export const RAY_BOUNDS: RayBounds = { lowerBounded: true, upperBounded: false };

/** t unrestricted */
export const LINE_BOUNDS: RayBounds = { lowerBounded: false, upperBounded: false };

/**
 * Check t against the active bounds.
 */
export function isWithinBounds(t: number, bounds: RayBounds): boolean {
  return (!bounds.lowerBounded || t >= 0) && (!bounds.upperBounded || t <= 1);
}

/**
 * Find where a segment's supporting line crosses a circle.
 *
 * Returns 0, 1 or 2 intersections, each with its parameter t. When the line
 * crosses the circle twice, the smaller root is listed first; callers should
 * not depend on that order.
 *
 * @throws InvalidGeometryError when the segment has zero length
 */
export function intersectCircle(
  circle: Circle,
  segment: LineSegment,
  bounds: RayBounds = SEGMENT_BOUNDS
): CircleIntersection[] {
  const { start } = segment;
  const { center, radius } = circle;

  const { x: dx, y: dy } = Segment.delta(segment);

  const fx = start.x - center.x;
  const fy = start.y - center.y;

  const a = dx * dx + dy * dy;
  const b = 2 * (dx * fx + dy * fy);
  const c = fx * fx + fy * fy - radius * radius;

  if (a === 0) {
    throw new InvalidGeometryError(
      GEOMETRY_ERROR_CODES.DEGENERATE_SEGMENT,
      `Cannot intersect a zero-length segment at (${start.x}, ${start.y})`,
      { segment }
    );
  }

  const discriminant = b * b - 4 * a * c;

  if (discriminant < 0) {
    return [];
  }

  const pointAt = (t: number): CircleIntersection => ({
    t,
    point: Segment.pointAt(segment, t),
  });

  if (discriminant === 0) {
    // Tangent: one touching point
    const t = -b / (2 * a);
    return isWithinBounds(t, bounds) ? [pointAt(t)] : [];
  }

  const sqrtDisc = Math.sqrt(discriminant);
  const results: CircleIntersection[] = [];

  for (const sign of [-1, 1]) {
    const t = (-b + sign * sqrtDisc) / (2 * a);
    if (isWithinBounds(t, bounds)) {
      results.push(pointAt(t));
    }
  }

  return results;
}
