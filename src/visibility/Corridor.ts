/**
 * Corridor - Quadrilateral swept between two circles by their external tangents.
 *
 * Vertices, in order: first tangent on A, second tangent on A, second tangent
 * on B, first tangent on B. Used by the demo to highlight obstacles lying
 * between source and target.
 */

import { Vec2 } from "@/math/Vec2";
import type { Circle, LineSegment, Vector2 } from "@/types";
import { externalTangents } from "./TangentSolver";

export type Corridor = readonly [Vector2, Vector2, Vector2, Vector2];

/**
 * Build the corridor from a pair of tangents.
 */
export function corridorFromTangents(first: LineSegment, second: LineSegment): Corridor {
  return [first.start, second.start, second.end, first.end];
}

/**
 * Corridor between two circles, or null when one contains the other.
 */
export function buildCorridor(circleA: Circle, circleB: Circle): Corridor | null {
  const pair = externalTangents(circleA, circleB);
  return pair ? corridorFromTangents(pair[0], pair[1]) : null;
}

/**
 * Check if a point is inside a polygon using ray casting algorithm.
 */
export function isPointInPolygon(point: Vector2, polygon: readonly Vector2[]): boolean {
  let inside = false;
  let previous = polygon[polygon.length - 1];

  for (const current of polygon) {
    if (previous) {
      const crosses =
        current.y > point.y !== previous.y > point.y &&
        point.x <
          ((previous.x - current.x) * (point.y - current.y)) / (previous.y - current.y) + current.x;

      if (crosses) {
        inside = !inside;
      }
    }
    previous = current;
  }

  return inside;
}

/**
 * True when the circle touches or lies inside the corridor.
 */
export function corridorIntersectsCircle(corridor: Corridor, circle: Circle): boolean {
  if (isPointInPolygon(circle.center, corridor)) {
    return true;
  }

  return corridor.some((vertex, i) => {
    const next = corridor[(i + 1) % corridor.length] ?? vertex;
    return Vec2.pointToSegmentDistance(circle.center, vertex, next) <= circle.radius;
  });
}
