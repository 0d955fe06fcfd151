/**
 * TangentSolver - Bitangent lines between two circles.
 *
 * For unit normal n of a tangent line and signed distance from the line
 * to each center, the tangent condition reduces to n·v = c with
 *   v = (centerB - centerA) / d
 *   c = (rA - sign1 * rB) / d
 * so n is v rotated by ±acos(c): n = (v.x*c - sign2*h*v.y, v.y*c + sign2*h*v.x)
 * with h = sqrt(1 - c²).
 *
 * sign1 = +1 gives the external pair (both circles on the same side),
 * sign1 = -1 the internal pair (the line crosses between the centers).
 */

import type { Circle, LineSegment } from "@/types";
import { TANGENCY_EPSILON } from "./tolerance";

const SIGNS = [1, -1] as const;

/** Indices of the external tangents in the computeTangents result */
export const EXTERNAL_TANGENT_INDICES = [0, 1] as const;

/** Indices of the internal tangents in the computeTangents result */
export const INTERNAL_TANGENT_INDICES = [2, 3] as const;

/**
 * Compute the tangent segments between two circles.
 *
 * Each segment starts on circleA and ends on circleB, at exactly the
 * respective radius from its center (up to rounding). Segments come in
 * (sign1, sign2) order: (+,+), (+,-), (-,+), (-,-).
 *
 * Returns an empty array when one circle lies inside the other or the circles
 * are concentric. A family whose |c| exceeds 1 is skipped, so overlapping
 * circles get only their two external tangents.
 */
export function computeTangents(circleA: Circle, circleB: Circle): LineSegment[] {
  const { center: a, radius: rA } = circleA;
  const { center: b, radius: rB } = circleB;

  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const distSq = dx * dx + dy * dy;
  const radiusDiff = rA - rB;

  if (distSq <= radiusDiff * radiusDiff + TANGENCY_EPSILON) {
    return [];
  }

  const d = Math.sqrt(distSq);
  const vx = dx / d;
  const vy = dy / d;

  const tangents: LineSegment[] = [];

  for (const sign1 of SIGNS) {
    const c = (rA - sign1 * rB) / d;

    if (Math.abs(c) > 1 + TANGENCY_EPSILON) {
      continue;
    }
    const h = Math.sqrt(Math.max(0, 1 - c * c));

    for (const sign2 of SIGNS) {
      const nx = vx * c - sign2 * h * vy;
      const ny = vy * c + sign2 * h * vx;

      tangents.push({
        start: { x: a.x + rA * nx, y: a.y + rA * ny },
        end: { x: b.x + sign1 * rB * nx, y: b.y + sign1 * rB * ny },
      });
    }
  }

  return tangents;
}

/**
 * The external pair, or null when the circles have none (nested circles).
 */
export function externalTangents(
  circleA: Circle,
  circleB: Circle
): readonly [LineSegment, LineSegment] | null {
  const [first, second] = computeTangents(circleA, circleB);
  return first && second ? [first, second] : null;
}
