/**
 * OcclusionQuery - First obstacle hit along a ray.
 *
 * The ray starts at `ray.start` and points through `ray.end`. By default it
 * is semi-infinite; `maxT` turns it into a bounded segment (maxT = 1 stops
 * at `ray.end`).
 */

import { Circle } from "@/math/Circle";
import type { Hit, HitRanking, LineSegment } from "@/types";
import { RAY_BOUNDS, intersectCircle } from "./RayCircleIntersector";

/**
 * Options for findFirstHit.
 */
export interface OcclusionOptions {
  /** How competing hits are ranked (default: "parametric") */
  readonly ranking?: HitRanking;
  /**
   * Largest t still counted as an obstruction (default: Infinity).
   * When finite, an obstacle strictly containing the ray start blocks at t = 0.
   */
  readonly maxT?: number;
}

/**
 * Ranking key of a candidate hit; smaller is nearer.
 */
function rankKey(ray: LineSegment, t: number, x: number, ranking: HitRanking): number {
  switch (ranking) {
    case "parametric":
      return t;
    case "x-distance":
      return Math.abs(x - ray.start.x);
  }
}

/**
 * Find the nearest obstacle crossing along a ray.
 *
 * @param ray The ray to cast (start, end)
 * @param obstacles Obstacle circles, read but never modified
 * @param options Ranking and extent
 * @returns The nearest hit with the obstacle that produced it, or null if the ray is clear
 * @throws InvalidGeometryError when the ray has zero length
 */
export function findFirstHit(
  ray: LineSegment,
  obstacles: readonly Circle[],
  options: OcclusionOptions = {}
): Hit | null {
  const { ranking = "parametric", maxT = Number.POSITIVE_INFINITY } = options;
  const bounded = Number.isFinite(maxT);

  let closest: Hit | null = null;
  let closestKey = Number.POSITIVE_INFINITY;

  for (const [obstacleIndex, obstacle] of obstacles.entries()) {
    // A bounded ray starting inside an obstacle may end before reaching its boundary
    const swallowed = bounded && Circle.containsPoint(obstacle, ray.start);
    const candidates = swallowed
      ? [{ point: ray.start, t: 0 }]
      : intersectCircle(obstacle, ray, RAY_BOUNDS).filter((hit) => hit.t <= maxT);

    for (const { point, t } of candidates) {
      const key = rankKey(ray, t, point.x, ranking);
      if (key < closestKey) {
        closestKey = key;
        closest = { point, t, obstacle, obstacleIndex };
      }
    }
  }

  return closest;
}

/**
 * True when any obstacle crosses the ray.
 */
export function isBlocked(
  ray: LineSegment,
  obstacles: readonly Circle[],
  options: OcclusionOptions = {}
): boolean {
  return findFirstHit(ray, obstacles, options) !== null;
}
