/**
 * VisibilityEngine - Is a target circle visible from a source circle?
 *
 * The target is visible when none of the bitangents between source and
 * target is crossed by an obstacle. Point locations are circles of radius 0.
 */

import { Segment } from "@/math/Segment";
import type { Circle, HitRanking, LineSegment, OcclusionExtent, VisibilityReport } from "@/types";
import { findFirstHit, isBlocked, type OcclusionOptions } from "./OcclusionQuery";
import { computeTangents } from "./TangentSolver";
import { TANGENCY_EPSILON } from "./tolerance";

/**
 * Options for visibility queries.
 */
export interface VisibilityOptions {
  /**
   * How far each tangent is checked (default: "segment").
   * "ray" also counts obstacles beyond the target.
   */
  readonly extent?: OcclusionExtent;
  /** Hit ranking passed to the occlusion query (default: "parametric") */
  readonly ranking?: HitRanking;
}

function toOcclusionOptions(options: VisibilityOptions): OcclusionOptions {
  const { extent = "segment", ranking = "parametric" } = options;
  return extent === "segment" ? { ranking, maxT: 1 } : { ranking };
}

/**
 * True for the contact tangent of externally touching circles, which
 * collapses to (almost) a single point.
 */
function isContactTangent(tangent: LineSegment): boolean {
  return Segment.isDegenerate(tangent, TANGENCY_EPSILON);
}

/**
 * Rays to test between source and target.
 *
 * Two points share one line, so point-to-point needs a single ray rather
 * than four identical tangents. Circles touching externally produce an
 * internal tangent of (near) zero length at the contact point; it has no
 * direction to scan and is skipped.
 */
function sightLines(source: Circle, target: Circle): LineSegment[] {
  const tangents = computeTangents(source, target).filter((t) => !isContactTangent(t));
  return source.radius === 0 && target.radius === 0 ? tangents.slice(0, 1) : tangents;
}

/**
 * Check whether the target is visible from the source.
 *
 * Nested or coincident circles have no tangents; they overlap, so the target
 * counts as visible.
 */
export function isVisible(
  target: Circle,
  source: Circle,
  obstacles: readonly Circle[],
  options: VisibilityOptions = {}
): boolean {
  const occlusion = toOcclusionOptions(options);
  return sightLines(source, target).every((line) => !isBlocked(line, obstacles, occlusion));
}

/**
 * Evaluate every tangent between source and target without stopping at the
 * first blocked one.
 *
 * Unlike isVisible, point-to-point queries still report all four (identical)
 * tangents so callers can index them uniformly.
 */
export function analyzeVisibility(
  target: Circle,
  source: Circle,
  obstacles: readonly Circle[],
  options: VisibilityOptions = {}
): VisibilityReport {
  const occlusion = toOcclusionOptions(options);
  const tangents = computeTangents(source, target);
  const hits = tangents.map((tangent) =>
    isContactTangent(tangent) ? null : findFirstHit(tangent, obstacles, occlusion)
  );

  return {
    visible: hits.every((hit) => hit === null),
    tangents,
    hits,
  };
}
