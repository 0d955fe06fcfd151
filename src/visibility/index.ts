/**
 * Visibility
 *
 * Tangent-based line of sight between circles:
 * - RayCircleIntersector: line/ray/segment vs circle
 * - TangentSolver: bitangents between two circles
 * - OcclusionQuery: first obstacle along a ray
 * - VisibilityEngine: source → target visibility through the tangents
 */

export {
  SEGMENT_BOUNDS,
  RAY_BOUNDS,
  LINE_BOUNDS,
  isWithinBounds,
  intersectCircle,
} from "./RayCircleIntersector";
export {
  computeTangents,
  externalTangents,
  EXTERNAL_TANGENT_INDICES,
  INTERNAL_TANGENT_INDICES,
} from "./TangentSolver";
export { findFirstHit, isBlocked, type OcclusionOptions } from "./OcclusionQuery";
export { isVisible, analyzeVisibility, type VisibilityOptions } from "./VisibilityEngine";
export {
  buildCorridor,
  corridorFromTangents,
  corridorIntersectsCircle,
  isPointInPolygon,
  type Corridor,
} from "./Corridor";
export { InvalidGeometryError, GEOMETRY_ERROR_CODES, type GeometryErrorCode } from "./errors";
export { TANGENCY_EPSILON } from "./tolerance";
