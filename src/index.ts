/**
 * tangent-sight
 *
 * Line of sight between circles in the presence of circular obstacles.
 */

export * from "./visibility";
export { Vec2 } from "./math/Vec2";
export { Segment } from "./math/Segment";
export { Circle } from "./math/Circle";
export {
  generateObstacles,
  randomInt,
  seededRandom,
  type ObstacleFieldOptions,
  type RandomSource,
} from "./obstacles/ObstacleField";
export type {
  Vector2,
  LineSegment,
  RayBounds,
  CircleIntersection,
  Hit,
  HitRanking,
  OcclusionExtent,
  VisibilityReport,
  Bounds,
} from "./types";
