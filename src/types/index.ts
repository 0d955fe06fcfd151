/**
 * Core type definitions for tangent-sight
 */

// =============================================================================
// MATH TYPES
// =============================================================================

/** 2D Vector representation (immutable) */
export interface Vector2 {
  readonly x: number;
  readonly y: number;
}

/** Line segment defined by two endpoints; also used as a ray (start → end and beyond) */
export interface LineSegment {
  readonly start: Vector2;
  readonly end: Vector2;
}

/** Circle with center and radius (radius 0 is a point location) */
export interface Circle {
  readonly center: Vector2;
  readonly radius: number;
}

// =============================================================================
// INTERSECTION TYPES
// =============================================================================

/**
 * Restricts the line parameter t of p(t) = start + t * (end - start).
 *
 * - lowerBounded: only t >= 0
 * - upperBounded: only t <= 1
 */
export interface RayBounds {
  readonly lowerBounded: boolean;
  readonly upperBounded: boolean;
}

/** A point where a line crosses a circle, with its solving parameter */
export interface CircleIntersection {
  readonly point: Vector2;
  readonly t: number;
}

/** Nearest obstruction along a ray */
export interface Hit {
  readonly point: Vector2;
  /** Parameter along the ray (0 = start, 1 = end) */
  readonly t: number;
  readonly obstacle: Circle;
  /** Index of the obstacle in the list that was queried */
  readonly obstacleIndex: number;
}

/**
 * How competing hits along one ray are ranked.
 * - "parametric": smallest t wins (nearest along the ray)
 * - "x-distance": smallest |point.x - ray.start.x| wins (legacy, wrong for steep rays)
 */
export type HitRanking = "parametric" | "x-distance";

/**
 * How far an occlusion test along a tangent looks.
 * - "segment": from the source tangent point up to the target tangent point
 * - "ray": from the source tangent point indefinitely (legacy)
 */
export type OcclusionExtent = "segment" | "ray";

/** Result of evaluating every tangent between a source and a target */
export interface VisibilityReport {
  readonly visible: boolean;
  readonly tangents: readonly LineSegment[];
  /** One entry per tangent, null where the tangent is clear */
  readonly hits: readonly (Hit | null)[];
}

// =============================================================================
// DEMO TYPES
// =============================================================================

/** Axis-aligned area obstacles are placed in */
export interface Bounds {
  readonly width: number;
  readonly height: number;
}

/** Options for the Phaser game instance */
export interface GameOptions {
  readonly width: number;
  readonly height: number;
  readonly backgroundColor: number;
}

/** Colors used by the demo scene */
export interface DemoPalette {
  readonly target: number;
  readonly source: number;
  readonly tangent: number;
  readonly corridor: number;
  readonly obstacle: number;
  readonly obstacleInCorridor: number;
  readonly hit: number;
}

/** Options for the interactive visibility demo */
export interface DemoOptions {
  readonly target: Circle;
  readonly initialSourceRadius: number;
  readonly minSourceRadius: number;
  readonly maxSourceRadius: number;
  readonly radiusStep: number;
  readonly obstacleCount: number;
  readonly minObstacleRadius: number;
  readonly maxObstacleRadius: number;
  readonly hitMarkerRadius: number;
  readonly lineWidth: number;
  readonly palette: DemoPalette;
}

/** Debug information displayed in overlay */
export interface DebugInfo {
  readonly fps: number;
  readonly obstacles: number;
  readonly [key: string]: string | number | boolean;
}
