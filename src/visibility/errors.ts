/**
 * Geometry errors.
 *
 * Thrown for malformed input only; "nothing found" outcomes are empty
 * arrays or null, never errors.
 */

export const GEOMETRY_ERROR_CODES = {
  /** Segment endpoints coincide, so it has no direction */
  DEGENERATE_SEGMENT: "DEGENERATE_SEGMENT",
  /** Circle radius below zero */
  NEGATIVE_RADIUS: "NEGATIVE_RADIUS",
  /** NaN or infinite coordinate or radius */
  NON_FINITE: "NON_FINITE",
} as const;

export type GeometryErrorCode = (typeof GEOMETRY_ERROR_CODES)[keyof typeof GEOMETRY_ERROR_CODES];

export class InvalidGeometryError extends Error {
  override readonly name = "InvalidGeometryError";

  constructor(
    readonly code: GeometryErrorCode,
    message: string,
    readonly details?: unknown
  ) {
    super(`[${code}] ${message}`);
  }
}
