import { Circle } from "@/math/Circle";
import type { DemoOptions } from "@/types";

/**
 * Default options for the visibility demo
 */
export const DEFAULT_DEMO_OPTIONS: DemoOptions = {
  target: Circle.create(200, 200, 100),
  initialSourceRadius: 100,
  minSourceRadius: 10,
  maxSourceRadius: 200,
  radiusStep: 10,
  obstacleCount: 10,
  minObstacleRadius: 10,
  maxObstacleRadius: 100,
  hitMarkerRadius: 5,
  lineWidth: 2,
  palette: {
    target: 0xff0000,
    source: 0x00ff00,
    tangent: 0xffffff,
    corridor: 0xffffff,
    obstacle: 0x00ffff,
    obstacleInCorridor: 0xff00ff,
    hit: 0xffff00,
  },
};

/**
 * Merge overrides onto the defaults
 * @throws RangeError when the radius limits or step are inconsistent
 */
export function createDemoOptions(overrides: Partial<DemoOptions> = {}): DemoOptions {
  const opts = { ...DEFAULT_DEMO_OPTIONS, ...overrides };

  if (opts.radiusStep <= 0) {
    throw new RangeError(`radiusStep must be positive, got ${opts.radiusStep}`);
  }
  if (
    opts.minSourceRadius < 0 ||
    opts.initialSourceRadius < opts.minSourceRadius ||
    opts.initialSourceRadius > opts.maxSourceRadius
  ) {
    throw new RangeError(
      `Source radius ${opts.initialSourceRadius} outside [${opts.minSourceRadius}, ${opts.maxSourceRadius}]`
    );
  }

  return opts;
}
