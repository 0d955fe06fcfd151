/**
 * ObstacleField - Random placement of obstacle circles.
 *
 * Centers are uniform integers over the bounds (inclusive) and radii uniform
 * integers over [minRadius, maxRadius]. Obstacles may overlap each other.
 */

import { Circle } from "@/math/Circle";
import type { Bounds } from "@/types";

/** Source of uniform values in [0, 1) */
export type RandomSource = () => number;

export interface ObstacleFieldOptions {
  readonly count: number;
  readonly bounds: Bounds;
  readonly minRadius: number;
  readonly maxRadius: number;
}

/**
 * Uniform integer in [min, max].
 */
export function randomInt(min: number, max: number, random: RandomSource = Math.random): number {
  return min + Math.floor(random() * (max - min + 1));
}

/**
 * Generate `count` obstacle circles.
 *
 * @throws RangeError when the count is negative or the radius range is empty
 */
export function generateObstacles(
  options: ObstacleFieldOptions,
  random: RandomSource = Math.random
): Circle[] {
  const { count, bounds, minRadius, maxRadius } = options;

  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`Obstacle count must be a non-negative integer, got ${count}`);
  }
  if (minRadius < 0 || minRadius > maxRadius) {
    throw new RangeError(`Invalid obstacle radius range [${minRadius}, ${maxRadius}]`);
  }

  return Array.from({ length: count }, () => {
    const x = randomInt(0, bounds.width, random);
    const y = randomInt(0, bounds.height, random);
    const r = randomInt(minRadius, maxRadius, random);
    return Circle.create(x, y, r);
  });
}

/**
 * Deterministic RandomSource (mulberry32), for reproducible fields.
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let z = state;
    z = Math.imul(z ^ (z >>> 15), z | 1);
    z ^= z + Math.imul(z ^ (z >>> 7), z | 61);
    return ((z ^ (z >>> 14)) >>> 0) / 4294967296;
  };
}
