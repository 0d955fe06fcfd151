import { Circle } from "@/math/Circle";
import type { DemoOptions, Vector2 } from "@/types";

type RadiusLimits = Pick<
  DemoOptions,
  "initialSourceRadius" | "minSourceRadius" | "maxSourceRadius" | "radiusStep"
>;

/**
 * Tracks the pointer-driven source circle
 *
 * Scrolling up grows the radius one step while it is below the maximum;
 * scrolling down shrinks it while it is above the minimum. A step may
 * overshoot a limit that is not a multiple of it.
 */
export class SourceController {
  private position: Vector2 = { x: 0, y: 0 };
  private radius: number;
  private readonly limits: RadiusLimits;

  constructor(limits: RadiusLimits) {
    this.limits = limits;
    this.radius = limits.initialSourceRadius;
  }

  /** Follow the pointer */
  moveTo(position: Vector2): void {
    this.position = { x: position.x, y: position.y };
  }

  /**
   * Apply a single wheel event
   * @param deltaY - Negative when scrolling up
   */
  onWheel(deltaY: number): void {
    const { minSourceRadius, maxSourceRadius, radiusStep } = this.limits;

    if (deltaY < 0 && this.radius < maxSourceRadius) {
      this.radius += radiusStep;
    } else if (deltaY > 0 && this.radius > minSourceRadius) {
      this.radius -= radiusStep;
    }
  }

  getRadius(): number {
    return this.radius;
  }

  getCircle(): Circle {
    return Circle.create(this.position.x, this.position.y, this.radius);
  }
}
