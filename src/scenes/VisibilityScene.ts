import { DEFAULT_GAME_OPTIONS } from "@/config/gameConfig";
import { createDemoOptions } from "@/config/demoConfig";
import { DebugView, InputManager, SourceController } from "@/core";
import { generateObstacles } from "@/obstacles/ObstacleField";
import type { Circle, DemoOptions, OcclusionExtent, VisibilityReport } from "@/types";
import { buildCorridor, corridorIntersectsCircle } from "@/visibility/Corridor";
import { VisibilityDebugLogger } from "@/visibility/VisibilityDebugLogger";
import { analyzeVisibility } from "@/visibility/VisibilityEngine";
import Phaser from "phaser";

/**
 * Interactive visibility demo
 *
 * The source circle follows the pointer and the mouse wheel resizes it. Each
 * frame draws the tangents between source and target, marks where each
 * tangent first meets an obstacle, and highlights obstacles lying in the
 * corridor spanned by the external tangents.
 */
export class VisibilityScene extends Phaser.Scene {
  private inputManager!: InputManager;
  private debugView!: DebugView;
  private sourceController!: SourceController;
  private graphics!: Phaser.GameObjects.Graphics;

  private readonly options: DemoOptions;
  private obstacles: Circle[] = [];

  // Occlusion extent used for the visible/blocked status; markers always use the full ray
  private statusExtent: OcclusionExtent = "segment";

  constructor(options: Partial<DemoOptions> = {}) {
    super({ key: "VisibilityScene" });
    this.options = createDemoOptions(options);
  }

  create(): void {
    this.inputManager = new InputManager(this);
    this.sourceController = new SourceController(this.options);
    this.graphics = this.add.graphics();

    this.debugView = new DebugView(this);
    this.debugView.create();

    this.regenerateObstacles();
    this.registerKeys();

    this.events.once(Phaser.Scenes.Events.SHUTDOWN, () => {
      this.inputManager.destroy();
      this.debugView.destroy();
    });
  }

  update(): void {
    this.sourceController.moveTo(this.inputManager.getPointerPosition());
    for (const step of this.inputManager.consumeWheelSteps()) {
      this.sourceController.onWheel(step);
    }

    const source = this.sourceController.getCircle();
    const { target } = this.options;

    // The markers reproduce the classic ray scan, which looks past the target
    const rays = analyzeVisibility(target, source, this.obstacles, { extent: "ray" });
    const status =
      this.statusExtent === "ray"
        ? rays
        : analyzeVisibility(target, source, this.obstacles, { extent: this.statusExtent });

    this.draw(source, rays);

    if (VisibilityDebugLogger.logFrame(source, target, this.obstacles)) {
      VisibilityDebugLogger.logReport(status);
    }

    this.debugView.setInfo("radius", source.radius);
    this.debugView.setInfo("extent", this.statusExtent);
    this.debugView.setInfo("visible", status.visible);
    this.debugView.update(this.obstacles.length);
  }

  private registerKeys(): void {
    this.inputManager.onKeyPress("Backquote", () => {
      this.debugView.toggle();
    });

    this.inputManager.onKeyPress("KeyL", () => {
      VisibilityDebugLogger.toggle();
    });

    this.inputManager.onKeyPress("KeyD", () => {
      VisibilityDebugLogger.dump();
    });

    this.inputManager.onKeyPress("KeyE", () => {
      VisibilityDebugLogger.exportToConsole();
    });

    this.inputManager.onKeyPress("KeyR", () => {
      this.regenerateObstacles();
      console.log(`Obstacles regenerated: ${this.obstacles.length}`);
    });

    this.inputManager.onKeyPress("KeyB", () => {
      this.statusExtent = this.statusExtent === "segment" ? "ray" : "segment";
      console.log(`Occlusion extent: ${this.statusExtent.toUpperCase()}`);
    });
  }

  private regenerateObstacles(): void {
    this.obstacles = generateObstacles({
      count: this.options.obstacleCount,
      bounds: { width: DEFAULT_GAME_OPTIONS.width, height: DEFAULT_GAME_OPTIONS.height },
      minRadius: this.options.minObstacleRadius,
      maxRadius: this.options.maxObstacleRadius,
    });
  }

  private draw(source: Circle, report: VisibilityReport): void {
    const { palette, lineWidth, hitMarkerRadius, target } = this.options;
    const g = this.graphics;
    g.clear();

    this.strokeCircle(target, palette.target);
    this.strokeCircle(source, palette.source);

    const corridor = buildCorridor(source, target);
    if (corridor) {
      g.lineStyle(lineWidth, palette.corridor, 1);
      g.strokePoints([...corridor], true);
    }

    for (const obstacle of this.obstacles) {
      const inCorridor = corridor !== null && corridorIntersectsCircle(corridor, obstacle);
      this.strokeCircle(obstacle, inCorridor ? palette.obstacleInCorridor : palette.obstacle);
    }

    g.lineStyle(lineWidth, palette.tangent, 1);
    for (const tangent of report.tangents) {
      g.lineBetween(tangent.start.x, tangent.start.y, tangent.end.x, tangent.end.y);
    }

    g.fillStyle(palette.hit, 1);
    for (const hit of report.hits) {
      if (hit) {
        g.fillCircle(hit.point.x, hit.point.y, hitMarkerRadius);
      }
    }
  }

  private strokeCircle(circle: Circle, color: number): void {
    this.graphics.lineStyle(this.options.lineWidth, color, 1);
    this.graphics.strokeCircle(circle.center.x, circle.center.y, circle.radius);
  }
}
