import type { Vector2 } from "@/types";
import type Phaser from "phaser";

/** Mutable internal state for input tracking */
interface MutableInputState {
  pointer: { x: number; y: number };
  wheelSteps: number[];
}

/**
 * Manages input handling for the demo
 * Tracks pointer position, mouse wheel and key presses
 */
export class InputManager {
  private scene: Phaser.Scene;
  private internalState: MutableInputState;
  private keyCallbacks: Map<string, () => void> = new Map();

  constructor(scene: Phaser.Scene) {
    this.scene = scene;
    this.internalState = {
      pointer: { x: 0, y: 0 },
      wheelSteps: [],
    };

    this.setupInputListeners();
  }

  private setupInputListeners(): void {
    this.scene.input.on("pointermove", (pointer: Phaser.Input.Pointer) => {
      this.internalState.pointer.x = pointer.worldX;
      this.internalState.pointer.y = pointer.worldY;
    });

    this.scene.input.on(
      "wheel",
      (_pointer: Phaser.Input.Pointer, _over: unknown[], _deltaX: number, deltaY: number) => {
        if (deltaY !== 0) {
          this.internalState.wheelSteps.push(Math.sign(deltaY));
        }
      }
    );

    this.scene.input.keyboard?.on("keydown", (event: KeyboardEvent) => {
      const callback = this.keyCallbacks.get(event.code);
      if (callback) callback();
    });
  }

  /** Get current pointer world position */
  getPointerPosition(): Vector2 {
    return { ...this.internalState.pointer };
  }

  /**
   * One entry per wheel event since the last call, in arrival order
   * -1 when scrolling up, 1 when scrolling down
   */
  consumeWheelSteps(): number[] {
    const steps = this.internalState.wheelSteps;
    this.internalState.wheelSteps = [];
    return steps;
  }

  /** Register a callback for a specific key press */
  onKeyPress(keyCode: string, callback: () => void): void {
    this.keyCallbacks.set(keyCode, callback);
  }

  /** Clean up input listeners */
  destroy(): void {
    this.scene.input.off("pointermove");
    this.scene.input.off("wheel");
    this.scene.input.keyboard?.off("keydown");
    this.keyCallbacks.clear();
    this.internalState.wheelSteps = [];
  }
}
