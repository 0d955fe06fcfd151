import Phaser from "phaser";
import { createGameConfig } from "@/config/gameConfig";
import { VisibilityScene } from "@/scenes";

/**
 * Main entry point for the visibility demo
 */
function startDemo(): void {
  const config = createGameConfig([new VisibilityScene()]);
  new Phaser.Game(config);
  console.log("Move the pointer to place the source, scroll to resize it. ` toggles debug info.");
}

try {
  startDemo();
} catch (error) {
  console.error(error);
}
