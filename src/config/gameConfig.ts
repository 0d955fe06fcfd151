import type { GameOptions } from "@/types";
import Phaser from "phaser";

/**
 * Default game options
 */
export const DEFAULT_GAME_OPTIONS: GameOptions = {
  width: 800,
  height: 600,
  backgroundColor: 0x1e1e1e,
};

/**
 * Creates the Phaser game configuration
 * Canvas rendering is enough for outline drawing and avoids WebGL context setup.
 */
export function createGameConfig(
  scenes: Phaser.Types.Scenes.SceneType[],
  options: Partial<GameOptions> = {}
): Phaser.Types.Core.GameConfig {
  const opts = { ...DEFAULT_GAME_OPTIONS, ...options };

  return {
    type: Phaser.CANVAS,
    width: opts.width,
    height: opts.height,
    backgroundColor: opts.backgroundColor,
    parent: "game-container",
    scene: scenes,
    scale: {
      mode: Phaser.Scale.FIT,
      autoCenter: Phaser.Scale.CENTER_BOTH,
    },
    render: {
      antialias: true,
      pixelArt: false,
      roundPixels: false,
    },
  };
}
