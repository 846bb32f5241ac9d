import type { MaterialManager } from "../assets/MaterialManager.js";
import type { MenuCVars } from "../console/menuCVars.js";
import type { ControllerMapper } from "../input/ControllerMapper.js";
import type { PointerTracker } from "../input/PointerTracker.js";
import type { Vec2 } from "../menu/MenuDef.js";
import type { MenuRenderer } from "../rendering/MenuRenderer.js";
import type { SceneManager } from "./SceneManager.js";

/**
 * Shared resources available to all scenes.
 * Constructed once by MenuApp and passed to SceneManager.
 */
export interface GameContext {
  readonly assets: MaterialManager;
  readonly pointer: PointerTracker;
  readonly controllers: ControllerMapper;
  readonly renderer: MenuRenderer;
  readonly cvars: MenuCVars;

  // Scene manager reference (so scenes can push/pop)
  readonly scenes: SceneManager;

  /** Window size in pixels, used for touch hit-testing. */
  readonly windowSize: Vec2;
}

/**
 * A game scene/state. Managed on a stack by SceneManager.
 * Each scene owns its update, render, and lifecycle.
 */
export interface GameScene {
  /** If true, the scene below also renders (for overlays like menus). */
  readonly transparent: boolean;

  /** Called when this scene is pushed onto the stack. */
  onEnter(ctx: GameContext): void;

  /** Called when this scene is popped from the stack. */
  onExit(ctx: GameContext): void;

  /** Called when this scene becomes the top again (scene above was popped). */
  onResume(ctx: GameContext): void;

  /** Called when another scene is pushed on top of this one. */
  onPause(ctx: GameContext): void;

  /** Fixed-timestep update. Only the top scene's update() is called. */
  update(dt: number, ctx: GameContext): void;

  /** Render frame. Called bottom-up through transparent scene chain. */
  render(alpha: number, ctx: GameContext): void;
}
