import { type AssetManifest, MaterialManager } from "../assets/MaterialManager.js";
import { CVarRegistry } from "../console/CVarRegistry.js";
import { type MenuCVars, registerMenuCVars } from "../console/menuCVars.js";
import type { ControllerMapConfig } from "../input/ControllerMap.js";
import { ControllerMapper } from "../input/ControllerMapper.js";
import { PointerTracker } from "../input/PointerTracker.js";
import { menuLog } from "../log/menuLog.js";
import type { Vec2 } from "../menu/MenuDef.js";
import { DrawList } from "../rendering/DrawList.js";
import { GameLoop } from "./GameLoop.js";
import type { GameContext } from "./GameScene.js";
import { SceneManager } from "./SceneManager.js";

export interface MenuAppOptions {
  manifest: AssetManifest;
  windowSize: Vec2;
  controllerMap?: ControllerMapConfig;
  /** CVar overrides by name, e.g. { ui_touchscreen: "1" }. */
  cvarOverrides?: Record<string, string>;
}

/**
 * Wires the menu runtime together: config, assets, input, draw list, scene
 * stack and the fixed-timestep loop. The host forwards pointer and key
 * events, pushes scenes, and consumes `drawList` after each render.
 */
export class MenuApp {
  readonly cvarRegistry = new CVarRegistry();
  readonly cvars: MenuCVars;
  readonly assets: MaterialManager;
  readonly pointer = new PointerTracker();
  readonly controllers: ControllerMapper;
  readonly drawList: DrawList;
  readonly scenes = new SceneManager();
  readonly loop: GameLoop;
  private readonly context: GameContext;

  constructor(options: MenuAppOptions) {
    this.cvars = registerMenuCVars(this.cvarRegistry);
    if (options.cvarOverrides) {
      for (const name of this.cvarRegistry.applyAll(options.cvarOverrides)) {
        menuLog(`ignoring unknown cvar '${name}'`);
      }
    }
    this.assets = new MaterialManager(options.manifest);
    this.controllers = new ControllerMapper(options.controllerMap);
    this.drawList = new DrawList(options.windowSize);
    this.context = {
      assets: this.assets,
      pointer: this.pointer,
      controllers: this.controllers,
      renderer: this.drawList,
      cvars: this.cvars,
      scenes: this.scenes,
      windowSize: this.drawList.windowSize,
    };
    this.scenes.setContext(this.context);
    this.loop = new GameLoop({
      update: (dt) => this.update(dt),
      render: (alpha) => this.render(alpha),
    });
  }

  get ctx(): GameContext {
    return this.context;
  }

  /** One fixed tick: update the top scene, then consume this frame's input edges. */
  update(dt: number): void {
    this.scenes.update(dt);
    this.pointer.endFrame();
    this.controllers.endFrame();
  }

  render(alpha: number): void {
    this.drawList.clear();
    this.scenes.render(alpha);
  }

  resize(width: number, height: number): void {
    this.drawList.resize(width, height);
  }

  start(): void {
    this.loop.start();
  }

  stop(): void {
    this.loop.stop();
  }
}
