import type { GameContext, GameScene } from "../core/GameScene.js";
import type { MenuSelection } from "../menu/ButtonId.js";
import { FocusMenu } from "../menu/FocusMenu.js";
import type { MenuDef } from "../menu/MenuDef.js";

/** Receives every drained selection, oldest first. May push/pop scenes. */
export type SelectionHandler = (selection: MenuSelection, gc: GameContext) => void;

/**
 * One menu screen. Transparent, so whatever is below keeps drawing behind it.
 *
 * Each update: advance the menu (touch), feed this frame's controller masks,
 * then drain the selection queue into the handler.
 */
export class MenuScene implements GameScene {
  readonly transparent = true;
  private readonly def: MenuDef;
  private readonly onSelect: SelectionHandler;
  private menu: FocusMenu | null = null;
  private exited = false;

  constructor(def: MenuDef, onSelect: SelectionHandler) {
    this.def = def;
    this.onSelect = onSelect;
  }

  /** The live menu while the scene is on the stack. */
  get focusMenu(): FocusMenu | null {
    return this.menu;
  }

  onEnter(gc: GameContext): void {
    const menu = new FocusMenu({
      touchScreen: gc.cvars.ui_touchscreen.get(),
      highlightScale: gc.cvars.ui_highlight_scale.get(),
    });
    menu.loadAssets(this.def, gc.assets);
    menu.setup(this.def, gc.assets);
    this.menu = menu;
    this.exited = false;
  }

  onExit(gc: GameContext): void {
    this.exited = true;
    this.menu?.setup(null, gc.assets);
    this.menu = null;
  }

  onResume(_gc: GameContext): void {}
  onPause(_gc: GameContext): void {}

  update(dt: number, gc: GameContext): void {
    const menu = this.menu;
    if (!menu) return;
    menu.advanceFrame(dt, gc.pointer, gc.windowSize);
    for (const { controller, input } of gc.controllers.poll()) {
      menu.handleControllerInput(input, controller);
    }
    // The handler may close this scene; stop draining once it has.
    while (menu.pendingSelectionCount > 0) {
      this.onSelect(menu.getRecentSelection(), gc);
      if (this.exited) break;
    }
  }

  render(_alpha: number, gc: GameContext): void {
    this.menu?.render(gc.renderer);
  }
}
