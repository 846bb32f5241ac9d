import type { AssetResolver, Material } from "../assets/MaterialManager.js";
import { DEFAULT_HIGHLIGHT_SCALE } from "../config/constants.js";
import { LogicalInputs } from "../input/LogicalInput.js";
import type { PointerInput } from "../input/PointerTracker.js";
import { menuLogError, menuLogWarn } from "../log/menuLog.js";
import type { MenuRenderer } from "../rendering/MenuRenderer.js";
import {
  type ButtonId,
  type ControllerId,
  type MenuSelection,
  ReservedId,
  TOUCH_CONTROLLER,
  UNDEFINED_CONTROLLER,
} from "./ButtonId.js";
import { MenuButton } from "./MenuButton.js";
import type { MenuDef, NavDirection, Vec2 } from "./MenuDef.js";
import { StaticImage } from "./StaticImage.js";
import { textureName } from "./textureName.js";

export interface FocusMenuOptions {
  /** Device has a touch screen: prefer touch texture variants. Read at setup time. */
  touchScreen: boolean;
  /** Size multiplier for the focused button. */
  highlightScale?: number;
}

/** Direction bits in the order handleControllerInput() checks them. */
const NAV_INPUTS: readonly (readonly [LogicalInputs, NavDirection])[] = [
  [LogicalInputs.Up, "navUp"],
  [LogicalInputs.Down, "navDown"],
  [LogicalInputs.Left, "navLeft"],
  [LogicalInputs.Right, "navRight"],
];

/**
 * Focus-driven menu: owns the buttons and static images of one menu
 * definition, tracks which button has focus, and queues selections from
 * touch and from controllers for the host to drain once per frame.
 *
 * Single-threaded and synchronous. Call order per frame:
 *   advanceFrame() → handleControllerInput()* → getRecentSelection() until empty.
 * Anything not drained before the next advanceFrame() is dropped.
 */
export class FocusMenu {
  private touchScreen: boolean;
  private readonly highlightScale: number;
  private buttons: MenuButton[] = [];
  private images: StaticImage[] = [];
  private currentFocus: ButtonId = ReservedId.Undefined;
  private selections: MenuSelection[] = [];

  constructor(options: FocusMenuOptions) {
    this.touchScreen = options.touchScreen;
    this.highlightScale = options.highlightScale ?? DEFAULT_HIGHLIGHT_SCALE;
  }

  /** Takes effect on the next setup() / loadAssets(). */
  setTouchScreen(touchScreen: boolean): void {
    this.touchScreen = touchScreen;
  }

  get buttonList(): readonly MenuButton[] {
    return this.buttons;
  }

  get imageList(): readonly StaticImage[] {
    return this.images;
  }

  /**
   * Rebuild every button and image from `def`. A null def clears the menu.
   * Assets that fail to resolve are logged and left null.
   */
  setup(def: MenuDef | null, assets: AssetResolver): void {
    this.clearRecentSelections();
    if (def === null) {
      this.buttons = [];
      this.images = [];
      this.currentFocus = ReservedId.Undefined;
      return;
    }
    if (!(def.canonicalWindowHeight > 0)) {
      menuLogError("setup", `canonicalWindowHeight must be > 0 (got ${def.canonicalWindowHeight})`);
    }
    this.currentFocus = def.startingSelection;

    this.buttons = def.buttons.map((buttonDef) => {
      const button = new MenuButton(buttonDef, def.canonicalWindowHeight, this.highlightScale);
      buttonDef.textureNormal.forEach((tex, i) => {
        button.setUpMaterial(i, assets.findMaterial(textureName(tex, this.touchScreen)));
      });
      if (buttonDef.texturePressed) {
        button.setDownMaterial(assets.findMaterial(textureName(buttonDef.texturePressed, this.touchScreen)));
      }
      const shaderName = buttonDef.shader ?? def.defaultShader;
      const shader = assets.findShader(shaderName);
      if (!shader) {
        menuLogWarn(`button ${buttonDef.id} has no shader ('${shaderName}' not found)`);
      }
      button.setShader(shader);
      button.setInactiveShader(assets.findShader(buttonDef.inactiveShader ?? def.defaultInactiveShader));
      button.setHighlighted(buttonDef.id === this.currentFocus);
      return button;
    });

    this.images = def.staticImages.map((imageDef) => {
      const materials = imageDef.texture.map((tex): Material | null => {
        const name = textureName(tex, this.touchScreen);
        const material = assets.findMaterial(name);
        if (!material) menuLogError("static image", `'${name}' not found`);
        return material;
      });
      const shaderName = imageDef.shader ?? def.defaultShader;
      const shader = assets.findShader(shaderName);
      if (!shader) menuLogError("static image", `missing shader '${shaderName}'`);
      return new StaticImage(imageDef, materials, shader, def.canonicalWindowHeight);
    });
  }

  /** Ask `assets` to load every shader and material `def` can reference. */
  loadAssets(def: MenuDef, assets: AssetResolver): void {
    assets.loadShader(def.defaultShader);
    assets.loadShader(def.defaultInactiveShader);
    for (const button of def.buttons) {
      for (const tex of button.textureNormal) {
        assets.loadMaterial(textureName(tex, this.touchScreen));
      }
      if (button.texturePressed) {
        assets.loadMaterial(textureName(button.texturePressed, this.touchScreen));
      }
      if (button.shader !== undefined) assets.loadShader(button.shader);
      if (button.inactiveShader !== undefined) assets.loadShader(button.inactiveShader);
    }
    for (const image of def.staticImages) {
      for (const tex of image.texture) {
        assets.loadMaterial(textureName(tex, this.touchScreen));
      }
      if (image.shader !== undefined) assets.loadShader(image.shader);
    }
  }

  /** Start a frame: drop undrained selections, then advance buttons and collect touch triggers. */
  advanceFrame(dt: number, input: PointerInput, windowSize: Vec2): void {
    this.clearRecentSelections();
    for (const button of this.buttons) {
      button.advanceFrame(dt, input, windowSize);
      button.setHighlighted(button.id === this.currentFocus);
      if (button.isTriggered()) {
        this.selections.push({
          id: button.isActive() ? button.id : ReservedId.InvalidInput,
          controller: TOUCH_CONTROLLER,
        });
      }
    }
  }

  /**
   * Apply a mask of LogicalInputs from one controller. Directions move focus
   * (in up, down, left, right order); select and cancel queue selections.
   * Does nothing when no button has the focused id.
   */
  handleControllerInput(logicalInput: number, controller: ControllerId): void {
    const focused = this.findButtonById(this.currentFocus);
    if (!focused) return;

    for (const [bit, direction] of NAV_INPUTS) {
      if (logicalInput & bit) this.updateFocus(focused.def[direction]);
    }
    if (logicalInput & LogicalInputs.Select) {
      // Active flag of the button focused on entry; id of the focus after any move.
      this.selections.push({
        id: focused.isActive() ? this.currentFocus : ReservedId.InvalidInput,
        controller,
      });
    }
    if (logicalInput & LogicalInputs.Cancel) {
      this.selections.push({ id: ReservedId.Cancel, controller });
    }
  }

  /** Draw images behind the buttons, the buttons, then images in front. */
  render(renderer: MenuRenderer): void {
    for (const image of this.images) {
      if (!image.renderAfterButtons) image.render(renderer);
    }
    for (const button of this.buttons) {
      button.render(renderer);
    }
    for (const image of this.images) {
      if (image.renderAfterButtons) image.render(renderer);
    }
  }

  getFocus(): ButtonId {
    return this.currentFocus;
  }

  /** Unchecked: the id does not have to name a visible (or any) button. */
  setFocus(id: ButtonId): void {
    this.currentFocus = id;
  }

  /** Pop the oldest queued selection, or { Undefined, UNDEFINED_CONTROLLER } when empty. */
  getRecentSelection(): MenuSelection {
    return this.selections.shift() ?? { id: ReservedId.Undefined, controller: UNDEFINED_CONTROLLER };
  }

  /** Selections waiting to be drained. */
  get pendingSelectionCount(): number {
    return this.selections.length;
  }

  findButtonById(id: ButtonId): MenuButton | null {
    return this.buttons.find((b) => b.id === id) ?? null;
  }

  findImageById(id: ButtonId): StaticImage | null {
    return this.images.find((img) => img.id === id) ?? null;
  }

  /** Move focus to the first visible candidate; queue an InvalidInput when there is none. */
  private updateFocus(destinations: readonly ButtonId[] | undefined): void {
    for (const id of destinations ?? []) {
      const destination = this.findButtonById(id);
      if (destination?.isVisible()) {
        this.setFocus(id);
        return;
      }
    }
    this.selections.push({ id: ReservedId.InvalidInput, controller: TOUCH_CONTROLLER });
  }

  private clearRecentSelections(): void {
    this.selections = [];
  }
}
