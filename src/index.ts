export { loadJSON } from "./assets/AssetLoader.js";
export {
  type AssetManifest,
  type AssetResolver,
  type Material,
  MaterialManager,
  parseAssetManifest,
  readAssetManifest,
  type Shader,
} from "./assets/MaterialManager.js";
export { CVar, type CVarCategory, type CVarDesc, type CVarHandle, type CVarValue } from "./console/CVar.js";
export { CVarRegistry } from "./console/CVarRegistry.js";
export { type MenuCVars, registerMenuCVars } from "./console/menuCVars.js";
export { GameLoop, type GameLoopCallbacks } from "./core/GameLoop.js";
export type { GameContext, GameScene } from "./core/GameScene.js";
export { MenuApp, type MenuAppOptions } from "./core/MenuApp.js";
export { SceneManager } from "./core/SceneManager.js";
export { type ControllerBinding, type ControllerMapConfig, DEFAULT_CONTROLLER_MAP } from "./input/ControllerMap.js";
export { type ControllerInput, ControllerMapper } from "./input/ControllerMapper.js";
export { LogicalInputs } from "./input/LogicalInput.js";
export { type PointerInput, type PointerState, PointerTracker } from "./input/PointerTracker.js";
export { closeMenuLog, initMenuLog, menuLog, menuLogError, menuLogWarn } from "./log/menuLog.js";
export {
  type ButtonId,
  type ControllerId,
  isRealButtonId,
  type MenuSelection,
  ReservedId,
  TOUCH_CONTROLLER,
  UNDEFINED_CONTROLLER,
} from "./menu/ButtonId.js";
export { FocusMenu, type FocusMenuOptions } from "./menu/FocusMenu.js";
export { MenuButton } from "./menu/MenuButton.js";
export {
  type ButtonDef,
  type ButtonTexture,
  type MenuDef,
  type NavDirection,
  parseMenuDef,
  readMenuDef,
  type StaticImageDef,
  type Vec2,
} from "./menu/MenuDef.js";
export { StaticImage } from "./menu/StaticImage.js";
export { textureName } from "./menu/textureName.js";
export { DrawList } from "./rendering/DrawList.js";
export type { MenuRenderer, SpriteQuad, Tint } from "./rendering/MenuRenderer.js";
export { type SelectionHandler, MenuScene } from "./scenes/MenuScene.js";
export { DefinitionError } from "./shared/jsonFields.js";
