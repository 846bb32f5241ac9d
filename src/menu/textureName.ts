import type { ButtonTexture } from "./MenuDef.js";

/**
 * Pick the asset name for a texture. The touch-screen variant is used only
 * when the device has a touch screen and the texture provides one.
 */
export function textureName(texture: ButtonTexture, touchScreen: boolean): string {
  return touchScreen && texture.touchScreen !== undefined ? texture.touchScreen : texture.standard;
}
