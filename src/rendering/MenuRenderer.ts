import type { Material, Shader } from "../assets/MaterialManager.js";
import type { ButtonId } from "../menu/ButtonId.js";
import type { Vec2 } from "../menu/MenuDef.js";

export type Tint = readonly [number, number, number, number];

/** One textured, axis-aligned quad in window pixels. */
export interface SpriteQuad {
  /** Button or image that produced the quad. */
  readonly source: { kind: "button" | "image"; id: ButtonId };
  readonly material: Material;
  /** Null when the shader failed to resolve; the renderer decides how that shows. */
  readonly shader: Shader | null;
  readonly center: Vec2;
  readonly size: Vec2;
  readonly tint: Tint;
}

/** Render target for menu widgets. */
export interface MenuRenderer {
  /** Current window size in pixels. */
  readonly windowSize: Vec2;
  drawQuad(quad: SpriteQuad): void;
}
