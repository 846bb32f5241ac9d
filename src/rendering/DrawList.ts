import type { Vec2 } from "../menu/MenuDef.js";
import type { MenuRenderer, SpriteQuad } from "./MenuRenderer.js";

/**
 * Renderer-agnostic MenuRenderer: records quads in draw order so a backend
 * (or a test) can consume them after the frame.
 */
export class DrawList implements MenuRenderer {
  /** Mutated in place on resize, so holders of this object see the new size. */
  readonly windowSize: Vec2;
  private quads: SpriteQuad[] = [];

  constructor(windowSize: Vec2) {
    this.windowSize = { x: windowSize.x, y: windowSize.y };
  }

  drawQuad(quad: SpriteQuad): void {
    this.quads.push(quad);
  }

  /** Start a new frame. */
  clear(): void {
    this.quads = [];
  }

  resize(width: number, height: number): void {
    this.windowSize.x = width;
    this.windowSize.y = height;
  }

  get items(): readonly SpriteQuad[] {
    return this.quads;
  }
}
