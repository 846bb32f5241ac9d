import type { Material, Shader } from "../assets/MaterialManager.js";
import {
  DEFAULT_HIGHLIGHT_SCALE,
  HIGHLIGHT_TINT,
  INACTIVE_TINT,
  MENU_BUTTON_FRAME_DURATION_MS,
  NORMAL_TINT,
} from "../config/constants.js";
import type { PointerInput, PointerState } from "../input/PointerTracker.js";
import type { MenuRenderer, Tint } from "../rendering/MenuRenderer.js";
import type { ButtonId } from "./ButtonId.js";
import type { ButtonDef, Vec2 } from "./MenuDef.js";

/**
 * An on-screen menu button: touch hit-testing, pressed/animated visuals and
 * the active/visible/highlighted flags the menu drives.
 */
export class MenuButton {
  readonly def: ButtonDef;
  private readonly oneOverCanonicalHeight: number;
  private readonly highlightScale: number;
  private upMaterials: (Material | null)[] = [];
  private downMaterial: Material | null = null;
  private shader: Shader | null = null;
  private inactiveShader: Shader | null = null;
  private active: boolean;
  private visible = true;
  private highlighted = false;
  private down = false;
  private triggered = false;
  private elapsedMs = 0;

  constructor(def: ButtonDef, canonicalWindowHeight: number, highlightScale = DEFAULT_HIGHLIGHT_SCALE) {
    this.def = def;
    this.oneOverCanonicalHeight = 1 / canonicalWindowHeight;
    this.highlightScale = highlightScale;
    this.active = def.startsActive;
  }

  get id(): ButtonId {
    return this.def.id;
  }

  setUpMaterial(index: number, material: Material | null): void {
    while (this.upMaterials.length <= index) this.upMaterials.push(null);
    this.upMaterials[index] = material;
  }

  getUpMaterials(): readonly (Material | null)[] {
    return this.upMaterials;
  }

  setDownMaterial(material: Material | null): void {
    this.downMaterial = material;
  }

  getDownMaterial(): Material | null {
    return this.downMaterial;
  }

  setShader(shader: Shader | null): void {
    this.shader = shader;
  }

  getShader(): Shader | null {
    return this.shader;
  }

  setInactiveShader(shader: Shader | null): void {
    this.inactiveShader = shader;
  }

  getInactiveShader(): Shader | null {
    return this.inactiveShader;
  }

  isActive(): boolean {
    return this.active;
  }

  setActive(active: boolean): void {
    this.active = active;
  }

  isVisible(): boolean {
    return this.visible;
  }

  setVisible(visible: boolean): void {
    this.visible = visible;
  }

  isHighlighted(): boolean {
    return this.highlighted;
  }

  setHighlighted(highlighted: boolean): void {
    this.highlighted = highlighted;
  }

  /** Held by a pointer inside the touch rectangle. */
  isDown(): boolean {
    return this.down;
  }

  /** A pointer went down inside the button this frame while it was visible. */
  isTriggered(): boolean {
    return this.triggered && this.visible;
  }

  advanceFrame(dt: number, input: PointerInput, windowSize: Vec2): void {
    this.elapsedMs += dt * 1000;
    this.down = false;
    this.triggered = false;
    for (const pointer of input.pointers) {
      if (!this.contains(pointer, windowSize)) continue;
      if (pointer.isDown) this.down = true;
      if (pointer.wentDown) this.triggered = true;
    }
  }

  render(renderer: MenuRenderer): void {
    if (!this.visible) return;
    const material = this.currentMaterial();
    if (!material) return;

    const shader = this.active || !this.inactiveShader ? this.shader : this.inactiveShader;
    const { x: winW, y: winH } = renderer.windowSize;
    const scale = winH * this.oneOverCanonicalHeight * (this.highlighted ? this.highlightScale : 1);
    renderer.drawQuad({
      source: { kind: "button", id: this.id },
      material,
      shader,
      center: { x: this.def.texturePosition.x * winW, y: this.def.texturePosition.y * winH },
      size: {
        x: material.width * scale * this.def.drawScale.x,
        y: material.height * scale * this.def.drawScale.y,
      },
      tint: this.tint(),
    });
  }

  private currentMaterial(): Material | null {
    if (this.down && this.downMaterial) return this.downMaterial;
    if (this.upMaterials.length === 0) return null;
    const frame = Math.floor(this.elapsedMs / MENU_BUTTON_FRAME_DURATION_MS) % this.upMaterials.length;
    return this.upMaterials[frame] ?? null;
  }

  private tint(): Tint {
    if (!this.active) return INACTIVE_TINT;
    return this.highlighted ? HIGHLIGHT_TINT : NORMAL_TINT;
  }

  private contains(pointer: PointerState, windowSize: Vec2): boolean {
    const { topLeft, bottomRight } = this.def;
    return (
      pointer.x >= topLeft.x * windowSize.x &&
      pointer.x <= bottomRight.x * windowSize.x &&
      pointer.y >= topLeft.y * windowSize.y &&
      pointer.y <= bottomRight.y * windowSize.y
    );
  }
}
