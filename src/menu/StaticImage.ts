import type { Material, Shader } from "../assets/MaterialManager.js";
import { IMAGE_TINT } from "../config/constants.js";
import type { MenuRenderer } from "../rendering/MenuRenderer.js";
import type { ButtonId } from "./ButtonId.js";
import type { StaticImageDef } from "./MenuDef.js";

/** Non-interactive menu decoration. Draws nothing unless fully resolved. */
export class StaticImage {
  readonly def: StaticImageDef;
  private readonly materials: readonly (Material | null)[];
  private readonly shader: Shader | null;
  private readonly oneOverCanonicalHeight: number;
  private currentMaterialIndex = 0;

  constructor(
    def: StaticImageDef,
    materials: readonly (Material | null)[],
    shader: Shader | null,
    canonicalWindowHeight: number,
  ) {
    this.def = def;
    this.materials = materials;
    this.shader = shader;
    this.oneOverCanonicalHeight = 1 / canonicalWindowHeight;
  }

  get id(): ButtonId {
    return this.def.id;
  }

  get renderAfterButtons(): boolean {
    return this.def.renderAfterButtons;
  }

  getMaterials(): readonly (Material | null)[] {
    return this.materials;
  }

  getShader(): Shader | null {
    return this.shader;
  }

  /** Every material and the shader resolved. */
  isValid(): boolean {
    return this.materials.length > 0 && this.shader !== null && this.materials.every((m) => m !== null);
  }

  getCurrentMaterialIndex(): number {
    return this.currentMaterialIndex;
  }

  /** Choose which material is drawn. Out-of-range indices are ignored. */
  setCurrentMaterialIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.materials.length) return;
    this.currentMaterialIndex = index;
  }

  render(renderer: MenuRenderer): void {
    if (!this.isValid()) return;
    const material = this.materials[this.currentMaterialIndex];
    if (!material) return;
    const { x: winW, y: winH } = renderer.windowSize;
    const scale = winH * this.oneOverCanonicalHeight;
    renderer.drawQuad({
      source: { kind: "image", id: this.id },
      material,
      shader: this.shader,
      center: { x: this.def.texturePosition.x * winW, y: this.def.texturePosition.y * winH },
      size: {
        x: material.width * scale * this.def.drawScale.x,
        y: material.height * scale * this.def.drawScale.y,
      },
      tint: IMAGE_TINT,
    });
  }
}
