import { menuLogError } from "../log/menuLog.js";
import {
  DefinitionError,
  expectRecord,
  readArray,
  readNumber,
} from "../shared/jsonFields.js";
import { loadJSON } from "./AssetLoader.js";

/** A loaded texture. Size is in texels of the authored asset. */
export interface Material {
  readonly name: string;
  readonly width: number;
  readonly height: number;
}

export interface Shader {
  readonly name: string;
}

/**
 * Resolves asset names to loaded handles. `find*` never loads; the `load*`
 * calls front-load assets so later lookups succeed.
 */
export interface AssetResolver {
  findMaterial(name: string): Material | null;
  findShader(name: string): Shader | null;
  loadMaterial(name: string): void;
  loadShader(name: string): void;
}

/** Known assets: material name → texture size, plus shader names. */
export interface AssetManifest {
  materials: Record<string, { width: number; height: number }>;
  shaders: readonly string[];
}

/** In-memory asset cache backed by a manifest of what exists. */
export class MaterialManager implements AssetResolver {
  private readonly manifest: AssetManifest;
  private readonly shaderNames: Set<string>;
  private readonly materials = new Map<string, Material>();
  private readonly shaders = new Map<string, Shader>();

  constructor(manifest: AssetManifest) {
    this.manifest = manifest;
    this.shaderNames = new Set(manifest.shaders);
  }

  findMaterial(name: string): Material | null {
    return this.materials.get(name) ?? null;
  }

  findShader(name: string): Shader | null {
    return this.shaders.get(name) ?? null;
  }

  loadMaterial(name: string): void {
    if (this.materials.has(name)) return;
    const entry = Object.hasOwn(this.manifest.materials, name) ? this.manifest.materials[name] : undefined;
    if (!entry) {
      menuLogError("loadMaterial", `unknown material '${name}'`);
      return;
    }
    this.materials.set(name, { name, width: entry.width, height: entry.height });
  }

  loadShader(name: string): void {
    if (this.shaders.has(name)) return;
    if (!this.shaderNames.has(name)) {
      menuLogError("loadShader", `unknown shader '${name}'`);
      return;
    }
    this.shaders.set(name, { name });
  }

  get loadedMaterialCount(): number {
    return this.materials.size;
  }

  get loadedShaderCount(): number {
    return this.shaders.size;
  }

  /** Drop every loaded handle. The manifest is kept. */
  clear(): void {
    this.materials.clear();
    this.shaders.clear();
  }
}

/** Validate parsed JSON into an AssetManifest. */
export function parseAssetManifest(raw: unknown): AssetManifest {
  const obj = expectRecord(raw, "manifest");
  const rawMaterials = obj.materials === undefined ? {} : expectRecord(obj.materials, "manifest.materials");
  const materials: AssetManifest["materials"] = {};
  for (const [name, value] of Object.entries(rawMaterials)) {
    const path = `manifest.materials.${name}`;
    const size = expectRecord(value, path);
    materials[name] = { width: readNumber(size, "width", path), height: readNumber(size, "height", path) };
  }
  const shaders = readArray(obj, "shaders", "manifest").map((s, i) => {
    if (typeof s !== "string") throw new DefinitionError(`manifest.shaders[${i}]`, "expected a string");
    return s;
  });
  return { materials, shaders };
}

/** Read an asset manifest file. */
export async function readAssetManifest(path: string): Promise<AssetManifest> {
  return parseAssetManifest(await loadJSON(path));
}
