import { loadJSON } from "../assets/AssetLoader.js";
import {
  DefinitionError,
  expectRecord,
  type JsonRecord,
  optBoolean,
  optIntegerArray,
  optString,
  readArray,
  readInteger,
  readNumber,
  readString,
} from "../shared/jsonFields.js";
import { type ButtonId, isRealButtonId } from "./ButtonId.js";

export interface Vec2 {
  x: number;
  y: number;
}

/** A texture with an optional variant used on touch-screen devices. */
export interface ButtonTexture {
  standard: string;
  touchScreen?: string;
}

export interface ButtonDef {
  id: ButtonId;
  startsActive: boolean;
  /** Ordered neighbor candidates per direction; first visible wins. */
  navUp?: readonly ButtonId[];
  navDown?: readonly ButtonId[];
  navLeft?: readonly ButtonId[];
  navRight?: readonly ButtonId[];
  /** Up-state textures, animated in order when there is more than one. */
  textureNormal: readonly ButtonTexture[];
  texturePressed?: ButtonTexture;
  /** Overrides MenuDef.defaultShader. */
  shader?: string;
  /** Overrides MenuDef.defaultInactiveShader. */
  inactiveShader?: string;
  /** Texture center, as a fraction of the window. */
  texturePosition: Vec2;
  /** Touch rectangle corners, as fractions of the window. */
  topLeft: Vec2;
  bottomRight: Vec2;
  drawScale: Vec2;
}

export interface StaticImageDef {
  id: ButtonId;
  texture: readonly ButtonTexture[];
  shader?: string;
  texturePosition: Vec2;
  drawScale: Vec2;
  /** Draw in front of the buttons instead of behind them. */
  renderAfterButtons: boolean;
}

export interface MenuDef {
  /** Window height the texture sizes were authored for. Must be > 0. */
  canonicalWindowHeight: number;
  startingSelection: ButtonId;
  defaultShader: string;
  defaultInactiveShader: string;
  buttons: readonly ButtonDef[];
  staticImages: readonly StaticImageDef[];
}

/** Neighbor candidate list for one direction. */
export type NavDirection = "navUp" | "navDown" | "navLeft" | "navRight";

const NAV_DIRECTIONS: readonly NavDirection[] = ["navUp", "navDown", "navLeft", "navRight"];

/** Validate parsed JSON into a MenuDef. Throws DefinitionError on bad data. */
export function parseMenuDef(raw: unknown): MenuDef {
  const obj = expectRecord(raw, "menu");
  const canonicalWindowHeight = readNumber(obj, "canonicalWindowHeight", "menu");
  if (canonicalWindowHeight <= 0) {
    throw new DefinitionError("menu.canonicalWindowHeight", "must be greater than 0");
  }
  return {
    canonicalWindowHeight,
    startingSelection: readInteger(obj, "startingSelection", "menu"),
    defaultShader: readString(obj, "defaultShader", "menu"),
    defaultInactiveShader: readString(obj, "defaultInactiveShader", "menu"),
    buttons: readArray(obj, "buttons", "menu").map((b, i) => parseButtonDef(b, `menu.buttons[${i}]`)),
    staticImages: readArray(obj, "staticImages", "menu").map((img, i) =>
      parseStaticImageDef(img, `menu.staticImages[${i}]`),
    ),
  };
}

/** Read a menu definition file. */
export async function readMenuDef(path: string): Promise<MenuDef> {
  return parseMenuDef(await loadJSON(path));
}

function parseButtonDef(raw: unknown, path: string): ButtonDef {
  const obj = expectRecord(raw, path);
  const def: ButtonDef = {
    id: readId(obj, path),
    startsActive: optBoolean(obj, "startsActive", path, true),
    textureNormal: readArray(obj, "textureNormal", path).map((t, i) =>
      parseTexture(t, `${path}.textureNormal[${i}]`),
    ),
    texturePosition: readVec2(obj, "texturePosition", path),
    topLeft: readVec2(obj, "topLeft", path),
    bottomRight: readVec2(obj, "bottomRight", path),
    drawScale: obj.drawScale === undefined ? { x: 1, y: 1 } : readVec2(obj, "drawScale", path),
  };
  for (const dir of NAV_DIRECTIONS) {
    const list = optIntegerArray(obj, dir, path);
    if (list) def[dir] = list;
  }
  if (obj.texturePressed !== undefined) {
    def.texturePressed = parseTexture(obj.texturePressed, `${path}.texturePressed`);
  }
  const shader = optString(obj, "shader", path);
  if (shader !== undefined) def.shader = shader;
  const inactiveShader = optString(obj, "inactiveShader", path);
  if (inactiveShader !== undefined) def.inactiveShader = inactiveShader;
  return def;
}

function parseStaticImageDef(raw: unknown, path: string): StaticImageDef {
  const obj = expectRecord(raw, path);
  const def: StaticImageDef = {
    id: readId(obj, path),
    texture: readArray(obj, "texture", path).map((t, i) => parseTexture(t, `${path}.texture[${i}]`)),
    texturePosition: readVec2(obj, "texturePosition", path),
    drawScale: obj.drawScale === undefined ? { x: 1, y: 1 } : readVec2(obj, "drawScale", path),
    renderAfterButtons: optBoolean(obj, "renderAfterButtons", path, false),
  };
  const shader = optString(obj, "shader", path);
  if (shader !== undefined) def.shader = shader;
  return def;
}

function parseTexture(raw: unknown, path: string): ButtonTexture {
  const obj = expectRecord(raw, path);
  const texture: ButtonTexture = { standard: readString(obj, "standard", path) };
  const touchScreen = optString(obj, "touchScreen", path);
  if (touchScreen !== undefined) texture.touchScreen = touchScreen;
  return texture;
}

function readId(obj: JsonRecord, path: string): ButtonId {
  const id = readInteger(obj, "id", path);
  if (!isRealButtonId(id)) throw new DefinitionError(`${path}.id`, "ids must be integers >= 1");
  return id;
}

function readVec2(obj: JsonRecord, key: string, path: string): Vec2 {
  const vec = expectRecord(obj[key], `${path}.${key}`);
  return { x: readNumber(vec, "x", `${path}.${key}`), y: readNumber(vec, "y", `${path}.${key}`) };
}
