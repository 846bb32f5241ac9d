import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { type AssetManifest, type AssetResolver, MaterialManager } from "../assets/MaterialManager.js";
import { LogicalInputs } from "../input/LogicalInput.js";
import { PointerTracker } from "../input/PointerTracker.js";
import { DrawList } from "../rendering/DrawList.js";
import { ReservedId, TOUCH_CONTROLLER, UNDEFINED_CONTROLLER } from "./ButtonId.js";
import { FocusMenu } from "./FocusMenu.js";
import type { ButtonDef, MenuDef, StaticImageDef } from "./MenuDef.js";

const MANIFEST: AssetManifest = {
  materials: {
    tex: { width: 64, height: 32 },
    tex_touch: { width: 96, height: 48 },
    pressed: { width: 64, height: 32 },
    bg: { width: 640, height: 480 },
  },
  shaders: ["textured", "gray", "glow"],
};

const WINDOW = { x: 1000, y: 1000 };

/** Button whose touch rectangle is the 100px square starting at column `slot`. */
function btn(id: number, slot: number, extra: Partial<ButtonDef> = {}): ButtonDef {
  return {
    id,
    startsActive: true,
    textureNormal: [{ standard: "tex" }],
    texturePosition: { x: slot * 0.2 + 0.05, y: 0.05 },
    topLeft: { x: slot * 0.2, y: 0 },
    bottomRight: { x: slot * 0.2 + 0.1, y: 0.1 },
    drawScale: { x: 1, y: 1 },
    ...extra,
  };
}

function img(id: number, extra: Partial<StaticImageDef> = {}): StaticImageDef {
  return {
    id,
    texture: [{ standard: "bg" }],
    texturePosition: { x: 0.5, y: 0.5 },
    drawScale: { x: 1, y: 1 },
    renderAfterButtons: false,
    ...extra,
  };
}

function menuDef(buttons: ButtonDef[], staticImages: StaticImageDef[] = [], startingSelection = 1): MenuDef {
  return {
    canonicalWindowHeight: 1000,
    startingSelection,
    defaultShader: "textured",
    defaultInactiveShader: "gray",
    buttons,
    staticImages,
  };
}

/** Preload and set up a menu against a fresh MaterialManager. */
function makeMenu(def: MenuDef, touchScreen = false): { menu: FocusMenu; assets: MaterialManager } {
  const menu = new FocusMenu({ touchScreen });
  const assets = new MaterialManager(MANIFEST);
  menu.loadAssets(def, assets);
  menu.setup(def, assets);
  return { menu, assets };
}

function spyResolver() {
  return {
    findMaterial: vi.fn<AssetResolver["findMaterial"]>(() => null),
    findShader: vi.fn<AssetResolver["findShader"]>(() => null),
    loadMaterial: vi.fn<AssetResolver["loadMaterial"]>(),
    loadShader: vi.fn<AssetResolver["loadShader"]>(),
  } satisfies AssetResolver;
}

function drain(menu: FocusMenu, count: number) {
  return Array.from({ length: count }, () => menu.getRecentSelection());
}

describe("FocusMenu", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  // --- setup ---

  it("setup(null) clears everything without touching the asset resolver", () => {
    const { menu } = makeMenu(menuDef([btn(1, 0), btn(2, 1)], [img(100)]));
    menu.handleControllerInput(LogicalInputs.Cancel, 0);
    const resolver = spyResolver();

    menu.setup(null, resolver);

    expect(menu.buttonList).toHaveLength(0);
    expect(menu.imageList).toHaveLength(0);
    expect(menu.getFocus()).toBe(ReservedId.Undefined);
    expect(menu.pendingSelectionCount).toBe(0);
    expect(resolver.findMaterial).not.toHaveBeenCalled();
    expect(resolver.findShader).not.toHaveBeenCalled();
    expect(resolver.loadMaterial).not.toHaveBeenCalled();
    expect(resolver.loadShader).not.toHaveBeenCalled();
  });

  it("builds one entry per declared button and image even when nothing resolves", () => {
    const def = menuDef([btn(1, 0), btn(2, 1), btn(3, 2)], [img(100), img(101)]);
    const menu = new FocusMenu({ touchScreen: false });
    menu.setup(def, spyResolver());

    expect(menu.buttonList).toHaveLength(3);
    expect(menu.imageList).toHaveLength(2);
    expect(menu.findButtonById(2)?.getUpMaterials()).toEqual([null]);
    expect(menu.findButtonById(2)?.getShader()).toBeNull();
    expect(menu.findImageById(101)?.isValid()).toBe(false);
  });

  it("resets focus to the starting selection and empties the queue", () => {
    const def = menuDef([btn(1, 0), btn(2, 1)], [], 2);
    const { menu, assets } = makeMenu(def);
    menu.setFocus(1);
    menu.handleControllerInput(LogicalInputs.Cancel, 0);

    menu.setup(def, assets);

    expect(menu.getFocus()).toBe(2);
    expect(menu.pendingSelectionCount).toBe(0);
  });

  it("seeds highlight from the starting selection", () => {
    const { menu } = makeMenu(menuDef([btn(1, 0), btn(2, 1)], [], 2));
    expect(menu.findButtonById(1)?.isHighlighted()).toBe(false);
    expect(menu.findButtonById(2)?.isHighlighted()).toBe(true);
  });

  it("takes active state from startsActive", () => {
    const { menu } = makeMenu(menuDef([btn(1, 0), btn(2, 1, { startsActive: false })]));
    expect(menu.findButtonById(1)?.isActive()).toBe(true);
    expect(menu.findButtonById(2)?.isActive()).toBe(false);
  });

  it("falls back to the menu's default shaders", () => {
    const def = menuDef([btn(1, 0), btn(2, 1, { shader: "glow", inactiveShader: "glow" })]);
    const { menu } = makeMenu(def);
    expect(menu.findButtonById(1)?.getShader()?.name).toBe("textured");
    expect(menu.findButtonById(1)?.getInactiveShader()?.name).toBe("gray");
    expect(menu.findButtonById(2)?.getShader()?.name).toBe("glow");
    expect(menu.findButtonById(2)?.getInactiveShader()?.name).toBe("glow");
  });

  it("resolves normal and pressed textures", () => {
    const def = menuDef([btn(1, 0, { textureNormal: [{ standard: "tex" }, { standard: "bg" }], texturePressed: { standard: "pressed" } })]);
    const { menu } = makeMenu(def);
    const button = menu.findButtonById(1);
    expect(button?.getUpMaterials().map((m) => m?.name)).toEqual(["tex", "bg"]);
    expect(button?.getDownMaterial()?.name).toBe("pressed");
  });

  it("uses touch-screen texture variants only when the capability flag is set", () => {
    const def = menuDef([btn(1, 0, { textureNormal: [{ standard: "tex", touchScreen: "tex_touch" }] })]);
    expect(makeMenu(def, false).menu.findButtonById(1)?.getUpMaterials()[0]?.name).toBe("tex");
    expect(makeMenu(def, true).menu.findButtonById(1)?.getUpMaterials()[0]?.name).toBe("tex_touch");
  });

  it("applies a changed touch-screen flag on the next setup", () => {
    const def = menuDef([btn(1, 0, { textureNormal: [{ standard: "tex", touchScreen: "tex_touch" }] })]);
    const { menu, assets } = makeMenu(def, false);
    assets.loadMaterial("tex_touch");

    menu.setTouchScreen(true);
    expect(menu.findButtonById(1)?.getUpMaterials()[0]?.name).toBe("tex");

    menu.setup(def, assets);
    expect(menu.findButtonById(1)?.getUpMaterials()[0]?.name).toBe("tex_touch");
  });

  it("warns about a button without a shader but still builds it", () => {
    const def = menuDef([btn(1, 0, { shader: "missing" })]);
    const { menu } = makeMenu(def);
    expect(menu.buttonList).toHaveLength(1);
    expect(menu.findButtonById(1)?.getShader()).toBeNull();
    expect(console.warn).toHaveBeenCalledWith(expect.stringContaining("WARN button 1 has no shader ('missing' not found)"));
  });

  it("reports missing image materials and shaders as errors and keeps going", () => {
    const def = menuDef([], [img(100, { texture: [{ standard: "nope" }], shader: "absent" }), img(101)]);
    const menu = new FocusMenu({ touchScreen: false });
    const assets = new MaterialManager(MANIFEST);
    assets.loadShader("textured");
    assets.loadMaterial("bg");

    menu.setup(def, assets);

    expect(console.error).toHaveBeenCalledWith(expect.stringContaining("ERROR static image: 'nope' not found"));
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining("ERROR static image: missing shader 'absent'"));
    expect(menu.imageList).toHaveLength(2);
    expect(menu.findImageById(100)?.isValid()).toBe(false);
    expect(menu.findImageById(101)?.isValid()).toBe(true);
  });

  // --- loadAssets ---

  it("preloads every shader and material the definition references", () => {
    const def = menuDef(
      [
        btn(1, 0, {
          textureNormal: [{ standard: "a" }, { standard: "b", touchScreen: "b_touch" }],
          texturePressed: { standard: "p" },
          shader: "s1",
          inactiveShader: "i1",
        }),
        btn(2, 1, { textureNormal: [] }),
      ],
      [img(100, { shader: "s2" })],
    );
    const resolver = spyResolver();
    const menu = new FocusMenu({ touchScreen: false });

    menu.loadAssets(def, resolver);

    expect(resolver.loadShader.mock.calls.map((c) => c[0])).toEqual(["textured", "gray", "s1", "i1", "s2"]);
    expect(resolver.loadMaterial.mock.calls.map((c) => c[0])).toEqual(["a", "b", "p", "bg"]);
    expect(menu.buttonList).toHaveLength(0);

    const touchResolver = spyResolver();
    new FocusMenu({ touchScreen: true }).loadAssets(def, touchResolver);
    expect(touchResolver.loadMaterial.mock.calls.map((c) => c[0])).toEqual(["a", "b_touch", "p", "bg"]);
  });

  // --- advanceFrame ---

  it("drops undrained selections at the start of every frame", () => {
    const { menu } = makeMenu(menuDef([btn(1, 0)]));
    menu.handleControllerInput(LogicalInputs.Cancel, 0);
    expect(menu.pendingSelectionCount).toBe(1);

    menu.advanceFrame(0.016, new PointerTracker(), WINDOW);

    expect(menu.getRecentSelection()).toEqual({ id: ReservedId.Undefined, controller: UNDEFINED_CONTROLLER });
  });

  it("recomputes highlight from focus each frame", () => {
    const { menu } = makeMenu(menuDef([btn(1, 0), btn(2, 1)]));
    menu.setFocus(2);
    expect(menu.findButtonById(1)?.isHighlighted()).toBe(true);

    menu.advanceFrame(0.016, new PointerTracker(), WINDOW);

    expect(menu.findButtonById(1)?.isHighlighted()).toBe(false);
    expect(menu.findButtonById(2)?.isHighlighted()).toBe(true);
  });

  it("queues touch triggers with the button id, or InvalidInput for inactive buttons", () => {
    const { menu } = makeMenu(menuDef([btn(3, 0), btn(4, 1, { startsActive: false })]));
    const pointer = new PointerTracker();
    pointer.press(0, 50, 50); // inside button 3
    pointer.press(1, 250, 50); // inside button 4

    menu.advanceFrame(0.016, pointer, WINDOW);

    expect(drain(menu, 3)).toEqual([
      { id: 3, controller: TOUCH_CONTROLLER },
      { id: ReservedId.InvalidInput, controller: TOUCH_CONTROLLER },
      { id: ReservedId.Undefined, controller: UNDEFINED_CONTROLLER },
    ]);
  });

  it("does not re-trigger a held pointer on the next frame", () => {
    const { menu } = makeMenu(menuDef([btn(3, 0)]));
    const pointer = new PointerTracker();
    pointer.press(0, 50, 50);
    menu.advanceFrame(0.016, pointer, WINDOW);
    pointer.endFrame();

    menu.advanceFrame(0.016, pointer, WINDOW);

    expect(menu.pendingSelectionCount).toBe(0);
    expect(menu.findButtonById(3)?.isDown()).toBe(true);
  });

  it("ignores touches on invisible buttons", () => {
    const { menu } = makeMenu(menuDef([btn(3, 0)]));
    menu.findButtonById(3)?.setVisible(false);
    const pointer = new PointerTracker();
    pointer.press(0, 50, 50);

    menu.advanceFrame(0.016, pointer, WINDOW);

    expect(menu.pendingSelectionCount).toBe(0);
  });

  // --- getRecentSelection ---

  it("returns the sentinel repeatedly once drained", () => {
    const { menu } = makeMenu(menuDef([btn(1, 0)]));
    menu.handleControllerInput(LogicalInputs.Select, 0);
    const sentinel = { id: ReservedId.Undefined, controller: UNDEFINED_CONTROLLER };

    expect(drain(menu, 4)).toEqual([{ id: 1, controller: 0 }, sentinel, sentinel, sentinel]);
    expect(menu.pendingSelectionCount).toBe(0);
  });

  // --- navigation ---

  it("does not move up onto an invisible button and reports the dead end", () => {
    const { menu } = makeMenu(menuDef([btn(1, 0, { navUp: [2] }), btn(2, 1)]));
    menu.findButtonById(2)?.setVisible(false);

    menu.handleControllerInput(LogicalInputs.Up, 0);

    expect(menu.getFocus()).toBe(1);
    expect(drain(menu, 2)).toEqual([
      { id: ReservedId.InvalidInput, controller: TOUCH_CONTROLLER },
      { id: ReservedId.Undefined, controller: UNDEFINED_CONTROLLER },
    ]);
  });

  it("moves up onto a visible button without queueing anything", () => {
    const { menu } = makeMenu(menuDef([btn(1, 0, { navUp: [2] }), btn(2, 1)]));

    menu.handleControllerInput(LogicalInputs.Up, 0);

    expect(menu.getFocus()).toBe(2);
    expect(menu.pendingSelectionCount).toBe(0);
  });

  it("treats an absent or empty candidate list as a dead end", () => {
    const { menu } = makeMenu(menuDef([btn(1, 0, { navLeft: [] }), btn(2, 1)]));

    menu.handleControllerInput(LogicalInputs.Left, 0);
    expect(menu.getFocus()).toBe(1);
    expect(menu.pendingSelectionCount).toBe(1);

    menu.handleControllerInput(LogicalInputs.Right, 0);
    expect(menu.getFocus()).toBe(1);
    expect(drain(menu, 2)).toEqual([
      { id: ReservedId.InvalidInput, controller: TOUCH_CONTROLLER },
      { id: ReservedId.InvalidInput, controller: TOUCH_CONTROLLER },
    ]);
  });

  it("takes the first candidate that exists and is visible", () => {
    const def = menuDef([btn(1, 0, { navRight: [99, 3, 4, 5] }), btn(3, 1), btn(4, 2), btn(5, 3)]);
    const { menu } = makeMenu(def);
    menu.findButtonById(3)?.setVisible(false);

    menu.handleControllerInput(LogicalInputs.Right, 0);

    expect(menu.getFocus()).toBe(4);
    expect(menu.pendingSelectionCount).toBe(0);
  });

  it("walks every asserted direction in up, down, left, right order using the starting button's lists", () => {
    const def = menuDef([btn(1, 0, { navUp: [2], navLeft: [3] }), btn(2, 1, { navLeft: [1] }), btn(3, 2)]);
    const { menu } = makeMenu(def);

    menu.handleControllerInput(LogicalInputs.Up | LogicalInputs.Down | LogicalInputs.Left | LogicalInputs.Right, 0);

    expect(menu.getFocus()).toBe(3);
    expect(drain(menu, 3)).toEqual([
      { id: ReservedId.InvalidInput, controller: TOUCH_CONTROLLER },
      { id: ReservedId.InvalidInput, controller: TOUCH_CONTROLLER },
      { id: ReservedId.Undefined, controller: UNDEFINED_CONTROLLER },
    ]);
  });

  it("navigates away from a focused button that has become invisible", () => {
    const { menu } = makeMenu(menuDef([btn(1, 0, { navDown: [2] }), btn(2, 1)]));
    menu.findButtonById(1)?.setVisible(false);
    menu.advanceFrame(0.016, new PointerTracker(), WINDOW);
    expect(menu.getFocus()).toBe(1);

    menu.handleControllerInput(LogicalInputs.Down, 0);

    expect(menu.getFocus()).toBe(2);
  });

  // --- select / cancel ---

  it("queues select then cancel for one call, tagged with the controller", () => {
    const { menu } = makeMenu(menuDef([btn(7, 0)], [], 7));

    menu.handleControllerInput(LogicalInputs.Select | LogicalInputs.Cancel, 2);

    expect(drain(menu, 3)).toEqual([
      { id: 7, controller: 2 },
      { id: ReservedId.Cancel, controller: 2 },
      { id: ReservedId.Undefined, controller: UNDEFINED_CONTROLLER },
    ]);
  });

  it("selecting an inactive button queues InvalidInput from that controller", () => {
    const { menu } = makeMenu(menuDef([btn(1, 0, { startsActive: false })]));

    menu.handleControllerInput(LogicalInputs.Select, 1);

    expect(menu.getRecentSelection()).toEqual({ id: ReservedId.InvalidInput, controller: 1 });
  });

  it("selects the button focus moved to when a direction comes with select", () => {
    const { menu } = makeMenu(menuDef([btn(1, 0, { navDown: [2] }), btn(2, 1)]));

    menu.handleControllerInput(LogicalInputs.Down | LogicalInputs.Select, 0);

    expect(menu.getFocus()).toBe(2);
    expect(drain(menu, 2)).toEqual([
      { id: 2, controller: 0 },
      { id: ReservedId.Undefined, controller: UNDEFINED_CONTROLLER },
    ]);
  });

  it("checks the active flag of the button focused before the move", () => {
    const def = menuDef([btn(1, 0, { startsActive: false, navDown: [2] }), btn(2, 1)]);
    const { menu } = makeMenu(def);

    menu.handleControllerInput(LogicalInputs.Down | LogicalInputs.Select, 3);

    expect(menu.getFocus()).toBe(2);
    expect(menu.getRecentSelection()).toEqual({ id: ReservedId.InvalidInput, controller: 3 });
  });

  it("ignores controller input when focus names no button", () => {
    const { menu } = makeMenu(menuDef([btn(1, 0, { navUp: [] })]));
    menu.setFocus(42);

    menu.handleControllerInput(LogicalInputs.Up | LogicalInputs.Select | LogicalInputs.Cancel, 0);

    expect(menu.getFocus()).toBe(42);
    expect(menu.pendingSelectionCount).toBe(0);
  });

  it("keeps touch and controller events in call order within a frame", () => {
    const { menu } = makeMenu(menuDef([btn(1, 0), btn(2, 1)]));
    const pointer = new PointerTracker();
    pointer.press(0, 250, 50); // button 2

    menu.advanceFrame(0.016, pointer, WINDOW);
    menu.handleControllerInput(LogicalInputs.Select, 0);

    expect(drain(menu, 2)).toEqual([
      { id: 2, controller: TOUCH_CONTROLLER },
      { id: 1, controller: 0 },
    ]);
  });

  // --- lookup ---

  it("finds buttons and images by id, first match wins", () => {
    const { menu } = makeMenu(menuDef([btn(1, 0), btn(1, 1, { startsActive: false })], [img(100)]));
    expect(menu.findButtonById(1)?.isActive()).toBe(true);
    expect(menu.findButtonById(2)).toBeNull();
    expect(menu.findImageById(100)?.id).toBe(100);
    expect(menu.findImageById(1)).toBeNull();
  });

  // --- render ---

  it("draws images behind, then buttons, then images in front", () => {
    const def = menuDef(
      [btn(1, 0), btn(2, 1)],
      [img(100, { renderAfterButtons: true }), img(101), img(102, { renderAfterButtons: true }), img(103)],
    );
    const { menu } = makeMenu(def);
    const drawList = new DrawList(WINDOW);

    menu.render(drawList);

    expect(drawList.items.map((q) => `${q.source.kind}:${q.source.id}`)).toEqual([
      "image:101",
      "image:103",
      "button:1",
      "button:2",
      "image:100",
      "image:102",
    ]);
  });
});
