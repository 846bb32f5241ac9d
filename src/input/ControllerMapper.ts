import type { ControllerId } from "../menu/ButtonId.js";
import type { ControllerBinding, ControllerMapConfig } from "./ControllerMap.js";
import { DEFAULT_CONTROLLER_MAP } from "./ControllerMap.js";
import type { LogicalInputs } from "./LogicalInput.js";

/** Logical inputs that went down on one controller since the last endFrame(). */
export interface ControllerInput {
  controller: ControllerId;
  /** Bitmask of LogicalInputs. */
  input: number;
}

/**
 * Turns raw key presses into per-controller logical input masks.
 * Presses are edge-triggered: holding a key fires once until it is released.
 */
export class ControllerMapper {
  private config: ControllerMapConfig;
  private keyToBindings = new Map<string, ControllerBinding[]>();
  private readonly keysDown = new Set<string>();
  private readonly pending = new Map<ControllerId, number>();

  constructor(config?: ControllerMapConfig) {
    this.config = config ?? DEFAULT_CONTROLLER_MAP;
    this.rebuildIndex();
  }

  private rebuildIndex(): void {
    this.keyToBindings.clear();
    for (const binding of this.config) {
      for (const key of binding.keys) {
        const existing = this.keyToBindings.get(key);
        if (existing) {
          existing.push(binding);
        } else {
          this.keyToBindings.set(key, [binding]);
        }
      }
    }
  }

  setConfig(config: ControllerMapConfig): void {
    this.config = config;
    this.rebuildIndex();
  }

  getConfig(): ControllerMapConfig {
    return this.config;
  }

  pressKey(key: string): void {
    if (this.keysDown.has(key)) return; // ignore repeat
    this.keysDown.add(key);
    const bindings = this.keyToBindings.get(key);
    if (!bindings) return;
    for (const binding of bindings) {
      this.pending.set(binding.controller, (this.pending.get(binding.controller) ?? 0) | binding.input);
    }
  }

  releaseKey(key: string): void {
    this.keysDown.delete(key);
  }

  /** Forget held keys (e.g. window lost focus). */
  releaseAll(): void {
    this.keysDown.clear();
  }

  isHeld(controller: ControllerId, input: LogicalInputs): boolean {
    return this.config.some(
      (b) => b.controller === controller && b.input === input && b.keys.some((k) => this.keysDown.has(k)),
    );
  }

  /** Controllers with inputs pending this frame, in order of their first press. */
  poll(): ControllerInput[] {
    const result: ControllerInput[] = [];
    for (const [controller, input] of this.pending) {
      if (input !== 0) result.push({ controller, input });
    }
    return result;
  }

  endFrame(): void {
    this.pending.clear();
  }
}
