import type { ControllerId } from "../menu/ButtonId.js";
import { LogicalInputs } from "./LogicalInput.js";

/** Maps one logical input of one controller to one or more keys (KeyboardEvent.key values). */
export interface ControllerBinding {
  controller: ControllerId;
  input: LogicalInputs;
  keys: string[];
}

export type ControllerMapConfig = ControllerBinding[];

export const DEFAULT_CONTROLLER_MAP: ControllerMapConfig = [
  // Controller 0: arrows
  { controller: 0, input: LogicalInputs.Up, keys: ["ArrowUp"] },
  { controller: 0, input: LogicalInputs.Down, keys: ["ArrowDown"] },
  { controller: 0, input: LogicalInputs.Left, keys: ["ArrowLeft"] },
  { controller: 0, input: LogicalInputs.Right, keys: ["ArrowRight"] },
  { controller: 0, input: LogicalInputs.Select, keys: ["Enter", " "] },
  { controller: 0, input: LogicalInputs.Cancel, keys: ["Escape", "Backspace"] },
  // Controller 1: WASD
  { controller: 1, input: LogicalInputs.Up, keys: ["w", "W"] },
  { controller: 1, input: LogicalInputs.Down, keys: ["s", "S"] },
  { controller: 1, input: LogicalInputs.Left, keys: ["a", "A"] },
  { controller: 1, input: LogicalInputs.Right, keys: ["d", "D"] },
  { controller: 1, input: LogicalInputs.Select, keys: ["e", "E"] },
  { controller: 1, input: LogicalInputs.Cancel, keys: ["q", "Q"] },
];
