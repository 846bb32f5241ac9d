/**
 * Identity of a menu button or static image. Menus define their own ids as
 * positive integers; values below 1 are reserved for the sentinels below.
 */
export type ButtonId = number;

/** Sentinel identities. Never assigned to a real button or image. */
export enum ReservedId {
  /** No focus / no event. */
  Undefined = 0,
  /** A selection or navigation that could not be carried out. */
  InvalidInput = -1,
  /** The player backed out of the menu. */
  Cancel = -2,
}

/** Source of a selection. Real controllers are numbered from 0. */
export type ControllerId = number;

/** Selection with no source (returned from an empty queue). */
export const UNDEFINED_CONTROLLER: ControllerId = -1;

/** Selection made by pointer/touch, and navigation failures. */
export const TOUCH_CONTROLLER: ControllerId = -2;

/** One queued user action: what was selected and by whom. */
export interface MenuSelection {
  readonly id: ButtonId;
  readonly controller: ControllerId;
}

/** True for ids a menu definition may assign to a button or image. */
export function isRealButtonId(id: number): boolean {
  return Number.isInteger(id) && id >= 1;
}
