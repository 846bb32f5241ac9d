/** Fixed update tick rate in Hz. */
export const TICK_RATE = 60;

/** Maximum frame time (seconds) fed to the loop, to avoid a spiral of death on lag spikes. */
export const MAX_FRAME_TIME = 0.25;

/** Duration of each frame of a button's animated up textures (milliseconds). */
export const MENU_BUTTON_FRAME_DURATION_MS = 150;

/** Size multiplier applied to the focused button. */
export const DEFAULT_HIGHLIGHT_SCALE = 1.1;

/** RGBA tint for a button that holds focus. */
export const HIGHLIGHT_TINT: readonly [number, number, number, number] = [1, 1, 1, 1];

/** RGBA tint for an active button without focus. */
export const NORMAL_TINT: readonly [number, number, number, number] = [0.85, 0.85, 0.85, 1];

/** RGBA tint for a button that cannot be selected. */
export const INACTIVE_TINT: readonly [number, number, number, number] = [0.5, 0.5, 0.5, 1];

/** Tint for static images. */
export const IMAGE_TINT: readonly [number, number, number, number] = [1, 1, 1, 1];
