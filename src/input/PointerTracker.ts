/** One pointer (finger or mouse) in window pixels. */
export interface PointerState {
  readonly id: number;
  readonly x: number;
  readonly y: number;
  /** Currently held. */
  readonly isDown: boolean;
  /** Pressed since the last endFrame(). */
  readonly wentDown: boolean;
  /** Released since the last endFrame(). */
  readonly wentUp: boolean;
}

/** Per-frame pointer state, as polled by menu buttons. */
export interface PointerInput {
  readonly pointers: readonly PointerState[];
}

interface TrackedPointer {
  id: number;
  x: number;
  y: number;
  isDown: boolean;
  wentDown: boolean;
  wentUp: boolean;
}

/**
 * Collects pointer events between frames. The host forwards press/move/release
 * as they arrive and calls endFrame() once the frame has consumed them.
 */
export class PointerTracker implements PointerInput {
  private readonly tracked = new Map<number, TrackedPointer>();

  get pointers(): readonly PointerState[] {
    return [...this.tracked.values()];
  }

  press(id: number, x: number, y: number): void {
    const existing = this.tracked.get(id);
    if (existing?.isDown) {
      existing.x = x;
      existing.y = y;
      return;
    }
    this.tracked.set(id, { id, x, y, isDown: true, wentDown: true, wentUp: existing?.wentUp ?? false });
  }

  move(id: number, x: number, y: number): void {
    const p = this.tracked.get(id);
    if (!p) return;
    p.x = x;
    p.y = y;
  }

  release(id: number): void {
    const p = this.tracked.get(id);
    if (!p?.isDown) return;
    p.isDown = false;
    p.wentUp = true;
  }

  /** Clear edge flags and forget released pointers. */
  endFrame(): void {
    for (const [id, p] of this.tracked) {
      if (!p.isDown) {
        this.tracked.delete(id);
        continue;
      }
      p.wentDown = false;
      p.wentUp = false;
    }
  }

  /** Release every pointer (e.g. window lost focus). */
  releaseAll(): void {
    for (const p of this.tracked.values()) {
      if (p.isDown) {
        p.isDown = false;
        p.wentUp = true;
      }
    }
  }
}
