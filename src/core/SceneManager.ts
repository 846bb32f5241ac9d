import type { GameContext, GameScene } from "./GameScene.js";

/**
 * Stack of menu screens and the scene underneath them.
 *
 * - `push(scene)` opens a screen on top (e.g. options over the title menu)
 * - `pop()` closes the top screen and resumes the one below
 * - `replace(scene)` swaps the top screen
 * - `popTo(scene)` closes every screen above `scene`
 *
 * Only the top scene updates. Rendering starts at the highest opaque scene
 * and draws upward, so transparent overlays show what is beneath them.
 */
export class SceneManager {
  private stack: GameScene[] = [];
  private ctx: GameContext | null = null;

  /** Bind the shared context. Called once during init. */
  setContext(ctx: GameContext): void {
    this.ctx = ctx;
  }

  /** The top scene, or null if the stack is empty. */
  get current(): GameScene | null {
    return this.stack.at(-1) ?? null;
  }

  get size(): number {
    return this.stack.length;
  }

  push(scene: GameScene): void {
    const ctx = this.requireCtx();
    this.current?.onPause(ctx);
    this.stack.push(scene);
    scene.onEnter(ctx);
  }

  pop(): GameScene | undefined {
    const ctx = this.requireCtx();
    const top = this.stack.pop();
    top?.onExit(ctx);
    this.current?.onResume(ctx);
    return top;
  }

  replace(scene: GameScene): void {
    const ctx = this.requireCtx();
    this.stack.pop()?.onExit(ctx);
    this.stack.push(scene);
    scene.onEnter(ctx);
  }

  /**
   * Close every scene above `scene`, which is resumed once. Returns false
   * (and changes nothing) when `scene` is not on the stack.
   */
  popTo(scene: GameScene): boolean {
    const index = this.stack.indexOf(scene);
    if (index < 0) return false;
    if (index === this.stack.length - 1) return true;
    const ctx = this.requireCtx();
    while (this.stack.length > index + 1) {
      this.stack.pop()?.onExit(ctx);
    }
    scene.onResume(ctx);
    return true;
  }

  /** Exit every scene, top first. */
  clear(): void {
    const ctx = this.requireCtx();
    while (this.stack.length > 0) {
      this.stack.pop()?.onExit(ctx);
    }
  }

  /** Topmost scene of the given class, if any. */
  findTop<T extends GameScene>(SceneClass: abstract new (...args: never[]) => T): T | null {
    for (let i = this.stack.length - 1; i >= 0; i--) {
      const scene = this.stack[i];
      if (scene instanceof SceneClass) return scene;
    }
    return null;
  }

  update(dt: number): void {
    const ctx = this.requireCtx();
    this.current?.update(dt, ctx);
  }

  render(alpha: number): void {
    if (this.stack.length === 0) return;
    const ctx = this.requireCtx();
    let start = this.stack.length - 1;
    while (start > 0 && this.stack[start]?.transparent) {
      start--;
    }
    for (let i = start; i < this.stack.length; i++) {
      this.stack[i]?.render(alpha, ctx);
    }
  }

  private requireCtx(): GameContext {
    if (!this.ctx) throw new Error("SceneManager: context not set. Call setContext() first.");
    return this.ctx;
  }
}
