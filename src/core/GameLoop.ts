import { MAX_FRAME_TIME, TICK_RATE } from "../config/constants.js";

export interface GameLoopCallbacks {
  update(dt: number): void;
  render(alpha: number): void;
}

/**
 * Fixed-timestep loop with interpolation alpha.
 *
 * update() runs at a fixed rate (TICK_RATE Hz by default) however often
 * frames arrive; render() receives how far [0, 1) the frame falls between
 * two updates. Frames come from start() (an interval timer) or from a host
 * clock through externalTick().
 */
export class GameLoop {
  private accumulator = 0;
  private lastTime: number | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private callbacks: GameLoopCallbacks;
  private fixedDt = 1 / TICK_RATE;
  timeScale = 1;

  constructor(callbacks: GameLoopCallbacks) {
    this.callbacks = callbacks;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /** Change the simulation tick rate. Resets the accumulator to avoid burst ticks. */
  setTickRate(hz: number): void {
    this.fixedDt = 1 / hz;
    this.accumulator = 0;
  }

  start(): void {
    if (this.timer) return;
    this.lastTime = performance.now() / 1000;
    this.timer = setInterval(() => this.externalTick(performance.now()), 1000 / TICK_RATE);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /**
   * Process one frame at `nowMs`. The first call only records the time.
   * Call stop() first when driving the loop from another clock.
   */
  externalTick(nowMs: number): void {
    const now = nowMs / 1000;
    if (this.lastTime === null) {
      this.lastTime = now;
      return;
    }
    const frameTime = Math.min(now - this.lastTime, MAX_FRAME_TIME);
    this.lastTime = now;

    this.accumulator += frameTime * this.timeScale;
    while (this.accumulator >= this.fixedDt) {
      this.callbacks.update(this.fixedDt);
      this.accumulator -= this.fixedDt;
    }
    this.callbacks.render(this.accumulator / this.fixedDt);
  }
}
