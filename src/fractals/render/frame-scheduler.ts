// ABOUTME: Per-frame orchestration of the progressive renderer under a time budget
// ABOUTME: Detects viewport changes, renders until the deadline, then presents or sleeps

import type { EscapeTimeAlgorithm } from "@/fractals/algorithms/base";
import { mandelbrotAlgorithm } from "@/fractals/algorithms/mandelbrot";
import type { ViewportParameters } from "@/fractals/mandelbrot/types";
import type { Clock } from "@/lib/clock";
import { applyFrameInput, type FrameInput, viewportEquals } from "@/lib/viewport";
import { FrameBuffer } from "./frame-buffer";
import { advance, initialRenderProgress, isDone, type RenderProgress } from "./progressive-renderer";

/** One frame at 60 Hz */
export const FRAME_BUDGET_MS = 16;

/**
 * Everything the frame loop owns across frames. Passed by reference into
 * runFrame(), which replaces its fields in place.
 */
export type FrameContext = {
  params: ViewportParameters;
  progress: RenderProgress;
  buffer: FrameBuffer;
};

/**
 * Receives the buffer after each frame that rendered something.
 */
export interface Presenter {
  present(buffer: FrameBuffer): void;
}

export type FrameReport = {
  /** The viewport changed this frame and the render was restarted */
  changed: boolean;
  advanceCalls: number;
  /** advance() ran and the buffer was presented */
  rendered: boolean;
  /** Milliseconds slept because the render was already complete */
  slept: number;
  done: boolean;
};

export type FrameSchedulerOptions = {
  clock: Clock;
  presenter: Presenter;
  budgetMs?: number;
  algorithm?: EscapeTimeAlgorithm;
};

export const createFrameContext = (params: ViewportParameters): FrameContext => ({
  params,
  progress: initialRenderProgress(),
  buffer: new FrameBuffer(params.width, params.height),
});

/**
 * Cooperative, single-threaded frame scheduler.
 *
 * Usage:
 * ```typescript
 * const scheduler = new FrameScheduler({ clock: systemClock, presenter });
 * const context = createFrameContext(params);
 * while (!input.quit) {
 *   await scheduler.runFrame(context, input);
 * }
 * ```
 */
export class FrameScheduler {
  private readonly clock: Clock;
  private readonly presenter: Presenter;
  private readonly algorithm: EscapeTimeAlgorithm;
  readonly budgetMs: number;

  constructor({ clock, presenter, budgetMs = FRAME_BUDGET_MS, algorithm = mandelbrotAlgorithm }: FrameSchedulerOptions) {
    if (!(budgetMs > 0)) {
      throw new RangeError(`FrameScheduler: budget must be positive, got ${budgetMs}`);
    }
    this.clock = clock;
    this.presenter = presenter;
    this.budgetMs = budgetMs;
    this.algorithm = algorithm;
  }

  async runFrame(context: FrameContext, input: FrameInput): Promise<FrameReport> {
    const startTime = this.clock.now();

    // change detection always happens before any rendering in the frame
    const changed = this.applyInput(context, input);

    if (!isDone(context.progress)) {
      let advanceCalls = 0;
      while (!isDone(context.progress) && this.clock.now() - startTime < this.budgetMs) {
        context.progress = advance(context.buffer, context.params, context.progress, this.algorithm);
        advanceCalls++;
      }
      this.presenter.present(context.buffer);
      return { changed, advanceCalls, rendered: true, slept: 0, done: isDone(context.progress) };
    }

    const timeToSleep = this.budgetMs - (this.clock.now() - startTime);
    if (timeToSleep > 0) {
      await this.clock.sleep(timeToSleep);
    }
    return { changed, advanceCalls: 0, rendered: false, slept: Math.max(0, timeToSleep), done: true };
  }

  /**
   * Applies this frame's input. Returns true when the viewport changed, in
   * which case the render starts over. A resize also replaces the buffer.
   */
  private applyInput(context: FrameContext, input: FrameInput): boolean {
    const next = applyFrameInput(context.params, input);
    if (viewportEquals(next, context.params)) {
      return false;
    }

    if (next.width !== context.buffer.width || next.height !== context.buffer.height) {
      context.buffer = new FrameBuffer(next.width, next.height);
    }
    context.params = next;
    context.progress = initialRenderProgress();
    return true;
  }
}
