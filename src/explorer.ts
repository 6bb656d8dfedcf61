// ABOUTME: The explorer main loop: input, export, scheduled rendering and bookkeeping
// ABOUTME: One FractalExplorer owns one frame context, store and performance monitor

import type { EscapeTimeAlgorithm } from "@/fractals/algorithms/base";
import { createFrameContext, type FrameContext, FrameScheduler, type Presenter } from "@/fractals/render/frame-scheduler";
import { advanceCallsToCompletion } from "@/fractals/render/progressive-renderer";
import { type Clock, systemClock } from "@/lib/clock";
import type { Exporter } from "@/lib/export";
import { PerformanceMonitor } from "@/lib/performance-monitor";
import { type InputSource, validateViewport } from "@/lib/viewport";
import { createExplorerStore, type ExplorerStore } from "@/state/explorer-store";

export type FractalExplorerOptions = {
  input: InputSource;
  presenter: Presenter;
  exporter: Exporter;
  clock?: Clock;
  budgetMs?: number;
  store?: ExplorerStore;
  monitor?: PerformanceMonitor;
  algorithm?: EscapeTimeAlgorithm;
};

export class FractalExplorer {
  readonly store: ExplorerStore;
  readonly monitor: PerformanceMonitor;
  private readonly input: InputSource;
  private readonly exporter: Exporter;
  private readonly clock: Clock;
  private readonly scheduler: FrameScheduler;
  private readonly context: FrameContext;
  private sessionId: string;
  private advanceCalls = 0;

  constructor({
    input,
    presenter,
    exporter,
    clock = systemClock,
    budgetMs,
    store = createExplorerStore(),
    monitor,
    algorithm,
  }: FractalExplorerOptions) {
    this.input = input;
    this.exporter = exporter;
    this.clock = clock;
    this.store = store;
    this.monitor = monitor ?? new PerformanceMonitor(() => clock.now());
    this.scheduler = new FrameScheduler({ clock, presenter, budgetMs, algorithm });
    this.context = createFrameContext(validateViewport(store.getState().params));
    store.getState().setParams(this.context.params);
    this.sessionId = this.startSession();
  }

  get frameContext(): Readonly<FrameContext> {
    return this.context;
  }

  /**
   * Runs frames until the input source asks to quit.
   *
   * @returns the number of frames run
   */
  async run(): Promise<number> {
    let frames = 0;
    for (;;) {
      const input = this.input.poll();
      if (input.quit) {
        return frames;
      }

      // export what is on screen now, before this frame paints anything
      if (input.pressed.includes("export")) {
        await this.exportFrame();
      }

      const frameStart = this.clock.now();
      const report = await this.scheduler.runFrame(this.context, input);
      const frameTime = this.clock.now() - frameStart;

      const { store } = this;
      if (report.changed) {
        this.monitor.cancelRender(this.sessionId);
        this.sessionId = this.startSession();
        store.getState().setParams(this.context.params);
      }

      if (report.rendered) {
        this.advanceCalls += report.advanceCalls;
        this.monitor.recordFrame(this.sessionId, report.advanceCalls, frameTime);
        store.getState().setRenderProgress(this.context.progress, this.advanceCalls);

        if (report.done) {
          const metrics = this.monitor.endRender(this.sessionId);
          const { width, height, maxIter } = this.context.params;
          console.log(
            `Render complete: ${width}x${height} at maxIter ${maxIter} in ${metrics.frames} frames (${metrics.duration.toFixed(1)}ms)`
          );
        }
      }

      store.getState().recordFrame(frameTime);
      frames++;
    }
  }

  /**
   * Hands a snapshot of the current buffer to the exporter.
   *
   * @returns where the exporter wrote it
   */
  async exportFrame(): Promise<string> {
    const { buffer } = this.context;
    const path = await this.exporter.export(buffer.snapshot());
    console.log(`Exported ${buffer.width}x${buffer.height} frame to ${path}`);
    return path;
  }

  private startSession(): string {
    const { width, height } = this.context.params;
    this.advanceCalls = 0;
    return this.monitor.startRender(advanceCallsToCompletion(width, height), width * height);
  }
}
