import { beforeEach, describe, expect, it, type Mock, vi } from "vitest";
import type { EscapeTimeAlgorithm, IterationResult } from "@/fractals/algorithms/base";
import type { ViewportParameters } from "@/fractals/mandelbrot/types";
import type { Clock } from "@/lib/clock";
import { type FrameInput, type HeldIntent, idleFrameInput } from "@/lib/viewport";
import { createFrameContext, type FrameContext, FrameScheduler, type Presenter } from "./frame-scheduler";
import { advanceCallsToCompletion } from "./progressive-renderer";

/**
 * Synthetic clock. Time only moves when a test (or sleep) moves it.
 */
class FakeClock implements Clock {
  time = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.time;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.time += ms;
  }
}

/**
 * Costs a fixed number of synthetic milliseconds per evaluated block and
 * records the clock reading at the start of each one.
 */
class TickingAlgorithm implements EscapeTimeAlgorithm {
  readonly name = "ticking";
  readonly startedAt: number[] = [];

  constructor(
    private readonly clock: FakeClock,
    private readonly cost: number
  ) {}

  computePoint(_re: number, _im: number, _maxIter: number): IterationResult {
    this.startedAt.push(this.clock.time);
    this.clock.time += this.cost;
    return { iter: 1, zr: 0, zi: 0 };
  }
}

const params: ViewportParameters = {
  center: { re: 0, im: 0 },
  width: 800,
  height: 600,
  realDomain: 4,
  maxIter: 64,
};

const holding = (...held: HeldIntent[]): FrameInput => ({ ...idleFrameInput(), held: new Set(held) });

describe("FrameScheduler", () => {
  let clock: FakeClock;
  let present: Mock;
  let presenter: Presenter;
  let context: FrameContext;

  beforeEach(() => {
    clock = new FakeClock();
    present = vi.fn();
    presenter = { present };
    context = createFrameContext(params);
  });

  it("should reject a non-positive budget", () => {
    expect(() => new FrameScheduler({ clock, presenter, budgetMs: 0 })).toThrow(RangeError);
  });

  it("should render until the deadline and then present", async () => {
    const algorithm = new TickingAlgorithm(clock, 5);
    const scheduler = new FrameScheduler({ clock, presenter, algorithm });

    const report = await scheduler.runFrame(context, idleFrameInput());

    // checks at 0, 5, 10 and 15 pass; the check at 20 stops the loop
    expect(report).toEqual({ changed: false, advanceCalls: 4, rendered: true, slept: 0, done: false });
    expect(algorithm.startedAt).toEqual([0, 5, 10, 15]);
    expect(context.progress).toEqual({ kind: "scanning", indexX: 4, indexY: 0, blockSize: 128 });
    expect(present).toHaveBeenCalledTimes(1);
    expect(present).toHaveBeenCalledWith(context.buffer);
  });

  it("should never start an advance once the elapsed time meets the budget", async () => {
    const algorithm = new TickingAlgorithm(clock, 3);
    const scheduler = new FrameScheduler({ clock, presenter, algorithm, budgetMs: 10 });

    for (let frame = 0; frame < 5; frame++) {
      const start = clock.time;
      algorithm.startedAt.length = 0;

      await scheduler.runFrame(context, idleFrameInput());

      expect(algorithm.startedAt.length).toBeGreaterThan(0);
      for (const startedAt of algorithm.startedAt) {
        expect(startedAt - start).toBeLessThan(10);
      }
      // the one in-flight call may overshoot by its own cost
      expect(clock.time - start).toBeLessThan(10 + 3);
    }
  });

  it("should not advance when the deadline has already passed", async () => {
    const readings = [0, 16];
    const scriptedClock: Clock = {
      now: () => readings.shift() ?? 16,
      sleep: async () => {},
    };
    const algorithm = new TickingAlgorithm(clock, 1);
    const scheduler = new FrameScheduler({ clock: scriptedClock, presenter, algorithm });

    const report = await scheduler.runFrame(context, idleFrameInput());

    expect(report.advanceCalls).toBe(0);
    expect(algorithm.startedAt).toEqual([]);
    expect(present).toHaveBeenCalledTimes(1);
  });

  it("should resume the render on the next frame when nothing changed", async () => {
    const algorithm = new TickingAlgorithm(clock, 5);
    const scheduler = new FrameScheduler({ clock, presenter, algorithm });

    await scheduler.runFrame(context, idleFrameInput());
    const report = await scheduler.runFrame(context, idleFrameInput());

    // three more blocks, a free row wrap, then the first block of the second row
    expect(report.changed).toBe(false);
    expect(report.advanceCalls).toBe(5);
    expect(context.progress).toEqual({ kind: "scanning", indexX: 1, indexY: 1, blockSize: 128 });
  });

  it("should restart the render when the viewport changes mid-render", async () => {
    const algorithm = new TickingAlgorithm(clock, 20);
    const scheduler = new FrameScheduler({ clock, presenter, algorithm });
    context.progress = { kind: "scanning", indexX: 7, indexY: 3, blockSize: 32 };

    const report = await scheduler.runFrame(context, holding("panRight"));

    expect(report.changed).toBe(true);
    expect(context.params.center).toEqual({ re: 0.08, im: 0 });
    // reset to the origin at 128, then one advance before the deadline
    expect(context.progress).toEqual({ kind: "scanning", indexX: 1, indexY: 0, blockSize: 128 });
  });

  it("should keep the buffer contents when restarting at the same size", async () => {
    const scheduler = new FrameScheduler({ clock, presenter, algorithm: new TickingAlgorithm(clock, 20) });
    const buffer = context.buffer;
    buffer.fillRect(700, 500, 10, 10, [9, 9, 9]);

    await scheduler.runFrame(context, holding("zoomIn"));

    expect(context.buffer).toBe(buffer);
    expect(buffer.getPixel(705, 505)).toEqual([9, 9, 9, 255]);
  });

  it("should replace the buffer on resize", async () => {
    const scheduler = new FrameScheduler({ clock, presenter, algorithm: new TickingAlgorithm(clock, 20) });

    const report = await scheduler.runFrame(context, { ...idleFrameInput(), resize: { width: 320, height: 200 } });

    expect(report.changed).toBe(true);
    expect(context.params.width).toBe(320);
    expect(context.buffer.width).toBe(320);
    expect(context.buffer.height).toBe(200);
  });

  it("should finish a render that fits in one frame", async () => {
    const scheduler = new FrameScheduler({ clock, presenter, algorithm: new TickingAlgorithm(clock, 0) });
    const tiny = createFrameContext({ ...params, width: 1, height: 1 });

    const report = await scheduler.runFrame(tiny, idleFrameInput());

    expect(report).toEqual({
      changed: false,
      advanceCalls: advanceCallsToCompletion(1, 1),
      rendered: true,
      slept: 0,
      done: true,
    });
    expect(tiny.progress).toEqual({ kind: "done" });
  });

  it("should sleep out the budget instead of rendering once done", async () => {
    const algorithm = new TickingAlgorithm(clock, 1);
    const scheduler = new FrameScheduler({ clock, presenter, algorithm });
    context.progress = { kind: "done" };

    const report = await scheduler.runFrame(context, idleFrameInput());

    expect(report).toEqual({ changed: false, advanceCalls: 0, rendered: false, slept: 16, done: true });
    expect(clock.sleeps).toEqual([16]);
    expect(algorithm.startedAt).toEqual([]);
    expect(present).not.toHaveBeenCalled();
  });

  it("should start rendering again when the viewport changes after completion", async () => {
    const scheduler = new FrameScheduler({ clock, presenter, algorithm: new TickingAlgorithm(clock, 20) });
    context.progress = { kind: "done" };

    const report = await scheduler.runFrame(context, holding("zoomOut"));

    expect(report.changed).toBe(true);
    expect(report.rendered).toBe(true);
    expect(clock.sleeps).toEqual([]);
  });

  it("should propagate invalid input without touching the context", async () => {
    const scheduler = new FrameScheduler({ clock, presenter });
    const before = context.params;

    await expect(
      scheduler.runFrame(context, { ...idleFrameInput(), resize: { width: 0, height: 0 } })
    ).rejects.toThrow("Viewport: width must be a positive integer, got 0");
    expect(context.params).toBe(before);
  });
});
