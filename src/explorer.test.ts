import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { EscapeTimeAlgorithm, IterationResult } from "@/fractals/algorithms/base";
import type { FrameSnapshot } from "@/fractals/render/frame-buffer";
import { advanceCallsToCompletion } from "@/fractals/render/progressive-renderer";
import type { Clock } from "@/lib/clock";
import type { Exporter } from "@/lib/export";
import { HeadlessPresenter } from "@/lib/headless-presenter";
import { ScriptedInput } from "@/lib/scripted-input";
import { createExplorerStore, DEFAULT_VIEWPORT, type ExplorerStore } from "@/state/explorer-store";
import { FractalExplorer } from "./explorer";

class FakeClock implements Clock {
  time = 0;

  now(): number {
    return this.time;
  }

  async sleep(ms: number): Promise<void> {
    this.time += ms;
  }
}

/** Every block escapes after `iter` steps and costs `cost` synthetic ms. */
class CostlyAlgorithm implements EscapeTimeAlgorithm {
  readonly name = "costly";

  constructor(
    private readonly clock: FakeClock,
    private readonly cost: number,
    private readonly iter = 64
  ) {}

  computePoint(_re: number, _im: number, maxIter: number): IterationResult {
    this.clock.time += this.cost;
    return { iter: Math.min(this.iter, maxIter), zr: 0, zi: 0 };
  }
}

class MemoryExporter implements Exporter {
  readonly snapshots: FrameSnapshot[] = [];

  async export(snapshot: FrameSnapshot): Promise<string> {
    this.snapshots.push(snapshot);
    return `memory-${this.snapshots.length}`;
  }
}

describe("FractalExplorer", () => {
  let clock: FakeClock;
  let store: ExplorerStore;
  let presenter: HeadlessPresenter;
  let exporter: MemoryExporter;

  const explorerFor = (script: string, cost = 0) =>
    new FractalExplorer({
      input: new ScriptedInput(script, () => store.getState().renderProgress.done),
      presenter,
      exporter,
      clock,
      store,
      algorithm: new CostlyAlgorithm(clock, cost),
    });

  beforeEach(() => {
    clock = new FakeClock();
    store = createExplorerStore({ ...DEFAULT_VIEWPORT, width: 16, height: 12 });
    presenter = new HeadlessPresenter();
    exporter = new MemoryExporter();
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should render to completion and quit once the script is exhausted", async () => {
    const explorer = explorerFor(".");

    const frames = await explorer.run();

    expect(frames).toBe(1);
    expect(store.getState().renderProgress).toEqual({ done: true, blockSize: 0, fraction: 1 });
    expect(store.getState().advanceCalls).toBe(advanceCallsToCompletion(16, 12));
    expect(store.getState().frameCount).toBe(1);
    expect(presenter.presented).toBe(1);
    expect(console.log).toHaveBeenCalledWith("Render complete: 16x12 at maxIter 64 in 1 frames (0.0ms)");
  });

  it("should spread a render over several frames under the budget", async () => {
    const explorer = explorerFor("", 5);

    const frames = await explorer.run();

    const [metrics] = explorer.monitor.getHistory();
    expect(frames).toBeGreaterThan(1);
    expect(metrics.frames).toBe(frames);
    expect(metrics.completedSteps).toBe(advanceCallsToCompletion(16, 12));
    expect(store.getState().frameCount).toBe(frames);
    expect(presenter.presented).toBe(frames);
  });

  it("should sleep once the render is complete", async () => {
    const explorer = explorerFor(". . .");

    const frames = await explorer.run();

    expect(frames).toBe(3);
    expect(presenter.presented).toBe(1);
    expect(clock.time).toBe(32);
  });

  it("should export the buffer as it was before the frame rendered", async () => {
    const explorer = explorerFor("r");

    await explorer.run();

    expect(exporter.snapshots).toHaveLength(1);
    expect(Array.from(exporter.snapshots[0].data.slice(0, 4))).toEqual([0, 0, 0, 255]);
    expect(console.log).toHaveBeenCalledWith("Exported 16x12 frame to memory-1");

    await explorer.exportFrame();
    expect(Array.from(exporter.snapshots[1].data.slice(0, 4))).toEqual([255, 255, 255, 255]);
  });

  it("should restart the render session when the viewport changes", async () => {
    const explorer = explorerFor("d e");

    await explorer.run();

    const state = store.getState();
    expect(state.params.center).toEqual({ re: 0.08, im: 0 });
    expect(state.params.maxIter).toBe(128);
    expect(explorer.frameContext.params).toEqual(state.params);
    // the starting viewport was replaced before it rendered and leaves no history
    expect(explorer.monitor.getHistory()).toHaveLength(2);
  });

  it("should follow a resize with a new buffer", async () => {
    const explorer = explorerFor("resize:8x4");

    await explorer.run();

    expect(explorer.frameContext.buffer.width).toBe(8);
    expect(explorer.frameContext.buffer.height).toBe(4);
    expect(store.getState().params.width).toBe(8);
  });
});
