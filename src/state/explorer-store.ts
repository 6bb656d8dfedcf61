import { createStore } from "zustand/vanilla";
import type { ViewportParameters } from "@/fractals/mandelbrot/types";
import { advanceCallsToCompletion, INITIAL_BLOCK_SIZE, type RenderProgress } from "@/fractals/render/progressive-renderer";

export const DEFAULT_VIEWPORT: ViewportParameters = {
  center: { re: 0, im: 0 },
  width: 800,
  height: 600,
  realDomain: 4,
  maxIter: 64,
};

export type RenderStatus = {
  done: boolean;
  /** Block size of the pass in progress, 0 once done */
  blockSize: number;
  /** Share of the render's advance() calls made so far, 0..1 */
  fraction: number;
};

type State = {
  params: ViewportParameters;
  renderProgress: RenderStatus;
  /** advance() calls made for the current viewport */
  advanceCalls: number;
  frameCount: number;
  lastFrameTime: number;
};

type Actions = {
  /** Replaces the viewport and starts a fresh render status */
  setParams: (params: ViewportParameters) => void;
  setRenderProgress: (progress: RenderProgress, advanceCalls: number) => void;
  recordFrame: (frameTime: number) => void;
  reset: () => void;
};

export type ExplorerState = State & Actions;

const initialStatus: RenderStatus = { done: false, blockSize: INITIAL_BLOCK_SIZE, fraction: 0 };

export const initialExplorerState = (params: ViewportParameters = DEFAULT_VIEWPORT): State => ({
  params,
  renderProgress: initialStatus,
  advanceCalls: 0,
  frameCount: 0,
  lastFrameTime: 0,
});

/**
 * Creates the observable state of one explorer. Each explorer gets its own
 * store so several can run side by side (and in tests).
 */
export const createExplorerStore = (params: ViewportParameters = DEFAULT_VIEWPORT) =>
  createStore<ExplorerState>()((set) => ({
    ...initialExplorerState(params),

    setParams: (params) => set({ params, renderProgress: initialStatus, advanceCalls: 0 }),
    setRenderProgress: (progress, advanceCalls) =>
      set((state) => {
        if (progress.kind === "done") {
          return { advanceCalls, renderProgress: { done: true, blockSize: 0, fraction: 1 } };
        }
        const total = advanceCallsToCompletion(state.params.width, state.params.height);
        return {
          advanceCalls,
          renderProgress: { done: false, blockSize: progress.blockSize, fraction: Math.min(1, advanceCalls / total) },
        };
      }),
    recordFrame: (lastFrameTime) => set((state) => ({ lastFrameTime, frameCount: state.frameCount + 1 })),
    reset: () => set(initialExplorerState(params)),
  }));

export type ExplorerStore = ReturnType<typeof createExplorerStore>;
