// ABOUTME: Resumable coarse-to-fine block renderer
// ABOUTME: Each advance() paints one block or does one grid bookkeeping step

import type { EscapeTimeAlgorithm } from "@/fractals/algorithms/base";
import { grayscaleColorScheme } from "@/fractals/algorithms/coloring";
import { mandelbrotAlgorithm } from "@/fractals/algorithms/mandelbrot";
import type { ViewportParameters } from "@/fractals/mandelbrot/types";
import { screenToWorld } from "@/lib/coordinates";
import type { FrameBuffer } from "./frame-buffer";

/**
 * Edge length of the blocks painted in the first, coarsest pass.
 */
export const INITIAL_BLOCK_SIZE = 128;

export type ScanningProgress = {
  kind: "scanning";
  /** Block column, in block units */
  indexX: number;
  /** Block row, in block units */
  indexY: number;
  blockSize: number;
};

export type DoneProgress = { kind: "done" };

/**
 * Where the renderer is in its traversal. `done` is absorbing: once reached,
 * advance() returns it unchanged until the viewport changes and the caller
 * starts over from initialRenderProgress().
 */
export type RenderProgress = ScanningProgress | DoneProgress;

/**
 * A block to paint: its top-left pixel and edge length.
 */
export type BlockPaint = {
  x: number;
  y: number;
  size: number;
};

export type Transition = {
  next: RenderProgress;
  paint: BlockPaint | null;
};

export const initialRenderProgress = (blockSize: number = INITIAL_BLOCK_SIZE): RenderProgress => ({
  kind: "scanning",
  indexX: 0,
  indexY: 0,
  blockSize,
});

export const isDone = (progress: RenderProgress): progress is DoneProgress => progress.kind === "done";

/**
 * The transition function of the traversal. Pure: decides what the next call
 * does without touching any buffer.
 *
 * The edge checks are strict, so the block whose top-left corner lies exactly
 * on the right or bottom edge is still visited. Its paint is clipped away, but
 * it counts as a step and shows up in advanceCallsToCompletion().
 */
export function transition(params: ViewportParameters, progress: RenderProgress): Transition {
  if (progress.kind === "done") {
    return { next: progress, paint: null };
  }

  const { indexX, indexY, blockSize } = progress;
  const screenTlX = indexX * blockSize;
  const screenTlY = indexY * blockSize;

  // row exhausted: wrap to the start of the next row
  if (screenTlX > params.width) {
    return { next: { kind: "scanning", indexX: 0, indexY: indexY + 1, blockSize }, paint: null };
  }

  // grid exhausted: start the next, finer pass
  if (screenTlY > params.height) {
    return {
      next: { kind: "scanning", indexX: 0, indexY: 0, blockSize: Math.floor(blockSize / 2) },
      paint: null,
    };
  }

  if (blockSize < 1) {
    return { next: { kind: "done" }, paint: null };
  }

  return {
    next: { kind: "scanning", indexX: indexX + 1, indexY, blockSize },
    paint: { x: screenTlX, y: screenTlY, size: blockSize },
  };
}

/**
 * Samples the block at its center pixel and fills it with the resulting gray.
 */
export function paintBlock(
  buffer: FrameBuffer,
  params: ViewportParameters,
  block: BlockPaint,
  algorithm: EscapeTimeAlgorithm = mandelbrotAlgorithm
): void {
  const half = Math.floor(block.size / 2);
  const c = screenToWorld({ x: block.x + half, y: block.y + half }, params);
  const { iter } = algorithm.computePoint(c.re, c.im, params.maxIter);
  buffer.fillRect(block.x, block.y, block.size, block.size, grayscaleColorScheme(iter, params.maxIter));
}

/**
 * Performs one unit of progressive rendering and returns the new progress.
 * The buffer must have the viewport's dimensions.
 */
export function advance(
  buffer: FrameBuffer,
  params: ViewportParameters,
  progress: RenderProgress,
  algorithm: EscapeTimeAlgorithm = mandelbrotAlgorithm
): RenderProgress {
  const { next, paint } = transition(params, progress);
  if (paint) {
    paintBlock(buffer, params, paint, algorithm);
  }
  return next;
}

/**
 * Number of advance() calls a fresh render of a width x height target takes
 * to reach `done`, the final call included.
 *
 * Per pass with block size b there are floor(height / b) + 1 rows, each with
 * floor(width / b) + 1 painted blocks and one wrap, followed by one halving.
 */
export function advanceCallsToCompletion(
  width: number,
  height: number,
  initialBlockSize: number = INITIAL_BLOCK_SIZE
): number {
  let calls = 1;
  for (let b = initialBlockSize; b >= 1; b = Math.floor(b / 2)) {
    const rows = Math.floor(height / b) + 1;
    const stepsPerRow = Math.floor(width / b) + 2;
    calls += rows * stepsPerRow + 1;
  }
  return calls;
}

/**
 * Drains a fresh render into the buffer without any time budget.
 *
 * @returns the number of advance() calls made
 */
export function renderToCompletion(
  buffer: FrameBuffer,
  params: ViewportParameters,
  algorithm: EscapeTimeAlgorithm = mandelbrotAlgorithm
): number {
  let progress = initialRenderProgress();
  let calls = 0;
  while (!isDone(progress)) {
    progress = advance(buffer, params, progress, algorithm);
    calls++;
  }
  return calls;
}
