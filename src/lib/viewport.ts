// ABOUTME: Applies one frame of user input to the viewport
// ABOUTME: Pans, zooms, iteration steps and resizes, followed by validation

import type { ViewportParameters } from "@/fractals/mandelbrot/types";

/** Fraction of the visible real span moved per frame while a pan key is held */
export const PAN_FRACTION = 0.02;
/** realDomain multiplier per frame while zoom-in is held (zoom-out divides) */
export const ZOOM_FACTOR = 0.95;
export const MIN_ITER = 1;
export const MAX_ITER_LIMIT = 1 << 20;

/**
 * Intents that act on every frame for as long as their key is held.
 */
export type HeldIntent = "panUp" | "panDown" | "panLeft" | "panRight" | "zoomIn" | "zoomOut";

/**
 * Intents that act once per key press.
 */
export type PressedIntent = "iterUp" | "iterDown" | "export";

export type Resize = {
  width: number;
  height: number;
};

/**
 * Everything the input collector reports for one frame.
 */
export type FrameInput = {
  held: ReadonlySet<HeldIntent>;
  pressed: readonly PressedIntent[];
  resize?: Resize;
  quit: boolean;
};

export const idleFrameInput = (): FrameInput => ({ held: new Set(), pressed: [], quit: false });

export class ViewportError extends Error {
  constructor(
    readonly field: keyof ViewportParameters,
    message: string
  ) {
    super(`Viewport: ${message}`);
    this.name = "ViewportError";
  }
}

export const viewportEquals = (a: ViewportParameters, b: ViewportParameters): boolean =>
  a.center.re === b.center.re &&
  a.center.im === b.center.im &&
  a.width === b.width &&
  a.height === b.height &&
  a.realDomain === b.realDomain &&
  a.maxIter === b.maxIter;

const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

/**
 * Throws a ViewportError for values the renderer cannot work with and clamps
 * maxIter into [MIN_ITER, MAX_ITER_LIMIT].
 */
export function validateViewport(params: ViewportParameters): ViewportParameters {
  const { center, width, height, realDomain, maxIter } = params;

  if (!Number.isInteger(width) || width <= 0) {
    throw new ViewportError("width", `width must be a positive integer, got ${width}`);
  }
  if (!Number.isInteger(height) || height <= 0) {
    throw new ViewportError("height", `height must be a positive integer, got ${height}`);
  }
  if (!Number.isFinite(realDomain) || realDomain <= 0) {
    throw new ViewportError("realDomain", `realDomain must be a positive number, got ${realDomain}`);
  }
  if (!Number.isFinite(center.re) || !Number.isFinite(center.im)) {
    throw new ViewportError("center", `center must be finite, got ${center.re}, ${center.im}`);
  }
  if (Number.isNaN(maxIter)) {
    throw new ViewportError("maxIter", "maxIter must be a number");
  }

  const clampedIter = clamp(Math.floor(maxIter), MIN_ITER, MAX_ITER_LIMIT);
  return clampedIter === maxIter ? params : { ...params, maxIter: clampedIter };
}

/**
 * Builds the viewport for this frame from the previous one. The input is
 * applied in a fixed order: iteration steps, resize, pans, then zoom, so
 * pans move by a fraction of the span shown at the start of the frame.
 */
export function applyFrameInput(params: ViewportParameters, input: FrameInput): ViewportParameters {
  let { maxIter, width, height, realDomain } = params;
  let { re, im } = params.center;

  for (const intent of input.pressed) {
    if (intent === "iterDown") {
      maxIter = Math.max(Math.floor(maxIter / 2), MIN_ITER);
    } else if (intent === "iterUp") {
      maxIter = Math.min(maxIter * 2, MAX_ITER_LIMIT);
    }
  }

  if (input.resize) {
    ({ width, height } = input.resize);
  }

  const { held } = input;
  if (held.has("panUp")) im -= PAN_FRACTION * realDomain;
  if (held.has("panDown")) im += PAN_FRACTION * realDomain;
  if (held.has("panLeft")) re -= PAN_FRACTION * realDomain;
  if (held.has("panRight")) re += PAN_FRACTION * realDomain;
  if (held.has("zoomIn")) realDomain *= ZOOM_FACTOR;
  if (held.has("zoomOut")) realDomain /= ZOOM_FACTOR;

  return validateViewport({ center: { re, im }, width, height, realDomain, maxIter });
}

/**
 * Supplies one FrameInput per frame, e.g. from a keyboard or a script.
 */
export interface InputSource {
  poll(): FrameInput;
}
