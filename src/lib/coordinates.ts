import type { Complex, ScreenPoint, ViewportParameters } from "@/fractals/mandelbrot/types";

/**
 * Height of the visible plane. The vertical span follows the aspect ratio of
 * the render target so the fractal is not stretched.
 */
export const imaginaryDomain = (params: ViewportParameters): number =>
  (params.realDomain * params.height) / params.width;

/**
 * Maps a pixel position to the complex point it represents.
 * The pixel at (width / 2, height / 2) maps to the viewport center.
 */
export const screenToWorld = (point: ScreenPoint, params: ViewportParameters): Complex => {
  const { center, width, height, realDomain } = params;

  const re = center.re + (realDomain * (point.x - width / 2)) / width;
  const im = center.im + (imaginaryDomain(params) * (point.y - height / 2)) / height;
  return { re, im };
};

/**
 * Inverse of screenToWorld. The result is fractional; callers that need a
 * pixel index floor it themselves.
 */
export const worldToScreen = (point: Complex, params: ViewportParameters): ScreenPoint => {
  const { center, width, height, realDomain } = params;

  const x = ((point.re - center.re) * width) / realDomain + width / 2;
  const y = ((point.im - center.im) * height) / imaginaryDomain(params) + height / 2;
  return { x, y };
};
