// ABOUTME: Mandelbrot set escape-time evaluator
// ABOUTME: Counts iterations of z -> z² + c until |z|² reaches 4

import type { EscapeTimeAlgorithm, IterationResult } from "./base";

/**
 * Squared escape radius. Once |z|² reaches this the orbit is known to diverge.
 */
export const ESCAPE_RADIUS_SQUARED = 4;

/**
 * Mandelbrot Set algorithm implementation.
 *
 * For each sample point c the orbit starts at z₀ = c (one step ahead of the
 * textbook z₀ = 0) and iterates
 *   z_{n+1} = z_n² + c
 *
 * The result is the smallest n with |z_n|² >= 4, or maxIter when the orbit
 * stays bounded that long. A point on the escape circle such as 2 + 0i
 * therefore returns 0.
 */
export class MandelbrotAlgorithm implements EscapeTimeAlgorithm {
  readonly name = "Mandelbrot Set";
  readonly description = "The classic Mandelbrot set: z → z² + c, starting from z = c";

  computePoint(real: number, imag: number, maxIter: number): IterationResult {
    let zr = real;
    let zi = imag;
    let iter = 0;

    while (zr * zr + zi * zi < ESCAPE_RADIUS_SQUARED && iter < maxIter) {
      // (zr + zi*i)² = zr² - zi² + 2*zr*zi*i
      const newZr = zr * zr - zi * zi + real;
      zi = 2 * zr * zi + imag;
      zr = newZr;
      iter++;
    }

    return { iter, zr, zi };
  }
}

/**
 * Default instance of the Mandelbrot algorithm for convenient importing.
 */
export const mandelbrotAlgorithm = new MandelbrotAlgorithm();
