/**
 * Result of computing iterations for a single point in the complex plane.
 */
export interface IterationResult {
  /** Number of iterations before escape (or maxIter if the point never escaped) */
  iter: number;
  /** Real component of final z value */
  zr: number;
  /** Imaginary component of final z value */
  zi: number;
}

/**
 * Interface for escape-time evaluators. The progressive renderer only depends
 * on this, so a different fractal or an instrumented evaluator can be swapped in.
 */
export interface EscapeTimeAlgorithm {
  /** Human-readable name of the algorithm (e.g., "Mandelbrot Set") */
  readonly name: string;

  readonly description?: string;

  /**
   * Computes the escape-time iteration count for a point in the complex plane.
   *
   * @param real - Real component of the sample point
   * @param imag - Imaginary component of the sample point
   * @param maxIter - Upper bound on the returned iteration count
   */
  computePoint(real: number, imag: number, maxIter: number): IterationResult;
}
