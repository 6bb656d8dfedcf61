// ABOUTME: Value types describing what part of the complex plane is on screen
// ABOUTME: ViewportParameters is compared by value every frame to detect changes

/**
 * Complex number in standard double precision.
 */
export type Complex = {
  re: number;
  im: number;
};

/**
 * The current view: which point of the plane sits at the screen center, how
 * large the render target is, how wide a slice of the real axis is visible and
 * how many iterations a point gets before it counts as inside the set.
 */
export type ViewportParameters = {
  center: Complex;
  /** Render target width in pixels */
  width: number;
  /** Render target height in pixels */
  height: number;
  /** Width of the visible plane along the real axis. Smaller is more zoomed in. */
  realDomain: number;
  maxIter: number;
};

export type ScreenPoint = {
  x: number;
  y: number;
};
