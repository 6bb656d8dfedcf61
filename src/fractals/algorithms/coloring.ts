export type RGB = [number, number, number];

/**
 * Maps an escape count to a gray level: points that never escaped are white,
 * points that escape immediately are black.
 *
 * brightness = floor(255 * iter / maxIter)
 */
export function grayscaleColorScheme(iter: number, maxIter: number): RGB {
  const brightness = Math.floor((255 * iter) / maxIter);
  return [brightness, brightness, brightness];
}
