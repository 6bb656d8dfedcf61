import type { RGB } from "@/fractals/algorithms/coloring";

/**
 * Copy of a frame buffer handed to exporters.
 */
export type FrameSnapshot = {
  width: number;
  height: number;
  /** RGBA, 4 bytes per pixel, row-major */
  data: Uint8ClampedArray;
};

/**
 * Opaque RGBA pixel buffer the progressive renderer paints into.
 *
 * The buffer keeps its contents until a later fill overwrites them, so a
 * presenter that shows it every frame shows the refinement as it happens.
 */
export class FrameBuffer {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;

  constructor(width: number, height: number) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new RangeError(`FrameBuffer: invalid dimensions ${width}x${height}`);
    }
    this.width = width;
    this.height = height;
    this.data = new Uint8ClampedArray(width * height * 4);

    // start opaque black
    for (let i = 3; i < this.data.length; i += 4) {
      this.data[i] = 255;
    }
  }

  /**
   * Fills a rectangle with a solid color. The rectangle is clipped to the
   * buffer; anything entirely outside is ignored.
   */
  fillRect(x: number, y: number, w: number, h: number, [r, g, b]: RGB): void {
    const startX = Math.max(0, x);
    const startY = Math.max(0, y);
    const endX = Math.min(x + w, this.width);
    const endY = Math.min(y + h, this.height);

    for (let py = startY; py < endY; py++) {
      let index = (py * this.width + startX) * 4;
      for (let px = startX; px < endX; px++) {
        this.data[index] = r;
        this.data[index + 1] = g;
        this.data[index + 2] = b;
        this.data[index + 3] = 255;
        index += 4;
      }
    }
  }

  getPixel(x: number, y: number): [number, number, number, number] {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) {
      throw new RangeError(`FrameBuffer: pixel (${x}, ${y}) is outside ${this.width}x${this.height}`);
    }
    const index = (y * this.width + x) * 4;
    return [this.data[index], this.data[index + 1], this.data[index + 2], this.data[index + 3]];
  }

  snapshot(): FrameSnapshot {
    return { width: this.width, height: this.height, data: this.data.slice() };
  }
}
