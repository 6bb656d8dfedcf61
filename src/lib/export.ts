import { writeFile } from "node:fs/promises";
import type { FrameSnapshot } from "@/fractals/render/frame-buffer";

export const DEFAULT_EXPORT_PATH = "out.ppm";

/**
 * Writes a buffer snapshot somewhere. The frame loop does not care about the
 * file format.
 */
export interface Exporter {
  export(snapshot: FrameSnapshot): Promise<string>;
}

/**
 * Encodes an RGBA snapshot as a binary PPM (P6) image, dropping alpha.
 */
export function encodePpm({ width, height, data }: FrameSnapshot): Buffer {
  const header = Buffer.from(`P6\n${width} ${height}\n255\n`, "ascii");
  const pixels = Buffer.alloc(width * height * 3);
  for (let src = 0, dst = 0; dst < pixels.length; src += 4, dst += 3) {
    pixels[dst] = data[src];
    pixels[dst + 1] = data[src + 1];
    pixels[dst + 2] = data[src + 2];
  }
  return Buffer.concat([header, pixels]);
}

/**
 * Writes every export to the same path, replacing the previous one.
 */
export class PpmExporter implements Exporter {
  constructor(readonly path: string = DEFAULT_EXPORT_PATH) {}

  async export(snapshot: FrameSnapshot): Promise<string> {
    await writeFile(this.path, encodePpm(snapshot));
    return this.path;
  }
}
