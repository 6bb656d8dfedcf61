import type { FrameBuffer } from "@/fractals/render/frame-buffer";
import type { Presenter } from "@/fractals/render/frame-scheduler";

/**
 * Presenter for running without a display. Counts presents and logs whenever
 * the presented surface changes size.
 */
export class HeadlessPresenter implements Presenter {
  presented = 0;
  private surface: { width: number; height: number } | null = null;

  present(buffer: FrameBuffer): void {
    this.presented++;
    const { width, height } = buffer;
    if (this.surface === null || this.surface.width !== width || this.surface.height !== height) {
      this.surface = { width, height };
      console.log(`Presenting ${width}x${height} frames`);
    }
  }
}
