/**
 * Metrics for a single frame's share of a render.
 */
export interface FrameMetrics {
  frameIndex: number;
  advanceCalls: number;
  frameTime: number; // milliseconds
}

/**
 * Metrics for a complete render session, from viewport change to done.
 */
export interface RenderSessionMetrics {
  sessionId: string;
  startTime: number;
  endTime: number;
  duration: number; // milliseconds
  totalSteps: number;
  completedSteps: number;
  frames: number;
  totalPixels: number;
  pixelsPerSecond: number;
  averageFrameTime: number;
}

/**
 * Active render session tracking.
 */
interface RenderSession {
  sessionId: string;
  startTime: number;
  totalSteps: number;
  completedSteps: number;
  frameMetrics: FrameMetrics[];
  totalPixels: number;
}

/**
 * Performance monitor for progressive renders.
 *
 * A session covers one viewport: it starts when the render is (re)started and
 * ends when the renderer reports done. A session whose viewport changed before
 * it finished is cancelled and leaves no history.
 *
 * Usage:
 * ```typescript
 * const monitor = new PerformanceMonitor();
 * const sessionId = monitor.startRender(advanceCallsToCompletion(w, h), w * h);
 *
 * // after each frame:
 * monitor.recordFrame(sessionId, report.advanceCalls, frameTime);
 *
 * const metrics = monitor.endRender(sessionId);
 * console.log(`Render took ${metrics.duration}ms over ${metrics.frames} frames`);
 * ```
 */
export class PerformanceMonitor {
  private activeSessions = new Map<string, RenderSession>();
  private completedSessions: RenderSessionMetrics[] = [];
  private maxHistorySize = 50; // Keep last 50 sessions
  private readonly now: () => number;

  constructor(now: () => number = () => performance.now()) {
    this.now = now;
  }

  /**
   * Starts a new render session.
   *
   * @param totalSteps - advance() calls the render will take
   * @param totalPixels - width * height of the render target
   * @returns Session ID for tracking
   */
  startRender(totalSteps: number, totalPixels: number): string {
    const sessionId = `render-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;

    this.activeSessions.set(sessionId, {
      sessionId,
      startTime: this.now(),
      totalSteps,
      completedSteps: 0,
      frameMetrics: [],
      totalPixels,
    });

    return sessionId;
  }

  /**
   * Records one frame of work on a session.
   */
  recordFrame(sessionId: string, advanceCalls: number, frameTime: number): void {
    const session = this.activeSessions.get(sessionId);
    if (!session) {
      console.warn(`PerformanceMonitor: Unknown session ${sessionId}`);
      return;
    }

    session.completedSteps += advanceCalls;
    session.frameMetrics.push({
      frameIndex: session.frameMetrics.length,
      advanceCalls,
      frameTime,
    });
  }

  /**
   * Ends a render session and calculates final metrics.
   */
  endRender(sessionId: string): RenderSessionMetrics {
    const session = this.activeSessions.get(sessionId);
    if (!session) {
      throw new Error(`PerformanceMonitor: Unknown session ${sessionId}`);
    }

    const endTime = this.now();
    const duration = endTime - session.startTime;
    const frames = session.frameMetrics.length;
    const averageFrameTime = frames > 0 ? session.frameMetrics.reduce((sum, m) => sum + m.frameTime, 0) / frames : 0;
    const pixelsPerSecond = duration > 0 ? (session.totalPixels / duration) * 1000 : 0;

    const metrics: RenderSessionMetrics = {
      sessionId,
      startTime: session.startTime,
      endTime,
      duration,
      totalSteps: session.totalSteps,
      completedSteps: session.completedSteps,
      frames,
      totalPixels: session.totalPixels,
      pixelsPerSecond,
      averageFrameTime,
    };

    // Move to history
    this.completedSessions.push(metrics);
    if (this.completedSessions.length > this.maxHistorySize) {
      this.completedSessions.shift();
    }

    this.activeSessions.delete(sessionId);

    return metrics;
  }

  /**
   * Drops an unfinished session, e.g. because the viewport changed.
   *
   * @returns whether the session was active
   */
  cancelRender(sessionId: string): boolean {
    return this.activeSessions.delete(sessionId);
  }

  /**
   * Gets current progress of an active session.
   *
   * @returns Progress percentage (0-100) or null if session not found
   */
  getProgress(sessionId: string): number | null {
    const session = this.activeSessions.get(sessionId);
    if (!session) {
      return null;
    }

    return session.totalSteps > 0 ? Math.min(100, (session.completedSteps / session.totalSteps) * 100) : 0;
  }

  getLastRenderMetrics(): RenderSessionMetrics | null {
    if (this.completedSessions.length === 0) {
      return null;
    }
    return this.completedSessions[this.completedSessions.length - 1];
  }

  /**
   * Gets summary statistics across all completed renders.
   */
  getStats(): {
    totalRenders: number;
    averageDuration: number;
    averagePixelsPerSecond: number;
    averageFrames: number;
  } {
    if (this.completedSessions.length === 0) {
      return {
        totalRenders: 0,
        averageDuration: 0,
        averagePixelsPerSecond: 0,
        averageFrames: 0,
      };
    }

    const count = this.completedSessions.length;
    const totalDuration = this.completedSessions.reduce((sum, m) => sum + m.duration, 0);
    const totalPixelsPerSecond = this.completedSessions.reduce((sum, m) => sum + m.pixelsPerSecond, 0);
    const totalFrames = this.completedSessions.reduce((sum, m) => sum + m.frames, 0);

    return {
      totalRenders: count,
      averageDuration: totalDuration / count,
      averagePixelsPerSecond: totalPixelsPerSecond / count,
      averageFrames: totalFrames / count,
    };
  }

  getHistory(): RenderSessionMetrics[] {
    return [...this.completedSessions];
  }

  clearHistory(): void {
    this.completedSessions = [];
  }

  /**
   * Sets the maximum number of sessions to keep in history.
   */
  setMaxHistorySize(size: number): void {
    this.maxHistorySize = size;
    while (this.completedSessions.length > this.maxHistorySize) {
      this.completedSessions.shift();
    }
  }
}
