/**
 * Rate limiter for the live preview: accepts the first frame in each
 * interval and skips the rest. Timestamps are in milliseconds.
 */

export class FrameSampler {
  private readonly intervalMs: number;
  private lastSampledAt: number;

  constructor(maxFps: number) {
    if (!Number.isFinite(maxFps) || maxFps <= 0) {
      throw new Error(`Invalid frame rate: ${maxFps}`);
    }
    this.intervalMs = 1000 / maxFps;
    this.lastSampledAt = -Infinity;
  }

  /**
   * Returns true if this frame should be processed.
   * The first frame is always sampled (lastSampledAt starts at -Infinity).
   */
  shouldSample(timestampMs: number): boolean {
    if (timestampMs - this.lastSampledAt >= this.intervalMs) {
      this.lastSampledAt = timestampMs;
      return true;
    }
    return false;
  }
}
