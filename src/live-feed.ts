// Donation Sorter - Live preview feed
// Keeps the most recent preview JPEG for the HTTP frame and stream endpoints.
// Encoding is throttled by a FrameSampler and never overlaps: a frame offered
// while one is still encoding is dropped.

import type { Frame, FrameEncoder } from "./types.js";
import { FrameSampler } from "./frame-sampler.js";
import { errorMessage } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";

export const DEFAULT_PREVIEW_FPS = 30;

export type JpegListener = (jpeg: Buffer) => void;

export interface LiveFeedOptions {
  maxFps?: number;
  logger?: Logger;
}

export class LiveFeed {
  private readonly encoder: FrameEncoder;
  private readonly sampler: FrameSampler;
  private readonly logger: Logger;
  private readonly listeners = new Set<JpegListener>();
  private latest: Buffer | null = null;
  private encoding: Promise<void> | null = null;
  private failures = 0;

  constructor(encoder: FrameEncoder, options: LiveFeedOptions = {}) {
    this.encoder = encoder;
    this.sampler = new FrameSampler(options.maxFps ?? DEFAULT_PREVIEW_FPS);
    this.logger = options.logger ?? createConsoleLogger("LiveFeed");
  }

  /** Newest preview JPEG, or null before the first frame is encoded. */
  latestJpeg(): Buffer | null {
    return this.latest;
  }

  /** Number of frames that failed to encode. */
  get encodeFailures(): number {
    return this.failures;
  }

  /** Offer a captured frame. Returns true if it was taken for encoding. */
  offer(frame: Frame): boolean {
    if (this.encoding) return false;
    if (!this.sampler.shouldSample(frame.capturedAt)) return false;

    this.encoding = this.encode(frame).finally(() => {
      this.encoding = null;
    });
    return true;
  }

  /** Resolves once any in-flight encode has finished. */
  async settled(): Promise<void> {
    await this.encoding;
  }

  subscribe(listener: JpegListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private async encode(frame: Frame): Promise<void> {
    let jpeg: Buffer;
    try {
      jpeg = await this.encoder.encodeJpeg(frame);
    } catch (err) {
      this.failures++;
      this.logger.warn(`Preview encode failed for frame #${frame.sequence}: ${errorMessage(err)}`);
      return;
    }
    this.latest = jpeg;
    for (const listener of this.listeners) {
      listener(jpeg);
    }
  }
}
