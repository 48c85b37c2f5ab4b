// Donation Sorter - Capture flow
// Reads the camera as fast as it delivers, storing each frame in the shared
// FrameSlot and offering it to the live preview. A missed read is not fatal:
// the loop waits briefly and tries again. A source that reports StreamEnded
// stops the loop for good.

import type { Frame, FrameSource } from "./types.js";
import type { FrameSlot } from "./controller-context.js";
import { CaptureMiss, StreamEnded, errorMessage } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";

export const DEFAULT_MISS_DELAY_MS = 20;

export interface CaptureLoopOptions {
  missDelayMs?: number;
  /** Called with every captured frame after it is stored. */
  onFrame?: (frame: Frame) => void;
  /** Called once when the source reports that its stream is gone. */
  onEnded?: (err: StreamEnded) => void;
  logger?: Logger;
}

export interface CaptureStats {
  frames: number;
  misses: number;
  lastMiss: string | null;
  /** Why capture stopped on its own, if it did. */
  ended: string | null;
}

export class CaptureLoop {
  private readonly source: FrameSource;
  private readonly slot: FrameSlot;
  private readonly missDelayMs: number;
  private readonly onFrame: ((frame: Frame) => void) | undefined;
  private readonly onEnded: ((err: StreamEnded) => void) | undefined;
  private readonly logger: Logger;

  private running = false;
  private loop: Promise<void> | null = null;
  private missStreak = 0;
  private readonly stats: CaptureStats = { frames: 0, misses: 0, lastMiss: null, ended: null };

  constructor(source: FrameSource, slot: FrameSlot, options: CaptureLoopOptions = {}) {
    this.source = source;
    this.slot = slot;
    this.missDelayMs = options.missDelayMs ?? DEFAULT_MISS_DELAY_MS;
    this.onFrame = options.onFrame;
    this.onEnded = options.onEnded;
    this.logger = options.logger ?? createConsoleLogger("Capture");
  }

  get isRunning(): boolean {
    return this.running;
  }

  getStats(): CaptureStats {
    return { ...this.stats };
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.loop = this.run();
  }

  /** Stops reading and resolves once the current read has returned. */
  async stop(): Promise<void> {
    this.running = false;
    await this.loop;
    this.loop = null;
  }

  private async run(): Promise<void> {
    while (this.running) {
      let frame: Frame | null = null;
      let miss: CaptureMiss | null = null;
      try {
        frame = await this.source.read();
      } catch (err) {
        if (err instanceof StreamEnded) {
          this.end(err);
          break;
        }
        miss = new CaptureMiss(`Camera read failed: ${errorMessage(err)}`);
      }
      if (!this.running) break;

      if (!frame) {
        this.recordMiss(miss ?? new CaptureMiss("Camera read returned no frame"));
        await new Promise((resolve) => setTimeout(resolve, this.missDelayMs));
        continue;
      }

      if (this.missStreak > 0) {
        this.logger.info(`Camera recovered after ${this.missStreak} missed reads`);
        this.missStreak = 0;
      }
      this.stats.frames++;
      this.slot.put(frame);
      try {
        this.onFrame?.(frame);
      } catch (err) {
        this.logger.error(`Frame listener failed: ${errorMessage(err)}`);
      }
    }
  }

  private end(err: StreamEnded): void {
    const wasRunning = this.running;
    this.running = false;
    this.stats.ended = err.message;
    this.logger.error(`Capture stopped: ${err.message}`);
    if (!wasRunning) return;
    try {
      this.onEnded?.(err);
    } catch (listenerErr) {
      this.logger.error(`Stream end listener failed: ${errorMessage(listenerErr)}`);
    }
  }

  private recordMiss(miss: CaptureMiss): void {
    this.stats.misses++;
    this.stats.lastMiss = miss.message;
    this.missStreak++;
    if (this.missStreak === 1) {
      this.logger.warn(`${miss.message}; retrying`);
    }
  }
}
