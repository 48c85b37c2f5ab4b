// Donation Sorter - Controller Context
// The only state shared across the capture, tick and
// worker flows. Created once at startup and handed to each flow explicitly.

import type { Frame } from "./types.js";
import { SnapshotPublisher } from "./snapshot-publisher.js";

/**
 * Latest-frame handoff between the capture flow and its readers.
 * Last write wins; readers get the newest frame object, which is never
 * mutated after it is stored.
 */
export class FrameSlot {
  private latest: Frame | null = null;
  private writes = 0;

  put(frame: Frame): void {
    this.latest = frame;
    this.writes++;
  }

  get(): Frame | null {
    return this.latest;
  }

  /** Total frames stored since startup. */
  get writeCount(): number {
    return this.writes;
  }
}

/**
 * Single-flight guard. A plain flag, not a queue: a caller that fails to
 * acquire is expected to drop its request.
 */
export class SingleFlight {
  private held = false;

  tryAcquire(): boolean {
    if (this.held) return false;
    this.held = true;
    return true;
  }

  release(): void {
    this.held = false;
  }

  get busy(): boolean {
    return this.held;
  }
}

export interface ControllerContext {
  frameSlot: FrameSlot;
  flight: SingleFlight;
  publisher: SnapshotPublisher;
}

export function createControllerContext(now?: () => Date): ControllerContext {
  return {
    frameSlot: new FrameSlot(),
    flight: new SingleFlight(),
    publisher: new SnapshotPublisher(now),
  };
}
