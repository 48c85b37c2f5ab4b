// Donation Sorter - Snapshot Publisher
// The latest pipeline status for status displays.
//
// Each publish replaces the whole snapshot with a new frozen object, so a
// reader holds either the previous snapshot or the next one, never a mix.
// There is no history: a slow reader just sees the most recent value.

import type { CycleResult, PipelineSnapshot, SnapshotMode } from "./types.js";
import { PipelineMode } from "./types.js";

export type SnapshotListener = (snapshot: PipelineSnapshot) => void;

export interface PublishExtras {
  motionArea?: number;
  cycleId?: string | null;
}

export class SnapshotPublisher {
  private current: PipelineSnapshot;
  private readonly listeners = new Set<SnapshotListener>();
  private readonly now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
    this.current = Object.freeze({
      mode: PipelineMode.IDLE,
      statusText: "Pipeline not started",
      lastResult: null,
      motionArea: 0,
      cycleId: null,
      updatedAt: this.now().toISOString(),
    });
  }

  /**
   * Overwrite the snapshot. `motionArea` and `cycleId` carry over from the
   * previous snapshot unless given.
   */
  publish(
    mode: SnapshotMode,
    statusText: string,
    lastResult: CycleResult | null,
    extras: PublishExtras = {},
  ): PipelineSnapshot {
    const previous = this.current;
    const next: PipelineSnapshot = Object.freeze({
      mode,
      statusText,
      lastResult: lastResult ? Object.freeze({ ...lastResult }) : null,
      motionArea: extras.motionArea ?? previous.motionArea,
      cycleId: extras.cycleId !== undefined ? extras.cycleId : previous.cycleId,
      updatedAt: this.now().toISOString(),
    });
    this.current = next;

    for (const listener of this.listeners) {
      listener(next);
    }
    return next;
  }

  read(): PipelineSnapshot {
    return this.current;
  }

  /** Returns an unsubscribe function. */
  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
