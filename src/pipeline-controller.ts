// Donation Sorter - Pipeline Controller
// The detection → classification → actuation state machine.
//
// Ticks are synchronous and cheap: each one takes the freshest frame, runs the
// motion detector (only while watching or settling) and moves the state
// machine. Classification, logging and the
// arm run in a worker promise that the tick loop never awaits. At most one
// worker exists at a time (single-flight guard), and every cycle ends in a
// cooldown whether it succeeded or failed, so an error can never leave the
// pipeline stuck.

import { v4 as uuidv4 } from "uuid";
import { PipelineMode } from "./types.js";
import type {
  Actuator,
  Category,
  ClassificationResult,
  Classifier,
  ControllerConfig,
  CycleResult,
  DonationRecord,
  Frame,
  FrameEncoder,
  ImageStore,
  RecordSink,
} from "./types.js";
import type { ControllerContext } from "./controller-context.js";
import { MotionDetector, toGray, type PreparedFrame } from "./motion-detector.js";
import { DEFAULT_FALLBACK_CATEGORY } from "./category.js";
import {
  ActuationFailure,
  ClassificationFailure,
  EncodeFailure,
  PipelineError,
  errorMessage,
} from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";

// ─── Defaults ───────────────────────────────────────────────────────────────────

export const DEFAULT_CONTROLLER_CONFIG: ControllerConfig = {
  triggerMode: "motion",
  actuationEnabled: true,
  warmupFrames: 60, // let the camera auto-expose
  settleTimeMs: 1500,
  cooldownMs: 5000,
  tickIntervalMs: 50,
  fallbackCategory: DEFAULT_FALLBACK_CATEGORY,
};

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface PipelineControllerDeps {
  context: ControllerContext;
  classifier: Classifier;
  encoder: FrameEncoder;
  recordSink: RecordSink;
  imageStore?: ImageStore;
  /** Required when actuation is enabled. */
  actuator?: Actuator;
  detector?: MotionDetector;
  logger?: Logger;
  /** Milliseconds clock used for settle and cooldown timing. */
  clock?: () => number;
  createCycleId?: () => string;
}

// ─── Results ────────────────────────────────────────────────────────────────────

export type CycleStatus =
  | "completed" // classified, logged and (if enabled) sorted
  | "partial" // logged, but the arm failed
  | "failed"; // nothing logged

export interface CycleOutcome {
  cycleId: string;
  status: CycleStatus;
  classification: ClassificationResult | null;
  record: DonationRecord | null;
  error: string | null;
}

export type TriggerRejection = "busy" | "no_frame" | "warming_up" | "stopped";

export type TriggerResult =
  | { accepted: true; cycleId: string; cycle: Promise<CycleOutcome> }
  | { accepted: false; reason: TriggerRejection };

export interface ControllerStats {
  framesProcessed: number;
  cyclesDispatched: number;
  triggersRejected: number;
}

// ─── PipelineController Class ───────────────────────────────────────────────────

export class PipelineController {
  private readonly config: ControllerConfig;
  private readonly context: ControllerContext;
  private readonly deps: PipelineControllerDeps;
  private readonly detector: MotionDetector;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly createCycleId: () => string;

  private currentMode: PipelineMode = PipelineMode.IDLE;
  private started = false;
  private stopped = false;
  private tickTimer: ReturnType<typeof setInterval> | null = null;

  // Tick state
  private warmupFramesSeen = 0;
  private lastFrame: Frame | null = null;
  private previous: PreparedFrame | null = null;
  private motionStoppedAt: number | null = null;
  private cooldownStartedAt: number | null = null;

  // Cycle state
  private inFlight: Promise<CycleOutcome> | null = null;
  private lastResult: CycleResult | null = null;
  private readonly stats: ControllerStats = {
    framesProcessed: 0,
    cyclesDispatched: 0,
    triggersRejected: 0,
  };

  constructor(config: Partial<ControllerConfig>, deps: PipelineControllerDeps) {
    this.config = { ...DEFAULT_CONTROLLER_CONFIG, ...config };
    this.deps = deps;
    this.context = deps.context;
    this.detector = deps.detector ?? new MotionDetector();
    this.logger = deps.logger ?? createConsoleLogger("Controller");
    this.clock = deps.clock ?? Date.now;
    this.createCycleId = deps.createCycleId ?? uuidv4;

    if (this.config.actuationEnabled && !deps.actuator) {
      throw new Error("Actuation is enabled but no actuator was provided");
    }
  }

  get mode(): PipelineMode {
    return this.currentMode;
  }

  /** True while a classify/sort cycle is in flight. */
  get processing(): boolean {
    return this.context.flight.busy;
  }

  /** The in-flight cycle, or null when idle between cycles. */
  get currentCycle(): Promise<CycleOutcome> | null {
    return this.inFlight;
  }

  getStats(): ControllerStats {
    return { ...this.stats };
  }

  /**
   * Enter WARMUP and, when tickIntervalMs > 0, start polling the frame slot.
   * A tickIntervalMs of 0 leaves ticking to the caller.
   */
  start(): void {
    if (this.stopped) {
      throw new Error("Controller has been stopped and cannot be restarted");
    }
    if (this.started) return;
    this.started = true;

    this.logger.info(
      `Starting: trigger=${this.config.triggerMode}, arm=${this.config.actuationEnabled ? "enabled" : "disabled"}, ` +
        `settle=${this.config.settleTimeMs}ms, cooldown=${this.config.cooldownMs}ms`,
    );
    this.setMode(PipelineMode.WARMUP, "Warming up camera...");

    if (this.config.tickIntervalMs > 0) {
      this.tickTimer = setInterval(() => this.tickLatest(), this.config.tickIntervalMs);
    }
  }

  /**
   * Enter IDLE for good. An in-flight worker is left to finish, but its
   * results are no longer published.
   */
  stop(statusText = "Pipeline stopped"): void {
    if (this.stopped) return;
    this.stopped = true;
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = null;
    }
    this.currentMode = PipelineMode.IDLE;
    this.context.publisher.publish(PipelineMode.IDLE, statusText, this.lastResult);
    this.logger.info(`Stopped: ${statusText}`);
  }

  /**
   * Timer callback: tick on the newest frame if it has not been seen yet.
   * Without a new frame only the cooldown clock advances.
   */
  tickLatest(): void {
    const frame = this.context.frameSlot.get();
    try {
      if (frame && frame !== this.lastFrame) {
        this.tick(frame);
      } else if (frame && this.started && !this.stopped) {
        this.expireCooldown(frame, this.clock());
      }
    } catch (err) {
      this.logger.error(`Tick failed: ${errorMessage(err)}`);
    }
  }

  /** Advance the state machine by one frame. Returns the resulting mode. */
  tick(frame: Frame, now: number = this.clock()): PipelineMode {
    if (!this.started || this.stopped) return this.currentMode;

    this.lastFrame = frame;
    this.stats.framesProcessed++;

    switch (this.currentMode) {
      case PipelineMode.WARMUP: {
        this.warmupFramesSeen++;
        if (this.warmupFramesSeen >= this.config.warmupFrames) {
          this.enterWatching(frame);
        }
        break;
      }

      case PipelineMode.WATCHING: {
        if (this.config.triggerMode !== "motion") break;
        const current = this.detector.prepare(toGray(frame));
        const sample = this.previous
          ? this.detector.compare(this.previous, current)
          : { isMotion: false, area: 0 };
        this.previous = current;
        if (sample.isMotion) {
          this.motionStoppedAt = null;
          this.setMode(
            PipelineMode.SETTLING,
            `Item detected, settling... (area=${sample.area})`,
            { motionArea: sample.area },
          );
        }
        break;
      }

      case PipelineMode.SETTLING: {
        const current = this.detector.prepare(toGray(frame));
        const sample = this.previous
          ? this.detector.compare(this.previous, current)
          : { isMotion: false, area: 0 };
        this.previous = current;
        if (sample.isMotion) {
          this.motionStoppedAt = null; // still moving
        } else if (this.motionStoppedAt === null) {
          this.motionStoppedAt = now;
        } else if (now - this.motionStoppedAt >= this.config.settleTimeMs) {
          if (!this.dispatch(frame)) {
            this.logger.warn("Settled item dropped: a cycle is already in flight");
            this.enterCooldown(now, PipelineMode.COOLDOWN, "Busy - cooling down");
          }
        }
        break;
      }

      case PipelineMode.COOLDOWN:
      case PipelineMode.ERROR: {
        this.expireCooldown(frame, now);
        break;
      }

      // CLASSIFYING / SORTING: the worker owns the transition out.
      default:
        break;
    }

    return this.currentMode;
  }

  /**
   * Manual trigger: classify the newest frame now. Rejected, never queued,
   * while another cycle is in flight.
   */
  trigger(): TriggerResult {
    if (!this.started || this.stopped) {
      return { accepted: false, reason: "stopped" };
    }
    if (this.currentMode === PipelineMode.WARMUP) {
      return { accepted: false, reason: "warming_up" };
    }
    const frame = this.context.frameSlot.get();
    if (!frame) {
      return { accepted: false, reason: "no_frame" };
    }
    const dispatched = this.dispatch(frame);
    if (!dispatched) {
      this.logger.warn("Trigger rejected: already processing");
      return { accepted: false, reason: "busy" };
    }
    return { accepted: true, ...dispatched };
  }

  // ─── Cycle dispatch ───────────────────────────────────────────────────────────

  private dispatch(frame: Frame): { cycleId: string; cycle: Promise<CycleOutcome> } | null {
    if (!this.context.flight.tryAcquire()) {
      this.stats.triggersRejected++;
      return null;
    }

    const cycleId = this.createCycleId();
    this.stats.cyclesDispatched++;
    this.motionStoppedAt = null;
    this.cooldownStartedAt = null;
    this.setMode(PipelineMode.CLASSIFYING, "Classifying item...", { cycleId });
    this.logger.info(`Cycle ${cycleId} dispatched (frame #${frame.sequence})`);

    const cycle = this.runCycle(cycleId, frame).finally(() => {
      this.context.flight.release();
      if (this.inFlight === cycle) this.inFlight = null;
    });
    this.inFlight = cycle;
    return { cycleId, cycle };
  }

  /** Worker flow. Never rejects: every failure becomes an outcome. */
  private async runCycle(cycleId: string, frame: Frame): Promise<CycleOutcome> {
    const { classifier, encoder, recordSink, imageStore } = this.deps;
    let classification: ClassificationResult | null = null;
    let record: DonationRecord;

    try {
      const jpeg = await encoder.encodeJpeg(frame).catch((err: unknown) => {
        throw err instanceof PipelineError
          ? err
          : new EncodeFailure(`Failed to encode frame: ${errorMessage(err)}`, { cause: err });
      });

      classification = await classifier.classify(jpeg).catch((err: unknown) => {
        throw err instanceof PipelineError
          ? err
          : new ClassificationFailure(errorMessage(err), { cause: err });
      });

      const imageReference = imageStore ? await imageStore.save(cycleId, jpeg) : null;
      record = await recordSink.append({
        category: classification.category,
        itemName: classification.itemName,
        estimatedWeightLbs: classification.estimatedWeightLbs,
        estimatedExpiry: classification.estimatedExpiry,
        imageReference,
        donorId: null,
      });
    } catch (err) {
      const message = errorMessage(err);
      this.logger.error(`Cycle ${cycleId} failed: ${message}`);
      this.finishCycle(PipelineMode.ERROR, `Error: ${message}`);
      return { cycleId, status: "failed", classification, record: null, error: message };
    }

    this.logger.info(
      `Cycle ${cycleId}: ${record.itemName} → ${record.category} (donation #${record.id})`,
    );
    const result = toCycleResult(record);
    if (!this.stopped) {
      this.lastResult = result;
      this.context.publisher.publish(
        "classified",
        `Classified: ${record.itemName} (${record.category}) | Logged donation #${record.id}`,
        result,
      );
    }

    if (this.config.actuationEnabled && this.deps.actuator) {
      this.setMode(PipelineMode.SORTING, `Sorting to ${record.category} bin...`);
      try {
        await this.sort(this.deps.actuator, record.category);
      } catch (err) {
        const message = errorMessage(err);
        this.logger.error(`Cycle ${cycleId} sort failed: ${message}`);
        this.finishCycle(PipelineMode.ERROR, `Logged donation #${record.id} but sort failed: ${message}`);
        return { cycleId, status: "partial", classification, record, error: message };
      }
      this.finishCycle(PipelineMode.COOLDOWN, `Done - ${record.itemName} sorted to ${record.category} bin`);
    } else {
      this.finishCycle(PipelineMode.COOLDOWN, `Done - ${record.itemName} logged as ${record.category}`);
    }

    return { cycleId, status: "completed", classification, record, error: null };
  }

  private async sort(actuator: Actuator, category: Category): Promise<void> {
    try {
      await actuator.sort(category);
    } catch (err) {
      throw err instanceof PipelineError
        ? err
        : new ActuationFailure(errorMessage(err), { cause: err });
    }
  }

  // ─── Transitions ──────────────────────────────────────────────────────────────

  private finishCycle(mode: PipelineMode.COOLDOWN | PipelineMode.ERROR, statusText: string): void {
    this.enterCooldown(this.clock(), mode, statusText);
  }

  private enterCooldown(
    now: number,
    mode: PipelineMode.COOLDOWN | PipelineMode.ERROR,
    statusText: string,
  ): void {
    if (this.stopped) return;
    this.cooldownStartedAt = now;
    this.setMode(mode, statusText);
  }

  private expireCooldown(frame: Frame, now: number): void {
    if (this.currentMode !== PipelineMode.COOLDOWN && this.currentMode !== PipelineMode.ERROR) return;
    if (this.cooldownStartedAt !== null && now - this.cooldownStartedAt >= this.config.cooldownMs) {
      this.enterWatching(frame);
    }
  }

  /** `frame` becomes the motion baseline. */
  private enterWatching(frame: Frame): void {
    this.cooldownStartedAt = null;
    this.motionStoppedAt = null;
    this.previous =
      this.config.triggerMode === "motion" ? this.detector.prepare(toGray(frame)) : null;
    this.setMode(
      PipelineMode.WATCHING,
      this.config.triggerMode === "motion" ? "Watching for item..." : "Camera live - waiting for capture",
      { motionArea: 0 },
    );
  }

  private setMode(
    mode: PipelineMode,
    statusText: string,
    extras: { motionArea?: number; cycleId?: string } = {},
  ): void {
    if (this.stopped) return;
    this.currentMode = mode;
    this.context.publisher.publish(mode, statusText, this.lastResult, extras);
    this.logger.info(`State: ${mode} - ${statusText}`);
  }
}

function toCycleResult(record: DonationRecord): CycleResult {
  return {
    donationId: record.id,
    category: record.category,
    itemName: record.itemName,
    estimatedWeightLbs: record.estimatedWeightLbs,
    estimatedExpiry: record.estimatedExpiry,
    imageReference: record.imageReference,
  };
}
