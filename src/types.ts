// Donation Sorter - Shared TypeScript interfaces and types

// ─── Pipeline State Machine ─────────────────────────────────────────────────────

export enum PipelineMode {
  WARMUP = "warmup",
  WATCHING = "watching",
  SETTLING = "settling",
  CLASSIFYING = "classifying",
  SORTING = "sorting",
  COOLDOWN = "cooldown",
  ERROR = "error",
  IDLE = "idle",
}

/**
 * Published mode. "classified" is a transient worker-side status shown
 * between the donation being logged and the arm (or cooldown) taking over.
 */
export type SnapshotMode = PipelineMode | "classified";

export type TriggerMode = "manual" | "motion";

// ─── Frames ─────────────────────────────────────────────────────────────────────

/** RGB frame as produced by a FrameSource. Never mutated after hand-off. */
export interface Frame {
  width: number;
  height: number;
  channels: 3;
  data: Buffer; // row-major, width * height * 3 bytes
  capturedAt: number; // Date.now() at capture
  sequence: number; // monotonic per source
}

/** Single-channel 8-bit image. */
export interface GrayFrame {
  width: number;
  height: number;
  data: Uint8Array;
}

export interface MotionSample {
  isMotion: boolean;
  area: number; // px² of the largest changed region
}

// ─── Classification ─────────────────────────────────────────────────────────────

export const CATEGORIES = ["fruit", "snack", "drink"] as const;

export type Category = (typeof CATEGORIES)[number];

export interface ClassificationResult {
  category: Category;
  itemName: string;
  estimatedWeightLbs: number | null;
  estimatedExpiry: string | null; // YYYY-MM-DD
  fallback: boolean; // category came from the fallback policy
}

// ─── Donation Records ───────────────────────────────────────────────────────────

export interface DonationRecord {
  id: number;
  category: Category;
  itemName: string;
  estimatedWeightLbs: number | null;
  estimatedExpiry: string | null;
  timestamp: string; // ISO-8601
  imageReference: string | null;
  donorId: string | null;
}

export type DonationDraft = Omit<DonationRecord, "id" | "timestamp">;

export interface DonationStats {
  totalItems: number;
  totalWeightLbs: number;
  uniqueDonors: number;
  byCategory: Record<string, number>;
}

// ─── Snapshot ───────────────────────────────────────────────────────────────────

/** Summary of the most recent cycle shown alongside the live status. */
export interface CycleResult {
  donationId: number;
  category: Category;
  itemName: string;
  estimatedWeightLbs: number | null;
  estimatedExpiry: string | null;
  imageReference: string | null;
}

export interface PipelineSnapshot {
  mode: SnapshotMode;
  statusText: string;
  lastResult: CycleResult | null;
  motionArea: number;
  cycleId: string | null;
  updatedAt: string; // ISO-8601
}

// ─── Collaborators ──────────────────────────────────────────────────────────────

export interface FrameSource {
  /** Opens the device. Rejects with StartupFailure when it cannot. */
  open(): Promise<void>;
  /** Next frame, or null on a transient miss / once closed. */
  read(): Promise<Frame | null>;
  close(): Promise<void>;
}

export interface Classifier {
  classify(jpeg: Buffer): Promise<ClassificationResult>;
}

export interface Actuator {
  sort(category: Category): Promise<void>;
}

export interface RecordSink {
  append(draft: DonationDraft): Promise<DonationRecord>;
}

export interface ImageStore {
  save(cycleId: string, jpeg: Buffer): Promise<string>;
}

export interface FrameEncoder {
  encodeJpeg(frame: Frame): Promise<Buffer>;
}

// ─── Configuration ──────────────────────────────────────────────────────────────

export interface MotionConfig {
  /** Per-pixel intensity delta (0-255) above which a pixel counts as changed. Default: 30 */
  threshold: number;
  /** Minimum largest-region area (px²) to count as motion. Default: 5000 */
  minArea: number;
  /** Gaussian kernel size (odd). Default: 21 */
  blurKernelSize: number;
  /** Dilation passes with a 3×3 square. Default: 2 */
  dilateIterations: number;
  /** Frames wider than this are downscaled by a whole factor before the blur. Default: 320 */
  analysisWidth: number;
}

export interface ControllerConfig {
  triggerMode: TriggerMode;
  actuationEnabled: boolean;
  warmupFrames: number;
  settleTimeMs: number;
  cooldownMs: number;
  tickIntervalMs: number;
  fallbackCategory: Category;
}

export interface CameraConfig {
  input: string;
  format: string | null;
  width: number;
  height: number;
  fps: number;
}

export interface ArmConfig {
  port: string;
  baudRate: number;
  positionsFile: string;
}

export interface AppConfig {
  port: number;
  openaiApiKey: string;
  classifierModel: string;
  camera: CameraConfig;
  arm: ArmConfig;
  motion: MotionConfig;
  controller: ControllerConfig;
  dataDir: string;
}

// ─── WebSocket Messages ─────────────────────────────────────────────────────────

export type ServerMessage =
  | { type: "pipeline_state"; snapshot: PipelineSnapshot }
  | { type: "error"; message: string };
