// Donation Sorter - Camera frame source
// Runs ffmpeg as a child process that writes raw rgb24 frames to stdout and
// slices that byte stream back into fixed-size frames. Only the newest frame
// is kept: a slow reader skips frames rather than falling behind. If ffmpeg
// dies after startup it is respawned with exponential backoff.

import { spawn } from "node:child_process";
import type { EventEmitter } from "node:events";
import type { Readable } from "node:stream";
import type { CameraConfig, Frame, FrameSource } from "./types.js";
import { StartupFailure, StreamEnded, errorMessage } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { createDeferred, type Deferred } from "./utils/deferred.js";

// ─── Raw stream framing ─────────────────────────────────────────────────────────

/**
 * Reassembles fixed-size frames from arbitrarily split stdout chunks.
 */
export class RawFrameAssembler {
  private pending: Buffer[] = [];
  private pendingBytes = 0;

  constructor(readonly frameSize: number) {
    if (!Number.isInteger(frameSize) || frameSize <= 0) {
      throw new Error(`Invalid frame size: ${frameSize}`);
    }
  }

  /** Returns every frame completed by this chunk, oldest first. */
  push(chunk: Buffer): Buffer[] {
    this.pending.push(chunk);
    this.pendingBytes += chunk.length;
    if (this.pendingBytes < this.frameSize) return [];

    let joined = Buffer.concat(this.pending, this.pendingBytes);
    const frames: Buffer[] = [];
    while (joined.length >= this.frameSize) {
      frames.push(joined.subarray(0, this.frameSize));
      joined = joined.subarray(this.frameSize);
    }
    this.pending = joined.length > 0 ? [joined] : [];
    this.pendingBytes = joined.length;
    return frames;
  }

  get buffered(): number {
    return this.pendingBytes;
  }
}

// ─── ffmpeg arguments ───────────────────────────────────────────────────────────

export function buildFfmpegArgs(camera: CameraConfig): string[] {
  const args = ["-hide_banner", "-loglevel", "error"];
  if (camera.format) {
    args.push(
      "-f", camera.format,
      "-video_size", `${camera.width}x${camera.height}`,
      "-framerate", String(camera.fps),
    );
  }
  args.push(
    "-i", camera.input,
    "-vf", `scale=${camera.width}:${camera.height}`,
    "-f", "rawvideo",
    "-pix_fmt", "rgb24",
    "pipe:1",
  );
  return args;
}

// ─── Frame source ───────────────────────────────────────────────────────────────

/** The slice of a child process the source depends on. */
export interface FrameProcess extends EventEmitter {
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnFrameProcess = (command: string, args: string[]) => FrameProcess;

export interface FfmpegFrameSourceOptions {
  ffmpegPath?: string;
  /** How long open(), or a restart, waits for the first frame. */
  startupTimeoutMs?: number;
  /** How long read() waits for a frame newer than the last one returned. */
  readTimeoutMs?: number;
  /** Delay before the first restart; doubles on each further attempt. */
  restartDelayMs?: number;
  restartMaxDelayMs?: number;
  /** Consecutive restarts without a frame before the stream is given up. */
  maxRestarts?: number;
  /** How long close() waits for ffmpeg to exit before SIGKILL. */
  closeTimeoutMs?: number;
  spawnProcess?: SpawnFrameProcess;
  logger?: Logger;
  clock?: () => number;
}

const STDERR_TAIL_LINES = 5;

/** How a process went away: an "error" event, or an exit code / signal. */
type ProcessEnd = { error: Error } | { reason: string; detail: string };

interface LaunchHooks {
  onFirstFrame(): void;
  onEnd(end: ProcessEnd): void;
}

function describeEnd(end: ProcessEnd): string {
  return "error" in end ? `ffmpeg error: ${end.error.message}` : `${end.reason}${end.detail}`;
}

export class FfmpegFrameSource implements FrameSource {
  private readonly camera: CameraConfig;
  private readonly ffmpegPath: string;
  private readonly startupTimeoutMs: number;
  private readonly readTimeoutMs: number;
  private readonly restartDelayMs: number;
  private readonly restartMaxDelayMs: number;
  private readonly maxRestarts: number;
  private readonly closeTimeoutMs: number;
  private readonly spawnProcess: SpawnFrameProcess;
  private readonly logger: Logger;
  private readonly clock: () => number;

  private process: FrameProcess | null = null;
  private closed = true;
  private failure: StreamEnded | null = null;
  private latest: Frame | null = null;
  private lastReturnedSequence = 0;
  private sequence = 0;
  private stderrTail: string[] = [];
  private waiters: Deferred<Frame | null>[] = [];

  // Restart state
  private restartAttempts = 0;
  private restartTimer: ReturnType<typeof setTimeout> | null = null;
  private stallTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(camera: CameraConfig, options: FfmpegFrameSourceOptions = {}) {
    this.camera = camera;
    this.ffmpegPath = options.ffmpegPath ?? "ffmpeg";
    this.startupTimeoutMs = options.startupTimeoutMs ?? 10_000;
    this.readTimeoutMs = options.readTimeoutMs ?? 1000;
    this.restartDelayMs = options.restartDelayMs ?? 1000;
    this.restartMaxDelayMs = options.restartMaxDelayMs ?? 10_000;
    this.maxRestarts = options.maxRestarts ?? 5;
    this.closeTimeoutMs = options.closeTimeoutMs ?? 2000;
    this.spawnProcess = options.spawnProcess ?? ((command, args) => spawn(command, args));
    this.logger = options.logger ?? createConsoleLogger("Camera");
    this.clock = options.clock ?? Date.now;
  }

  /** Starts ffmpeg and resolves once the first frame arrives. */
  async open(): Promise<void> {
    if (this.process) return;
    this.logger.info(`Opening camera ${this.camera.input} (${this.camera.width}x${this.camera.height}@${this.camera.fps})`);
    this.closed = false;
    this.failure = null;
    this.restartAttempts = 0;

    const firstFrame = createDeferred<void>();
    let opened = false;
    try {
      this.launch({
        onFirstFrame: () => {
          opened = true;
          firstFrame.resolve();
        },
        onEnd: (end) => {
          if (opened) {
            this.handleStreamEnd(end);
          } else if ("error" in end) {
            firstFrame.reject(new StartupFailure(`Failed to start ffmpeg: ${end.error.message}`, { cause: end.error }));
          } else {
            firstFrame.reject(
              new StartupFailure(`Camera stream ended before the first frame (${end.reason})${end.detail}`),
            );
          }
        },
      });
    } catch (err) {
      this.closed = true;
      throw new StartupFailure(`Failed to start ffmpeg: ${errorMessage(err)}`, { cause: err });
    }

    const timer = setTimeout(() => {
      if (opened) return;
      firstFrame.reject(
        new StartupFailure(`Camera produced no frame within ${this.startupTimeoutMs}ms`),
      );
    }, this.startupTimeoutMs);

    try {
      await firstFrame.promise;
    } catch (err) {
      await this.close();
      throw err;
    } finally {
      clearTimeout(timer);
    }
    this.logger.info("Camera opened");
  }

  /**
   * The newest frame not yet returned, waiting up to readTimeoutMs for one.
   * Null when none arrives in time or the source is closed. Throws
   * StreamEnded once restarts are exhausted.
   */
  async read(): Promise<Frame | null> {
    const latest = this.latest;
    if (latest && latest.sequence > this.lastReturnedSequence) {
      this.lastReturnedSequence = latest.sequence;
      return latest;
    }
    if (this.failure) throw this.failure;
    if (this.closed) return null;

    const waiter = createDeferred<Frame | null>();
    this.waiters.push(waiter);
    const timer = setTimeout(() => {
      this.waiters = this.waiters.filter((w) => w !== waiter);
      waiter.resolve(null);
    }, this.readTimeoutMs);

    try {
      const frame = await waiter.promise;
      if (frame) this.lastReturnedSequence = frame.sequence;
      return frame;
    } finally {
      clearTimeout(timer);
    }
  }

  /** Stops ffmpeg and resolves once it has exited. Pending reads return null. */
  async close(): Promise<void> {
    this.closed = true;
    this.clearRestartTimers();
    this.latest = null;
    this.settleWaiters(null);

    const proc = this.process;
    if (!proc) return;
    this.process = null;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const exited = new Promise<void>((resolve) => {
      proc.once("exit", () => resolve());
      timer = setTimeout(() => {
        this.logger.warn(`ffmpeg did not exit within ${this.closeTimeoutMs}ms; sending SIGKILL`);
        proc.kill("SIGKILL");
        resolve();
      }, this.closeTimeoutMs);
    });
    proc.kill("SIGTERM");
    await exited;
    clearTimeout(timer);
    this.logger.info("Camera closed");
  }

  // ─── Process lifecycle ──────────────────────────────────────────────────────

  /** Spawns ffmpeg and wires its streams. Throws if the spawn itself throws. */
  private launch(hooks: LaunchHooks): FrameProcess {
    const proc = this.spawnProcess(this.ffmpegPath, buildFfmpegArgs(this.camera));
    this.process = proc;
    this.stderrTail = [];
    const assembler = new RawFrameAssembler(this.camera.width * this.camera.height * 3);
    let delivering = false;

    proc.stdout.on("data", (chunk: Buffer) => {
      if (this.process !== proc) return;
      const frames = assembler.push(chunk);
      for (const data of frames) {
        this.accept(data);
      }
      if (!delivering && frames.length > 0) {
        delivering = true;
        hooks.onFirstFrame();
      }
    });

    proc.stderr.on("data", (chunk: Buffer) => {
      const lines = chunk.toString("utf-8").split("\n").map((l) => l.trim()).filter(Boolean);
      this.stderrTail = [...this.stderrTail, ...lines].slice(-STDERR_TAIL_LINES);
    });

    // Whichever of "error" and "exit" comes first ends this process; the other
    // finds it already replaced.
    const ended = (end: ProcessEnd) => {
      if (this.process !== proc) return;
      this.process = null;
      hooks.onEnd(end);
    };

    proc.once("error", (err: Error) => {
      ended({ error: err });
    });

    proc.once("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      ended({
        reason: signal ? `signal ${signal}` : `exit code ${code}`,
        detail: this.stderrTail.length > 0 ? `: ${this.stderrTail.join(" | ")}` : "",
      });
    });

    return proc;
  }

  private handleStreamEnd(end: ProcessEnd): void {
    if (this.closed) return;
    this.clearRestartTimers();
    const description = describeEnd(end);

    if (this.restartAttempts >= this.maxRestarts) {
      this.fail(
        new StreamEnded(`Camera stream ended after ${this.restartAttempts} restart attempts (${description})`),
      );
      return;
    }

    const delay = Math.min(this.restartDelayMs * 2 ** this.restartAttempts, this.restartMaxDelayMs);
    this.restartAttempts++;
    this.logger.error(
      `Camera stream ended (${description}); restarting in ${delay}ms (attempt ${this.restartAttempts}/${this.maxRestarts})`,
    );
    this.restartTimer = setTimeout(() => this.restart(), delay);
  }

  private restart(): void {
    this.restartTimer = null;
    if (this.closed) return;

    let proc: FrameProcess;
    try {
      proc = this.launch({
        onFirstFrame: () => {
          this.clearRestartTimers();
          this.logger.info(`Camera stream restarted after ${this.restartAttempts} attempt(s)`);
          this.restartAttempts = 0;
        },
        onEnd: (end) => this.handleStreamEnd(end),
      });
    } catch (err) {
      this.handleStreamEnd({ error: err instanceof Error ? err : new Error(String(err)) });
      return;
    }

    this.stallTimer = setTimeout(() => {
      this.stallTimer = null;
      if (this.process !== proc) return;
      this.process = null;
      proc.kill("SIGTERM");
      this.handleStreamEnd({ reason: `no frame within ${this.startupTimeoutMs}ms`, detail: "" });
    }, this.startupTimeoutMs);
  }

  private fail(err: StreamEnded): void {
    this.failure = err;
    this.logger.error(err.message);
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter.reject(err);
  }

  private clearRestartTimers(): void {
    if (this.restartTimer) {
      clearTimeout(this.restartTimer);
      this.restartTimer = null;
    }
    if (this.stallTimer) {
      clearTimeout(this.stallTimer);
      this.stallTimer = null;
    }
  }

  private accept(data: Buffer): void {
    const frame: Frame = {
      width: this.camera.width,
      height: this.camera.height,
      channels: 3,
      // Copy out of the assembler's shared chunk so the frame never changes.
      data: Buffer.from(data),
      capturedAt: this.clock(),
      sequence: ++this.sequence,
    };
    this.latest = frame;
    this.settleWaiters(frame);
  }

  private settleWaiters(frame: Frame | null): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter.resolve(frame);
  }
}
