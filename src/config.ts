// Donation Sorter - Configuration
// Reads the process environment (populated from .env by dotenv) into a typed
// AppConfig. Any invalid value is a StartupFailure naming the variable.

import type { AppConfig, Category, TriggerMode } from "./types.js";
import { CATEGORIES } from "./types.js";
import { isCategory, DEFAULT_FALLBACK_CATEGORY } from "./category.js";
import { DEFAULT_CLASSIFIER_MODEL } from "./classifier.js";
import { DEFAULT_MOTION_CONFIG } from "./motion-detector.js";
import { DEFAULT_CONTROLLER_CONFIG } from "./pipeline-controller.js";
import { StartupFailure } from "./errors.js";

export type Env = Record<string, string | undefined>;

/** Unset and blank variables both mean "use the default". */
function read(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readInt(env: Env, name: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const raw = read(env, name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!/^-?\d+$/.test(raw) || value < min || value > max) {
    throw new StartupFailure(
      `${name} must be an integer from ${min}${max === Number.MAX_SAFE_INTEGER ? " up" : ` to ${max}`}, got "${raw}"`,
    );
  }
  return value;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = read(env, name);
  if (raw === undefined) return fallback;
  switch (raw.toLowerCase()) {
    case "true":
    case "1":
    case "yes":
    case "on":
      return true;
    case "false":
    case "0":
    case "no":
    case "off":
      return false;
    default:
      throw new StartupFailure(`${name} must be true or false, got "${raw}"`);
  }
}

function readTriggerMode(env: Env): TriggerMode {
  const raw = read(env, "TRIGGER_MODE")?.toLowerCase() ?? DEFAULT_CONTROLLER_CONFIG.triggerMode;
  if (raw !== "motion" && raw !== "manual") {
    throw new StartupFailure(`TRIGGER_MODE must be "motion" or "manual", got "${raw}"`);
  }
  return raw;
}

function readCategory(env: Env): Category {
  const raw = read(env, "FALLBACK_CATEGORY")?.toLowerCase() ?? DEFAULT_FALLBACK_CATEGORY;
  if (!isCategory(raw)) {
    throw new StartupFailure(`FALLBACK_CATEGORY must be one of ${CATEGORIES.join(", ")}, got "${raw}"`);
  }
  return raw;
}

/** Keys pasted from a dashboard sometimes arrive wrapped in braces. */
export function cleanApiKey(raw: string): string {
  return raw.trim().replace(/^\{+/, "").replace(/\}+$/, "").trim();
}

export function loadConfig(env: Env): AppConfig {
  const rawKey = env.OPENAI_API_KEY;
  const openaiApiKey = rawKey ? cleanApiKey(rawKey) : "";
  if (!openaiApiKey) {
    throw new StartupFailure("OPENAI_API_KEY is not set. Add it to your .env file.");
  }

  // An explicitly empty CAMERA_FORMAT lets ffmpeg detect the input format.
  const format = env.CAMERA_FORMAT === undefined ? "v4l2" : env.CAMERA_FORMAT.trim() || null;

  return {
    port: readInt(env, "PORT", 5000, 0, 65535),
    openaiApiKey,
    classifierModel: read(env, "CLASSIFIER_MODEL") ?? DEFAULT_CLASSIFIER_MODEL,
    camera: {
      input: read(env, "CAMERA_INPUT") ?? "/dev/video0",
      format,
      width: readInt(env, "CAMERA_WIDTH", 640, 1),
      height: readInt(env, "CAMERA_HEIGHT", 480, 1),
      fps: readInt(env, "CAMERA_FPS", 30, 1, 240),
    },
    arm: {
      port: read(env, "ARM_PORT") ?? "/dev/ttyUSB0",
      baudRate: readInt(env, "ARM_BAUD_RATE", 9600, 1),
      positionsFile: read(env, "POSITIONS_FILE") ?? "config/positions.json",
    },
    motion: {
      ...DEFAULT_MOTION_CONFIG,
      threshold: readInt(env, "MOTION_THRESHOLD", DEFAULT_MOTION_CONFIG.threshold, 0, 255),
      minArea: readInt(env, "MOTION_MIN_AREA", DEFAULT_MOTION_CONFIG.minArea, 1),
      analysisWidth: readInt(env, "MOTION_ANALYSIS_WIDTH", DEFAULT_MOTION_CONFIG.analysisWidth, 1),
    },
    controller: {
      triggerMode: readTriggerMode(env),
      actuationEnabled: readBool(env, "ACTUATION_ENABLED", DEFAULT_CONTROLLER_CONFIG.actuationEnabled),
      warmupFrames: readInt(env, "WARMUP_FRAMES", DEFAULT_CONTROLLER_CONFIG.warmupFrames, 0),
      settleTimeMs: readInt(env, "SETTLE_TIME_MS", DEFAULT_CONTROLLER_CONFIG.settleTimeMs, 0),
      cooldownMs: readInt(env, "COOLDOWN_MS", DEFAULT_CONTROLLER_CONFIG.cooldownMs, 0),
      tickIntervalMs: readInt(env, "TICK_INTERVAL_MS", DEFAULT_CONTROLLER_CONFIG.tickIntervalMs, 1),
      fallbackCategory: readCategory(env),
    },
    dataDir: read(env, "DATA_DIR") ?? "data",
  };
}
