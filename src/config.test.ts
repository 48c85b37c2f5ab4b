import { describe, it, expect } from "vitest";
import { cleanApiKey, loadConfig } from "./config.js";
import { StartupFailure } from "./errors.js";

const BASE_ENV = { OPENAI_API_KEY: "test-secret" };

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig(BASE_ENV)).toEqual({
      port: 5000,
      openaiApiKey: "test-secret",
      classifierModel: "gpt-4o-mini",
      camera: { input: "/dev/video0", format: "v4l2", width: 640, height: 480, fps: 30 },
      arm: { port: "/dev/ttyUSB0", baudRate: 9600, positionsFile: "config/positions.json" },
      motion: { threshold: 30, minArea: 5000, blurKernelSize: 21, dilateIterations: 2, analysisWidth: 320 },
      controller: {
        triggerMode: "motion",
        actuationEnabled: true,
        warmupFrames: 60,
        settleTimeMs: 1500,
        cooldownMs: 5000,
        tickIntervalMs: 50,
        fallbackCategory: "snack",
      },
      dataDir: "data",
    });
  });

  it("reads every override", () => {
    const config = loadConfig({
      ...BASE_ENV,
      PORT: "8080",
      CLASSIFIER_MODEL: "gpt-4o",
      CAMERA_INPUT: "0",
      CAMERA_FORMAT: "avfoundation",
      CAMERA_WIDTH: "1280",
      CAMERA_HEIGHT: "720",
      CAMERA_FPS: "15",
      TRIGGER_MODE: "Manual",
      ACTUATION_ENABLED: "false",
      ARM_PORT: "COM3",
      ARM_BAUD_RATE: "115200",
      POSITIONS_FILE: "/etc/sorter/positions.json",
      MOTION_THRESHOLD: "25",
      MOTION_MIN_AREA: "8000",
      MOTION_ANALYSIS_WIDTH: "160",
      SETTLE_TIME_MS: "2000",
      COOLDOWN_MS: "3000",
      WARMUP_FRAMES: "10",
      TICK_INTERVAL_MS: "100",
      FALLBACK_CATEGORY: "DRINK",
      DATA_DIR: "/var/lib/sorter",
    });

    expect(config.port).toBe(8080);
    expect(config.classifierModel).toBe("gpt-4o");
    expect(config.camera).toEqual({ input: "0", format: "avfoundation", width: 1280, height: 720, fps: 15 });
    expect(config.arm).toEqual({ port: "COM3", baudRate: 115200, positionsFile: "/etc/sorter/positions.json" });
    expect(config.motion).toMatchObject({ threshold: 25, minArea: 8000, analysisWidth: 160 });
    expect(config.controller).toEqual({
      triggerMode: "manual",
      actuationEnabled: false,
      warmupFrames: 10,
      settleTimeMs: 2000,
      cooldownMs: 3000,
      tickIntervalMs: 100,
      fallbackCategory: "drink",
    });
    expect(config.dataDir).toBe("/var/lib/sorter");
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ ...BASE_ENV, PORT: "  ", DATA_DIR: "" })).toMatchObject({ port: 5000, dataDir: "data" });
  });

  it("lets an empty CAMERA_FORMAT switch off the input format", () => {
    expect(loadConfig({ ...BASE_ENV, CAMERA_FORMAT: "" }).camera.format).toBeNull();
  });

  it("requires an API key", () => {
    expect(() => loadConfig({})).toThrow(StartupFailure);
    expect(() => loadConfig({ OPENAI_API_KEY: " {} " })).toThrow("OPENAI_API_KEY is not set");
  });

  it.each([
    ["PORT", "http", 'PORT must be an integer from 0 to 65535, got "http"'],
    ["PORT", "70000", 'PORT must be an integer from 0 to 65535, got "70000"'],
    ["CAMERA_WIDTH", "0", 'CAMERA_WIDTH must be an integer from 1 up, got "0"'],
    ["MOTION_THRESHOLD", "12.5", 'MOTION_THRESHOLD must be an integer from 0 to 255, got "12.5"'],
    ["ACTUATION_ENABLED", "maybe", 'ACTUATION_ENABLED must be true or false, got "maybe"'],
    ["TRIGGER_MODE", "button", 'TRIGGER_MODE must be "motion" or "manual", got "button"'],
    ["FALLBACK_CATEGORY", "toys", 'FALLBACK_CATEGORY must be one of fruit, snack, drink, got "toys"'],
  ])("rejects %s=%s", (name, value, message) => {
    expect(() => loadConfig({ ...BASE_ENV, [name]: value })).toThrow(message);
  });
});

describe("cleanApiKey", () => {
  it("strips whitespace and wrapping braces", () => {
    expect(cleanApiKey("  {test-secret}\n")).toBe("test-secret");
    expect(cleanApiKey("test-secret")).toBe("test-secret");
  });
});
