// Donation Sorter - Entry point
// Loads configuration, wires the real camera, classifier and arm, and starts
// the server.

import "dotenv/config";
import OpenAI from "openai";
import { loadConfig } from "./config.js";
import { startApp, APP_NAME, APP_VERSION, type AppFactories } from "./app.js";
import { VisionClassifier, type OpenAIVisionClient } from "./classifier.js";
import { SharpFrameEncoder } from "./frame-encoder.js";
import { FfmpegFrameSource } from "./frame-source.js";
import { loadArmPositions } from "./arm-positions.js";
import { SerialPortTransport, XArmActuator } from "./xarm-actuator.js";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

const initLogger: Logger = {
  info: logInit,
  warn: (msg) => console.warn(`[WARN] [${ts()}] ${msg}`),
  error: logFatal,
};

const factories: AppFactories = {
  createClassifier(config) {
    logInit(`Creating OpenAI client (model ${config.classifierModel})...`);
    const openaiClient = new OpenAI({ apiKey: config.openaiApiKey });
    return new VisionClassifier(openaiClient as unknown as OpenAIVisionClient, {
      model: config.classifierModel,
      fallbackCategory: config.controller.fallbackCategory,
    });
  },
  createEncoder() {
    return new SharpFrameEncoder();
  },
  createFrameSource(config) {
    return new FfmpegFrameSource(config.camera);
  },
  async connectArm(config) {
    const positions = await loadArmPositions(config.arm.positionsFile);
    const arm = new XArmActuator(new SerialPortTransport(config.arm.port, config.arm.baudRate), positions);
    await arm.connect();
    return arm;
  },
};

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  logInit("Configuration loaded");

  const app = await startApp(config, factories, { logger: initLogger });
  logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${app.server.port() ?? config.port}`);
  logInit(
    `Pipeline: camera -> ${config.controller.triggerMode} trigger -> ${config.classifierModel} -> donation log` +
      (config.controller.actuationEnabled ? " -> arm" : ""),
  );

  const onSignal = (signal: NodeJS.Signals) => {
    logInit(`Received ${signal}`);
    app
      .shutdown()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logFatal(`Shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      });
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
}

main().catch((err: unknown) => {
  logFatal(errorMessage(err));
  process.exit(1);
});
