// Donation Sorter - Application wiring
// Builds every pipeline component from an AppConfig and starts the capture
// loop, controller and server. Hardware and API clients come from factories
// so the whole stack can run against fakes.

import type { Actuator, AppConfig, Classifier, Frame, FrameEncoder, FrameSource } from "./types.js";
import { createControllerContext, type ControllerContext } from "./controller-context.js";
import { PipelineController } from "./pipeline-controller.js";
import { MotionDetector } from "./motion-detector.js";
import { CaptureLoop } from "./capture-loop.js";
import { LiveFeed } from "./live-feed.js";
import { DonationLog } from "./donation-log.js";
import { FileImageStore } from "./image-store.js";
import { createAppServer, type AppServer } from "./server.js";
import { errorMessage } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";

export const APP_NAME = "Donation Sorter";
export const APP_VERSION = "0.1.0";

/** An actuator that also owns a hardware connection. */
export interface ArmHandle extends Actuator {
  home(): Promise<void>;
  close(): Promise<void>;
}

export interface AppFactories {
  createClassifier(config: AppConfig): Classifier;
  createEncoder(config: AppConfig): FrameEncoder;
  createFrameSource(config: AppConfig): FrameSource;
  /** Only called when actuation is enabled. Resolves once the arm is homed. */
  connectArm(config: AppConfig): Promise<ArmHandle>;
}

export interface StartAppOptions {
  /** Directory served as the dashboard. */
  staticDir?: string;
  logger?: Logger;
}

export interface RunningApp {
  context: ControllerContext;
  controller: PipelineController;
  captureLoop: CaptureLoop;
  liveFeed: LiveFeed;
  donationLog: DonationLog;
  server: AppServer;
  shutdown(): Promise<void>;
}

/**
 * Starts the pipeline. Anything that fails before the server is listening
 * releases what was already opened and rethrows.
 */
export async function startApp(
  config: AppConfig,
  factories: AppFactories,
  options: StartAppOptions = {},
): Promise<RunningApp> {
  const logger = options.logger ?? createConsoleLogger("App");
  const cleanup: Array<() => Promise<void>> = [];

  try {
    logger.info(`Opening donation log in ${config.dataDir}...`);
    const donationLog = await DonationLog.open(config.dataDir);
    const imageStore = new FileImageStore(config.dataDir);

    const classifier = factories.createClassifier(config);
    const encoder = factories.createEncoder(config);

    let arm: ArmHandle | undefined;
    if (config.controller.actuationEnabled) {
      logger.info(`Connecting arm on ${config.arm.port}...`);
      const connected = await factories.connectArm(config);
      arm = connected;
      cleanup.push(() => connected.close());
    } else {
      logger.info("Arm disabled: donations are logged without sorting");
    }

    logger.info("Opening camera...");
    const source = factories.createFrameSource(config);
    await source.open();
    cleanup.push(() => source.close());

    const context = createControllerContext();
    const liveFeed = new LiveFeed(encoder);
    const controller = new PipelineController(config.controller, {
      context,
      classifier,
      encoder,
      recordSink: donationLog,
      imageStore,
      actuator: arm,
      detector: new MotionDetector(config.motion),
    });
    const captureLoop = new CaptureLoop(source, context.frameSlot, {
      onFrame: (frame: Frame) => {
        liveFeed.offer(frame);
      },
      // The server stays up so the dashboard can show why.
      onEnded: (err) => {
        controller.stop(`Camera stopped: ${err.message}`);
      },
    });

    captureLoop.start();
    cleanup.push(() => captureLoop.stop());
    controller.start();
    cleanup.push(async () => controller.stop());

    const server = createAppServer({
      donations: donationLog,
      publisher: context.publisher,
      trigger: controller,
      preview: liveFeed,
      staticDir: options.staticDir,
    });
    await server.listen(config.port);

    const stopAll = async (): Promise<void> => {
      logger.info("Shutting down...");
      controller.stop();
      const cycle = controller.currentCycle;
      if (cycle) {
        logger.info("Waiting for the current cycle to finish...");
        await cycle;
      }
      await captureLoop.stop();
      await liveFeed.settled();
      await source.close();
      if (arm) {
        await arm.home().catch((err: unknown) => {
          logger.warn(`Could not home arm on shutdown: ${errorMessage(err)}`);
        });
        await arm.close();
      }
      await server.close();
      logger.info("Shutdown complete");
    };

    let stopping: Promise<void> | null = null;
    const shutdown = (): Promise<void> => {
      if (!stopping) stopping = stopAll();
      return stopping;
    };

    return { context, controller, captureLoop, liveFeed, donationLog, server, shutdown };
  } catch (err) {
    for (const release of cleanup.reverse()) {
      await release().catch((cleanupErr: unknown) => {
        logger.warn(`Cleanup after failed start: ${errorMessage(cleanupErr)}`);
      });
    }
    throw err;
  }
}

