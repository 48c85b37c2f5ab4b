// Donation Sorter - xArm actuator
// Drives a six-servo xArm over its serial bus to carry an item from the
// pickup zone to the bin for its category.

import { SerialPort } from "serialport";
import type { Actuator, Category } from "./types.js";
import type { ArmPositions, Pose } from "./arm-positions.js";
import { GRIPPER_SERVO } from "./arm-positions.js";
import {
  PacketParser,
  XArmCommand,
  decodePositions,
  encodeMove,
  encodeReadPositions,
  encodeUnload,
  type ServoTarget,
  type XArmPacket,
} from "./xarm-protocol.js";
import { ActuationFailure, StartupFailure, errorMessage } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { createDeferred } from "./utils/deferred.js";

// ─── Transport ──────────────────────────────────────────────────────────────────

export interface ArmTransport {
  open(): Promise<void>;
  write(packet: Buffer): Promise<void>;
  /** Returns an unsubscribe function. */
  onData(listener: (chunk: Buffer) => void): () => void;
  close(): Promise<void>;
}

export class SerialPortTransport implements ArmTransport {
  private readonly port: SerialPort;

  constructor(path: string, baudRate: number) {
    this.port = new SerialPort({ path, baudRate, autoOpen: false });
  }

  open(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.port.open((err) => (err ? reject(err) : resolve()));
    });
  }

  write(packet: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      this.port.write(packet, (writeErr) => {
        if (writeErr) {
          reject(writeErr);
          return;
        }
        this.port.drain((drainErr) => (drainErr ? reject(drainErr) : resolve()));
      });
    });
  }

  onData(listener: (chunk: Buffer) => void): () => void {
    this.port.on("data", listener);
    return () => {
      this.port.off("data", listener);
    };
  }

  close(): Promise<void> {
    if (!this.port.isOpen) return Promise.resolve();
    return new Promise((resolve, reject) => {
      this.port.close((err) => (err ? reject(err) : resolve()));
    });
  }
}

// ─── Actuator ───────────────────────────────────────────────────────────────────

export interface XArmActuatorOptions {
  /** Pause after each step of a sort, in ms. */
  stepPauseMs?: number;
  /** Duration of the gripper pressure-relief move, in ms. */
  reliefMoveMs?: number;
  readTimeoutMs?: number;
  wait?: (ms: number) => Promise<void>;
  logger?: Logger;
}

const BODY_SERVOS = [2, 3, 4, 5, 6];
const UNLOAD_SETTLE_MS = 100;

function defaultWait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class XArmActuator implements Actuator {
  private readonly transport: ArmTransport;
  private readonly positions: ArmPositions;
  private readonly stepPauseMs: number;
  private readonly reliefMoveMs: number;
  private readonly readTimeoutMs: number;
  private readonly wait: (ms: number) => Promise<void>;
  private readonly logger: Logger;
  private readonly parser = new PacketParser();
  private readonly replyListeners = new Set<(packet: XArmPacket) => void>();
  private unsubscribe: (() => void) | null = null;
  private connected = false;
  private moving = false;

  constructor(transport: ArmTransport, positions: ArmPositions, options: XArmActuatorOptions = {}) {
    this.transport = transport;
    this.positions = positions;
    this.stepPauseMs = options.stepPauseMs ?? 300;
    this.reliefMoveMs = options.reliefMoveMs ?? 500;
    this.readTimeoutMs = options.readTimeoutMs ?? 1000;
    this.wait = options.wait ?? defaultWait;
    this.logger = options.logger ?? createConsoleLogger("Arm");
  }

  get isConnected(): boolean {
    return this.connected;
  }

  /** Opens the port, homes the arm and opens the gripper. */
  async connect(): Promise<void> {
    if (this.connected) return;
    try {
      await this.transport.open();
      this.unsubscribe = this.transport.onData((chunk) => {
        for (const packet of this.parser.push(chunk)) {
          for (const listener of this.replyListeners) listener(packet);
        }
      });
      this.connected = true;
      await this.moveBody(this.positions.home);
      await this.gripper(this.positions.gripperOpen);
    } catch (err) {
      this.connected = false;
      throw new StartupFailure(`Failed to initialize arm: ${errorMessage(err)}`, { cause: err });
    }
    this.logger.info("Arm connected and homed");
  }

  async sort(category: Category): Promise<void> {
    const bin = this.positions.bins[category];
    this.logger.info(`Sorting item to ${category} bin...`);

    const steps: Array<[string, () => Promise<void>]> = [
      ["home", () => this.moveBody(this.positions.home)],
      ["open gripper", () => this.gripper(this.positions.gripperOpen)],
      ["pickup", () => this.moveBody(this.positions.pickup)],
      ["close gripper", () => this.gripper(this.positions.gripperClose)],
      ["lift", () => this.moveBody(this.positions.home)],
      [`${category} bin`, () => this.moveBody(bin)],
      ["release", () => this.gripper(this.positions.gripperOpen)],
      ["return home", () => this.moveBody(this.positions.home)],
    ];

    await this.exclusive(async () => {
      for (const [name, step] of steps) {
        this.logger.info(`  -> ${name}`);
        try {
          await step();
        } catch (err) {
          throw new ActuationFailure(`Arm failed at "${name}": ${errorMessage(err)}`, { cause: err });
        }
        await this.wait(this.stepPauseMs);
      }
    });
    this.logger.info(`Sorted to ${category} bin`);
  }

  /** Moves the arm to the home pose. */
  async home(): Promise<void> {
    await this.exclusive(async () => {
      try {
        await this.moveBody(this.positions.home);
      } catch (err) {
        throw new ActuationFailure(`Failed to home arm: ${errorMessage(err)}`, { cause: err });
      }
    });
  }

  async close(): Promise<void> {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.connected = false;
    await this.transport.close();
  }

  // ─── Servo primitives ─────────────────────────────────────────────────────────

  private async exclusive(run: () => Promise<void>): Promise<void> {
    if (!this.connected) throw new ActuationFailure("Arm is not connected");
    if (this.moving) throw new ActuationFailure("Arm is already moving");
    this.moving = true;
    try {
      await run();
    } finally {
      this.moving = false;
    }
  }

  /** Moves servos 2-6, leaving the gripper where it is. */
  private async moveBody(pose: Pose): Promise<void> {
    const targets = BODY_SERVOS.map((id) => ({ id, position: pose[id - 1] }));
    await this.move(targets, this.positions.moveMs);
  }

  /** Moves the gripper, then relieves servo pressure by re-seating it where it stopped. */
  private async gripper(position: number): Promise<void> {
    await this.move([{ id: GRIPPER_SERVO, position }], this.positions.moveMs);

    const actual = (await this.readPositions([GRIPPER_SERVO])).find((p) => p.id === GRIPPER_SERVO);
    if (!actual) throw new Error("Gripper position missing from reply");
    await this.transport.write(encodeUnload([GRIPPER_SERVO]));
    await this.wait(UNLOAD_SETTLE_MS);
    await this.move([{ id: GRIPPER_SERVO, position: actual.position }], this.reliefMoveMs);
  }

  private async move(targets: ServoTarget[], durationMs: number): Promise<void> {
    await this.transport.write(encodeMove(targets, durationMs));
    await this.wait(durationMs);
  }

  private async readPositions(ids: number[]): Promise<ServoTarget[]> {
    const reply = createDeferred<XArmPacket>();
    const listener = (packet: XArmPacket) => {
      if (packet.command === XArmCommand.ServoPositionRead) reply.resolve(packet);
    };
    this.replyListeners.add(listener);
    let timer: ReturnType<typeof setTimeout> | undefined;
    try {
      await this.transport.write(encodeReadPositions(ids));
      timer = setTimeout(
        () => reply.reject(new Error(`No position reply within ${this.readTimeoutMs}ms`)),
        this.readTimeoutMs,
      );
      return decodePositions(await reply.promise);
    } finally {
      clearTimeout(timer);
      this.replyListeners.delete(listener);
    }
  }
}
