// Calibrated arm poses, read from a JSON file at startup.
// A pose is six servo positions (0-1000) for servos 1-6; servo 1 is the gripper.

import { readFile } from "node:fs/promises";
import type { Category } from "./types.js";
import { StartupFailure, errorMessage } from "./errors.js";

export const SERVO_COUNT = 6;
export const GRIPPER_SERVO = 1;
export const MAX_SERVO_POSITION = 1000;

export type Pose = readonly number[];

export interface ArmPositions {
  home: Pose;
  pickup: Pose;
  bins: Record<Category, Pose>;
  gripperOpen: number;
  gripperClose: number;
  /** Duration of each move, in milliseconds. */
  moveMs: number;
}

function isServoPosition(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= MAX_SERVO_POSITION;
}

function parsePose(value: unknown, path: string): Pose {
  if (!Array.isArray(value) || value.length !== SERVO_COUNT) {
    throw new Error(`${path} must be an array of ${SERVO_COUNT} servo positions`);
  }
  const pose: number[] = [];
  for (const [i, position] of value.entries()) {
    if (!isServoPosition(position)) {
      throw new Error(`${path}[${i}] must be an integer from 0 to ${MAX_SERVO_POSITION}`);
    }
    pose.push(position);
  }
  return Object.freeze(pose);
}

function field(obj: object, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(obj, key) ? Reflect.get(obj, key) : undefined;
}

/** Validates parsed JSON into ArmPositions. Throws with the offending field's path. */
export function parseArmPositions(raw: unknown): ArmPositions {
  if (typeof raw !== "object" || raw === null) {
    throw new Error("Arm positions must be a JSON object");
  }

  const binsRaw = field(raw, "bins");
  if (typeof binsRaw !== "object" || binsRaw === null) {
    throw new Error("bins must be an object with a pose per category");
  }
  const binPose = (category: Category): Pose => parsePose(field(binsRaw, category), `bins.${category}`);
  const bins: Record<Category, Pose> = {
    fruit: binPose("fruit"),
    snack: binPose("snack"),
    drink: binPose("drink"),
  };

  const gripperOpen = field(raw, "gripperOpen");
  const gripperClose = field(raw, "gripperClose");
  if (!isServoPosition(gripperOpen)) {
    throw new Error(`gripperOpen must be an integer from 0 to ${MAX_SERVO_POSITION}`);
  }
  if (!isServoPosition(gripperClose)) {
    throw new Error(`gripperClose must be an integer from 0 to ${MAX_SERVO_POSITION}`);
  }

  const moveMs = field(raw, "moveMs");
  if (typeof moveMs !== "number" || !Number.isInteger(moveMs) || moveMs <= 0 || moveMs > 0xffff) {
    throw new Error("moveMs must be an integer from 1 to 65535");
  }

  return {
    home: parsePose(field(raw, "home"), "home"),
    pickup: parsePose(field(raw, "pickup"), "pickup"),
    bins,
    gripperOpen,
    gripperClose,
    moveMs,
  };
}

export async function loadArmPositions(filePath: string): Promise<ArmPositions> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(filePath, "utf-8"));
  } catch (err) {
    throw new StartupFailure(`Failed to read arm positions from ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
  try {
    return parseArmPositions(parsed);
  } catch (err) {
    throw new StartupFailure(`Invalid arm positions in ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
}
