import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { loadArmPositions, parseArmPositions } from "./arm-positions.js";
import { StartupFailure } from "./errors.js";

function validPositions(): Record<string, unknown> {
  return {
    home: [500, 500, 100, 520, 510, 500],
    pickup: [500, 500, 300, 890, 500, 500],
    bins: {
      fruit: [500, 500, 300, 820, 500, 830],
      snack: [500, 500, 300, 820, 500, 980],
      drink: [500, 500, 300, 800, 500, 720],
    },
    gripperOpen: 50,
    gripperClose: 700,
    moveMs: 1500,
  };
}

describe("parseArmPositions", () => {
  it("accepts a complete calibration", () => {
    const positions = parseArmPositions(validPositions());
    expect(positions.home).toEqual([500, 500, 100, 520, 510, 500]);
    expect(positions.bins.snack).toEqual([500, 500, 300, 820, 500, 980]);
    expect(positions).toMatchObject({ gripperOpen: 50, gripperClose: 700, moveMs: 1500 });
  });

  it("freezes poses", () => {
    const positions = parseArmPositions(validPositions());
    expect(Object.isFrozen(positions.pickup)).toBe(true);
  });

  it.each([
    ["a short pose", { home: [500, 500] }, "home must be an array of 6 servo positions"],
    ["an out-of-range servo", { pickup: [500, 500, 300, 1200, 500, 500] }, "pickup[3] must be an integer from 0 to 1000"],
    ["a fractional servo", { pickup: [500.5, 500, 300, 890, 500, 500] }, "pickup[0] must be an integer from 0 to 1000"],
    ["a missing bin", { bins: { fruit: [500, 500, 300, 820, 500, 830] } }, "bins.snack must be an array of 6 servo positions"],
    ["missing bins", { bins: null }, "bins must be an object with a pose per category"],
    ["a bad gripper value", { gripperClose: -1 }, "gripperClose must be an integer from 0 to 1000"],
    ["a zero move time", { moveMs: 0 }, "moveMs must be an integer from 1 to 65535"],
  ])("rejects %s", (_label, override, message) => {
    expect(() => parseArmPositions({ ...validPositions(), ...override })).toThrow(message);
  });

  it("rejects a non-object", () => {
    expect(() => parseArmPositions([1, 2, 3])).toThrow("bins must be an object");
    expect(() => parseArmPositions("home")).toThrow("Arm positions must be a JSON object");
  });
});

describe("loadArmPositions", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "arm-positions-test-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("loads a positions file", async () => {
    const file = join(tempDir, "positions.json");
    await writeFile(file, JSON.stringify(validPositions()));
    expect((await loadArmPositions(file)).moveMs).toBe(1500);
  });

  it("reports a missing file as a startup failure", async () => {
    await expect(loadArmPositions(join(tempDir, "missing.json"))).rejects.toBeInstanceOf(StartupFailure);
  });

  it("reports invalid contents with the file name", async () => {
    const file = join(tempDir, "positions.json");
    await writeFile(file, JSON.stringify({ ...validPositions(), moveMs: "fast" }));
    await expect(loadArmPositions(file)).rejects.toThrow(
      `Invalid arm positions in ${file}: moveMs must be an integer from 1 to 65535`,
    );
  });
});
