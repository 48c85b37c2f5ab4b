import { describe, it, expect } from "vitest";
import { FrameSlot, SingleFlight, createControllerContext } from "./controller-context.js";
import type { Frame } from "./types.js";

function frame(sequence: number): Frame {
  return { width: 2, height: 2, channels: 3, data: Buffer.alloc(12), capturedAt: sequence, sequence };
}

describe("FrameSlot", () => {
  it("is empty until the first write", () => {
    const slot = new FrameSlot();
    expect(slot.get()).toBeNull();
    expect(slot.writeCount).toBe(0);
  });

  it("keeps only the newest frame", () => {
    const slot = new FrameSlot();
    const a = frame(1);
    const b = frame(2);
    slot.put(a);
    slot.put(b);
    expect(slot.get()).toBe(b);
    expect(slot.writeCount).toBe(2);
  });
});

describe("SingleFlight", () => {
  it("grants one holder at a time", () => {
    const flight = new SingleFlight();
    expect(flight.tryAcquire()).toBe(true);
    expect(flight.busy).toBe(true);
    expect(flight.tryAcquire()).toBe(false);

    flight.release();
    expect(flight.busy).toBe(false);
    expect(flight.tryAcquire()).toBe(true);
  });
});

describe("createControllerContext", () => {
  it("wires fresh shared state", () => {
    const context = createControllerContext(() => new Date("2026-01-01T00:00:00.000Z"));
    expect(context.frameSlot.get()).toBeNull();
    expect(context.flight.busy).toBe(false);
    expect(context.publisher.read().updatedAt).toBe("2026-01-01T00:00:00.000Z");
  });
});
