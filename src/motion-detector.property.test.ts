// Property-Based Tests: frame-difference motion detection

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { MotionDetector } from "./motion-detector.js";
import type { GrayFrame } from "./types.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

/** Small random grayscale images; content is arbitrary noise. */
const arbitraryGrayFrame = (): fc.Arbitrary<GrayFrame> =>
  fc
    .record({ width: fc.integer({ min: 8, max: 48 }), height: fc.integer({ min: 8, max: 36 }) })
    .chain(({ width, height }) =>
      fc
        .uint8Array({ minLength: width * height, maxLength: width * height })
        .map((data) => ({ width, height, data })),
    );

interface BlockCase {
  background: number;
  delta: number;
  x: number;
  y: number;
  w: number;
  h: number;
}

const FRAME_WIDTH = 200;
const FRAME_HEIGHT = 150;

/**
 * A single rectangular change of at least 75×75 px (≥ 5625 px²) whose
 * intensity delta is well above the default threshold.
 */
const arbitraryBlockCase = (): fc.Arbitrary<BlockCase> =>
  fc
    .record({
      background: fc.integer({ min: 0, max: 100 }),
      delta: fc.integer({ min: 120, max: 155 }),
      w: fc.integer({ min: 75, max: 140 }),
      h: fc.integer({ min: 75, max: 120 }),
    })
    .chain((base) =>
      fc
        .record({
          x: fc.integer({ min: 0, max: FRAME_WIDTH - base.w }),
          y: fc.integer({ min: 0, max: FRAME_HEIGHT - base.h }),
        })
        .map((pos) => ({ ...base, ...pos })),
    );

function renderBlock(c: BlockCase): { before: GrayFrame; after: GrayFrame } {
  const before = new Uint8Array(FRAME_WIDTH * FRAME_HEIGHT).fill(c.background);
  const after = Uint8Array.from(before);
  for (let row = c.y; row < c.y + c.h; row++) {
    after.fill(c.background + c.delta, row * FRAME_WIDTH + c.x, row * FRAME_WIDTH + c.x + c.w);
  }
  return {
    before: { width: FRAME_WIDTH, height: FRAME_HEIGHT, data: before },
    after: { width: FRAME_WIDTH, height: FRAME_HEIGHT, data: after },
  };
}

// ─── Property Tests ─────────────────────────────────────────────────────────────

describe("MotionDetector properties", () => {
  const detector = new MotionDetector();

  it("identical frames never report motion", () => {
    fc.assert(
      fc.property(arbitraryGrayFrame(), (frame) => {
        const copy: GrayFrame = { ...frame, data: Uint8Array.from(frame.data) };
        expect(detector.detect(frame, copy)).toEqual({ isMotion: false, area: 0 });
      }),
      { numRuns: 50 },
    );
  });

  it("a changed region of at least 5000 px² above the threshold is motion", () => {
    fc.assert(
      fc.property(arbitraryBlockCase(), (c) => {
        const { before, after } = renderBlock(c);
        const sample = detector.detect(before, after);
        expect(sample.isMotion).toBe(true);
        expect(sample.area).toBeGreaterThanOrEqual(c.w * c.h);
      }),
      { numRuns: 25 },
    );
  });

  it("detection is symmetric in its arguments", () => {
    fc.assert(
      fc.property(arbitraryBlockCase(), (c) => {
        const { before, after } = renderBlock(c);
        expect(detector.detect(after, before)).toEqual(detector.detect(before, after));
      }),
      { numRuns: 10 },
    );
  });
});
