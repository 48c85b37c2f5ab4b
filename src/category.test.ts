import { describe, it, expect, vi } from "vitest";
import * as fc from "fast-check";
import {
  isCategory,
  parseCategory,
  normalizeCategory,
  DEFAULT_FALLBACK_CATEGORY,
} from "./category.js";
import { AmbiguousClassification } from "./errors.js";
import { CATEGORIES } from "./types.js";

describe("parseCategory", () => {
  it.each([
    ["Fruit", "fruit"],
    ["FRUIT!!", "fruit"],
    [" fruit ", "fruit"],
    ["snack", "snack"],
    ["Drink.", "drink"],
    ["It looks like a drink to me", "drink"],
  ])("parses %j as %s", (raw, expected) => {
    expect(parseCategory(raw)).toBe(expected);
  });

  it("prefers categories in declaration order when several appear", () => {
    expect(parseCategory("a drink or a snack with fruit")).toBe("fruit");
  });

  it("throws AmbiguousClassification for unknown text", () => {
    expect(() => parseCategory("vegetable")).toThrow(AmbiguousClassification);
    try {
      parseCategory("vegetable");
    } catch (err) {
      expect(err).toBeInstanceOf(AmbiguousClassification);
      if (err instanceof AmbiguousClassification) {
        expect(err.response).toBe("vegetable");
        expect(err.kind).toBe("ambiguous");
        expect(err.recoverable).toBe(true);
      }
    }
  });
});

describe("normalizeCategory", () => {
  it("defaults to snack", () => {
    expect(DEFAULT_FALLBACK_CATEGORY).toBe("snack");
    expect(normalizeCategory("vegetable")).toEqual({ category: "snack", fallback: true });
  });

  it("uses the configured fallback and logs a warning", () => {
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    expect(normalizeCategory("", "drink", logger)).toEqual({ category: "drink", fallback: true });
    expect(logger.warn).toHaveBeenCalledWith('Unrecognized category response: "", defaulting to "drink"');
  });

  it("does not flag recognized responses", () => {
    expect(normalizeCategory("FRUIT!!")).toEqual({ category: "fruit", fallback: false });
  });

  it("never throws and always yields a known category", () => {
    fc.assert(
      fc.property(fc.string(), fc.constantFrom(...CATEGORIES), (raw, fallback) => {
        const result = normalizeCategory(raw, fallback);
        expect(isCategory(result.category)).toBe(true);
        if (result.fallback) expect(result.category).toBe(fallback);
      }),
      { numRuns: 200 },
    );
  });

  it("is stable under padding and case changes", () => {
    fc.assert(
      fc.property(
        fc.constantFrom(...CATEGORIES),
        fc.constantFrom("", " ", "  \t"),
        fc.boolean(),
        (category, pad, upper) => {
          const raw = `${pad}${upper ? category.toUpperCase() : category}${pad}`;
          expect(normalizeCategory(raw)).toEqual({ category, fallback: false });
        },
      ),
    );
  });
});
