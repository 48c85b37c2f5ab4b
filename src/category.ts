// Category resolution for classifier responses.
//
// Responses are matched against the closed category set: an exact match after
// trimming and lowercasing wins, otherwise the first category (in CATEGORIES
// order) that appears anywhere in the text. Anything else is ambiguous and, in
// the lenient path, resolves to the configured fallback category so the item
// still gets sorted instead of being dropped.

import { CATEGORIES, type Category } from "./types.js";
import { AmbiguousClassification } from "./errors.js";
import type { Logger } from "./logger.js";

export const DEFAULT_FALLBACK_CATEGORY: Category = "snack";

export function isCategory(value: string): value is Category {
  return (CATEGORIES as readonly string[]).includes(value);
}

/**
 * Strict parse.
 * @throws AmbiguousClassification when no known category can be found
 */
export function parseCategory(raw: string): Category {
  const text = raw.trim().toLowerCase();
  if (isCategory(text)) return text;
  for (const category of CATEGORIES) {
    if (text.includes(category)) return category;
  }
  throw new AmbiguousClassification(raw);
}

export interface NormalizedCategory {
  category: Category;
  fallback: boolean;
}

/** Lenient parse: never throws, reports whether the fallback was used. */
export function normalizeCategory(
  raw: string,
  fallbackCategory: Category = DEFAULT_FALLBACK_CATEGORY,
  logger?: Logger,
): NormalizedCategory {
  try {
    return { category: parseCategory(raw), fallback: false };
  } catch (err) {
    if (!(err instanceof AmbiguousClassification)) throw err;
    logger?.warn(`${err.message}, defaulting to "${fallbackCategory}"`);
    return { category: fallbackCategory, fallback: true };
  }
}
