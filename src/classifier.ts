// Donation Sorter - Vision Classifier
// Identifies the donated item in a JPEG snapshot using an
// OpenAI vision-capable chat model, returning a category from the closed set
// plus best-effort item details.
//
// Transport errors and empty responses throw ClassificationFailure. A response
// that is not valid JSON, or whose category is outside the known set, is not a
// failure: the category falls back to the configured default so the physical
// sort keeps moving.

import type { Category, ClassificationResult, Classifier } from "./types.js";
import { normalizeCategory, DEFAULT_FALLBACK_CATEGORY } from "./category.js";
import { ClassificationFailure, errorMessage } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";

// ─── OpenAI client interface (for testability / dependency injection) ───────────

export type VisionMessageContent =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string; detail?: "low" | "high" | "auto" } };

/**
 * Minimal interface for the OpenAI chat completions surface we use.
 * Lets tests inject a mock client without importing the full SDK.
 */
export interface OpenAIVisionClient {
  chat: {
    completions: {
      create(params: {
        model: string;
        messages: Array<{ role: "user"; content: VisionMessageContent[] }>;
        max_tokens?: number;
        temperature?: number;
      }): Promise<{
        choices: Array<{
          message: {
            content: string | null;
          };
        }>;
      }>;
    };
  };
}

export interface VisionClassifierOptions {
  model?: string;
  fallbackCategory?: Category;
  logger?: Logger;
}

export const DEFAULT_CLASSIFIER_MODEL = "gpt-4o-mini";

export const CLASSIFICATION_PROMPT = `Analyze the main food or beverage item in this image.
Return ONLY a JSON object with these fields (no other text):
{
  "category": "fruit" or "snack" or "drink",
  "item_name": "specific item name, e.g. Granny Smith Apple, Tortilla Chips, Bottled Water",
  "estimated_weight_lbs": estimated weight in pounds as a number (e.g. 0.3),
  "estimated_expiry": "YYYY-MM-DD if visible on packaging, otherwise null"
}`;

const EXPIRY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

// ─── Response parsing ───────────────────────────────────────────────────────────

/** Removes a surrounding ``` / ```json fence if the model added one. */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith("```")) return trimmed;
  const firstNewline = trimmed.indexOf("\n");
  const body = firstNewline === -1 ? "" : trimmed.slice(firstNewline + 1);
  const closing = body.lastIndexOf("```");
  return (closing === -1 ? body : body.slice(0, closing)).trim();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseWeight(value: unknown): number | null {
  const n = typeof value === "string" ? parseFloat(value) : value;
  if (typeof n !== "number" || !Number.isFinite(n) || n < 0) return null;
  return n;
}

function parseExpiry(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return EXPIRY_PATTERN.test(trimmed) ? trimmed : null;
}

/**
 * Turns raw model text into a ClassificationResult. Never throws.
 * Non-JSON text is still searched for a category word.
 */
export function parseClassificationResponse(
  raw: string,
  fallbackCategory: Category = DEFAULT_FALLBACK_CATEGORY,
  logger?: Logger,
): ClassificationResult {
  const text = stripCodeFence(raw);

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    logger?.warn(`Could not parse classifier JSON, falling back. Raw: ${text}`);
    data = null;
  }

  if (!isRecord(data)) {
    const { category, fallback } = normalizeCategory(text, fallbackCategory, logger);
    return {
      category,
      itemName: "unknown",
      estimatedWeightLbs: null,
      estimatedExpiry: null,
      fallback,
    };
  }

  const rawCategory = typeof data.category === "string" ? data.category : "";
  const { category, fallback } = normalizeCategory(rawCategory, fallbackCategory, logger);
  const itemName =
    typeof data.item_name === "string" && data.item_name.trim().length > 0
      ? data.item_name.trim()
      : "unknown";

  return {
    category,
    itemName,
    estimatedWeightLbs: parseWeight(data.estimated_weight_lbs),
    estimatedExpiry: parseExpiry(data.estimated_expiry),
    fallback,
  };
}

// ─── VisionClassifier Class ─────────────────────────────────────────────────────

export class VisionClassifier implements Classifier {
  private readonly client: OpenAIVisionClient;
  private readonly model: string;
  private readonly fallbackCategory: Category;
  private readonly logger: Logger;

  constructor(client: OpenAIVisionClient, options: VisionClassifierOptions = {}) {
    this.client = client;
    this.model = options.model ?? DEFAULT_CLASSIFIER_MODEL;
    this.fallbackCategory = options.fallbackCategory ?? DEFAULT_FALLBACK_CATEGORY;
    this.logger = options.logger ?? createConsoleLogger("Classifier");
  }

  async classify(jpeg: Buffer): Promise<ClassificationResult> {
    const dataUrl = `data:image/jpeg;base64,${jpeg.toString("base64")}`;

    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        max_tokens: 256,
        temperature: 0,
        messages: [
          {
            role: "user",
            content: [
              { type: "image_url", image_url: { url: dataUrl, detail: "low" } },
              { type: "text", text: CLASSIFICATION_PROMPT },
            ],
          },
        ],
      });
      content = response.choices[0]?.message.content;
    } catch (err) {
      throw new ClassificationFailure(`Classifier request failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!content || content.trim().length === 0) {
      throw new ClassificationFailure("Classifier returned an empty response");
    }

    const result = parseClassificationResponse(content, this.fallbackCategory, this.logger);
    this.logger.info(
      `Classified ${result.itemName} as ${result.category}` +
        (result.fallback ? " (fallback)" : "") +
        ` | weight=${result.estimatedWeightLbs ?? "?"} lbs | expiry=${result.estimatedExpiry ?? "N/A"}`,
    );
    return result;
  }
}
