// Donation Sorter - Donation log
// Append-only record of donations, kept as a pretty-printed JSON array in
// <dataDir>/donations.json. The whole file is held in memory; each append
// rewrites it through a temp file and rename so a crash never leaves a
// half-written log. Appends are serialized.

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { DonationDraft, DonationRecord, DonationStats, RecordSink } from "./types.js";
import { isCategory } from "./category.js";
import { StartupFailure, errorMessage } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";

export const DONATIONS_FILE = "donations.json";
export const DEFAULT_RECENT_LIMIT = 10;

export interface DonationLogOptions {
  logger?: Logger;
  now?: () => Date;
}

// ─── Record validation ──────────────────────────────────────────────────────────

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === "string";
}

export function isDonationRecord(value: unknown): value is DonationRecord {
  if (typeof value !== "object" || value === null) return false;
  const r = value as Record<string, unknown>;
  return (
    typeof r.id === "number" &&
    Number.isInteger(r.id) &&
    typeof r.category === "string" &&
    isCategory(r.category) &&
    typeof r.itemName === "string" &&
    (r.estimatedWeightLbs === null || typeof r.estimatedWeightLbs === "number") &&
    isNullableString(r.estimatedExpiry) &&
    typeof r.timestamp === "string" &&
    isNullableString(r.imageReference) &&
    isNullableString(r.donorId)
  );
}

// ─── Stats ──────────────────────────────────────────────────────────────────────

export function computeStats(records: readonly DonationRecord[]): DonationStats {
  let totalWeight = 0;
  const donors = new Set<string>();
  const byCategory: Record<string, number> = {};

  for (const record of records) {
    totalWeight += record.estimatedWeightLbs ?? 0;
    if (record.donorId) donors.add(record.donorId);
    byCategory[record.category] = (byCategory[record.category] ?? 0) + 1;
  }

  return {
    totalItems: records.length,
    totalWeightLbs: Math.round(totalWeight * 100) / 100,
    uniqueDonors: donors.size,
    byCategory,
  };
}

// ─── DonationLog ────────────────────────────────────────────────────────────────

export class DonationLog implements RecordSink {
  readonly filePath: string;
  private readonly dataDir: string;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private records: DonationRecord[] = [];
  private writeChain: Promise<unknown> = Promise.resolve();

  private constructor(dataDir: string, options: DonationLogOptions) {
    this.dataDir = dataDir;
    this.filePath = join(dataDir, DONATIONS_FILE);
    this.logger = options.logger ?? createConsoleLogger("DonationLog");
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Loads the log from disk. A missing file is an empty log; an unreadable or
   * malformed one is a StartupFailure rather than something to overwrite.
   */
  static async open(dataDir: string, options: DonationLogOptions = {}): Promise<DonationLog> {
    const log = new DonationLog(dataDir, options);
    await log.load();
    return log;
  }

  append(draft: DonationDraft): Promise<DonationRecord> {
    const next = this.writeChain.then(() => this.write(draft));
    this.writeChain = next.catch(() => undefined);
    return next;
  }

  getAll(): DonationRecord[] {
    return [...this.records];
  }

  /** The last `limit` records, oldest first. */
  getRecent(limit: number = DEFAULT_RECENT_LIMIT): DonationRecord[] {
    if (limit <= 0) return [];
    return this.records.slice(-limit);
  }

  getStats(): DonationStats {
    return computeStats(this.records);
  }

  private async load(): Promise<void> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isNodeError(err) && err.code === "ENOENT") {
        this.logger.info(`No donation log at ${this.filePath}; starting empty`);
        return;
      }
      throw new StartupFailure(`Failed to read donation log ${this.filePath}: ${errorMessage(err)}`, { cause: err });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new StartupFailure(`Donation log ${this.filePath} is not valid JSON: ${errorMessage(err)}`, { cause: err });
    }
    if (!Array.isArray(parsed)) {
      throw new StartupFailure(`Donation log ${this.filePath} must contain a JSON array`);
    }
    const invalid = parsed.findIndex((entry) => !isDonationRecord(entry));
    if (invalid !== -1) {
      throw new StartupFailure(`Donation log ${this.filePath} has an invalid record at index ${invalid}`);
    }

    this.records = parsed.filter(isDonationRecord);
    this.logger.info(`Loaded ${this.records.length} donation records`);
  }

  private async write(draft: DonationDraft): Promise<DonationRecord> {
    const id = this.records.reduce((max, r) => Math.max(max, r.id), 0) + 1;
    const record: DonationRecord = {
      id,
      category: draft.category,
      itemName: draft.itemName,
      estimatedWeightLbs: draft.estimatedWeightLbs,
      estimatedExpiry: draft.estimatedExpiry,
      timestamp: this.now().toISOString(),
      imageReference: draft.imageReference,
      donorId: draft.donorId,
    };
    const next = [...this.records, record];

    await mkdir(this.dataDir, { recursive: true });
    const tmpPath = `${this.filePath}.tmp`;
    await writeFile(tmpPath, JSON.stringify(next, null, 2) + "\n", "utf-8");
    await rename(tmpPath, this.filePath);

    this.records = next;
    this.logger.info(`Logged donation #${id}: ${record.itemName} (${record.category})`);
    return record;
  }
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
