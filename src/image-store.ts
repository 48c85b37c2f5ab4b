// Saves the frame each donation was classified from.

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { ImageStore } from "./types.js";

export const IMAGES_DIR = "images";

export class FileImageStore implements ImageStore {
  private readonly imagesDir: string;

  constructor(dataDir: string) {
    this.imagesDir = join(dataDir, IMAGES_DIR);
  }

  /** Writes `<dataDir>/images/<cycleId>.jpg`; returns the path relative to dataDir. */
  async save(cycleId: string, jpeg: Buffer): Promise<string> {
    if (!/^[\w-]+$/.test(cycleId)) {
      throw new Error(`Invalid cycle id for image file: "${cycleId}"`);
    }
    await mkdir(this.imagesDir, { recursive: true });
    const fileName = `${cycleId}.jpg`;
    await writeFile(join(this.imagesDir, fileName), jpeg);
    return `${IMAGES_DIR}/${fileName}`;
  }
}
