import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { FileImageStore } from "./image-store.js";

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), "image-store-test-"));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

describe("FileImageStore", () => {
  it("writes the JPEG under images/ and returns a relative reference", async () => {
    const store = new FileImageStore(tempDir);
    const reference = await store.save("3f2c9a1e-cycle", Buffer.from([0xff, 0xd8, 0xff, 0xd9]));

    expect(reference).toBe("images/3f2c9a1e-cycle.jpg");
    const written = await readFile(join(tempDir, "images", "3f2c9a1e-cycle.jpg"));
    expect([...written]).toEqual([0xff, 0xd8, 0xff, 0xd9]);
  });

  it("rejects ids that could escape the images directory", async () => {
    const store = new FileImageStore(tempDir);
    await expect(store.save("../donations", Buffer.alloc(1))).rejects.toThrow(
      'Invalid cycle id for image file: "../donations"',
    );
  });
});
