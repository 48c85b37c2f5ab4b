import { describe, it, expect, vi } from "vitest";
import { LiveFeed } from "./live-feed.js";
import { createDeferred } from "./utils/deferred.js";
import type { Frame } from "./types.js";

function frameAt(capturedAt: number, sequence = capturedAt): Frame {
  return { width: 2, height: 2, channels: 3, data: Buffer.alloc(12), capturedAt, sequence };
}

function silentLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("LiveFeed", () => {
  it("has no preview before the first frame", () => {
    const feed = new LiveFeed({ encodeJpeg: vi.fn() }, { logger: silentLogger() });
    expect(feed.latestJpeg()).toBeNull();
  });

  it("stores the encoded preview and notifies subscribers", async () => {
    const encodeJpeg = vi.fn().mockResolvedValue(Buffer.from("jpeg-1"));
    const feed = new LiveFeed({ encodeJpeg }, { logger: silentLogger() });
    const listener = vi.fn();
    feed.subscribe(listener);

    expect(feed.offer(frameAt(0))).toBe(true);
    await feed.settled();

    expect(feed.latestJpeg()).toEqual(Buffer.from("jpeg-1"));
    expect(listener).toHaveBeenCalledWith(Buffer.from("jpeg-1"));
  });

  it("throttles to the configured rate", async () => {
    const encodeJpeg = vi.fn().mockResolvedValue(Buffer.from("jpeg"));
    const feed = new LiveFeed({ encodeJpeg }, { maxFps: 10, logger: silentLogger() });

    expect(feed.offer(frameAt(0))).toBe(true);
    await feed.settled();
    expect(feed.offer(frameAt(50))).toBe(false);
    expect(feed.offer(frameAt(100))).toBe(true);
    await feed.settled();
    expect(encodeJpeg).toHaveBeenCalledTimes(2);
  });

  it("drops frames while an encode is in flight", async () => {
    const pending = createDeferred<Buffer>();
    const encodeJpeg = vi.fn().mockReturnValue(pending.promise);
    const feed = new LiveFeed({ encodeJpeg }, { maxFps: 1000, logger: silentLogger() });

    expect(feed.offer(frameAt(0))).toBe(true);
    expect(feed.offer(frameAt(500))).toBe(false);
    pending.resolve(Buffer.from("slow"));
    await feed.settled();

    expect(encodeJpeg).toHaveBeenCalledTimes(1);
    expect(feed.latestJpeg()).toEqual(Buffer.from("slow"));
  });

  it("keeps the previous preview when an encode fails", async () => {
    const logger = silentLogger();
    const encodeJpeg = vi
      .fn()
      .mockResolvedValueOnce(Buffer.from("good"))
      .mockRejectedValueOnce(new Error("corrupt frame"));
    const feed = new LiveFeed({ encodeJpeg }, { maxFps: 1000, logger });

    feed.offer(frameAt(0, 1));
    await feed.settled();
    feed.offer(frameAt(10, 2));
    await feed.settled();

    expect(feed.latestJpeg()).toEqual(Buffer.from("good"));
    expect(feed.encodeFailures).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith("Preview encode failed for frame #2: corrupt frame");
  });

  it("stops notifying after unsubscribe", async () => {
    const feed = new LiveFeed({ encodeJpeg: vi.fn().mockResolvedValue(Buffer.from("x")) }, { maxFps: 1000, logger: silentLogger() });
    const listener = vi.fn();
    const unsubscribe = feed.subscribe(listener);
    unsubscribe();
    feed.offer(frameAt(0));
    await feed.settled();
    expect(listener).not.toHaveBeenCalled();
  });
});
