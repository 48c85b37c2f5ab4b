// JPEG encoding of raw RGB frames, shared by the live feed and the worker.

import sharp from "sharp";
import type { Frame, FrameEncoder } from "./types.js";
import { EncodeFailure, errorMessage } from "./errors.js";

export const DEFAULT_JPEG_QUALITY = 80;

export class SharpFrameEncoder implements FrameEncoder {
  constructor(private readonly quality: number = DEFAULT_JPEG_QUALITY) {}

  async encodeJpeg(frame: Frame): Promise<Buffer> {
    const expected = frame.width * frame.height * frame.channels;
    if (frame.data.length !== expected) {
      throw new EncodeFailure(
        `Frame buffer has ${frame.data.length} bytes, expected ${expected} for ${frame.width}x${frame.height}`,
      );
    }
    try {
      return await sharp(frame.data, {
        raw: { width: frame.width, height: frame.height, channels: frame.channels },
      })
        .jpeg({ quality: this.quality })
        .toBuffer();
    } catch (err) {
      throw new EncodeFailure(`Failed to encode frame: ${errorMessage(err)}`, { cause: err });
    }
  }
}
