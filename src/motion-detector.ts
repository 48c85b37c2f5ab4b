/**
 * MotionDetector: frame-difference motion detection.
 *
 * Frames wider than analysisWidth are box-downscaled first. Both frames are
 * then blurred to suppress sensor noise, absolute-differenced, thresholded,
 * dilated to merge fragments, and the area of the largest 8-connected changed
 * region is reported in full-resolution pixels. Pure: no state is kept
 * between calls, so the same inputs always give the same sample.
 */

import type { Frame, GrayFrame, MotionConfig, MotionSample } from "./types.js";

// ─── Default Config ─────────────────────────────────────────────────────────────

export const DEFAULT_MOTION_CONFIG: MotionConfig = {
  threshold: 30,
  minArea: 5000,
  blurKernelSize: 21,
  dilateIterations: 2,
  analysisWidth: 320,
};

/** A grayscale frame that has already been downscaled and blurred. */
export interface PreparedFrame extends GrayFrame {
  readonly prepared: true;
  /** Source pixels per analysed pixel along each axis. */
  readonly scale: number;
}

// ─── Image helpers ──────────────────────────────────────────────────────────────

/** RGB → 8-bit luma (ITU-R BT.601 weights). */
export function toGray(frame: Frame): GrayFrame {
  const pixelCount = frame.width * frame.height;
  const out = new Uint8Array(pixelCount);
  const src = frame.data;
  for (let i = 0, j = 0; i < pixelCount; i++, j += 3) {
    out[i] = Math.round(0.299 * src[j] + 0.587 * src[j + 1] + 0.114 * src[j + 2]);
  }
  return { width: frame.width, height: frame.height, data: out };
}

/** Mean of each factor×factor block; a partial last row or column is dropped. */
export function downscale(image: GrayFrame, factor: number): GrayFrame {
  if (!Number.isInteger(factor) || factor < 1) {
    throw new Error(`Invalid downscale factor: ${factor}`);
  }
  if (factor === 1) return image;

  const width = Math.max(1, Math.floor(image.width / factor));
  const height = Math.max(1, Math.floor(image.height / factor));
  const blockW = Math.min(factor, image.width);
  const blockH = Math.min(factor, image.height);
  const out = new Uint8Array(width * height);
  const cells = blockW * blockH;

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let sum = 0;
      for (let dy = 0; dy < blockH; dy++) {
        const row = (y * factor + dy) * image.width + x * factor;
        for (let dx = 0; dx < blockW; dx++) sum += image.data[row + dx];
      }
      out[y * width + x] = Math.round(sum / cells);
    }
  }
  return { width, height, data: out };
}

/**
 * Normalized 1-D Gaussian kernel. Sigma follows the usual size-derived rule
 * sigma = 0.3 * ((k - 1) * 0.5 - 1) + 0.8.
 */
export function gaussianKernel(size: number): Float64Array {
  if (size < 1 || size % 2 === 0) {
    throw new Error(`Invalid blur kernel size: ${size}. Must be a positive odd integer.`);
  }
  const sigma = 0.3 * ((size - 1) * 0.5 - 1) + 0.8;
  const radius = (size - 1) / 2;
  const kernel = new Float64Array(size);
  let sum = 0;
  for (let i = 0; i < size; i++) {
    const x = i - radius;
    kernel[i] = Math.exp(-(x * x) / (2 * sigma * sigma));
    sum += kernel[i];
  }
  for (let i = 0; i < size; i++) kernel[i] /= sum;
  return kernel;
}

/** Separable Gaussian blur with replicated edges. */
export function gaussianBlur(image: GrayFrame, kernelSize: number): GrayFrame {
  const { width, height, data } = image;
  const kernel = gaussianKernel(kernelSize);
  const radius = (kernelSize - 1) / 2;
  const horizontal = new Float32Array(width * height);

  for (let y = 0; y < height; y++) {
    const row = y * width;
    for (let x = 0; x < width; x++) {
      let acc = 0;
      for (let k = -radius; k <= radius; k++) {
        const sx = Math.min(width - 1, Math.max(0, x + k));
        acc += data[row + sx] * kernel[k + radius];
      }
      horizontal[row + x] = acc;
    }
  }

  const out = new Uint8Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let acc = 0;
      for (let k = -radius; k <= radius; k++) {
        const sy = Math.min(height - 1, Math.max(0, y + k));
        acc += horizontal[sy * width + x] * kernel[k + radius];
      }
      out[y * width + x] = Math.min(255, Math.round(acc));
    }
  }

  return { width, height, data: out };
}

/** 1 where |a - b| > threshold, else 0. */
export function thresholdDiff(a: GrayFrame, b: GrayFrame, threshold: number): Uint8Array {
  const mask = new Uint8Array(a.data.length);
  for (let i = 0; i < mask.length; i++) {
    mask[i] = Math.abs(a.data[i] - b.data[i]) > threshold ? 1 : 0;
  }
  return mask;
}

/** Binary dilation with a 3×3 square structuring element. */
export function dilate(mask: Uint8Array, width: number, height: number, iterations: number): Uint8Array {
  let current = mask;
  for (let pass = 0; pass < iterations; pass++) {
    const next = new Uint8Array(current.length);
    for (let y = 0; y < height; y++) {
      const y0 = Math.max(0, y - 1);
      const y1 = Math.min(height - 1, y + 1);
      for (let x = 0; x < width; x++) {
        const x0 = Math.max(0, x - 1);
        const x1 = Math.min(width - 1, x + 1);
        let hit = 0;
        for (let ny = y0; ny <= y1 && hit === 0; ny++) {
          for (let nx = x0; nx <= x1; nx++) {
            if (current[ny * width + nx] === 1) {
              hit = 1;
              break;
            }
          }
        }
        next[y * width + x] = hit;
      }
    }
    current = next;
  }
  return current;
}

/** Pixel count of the largest 8-connected region of 1s. */
export function largestRegionArea(mask: Uint8Array, width: number, height: number): number {
  const visited = new Uint8Array(mask.length);
  const stack = new Int32Array(mask.length);
  let largest = 0;

  for (let start = 0; start < mask.length; start++) {
    if (mask[start] === 0 || visited[start] === 1) continue;

    let top = 0;
    let area = 0;
    stack[top++] = start;
    visited[start] = 1;

    while (top > 0) {
      const idx = stack[--top];
      area++;
      const x = idx % width;
      const y = (idx - x) / width;
      for (let dy = -1; dy <= 1; dy++) {
        const ny = y + dy;
        if (ny < 0 || ny >= height) continue;
        for (let dx = -1; dx <= 1; dx++) {
          const nx = x + dx;
          if (nx < 0 || nx >= width) continue;
          const n = ny * width + nx;
          if (mask[n] === 1 && visited[n] === 0) {
            visited[n] = 1;
            stack[top++] = n;
          }
        }
      }
    }

    if (area > largest) largest = area;
  }

  return largest;
}

// ─── MotionDetector Class ───────────────────────────────────────────────────────

export class MotionDetector {
  private readonly config: MotionConfig;

  constructor(config: Partial<MotionConfig> = {}) {
    this.config = { ...DEFAULT_MOTION_CONFIG, ...config };
    // Fail at construction rather than on the first tick.
    gaussianKernel(this.config.blurKernelSize);
    if (!Number.isInteger(this.config.analysisWidth) || this.config.analysisWidth < 1) {
      throw new Error(`Invalid analysis width: ${this.config.analysisWidth}`);
    }
  }

  get minArea(): number {
    return this.config.minArea;
  }

  /** Downscale factor applied to frames of the given width. */
  scaleFor(width: number): number {
    return Math.max(1, Math.ceil(width / this.config.analysisWidth));
  }

  /** Downscale and blur a grayscale frame once so it can be compared against several others. */
  prepare(gray: GrayFrame): PreparedFrame {
    const scale = this.scaleFor(gray.width);
    const blurred = gaussianBlur(downscale(gray, scale), scaledKernelSize(this.config.blurKernelSize, scale));
    return { ...blurred, prepared: true, scale };
  }

  compare(prev: PreparedFrame, curr: PreparedFrame): MotionSample {
    if (prev.width !== curr.width || prev.height !== curr.height) {
      throw new Error(
        `Frame size mismatch: ${prev.width}x${prev.height} vs ${curr.width}x${curr.height}`,
      );
    }
    const mask = thresholdDiff(prev, curr, this.config.threshold);
    const dilated = dilate(mask, curr.width, curr.height, this.config.dilateIterations);
    const area = largestRegionArea(dilated, curr.width, curr.height) * curr.scale * curr.scale;
    return { isMotion: area >= this.config.minArea, area };
  }

  detect(prevGray: GrayFrame, currGray: GrayFrame): MotionSample {
    return this.compare(this.prepare(prevGray), this.prepare(currGray));
  }
}

/** The blur kernel shrinks with the image so it covers the same scene area. */
function scaledKernelSize(size: number, scale: number): number {
  if (scale === 1) return size;
  const scaled = Math.max(1, Math.round(size / scale));
  return scaled % 2 === 0 ? scaled + 1 : scaled;
}
