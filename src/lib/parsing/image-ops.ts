/**
 * Pixel-level filters that libvips (and so sharp) does not provide:
 * edge-preserving smoothing, skew estimation, rotation with replicated
 * borders and adaptive thresholding. All operate on raw interleaved buffers.
 */

import type { RawImage } from './types';

/** Luminance below this is treated as ink on paper */
const FOREGROUND_MAX_LUMA = 128;
const MIN_FOREGROUND_PIXELS = 10;

export function toLuminance(image: RawImage): Uint8Array {
  const { data, width, height, channels } = image;
  if (channels === 1) return data;

  const luma = new Uint8Array(width * height);
  for (let i = 0, p = 0; i < luma.length; i++, p += channels) {
    if (channels < 3) {
      luma[i] = data[p] ?? 0;
      continue;
    }
    const r = data[p] ?? 0;
    const g = data[p + 1] ?? 0;
    const b = data[p + 2] ?? 0;
    luma[i] = Math.round(0.299 * r + 0.587 * g + 0.114 * b);
  }
  return luma;
}

function clamp(value: number, min: number, max: number): number {
  return value < min ? min : value > max ? max : value;
}

export interface BilateralOptions {
  diameter?: number;
  sigmaColor?: number;
  sigmaSpace?: number;
}

/**
 * Bilateral filter: each output pixel is a neighbourhood average weighted by
 * both spatial distance and intensity difference, so edges survive.
 * Colour distance is the sum of absolute channel differences.
 */
export function bilateralFilter(image: RawImage, options: BilateralOptions = {}): RawImage {
  const diameter = options.diameter ?? 9;
  const sigmaColor = options.sigmaColor ?? 75;
  const sigmaSpace = options.sigmaSpace ?? 75;
  const { data, width, height, channels } = image;
  const radius = Math.floor(diameter / 2);

  const offsets: { dx: number; dy: number; weight: number }[] = [];
  for (let dy = -radius; dy <= radius; dy++) {
    for (let dx = -radius; dx <= radius; dx++) {
      const r2 = dx * dx + dy * dy;
      if (r2 > radius * radius) continue;
      offsets.push({ dx, dy, weight: Math.exp(-r2 / (2 * sigmaSpace * sigmaSpace)) });
    }
  }

  const colorWeights = new Float64Array(256 * channels);
  for (let i = 0; i < colorWeights.length; i++) {
    colorWeights[i] = Math.exp(-(i * i) / (2 * sigmaColor * sigmaColor));
  }

  const out = new Uint8Array(data.length);
  const sums = new Float64Array(channels);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const center = (y * width + x) * channels;
      sums.fill(0);
      let weightSum = 0;

      for (const { dx, dy, weight } of offsets) {
        const nx = clamp(x + dx, 0, width - 1);
        const ny = clamp(y + dy, 0, height - 1);
        const neighbour = (ny * width + nx) * channels;

        let colorDistance = 0;
        for (let c = 0; c < channels; c++) {
          colorDistance += Math.abs((data[neighbour + c] ?? 0) - (data[center + c] ?? 0));
        }
        const w = weight * (colorWeights[colorDistance] ?? 0);
        weightSum += w;
        for (let c = 0; c < channels; c++) {
          sums[c] = (sums[c] ?? 0) + w * (data[neighbour + c] ?? 0);
        }
      }

      for (let c = 0; c < channels; c++) {
        out[center + c] = Math.round((sums[c] ?? 0) / weightSum);
      }
    }
  }

  return { data: out, width, height, channels };
}

export type Point = readonly [number, number];

function cross(o: Point, a: Point, b: Point): number {
  return (a[0] - o[0]) * (b[1] - o[1]) - (a[1] - o[1]) * (b[0] - o[0]);
}

/** One monotone-chain pass; keeps only counter-clockwise turns. */
function buildChain(points: readonly Point[]): Point[] {
  const chain: Point[] = [];
  for (const p of points) {
    while (chain.length >= 2) {
      const a = chain[chain.length - 2];
      const b = chain[chain.length - 1];
      if (a === undefined || b === undefined || cross(a, b, p) > 0) break;
      chain.pop();
    }
    chain.push(p);
  }
  return chain;
}

/** Andrew's monotone chain; returns hull vertices counter-clockwise. */
export function convexHull(points: Point[]): Point[] {
  const sorted = [...points].sort((a, b) => a[0] - b[0] || a[1] - b[1]);
  if (sorted.length <= 2) return sorted;

  const lower = buildChain(sorted);
  const upper = buildChain([...sorted].reverse());

  lower.pop();
  upper.pop();
  return lower.concat(upper);
}

/**
 * Edge angle (degrees, image coordinates with y pointing down) of the
 * minimum-area rectangle enclosing the given hull.
 */
export function minAreaRectAngle(hull: Point[]): number {
  if (hull.length < 2) return 0;

  let bestArea = Infinity;
  let bestAngle = 0;

  for (const [i, a] of hull.entries()) {
    const b = hull[(i + 1) % hull.length];
    if (b === undefined) continue;
    const ex = b[0] - a[0];
    const ey = b[1] - a[1];
    const length = Math.hypot(ex, ey);
    if (length === 0) continue;

    const ux = ex / length;
    const uy = ey / length;
    let minU = Infinity;
    let maxU = -Infinity;
    let minV = Infinity;
    let maxV = -Infinity;
    for (const p of hull) {
      const u = p[0] * ux + p[1] * uy;
      const v = -p[0] * uy + p[1] * ux;
      minU = Math.min(minU, u);
      maxU = Math.max(maxU, u);
      minV = Math.min(minV, v);
      maxV = Math.max(maxV, v);
    }

    const area = (maxU - minU) * (maxV - minV);
    if (area < bestArea) {
      bestArea = area;
      bestAngle = (Math.atan2(ey, ex) * 180) / Math.PI;
    }
  }

  return bestAngle;
}

/** Fold any angle into (-45, 45]. */
export function normalizeSkewAngle(degrees: number): number {
  let angle = ((degrees % 90) + 90) % 90;
  if (angle > 45) angle -= 90;
  return angle;
}

/**
 * Dominant text angle from the minimum-area rectangle around the dark pixels.
 * Throws when there is not enough ink to estimate from.
 */
export function estimateSkewAngle(image: RawImage): number {
  const luma = toLuminance(image);
  const { width, height } = image;
  const extremes: Point[] = [];
  let foreground = 0;

  // Only the outermost ink pixel on each side of a row can be a hull vertex
  for (let y = 0; y < height; y++) {
    let left = -1;
    let right = -1;
    for (let x = 0; x < width; x++) {
      if ((luma[y * width + x] ?? 255) < FOREGROUND_MAX_LUMA) {
        if (left < 0) left = x;
        right = x;
        foreground++;
      }
    }
    if (left >= 0) {
      extremes.push([left, y]);
      if (right !== left) extremes.push([right, y]);
    }
  }

  if (foreground < MIN_FOREGROUND_PIXELS) {
    throw new Error(`Too few foreground pixels to estimate skew (${foreground})`);
  }

  return normalizeSkewAngle(minAreaRectAngle(convexHull(extremes)));
}

/**
 * Rotate about the image centre by `degrees` (positive turns content clockwise
 * on screen). Output keeps the input size; samples falling outside the source
 * take the nearest edge pixel.
 */
export function rotateReplicate(image: RawImage, degrees: number): RawImage {
  const { data, width, height, channels } = image;
  const out = new Uint8Array(data.length);
  const rad = (degrees * Math.PI) / 180;
  const cos = Math.cos(rad);
  const sin = Math.sin(rad);
  const cx = (width - 1) / 2;
  const cy = (height - 1) / 2;

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const dx = x - cx;
      const dy = y - cy;
      const sx = clamp(cx + cos * dx + sin * dy, 0, width - 1);
      const sy = clamp(cy - sin * dx + cos * dy, 0, height - 1);

      const x0 = Math.floor(sx);
      const y0 = Math.floor(sy);
      const x1 = Math.min(x0 + 1, width - 1);
      const y1 = Math.min(y0 + 1, height - 1);
      const fx = sx - x0;
      const fy = sy - y0;

      const target = (y * width + x) * channels;
      for (let c = 0; c < channels; c++) {
        const p00 = data[(y0 * width + x0) * channels + c] ?? 0;
        const p10 = data[(y0 * width + x1) * channels + c] ?? 0;
        const p01 = data[(y1 * width + x0) * channels + c] ?? 0;
        const p11 = data[(y1 * width + x1) * channels + c] ?? 0;
        const top = p00 + (p10 - p00) * fx;
        const bottom = p01 + (p11 - p01) * fx;
        out[target + c] = Math.round(top + (bottom - top) * fy);
      }
    }
  }

  return { data: out, width, height, channels };
}

function gaussianKernel(size: number): Float64Array {
  const sigma = 0.3 * ((size - 1) * 0.5 - 1) + 0.8;
  const radius = Math.floor(size / 2);
  const kernel = new Float64Array(size);
  let sum = 0;
  for (let i = 0; i < size; i++) {
    const d = i - radius;
    const v = Math.exp(-(d * d) / (2 * sigma * sigma));
    kernel[i] = v;
    sum += v;
  }
  for (let i = 0; i < size; i++) kernel[i] = (kernel[i] ?? 0) / sum;
  return kernel;
}

export interface AdaptiveThresholdOptions {
  /** Odd neighbourhood size */
  blockSize?: number;
  /** Subtracted from the weighted local mean */
  offset?: number;
}

/**
 * Gaussian-weighted local thresholding. Pixels brighter than their local
 * mean minus `offset` become white, everything else black.
 * Output is always single-channel.
 */
export function adaptiveThreshold(image: RawImage, options: AdaptiveThresholdOptions = {}): RawImage {
  const blockSize = options.blockSize ?? 11;
  const offset = options.offset ?? 2;
  if (blockSize < 3 || blockSize % 2 === 0) {
    throw new Error(`Adaptive threshold block size must be odd and >= 3, got ${blockSize}`);
  }

  const { width, height } = image;
  const luma = toLuminance(image);
  const kernel = gaussianKernel(blockSize);
  const radius = Math.floor(blockSize / 2);

  const horizontal = new Float64Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let acc = 0;
      for (let k = -radius; k <= radius; k++) {
        const nx = clamp(x + k, 0, width - 1);
        acc += (kernel[k + radius] ?? 0) * (luma[y * width + nx] ?? 0);
      }
      horizontal[y * width + x] = acc;
    }
  }

  const out = new Uint8Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let mean = 0;
      for (let k = -radius; k <= radius; k++) {
        const ny = clamp(y + k, 0, height - 1);
        mean += (kernel[k + radius] ?? 0) * (horizontal[ny * width + x] ?? 0);
      }
      const i = y * width + x;
      out[i] = (luma[i] ?? 0) > mean - offset ? 255 : 0;
    }
  }

  return { data: out, width, height, channels: 1 };
}
