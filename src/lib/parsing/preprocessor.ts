/**
 * Image preprocessing for OCR.
 *
 * Steps always run in the same order, each behind its own switch:
 * grayscale → upscale (2×, cubic) → denoise (median + bilateral) → deskew → binarize.
 * Bilateral smoothing is skipped on images above MAX_BILATERAL_PIXELS.
 * A step that fails leaves the image as it was; only an undecodable input aborts.
 */

import sharp from 'sharp';
import type { PreprocessOptions, PreprocessResult, PreprocessStep, RawImage } from './types';
import {
  adaptiveThreshold,
  bilateralFilter,
  estimateSkewAngle,
  rotateReplicate,
} from './image-ops';
import { preprocessOptionsSchema } from '@/lib/utils/validation';

export class ImageDecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ImageDecodeError';
  }
}

const STEP_ORDER: readonly PreprocessStep[] = ['grayscale', 'upscale', 'denoise', 'deskew', 'binarize'];

const UPSCALE_FACTOR = 2;
/** Skew at or below this many degrees is left alone */
const MIN_DESKEW_DEGREES = 0.5;
const MAX_UPSCALE_PIXELS = 100_000_000;
/**
 * The bilateral pass is plain JS at ~70 samples per pixel; above this size
 * denoise keeps only the median and records a warning.
 */
export const MAX_BILATERAL_PIXELS = 12_000_000;

const SHARP_CHANNELS = [1, 2, 3, 4] as const;

function sharpChannels(channels: number): (typeof SHARP_CHANNELS)[number] {
  const match = SHARP_CHANNELS.find((c) => c === channels);
  if (match === undefined) {
    throw new Error(`Unsupported channel count: ${channels}`);
  }
  return match;
}

/** Single-channel input stays single-channel on output; sharp otherwise widens it to sRGB */
function fromRaw(image: RawImage): sharp.Sharp {
  const pipeline = sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: sharpChannels(image.channels) },
  });
  return image.channels === 1 ? pipeline.toColourspace('b-w') : pipeline;
}

async function toRaw(pipeline: sharp.Sharp): Promise<RawImage> {
  const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
  return { data, width: info.width, height: info.height, channels: info.channels };
}

async function decodeImage(imageBuffer: Buffer): Promise<RawImage> {
  try {
    return await toRaw(sharp(imageBuffer).removeAlpha());
  } catch (error) {
    throw new ImageDecodeError(
      `Could not decode image: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
}

async function upscaleImage(image: RawImage): Promise<RawImage> {
  const width = image.width * UPSCALE_FACTOR;
  const height = image.height * UPSCALE_FACTOR;
  if (width * height > MAX_UPSCALE_PIXELS) {
    throw new Error(`Image too large to upscale safely (${width}x${height})`);
  }
  return toRaw(fromRaw(image).resize({ width, height, fit: 'fill', kernel: sharp.kernel.cubic }));
}

/**
 * Preprocess an image buffer for OCR. Returns a PNG plus the scale factor
 * needed to map coordinates back onto the original image.
 */
export async function preprocessForOcr(
  imageBuffer: Buffer,
  options?: Partial<PreprocessOptions>
): Promise<PreprocessResult> {
  const settings = preprocessOptionsSchema.parse(options ?? {});
  let image = await decodeImage(imageBuffer);
  const appliedSteps: PreprocessStep[] = [];
  const warnings: string[] = [];
  let scale = 1;

  const handlers: Record<PreprocessStep, (input: RawImage) => Promise<RawImage>> = {
    grayscale: (input) => toRaw(fromRaw(input).grayscale()),
    upscale: upscaleImage,
    denoise: async (input) => {
      const median = await toRaw(fromRaw(input).median(3));
      if (median.width * median.height > MAX_BILATERAL_PIXELS) {
        const message = `denoise: bilateral filter skipped for ${median.width}x${median.height} image`;
        warnings.push(message);
        console.warn(`[Preprocess] ${message}`);
        return median;
      }
      return bilateralFilter(median, { diameter: 9, sigmaColor: 75, sigmaSpace: 75 });
    },
    deskew: async (input) => {
      const angle = estimateSkewAngle(input);
      if (Math.abs(angle) <= MIN_DESKEW_DEGREES) return input;
      console.log(`[Preprocess] Correcting skew of ${angle.toFixed(2)}°`);
      return rotateReplicate(input, -angle);
    },
    binarize: async (input) => adaptiveThreshold(input, { blockSize: 11, offset: 2 }),
  };

  for (const step of STEP_ORDER) {
    if (!settings[step]) continue;
    try {
      image = await handlers[step](image);
      appliedSteps.push(step);
      if (step === 'upscale') scale = UPSCALE_FACTOR;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      warnings.push(`${step} skipped: ${message}`);
      console.warn(`[Preprocess] ${step} failed, passing image through:`, message);
    }
  }

  const buffer = await fromRaw(image).png().toBuffer();

  return {
    buffer,
    width: image.width,
    height: image.height,
    scale,
    appliedSteps,
    warnings,
  };
}
