/**
 * Shared types for the preprocessing and OCR stages.
 */

/** Pixel coordinates, top-left (x1, y1) to bottom-right (x2, y2). */
export interface BoundingBox {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export interface OCRToken {
  readonly text: string;
  readonly box: BoundingBox;
  /** Engine confidence, integer 0–100 */
  readonly confidence: number;
}

export interface OCRDocument {
  readonly rawText: string;
  readonly tokens: readonly OCRToken[];
  readonly wordCount: number;
  readonly avgConfidence: number;
}

export type PreprocessStep = 'grayscale' | 'upscale' | 'denoise' | 'deskew' | 'binarize';

export type PreprocessOptions = Record<PreprocessStep, boolean>;

export interface PreprocessResult {
  buffer: Buffer;
  width: number;
  height: number;
  /** Linear factor applied to the original dimensions (2 after upscaling, else 1) */
  scale: number;
  appliedSteps: PreprocessStep[];
  warnings: string[];
}

/**
 * Uncompressed interleaved pixels, as produced by sharp's raw output.
 */
export interface RawImage {
  data: Uint8Array;
  width: number;
  height: number;
  channels: number;
}

export interface OcrRecognizeOptions {
  confidenceThreshold: number;
}

/**
 * Boundary to the OCR engine. Implementations must not throw: a failed
 * recognition is reported as an empty document.
 */
export interface OcrAdapter {
  recognize(image: Buffer, options: OcrRecognizeOptions): Promise<OCRDocument>;
}
