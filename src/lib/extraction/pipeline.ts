/**
 * Receipt processing entry point: image bytes in, extracted fields out.
 *
 * image → preprocess → OCR → (boxes mapped back to original pixels) → field extraction
 *
 * Only an undecodable image or invalid options throw; every other problem
 * degrades to empty fields with zero confidence.
 */

import type { OCRDocument, OcrAdapter, PreprocessOptions, PreprocessStep } from '@/lib/parsing/types';
import { preprocessForOcr } from '@/lib/parsing/preprocessor';
import { TesseractOcrAdapter } from '@/lib/parsing/ocr';
import { confidenceThresholdSchema } from '@/lib/utils/validation';
import { getConfig } from '@/lib/config';
import type { ExtractionResult } from './types';
import type { ExtractionRules } from './rules';
import { extractFields } from './aggregator';

export interface ProcessReceiptOptions {
  preprocessing?: Partial<PreprocessOptions>;
  /** Minimum OCR token confidence (0–100); defaults to OCR_CONFIDENCE_THRESHOLD */
  confidenceThreshold?: number;
  ocr?: OcrAdapter;
  rules?: ExtractionRules;
  referenceDate?: Date;
}

export interface ReceiptProcessingResult {
  result: ExtractionResult;
  metrics: {
    wordCount: number;
    avgConfidence: number;
  };
  preprocessing: {
    scale: number;
    appliedSteps: PreprocessStep[];
    warnings: string[];
  };
  processingTimeMs: number;
}

let defaultOcr: TesseractOcrAdapter | null = null;

function getDefaultOcr(): TesseractOcrAdapter {
  if (!defaultOcr) defaultOcr = new TesseractOcrAdapter();
  return defaultOcr;
}

/**
 * Release the shared Tesseract worker, if one was started.
 */
export async function shutdownDefaultOcr(): Promise<void> {
  if (defaultOcr) {
    await defaultOcr.terminate();
    defaultOcr = null;
  }
}

/**
 * Divide token boxes by the preprocessing scale so they refer to the
 * original image.
 */
export function scaleDocumentBoxes(document: OCRDocument, scale: number): OCRDocument {
  if (scale === 1) return document;

  return {
    ...document,
    tokens: document.tokens.map((token) => ({
      ...token,
      box: {
        x1: Math.round(token.box.x1 / scale),
        y1: Math.round(token.box.y1 / scale),
        x2: Math.round(token.box.x2 / scale),
        y2: Math.round(token.box.y2 / scale),
      },
    })),
  };
}

export async function processReceipt(
  image: Buffer,
  options: ProcessReceiptOptions = {}
): Promise<ReceiptProcessingResult> {
  const startTime = Date.now();
  const confidenceThreshold = confidenceThresholdSchema.parse(
    options.confidenceThreshold ?? getConfig().OCR_CONFIDENCE_THRESHOLD
  );
  const ocr = options.ocr ?? getDefaultOcr();

  const preprocessed = await preprocessForOcr(image, options.preprocessing);
  console.log(
    `[Receipt] Preprocessed ${preprocessed.width}x${preprocessed.height} ` +
    `(${preprocessed.appliedSteps.join(', ') || 'no steps'})`
  );

  const recognized = await ocr.recognize(preprocessed.buffer, { confidenceThreshold });
  const document = scaleDocumentBoxes(recognized, preprocessed.scale);

  const result = extractFields(document, {
    rules: options.rules,
    referenceDate: options.referenceDate,
  });

  const processingTimeMs = Date.now() - startTime;
  console.log(
    `[Receipt] Extracted fields in ${processingTimeMs}ms: ` +
    `overall confidence ${(result.overallConfidence * 100).toFixed(1)}%, amounts ${result.amountCheck}`
  );

  return {
    result,
    metrics: {
      wordCount: document.wordCount,
      avgConfidence: document.avgConfidence,
    },
    preprocessing: {
      scale: preprocessed.scale,
      appliedSteps: preprocessed.appliedSteps,
      warnings: preprocessed.warnings,
    },
    processingTimeMs,
  };
}
