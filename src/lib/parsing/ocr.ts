/**
 * Tesseract.js OCR adapter.
 *
 * Produces an OCRDocument of word tokens with boxes and 0–100 confidences.
 * Recognition failures are logged and reported as an empty document.
 */

import { createWorker, OEM, PSM, type Worker } from 'tesseract.js';
import type { OCRDocument, OCRToken, OcrAdapter, OcrRecognizeOptions } from './types';
import { getConfig } from '@/lib/config';

/** Word shape shared by tesseract.js output and test fixtures */
export interface RecognizedWord {
  text: string;
  confidence: number;
  bbox: { x0: number; y0: number; x1: number; y1: number };
}

export function emptyOcrDocument(): OCRDocument {
  return { rawText: '', tokens: [], wordCount: 0, avgConfidence: 0 };
}

/**
 * Keep non-empty words whose confidence is strictly above the threshold.
 */
export function buildOcrDocument(
  rawText: string,
  words: readonly RecognizedWord[],
  confidenceThreshold: number
): OCRDocument {
  const tokens: OCRToken[] = [];

  for (const word of words) {
    const text = word.text.trim();
    const confidence = Math.trunc(word.confidence);
    if (!text || confidence <= confidenceThreshold) continue;

    tokens.push({
      text,
      confidence,
      box: { x1: word.bbox.x0, y1: word.bbox.y0, x2: word.bbox.x1, y2: word.bbox.y1 },
    });
  }

  const avgConfidence =
    tokens.length > 0
      ? tokens.reduce((sum, t) => sum + t.confidence, 0) / tokens.length
      : 0;

  return {
    rawText,
    tokens,
    wordCount: tokens.length,
    avgConfidence,
  };
}

export class TesseractOcrAdapter implements OcrAdapter {
  /** Pending or ready worker; shared by concurrent first calls */
  private workerPromise: Promise<Worker> | null = null;

  constructor(private readonly languages: string = getConfig().OCR_LANGUAGES) {}

  /**
   * Create and configure a worker (LSTM + legacy engine, single text block).
   * A worker that fails configuration is terminated before the error propagates.
   */
  private async startWorker(): Promise<Worker> {
    // tesseract.js fetches language data on first use
    const worker = await createWorker(this.languages, OEM.DEFAULT);
    try {
      await worker.setParameters({ tessedit_pageseg_mode: PSM.SINGLE_BLOCK });
    } catch (error) {
      await worker.terminate();
      throw error;
    }
    return worker;
  }

  private getWorker(): Promise<Worker> {
    if (!this.workerPromise) {
      const pending = this.startWorker();
      // Let the next call retry after a failed start
      void pending.catch(() => {
        if (this.workerPromise === pending) this.workerPromise = null;
      });
      this.workerPromise = pending;
    }
    return this.workerPromise;
  }

  async recognize(image: Buffer, options: OcrRecognizeOptions): Promise<OCRDocument> {
    try {
      const worker = await this.getWorker();
      const result = await worker.recognize(image);
      const document = buildOcrDocument(
        result.data.text ?? '',
        result.data.words ?? [],
        options.confidenceThreshold
      );
      console.log(
        `[OCR] Recognized ${document.wordCount} words (avg confidence ${document.avgConfidence.toFixed(1)})`
      );
      return document;
    } catch (error) {
      console.error('[OCR] Recognition failed:', error);
      return emptyOcrDocument();
    }
  }

  /**
   * Terminate the Tesseract worker (cleanup).
   */
  async terminate(): Promise<void> {
    const pending = this.workerPromise;
    if (!pending) return;
    this.workerPromise = null;

    let worker: Worker;
    try {
      worker = await pending;
    } catch (error) {
      console.warn('[OCR] Worker never started:', error instanceof Error ? error.message : error);
      return;
    }
    await worker.terminate();
  }
}
