/**
 * Body of a receipt queue job, kept apart from the BullMQ worker so it can
 * run inline or under test.
 */

import type { OcrAdapter } from '@/lib/parsing/types';
import type { TempStorage } from '@/lib/storage/tmp-storage';
import { processReceipt, type ReceiptProcessingResult } from '@/lib/extraction/pipeline';
import type { ExtractionResult } from '@/lib/extraction/types';
import { receiptJobSchema } from '@/lib/utils/validation';

export interface ReceiptJobDeps {
  storage: TempStorage;
  ocr?: OcrAdapter;
  referenceDate?: Date;
  onProgress?: (percent: number) => Promise<void>;
}

export interface ReceiptJobSummary {
  status: 'completed';
  documentId: string;
  filename: string;
  result: ExtractionResult;
  metrics: { wordCount: number; avgConfidence: number };
  warnings: string[];
  processingTimeMs: number;
}

export async function runReceiptJob(data: unknown, deps: ReceiptJobDeps): Promise<ReceiptJobSummary> {
  const job = receiptJobSchema.parse(data);
  const progress = deps.onProgress ?? (async () => {});

  console.log(`[ReceiptJob] Processing ${job.documentId.slice(0, 12)}... (${job.filename})`);
  const image = await deps.storage.read(job.storageKey);
  await progress(10);

  let processed: ReceiptProcessingResult;
  try {
    processed = await processReceipt(image, {
      preprocessing: job.preprocessing,
      confidenceThreshold: job.confidenceThreshold,
      ocr: deps.ocr,
      referenceDate: deps.referenceDate,
    });
  } finally {
    await deps.storage.remove(job.storageKey);
  }
  await progress(100);

  return {
    status: 'completed',
    documentId: job.documentId,
    filename: job.filename,
    result: processed.result,
    metrics: processed.metrics,
    warnings: processed.preprocessing.warnings,
    processingTimeMs: processed.processingTimeMs,
  };
}
