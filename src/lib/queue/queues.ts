/**
 * Receipt queue: callers hand over image bytes, a worker runs the pipeline.
 */

import { createHash } from 'crypto';
import { Queue } from 'bullmq';
import { getRedisConnection } from './connection';
import { generateStorageKey, getTempStorage, type TempStorage } from '@/lib/storage/tmp-storage';
import {
  confidenceThresholdSchema,
  preprocessOptionsSchema,
  receiptJobSchema,
  validateImageSize,
  validateImageType,
  type ReceiptJobData,
} from '@/lib/utils/validation';
import type { PreprocessOptions } from '@/lib/parsing/types';

export const RECEIPT_QUEUE = 'receipt';

export interface EnqueueReceiptOptions {
  mimeType: string;
  preprocessing?: Partial<PreprocessOptions>;
  confidenceThreshold?: number;
}

let receiptQueue: Queue<ReceiptJobData> | null = null;

export function getReceiptQueue(): Queue<ReceiptJobData> {
  if (!receiptQueue) {
    receiptQueue = new Queue<ReceiptJobData>(RECEIPT_QUEUE, { connection: getRedisConnection() });
  }
  return receiptQueue;
}

/**
 * Validate the upload and derive its job payload. The document id hashes
 * the bytes together with the filename and the resolved options, so only a
 * resubmission that would produce the same result maps to the same job.
 */
export function buildReceiptJob(
  image: Buffer,
  filename: string,
  options: EnqueueReceiptOptions
): ReceiptJobData {
  if (!validateImageType(options.mimeType)) {
    throw new Error(`Unsupported image type: ${options.mimeType}`);
  }
  if (!validateImageSize(image.length)) {
    throw new Error(`Image size out of range: ${image.length} bytes`);
  }

  const preprocessing = preprocessOptionsSchema.partial().parse(options.preprocessing ?? {});
  const confidenceThreshold =
    options.confidenceThreshold === undefined
      ? undefined
      : confidenceThresholdSchema.parse(options.confidenceThreshold);

  // Omitted switches hash the same as their defaults
  const fingerprint = JSON.stringify({
    filename,
    preprocessing: preprocessOptionsSchema.parse(preprocessing),
    confidenceThreshold: confidenceThreshold ?? null,
  });
  const documentId = createHash('sha256').update(image).update(fingerprint).digest('hex');

  return receiptJobSchema.parse({
    documentId,
    storageKey: generateStorageKey(documentId, filename),
    filename,
    preprocessing,
    confidenceThreshold,
  });
}

export async function enqueueReceipt(
  image: Buffer,
  filename: string,
  options: EnqueueReceiptOptions,
  storage: TempStorage = getTempStorage()
): Promise<{ documentId: string; jobId: string }> {
  const data = buildReceiptJob(image, filename, options);
  const queue = getReceiptQueue();

  // A job with this id already owns (or has already removed) the stored file
  const existing = await queue.getJob(data.documentId);
  if (existing) {
    console.log(`[Queue] ${filename} already queued as ${data.documentId.slice(0, 12)}...`);
    return { documentId: data.documentId, jobId: existing.id ?? data.documentId };
  }

  await storage.save(data.storageKey, image);

  const job = await queue.add('extract', data, {
    jobId: data.documentId,
    removeOnComplete: { count: 200 },
    removeOnFail: { count: 100 },
  });

  console.log(`[Queue] Enqueued ${filename} as ${data.documentId.slice(0, 12)}...`);
  return { documentId: data.documentId, jobId: job.id ?? data.documentId };
}
