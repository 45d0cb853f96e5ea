import { z } from 'zod';

export const preprocessOptionsSchema = z.object({
  grayscale: z.boolean().default(true),
  denoise: z.boolean().default(true),
  deskew: z.boolean().default(true),
  upscale: z.boolean().default(true),
  binarize: z.boolean().default(true),
});

export const confidenceThresholdSchema = z.number().int().min(0).max(100);

export const receiptJobSchema = z.object({
  documentId: z.string().min(1),
  storageKey: z.string().min(1),
  filename: z.string().min(1),
  preprocessing: preprocessOptionsSchema.partial().default({}),
  confidenceThreshold: confidenceThresholdSchema.optional(),
});

export type ReceiptJobData = z.infer<typeof receiptJobSchema>;

export const groundTruthEntrySchema = z.object({
  vendor: z.string().nullable(),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD').nullable(),
  subtotal: z.number().nonnegative().nullable(),
  tax: z.number().nonnegative().nullable(),
  total: z.number().nonnegative().nullable(),
  expectedWordsMin: z.number().int().min(0).default(20),
});

/** Keyed by sample filename */
export const groundTruthSchema = z.record(z.string().min(1), groundTruthEntrySchema);

export type GroundTruthEntry = z.infer<typeof groundTruthEntrySchema>;
export type GroundTruth = z.infer<typeof groundTruthSchema>;

export const ACCEPTED_IMAGE_TYPES = [
  'image/png',
  'image/jpeg',
  'image/tiff',
  'image/webp',
  'image/bmp',
] as const;

export const MAX_IMAGE_SIZE_BYTES = 25 * 1024 * 1024; // 25MB

export function validateImageSize(sizeBytes: number): boolean {
  return sizeBytes > 0 && sizeBytes <= MAX_IMAGE_SIZE_BYTES;
}

export function validateImageType(mimeType: string): boolean {
  return (ACCEPTED_IMAGE_TYPES as readonly string[]).includes(mimeType);
}
