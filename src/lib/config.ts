/**
 * Environment-backed settings, parsed once on first access.
 */

import os from 'os';
import path from 'path';
import { z } from 'zod';

const envSchema = z.object({
  REDIS_URL: z.string().default('redis://localhost:6379'),
  OCR_LANGUAGES: z.string().min(1).default('eng'),
  OCR_CONFIDENCE_THRESHOLD: z.coerce.number().int().min(0).max(100).default(30),
  RECEIPT_WORKER_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
  RECEIPT_TMP_DIR: z.string().default(path.join(os.tmpdir(), 'receipt-engine')),
});

export type AppConfig = z.infer<typeof envSchema>;

let cached: AppConfig | null = null;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return envSchema.parse(env);
}

export function getConfig(): AppConfig {
  if (!cached) cached = loadConfig();
  return cached;
}
